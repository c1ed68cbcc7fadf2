import { describe, expect, it } from 'vitest';

import { buildPrompt, fillTemplate, getAllPrompts } from '../src/prompts';
import type { LaunchKind } from '../src/types';

describe('fillTemplate', () => {
  it('substitutes known keys and keeps unknown ones', () => {
    expect(fillTemplate('{a} and {b}', { a: '1' })).toBe('1 and {b}');
  });
});

describe('getAllPrompts', () => {
  const kinds: LaunchKind[] = ['drop', 'upward', 'downward'];

  it.each(kinds)('has templates mentioning height, gravity and duration for %s', (kind) => {
    const templates = getAllPrompts(kind);
    expect(templates.length).toBeGreaterThan(0);
    for (const t of templates) {
      expect(t).toContain('{height}');
      expect(t).toContain('{gravity}');
      expect(t).toContain('{duration}');
    }
  });

  it('only moving launches mention a speed', () => {
    expect(getAllPrompts('drop').some(t => t.includes('{speed}'))).toBe(false);
    expect(getAllPrompts('upward').every(t => t.includes('{speed}'))).toBe(true);
    expect(getAllPrompts('downward').every(t => t.includes('{speed}'))).toBe(true);
  });
});

describe('buildPrompt', () => {
  it('fills a drop template', () => {
    const prompt = buildPrompt(() => 0,
      { initialHeight: 12.7, initialVelocity: 0, gravity: 11.4, kind: 'drop' }, 3);
    expect(prompt).toBe('A ball is released from rest at a height of 12.7 m above the ground. '
      + 'Gravity is 11.4 m/s². Animate the ball\'s vertical motion over the next 3 seconds, '
      + 'including any bounces off the ground.');
  });

  it('reports a downward launch speed without its sign', () => {
    const prompt = buildPrompt(() => 0.99,
      { initialHeight: 20.2, initialVelocity: -2.9, gravity: 8.5, kind: 'downward' }, 3);
    expect(prompt).toBe('Push a ball downward at 2.9 m/s from a height of 20.2 m. '
      + 'With gravity at 8.5 m/s², animate how it falls and bounces during 3 seconds.');
  });
});
