// ═══════════════════════════════════════════════════════════════
//  Task prompts: templates per launch kind
// ═══════════════════════════════════════════════════════════════

import { readFileSync } from 'node:fs';
import { z } from 'zod';

import type { Rng } from './sampling';
import type { InitialConditions, LaunchKind } from './types';

const templateList = z.array(z.string().min(1)).nonempty();

const promptFileSchema = z.object({
  drop: templateList,
  upward: templateList,
  downward: templateList,
});

const PROMPTS = promptFileSchema.parse(
  JSON.parse(readFileSync(new URL('./prompts.json', import.meta.url), 'utf-8')),
);

/** Replace every `{key}` with its value; unknown keys are left as-is. */
export function fillTemplate(template: string, values: Record<string, string>): string {
  return template.replace(/\{(\w+)\}/g, (match, key: string) => values[key] ?? match);
}

export function getAllPrompts(kind: LaunchKind): readonly string[] {
  return PROMPTS[kind];
}

/** Pick a template for the launch kind and fill in the task's numbers. */
export function buildPrompt(rng: Rng, conditions: InitialConditions, duration: number): string {
  const templates = PROMPTS[conditions.kind];
  const template = templates[Math.floor(rng() * templates.length)];
  return fillTemplate(template, {
    height: conditions.initialHeight.toFixed(1),
    speed: Math.abs(conditions.initialVelocity).toFixed(1),
    gravity: conditions.gravity.toFixed(1),
    duration: String(duration),
  });
}
