import { afterEach, describe, expect, it, vi } from 'vitest';

import { main, parseCliArgs } from '../src/cli';

describe('parseCliArgs', () => {
  it('maps flags onto config overrides', () => {
    expect(parseCliArgs(['-n', '5', '--seed', '42', '--no-videos', '-o', 'out'])).toEqual({
      help: false,
      configPath: undefined,
      overrides: { numSamples: 5, outputDir: 'out', randomSeed: 42, generateVideos: false },
    });
  });

  it('passes the config path through', () => {
    const options = parseCliArgs(['--config', 'task.json']);
    expect(options.configPath).toBe('task.json');
    expect(options.overrides).toEqual({});
  });

  it('rejects unknown options', () => {
    expect(() => parseCliArgs(['--frobnicate'])).toThrow();
  });
});

describe('main', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('prints usage for --help', async () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    await expect(main(['--help'])).resolves.toBe(0);
    expect(log).toHaveBeenCalledTimes(1);
    expect(String(log.mock.calls[0][0]).startsWith('Usage: vertical-bounce-generator')).toBe(true);
  });
});
