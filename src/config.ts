// ═══════════════════════════════════════════════════════════════
//  Task configuration: schema, defaults, loading
// ═══════════════════════════════════════════════════════════════

import { readFile } from 'node:fs/promises';
import { z } from 'zod';

import {
  DEFAULT_FRICTION_DAMPING,
  DEFAULT_GROUND_HEIGHT,
  DEFAULT_RESTITUTION,
  DEFAULT_SAMPLE_RATE,
  REST_HEIGHT_EPSILON,
  REST_VELOCITY_EPSILON,
} from './constants';
import { ConfigError } from './errors';

const channel = z.number().int().min(0).max(255);
const pixels = z.number().int().positive();

export const taskConfigSchema = z.object({
  // Generation
  numSamples:          z.number().int().positive().default(10),
  domain:              z.string().min(1).default('gravity_physics'),
  randomSeed:          z.number().int().optional(),
  outputDir:           z.string().min(1).default('data/questions'),
  /** [width, height]: portrait for vertical motion. */
  imageSize:           z.tuple([pixels, pixels]).default([600, 800]),

  // Video
  generateVideos:      z.boolean().default(true),
  videoFps:            z.number().positive().default(15),
  holdFrames:          z.number().int().min(0).default(5),

  // Ball
  ballRadius:          z.number().positive().default(25),
  ballColor:           z.tuple([channel, channel, channel]).default([220, 60, 60]),

  // Initial conditions
  minHeight:           z.number().default(10),
  maxHeight:           z.number().default(25),
  minInitialVelocity:  z.number().default(-5),
  maxInitialVelocity:  z.number().default(10),
  minGravity:          z.number().positive().default(5),
  maxGravity:          z.number().positive().default(15),

  // Visuals
  showVelocityArrow:   z.boolean().default(true),
  showGravityArrow:    z.boolean().default(true),
  showHeightMarkers:   z.boolean().default(true),
  showGround:          z.boolean().default(true),

  // Simulation
  simulationDuration:  z.number().positive().default(3.0),
  pixelsPerMeter:      z.number().positive().default(25),
  groundHeightMeters:  z.number().default(DEFAULT_GROUND_HEIGHT),
  sampleRate:          z.number().positive().default(DEFAULT_SAMPLE_RATE),
  restitution:         z.number().min(0).max(1).default(DEFAULT_RESTITUTION),
  frictionDamping:     z.number().min(0).max(1).default(DEFAULT_FRICTION_DAMPING),
  restVelocityEpsilon: z.number().positive().default(REST_VELOCITY_EPSILON),
  restHeightEpsilon:   z.number().positive().default(REST_HEIGHT_EPSILON),
}).strict().superRefine((cfg, ctx) => {
  const ranges = [
    ['minHeight', 'maxHeight'],
    ['minInitialVelocity', 'maxInitialVelocity'],
    ['minGravity', 'maxGravity'],
  ] as const;
  for (const [lo, hi] of ranges) {
    if (cfg[lo] > cfg[hi]) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: [lo],
        message: `${lo} (${cfg[lo]}) must be <= ${hi} (${cfg[hi]})`,
      });
    }
  }
  if (cfg.minHeight < cfg.groundHeightMeters) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['minHeight'],
      message: `minHeight (${cfg.minHeight}) must be >= groundHeightMeters (${cfg.groundHeightMeters})`,
    });
  }
});

export type TaskConfig = z.infer<typeof taskConfigSchema>;
export type TaskConfigInput = z.input<typeof taskConfigSchema>;

/** Validate raw input and apply defaults; throws ConfigError listing every issue. */
export function parseTaskConfig(input: unknown): TaskConfig {
  const result = taskConfigSchema.safeParse(input);
  if (!result.success) {
    throw new ConfigError(result.error.issues.map(issue =>
      `${issue.path.length ? issue.path.join('.') : '(root)'}: ${issue.message}`));
  }
  return result.data;
}

/** Read an optional JSON config file and layer `overrides` on top. */
export async function loadTaskConfig(
  path?: string,
  overrides: Partial<TaskConfigInput> = {},
): Promise<TaskConfig> {
  let base: object = {};
  if (path) {
    const text = await readFile(path, 'utf-8');
    let raw: unknown;
    try {
      raw = JSON.parse(text);
    } catch (err) {
      throw new ConfigError([`${path}: ${err instanceof Error ? err.message : String(err)}`]);
    }
    if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
      throw new ConfigError([`${path}: expected a JSON object`]);
    }
    base = raw;
  }
  return parseTaskConfig({ ...base, ...overrides });
}
