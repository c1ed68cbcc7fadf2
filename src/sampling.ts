// ═══════════════════════════════════════════════════════════════
//  Initial-condition sampling
// ═══════════════════════════════════════════════════════════════

import seedrandom from 'seedrandom';

import type { TaskConfig } from './config';
import type { InitialConditions, LaunchKind, SimulationParameters } from './types';

export type Rng = () => number;

/**
 * Independent stream for task `index`.  With a seed the stream is
 * reproducible; without one it is seeded from the environment.
 */
export function createTaskRng(seed: number | undefined, index: number): Rng {
  return seed === undefined ? seedrandom() : seedrandom(String(seed + index));
}

/** Round to one decimal place, never returning -0. */
export function roundTenth(x: number): number {
  const r = Math.round(x * 10) / 10;
  return r === 0 ? 0 : r;
}

/** Uniform draw rounded to 0.1, clamped back into [lo, hi]. */
function drawTenth(rng: Rng, lo: number, hi: number): number {
  const x = roundTenth(lo + rng() * (hi - lo));
  return Math.min(Math.max(x, lo), hi);
}

export function launchKind(initialVelocity: number): LaunchKind {
  if (initialVelocity > 0) return 'upward';
  if (initialVelocity < 0) return 'downward';
  return 'drop';
}

/**
 * Draw height, velocity and gravity uniformly from the configured ranges.
 * Each value is rounded to 0.1 and stays within its range.
 */
export function sampleInitialConditions(rng: Rng, config: TaskConfig): InitialConditions {
  const initialHeight = drawTenth(rng, config.minHeight, config.maxHeight);
  const initialVelocity = drawTenth(rng, config.minInitialVelocity, config.maxInitialVelocity);
  const gravity = drawTenth(rng, config.minGravity, config.maxGravity);
  return { initialHeight, initialVelocity, gravity, kind: launchKind(initialVelocity) };
}

export function toSimulationParameters(
  conditions: InitialConditions,
  config: TaskConfig,
): SimulationParameters {
  return {
    initialHeight: conditions.initialHeight,
    initialVelocity: conditions.initialVelocity,
    gravity: conditions.gravity,
    duration: config.simulationDuration,
    sampleRate: config.sampleRate,
    restitution: config.restitution,
    frictionDamping: config.frictionDamping,
    groundHeight: config.groundHeightMeters,
    restVelocityEpsilon: config.restVelocityEpsilon,
    restHeightEpsilon: config.restHeightEpsilon,
  };
}
