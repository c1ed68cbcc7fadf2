// ═══════════════════════════════════════════════════════════════
//  Physics engine: vertical motion with ground bounces
// ═══════════════════════════════════════════════════════════════

import {
  DEFAULT_SAMPLE_RATE,
  DEFAULT_RESTITUTION,
  DEFAULT_FRICTION_DAMPING,
  DEFAULT_GROUND_HEIGHT,
  REST_VELOCITY_EPSILON,
  REST_HEIGHT_EPSILON,
} from './constants';
import { InvalidParameterError } from './errors';
import type { ContactResult, MotionState, SimulationParameters, Trajectory } from './types';

/** The four launch values plus any overrides of the remaining defaults. */
export type SimulationInput =
  Pick<SimulationParameters, 'initialHeight' | 'initialVelocity' | 'gravity' | 'duration'>
  & Partial<SimulationParameters>;

/** Fill in sample rate, restitution, friction, ground and rest thresholds. */
export function withDefaults(input: SimulationInput): SimulationParameters {
  return {
    sampleRate: DEFAULT_SAMPLE_RATE,
    restitution: DEFAULT_RESTITUTION,
    frictionDamping: DEFAULT_FRICTION_DAMPING,
    groundHeight: DEFAULT_GROUND_HEIGHT,
    restVelocityEpsilon: REST_VELOCITY_EPSILON,
    restHeightEpsilon: REST_HEIGHT_EPSILON,
    ...input,
  };
}

// ── Validation ───────────────────────────────────────────────

const NUMERIC_FIELDS = [
  'initialHeight', 'initialVelocity', 'gravity', 'duration', 'sampleRate',
  'restitution', 'frictionDamping', 'groundHeight',
  'restVelocityEpsilon', 'restHeightEpsilon',
] as const satisfies readonly (keyof SimulationParameters)[];

/** Number of integration steps: round(duration · sampleRate). */
export function sampleCount(params: SimulationParameters): number {
  return Math.round(params.duration * params.sampleRate);
}

/**
 * Fail fast on parameters the integrator cannot use.
 * Throws InvalidParameterError naming the first offending field.
 */
export function validateParams(params: SimulationParameters): SimulationParameters {
  for (const field of NUMERIC_FIELDS) {
    if (!Number.isFinite(params[field])) {
      throw new InvalidParameterError(field, params[field], 'must be a finite number');
    }
  }

  if (params.gravity <= 0) throw new InvalidParameterError('gravity', params.gravity, 'must be > 0');
  if (params.sampleRate <= 0) throw new InvalidParameterError('sampleRate', params.sampleRate, 'must be > 0');
  if (params.duration <= 0) throw new InvalidParameterError('duration', params.duration, 'must be > 0');

  if (params.initialHeight < params.groundHeight) {
    throw new InvalidParameterError('initialHeight', params.initialHeight,
      `must be >= groundHeight ${params.groundHeight}`);
  }
  if (params.restitution < 0 || params.restitution > 1) {
    throw new InvalidParameterError('restitution', params.restitution, 'must be within [0, 1]');
  }
  if (params.frictionDamping < 0 || params.frictionDamping > 1) {
    throw new InvalidParameterError('frictionDamping', params.frictionDamping, 'must be within [0, 1]');
  }
  if (params.restVelocityEpsilon <= 0) {
    throw new InvalidParameterError('restVelocityEpsilon', params.restVelocityEpsilon, 'must be > 0');
  }
  if (params.restHeightEpsilon <= 0) {
    throw new InvalidParameterError('restHeightEpsilon', params.restHeightEpsilon, 'must be > 0');
  }

  if (sampleCount(params) < 1) {
    throw new InvalidParameterError('duration', params.duration,
      `duration · sampleRate must round to at least 1 sample (sampleRate ${params.sampleRate})`);
  }

  return params;
}

// ── Integrator ───────────────────────────────────────────────

/**
 * Advance one fixed step under constant gravity:
 *
 *   v' = v − g·Δt
 *   h' = h + v·Δt − ½·g·Δt²
 *
 * Position uses the pre-step velocity (closed-form, not symplectic Euler).
 */
export function stepKinematics(state: MotionState, gravity: number, dt: number): MotionState {
  return {
    time: state.time + dt,
    height: state.height + state.velocity * dt - 0.5 * gravity * dt * dt,
    velocity: state.velocity - gravity * dt,
  };
}

// ── Ground contact ───────────────────────────────────────────

/**
 * Resolve a candidate step that may have passed through the ground.
 *
 * Solves  ground = h + v·t − ½·g·t²  for the contact time t_c ∈ [0, Δt],
 * reflects the contact velocity by −restitution and pins the ball to the
 * ground.  If no root lies in the step (floating-point edge), the ball is
 * clamped to the ground with the contact speed implied by energy
 * conservation.
 *
 * Friction damping only enters rest detection: a bounce settles when the
 * damped speed |v_r|·(1 − friction) is below restVelocityEpsilon and the
 * step started within restHeightEpsilon of the ground.
 */
export function resolveGroundContact(
  previous: MotionState,
  candidate: MotionState,
  params: SimulationParameters,
  dt: number,
): ContactResult {
  const ground = params.groundHeight;
  if (candidate.height >= ground) {
    return { state: candidate, bounced: false, atRest: false };
  }

  const g = params.gravity;
  const h = previous.height;
  const v = previous.velocity;

  // ½g·t² − v·t − (h − ground) = 0  →  t = (v + √(v² + 2g(h − ground))) / g
  const disc = v * v + 2 * g * (h - ground);
  let vContact: number;
  const tContact = disc >= 0 ? (v + Math.sqrt(disc)) / g : NaN;
  if (tContact >= 0 && tContact <= dt) {
    vContact = v - g * tContact;
  } else {
    vContact = -Math.sqrt(Math.max(disc, 0));
  }

  const vReflected = -params.restitution * vContact;

  const settled = Math.abs(vReflected) * (1 - params.frictionDamping) < params.restVelocityEpsilon
    && Math.abs(previous.height - ground) <= params.restHeightEpsilon;
  if (settled) {
    return {
      state: { time: candidate.time, height: ground, velocity: 0 },
      bounced: true,
      atRest: true,
    };
  }

  return {
    state: { time: candidate.time, height: ground, velocity: vReflected },
    bounced: true,
    atRest: false,
  };
}

// ── Trajectory sampler ───────────────────────────────────────

/**
 * Run the integrator + contact resolver for round(duration · sampleRate)
 * steps.  Sample i is stamped at i / sampleRate.  Once the ball settles,
 * every later sample repeats the resting height and velocity, so the
 * output length is always sampleCount + 1.
 */
export function simulate(params: SimulationParameters): Trajectory {
  const p = validateParams(params);
  const steps = sampleCount(p);
  const dt = 1 / p.sampleRate;

  let current: MotionState = { time: 0, height: p.initialHeight, velocity: p.initialVelocity };
  const trajectory: MotionState[] = [current];
  let resting = false;

  for (let i = 1; i <= steps; i++) {
    const time = i / p.sampleRate;

    if (resting) {
      current = { time, height: current.height, velocity: current.velocity };
    } else {
      const candidate = stepKinematics(current, p.gravity, dt);
      const contact = resolveGroundContact(current, { ...candidate, time }, p, dt);
      current = contact.state;
      resting = contact.atRest;
    }

    trajectory.push(current);
  }

  return Object.freeze(trajectory);
}

// ── Trajectory queries ───────────────────────────────────────

/** Mechanical energy per unit weight (metres): (h − ground) + v² / 2g. */
export function mechanicalEnergy(state: MotionState, params: SimulationParameters): number {
  return (state.height - params.groundHeight) + (state.velocity * state.velocity) / (2 * params.gravity);
}

/** True for the terminal resting state: on the ground with zero velocity. */
export function isAtRest(state: MotionState, params: SimulationParameters): boolean {
  return state.height === params.groundHeight && state.velocity === 0;
}

/**
 * Indices of samples produced by a bounce: the ball sits on the ground
 * moving upward, or has just settled there.
 */
export function bounceIndices(trajectory: Trajectory, params: SimulationParameters): number[] {
  const out: number[] = [];
  for (let i = 1; i < trajectory.length; i++) {
    const s = trajectory[i];
    if (s.height !== params.groundHeight) continue;
    if (s.velocity > 0) {
      out.push(i);
    } else if (s.velocity === 0 && !isAtRest(trajectory[i - 1], params)) {
      out.push(i);
    }
  }
  return out;
}

/** Highest sample (earliest one on ties). */
export function peakState(trajectory: Trajectory): MotionState {
  let best = trajectory[0];
  for (const s of trajectory) {
    if (s.height > best.height) best = s;
  }
  return best;
}
