// ═══════════════════════════════════════════════════════════════
//  Type definitions for the vertical bounce generator
// ═══════════════════════════════════════════════════════════════

/** Inputs to one vertical-motion simulation.  SI units, +velocity = up. */
export interface SimulationParameters {
  initialHeight: number;
  initialVelocity: number;
  gravity: number;
  duration: number;
  /** Samples per second; also the integration rate (Δt = 1 / sampleRate). */
  sampleRate: number;
  restitution: number;
  frictionDamping: number;
  groundHeight: number;
  restVelocityEpsilon: number;
  restHeightEpsilon: number;
}

/** Single recorded sample of the ball. */
export interface MotionState {
  readonly time: number;
  readonly height: number;
  readonly velocity: number;
}

/** Ordered samples, index i at time i / sampleRate. */
export type Trajectory = readonly MotionState[];

/** Outcome of resolving one integration step against the ground plane. */
export interface ContactResult {
  state: MotionState;
  bounced: boolean;
  atRest: boolean;
}

/** Which image a render call is producing. */
export type FrameRole = 'first' | 'final' | 'frame';

/**
 * States chosen from a trajectory.  Indices point into the trajectory
 * the selection was made from.
 */
export interface FrameSelection {
  firstIndex: number;
  finalIndex: number;
  first: MotionState;
  final: MotionState;
  /** False when no sample was visible and the literal last one was used. */
  finalVisible: boolean;
  videoIndices: number[] | null;
}

/** Renders single states to encoded images and answers visibility. */
export interface ImageRenderer<Image = Buffer> {
  render(state: MotionState, params: SimulationParameters, role: FrameRole): Image;
  isVisible(state: MotionState, params: SimulationParameters): boolean;
}

/** Turns an ordered list of encoded frames into a video payload. */
export interface VideoEncoder<Image = Buffer, Video = Buffer> {
  encode(frames: readonly Image[], fps: number): Promise<Video>;
}

/** Images and (optional) video produced for one trajectory. */
export interface ProjectedFrames<Image = Buffer, Video = Buffer> {
  selection: FrameSelection;
  firstImage: Image;
  finalImage: Image;
  video: Video | null;
  videoSkipped: 'not-requested' | 'encoding-unavailable' | null;
}

/** How the ball leaves its starting height. */
export type LaunchKind = 'drop' | 'upward' | 'downward';

/** Randomly drawn initial conditions for one task. */
export interface InitialConditions {
  initialHeight: number;
  initialVelocity: number;
  gravity: number;
  kind: LaunchKind;
}

/** Metadata persisted next to each generated task. */
export interface TaskMetadata {
  conditions: InitialConditions;
  params: SimulationParameters;
  sampleCount: number;
  bounceCount: number;
  firstState: MotionState;
  finalState: MotionState;
  finalVisible: boolean;
  videoFrameCount: number;
}

/** One generated example: prompt, first/final image and optional video. */
export interface TaskPair {
  taskId: string;
  domain: string;
  prompt: string;
  firstImage: Buffer;
  finalImage: Buffer;
  video: Buffer | null;
  metadata: TaskMetadata;
}
