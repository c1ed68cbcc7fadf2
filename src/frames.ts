// ═══════════════════════════════════════════════════════════════
//  Frame selection & video projection
// ═══════════════════════════════════════════════════════════════

import { EncodingUnavailableError } from './errors';
import type {
  FrameSelection,
  ImageRenderer,
  MotionState,
  ProjectedFrames,
  SimulationParameters,
  Trajectory,
  VideoEncoder,
} from './types';

export interface VideoTiming {
  fps: number;
  sampleRate: number;
}

/**
 * Trajectory sample indices for a video at `fps`, covering samples
 * 0 … lastIndex.  Frame k shows the sample nearest to k / fps; the last
 * frame is always lastIndex.
 */
export function videoFrameIndices(lastIndex: number, sampleRate: number, fps: number): number[] {
  const lastTime = lastIndex / sampleRate;
  const frameCount = Math.floor(lastTime * fps + 1e-9);
  const indices: number[] = [];
  for (let k = 0; k <= frameCount; k++) {
    indices.push(Math.min(Math.round((k / fps) * sampleRate), lastIndex));
  }
  if (indices[indices.length - 1] !== lastIndex) indices.push(lastIndex);
  return indices;
}

/**
 * Reverse scan for the most recent sample satisfying `isVisible`.
 * Returns -1 when none is.
 */
export function lastVisibleIndex(
  trajectory: Trajectory,
  isVisible: (state: MotionState) => boolean,
): number {
  for (let i = trajectory.length - 1; i >= 0; i--) {
    if (isVisible(trajectory[i])) return i;
  }
  return -1;
}

/**
 * Pick the first state, the last visible state and (when `video` is given)
 * the samples that make up the video.  Falls back to the literal last
 * sample if the ball is never visible.  The video always resamples the
 * whole trajectory, whatever the final state.
 */
export function selectFrames(
  trajectory: Trajectory,
  isVisible: (state: MotionState) => boolean,
  video?: VideoTiming,
): FrameSelection {
  if (trajectory.length === 0) {
    throw new RangeError('Cannot select frames from an empty trajectory');
  }

  const visible = lastVisibleIndex(trajectory, isVisible);
  const finalIndex = visible >= 0 ? visible : trajectory.length - 1;

  return {
    firstIndex: 0,
    finalIndex,
    first: trajectory[0],
    final: trajectory[finalIndex],
    finalVisible: visible >= 0,
    videoIndices: video
      ? videoFrameIndices(trajectory.length - 1, video.sampleRate, video.fps)
      : null,
  };
}

// ── Projection through the rendering collaborators ───────────

export interface ProjectionCollaborators<Image, Video> {
  renderer: ImageRenderer<Image>;
  /** Absent when no encoding backend is installed. */
  encoder?: VideoEncoder<Image, Video> | null;
}

export interface ProjectionOptions {
  video: boolean;
  fps: number;
  /** Copies of the first and last video frame added before / after the motion. */
  holdFrames: number;
}

/**
 * Render the first and final images and, if requested, encode a video of
 * the motion.  A missing encoder (or EncodingUnavailableError) only skips
 * the video; every other failure propagates.
 */
export async function projectFrames<Image, Video>(
  trajectory: Trajectory,
  params: SimulationParameters,
  collaborators: ProjectionCollaborators<Image, Video>,
  options: ProjectionOptions,
): Promise<ProjectedFrames<Image, Video>> {
  const { renderer, encoder } = collaborators;
  const selection = selectFrames(
    trajectory,
    (state) => renderer.isVisible(state, params),
    options.video ? { fps: options.fps, sampleRate: params.sampleRate } : undefined,
  );

  const firstImage = renderer.render(selection.first, params, 'first');
  const finalImage = renderer.render(selection.final, params, 'final');

  if (!selection.videoIndices) {
    return { selection, firstImage, finalImage, video: null, videoSkipped: 'not-requested' };
  }
  if (!encoder) {
    return { selection, firstImage, finalImage, video: null, videoSkipped: 'encoding-unavailable' };
  }

  const indices = selection.videoIndices;
  const frames: Image[] = [];
  for (let h = 0; h < options.holdFrames; h++) frames.push(firstImage);
  for (let k = 0; k < indices.length; k++) {
    const idx = indices[k];
    if (idx === selection.firstIndex) {
      frames.push(firstImage);
    } else if (idx === selection.finalIndex) {
      frames.push(finalImage);
    } else {
      frames.push(renderer.render(trajectory[idx], params, 'frame'));
    }
  }
  const lastFrame = frames[frames.length - 1];
  for (let h = 0; h < options.holdFrames; h++) frames.push(lastFrame);

  try {
    const video = await encoder.encode(frames, options.fps);
    return { selection, firstImage, finalImage, video, videoSkipped: null };
  } catch (err) {
    if (err instanceof EncodingUnavailableError) {
      return { selection, firstImage, finalImage, video: null, videoSkipped: 'encoding-unavailable' };
    }
    throw err;
  }
}
