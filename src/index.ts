// ═══════════════════════════════════════════════════════════════
//  Public API
// ═══════════════════════════════════════════════════════════════

export * from './types';
export * from './errors';
export {
  withDefaults,
  validateParams,
  sampleCount,
  stepKinematics,
  resolveGroundContact,
  simulate,
  mechanicalEnergy,
  isAtRest,
  bounceIndices,
  peakState,
  type SimulationInput,
} from './physics';
export {
  selectFrames,
  lastVisibleIndex,
  videoFrameIndices,
  projectFrames,
  type ProjectionCollaborators,
  type ProjectionOptions,
  type VideoTiming,
} from './frames';
export { CanvasImageRenderer, type RendererOptions } from './render';
export { FfmpegVideoEncoder, type FfmpegOptions } from './video';
export {
  taskConfigSchema,
  parseTaskConfig,
  loadTaskConfig,
  type TaskConfig,
  type TaskConfigInput,
} from './config';
export { TaskGenerator, taskIdFor, type DatasetSummary, type GeneratorCollaborators } from './generator';
export { writeTaskPair, taskDirectory, FILE_NAMES } from './output';
export { consoleLogger, silentLogger, type Logger } from './log';
