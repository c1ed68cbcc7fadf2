// ═══════════════════════════════════════════════════════════════
//  Task generator: conditions → trajectory → frames → task pair
// ═══════════════════════════════════════════════════════════════

import type { TaskConfig } from './config';
import { projectFrames } from './frames';
import { consoleLogger, logBanner, type Logger } from './log';
import { writeTaskPair } from './output';
import { bounceIndices, sampleCount, simulate } from './physics';
import { buildPrompt } from './prompts';
import { CanvasImageRenderer } from './render';
import { createTaskRng, sampleInitialConditions, toSimulationParameters } from './sampling';
import type { ImageRenderer, TaskPair, VideoEncoder } from './types';
import { FfmpegVideoEncoder } from './video';

export interface GeneratorCollaborators {
  renderer?: ImageRenderer<Buffer>;
  /** `null` disables video; omitted means "use ffmpeg if installed". */
  encoder?: VideoEncoder<Buffer, Buffer> | null;
  logger?: Logger;
}

export interface DatasetSummary {
  outputDir: string;
  taskCount: number;
  videoCount: number;
  taskDirs: string[];
}

export function taskIdFor(domain: string, index: number): string {
  return `${domain}_${String(index).padStart(4, '0')}`;
}

export class TaskGenerator {
  readonly config: TaskConfig;
  private readonly renderer: ImageRenderer<Buffer>;
  private readonly encoder: VideoEncoder<Buffer, Buffer> | null;
  private readonly logger: Logger;
  private warnedNoVideo = false;

  constructor(config: TaskConfig, collaborators: GeneratorCollaborators = {}) {
    this.config = config;
    this.logger = collaborators.logger ?? consoleLogger;
    this.renderer = collaborators.renderer ?? CanvasImageRenderer.fromConfig(config);

    if (!config.generateVideos) {
      this.encoder = null;
    } else if (collaborators.encoder !== undefined) {
      this.encoder = collaborators.encoder;
    } else {
      this.encoder = FfmpegVideoEncoder.isAvailable() ? new FfmpegVideoEncoder() : null;
    }
  }

  /** Build one task.  Task `index` always draws from the same RNG stream. */
  async generateTaskPair(taskId: string, index: number): Promise<TaskPair> {
    const cfg = this.config;
    const rng = createTaskRng(cfg.randomSeed, index);
    const conditions = sampleInitialConditions(rng, cfg);
    const params = toSimulationParameters(conditions, cfg);
    const trajectory = simulate(params);

    const projected = await projectFrames(trajectory, params,
      { renderer: this.renderer, encoder: this.encoder },
      { video: cfg.generateVideos, fps: cfg.videoFps, holdFrames: cfg.holdFrames });

    if (projected.videoSkipped === 'encoding-unavailable' && !this.warnedNoVideo) {
      this.logger.warn('no video encoder available (install ffmpeg); writing images only');
      this.warnedNoVideo = true;
    }

    const { selection } = projected;
    const videoFrameCount = projected.video && selection.videoIndices
      ? selection.videoIndices.length + 2 * cfg.holdFrames
      : 0;

    return {
      taskId,
      domain: cfg.domain,
      prompt: buildPrompt(rng, conditions, cfg.simulationDuration),
      firstImage: projected.firstImage,
      finalImage: projected.finalImage,
      video: projected.video,
      metadata: {
        conditions,
        params,
        sampleCount: sampleCount(params),
        bounceCount: bounceIndices(trajectory, params).length,
        firstState: selection.first,
        finalState: selection.final,
        finalVisible: selection.finalVisible,
        videoFrameCount,
      },
    };
  }

  /** Generate and write `numSamples` tasks under `outputDir`. */
  async generateDataset(): Promise<DatasetSummary> {
    const cfg = this.config;
    logBanner(this.logger, `Generating ${cfg.numSamples} ${cfg.domain} tasks`);
    this.logger.info(`Output: ${cfg.outputDir}`);
    this.logger.info(`Seed: ${cfg.randomSeed ?? 'random'}`);
    this.logger.info(`Videos: ${this.encoder ? `${cfg.videoFps} fps` : 'off'}\n`);

    const summary: DatasetSummary = {
      outputDir: cfg.outputDir,
      taskCount: 0,
      videoCount: 0,
      taskDirs: [],
    };

    for (let i = 0; i < cfg.numSamples; i++) {
      const pair = await this.generateTaskPair(taskIdFor(cfg.domain, i), i);
      const dir = await writeTaskPair(cfg.outputDir, pair);
      summary.taskCount++;
      if (pair.video) summary.videoCount++;
      summary.taskDirs.push(dir);
      this.logger.info(`  [${i + 1}/${cfg.numSamples}] ${pair.taskId}  `
        + `h0=${pair.metadata.conditions.initialHeight}m v0=${pair.metadata.conditions.initialVelocity}m/s `
        + `g=${pair.metadata.conditions.gravity}m/s²  bounces=${pair.metadata.bounceCount}`);
    }

    this.logger.info(`\nDone: ${summary.taskCount} tasks, ${summary.videoCount} videos`);
    return summary;
  }
}
