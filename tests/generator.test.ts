import { mkdtemp, readdir, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { parseTaskConfig, type TaskConfigInput } from '../src/config';
import { EncodingUnavailableError } from '../src/errors';
import { TaskGenerator, taskIdFor } from '../src/generator';
import { silentLogger, type Logger } from '../src/log';
import type { FrameRole, ImageRenderer, MotionState, VideoEncoder } from '../src/types';

class FakeRenderer implements ImageRenderer<Buffer> {
  render(state: MotionState, _params: unknown, role: FrameRole): Buffer {
    return Buffer.from(`${role}:${state.time.toFixed(3)}`);
  }

  isVisible(): boolean {
    return true;
  }
}

class CountingEncoder implements VideoEncoder<Buffer, Buffer> {
  frameCounts: number[] = [];

  async encode(frames: readonly Buffer[]): Promise<Buffer> {
    this.frameCounts.push(frames.length);
    return Buffer.from('mp4');
  }
}

class MissingEncoder implements VideoEncoder<Buffer, Buffer> {
  async encode(): Promise<Buffer> {
    throw new EncodingUnavailableError();
  }
}

class CapturingLogger implements Logger {
  infos: string[] = [];
  warnings: string[] = [];

  info(message: string): void {
    this.infos.push(message);
  }

  warn(message: string): void {
    this.warnings.push(message);
  }
}

describe('taskIdFor', () => {
  it('zero-pads the index', () => {
    expect(taskIdFor('gravity_physics', 7)).toBe('gravity_physics_0007');
  });
});

describe('TaskGenerator', () => {
  let root: string;

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), 'bounce-gen-'));
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  const configFor = (overrides: TaskConfigInput = {}) => parseTaskConfig({
    numSamples: 3, randomSeed: 42, outputDir: root, sampleRate: 30, ...overrides,
  });

  it('builds a task pair with held video frames', async () => {
    const encoder = new CountingEncoder();
    const generator = new TaskGenerator(configFor(),
      { renderer: new FakeRenderer(), encoder, logger: new CapturingLogger() });
    const pair = await generator.generateTaskPair('gravity_physics_0000', 0);

    expect(pair.taskId).toBe('gravity_physics_0000');
    expect(pair.domain).toBe('gravity_physics');
    expect(pair.firstImage.toString()).toBe('first:0.000');
    expect(pair.finalImage.toString()).toBe('final:3.000');
    expect(pair.video?.toString()).toBe('mp4');
    expect(pair.metadata.sampleCount).toBe(90);
    expect(pair.metadata.videoFrameCount).toBe(56);
    expect(encoder.frameCounts).toEqual([56]);
    expect(pair.metadata.firstState).toEqual({
      time: 0,
      height: pair.metadata.conditions.initialHeight,
      velocity: pair.metadata.conditions.initialVelocity,
    });
    expect(pair.prompt).toContain(pair.metadata.conditions.initialHeight.toFixed(1));
  });

  it('is reproducible for a fixed seed', async () => {
    const make = () => new TaskGenerator(configFor(),
      { renderer: new FakeRenderer(), encoder: null, logger: silentLogger });
    const a = await make().generateTaskPair('t', 2);
    const b = await make().generateTaskPair('t', 2);
    expect(a.prompt).toBe(b.prompt);
    expect(a.metadata).toEqual(b.metadata);
  });

  it('warns once when no encoder is available and still writes images', async () => {
    const logger = new CapturingLogger();
    const generator = new TaskGenerator(configFor(),
      { renderer: new FakeRenderer(), encoder: new MissingEncoder(), logger });
    const summary = await generator.generateDataset();

    expect(summary.taskCount).toBe(3);
    expect(summary.videoCount).toBe(0);
    expect(logger.warnings).toEqual(['no video encoder available (install ffmpeg); writing images only']);
    expect((await readdir(summary.taskDirs[0])).sort())
      .toEqual(['final_frame.png', 'first_frame.png', 'metadata.json', 'prompt.txt']);
  });

  it('writes one directory per task with its video', async () => {
    const logger = new CapturingLogger();
    const generator = new TaskGenerator(configFor(),
      { renderer: new FakeRenderer(), encoder: new CountingEncoder(), logger });
    const summary = await generator.generateDataset();

    expect(summary.videoCount).toBe(3);
    expect(summary.taskDirs).toEqual([0, 1, 2].map(i =>
      join(root, 'gravity_physics_task', taskIdFor('gravity_physics', i))));
    expect(await readdir(summary.taskDirs[2])).toContain('ground_truth.mp4');
    expect(logger.infos[1]).toBe('  Generating 3 gravity_physics tasks');
    expect(logger.infos[logger.infos.length - 1]).toBe('\nDone: 3 tasks, 3 videos');
  });

  it('skips video entirely when disabled', async () => {
    const logger = new CapturingLogger();
    const encoder = new CountingEncoder();
    const generator = new TaskGenerator(configFor({ generateVideos: false }),
      { renderer: new FakeRenderer(), encoder, logger });
    const pair = await generator.generateTaskPair('t', 0);

    expect(pair.video).toBeNull();
    expect(pair.metadata.videoFrameCount).toBe(0);
    expect(encoder.frameCounts).toEqual([]);
    expect(logger.warnings).toEqual([]);
  });
});
