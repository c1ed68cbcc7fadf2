// ═══════════════════════════════════════════════════════════════
//  Output writer: one directory per task
// ═══════════════════════════════════════════════════════════════

import { mkdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';

import type { TaskPair } from './types';

export const FILE_NAMES = {
  firstFrame: 'first_frame.png',
  finalFrame: 'final_frame.png',
  prompt: 'prompt.txt',
  video: 'ground_truth.mp4',
  metadata: 'metadata.json',
} as const;

export function taskDirectory(outputDir: string, domain: string, taskId: string): string {
  return join(outputDir, `${domain}_task`, taskId);
}

/**
 * Write <outputDir>/<domain>_task/<taskId>/ with both frames, the prompt,
 * the metadata and (when present) the video.  Returns the directory.
 */
export async function writeTaskPair(outputDir: string, pair: TaskPair): Promise<string> {
  const dir = taskDirectory(outputDir, pair.domain, pair.taskId);
  await mkdir(dir, { recursive: true });

  await writeFile(join(dir, FILE_NAMES.firstFrame), pair.firstImage);
  await writeFile(join(dir, FILE_NAMES.finalFrame), pair.finalImage);
  await writeFile(join(dir, FILE_NAMES.prompt), pair.prompt + '\n', 'utf-8');
  if (pair.video) {
    await writeFile(join(dir, FILE_NAMES.video), pair.video);
  }
  await writeFile(
    join(dir, FILE_NAMES.metadata),
    JSON.stringify({ taskId: pair.taskId, domain: pair.domain, ...pair.metadata }, null, 2) + '\n',
    'utf-8',
  );

  return dir;
}
