// ═══════════════════════════════════════════════════════════════
//  Video encoder: PNG frames piped through ffmpeg into MP4
// ═══════════════════════════════════════════════════════════════

import { spawn, spawnSync } from 'node:child_process';
import { Readable } from 'node:stream';

import { EncodingUnavailableError, VideoEncodingError } from './errors';
import type { VideoEncoder } from './types';

export interface FfmpegOptions {
  /** Executable name or path. */
  binary?: string;
  codec?: string;
}

export class FfmpegVideoEncoder implements VideoEncoder<Buffer, Buffer> {
  readonly binary: string;
  readonly codec: string;

  constructor(options: FfmpegOptions = {}) {
    this.binary = options.binary ?? 'ffmpeg';
    this.codec = options.codec ?? 'libx264';
  }

  /** Probe `<binary> -version`. */
  static isAvailable(binary = 'ffmpeg'): boolean {
    const probe = spawnSync(binary, ['-version'], { stdio: 'ignore' });
    return !probe.error && probe.status === 0;
  }

  args(fps: number): string[] {
    return [
      '-hide_banner', '-loglevel', 'error', '-y',
      '-f', 'image2pipe', '-framerate', String(fps), '-c:v', 'png', '-i', 'pipe:0',
      '-c:v', this.codec, '-pix_fmt', 'yuv420p',
      // Fragmented MP4 so the muxer never needs to seek the output pipe
      '-movflags', 'frag_keyframe+empty_moov',
      '-f', 'mp4', 'pipe:1',
    ];
  }

  encode(frames: readonly Buffer[], fps: number): Promise<Buffer> {
    if (frames.length === 0) {
      return Promise.reject(new RangeError('Cannot encode a video with no frames'));
    }

    return new Promise<Buffer>((resolve, reject) => {
      const proc = spawn(this.binary, this.args(fps), { stdio: ['pipe', 'pipe', 'pipe'] });
      const chunks: Buffer[] = [];
      let stderr = '';

      proc.stdout.on('data', (chunk: Buffer) => chunks.push(chunk));
      proc.stderr.on('data', (chunk: Buffer) => {
        stderr = (stderr + chunk.toString()).slice(-4000);
      });

      proc.on('error', (err: NodeJS.ErrnoException) => {
        reject(err.code === 'ENOENT' ? new EncodingUnavailableError() : err);
      });

      proc.on('close', (code) => {
        if (code === 0) {
          resolve(Buffer.concat(chunks));
        } else {
          const tail = stderr.trim().split('\n').slice(-3).join(' | ');
          reject(new VideoEncodingError(code, tail || 'no diagnostic output'));
        }
      });

      // EPIPE means ffmpeg exited early; the exit code reports why.
      proc.stdin.on('error', (err: NodeJS.ErrnoException) => {
        if (err.code !== 'EPIPE') reject(err);
      });

      // pipe() honours stdin backpressure
      Readable.from(frames).pipe(proc.stdin);
    });
  }
}
