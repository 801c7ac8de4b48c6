/**
 * FFmpeg video encoder
 *
 * Streams raw RGB frames into an ffmpeg subprocess on stdin.
 */

import { spawn, ChildProcessByStdio } from 'node:child_process';
import { once } from 'node:events';
import { Readable, Writable } from 'node:stream';
import { RasterFrame, VideoCodecParams, VideoEncoder } from '../types';
import { describeError, OutputError } from './errors';

const STDERR_TAIL_LENGTH = 2000;

export interface FfmpegVideoOptions {
  outputPath: string;
  width: number;
  height: number;
  frameRate: number;
  codec: VideoCodecParams;
}

/**
 * Arguments for reading rgb24 frames from stdin and writing the output file
 */
export function buildFfmpegArgs(options: FfmpegVideoOptions): string[] {
  return [
    '-y',
    '-f', 'rawvideo',
    '-pix_fmt', 'rgb24',
    '-s', `${options.width}x${options.height}`,
    '-r', String(options.frameRate),
    '-i', '-',
    '-c:v', options.codec.codec,
    '-pix_fmt', options.codec.pixelFormat,
    options.outputPath,
  ];
}

export class FfmpegVideoEncoder implements VideoEncoder {
  private readonly process: ChildProcessByStdio<Writable, null, Readable>;
  private readonly exited: Promise<number | null>;
  private stderr = '';
  private failure?: Error;
  private finalized = false;

  constructor(private readonly options: FfmpegVideoOptions) {
    this.process = spawn(options.codec.ffmpegPath, buildFfmpegArgs(options), {
      stdio: ['pipe', 'ignore', 'pipe'],
    });

    this.process.stderr.on('data', (data: Buffer) => {
      this.stderr = (this.stderr + data.toString()).slice(-STDERR_TAIL_LENGTH);
    });

    // A dead encoder shows up as EPIPE on stdin
    this.process.stdin.on('error', (error) => {
      this.failure ??= error;
    });

    this.exited = new Promise((resolve) => {
      this.process.on('error', (error) => {
        this.failure ??= error;
        resolve(null);
      });
      this.process.on('close', (code) => resolve(code));
    });
  }

  async append(frame: RasterFrame): Promise<void> {
    this.throwIfFailed();
    if (this.finalized) throw new OutputError('Video encoder is already finalized', this.options.outputPath);
    if (frame.width !== this.options.width || frame.height !== this.options.height) {
      throw new OutputError(
        `Frame is ${frame.width}x${frame.height}, encoder expects ${this.options.width}x${this.options.height}`,
        this.options.outputPath
      );
    }

    if (!this.process.stdin.write(frame.data)) {
      await Promise.race([once(this.process.stdin, 'drain'), this.exited]);
    }
    this.throwIfFailed();
  }

  async finalize(): Promise<void> {
    if (!this.finalized) {
      this.finalized = true;
      this.process.stdin.end();
    }
    const code = await this.exited;
    this.throwIfFailed();
    if (code !== 0) {
      throw new OutputError(
        `ffmpeg exited with code ${code}: ${this.stderr.trim()}`,
        this.options.outputPath
      );
    }
  }

  private throwIfFailed() {
    if (this.failure) {
      throw new OutputError(`ffmpeg failed: ${describeError(this.failure)}`, this.options.outputPath);
    }
  }
}
