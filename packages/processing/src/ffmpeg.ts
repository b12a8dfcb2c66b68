/**
 * FFmpeg Wrapper
 *
 * Runs FFmpeg non-interactively with machine-readable progress on stdout.
 * Every invocation is cancellable through an AbortSignal.
 */

import { executeCommand, createLogger, type CommandRunner } from '@tracksmith/utils';
import { FFmpegProgressParser, type FFmpegProgress } from './progressParser.js';

const log = createLogger({ module: 'ffmpeg' });

export interface FFmpegRunOptions {
  signal?: AbortSignal;
  /** Input duration; progress snapshots carry a percentage when given */
  durationMs?: number;
  onProgress?: (progress: FFmpegProgress) => void;
}

export interface FFmpegRunResult {
  exitCode: number;
  stderr: string;
  timedOut: boolean;
  aborted: boolean;
  duration: number;
}

export interface FFmpegOptions {
  runner?: CommandRunner;
  timeout?: number;
}

/**
 * Arguments placed before every command: no stdin, overwrite, progress on stdout,
 * only errors on stderr
 */
export const FFMPEG_GLOBAL_ARGS: readonly string[] = [
  '-hide_banner',
  '-nostdin',
  '-y',
  '-loglevel', 'error',
  '-progress', 'pipe:1',
];

export class FFmpeg {
  private readonly ffmpegPath: string;
  private readonly runner: CommandRunner;
  private readonly timeout: number;

  constructor(ffmpegPath: string = 'ffmpeg', options: FFmpegOptions = {}) {
    this.ffmpegPath = ffmpegPath;
    this.runner = options.runner ?? executeCommand;
    this.timeout = options.timeout ?? 6 * 3600000; // large remuxes take a while
  }

  /**
   * Execute an FFmpeg command. `args` must not include the global arguments.
   * Spawn errors reject; everything else is reported through the result.
   */
  async execute(args: string[], options: FFmpegRunOptions = {}): Promise<FFmpegRunResult> {
    const fullArgs = [...FFMPEG_GLOBAL_ARGS, ...args];
    const parser = new FFmpegProgressParser(options.durationMs);

    log.debug({ command: this.ffmpegPath, args: fullArgs }, 'Running ffmpeg');

    const result = await this.runner(this.ffmpegPath, fullArgs, {
      timeout: this.timeout,
      signal: options.signal,
      onStdoutLine: options.onProgress
        ? (line) => {
            const progress = parser.parseLine(line);
            if (progress) options.onProgress?.(progress);
          }
        : undefined,
    });

    log.debug({ exitCode: result.exitCode, duration: result.duration }, 'ffmpeg finished');

    return {
      exitCode: result.exitCode,
      stderr: result.stderr,
      timedOut: result.timedOut,
      aborted: result.aborted,
      duration: result.duration,
    };
  }
}
