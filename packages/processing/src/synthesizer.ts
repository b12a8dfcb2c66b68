/**
 * Downmix Synthesizer
 *
 * Produces a standalone encoded audio file holding one remixed track derived
 * from a selected source stream.
 *
 * CRITICAL: The source stream is selected by its audio stream number
 * (`0:a:<n>`), never by its container index.
 */

import { isNonEmptyFile, getFileSizeBytes } from '@tracksmith/utils';
import {
  CancelledError,
  SynthesisFailure,
  VerificationFailure,
  type SynthesisTarget,
} from '@tracksmith/core';
import type { SourceStream } from '@tracksmith/media';
import { FFmpegCommandBuilder } from './commandBuilder.js';
import { FFmpeg } from './ffmpeg.js';
import { DOWNMIX_PRESETS, getDownmixFilter } from './presets.js';
import type { FFmpegProgress } from './progressParser.js';

export interface SynthesizeOptions {
  sourcePath: string;
  source: SourceStream;
  target: SynthesisTarget;
  outputPath: string;
  durationMs?: number;
  signal?: AbortSignal;
  onProgress?: (progress: FFmpegProgress) => void;
}

export interface SynthesizeResult {
  outputPath: string;
  size: number;
  duration: number;
}

/**
 * Arguments for extracting and remixing one track
 */
export function buildSynthesisCommand(
  sourcePath: string,
  source: SourceStream,
  target: SynthesisTarget,
  outputPath: string
): string[] {
  const preset = DOWNMIX_PRESETS[target];

  return new FFmpegCommandBuilder()
    .addInput(sourcePath)
    .map(0, `a:${source.streamNumber}`)
    .addAudioFilter(getDownmixFilter(target, source.channelCount))
    .setCodec('a', preset.codec, preset.bitrate)
    .setOutput(outputPath)
    .build();
}

export class DownmixSynthesizer {
  private readonly ffmpeg: FFmpeg;

  constructor(ffmpeg: FFmpeg = new FFmpeg()) {
    this.ffmpeg = ffmpeg;
  }

  /**
   * Synthesize one track. Throws SynthesisFailure on a non-zero exit and
   * VerificationFailure when the output is missing or empty.
   */
  async synthesize(options: SynthesizeOptions): Promise<SynthesizeResult> {
    const args = buildSynthesisCommand(
      options.sourcePath,
      options.source,
      options.target,
      options.outputPath
    );

    const result = await this.ffmpeg.execute(args, {
      signal: options.signal,
      durationMs: options.durationMs,
      onProgress: options.onProgress,
    });

    if (result.aborted) {
      throw new CancelledError(options.sourcePath, 'synthesis');
    }
    if (result.exitCode !== 0) {
      throw new SynthesisFailure(options.sourcePath, result.exitCode, result.stderr, options.target);
    }
    if (!(await isNonEmptyFile(options.outputPath))) {
      throw new VerificationFailure(options.outputPath, 'synthesis');
    }

    return {
      outputPath: options.outputPath,
      size: await getFileSizeBytes(options.outputPath),
      duration: result.duration,
    };
  }
}
