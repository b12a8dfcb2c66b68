/**
 * Track Merger
 *
 * Combines the original container with newly synthesized audio tracks.
 *
 * CRITICAL: Never re-encode video. Original audio and subtitle streams are
 * stream-copied in their original order; only the new tracks are encoded, and
 * they are appended after every original audio track.
 */

import { isNonEmptyFile } from '@tracksmith/utils';
import { CancelledError, MergeFailure, VerificationFailure } from '@tracksmith/core';
import type { StreamProber } from '@tracksmith/media';
import { FFmpegCommandBuilder } from './commandBuilder.js';
import { FFmpeg } from './ffmpeg.js';
import { DOWNMIX_PRESETS } from './presets.js';
import type { FFmpegProgress } from './progressParser.js';
import type { SynthesizedTrack } from './types.js';

export interface MergeOptions {
  sourcePath: string;
  tracks: SynthesizedTrack[];
  outputPath: string;
  durationMs?: number;
  signal?: AbortSignal;
  onProgress?: (progress: FFmpegProgress) => void;
}

export interface MergeResult {
  outputPath: string;
  audioStreamsKept: number;
  subtitleStreamsKept: number;
  duration: number;
}

export interface MergeLayout {
  /** Audio stream numbers of the source to copy; [0] when probing found none */
  audioStreamNumbers: number[];
  subtitleStreamNumbers: number[];
}

/**
 * Arguments for the remux
 */
export function buildMergeCommand(
  sourcePath: string,
  tracks: SynthesizedTrack[],
  layout: MergeLayout,
  outputPath: string
): string[] {
  const builder = new FFmpegCommandBuilder().addInput(sourcePath);
  for (const track of tracks) {
    builder.addInput(track.path);
  }

  builder.map(0, 'v:0');
  for (const streamNumber of layout.audioStreamNumbers) {
    builder.map(0, `a:${streamNumber}`);
  }
  tracks.forEach((_track, i) => builder.map(i + 1, 'a:0'));
  for (const streamNumber of layout.subtitleStreamNumbers) {
    builder.map(0, `s:${streamNumber}`);
  }

  builder.copyMetadata(0).copyChapters(0);

  builder.setCodec('v', 'copy');
  layout.audioStreamNumbers.forEach((_n, i) => builder.setCodec(`a:${i}`, 'copy'));
  tracks.forEach((track, i) => {
    const preset = DOWNMIX_PRESETS[track.target];
    builder.setCodec(`a:${layout.audioStreamNumbers.length + i}`, preset.codec, preset.bitrate);
  });
  layout.subtitleStreamNumbers.forEach((_n, i) => builder.setCodec(`s:${i}`, 'copy'));

  return builder.setOutput(outputPath).build();
}

export class TrackMerger {
  private readonly ffmpeg: FFmpeg;
  private readonly prober: StreamProber;

  constructor(prober: StreamProber, ffmpeg: FFmpeg = new FFmpeg()) {
    this.prober = prober;
    this.ffmpeg = ffmpeg;
  }

  /**
   * Stream layout of the source as it is right now
   */
  async inspect(sourcePath: string, signal?: AbortSignal): Promise<MergeLayout> {
    const audio = await this.prober.probeAudioStreams(sourcePath, signal);
    const subtitles = await this.prober.probeSubtitleStreams(sourcePath, signal);

    return {
      audioStreamNumbers: audio.length > 0 ? audio.map((s) => s.streamNumber) : [0],
      subtitleStreamNumbers: subtitles.map((s) => s.streamNumber),
    };
  }

  /**
   * Merge the new tracks into a copy of the source written to `outputPath`
   */
  async merge(options: MergeOptions): Promise<MergeResult> {
    const layout = await this.inspect(options.sourcePath, options.signal);
    const args = buildMergeCommand(options.sourcePath, options.tracks, layout, options.outputPath);

    const result = await this.ffmpeg.execute(args, {
      signal: options.signal,
      durationMs: options.durationMs,
      onProgress: options.onProgress,
    });

    if (result.aborted) {
      throw new CancelledError(options.sourcePath, 'merge');
    }
    if (result.exitCode !== 0) {
      throw new MergeFailure(options.sourcePath, result.exitCode, result.stderr);
    }
    if (!(await isNonEmptyFile(options.outputPath))) {
      throw new VerificationFailure(options.outputPath, 'merge');
    }

    return {
      outputPath: options.outputPath,
      audioStreamsKept: layout.audioStreamNumbers.length,
      subtitleStreamsKept: layout.subtitleStreamNumbers.length,
      duration: result.duration,
    };
  }
}
