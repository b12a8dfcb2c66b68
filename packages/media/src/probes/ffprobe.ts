/**
 * FFProbe Wrapper
 *
 * Lists the audio and subtitle streams of a container.
 * Reads ffprobe's JSON writer, or its key=value text writer when JSON output
 * is unusable; both produce the same descriptors.
 */

import { z } from 'zod';
import {
  executeCommand,
  createLogger,
  toNonNegativeInt,
  type CommandResult,
  type CommandRunner,
} from '@tracksmith/utils';
import { CancelledError, ProbeFailure, describeError } from '@tracksmith/core';
import type {
  AudioStreamDescriptor,
  ProbeFormat,
  StreamDescriptor,
  StreamType,
} from '../types.js';

const log = createLogger({ module: 'ffprobe' });

/**
 * Anything that can list the streams of a file. The processing layer depends
 * on this rather than on FFProbe so it can be exercised without ffprobe.
 */
export interface StreamProber {
  probeAudioStreams(filePath: string, signal?: AbortSignal): Promise<AudioStreamDescriptor[]>;
  probeSubtitleStreams(filePath: string, signal?: AbortSignal): Promise<StreamDescriptor[]>;
  /** Container duration, used only to turn ffmpeg progress into a percentage */
  probeDurationMs?(filePath: string, signal?: AbortSignal): Promise<number | undefined>;
}

export interface FFProbeOptions {
  format?: ProbeFormat;
  timeout?: number;
  runner?: CommandRunner;
}

/**
 * One stream as read from either output mode, before numbering
 */
export interface RawStreamEntry {
  index: number;
  codecName: string;
  channels?: number;
}

const streamEntrySchema = z.object({
  index: z.number().int().nonnegative(),
  codec_name: z.string().optional(),
  channels: z.number().int().nonnegative().optional(),
});

const streamsOutputSchema = z.object({
  streams: z.array(streamEntrySchema).default([]),
});

export class ProbeOutputError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ProbeOutputError';
  }
}

/**
 * Parse `-of json` output
 */
export function parseJsonStreams(output: string): RawStreamEntry[] {
  let json: unknown;
  try {
    json = JSON.parse(output.trim() === '' ? '{}' : output);
  } catch (error) {
    throw new ProbeOutputError(`Invalid JSON: ${describeError(error)}`);
  }

  const parsed = streamsOutputSchema.safeParse(json);
  if (!parsed.success) {
    throw new ProbeOutputError(`Unexpected JSON shape: ${parsed.error.issues[0]?.message ?? 'unknown'}`);
  }

  return parsed.data.streams.map((stream) => ({
    index: stream.index,
    codecName: stream.codec_name ?? 'unknown',
    channels: stream.channels,
  }));
}

/**
 * Parse `-of default=noprint_wrappers=1` output:
 *
 *   index=1
 *   codec_name=dts
 *   channels=8
 *
 * Each `index=` line starts a new stream. Section wrappers such as [STREAM]
 * are tolerated in case the writer prints them anyway.
 */
export function parsePlainStreams(output: string): RawStreamEntry[] {
  const entries: RawStreamEntry[] = [];
  let current: RawStreamEntry | undefined;

  for (const rawLine of output.split(/\r?\n/)) {
    const line = rawLine.trim();
    if (line === '' || /^\[\/?[A-Z_]+\]$/.test(line)) {
      continue;
    }

    const separator = line.indexOf('=');
    if (separator <= 0) {
      throw new ProbeOutputError(`Unrecognized line: ${line.substring(0, 80)}`);
    }

    const key = line.substring(0, separator);
    const value = line.substring(separator + 1).trim();

    if (key === 'index') {
      const index = toNonNegativeInt(value);
      if (index === undefined) {
        throw new ProbeOutputError(`Invalid stream index: ${value}`);
      }
      current = { index, codecName: 'unknown' };
      entries.push(current);
      continue;
    }

    if (!current) {
      throw new ProbeOutputError(`Field before any stream index: ${key}`);
    }

    if (key === 'codec_name' && value !== '') {
      current.codecName = value;
    } else if (key === 'channels') {
      current.channels = toNonNegativeInt(value);
    }
  }

  return entries;
}

/**
 * Parse `format=duration` printed with `nokey=1`: seconds, or N/A
 */
export function parseDuration(output: string): number | undefined {
  const seconds = Number.parseFloat(output.trim());
  if (!Number.isFinite(seconds) || seconds <= 0) {
    return undefined;
  }
  return Math.round(seconds * 1000);
}

/**
 * Number streams by their position in probe order
 */
export function toAudioDescriptors(entries: RawStreamEntry[]): AudioStreamDescriptor[] {
  return entries.map((entry, streamNumber): AudioStreamDescriptor => ({
    type: 'audio',
    streamIndex: entry.index,
    streamNumber,
    codecName: entry.codecName,
    channelCount: entry.channels ?? 0,
  }));
}

export function toStreamDescriptors(type: StreamType, entries: RawStreamEntry[]): StreamDescriptor[] {
  return entries.map((entry, streamNumber): StreamDescriptor => ({
    type,
    streamIndex: entry.index,
    streamNumber,
    codecName: entry.codecName,
  }));
}

export class FFProbe implements StreamProber {
  private readonly ffprobePath: string;
  private readonly format: ProbeFormat;
  private readonly timeout: number;
  private readonly runner: CommandRunner;

  constructor(ffprobePath: string = 'ffprobe', options: FFProbeOptions = {}) {
    this.ffprobePath = ffprobePath;
    this.format = options.format ?? 'auto';
    this.timeout = options.timeout ?? 60000;
    this.runner = options.runner ?? executeCommand;
  }

  /**
   * Audio streams in container order; empty when the file has none
   */
  async probeAudioStreams(filePath: string, signal?: AbortSignal): Promise<AudioStreamDescriptor[]> {
    const entries = await this.probe(filePath, 'a', 'stream=index,channels,codec_name', signal);
    return toAudioDescriptors(entries);
  }

  /**
   * Subtitle streams in container order; empty when the file has none
   */
  async probeSubtitleStreams(filePath: string, signal?: AbortSignal): Promise<StreamDescriptor[]> {
    const entries = await this.probe(filePath, 's', 'stream=index,codec_name', signal);
    return toStreamDescriptors('subtitle', entries);
  }

  /**
   * Container duration; undefined when ffprobe cannot tell
   */
  async probeDurationMs(filePath: string, signal?: AbortSignal): Promise<number | undefined> {
    const stdout = await this.invoke(filePath, [
      '-v', 'error',
      '-show_entries', 'format=duration',
      '-of', 'default=noprint_wrappers=1:nokey=1',
      filePath,
    ], signal);
    return parseDuration(stdout);
  }

  private async probe(
    filePath: string,
    selector: 'a' | 's',
    entries: string,
    signal?: AbortSignal
  ): Promise<RawStreamEntry[]> {
    if (this.format !== 'plain') {
      try {
        return await this.run(filePath, selector, entries, 'json', signal);
      } catch (error) {
        if (!(error instanceof ProbeOutputError) || this.format === 'json') {
          throw this.wrap(filePath, error);
        }
        log.debug({ filePath, error: error.message }, 'JSON probe output unusable, retrying with text writer');
      }
    }

    try {
      return await this.run(filePath, selector, entries, 'plain', signal);
    } catch (error) {
      throw this.wrap(filePath, error);
    }
  }

  private async run(
    filePath: string,
    selector: 'a' | 's',
    entries: string,
    mode: 'json' | 'plain',
    signal?: AbortSignal
  ): Promise<RawStreamEntry[]> {
    const args = [
      '-v', 'error',
      '-select_streams', selector,
      '-show_entries', entries,
      '-of', mode === 'json' ? 'json' : 'default=noprint_wrappers=1',
      filePath,
    ];

    const stdout = await this.invoke(filePath, args, signal);
    return mode === 'json' ? parseJsonStreams(stdout) : parsePlainStreams(stdout);
  }

  private async invoke(filePath: string, args: string[], signal?: AbortSignal): Promise<string> {
    log.debug({ command: this.ffprobePath, args }, 'Running ffprobe');

    let result: CommandResult;
    try {
      result = await this.runner(this.ffprobePath, args, { timeout: this.timeout, signal });
    } catch (error) {
      throw new ProbeFailure(filePath, `could not run ${this.ffprobePath}: ${describeError(error)}`);
    }

    if (result.aborted) {
      throw new CancelledError(filePath, 'probe');
    }
    if (result.timedOut) {
      throw new ProbeFailure(filePath, `timed out after ${this.timeout}ms`, result.exitCode);
    }
    if (result.exitCode !== 0) {
      throw new ProbeFailure(filePath, result.stderr.trim() || 'ffprobe exited with an error', result.exitCode);
    }

    return result.stdout;
  }

  private wrap(filePath: string, error: unknown): Error {
    if (error instanceof ProbeOutputError) {
      return new ProbeFailure(filePath, error.message);
    }
    return error instanceof Error ? error : new ProbeFailure(filePath, describeError(error));
  }
}
