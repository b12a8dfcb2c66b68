/**
 * Processing Types
 */

import type {
  FileOutcome,
  SynthesisTarget,
  TransactionState,
} from '@tracksmith/core';
import type {
  AudioConfiguration,
  AudioStreamDescriptor,
  RequiredAction,
  SourceStream,
} from '@tracksmith/media';
import type { FFmpegProgress } from './progressParser.js';

export interface SynthesizedTrack {
  target: SynthesisTarget;
  path: string;
}

/**
 * Everything one file's transaction creates. All paths are unique per source
 * file so files can be processed in parallel.
 */
export interface TransformJob {
  sourcePath: string;
  backupPath: string;
  /**
   * Sibling of the source, created only when the staged output lives on
   * another filesystem. Named per source so it never matches a file the
   * library already holds.
   */
  partialPath: string;
  stagedOutputPath: string;
  synthesizedTracks: SynthesizedTrack[];
  source: SourceStream;
  durationMs?: number;
}

export type TransformStage = 'synthesize' | 'merge';

/**
 * Structured events emitted while a batch runs. The CLI renders them; nothing
 * downstream parses console text.
 */
export type PipelineEvent =
  | { type: 'file-start'; filePath: string; position: number; total: number }
  | { type: 'probed'; filePath: string; streams: AudioStreamDescriptor[]; configuration: AudioConfiguration }
  | { type: 'decision'; filePath: string; action: RequiredAction }
  | { type: 'stage'; filePath: string; from: TransactionState; to: TransactionState; reason?: string }
  | { type: 'backup'; filePath: string; backupPath: string; size: number }
  | { type: 'progress'; filePath: string; stage: TransformStage; target?: SynthesisTarget; progress: FFmpegProgress }
  | {
      type: 'artifact';
      filePath: string;
      stage: TransformStage;
      path: string;
      size: number;
      target?: SynthesisTarget;
      /** Original streams carried into the merged output */
      kept?: { audio: number; subtitles: number };
    }
  | { type: 'cleanup-warning'; filePath: string; path: string; message: string }
  | { type: 'file-done'; outcome: FileOutcome };

export type PipelineObserver = (event: PipelineEvent) => void;
