/**
 * Safety Transaction
 *
 * Owns one file's backup → synthesize → merge → verify → commit sequence and
 * every artifact it creates.
 *
 * Guarantees:
 * - The source path is never written until the final atomic replace
 * - Every artifact (backup, synthesized tracks, staged output) is removed
 *   when the transaction ends, successful or not. The cross-filesystem
 *   sidecar is removed by the replace itself.
 * - Nothing is restored from the backup: before the replace the source is
 *   untouched, after it the backup is redundant
 */

import { join } from 'node:path';
import {
  copyFile,
  createLogger,
  formatBytes,
  getExtension,
  getFileSizeBytes,
  pathDigest,
  isNonEmptyFile,
  removeFile,
  replaceFileAtomically,
  statFileSize,
  uniqueStem,
} from '@tracksmith/utils';
import {
  BackupFailure,
  CancelledError,
  TransactionStateMachine,
  VerificationFailure,
  describeError,
  type SynthesisTarget,
  type TransactionState,
} from '@tracksmith/core';
import type { SourceStream } from '@tracksmith/media';
import { DOWNMIX_PRESETS, sortTargets } from './presets.js';
import type { DownmixSynthesizer } from './synthesizer.js';
import type { MergeResult, TrackMerger } from './muxer.js';
import type { PipelineObserver, TransformJob } from './types.js';

const log = createLogger({ module: 'transaction' });

export const BACKUP_SUFFIX = '.backup';
export const PARTIAL_SUFFIX = '.partial';

/**
 * Lay out every path one file's transaction will use
 */
export function planTransformJob(
  sourcePath: string,
  scratchDir: string,
  source: SourceStream,
  targets: readonly SynthesisTarget[],
  durationMs?: number
): TransformJob {
  const stem = uniqueStem(sourcePath);
  const extension = getExtension(sourcePath);

  return {
    sourcePath,
    backupPath: `${sourcePath}${BACKUP_SUFFIX}`,
    partialPath: `${sourcePath}.${pathDigest(sourcePath)}${PARTIAL_SUFFIX}`,
    stagedOutputPath: join(scratchDir, extension ? `${stem}.staged.${extension}` : `${stem}.staged`),
    synthesizedTracks: sortTargets(targets).map((target) => ({
      target,
      path: join(scratchDir, `${stem}.${target}.${DOWNMIX_PRESETS[target].extension}`),
    })),
    source,
    durationMs,
  };
}

export interface TransactionDependencies {
  synthesizer: DownmixSynthesizer;
  merger: TrackMerger;
  observer?: PipelineObserver;
}

export interface TransactionResult {
  state: TransactionState;
  commitMethod: 'rename' | 'copy';
}

export class SafetyTransaction {
  private readonly job: TransformJob;
  private readonly deps: TransactionDependencies;
  private readonly machine: TransactionStateMachine;
  private merged: MergeResult | null = null;

  constructor(job: TransformJob, deps: TransactionDependencies) {
    this.job = job;
    this.deps = deps;
    this.machine = new TransactionStateMachine(job.sourcePath, (transition) => {
      this.deps.observer?.({
        type: 'stage',
        filePath: job.sourcePath,
        from: transition.from,
        to: transition.to,
        reason: transition.reason,
      });
    });
  }

  getState(): TransactionState {
    return this.machine.getState();
  }

  /**
   * Run the whole transaction. Throws the failure that aborted it, after cleanup.
   */
  async run(signal?: AbortSignal): Promise<TransactionResult> {
    try {
      this.machine.transitionTo('BACKING_UP');
      await this.backup();

      this.checkpoint('synthesis', signal);
      this.machine.transitionTo('SYNTHESIZING');
      await this.synthesize(signal);

      this.checkpoint('merge', signal);
      this.machine.transitionTo('MERGING');
      await this.merge(signal);

      this.machine.transitionTo('VERIFYING');
      await this.verify();

      this.checkpoint('commit', signal);
      this.machine.transitionTo('COMMITTING');
      const commitMethod = await replaceFileAtomically(
        this.job.stagedOutputPath,
        this.job.sourcePath,
        this.job.partialPath
      );
      log.debug({ filePath: this.job.sourcePath, commitMethod }, 'Replaced source with staged output');

      await this.cleanup();
      this.machine.transitionTo('DONE');
      return { state: 'DONE', commitMethod };
    } catch (error) {
      await this.cleanup();
      if (!this.machine.isTerminal()) {
        this.machine.abort(describeError(error));
      }
      throw error;
    }
  }

  private checkpoint(stage: string, signal?: AbortSignal): void {
    if (signal?.aborted) {
      throw new CancelledError(this.job.sourcePath, stage);
    }
  }

  /**
   * Copy the source next to itself and confirm the copy is complete
   */
  private async backup(): Promise<void> {
    const { sourcePath, backupPath } = this.job;

    let expected: number;
    try {
      expected = await getFileSizeBytes(sourcePath);
    } catch (error) {
      throw new BackupFailure(sourcePath, `cannot read source: ${describeError(error)}`);
    }
    if (expected === 0) {
      throw new BackupFailure(sourcePath, 'source file is empty', 0);
    }

    try {
      await copyFile(sourcePath, backupPath);
    } catch (error) {
      throw new BackupFailure(sourcePath, `copy failed: ${describeError(error)}`, expected);
    }

    const actual = await statFileSize(backupPath);
    if (actual !== expected) {
      throw new BackupFailure(
        sourcePath,
        `size mismatch (expected ${expected}, got ${actual ?? 'nothing'})`,
        expected,
        actual ?? undefined
      );
    }

    this.deps.observer?.({ type: 'backup', filePath: sourcePath, backupPath, size: actual });
  }

  private async synthesize(signal?: AbortSignal): Promise<void> {
    for (const track of this.job.synthesizedTracks) {
      const result = await this.deps.synthesizer.synthesize({
        sourcePath: this.job.sourcePath,
        source: this.job.source,
        target: track.target,
        outputPath: track.path,
        durationMs: this.job.durationMs,
        signal,
        onProgress: (progress) => this.deps.observer?.({
          type: 'progress',
          filePath: this.job.sourcePath,
          stage: 'synthesize',
          target: track.target,
          progress,
        }),
      });

      this.deps.observer?.({
        type: 'artifact',
        filePath: this.job.sourcePath,
        stage: 'synthesize',
        target: track.target,
        path: track.path,
        size: result.size,
      });
    }
  }

  private async merge(signal?: AbortSignal): Promise<void> {
    this.merged = await this.deps.merger.merge({
      sourcePath: this.job.sourcePath,
      tracks: this.job.synthesizedTracks,
      outputPath: this.job.stagedOutputPath,
      durationMs: this.job.durationMs,
      signal,
      onProgress: (progress) => this.deps.observer?.({
        type: 'progress',
        filePath: this.job.sourcePath,
        stage: 'merge',
        progress,
      }),
    });
  }

  private async verify(): Promise<void> {
    if (!(await isNonEmptyFile(this.job.stagedOutputPath))) {
      throw new VerificationFailure(this.job.stagedOutputPath, 'staged output');
    }

    const size = await getFileSizeBytes(this.job.stagedOutputPath);
    this.deps.observer?.({
      type: 'artifact',
      filePath: this.job.sourcePath,
      stage: 'merge',
      path: this.job.stagedOutputPath,
      size,
      kept: this.merged
        ? { audio: this.merged.audioStreamsKept, subtitles: this.merged.subtitleStreamsKept }
        : undefined,
    });
    log.debug({ filePath: this.job.sourcePath, size: formatBytes(size) }, 'Staged output verified');
  }

  /**
   * Remove every artifact this transaction may have created. Never touches the source.
   */
  private async cleanup(): Promise<void> {
    const paths = [
      this.job.backupPath,
      this.job.stagedOutputPath,
      ...this.job.synthesizedTracks.map((track) => track.path),
    ].filter((path) => path !== this.job.sourcePath);

    for (const path of paths) {
      try {
        await removeFile(path);
      } catch (error) {
        log.warn({ path, error: describeError(error) }, 'Could not remove artifact');
        this.deps.observer?.({
          type: 'cleanup-warning',
          filePath: this.job.sourcePath,
          path,
          message: describeError(error),
        });
      }
    }
  }
}
