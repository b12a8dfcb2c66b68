/**
 * Batch Driver
 *
 * Walks the library and runs the per-file pipeline over every video file with
 * a fixed-size worker pool. Per-file failures become outcomes; only fatal
 * errors stop the run.
 *
 * Events:
 * - 'batch:started'  { root, total }
 * - 'event'          PipelineEvent, for every file-level event
 * - 'batch:complete' BatchResult
 */

import { EventEmitter } from 'node:events';
import { createLogger, isDefined, isDirectory } from '@tracksmith/utils';
import {
  DEFAULT_SYNTHESIS_POLICY,
  PreconditionError,
  emptyBatchResult,
  type BatchResult,
  type FileOutcome,
  type SynthesisPolicy,
} from '@tracksmith/core';
import type { FileProcessor, PipelineEvent } from '@tracksmith/processing';
import { ScratchDirectory } from './scratch.js';
import { VIDEO_EXTENSIONS, collectLibrary } from './walker.js';

const log = createLogger({ module: 'batch' });

export interface BatchOptions {
  root: string;
  /** Parent of the per-run scratch directory; OS temp directory when unset */
  scratchParent?: string;
  concurrency?: number;
  policy?: SynthesisPolicy;
  dryRun?: boolean;
  extensions?: readonly string[];
  signal?: AbortSignal;
}

export interface BatchStartedEvent {
  root: string;
  total: number;
}

export class BatchDriver extends EventEmitter {
  private readonly processor: FileProcessor;

  constructor(processor: FileProcessor) {
    super();
    this.processor = processor;
  }

  async run(options: BatchOptions): Promise<BatchResult> {
    const startTime = Date.now();
    const { root, signal } = options;
    const dryRun = options.dryRun ?? false;
    const concurrency = Math.max(1, Math.floor(options.concurrency ?? 1));

    if (!(await isDirectory(root))) {
      throw new PreconditionError(`Library root is not a directory: ${root}`, { root });
    }

    const files = await collectLibrary(root, options.extensions ?? VIDEO_EXTENSIONS);
    const result = emptyBatchResult(root, dryRun);
    result.total = files.length;

    log.info({ root, total: files.length, concurrency, dryRun }, 'Batch started');
    this.emit('batch:started', { root, total: files.length } satisfies BatchStartedEvent);

    if (files.length > 0) {
      const outcomes = await this.processAll(files, options, concurrency);
      result.files = outcomes.filter(isDefined);
    }

    for (const outcome of result.files) {
      result[outcome.status]++;
    }
    result.interrupted = signal?.aborted ?? false;
    result.durationMs = Date.now() - startTime;

    log.info(
      {
        processed: result.processed,
        skipped: result.skipped,
        failed: result.failed,
        interrupted: result.interrupted,
      },
      'Batch complete'
    );
    this.emit('batch:complete', result);

    return result;
  }

  /**
   * Outcomes indexed by walk position; files never started stay undefined
   */
  private async processAll(
    files: string[],
    options: BatchOptions,
    concurrency: number
  ): Promise<Array<FileOutcome | undefined>> {
    const outcomes: Array<FileOutcome | undefined> = files.map(() => undefined);
    const scratch = await ScratchDirectory.create(options.scratchParent);
    const observer = (event: PipelineEvent): void => {
      this.emit('event', event);
    };

    let next = 0;
    let stopped = false;

    const worker = async (): Promise<void> => {
      while (!stopped && !options.signal?.aborted && next < files.length) {
        const position = next++;
        const filePath = files[position];
        if (filePath === undefined) {
          return;
        }

        try {
          outcomes[position] = await this.processor.process(filePath, {
            scratchDir: scratch.path,
            policy: options.policy ?? DEFAULT_SYNTHESIS_POLICY,
            dryRun: options.dryRun,
            position: position + 1,
            total: files.length,
            signal: options.signal,
            observer,
          });
        } catch (error) {
          stopped = true;
          throw error;
        }
      }
    };

    try {
      const settled = await Promise.allSettled(
        Array.from({ length: Math.min(concurrency, files.length) }, () => worker())
      );
      for (const entry of settled) {
        if (entry.status === 'rejected') {
          throw entry.reason;
        }
      }
    } finally {
      await scratch.release();
    }

    return outcomes;
  }
}
