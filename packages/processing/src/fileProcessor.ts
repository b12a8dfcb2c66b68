/**
 * File Processor
 *
 * The per-file pipeline: probe → classify → (transaction). Every error that
 * belongs to a single file is turned into a failed outcome here; only fatal
 * errors escape.
 */

import { createLogger } from '@tracksmith/utils';
import {
  CancelledError,
  DEFAULT_SYNTHESIS_POLICY,
  ProbeFailure,
  describeError,
  isFatalError,
  isTracksmithError,
  type FileOutcome,
  type SynthesisPolicy,
} from '@tracksmith/core';
import {
  classify,
  describeConfiguration,
  resolveStreamNumber,
  type RequiredAction,
  type SourceStream,
  type StreamProber,
  type SynthesizeAction,
} from '@tracksmith/media';
import type { DownmixSynthesizer } from './synthesizer.js';
import type { TrackMerger } from './muxer.js';
import { SafetyTransaction, planTransformJob } from './transaction.js';
import type { PipelineObserver } from './types.js';

const log = createLogger({ module: 'file-processor' });

export interface FileProcessorDependencies {
  prober: StreamProber;
  synthesizer: DownmixSynthesizer;
  merger: TrackMerger;
}

export interface ProcessContext {
  scratchDir: string;
  policy?: SynthesisPolicy;
  dryRun?: boolean;
  position?: number;
  total?: number;
  signal?: AbortSignal;
  observer?: PipelineObserver;
}

export const SKIP_REASONS = {
  alreadyComplete: 'already has 5.1',
  stereoOnly: 'stereo only, no surround source',
  noSurround: 'no surround source',
  dryRun: 'dry-run',
} as const;

function skipReason(action: RequiredAction): string {
  switch (action.kind) {
    case 'AlreadyComplete':
      return SKIP_REASONS.alreadyComplete;
    case 'NoSurroundSource':
      return action.hasStereo ? SKIP_REASONS.stereoOnly : SKIP_REASONS.noSurround;
    default:
      return SKIP_REASONS.dryRun;
  }
}

function isSynthesizeAction(action: RequiredAction): action is SynthesizeAction {
  return action.kind === 'SynthesizeFrom71' || action.kind === 'SynthesizeStereo';
}

export class FileProcessor {
  private readonly deps: FileProcessorDependencies;

  constructor(deps: FileProcessorDependencies) {
    this.deps = deps;
  }

  async process(filePath: string, context: ProcessContext): Promise<FileOutcome> {
    const startTime = Date.now();
    const emit: PipelineObserver = (event) => context.observer?.(event);

    emit({
      type: 'file-start',
      filePath,
      position: context.position ?? 1,
      total: context.total ?? 1,
    });

    let outcome: FileOutcome;
    try {
      outcome = await this.run(filePath, context, startTime);
    } catch (error) {
      if (isFatalError(error)) {
        throw error;
      }
      log.error({ filePath, error: describeError(error) }, 'File failed');
      outcome = {
        filePath,
        status: 'failed',
        reason: describeError(error),
        errorCode: isTracksmithError(error) ? error.code : 'UNEXPECTED_ERROR',
        durationMs: Date.now() - startTime,
      };
    }

    emit({ type: 'file-done', outcome });
    return outcome;
  }

  private async run(filePath: string, context: ProcessContext, startTime: number): Promise<FileOutcome> {
    const { signal } = context;
    if (signal?.aborted) {
      throw new CancelledError(filePath, 'probe');
    }

    const streams = await this.deps.prober.probeAudioStreams(filePath, signal);
    const { configuration, action } = classify(streams, context.policy ?? DEFAULT_SYNTHESIS_POLICY);

    context.observer?.({ type: 'probed', filePath, streams, configuration });
    context.observer?.({ type: 'decision', filePath, action });
    log.debug({ filePath, configuration: describeConfiguration(configuration), action: action.kind }, 'Classified');

    if (!isSynthesizeAction(action)) {
      return {
        filePath,
        status: 'skipped',
        action: action.kind,
        reason: skipReason(action),
        durationMs: Date.now() - startTime,
      };
    }

    if (context.dryRun) {
      return {
        filePath,
        status: 'skipped',
        action: action.kind,
        targets: [...action.targets],
        reason: SKIP_REASONS.dryRun,
        durationMs: Date.now() - startTime,
      };
    }

    const source = await this.resolveSource(filePath, action.source, signal);
    const durationMs = await this.deps.prober.probeDurationMs?.(filePath, signal);
    const job = planTransformJob(filePath, context.scratchDir, source, action.targets, durationMs);
    const transaction = new SafetyTransaction(job, {
      synthesizer: this.deps.synthesizer,
      merger: this.deps.merger,
      observer: context.observer,
    });

    await transaction.run(signal);

    return {
      filePath,
      status: 'processed',
      action: action.kind,
      targets: job.synthesizedTracks.map((track) => track.target),
      durationMs: Date.now() - startTime,
    };
  }

  /**
   * Re-probe and translate the chosen stream's container index into its
   * current audio stream number
   */
  private async resolveSource(
    filePath: string,
    chosen: SourceStream,
    signal?: AbortSignal
  ): Promise<SourceStream> {
    const streams = await this.deps.prober.probeAudioStreams(filePath, signal);
    const streamNumber = resolveStreamNumber(streams, chosen.streamIndex);

    if (streamNumber === undefined) {
      throw new ProbeFailure(filePath, `audio stream with index ${chosen.streamIndex} is no longer present`);
    }

    return { ...chosen, streamNumber };
  }
}
