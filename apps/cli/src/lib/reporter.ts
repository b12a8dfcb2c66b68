/**
 * Console Reporter
 *
 * Turns batch and pipeline events into status lines, with an ora spinner for
 * ffmpeg progress when stdout is a terminal.
 */

import { basename } from 'node:path';
import ora, { type Ora } from 'ora';
import { formatBytes, formatDuration } from '@tracksmith/utils';
import type { BatchResult, FileOutcome, SynthesisTarget } from '@tracksmith/core';
import { describeConfiguration, type RequiredAction } from '@tracksmith/media';
import { DOWNMIX_PRESETS, type FFmpegProgress, type PipelineEvent } from '@tracksmith/processing';
import type { BatchDriver, BatchStartedEvent } from '@tracksmith/library';
import {
  printError,
  printHeader,
  printInfo,
  printKeyValue,
  printSuccess,
  printWarning,
} from './output.js';

export type LineLevel = 'info' | 'success' | 'warning' | 'error';

export interface StatusLine {
  level: LineLevel;
  message: string;
}

function labels(targets: readonly SynthesisTarget[]): string {
  return targets.map((target) => DOWNMIX_PRESETS[target].label).join(' + ');
}

export function describeDecision(filePath: string, action: RequiredAction): StatusLine | null {
  const name = basename(filePath);
  switch (action.kind) {
    case 'SynthesizeFrom71':
      return {
        level: 'info',
        message: `${name}: adding ${labels(action.targets)} from 7.1 (audio stream ${action.source.streamNumber}, index ${action.source.streamIndex})`,
      };
    case 'SynthesizeStereo':
      return {
        level: 'info',
        message: `${name}: adding stereo from 5.1 (audio stream ${action.source.streamNumber}, index ${action.source.streamIndex})`,
      };
    default:
      return null;
  }
}

export function describeOutcome(outcome: FileOutcome): StatusLine {
  const name = basename(outcome.filePath);
  switch (outcome.status) {
    case 'processed':
      return {
        level: 'success',
        message: `Successfully processed: ${name} (+${labels(outcome.targets ?? [])}, ${formatDuration(outcome.durationMs)})`,
      };
    case 'skipped':
      if (outcome.reason === 'dry-run') {
        return { level: 'info', message: `${name}: would add ${labels(outcome.targets ?? [])}` };
      }
      return { level: 'warning', message: `${name}: ${outcome.reason ?? 'nothing to do'} - skipping` };
    case 'failed':
      return {
        level: 'error',
        message: `Failed: ${name} [${outcome.errorCode ?? 'UNKNOWN'}] ${outcome.reason ?? ''}`.trimEnd(),
      };
  }
}

type StageEvent = Extract<PipelineEvent, { type: 'stage' }>;
type ArtifactEvent = Extract<PipelineEvent, { type: 'artifact' }>;

export function describeStage(event: StageEvent): StatusLine | null {
  const name = basename(event.filePath);
  switch (event.to) {
    case 'BACKING_UP':
      return { level: 'info', message: `${name}: creating backup` };
    case 'SYNTHESIZING':
      return { level: 'info', message: `${name}: generating new audio tracks` };
    case 'MERGING':
      return { level: 'info', message: `${name}: merging tracks into a new container` };
    case 'VERIFYING':
      return { level: 'info', message: `${name}: verifying merged output` };
    case 'COMMITTING':
      return { level: 'info', message: `${name}: replacing original` };
    case 'DONE':
      return { level: 'info', message: `${name}: backup and temporary files removed` };
    case 'ABORTED':
      return {
        level: 'warning',
        message: `${name}: rolled back, original untouched${event.reason ? ` (${event.reason})` : ''}`,
      };
    default:
      return null;
  }
}

export function describeArtifact(event: ArtifactEvent): StatusLine {
  const name = basename(event.filePath);
  const size = formatBytes(event.size);
  if (event.stage === 'synthesize') {
    const label = event.target ? DOWNMIX_PRESETS[event.target].label : 'audio';
    return { level: 'info', message: `${name}: ${label} track ready (${size})` };
  }
  const kept = event.kept
    ? `, kept ${event.kept.audio} audio and ${event.kept.subtitles} subtitle track(s)`
    : '';
  return { level: 'info', message: `${name}: merged output ready (${size}${kept})` };
}

export function describeProgress(filePath: string, stage: string, progress: FFmpegProgress): string {
  const parts = [`${stage} ${basename(filePath)}`, formatDuration(progress.outTimeMs)];
  if (progress.percent !== undefined) {
    parts.push(`${progress.percent.toFixed(0)}%`);
  }
  if (progress.speed > 0) {
    parts.push(`${progress.speed}x`);
  }
  return parts.join(' · ');
}

export function summaryLine(result: BatchResult): StatusLine {
  if (result.total === 0) {
    return { level: 'warning', message: `No video files found in ${result.root}` };
  }
  if (result.interrupted) {
    return { level: 'warning', message: 'Interrupted; remaining files were not started' };
  }
  if (result.failed > 0) {
    return { level: 'error', message: `${result.failed} of ${result.total} file(s) failed` };
  }
  if (result.processed === 0) {
    return {
      level: 'info',
      message: result.dryRun ? 'Dry run complete; nothing was changed' : 'Nothing needed changes',
    };
  }
  return { level: 'success', message: `Added tracks to ${result.processed} file(s)` };
}

export interface ReporterOptions {
  /** Suppress status lines; only the final JSON is printed */
  quiet?: boolean;
  /** Show a spinner while ffmpeg runs */
  interactive?: boolean;
}

export class ConsoleReporter {
  private readonly quiet: boolean;
  private readonly interactive: boolean;
  private spinner: Ora | null = null;

  constructor(options: ReporterOptions = {}) {
    this.quiet = options.quiet ?? false;
    this.interactive = options.interactive ?? false;
  }

  attach(source: BatchDriver): void {
    source.on('batch:started', (event: BatchStartedEvent) => {
      if (event.total > 0) {
        this.print({ level: 'info', message: `Found ${event.total} video file(s) in ${event.root}` });
      }
    });
    source.on('event', (event: PipelineEvent) => this.handle(event));
  }

  handle(event: PipelineEvent): void {
    switch (event.type) {
      case 'file-start':
        this.print({ level: 'info', message: `[${event.position}/${event.total}] Processing: ${basename(event.filePath)}` });
        break;
      case 'probed':
        this.print({ level: 'info', message: `${basename(event.filePath)}: ${describeConfiguration(event.configuration)}` });
        break;
      case 'decision': {
        const line = describeDecision(event.filePath, event.action);
        if (line) this.print(line);
        break;
      }
      case 'progress':
        this.spin(describeProgress(event.filePath, event.target ? `${event.stage} ${event.target}` : event.stage, event.progress));
        break;
      case 'cleanup-warning':
        this.print({ level: 'warning', message: `Could not remove ${event.path}: ${event.message}` });
        break;
      case 'file-done':
        this.print(describeOutcome(event.outcome));
        break;
      case 'stage': {
        const line = describeStage(event);
        if (line) this.print(line);
        break;
      }
      case 'backup':
        this.print({
          level: 'info',
          message: `${basename(event.filePath)}: backup created (${formatBytes(event.size)})`,
        });
        break;
      case 'artifact':
        this.print(describeArtifact(event));
        break;
    }
  }

  summary(result: BatchResult): void {
    this.stopSpinner();
    if (this.quiet) return;

    printHeader('Summary');
    printKeyValue('Root', result.root);
    printKeyValue('Video files', result.total);
    printKeyValue('Processed', result.processed);
    printKeyValue('Skipped', result.skipped);
    printKeyValue('Failed', result.failed);
    printKeyValue('Duration', formatDuration(result.durationMs));
    console.log();
    this.print(summaryLine(result));
  }

  stopSpinner(): void {
    this.spinner?.stop();
    this.spinner = null;
  }

  private spin(text: string): void {
    if (this.quiet || !this.interactive) return;
    if (this.spinner) {
      this.spinner.text = text;
    } else {
      this.spinner = ora(text).start();
    }
  }

  private print(line: StatusLine): void {
    if (this.quiet) return;
    this.stopSpinner();
    switch (line.level) {
      case 'success':
        printSuccess(line.message);
        break;
      case 'warning':
        printWarning(line.message);
        break;
      case 'error':
        printError(line.message);
        break;
      default:
        printInfo(line.message);
    }
  }
}
