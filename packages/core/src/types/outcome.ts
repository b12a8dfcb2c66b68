/**
 * Per-file and per-batch results
 */

import type { SynthesisTarget } from './policy.js';

export type FileOutcomeStatus = 'processed' | 'skipped' | 'failed';

export interface FileOutcome {
  filePath: string;
  status: FileOutcomeStatus;
  /** Action kind chosen by the classifier, when classification got that far */
  action?: string;
  /** Layouts that were (or, in a dry run, would be) added */
  targets?: SynthesisTarget[];
  reason?: string;
  errorCode?: string;
  durationMs: number;
}

export interface BatchResult {
  root: string;
  total: number;
  processed: number;
  skipped: number;
  failed: number;
  interrupted: boolean;
  dryRun: boolean;
  durationMs: number;
  files: FileOutcome[];
}

export function emptyBatchResult(root: string, dryRun = false): BatchResult {
  return {
    root,
    total: 0,
    processed: 0,
    skipped: 0,
    failed: 0,
    interrupted: false,
    dryRun,
    durationMs: 0,
    files: [],
  };
}
