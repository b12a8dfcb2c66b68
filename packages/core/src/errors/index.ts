/**
 * Custom Error Classes
 */

import type { TransactionState } from '../stateMachine.js';

/**
 * Base error class for all tracksmith errors
 */
export class TracksmithError extends Error {
  public readonly code: string;
  public readonly details?: Record<string, unknown>;

  constructor(
    message: string,
    code: string,
    details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'TracksmithError';
    this.code = code;
    this.details = details;

    // Maintains proper stack trace
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * ffprobe could not be run or its output could not be read.
 * "No audio streams" is not a probe failure.
 */
export class ProbeFailure extends TracksmithError {
  constructor(filePath: string, message: string, exitCode?: number) {
    super(
      `Probe failed for ${filePath}: ${message}`,
      'PROBE_FAILURE',
      { filePath, exitCode }
    );
    this.name = 'ProbeFailure';
  }
}

/**
 * Backup copy failed or its size does not match the source
 */
export class BackupFailure extends TracksmithError {
  constructor(filePath: string, message: string, expectedSize?: number, actualSize?: number) {
    super(
      `Backup failed for ${filePath}: ${message}`,
      'BACKUP_FAILURE',
      { filePath, expectedSize, actualSize }
    );
    this.name = 'BackupFailure';
  }
}

/**
 * Base for failures of an external transcoder run
 */
export class CommandExecutionError extends TracksmithError {
  public readonly exitCode: number;

  constructor(
    message: string,
    code: string,
    exitCode: number,
    stderr: string,
    details: Record<string, unknown> = {}
  ) {
    super(message, code, {
      ...details,
      exitCode,
      stderr: stderr.substring(Math.max(0, stderr.length - 1000)),
    });
    this.name = 'CommandExecutionError';
    this.exitCode = exitCode;
  }
}

/**
 * ffmpeg failed while producing a standalone downmixed track
 */
export class SynthesisFailure extends CommandExecutionError {
  constructor(filePath: string, exitCode: number, stderr: string, target?: string) {
    super(
      `Audio synthesis failed for ${filePath} with exit code ${exitCode}`,
      'SYNTHESIS_FAILURE',
      exitCode,
      stderr,
      { filePath, target }
    );
    this.name = 'SynthesisFailure';
  }
}

/**
 * ffmpeg failed while remuxing the new track(s) into the container
 */
export class MergeFailure extends CommandExecutionError {
  constructor(filePath: string, exitCode: number, stderr: string) {
    super(
      `Track merge failed for ${filePath} with exit code ${exitCode}`,
      'MERGE_FAILURE',
      exitCode,
      stderr,
      { filePath }
    );
    this.name = 'MergeFailure';
  }
}

/**
 * An expected artifact is missing or empty
 */
export class VerificationFailure extends TracksmithError {
  constructor(artifactPath: string, stage: string) {
    super(
      `Expected ${stage} output is missing or empty: ${artifactPath}`,
      'VERIFICATION_FAILURE',
      { artifactPath, stage }
    );
    this.name = 'VerificationFailure';
  }
}

/**
 * Work stopped because the run was interrupted
 */
export class CancelledError extends TracksmithError {
  constructor(filePath: string, stage: string) {
    super(
      `Interrupted during ${stage}: ${filePath}`,
      'CANCELLED',
      { filePath, stage }
    );
    this.name = 'CancelledError';
  }
}

/**
 * State transition error for invalid state changes
 */
export class StateTransitionError extends TracksmithError {
  constructor(
    filePath: string,
    fromState: TransactionState,
    toState: TransactionState,
    message?: string
  ) {
    super(
      message ?? `Invalid state transition from ${fromState} to ${toState}`,
      'STATE_TRANSITION_ERROR',
      { filePath, fromState, toState }
    );
    this.name = 'StateTransitionError';
  }
}

/**
 * A run precondition does not hold (missing tool, missing root directory).
 * Fatal: the run stops before any file is touched.
 */
export class PreconditionError extends TracksmithError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'PRECONDITION_FAILED', details);
    this.name = 'PreconditionError';
  }
}

/**
 * Configuration values failed validation
 */
export class ConfigurationError extends TracksmithError {
  constructor(message: string, issues: string[] = []) {
    super(message, 'CONFIGURATION_ERROR', { issues });
    this.name = 'ConfigurationError';
  }
}

export function isTracksmithError(error: unknown): error is TracksmithError {
  return error instanceof TracksmithError;
}

/**
 * Errors that stop the whole run instead of a single file
 */
export function isFatalError(error: unknown): boolean {
  return error instanceof PreconditionError || error instanceof ConfigurationError;
}

/**
 * Human-readable message for anything that was thrown
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
