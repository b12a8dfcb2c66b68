/**
 * @tracksmith/core
 *
 * Core package containing:
 * - Transaction state machine
 * - Error handling
 * - External binary resolution
 * - Shared types
 */

// State machine
export {
  TRANSACTION_STATES,
  TransactionStateMachine,
  isValidTransition,
  getNextStates,
} from './stateMachine.js';

export type {
  TransactionState,
  TransactionStateTransition,
} from './stateMachine.js';

// Errors
export {
  TracksmithError,
  ProbeFailure,
  BackupFailure,
  CommandExecutionError,
  SynthesisFailure,
  MergeFailure,
  VerificationFailure,
  CancelledError,
  StateTransitionError,
  PreconditionError,
  ConfigurationError,
  isTracksmithError,
  isFatalError,
  describeError,
} from './errors/index.js';

// Binaries
export {
  resolveBinaryPath,
  getBinariesConfig,
  checkBinaries,
  type BinaryConfig,
  type BinariesConfig,
  type BinaryName,
  type BinaryCheck,
} from './config/binaries.js';

// Types
export {
  SYNTHESIS_POLICIES,
  DEFAULT_SYNTHESIS_POLICY,
  type SynthesisPolicy,
  type SynthesisTarget,
} from './types/policy.js';

export {
  emptyBatchResult,
  type FileOutcome,
  type FileOutcomeStatus,
  type BatchResult,
} from './types/outcome.js';
