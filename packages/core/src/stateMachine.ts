/**
 * Transaction State Machine
 *
 * Strict state machine for the per-file safety transaction.
 *
 * State Flow:
 * IDLE → BACKING_UP → SYNTHESIZING → MERGING → VERIFYING → COMMITTING → DONE
 *            ↘ ABORTED (from any non-terminal state)
 *
 * Rules:
 * - State transitions MUST be explicit
 * - Invalid transitions throw errors
 * - Every transition is recorded
 */

import { StateTransitionError } from './errors/index.js';

export const TRANSACTION_STATES = [
  'IDLE',
  'BACKING_UP',
  'SYNTHESIZING',
  'MERGING',
  'VERIFYING',
  'COMMITTING',
  'DONE',
  'ABORTED',
] as const;

export type TransactionState = typeof TRANSACTION_STATES[number];

/**
 * Represents a state transition with metadata
 */
export interface TransactionStateTransition {
  from: TransactionState;
  to: TransactionState;
  timestamp: Date;
  reason?: string;
  metadata?: Record<string, unknown>;
}

/**
 * Valid state transitions
 * Maps each state to the set of states it can transition to
 */
const validTransitions: Record<TransactionState, ReadonlySet<TransactionState>> = {
  IDLE: new Set<TransactionState>(['BACKING_UP', 'ABORTED']),
  BACKING_UP: new Set<TransactionState>(['SYNTHESIZING', 'ABORTED']),
  SYNTHESIZING: new Set<TransactionState>(['MERGING', 'ABORTED']),
  MERGING: new Set<TransactionState>(['VERIFYING', 'ABORTED']),
  VERIFYING: new Set<TransactionState>(['COMMITTING', 'ABORTED']),
  COMMITTING: new Set<TransactionState>(['DONE', 'ABORTED']),
  DONE: new Set<TransactionState>([]), // Terminal state
  ABORTED: new Set<TransactionState>([]), // Terminal state
};

/**
 * Check if a state transition is valid
 */
export function isValidTransition(from: TransactionState, to: TransactionState): boolean {
  return validTransitions[from].has(to);
}

/**
 * Get all valid next states from the current state
 */
export function getNextStates(current: TransactionState): TransactionState[] {
  return Array.from(validTransitions[current]);
}

/**
 * Manages state transitions with validation
 */
export class TransactionStateMachine {
  private currentState: TransactionState = 'IDLE';
  private readonly history: TransactionStateTransition[] = [];
  private readonly filePath: string;
  private readonly onTransition?: (transition: TransactionStateTransition) => void;

  constructor(
    filePath: string,
    onTransition?: (transition: TransactionStateTransition) => void
  ) {
    this.filePath = filePath;
    this.onTransition = onTransition;
  }

  getState(): TransactionState {
    return this.currentState;
  }

  getHistory(): ReadonlyArray<TransactionStateTransition> {
    return [...this.history];
  }

  canTransitionTo(targetState: TransactionState): boolean {
    return isValidTransition(this.currentState, targetState);
  }

  /**
   * Transition to a new state
   * Throws StateTransitionError if the transition is invalid
   */
  transitionTo(
    targetState: TransactionState,
    reason?: string,
    metadata?: Record<string, unknown>
  ): TransactionStateTransition {
    if (!this.canTransitionTo(targetState)) {
      throw new StateTransitionError(this.filePath, this.currentState, targetState);
    }

    const transition: TransactionStateTransition = {
      from: this.currentState,
      to: targetState,
      timestamp: new Date(),
      reason,
      metadata,
    };

    this.history.push(transition);
    this.currentState = targetState;
    this.onTransition?.(transition);

    return transition;
  }

  isTerminal(): boolean {
    return this.currentState === 'DONE' || this.currentState === 'ABORTED';
  }

  isComplete(): boolean {
    return this.currentState === 'DONE';
  }

  hasAborted(): boolean {
    return this.currentState === 'ABORTED';
  }

  /**
   * Abort the transaction with a reason
   */
  abort(reason: string, metadata?: Record<string, unknown>): TransactionStateTransition {
    return this.transitionTo('ABORTED', reason, metadata);
  }
}
