/**
 * Per-attempt state machine.
 *
 *   Pending -> Preparing -> Executing -> Verifying -> Success
 *                  |            |            |
 *                  +------------+------------+--> Failed | Error
 *
 * Every transition is timestamped and reported to the listener. Once the
 * attempt reaches a terminal status it is frozen.
 */

import { EngineError, InvalidTransitionError } from './errors';
import { generateAttemptId, getCurrentTimestamp } from '../../utils/uuid';
import {
  TERMINAL_STATUSES,
  type AttemptLogEntry,
  type AttemptStatus,
  type AttemptTransition,
  type BypassAttempt,
  type ErrorCategory
} from '../../types/bypass';

const ALLOWED_TRANSITIONS: Readonly<Record<AttemptStatus, readonly AttemptStatus[]>> = {
  Pending: ['Preparing'],
  Preparing: ['Executing', 'Failed', 'Error'],
  Executing: ['Verifying', 'Failed', 'Error'],
  Verifying: ['Success', 'Failed', 'Error'],
  Success: [],
  Failed: [],
  Error: []
};

export function canTransition(from: AttemptStatus, to: AttemptStatus): boolean {
  return ALLOWED_TRANSITIONS[from].includes(to);
}

export type TransitionListener = (transition: AttemptTransition, methodName: string) => void;

export interface AttemptFailure {
  message: string;
  category?: ErrorCategory;
  errorName?: string;
  errorCode?: string;
}

export class AttemptRecorder {
  readonly id = generateAttemptId();
  private state: AttemptStatus = 'Pending';
  private readonly entries: AttemptLogEntry[] = [];
  private readonly steps: string[] = [];
  private readonly transitions: AttemptTransition[] = [];
  private readonly startedAt = Date.now();
  private failure?: AttemptFailure;
  private verified = false;

  constructor(
    readonly methodName: string,
    readonly attemptNumber: number,
    private readonly listener?: TransitionListener
  ) {}

  get status(): AttemptStatus {
    return this.state;
  }

  get isTerminal(): boolean {
    return TERMINAL_STATUSES.has(this.state);
  }

  transition(to: AttemptStatus, detail?: string): void {
    if (!canTransition(this.state, to)) {
      throw new InvalidTransitionError(this.methodName, this.state, to);
    }
    if (to === 'Success' && (!this.verified || this.steps.length === 0)) {
      throw new InvalidTransitionError(this.methodName, this.state, to);
    }

    const transition: AttemptTransition = { from: this.state, to, at: getCurrentTimestamp() };
    if (detail !== undefined) {
      transition.detail = detail;
    }
    this.transitions.push(transition);
    this.state = to;
    this.note(detail ? `${transition.from} -> ${to}: ${detail}` : `${transition.from} -> ${to}`);
    this.listener?.(transition, this.methodName);
  }

  note(message: string): void {
    this.entries.push({ timestamp: getCurrentTimestamp(), message });
  }

  stepCompleted(stepId: string): void {
    this.steps.push(stepId);
  }

  /** Records the verification read; required before Success */
  verification(message: string): void {
    this.verified = true;
    this.note(`verification: ${message}`);
  }

  fail(status: 'Failed' | 'Error', failure: AttemptFailure): void {
    this.failure = failure;
    this.transition(status, failure.message);
  }

  /**
   * Frozen view of the attempt. Only legal once terminal.
   */
  finish(): BypassAttempt {
    if (!this.isTerminal) {
      throw new EngineError(`Attempt ${this.id} is still ${this.state}`, 'ATTEMPT_NOT_TERMINAL', {
        methodName: this.methodName
      });
    }

    const attempt: BypassAttempt = {
      id: this.id,
      methodName: this.methodName,
      attemptNumber: this.attemptNumber,
      status: this.state,
      log: Object.freeze(this.entries.map(entry => Object.freeze({ ...entry }))),
      completedSteps: Object.freeze([...this.steps]),
      transitions: Object.freeze(this.transitions.map(transition => Object.freeze({ ...transition }))),
      executionDurationMs: Date.now() - this.startedAt,
      ...(this.failure && {
        errorMessage: this.failure.message,
        errorCategory: this.failure.category,
        errorName: this.failure.errorName,
        errorCode: this.failure.errorCode
      })
    };
    return Object.freeze(attempt);
  }
}
