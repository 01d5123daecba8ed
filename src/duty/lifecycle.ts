/**
 * Duty lifecycle for Retention PDP
 *
 * A duty is the obligation to delete a data target once its retention period
 * has elapsed. It is created PENDING and concludes exactly once:
 *
 *   PENDING → IN_PROGRESS → COMPLETED
 *                         → FAILED
 *                         → PENDING (retry)
 */

import { InvalidTransitionError } from '../core/errors.js';
import type { Timestamp } from '../core/time/temporal.js';

export const DutyStatus = {
  /** Waiting for its expiry (or its next retry) */
  PENDING: 'PENDING',
  /** Deletion hook running in the current tick */
  IN_PROGRESS: 'IN_PROGRESS',
  /** Deleted and audited (terminal) */
  COMPLETED: 'COMPLETED',
  /** Gave up after the maximum attempts; audited (terminal) */
  FAILED: 'FAILED',
} as const;

export type DutyStatusValue = (typeof DutyStatus)[keyof typeof DutyStatus];

/**
 * Valid state transitions
 */
export const VALID_TRANSITIONS: Record<DutyStatusValue, readonly DutyStatusValue[]> = {
  PENDING: ['IN_PROGRESS'],
  IN_PROGRESS: ['COMPLETED', 'FAILED', 'PENDING'],
  COMPLETED: [], // Terminal state
  FAILED: [], // Terminal state
};

export interface Duty {
  readonly id: string;
  readonly policyId: string;
  readonly dataTarget: string;
  readonly retentionPeriod: string;
  readonly createdAt: Timestamp;
  /** Decision time plus the retention period */
  readonly expiresAt: Timestamp;
  readonly status: DutyStatusValue;
  /** Deletion hook invocations so far */
  readonly attemptCount: number;
  /** Earliest time of the next retry */
  readonly nextAttemptAt?: Timestamp;
  readonly lastError?: string;
  /** Sequence of the decision's audit entry */
  readonly sourceSequence?: number;
  readonly updatedAt: Timestamp;
  /** When the duty reached a terminal state */
  readonly concludedAt?: Timestamp;
}

export interface CreateDutyInput {
  readonly id: string;
  readonly policyId: string;
  readonly dataTarget: string;
  readonly retentionPeriod: string;
  readonly expiresAt: Timestamp;
  readonly createdAt: Timestamp;
  readonly sourceSequence?: number;
}

/**
 * Fields a transition may change besides the status
 */
export type DutyChanges = Partial<Pick<Duty, 'attemptCount' | 'nextAttemptAt' | 'lastError'>>;

export function createDuty(input: CreateDutyInput): Duty {
  return {
    id: input.id,
    policyId: input.policyId,
    dataTarget: input.dataTarget,
    retentionPeriod: input.retentionPeriod,
    createdAt: input.createdAt,
    expiresAt: input.expiresAt,
    status: DutyStatus.PENDING,
    attemptCount: 0,
    ...(input.sourceSequence !== undefined && { sourceSequence: input.sourceSequence }),
    updatedAt: input.createdAt,
  };
}

/**
 * Check if a state transition is valid
 */
export function canTransition(from: DutyStatusValue, to: DutyStatusValue): boolean {
  return VALID_TRANSITIONS[from].includes(to);
}

/**
 * Move a duty to a new status, throwing InvalidTransitionError when not allowed
 */
export function transitionDuty(
  duty: Duty,
  to: DutyStatusValue,
  at: Timestamp,
  changes: DutyChanges = {}
): Duty {
  if (!canTransition(duty.status, to)) {
    throw new InvalidTransitionError(
      `duty ${duty.id}`,
      duty.status,
      to,
      VALID_TRANSITIONS[duty.status]
    );
  }

  return {
    ...duty,
    ...changes,
    status: to,
    updatedAt: at,
    ...(isTerminalStatus(to) && { concludedAt: at }),
  };
}

/**
 * Check if a duty is in a terminal state
 */
export function isTerminalStatus(status: DutyStatusValue): boolean {
  return VALID_TRANSITIONS[status].length === 0;
}
