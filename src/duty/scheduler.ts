/**
 * Duty Scheduler for Retention PDP
 *
 * Turns the retention obligations of Permit decisions into deletion duties and
 * executes each one exactly once through a deletion hook:
 *
 * 1. `onDecision` materializes one PENDING duty per obligation (no audit write).
 * 2. `tick` runs the due duties. A duty's terminal state is persisted only
 *    after its Delete entry is in the audit log, so a crash between the two is
 *    repaired by the next tick from the log.
 * 3. Hook failures are retried with exponential backoff; after `maxAttempts`
 *    the duty is FAILED, which is audited too.
 */

import { randomUUID } from 'crypto';
import type { AuditLog } from '../audit/audit-log.js';
import type { AuditEntry, DeletePayload } from '../audit/entry.js';
import { AuditKind, DeleteOutcome } from '../audit/entry.js';
import { DEFAULT_ENGINE_CONFIG } from '../config/index.js';
import { DutyExecutionFailedError, describeError } from '../core/errors.js';
import { computeContentAddress } from '../core/identity/content-address.js';
import type { Logger } from '../core/logging/logger.js';
import { silentLogger } from '../core/logging/logger.js';
import { SerialQueue } from '../core/sync/serial-queue.js';
import type { Clock, Timestamp } from '../core/time/temporal.js';
import { addMilliseconds, systemClock } from '../core/time/temporal.js';
import type { Decision } from '../policy/evaluator.js';
import { Effect } from '../policy/schema.js';
import type { Duty } from './lifecycle.js';
import { DutyStatus, createDuty, transitionDuty } from './lifecycle.js';
import type { DutyFilter, DutyRepository } from './repository.js';
import { InMemoryDutyRepository } from './repository.js';

/**
 * Performs the actual deletion. Must be idempotent: a duty interrupted
 * between the hook and its audit entry is run again.
 */
export interface DeletionHook {
  delete(dataTarget: string, duty: Duty): Promise<void>;
}

export interface DutySchedulerOptions {
  readonly auditLog: AuditLog;
  readonly deletionHook: DeletionHook;
  readonly repository?: DutyRepository;
  readonly clock?: Clock;
  readonly logger?: Logger;
  /** Hook attempts before a duty becomes FAILED */
  readonly maxAttempts?: number;
  /** Base retry delay; attempt n waits retryBackoffMs * 2^(n-1) */
  readonly retryBackoffMs?: number;
  /** Duties executed per tick at most */
  readonly batchSize?: number;
}

export interface TickOptions {
  /** Stops the pass between duties */
  readonly signal?: AbortSignal;
}

export interface TickSummary {
  readonly completed: readonly string[];
  readonly failed: readonly string[];
  readonly retried: readonly string[];
  /** Duties still PENDING and due at the tick time after the pass */
  readonly stillPending: number;
}

type ExecutionOutcome = 'completed' | 'failed' | 'retried';

/**
 * Duty id derived from the decision's audit entry and the obligation index
 */
export function deriveDutyId(source: Pick<AuditEntry, 'hash'>, obligationIndex: number): string {
  return computeContentAddress({ source: source.hash, obligation: obligationIndex });
}

export class DutyScheduler {
  private readonly auditLog: AuditLog;
  private readonly hook: DeletionHook;
  private readonly repository: DutyRepository;
  private readonly clock: Clock;
  private readonly logger: Logger;
  private readonly maxAttempts: number;
  private readonly retryBackoffMs: number;
  private readonly batchSize: number;
  private readonly passes = new SerialQueue();
  private timer: NodeJS.Timeout | null = null;
  private scheduled: Promise<void> | null = null;

  constructor(options: DutySchedulerOptions) {
    this.auditLog = options.auditLog;
    this.hook = options.deletionHook;
    this.repository = options.repository ?? new InMemoryDutyRepository();
    this.clock = options.clock ?? systemClock;
    this.logger = (options.logger ?? silentLogger).child({ component: 'duty-scheduler' });
    this.maxAttempts = options.maxAttempts ?? DEFAULT_ENGINE_CONFIG.maxAttempts;
    this.retryBackoffMs = options.retryBackoffMs ?? DEFAULT_ENGINE_CONFIG.retryBackoffMs;
    this.batchSize = options.batchSize ?? DEFAULT_ENGINE_CONFIG.tickBatchSize;
  }

  /**
   * Materialize one PENDING duty per retention obligation of a Permit.
   * With the decision's audit entry as `source`, redelivery returns the
   * duties created the first time.
   */
  async onDecision(decision: Decision, source?: AuditEntry): Promise<readonly Duty[]> {
    if (decision.effect !== Effect.PERMIT || decision.obligations.length === 0) {
      return [];
    }

    const createdAt = decision.evaluatedAt;
    const duties: Duty[] = [];

    for (const [index, obligation] of decision.obligations.entries()) {
      const duty = createDuty({
        id: source ? deriveDutyId(source, index) : randomUUID(),
        policyId: decision.policyId,
        dataTarget: obligation.dataTarget,
        retentionPeriod: obligation.retentionPeriod,
        expiresAt: addMilliseconds(createdAt, obligation.retentionMs),
        createdAt,
        ...(source !== undefined && { sourceSequence: source.sequence }),
      });

      if (await this.repository.insert(duty)) {
        this.logger.debug('Scheduled duty', {
          dutyId: duty.id,
          dataTarget: duty.dataTarget,
          expiresAt: duty.expiresAt,
        });
        duties.push(duty);
        continue;
      }

      const existing = await this.repository.get(duty.id);
      if (existing) {
        duties.push(existing);
      }
    }

    return duties;
  }

  /**
   * Execute every duty due at `now`. Passes never overlap.
   */
  tick(now: Timestamp = this.clock(), options: TickOptions = {}): Promise<TickSummary> {
    return this.passes.run(() => this.runPass(now, options.signal));
  }

  /**
   * Start the periodic trigger
   */
  start(intervalMs: number): void {
    if (this.timer) {
      return;
    }

    this.timer = setInterval(() => {
      // Skip while the previous scheduled pass is still running
      if (this.scheduled) {
        return;
      }
      this.scheduled = this.tick()
        .then(
          (summary) => {
            this.logger.debug('Scheduled tick finished', {
              completed: summary.completed.length,
              failed: summary.failed.length,
              retried: summary.retried.length,
            });
          },
          (error: unknown) => {
            this.logger.error('Scheduled tick failed', {}, error);
          }
        )
        .finally(() => {
          this.scheduled = null;
        });
    }, intervalMs);
    this.timer.unref();

    this.logger.info('Scheduler started', { intervalMs });
  }

  /**
   * Stop the periodic trigger and wait for a running pass
   */
  async stop(): Promise<void> {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
      this.logger.info('Scheduler stopped');
    }
    await this.passes.drain();
  }

  get running(): boolean {
    return this.timer !== null;
  }

  async list(filter?: DutyFilter): Promise<readonly Duty[]> {
    return this.repository.list(filter);
  }

  async get(id: string): Promise<Duty | null> {
    return this.repository.get(id);
  }

  private async runPass(now: Timestamp, signal?: AbortSignal): Promise<TickSummary> {
    await this.reconcile(now);

    const due = (await this.repository.list({ dueAt: now })).slice(0, this.batchSize);
    const completed: string[] = [];
    const failed: string[] = [];
    const retried: string[] = [];

    for (const [index, duty] of due.entries()) {
      if (signal?.aborted) {
        this.logger.warn('Tick aborted', { remaining: due.length - index });
        break;
      }

      const outcome = await this.execute(duty, now);
      if (outcome === 'completed') {
        completed.push(duty.id);
      } else if (outcome === 'failed') {
        failed.push(duty.id);
      } else {
        retried.push(duty.id);
      }
    }

    const stillPending = (await this.repository.list({ dueAt: now })).length;
    return { completed, failed, retried, stillPending };
  }

  /**
   * Settle duties left IN_PROGRESS by an interrupted pass
   */
  private async reconcile(now: Timestamp): Promise<void> {
    const interrupted = await this.repository.list({ status: DutyStatus.IN_PROGRESS });

    for (const duty of interrupted) {
      const recorded = await this.auditLog.findDutyOutcome(duty.id);
      if (recorded === null) {
        await this.repository.update(transitionDuty(duty, DutyStatus.PENDING, now));
        this.logger.warn('Reverted interrupted duty', { dutyId: duty.id });
        continue;
      }

      const { outcome, attemptCount, error } = recorded.payload;
      await this.repository.update(
        transitionDuty(duty, outcome, now, {
          attemptCount,
          ...(error !== undefined && { lastError: error }),
        })
      );
      this.logger.info('Restored duty outcome from audit log', {
        dutyId: duty.id,
        outcome,
        sequence: recorded.sequence,
      });
    }
  }

  private async execute(duty: Duty, now: Timestamp): Promise<ExecutionOutcome> {
    const inProgress = transitionDuty(duty, DutyStatus.IN_PROGRESS, now);
    await this.repository.update(inProgress);

    const attempt = duty.attemptCount + 1;
    try {
      await this.hook.delete(duty.dataTarget, inProgress);
    } catch (cause) {
      const failure = new DutyExecutionFailedError(duty.id, attempt, cause);

      if (attempt < this.maxAttempts) {
        const nextAttemptAt = addMilliseconds(now, this.retryBackoffMs * 2 ** (attempt - 1));
        await this.repository.update(
          transitionDuty(inProgress, DutyStatus.PENDING, now, {
            attemptCount: attempt,
            nextAttemptAt,
            lastError: describeError(cause),
          })
        );
        this.logger.warn('Deletion failed, will retry', {
          dutyId: duty.id,
          attempt,
          nextAttemptAt,
          error: failure.message,
        });
        return 'retried';
      }

      await this.conclude(inProgress, now, {
        dutyId: duty.id,
        policyId: duty.policyId,
        dataTarget: duty.dataTarget,
        outcome: DeleteOutcome.FAILED,
        failed: true,
        attemptCount: attempt,
        error: describeError(cause),
      });
      this.logger.error('Duty failed permanently', { dutyId: duty.id, attempts: attempt }, failure);
      return 'failed';
    }

    await this.conclude(inProgress, now, {
      dutyId: duty.id,
      policyId: duty.policyId,
      dataTarget: duty.dataTarget,
      outcome: DeleteOutcome.COMPLETED,
      failed: false,
      attemptCount: attempt,
    });
    this.logger.info('Duty completed', { dutyId: duty.id, dataTarget: duty.dataTarget });
    return 'completed';
  }

  /**
   * Audit first, then persist the terminal state. If the audit append fails
   * the duty goes back to PENDING with its attempt count unchanged.
   */
  private async conclude(duty: Duty, now: Timestamp, payload: DeletePayload): Promise<void> {
    try {
      await this.auditLog.append({ kind: AuditKind.DELETE, payload });
    } catch (error) {
      await this.repository.update(transitionDuty(duty, DutyStatus.PENDING, now));
      this.logger.error('Audit append failed, duty reverted', { dutyId: duty.id }, error);
      throw error;
    }

    await this.repository.update(
      transitionDuty(duty, payload.outcome, now, {
        attemptCount: payload.attemptCount,
        ...(payload.error !== undefined && { lastError: payload.error }),
      })
    );
  }
}

export function createDutyScheduler(options: DutySchedulerOptions): DutyScheduler {
  return new DutyScheduler(options);
}
