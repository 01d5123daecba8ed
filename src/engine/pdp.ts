/**
 * Policy Decision Point
 *
 * Wires the policy store, the evaluator, the audit log and the duty
 * scheduler together. A request flows:
 *
 *   validate context → PolicyStore.get → evaluate → AuditLog.append(DECISION)
 *     → DutyScheduler.onDecision
 *
 * Validation and lookup failures are raised before anything reaches the
 * audit chain.
 */

import { join } from 'path';
import type { AuditLog, AuditReadRange, VerificationResult } from '../audit/audit-log.js';
import { createAuditLog } from '../audit/audit-log.js';
import type { AuditEntry, DecisionAuditEntry } from '../audit/entry.js';
import { AuditKind } from '../audit/entry.js';
import type { AuditStorage } from '../audit/storage.js';
import { InMemoryAuditStorage, JsonLinesAuditStorage } from '../audit/storage.js';
import type { EngineConfig } from '../config/index.js';
import { DEFAULT_ENGINE_CONFIG } from '../config/index.js';
import type { Logger } from '../core/logging/logger.js';
import { createLogger } from '../core/logging/logger.js';
import type { Clock, Timestamp } from '../core/time/temporal.js';
import { systemClock } from '../core/time/temporal.js';
import type { Duty } from '../duty/lifecycle.js';
import type { DutyRepository } from '../duty/repository.js';
import { InMemoryDutyRepository, JsonFileDutyRepository } from '../duty/repository.js';
import type { DeletionHook, TickOptions, TickSummary } from '../duty/scheduler.js';
import { DutyScheduler } from '../duty/scheduler.js';
import { createRequestContext } from '../policy/context.js';
import type { Decision, DecisionResponse } from '../policy/evaluator.js';
import { evaluate, toDecisionResponse } from '../policy/evaluator.js';
import type { PolicyRepository } from '../policy/repository.js';
import { InMemoryPolicyRepository, JsonFilePolicyRepository } from '../policy/repository.js';
import { PolicyStore } from '../policy/store.js';

export const AUDIT_LOG_FILE = 'audit.jsonl';

export interface PolicyDecisionPointOptions {
  readonly deletionHook: DeletionHook;
  readonly config?: Partial<EngineConfig>;
  readonly clock?: Clock;
  readonly logger?: Logger;
  readonly policyRepository?: PolicyRepository;
  readonly dutyRepository?: DutyRepository;
  readonly auditStorage?: AuditStorage;
}

/**
 * Everything a single decide call produced
 */
export interface DecideResult {
  readonly decision: Decision;
  readonly response: DecisionResponse;
  readonly entry: DecisionAuditEntry;
  /** Duties materialized from the decision's obligations */
  readonly duties: readonly Duty[];
}

export class PolicyDecisionPoint {
  readonly config: EngineConfig;
  readonly policies: PolicyStore;
  readonly auditLog: AuditLog;
  readonly duties: DutyScheduler;
  private readonly clock: Clock;
  private readonly logger: Logger;

  constructor(options: PolicyDecisionPointOptions) {
    this.config = { ...DEFAULT_ENGINE_CONFIG, ...options.config };
    this.clock = options.clock ?? systemClock;
    this.logger =
      options.logger ??
      createLogger({ service: this.config.serviceName, level: this.config.logLevel });

    const { dataDir } = this.config;
    const policyRepository =
      options.policyRepository ??
      (dataDir !== undefined ? new JsonFilePolicyRepository(dataDir) : new InMemoryPolicyRepository());
    const dutyRepository =
      options.dutyRepository ??
      (dataDir !== undefined ? new JsonFileDutyRepository(dataDir) : new InMemoryDutyRepository());
    const auditStorage =
      options.auditStorage ??
      (dataDir !== undefined
        ? new JsonLinesAuditStorage(join(dataDir, AUDIT_LOG_FILE))
        : new InMemoryAuditStorage());

    this.policies = new PolicyStore({ repository: policyRepository, logger: this.logger });
    this.auditLog = createAuditLog(auditStorage, { clock: this.clock, logger: this.logger });
    this.duties = new DutyScheduler({
      auditLog: this.auditLog,
      deletionHook: options.deletionHook,
      repository: dutyRepository,
      clock: this.clock,
      logger: this.logger,
      maxAttempts: this.config.maxAttempts,
      retryBackoffMs: this.config.retryBackoffMs,
      batchSize: this.config.tickBatchSize,
    });
  }

  /**
   * Decide a request against a policy and record the decision
   */
  async decide(policyId: string, request: unknown): Promise<DecideResult> {
    const context = createRequestContext(request, this.clock);
    const policy = await this.policies.get(policyId);
    const decision = evaluate(policy, context);

    const entry = await this.auditLog.append({
      kind: AuditKind.DECISION,
      payload: { policyId, context, decision },
    });
    const duties = await this.duties.onDecision(decision, entry);

    this.logger.debug('Decision recorded', {
      policyId,
      effect: decision.effect,
      reason: decision.reason,
      sequence: entry.sequence,
      duties: duties.length,
    });

    return { decision, response: toDecisionResponse(decision), entry, duties };
  }

  verifyAudit(): Promise<VerificationResult> {
    return this.auditLog.verify();
  }

  readAudit(range?: AuditReadRange): Promise<readonly AuditEntry[]> {
    return this.auditLog.read(range);
  }

  /**
   * Run one scheduler pass now
   */
  flushDuties(now?: Timestamp, options?: TickOptions): Promise<TickSummary> {
    return this.duties.tick(now ?? this.clock(), options);
  }

  /**
   * Start the periodic scheduler at the configured interval
   */
  start(): void {
    this.duties.start(this.config.tickIntervalMs);
  }

  async stop(): Promise<void> {
    await this.duties.stop();
  }
}

export function createPolicyDecisionPoint(options: PolicyDecisionPointOptions): PolicyDecisionPoint {
  return new PolicyDecisionPoint(options);
}
