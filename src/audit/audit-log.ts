/**
 * Hash-chained, append-only audit log
 *
 * - `append` is the only mutator; appends are linearized through a
 *   single-writer queue held just for hashing and the storage write.
 * - `verify` and `read` work on a snapshot read back from storage, so they
 *   check what was actually persisted.
 * - A sequence conflict reported by storage means another writer touched the
 *   log; the writer stops accepting appends for good.
 */

import type { ContentAddress } from '../core/identity/content-address.js';
import { ChainVerificationFailedError, ConcurrentWriteConflictError } from '../core/errors.js';
import type { Logger } from '../core/logging/logger.js';
import { silentLogger } from '../core/logging/logger.js';
import { SerialQueue } from '../core/sync/serial-queue.js';
import type { Clock } from '../core/time/temporal.js';
import { systemClock } from '../core/time/temporal.js';
import type {
  AuditEntry,
  AuditEntryInput,
  AuditKindValue,
  DecisionAuditEntry,
  DeleteAuditEntry,
} from './entry.js';
import { AuditKind, GENESIS_HASH, computeEntryHash } from './entry.js';
import type { AuditStorage } from './storage.js';

export interface AuditLogOptions {
  readonly clock?: Clock;
  readonly logger?: Logger;
}

/**
 * Range query over the log
 */
export interface AuditReadRange {
  /** First sequence number (inclusive) */
  readonly fromSequence?: number;
  /** Last sequence number (exclusive) */
  readonly toSequence?: number;
  readonly kinds?: readonly AuditKindValue[];
  /** Maximum number of entries to return */
  readonly limit?: number;
}

export type VerificationResult =
  | { readonly valid: true; readonly checked: number }
  | {
      readonly valid: false;
      /** Index of the first entry that does not verify */
      readonly firstBadIndex: number;
      /** Entries verified intact before it */
      readonly checked: number;
      readonly reason: string;
    };

interface ChainHead {
  readonly nextSequence: number;
  readonly hash: ContentAddress;
  /** Delete entries by duty id */
  readonly outcomes: Map<string, DeleteAuditEntry>;
}

export class AuditLog {
  private readonly storage: AuditStorage;
  private readonly clock: Clock;
  private readonly logger: Logger;
  private readonly writer = new SerialQueue();
  private head: Promise<ChainHead> | null = null;
  private fatal: ConcurrentWriteConflictError | null = null;

  constructor(storage: AuditStorage, options: AuditLogOptions = {}) {
    this.storage = storage;
    this.clock = options.clock ?? systemClock;
    this.logger = (options.logger ?? silentLogger).child({ component: 'audit-log' });
  }

  /**
   * Open a log over existing storage, restoring the chain head eagerly
   */
  static async open(storage: AuditStorage, options: AuditLogOptions = {}): Promise<AuditLog> {
    const log = new AuditLog(storage, options);
    await log.restoreHead();
    return log;
  }

  /**
   * Append an entry to the chain
   */
  append(input: Extract<AuditEntryInput, { kind: 'DECISION' }>): Promise<DecisionAuditEntry>;
  append(input: Extract<AuditEntryInput, { kind: 'DELETE' }>): Promise<DeleteAuditEntry>;
  append(input: AuditEntryInput): Promise<AuditEntry>;
  append(input: AuditEntryInput): Promise<AuditEntry> {
    return this.writer.run(async () => {
      if (this.fatal) {
        throw this.fatal;
      }

      const head = await this.restoreHead();
      const fields = {
        sequence: head.nextSequence,
        timestamp: this.clock(),
        ...input,
      };
      const entry: AuditEntry = Object.freeze({
        ...fields,
        previousHash: head.hash,
        hash: computeEntryHash(head.hash, fields),
      });

      try {
        await this.storage.append(entry);
      } catch (error) {
        if (error instanceof ConcurrentWriteConflictError) {
          this.fatal = error;
          this.logger.error(
            'Audit writer stopped after a concurrent write',
            { expected: error.expected, actual: error.actual },
            error
          );
        }
        throw error;
      }

      if (entry.kind === AuditKind.DELETE) {
        head.outcomes.set(entry.payload.dutyId, entry);
      }
      this.head = Promise.resolve({
        nextSequence: entry.sequence + 1,
        hash: entry.hash,
        outcomes: head.outcomes,
      });

      this.logger.debug('Appended audit entry', { sequence: entry.sequence, kind: entry.kind });
      return entry;
    });
  }

  /**
   * Recompute the chain from persisted entries, stopping at the first mismatch
   */
  async verify(): Promise<VerificationResult> {
    let entries: readonly AuditEntry[];
    try {
      entries = await this.storage.readAll();
    } catch (error) {
      if (error instanceof ChainVerificationFailedError) {
        return this.reportBroken(error.index, error.message);
      }
      throw error;
    }

    let previousHash = GENESIS_HASH;
    for (const [index, entry] of entries.entries()) {
      if (entry.sequence !== index) {
        return this.reportBroken(index, `sequence ${entry.sequence} out of order`);
      }
      if (entry.previousHash !== previousHash) {
        return this.reportBroken(index, 'previousHash does not link to the prior entry');
      }
      if (computeEntryHash(previousHash, entry) !== entry.hash) {
        return this.reportBroken(index, 'hash does not match entry contents');
      }
      previousHash = entry.hash;
    }

    return { valid: true, checked: entries.length };
  }

  /**
   * Throw ChainVerificationFailedError when the chain does not verify
   */
  async assertIntact(): Promise<void> {
    const result = await this.verify();
    if (!result.valid) {
      throw new ChainVerificationFailedError(result.firstBadIndex, result.reason);
    }
  }

  async read(range: AuditReadRange = {}): Promise<readonly AuditEntry[]> {
    const { fromSequence, toSequence, kinds, limit } = range;
    const entries = (await this.storage.readAll()).filter(
      (entry) =>
        (fromSequence === undefined || entry.sequence >= fromSequence) &&
        (toSequence === undefined || entry.sequence < toSequence) &&
        (kinds === undefined || kinds.length === 0 || kinds.includes(entry.kind))
    );

    return limit !== undefined ? entries.slice(0, limit) : entries;
  }

  /**
   * The Delete entry already recorded for a duty, if any
   */
  async findDutyOutcome(dutyId: string): Promise<DeleteAuditEntry | null> {
    const head = await this.restoreHead();
    return head.outcomes.get(dutyId) ?? null;
  }

  /**
   * Number of entries appended so far
   */
  async size(): Promise<number> {
    return (await this.restoreHead()).nextSequence;
  }

  /**
   * Shared head promise; a failed load is dropped so the next call reads again
   */
  private restoreHead(): Promise<ChainHead> {
    this.head ??= this.loadHead().catch((error: unknown) => {
      this.head = null;
      throw error;
    });
    return this.head;
  }

  private async loadHead(): Promise<ChainHead> {
    const entries = await this.storage.readAll();
    const outcomes = new Map<string, DeleteAuditEntry>();
    for (const entry of entries) {
      if (entry.kind === AuditKind.DELETE) {
        outcomes.set(entry.payload.dutyId, entry);
      }
    }

    const last = entries[entries.length - 1];
    return {
      nextSequence: last ? last.sequence + 1 : 0,
      hash: last ? last.hash : GENESIS_HASH,
      outcomes,
    };
  }

  private reportBroken(index: number, reason: string): VerificationResult {
    this.logger.error('Audit chain verification failed', { firstBadIndex: index, reason });
    return { valid: false, firstBadIndex: index, checked: index, reason };
  }
}

/**
 * Create an audit log; the chain head is restored on first use
 */
export function createAuditLog(storage: AuditStorage, options?: AuditLogOptions): AuditLog {
  return new AuditLog(storage, options);
}
