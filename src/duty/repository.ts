/**
 * Persistence collaborators for duties.
 *
 * Duties are never removed; terminal duties stay for inspection.
 */

import { join } from 'path';
import { z } from 'zod';
import { SchemaInvalidError } from '../core/errors.js';
import { readJsonFile, writeJsonFileAtomic } from '../core/storage/json-file.js';
import { SerialQueue } from '../core/sync/serial-queue.js';
import type { Timestamp } from '../core/time/temporal.js';
import { compareTimestamps } from '../core/time/temporal.js';
import type { Duty, DutyStatusValue } from './lifecycle.js';
import { DutyStatus } from './lifecycle.js';

export interface DutyFilter {
  readonly status?: DutyStatusValue | readonly DutyStatusValue[];
  readonly policyId?: string;
  readonly dataTarget?: string;
  /** Only PENDING duties expired and out of backoff at this instant, oldest first */
  readonly dueAt?: Timestamp;
}

export interface DutyRepository {
  /** Returns false (and stores nothing) when the id already exists */
  insert(duty: Duty): Promise<boolean>;
  /** Replace a stored duty */
  update(duty: Duty): Promise<void>;
  get(id: string): Promise<Duty | null>;
  /** Matching duties in insertion order, or oldest-expiry first with `dueAt` */
  list(filter?: DutyFilter): Promise<readonly Duty[]>;
}

export function isDue(duty: Duty, at: Timestamp): boolean {
  return (
    duty.status === DutyStatus.PENDING &&
    compareTimestamps(duty.expiresAt, at) <= 0 &&
    (duty.nextAttemptAt === undefined || compareTimestamps(duty.nextAttemptAt, at) <= 0)
  );
}

export function matchesDutyFilter(duty: Duty, filter: DutyFilter): boolean {
  if (filter.status !== undefined) {
    const statuses: readonly DutyStatusValue[] =
      typeof filter.status === 'string' ? [filter.status] : filter.status;
    if (!statuses.includes(duty.status)) {
      return false;
    }
  }

  if (filter.policyId !== undefined && duty.policyId !== filter.policyId) {
    return false;
  }

  if (filter.dataTarget !== undefined && duty.dataTarget !== filter.dataTarget) {
    return false;
  }

  return filter.dueAt === undefined || isDue(duty, filter.dueAt);
}

/**
 * In-memory implementation of DutyRepository
 */
export class InMemoryDutyRepository implements DutyRepository {
  protected readonly duties = new Map<string, Duty>();

  async insert(duty: Duty): Promise<boolean> {
    if (this.duties.has(duty.id)) {
      return false;
    }
    this.duties.set(duty.id, duty);
    return true;
  }

  async update(duty: Duty): Promise<void> {
    if (!this.duties.has(duty.id)) {
      throw new Error(`Duty not found: ${duty.id}`);
    }
    this.duties.set(duty.id, duty);
  }

  async get(id: string): Promise<Duty | null> {
    return this.duties.get(id) ?? null;
  }

  async list(filter: DutyFilter = {}): Promise<readonly Duty[]> {
    const matching = Array.from(this.duties.values()).filter((duty) =>
      matchesDutyFilter(duty, filter)
    );

    if (filter.dueAt !== undefined) {
      // Stable: equal expiries keep insertion order
      matching.sort((a, b) => compareTimestamps(a.expiresAt, b.expiresAt));
    }

    return matching;
  }
}

const dutyRecordSchema = z
  .object({
    id: z.string().min(1),
    policyId: z.string(),
    dataTarget: z.string(),
    retentionPeriod: z.string(),
    createdAt: z.string(),
    expiresAt: z.string(),
    status: z.enum([
      DutyStatus.PENDING,
      DutyStatus.IN_PROGRESS,
      DutyStatus.COMPLETED,
      DutyStatus.FAILED,
    ]),
    attemptCount: z.number().int().min(0),
    nextAttemptAt: z.string().optional(),
    lastError: z.string().optional(),
    sourceSequence: z.number().int().min(0).optional(),
    updatedAt: z.string(),
    concludedAt: z.string().optional(),
  })
  .strict();

function toDuty(record: z.infer<typeof dutyRecordSchema>): Duty {
  const { nextAttemptAt, lastError, sourceSequence, concludedAt, ...required } = record;
  return {
    ...required,
    ...(nextAttemptAt !== undefined && { nextAttemptAt }),
    ...(lastError !== undefined && { lastError }),
    ...(sourceSequence !== undefined && { sourceSequence }),
    ...(concludedAt !== undefined && { concludedAt }),
  };
}

/**
 * Duty repository persisted as one JSON document (`duties.json`)
 */
export class JsonFileDutyRepository extends InMemoryDutyRepository {
  private readonly path: string;
  private readonly writes = new SerialQueue();
  private loaded: Promise<void> | null = null;

  constructor(directory: string, fileName = 'duties.json') {
    super();
    this.path = join(directory, fileName);
  }

  override async insert(duty: Duty): Promise<boolean> {
    await this.ensureLoaded();
    const inserted = await super.insert(duty);
    if (inserted) {
      await this.flush();
    }
    return inserted;
  }

  override async update(duty: Duty): Promise<void> {
    await this.ensureLoaded();
    await super.update(duty);
    await this.flush();
  }

  override async get(id: string): Promise<Duty | null> {
    await this.ensureLoaded();
    return super.get(id);
  }

  override async list(filter?: DutyFilter): Promise<readonly Duty[]> {
    await this.ensureLoaded();
    return super.list(filter);
  }

  private ensureLoaded(): Promise<void> {
    this.loaded ??= this.load();
    return this.loaded;
  }

  private async load(): Promise<void> {
    const document = await readJsonFile(this.path);
    if (document === null) {
      return;
    }

    const parsed = z.array(dutyRecordSchema).safeParse(document);
    if (!parsed.success) {
      throw new SchemaInvalidError(
        `duty file ${this.path}`,
        parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      );
    }

    for (const record of parsed.data) {
      this.duties.set(record.id, toDuty(record));
    }
  }

  private flush(): Promise<void> {
    const snapshot = Array.from(this.duties.values());
    return this.writes.run(() => writeJsonFileAtomic(this.path, snapshot));
  }
}
