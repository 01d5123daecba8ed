import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import { mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { SchemaInvalidError } from '../../src/core/errors.js';
import type { Duty } from '../../src/duty/lifecycle.js';
import { DutyStatus, createDuty, transitionDuty } from '../../src/duty/lifecycle.js';
import type { DutyFilter } from '../../src/duty/repository.js';
import { InMemoryDutyRepository, JsonFileDutyRepository, isDue } from '../../src/duty/repository.js';

const CREATED = '2024-01-01T00:00:00.000Z';

function duty(id: string, expiresAt: string, dataTarget = 'customers'): Duty {
  return createDuty({
    id,
    policyId: 'analytics',
    dataTarget,
    retentionPeriod: '30d',
    createdAt: CREATED,
    expiresAt,
  });
}

describe('Duty repositories', () => {
  describe('isDue', () => {
    const base = duty('d1', '2024-01-31T00:00:00.000Z');

    it('should be due once expired', () => {
      expect(isDue(base, '2024-01-30T23:59:59.999Z')).toBe(false);
      expect(isDue(base, '2024-01-31T00:00:00.000Z')).toBe(true);
    });

    it('should wait out the retry backoff', () => {
      const backingOff: Duty = { ...base, nextAttemptAt: '2024-01-31T00:01:00.000Z' };

      expect(isDue(backingOff, '2024-01-31T00:00:30.000Z')).toBe(false);
      expect(isDue(backingOff, '2024-01-31T00:01:00.000Z')).toBe(true);
    });

    it('should ignore duties that are not PENDING', () => {
      const running = transitionDuty(base, DutyStatus.IN_PROGRESS, CREATED);
      expect(isDue(running, '2025-01-01T00:00:00.000Z')).toBe(false);
    });
  });

  describe('InMemoryDutyRepository', () => {
    it('should refuse duplicate ids', async () => {
      const repository = new InMemoryDutyRepository();

      expect(await repository.insert(duty('d1', '2024-02-01T00:00:00.000Z'))).toBe(true);
      expect(await repository.insert(duty('d1', '2024-03-01T00:00:00.000Z'))).toBe(false);
      expect((await repository.get('d1'))?.expiresAt).toBe('2024-02-01T00:00:00.000Z');
    });

    it('should reject updates to unknown duties', async () => {
      await expect(new InMemoryDutyRepository().update(duty('d1', CREATED))).rejects.toThrow(
        'Duty not found: d1'
      );
    });

    it('should list due duties oldest expiry first', async () => {
      const repository = new InMemoryDutyRepository();
      await repository.insert(duty('late', '2024-03-01T00:00:00.000Z'));
      await repository.insert(duty('early', '2024-02-01T00:00:00.000Z'));
      await repository.insert(duty('future', '2025-01-01T00:00:00.000Z'));
      await repository.insert(duty('tie', '2024-02-01T00:00:00.000Z'));

      const due = await repository.list({ dueAt: '2024-06-01T00:00:00.000Z' });

      expect(due.map((entry) => entry.id)).toEqual(['early', 'tie', 'late']);
    });

    it('should filter by status, policy and target', async () => {
      const repository = new InMemoryDutyRepository();
      await repository.insert(duty('a', CREATED, 'customers'));
      await repository.insert(duty('b', CREATED, 'orders'));
      await repository.update(transitionDuty(duty('b', CREATED, 'orders'), DutyStatus.IN_PROGRESS, CREATED));

      const ids = async (filter?: DutyFilter) =>
        (await repository.list(filter)).map((entry) => entry.id);

      expect(await ids({ status: DutyStatus.IN_PROGRESS })).toEqual(['b']);
      expect(await ids({ status: [DutyStatus.PENDING, DutyStatus.IN_PROGRESS] })).toEqual(['a', 'b']);
      expect(await ids({ dataTarget: 'customers' })).toEqual(['a']);
      expect(await ids({ policyId: 'other' })).toEqual([]);
      expect(await ids()).toEqual(['a', 'b']);
    });
  });

  describe('JsonFileDutyRepository', () => {
    let directory: string;

    beforeEach(async () => {
      directory = await mkdtemp(join(tmpdir(), 'pdp-duties-'));
    });

    afterEach(async () => {
      await rm(directory, { recursive: true, force: true });
    });

    it('should persist duties across instances', async () => {
      const first = new JsonFileDutyRepository(directory);
      await first.insert(duty('d1', '2024-02-01T00:00:00.000Z'));
      const retry = transitionDuty(
        transitionDuty(duty('d1', '2024-02-01T00:00:00.000Z'), DutyStatus.IN_PROGRESS, CREATED),
        DutyStatus.PENDING,
        CREATED,
        { attemptCount: 1, nextAttemptAt: '2024-02-01T00:01:00.000Z', lastError: 'timeout' }
      );
      await first.update(retry);

      const second = new JsonFileDutyRepository(directory);

      expect(await second.get('d1')).toEqual(retry);
      expect(await second.list()).toHaveLength(1);
    });

    it('should reject a malformed duty file', async () => {
      await writeFile(join(directory, 'duties.json'), JSON.stringify([{ id: 'd1', status: 'LOST' }]));

      await expect(new JsonFileDutyRepository(directory).list()).rejects.toThrow(SchemaInvalidError);
    });
  });
});
