/**
 * Integration test: decisions, audit trail and retention deletion end to end
 */

import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import { mkdtemp, readdir, rm } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { PolicyNotFoundError, RequestInvalidError, SchemaInvalidError } from '../../src/core/errors.js';
import { silentLogger } from '../../src/core/logging/logger.js';
import type { Duty } from '../../src/duty/lifecycle.js';
import type { DeletionHook } from '../../src/duty/scheduler.js';
import { deriveDutyId } from '../../src/duty/scheduler.js';
import { createPolicyDecisionPoint } from '../../src/engine/pdp.js';
import type { PolicyDecisionPoint } from '../../src/engine/pdp.js';
import { createPolicyBuilder } from '../../src/policy/schema.js';

const NOW = '2024-01-01T00:00:00.000Z';

const analytics = createPolicyBuilder('analytics')
  .permit({ id: 'improve-service', role: 'analyst', purpose: 'service-improvement', retentionPeriod: '30d' })
  .deny({ id: 'no-marketing', purpose: 'marketing', dataTarget: 'customers' })
  .buildDefinition();

function request(purpose: string) {
  return { role: 'analyst', purpose, dataTarget: 'customers', location: 'EU' };
}

class RecordingHook implements DeletionHook {
  readonly deleted: Array<{ dataTarget: string; dutyId: string }> = [];

  async delete(dataTarget: string, duty: Duty): Promise<void> {
    this.deleted.push({ dataTarget, dutyId: duty.id });
  }
}

describe('Retention workflow', () => {
  let current: string;
  let hook: RecordingHook;

  const clock = () => current;

  function createPdp(dataDir?: string): PolicyDecisionPoint {
    return createPolicyDecisionPoint({
      deletionHook: hook,
      clock,
      logger: silentLogger,
      ...(dataDir !== undefined && { config: { dataDir } }),
    });
  }

  beforeEach(() => {
    current = NOW;
    hook = new RecordingHook();
  });

  describe('in memory', () => {
    let pdp: PolicyDecisionPoint;

    beforeEach(async () => {
      pdp = createPdp();
      await pdp.policies.load([analytics]);
    });

    it('should deny marketing use without scheduling a duty', async () => {
      const result = await pdp.decide('analytics', request('marketing'));

      expect(result.response).toEqual({ effect: 'Deny', obligations: [] });
      expect(result.decision.matchedRuleId).toBe('no-marketing');
      expect(result.entry.sequence).toBe(0);
      expect(result.duties).toEqual([]);
    });

    it('should delete the data once the retention period has passed', async () => {
      await pdp.decide('analytics', request('marketing'));
      const permit = await pdp.decide('analytics', request('service-improvement'));
      const [duty] = permit.duties;

      expect(permit.response).toEqual({
        effect: 'Permit',
        obligations: [{ dataTarget: 'customers', retentionPeriod: '30d' }],
      });
      expect(duty?.id).toBe(deriveDutyId(permit.entry, 0));
      expect(duty?.expiresAt).toBe('2024-01-31T00:00:00.000Z');

      current = '2024-01-30T00:00:00.000Z';
      expect((await pdp.flushDuties()).completed).toEqual([]);
      expect(hook.deleted).toEqual([]);

      current = '2024-02-01T00:00:00.000Z';
      const summary = await pdp.flushDuties();

      expect(summary).toEqual({ completed: [duty?.id], failed: [], retried: [], stillPending: 0 });
      expect(hook.deleted).toEqual([{ dataTarget: 'customers', dutyId: duty?.id }]);

      const entries = await pdp.readAudit();
      expect(entries.map((entry) => entry.kind)).toEqual(['DECISION', 'DECISION', 'DELETE']);
      expect(entries[2]?.timestamp).toBe('2024-02-01T00:00:00.000Z');
      expect(await pdp.verifyAudit()).toEqual({ valid: true, checked: 3 });
    });

    it('should reject bad lookups and requests before writing to the audit log', async () => {
      await expect(pdp.decide('unknown', request('marketing'))).rejects.toThrow(PolicyNotFoundError);
      await expect(pdp.decide('analytics', { role: 'analyst' })).rejects.toThrow(RequestInvalidError);

      expect(await pdp.auditLog.size()).toBe(0);
    });

    it('should refuse a policy whose retention cannot be scheduled', async () => {
      const forever = createPolicyBuilder('forever')
        .permit({ id: 'keep', retentionPeriod: '100000000d' })
        .buildDefinition();

      await expect(pdp.policies.create(forever)).rejects.toThrow(SchemaInvalidError);
      await expect(pdp.decide('forever', request('marketing'))).rejects.toThrow(PolicyNotFoundError);
      expect(await pdp.auditLog.size()).toBe(0);
      expect(await pdp.duties.list()).toEqual([]);
    });

    it('should stamp requests without a timestamp with the clock', async () => {
      const result = await pdp.decide('analytics', request('service-improvement'));
      expect(result.decision.evaluatedAt).toBe(NOW);
    });
  });

  describe('with a data directory', () => {
    let dataDir: string;

    beforeEach(async () => {
      dataDir = await mkdtemp(join(tmpdir(), 'pdp-workflow-'));
    });

    afterEach(async () => {
      await rm(dataDir, { recursive: true, force: true });
    });

    it('should carry policies, duties and the audit chain across restarts', async () => {
      const first = createPdp(dataDir);
      await first.policies.load([analytics]);
      const permit = await first.decide('analytics', request('service-improvement'));
      const dutyId = permit.duties[0]?.id;

      expect((await readdir(dataDir)).sort()).toEqual(['audit.jsonl', 'duties.json', 'policies.json']);

      current = '2024-03-01T00:00:00.000Z';
      const second = createPdp(dataDir);

      expect((await second.policies.list()).map((policy) => policy.id)).toEqual(['analytics']);
      expect((await second.flushDuties()).completed).toEqual([dutyId]);

      const denied = await second.decide('analytics', request('marketing'));
      expect(denied.entry.sequence).toBe(2);

      const third = createPdp(dataDir);
      expect(await third.verifyAudit()).toEqual({ valid: true, checked: 3 });
      expect((await third.duties.list({ status: 'COMPLETED' })).map((duty) => duty.id)).toEqual([dutyId]);
      expect(hook.deleted).toHaveLength(1);
    });
  });
});
