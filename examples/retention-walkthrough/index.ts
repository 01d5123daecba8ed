/**
 * Retention Walkthrough
 *
 * Demonstrates the decision point end to end:
 * - A marketing analytics request is denied
 * - A service-improvement request is permitted with a 30 day retention duty
 * - A scheduler pass 31 days later deletes the data and audits the deletion
 * - The audit chain still verifies afterwards
 */

import {
  addMilliseconds,
  createPolicyBuilder,
  createPolicyDecisionPoint,
  silentLogger,
} from '../../src/index.js';
import type { DeletionHook, Timestamp } from '../../src/index.js';

const DAY_MS = 24 * 60 * 60 * 1000;

let currentTime: Timestamp = '2024-01-01T00:00:00.000Z';

const deleted: string[] = [];
const deletionHook: DeletionHook = {
  delete: async (dataTarget) => {
    deleted.push(dataTarget);
  },
};

const pdp = createPolicyDecisionPoint({
  deletionHook,
  clock: () => currentTime,
  logger: silentLogger,
});

const policy = createPolicyBuilder('analytics')
  .description('Analysts may use data to improve the service, never customer data for marketing')
  .permit({
    id: 'improve-service',
    role: 'analyst',
    purpose: 'service-improvement',
    retentionPeriod: '30d',
  })
  .deny({ id: 'no-marketing', purpose: 'marketing', dataTarget: 'customers' })
  .buildDefinition();

async function run(): Promise<void> {
  console.log('Retention PDP - Walkthrough');
  console.log('===========================\n');

  await pdp.policies.load([policy]);

  const marketing = await pdp.decide('analytics', {
    role: 'analyst',
    purpose: 'marketing',
    dataTarget: 'customers',
    location: 'EU',
  });
  console.log(`marketing request:           ${marketing.response.effect} (${marketing.decision.reason})`);

  const improvement = await pdp.decide('analytics', {
    role: 'analyst',
    purpose: 'service-improvement',
    dataTarget: 'customers',
    location: 'EU',
  });
  console.log(`service-improvement request: ${improvement.response.effect}`);
  for (const obligation of improvement.response.obligations) {
    console.log(`  retain ${obligation.dataTarget} for ${obligation.retentionPeriod}`);
  }

  currentTime = addMilliseconds(currentTime, 31 * DAY_MS);
  const summary = await pdp.flushDuties();
  console.log(`\nscheduler pass at ${currentTime}: completed ${summary.completed.length} duty`);
  console.log(`deleted targets: ${deleted.join(', ')}`);

  const entries = await pdp.readAudit();
  console.log(`\naudit entries: ${entries.map((entry) => entry.kind).join(', ')}`);

  const verification = await pdp.verifyAudit();
  console.log(`audit chain valid: ${verification.valid}`);
}

run().catch((error: unknown) => {
  console.error(error);
  process.exitCode = 1;
});
