/**
 * PolicyStore: validation and lookup of policies.
 *
 * Every write validates the full definition first and is rejected as a whole
 * on any error; nothing is partially applied. Compiled policies are cached in
 * an in-memory index in front of the repository. Writes run one at a time so
 * the duplicate-id check and the save that follows it cannot interleave.
 */

import { PolicyNotFoundError, SchemaInvalidError } from '../core/errors.js';
import type { Logger } from '../core/logging/logger.js';
import { silentLogger } from '../core/logging/logger.js';
import { SerialQueue } from '../core/sync/serial-queue.js';
import type { PolicyRepository } from './repository.js';
import { InMemoryPolicyRepository } from './repository.js';
import type { RequestContext } from './context.js';
import type { Decision } from './evaluator.js';
import { evaluate } from './evaluator.js';
import type { Policy } from './schema.js';
import { compilePolicy, describePolicyId, toPolicyDefinition, validatePolicyDefinition } from './schema.js';

/**
 * Policies produced by one load, in definition order
 */
export interface PolicySet {
  readonly policies: readonly Policy[];
  get(id: string): Policy | undefined;
}

export interface PolicyStoreOptions {
  readonly repository?: PolicyRepository;
  readonly logger?: Logger;
}

function createPolicySet(policies: readonly Policy[]): PolicySet {
  const byId = new Map(policies.map((policy) => [policy.id, policy]));
  return {
    policies,
    get: (id) => byId.get(id),
  };
}

export class PolicyStore {
  private readonly repository: PolicyRepository;
  private readonly logger: Logger;
  private readonly cache = new Map<string, Policy>();
  private readonly writes = new SerialQueue();

  constructor(options: PolicyStoreOptions = {}) {
    this.repository = options.repository ?? new InMemoryPolicyRepository();
    this.logger = (options.logger ?? silentLogger).child({ component: 'policy-store' });
  }

  /**
   * Validate and store a batch of definitions.
   * Fails with SchemaInvalid (listing every error) if any definition is
   * invalid or any id is duplicated in the batch or already stored.
   */
  load(definitions: readonly unknown[]): Promise<PolicySet> {
    return this.writes.run(() => this.loadBatch(definitions));
  }

  private async loadBatch(definitions: readonly unknown[]): Promise<PolicySet> {
    const errors: string[] = [];
    const policies: Policy[] = [];
    const batchIds = new Set<string>();

    for (const [index, definition] of definitions.entries()) {
      const result = validatePolicyDefinition(definition);
      const label = describePolicyId(definition) ?? `#${index}`;
      if (!result.valid) {
        errors.push(...result.errors.map((error) => `policy ${label}: ${error}`));
        continue;
      }

      const { policy } = result;
      if (batchIds.has(policy.id)) {
        errors.push(`policy ${label}: duplicate policy id in batch`);
        continue;
      }
      batchIds.add(policy.id);

      if ((await this.repository.get(policy.id)) !== null) {
        errors.push(`policy ${label}: policy id already exists`);
        continue;
      }
      policies.push(policy);
    }

    if (errors.length > 0) {
      this.logger.warn('Rejected policy batch', { count: definitions.length, errors });
      throw new SchemaInvalidError('policy set', errors);
    }

    await this.repository.save(policies.map(toPolicyDefinition));
    for (const policy of policies) {
      this.cache.set(policy.id, policy);
    }

    this.logger.info('Loaded policies', { ids: policies.map((policy) => policy.id) });
    return createPolicySet(policies);
  }

  async get(id: string): Promise<Policy> {
    const cached = this.cache.get(id);
    if (cached) {
      return cached;
    }

    const definition = await this.repository.get(id);
    if (definition === null) {
      throw new PolicyNotFoundError(id);
    }

    const policy = compilePolicy(definition);
    this.cache.set(id, policy);
    return policy;
  }

  async has(id: string): Promise<boolean> {
    return this.cache.has(id) || (await this.repository.get(id)) !== null;
  }

  /**
   * All policies in insertion order
   */
  async list(): Promise<readonly Policy[]> {
    const definitions = await this.repository.list();
    return definitions.map((definition) => {
      const cached = this.cache.get(definition.id);
      if (cached) {
        return cached;
      }
      const policy = compilePolicy(definition);
      this.cache.set(policy.id, policy);
      return policy;
    });
  }

  async create(definition: unknown): Promise<Policy> {
    const set = await this.load([definition]);
    const created = set.policies[0];
    if (created === undefined) {
      throw new SchemaInvalidError('policy', ['no policy in definition']);
    }
    return created;
  }

  /**
   * Replace a policy; the definition is re-validated and its id must match
   */
  update(id: string, definition: unknown): Promise<Policy> {
    return this.writes.run(() => this.replace(id, definition));
  }

  private async replace(id: string, definition: unknown): Promise<Policy> {
    if ((await this.repository.get(id)) === null) {
      throw new PolicyNotFoundError(id);
    }

    const policy = compilePolicy(definition);
    if (policy.id !== id) {
      throw new SchemaInvalidError(`policy "${id}"`, [
        `id: "${policy.id}" does not match the policy being updated`,
      ]);
    }

    await this.repository.save([toPolicyDefinition(policy)]);
    this.cache.set(id, policy);
    this.logger.info('Updated policy', { id });
    return policy;
  }

  delete(id: string): Promise<void> {
    return this.writes.run(() => this.remove(id));
  }

  private async remove(id: string): Promise<void> {
    const removed = await this.repository.delete(id);
    this.cache.delete(id);
    if (!removed) {
      throw new PolicyNotFoundError(id);
    }
    this.logger.info('Deleted policy', { id });
  }
}

/**
 * Look up a policy and evaluate a context against it
 */
export async function evaluateById(
  store: PolicyStore,
  policyId: string,
  context: RequestContext
): Promise<Decision> {
  const policy = await store.get(policyId);
  return evaluate(policy, context);
}

export function createPolicyStore(options?: PolicyStoreOptions): PolicyStore {
  return new PolicyStore(options);
}
