/**
 * Persistence collaborators for policy definitions.
 *
 * The store validates; repositories only keep validated definitions
 * keyed by policy id, in insertion order.
 */

import { join } from 'path';
import { SchemaInvalidError } from '../core/errors.js';
import { readJsonFile, writeJsonFileAtomic } from '../core/storage/json-file.js';
import { SerialQueue } from '../core/sync/serial-queue.js';
import type { PolicyDefinition } from './schema.js';
import { compilePolicy, toPolicyDefinition } from './schema.js';

export interface PolicyRepository {
  /** All stored definitions in insertion order */
  list(): Promise<readonly PolicyDefinition[]>;
  get(id: string): Promise<PolicyDefinition | null>;
  /** Insert or replace; replacing keeps the original position */
  save(definitions: readonly PolicyDefinition[]): Promise<void>;
  /** Returns false when the id was unknown */
  delete(id: string): Promise<boolean>;
}

/**
 * In-memory implementation of PolicyRepository
 */
export class InMemoryPolicyRepository implements PolicyRepository {
  protected readonly definitions = new Map<string, PolicyDefinition>();

  async list(): Promise<readonly PolicyDefinition[]> {
    return Array.from(this.definitions.values());
  }

  async get(id: string): Promise<PolicyDefinition | null> {
    return this.definitions.get(id) ?? null;
  }

  async save(definitions: readonly PolicyDefinition[]): Promise<void> {
    for (const definition of definitions) {
      this.definitions.set(definition.id, definition);
    }
  }

  async delete(id: string): Promise<boolean> {
    return this.definitions.delete(id);
  }
}

/**
 * Policy repository persisted as one JSON document (`policies.json`).
 * The document is re-validated when first read.
 */
export class JsonFilePolicyRepository extends InMemoryPolicyRepository {
  private readonly path: string;
  private readonly writes = new SerialQueue();
  private loaded: Promise<void> | null = null;

  constructor(directory: string, fileName = 'policies.json') {
    super();
    this.path = join(directory, fileName);
  }

  override async list(): Promise<readonly PolicyDefinition[]> {
    await this.ensureLoaded();
    return super.list();
  }

  override async get(id: string): Promise<PolicyDefinition | null> {
    await this.ensureLoaded();
    return super.get(id);
  }

  override async save(definitions: readonly PolicyDefinition[]): Promise<void> {
    await this.ensureLoaded();
    await super.save(definitions);
    await this.flush();
  }

  override async delete(id: string): Promise<boolean> {
    await this.ensureLoaded();
    const removed = await super.delete(id);
    if (removed) {
      await this.flush();
    }
    return removed;
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
    if (!Array.isArray(document)) {
      throw new SchemaInvalidError(`policy file ${this.path}`, ['expected a JSON array of policies']);
    }
    const entries: readonly unknown[] = document;
    for (const entry of entries) {
      const policy = compilePolicy(entry);
      this.definitions.set(policy.id, toPolicyDefinition(policy));
    }
  }

  private flush(): Promise<void> {
    const snapshot = Array.from(this.definitions.values());
    return this.writes.run(() => writeJsonFileAtomic(this.path, snapshot));
  }
}
