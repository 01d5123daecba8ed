/**
 * Append-only storage for audit entries.
 *
 * Storage never computes hashes; it only keeps entries in sequence order and
 * refuses an entry whose sequence is not the next one it expects. That check
 * is how a second writer on the same log is detected.
 */

import { appendFile, mkdir, readFile, stat } from 'fs/promises';
import { dirname } from 'path';
import { ChainVerificationFailedError, ConcurrentWriteConflictError } from '../core/errors.js';
import { isMissingFile } from '../core/storage/json-file.js';
import type { AuditEntry } from './entry.js';
import { parseAuditRecord } from './entry.js';

/**
 * Audit storage contract
 */
export interface AuditStorage {
  /**
   * Persist one entry.
   * Rejects with ConcurrentWriteConflictError unless `entry.sequence` equals
   * the number of entries already stored.
   */
  append(entry: AuditEntry): Promise<void>;

  /**
   * Snapshot of every stored entry in sequence order.
   * Rejects with ChainVerificationFailedError when a record cannot be read.
   */
  readAll(): Promise<readonly AuditEntry[]>;
}

/**
 * In-memory implementation of AuditStorage
 * Suitable for testing and development
 */
export class InMemoryAuditStorage implements AuditStorage {
  private readonly entries: AuditEntry[];

  constructor(initial: readonly AuditEntry[] = []) {
    this.entries = [...initial];
  }

  async append(entry: AuditEntry): Promise<void> {
    if (entry.sequence !== this.entries.length) {
      throw new ConcurrentWriteConflictError(this.entries.length, entry.sequence);
    }
    this.entries.push(entry);
  }

  async readAll(): Promise<readonly AuditEntry[]> {
    return [...this.entries];
  }
}

/**
 * Audit storage as a JSON-lines file: one record per line, appended in place.
 */
export class JsonLinesAuditStorage implements AuditStorage {
  readonly path: string;
  /** Entry count and file size after our last read or write */
  private known: { count: number; size: number } | null = null;

  constructor(path: string) {
    this.path = path;
  }

  async append(entry: AuditEntry): Promise<void> {
    const count = await this.currentCount();
    if (entry.sequence !== count) {
      throw new ConcurrentWriteConflictError(count, entry.sequence);
    }

    const line = JSON.stringify(entry) + '\n';
    await mkdir(dirname(this.path), { recursive: true });
    await appendFile(this.path, line, 'utf8');

    const size = (this.known?.size ?? 0) + Buffer.byteLength(line, 'utf8');
    this.known = { count: count + 1, size };
  }

  async readAll(): Promise<readonly AuditEntry[]> {
    const raw = await this.readRaw();
    const lines = raw.split('\n');
    const entries: AuditEntry[] = [];

    for (const [index, line] of lines.entries()) {
      if (line.trim() === '') {
        continue;
      }

      let record: unknown;
      try {
        record = JSON.parse(line);
      } catch {
        throw new ChainVerificationFailedError(entries.length, `line ${index + 1} is not valid JSON`);
      }

      const result = parseAuditRecord(record);
      if (!result.valid) {
        throw new ChainVerificationFailedError(
          entries.length,
          `line ${index + 1} is not an audit record (${result.errors.join('; ')})`
        );
      }
      entries.push(result.entry);
    }

    this.known = { count: entries.length, size: Buffer.byteLength(raw, 'utf8') };
    return entries;
  }

  /**
   * Entry count on disk; re-read only when the file changed behind our back
   */
  private async currentCount(): Promise<number> {
    const size = await this.fileSize();
    if (this.known !== null && this.known.size === size) {
      return this.known.count;
    }
    return (await this.readAll()).length;
  }

  private async fileSize(): Promise<number> {
    try {
      return (await stat(this.path)).size;
    } catch (error) {
      if (isMissingFile(error)) {
        return 0;
      }
      throw error;
    }
  }

  private async readRaw(): Promise<string> {
    try {
      return await readFile(this.path, 'utf8');
    } catch (error) {
      if (isMissingFile(error)) {
        return '';
      }
      throw error;
    }
  }
}
