/**
 * Audit trail for Retention PDP
 *
 * Provides:
 * - Entry: hash-chained entry model and persisted record validation
 * - Storage: in-memory and JSON-lines append-only collaborators
 * - AuditLog: single-writer append, verification and range reads
 */

export * from './entry.js';
export * from './storage.js';
export * from './audit-log.js';
