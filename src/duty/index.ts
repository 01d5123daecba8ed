/**
 * Retention duties for Retention PDP
 *
 * Provides:
 * - Lifecycle: duty states and the transition table
 * - Repository: in-memory and JSON-file duty persistence
 * - Scheduler: exactly-once execution of due duties through a deletion hook
 */

export * from './lifecycle.js';
export * from './repository.js';
export * from './scheduler.js';
