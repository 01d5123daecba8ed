/**
 * Retention PDP
 *
 * Policy decision point with deny-overrides evaluation, a hash-chained audit
 * trail and scheduled retention deletion duties.
 *
 * @packageDocumentation
 */

// Core module exports
export * from './core/index.js';

// Configuration exports
export * from './config/index.js';

// Policy Engine exports
export * from './policy/index.js';

// Audit trail exports
export * from './audit/index.js';

// Retention duty exports
export * from './duty/index.js';

// Decision point facade
export * from './engine/pdp.js';

// Version
export const VERSION = '0.1.0';
