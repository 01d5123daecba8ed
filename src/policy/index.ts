/**
 * Policy Engine for Retention PDP
 *
 * Provides:
 * - Schema: rule definitions, validation and specificity ranking
 * - Store: validated policy CRUD over a repository collaborator
 * - Evaluation: pure deny-overrides evaluation with retention obligations
 */

export * from './schema.js';
export * from './context.js';
export * from './evaluator.js';
export * from './repository.js';
export * from './store.js';
export * from './loader.js';
