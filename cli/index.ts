/**
 * CLI Tools for Retention PDP
 *
 * Provides:
 * - pdp: evaluate requests, verify and list audit logs
 * - Lint: policy linting for CI/CD integration
 */

export * from './pdp.js';
export * from './lint.js';
