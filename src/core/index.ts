/**
 * Core Module for Retention PDP
 *
 * Foundations shared by every component: identity and hashing, time,
 * errors, logging, the single-writer queue and file storage helpers.
 */

export * from './identity/content-address.js';
export * from './time/temporal.js';
export * from './time/duration.js';
export * from './errors.js';
export * from './logging/logger.js';
export * from './sync/serial-queue.js';
export * from './storage/json-file.js';
