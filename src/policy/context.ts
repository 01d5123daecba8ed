/**
 * Request contexts: the four match attributes plus the request time.
 * Built once per request at the boundary and frozen.
 */

import { z } from 'zod';
import { RequestInvalidError } from '../core/errors.js';
import type { Clock, Timestamp } from '../core/time/temporal.js';
import { normalizeTimestamp } from '../core/time/temporal.js';
import { WILDCARD } from './schema.js';

export interface RequestContext {
  readonly role: string;
  readonly purpose: string;
  readonly dataTarget: string;
  readonly location: string;
  readonly timestamp: Timestamp;
}

const attributeSchema = z
  .string()
  .trim()
  .min(1, 'is required')
  .refine((value) => value !== WILDCARD, 'must be a concrete value, not "*"');

const contextSchema = z.object({
  role: attributeSchema,
  purpose: attributeSchema,
  dataTarget: attributeSchema,
  location: attributeSchema,
  timestamp: z.string().optional(),
});

/**
 * Validate raw request input into an immutable context.
 * A missing timestamp is taken from the clock.
 */
export function createRequestContext(input: unknown, clock?: Clock): RequestContext {
  const parsed = contextSchema.safeParse(input);
  if (!parsed.success) {
    throw new RequestInvalidError(
      parsed.error.issues.map((issue) =>
        issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
      )
    );
  }

  const raw = parsed.data;
  const rawTimestamp = raw.timestamp ?? clock?.();
  if (rawTimestamp === undefined) {
    throw new RequestInvalidError(['timestamp: is required']);
  }

  const timestamp = normalizeTimestamp(rawTimestamp);
  if (timestamp === null) {
    throw new RequestInvalidError([`timestamp: "${rawTimestamp}" is not an ISO 8601 timestamp`]);
  }

  return Object.freeze({
    role: raw.role,
    purpose: raw.purpose,
    dataTarget: raw.dataTarget,
    location: raw.location,
    timestamp,
  });
}
