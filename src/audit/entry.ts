/**
 * Audit entries for Retention PDP
 *
 * Every decision and every duty outcome is one entry in a hash chain:
 *
 *   hash = sha256(previousHash ‖ canonical({ sequence, timestamp, kind, payload }))
 *
 * Entry 0 links to GENESIS_HASH. Changing any field of any entry changes its
 * hash and breaks the link of every later entry.
 */

import { z } from 'zod';
import type { ContentAddress } from '../core/identity/content-address.js';
import { computeChainHash, isValidContentAddress } from '../core/identity/content-address.js';
import type { Timestamp } from '../core/time/temporal.js';
import type { RequestContext } from '../policy/context.js';
import type { Decision } from '../policy/evaluator.js';
import { DecisionReason } from '../policy/evaluator.js';
import { Effect } from '../policy/schema.js';

export const AuditKind = {
  /** A policy decision was made */
  DECISION: 'DECISION',
  /** A retention duty reached a terminal outcome */
  DELETE: 'DELETE',
} as const;

export type AuditKindValue = (typeof AuditKind)[keyof typeof AuditKind];

export const GENESIS_HASH: ContentAddress = `sha256:${'0'.repeat(64)}`;

export const DeleteOutcome = {
  COMPLETED: 'COMPLETED',
  FAILED: 'FAILED',
} as const;

export type DeleteOutcomeValue = (typeof DeleteOutcome)[keyof typeof DeleteOutcome];

export interface DecisionPayload {
  readonly policyId: string;
  readonly context: RequestContext;
  readonly decision: Decision;
}

export interface DeletePayload {
  readonly dutyId: string;
  readonly policyId: string;
  readonly dataTarget: string;
  readonly outcome: DeleteOutcomeValue;
  readonly failed: boolean;
  readonly attemptCount: number;
  /** Last hook error, on FAILED outcomes */
  readonly error?: string;
}

interface AuditEntryBase {
  /** 0-based position in the chain */
  readonly sequence: number;
  readonly timestamp: Timestamp;
  readonly previousHash: ContentAddress;
  readonly hash: ContentAddress;
}

export interface DecisionAuditEntry extends AuditEntryBase {
  readonly kind: typeof AuditKind.DECISION;
  readonly payload: DecisionPayload;
}

export interface DeleteAuditEntry extends AuditEntryBase {
  readonly kind: typeof AuditKind.DELETE;
  readonly payload: DeletePayload;
}

export type AuditEntry = DecisionAuditEntry | DeleteAuditEntry;

/**
 * Input for appending an entry
 */
export type AuditEntryInput =
  | { readonly kind: typeof AuditKind.DECISION; readonly payload: DecisionPayload }
  | { readonly kind: typeof AuditKind.DELETE; readonly payload: DeletePayload };

/**
 * Hash of an entry given the hash of its predecessor
 */
export function computeEntryHash(
  previousHash: ContentAddress,
  fields: {
    readonly sequence: number;
    readonly timestamp: Timestamp;
    readonly kind: AuditKindValue;
    readonly payload: DecisionPayload | DeletePayload;
  }
): ContentAddress {
  return computeChainHash(previousHash, {
    sequence: fields.sequence,
    timestamp: fields.timestamp,
    kind: fields.kind,
    payload: fields.payload,
  });
}

// Record schemas for persisted entries. Objects are strict so an added field
// is reported instead of silently dropped before the hash is recomputed.

const contentAddressSchema = z.string().refine(isValidContentAddress, 'must be a content address');

const contextSchema = z
  .object({
    role: z.string(),
    purpose: z.string(),
    dataTarget: z.string(),
    location: z.string(),
    timestamp: z.string(),
  })
  .strict();

const obligationSchema = z
  .object({
    type: z.literal('RETENTION'),
    dataTarget: z.string(),
    retentionPeriod: z.string(),
    retentionMs: z.number(),
    ruleId: z.string(),
  })
  .strict();

const decisionSchema = z
  .object({
    effect: z.enum([Effect.PERMIT, Effect.DENY]),
    policyId: z.string(),
    matchedRuleId: z.string().nullable(),
    matchedRuleIds: z.array(z.string()),
    obligations: z.array(obligationSchema),
    reason: z.enum([
      DecisionReason.RULE_MATCH,
      DecisionReason.DENY_OVERRIDES,
      DecisionReason.DEFAULT_DENY,
      DecisionReason.POLICY_INACTIVE,
    ]),
    evaluatedAt: z.string(),
  })
  .strict();

const envelope = {
  sequence: z.number().int().min(0),
  timestamp: z.string(),
  previousHash: contentAddressSchema,
  hash: contentAddressSchema,
};

const decisionRecordSchema = z
  .object({
    ...envelope,
    kind: z.literal(AuditKind.DECISION),
    payload: z
      .object({
        policyId: z.string(),
        context: contextSchema,
        decision: decisionSchema,
      })
      .strict(),
  })
  .strict();

const deleteRecordSchema = z
  .object({
    ...envelope,
    kind: z.literal(AuditKind.DELETE),
    payload: z
      .object({
        dutyId: z.string(),
        policyId: z.string(),
        dataTarget: z.string(),
        outcome: z.enum([DeleteOutcome.COMPLETED, DeleteOutcome.FAILED]),
        failed: z.boolean(),
        attemptCount: z.number().int().min(0),
        error: z.string().optional(),
      })
      .strict(),
  })
  .strict();

const auditRecordSchema = z.discriminatedUnion('kind', [decisionRecordSchema, deleteRecordSchema]);

export type AuditRecordParseResult =
  | { readonly valid: true; readonly entry: AuditEntry }
  | { readonly valid: false; readonly errors: readonly string[] };

/**
 * Validate one persisted record (already JSON-parsed) into an entry
 */
export function parseAuditRecord(input: unknown): AuditRecordParseResult {
  const parsed = auditRecordSchema.safeParse(input);
  if (!parsed.success) {
    return {
      valid: false,
      errors: parsed.error.issues.map((issue) =>
        issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
      ),
    };
  }

  const record = parsed.data;
  if (record.kind === AuditKind.DECISION) {
    return { valid: true, entry: record };
  }

  const { error, ...payload } = record.payload;
  return {
    valid: true,
    entry: {
      ...record,
      payload: error !== undefined ? { ...payload, error } : payload,
    },
  };
}
