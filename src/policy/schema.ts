/**
 * Policy Schema for Retention PDP
 *
 * A policy is an ordered list of rules. Each rule matches a request on four
 * fields (role, purpose, dataTarget, location), each either a literal or the
 * wildcard `*`, and carries an effect. Permit rules may impose a retention
 * period that becomes a deletion duty once the decision is recorded.
 *
 * Definitions are plain JSON; `compilePolicy` validates one and returns the
 * immutable, ranked form the evaluator works on.
 */

import { z } from 'zod';
import { SchemaInvalidError } from '../core/errors.js';
import { MAX_DURATION_MS, parseDuration } from '../core/time/duration.js';
import type { Timestamp } from '../core/time/temporal.js';
import { isBefore, normalizeTimestamp } from '../core/time/temporal.js';

export const WILDCARD = '*';

export const Effect = {
  PERMIT: 'Permit',
  DENY: 'Deny',
} as const;

export type EffectValue = (typeof Effect)[keyof typeof Effect];

/**
 * How obligations from several top-tier Permit rules combine
 */
export const ObligationCombining = {
  /** Every distinct retention duty is kept */
  UNION: 'union',
  /** Only the shortest retention period is kept (policy-author opt-in) */
  MOST_RESTRICTIVE: 'most-restrictive',
} as const;

export type ObligationCombiningValue =
  (typeof ObligationCombining)[keyof typeof ObligationCombining];

/**
 * Match fields in tie-break priority order, most decisive first
 */
export const MATCH_FIELDS = ['location', 'dataTarget', 'purpose', 'role'] as const;

export type MatchField = (typeof MATCH_FIELDS)[number];

export interface RuleDefinition {
  readonly id: string;
  readonly role: string;
  readonly purpose: string;
  readonly dataTarget: string;
  readonly location: string;
  readonly effect: EffectValue;
  /** Duration such as `30d`; only on Permit rules */
  readonly retentionPeriod?: string;
  /** When true, retentionPeriod is mandatory */
  readonly imposesRetention?: boolean;
}

export interface ActivationWindow {
  readonly activatesAt: Timestamp;
  readonly expiresAt?: Timestamp;
}

export interface PolicyDefinition {
  readonly id: string;
  readonly description?: string;
  readonly rules: readonly RuleDefinition[];
  readonly obligationCombining?: ObligationCombiningValue;
  readonly activation?: ActivationWindow;
}

/**
 * A validated rule with its derived rank
 */
export interface Rule extends RuleDefinition {
  /** Retention period in milliseconds, present on retention-bearing rules */
  readonly retentionMs?: number;
  /** Specificity score; higher wins, see specificityOf */
  readonly specificity: number;
}

export interface Policy {
  readonly id: string;
  readonly description?: string;
  readonly rules: readonly Rule[];
  readonly obligationCombining: ObligationCombiningValue;
  readonly activation?: ActivationWindow;
}

const matchValueSchema = z.string().trim().min(1, 'must be a literal or "*"');

const ruleSchema = z
  .object({
    id: z.string().trim().min(1),
    role: matchValueSchema,
    purpose: matchValueSchema,
    dataTarget: matchValueSchema,
    location: matchValueSchema,
    effect: z.enum([Effect.PERMIT, Effect.DENY]),
    retentionPeriod: z.string().trim().min(1).optional(),
    imposesRetention: z.boolean().optional(),
  })
  .strict();

const policySchema = z
  .object({
    id: z.string().trim().min(1),
    description: z.string().optional(),
    rules: z.array(ruleSchema),
    obligationCombining: z
      .enum([ObligationCombining.UNION, ObligationCombining.MOST_RESTRICTIVE])
      .optional(),
    activation: z
      .object({
        activatesAt: z.string(),
        expiresAt: z.string().optional(),
      })
      .strict()
      .optional(),
  })
  .strict();

type ParsedRule = z.infer<typeof ruleSchema>;
type ParsedPolicy = z.infer<typeof policySchema>;

export type PolicyValidationResult =
  | { readonly valid: true; readonly policy: Policy; readonly errors: readonly string[] }
  | { readonly valid: false; readonly errors: readonly string[] };

/**
 * Specificity score of a rule.
 *
 * Literal-field count dominates; among equal counts a literal on a
 * higher-priority field (location > dataTarget > purpose > role) wins.
 * Rules share a tier only when they share a score, i.e. the same set of
 * literal fields.
 */
export function specificityOf(rule: Pick<RuleDefinition, MatchField>): number {
  let count = 0;
  let priority = 0;

  MATCH_FIELDS.forEach((field, index) => {
    if (rule[field] !== WILDCARD) {
      count += 1;
      priority += 1 << (MATCH_FIELDS.length - 1 - index);
    }
  });

  return count * (1 << MATCH_FIELDS.length) + priority;
}

function validateRule(rule: ParsedRule, path: string, errors: string[]): Rule | null {
  let retentionMs: number | null = null;

  if (rule.retentionPeriod !== undefined) {
    retentionMs = parseDuration(rule.retentionPeriod);
    if (retentionMs === null) {
      errors.push(
        `${path}.retentionPeriod: "${rule.retentionPeriod}" is not a positive duration (e.g. 30d, 12h)`
      );
    } else if (retentionMs > MAX_DURATION_MS) {
      errors.push(`${path}.retentionPeriod: "${rule.retentionPeriod}" exceeds the 1000 year maximum`);
      retentionMs = null;
    }
    if (rule.effect !== Effect.PERMIT) {
      errors.push(`${path}.retentionPeriod: only Permit rules may impose retention`);
    }
  } else if (rule.imposesRetention === true) {
    errors.push(`${path}.retentionPeriod: required when imposesRetention is true`);
  }

  if (retentionMs === null && rule.retentionPeriod !== undefined) {
    return null;
  }

  return {
    id: rule.id,
    role: rule.role,
    purpose: rule.purpose,
    dataTarget: rule.dataTarget,
    location: rule.location,
    effect: rule.effect,
    ...(rule.retentionPeriod !== undefined && { retentionPeriod: rule.retentionPeriod }),
    ...(rule.imposesRetention !== undefined && { imposesRetention: rule.imposesRetention }),
    ...(retentionMs !== null && { retentionMs }),
    specificity: specificityOf(rule),
  };
}

function validateActivation(
  activation: NonNullable<ParsedPolicy['activation']>,
  errors: string[]
): ActivationWindow | null {
  const activatesAt = normalizeTimestamp(activation.activatesAt);
  if (activatesAt === null) {
    errors.push(`activation.activatesAt: "${activation.activatesAt}" is not an ISO 8601 timestamp`);
  }

  let expiresAt: Timestamp | null = null;
  if (activation.expiresAt !== undefined) {
    expiresAt = normalizeTimestamp(activation.expiresAt);
    if (expiresAt === null) {
      errors.push(`activation.expiresAt: "${activation.expiresAt}" is not an ISO 8601 timestamp`);
    }
  }

  if (activatesAt === null) {
    return null;
  }

  if (expiresAt !== null && !isBefore(activatesAt, expiresAt)) {
    errors.push('activation.expiresAt: must be after activatesAt');
    return null;
  }

  return expiresAt !== null ? { activatesAt, expiresAt } : { activatesAt };
}

/**
 * Validate a policy definition
 */
export function validatePolicyDefinition(input: unknown): PolicyValidationResult {
  const parsed = policySchema.safeParse(input);
  if (!parsed.success) {
    return {
      valid: false,
      errors: parsed.error.issues.map((issue) =>
        issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
      ),
    };
  }

  const definition = parsed.data;
  const errors: string[] = [];
  const seen = new Set<string>();
  const rules: Rule[] = [];

  definition.rules.forEach((rule, index) => {
    const path = `rules.${index}`;
    if (seen.has(rule.id)) {
      errors.push(`${path}.id: duplicate rule id "${rule.id}"`);
    }
    seen.add(rule.id);

    const validated = validateRule(rule, path, errors);
    if (validated) {
      rules.push(validated);
    }
  });

  const activation =
    definition.activation !== undefined ? validateActivation(definition.activation, errors) : null;

  if (errors.length > 0) {
    return { valid: false, errors };
  }

  const policy: Policy = {
    id: definition.id,
    ...(definition.description !== undefined && { description: definition.description }),
    rules,
    obligationCombining: definition.obligationCombining ?? ObligationCombining.UNION,
    ...(activation !== null && { activation }),
  };

  return { valid: true, policy: deepFreeze(policy), errors: [] };
}

/**
 * Validate and compile a policy definition, throwing SchemaInvalidError on failure
 */
export function compilePolicy(input: unknown): Policy {
  const result = validatePolicyDefinition(input);
  if (!result.valid) {
    const id = describePolicyId(input);
    throw new SchemaInvalidError(id !== null ? `policy "${id}"` : 'policy', result.errors);
  }
  return result.policy;
}

/**
 * Plain definition of a compiled policy, suitable for storage
 */
export function toPolicyDefinition(policy: Policy): PolicyDefinition {
  return {
    id: policy.id,
    ...(policy.description !== undefined && { description: policy.description }),
    rules: policy.rules.map((rule) => ({
      id: rule.id,
      role: rule.role,
      purpose: rule.purpose,
      dataTarget: rule.dataTarget,
      location: rule.location,
      effect: rule.effect,
      ...(rule.retentionPeriod !== undefined && { retentionPeriod: rule.retentionPeriod }),
      ...(rule.imposesRetention !== undefined && { imposesRetention: rule.imposesRetention }),
    })),
    obligationCombining: policy.obligationCombining,
    ...(policy.activation !== undefined && { activation: policy.activation }),
  };
}

/**
 * Best-effort policy id from unvalidated input, for error messages
 */
export function describePolicyId(input: unknown): string | null {
  if (typeof input === 'object' && input !== null && 'id' in input && typeof input.id === 'string') {
    return input.id;
  }
  return null;
}

function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const nested of Object.values(value)) {
      deepFreeze(nested);
    }
  }
  return value;
}

/**
 * Input for a rule added through the builder; unset match fields are wildcards
 */
export interface RuleInput {
  readonly id?: string;
  readonly role?: string;
  readonly purpose?: string;
  readonly dataTarget?: string;
  readonly location?: string;
  readonly retentionPeriod?: string;
}

/**
 * Create a policy builder for fluent policy creation
 */
export function createPolicyBuilder(id: string): PolicyBuilder {
  return new PolicyBuilder(id);
}

/**
 * Fluent builder for policy definitions
 */
export class PolicyBuilder {
  private readonly id: string;
  private readonly rules: RuleDefinition[] = [];
  private descriptionText: string | undefined;
  private combining: ObligationCombiningValue | undefined;
  private window: ActivationWindow | undefined;

  constructor(id: string) {
    this.id = id;
  }

  description(text: string): this {
    this.descriptionText = text;
    return this;
  }

  permit(input: RuleInput = {}): this {
    return this.rule(Effect.PERMIT, input);
  }

  deny(input: RuleInput = {}): this {
    return this.rule(Effect.DENY, input);
  }

  mostRestrictiveRetention(): this {
    this.combining = ObligationCombining.MOST_RESTRICTIVE;
    return this;
  }

  activeBetween(activatesAt: Timestamp, expiresAt?: Timestamp): this {
    this.window = expiresAt !== undefined ? { activatesAt, expiresAt } : { activatesAt };
    return this;
  }

  /**
   * The raw definition, unvalidated
   */
  buildDefinition(): PolicyDefinition {
    return {
      id: this.id,
      ...(this.descriptionText !== undefined && { description: this.descriptionText }),
      rules: [...this.rules],
      ...(this.combining !== undefined && { obligationCombining: this.combining }),
      ...(this.window !== undefined && { activation: this.window }),
    };
  }

  build(): Policy {
    return compilePolicy(this.buildDefinition());
  }

  private rule(effect: EffectValue, input: RuleInput): this {
    this.rules.push({
      id: input.id ?? `rule-${this.rules.length + 1}`,
      role: input.role ?? WILDCARD,
      purpose: input.purpose ?? WILDCARD,
      dataTarget: input.dataTarget ?? WILDCARD,
      location: input.location ?? WILDCARD,
      effect,
      ...(input.retentionPeriod !== undefined && { retentionPeriod: input.retentionPeriod }),
    });
    return this;
  }
}
