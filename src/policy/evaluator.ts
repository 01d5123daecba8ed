/**
 * Policy Evaluation for Retention PDP
 *
 * `evaluate` is a pure function of (policy, context): no clock reads, no I/O.
 *
 * 1. A policy outside its activation window denies.
 * 2. Rules survive when each match field equals the context value or is `*`.
 * 3. Survivors are ranked by specificity; the top tier is every survivor
 *    sharing the highest score.
 * 4. Any Deny in the top tier wins (deny-overrides).
 * 5. Otherwise the top-tier Permit rules permit, carrying their retention
 *    obligations, combined per the policy's obligationCombining setting.
 * 6. No survivor denies (fail-closed).
 */

import type { Timestamp } from '../core/time/temporal.js';
import { isWithinWindow } from '../core/time/temporal.js';
import type { RequestContext } from './context.js';
import type { EffectValue, Policy, Rule } from './schema.js';
import { Effect, MATCH_FIELDS, ObligationCombining, WILDCARD } from './schema.js';

export const DecisionReason = {
  /** The top tier held only rules of the returned effect */
  RULE_MATCH: 'RULE_MATCH',
  /** A Deny beat a Permit in the same tier */
  DENY_OVERRIDES: 'DENY_OVERRIDES',
  /** No rule matched */
  DEFAULT_DENY: 'DEFAULT_DENY',
  /** The policy is outside its activation window at the request time */
  POLICY_INACTIVE: 'POLICY_INACTIVE',
} as const;

export type DecisionReasonValue = (typeof DecisionReason)[keyof typeof DecisionReason];

/**
 * Retention duty attached to a Permit
 */
export interface Obligation {
  readonly type: 'RETENTION';
  /** The requested data target (a wildcard rule applies to the concrete target) */
  readonly dataTarget: string;
  readonly retentionPeriod: string;
  readonly retentionMs: number;
  /** Rule that declared the retention */
  readonly ruleId: string;
}

export interface Decision {
  readonly effect: EffectValue;
  readonly policyId: string;
  /** First deciding rule in declaration order; null for default and inactive denials */
  readonly matchedRuleId: string | null;
  /** Every top-tier rule carrying the returned effect */
  readonly matchedRuleIds: readonly string[];
  readonly obligations: readonly Obligation[];
  readonly reason: DecisionReasonValue;
  /** The context timestamp */
  readonly evaluatedAt: Timestamp;
}

/**
 * Decision response shape for transport adapters
 */
export interface DecisionResponse {
  readonly effect: EffectValue;
  readonly obligations: readonly {
    readonly dataTarget: string;
    readonly retentionPeriod: string;
  }[];
}

/**
 * Check whether every match field of a rule accepts the context
 */
export function matchesRule(rule: Rule, context: RequestContext): boolean {
  return MATCH_FIELDS.every((field) => rule[field] === WILDCARD || rule[field] === context[field]);
}

/**
 * Matching rules, most specific first; equal scores keep declaration order
 */
export function rankMatchingRules(policy: Policy, context: RequestContext): readonly Rule[] {
  return policy.rules
    .filter((rule) => matchesRule(rule, context))
    .map((rule, index) => ({ rule, index }))
    .sort((a, b) => b.rule.specificity - a.rule.specificity || a.index - b.index)
    .map(({ rule }) => rule);
}

function isPolicyActive(policy: Policy, at: Timestamp): boolean {
  if (policy.activation === undefined) {
    return true;
  }

  const { activatesAt, expiresAt } = policy.activation;
  return isWithinWindow(
    at,
    expiresAt !== undefined ? { from: activatesAt, until: expiresAt } : { from: activatesAt }
  );
}

function collectObligations(
  policy: Policy,
  permits: readonly Rule[],
  context: RequestContext
): readonly Obligation[] {
  const obligations: Obligation[] = [];
  const seen = new Set<number>();

  for (const rule of permits) {
    if (rule.retentionMs === undefined || rule.retentionPeriod === undefined) {
      continue;
    }
    if (seen.has(rule.retentionMs)) {
      continue;
    }
    seen.add(rule.retentionMs);
    obligations.push({
      type: 'RETENTION',
      dataTarget: context.dataTarget,
      retentionPeriod: rule.retentionPeriod,
      retentionMs: rule.retentionMs,
      ruleId: rule.id,
    });
  }

  if (policy.obligationCombining === ObligationCombining.MOST_RESTRICTIVE && obligations.length > 1) {
    const shortest = obligations.reduce((best, candidate) =>
      candidate.retentionMs < best.retentionMs ? candidate : best
    );
    return [shortest];
  }

  return obligations;
}

function deny(
  policy: Policy,
  context: RequestContext,
  reason: DecisionReasonValue,
  rules: readonly Rule[] = []
): Decision {
  return Object.freeze({
    effect: Effect.DENY,
    policyId: policy.id,
    matchedRuleId: rules[0]?.id ?? null,
    matchedRuleIds: Object.freeze(rules.map((rule) => rule.id)),
    obligations: Object.freeze([]),
    reason,
    evaluatedAt: context.timestamp,
  });
}

/**
 * Evaluate a request context against a policy
 */
export function evaluate(policy: Policy, context: RequestContext): Decision {
  if (!isPolicyActive(policy, context.timestamp)) {
    return deny(policy, context, DecisionReason.POLICY_INACTIVE);
  }

  const ranked = rankMatchingRules(policy, context);
  const top = ranked[0];
  if (top === undefined) {
    return deny(policy, context, DecisionReason.DEFAULT_DENY);
  }

  const tier = ranked.filter((rule) => rule.specificity === top.specificity);
  const denies = tier.filter((rule) => rule.effect === Effect.DENY);
  const permits = tier.filter((rule) => rule.effect === Effect.PERMIT);

  if (denies.length > 0) {
    return deny(
      policy,
      context,
      permits.length > 0 ? DecisionReason.DENY_OVERRIDES : DecisionReason.RULE_MATCH,
      denies
    );
  }

  return Object.freeze({
    effect: Effect.PERMIT,
    policyId: policy.id,
    matchedRuleId: top.id,
    matchedRuleIds: Object.freeze(permits.map((rule) => rule.id)),
    obligations: Object.freeze(
      collectObligations(policy, permits, context).map((obligation) => Object.freeze(obligation))
    ),
    reason: DecisionReason.RULE_MATCH,
    evaluatedAt: context.timestamp,
  });
}

/**
 * Project a decision onto the transport response shape
 */
export function toDecisionResponse(decision: Decision): DecisionResponse {
  return {
    effect: decision.effect,
    obligations: decision.obligations.map((obligation) => ({
      dataTarget: obligation.dataTarget,
      retentionPeriod: obligation.retentionPeriod,
    })),
  };
}
