/**
 * Policy Linter
 *
 * Static checks over policy definitions, run before they are loaded.
 * Schema errors are reported as `valid-schema` issues; the remaining rules
 * look at the compiled rules of each valid policy.
 */

import type { Policy, Rule } from '../src/policy/schema.js';
import {
  Effect,
  MATCH_FIELDS,
  WILDCARD,
  describePolicyId,
  validatePolicyDefinition,
} from '../src/policy/schema.js';

/**
 * Lint rule severity
 */
export const LintSeverity = {
  /** Error - must fix */
  ERROR: 'error',
  /** Warning - should fix */
  WARNING: 'warning',
  /** Info - consider fixing */
  INFO: 'info',
} as const;

export type LintSeverityValue = (typeof LintSeverity)[keyof typeof LintSeverity];

/**
 * Lint rule definition
 */
export interface LintRule {
  readonly id: string;
  readonly description: string;
  readonly severity: LintSeverityValue;
  readonly check: (policy: Policy) => LintIssue[];
}

export interface LintIssue {
  /** Rule that triggered the issue */
  readonly ruleId: string;
  readonly severity: LintSeverityValue;
  readonly policyId: string;
  readonly message: string;
  /** Suggestion for fix */
  readonly suggestion?: string;
  /** Path inside the definition, e.g. `rules.2` */
  readonly location?: string;
}

export interface LintResult {
  readonly policiesChecked: number;
  readonly totalIssues: number;
  readonly bySeverity: {
    readonly errors: number;
    readonly warnings: number;
    readonly infos: number;
  };
  readonly issues: readonly LintIssue[];
  /** Whether linting passed (no errors) */
  readonly passed: boolean;
  readonly summary: string;
}

export interface LintConfig {
  /** Disable a rule with `false` or override its severity */
  readonly rules: Readonly<Record<string, boolean | LintSeverityValue>>;
  /** Treat warnings as errors */
  readonly warningsAsErrors?: boolean;
}

export const SCHEMA_RULE_ID = 'valid-schema';

function sameMatch(a: Rule, b: Rule): boolean {
  return MATCH_FIELDS.every((field) => a[field] === b[field]);
}

function describeMatch(rule: Rule): string {
  return MATCH_FIELDS.map((field) => `${field}=${rule[field]}`).join(', ');
}

function ruleLocation(policy: Policy, rule: Rule): string {
  return `rules.${policy.rules.indexOf(rule)}`;
}

/**
 * Pairs of rules (earlier, later) with identical match fields
 */
function sameMatchPairs(policy: Policy): Array<readonly [Rule, Rule]> {
  const pairs: Array<readonly [Rule, Rule]> = [];
  policy.rules.forEach((rule, index) => {
    for (const earlier of policy.rules.slice(0, index)) {
      if (sameMatch(earlier, rule)) {
        pairs.push([earlier, rule]);
      }
    }
  });
  return pairs;
}

/**
 * Default lint rules
 */
export const DEFAULT_LINT_RULES: readonly LintRule[] = [
  {
    id: 'no-permit-all',
    description: 'A Permit rule should not match every request',
    severity: LintSeverity.WARNING,
    check: (policy) =>
      policy.rules
        .filter(
          (rule) =>
            rule.effect === Effect.PERMIT && MATCH_FIELDS.every((field) => rule[field] === WILDCARD)
        )
        .map((rule) => ({
          ruleId: 'no-permit-all',
          severity: LintSeverity.WARNING,
          policyId: policy.id,
          message: `Rule "${rule.id}" permits every role, purpose, data target and location`,
          suggestion: 'Narrow at least one match field',
          location: ruleLocation(policy, rule),
        })),
  },
  {
    id: 'duplicate-match',
    description: 'Two rules with the same effect should not match the same requests',
    severity: LintSeverity.ERROR,
    check: (policy) =>
      sameMatchPairs(policy)
        .filter(([earlier, later]) => earlier.effect === later.effect)
        .map(([earlier, later]) => ({
          ruleId: 'duplicate-match',
          severity: LintSeverity.ERROR,
          policyId: policy.id,
          message: `Rule "${later.id}" duplicates the match of "${earlier.id}" (${describeMatch(later)})`,
          suggestion: 'Merge the rules or remove one of them',
          location: ruleLocation(policy, later),
        })),
  },
  {
    id: 'shadowed-permit',
    description: 'A Permit with the exact match of a Deny never takes effect',
    severity: LintSeverity.WARNING,
    check: (policy) =>
      sameMatchPairs(policy)
        .filter(([earlier, later]) => earlier.effect !== later.effect)
        .map(([earlier, later]) => {
          const permit = earlier.effect === Effect.PERMIT ? earlier : later;
          const deny = permit === earlier ? later : earlier;
          return {
            ruleId: 'shadowed-permit',
            severity: LintSeverity.WARNING,
            policyId: policy.id,
            message: `Permit rule "${permit.id}" is always overridden by Deny rule "${deny.id}"`,
            suggestion: 'Remove the Permit or give it a more specific match',
            location: ruleLocation(policy, permit),
          };
        }),
  },
  {
    id: 'permit-without-retention',
    description: 'Permit rules usually declare how long the data may be kept',
    severity: LintSeverity.INFO,
    check: (policy) =>
      policy.rules
        .filter((rule) => rule.effect === Effect.PERMIT && rule.retentionPeriod === undefined)
        .map((rule) => ({
          ruleId: 'permit-without-retention',
          severity: LintSeverity.INFO,
          policyId: policy.id,
          message: `Permit rule "${rule.id}" imposes no retention period`,
          suggestion: 'Add a retentionPeriod such as "30d"',
          location: ruleLocation(policy, rule),
        })),
  },
];

/**
 * Policy Linter
 */
export class PolicyLinter {
  private rules: Map<string, LintRule> = new Map();
  private config: LintConfig;

  constructor(config: LintConfig = { rules: {} }) {
    this.config = config;

    for (const rule of DEFAULT_LINT_RULES) {
      this.registerRule(rule);
    }
  }

  /**
   * Register a custom lint rule
   */
  registerRule(rule: LintRule): void {
    this.rules.set(rule.id, rule);
  }

  getRules(): readonly LintRule[] {
    return Array.from(this.rules.values());
  }

  /**
   * Lint a single policy definition
   */
  lintPolicy(definition: unknown, index = 0): readonly LintIssue[] {
    const validation = validatePolicyDefinition(definition);
    if (!validation.valid) {
      const policyId = describePolicyId(definition) ?? `#${index}`;
      return this.applySeverity(
        SCHEMA_RULE_ID,
        validation.errors.map((error) => ({
          ruleId: SCHEMA_RULE_ID,
          severity: LintSeverity.ERROR,
          policyId,
          message: error,
        }))
      );
    }

    const issues: LintIssue[] = [];
    for (const [ruleId, rule] of this.rules) {
      if (this.config.rules[ruleId] === false) {
        continue;
      }
      issues.push(...this.applySeverity(ruleId, rule.check(validation.policy)));
    }
    return issues;
  }

  /**
   * Lint multiple policy definitions
   */
  lint(definitions: readonly unknown[]): LintResult {
    const allIssues = definitions.flatMap((definition, index) => this.lintPolicy(definition, index));

    const errors = allIssues.filter((i) => i.severity === LintSeverity.ERROR).length;
    const warnings = allIssues.filter((i) => i.severity === LintSeverity.WARNING).length;
    const infos = allIssues.filter((i) => i.severity === LintSeverity.INFO).length;

    const summary =
      allIssues.length === 0
        ? `Linted ${definitions.length} policies - no issues found`
        : `Linted ${definitions.length} policies - found ${errors} error(s), ${warnings} warning(s), ${infos} info(s)`;

    return {
      policiesChecked: definitions.length,
      totalIssues: allIssues.length,
      bySeverity: { errors, warnings, infos },
      issues: allIssues,
      passed: errors === 0,
      summary,
    };
  }

  /**
   * Format lint result for console output
   */
  formatResult(result: LintResult, verbose = false): string {
    const lines: string[] = [];

    const byPolicy = new Map<string, LintIssue[]>();
    for (const issue of result.issues) {
      const existing = byPolicy.get(issue.policyId) ?? [];
      existing.push(issue);
      byPolicy.set(issue.policyId, existing);
    }

    for (const [policyId, issues] of byPolicy) {
      lines.push('', policyId);
      for (const issue of issues) {
        const icon = issue.severity === 'error' ? '✖' : issue.severity === 'warning' ? '⚠' : 'ℹ';
        const where = issue.location !== undefined ? ` [${issue.location}]` : '';
        lines.push(`  ${icon} ${issue.message} (${issue.ruleId})${where}`);
        if (verbose && issue.suggestion) {
          lines.push(`    → ${issue.suggestion}`);
        }
      }
    }

    lines.push('', result.summary);

    if (!result.passed) {
      lines.push('', 'Linting failed. Please fix the errors above.');
    }

    return lines.join('\n');
  }

  /**
   * Format result as JSON for CI/CD
   */
  formatResultJSON(result: LintResult): string {
    return JSON.stringify(result, null, 2);
  }

  private applySeverity(ruleId: string, issues: readonly LintIssue[]): LintIssue[] {
    const override = this.config.rules[ruleId];
    return issues.map((issue) => {
      const severity = typeof override === 'string' ? override : issue.severity;
      return {
        ...issue,
        severity:
          this.config.warningsAsErrors && severity === LintSeverity.WARNING
            ? LintSeverity.ERROR
            : severity,
      };
    });
  }
}

/**
 * Create a policy linter
 */
export function createPolicyLinter(config?: LintConfig): PolicyLinter {
  return new PolicyLinter(config);
}
