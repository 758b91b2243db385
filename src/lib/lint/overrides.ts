/**
 * Per-rule overrides of the baseline severity.
 *
 * An override either pins a rule's severity or skips the rule. Overrides are
 * resolved once per rule lookup; a skipped rule resolves to a variant that
 * reports nothing, so call sites never special-case it.
 */

import { UnknownRuleError } from '../errors.js';
import { RULE_CATALOG, findRule } from './rules.js';
import type { LintRule, LintViolation, RuleName, Severity } from './types.js';

export type RuleOverride = Severity | 'skip';

export type RuleOverrideConfig = ReadonlyMap<RuleName, RuleOverride>;

export const NO_OVERRIDES: RuleOverrideConfig = new Map();

/**
 * Rule identifiers (full names or short codes) grouped by requested action.
 */
export interface OverrideRequest {
  error?: readonly string[] | undefined;
  warn?: readonly string[] | undefined;
  skip?: readonly string[] | undefined;
}

export type ResolvedRule<TInput> =
  | { kind: 'active'; rule: LintRule<TInput>; severity: Severity }
  | { kind: 'skipped'; rule: LintRule<TInput> };

/**
 * Every name and code a user may pass, for error messages and listings.
 */
export function ruleIdentifiers(): string[] {
  return RULE_CATALOG.flatMap(rule => [rule.name, rule.code]);
}

/**
 * Build the override configuration for a run.
 *
 * When a rule is named more than once, the later action wins in the order
 * error, warn, skip.
 *
 * @throws UnknownRuleError for an identifier that matches no rule
 */
export function buildOverrideConfig(request: OverrideRequest): RuleOverrideConfig {
  const overrides = new Map<RuleName, RuleOverride>();
  const actions: Array<[readonly string[] | undefined, RuleOverride]> = [
    [request.error, 'error'],
    [request.warn, 'warning'],
    [request.skip, 'skip'],
  ];

  for (const [identifiers, action] of actions) {
    for (const identifier of identifiers ?? []) {
      const rule = findRule(identifier);
      if (!rule) {
        throw new UnknownRuleError(identifier, ruleIdentifiers());
      }
      overrides.set(rule.name, action);
    }
  }

  return overrides;
}

export function resolveRule<TInput>(
  rule: LintRule<TInput>,
  overrides: RuleOverrideConfig
): ResolvedRule<TInput> {
  const override = overrides.get(rule.name);
  if (override === 'skip') {
    return { kind: 'skipped', rule };
  }
  return { kind: 'active', rule, severity: override ?? rule.defaultSeverity };
}

export function applyRule<TInput>(resolved: ResolvedRule<TInput>, input: TInput): LintViolation[] {
  switch (resolved.kind) {
    case 'skipped':
      return [];
    case 'active':
      return resolved.rule.check(input, resolved.severity);
  }
}
