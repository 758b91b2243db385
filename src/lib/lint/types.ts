/**
 * Lint types and interfaces.
 *
 * This module contains the type definitions shared by the rule catalog,
 * the override configuration and the rule engine.
 */

import type { DocumentNode, MappingNode, SourcePosition } from '../../types/document.js';

// ============================================================================
// Severity
// ============================================================================

/**
 * Severity of a single violation.
 */
export type Severity = 'error' | 'warning';

/**
 * Severity of a whole file or run. 'none' means nothing was reported.
 */
export type EffectiveSeverity = Severity | 'none';

/**
 * Explicit rank table: a LARGER rank is MORE severe.
 */
const SEVERITY_RANK: Record<EffectiveSeverity, number> = {
  none: 0,
  warning: 1,
  error: 2,
};

/**
 * Positive when `a` is more severe than `b`, negative when less, 0 when equal.
 */
export function compareSeverity(a: EffectiveSeverity, b: EffectiveSeverity): number {
  return SEVERITY_RANK[a] - SEVERITY_RANK[b];
}

/**
 * Most severe level among the given violations.
 */
export function mostSevere(violations: readonly LintViolation[]): EffectiveSeverity {
  let result: EffectiveSeverity = 'none';
  for (const violation of violations) {
    if (compareSeverity(violation.severity, result) > 0) {
      result = violation.severity;
    }
  }
  return result;
}

// ============================================================================
// Rule identifiers
// ============================================================================

export type RuleName =
  | 'keywords_valid'
  | 'keywords_unique'
  | 'unique_names'
  | 'block_is_list'
  | 'unique_titles'
  | 'name_prefix_typos'
  | 'keys_valid'
  | 'required_keys_present'
  | 'no_substructures'
  | 'no_trailing_spaces'
  | 'nested_compound_metadata'
  | 'nested_compound_metadata_controlled_vocab';

/**
 * Findings raised by the readers rather than by catalog rules.
 * These cannot be overridden.
 */
export type ReaderCheck = 'guess_input_type' | 'parse_document' | 'identify_break_points' | 'tabular_layout';

export type ViolationSource = RuleName | ReaderCheck;

export type RuleScope = 'top-level' | 'block' | 'record';

// ============================================================================
// Violations
// ============================================================================

/**
 * A single lint finding. Never mutated after creation.
 */
export interface LintViolation {
  readonly severity: Severity;
  readonly rule: ViolationSource;
  readonly message: string;
  readonly line?: number | undefined;
  readonly column?: number | undefined;
}

export function createViolation(
  severity: Severity,
  rule: ViolationSource,
  message: string,
  position?: SourcePosition | undefined
): LintViolation {
  return {
    severity,
    rule,
    message,
    ...(position && { line: position.line }),
    ...(position?.column !== undefined && { column: position.column }),
  };
}

/**
 * Log-style rendering: `[ERROR] line 3 column 5 unique_names: message`.
 */
export function formatViolation(violation: LintViolation): string {
  const lineInfo = violation.line !== undefined ? `line ${violation.line} ` : '';
  const columnInfo = violation.column !== undefined ? `column ${violation.column} ` : '';
  return `[${violation.severity.toUpperCase()}] ${lineInfo}${columnInfo}${violation.rule}: ${violation.message}`;
}

// ============================================================================
// Rules
// ============================================================================

/**
 * Tunables shared by rules that need more than the node they inspect.
 */
export interface RuleSettings {
  minPrefixLength: number;
  typoThreshold: number;
}

export interface KeywordsInput {
  keywords: readonly string[];
  position?: SourcePosition | undefined;
}

export interface BlockInput {
  keyword: string;
  block: DocumentNode;
  settings: RuleSettings;
}

export interface RecordInput {
  keyword: string;
  record: MappingNode;
  settings: RuleSettings;
}

export interface RuleInfo {
  name: RuleName;
  code: string;
  scope: RuleScope;
  defaultSeverity: Severity;
  description: string;
}

/**
 * A lint is a pure function from its input to violations at the given severity.
 */
export interface LintRule<TInput> extends RuleInfo {
  check(input: TInput, severity: Severity): LintViolation[];
}

export type AnyLintRule = LintRule<KeywordsInput> | LintRule<BlockInput> | LintRule<RecordInput>;
