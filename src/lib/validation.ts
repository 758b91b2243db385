import type { MetadataDocument } from '../types/document.js';
import { recordsOf } from './document.js';
import { lintDocument, type TraceFn } from './lint/engine.js';
import { hasLeadingKeyColumn } from './lint/grammar.js';
import { NO_OVERRIDES, type RuleOverrideConfig } from './lint/overrides.js';
import { mostSevere, type LintViolation } from './lint/types.js';
import { DEFAULT_MIN_PREFIX_LENGTH } from './prefix/clusters.js';
import { DEFAULT_TYPO_THRESHOLD } from './prefix/typos.js';

/**
 * Options for validation.
 */
export interface ValidationOptions {
  /** Severity overrides and skipped rules. Default: none */
  overrides?: RuleOverrideConfig | undefined;
  /** Shortest shared prefix that groups field names. Default: 3 */
  minPrefixLength?: number | undefined;
  /** Largest edit distance reported as a likely typo. Default: 1 */
  typoThreshold?: number | undefined;
  /** Verbose tracing */
  trace?: TraceFn | undefined;
}

/**
 * Result of validating one document.
 */
export interface ValidationResult {
  violations: LintViolation[];
  /** Widest row any record needs in the tabular output */
  longestRow: number;
}

/**
 * Number of columns a document's widest record occupies in the tabular
 * layout. Records of every section but metadataBlock carry an extra leading
 * key column.
 */
export function longestRowOf(document: MetadataDocument): number {
  let longest = 0;
  for (const { key, value } of document.entries) {
    const extra = hasLeadingKeyColumn(key) ? 1 : 0;
    for (const record of recordsOf(value)) {
      longest = Math.max(longest, record.entries.length + extra);
    }
  }
  return longest;
}

/**
 * Validate a parsed document.
 * Returns the violations in discovery order with the layout width for the writer.
 */
export function validateDocument(
  document: MetadataDocument,
  options: ValidationOptions = {}
): ValidationResult {
  const violations = lintDocument(document, {
    overrides: options.overrides ?? NO_OVERRIDES,
    settings: {
      minPrefixLength: options.minPrefixLength ?? DEFAULT_MIN_PREFIX_LENGTH,
      typoThreshold: options.typoThreshold ?? DEFAULT_TYPO_THRESHOLD,
    },
    trace: options.trace,
  });

  if (options.trace) {
    options.trace(1, violations.length === 0
      ? 'SUCCESS!'
      : `FAILURE! Detected ${violations.length} violation(s), most severe: ${mostSevere(violations)}`);
  }

  return { violations, longestRow: longestRowOf(document) };
}
