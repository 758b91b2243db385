/**
 * Rule dispatch.
 *
 * Runs the catalog against a document in a fixed order: top-level rules,
 * then each section in canonical keyword order (unknown keywords last, in
 * source order), with block rules before the record rules of that section's
 * entries in source order. An invalid keyword set does not stop the section
 * checks, so all defects surface in one pass.
 */

import type { DocumentNode, MetadataDocument } from '../../types/document.js';
import { keywordsOf, recordsOf } from '../document.js';
import { keywordOrder } from './grammar.js';
import { applyRule, resolveRule, type RuleOverrideConfig } from './overrides.js';
import { BLOCK_RULES, RECORD_RULES, TOP_LEVEL_RULES } from './rules.js';
import type { LintRule, LintViolation, RuleSettings } from './types.js';

/**
 * Tracing hook. Level 1 reports phases, level 2 every rule invocation.
 */
export type TraceFn = (level: 1 | 2, message: string) => void;

export interface EngineOptions {
  overrides: RuleOverrideConfig;
  settings: RuleSettings;
  trace?: TraceFn | undefined;
}

export interface Section {
  keyword: string;
  block: DocumentNode;
}

function runAll<TInput>(
  rules: readonly LintRule<TInput>[],
  input: TInput,
  options: EngineOptions
): LintViolation[] {
  const violations: LintViolation[] = [];
  for (const rule of rules) {
    const resolved = resolveRule(rule, options.overrides);
    options.trace?.(2, resolved.kind === 'skipped' ? `Skipping lint: ${rule.name}` : `Running lint: ${rule.name}`);
    violations.push(...applyRule(resolved, input));
  }
  return violations;
}

/**
 * Sections in validation order.
 */
export function orderedSections(document: MetadataDocument): Section[] {
  return document.entries
    .map((entry, index) => ({ keyword: entry.key, block: entry.value, index }))
    .sort((a, b) => keywordOrder(a.keyword) - keywordOrder(b.keyword) || a.index - b.index)
    .map(({ keyword, block }) => ({ keyword, block }));
}

export function runTopLevelRules(document: MetadataDocument, options: EngineOptions): LintViolation[] {
  const keywords = keywordsOf(document);
  options.trace?.(1, `Validating top-level keywords: ${keywords.join(', ')}`);
  return runAll(TOP_LEVEL_RULES, { keywords, position: document.position }, options);
}

export function runSectionRules(section: Section, options: EngineOptions): LintViolation[] {
  const { keyword, block } = section;
  options.trace?.(1, `Validating entries for ${keyword}`);

  const violations = runAll(BLOCK_RULES, { keyword, block, settings: options.settings }, options);
  for (const record of recordsOf(block)) {
    violations.push(...runAll(RECORD_RULES, { keyword, record, settings: options.settings }, options));
  }
  return violations;
}

/**
 * Run every applicable rule and return the violations in discovery order.
 */
export function lintDocument(document: MetadataDocument, options: EngineOptions): LintViolation[] {
  const violations = runTopLevelRules(document, options);
  for (const section of orderedSections(document)) {
    violations.push(...runSectionRules(section, options));
  }
  return violations;
}
