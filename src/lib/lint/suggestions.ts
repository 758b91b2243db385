/**
 * Messages that tell the user how to fix a violation.
 */

import type { MappingNode } from '../../types/document.js';
import { getText } from '../document.js';
import { closestMatch } from '../distance.js';

/**
 * Minimum similarity ratio (exclusive) for proposing a rename.
 */
export const SUGGESTION_RATIO = 0.5;

function quoteList(values: readonly string[]): string {
  return values.map(value => `'${value}'`).join(', ');
}

/**
 * Propose the closest candidate, if it is close enough.
 */
export function suggestRename(value: string, candidates: readonly string[]): string | null {
  const best = closestMatch(value, candidates);
  return best && best.ratio > SUGGESTION_RATIO ? best.candidate : null;
}

/**
 * Human-readable handle for a record in messages.
 */
export function describeRecord(record: MappingNode, keyword: string): string {
  const handle = getText(record, keyword === 'controlledVocabulary' ? 'DatasetField' : 'name');
  if (handle !== null) return `'${handle}'`;
  return record.position ? `the entry at line ${record.position.line}` : 'an unnamed entry';
}

export function fixKeywordsValid(
  keywords: readonly string[],
  permissible: readonly string[],
  required: readonly string[]
): string {
  const present = new Set(keywords);
  const messages: string[] = [];

  for (const keyword of present) {
    if (permissible.includes(keyword)) continue;
    const suggestion = suggestRename(keyword, permissible);
    messages.push(
      suggestion
        ? `Invalid keyword '${keyword}'. Did you mean '${suggestion}'?`
        : `Invalid keyword '${keyword}'. Valid keywords are: ${quoteList(permissible)}`
    );
  }

  for (const keyword of required) {
    if (!present.has(keyword)) {
      messages.push(`Missing required keyword '${keyword}'`);
    }
  }

  return messages.join('; ');
}

export function fixKeysValid(
  key: string,
  record: MappingNode,
  keyword: string,
  permissible: readonly string[]
): string {
  const message = `Invalid key '${key}' present for ${describeRecord(record, keyword)} in block '${keyword}'.`;
  const suggestion = suggestRename(key, permissible);
  return suggestion
    ? `${message} Did you mean '${suggestion}'?`
    : `${message} Permitted keys are: ${quoteList(permissible)}`;
}

export function fixRequiredKeysPresent(
  missing: readonly string[],
  record: MappingNode,
  keyword: string
): string {
  const noun = missing.length === 1 ? 'key' : 'keys';
  return `Missing required ${noun} ${quoteList(missing)} for ${describeRecord(record, keyword)} in block '${keyword}'.`;
}
