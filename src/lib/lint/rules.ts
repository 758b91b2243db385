/**
 * Lints that can be selectively applied to a metadata block document.
 *
 * Every rule is a pure function returning the violations it found at the
 * severity it was invoked with. Rules are grouped by scope:
 *
 * - top-level: the list of section keywords
 * - block: the content of one section as a whole
 * - record: one entry of a section
 */

import type { MappingNode, ScalarNode } from '../../types/document.js';
import { getEntry, getScalarNode, getText, recordsOf } from '../document.js';
import { estimateTypos } from '../prefix/typos.js';
import {
  PERMISSIBLE_KEYS,
  REQUIRED_KEYS,
  REQUIRED_SECTION_KEYWORDS,
  SECTION_KEYWORDS,
  WHITESPACE_CHECKED_KEYS,
  isSectionKeyword,
} from './grammar.js';
import { describeRecord, fixKeysValid, fixKeywordsValid, fixRequiredKeysPresent } from './suggestions.js';
import {
  createViolation,
  type AnyLintRule,
  type BlockInput,
  type KeywordsInput,
  type LintRule,
  type LintViolation,
  type RecordInput,
  type RuleName,
} from './types.js';

// ============================================================================
// Helpers
// ============================================================================

function setsEqual(a: ReadonlySet<string>, b: readonly string[]): boolean {
  return a.size === b.length && b.every(value => a.has(value));
}

function formatLines(records: readonly MappingNode[]): string {
  return records
    .flatMap(record => (record.position ? [`line ${record.position.line}`] : []))
    .join(', ');
}

/**
 * Group records by a derived key, keeping first-seen order.
 */
function groupRecords(
  records: readonly MappingNode[],
  keyOf: (record: MappingNode) => string | null
): Map<string, MappingNode[]> {
  const groups = new Map<string, MappingNode[]>();
  for (const record of records) {
    const key = keyOf(record);
    if (key === null) continue;
    const group = groups.get(key);
    if (group) {
      group.push(record);
    } else {
      groups.set(key, [record]);
    }
  }
  return groups;
}

function booleanOf(node: ScalarNode | undefined): boolean | null {
  if (!node) return null;
  const value = node.value;
  return value.kind === 'boolean' ? value.value : null;
}

/**
 * Parent field name, treating an empty value as no parent.
 */
function parentOf(record: MappingNode): string | null {
  const parent = getText(record, 'parent');
  return parent === '' ? null : parent;
}

function invalidKeywordViolation(
  rule: RuleName,
  severity: LintViolation['severity'],
  input: RecordInput
): LintViolation {
  return createViolation(
    severity,
    rule,
    `Cannot check entry for invalid keyword '${input.keyword}'. Skipping entry.`,
    input.record.position
  );
}

// ============================================================================
// Top-level keyword lints
// ============================================================================

export const keywordsValid: LintRule<KeywordsInput> = {
  name: 'keywords_valid',
  code: 'k001',
  scope: 'top-level',
  defaultSeverity: 'error',
  description: 'Section keywords are spelled correctly and form a complete set',
  check({ keywords, position }, severity) {
    const present = new Set(keywords);
    if (setsEqual(present, SECTION_KEYWORDS) || setsEqual(present, REQUIRED_SECTION_KEYWORDS)) {
      return [];
    }
    return [
      createViolation(
        severity,
        'keywords_valid',
        fixKeywordsValid(keywords, SECTION_KEYWORDS, REQUIRED_SECTION_KEYWORDS),
        position
      ),
    ];
  },
};

export const keywordsUnique: LintRule<KeywordsInput> = {
  name: 'keywords_unique',
  code: 'k002',
  scope: 'top-level',
  defaultSeverity: 'error',
  description: 'No section keyword is given twice',
  check({ keywords, position }, severity) {
    const seen = new Set<string>();
    const duplicates = new Set<string>();
    for (const keyword of keywords) {
      if (seen.has(keyword)) duplicates.add(keyword);
      seen.add(keyword);
    }
    if (duplicates.size === 0) return [];

    const listed = [...duplicates].map(keyword => `'${keyword}'`).join(', ');
    return [
      createViolation(severity, 'keywords_unique', `Keyword list contains duplicate keys: ${listed}.`, position),
    ];
  },
};

// ============================================================================
// Block content lints
// ============================================================================

export const blockIsList: LintRule<BlockInput> = {
  name: 'block_is_list',
  code: 'b002',
  scope: 'block',
  defaultSeverity: 'error',
  description: 'Each section holds a list of entries',
  check({ keyword, block }, severity) {
    if (block.type !== 'list') {
      return [
        createViolation(severity, 'block_is_list', `Block '${keyword}' is not a list of entries.`, block.position),
      ];
    }

    const violations: LintViolation[] = [];
    block.items.forEach((item, index) => {
      if (item.type !== 'mapping') {
        violations.push(
          createViolation(
            severity,
            'block_is_list',
            `Entry ${index + 1} of block '${keyword}' is not a mapping of keys to values.`,
            item.position
          )
        );
      }
    });
    return violations;
  },
};

export const uniqueNames: LintRule<BlockInput> = {
  name: 'unique_names',
  code: 'b001',
  scope: 'block',
  defaultSeverity: 'error',
  description: "Each 'name' is used only once in metadataBlock and datasetField",
  check({ keyword, block }, severity) {
    if (keyword !== 'metadataBlock' && keyword !== 'datasetField') return [];

    const violations: LintViolation[] = [];
    const byName = groupRecords(recordsOf(block), record => getText(record, 'name'));

    for (const [name, records] of byName) {
      if (records.length < 2) continue;
      const lines = formatLines(records);
      violations.push(
        createViolation(
          severity,
          'unique_names',
          `Name '${name}' occurs ${records.length} times${lines ? `: ${lines}` : ''}. Names have to be unique.`,
          records[0]?.position
        )
      );
    }
    return violations;
  },
};

export const uniqueTitles: LintRule<BlockInput> = {
  name: 'unique_titles',
  code: 'b003',
  scope: 'block',
  defaultSeverity: 'error',
  description: "Each 'title' is used only once per parent in datasetField",
  check({ keyword, block }, severity) {
    if (keyword !== 'datasetField') return [];

    const violations: LintViolation[] = [];
    // Titles only clash within the same parent, so compound fields may reuse them
    const byTitle = groupRecords(recordsOf(block), record => {
      const title = getText(record, 'title');
      return title === null ? null : JSON.stringify([title, parentOf(record)]);
    });

    for (const records of byTitle.values()) {
      const first = records[0];
      if (records.length < 2 || !first) continue;
      const title = getText(first, 'title');
      const parent = parentOf(first);
      const scope = parent === null ? '' : ` under parent '${parent}'`;
      const lines = formatLines(records);
      violations.push(
        createViolation(
          severity,
          'unique_titles',
          `Title '${title}' occurs ${records.length} times${scope}${lines ? `: ${lines}` : ''}. Titles should be unique.`,
          first.position
        )
      );
    }
    return violations;
  },
};

export const namePrefixTypos: LintRule<BlockInput> = {
  name: 'name_prefix_typos',
  code: 'b004',
  scope: 'block',
  defaultSeverity: 'warning',
  description: 'Field names in datasetField do not look like typos of a shared prefix',
  check({ keyword, block, settings }, severity) {
    if (keyword !== 'datasetField') return [];

    const recordsByName = new Map<string, MappingNode>();
    for (const record of recordsOf(block)) {
      const name = getText(record, 'name');
      if (name !== null && !recordsByName.has(name)) {
        recordsByName.set(name, record);
      }
    }

    const candidates = estimateTypos([...recordsByName.keys()], {
      minPrefixLength: settings.minPrefixLength,
      distanceThreshold: settings.typoThreshold,
    });

    return candidates.map(({ suspect, likelyIntended }) => {
      const name = suspect.keywords[0] ?? suspect.prefix;
      const members = likelyIntended.keywords.map(member => `'${member}'`).join(', ');
      return createViolation(
        severity,
        'name_prefix_typos',
        `Name '${name}' might contain a typo: its prefix is close to '${likelyIntended.prefix}' shared by ${members}.`,
        recordsByName.get(name)?.position
      );
    });
  },
};

// ============================================================================
// Record lints
// ============================================================================

export const keysValid: LintRule<RecordInput> = {
  name: 'keys_valid',
  code: 'e001',
  scope: 'record',
  defaultSeverity: 'error',
  description: 'Entries only use keys permitted for their section',
  check(input, severity) {
    const { keyword, record } = input;
    if (!isSectionKeyword(keyword)) {
      return [invalidKeywordViolation('keys_valid', severity, input)];
    }

    const permissible = PERMISSIBLE_KEYS[keyword];
    return record.entries
      .filter(entry => !permissible.includes(entry.key))
      .map(entry =>
        createViolation(
          severity,
          'keys_valid',
          fixKeysValid(entry.key, record, keyword, permissible),
          entry.keyPosition ?? entry.value.position ?? record.position
        )
      );
  },
};

export const requiredKeysPresent: LintRule<RecordInput> = {
  name: 'required_keys_present',
  code: 'e002',
  scope: 'record',
  defaultSeverity: 'error',
  description: 'Entries provide every key required for their section',
  check(input, severity) {
    const { keyword, record } = input;
    if (!isSectionKeyword(keyword)) {
      return [invalidKeywordViolation('required_keys_present', severity, input)];
    }

    const missing = REQUIRED_KEYS[keyword].filter(key => getEntry(record, key) === undefined);
    if (missing.length === 0) return [];
    return [
      createViolation(
        severity,
        'required_keys_present',
        fixRequiredKeysPresent(missing, record, keyword),
        record.position
      ),
    ];
  },
};

export const noSubstructures: LintRule<RecordInput> = {
  name: 'no_substructures',
  code: 'e003',
  scope: 'record',
  defaultSeverity: 'error',
  description: 'Entry values are plain strings, booleans or numbers',
  check({ keyword, record }, severity) {
    return record.entries
      .filter(entry => entry.value.type !== 'scalar')
      .map(entry =>
        createViolation(
          severity,
          'no_substructures',
          `Key '${entry.key}' in block '${keyword}' has a substructure of type ${entry.value.type}. `
            + 'Only strings, booleans and numbers are allowed here.',
          entry.value.position ?? record.position
        )
      );
  },
};

export const noTrailingSpaces: LintRule<RecordInput> = {
  name: 'no_trailing_spaces',
  code: 'e004',
  scope: 'record',
  defaultSeverity: 'warning',
  description: 'Text values do not end in whitespace',
  check({ keyword, record }, severity) {
    // Invalid keywords are reported by keywords_valid
    if (!isSectionKeyword(keyword)) return [];

    const violations: LintViolation[] = [];
    for (const key of WHITESPACE_CHECKED_KEYS[keyword]) {
      // Missing keys are reported by required_keys_present
      const node = getScalarNode(record, key);
      const value = node?.value;
      if (value?.kind !== 'string') continue;
      if (/[ \t]+$/.test(value.value)) {
        violations.push(
          createViolation(
            severity,
            'no_trailing_spaces',
            `The value '${value.value}' of key '${key}' has one or more trailing spaces.`,
            node?.position ?? record.position
          )
        );
      }
    }
    return violations;
  },
};

function nestedCompoundRule(
  name: 'nested_compound_metadata' | 'nested_compound_metadata_controlled_vocab',
  code: string,
  withControlledVocabulary: boolean
): LintRule<RecordInput> {
  return {
    name,
    code,
    scope: 'record',
    defaultSeverity: withControlledVocabulary ? 'error' : 'warning',
    description: withControlledVocabulary
      ? 'Nested fields allowing multiple values do not use a controlled vocabulary'
      : 'Nested fields allowing multiple values use a controlled vocabulary',
    check({ keyword, record }, severity) {
      if (keyword !== 'datasetField' || parentOf(record) === null) return [];

      const allowMultiples = getScalarNode(record, 'allowmultiples');
      const controlledVocabulary = getScalarNode(record, 'allowControlledVocabulary');
      if (booleanOf(allowMultiples) !== true) return [];
      if (booleanOf(controlledVocabulary) !== withControlledVocabulary) return [];

      const detail = withControlledVocabulary
        ? 'with a controlled vocabulary, which is not supported'
        : 'without a controlled vocabulary, which cannot be entered in the user interface';
      return [
        createViolation(
          severity,
          name,
          `The entry ${describeRecord(record, keyword)} allows multiple values in a nested field ${detail}.`,
          allowMultiples?.position ?? record.position
        ),
      ];
    },
  };
}

export const nestedCompoundMetadata = nestedCompoundRule('nested_compound_metadata', 'e005', false);

export const nestedCompoundMetadataControlledVocab = nestedCompoundRule(
  'nested_compound_metadata_controlled_vocab',
  'e006',
  true
);

// ============================================================================
// Catalog
// ============================================================================

export const TOP_LEVEL_RULES: readonly LintRule<KeywordsInput>[] = [keywordsValid, keywordsUnique];

export const BLOCK_RULES: readonly LintRule<BlockInput>[] = [
  blockIsList,
  uniqueNames,
  uniqueTitles,
  namePrefixTypos,
];

export const RECORD_RULES: readonly LintRule<RecordInput>[] = [
  requiredKeysPresent,
  keysValid,
  noSubstructures,
  noTrailingSpaces,
  nestedCompoundMetadata,
  nestedCompoundMetadataControlledVocab,
];

export const RULE_CATALOG: readonly AnyLintRule[] = [...TOP_LEVEL_RULES, ...BLOCK_RULES, ...RECORD_RULES];

/**
 * Look up a rule by full name, falling back to its short code.
 */
export function findRule(identifier: string): AnyLintRule | undefined {
  return RULE_CATALOG.find(rule => rule.name === identifier)
    ?? RULE_CATALOG.find(rule => rule.code === identifier.toLowerCase());
}
