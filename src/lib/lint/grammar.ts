/**
 * The fixed metadata block grammar.
 *
 * The order of SECTION_KEYWORDS is the order sections are validated in and
 * written out in.
 */

export const SECTION_KEYWORDS = ['metadataBlock', 'datasetField', 'controlledVocabulary'] as const;

export type SectionKeyword = (typeof SECTION_KEYWORDS)[number];

export const REQUIRED_SECTION_KEYWORDS: readonly SectionKeyword[] = ['metadataBlock', 'datasetField'];

export const REQUIRED_KEYS: Record<SectionKeyword, readonly string[]> = {
  metadataBlock: ['name', 'displayName'],
  datasetField: [
    'name',
    'title',
    'description',
    'fieldType',
    'displayOrder',
    'advancedSearchField',
    'allowControlledVocabulary',
    'allowmultiples',
    'facetable',
    'displayoncreate',
    'required',
    'metadatablock_id',
  ],
  controlledVocabulary: ['DatasetField', 'Value'],
};

export const PERMISSIBLE_KEYS: Record<SectionKeyword, readonly string[]> = {
  metadataBlock: ['name', 'dataverseAlias', 'displayName', 'blockURI'],
  datasetField: [
    'name',
    'title',
    'description',
    'watermark',
    'fieldType',
    'displayOrder',
    'displayFormat',
    'advancedSearchField',
    'allowControlledVocabulary',
    'allowmultiples',
    'facetable',
    'displayoncreate',
    'required',
    'parent',
    'metadatablock_id',
    'termURI',
  ],
  controlledVocabulary: ['DatasetField', 'Value', 'identifier', 'displayOrder'],
};

/**
 * String fields checked for trailing whitespace, per section.
 */
export const WHITESPACE_CHECKED_KEYS: Record<SectionKeyword, readonly string[]> = {
  metadataBlock: ['name', 'dataverseAlias'],
  datasetField: ['name', 'title', 'description', 'watermark', 'fieldType', 'parent', 'metadatablock_id'],
  controlledVocabulary: ['Value', 'identifier'],
};

export function isSectionKeyword(keyword: string): keyword is SectionKeyword {
  return SECTION_KEYWORDS.some(known => known === keyword);
}

/**
 * Canonical position of a keyword. Unknown keywords sort after all known ones.
 */
export function keywordOrder(keyword: string): number {
  return isSectionKeyword(keyword) ? SECTION_KEYWORDS.indexOf(keyword) : SECTION_KEYWORDS.length;
}

/**
 * Sections whose rows carry a leading key column in the tabular layout.
 */
export function hasLeadingKeyColumn(keyword: string): boolean {
  return keyword !== 'metadataBlock';
}
