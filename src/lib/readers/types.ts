import type { MetadataDocument } from '../../types/document.js';
import type { LintViolation } from '../lint/types.js';

/**
 * Outcome of reading one input file. `document` is null when the input
 * could not be turned into a document at all; `violations` then explains why.
 */
export interface ReadResult {
  document: MetadataDocument | null;
  violations: LintViolation[];
}

export type InputType = 'yaml' | 'tsv';
