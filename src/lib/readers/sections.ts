/**
 * Locates the sections of a tabular metadata block.
 *
 * A TSV metadata block consists of up to three sections (metadataBlock,
 * datasetField, controlledVocabulary), each starting at a marker line that
 * begins with '#'.
 */

import { createViolation, type LintViolation } from '../lint/types.js';

export const SECTION_MARKER = '#';

/**
 * Contiguous run of lines starting at a marker line.
 */
export interface SectionSlice {
  /** 0-based index of the marker line in the file */
  start: number;
  lines: readonly string[];
}

/**
 * Stand-in for the third section when the file only has two.
 */
export interface MissingSection {
  kind: 'missing';
}

export const MISSING_SECTION: MissingSection = { kind: 'missing' };

export type SectionSplit =
  | {
      kind: 'split';
      /** Lines before the first marker */
      preamble: readonly string[];
      sections: readonly [SectionSlice, SectionSlice, SectionSlice | MissingSection];
    }
  | {
      /** Markers were ambiguous; the file is handed on unchanged */
      kind: 'passthrough';
      lines: readonly string[];
    };

export interface SplitResult {
  split: SectionSplit;
  violations: LintViolation[];
}

export function isMissingSection(section: SectionSlice | MissingSection): section is MissingSection {
  return 'kind' in section && section.kind === 'missing';
}

export function isMarkerLine(line: string): boolean {
  return line.startsWith(SECTION_MARKER);
}

/**
 * 0-based indices of all marker lines.
 */
export function findBreakPoints(lines: readonly string[]): number[] {
  const indices: number[] = [];
  lines.forEach((line, index) => {
    if (isMarkerLine(line)) indices.push(index);
  });
  return indices;
}

function slice(lines: readonly string[], start: number, end: number): SectionSlice {
  return { start, lines: lines.slice(start, end) };
}

/**
 * Partition the lines of a TSV file into its sections.
 *
 * Exactly three markers give three slices, exactly two give two slices plus
 * MISSING_SECTION. Any other marker count is ambiguous: the lines are passed
 * through unchanged together with one warning, and later checks pinpoint
 * the actual defect.
 */
export function splitSections(lines: readonly string[]): SplitResult {
  const breakPoints = findBreakPoints(lines);
  const [first, second, third] = breakPoints;

  if (breakPoints.length === 3 && first !== undefined && second !== undefined && third !== undefined) {
    return {
      split: {
        kind: 'split',
        preamble: lines.slice(0, first),
        sections: [slice(lines, first, second), slice(lines, second, third), slice(lines, third, lines.length)],
      },
      violations: [],
    };
  }

  if (breakPoints.length === 2 && first !== undefined && second !== undefined) {
    return {
      split: {
        kind: 'split',
        preamble: lines.slice(0, first),
        sections: [slice(lines, first, second), slice(lines, second, lines.length), MISSING_SECTION],
      },
      violations: [],
    };
  }

  const found = breakPoints.length === 0
    ? 'no section markers'
    : `${breakPoints.length} section marker(s) at line(s) ${breakPoints.map(i => i + 1).join(', ')}`;
  return {
    split: { kind: 'passthrough', lines },
    violations: [
      createViolation(
        'warning',
        'identify_break_points',
        `Expected two or three lines starting with '${SECTION_MARKER}' but found ${found}. `
          + 'Could not split the file into sections reliably.'
      ),
    ],
  };
}
