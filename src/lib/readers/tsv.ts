/**
 * Reads a TSV metadata block into the same document model the YAML reader
 * produces.
 *
 * Each section is itself valid TSV: a marker line `#keyword<TAB>header...`
 * followed by rows whose first cell is empty. Shorter sections may carry
 * trailing empty cells up to the width of the widest section.
 */

import papaparse from 'papaparse';
import type { MappingEntry, ScalarValue } from '../../types/document.js';
import { listNode, mappingEntry, mappingNode, NULL_VALUE, scalarNode } from '../document.js';
import { createViolation, type LintViolation } from '../lint/types.js';
import type { ReadResult } from './types.js';
import { findBreakPoints, isMissingSection, splitSections, type SectionSlice } from './sections.js';

const { parse } = papaparse;

/**
 * Split a file into lines without line terminators.
 */
export function splitLines(source: string): string[] {
  const lines = source.split(/\r?\n/);
  if (lines.length > 0 && lines[lines.length - 1] === '') {
    lines.pop();
  }
  return lines;
}

/**
 * Decode a single cell: empty → null, TRUE/FALSE → boolean, integers → number.
 * Integers a double cannot hold exactly stay strings.
 */
export function parseCell(cell: string): ScalarValue {
  if (cell === '') return NULL_VALUE;
  if (/^true$/i.test(cell)) return { kind: 'boolean', value: true };
  if (/^false$/i.test(cell)) return { kind: 'boolean', value: false };
  if (/^-?(0|[1-9]\d*)$/.test(cell)) {
    const value = Number(cell);
    if (Number.isSafeInteger(value)) return { kind: 'number', value };
  }
  return { kind: 'string', value: cell };
}

export interface ParsedRow {
  cells: string[];
  /** Tokenizer complaints, e.g. an unterminated quoted cell */
  errors: string[];
}

/**
 * Tokenize one line of tab-separated values. Quoted cells may contain tabs.
 */
export function parseRow(line: string): ParsedRow {
  const result = parse<string[]>(line, { delimiter: '\t', newline: '\n' });
  return {
    cells: result.data[0] ?? [],
    errors: result.errors.map(error => error.message),
  };
}

/**
 * Keyword and header names from a marker line.
 */
export function parseMarkerLine(line: string): { keyword: string; headers: string[] } {
  const [marker = '', ...headers] = parseRow(line).cells;
  while (headers.length > 0 && headers[headers.length - 1] === '') {
    headers.pop();
  }
  return {
    keyword: marker.slice(1),
    // Published blocks pad some headers (notably fieldType) with spaces
    headers: headers.map(header => header.trim()),
  };
}

interface SectionRead {
  entry: MappingEntry;
  violations: LintViolation[];
}

function readSection(section: SectionSlice): SectionRead {
  const [markerLine = '', ...rows] = section.lines;
  const { keyword, headers } = parseMarkerLine(markerLine);
  const markerPosition = { line: section.start + 1 };
  const violations: LintViolation[] = [];

  const records = rows.flatMap((row, offset) => {
    if (row.trim() === '') return [];
    const position = { line: section.start + offset + 2 };
    const { cells: [, ...cells], errors } = parseRow(row);

    for (const message of errors) {
      violations.push(createViolation('warning', 'tabular_layout', `Malformed row: ${message}.`, position));
    }
    const dropped = cells.slice(headers.length).filter(cell => cell !== '').length;
    if (dropped > 0) {
      violations.push(
        createViolation(
          'warning',
          'tabular_layout',
          `Row has ${dropped} value(s) beyond the ${headers.length} header(s) of '${keyword}'; they were ignored.`,
          position
        )
      );
    }

    const entries = headers.map((header, column) =>
      mappingEntry(header, scalarNode(parseCell(cells[column] ?? ''), position))
    );
    return [mappingNode(entries, position)];
  });

  return { entry: mappingEntry(keyword, listNode(records, markerPosition), markerPosition), violations };
}

/**
 * Sections found by walking the file marker by marker.
 */
function looseSections(lines: readonly string[]): SectionSlice[] {
  const breakPoints = findBreakPoints(lines);
  return breakPoints.map((start, i) => ({
    start,
    lines: lines.slice(start, breakPoints[i + 1] ?? lines.length),
  }));
}

function preambleViolations(preamble: readonly string[]): LintViolation[] {
  const index = preamble.findIndex(line => line.trim() !== '');
  if (index === -1) return [];
  const ignored = preamble.filter(line => line.trim() !== '').length;
  return [
    createViolation(
      'warning',
      'tabular_layout',
      `${ignored} line(s) before the first section marker were ignored.`,
      { line: index + 1 }
    ),
  ];
}

/**
 * Parse TSV source text. Ambiguous section markers produce a warning and a
 * best-effort document that opens a new section at every marker line.
 */
export function readTsvSource(source: string): ReadResult {
  const lines = splitLines(source);
  const { split, violations } = splitSections(lines);

  let sections: SectionSlice[];
  if (split.kind === 'split') {
    violations.push(...preambleViolations(split.preamble));
    sections = split.sections.filter((section): section is SectionSlice => !isMissingSection(section));
  } else {
    const first = findBreakPoints(split.lines)[0] ?? split.lines.length;
    violations.push(...preambleViolations(split.lines.slice(0, first)));
    sections = looseSections(split.lines);
  }

  const reads = sections.map(readSection);
  return {
    document: mappingNode(reads.map(read => read.entry), { line: 1 }),
    violations: [...violations, ...reads.flatMap(read => read.violations)],
  };
}
