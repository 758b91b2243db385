import papaparse from 'papaparse';
import type { MappingNode, MetadataDocument, ScalarValue } from '../types/document.js';
import { getEntry, recordsOf } from './document.js';
import { orderedSections } from './lint/engine.js';
import { SECTION_MARKER } from './readers/sections.js';

const { unparse } = papaparse;

/**
 * Cell text for a scalar in the tabular layout.
 */
export function renderScalar(value: ScalarValue): string {
  switch (value.kind) {
    case 'boolean':
      return value.value ? 'TRUE' : 'FALSE';
    case 'null':
      return '';
    case 'number':
      return String(value.value);
    case 'string':
      return value.value;
  }
}

function padRow(cells: string[], width: number): string[] {
  const padding = Math.max(0, width - cells.length);
  return [...cells, ...Array.from({ length: padding }, () => '')];
}

/**
 * Union of the records' keys in first-seen order.
 */
function headersOf(records: readonly MappingNode[]): string[] {
  const headers: string[] = [];
  for (const record of records) {
    for (const { key } of record.entries) {
      if (!headers.includes(key)) headers.push(key);
    }
  }
  return headers;
}

function renderCell(record: MappingNode, header: string, keyword: string): string {
  const node = getEntry(record, header);
  if (node === undefined) return '';
  if (node.type !== 'scalar') {
    throw new Error(`Cannot write nested value of key '${header}' in block '${keyword}'.`);
  }
  return renderScalar(node.value);
}

/**
 * Render a validated document as a tab-separated metadata block.
 *
 * Sections appear in canonical order. Every row, headers included, is
 * padded with empty cells to one width: `longestRow` or the widest header
 * row, whichever is larger.
 */
export function renderMetadataBlock(document: MetadataDocument, longestRow: number): string {
  const sections = orderedSections(document).map(({ keyword, block }) => {
    const records = recordsOf(block);
    const headers = headersOf(records);
    return {
      header: [`${SECTION_MARKER}${keyword}`, ...headers],
      rows: records.map(record => ['', ...headers.map(header => renderCell(record, header, keyword))]),
    };
  });

  const width = Math.max(longestRow, ...sections.map(section => section.header.length));
  const rows = sections.flatMap(section => [section.header, ...section.rows].map(row => padRow(row, width)));
  if (rows.length === 0) return '';

  return `${unparse(rows, { delimiter: '\t', newline: '\n' })}\n`;
}
