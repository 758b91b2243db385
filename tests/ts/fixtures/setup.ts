import { mkdtemp, rm } from 'fs/promises';
import { dirname, join, resolve } from 'path';
import { tmpdir } from 'os';
import { fileURLToPath } from 'url';
import { vi } from 'vitest';
import { listNode, mappingEntry, mappingNode, scalarFromPrimitive, scalarNode } from '../../../src/lib/document.js';
import type { DocumentNode, MappingNode } from '../../../src/types/document.js';

const __dirname = dirname(fileURLToPath(import.meta.url));

export const PROJECT_ROOT = resolve(__dirname, '../../..');
export const BLOCKS_DIR = join(PROJECT_ROOT, 'tests/fixtures/blocks');

export function fixturePath(name: string): string {
  return join(BLOCKS_DIR, name);
}

export async function createTempDir(): Promise<string> {
  return mkdtemp(join(tmpdir(), 'mdblock-test-'));
}

export async function cleanupTempDir(dir: string): Promise<void> {
  await rm(dir, { recursive: true, force: true });
}

export type FieldValue = string | number | boolean | null;

/**
 * Flat record whose entries all report the record's line.
 */
export function record(fields: Record<string, FieldValue | DocumentNode>, line?: number): MappingNode {
  const position = line === undefined ? undefined : { line };
  const entries = Object.entries(fields).map(([key, value]) =>
    mappingEntry(
      key,
      value !== null && typeof value === 'object' ? value : scalarNode(scalarFromPrimitive(value), position)
    )
  );
  return mappingNode(entries, position);
}

export function block(records: readonly DocumentNode[], line?: number): DocumentNode {
  return listNode(records, line === undefined ? undefined : { line });
}

/**
 * Document from section keyword → block pairs, in the given order.
 */
export function documentOf(sections: ReadonlyArray<[string, DocumentNode]>): MappingNode {
  return mappingNode(sections.map(([keyword, value]) => mappingEntry(keyword, value)), { line: 1 });
}

/**
 * A complete, valid datasetField record.
 */
export function datasetField(overrides: Record<string, FieldValue> = {}, line?: number): MappingNode {
  return record({
    name: 'demoTitle',
    title: 'Title',
    description: 'The title',
    fieldType: 'text',
    displayOrder: 0,
    advancedSearchField: true,
    allowControlledVocabulary: false,
    allowmultiples: false,
    facetable: false,
    displayoncreate: true,
    required: true,
    parent: null,
    metadatablock_id: 'demo',
    ...overrides,
  }, line);
}

export interface CapturedConsole {
  logs: string[];
  errors: string[];
}

/**
 * Silence console output and record it line by line.
 * Restore with `vi.restoreAllMocks()`.
 */
export function captureConsole(): CapturedConsole {
  const captured: CapturedConsole = { logs: [], errors: [] };
  vi.spyOn(console, 'log').mockImplementation((...args: unknown[]) => {
    captured.logs.push(args.map(String).join(' '));
  });
  vi.spyOn(console, 'error').mockImplementation((...args: unknown[]) => {
    captured.errors.push(args.map(String).join(' '));
  });
  return captured;
}
