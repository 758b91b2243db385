import { describe, it, expect } from 'vitest';
import {
  formatNode,
  getText,
  keywordsOf,
  listNode,
  mappingEntry,
  mappingNode,
  nodesEqual,
  NULL_VALUE,
  recordsOf,
  scalarFromPrimitive,
  scalarNode,
  scalarText,
  toPlain,
} from '../../../src/lib/document.js';
import { documentOf, record } from '../fixtures/setup.js';

describe('scalarFromPrimitive', () => {
  it('should tag primitives by kind', () => {
    expect(scalarFromPrimitive('text')).toEqual({ kind: 'string', value: 'text' });
    expect(scalarFromPrimitive(3)).toEqual({ kind: 'number', value: 3 });
    expect(scalarFromPrimitive(false)).toEqual({ kind: 'boolean', value: false });
    expect(scalarFromPrimitive(null)).toEqual(NULL_VALUE);
    expect(scalarFromPrimitive(undefined)).toEqual(NULL_VALUE);
  });

  it('should keep dates as ISO calendar dates', () => {
    expect(scalarFromPrimitive(new Date('2024-03-01T00:00:00Z'))).toEqual({ kind: 'string', value: '2024-03-01' });
  });
});

describe('scalarText', () => {
  it('should render values as a user would read them', () => {
    expect(scalarText({ kind: 'string', value: 'a' })).toBe('a');
    expect(scalarText({ kind: 'number', value: 7 })).toBe('7');
    expect(scalarText({ kind: 'boolean', value: true })).toBe('true');
    expect(scalarText(NULL_VALUE)).toBeNull();
  });
});

describe('getText', () => {
  it('should read the first entry with the key', () => {
    const node = mappingNode([
      mappingEntry('name', scalarNode({ kind: 'string', value: 'first' })),
      mappingEntry('name', scalarNode({ kind: 'string', value: 'second' })),
    ]);

    expect(getText(node, 'name')).toBe('first');
  });

  it('should treat missing, null and nested values as absent', () => {
    const node = record({ parent: null, nested: listNode([]) });

    expect(getText(node, 'missing')).toBeNull();
    expect(getText(node, 'parent')).toBeNull();
    expect(getText(node, 'nested')).toBeNull();
  });
});

describe('keywordsOf and recordsOf', () => {
  it('should list keywords in order including duplicates', () => {
    const doc = documentOf([
      ['metadataBlock', listNode([])],
      ['datasetField', listNode([])],
      ['metadataBlock', listNode([])],
    ]);

    expect(keywordsOf(doc)).toEqual(['metadataBlock', 'datasetField', 'metadataBlock']);
  });

  it('should only yield mapping items of a list', () => {
    const first = record({ name: 'a' });
    const second = record({ name: 'b' });
    const mixed = listNode([first, scalarNode({ kind: 'string', value: 'stray' }), second]);

    expect(recordsOf(mixed)).toEqual([first, second]);
    expect(recordsOf(scalarNode(NULL_VALUE))).toEqual([]);
  });
});

describe('position-free views', () => {
  it('should ignore positions in equality', () => {
    const a = record({ name: 'demo', displayOrder: 1 }, 3);
    const b = record({ name: 'demo', displayOrder: 1 }, 12);

    expect(nodesEqual(a, b)).toBe(true);
    expect(formatNode(a)).toBe(formatNode(b));
  });

  it('should distinguish values of different kinds', () => {
    expect(nodesEqual(record({ value: 1 }), record({ value: '1' }))).toBe(false);
    expect(nodesEqual(record({ value: null }), record({ value: null }))).toBe(true);
    expect(nodesEqual(listNode([]), record({}))).toBe(false);
  });

  it('should print the plain value', () => {
    const node = listNode([record({ name: 'demo', required: true, parent: null })]);

    expect(toPlain(node)).toEqual([{ name: 'demo', required: true, parent: null }]);
    expect(formatNode(node)).toBe('[{"name":"demo","required":true,"parent":null}]');
  });

  it('should keep the first of repeated keys in the plain view', () => {
    const node = mappingNode([
      mappingEntry('name', scalarNode({ kind: 'string', value: 'first' })),
      mappingEntry('name', scalarNode({ kind: 'string', value: 'second' })),
    ]);

    expect(toPlain(node)).toEqual({ name: 'first' });
  });
});
