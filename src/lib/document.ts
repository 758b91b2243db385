import type {
  DocumentNode,
  ListNode,
  MappingEntry,
  MappingNode,
  MetadataDocument,
  PlainValue,
  ScalarNode,
  ScalarValue,
  SourcePosition,
} from '../types/document.js';

// ============================================================================
// Construction
// ============================================================================

export function scalarNode(value: ScalarValue, position?: SourcePosition): ScalarNode {
  return position ? { type: 'scalar', value, position } : { type: 'scalar', value };
}

export function mappingNode(entries: readonly MappingEntry[], position?: SourcePosition): MappingNode {
  return position ? { type: 'mapping', entries, position } : { type: 'mapping', entries };
}

export function listNode(items: readonly DocumentNode[], position?: SourcePosition): ListNode {
  return position ? { type: 'list', items, position } : { type: 'list', items };
}

export function mappingEntry(key: string, value: DocumentNode, keyPosition?: SourcePosition): MappingEntry {
  return keyPosition ? { key, value, keyPosition } : { key, value };
}

export const NULL_VALUE: ScalarValue = { kind: 'null' };

/**
 * Wrap a decoded primitive in a tagged scalar value.
 * Values that are not primitives (dates, bigints) are kept as their string form.
 */
export function scalarFromPrimitive(raw: unknown): ScalarValue {
  if (raw === null || raw === undefined) return NULL_VALUE;
  if (typeof raw === 'string') return { kind: 'string', value: raw };
  if (typeof raw === 'number') return { kind: 'number', value: raw };
  if (typeof raw === 'boolean') return { kind: 'boolean', value: raw };
  if (raw instanceof Date) return { kind: 'string', value: raw.toISOString().slice(0, 10) };
  return { kind: 'string', value: String(raw) };
}

// ============================================================================
// Access
// ============================================================================

/**
 * First value stored under `key`, if any.
 */
export function getEntry(mapping: MappingNode, key: string): DocumentNode | undefined {
  return mapping.entries.find(entry => entry.key === key)?.value;
}

/**
 * Scalar node stored under `key`. Nested structures count as absent here.
 */
export function getScalarNode(mapping: MappingNode, key: string): ScalarNode | undefined {
  const node = getEntry(mapping, key);
  return node?.type === 'scalar' ? node : undefined;
}

export function getScalar(mapping: MappingNode, key: string): ScalarValue | undefined {
  return getScalarNode(mapping, key)?.value;
}

/**
 * Text of a scalar as a user would read it. Null yields null.
 */
export function scalarText(value: ScalarValue): string | null {
  switch (value.kind) {
    case 'string':
      return value.value;
    case 'number':
      return String(value.value);
    case 'boolean':
      return value.value ? 'true' : 'false';
    case 'null':
      return null;
  }
}

/**
 * Text stored under `key`, or null when absent, null or nested.
 */
export function getText(mapping: MappingNode, key: string): string | null {
  const value = getScalar(mapping, key);
  return value ? scalarText(value) : null;
}

/**
 * Section keywords in document order, duplicates included.
 */
export function keywordsOf(document: MetadataDocument): string[] {
  return document.entries.map(entry => entry.key);
}

/**
 * Mapping items of a record list. Anything else yields no records.
 */
export function recordsOf(block: DocumentNode): MappingNode[] {
  if (block.type !== 'list') return [];
  return block.items.filter((item): item is MappingNode => item.type === 'mapping');
}

// ============================================================================
// Position-free views
// ============================================================================

export function toPlain(node: DocumentNode): PlainValue {
  switch (node.type) {
    case 'scalar':
      return node.value.kind === 'null' ? null : node.value.value;
    case 'list':
      return node.items.map(toPlain);
    case 'mapping': {
      const result: { [key: string]: PlainValue } = {};
      for (const entry of node.entries) {
        if (!Object.hasOwn(result, entry.key)) {
          result[entry.key] = toPlain(entry.value);
        }
      }
      return result;
    }
  }
}

function scalarValuesEqual(a: ScalarValue, b: ScalarValue): boolean {
  if (a.kind === 'null' || b.kind === 'null') return a.kind === b.kind;
  return a.kind === b.kind && a.value === b.value;
}

/**
 * Structural equality that ignores positions.
 */
export function nodesEqual(a: DocumentNode, b: DocumentNode): boolean {
  if (a.type === 'scalar' && b.type === 'scalar') {
    return scalarValuesEqual(a.value, b.value);
  }
  if (a.type === 'list' && b.type === 'list') {
    return a.items.length === b.items.length
      && a.items.every((item, i) => {
        const other = b.items[i];
        return other !== undefined && nodesEqual(item, other);
      });
  }
  if (a.type === 'mapping' && b.type === 'mapping') {
    return a.entries.length === b.entries.length
      && a.entries.every((entry, i) => {
        const other = b.entries[i];
        return other !== undefined && entry.key === other.key && nodesEqual(entry.value, other.value);
      });
  }
  return false;
}

/**
 * Compact printable form without positions.
 */
export function formatNode(node: DocumentNode): string {
  return JSON.stringify(toPlain(node));
}
