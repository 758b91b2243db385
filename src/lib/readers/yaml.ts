import { LineCounter, isAlias, isMap, isScalar, isSeq, parseDocument } from 'yaml';
import type { Document } from 'yaml';
import type { DocumentNode, SourcePosition } from '../../types/document.js';
import {
  listNode,
  mappingEntry,
  mappingNode,
  NULL_VALUE,
  scalarFromPrimitive,
  scalarNode,
} from '../document.js';
import { createViolation } from '../lint/types.js';
import type { ReadResult } from './types.js';

interface ConversionContext {
  doc: Document.Parsed;
  lineCounter: LineCounter;
}

function positionAt(offset: number, context: ConversionContext): SourcePosition {
  const { line, col } = context.lineCounter.linePos(offset);
  return { line, column: col };
}

function positionOf(node: unknown, context: ConversionContext): SourcePosition | undefined {
  if (node && typeof node === 'object' && 'range' in node) {
    const range: unknown = node.range;
    if (Array.isArray(range) && typeof range[0] === 'number') {
      return positionAt(range[0], context);
    }
  }
  return undefined;
}

function keyText(key: unknown): string {
  if (isScalar(key)) return String(key.value);
  return String(key);
}

function convertNode(node: unknown, context: ConversionContext): DocumentNode {
  const position = positionOf(node, context);

  if (isAlias(node)) {
    const target = node.resolve(context.doc);
    return target ? convertNode(target, context) : scalarNode(NULL_VALUE, position);
  }

  if (isMap(node)) {
    const entries = node.items.map(pair => {
      const keyPosition = positionOf(pair.key, context);
      // `key:` without a value has no value node
      const value = pair.value === null || pair.value === undefined
        ? scalarNode(NULL_VALUE, keyPosition)
        : convertNode(pair.value, context);
      return mappingEntry(keyText(pair.key), value, keyPosition);
    });
    return mappingNode(entries, position);
  }

  if (isSeq(node)) {
    return listNode(node.items.map(item => convertNode(item, context)), position);
  }

  if (isScalar(node)) {
    return scalarNode(scalarFromPrimitive(node.value), position);
  }

  return scalarNode(scalarFromPrimitive(node), position);
}

/**
 * Parse YAML source text into a position-annotated document.
 *
 * Any parse error (duplicate keys included) yields a single ERROR and no
 * document; the remaining checks would only repeat the same defect.
 */
export function readYamlSource(source: string): ReadResult {
  const lineCounter = new LineCounter();
  const doc = parseDocument(source, { lineCounter });

  const [firstError] = doc.errors;
  if (firstError) {
    const [start] = firstError.linePos ?? [];
    const message = firstError.message.split('\n')[0] ?? firstError.message;
    return {
      document: null,
      violations: [
        createViolation(
          'error',
          'parse_document',
          message,
          start ? { line: start.line, column: start.col } : undefined
        ),
      ],
    };
  }

  const context: ConversionContext = { doc, lineCounter };

  if (doc.contents === null) {
    return { document: mappingNode([], { line: 1, column: 1 }), violations: [] };
  }

  const root = convertNode(doc.contents, context);
  if (root.type !== 'mapping') {
    return {
      document: null,
      violations: [
        createViolation(
          'error',
          'parse_document',
          'The document root must map section keywords to lists of entries.',
          root.position
        ),
      ],
    };
  }

  return { document: root, violations: [] };
}
