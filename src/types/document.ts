/**
 * Position-annotated document model shared by the YAML and TSV readers.
 *
 * Positions are provenance only: they feed diagnostics and never take part
 * in equality or printing (see `nodesEqual` and `formatNode` in
 * src/lib/document.ts).
 */

/**
 * 1-based source coordinates. TSV input has no column information.
 */
export interface SourcePosition {
  readonly line: number;
  readonly column?: number | undefined;
}

/**
 * Value carried by a scalar node.
 */
export type ScalarValue =
  | { readonly kind: 'string'; readonly value: string }
  | { readonly kind: 'number'; readonly value: number }
  | { readonly kind: 'boolean'; readonly value: boolean }
  | { readonly kind: 'null' };

export interface ScalarNode {
  readonly type: 'scalar';
  readonly value: ScalarValue;
  readonly position?: SourcePosition | undefined;
}

export interface MappingEntry {
  readonly key: string;
  readonly value: DocumentNode;
  /** Where the key itself was written, when the reader knows it */
  readonly keyPosition?: SourcePosition | undefined;
}

/**
 * Ordered mapping. Keys may repeat; the rules decide whether that is a defect.
 */
export interface MappingNode {
  readonly type: 'mapping';
  readonly entries: readonly MappingEntry[];
  readonly position?: SourcePosition | undefined;
}

export interface ListNode {
  readonly type: 'list';
  readonly items: readonly DocumentNode[];
  readonly position?: SourcePosition | undefined;
}

export type DocumentNode = ScalarNode | MappingNode | ListNode;

/**
 * Root of a parsed metadata block: section keyword → record list.
 */
export type MetadataDocument = MappingNode;

/**
 * Position-free view of a node, used for equality and printing.
 */
export type PlainValue =
  | string
  | number
  | boolean
  | null
  | PlainValue[]
  | { [key: string]: PlainValue };
