/**
 * Athena Integration Types
 *
 * Core type definitions for the Athena integration module.
 * @module athena-catalog/types
 */

// ============================================================================
// Values and Rows
// ============================================================================

/**
 * Value decoded from a JSON-typed column.
 */
export type JsonValue =
  | null
  | boolean
  | number
  | string
  | JsonValue[]
  | { [key: string]: JsonValue };

/**
 * A single cell of a result row.
 */
export type Value = JsonValue | bigint | Uint8Array;

/**
 * Positional row. Column names are not used as keys because a result may
 * carry the same name more than once.
 */
export type Row = Value[];

// ============================================================================
// Column Metadata
// ============================================================================

/**
 * Column metadata as reported by the engine.
 */
export interface ColumnDescription {
  /** Column name */
  name: string;
  /** Engine type name, e.g. `varchar`, `decimal(10,2)` */
  typeName: string;
}

/**
 * Column summary exposed to the host application.
 */
export interface ColumnSummary {
  /** Column name */
  name: string;
  /** Short type glyph */
  type: string;
}

// ============================================================================
// Catalog Nodes
// ============================================================================

/**
 * Arena index of a catalog node.
 */
export type NodeId = number;

/**
 * Node kinds of the catalog tree.
 */
export type CatalogNodeKind = 'catalog' | 'schema' | 'table' | 'column';

/**
 * Relation type glyph: table or view.
 */
export type RelationType = 't' | 'v';

interface CatalogNodeBase {
  /** Arena index */
  readonly id: NodeId;
  /** Fully quoted identifier, e.g. `"catalog"."schema"."table"` */
  readonly qualifiedIdentifier: string;
  /** Text inserted into a query when the node is picked */
  readonly queryName: string;
  /** Display label */
  readonly label: string;
  /** Short type glyph */
  readonly typeLabel: string;
  /** Parent arena index */
  readonly parent: NodeId | null;
  /**
   * Child arena indices. `undefined` until the node has been expanded; once
   * set, the list is complete.
   */
  readonly children: readonly NodeId[] | undefined;
}

export interface CatalogItemNode extends CatalogNodeBase {
  readonly kind: 'catalog';
  readonly catalog: string;
  readonly children: readonly NodeId[];
}

export interface SchemaNode extends CatalogNodeBase {
  readonly kind: 'schema';
  readonly catalog: string;
  readonly schema: string;
}

export interface TableNode extends CatalogNodeBase {
  readonly kind: 'table';
  readonly catalog: string;
  readonly schema: string;
  readonly table: string;
  readonly relationType: RelationType;
}

export interface ColumnNode extends CatalogNodeBase {
  readonly kind: 'column';
  readonly catalog: string;
  readonly schema: string;
  readonly table: string;
  readonly column: string;
  /** Engine type name the glyph was derived from */
  readonly dataType: string;
  readonly children: readonly NodeId[];
}

/**
 * A node of the catalog tree.
 */
export type CatalogNode = CatalogItemNode | SchemaNode | TableNode | ColumnNode;

/**
 * Nodes whose children are fetched on demand.
 */
export type LazyNode = SchemaNode | TableNode;

/**
 * Checks whether a node loads its children lazily.
 */
export function isLazyNode(node: CatalogNode): node is LazyNode {
  return node.kind === 'schema' || node.kind === 'table';
}

// ============================================================================
// Metadata Records
// ============================================================================

/**
 * Relation listed by the tables catalog.
 */
export interface RelationInfo {
  name: string;
  type: RelationType;
}

/**
 * Column listed by the columns catalog.
 */
export interface ColumnInfo {
  name: string;
  dataType: string;
}

// ============================================================================
// Snapshots
// ============================================================================

export const SNAPSHOT_VERSION = 1;

export interface ColumnSnapshot {
  name: string;
  dataType: string;
}

export interface TableSnapshot {
  name: string;
  type: RelationType;
  /** Absent when the table was never expanded */
  columns?: ColumnSnapshot[];
}

export interface SchemaSnapshot {
  name: string;
  /** Absent when the schema was never expanded */
  tables?: TableSnapshot[];
}

export interface CatalogItemSnapshot {
  name: string;
  schemas: SchemaSnapshot[];
}

/**
 * Connection-free projection of a catalog tree.
 */
export interface CatalogSnapshot {
  version: typeof SNAPSHOT_VERSION;
  /** Cache key the snapshot was written under */
  key: string;
  /** ISO timestamp */
  createdAt: string;
  catalogs: CatalogItemSnapshot[];
}

// ============================================================================
// Completions
// ============================================================================

/**
 * Editor completion entry.
 */
export interface Completion {
  label: string;
  typeLabel: string;
  value: string;
  priority: number;
  context: string | null;
}
