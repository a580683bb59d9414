/**
 * Athena Catalog Tree
 *
 * Catalogs, schemas, tables and columns kept in one arena. Nodes point at
 * their parent and children by index; the tree holds the metadata source it
 * needs to expand nodes, never the connection.
 *
 * Catalog and schema levels are built up front. Tables of a schema and
 * columns of a table are fetched the first time the node is expanded, all at
 * once, and kept for the lifetime of the tree.
 *
 * @module athena-catalog/metadata/catalog-tree
 */

import { AthenaError, AthenaErrorCode } from '../errors/index.js';
import { NoopLogger, type Logger } from '../observability/logging.js';
import {
  SNAPSHOT_VERSION,
  isLazyNode,
  type CatalogItemNode,
  type CatalogItemSnapshot,
  type CatalogNode,
  type CatalogSnapshot,
  type ColumnInfo,
  type ColumnNode,
  type NodeId,
  type RelationInfo,
  type SchemaNode,
  type SchemaSnapshot,
  type TableNode,
  type TableSnapshot,
} from '../types/index.js';
import { shortType } from '../types/short-type.js';
import { qualify, quoteIdentifier, tableKey, type MetadataSource } from './discovery.js';

/**
 * Glyphs for the two eagerly built levels.
 */
export const CATALOG_GLYPH = 'c';
export const SCHEMA_GLYPH = 's';

/**
 * Restricts the eagerly built levels.
 */
export interface CatalogFilters {
  /** Only this catalog; otherwise every catalog the source lists */
  catalogFilter?: string;
  /** Only this schema; otherwise every schema the source lists */
  schemaFilter?: string;
}

export interface CatalogTreeOptions {
  /**
   * Called after nodes were expanded, with the ids of the expanded nodes.
   */
  onExpand?: (tree: CatalogTree, expanded: readonly NodeId[]) => Promise<void>;
  logger?: Logger;
}

function pushGrouped<T>(groups: Map<string, T[]>, key: string, value: T): void {
  const group = groups.get(key);
  if (group) {
    group.push(value);
  } else {
    groups.set(key, [value]);
  }
}

/**
 * Lazy catalog tree.
 *
 * @example
 * ```typescript
 * const tree = await connection.getCatalog();
 * const [catalog] = tree.roots();
 * const schemas = tree.childrenOf(catalog.id);
 * const tables = await tree.fetchChildren(schemas[0].id); // one remote query
 * await tree.fetchChildren(schemas[0].id);                // cached, no query
 * ```
 */
export class CatalogTree {
  private readonly nodes: CatalogNode[] = [];
  private readonly rootIds: NodeId[] = [];
  private readonly pending = new Map<NodeId, Promise<void>>();
  private readonly source: MetadataSource;
  private readonly onExpand?: CatalogTreeOptions['onExpand'];
  private readonly logger: Logger;
  /** When the catalog and schema levels were listed (ISO timestamp) */
  readonly createdAt: string;

  private constructor(source: MetadataSource, options: CatalogTreeOptions, createdAt: string) {
    this.source = source;
    this.createdAt = createdAt;
    this.onExpand = options.onExpand;
    this.logger = options.logger ?? new NoopLogger();
  }

  // ==========================================================================
  // Construction
  // ==========================================================================

  /**
   * Builds the catalog and schema levels from the metadata source.
   *
   * @throws {QueryError} If listing catalogs or schemas fails
   */
  static async build(
    source: MetadataSource,
    filters: CatalogFilters = {},
    options: CatalogTreeOptions = {}
  ): Promise<CatalogTree> {
    const tree = new CatalogTree(source, options, new Date().toISOString());
    const catalogs = filters.catalogFilter ? [filters.catalogFilter] : await source.listCatalogs();

    for (const catalog of catalogs) {
      const schemas = filters.schemaFilter
        ? [filters.schemaFilter]
        : await source.listSchemas(catalog);
      tree.addCatalog({ name: catalog, schemas: schemas.map((name) => ({ name })) });
    }

    tree.logger.debug('Catalog tree built', { catalogs: catalogs.length, nodes: tree.size });
    return tree;
  }

  /**
   * Rebuilds a tree from a snapshot. Schemas and tables whose children were
   * recorded come back expanded; the rest stay lazy.
   */
  static fromSnapshot(
    snapshot: CatalogSnapshot,
    source: MetadataSource,
    options: CatalogTreeOptions = {}
  ): CatalogTree {
    const tree = new CatalogTree(source, options, snapshot.createdAt);
    for (const catalog of snapshot.catalogs) {
      tree.addCatalog(catalog);
    }
    return tree;
  }

  private addCatalog(snapshot: CatalogItemSnapshot): void {
    const id = this.nodes.length;
    const schemaIds: NodeId[] = [];
    const node: CatalogItemNode = {
      id,
      kind: 'catalog',
      catalog: snapshot.name,
      qualifiedIdentifier: quoteIdentifier(snapshot.name),
      queryName: quoteIdentifier(snapshot.name),
      label: snapshot.name,
      typeLabel: CATALOG_GLYPH,
      parent: null,
      children: schemaIds,
    };
    this.nodes.push(node);
    this.rootIds.push(id);

    for (const schema of snapshot.schemas) {
      schemaIds.push(this.addSchema(id, snapshot.name, schema));
    }
  }

  private addSchema(parent: NodeId, catalog: string, snapshot: SchemaSnapshot): NodeId {
    const id = this.nodes.length;
    const identifier = qualify(catalog, snapshot.name);
    this.nodes.push({
      id,
      kind: 'schema',
      catalog,
      schema: snapshot.name,
      qualifiedIdentifier: identifier,
      queryName: identifier,
      label: snapshot.name,
      typeLabel: SCHEMA_GLYPH,
      parent,
      children: undefined,
    });

    if (snapshot.tables) {
      const tableIds = snapshot.tables.map((table) =>
        this.addTable(id, catalog, snapshot.name, table)
      );
      this.setChildren(id, tableIds);
    }
    return id;
  }

  private addTable(parent: NodeId, catalog: string, schema: string, snapshot: TableSnapshot): NodeId {
    const id = this.nodes.length;
    const identifier = qualify(catalog, schema, snapshot.name);
    this.nodes.push({
      id,
      kind: 'table',
      catalog,
      schema,
      table: snapshot.name,
      relationType: snapshot.type,
      qualifiedIdentifier: identifier,
      queryName: identifier,
      label: snapshot.name,
      typeLabel: snapshot.type,
      parent,
      children: undefined,
    });

    if (snapshot.columns) {
      const columnIds = snapshot.columns.map((column) =>
        this.addColumn(id, catalog, schema, snapshot.name, column)
      );
      this.setChildren(id, columnIds);
    }
    return id;
  }

  private addColumn(
    parent: NodeId,
    catalog: string,
    schema: string,
    table: string,
    info: ColumnInfo
  ): NodeId {
    const id = this.nodes.length;
    const node: ColumnNode = {
      id,
      kind: 'column',
      catalog,
      schema,
      table,
      column: info.name,
      dataType: info.dataType,
      qualifiedIdentifier: qualify(catalog, schema, table, info.name),
      queryName: quoteIdentifier(info.name),
      label: info.name,
      typeLabel: shortType(info.dataType),
      parent,
      children: [],
    };
    this.nodes.push(node);
    return id;
  }

  private setChildren(id: NodeId, children: NodeId[]): void {
    const node = this.node(id);
    if (node.kind === 'schema' || node.kind === 'table') {
      this.nodes[id] = { ...node, children };
    }
  }

  // ==========================================================================
  // Access
  // ==========================================================================

  /**
   * Number of nodes in the arena.
   */
  get size(): number {
    return this.nodes.length;
  }

  /**
   * Top-level catalog nodes.
   */
  roots(): CatalogItemNode[] {
    const roots: CatalogItemNode[] = [];
    for (const id of this.rootIds) {
      const node = this.node(id);
      if (node.kind === 'catalog') {
        roots.push(node);
      }
    }
    return roots;
  }

  /**
   * Looks up a node by arena index.
   *
   * @throws {AthenaError} If the index does not belong to this tree
   */
  node(id: NodeId): CatalogNode {
    const node = this.nodes[id];
    if (node === undefined) {
      throw new AthenaError(`Unknown catalog node ${id}`, AthenaErrorCode.UNKNOWN_NODE);
    }
    return node;
  }

  /**
   * Parent of a node, or `undefined` for catalogs.
   */
  parentOf(id: NodeId): CatalogNode | undefined {
    const parent = this.node(id).parent;
    return parent === null ? undefined : this.node(parent);
  }

  /**
   * Loaded children of a node. Empty while a lazy node is unexpanded; use
   * {@link isLoaded} to tell "not loaded" from "no children".
   */
  childrenOf(id: NodeId): CatalogNode[] {
    const children = this.node(id).children;
    return children ? children.map((child) => this.node(child)) : [];
  }

  /**
   * Whether a node's children are present.
   */
  isLoaded(id: NodeId): boolean {
    return this.node(id).children !== undefined;
  }

  /**
   * Finds a loaded node by its label path, e.g. `find('AwsDataCatalog', 'sales', 'orders')`.
   */
  find(...path: string[]): CatalogNode | undefined {
    let candidates = this.roots().map((root) => root.id);
    let found: CatalogNode | undefined;
    for (const label of path) {
      found = candidates.map((id) => this.node(id)).find((node) => node.label === label);
      if (!found) {
        return undefined;
      }
      candidates = [...(found.children ?? [])];
    }
    return found;
  }

  /**
   * Schemas whose tables are loaded.
   */
  loadedSchemas(): SchemaNode[] {
    return this.nodes.filter(
      (node): node is SchemaNode => node.kind === 'schema' && node.children !== undefined
    );
  }

  // ==========================================================================
  // Expansion
  // ==========================================================================

  /**
   * Returns the children of a node, fetching them on first use.
   *
   * @throws {QueryError} If the metadata query fails; the node stays unexpanded
   */
  async fetchChildren(id: NodeId): Promise<CatalogNode[]> {
    await this.expandMany([id]);
    return this.childrenOf(id);
  }

  /**
   * Expands a node according to its kind. Catalog and column nodes are always
   * loaded and return their children as they are.
   */
  async expand(node: CatalogNode): Promise<CatalogNode[]> {
    switch (node.kind) {
      case 'catalog':
      case 'column':
        return this.childrenOf(node.id);
      case 'schema':
      case 'table':
        return this.fetchChildren(node.id);
    }
  }

  /**
   * Expands several nodes with as few remote queries as possible: one per
   * catalog for schemas, one per catalog for tables. Loaded nodes are
   * skipped; nodes already being expanded are awaited, not fetched again.
   */
  async expandMany(ids: readonly NodeId[]): Promise<void> {
    const waits: Promise<void>[] = [];
    const schemaGroups = new Map<string, SchemaNode[]>();
    const tableGroups = new Map<string, TableNode[]>();

    for (const id of new Set(ids)) {
      const node = this.node(id);
      if (!isLazyNode(node) || node.children !== undefined) {
        continue;
      }
      const inFlight = this.pending.get(id);
      if (inFlight) {
        waits.push(inFlight);
      } else if (node.kind === 'schema') {
        pushGrouped(schemaGroups, node.catalog, node);
      } else {
        pushGrouped(tableGroups, node.catalog, node);
      }
    }

    for (const [catalog, nodes] of schemaGroups) {
      waits.push(this.track(nodes, this.loadRelations(catalog, nodes)));
    }
    for (const [catalog, nodes] of tableGroups) {
      waits.push(this.track(nodes, this.loadColumns(catalog, nodes)));
    }

    await Promise.all(waits);
  }

  private track(nodes: readonly CatalogNode[], load: Promise<NodeId[]>): Promise<void> {
    const tracked = load
      .then((expanded) => this.notify(expanded))
      .finally(() => {
        for (const node of nodes) {
          this.pending.delete(node.id);
        }
      });
    for (const node of nodes) {
      this.pending.set(node.id, tracked);
    }
    return tracked;
  }

  private async notify(expanded: NodeId[]): Promise<void> {
    if (this.onExpand && expanded.length > 0) {
      await this.onExpand(this, expanded);
    }
  }

  private async loadRelations(catalog: string, nodes: readonly SchemaNode[]): Promise<NodeId[]> {
    const relations = await this.source.fetchRelations(
      catalog,
      nodes.map((node) => node.schema)
    );

    for (const node of nodes) {
      const list: RelationInfo[] = relations.get(node.schema) ?? [];
      const tableIds = list.map((relation) =>
        this.addTable(node.id, catalog, node.schema, { name: relation.name, type: relation.type })
      );
      this.setChildren(node.id, tableIds);
    }

    this.logger.debug('Schemas expanded', { catalog, schemas: nodes.length });
    return nodes.map((node) => node.id);
  }

  private async loadColumns(catalog: string, nodes: readonly TableNode[]): Promise<NodeId[]> {
    const tables = new Map<string, string[]>();
    for (const node of nodes) {
      pushGrouped(tables, node.schema, node.table);
    }
    const columns = await this.source.fetchColumns(catalog, tables);

    for (const node of nodes) {
      const list: ColumnInfo[] = columns.get(tableKey(node.schema, node.table)) ?? [];
      const columnIds = list.map((column) =>
        this.addColumn(node.id, catalog, node.schema, node.table, column)
      );
      this.setChildren(node.id, columnIds);
    }

    this.logger.debug('Tables expanded', { catalog, tables: nodes.length });
    return nodes.map((node) => node.id);
  }

  // ==========================================================================
  // Snapshots
  // ==========================================================================

  /**
   * Connection-free projection of the tree. Unexpanded schemas and tables
   * are recorded without children. `createdAt` stays the build time, so
   * expansions do not extend the snapshot's lifetime.
   */
  toSnapshot(key: string): CatalogSnapshot {
    return {
      version: SNAPSHOT_VERSION,
      key,
      createdAt: this.createdAt,
      catalogs: this.roots().map((catalog) => ({
        name: catalog.label,
        schemas: this.childrenOf(catalog.id).map((schema) => this.schemaSnapshot(schema)),
      })),
    };
  }

  private schemaSnapshot(schema: CatalogNode): SchemaSnapshot {
    const snapshot: SchemaSnapshot = { name: schema.label };
    if (schema.children !== undefined) {
      snapshot.tables = this.childrenOf(schema.id).map((table) => this.tableSnapshot(table));
    }
    return snapshot;
  }

  private tableSnapshot(table: CatalogNode): TableSnapshot {
    const snapshot: TableSnapshot = {
      name: table.label,
      type: table.kind === 'table' ? table.relationType : 't',
    };
    if (table.children !== undefined) {
      snapshot.columns = this.childrenOf(table.id).map((column) => ({
        name: column.label,
        dataType: column.kind === 'column' ? column.dataType : '',
      }));
    }
    return snapshot;
  }
}
