/**
 * Athena Metadata Discovery
 *
 * Metadata queries behind the catalog tree. Table and column lookups take
 * several sibling keys at once so one round trip can populate many nodes.
 *
 * @module athena-catalog/metadata/discovery
 */

import { DEFAULT_CATALOG } from '../config/index.js';
import type { RemoteCursor } from '../driver/types.js';
import { AthenaErrorCode, CATALOG_ERROR_TITLE, QueryError, errorMessage } from '../errors/index.js';
import type { Logger } from '../observability/logging.js';
import type { ColumnInfo, RelationInfo, RelationType, Row, Value } from '../types/index.js';

/**
 * Schema that holds the engine's own metadata views.
 */
export const INFORMATION_SCHEMA = 'information_schema';

// ============================================================================
// Quoting
// ============================================================================

/**
 * Double-quotes one identifier segment.
 */
export function quoteIdentifier(name: string): string {
  return `"${name.replace(/"/g, '""')}"`;
}

/**
 * Builds a qualified identifier, quoting every segment:
 * `qualify('c', 's', 't')` is `"c"."s"."t"`.
 */
export function qualify(...segments: string[]): string {
  return segments.map(quoteIdentifier).join('.');
}

/**
 * Single-quotes a string literal.
 */
export function quoteLiteral(value: string): string {
  return `'${value.replace(/'/g, "''")}'`;
}

/**
 * Map key for a (schema, table) pair.
 */
export function tableKey(schema: string, table: string): string {
  return JSON.stringify([schema, table]);
}

// ============================================================================
// Query Builders
// ============================================================================

export const LIST_SCHEMAS_SQL = 'SHOW DATABASES';

/**
 * Lists the relations of several schemas, classifying each as table or view.
 */
export function buildRelationsQuery(catalog: string, schemas: readonly string[]): string {
  const schemaList = schemas.map(quoteLiteral).join(', ');
  return `
    SELECT
      table_schema,
      table_name,
      CASE
        WHEN table_type LIKE '%TABLE' THEN 't'
        ELSE 'v'
      END AS table_type
    FROM ${quoteIdentifier(catalog)}.information_schema.tables
    WHERE table_schema IN (${schemaList})
  `;
}

/**
 * Lists the columns of several tables in their natural order.
 */
export function buildColumnsQuery(
  catalog: string,
  tables: ReadonlyMap<string, readonly string[]>
): string {
  const conditions: string[] = [];
  for (const [schema, names] of tables) {
    for (const name of names) {
      conditions.push(
        `(table_schema = ${quoteLiteral(schema)} AND table_name = ${quoteLiteral(name)})`
      );
    }
  }
  return `
    SELECT
      table_schema,
      table_name,
      column_name,
      data_type
    FROM ${quoteIdentifier(catalog)}.information_schema.columns
    WHERE ${conditions.join(' OR ')}
    ORDER BY table_schema, table_name, ordinal_position
  `;
}

// ============================================================================
// Metadata Source
// ============================================================================

/**
 * Fetch capability the catalog tree depends on.
 */
export interface MetadataSource {
  /** Catalog names visible to the connection. */
  listCatalogs(): Promise<string[]>;

  /** Schema names of one catalog, without the information schema. */
  listSchemas(catalog: string): Promise<string[]>;

  /**
   * Relations of several schemas in one round trip, keyed by schema. Schemas
   * without relations are present with an empty list.
   */
  fetchRelations(catalog: string, schemas: readonly string[]): Promise<Map<string, RelationInfo[]>>;

  /**
   * Columns of several tables in one round trip, keyed by {@link tableKey}.
   * Tables without columns are present with an empty list.
   */
  fetchColumns(
    catalog: string,
    tables: ReadonlyMap<string, readonly string[]>
  ): Promise<Map<string, ColumnInfo[]>>;
}

function text(value: Value | undefined): string {
  return value === null || value === undefined ? '' : String(value);
}

function relationType(value: Value | undefined): RelationType {
  return text(value) === 't' ? 't' : 'v';
}

/**
 * Metadata source that runs SQL through remote cursors.
 *
 * @example
 * ```typescript
 * const discovery = new CatalogDiscovery(() => remote.cursor(), logger);
 * const schemas = await discovery.listSchemas('AwsDataCatalog');
 * const relations = await discovery.fetchRelations('AwsDataCatalog', schemas);
 * ```
 */
export class CatalogDiscovery implements MetadataSource {
  private readonly openCursor: () => RemoteCursor;
  private readonly logger: Logger;

  /**
   * @param openCursor - Opens a fresh remote cursor for each metadata query
   */
  constructor(openCursor: () => RemoteCursor, logger: Logger) {
    this.openCursor = openCursor;
    this.logger = logger;
  }

  /**
   * Athena has no statement to enumerate data catalogs, so only the default
   * catalog is listed. Other catalogs are reached through the catalog option.
   */
  async listCatalogs(): Promise<string[]> {
    return [DEFAULT_CATALOG];
  }

  /**
   * Lists schemas with SHOW DATABASES. The statement ignores the catalog
   * argument; the catalog comes from the connection's execution context.
   */
  async listSchemas(catalog: string): Promise<string[]> {
    const rows = await this.run(LIST_SCHEMAS_SQL, 'listSchemas', { catalog });
    return rows.map((row) => text(row[0])).filter((name) => name !== INFORMATION_SCHEMA);
  }

  async fetchRelations(
    catalog: string,
    schemas: readonly string[]
  ): Promise<Map<string, RelationInfo[]>> {
    const relations = new Map<string, RelationInfo[]>();
    if (schemas.length === 0) {
      return relations;
    }
    for (const schema of schemas) {
      relations.set(schema, []);
    }

    const rows = await this.run(buildRelationsQuery(catalog, schemas), 'fetchRelations', {
      catalog,
      schemas: schemas.length,
    });
    for (const row of rows) {
      const schema = text(row[0]);
      const list = relations.get(schema) ?? [];
      list.push({ name: text(row[1]), type: relationType(row[2]) });
      relations.set(schema, list);
    }
    return relations;
  }

  async fetchColumns(
    catalog: string,
    tables: ReadonlyMap<string, readonly string[]>
  ): Promise<Map<string, ColumnInfo[]>> {
    const columns = new Map<string, ColumnInfo[]>();
    for (const [schema, names] of tables) {
      for (const name of names) {
        columns.set(tableKey(schema, name), []);
      }
    }
    if (columns.size === 0) {
      return columns;
    }

    const rows = await this.run(buildColumnsQuery(catalog, tables), 'fetchColumns', {
      catalog,
      tables: columns.size,
    });
    for (const row of rows) {
      const key = tableKey(text(row[0]), text(row[1]));
      const list = columns.get(key) ?? [];
      list.push({ name: text(row[2]), dataType: text(row[3]) });
      columns.set(key, list);
    }
    return columns;
  }

  /**
   * Runs one metadata query on its own cursor and always closes the cursor.
   */
  private async run(sql: string, operation: string, context: Record<string, unknown>): Promise<Row[]> {
    const cursor = this.openCursor();
    this.logger.debug('Running metadata query', { operation, ...context });

    try {
      await cursor.execute(sql);
      return await cursor.fetchAll();
    } catch (error) {
      this.logger.error('Metadata query failed', { operation, errorMessage: errorMessage(error) });
      throw new QueryError(errorMessage(error), {
        code: AthenaErrorCode.CATALOG_FAILED,
        title: CATALOG_ERROR_TITLE,
        cause: error instanceof Error ? error : undefined,
      });
    } finally {
      await cursor.close();
    }
  }
}
