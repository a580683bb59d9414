/**
 * Amazon Athena Catalog Adapter
 *
 * Query execution and catalog browsing for interactive SQL clients:
 * - Statement execution with polled completion and paged results
 * - Result cursors with type glyphs and row limits
 * - A lazy catalog tree (catalogs, schemas, tables, columns) with batched expansion
 * - Catalog snapshots persisted between runs, dropped on schema changes
 * - Keyword and function completions
 *
 * @module athena-catalog
 *
 * @example
 * ```typescript
 * import { AthenaAdapter } from 'athena-catalog';
 *
 * const connection = await new AthenaAdapter({
 *   region: 'us-east-1',
 *   s3StagingDir: 's3://query-results/athena/',
 * }).connect();
 *
 * const tree = await connection.getCatalog();
 * for (const schema of tree.childrenOf(tree.roots()[0].id)) {
 *   console.log(schema.label, (await tree.fetchChildren(schema.id)).length);
 * }
 *
 * await connection.close();
 * ```
 */

// ============================================================================
// Client Module - Main Entry Point
// ============================================================================

export { AthenaConnection, AthenaAdapter, type AthenaConnectionDeps } from './client/index.js';

// ============================================================================
// Configuration
// ============================================================================

export {
  DEFAULT_REGION,
  DEFAULT_CATALOG,
  DEFAULT_POLL_INTERVAL,
  DEFAULT_POLL_INTERVAL_MS,
  DEFAULT_LOG_LEVEL,
  DEFAULT_CATALOG_TTL_MS,
  ENVIRONMENT_VARIABLES,
  resolveConfig,
  resolveCredentials,
  parsePollInterval,
  parseCatalogTtl,
  withEnvironmentFallback,
  configFromEnvironment,
  type AthenaConfig,
  type AthenaConnectionOptions,
  type CredentialSource,
  type StaticCredentials,
  type ProfileCredentials,
  type DefaultChainCredentials,
} from './config/index.js';

// ============================================================================
// Errors
// ============================================================================

export {
  AthenaErrorCode,
  AthenaError,
  ConnectionError,
  QueryError,
  ConfigurationError,
  MissingConfigurationError,
  CONNECTION_ERROR_TITLE,
  QUERY_ERROR_TITLE,
  CATALOG_ERROR_TITLE,
  isAthenaError,
  wrapError,
} from './errors/index.js';

// ============================================================================
// Types
// ============================================================================

export * from './types/index.js';
export { shortType, SHORT_TYPES, UNKNOWN_TYPE_GLYPH } from './types/short-type.js';

// ============================================================================
// Results
// ============================================================================

export { AthenaCursor } from './result/cursor.js';

// ============================================================================
// Catalog
// ============================================================================

export {
  CatalogTree,
  CATALOG_GLYPH,
  SCHEMA_GLYPH,
  type CatalogFilters,
  type CatalogTreeOptions,
} from './metadata/catalog-tree.js';
export {
  CatalogDiscovery,
  quoteIdentifier,
  quoteLiteral,
  qualify,
  type MetadataSource,
} from './metadata/discovery.js';
export { CatalogCache, isSchemaMutation, type CatalogCacheOptions } from './cache/catalog-cache.js';
export { CacheStore, cacheKey, resolveCacheDir, type CacheStoreOptions } from './cache/store.js';

// ============================================================================
// Completions
// ============================================================================

export { loadCompletions } from './completions/index.js';

// ============================================================================
// Driver
// ============================================================================

export type { RemoteDriver, RemoteConnection, RemoteCursor, RemoteConnectParams } from './driver/types.js';
export { athenaDriver, createAthenaDriver, type AthenaApi } from './driver/athena.js';

// ============================================================================
// Observability
// ============================================================================

export { ConsoleLogger, NoopLogger, type Logger, type LogLevel, type LogContext } from './observability/logging.js';
