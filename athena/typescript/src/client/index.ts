/**
 * Athena Client Module
 *
 * Connection facade used by the host SQL client: statement execution,
 * the lazy catalog tree and editor completions.
 * @module athena-catalog/client
 */

import { CatalogCache, isSchemaMutation } from '../cache/catalog-cache.js';
import { CacheStore, cacheKey, resolveCacheDir } from '../cache/store.js';
import { loadCompletions } from '../completions/index.js';
import {
  resolveConfig,
  withEnvironmentFallback,
  type AthenaConfig,
  type AthenaConnectionOptions,
} from '../config/index.js';
import { athenaDriver } from '../driver/athena.js';
import type { RemoteConnection, RemoteDriver } from '../driver/types.js';
import {
  AthenaErrorCode,
  ConnectionError,
  errorMessage,
  isAthenaError,
  toQueryError,
} from '../errors/index.js';
import type { CatalogTree } from '../metadata/catalog-tree.js';
import { CatalogDiscovery } from '../metadata/discovery.js';
import { ConsoleLogger, type Logger } from '../observability/logging.js';
import { AthenaCursor } from '../result/cursor.js';
import type { Completion } from '../types/index.js';

// ============================================================================
// Connection Dependencies
// ============================================================================

/**
 * Collaborators a connection can be given instead of the defaults.
 */
export interface AthenaConnectionDeps {
  /** Remote engine driver (default: the Athena SDK driver) */
  driver?: RemoteDriver;
  /** Logger (default: console logger at the configured level) */
  logger?: Logger;
  /** Environment for cache directory resolution (default: process.env) */
  env?: NodeJS.ProcessEnv;
}

// ============================================================================
// Athena Connection
// ============================================================================

/**
 * Open connection to Athena.
 *
 * @example
 * ```typescript
 * const connection = await AthenaConnection.open({
 *   region: 'eu-west-1',
 *   s3StagingDir: 's3://query-results/athena/',
 * });
 *
 * const cursor = await connection.execute('SELECT 1 AS a');
 * cursor.columns(); // [{ name: 'a', type: '#' }]
 * await cursor.fetchAll(); // [[1]]
 *
 * const tree = await connection.getCatalog();
 * await connection.close();
 * ```
 */
export class AthenaConnection {
  readonly config: AthenaConfig;
  private readonly remote: RemoteConnection;
  private readonly cache: CatalogCache;
  private readonly logger: Logger;
  private closed = false;

  private constructor(
    config: AthenaConfig,
    remote: RemoteConnection,
    cache: CatalogCache,
    logger: Logger
  ) {
    this.config = config;
    this.remote = remote;
    this.cache = cache;
    this.logger = logger;
  }

  /**
   * Validates the options and opens the remote handle.
   *
   * @throws {ConnectionError} If the options are invalid (before any remote
   *   call) or the remote handle cannot be opened
   */
  static async open(
    options: AthenaConnectionOptions,
    deps: AthenaConnectionDeps = {}
  ): Promise<AthenaConnection> {
    let config: AthenaConfig;
    try {
      config = resolveConfig(options);
    } catch (error) {
      const cause = error instanceof Error ? error : undefined;
      const code = isAthenaError(error) ? error.code : AthenaErrorCode.INVALID_CONFIG;
      throw new ConnectionError(errorMessage(error), cause, code);
    }

    const logger = deps.logger ?? new ConsoleLogger(config.logLevel);
    const driver = deps.driver ?? athenaDriver;

    let remote: RemoteConnection;
    try {
      remote = await driver.connect({
        region: config.region,
        stagingLocation: config.stagingLocation,
        workGroup: config.workGroup,
        schema: config.schemaFilter,
        catalog: config.catalogFilter,
        pollIntervalMs: config.pollIntervalMs,
        credentials: config.credentials,
      });
    } catch (error) {
      throw new ConnectionError(errorMessage(error), error instanceof Error ? error : undefined);
    }

    const key = cacheKey({
      catalog: config.catalogFilter,
      region: config.region,
      workGroup: config.workGroup,
      schema: config.schemaFilter,
    });
    const cacheDir = config.persistCatalog
      ? await resolveCacheDir(config.cacheDir, deps.env)
      : undefined;
    const store = cacheDir
      ? new CacheStore(cacheDir, key, logger, { ttlMs: config.catalogTtlMs })
      : undefined;

    const cache = new CatalogCache({
      source: new CatalogDiscovery(() => remote.cursor(), logger),
      filters: { catalogFilter: config.catalogFilter, schemaFilter: config.schemaFilter },
      store,
      logger,
    });

    logger.debug('Athena connection opened', {
      driver: driver.name,
      region: config.region,
      workGroup: config.workGroup,
      cacheFile: store?.file,
    });
    return new AthenaConnection(config, remote, cache, logger);
  }

  /**
   * Runs a statement and returns its cursor. Statements that change the
   * catalog drop the cached catalog.
   *
   * @throws {QueryError} With the engine's message if the statement fails
   */
  async execute(sql: string): Promise<AthenaCursor> {
    this.ensureOpen();
    const cursor = this.remote.cursor();
    this.logger.debug('Submitting statement', { length: sql.length });

    try {
      await cursor.execute(sql);
    } catch (error) {
      this.logger.debug('Statement failed', { errorMessage: errorMessage(error) });
      try {
        await cursor.close();
      } catch (closeError) {
        this.logger.debug('Cursor close failed', { errorMessage: errorMessage(closeError) });
      }
      throw toQueryError(error);
    }

    if (isSchemaMutation(sql)) {
      this.logger.debug('Schema-changing statement, invalidating catalog');
      await this.cache.invalidate();
    }
    return new AthenaCursor(cursor);
  }

  /**
   * Returns the catalog tree, building it on first use.
   *
   * @throws {QueryError} If the metadata queries fail
   */
  async getCatalog(): Promise<CatalogTree> {
    this.ensureOpen();
    return this.cache.getCatalog();
  }

  /**
   * Drops the cached catalog, in memory and on disk.
   */
  async invalidateCatalog(): Promise<void> {
    await this.cache.invalidate();
  }

  getCompletions(): readonly Completion[] {
    return loadCompletions();
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /**
   * Closes the remote handle. Safe to call more than once.
   */
  async close(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;
    await this.remote.close();
    this.logger.debug('Athena connection closed');
  }

  private ensureOpen(): void {
    if (this.closed) {
      throw new ConnectionError('Connection is closed', undefined, AthenaErrorCode.CONNECTION_CLOSED);
    }
  }
}

// ============================================================================
// Adapter
// ============================================================================

/**
 * Entry point for the host application: holds the options and opens
 * connections. Options left unset are read from `ATHENA_*` variables.
 *
 * @example
 * ```typescript
 * const adapter = new AthenaAdapter({ region: 'us-east-1', schema: 'sales' });
 * const connection = await adapter.connect();
 * ```
 */
export class AthenaAdapter {
  readonly options: AthenaConnectionOptions;
  private readonly deps: AthenaConnectionDeps;

  constructor(options: AthenaConnectionOptions = {}, deps: AthenaConnectionDeps = {}) {
    this.options = withEnvironmentFallback(options, deps.env);
    this.deps = deps;
  }

  connect(): Promise<AthenaConnection> {
    return AthenaConnection.open(this.options, this.deps);
  }
}
