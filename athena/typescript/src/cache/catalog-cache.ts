/**
 * In-memory catalog cache with optional snapshot persistence.
 *
 * @module athena-catalog/cache/catalog-cache
 */

import { CatalogTree, type CatalogFilters } from '../metadata/catalog-tree.js';
import type { MetadataSource } from '../metadata/discovery.js';
import { NoopLogger, type Logger } from '../observability/logging.js';
import type { CacheStore } from './store.js';

/**
 * Statement prefixes that change the catalog.
 */
export const SCHEMA_MUTATION_PREFIXES = ['CREATE', 'DROP', 'ALTER', 'TRUNCATE', 'RENAME'] as const;

/**
 * Whether a statement may change the catalog.
 */
export function isSchemaMutation(sql: string): boolean {
  const statement = sql.trim().toUpperCase();
  return SCHEMA_MUTATION_PREFIXES.some((prefix) => statement.startsWith(prefix));
}

export interface CatalogCacheOptions {
  source: MetadataSource;
  filters?: CatalogFilters;
  /** Snapshot store; no persistence without one */
  store?: CacheStore;
  logger?: Logger;
}

/**
 * Owns the catalog tree of one connection.
 *
 * The tree is served from memory, else restored from the snapshot store,
 * else built remotely. Snapshots are written after every build and every
 * expansion, so a restored tree keeps the nodes the user already opened.
 */
export class CatalogCache {
  private readonly source: MetadataSource;
  private readonly filters: CatalogFilters;
  private readonly store?: CacheStore;
  private readonly logger: Logger;
  private tree?: CatalogTree;
  private building?: Promise<CatalogTree>;
  private generation = 0;

  constructor(options: CatalogCacheOptions) {
    this.source = options.source;
    this.filters = options.filters ?? {};
    this.store = options.store;
    this.logger = options.logger ?? new NoopLogger();
  }

  /**
   * Whether a tree is held in memory.
   */
  get isLoaded(): boolean {
    return this.tree !== undefined;
  }

  /**
   * Returns the catalog tree. Concurrent calls during a build share it.
   *
   * @throws {QueryError} If the tree has to be built and a metadata query fails
   */
  async getCatalog(): Promise<CatalogTree> {
    if (this.tree) {
      this.logger.debug('Catalog cache hit', { source: 'memory' });
      return this.tree;
    }
    if (!this.building) {
      const building = this.load(this.generation).finally(() => {
        if (this.building === building) {
          this.building = undefined;
        }
      });
      this.building = building;
    }
    return this.building;
  }

  /**
   * Drops the in-memory tree and the persisted snapshot.
   */
  async invalidate(): Promise<void> {
    this.generation += 1;
    this.tree = undefined;
    this.building = undefined;
    this.logger.debug('Catalog cache invalidated');
    await this.store?.delete();
  }

  private async load(generation: number): Promise<CatalogTree> {
    const options = {
      logger: this.logger,
      onExpand: (tree: CatalogTree) => this.persist(tree),
    };

    const snapshot = await this.store?.load();
    let tree: CatalogTree;
    if (snapshot) {
      this.logger.debug('Catalog cache hit', { source: 'snapshot' });
      tree = CatalogTree.fromSnapshot(snapshot, this.source, options);
    } else {
      this.logger.debug('Catalog cache miss');
      tree = await CatalogTree.build(this.source, this.filters, options);
    }

    if (generation === this.generation) {
      this.tree = tree;
      if (!snapshot) {
        await this.persist(tree);
      }
    }
    return tree;
  }

  private async persist(tree: CatalogTree): Promise<void> {
    // Expansions of a tree dropped by invalidate() are not written back
    if (!this.store || tree !== this.tree) {
      return;
    }
    await this.store.save(tree.toSnapshot(this.store.key));
  }
}
