/**
 * Tests for the lazy catalog tree.
 */

import { beforeEach, describe, it, expect } from 'vitest';
import type { RemoteConnection } from '../driver/types.js';
import { catalogSnapshotSchema } from '../cache/store.js';
import { AthenaError, AthenaErrorCode, QueryError } from '../errors/index.js';
import { CatalogTree } from '../metadata/catalog-tree.js';
import { CatalogDiscovery } from '../metadata/discovery.js';
import { NoopLogger } from '../observability/logging.js';
import { MockAthenaDriver } from '../testing/mock-driver.js';
import type { CatalogNode, NodeId } from '../types/index.js';

function schemaFixtures() {
  return {
    sales: [
      {
        name: 'orders',
        columns: [
          { name: 'id', dataType: 'bigint' },
          { name: 'total', dataType: 'decimal(10,2)' },
          { name: 'placed_at', dataType: 'timestamp' },
        ],
      },
      { name: 'recent_orders', type: 'v' as const, columns: [{ name: 'id', dataType: 'bigint' }] },
    ],
    hr: [{ name: 'people', columns: [{ name: 'name', dataType: 'varchar' }] }],
  };
}

function labels(nodes: readonly CatalogNode[]): string[] {
  return nodes.map((node) => node.label);
}

describe('CatalogTree', () => {
  let driver: MockAthenaDriver;
  let discovery: CatalogDiscovery;

  function find(tree: CatalogTree, ...path: string[]): CatalogNode {
    const node = tree.find(...path);
    if (!node) {
      throw new Error(`no node at ${path.join('/')}`);
    }
    return node;
  }

  beforeEach(async () => {
    driver = new MockAthenaDriver({ schemas: schemaFixtures() });
    const remote: RemoteConnection = await driver.connect({
      region: 'us-east-1',
      stagingLocation: 's3://test-bucket/results/',
      catalog: 'AwsDataCatalog',
      pollIntervalMs: 1,
      credentials: { type: 'default' },
    });
    discovery = new CatalogDiscovery(() => remote.cursor(), new NoopLogger());
  });

  describe('build', () => {
    it('should build the catalog and schema levels', async () => {
      const tree = await CatalogTree.build(discovery);

      const [catalog] = tree.roots();
      expect(catalog?.label).toBe('AwsDataCatalog');
      expect(catalog?.typeLabel).toBe('c');
      expect(catalog?.qualifiedIdentifier).toBe('"AwsDataCatalog"');
      expect(labels(tree.childrenOf(catalog?.id ?? -1))).toEqual(['hr', 'sales']);
      expect(driver.statements).toEqual(['SHOW DATABASES']);
    });

    it('should leave schemas unexpanded', async () => {
      const tree = await CatalogTree.build(discovery);
      const sales = find(tree, 'AwsDataCatalog', 'sales');

      expect(sales.kind).toBe('schema');
      expect(sales.typeLabel).toBe('s');
      expect(sales.qualifiedIdentifier).toBe('"AwsDataCatalog"."sales"');
      expect(sales.queryName).toBe('"AwsDataCatalog"."sales"');
      expect(sales.children).toBeUndefined();
      expect(tree.isLoaded(sales.id)).toBe(false);
      expect(tree.parentOf(sales.id)?.label).toBe('AwsDataCatalog');
    });

    it('should use the filters instead of listing', async () => {
      const tree = await CatalogTree.build(discovery, {
        catalogFilter: 'analytics',
        schemaFilter: 'sales',
      });

      expect(labels(tree.roots())).toEqual(['analytics']);
      expect(find(tree, 'analytics', 'sales').qualifiedIdentifier).toBe('"analytics"."sales"');
      expect(driver.statements).toEqual([]);
    });

    it('should propagate listing failures', async () => {
      driver.on('SHOW DATABASES', { error: 'AccessDeniedException' });

      await expect(CatalogTree.build(discovery)).rejects.toBeInstanceOf(QueryError);
    });
  });

  describe('expansion', () => {
    let tree: CatalogTree;

    beforeEach(async () => {
      tree = await CatalogTree.build(discovery);
      driver.statements.length = 0;
    });

    it('should load tables of a schema on first use', async () => {
      const sales = find(tree, 'AwsDataCatalog', 'sales');

      const tables = await tree.fetchChildren(sales.id);

      expect(labels(tables)).toEqual(['orders', 'recent_orders']);
      expect(tables.map((table) => table.typeLabel)).toEqual(['t', 'v']);
      expect(tables[0]?.qualifiedIdentifier).toBe('"AwsDataCatalog"."sales"."orders"');
      expect(tables[0]?.queryName).toBe('"AwsDataCatalog"."sales"."orders"');
      expect(driver.count('information_schema.tables')).toBe(1);
    });

    it('should load columns of a table on first use', async () => {
      const sales = find(tree, 'AwsDataCatalog', 'sales');
      await tree.fetchChildren(sales.id);
      const orders = find(tree, 'AwsDataCatalog', 'sales', 'orders');

      const columns = await tree.fetchChildren(orders.id);

      expect(labels(columns)).toEqual(['id', 'total', 'placed_at']);
      expect(columns.map((column) => column.typeLabel)).toEqual(['##', '#.#', 'ts']);
      expect(columns[1]?.qualifiedIdentifier).toBe('"AwsDataCatalog"."sales"."orders"."total"');
      expect(columns[1]?.queryName).toBe('"total"');
      expect(columns[1]?.children).toEqual([]);
      expect(driver.count('information_schema.columns')).toBe(1);
    });

    it('should not query again for an expanded node', async () => {
      const sales = find(tree, 'AwsDataCatalog', 'sales');
      const first = await tree.fetchChildren(sales.id);
      const statements = driver.statements.length;

      const second = await tree.fetchChildren(sales.id);

      expect(driver.statements.length).toBe(statements);
      expect(second).toEqual(first);
    });

    it('should share one query between concurrent expansions', async () => {
      const sales = find(tree, 'AwsDataCatalog', 'sales');

      const [first, second] = await Promise.all([
        tree.fetchChildren(sales.id),
        tree.fetchChildren(sales.id),
      ]);

      expect(driver.count('information_schema.tables')).toBe(1);
      expect(labels(first)).toEqual(labels(second));
      expect(tree.size).toBe(1 + 2 + 2);
    });

    it('should batch sibling schemas into one query', async () => {
      const ids = tree.childrenOf(tree.roots()[0]?.id ?? -1).map((node) => node.id);

      await tree.expandMany(ids);

      expect(driver.count('information_schema.tables')).toBe(1);
      expect(labels(tree.childrenOf(find(tree, 'AwsDataCatalog', 'hr').id))).toEqual(['people']);
      expect(tree.loadedSchemas().map((schema) => schema.schema)).toEqual(['hr', 'sales']);
    });

    it('should batch tables across schemas into one query', async () => {
      const schemaIds = tree.childrenOf(tree.roots()[0]?.id ?? -1).map((node) => node.id);
      await tree.expandMany(schemaIds);
      const tableIds: NodeId[] = schemaIds.flatMap((id) => tree.childrenOf(id).map((node) => node.id));

      await tree.expandMany(tableIds);

      expect(driver.count('information_schema.columns')).toBe(1);
      expect(labels(tree.childrenOf(find(tree, 'AwsDataCatalog', 'hr', 'people').id))).toEqual([
        'name',
      ]);
      expect(labels(tree.childrenOf(find(tree, 'AwsDataCatalog', 'sales', 'recent_orders').id))).toEqual([
        'id',
      ]);
    });

    it('should skip loaded nodes in a batch', async () => {
      const sales = find(tree, 'AwsDataCatalog', 'sales');
      const hr = find(tree, 'AwsDataCatalog', 'hr');
      await tree.fetchChildren(sales.id);

      await tree.expandMany([sales.id, hr.id]);

      const relationQueries = driver.statements.filter((sql) => sql.includes('information_schema.tables'));
      expect(relationQueries).toHaveLength(2);
      expect(relationQueries[1]).toContain("IN ('hr')");
    });

    it('should dispatch expansion by node kind', async () => {
      const catalog = tree.roots()[0];
      if (!catalog) {
        throw new Error('no catalog');
      }
      expect(labels(await tree.expand(catalog))).toEqual(['hr', 'sales']);
      expect(driver.statements).toEqual([]);

      const tables = await tree.expand(find(tree, 'AwsDataCatalog', 'hr'));
      const columns = await tree.expand(tables[0] ?? catalog);
      const [column] = columns;
      expect(column?.kind).toBe('column');
      expect(await tree.expand(column ?? catalog)).toEqual([]);
    });

    it('should leave a node unexpanded when the query fails', async () => {
      const sales = find(tree, 'AwsDataCatalog', 'sales');
      driver.on('information_schema.tables', { error: 'ThrottlingException: Rate exceeded' });

      await expect(tree.fetchChildren(sales.id)).rejects.toThrow('ThrottlingException: Rate exceeded');
      expect(tree.isLoaded(sales.id)).toBe(false);

      driver.clearScripts();
      expect(labels(await tree.fetchChildren(sales.id))).toEqual(['orders', 'recent_orders']);
    });

    it('should reject unknown node ids', () => {
      expect(() => tree.node(999)).toThrow(AthenaError);
      try {
        tree.node(999);
      } catch (error) {
        expect(error).toMatchObject({ code: AthenaErrorCode.UNKNOWN_NODE });
      }
    });
  });

  describe('listeners', () => {
    it('should report expanded node ids', async () => {
      const expanded: NodeId[][] = [];
      const tree = await CatalogTree.build(
        discovery,
        {},
        {
          onExpand: async (_tree, ids) => {
            expanded.push([...ids]);
          },
        }
      );
      const sales = find(tree, 'AwsDataCatalog', 'sales');

      await tree.fetchChildren(sales.id);
      await tree.fetchChildren(sales.id);

      expect(expanded).toEqual([[sales.id]]);
    });
  });

  describe('snapshots', () => {
    it('should record only what was loaded', async () => {
      const tree = await CatalogTree.build(discovery);
      const sales = find(tree, 'AwsDataCatalog', 'sales');
      await tree.fetchChildren(sales.id);
      await tree.fetchChildren(find(tree, 'AwsDataCatalog', 'sales', 'recent_orders').id);

      const snapshot = tree.toSnapshot('test-key');

      expect(snapshot.version).toBe(1);
      expect(snapshot.key).toBe('test-key');
      expect(snapshot.catalogs).toEqual([
        {
          name: 'AwsDataCatalog',
          schemas: [
            { name: 'hr' },
            {
              name: 'sales',
              tables: [
                { name: 'orders', type: 't' },
                { name: 'recent_orders', type: 'v', columns: [{ name: 'id', dataType: 'bigint' }] },
              ],
            },
          ],
        },
      ]);
    });

    it('should restore expanded nodes without querying', async () => {
      const original = await CatalogTree.build(discovery);
      await original.fetchChildren(find(original, 'AwsDataCatalog', 'sales').id);
      const snapshot = catalogSnapshotSchema.parse(
        JSON.parse(JSON.stringify(original.toSnapshot('test-key')))
      );
      driver.statements.length = 0;

      const restored = CatalogTree.fromSnapshot(snapshot, discovery);
      const sales = find(restored, 'AwsDataCatalog', 'sales');

      expect(restored.isLoaded(sales.id)).toBe(true);
      expect(labels(await restored.fetchChildren(sales.id))).toEqual(['orders', 'recent_orders']);
      expect(restored.loadedSchemas().map((schema) => schema.label)).toEqual(['sales']);
      expect(driver.statements).toEqual([]);
    });

    it('should expand restored lazy nodes remotely', async () => {
      const original = await CatalogTree.build(discovery);
      const restored = CatalogTree.fromSnapshot(original.toSnapshot('test-key'), discovery);
      driver.statements.length = 0;

      const hr = find(restored, 'AwsDataCatalog', 'hr');
      expect(restored.isLoaded(hr.id)).toBe(false);
      expect(labels(await restored.fetchChildren(hr.id))).toEqual(['people']);
      expect(driver.count('information_schema.tables')).toBe(1);
    });

    it('should keep the build time across restores and expansions', async () => {
      const original = await CatalogTree.build(discovery);
      const snapshot = { ...original.toSnapshot('test-key'), createdAt: '2024-05-01T00:00:00.000Z' };

      const restored = CatalogTree.fromSnapshot(snapshot, discovery);
      await restored.fetchChildren(find(restored, 'AwsDataCatalog', 'hr').id);

      expect(restored.createdAt).toBe('2024-05-01T00:00:00.000Z');
      expect(restored.toSnapshot('test-key').createdAt).toBe('2024-05-01T00:00:00.000Z');
    });
  });
});
