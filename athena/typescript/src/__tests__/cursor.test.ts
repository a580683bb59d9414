/**
 * Tests for the result cursor.
 */

import { beforeEach, describe, it, expect } from 'vitest';
import type { RemoteConnection } from '../driver/types.js';
import { AthenaErrorCode, QueryError } from '../errors/index.js';
import { AthenaCursor } from '../result/cursor.js';
import { MockAthenaDriver } from '../testing/mock-driver.js';

const params = {
  region: 'us-east-1',
  stagingLocation: 's3://test-bucket/results/',
  catalog: 'AwsDataCatalog',
  pollIntervalMs: 1,
  credentials: { type: 'default' as const },
};

describe('AthenaCursor', () => {
  let driver: MockAthenaDriver;
  let remote: RemoteConnection;

  async function run(sql: string): Promise<AthenaCursor> {
    const cursor = remote.cursor();
    await cursor.execute(sql);
    return new AthenaCursor(cursor);
  }

  beforeEach(async () => {
    driver = new MockAthenaDriver();
    remote = await driver.connect(params);
  });

  it('should describe columns with type glyphs', async () => {
    const cursor = await run('SELECT 1 AS a');

    expect(cursor.columns()).toEqual([{ name: 'a', type: '#' }]);
    expect(cursor.rawColumns()).toEqual([{ name: 'a', typeName: 'integer' }]);
    expect(await cursor.fetchAll()).toEqual([[1]]);
  });

  it('should keep duplicate column names positionally', async () => {
    const cursor = await run('SELECT 1 AS a, 2 AS a, 3 AS a');

    expect(cursor.columns().map((column) => column.name)).toEqual(['a', 'a', 'a']);
    expect(await cursor.fetchAll()).toEqual([[1, 2, 3]]);
  });

  it('should return no columns for statements without a result set', async () => {
    const cursor = await run('CREATE TABLE sales.returns (id int)');

    expect(cursor.columns()).toEqual([]);
    expect(await cursor.fetchAll()).toEqual([]);
  });

  it('should honor the row limit', async () => {
    const cursor = await run('SELECT 1 AS a UNION ALL SELECT 2 UNION ALL SELECT 3');

    const rows = await cursor.setLimit(2).fetchAll();

    expect(rows).toEqual([[1], [2]]);
  });

  it('should return every row without a limit', async () => {
    const cursor = await run('SELECT 1 AS a UNION ALL SELECT 2 UNION ALL SELECT 3');

    expect(await cursor.fetchAll()).toHaveLength(3);
  });

  it('should reject invalid limits', async () => {
    const cursor = await run('SELECT 1 AS a');

    expect(() => cursor.setLimit(-1)).toThrow(QueryError);
    expect(() => cursor.setLimit(1.5)).toThrow('Invalid row limit: 1.5');
  });

  it('should close the remote cursor after fetching', async () => {
    const cursor = await run('SELECT 1 AS a');

    await cursor.fetchAll();
    await cursor.close();

    expect(driver.closedCursors).toBe(1);
    expect(cursor.isConsumed).toBe(true);
  });

  it('should keep the columns after the remote cursor is closed', async () => {
    const cursor = await run('SELECT 7 AS lucky');

    await cursor.fetchAll();

    expect(cursor.columns()).toEqual([{ name: 'lucky', type: '#' }]);
  });

  it('should be consumed by the first fetch', async () => {
    const cursor = await run('SELECT 1 AS a');
    await cursor.fetchAll();

    await expect(cursor.fetchAll()).rejects.toMatchObject({ code: AthenaErrorCode.CURSOR_CONSUMED });
    expect(() => cursor.setLimit(1)).toThrow(QueryError);
  });

  it('should wrap fetch failures and still close the remote cursor', async () => {
    driver.on('FROM flaky', {
      columns: [{ name: 'id', typeName: 'bigint' }],
      rows: [],
      fetchError: 'Unable to read query results from S3',
    });
    const cursor = await run('SELECT id FROM flaky');

    await expect(cursor.fetchAll()).rejects.toThrow(QueryError);
    expect(driver.closedCursors).toBe(1);
    expect(cursor.columns()).toEqual([{ name: 'id', type: '##' }]);
  });

  it('should carry the engine message on fetch failures', async () => {
    driver.on('FROM flaky', {
      columns: [{ name: 'id', typeName: 'bigint' }],
      rows: [],
      fetchError: 'Unable to read query results from S3',
    });
    const cursor = await run('SELECT id FROM flaky');

    await expect(cursor.fetchAll()).rejects.toThrow('Unable to read query results from S3');
  });
});
