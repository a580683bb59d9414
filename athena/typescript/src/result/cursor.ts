/**
 * Athena Result Cursor
 *
 * Wraps one executed remote cursor for the host application. Column metadata
 * is copied as early as possible because the remote cursor is closed once
 * its rows have been fetched.
 *
 * @module athena-catalog/result/cursor
 */

import type { RemoteCursor } from '../driver/types.js';
import { AthenaErrorCode, QueryError, toQueryError } from '../errors/index.js';
import type { ColumnDescription, ColumnSummary, Row } from '../types/index.js';
import { shortType } from '../types/short-type.js';

/**
 * Result of one executed statement, consumed once by {@link fetchAll}.
 *
 * @example
 * ```typescript
 * const cursor = await connection.execute('SELECT * FROM "sales"."orders"');
 * cursor.columns(); // [{ name: 'order_id', type: '##' }, ...]
 * const rows = await cursor.setLimit(500).fetchAll();
 * ```
 */
export class AthenaCursor {
  private readonly cursor: RemoteCursor;
  private preserved: readonly ColumnDescription[] | null = null;
  private limit: number | null = null;
  private consumed = false;
  private closed = false;

  constructor(cursor: RemoteCursor) {
    this.cursor = cursor;
    this.preserve();
  }

  /**
   * Column names and type glyphs, in result order. Empty when the statement
   * produced no result set.
   */
  columns(): ColumnSummary[] {
    return this.rawColumns().map((column) => ({
      name: column.name,
      type: shortType(column.typeName),
    }));
  }

  /**
   * Column names and engine type names, in result order.
   */
  rawColumns(): ColumnDescription[] {
    const description = this.preserved ?? (this.closed ? null : this.cursor.description);
    return description ? description.map((column) => ({ ...column })) : [];
  }

  /**
   * Caps the number of rows the fetch returns.
   *
   * @throws {QueryError} If the limit is not a non-negative integer or the rows were already fetched
   */
  setLimit(limit: number): this {
    if (this.consumed) {
      throw new QueryError('The limit must be set before the rows are fetched', {
        code: AthenaErrorCode.CURSOR_CONSUMED,
      });
    }
    if (!Number.isInteger(limit) || limit < 0) {
      throw new QueryError(`Invalid row limit: ${limit}`);
    }
    this.limit = limit;
    return this;
  }

  /**
   * Fetches the rows, honoring the limit, and releases the remote cursor.
   *
   * @throws {QueryError} If fetching fails or the cursor was already consumed
   */
  async fetchAll(): Promise<Row[]> {
    if (this.consumed) {
      throw new QueryError('The result of this cursor was already fetched', {
        code: AthenaErrorCode.CURSOR_CONSUMED,
      });
    }
    this.consumed = true;

    try {
      this.preserve();
      const rows =
        this.limit === null ? await this.cursor.fetchAll() : await this.cursor.fetchMany(this.limit);
      this.preserve();
      return rows;
    } catch (error) {
      throw toQueryError(error);
    } finally {
      await this.close();
    }
  }

  /**
   * Releases the remote cursor without fetching. Safe to call more than once.
   */
  async close(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;
    try {
      await this.cursor.close();
    } catch (error) {
      throw toQueryError(error);
    }
  }

  /**
   * Whether the rows were fetched already.
   */
  get isConsumed(): boolean {
    return this.consumed;
  }

  private preserve(): void {
    const description = this.cursor.description;
    if (description !== null) {
      this.preserved = description.map((column) => ({ ...column }));
    }
  }
}
