/**
 * Remote engine contract
 *
 * The adapter talks to the query engine only through these interfaces. The
 * Athena SDK driver implements them for production; the in-process mock
 * implements them for tests.
 *
 * @module athena-catalog/driver/types
 */

import type { CredentialSource } from '../config/index.js';
import type { ColumnDescription, Row } from '../types/index.js';

/**
 * Parameters for opening a remote connection.
 */
export interface RemoteConnectParams {
  region: string;
  stagingLocation: string;
  workGroup?: string;
  /** Default database for unqualified names */
  schema?: string;
  /** Default data catalog for unqualified names */
  catalog: string;
  pollIntervalMs: number;
  credentials: CredentialSource;
}

/**
 * One statement's worth of server-side state.
 */
export interface RemoteCursor {
  /**
   * Column metadata of the current result, or `null` when the statement has
   * not run yet or produced no result set.
   */
  readonly description: readonly ColumnDescription[] | null;

  /** Submits a statement and resolves once it reached a terminal state. */
  execute(sql: string): Promise<void>;

  /** Returns every remaining row. */
  fetchAll(): Promise<Row[]>;

  /** Returns at most `size` of the remaining rows. */
  fetchMany(size: number): Promise<Row[]>;

  /** Releases the cursor. Safe to call more than once. */
  close(): Promise<void>;
}

/**
 * An open handle to the engine.
 */
export interface RemoteConnection {
  cursor(): RemoteCursor;
  close(): Promise<void>;
}

/**
 * Factory for remote connections.
 */
export interface RemoteDriver {
  readonly name: string;
  connect(params: RemoteConnectParams): Promise<RemoteConnection>;
}
