/**
 * Athena SDK driver
 *
 * Implements the remote engine contract on top of `@aws-sdk/client-athena`.
 * A statement is submitted with StartQueryExecution, polled with
 * GetQueryExecution until it reaches a terminal state, and its rows are read
 * page by page with GetQueryResults.
 *
 * @module athena-catalog/driver/athena
 */

import {
  AthenaClient,
  GetQueryExecutionCommand,
  GetQueryResultsCommand,
  StartQueryExecutionCommand,
  type AthenaClientConfig,
  type GetQueryExecutionCommandInput,
  type GetQueryExecutionCommandOutput,
  type GetQueryResultsCommandInput,
  type GetQueryResultsCommandOutput,
  type StartQueryExecutionCommandInput,
  type StartQueryExecutionCommandOutput,
  type Row as AthenaRow,
} from '@aws-sdk/client-athena';
import { fromIni } from '@aws-sdk/credential-providers';
import type { CredentialSource } from '../config/index.js';
import { AthenaErrorCode, QueryError } from '../errors/index.js';
import type { ColumnDescription, Row } from '../types/index.js';
import { isHeaderRow, toColumnDescriptions, toRow } from './parser.js';
import type { RemoteConnectParams, RemoteConnection, RemoteCursor, RemoteDriver } from './types.js';

/**
 * Maximum page size accepted by GetQueryResults.
 */
export const MAX_RESULTS_PER_PAGE = 1000;

// ============================================================================
// SDK Surface
// ============================================================================

/**
 * The three Athena calls the driver needs. Kept narrow so tests can stand in
 * for the SDK client.
 */
export interface AthenaApi {
  startQueryExecution(input: StartQueryExecutionCommandInput): Promise<StartQueryExecutionCommandOutput>;
  getQueryExecution(input: GetQueryExecutionCommandInput): Promise<GetQueryExecutionCommandOutput>;
  getQueryResults(input: GetQueryResultsCommandInput): Promise<GetQueryResultsCommandOutput>;
  destroy(): void;
}

/**
 * Builds the SDK client configuration from the connect parameters.
 */
export function toClientConfig(region: string, credentials: CredentialSource): AthenaClientConfig {
  switch (credentials.type) {
    case 'static':
      return {
        region,
        credentials: {
          accessKeyId: credentials.accessKeyId,
          secretAccessKey: credentials.secretAccessKey,
          sessionToken: credentials.sessionToken,
        },
      };
    case 'profile':
      return { region, credentials: fromIni({ profile: credentials.profileName }) };
    case 'default':
      return { region };
  }
}

/**
 * Wraps an SDK client as an {@link AthenaApi}.
 */
export function sdkApi(client: AthenaClient): AthenaApi {
  return {
    startQueryExecution: (input) => client.send(new StartQueryExecutionCommand(input)),
    getQueryExecution: (input) => client.send(new GetQueryExecutionCommand(input)),
    getQueryResults: (input) => client.send(new GetQueryResultsCommand(input)),
    destroy: () => client.destroy(),
  };
}

// ============================================================================
// Cursor
// ============================================================================

/**
 * Cursor over one Athena query execution.
 */
export class AthenaRemoteCursor implements RemoteCursor {
  private readonly api: AthenaApi;
  private readonly params: RemoteConnectParams;
  private queryExecutionId?: string;
  private columns: ColumnDescription[] | null = null;
  private buffer: Row[] = [];
  private nextToken?: string;
  private exhausted = true;
  private closed = false;

  constructor(api: AthenaApi, params: RemoteConnectParams) {
    this.api = api;
    this.params = params;
  }

  get description(): readonly ColumnDescription[] | null {
    return this.columns;
  }

  /**
   * Id of the last submitted query execution.
   */
  get executionId(): string | undefined {
    return this.queryExecutionId;
  }

  async execute(sql: string): Promise<void> {
    this.ensureOpen();
    this.columns = null;
    this.buffer = [];
    this.nextToken = undefined;
    this.exhausted = true;

    const started = await this.api.startQueryExecution({
      QueryString: sql,
      WorkGroup: this.params.workGroup,
      QueryExecutionContext: {
        Catalog: this.params.catalog,
        Database: this.params.schema,
      },
      ResultConfiguration: {
        OutputLocation: this.params.stagingLocation,
      },
    });
    const queryExecutionId = started.QueryExecutionId;
    if (!queryExecutionId) {
      throw new QueryError('Athena did not return a query execution id');
    }
    this.queryExecutionId = queryExecutionId;

    const statementType = await this.waitForCompletion(queryExecutionId);
    await this.loadFirstPage(statementType === 'DML');
  }

  async fetchAll(): Promise<Row[]> {
    this.ensureOpen();
    while (!this.exhausted) {
      await this.loadPage();
    }
    return this.buffer.splice(0);
  }

  async fetchMany(size: number): Promise<Row[]> {
    this.ensureOpen();
    while (this.buffer.length < size && !this.exhausted) {
      await this.loadPage();
    }
    return this.buffer.splice(0, Math.max(size, 0));
  }

  async close(): Promise<void> {
    this.closed = true;
    this.buffer = [];
    this.exhausted = true;
  }

  /**
   * Polls while the query is queued or running. A response without a known
   * state ends the wait with a QueryError.
   *
   * @returns The statement type reported by Athena (DDL, DML or UTILITY)
   */
  private async waitForCompletion(queryExecutionId: string): Promise<string | undefined> {
    for (;;) {
      const { QueryExecution: execution } = await this.api.getQueryExecution({
        QueryExecutionId: queryExecutionId,
      });
      const status = execution?.Status;

      switch (status?.State) {
        case 'SUCCEEDED':
          return execution?.StatementType;
        case 'FAILED':
          throw new QueryError(
            status?.StateChangeReason ?? status?.AthenaError?.ErrorMessage ?? 'Query failed',
            { queryExecutionId }
          );
        case 'CANCELLED':
          throw new QueryError(status?.StateChangeReason ?? `Query ${queryExecutionId} was cancelled`, {
            queryExecutionId,
            code: AthenaErrorCode.QUERY_CANCELLED,
          });
        case 'QUEUED':
        case 'RUNNING':
          await this.sleep(this.params.pollIntervalMs);
          break;
        default:
          throw new QueryError(`Query ${queryExecutionId} reported no known state`, {
            queryExecutionId,
          });
      }
    }
  }

  /**
   * Reads the first page, which carries the result metadata. SELECT results
   * repeat the column names as their first row.
   */
  private async loadFirstPage(skipHeader: boolean): Promise<void> {
    const page = await this.requestPage();
    this.columns = toColumnDescriptions(page.ResultSet?.ResultSetMetadata?.ColumnInfo);

    const columns = this.columns ?? [];
    let rows = page.ResultSet?.Rows ?? [];
    if (skipHeader && rows.length > 0 && isHeaderRow(rows[0], columns)) {
      rows = rows.slice(1);
    }
    this.bufferPage(rows, page.NextToken);
  }

  private async loadPage(): Promise<void> {
    const page = await this.requestPage();
    this.bufferPage(page.ResultSet?.Rows ?? [], page.NextToken);
  }

  private async requestPage(): Promise<GetQueryResultsCommandOutput> {
    return this.api.getQueryResults({
      QueryExecutionId: this.queryExecutionId,
      NextToken: this.nextToken,
      MaxResults: MAX_RESULTS_PER_PAGE,
    });
  }

  private bufferPage(rows: readonly AthenaRow[], nextToken: string | undefined): void {
    const columns = this.columns ?? [];
    if (columns.length > 0) {
      for (const row of rows) {
        this.buffer.push(toRow(row, columns));
      }
    }
    this.nextToken = nextToken;
    this.exhausted = !nextToken;
  }

  private ensureOpen(): void {
    if (this.closed) {
      throw new QueryError('Cursor is closed', {
        queryExecutionId: this.queryExecutionId,
        code: AthenaErrorCode.CURSOR_CONSUMED,
      });
    }
  }

  private sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
  }
}

// ============================================================================
// Connection and Driver
// ============================================================================

/**
 * Connection backed by one Athena SDK client.
 */
export class AthenaRemoteConnection implements RemoteConnection {
  private readonly api: AthenaApi;
  private readonly params: RemoteConnectParams;

  constructor(api: AthenaApi, params: RemoteConnectParams) {
    this.api = api;
    this.params = params;
  }

  cursor(): AthenaRemoteCursor {
    return new AthenaRemoteCursor(this.api, this.params);
  }

  async close(): Promise<void> {
    this.api.destroy();
  }
}

/**
 * Creates the Athena driver.
 *
 * @param apiFactory - Builds the SDK surface; defaults to a real `AthenaClient`
 */
export function createAthenaDriver(
  apiFactory: (config: AthenaClientConfig) => AthenaApi = (config) => sdkApi(new AthenaClient(config))
): RemoteDriver {
  return {
    name: 'athena',
    async connect(params: RemoteConnectParams): Promise<RemoteConnection> {
      const api = apiFactory(toClientConfig(params.region, params.credentials));
      return new AthenaRemoteConnection(api, params);
    },
  };
}

/**
 * Default driver instance.
 */
export const athenaDriver: RemoteDriver = createAthenaDriver();
