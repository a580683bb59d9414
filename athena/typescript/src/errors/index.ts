/**
 * Athena Integration Error Types
 *
 * Error classes for the Athena integration module.
 * @module athena-catalog/errors
 */

// ============================================================================
// Error Codes
// ============================================================================

/**
 * Athena error codes mapped to categories.
 */
export enum AthenaErrorCode {
  // Connection errors
  CONNECTION_FAILED = 'ATHENA_CONNECTION_FAILED',
  CONNECTION_CLOSED = 'ATHENA_CONNECTION_CLOSED',

  // Query errors
  QUERY_FAILED = 'ATHENA_QUERY_FAILED',
  QUERY_CANCELLED = 'ATHENA_QUERY_CANCELLED',
  CURSOR_CONSUMED = 'ATHENA_CURSOR_CONSUMED',

  // Catalog errors
  CATALOG_FAILED = 'ATHENA_CATALOG_FAILED',
  UNKNOWN_NODE = 'ATHENA_UNKNOWN_NODE',

  // Configuration errors
  INVALID_CONFIG = 'ATHENA_INVALID_CONFIG',
  MISSING_CONFIG = 'ATHENA_MISSING_CONFIG',

  // General errors
  UNKNOWN_ERROR = 'ATHENA_UNKNOWN_ERROR',
}

/**
 * Short titles shown alongside the underlying message.
 */
export const CONNECTION_ERROR_TITLE = 'Could not connect to Athena.';
export const QUERY_ERROR_TITLE = 'Athena reported an error while running your query.';
export const CATALOG_ERROR_TITLE = 'Could not load the Athena catalog.';

// ============================================================================
// Base Error Class
// ============================================================================

/**
 * Base error class for all Athena errors.
 */
export class AthenaError extends Error {
  /** Error code */
  readonly code: AthenaErrorCode;
  /** Short, user-facing title */
  readonly title: string;
  /** Athena query execution id (if applicable) */
  readonly queryExecutionId?: string;
  /** Original error */
  readonly cause?: Error;
  /** Additional context */
  readonly context?: Record<string, unknown>;

  constructor(
    message: string,
    code: AthenaErrorCode,
    options?: {
      title?: string;
      queryExecutionId?: string;
      cause?: Error;
      context?: Record<string, unknown>;
    }
  ) {
    super(message);
    this.name = 'AthenaError';
    this.code = code;
    this.title = options?.title ?? 'Athena error.';
    this.queryExecutionId = options?.queryExecutionId;
    this.cause = options?.cause;
    this.context = options?.context;

    // Maintain proper stack trace
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * Returns a detailed error message including context.
   */
  toDetailedString(): string {
    const parts = [`${this.name} [${this.code}]: ${this.title} ${this.message}`];
    if (this.queryExecutionId) parts.push(`Query execution ID: ${this.queryExecutionId}`);
    if (this.cause && this.cause.message !== this.message) {
      parts.push(`Caused by: ${this.cause.message}`);
    }
    if (this.context) parts.push(`Context: ${JSON.stringify(this.context)}`);
    return parts.join('\n');
  }
}

// ============================================================================
// Connection Errors
// ============================================================================

/**
 * Raised while opening a connection: missing staging location, invalid
 * configuration, or a remote client that could not be created.
 */
export class ConnectionError extends AthenaError {
  constructor(message: string, cause?: Error, code: AthenaErrorCode = AthenaErrorCode.CONNECTION_FAILED) {
    super(message, code, {
      title: CONNECTION_ERROR_TITLE,
      cause,
    });
    this.name = 'ConnectionError';
  }
}

// ============================================================================
// Query Errors
// ============================================================================

/**
 * Raised for any failure while executing a statement or fetching its rows.
 * The message is the engine's own error text.
 */
export class QueryError extends AthenaError {
  constructor(
    message: string,
    options?: {
      queryExecutionId?: string;
      cause?: Error;
      code?: AthenaErrorCode;
      title?: string;
    }
  ) {
    super(message, options?.code ?? AthenaErrorCode.QUERY_FAILED, {
      title: options?.title ?? QUERY_ERROR_TITLE,
      queryExecutionId: options?.queryExecutionId,
      cause: options?.cause,
    });
    this.name = 'QueryError';
  }
}

// ============================================================================
// Configuration Errors
// ============================================================================

/**
 * Invalid configuration error.
 */
export class ConfigurationError extends AthenaError {
  constructor(message: string) {
    super(message, AthenaErrorCode.INVALID_CONFIG, {
      title: CONNECTION_ERROR_TITLE,
    });
    this.name = 'ConfigurationError';
  }
}

/**
 * Missing configuration error.
 */
export class MissingConfigurationError extends AthenaError {
  constructor(configKey: string, message?: string) {
    super(message ?? `Missing required configuration: ${configKey}`, AthenaErrorCode.MISSING_CONFIG, {
      title: CONNECTION_ERROR_TITLE,
      context: { configKey },
    });
    this.name = 'MissingConfigurationError';
  }
}

// ============================================================================
// Error Utilities
// ============================================================================

/**
 * Checks if an error is an AthenaError.
 */
export function isAthenaError(error: unknown): error is AthenaError {
  return error instanceof AthenaError;
}

/**
 * Extracts the message of an unknown throwable.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Wraps an unknown error as an AthenaError.
 */
export function wrapError(error: unknown, context?: string): AthenaError {
  if (isAthenaError(error)) {
    return error;
  }

  const message = errorMessage(error);
  const cause = error instanceof Error ? error : undefined;
  const fullMessage = context ? `${context}: ${message}` : message;

  return new AthenaError(fullMessage, AthenaErrorCode.UNKNOWN_ERROR, { cause });
}

/**
 * Translates a driver failure into a QueryError carrying the original message.
 * QueryErrors pass through untouched.
 */
export function toQueryError(error: unknown, queryExecutionId?: string): QueryError {
  if (error instanceof QueryError) {
    return error;
  }
  return new QueryError(errorMessage(error), {
    queryExecutionId,
    cause: error instanceof Error ? error : undefined,
  });
}
