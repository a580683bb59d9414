/**
 * Athena Integration Configuration
 *
 * Configuration types and normalization for the Athena integration module.
 * @module athena-catalog/config
 */

import { ConfigurationError, MissingConfigurationError } from '../errors/index.js';
import { isLogLevel, type LogLevel } from '../observability/logging.js';

// ============================================================================
// Default Values
// ============================================================================

export const DEFAULT_REGION = 'us-east-1';
export const DEFAULT_CATALOG = 'AwsDataCatalog';
export const DEFAULT_POLL_INTERVAL = '0.5';
export const DEFAULT_POLL_INTERVAL_MS = 500;
export const DEFAULT_LOG_LEVEL: LogLevel = 'warn';
/** Persisted catalogs older than this are rebuilt (1 hour) */
export const DEFAULT_CATALOG_TTL_MS = 60 * 60 * 1000;

// ============================================================================
// Credential Types
// ============================================================================

/**
 * Static access key credentials.
 */
export interface StaticCredentials {
  type: 'static';
  /** AWS access key ID */
  accessKeyId: string;
  /** AWS secret access key */
  secretAccessKey: string;
  /** Optional session token for temporary credentials */
  sessionToken?: string;
}

/**
 * Named profile from the shared AWS config files.
 */
export interface ProfileCredentials {
  type: 'profile';
  profileName: string;
}

/**
 * Default AWS SDK provider chain (environment, shared files, instance role).
 */
export interface DefaultChainCredentials {
  type: 'default';
}

/**
 * Union type for all credential sources.
 */
export type CredentialSource = StaticCredentials | ProfileCredentials | DefaultChainCredentials;

// ============================================================================
// Connection Options
// ============================================================================

/**
 * Options handed to a connection by the host application. Values usually come
 * straight from command-line flags, so numeric options arrive as strings.
 */
export interface AthenaConnectionOptions {
  /** AWS region where Athena runs (default: us-east-1) */
  region?: string | null;
  /** S3 location where Athena writes query results (required) */
  s3StagingDir?: string | null;
  /** Athena work group */
  workGroup?: string | null;
  /** Restricts the catalog to one schema (database) */
  schema?: string | null;
  /** Data catalog name (default: AwsDataCatalog) */
  catalog?: string | null;
  /** AWS access key ID */
  awsAccessKeyId?: string | null;
  /** AWS secret access key */
  awsSecretAccessKey?: string | null;
  /** AWS session token */
  awsSessionToken?: string | null;
  /** Profile from the shared AWS credentials file */
  profileName?: string | null;
  /** Status polling interval in seconds, as a numeric string (default: "0.5") */
  pollInterval?: string | number | null;
  /** Overrides the platform cache directory */
  cacheDir?: string | null;
  /** Persist the catalog snapshot between runs (default: true) */
  persistCatalog?: boolean | null;
  /** Maximum age of a persisted catalog in milliseconds (default: 1 hour) */
  catalogTtlMs?: string | number | null;
  /** Log level for the default console logger (default: warn) */
  logLevel?: string | null;
}

/**
 * Validated, immutable connection configuration.
 */
export interface AthenaConfig {
  readonly region: string;
  readonly stagingLocation: string;
  readonly workGroup?: string;
  readonly schemaFilter?: string;
  readonly catalogFilter: string;
  readonly pollIntervalMs: number;
  readonly credentials: CredentialSource;
  readonly cacheDir?: string;
  readonly persistCatalog: boolean;
  readonly catalogTtlMs: number;
  readonly logLevel: LogLevel;
}

// ============================================================================
// Normalization
// ============================================================================

function optionalString(value: string | null | undefined): string | undefined {
  if (value === null || value === undefined) {
    return undefined;
  }
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

/**
 * Parses a poll interval given in seconds. Anything that is not a positive
 * finite number falls back to the default.
 *
 * @returns Poll interval in milliseconds
 */
export function parsePollInterval(value: string | number | null | undefined): number {
  if (value === null || value === undefined) {
    return DEFAULT_POLL_INTERVAL_MS;
  }
  const seconds = typeof value === 'number' ? value : Number(value.trim());
  if (typeof value === 'string' && value.trim().length === 0) {
    return DEFAULT_POLL_INTERVAL_MS;
  }
  if (!Number.isFinite(seconds) || seconds <= 0) {
    return DEFAULT_POLL_INTERVAL_MS;
  }
  return Math.round(seconds * 1000);
}

/**
 * Parses the maximum age of a persisted catalog. `0` expires every snapshot;
 * anything that is not a non-negative finite number falls back to the default.
 *
 * @returns Age in milliseconds
 */
export function parseCatalogTtl(value: string | number | null | undefined): number {
  if (value === null || value === undefined) {
    return DEFAULT_CATALOG_TTL_MS;
  }
  if (typeof value === 'string' && value.trim().length === 0) {
    return DEFAULT_CATALOG_TTL_MS;
  }
  const ms = typeof value === 'number' ? value : Number(value.trim());
  if (!Number.isFinite(ms) || ms < 0) {
    return DEFAULT_CATALOG_TTL_MS;
  }
  return Math.floor(ms);
}

/**
 * Picks the credential source from the options. Static keys need both the
 * key ID and the secret; a profile applies otherwise.
 */
export function resolveCredentials(options: AthenaConnectionOptions): CredentialSource {
  const accessKeyId = optionalString(options.awsAccessKeyId);
  const secretAccessKey = optionalString(options.awsSecretAccessKey);
  if (accessKeyId && secretAccessKey) {
    return {
      type: 'static',
      accessKeyId,
      secretAccessKey,
      sessionToken: optionalString(options.awsSessionToken),
    };
  }

  const profileName = optionalString(options.profileName);
  if (profileName) {
    return { type: 'profile', profileName };
  }

  return { type: 'default' };
}

/**
 * Validates and normalizes connection options.
 *
 * @throws {MissingConfigurationError} If the staging location is missing
 * @throws {ConfigurationError} If the staging location is not an S3 URI or the log level is unknown
 */
export function resolveConfig(options: AthenaConnectionOptions): AthenaConfig {
  const stagingLocation = optionalString(options.s3StagingDir);
  if (!stagingLocation) {
    throw new MissingConfigurationError(
      's3StagingDir',
      's3StagingDir is required for Athena connections'
    );
  }
  if (!stagingLocation.startsWith('s3://')) {
    throw new ConfigurationError(`s3StagingDir must be an s3:// URI, got '${stagingLocation}'`);
  }

  const logLevelOption = optionalString(options.logLevel);
  let logLevel = DEFAULT_LOG_LEVEL;
  if (logLevelOption) {
    const lower = logLevelOption.toLowerCase();
    if (!isLogLevel(lower)) {
      throw new ConfigurationError(`Unknown log level '${logLevelOption}'`);
    }
    logLevel = lower;
  }

  const config: AthenaConfig = {
    region: optionalString(options.region) ?? DEFAULT_REGION,
    stagingLocation,
    workGroup: optionalString(options.workGroup),
    schemaFilter: optionalString(options.schema),
    catalogFilter: optionalString(options.catalog) ?? DEFAULT_CATALOG,
    pollIntervalMs: parsePollInterval(options.pollInterval),
    credentials: resolveCredentials(options),
    cacheDir: optionalString(options.cacheDir),
    persistCatalog: options.persistCatalog ?? true,
    catalogTtlMs: parseCatalogTtl(options.catalogTtlMs),
    logLevel,
  };

  return Object.freeze(config);
}

// ============================================================================
// Configuration from Environment
// ============================================================================

/**
 * Environment variables consulted when an option is not given explicitly.
 * Credentials and region are left to the AWS SDK's own variables
 * (AWS_ACCESS_KEY_ID, AWS_REGION, AWS_PROFILE, ...).
 */
export const ENVIRONMENT_VARIABLES = {
  s3StagingDir: 'ATHENA_S3_STAGING_DIR',
  workGroup: 'ATHENA_WORK_GROUP',
  schema: 'ATHENA_SCHEMA',
  catalog: 'ATHENA_CATALOG',
  pollInterval: 'ATHENA_POLL_INTERVAL',
  catalogTtlMs: 'ATHENA_CATALOG_TTL_MS',
  logLevel: 'ATHENA_LOG_LEVEL',
} as const;

/**
 * Fills options that were not given explicitly from the environment.
 *
 * @param options - Explicit options; these win over the environment
 * @param env - Environment to read (default: process.env)
 */
export function withEnvironmentFallback(
  options: AthenaConnectionOptions,
  env: NodeJS.ProcessEnv = process.env
): AthenaConnectionOptions {
  return {
    ...options,
    s3StagingDir: options.s3StagingDir || env[ENVIRONMENT_VARIABLES.s3StagingDir],
    workGroup: options.workGroup || env[ENVIRONMENT_VARIABLES.workGroup],
    schema: options.schema || env[ENVIRONMENT_VARIABLES.schema],
    catalog: options.catalog || env[ENVIRONMENT_VARIABLES.catalog],
    pollInterval: options.pollInterval || env[ENVIRONMENT_VARIABLES.pollInterval],
    catalogTtlMs: options.catalogTtlMs ?? env[ENVIRONMENT_VARIABLES.catalogTtlMs],
    logLevel: options.logLevel || env[ENVIRONMENT_VARIABLES.logLevel],
  };
}

/**
 * Creates configuration from environment variables alone.
 *
 * @throws {MissingConfigurationError} If ATHENA_S3_STAGING_DIR is not set
 */
export function configFromEnvironment(env: NodeJS.ProcessEnv = process.env): AthenaConfig {
  return resolveConfig(withEnvironmentFallback({ region: env['AWS_REGION'] }, env));
}
