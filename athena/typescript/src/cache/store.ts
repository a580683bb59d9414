/**
 * Catalog snapshot store
 *
 * One JSON file per cache key under the platform cache directory. Every
 * operation is best effort: faults are logged at debug level and reported
 * as a miss, never thrown.
 *
 * @module athena-catalog/cache/store
 */

import { createHash, randomUUID } from 'crypto';
import { mkdir, readFile, rename, rm, writeFile } from 'fs/promises';
import { homedir } from 'os';
import { join } from 'path';
import { z } from 'zod';
import { DEFAULT_CATALOG, DEFAULT_REGION } from '../config/index.js';
import { logCacheFault, NoopLogger, type Logger } from '../observability/logging.js';
import { SNAPSHOT_VERSION, type CatalogSnapshot } from '../types/index.js';

export const CACHE_APP_NAME = 'athena-catalog';

// ============================================================================
// Cache Directory
// ============================================================================

/**
 * Platform cache directory for snapshots, created if missing.
 *
 * - Windows: `%LOCALAPPDATA%\athena-catalog\cache`
 * - macOS: `~/Library/Caches/athena-catalog`
 * - elsewhere: `$XDG_CACHE_HOME/athena-catalog`, or `~/.cache/athena-catalog`
 *
 * @param override - Directory to use instead of the platform default
 * @returns The directory, or `undefined` when it cannot be created
 */
export async function resolveCacheDir(
  override?: string,
  env: NodeJS.ProcessEnv = process.env,
  platform: NodeJS.Platform = process.platform
): Promise<string | undefined> {
  try {
    // homedir() throws when the user has no home directory
    const dir = override ?? platformCacheDir(env, platform);
    await mkdir(dir, { recursive: true });
    return dir;
  } catch {
    return undefined;
  }
}

function platformCacheDir(env: NodeJS.ProcessEnv, platform: NodeJS.Platform): string {
  switch (platform) {
    case 'win32':
      return join(env['LOCALAPPDATA'] ?? join(homedir(), 'AppData', 'Local'), CACHE_APP_NAME, 'cache');
    case 'darwin':
      return join(homedir(), 'Library', 'Caches', CACHE_APP_NAME);
    default:
      return join(env['XDG_CACHE_HOME'] || join(homedir(), '.cache'), CACHE_APP_NAME);
  }
}

// ============================================================================
// Cache Key
// ============================================================================

export interface CacheKeyParts {
  catalog?: string;
  region?: string;
  workGroup?: string;
  schema?: string;
}

/**
 * Stable key for a connection target: sha256 of
 * `catalog|region[|wg:<workGroup>][|schema:<schema>]`.
 */
export function cacheKey(parts: CacheKeyParts): string {
  const segments = [parts.catalog || DEFAULT_CATALOG, parts.region || DEFAULT_REGION];
  if (parts.workGroup) {
    segments.push(`wg:${parts.workGroup}`);
  }
  if (parts.schema) {
    segments.push(`schema:${parts.schema}`);
  }
  return createHash('sha256').update(segments.join('|')).digest('hex');
}

/**
 * File name of the snapshot for a key.
 */
export function snapshotFileName(key: string): string {
  return `catalog_${key}.json`;
}

// ============================================================================
// Snapshot Schema
// ============================================================================

const columnSnapshotSchema = z.object({
  name: z.string(),
  dataType: z.string(),
});

const tableSnapshotSchema = z.object({
  name: z.string(),
  type: z.enum(['t', 'v']),
  columns: z.array(columnSnapshotSchema).optional(),
});

const schemaSnapshotSchema = z.object({
  name: z.string(),
  tables: z.array(tableSnapshotSchema).optional(),
});

export const catalogSnapshotSchema = z.object({
  version: z.literal(SNAPSHOT_VERSION),
  key: z.string(),
  createdAt: z.string().datetime(),
  catalogs: z.array(
    z.object({
      name: z.string(),
      schemas: z.array(schemaSnapshotSchema),
    })
  ),
});

// ============================================================================
// Store
// ============================================================================

export interface CacheStoreOptions {
  /** Age at which a snapshot is discarded on load; no expiry when unset */
  ttlMs?: number;
  /** Clock in epoch milliseconds (default: Date.now) */
  now?: () => number;
}

/**
 * Reads and writes the snapshot of one cache key.
 */
export class CacheStore {
  readonly key: string;
  readonly file: string;
  private readonly logger: Logger;
  private readonly ttlMs?: number;
  private readonly now: () => number;
  private queue: Promise<void> = Promise.resolve();

  constructor(
    dir: string,
    key: string,
    logger: Logger = new NoopLogger(),
    options: CacheStoreOptions = {}
  ) {
    this.key = key;
    this.file = join(dir, snapshotFileName(key));
    this.logger = logger;
    this.ttlMs = options.ttlMs;
    this.now = options.now ?? Date.now;
  }

  /**
   * Reads the snapshot. A missing file is a miss; an unreadable, invalid or
   * expired file is deleted and is a miss too.
   */
  async load(): Promise<CatalogSnapshot | undefined> {
    await this.queue;

    let text: string;
    let snapshot: CatalogSnapshot;
    try {
      text = await readFile(this.file, 'utf8');
    } catch (error) {
      if (!isNotFound(error)) {
        logCacheFault(this.logger, 'load', error);
      }
      return undefined;
    }

    try {
      const parsed: unknown = JSON.parse(text);
      const result = catalogSnapshotSchema.safeParse(parsed);
      if (!result.success) {
        throw new Error(`Invalid snapshot: ${result.error.issues[0]?.message ?? 'unknown issue'}`);
      }
      if (result.data.key !== this.key) {
        throw new Error('Snapshot was written for another key');
      }
      snapshot = result.data;
    } catch (error) {
      logCacheFault(this.logger, 'load', error);
      await this.delete();
      return undefined;
    }

    const ageMs = this.now() - Date.parse(snapshot.createdAt);
    if (this.ttlMs !== undefined && ageMs >= this.ttlMs) {
      this.logger.debug('Catalog snapshot expired', { file: this.file, ageMs, ttlMs: this.ttlMs });
      await this.delete();
      return undefined;
    }
    return snapshot;
  }

  /**
   * Writes the snapshot through a temporary file of its own. Writes and
   * deletes of one store run in call order.
   */
  save(snapshot: CatalogSnapshot): Promise<void> {
    return this.enqueue('save', async () => {
      const temporary = temporaryFileName(this.file);
      try {
        await writeFile(temporary, JSON.stringify(snapshot), 'utf8');
        await rename(temporary, this.file);
      } finally {
        await rm(temporary, { force: true });
      }
    });
  }

  delete(): Promise<void> {
    return this.enqueue('delete', () => rm(this.file, { force: true }));
  }

  private enqueue(operation: string, task: () => Promise<void>): Promise<void> {
    this.queue = this.queue.then(task).catch((error: unknown) => {
      logCacheFault(this.logger, operation, error);
    });
    return this.queue;
  }
}

/**
 * Unique sibling of `file` for one write.
 */
export function temporaryFileName(file: string): string {
  return `${file}.${process.pid}.${randomUUID()}.tmp`;
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
