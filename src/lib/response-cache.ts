/**
 * Response Cache
 *
 * SQLite-based cache for validated model responses.
 * Lookup-before-invoke, store-after-invoke, TTL-based expiration.
 *
 * Cache Key: hash(fingerprint + instructionVersion + modelId + stageId)
 *
 * An entry is immutable while it is valid: a changed answer reaches the cache
 * under a new key through the instruction version or model id.
 *
 * @module response-cache
 */

import sqlite3 from "sqlite3";
import { open, type Database } from "sqlite";
import path from "path";
import crypto from "crypto";

// ============================================================================
// TYPES
// ============================================================================

export interface CacheKeyParts {
  fingerprint: string;
  instructionVersion: string;
  modelId: string;
  stageId: string;
}

export interface CachedResponse extends CacheKeyParts {
  cacheKey: string;
  payload: string;
  cachedAt: string;
  expiresAt: string;
}

export interface CacheStats {
  totalEntries: number;
  validEntries: number;
  expiredEntries: number;
  byStage: Record<string, number>;
  dbSizeBytes: number;
}

/** What the orchestrator needs from a cache. */
export interface ResponseCache {
  get(parts: CacheKeyParts): Promise<CachedResponse | null>;
  set(parts: CacheKeyParts, payload: string): Promise<void>;
}

interface ResponseCacheRow {
  cache_key: string;
  fingerprint: string;
  instruction_version: string;
  model_id: string;
  stage_id: string;
  payload: string;
  cached_at: string;
  expires_at: string;
}

export interface SqliteResponseCacheOptions {
  dbPath: string;
  ttlHours: number;
  now?: () => number;
}

// ============================================================================
// KEYS
// ============================================================================

/** Content hash used as the primary key component. */
export function fingerprint(...parts: string[]): string {
  return crypto.createHash("sha256").update(parts.join("\u0000"), "utf8").digest("hex");
}

export function generateCacheKey(parts: CacheKeyParts): string {
  const normalized = [parts.fingerprint, parts.instructionVersion, parts.modelId, parts.stageId].join("|");
  return crypto.createHash("sha256").update(normalized, "utf8").digest("hex");
}

// ============================================================================
// SQLITE CACHE
// ============================================================================

export class SqliteResponseCache implements ResponseCache {
  private db: Database | null = null;
  private dbPromise: Promise<Database> | null = null;
  private readonly now: () => number;

  constructor(private readonly options: SqliteResponseCacheOptions) {
    this.now = options.now ?? Date.now;
  }

  private get resolvedPath(): string {
    return this.options.dbPath === ":memory:" ? ":memory:" : path.resolve(this.options.dbPath);
  }

  private async getDb(): Promise<Database> {
    if (this.db) return this.db;
    if (!this.dbPromise) {
      this.dbPromise = (async () => {
        const dbPath = this.resolvedPath;
        console.log(`[Response-Cache] Opening database at ${dbPath}`);
        const database = await open({ filename: dbPath, driver: sqlite3.Database });

        await database.exec("PRAGMA journal_mode=WAL;");
        await database.exec("PRAGMA busy_timeout=5000;");
        await database.exec(`
          CREATE TABLE IF NOT EXISTS response_cache (
            cache_key TEXT PRIMARY KEY,
            fingerprint TEXT NOT NULL,
            instruction_version TEXT NOT NULL,
            model_id TEXT NOT NULL,
            stage_id TEXT NOT NULL,
            payload TEXT NOT NULL,
            cached_at TEXT NOT NULL,
            expires_at TEXT NOT NULL
          );

          CREATE INDEX IF NOT EXISTS idx_response_cache_expires ON response_cache(expires_at);
          CREATE INDEX IF NOT EXISTS idx_response_cache_stage ON response_cache(stage_id);
        `);

        this.db = database;
        return database;
      })();
    }
    return this.dbPromise;
  }

  private nowIso(): string {
    return new Date(this.now()).toISOString();
  }

  /** Valid entry for the key, or null. Expired entries are deleted and count as a miss. */
  async get(parts: CacheKeyParts): Promise<CachedResponse | null> {
    const database = await this.getDb();
    const cacheKey = generateCacheKey(parts);
    const row = await database.get<ResponseCacheRow>(
      "SELECT * FROM response_cache WHERE cache_key = ?",
      cacheKey,
    );

    if (!row) return null;

    if (row.expires_at <= this.nowIso()) {
      await database.run("DELETE FROM response_cache WHERE cache_key = ?", cacheKey);
      console.log(`[Response-Cache] Expired entry for ${parts.stageId} (${parts.modelId}) removed`);
      return null;
    }

    console.log(`[Response-Cache] HIT ${parts.stageId} (${parts.modelId}, ${parts.instructionVersion})`);
    return {
      cacheKey: row.cache_key,
      fingerprint: row.fingerprint,
      instructionVersion: row.instruction_version,
      modelId: row.model_id,
      stageId: row.stage_id,
      payload: row.payload,
      cachedAt: row.cached_at,
      expiresAt: row.expires_at,
    };
  }

  /** Store a payload. A valid existing entry for the same key is left untouched. */
  async set(parts: CacheKeyParts, payload: string): Promise<void> {
    const database = await this.getDb();
    const cacheKey = generateCacheKey(parts);
    const cachedAt = this.nowIso();
    const expiresAt = new Date(this.now() + this.options.ttlHours * 3600_000).toISOString();

    await database.run("DELETE FROM response_cache WHERE cache_key = ? AND expires_at <= ?", cacheKey, cachedAt);
    await database.run(
      `INSERT OR IGNORE INTO response_cache (
        cache_key, fingerprint, instruction_version, model_id, stage_id, payload, cached_at, expires_at
      ) VALUES (?, ?, ?, ?, ?, ?, ?, ?)`,
      cacheKey,
      parts.fingerprint,
      parts.instructionVersion,
      parts.modelId,
      parts.stageId,
      payload,
      cachedAt,
      expiresAt,
    );
  }

  /** Delete expired entries; returns how many were removed. */
  async cleanupExpired(): Promise<number> {
    const database = await this.getDb();
    const result = await database.run("DELETE FROM response_cache WHERE expires_at <= ?", this.nowIso());
    const deleted = result.changes ?? 0;
    if (deleted > 0) {
      console.log(`[Response-Cache] Cleaned up ${deleted} expired entries`);
    }
    return deleted;
  }

  async clear(): Promise<number> {
    const database = await this.getDb();
    const result = await database.run("DELETE FROM response_cache");
    const deleted = result.changes ?? 0;
    console.log(`[Response-Cache] Cleared ${deleted} entries`);
    return deleted;
  }

  async getStats(): Promise<CacheStats> {
    const database = await this.getDb();
    const now = this.nowIso();

    const total = await database.get<{ count: number }>("SELECT COUNT(*) as count FROM response_cache");
    const valid = await database.get<{ count: number }>(
      "SELECT COUNT(*) as count FROM response_cache WHERE expires_at > ?",
      now,
    );
    const byStageRows = await database.all<Array<{ stage_id: string; count: number }>>(
      "SELECT stage_id, COUNT(*) as count FROM response_cache WHERE expires_at > ? GROUP BY stage_id",
      now,
    );
    const pageCount = await database.get<{ page_count: number }>("PRAGMA page_count");
    const pageSize = await database.get<{ page_size: number }>("PRAGMA page_size");

    const byStage: Record<string, number> = {};
    for (const row of byStageRows) {
      byStage[row.stage_id] = row.count;
    }

    const totalEntries = total?.count ?? 0;
    const validEntries = valid?.count ?? 0;
    return {
      totalEntries,
      validEntries,
      expiredEntries: totalEntries - validEntries,
      byStage,
      dbSizeBytes: (pageCount?.page_count ?? 0) * (pageSize?.page_size ?? 0),
    };
  }

  async close(): Promise<void> {
    if (this.db) {
      await this.db.close();
      this.db = null;
      this.dbPromise = null;
      console.log("[Response-Cache] Database closed");
    }
  }
}
