/**
 * Catalog Storage
 *
 * SQLite-backed history of catalog versions.
 * Three-table design: catalog_blobs (immutable, content-addressed),
 * catalog_active (single pointer row), catalog_history (append-only log).
 *
 * @module catalog-storage
 * @version 1.0.0
 */

import sqlite3 from "sqlite3";
import { open, type Database } from "sqlite";
import path from "path";

import {
  SCHEMA_VERSIONS,
  canonicalizeJson,
  computeContentHash,
  parseTypedConfig,
  validateConfig,
  type CatalogConfig,
} from "./config-schemas";
import { ConfigurationError } from "./errors";

// ============================================================================
// CONFIGURATION
// ============================================================================

const MEMORY_DB = ":memory:";

export function getCatalogDbPath(): string {
  return process.env.CE_CATALOG_DB_PATH || "./catalog.db";
}

// ============================================================================
// TYPES
// ============================================================================

interface CatalogBlobRow {
  content_hash: string;
  schema_version: string;
  content: string;
  created_utc: string;
  created_by: string | null;
}

interface CatalogHistoryRow {
  id: number;
  content_hash: string;
  summary: string | null;
  committed_utc: string;
  committed_by: string | null;
}

export interface CatalogHistoryEntry {
  id: number;
  contentHash: string;
  summary: string | null;
  committedUtc: string;
  committedBy: string | null;
}

export interface SaveCatalogResult {
  contentHash: string;
  /** false when identical content was already stored */
  isNew: boolean;
}

function rowToHistoryEntry(row: CatalogHistoryRow): CatalogHistoryEntry {
  return {
    id: row.id,
    contentHash: row.content_hash,
    summary: row.summary,
    committedUtc: row.committed_utc,
    committedBy: row.committed_by,
  };
}

// ============================================================================
// CATALOG STORE
// ============================================================================

export class CatalogStore {
  private dbPromise: Promise<Database> | null = null;
  private writeChain: Promise<void> = Promise.resolve();

  constructor(private readonly dbPath: string = getCatalogDbPath()) {}

  private getDb(): Promise<Database> {
    if (!this.dbPromise) {
      this.dbPromise = this.openDb();
    }
    return this.dbPromise;
  }

  private async openDb(): Promise<Database> {
    const filename = this.dbPath === MEMORY_DB ? MEMORY_DB : path.resolve(this.dbPath);
    console.log(`[Catalog-Storage] Opening database at ${filename}`);

    const db = await open({
      filename,
      driver: sqlite3.Database,
    });

    await db.exec("PRAGMA journal_mode=WAL");

    await db.exec(`
      CREATE TABLE IF NOT EXISTS catalog_blobs (
        content_hash TEXT PRIMARY KEY,
        schema_version TEXT NOT NULL,
        content TEXT NOT NULL,
        created_utc TEXT NOT NULL,
        created_by TEXT
      );

      CREATE TABLE IF NOT EXISTS catalog_active (
        id INTEGER PRIMARY KEY CHECK (id = 1),
        active_hash TEXT NOT NULL,
        activated_utc TEXT NOT NULL,
        activated_by TEXT,
        FOREIGN KEY (active_hash) REFERENCES catalog_blobs(content_hash)
      );

      CREATE TABLE IF NOT EXISTS catalog_history (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        content_hash TEXT NOT NULL,
        summary TEXT,
        committed_utc TEXT NOT NULL,
        committed_by TEXT
      );

      CREATE INDEX IF NOT EXISTS idx_catalog_history_committed
        ON catalog_history(committed_utc);
    `);

    return db;
  }

  /**
   * Store a catalog version and make it the active one.
   * Identical content (after canonicalization) reuses the existing blob.
   */
  async saveCatalog(
    definition: CatalogConfig,
    options: { createdBy?: string; summary?: string } = {},
  ): Promise<SaveCatalogResult> {
    const validation = validateConfig("catalog", definition);
    if (!validation.valid) {
      throw new ConfigurationError(
        `Refusing to store invalid catalog: ${validation.errors.join(", ")}`,
        "catalog",
        validation.errors,
      );
    }

    const canonicalized = canonicalizeJson(definition);
    const contentHash = computeContentHash(canonicalized);
    const createdBy = options.createdBy || null;

    // One write transaction at a time on the shared connection
    const write = this.writeChain.then(async () => {
      const database = await this.getDb();
      const now = new Date().toISOString();

      await database.exec("BEGIN IMMEDIATE TRANSACTION");
      try {
        const existing = await database.get<{ content_hash: string }>(
          "SELECT content_hash FROM catalog_blobs WHERE content_hash = ?",
          [contentHash],
        );

        if (!existing) {
          await database.run(
            `INSERT INTO catalog_blobs (content_hash, schema_version, content, created_utc, created_by)
             VALUES (?, ?, ?, ?, ?)`,
            [contentHash, SCHEMA_VERSIONS.catalog, canonicalized, now, createdBy],
          );
        }

        await database.run(
          `INSERT INTO catalog_active (id, active_hash, activated_utc, activated_by)
           VALUES (1, ?, ?, ?)
           ON CONFLICT(id) DO UPDATE SET
             active_hash = excluded.active_hash,
             activated_utc = excluded.activated_utc,
             activated_by = excluded.activated_by`,
          [contentHash, now, createdBy],
        );

        await database.run(
          `INSERT INTO catalog_history (content_hash, summary, committed_utc, committed_by)
           VALUES (?, ?, ?, ?)`,
          [contentHash, options.summary || null, now, createdBy],
        );

        await database.exec("COMMIT");
        return existing !== undefined;
      } catch (err) {
        await database.exec("ROLLBACK");
        throw err;
      }
    });
    this.writeChain = write.then(
      () => undefined,
      () => undefined,
    );
    const reused = await write;

    console.log(
      `[Catalog-Storage] Saved catalog ${contentHash.slice(0, 12)} (${reused ? "existing" : "new"} blob)`,
    );
    return { contentHash, isNew: !reused };
  }

  /**
   * The active catalog definition, or null when nothing was stored yet.
   * Throws ConfigurationError if the stored content no longer validates.
   */
  async getActiveCatalog(): Promise<CatalogConfig | null> {
    const database = await this.getDb();
    const row = await database.get<CatalogBlobRow>(
      `SELECT b.* FROM catalog_active a
       JOIN catalog_blobs b ON b.content_hash = a.active_hash
       WHERE a.id = 1`,
    );
    if (!row) return null;

    if (row.schema_version !== SCHEMA_VERSIONS.catalog) {
      console.warn(
        `[Catalog-Storage] Stored catalog schema ${row.schema_version} differs from ${SCHEMA_VERSIONS.catalog}`,
      );
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(row.content);
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      throw new ConfigurationError(`Stored catalog ${row.content_hash} is not valid JSON: ${message}`, "catalog");
    }
    return parseTypedConfig("catalog", parsed);
  }

  async getActiveHash(): Promise<string | null> {
    const database = await this.getDb();
    const row = await database.get<{ active_hash: string }>("SELECT active_hash FROM catalog_active WHERE id = 1");
    return row?.active_hash ?? null;
  }

  /**
   * Most recent commits first.
   */
  async getHistory(limit = 20): Promise<CatalogHistoryEntry[]> {
    const database = await this.getDb();
    const rows = await database.all<CatalogHistoryRow[]>(
      "SELECT * FROM catalog_history ORDER BY id DESC LIMIT ?",
      [limit],
    );
    return rows.map(rowToHistoryEntry);
  }

  async close(): Promise<void> {
    if (!this.dbPromise) return;
    const pending = this.dbPromise;
    this.dbPromise = null;
    const db = await pending;
    await db.close();
    console.log("[Catalog-Storage] Closed database");
  }
}
