// SQLite site and chunk store using better-sqlite3, with an FTS5 keyword index

import Database from "better-sqlite3";
import { randomUUID } from "crypto";
import type {
  ChunkRecord,
  KeywordMatch,
  NewChunk,
  Site,
  SiteStatus,
  SiteStore,
} from "../types";
import { SITE_STATUSES } from "../types";
import { IndexError, errorMessage } from "../errors";

const SCHEMA = `
CREATE TABLE IF NOT EXISTS sites (
  id TEXT PRIMARY KEY,
  url TEXT NOT NULL,
  name TEXT NOT NULL,
  status TEXT NOT NULL DEFAULT 'starting',
  progress REAL NOT NULL DEFAULT 0,
  current_url TEXT,
  chunks_added INTEGER NOT NULL DEFAULT 0,
  total_chunks INTEGER,
  error TEXT,
  processed_urls INTEGER NOT NULL DEFAULT 0,
  total_urls INTEGER NOT NULL DEFAULT 0,
  failed_urls INTEGER NOT NULL DEFAULT 0,
  created_at INTEGER NOT NULL,
  updated_at INTEGER NOT NULL
);

CREATE TABLE IF NOT EXISTS chunks (
  id TEXT PRIMARY KEY,
  site_id TEXT NOT NULL,
  text TEXT NOT NULL,
  source_url TEXT NOT NULL,
  title TEXT NOT NULL,
  position INTEGER NOT NULL,
  created_at INTEGER NOT NULL,
  FOREIGN KEY (site_id) REFERENCES sites(id) ON DELETE CASCADE
);

CREATE INDEX IF NOT EXISTS idx_chunks_site_id ON chunks(site_id);

CREATE VIRTUAL TABLE IF NOT EXISTS chunks_fts USING fts5(
  chunk_id UNINDEXED,
  site_id UNINDEXED,
  title,
  text,
  tokenize = 'unicode61'
);
`;

interface SiteRow {
  id: string;
  url: string;
  name: string;
  status: string;
  progress: number;
  current_url: string | null;
  chunks_added: number;
  total_chunks: number | null;
  error: string | null;
  processed_urls: number;
  total_urls: number;
  failed_urls: number;
  created_at: number;
  updated_at: number;
}

interface ChunkRow {
  id: string;
  site_id: string;
  text: string;
  source_url: string;
  title: string;
  position: number;
  created_at: number;
}

interface KeywordRow {
  chunk_id: string;
  score: number;
}

type SqlValue = string | number | null;

function toStatus(value: string): SiteStatus {
  return SITE_STATUSES.find(status => status === value) ?? "error";
}

/**
 * FTS5 query from free text: lowercased word tokens, each as a quoted prefix
 * term, OR-ed together. Returns null when nothing searchable is left.
 */
export function buildFtsQuery(query: string): string | null {
  const words = query
    .toLowerCase()
    .replace(/[^\p{L}\p{N}\s]/gu, " ")
    .split(/\s+/)
    .filter(word => word.length > 1);

  if (words.length === 0) {
    return null;
  }

  return [...new Set(words)].map(word => `"${word}"*`).join(" OR ");
}

export class SQLiteSiteStore implements SiteStore {
  private db: Database.Database;

  constructor(dbPath: string) {
    try {
      this.db = new Database(dbPath);
      this.db.pragma("journal_mode = WAL");
      this.db.pragma("foreign_keys = ON");
      this.db.exec(SCHEMA);
    } catch (error) {
      throw new IndexError(`Failed to open site store at ${dbPath}: ${errorMessage(error)}`, { cause: error });
    }
  }

  createSite(site: Site): void {
    this.guard("createSite", () => {
      this.db.prepare<[SqlValue[]]>(`
        INSERT INTO sites (id, url, name, status, progress, current_url, chunks_added, total_chunks,
                           error, processed_urls, total_urls, failed_urls, created_at, updated_at)
        VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
      `).run([
        site.id,
        site.url,
        site.name,
        site.status,
        site.progress,
        site.currentUrl,
        site.chunksAdded,
        site.totalChunks,
        site.error,
        site.processedUrls,
        site.totalUrls,
        site.failedUrls,
        site.createdAt,
        site.updatedAt,
      ]);
    });
  }

  getSite(id: string): Site | null {
    return this.guard("getSite", () => {
      const row = this.db.prepare<[string], SiteRow>(`SELECT * FROM sites WHERE id = ?`).get(id);
      return row ? this.rowToSite(row) : null;
    });
  }

  listSites(): Site[] {
    return this.guard("listSites", () =>
      this.db
        .prepare<[], SiteRow>(`SELECT * FROM sites ORDER BY created_at ASC, id ASC`)
        .all()
        .map(row => this.rowToSite(row))
    );
  }

  updateSite(id: string, updates: Partial<Omit<Site, "id" | "createdAt">>): void {
    const fields: string[] = [];
    const values: SqlValue[] = [];
    const assign = (column: string, value: SqlValue | undefined) => {
      if (value !== undefined) {
        fields.push(`${column} = ?`);
        values.push(value);
      }
    };

    assign("url", updates.url);
    assign("name", updates.name);
    assign("status", updates.status);
    assign("progress", updates.progress);
    assign("current_url", updates.currentUrl);
    assign("chunks_added", updates.chunksAdded);
    assign("total_chunks", updates.totalChunks);
    assign("error", updates.error);
    assign("processed_urls", updates.processedUrls);
    assign("total_urls", updates.totalUrls);
    assign("failed_urls", updates.failedUrls);
    assign("updated_at", updates.updatedAt ?? Date.now());

    values.push(id);
    this.guard("updateSite", () => {
      this.db.prepare<[SqlValue[]]>(`UPDATE sites SET ${fields.join(", ")} WHERE id = ?`).run(values);
    });
  }

  deleteSite(id: string): boolean {
    return this.guard("deleteSite", () => {
      const tx = this.db.transaction((siteId: string) => {
        this.db.prepare<[string]>(`DELETE FROM chunks_fts WHERE site_id = ?`).run(siteId);
        return this.db.prepare<[string]>(`DELETE FROM sites WHERE id = ?`).run(siteId).changes > 0;
      });
      return tx(id);
    });
  }

  insertChunks(chunks: NewChunk[]): ChunkRecord[] {
    if (chunks.length === 0) return [];

    return this.guard("insertChunks", () => {
      const insertChunk = this.db.prepare<[SqlValue[]]>(`
        INSERT INTO chunks (id, site_id, text, source_url, title, position, created_at)
        VALUES (?, ?, ?, ?, ?, ?, ?)
      `);
      const insertFts = this.db.prepare<[SqlValue[]]>(`
        INSERT INTO chunks_fts (chunk_id, site_id, title, text) VALUES (?, ?, ?, ?)
      `);

      const tx = this.db.transaction((batch: NewChunk[]) => {
        const now = Date.now();
        return batch.map(chunk => {
          const record: ChunkRecord = { ...chunk, id: randomUUID(), createdAt: now };
          insertChunk.run([record.id, record.siteId, record.text, record.sourceUrl, record.title, record.position, now]);
          insertFts.run([record.id, record.siteId, record.title, record.text]);
          return record;
        });
      });
      return tx(chunks);
    });
  }

  getChunks(ids: string[]): ChunkRecord[] {
    if (ids.length === 0) return [];

    return this.guard("getChunks", () => {
      const placeholders = ids.map(() => "?").join(", ");
      return this.db
        .prepare<string[], ChunkRow>(`SELECT * FROM chunks WHERE id IN (${placeholders})`)
        .all(...ids)
        .map(row => this.rowToChunk(row));
    });
  }

  countChunks(siteId?: string): number {
    return this.guard("countChunks", () => {
      const row = siteId === undefined
        ? this.db.prepare<[], { count: number }>(`SELECT COUNT(*) AS count FROM chunks`).get()
        : this.db.prepare<[string], { count: number }>(`SELECT COUNT(*) AS count FROM chunks WHERE site_id = ?`).get(siteId);
      return row?.count ?? 0;
    });
  }

  deleteChunksForSite(siteId: string): number {
    return this.guard("deleteChunksForSite", () => {
      const tx = this.db.transaction((id: string) => {
        this.db.prepare<[string]>(`DELETE FROM chunks_fts WHERE site_id = ?`).run(id);
        return this.db.prepare<[string]>(`DELETE FROM chunks WHERE site_id = ?`).run(id).changes;
      });
      return tx(siteId);
    });
  }

  searchKeyword(query: string, topK: number): KeywordMatch[] {
    const ftsQuery = buildFtsQuery(query);
    if (!ftsQuery || topK <= 0) return [];

    return this.guard("searchKeyword", () =>
      this.db
        .prepare<[string, number], KeywordRow>(`
          SELECT chunk_id, bm25(chunks_fts) AS score
          FROM chunks_fts
          WHERE chunks_fts MATCH ?
          ORDER BY score ASC, chunk_id ASC
          LIMIT ?
        `)
        .all(ftsQuery, topK)
        .map(row => ({ chunkId: row.chunk_id, bm25: row.score }))
    );
  }

  clear(): void {
    this.guard("clear", () => {
      this.db.transaction(() => {
        this.db.exec(`DELETE FROM chunks_fts; DELETE FROM chunks; DELETE FROM sites;`);
      })();
    });
  }

  close(): void {
    this.db.close();
  }

  private guard<T>(operation: string, fn: () => T): T {
    try {
      return fn();
    } catch (error) {
      throw new IndexError(`Site store ${operation} failed: ${errorMessage(error)}`, { cause: error });
    }
  }

  private rowToSite(row: SiteRow): Site {
    return {
      id: row.id,
      url: row.url,
      name: row.name,
      status: toStatus(row.status),
      progress: row.progress,
      currentUrl: row.current_url,
      chunksAdded: row.chunks_added,
      totalChunks: row.total_chunks,
      error: row.error,
      processedUrls: row.processed_urls,
      totalUrls: row.total_urls,
      failedUrls: row.failed_urls,
      createdAt: row.created_at,
      updatedAt: row.updated_at,
    };
  }

  private rowToChunk(row: ChunkRow): ChunkRecord {
    return {
      id: row.id,
      siteId: row.site_id,
      text: row.text,
      sourceUrl: row.source_url,
      title: row.title,
      position: row.position,
      createdAt: row.created_at,
    };
  }
}
