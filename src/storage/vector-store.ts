// Local vector store - in-memory cosine search, persisted as one JSON file per site

import { mkdir, readFile, readdir, rename, rm, writeFile } from "fs/promises";
import { basename, join } from "path";
import type { IndexedVector, VectorIndex, VectorMatch } from "../types";
import { IndexError, errorMessage } from "../errors";

interface StoredVector {
  chunkId: string;
  vector: number[];
}

interface SiteIndexFile {
  siteId: string;
  dimensions: number;
  vectors: StoredVector[];
}

const FILE_PATTERN = /^site-.+\.json$/;

function isStoredVector(value: unknown): value is StoredVector {
  if (typeof value !== "object" || value === null) return false;
  if (!("chunkId" in value) || typeof value.chunkId !== "string") return false;
  return "vector" in value && Array.isArray(value.vector) && value.vector.every(n => typeof n === "number");
}

function isSiteIndexFile(value: unknown): value is SiteIndexFile {
  if (typeof value !== "object" || value === null) return false;
  if (!("siteId" in value) || typeof value.siteId !== "string") return false;
  if (!("dimensions" in value) || typeof value.dimensions !== "number") return false;
  return "vectors" in value && Array.isArray(value.vectors) && value.vectors.every(isStoredVector);
}

export function cosineSimilarity(a: number[], b: number[]): number {
  if (a.length !== b.length) {
    throw new IndexError(`Vector length mismatch: ${a.length} vs ${b.length}`);
  }

  let dotProduct = 0;
  let normA = 0;
  let normB = 0;

  for (let i = 0; i < a.length; i++) {
    const x = a[i] ?? 0;
    const y = b[i] ?? 0;
    dotProduct += x * y;
    normA += x * x;
    normB += y * y;
  }

  normA = Math.sqrt(normA);
  normB = Math.sqrt(normB);

  if (normA === 0 || normB === 0) {
    return 0;
  }

  return dotProduct / (normA * normB);
}

export class LocalVectorStore implements VectorIndex {
  readonly name = "local";
  private sites: Map<string, Map<string, number[]>> = new Map();
  private dimensions = 0;
  private writes: Map<string, Promise<void>> = new Map();

  constructor(private dataDir: string) {}

  async load(): Promise<void> {
    await mkdir(this.dataDir, { recursive: true });
    const files = (await readdir(this.dataDir)).filter(file => FILE_PATTERN.test(file)).sort();

    for (const file of files) {
      const path = join(this.dataDir, file);
      let parsed: unknown;
      try {
        parsed = JSON.parse(await readFile(path, "utf8"));
      } catch (error) {
        console.warn(`[vectors] Skipping unreadable index ${path}: ${errorMessage(error)}`);
        continue;
      }
      if (!isSiteIndexFile(parsed)) {
        console.warn(`[vectors] Skipping malformed index ${path}`);
        continue;
      }

      const vectors = new Map<string, number[]>();
      for (const stored of parsed.vectors) {
        vectors.set(stored.chunkId, stored.vector);
      }
      this.sites.set(parsed.siteId, vectors);
      if (this.dimensions === 0 && parsed.dimensions > 0) {
        this.dimensions = parsed.dimensions;
      }
    }
  }

  upsert(vectors: IndexedVector[]): Promise<void> {
    let dimensions = this.dimensions;
    for (const entry of vectors) {
      if (dimensions === 0) dimensions = entry.vector.length;
      if (entry.vector.length !== dimensions) {
        return Promise.reject(
          new IndexError(`Vector for chunk ${entry.chunkId} has ${entry.vector.length} dimensions, index has ${dimensions}`)
        );
      }
    }
    this.dimensions = dimensions;

    const touched = new Set<string>();
    for (const entry of vectors) {
      let site = this.sites.get(entry.siteId);
      if (!site) {
        site = new Map();
        this.sites.set(entry.siteId, site);
      }
      site.set(entry.chunkId, entry.vector);
      touched.add(entry.siteId);
    }

    return Promise.all([...touched].map(siteId => this.persist(siteId))).then(() => undefined);
  }

  deleteBySite(siteId: string): Promise<void> {
    this.sites.delete(siteId);
    if (this.sites.size === 0) {
      this.dimensions = 0;
    }
    return this.persist(siteId);
  }

  async search(queryVector: number[], k: number): Promise<VectorMatch[]> {
    if (k <= 0 || this.dimensions === 0) {
      return [];
    }
    if (queryVector.length !== this.dimensions) {
      throw new IndexError(`Query vector has ${queryVector.length} dimensions, index has ${this.dimensions}`);
    }

    const scored: VectorMatch[] = [];
    for (const vectors of this.sites.values()) {
      for (const [chunkId, vector] of vectors) {
        scored.push({ chunkId, score: cosineSimilarity(queryVector, vector) });
      }
    }

    scored.sort((a, b) => b.score - a.score || (a.chunkId < b.chunkId ? -1 : a.chunkId > b.chunkId ? 1 : 0));
    return scored.slice(0, k);
  }

  clear(): Promise<void> {
    const siteIds = [...this.sites.keys()];
    this.sites.clear();
    this.dimensions = 0;
    return Promise.all(siteIds.map(siteId => this.persist(siteId)))
      .then(() => this.removeStrayFiles());
  }

  count(siteId?: string): number {
    if (siteId !== undefined) {
      return this.sites.get(siteId)?.size ?? 0;
    }
    let total = 0;
    for (const vectors of this.sites.values()) {
      total += vectors.size;
    }
    return total;
  }

  private getIndexPath(siteId: string): string {
    const sanitized = siteId.replace(/[^a-zA-Z0-9-_]/g, "_");
    return join(this.dataDir, `site-${sanitized}.json`);
  }

  // Writes for one site run in call order; each writes whatever state is current
  private persist(siteId: string): Promise<void> {
    const previous = this.writes.get(siteId) ?? Promise.resolve();
    const run = () => this.writeSite(siteId);
    const next = previous.then(run, run);
    this.writes.set(siteId, next);
    return next.finally(() => {
      if (this.writes.get(siteId) === next) {
        this.writes.delete(siteId);
      }
    });
  }

  private async writeSite(siteId: string): Promise<void> {
    const path = this.getIndexPath(siteId);
    const vectors = this.sites.get(siteId);

    try {
      if (!vectors) {
        await rm(path, { force: true });
        return;
      }

      const data: SiteIndexFile = {
        siteId,
        dimensions: this.dimensions,
        vectors: [...vectors].map(([chunkId, vector]) => ({ chunkId, vector })),
      };
      await mkdir(this.dataDir, { recursive: true });
      const tmpPath = `${path}.tmp`;
      await writeFile(tmpPath, JSON.stringify(data));
      await rename(tmpPath, path);
    } catch (error) {
      throw new IndexError(`Failed to persist vectors for site ${siteId}: ${errorMessage(error)}`, { cause: error });
    }
  }

  private async removeStrayFiles(): Promise<void> {
    let files: string[];
    try {
      files = await readdir(this.dataDir);
    } catch (error) {
      throw new IndexError(`Failed to read vector directory ${this.dataDir}: ${errorMessage(error)}`, { cause: error });
    }
    const live = new Set([...this.sites.keys()].map(siteId => basename(this.getIndexPath(siteId))));
    await Promise.all(
      files
        .filter(file => FILE_PATTERN.test(file) && !live.has(file))
        .map(file => rm(join(this.dataDir, file), { force: true }))
    );
  }
}
