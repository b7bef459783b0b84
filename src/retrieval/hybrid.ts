// Hybrid retriever - vector and FTS5 keyword candidates merged by reciprocal-rank fusion

import type { Embedder, Retriever, SiteStore, SourcePassage, VectorIndex } from "../types";
import { IndexError, errorMessage } from "../errors";

export interface HybridRetrieverDeps {
  store: SiteStore;
  vectors: VectorIndex;
  embedder: Embedder;
}

export interface HybridRetrieverOptions {
  /** Candidates taken from each list before fusion */
  candidates?: number;
  /** Damping constant c in 1 / (rank + c) */
  rrfK?: number;
  previewChars?: number;
}

export interface FusedCandidate {
  chunkId: string;
  score: number;
}

function compareIds(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Sums 1 / (rank + c) over every list a chunk appears in (ranks are
 * 1-based). Sorted by score, then chunk id.
 */
export function reciprocalRankFusion(lists: string[][], c: number): FusedCandidate[] {
  const scores = new Map<string, number>();

  for (const list of lists) {
    const seen = new Set<string>();
    list.forEach((chunkId, index) => {
      if (seen.has(chunkId)) return;
      seen.add(chunkId);
      scores.set(chunkId, (scores.get(chunkId) ?? 0) + 1 / (index + 1 + c));
    });
  }

  return [...scores]
    .map(([chunkId, score]) => ({ chunkId, score }))
    .sort((a, b) => b.score - a.score || compareIds(a.chunkId, b.chunkId));
}

export function queryTerms(query: string): string[] {
  return [...new Set(
    query
      .toLowerCase()
      .replace(/[^\p{L}\p{N}\s]/gu, " ")
      .split(/\s+/)
      .filter(term => term.length > 1)
  )];
}

/** Window of at most maxChars characters around the earliest query term match */
export function buildPreview(text: string, query: string, maxChars: number): string {
  const flat = text.replace(/\s+/g, " ").trim();
  if (flat.length <= maxChars) {
    return flat;
  }

  const lower = flat.toLowerCase();
  let matchAt = -1;
  let matchLength = 0;
  for (const term of queryTerms(query)) {
    const index = lower.indexOf(term);
    if (index >= 0 && (matchAt < 0 || index < matchAt)) {
      matchAt = index;
      matchLength = term.length;
    }
  }

  let start = matchAt < 0 ? 0 : Math.max(0, matchAt - Math.floor((maxChars - matchLength) / 2));
  const end = Math.min(flat.length, start + maxChars);
  start = Math.max(0, end - maxChars);

  const window = flat.slice(start, end).trim();
  return `${start > 0 ? "..." : ""}${window}${end < flat.length ? "..." : ""}`;
}

export class HybridRetriever implements Retriever {
  private candidates: number;
  private rrfK: number;
  private previewChars: number;

  constructor(private deps: HybridRetrieverDeps, options?: HybridRetrieverOptions) {
    this.candidates = options?.candidates ?? 20;
    this.rrfK = options?.rrfK ?? 60;
    this.previewChars = options?.previewChars ?? 200;
  }

  async retrieve(query: string, k: number): Promise<SourcePassage[]> {
    const trimmed = query.trim();
    if (!trimmed || k <= 0) {
      return [];
    }

    const n = Math.max(k, this.candidates);
    const [vectorResult, keywordResult] = await Promise.allSettled([
      this.vectorCandidates(trimmed, n),
      Promise.resolve().then(() => this.deps.store.searchKeyword(trimmed, n).map(match => match.chunkId)),
    ]);

    const lists: string[][] = [];
    if (vectorResult.status === "fulfilled") {
      lists.push(vectorResult.value);
    } else {
      console.warn(`[retrieve] Vector search unavailable, using keyword results: ${errorMessage(vectorResult.reason)}`);
    }
    if (keywordResult.status === "fulfilled") {
      lists.push(keywordResult.value);
    } else {
      console.warn(`[retrieve] Keyword search unavailable, using vector results: ${errorMessage(keywordResult.reason)}`);
    }

    if (vectorResult.status === "rejected" && keywordResult.status === "rejected") {
      throw new IndexError(
        `Retrieval failed: ${errorMessage(vectorResult.reason)}; ${errorMessage(keywordResult.reason)}`,
        { cause: vectorResult.reason }
      );
    }

    const fused = reciprocalRankFusion(lists, this.rrfK);
    if (fused.length === 0) {
      return [];
    }

    const records = new Map(this.deps.store.getChunks(fused.map(c => c.chunkId)).map(r => [r.id, r]));
    const passages: SourcePassage[] = [];
    for (const candidate of fused) {
      const record = records.get(candidate.chunkId);
      if (!record) continue;

      passages.push({
        chunkId: record.id,
        siteId: record.siteId,
        title: record.title,
        url: record.sourceUrl,
        preview: buildPreview(record.text, trimmed, this.previewChars),
        score: candidate.score,
        position: record.position,
      });
      if (passages.length >= k) break;
    }
    return passages;
  }

  private async vectorCandidates(query: string, n: number): Promise<string[]> {
    const queryVector = await this.deps.embedder.embedQuery(query);
    const matches = await this.deps.vectors.search(queryVector, n);
    // Unrelated chunks score 0 and are not candidates
    return matches.filter(match => match.score > 0).map(match => match.chunkId);
  }
}
