// Local embedding provider - signed feature hashing of term frequencies, no network

import type { EmbeddingProvider } from "../types";

export interface LocalEmbeddingOptions {
  dimensions?: number;
}

export class LocalEmbeddingProvider implements EmbeddingProvider {
  readonly name = "local";
  readonly dimensions: number;

  constructor(options?: LocalEmbeddingOptions) {
    this.dimensions = options?.dimensions ?? 384;
  }

  async embedBatch(texts: string[], signal?: AbortSignal): Promise<number[][]> {
    signal?.throwIfAborted();
    return texts.map(text => this.embedText(text));
  }

  private embedText(text: string): number[] {
    const tokens = tokenize(text);
    const vector = new Array<number>(this.dimensions).fill(0);
    if (tokens.length === 0) {
      return vector;
    }

    for (const [token, freq] of termFrequencies(tokens)) {
      const hash = hashString(token);
      const idx = Math.abs(hash) % this.dimensions;
      const sign = hash >= 0 ? 1 : -1;
      vector[idx] = (vector[idx] ?? 0) + freq * sign;
    }

    return normalize(vector);
  }
}

export function tokenize(text: string): string[] {
  return text
    .toLowerCase()
    .replace(/[^\p{L}\p{N}\s]/gu, " ")
    .split(/\s+/)
    .filter(t => t.length > 2);
}

function termFrequencies(tokens: string[]): Map<string, number> {
  const tf = new Map<string, number>();
  for (const token of tokens) {
    tf.set(token, (tf.get(token) ?? 0) + 1);
  }
  for (const [token, count] of tf) {
    tf.set(token, count / tokens.length);
  }
  return tf;
}

function hashString(str: string): number {
  let hash = 0;
  for (let i = 0; i < str.length; i++) {
    hash = ((hash << 5) - hash) + str.charCodeAt(i);
    hash |= 0;
  }
  return hash;
}

function normalize(vector: number[]): number[] {
  const magnitude = Math.sqrt(vector.reduce((sum, v) => sum + v * v, 0));
  if (magnitude === 0) return vector;
  return vector.map(v => v / magnitude);
}
