// Batching embedder - splits input into provider-sized batches and retries each batch as a whole

import type { Embedder, EmbeddingProvider } from "../types";
import { EmbeddingError, RetryExhaustedError, errorMessage } from "../errors";
import { RetryPolicy, classifyNetworkError, type ErrorClass } from "../utils/retry";

export interface BatchingEmbedderOptions {
  batchSize: number;
  retry?: RetryPolicy;
}

export function classifyEmbeddingError(error: unknown): ErrorClass {
  if (error instanceof EmbeddingError) {
    return error.kind === "transient" ? "transient" : "permanent";
  }
  return classifyNetworkError(error);
}

export class BatchingEmbedder implements Embedder {
  readonly batchSize: number;
  private retry: RetryPolicy;

  constructor(
    private provider: EmbeddingProvider,
    options: BatchingEmbedderOptions
  ) {
    this.batchSize = Math.max(1, options.batchSize);
    this.retry = options.retry ?? new RetryPolicy({ classify: classifyEmbeddingError });
  }

  get dimensions(): number {
    return this.provider.dimensions;
  }

  async embed(texts: string[], signal?: AbortSignal): Promise<number[][]> {
    const results: number[][] = [];
    const batches = Math.ceil(texts.length / this.batchSize);

    for (let i = 0; i < texts.length; i += this.batchSize) {
      const batch = texts.slice(i, i + this.batchSize);
      const label = `${this.provider.name} batch ${i / this.batchSize + 1}/${batches}`;
      const vectors = await this.embedBatch(batch, label, signal);
      results.push(...vectors);
    }

    return results;
  }

  async embedQuery(text: string, signal?: AbortSignal): Promise<number[]> {
    const [vector] = await this.embedBatch([text], `${this.provider.name} query`, signal);
    if (!vector) {
      throw new EmbeddingError("Embedding provider returned no vector for the query", "exhausted");
    }
    return vector;
  }

  private async embedBatch(batch: string[], label: string, signal?: AbortSignal): Promise<number[][]> {
    let vectors: number[][];
    try {
      vectors = await this.retry.execute(() => this.provider.embedBatch(batch, signal), {
        signal,
        label,
        onRetry: (error, attempt, delayMs) => {
          console.warn(
            `[embed] ${label}: ${errorMessage(error)}, attempt ${attempt}/${this.retry.maxAttempts}, retrying in ${Math.round(delayMs)}ms`
          );
        },
      });
    } catch (error) {
      if (error instanceof RetryExhaustedError) {
        throw new EmbeddingError(
          `Embedding service unavailable after ${error.attempts} attempts: ${errorMessage(error.lastError)}`,
          "exhausted",
          null,
          { cause: error }
        );
      }
      throw error;
    }

    if (vectors.length !== batch.length) {
      throw new EmbeddingError(
        `Embedding provider returned ${vectors.length} vectors for ${batch.length} texts`,
        "exhausted"
      );
    }
    return vectors;
  }
}
