// OpenAI-compatible embedding provider (/embeddings)

import { z } from "zod/v4";
import type { EmbeddingProvider, EmbeddingConfig } from "../types";
import { EmbeddingError, errorMessage, isAbortError } from "../errors";
import { isTransientStatus, parseRetryAfter } from "../crawler/fetcher";

const EmbeddingResponseSchema = z.object({
  data: z.array(z.object({
    embedding: z.array(z.number()),
    index: z.number().int(),
  })),
});

export class OpenAIEmbeddingProvider implements EmbeddingProvider {
  readonly name = "openai";
  readonly dimensions: number;

  private apiKey: string;
  private model: string;
  private apiBase: string;

  constructor(config: EmbeddingConfig) {
    if (!config.apiKey) {
      throw new EmbeddingError("OpenAI API key is required (embedding.apiKey)", "exhausted");
    }

    this.apiKey = config.apiKey;
    this.model = config.model || "text-embedding-3-small";
    this.apiBase = (config.apiBase || "https://api.openai.com/v1").replace(/\/+$/, "");
    this.dimensions = this.model.includes("3-large") ? 3072 : 1536;
  }

  async embedBatch(texts: string[], signal?: AbortSignal): Promise<number[][]> {
    let response: Response;
    try {
      response = await fetch(`${this.apiBase}/embeddings`, {
        method: "POST",
        headers: {
          "Authorization": `Bearer ${this.apiKey}`,
          "Content-Type": "application/json",
        },
        body: JSON.stringify({
          input: texts,
          model: this.model,
        }),
        signal,
      });
    } catch (error) {
      if (signal?.aborted || isAbortError(error)) throw error;
      throw new EmbeddingError(`OpenAI embeddings request failed: ${errorMessage(error)}`, "transient", null, { cause: error });
    }

    if (!response.ok) {
      const body = await response.text();
      const message = `OpenAI API error: ${response.status} ${body.slice(0, 200)}`;
      if (isTransientStatus(response.status)) {
        throw new EmbeddingError(message, "transient", parseRetryAfter(response.headers.get("Retry-After")));
      }
      throw new EmbeddingError(message, "exhausted");
    }

    const parsed = EmbeddingResponseSchema.safeParse(await response.json());
    if (!parsed.success || parsed.data.data.length !== texts.length) {
      throw new EmbeddingError("OpenAI API returned a malformed embeddings response", "exhausted");
    }

    return [...parsed.data.data]
      .sort((a, b) => a.index - b.index)
      .map(d => d.embedding);
  }
}
