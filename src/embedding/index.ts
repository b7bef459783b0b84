// Embedding providers - barrel export and factories

import type { EmbeddingConfig, EmbeddingProvider } from "../types";
import { RetryPolicy } from "../utils/retry";
import { BatchingEmbedder, classifyEmbeddingError } from "./embedder";
import { LocalEmbeddingProvider } from "./local";
import { OpenAIEmbeddingProvider } from "./openai";

export { LocalEmbeddingProvider } from "./local";
export { OpenAIEmbeddingProvider } from "./openai";
export { BatchingEmbedder, classifyEmbeddingError } from "./embedder";

export function createEmbeddingProvider(config: EmbeddingConfig): EmbeddingProvider {
  switch (config.provider) {
    case "openai":
      return new OpenAIEmbeddingProvider(config);
    case "local":
    default:
      return new LocalEmbeddingProvider();
  }
}

export function createEmbedder(config: EmbeddingConfig, provider = createEmbeddingProvider(config)): BatchingEmbedder {
  return new BatchingEmbedder(provider, {
    batchSize: config.batchSize,
    retry: new RetryPolicy({
      maxAttempts: config.maxAttempts,
      baseDelayMs: config.baseDelayMs,
      classify: classifyEmbeddingError,
    }),
  });
}
