// Shared fixtures for the test suite: sites, an in-process site map and a deterministic embedder

import type { DocsageConfig, Embedder, FetchedPage, PageFetcher, Site } from "../src/types";
import { FetchError } from "../src/errors";
import { DocExtractor } from "../src/crawler/extractor";
import { LocalEmbeddingProvider } from "../src/embedding/local";
import { BatchingEmbedder, classifyEmbeddingError } from "../src/embedding/embedder";
import { RetryPolicy } from "../src/utils/retry";
import { defaultConfig } from "../src/config";

export function makeSite(overrides: Partial<Site> = {}): Site {
  return {
    id: "site-1",
    url: "https://docs.example.com/",
    name: "docs.example.com",
    status: "starting",
    progress: 0,
    currentUrl: null,
    chunksAdded: 0,
    totalChunks: null,
    error: null,
    processedUrls: 0,
    totalUrls: 0,
    failedUrls: 0,
    createdAt: 1000,
    updatedAt: 1000,
    ...overrides,
  };
}

export interface FakePage {
  body: string;
  contentType?: string;
  /** Milliseconds to wait before answering */
  delayMs?: number;
}

/**
 * Serves pages from a map of URL to body. Unknown URLs are 404s, the
 * failures map turns a URL into a network error and the redirects map
 * answers a URL with the page of another one.
 */
export class FakeSiteFetcher implements PageFetcher {
  readonly requested: string[] = [];
  inFlight = 0;
  maxInFlight = 0;
  private extractor = new DocExtractor();

  constructor(
    private pages: Map<string, FakePage>,
    private failures: Map<string, FetchError> = new Map(),
    private redirects: Map<string, string> = new Map()
  ) {}

  async fetch(url: string, signal?: AbortSignal): Promise<FetchedPage> {
    signal?.throwIfAborted();
    this.requested.push(url);
    this.inFlight++;
    this.maxInFlight = Math.max(this.maxInFlight, this.inFlight);
    try {
      const finalUrl = this.redirects.get(url) ?? url;
      const page = this.pages.get(finalUrl);
      await delay(page?.delayMs ?? 1, signal);

      const failure = this.failures.get(url);
      if (failure) throw failure;
      if (!page) {
        throw new FetchError(`HTTP 404: ${url}`, "permanent", url, 404);
      }

      const contentType = page.contentType ?? "text/markdown";
      const extracted = await this.extractor.extract(page.body, finalUrl, contentType);
      return { ...extracted, contentType, statusCode: 200 };
    } finally {
      this.inFlight--;
    }
  }
}

export function delay(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    const timer = setTimeout(resolve, ms);
    const abortSignal = signal;
    if (!abortSignal) return;
    abortSignal.addEventListener("abort", () => {
      clearTimeout(timer);
      reject(abortSignal.reason);
    }, { once: true });
  });
}

/** Markdown page linking to the given paths */
export function markdownPage(title: string, body: string, links: string[] = []): FakePage {
  const linkLines = links.map(link => `- [${link}](${link})`).join("\n");
  return { body: `# ${title}\n\n${body}${linkLines ? `\n\n${linkLines}` : ""}` };
}

export function localEmbedder(batchSize = 4): Embedder {
  return new BatchingEmbedder(new LocalEmbeddingProvider({ dimensions: 64 }), {
    batchSize,
    retry: new RetryPolicy({ maxAttempts: 2, baseDelayMs: 1, jitter: false, classify: classifyEmbeddingError }),
  });
}

export function testConfig(dataDir: string): DocsageConfig {
  const config = defaultConfig(dataDir);
  return {
    ...config,
    crawler: {
      ...config.crawler,
      concurrency: 3,
      requestDelay: 0,
      maxAttempts: 2,
      baseDelayMs: 1,
      useSitemap: false,
    },
    chunking: { chunkSize: 300, chunkOverlap: 30 },
  };
}
