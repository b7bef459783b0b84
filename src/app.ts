// App context - every component constructed once and passed by reference

import { mkdir } from "fs/promises";
import { join } from "path";
import type { AnswerGenerator, DocsageConfig, Embedder, PageFetcher, SiteStore, VectorIndex } from "./types";
import { SQLiteSiteStore, LocalVectorStore } from "./storage";
import { createEmbedder } from "./embedding";
import { ProgressBus } from "./progress/bus";
import { CrawlOrchestrator } from "./crawler/orchestrator";
import { HttpFetcher } from "./crawler/fetcher";
import { TextChunker } from "./crawler/chunker";
import { SitemapDiscovery } from "./crawler/sitemap";
import { HybridRetriever } from "./retrieval/hybrid";
import { createAnswerGenerator } from "./chat/generator";
import { ChatService } from "./chat/service";
import { errorMessage } from "./errors";

export interface AppContext {
  config: DocsageConfig;
  store: SiteStore;
  vectors: VectorIndex;
  embedder: Embedder;
  bus: ProgressBus;
  orchestrator: CrawlOrchestrator;
  retriever: HybridRetriever;
  chat: ChatService;
  /** Cancels running crawls, waits for them and closes the database */
  close(): Promise<void>;
}

/** Replacements for the components that reach the network or disk */
export interface AppOverrides {
  store?: SiteStore;
  vectors?: VectorIndex;
  fetcher?: PageFetcher;
  embedder?: Embedder;
  generator?: AnswerGenerator;
  /** Set to null to skip sitemap discovery */
  sitemap?: SitemapDiscovery | null;
}

export async function createAppContext(config: DocsageConfig, overrides: AppOverrides = {}): Promise<AppContext> {
  let store = overrides.store;
  if (!store) {
    await mkdir(join(config.dataDir, "db"), { recursive: true });
    store = new SQLiteSiteStore(join(config.dataDir, "db", "docsage.sqlite"));
  }

  const vectors = overrides.vectors ?? new LocalVectorStore(join(config.dataDir, "vectors"));
  await vectors.load();

  const embedder = overrides.embedder ?? createEmbedder(config.embedding);
  const bus = new ProgressBus();

  const orchestrator = new CrawlOrchestrator({
    store,
    vectors,
    embedder,
    bus,
    crawler: config.crawler,
    fetcher: overrides.fetcher ?? new HttpFetcher({
      userAgent: config.crawler.userAgent,
      timeout: config.crawler.timeout,
    }),
    chunker: new TextChunker(config.chunking),
    sitemap: overrides.sitemap !== undefined
      ? overrides.sitemap
      : new SitemapDiscovery({ userAgent: config.crawler.userAgent, timeout: config.crawler.timeout }),
  });

  const recovered = orchestrator.recoverInterrupted();
  if (recovered > 0) {
    console.log(`[recovery] Marked ${recovered} interrupted sites as failed`);
  }
  bus.hydrate(store.listSites());

  const retriever = new HybridRetriever({ store, vectors, embedder }, {
    candidates: config.retrieval.candidates,
    rrfK: config.retrieval.rrfK,
    previewChars: config.retrieval.previewChars,
  });

  const chat = new ChatService({
    retriever,
    store,
    generator: overrides.generator ?? createAnswerGenerator(config.generator),
    topK: config.retrieval.topK,
  });

  const ownedStore = store;
  let closed = false;
  return {
    config,
    store,
    vectors,
    embedder,
    bus,
    orchestrator,
    retriever,
    chat,
    async close() {
      if (closed) return;
      closed = true;
      try {
        await orchestrator.shutdown();
      } catch (error) {
        console.error(`[app] Shutdown failed: ${errorMessage(error)}`);
      }
      ownedStore.close();
    },
  };
}
