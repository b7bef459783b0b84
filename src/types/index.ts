// Core types and interfaces for docsage

export const SITE_STATUSES = ["starting", "finding_urls", "crawling", "completed", "error"] as const;

export type SiteStatus = (typeof SITE_STATUSES)[number];

export interface SiteInput {
  /** Root URL of the documentation site (e.g., "https://docs.example.com") */
  url: string;
  /** Optional display name (defaults to the URL host) */
  name?: string;
}

export interface Site {
  id: string;
  url: string;
  name: string;
  status: SiteStatus;
  /** 0-100, never decreases within one crawl attempt */
  progress: number;
  currentUrl: string | null;
  chunksAdded: number;
  /** Set only once the crawl has completed */
  totalChunks: number | null;
  /** Set only in the error state */
  error: string | null;
  processedUrls: number;
  totalUrls: number;
  failedUrls: number;
  createdAt: number;
  updatedAt: number;
}

export interface ChunkRecord {
  id: string;
  siteId: string;
  text: string;
  sourceUrl: string;
  title: string;
  /** Ordinal within the source page */
  position: number;
  createdAt: number;
}

export type NewChunk = Omit<ChunkRecord, "id" | "createdAt">;

export interface HeadingInfo {
  level: number;
  text: string;
  offset: number;
}

export interface ExtractedContent {
  url: string;
  title: string;
  content: string;
  links: string[];
  headings: HeadingInfo[];
}

export interface FetchedPage extends ExtractedContent {
  contentType: string;
  statusCode: number;
}

export interface PageFetcher {
  /** Fetch and extract a page; rejects with FetchError */
  fetch(url: string, signal?: AbortSignal): Promise<FetchedPage>;
}

export interface Extractor {
  extract(content: string, url: string, contentType: string): Promise<ExtractedContent>;
}

/** Chunk produced by the chunker, before it is written anywhere */
export interface TextChunk {
  text: string;
  title: string;
  position: number;
  startOffset: number;
  endOffset: number;
}

export interface ChunkSource {
  url: string;
  title: string;
}

export interface Chunker {
  split(text: string, source: ChunkSource): TextChunk[];
}

export interface EmbeddingProvider {
  readonly name: string;
  readonly dimensions: number;
  /** Embed one batch in a single provider call */
  embedBatch(texts: string[], signal?: AbortSignal): Promise<number[][]>;
}

export interface Embedder {
  readonly batchSize: number;
  embed(texts: string[], signal?: AbortSignal): Promise<number[][]>;
  embedQuery(text: string, signal?: AbortSignal): Promise<number[]>;
}

export interface IndexedVector {
  chunkId: string;
  siteId: string;
  vector: number[];
}

export interface VectorMatch {
  chunkId: string;
  score: number;
}

/**
 * Opaque nearest-neighbour store. In-memory state changes synchronously when a
 * method is called; the returned promise settles once the change is persisted.
 */
export interface VectorIndex {
  readonly name: string;
  load(): Promise<void>;
  upsert(vectors: IndexedVector[]): Promise<void>;
  deleteBySite(siteId: string): Promise<void>;
  search(queryVector: number[], k: number): Promise<VectorMatch[]>;
  clear(): Promise<void>;
  count(siteId?: string): number;
}

export interface KeywordMatch {
  chunkId: string;
  /** Raw bm25 value, lower is better */
  bm25: number;
}

export interface SiteStore {
  createSite(site: Site): void;
  getSite(id: string): Site | null;
  listSites(): Site[];
  updateSite(id: string, updates: Partial<Omit<Site, "id" | "createdAt">>): void;
  deleteSite(id: string): boolean;

  insertChunks(chunks: NewChunk[]): ChunkRecord[];
  getChunks(ids: string[]): ChunkRecord[];
  countChunks(siteId?: string): number;
  deleteChunksForSite(siteId: string): number;

  searchKeyword(query: string, topK: number): KeywordMatch[];
  clear(): void;
  close(): void;
}

export interface SourcePassage {
  chunkId: string;
  siteId: string;
  title: string;
  url: string;
  preview: string;
  score: number;
  position: number;
}

export interface Retriever {
  retrieve(query: string, k: number): Promise<SourcePassage[]>;
}

export interface AnswerPrompt {
  question: string;
  passages: SourcePassage[];
  /** Full chunk texts in passage order, used as generation context */
  contexts: string[];
}

export interface AnswerGenerator {
  readonly name: string;
  generate(prompt: AnswerPrompt, signal?: AbortSignal): AsyncIterable<string>;
}

// Progress events

export type CrawlEvent =
  | { type: "site_added"; site: Site }
  | {
      type: "crawl_progress";
      siteId: string;
      status: SiteStatus;
      progress: number;
      currentUrl: string | null;
      chunksAdded: number;
      processedUrls: number;
      totalUrls: number;
    }
  | { type: "crawl_completed"; siteId: string; totalChunks: number }
  | { type: "crawl_error"; siteId: string; error: string }
  | { type: "site_deleted"; siteId: string }
  | { type: "database_cleared" };

/** Catch-up message sent to a new subscriber for every known site */
export interface SiteStatusMessage {
  type: "site_status";
  site: Site;
}

export type ProgressMessage = CrawlEvent | SiteStatusMessage;

export type ProgressObserver = (message: ProgressMessage) => void;

export interface SubscriptionHandle {
  readonly id: number;
}

export interface RecordedEvent {
  seq: number;
  at: number;
  event: CrawlEvent;
}

// Chat messages

export type ChatMessage =
  | { type: "typing"; isTyping: boolean; messageId: string }
  | { type: "sources"; sources: SourcePassage[]; messageId: string }
  | {
      type: "chat_response";
      response: string;
      messageId: string;
      isComplete: boolean;
      sources?: SourcePassage[];
      error?: string;
    };

// Configuration

export type CrawlScope = "host" | "domain" | "path";

export interface DocsageConfig {
  /** Data directory (defaults to ~/.docsage) */
  dataDir: string;
  embedding: EmbeddingConfig;
  generator: GeneratorConfig;
  worker: WorkerConfig;
  crawler: CrawlerConfig;
  chunking: ChunkingConfig;
  retrieval: RetrievalConfig;
}

export interface EmbeddingConfig {
  /** Provider type: "local" | "openai" */
  provider: "local" | "openai";
  model?: string;
  apiKey?: string;
  apiBase?: string;
  /** Maximum texts per provider call */
  batchSize: number;
  /** Attempts per batch before the embedder gives up */
  maxAttempts: number;
  baseDelayMs: number;
}

export interface GeneratorConfig {
  /** Provider type: "extractive" | "openai" */
  provider: "extractive" | "openai";
  model?: string;
  apiKey?: string;
  apiBase?: string;
}

export interface WorkerConfig {
  port: number;
  host: string;
}

export interface CrawlerConfig {
  /** Maximum concurrent fetches per site */
  concurrency: number;
  /** Delay between fetch starts for one site (ms) */
  requestDelay: number;
  /** Request timeout (ms) */
  timeout: number;
  /** Maximum pages to crawl per site */
  maxPages: number;
  /** Maximum link depth from the root page */
  maxDepth: number;
  /** Which discovered links are in scope */
  scope: CrawlScope;
  userAgent: string;
  /** Fetch attempts per URL for transient failures */
  maxAttempts: number;
  baseDelayMs: number;
  /** Look for sitemap.xml during URL discovery */
  useSitemap: boolean;
}

export interface ChunkingConfig {
  chunkSize: number;
  chunkOverlap: number;
}

export interface RetrievalConfig {
  /** Passages returned to chat */
  topK: number;
  /** Candidates pulled from each list before fusion */
  candidates: number;
  /** Reciprocal-rank fusion damping constant */
  rrfK: number;
  previewChars: number;
}
