// Crawl job - one site's crawl as an explicit state machine driven by a bounded worker pool

import type {
  Chunker,
  CrawlerConfig,
  Embedder,
  FetchedPage,
  PageFetcher,
  Site,
  SiteStatus,
  SiteStore,
  VectorIndex,
} from "../types";
import { FetchError, RetryExhaustedError, errorMessage } from "../errors";
import type { ProgressBus } from "../progress/bus";
import { RetryPolicy, sleep } from "../utils/retry";
import { classifyFetchError } from "./fetcher";
import { Frontier, type FrontierItem } from "./frontier";
import type { SitemapDiscovery } from "./sitemap";

export interface CrawlJobDeps {
  store: SiteStore;
  vectors: VectorIndex;
  fetcher: PageFetcher;
  chunker: Chunker;
  embedder: Embedder;
  bus: ProgressBus;
  crawler: CrawlerConfig;
  sitemap?: SitemapDiscovery | null;
  /** Retry policy for page fetches; built from the crawler config when omitted */
  fetchRetry?: RetryPolicy;
}

export function createFetchRetry(crawler: CrawlerConfig): RetryPolicy {
  return new RetryPolicy({
    maxAttempts: crawler.maxAttempts,
    baseDelayMs: crawler.baseDelayMs,
    classify: classifyFetchError,
  });
}

export class CrawlJob {
  readonly siteId: string;
  private readonly rootUrl: string;
  private readonly deps: CrawlJobDeps;
  private readonly retry: RetryPolicy;
  private readonly frontier: Frontier;
  private readonly controller = new AbortController();

  private status: SiteStatus = "starting";
  private progress = 0;
  private currentUrl: string | null = null;
  private chunksAdded = 0;
  private processed = 0;
  private failed = 0;
  private inFlight = 0;
  private nextAllowedFetchAt = 0;
  private cancelled = false;
  private fatal: unknown = null;
  private waiters: Array<() => void> = [];

  constructor(site: Site, deps: CrawlJobDeps) {
    this.siteId = site.id;
    this.rootUrl = site.url;
    this.deps = deps;
    this.retry = deps.fetchRetry ?? createFetchRetry(deps.crawler);
    this.frontier = new Frontier(site.url, {
      maxPages: deps.crawler.maxPages,
      maxDepth: deps.crawler.maxDepth,
      scope: deps.crawler.scope,
    });
    this.controller.signal.addEventListener("abort", () => this.notify(), { once: true });
  }

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  get state(): SiteStatus {
    return this.status;
  }

  /** Runs the job to a terminal state; never rejects */
  async run(): Promise<void> {
    try {
      this.start();
      await this.findUrls();
      await this.crawl();
      this.complete();
    } catch (error) {
      if (this.cancelled) {
        console.log(`[crawl] ${this.rootUrl}: cancelled`);
        return;
      }
      this.fail(this.fatal ?? error);
    }
  }

  /** Stop the job; nothing is committed or published for the site afterwards */
  cancel(): void {
    if (this.cancelled) return;
    this.cancelled = true;
    this.controller.abort();
  }

  start(): void {
    this.transition("starting");
    this.frontier.seed();
    console.log(`[crawl] ${this.rootUrl}: started`);
    this.publishProgress();
  }

  async findUrls(): Promise<void> {
    this.transition("finding_urls");
    this.publishProgress();

    const root = this.frontier.next();
    if (!root) {
      throw new FetchError(`Nothing to crawl at ${this.rootUrl}`, "permanent", this.rootUrl);
    }

    this.currentUrl = root.url;
    this.inFlight++;
    let page: FetchedPage;
    try {
      page = await this.fetchWithRetry(root.url);
    } catch (error) {
      if (this.signal.aborted) throw error;
      throw new FetchError(
        `Root URL unreachable: ${errorMessage(error)}`,
        error instanceof FetchError ? error.kind : "permanent",
        root.url,
        error instanceof FetchError ? error.status : null,
        null,
        { cause: error }
      );
    } finally {
      this.inFlight--;
    }

    this.frontier.markVisited(page.url);
    this.frontier.rebase(page.url);
    this.frontier.enqueue(page.links, root.depth + 1, root.url);

    if (this.deps.crawler.useSitemap && this.deps.sitemap) {
      const listed = await this.deps.sitemap.discover(this.frontier.scopeRootUrl, this.signal);
      const added = this.frontier.enqueue(listed, 1, null);
      if (added > 0) {
        console.log(`[crawl] ${this.rootUrl}: ${added} URLs queued from sitemap`);
      }
    }

    await this.indexPage(page);
    this.processed++;
    this.publishProgress();
  }

  async crawl(): Promise<void> {
    this.transition("crawling");
    this.publishProgress();

    const workers: Promise<void>[] = [];
    for (let i = 0; i < this.deps.crawler.concurrency; i++) {
      workers.push(this.worker());
    }
    await Promise.all(workers);

    if (this.signal.aborted) {
      throw this.fatal ?? this.signal.reason;
    }
  }

  complete(): void {
    this.signal.throwIfAborted();
    this.transition("completed");
    this.progress = 100;
    this.currentUrl = null;

    this.deps.store.updateSite(this.siteId, {
      status: "completed",
      progress: 100,
      currentUrl: null,
      chunksAdded: this.chunksAdded,
      totalChunks: this.chunksAdded,
      processedUrls: this.processed,
      totalUrls: this.frontier.discovered,
      failedUrls: this.failed,
    });
    this.deps.bus.publish({ type: "crawl_completed", siteId: this.siteId, totalChunks: this.chunksAdded });
    console.log(
      `[crawl] ${this.rootUrl}: completed, ${this.processed} pages (${this.failed} failed), ${this.chunksAdded} chunks`
    );
  }

  fail(error: unknown): void {
    this.transition("error");
    this.currentUrl = null;
    const message = errorMessage(error) || "Crawl failed";
    console.error(`[crawl] ${this.rootUrl}: failed: ${message}`);

    try {
      this.deps.store.updateSite(this.siteId, {
        status: "error",
        error: message,
        currentUrl: null,
        chunksAdded: this.chunksAdded,
        processedUrls: this.processed,
        totalUrls: this.frontier.discovered,
        failedUrls: this.failed,
      });
    } catch (storeError) {
      console.error(`[crawl] ${this.rootUrl}: could not record failure: ${errorMessage(storeError)}`);
    }
    this.deps.bus.publish({ type: "crawl_error", siteId: this.siteId, error: message });
  }

  private transition(status: SiteStatus): void {
    this.status = status;
  }

  private async worker(): Promise<void> {
    while (!this.signal.aborted) {
      const item = this.frontier.next();
      if (!item) {
        if (this.inFlight === 0) return;
        await this.waitForActivity();
        continue;
      }

      this.inFlight++;
      try {
        await this.waitForFetchSlot();
        await this.processUrl(item);
      } catch (error) {
        if (!this.signal.aborted) {
          this.fatal = error;
          this.controller.abort(error);
        }
      } finally {
        this.inFlight--;
        this.processed++;
        this.publishProgress();
        this.notify();
      }
    }
  }

  private async processUrl(item: FrontierItem): Promise<void> {
    this.currentUrl = item.url;

    let page: FetchedPage;
    try {
      page = await this.fetchWithRetry(item.url);
    } catch (error) {
      if (this.signal.aborted || !(error instanceof FetchError)) throw error;
      this.failed++;
      console.warn(`[crawl] Skipping ${item.url}: ${error.message}`);
      return;
    }

    this.frontier.markVisited(page.url);
    if (this.frontier.enqueue(page.links, item.depth + 1, item.url) > 0) {
      this.notify();
    }
    await this.indexPage(page);
  }

  private async fetchWithRetry(url: string): Promise<FetchedPage> {
    try {
      return await this.retry.execute(() => this.deps.fetcher.fetch(url, this.signal), {
        signal: this.signal,
        label: url,
        onRetry: (error, attempt, delayMs) => {
          console.warn(
            `[fetch] ${url}: ${errorMessage(error)}, attempt ${attempt}/${this.retry.maxAttempts}, retrying in ${Math.round(delayMs)}ms`
          );
        },
      });
    } catch (error) {
      if (error instanceof RetryExhaustedError) {
        const last = error.lastError;
        throw new FetchError(
          error.message,
          "transient",
          url,
          last instanceof FetchError ? last.status : null,
          null,
          { cause: error }
        );
      }
      if (!this.signal.aborted && !(error instanceof FetchError)) {
        throw new FetchError(errorMessage(error), "permanent", url, null, null, { cause: error });
      }
      throw error;
    }
  }

  private async indexPage(page: FetchedPage): Promise<void> {
    const chunks = this.deps.chunker.split(page.content, { url: page.url, title: page.title });
    const batchSize = this.deps.embedder.batchSize;

    for (let i = 0; i < chunks.length; i += batchSize) {
      const batch = chunks.slice(i, i + batchSize);
      const vectors = await this.deps.embedder.embed(batch.map(chunk => chunk.text), this.signal);

      // Commit without suspending: chunk rows, vectors, counter and event land together
      this.signal.throwIfAborted();
      const records = this.deps.store.insertChunks(
        batch.map(chunk => ({
          siteId: this.siteId,
          text: chunk.text,
          sourceUrl: page.url,
          title: chunk.title,
          position: chunk.position,
        }))
      );
      const persisted = this.deps.vectors.upsert(
        records.map((record, index) => ({
          chunkId: record.id,
          siteId: this.siteId,
          vector: vectors[index] ?? [],
        }))
      );
      this.chunksAdded += records.length;
      this.publishProgress();

      await persisted;
    }
  }

  private publishProgress(): void {
    if (this.signal.aborted) return;

    const remaining = this.frontier.pending + this.inFlight;
    const total = this.processed + remaining;
    const computed = total === 0 ? 0 : (this.processed / total) * 100;
    // Never moves backwards, and only completion reaches 100
    this.progress = Math.max(this.progress, Math.min(99, Math.round(computed * 10) / 10));

    this.deps.store.updateSite(this.siteId, {
      status: this.status,
      progress: this.progress,
      currentUrl: this.currentUrl,
      chunksAdded: this.chunksAdded,
      processedUrls: this.processed,
      totalUrls: this.frontier.discovered,
      failedUrls: this.failed,
    });
    this.deps.bus.publish({
      type: "crawl_progress",
      siteId: this.siteId,
      status: this.status,
      progress: this.progress,
      currentUrl: this.currentUrl,
      chunksAdded: this.chunksAdded,
      processedUrls: this.processed,
      totalUrls: this.frontier.discovered,
    });
  }

  private async waitForFetchSlot(): Promise<void> {
    const now = Date.now();
    const slot = Math.max(now, this.nextAllowedFetchAt);
    this.nextAllowedFetchAt = slot + this.deps.crawler.requestDelay;
    if (slot > now) {
      await sleep(slot - now, this.signal);
    }
  }

  private waitForActivity(): Promise<void> {
    return new Promise(resolve => this.waiters.push(resolve));
  }

  private notify(): void {
    const waiters = this.waiters;
    this.waiters = [];
    for (const resolve of waiters) resolve();
  }
}
