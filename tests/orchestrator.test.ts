import { describe, test, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, rm } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";
import { CrawlOrchestrator, INTERRUPTED_MESSAGE } from "../src/crawler/orchestrator";
import { TextChunker } from "../src/crawler/chunker";
import { SQLiteSiteStore } from "../src/storage/metadata";
import { LocalVectorStore } from "../src/storage/vector-store";
import { ProgressBus } from "../src/progress/bus";
import { DEFAULT_CRAWLER_CONFIG } from "../src/config";
import { EmbeddingError, FetchError, NotFoundError, ValidationError } from "../src/errors";
import type { Embedder, ProgressMessage } from "../src/types";
import { FakeSiteFetcher, delay, localEmbedder, makeSite, markdownPage, type FakePage } from "./helpers";

const PARAGRAPH =
  "Each section explains one part of the client. It covers setup, configuration and the request lifecycle. " +
  "Read it in order the first time and come back to the reference later.";

function docsSite(host: string, extraLinks: string[] = [], delayMs?: number): Map<string, FakePage> {
  const root = `https://${host}/`;
  const pages = new Map<string, FakePage>([
    [root, markdownPage("Welcome", `${PARAGRAPH}\n\n${PARAGRAPH}`, ["/guide", "/api", ...extraLinks])],
    [`https://${host}/guide`, markdownPage("Guide", `Installation steps for the client. ${PARAGRAPH}`, ["/guide/install"])],
    [`https://${host}/api`, markdownPage("API", `The API reference lists every method. ${PARAGRAPH}`)],
    [`https://${host}/guide/install`, markdownPage("Install", `Run the installer and restart. ${PARAGRAPH}`)],
  ]);
  if (delayMs !== undefined) {
    for (const page of pages.values()) page.delayMs = delayMs;
  }
  return pages;
}

function eventsFor(messages: ProgressMessage[], siteId: string): ProgressMessage[] {
  return messages.filter(message => {
    switch (message.type) {
      case "site_added":
      case "site_status":
        return message.site.id === siteId;
      case "database_cleared":
        return false;
      default:
        return message.siteId === siteId;
    }
  });
}

describe("CrawlOrchestrator", () => {
  let dir: string;
  let store: SQLiteSiteStore;
  let vectors: LocalVectorStore;
  let bus: ProgressBus;
  let messages: ProgressMessage[];

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "docsage-orchestrator-"));
    store = new SQLiteSiteStore(":memory:");
    vectors = new LocalVectorStore(dir);
    await vectors.load();
    bus = new ProgressBus();
    messages = [];
    bus.subscribe(message => messages.push(message));
  });

  afterEach(async () => {
    store.close();
    await rm(dir, { recursive: true, force: true });
  });

  function orchestrator(fetcher: FakeSiteFetcher, options: { embedder?: Embedder; concurrency?: number } = {}) {
    return new CrawlOrchestrator({
      store,
      vectors,
      bus,
      fetcher,
      chunker: new TextChunker({ chunkSize: 200, chunkOverlap: 20 }),
      embedder: options.embedder ?? localEmbedder(),
      crawler: {
        ...DEFAULT_CRAWLER_CONFIG,
        concurrency: options.concurrency ?? 3,
        requestDelay: 0,
        maxAttempts: 2,
        baseDelayMs: 1,
        maxPages: 50,
        maxDepth: 3,
        useSitemap: false,
      },
      sitemap: null,
    });
  }

  test("crawls docs.example.com and publishes events in order", async () => {
    const fetcher = new FakeSiteFetcher(docsSite("docs.example.com"));
    const crawler = orchestrator(fetcher);

    const site = crawler.submit({ url: "https://docs.example.com" });
    expect(site.name).toBe("docs.example.com");
    expect(site.url).toBe("https://docs.example.com/");
    await crawler.waitForJob(site.id);

    const events = eventsFor(messages, site.id);
    expect(events[0]?.type).toBe("site_added");
    expect(events.at(-1)).toEqual({ type: "crawl_completed", siteId: site.id, totalChunks: store.countChunks(site.id) });

    const progress = events.flatMap(e => (e.type === "crawl_progress" ? [e] : []));
    expect(progress.length).toBe(events.length - 2);

    const statuses = progress.map(e => e.status).filter((status, i, all) => status !== all[i - 1]);
    expect(statuses).toEqual(["starting", "finding_urls", "crawling"]);

    for (let i = 1; i < progress.length; i++) {
      expect(progress[i]?.progress).toBeGreaterThanOrEqual(progress[i - 1]?.progress ?? 0);
      expect(progress[i]?.chunksAdded).toBeGreaterThanOrEqual(progress[i - 1]?.chunksAdded ?? 0);
    }
    expect(progress.every(e => e.progress < 100)).toBe(true);

    const final = crawler.status(site.id);
    expect(final.status).toBe("completed");
    expect(final.progress).toBe(100);
    expect(final.totalChunks).toBeGreaterThan(0);
    expect(final.totalChunks).toBe(final.chunksAdded);
    expect(vectors.count(site.id)).toBe(final.chunksAdded);
    expect(final.processedUrls).toBe(4);
    expect(final.totalUrls).toBe(4);
    expect(final.failedUrls).toBe(0);
    expect([...fetcher.requested].sort()).toEqual([
      "https://docs.example.com/",
      "https://docs.example.com/api",
      "https://docs.example.com/guide",
      "https://docs.example.com/guide/install",
    ]);
  });

  test("follows a root that redirects to another host", async () => {
    const pages = new Map<string, FakePage>([
      ["https://www.example.com/", markdownPage("Welcome", PARAGRAPH, ["/guide", "/api"])],
      ["https://www.example.com/guide", markdownPage("Guide", PARAGRAPH)],
      ["https://www.example.com/api", markdownPage("API", PARAGRAPH)],
    ]);
    const fetcher = new FakeSiteFetcher(pages, new Map(), new Map([["https://example.com/", "https://www.example.com/"]]));
    const crawler = orchestrator(fetcher);

    const site = crawler.submit({ url: "https://example.com" });
    await crawler.waitForJob(site.id);

    expect([...fetcher.requested].sort()).toEqual([
      "https://example.com/",
      "https://www.example.com/api",
      "https://www.example.com/guide",
    ]);
    expect(crawler.status(site.id)).toMatchObject({ status: "completed", processedUrls: 3, failedUrls: 0 });
  });

  test("starts fetching newly found links while their page is still being indexed", async () => {
    const children = Array.from({ length: 6 }, (_, i) => `/child${i}`);
    const pages = new Map<string, FakePage>([
      ["https://docs.example.com/", markdownPage("Welcome", PARAGRAPH, ["/hub"])],
      ["https://docs.example.com/hub", markdownPage("Hub index", "Links to every child page.", children)],
    ]);
    for (const path of children) {
      pages.set(`https://docs.example.com${path}`, markdownPage(path, PARAGRAPH));
    }
    const fetcher = new FakeSiteFetcher(pages);

    const base = localEmbedder();
    let requestedWhileHubIndexed = 0;
    const embedder: Embedder = {
      batchSize: base.batchSize,
      embedQuery: (text, signal) => base.embedQuery(text, signal),
      embed: async (texts, signal) => {
        if (texts.some(text => text.includes("Hub index"))) {
          await delay(50, signal);
          requestedWhileHubIndexed = fetcher.requested.length;
        }
        return base.embed(texts, signal);
      },
    };
    const crawler = orchestrator(fetcher, { embedder });

    const site = crawler.submit({ url: "https://docs.example.com/" });
    await crawler.waitForJob(site.id);

    expect(crawler.status(site.id)).toMatchObject({ status: "completed", processedUrls: 8 });
    expect(requestedWhileHubIndexed).toBeGreaterThan(2);
  });

  test("reports an unreachable root after retries are exhausted", async () => {
    const root = "https://unreachable.example.com/";
    const fetcher = new FakeSiteFetcher(
      new Map(),
      new Map([[root, new FetchError("connect ECONNREFUSED", "transient", root)]])
    );
    const crawler = orchestrator(fetcher);

    const site = crawler.submit({ url: root });
    await crawler.waitForJob(site.id);

    const error = "Root URL unreachable: Gave up after 2 attempts: connect ECONNREFUSED";
    expect(eventsFor(messages, site.id).at(-1)).toEqual({ type: "crawl_error", siteId: site.id, error });
    expect(crawler.status(site.id)).toMatchObject({ status: "error", error });
    expect(fetcher.requested).toEqual([root, root]);
  });

  test("fails the job when embedding retries are exhausted", async () => {
    const embedder: Embedder = {
      batchSize: 4,
      embed: async () => {
        throw new EmbeddingError("Embedding service unavailable after 2 attempts: rate limited", "exhausted");
      },
      embedQuery: async () => [],
    };
    const crawler = orchestrator(new FakeSiteFetcher(docsSite("docs.example.com")), { embedder });

    const site = crawler.submit({ url: "https://docs.example.com/" });
    await crawler.waitForJob(site.id);

    expect(crawler.status(site.id)).toMatchObject({
      status: "error",
      error: "Embedding service unavailable after 2 attempts: rate limited",
      chunksAdded: 0,
    });
  });

  test("counts a missing page as processed without chunks", async () => {
    const fetcher = new FakeSiteFetcher(docsSite("docs.example.com", ["/missing"]));
    const crawler = orchestrator(fetcher);

    const site = crawler.submit({ url: "https://docs.example.com/" });
    await crawler.waitForJob(site.id);

    expect(crawler.status(site.id)).toMatchObject({ status: "completed", processedUrls: 5, failedUrls: 1, totalUrls: 5 });
  });

  test("runs 10 crawls at once without mixing their chunks or events", async () => {
    const pages = new Map<string, FakePage>();
    for (let i = 0; i < 10; i++) {
      for (const [url, page] of docsSite(`site${i}.example.com`)) {
        pages.set(url, { ...page, body: `${page.body}\n\nMarker siteword${i}.` });
      }
    }
    const crawler = orchestrator(new FakeSiteFetcher(pages));

    const sites = Array.from({ length: 10 }, (_, i) => crawler.submit({ url: `https://site${i}.example.com/` }));
    expect(crawler.activeJobs).toBe(10);
    await crawler.waitForAll();

    sites.forEach((site, i) => {
      const final = crawler.status(site.id);
      expect(final.status).toBe("completed");
      expect(final.totalChunks).toBe(store.countChunks(site.id));
      expect(vectors.count(site.id)).toBe(final.chunksAdded);

      const completed = eventsFor(messages, site.id).filter(e => e.type === "crawl_completed");
      expect(completed).toEqual([{ type: "crawl_completed", siteId: site.id, totalChunks: final.chunksAdded }]);

      const hits = store.getChunks(store.searchKeyword(`siteword${i}`, 50).map(m => m.chunkId));
      expect(hits.length).toBeGreaterThan(0);
      expect(hits.every(chunk => chunk.siteId === site.id && chunk.sourceUrl.startsWith(`https://site${i}.example.com/`))).toBe(true);
    });
  });

  test("never has more fetches in flight than the concurrency limit", async () => {
    const children = Array.from({ length: 12 }, (_, i) => `/page${i}`);
    const pages = docsSite("docs.example.com", children, 15);
    for (const path of children) {
      pages.set(`https://docs.example.com${path}`, { ...markdownPage(path, PARAGRAPH), delayMs: 15 });
    }
    const fetcher = new FakeSiteFetcher(pages);
    const crawler = orchestrator(fetcher, { concurrency: 3 });

    const site = crawler.submit({ url: "https://docs.example.com/" });
    await crawler.waitForJob(site.id);

    expect(crawler.status(site.id).processedUrls).toBe(16);
    expect(fetcher.maxInFlight).toBe(3);
  });

  test("delete aborts a running crawl and purges everything for the site", async () => {
    const fetcher = new FakeSiteFetcher(docsSite("docs.example.com", [], 30));
    const crawler = orchestrator(fetcher);

    let crawling = false;
    const reachedCrawling = new Promise<void>(resolve => {
      bus.subscribe(message => {
        if (!crawling && message.type === "crawl_progress" && message.status === "crawling") {
          crawling = true;
          resolve();
        }
      });
    });

    const site = crawler.submit({ url: "https://docs.example.com/" });
    await reachedCrawling;
    await crawler.delete(site.id);

    expect(crawler.isCrawling(site.id)).toBe(false);
    expect(() => crawler.status(site.id)).toThrow(NotFoundError);
    expect(store.countChunks(site.id)).toBe(0);
    expect(vectors.count(site.id)).toBe(0);
    expect(store.searchKeyword("installation steps", 10)).toEqual([]);

    await delay(100);
    expect(eventsFor(messages, site.id).at(-1)).toEqual({ type: "site_deleted", siteId: site.id });
    expect(store.countChunks()).toBe(0);

    await expect(crawler.delete(site.id)).rejects.toBeInstanceOf(NotFoundError);
    await expect(crawler.cancel("missing")).rejects.toBeInstanceOf(NotFoundError);
  });

  test("clearAll empties every store and publishes database_cleared", async () => {
    const crawler = orchestrator(new FakeSiteFetcher(docsSite("docs.example.com")));
    const site = crawler.submit({ url: "https://docs.example.com/" });
    await crawler.waitForJob(site.id);

    await crawler.clearAll();

    expect(crawler.listSites()).toEqual([]);
    expect(store.countChunks()).toBe(0);
    expect(vectors.count()).toBe(0);
    expect(store.searchKeyword("installation steps", 10)).toEqual([]);
    expect(messages.at(-1)).toEqual({ type: "database_cleared" });
  });

  test("recrawl purges old chunks and runs a fresh attempt", async () => {
    const crawler = orchestrator(new FakeSiteFetcher(docsSite("docs.example.com")));
    const site = crawler.submit({ url: "https://docs.example.com/" });
    await crawler.waitForJob(site.id);
    const firstCount = store.countChunks(site.id);

    const pending = crawler.recrawl(site.id);
    await expect(crawler.recrawl(site.id)).rejects.toBeInstanceOf(ValidationError);
    expect(await pending).toMatchObject({ status: "starting", progress: 0, chunksAdded: 0, totalChunks: null });
    await crawler.waitForJob(site.id);

    expect(crawler.status(site.id)).toMatchObject({ status: "completed", totalChunks: firstCount });
    expect(store.countChunks(site.id)).toBe(firstCount);
    expect(vectors.count(site.id)).toBe(firstCount);
  });

  test("rejects malformed URLs before creating a site", () => {
    const crawler = orchestrator(new FakeSiteFetcher(new Map()));
    expect(() => crawler.submit({ url: "ftp://docs.example.com" })).toThrow(ValidationError);
    expect(() => crawler.submit({ url: "" })).toThrow("url is required");
    expect(crawler.listSites()).toEqual([]);
  });

  test("marks sites left mid-crawl by a previous process as interrupted", () => {
    store.createSite(makeSite({ id: "stuck", status: "crawling", progress: 40 }));
    store.createSite(makeSite({ id: "done", status: "completed", progress: 100 }));
    const crawler = orchestrator(new FakeSiteFetcher(new Map()));

    expect(crawler.recoverInterrupted()).toBe(1);
    expect(crawler.status("stuck")).toMatchObject({ status: "error", error: INTERRUPTED_MESSAGE });
    expect(crawler.status("done").status).toBe("completed");
  });
});
