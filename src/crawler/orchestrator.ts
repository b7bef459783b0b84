// Crawl orchestrator - owns the site-to-job registry and the site lifecycle operations

import { randomUUID } from "crypto";
import type { Site, SiteInput, SiteStore, VectorIndex } from "../types";
import { NotFoundError, ValidationError, errorMessage } from "../errors";
import type { ProgressBus } from "../progress/bus";
import { parseSiteUrl } from "../utils/url";
import { CrawlJob, type CrawlJobDeps } from "./job";

interface JobEntry {
  job: CrawlJob;
  done: Promise<void>;
}

const TERMINAL_STATUSES = new Set(["completed", "error"]);

export const INTERRUPTED_MESSAGE = "Crawl interrupted by restart";

export class CrawlOrchestrator {
  private jobs: Map<string, JobEntry> = new Map();
  private store: SiteStore;
  private vectors: VectorIndex;
  private bus: ProgressBus;

  constructor(private deps: CrawlJobDeps) {
    this.store = deps.store;
    this.vectors = deps.vectors;
    this.bus = deps.bus;
  }

  submit(input: SiteInput): Site {
    const url = parseSiteUrl(input.url);
    if (input.name !== undefined && typeof input.name !== "string") {
      throw new ValidationError("name must be a string", "name");
    }

    const now = Date.now();
    const site: Site = {
      id: randomUUID(),
      url,
      name: input.name?.trim() || new URL(url).hostname,
      status: "starting",
      progress: 0,
      currentUrl: null,
      chunksAdded: 0,
      totalChunks: null,
      error: null,
      processedUrls: 0,
      totalUrls: 0,
      failedUrls: 0,
      createdAt: now,
      updatedAt: now,
    };

    this.store.createSite(site);
    this.bus.publish({ type: "site_added", site: { ...site } });
    console.log(`[crawl] Added site ${site.name} (${site.url})`);
    this.startJob(site);
    return site;
  }

  status(siteId: string): Site {
    const site = this.store.getSite(siteId);
    if (!site) {
      throw new NotFoundError("Site", siteId);
    }
    return site;
  }

  listSites(): Site[] {
    return this.store.listSites();
  }

  /**
   * Aborts the site's job and removes its records before the first
   * suspension point; the returned promise settles once vectors are persisted.
   */
  async delete(siteId: string): Promise<void> {
    if (!this.store.getSite(siteId)) {
      throw new NotFoundError("Site", siteId);
    }

    const entry = this.jobs.get(siteId);
    this.jobs.delete(siteId);
    entry?.job.cancel();

    this.store.deleteSite(siteId);
    const persisted = this.vectors.deleteBySite(siteId);
    this.bus.publish({ type: "site_deleted", siteId });
    console.log(`[crawl] Deleted site ${siteId}`);

    await persisted;
  }

  cancel(siteId: string): Promise<void> {
    return this.delete(siteId);
  }

  async recrawl(siteId: string): Promise<Site> {
    const site = this.status(siteId);
    if (this.jobs.has(siteId)) {
      throw new ValidationError(`Site ${siteId} is still being crawled`, "siteId");
    }

    this.store.deleteChunksForSite(siteId);
    const purged = this.vectors.deleteBySite(siteId);

    const reset: Site = {
      ...site,
      status: "starting",
      progress: 0,
      currentUrl: null,
      chunksAdded: 0,
      totalChunks: null,
      error: null,
      processedUrls: 0,
      totalUrls: 0,
      failedUrls: 0,
      updatedAt: Date.now(),
    };
    this.store.updateSite(siteId, reset);
    console.log(`[crawl] Re-crawling ${site.url}`);
    this.startJob(reset);

    await purged;
    return reset;
  }

  async clearAll(): Promise<void> {
    const entries = [...this.jobs.values()];
    this.jobs.clear();
    for (const entry of entries) {
      entry.job.cancel();
    }

    this.store.clear();
    const cleared = this.vectors.clear();
    this.bus.publish({ type: "database_cleared" });
    console.log(`[crawl] Database cleared (${entries.length} running jobs cancelled)`);

    await cleared;
  }

  isCrawling(siteId: string): boolean {
    return this.jobs.has(siteId);
  }

  get activeJobs(): number {
    return this.jobs.size;
  }

  async waitForJob(siteId: string): Promise<void> {
    await this.jobs.get(siteId)?.done;
  }

  async waitForAll(): Promise<void> {
    await Promise.all([...this.jobs.values()].map(entry => entry.done));
  }

  /** Sites left mid-crawl by a previous process become errors */
  recoverInterrupted(): number {
    let recovered = 0;
    for (const site of this.store.listSites()) {
      if (TERMINAL_STATUSES.has(site.status) || this.jobs.has(site.id)) continue;

      this.store.updateSite(site.id, { status: "error", error: INTERRUPTED_MESSAGE, currentUrl: null });
      console.warn(`[recovery] ${site.url}: ${INTERRUPTED_MESSAGE}`);
      recovered++;
    }
    return recovered;
  }

  async shutdown(): Promise<void> {
    const entries = [...this.jobs.values()];
    for (const entry of entries) {
      entry.job.cancel();
    }
    await Promise.all(entries.map(entry => entry.done));
  }

  private startJob(site: Site): void {
    const job = new CrawlJob(site, this.deps);
    const done = job.run()
      .catch(err => console.error(`[crawl] Unexpected failure for ${site.url}: ${errorMessage(err)}`))
      .finally(() => {
        if (this.jobs.get(site.id)?.job === job) {
          this.jobs.delete(site.id);
        }
      });
    this.jobs.set(site.id, { job, done });
  }
}
