// Progress bus - ordered per-site event log with synchronous fan-out to subscribers

import type {
  CrawlEvent,
  ProgressMessage,
  ProgressObserver,
  RecordedEvent,
  Site,
  SubscriptionHandle,
} from "../types";
import { errorMessage } from "../errors";

const GLOBAL_TOPIC = "*";

export interface ProgressBusOptions {
  /** Events kept per topic; older ones are dropped first */
  historyLimit?: number;
}

function topicOf(event: CrawlEvent): string {
  switch (event.type) {
    case "site_added":
      return event.site.id;
    case "database_cleared":
      return GLOBAL_TOPIC;
    default:
      return event.siteId;
  }
}

/**
 * Publish appends to the topic's log, folds the event into the site snapshot
 * and delivers it to every subscriber before returning. An event published
 * from inside an observer is delivered once the current event has reached
 * every subscriber. A subscriber that throws is dropped and misses only what
 * comes after.
 */
export class ProgressBus {
  private observers: Map<number, ProgressObserver> = new Map();
  private logs: Map<string, RecordedEvent[]> = new Map();
  private snapshots: Map<string, Site> = new Map();
  private nextSubscriptionId = 1;
  private seq = 0;
  private historyLimit: number;
  private outbox: CrawlEvent[] = [];
  private delivering = false;

  constructor(options?: ProgressBusOptions) {
    this.historyLimit = options?.historyLimit ?? 1000;
  }

  /** Seed snapshots from persisted sites, without recording events */
  hydrate(sites: Site[]): void {
    for (const site of sites) {
      this.snapshots.set(site.id, { ...site });
    }
  }

  publish(event: CrawlEvent): RecordedEvent {
    const recorded: RecordedEvent = { seq: ++this.seq, at: Date.now(), event };

    if (event.type === "database_cleared") {
      this.logs.clear();
      this.snapshots.clear();
    }
    this.append(topicOf(event), recorded);
    this.fold(event);

    this.outbox.push(event);
    if (!this.delivering) {
      this.drain();
    }
    return recorded;
  }

  subscribe(observer: ProgressObserver): SubscriptionHandle {
    const handle: SubscriptionHandle = { id: this.nextSubscriptionId++ };
    this.observers.set(handle.id, observer);

    for (const site of this.snapshots.values()) {
      if (!this.observers.has(handle.id)) break;
      this.deliver(handle.id, observer, { type: "site_status", site: { ...site } });
    }
    return handle;
  }

  unsubscribe(handle: SubscriptionHandle): void {
    this.observers.delete(handle.id);
  }

  get subscriberCount(): number {
    return this.observers.size;
  }

  /** Events for one site, or every event in publish order */
  history(siteId?: string): RecordedEvent[] {
    if (siteId !== undefined) {
      return [...(this.logs.get(siteId) ?? [])];
    }
    return [...this.logs.values()].flat().sort((a, b) => a.seq - b.seq);
  }

  snapshot(siteId: string): Site | null {
    const site = this.snapshots.get(siteId);
    return site ? { ...site } : null;
  }

  // Events published by an observer wait until the current one reached everybody
  private drain(): void {
    this.delivering = true;
    try {
      let event: CrawlEvent | undefined;
      while ((event = this.outbox.shift()) !== undefined) {
        for (const [id, observer] of [...this.observers]) {
          if (!this.observers.has(id)) continue;
          this.deliver(id, observer, event);
        }
      }
    } finally {
      this.delivering = false;
    }
  }

  private deliver(id: number, observer: ProgressObserver, message: ProgressMessage): void {
    try {
      observer(message);
    } catch (error) {
      this.observers.delete(id);
      console.warn(`[progress] Dropping subscriber ${id}: ${errorMessage(error)}`);
    }
  }

  private append(topic: string, recorded: RecordedEvent): void {
    let log = this.logs.get(topic);
    if (!log) {
      log = [];
      this.logs.set(topic, log);
    }
    log.push(recorded);
    if (log.length > this.historyLimit) {
      log.splice(0, log.length - this.historyLimit);
    }
  }

  private fold(event: CrawlEvent): void {
    const now = Date.now();
    switch (event.type) {
      case "site_added":
        this.snapshots.set(event.site.id, { ...event.site });
        break;
      case "crawl_progress": {
        const site = this.snapshots.get(event.siteId);
        if (site) {
          this.snapshots.set(event.siteId, {
            ...site,
            status: event.status,
            progress: event.progress,
            currentUrl: event.currentUrl,
            chunksAdded: event.chunksAdded,
            processedUrls: event.processedUrls,
            totalUrls: event.totalUrls,
            totalChunks: null,
            error: null,
            updatedAt: now,
          });
        }
        break;
      }
      case "crawl_completed": {
        const site = this.snapshots.get(event.siteId);
        if (site) {
          this.snapshots.set(event.siteId, {
            ...site,
            status: "completed",
            progress: 100,
            currentUrl: null,
            chunksAdded: event.totalChunks,
            totalChunks: event.totalChunks,
            updatedAt: now,
          });
        }
        break;
      }
      case "crawl_error": {
        const site = this.snapshots.get(event.siteId);
        if (site) {
          this.snapshots.set(event.siteId, { ...site, status: "error", error: event.error, currentUrl: null, updatedAt: now });
        }
        break;
      }
      case "site_deleted":
        this.snapshots.delete(event.siteId);
        break;
      case "database_cleared":
        break;
    }
  }
}
