import { describe, test, expect } from "vitest";
import { ProgressBus } from "../src/progress/bus";
import type { CrawlEvent, ProgressMessage } from "../src/types";
import { makeSite } from "./helpers";

function progress(siteId: string, value: number): CrawlEvent {
  return {
    type: "crawl_progress",
    siteId,
    status: "crawling",
    progress: value,
    currentUrl: `https://docs.example.com/${value}`,
    chunksAdded: value,
    processedUrls: 1,
    totalUrls: 4,
  };
}

describe("ProgressBus", () => {
  test("delivers events to subscribers synchronously and in publish order", () => {
    const bus = new ProgressBus();
    const received: string[] = [];
    bus.subscribe(message => received.push(message.type));

    bus.publish({ type: "site_added", site: makeSite() });
    bus.publish(progress("site-1", 10));
    expect(received).toEqual(["site_added", "crawl_progress"]);
  });

  test("delivers an event published by an observer after the current one", () => {
    const bus = new ProgressBus();
    const first: string[] = [];
    const second: string[] = [];
    bus.subscribe(message => {
      first.push(message.type);
      if (message.type === "crawl_progress") {
        bus.publish({ type: "site_deleted", siteId: message.siteId });
      }
    });
    bus.subscribe(message => second.push(message.type));

    const recorded = bus.publish(progress("site-1", 10));

    expect(first).toEqual(["crawl_progress", "site_deleted"]);
    expect(second).toEqual(["crawl_progress", "site_deleted"]);
    expect(bus.history("site-1").map(r => r.event.type)).toEqual(["crawl_progress", "site_deleted"]);
    expect(recorded.seq).toBe(1);
  });

  test("sends a site_status catch-up for every known site on subscribe", () => {
    const bus = new ProgressBus();
    bus.hydrate([makeSite({ id: "a" }), makeSite({ id: "b", status: "completed" })]);

    const received: ProgressMessage[] = [];
    bus.subscribe(message => received.push(message));

    expect(received.map(m => (m.type === "site_status" ? [m.site.id, m.site.status] : null))).toEqual([
      ["a", "starting"],
      ["b", "completed"],
    ]);
  });

  test("folds events into the site snapshot", () => {
    const bus = new ProgressBus();
    bus.publish({ type: "site_added", site: makeSite() });
    bus.publish(progress("site-1", 40));

    expect(bus.snapshot("site-1")).toMatchObject({ status: "crawling", progress: 40, chunksAdded: 40, totalChunks: null });

    bus.publish({ type: "crawl_completed", siteId: "site-1", totalChunks: 12 });
    expect(bus.snapshot("site-1")).toMatchObject({ status: "completed", progress: 100, chunksAdded: 12, totalChunks: 12, currentUrl: null });
  });

  test("records crawl errors", () => {
    const bus = new ProgressBus();
    bus.publish({ type: "site_added", site: makeSite() });
    bus.publish({ type: "crawl_error", siteId: "site-1", error: "Root URL unreachable" });

    expect(bus.snapshot("site-1")).toMatchObject({ status: "error", error: "Root URL unreachable" });
  });

  test("keeps an ordered log per site and a global history", () => {
    const bus = new ProgressBus();
    bus.publish({ type: "site_added", site: makeSite({ id: "a" }) });
    bus.publish({ type: "site_added", site: makeSite({ id: "b" }) });
    bus.publish(progress("a", 50));

    expect(bus.history("a").map(r => r.event.type)).toEqual(["site_added", "crawl_progress"]);
    expect(bus.history().map(r => r.seq)).toEqual([1, 2, 3]);
  });

  test("site_deleted drops the snapshot but keeps the log", () => {
    const bus = new ProgressBus();
    bus.publish({ type: "site_added", site: makeSite() });
    bus.publish({ type: "site_deleted", siteId: "site-1" });

    expect(bus.snapshot("site-1")).toBeNull();
    expect(bus.history("site-1").map(r => r.event.type)).toEqual(["site_added", "site_deleted"]);
  });

  test("database_cleared resets snapshots and history", () => {
    const bus = new ProgressBus();
    bus.publish({ type: "site_added", site: makeSite() });
    bus.publish({ type: "database_cleared" });

    expect(bus.snapshot("site-1")).toBeNull();
    expect(bus.history().map(r => r.event.type)).toEqual(["database_cleared"]);
  });

  test("trims each topic to the history limit", () => {
    const bus = new ProgressBus({ historyLimit: 2 });
    bus.publish({ type: "site_added", site: makeSite() });
    bus.publish(progress("site-1", 10));
    bus.publish(progress("site-1", 20));

    expect(bus.history("site-1").map(r => r.seq)).toEqual([2, 3]);
  });

  test("drops a subscriber that throws without affecting the others", () => {
    const bus = new ProgressBus();
    const healthy: string[] = [];
    bus.subscribe(() => {
      throw new Error("socket closed");
    });
    bus.subscribe(message => healthy.push(message.type));
    expect(bus.subscriberCount).toBe(2);

    bus.publish({ type: "site_added", site: makeSite() });
    bus.publish(progress("site-1", 5));

    expect(bus.subscriberCount).toBe(1);
    expect(healthy).toEqual(["site_added", "crawl_progress"]);
  });

  test("unsubscribe stops delivery", () => {
    const bus = new ProgressBus();
    const received: string[] = [];
    const handle = bus.subscribe(message => received.push(message.type));
    bus.unsubscribe(handle);

    bus.publish({ type: "site_added", site: makeSite() });
    expect(received).toEqual([]);
    expect(bus.subscriberCount).toBe(0);
  });
});
