// Crawl frontier - queued URLs plus the visited set for one crawl job

import type { CrawlScope } from "../types";
import { isInScope, normalizeUrl } from "../utils/url";

export interface FrontierItem {
  url: string;
  depth: number;
  fromUrl: string | null;
}

export interface FrontierOptions {
  maxPages: number;
  maxDepth: number;
  scope: CrawlScope;
}

export class Frontier {
  private queue: FrontierItem[] = [];
  private visited: Set<string> = new Set();
  private readonly rootUrl: string;
  private scopeRoot: string;
  private readonly maxPages: number;
  private readonly maxDepth: number;
  private readonly scope: CrawlScope;

  constructor(rootUrl: string, options: FrontierOptions) {
    this.rootUrl = rootUrl;
    this.scopeRoot = rootUrl;
    this.maxPages = options.maxPages;
    this.maxDepth = options.maxDepth;
    this.scope = options.scope;
  }

  /** Queue the root URL; it is exempt from scope checks */
  seed(): FrontierItem | null {
    const url = normalizeUrl(this.rootUrl);
    if (!url || this.visited.has(url)) return null;

    const item = { url, depth: 0, fromUrl: null };
    this.visited.add(url);
    this.queue.push(item);
    return item;
  }

  /** Returns how many of the links were newly queued */
  enqueue(links: Iterable<string>, depth: number, fromUrl: string | null): number {
    if (depth > this.maxDepth) return 0;

    let added = 0;
    for (const link of links) {
      if (this.visited.size >= this.maxPages) {
        break;
      }

      const url = normalizeUrl(link);
      if (!url || this.visited.has(url)) continue;
      if (!isInScope(url, this.scopeRoot, this.scope)) continue;

      this.visited.add(url);
      this.insert({ url, depth, fromUrl });
      added++;
    }
    return added;
  }

  next(): FrontierItem | undefined {
    return this.queue.shift();
  }

  /** Record a URL reached some other way, e.g. the target of a redirect */
  markVisited(url: string): void {
    const normalized = normalizeUrl(url);
    if (normalized) this.visited.add(normalized);
  }

  /** Judge scope against the URL the root actually resolved to, after redirects */
  rebase(finalRootUrl: string): void {
    const normalized = normalizeUrl(finalRootUrl);
    if (normalized) this.scopeRoot = normalized;
  }

  get scopeRootUrl(): string {
    return this.scopeRoot;
  }

  has(url: string): boolean {
    const normalized = normalizeUrl(url);
    return normalized !== null && this.visited.has(normalized);
  }

  get pending(): number {
    return this.queue.length;
  }

  get discovered(): number {
    return this.visited.size;
  }

  // Shallow pages first; FIFO among equal depths
  private insert(item: FrontierItem): void {
    let index = this.queue.length;
    while (index > 0) {
      const previous = this.queue[index - 1];
      if (!previous || previous.depth <= item.depth) break;
      index--;
    }
    this.queue.splice(index, 0, item);
  }
}
