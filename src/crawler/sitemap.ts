// Sitemap discovery - probes the usual locations and flattens sitemap indexes

import { DOMParser } from "linkedom";
import { errorMessage } from "../errors";
import { normalizeUrl } from "../utils/url";

export const SITEMAP_PATHS = ["/sitemap.xml", "/sitemap_index.xml", "/sitemap1.xml", "/sitemap/sitemap.xml"];

export interface SitemapOptions {
  userAgent?: string;
  timeout?: number;
  /** Stop collecting once this many page URLs are known */
  maxUrls?: number;
  /** Nesting limit for sitemap indexes */
  maxDepth?: number;
}

export interface ParsedSitemap {
  isIndex: boolean;
  locations: string[];
}

export function parseSitemapXml(xml: string): ParsedSitemap {
  const document = new DOMParser().parseFromString(xml, "text/xml");
  const isIndex = document.getElementsByTagName("sitemapindex").length > 0;
  const locations: string[] = [];

  for (const loc of Array.from(document.getElementsByTagName("loc"))) {
    const text = loc.textContent?.trim();
    if (text) locations.push(text);
  }

  return { isIndex, locations };
}

function looksLikeSitemap(body: string): boolean {
  return body.includes("<urlset") || body.includes("<sitemapindex");
}

export class SitemapDiscovery {
  private userAgent: string;
  private timeout: number;
  private maxUrls: number;
  private maxDepth: number;

  constructor(options?: SitemapOptions) {
    this.userAgent = options?.userAgent ?? "docsage/0.1 (documentation crawler)";
    this.timeout = options?.timeout ?? 10000;
    this.maxUrls = options?.maxUrls ?? 1000;
    this.maxDepth = options?.maxDepth ?? 3;
  }

  /** Page URLs listed by the site's sitemap, or [] when it has none */
  async discover(rootUrl: string, signal?: AbortSignal): Promise<string[]> {
    const found = await this.find(rootUrl, signal);
    if (!found) {
      return [];
    }

    const urls = new Set<string>();
    await this.collect(found.url, found.body, 0, urls, signal);
    console.log(`[sitemap] ${found.url}: ${urls.size} URLs`);
    return [...urls];
  }

  private async find(rootUrl: string, signal?: AbortSignal): Promise<{ url: string; body: string } | null> {
    for (const path of SITEMAP_PATHS) {
      const url = new URL(path, rootUrl).toString();
      const body = await this.download(url, signal);
      if (body !== null && looksLikeSitemap(body)) {
        return { url, body };
      }
    }
    return null;
  }

  private async collect(
    sitemapUrl: string,
    body: string,
    depth: number,
    urls: Set<string>,
    signal?: AbortSignal
  ): Promise<void> {
    const { isIndex, locations } = parseSitemapXml(body);

    for (const location of locations) {
      if (urls.size >= this.maxUrls) return;

      if (isIndex) {
        if (depth >= this.maxDepth) continue;
        const nested = await this.download(location, signal);
        if (nested !== null && looksLikeSitemap(nested)) {
          await this.collect(location, nested, depth + 1, urls, signal);
        }
        continue;
      }

      const normalized = normalizeUrl(location, sitemapUrl);
      if (normalized) urls.add(normalized);
    }
  }

  // Missing or broken sitemaps are expected, so failures only log
  private async download(url: string, signal?: AbortSignal): Promise<string | null> {
    signal?.throwIfAborted();
    const controller = new AbortController();
    const timeoutId = setTimeout(() => {
      controller.abort(new DOMException(`Timed out after ${this.timeout}ms`, "TimeoutError"));
    }, this.timeout);
    const onAbort = () => controller.abort(signal?.reason);
    signal?.addEventListener("abort", onAbort, { once: true });

    try {
      const response = await fetch(url, {
        headers: { "User-Agent": this.userAgent, "Accept": "application/xml,text/xml,*/*" },
        signal: controller.signal,
        redirect: "follow",
      });
      if (!response.ok) {
        await response.body?.cancel();
        return null;
      }
      return await response.text();
    } catch (error) {
      if (signal?.aborted) throw signal.reason;
      console.warn(`[sitemap] Could not fetch ${url}: ${errorMessage(error)}`);
      return null;
    } finally {
      clearTimeout(timeoutId);
      signal?.removeEventListener("abort", onAbort);
    }
  }
}
