// HTTP fetcher - downloads a page, classifies failures and hands the body to the extractor

import type { Extractor, FetchedPage, PageFetcher } from "../types";
import { FetchError, errorMessage } from "../errors";
import { classifyNetworkError, type ErrorClass } from "../utils/retry";
import { DocExtractor } from "./extractor";

export interface HttpFetcherOptions {
  userAgent?: string;
  /** Per-request timeout (ms) */
  timeout?: number;
  extractor?: Extractor;
}

const ACCEPT = "text/html,application/xhtml+xml,text/markdown,text/plain;q=0.9,*/*;q=0.5";
const SUPPORTED_TYPES = ["text/html", "application/xhtml+xml", "text/markdown", "text/x-markdown", "text/plain"];
const TRANSIENT_STATUSES = new Set([408, 425, 429]);

export function isTransientStatus(status: number): boolean {
  return TRANSIENT_STATUSES.has(status) || status >= 500;
}

/** Retry-After as milliseconds, from either delta-seconds or an HTTP date */
export function parseRetryAfter(header: string | null, now = Date.now()): number | null {
  if (!header) return null;
  const trimmed = header.trim();
  if (/^\d+$/.test(trimmed)) {
    return Number(trimmed) * 1000;
  }
  const date = Date.parse(trimmed);
  return Number.isNaN(date) ? null : Math.max(0, date - now);
}

export function classifyFetchError(error: unknown): ErrorClass {
  if (error instanceof FetchError) {
    return error.kind;
  }
  return classifyNetworkError(error);
}

export class HttpFetcher implements PageFetcher {
  private userAgent: string;
  private timeout: number;
  private extractor: Extractor;

  constructor(options?: HttpFetcherOptions) {
    this.userAgent = options?.userAgent ?? "docsage/0.1 (documentation crawler)";
    this.timeout = options?.timeout ?? 20000;
    this.extractor = options?.extractor ?? new DocExtractor();
  }

  async fetch(url: string, signal?: AbortSignal): Promise<FetchedPage> {
    signal?.throwIfAborted();

    const controller = new AbortController();
    let timedOut = false;
    const timeoutId = setTimeout(() => {
      timedOut = true;
      controller.abort(new DOMException(`Timed out after ${this.timeout}ms`, "TimeoutError"));
    }, this.timeout);
    const onAbort = () => controller.abort(signal?.reason);
    signal?.addEventListener("abort", onAbort, { once: true });

    let response: Response;
    let body: string;
    try {
      response = await fetch(url, {
        headers: {
          "User-Agent": this.userAgent,
          "Accept": ACCEPT,
        },
        signal: controller.signal,
        redirect: "follow",
      });

      if (!response.ok) {
        await response.body?.cancel();
        throw this.statusError(url, response);
      }

      const serverType = contentTypeOf(response);
      if (!SUPPORTED_TYPES.some(type => serverType.includes(type))) {
        await response.body?.cancel();
        throw new FetchError(`Unsupported content type "${serverType}": ${url}`, "permanent", url, response.status);
      }

      body = await response.text();
    } catch (error) {
      if (error instanceof FetchError) throw error;
      if (signal?.aborted) throw signal.reason;
      if (timedOut) {
        throw new FetchError(`Timed out after ${this.timeout}ms: ${url}`, "transient", url, null, null, { cause: error });
      }
      throw new FetchError(`Network error fetching ${url}: ${errorMessage(error)}`, "transient", url, null, null, { cause: error });
    } finally {
      clearTimeout(timeoutId);
      signal?.removeEventListener("abort", onAbort);
    }

    const finalUrl = response.url || url;
    const contentType = detectContentType(finalUrl, body, contentTypeOf(response));

    try {
      const extracted = await this.extractor.extract(body, finalUrl, contentType);
      return { ...extracted, contentType, statusCode: response.status };
    } catch (error) {
      throw new FetchError(`Malformed content at ${url}: ${errorMessage(error)}`, "permanent", url, response.status, null, { cause: error });
    }
  }

  private statusError(url: string, response: Response): FetchError {
    const status = response.status;
    const message = `HTTP ${status}${response.statusText ? ` ${response.statusText}` : ""}: ${url}`;
    if (isTransientStatus(status)) {
      return new FetchError(message, "transient", url, status, parseRetryAfter(response.headers.get("Retry-After")));
    }
    return new FetchError(message, "permanent", url, status);
  }
}

function contentTypeOf(response: Response): string {
  return (response.headers.get("Content-Type") ?? "text/html").toLowerCase();
}

function detectContentType(url: string, content: string, serverType: string): string {
  const path = url.split(/[?#]/)[0] ?? url;
  if (path.endsWith(".md") || path.endsWith(".mdx")) {
    return "text/markdown";
  }

  // Raw markdown served as text/plain
  if (serverType.includes("text/plain")) {
    const trimmed = content.trimStart();
    if (trimmed.startsWith("# ") || trimmed.startsWith("## ") || /^---\n[\s\S]*?\n---/.test(trimmed)) {
      return "text/markdown";
    }
  }

  return serverType;
}
