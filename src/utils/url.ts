// URL canonicalization and crawl-scope checks

import type { CrawlScope } from "../types";
import { ValidationError } from "../errors";

const SKIPPED_EXTENSIONS = /\.(png|jpe?g|gif|svg|webp|ico|pdf|zip|gz|tgz|tar|mp4|mp3|wav|woff2?|ttf|eot|css|js|mjs|map|json|xml|rss|atom)$/i;

/**
 * Canonical form used for deduplication: lowercase scheme and host, default
 * port dropped, fragment stripped, duplicate slashes collapsed, trailing slash
 * removed (except for the root path) and query parameters sorted.
 */
export function normalizeUrl(input: string, base?: string): string | null {
  let url: URL;
  try {
    url = base ? new URL(input, base) : new URL(input);
  } catch {
    return null;
  }

  if (url.protocol !== "http:" && url.protocol !== "https:") {
    return null;
  }

  url.hash = "";
  url.username = "";
  url.password = "";

  let path = url.pathname.replace(/\/{2,}/g, "/");
  if (path.length > 1 && path.endsWith("/")) {
    path = path.replace(/\/+$/, "");
  }
  url.pathname = path || "/";

  if (url.search) {
    const params = Array.from(url.searchParams.entries()).sort(([a, av], [b, bv]) =>
      a === b ? compare(av, bv) : compare(a, b)
    );
    url.search = new URLSearchParams(params).toString();
  }

  // URL already lowercases the host and drops default ports
  return url.toString();
}

function compare(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/** Parse a user-submitted root URL, rejecting anything that is not http(s) */
export function parseSiteUrl(input: unknown): string {
  if (typeof input !== "string" || input.trim() === "") {
    throw new ValidationError("url is required", "url");
  }

  let raw = input.trim();
  if (!/^[a-z][a-z0-9+.-]*:\/\//i.test(raw)) {
    raw = `https://${raw}`;
  }

  const normalized = normalizeUrl(raw);
  if (!normalized) {
    throw new ValidationError(`Invalid URL: ${input}`, "url");
  }
  const hostname = new URL(normalized).hostname;
  if (!hostname.includes(".") && hostname !== "localhost") {
    throw new ValidationError(`Invalid URL host: ${hostname}`, "url");
  }
  return normalized;
}

/** Registrable-domain approximation: the last two labels of the host */
export function baseDomain(hostname: string): string {
  const labels = hostname.split(".");
  return labels.slice(-2).join(".");
}

/** Directory prefix of the root path, e.g. "/docs/intro" -> "/docs/" */
export function rootPathPrefix(pathname: string): string {
  if (pathname.endsWith("/")) return pathname;
  const lastSlash = pathname.lastIndexOf("/");
  return lastSlash <= 0 ? "/" : pathname.slice(0, lastSlash + 1);
}

export function isInScope(candidate: string, rootUrl: string, scope: CrawlScope): boolean {
  let target: URL;
  let root: URL;
  try {
    target = new URL(candidate);
    root = new URL(rootUrl);
  } catch {
    return false;
  }

  if (SKIPPED_EXTENSIONS.test(target.pathname)) {
    return false;
  }

  switch (scope) {
    case "domain":
      return baseDomain(target.hostname) === baseDomain(root.hostname);
    case "path": {
      if (target.hostname !== root.hostname) return false;
      const prefix = rootPathPrefix(root.pathname);
      return target.pathname === root.pathname || `${target.pathname}/`.startsWith(prefix);
    }
    case "host":
    default:
      return target.hostname === root.hostname;
  }
}
