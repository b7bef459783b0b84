// Crawler module barrel export

export { DocExtractor, cleanText, isMarkdownSource } from "./extractor";
export { HttpFetcher, classifyFetchError, isTransientStatus, parseRetryAfter } from "./fetcher";
export type { HttpFetcherOptions } from "./fetcher";
export { TextChunker, findHeadings } from "./chunker";
export type { ChunkerOptions } from "./chunker";
export { Frontier } from "./frontier";
export type { FrontierItem, FrontierOptions } from "./frontier";
export { SitemapDiscovery, parseSitemapXml, SITEMAP_PATHS } from "./sitemap";
export { CrawlJob, createFetchRetry } from "./job";
export type { CrawlJobDeps } from "./job";
export { CrawlOrchestrator, INTERRUPTED_MESSAGE } from "./orchestrator";
