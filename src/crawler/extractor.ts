// Doc extractor using Readability for HTML and light cleanup for Markdown

import { parseHTML } from "linkedom";
import { Readability } from "@mozilla/readability";
import type { Extractor, ExtractedContent } from "../types";
import { normalizeUrl } from "../utils/url";
import { findHeadings } from "./chunker";

type LinkedDocument = ReturnType<typeof parseHTML>["document"];

const BLOCK_SELECTOR = "p, div, section, article, li, ul, ol, tr, table, pre, blockquote, dt, dd, figure";

export function isMarkdownSource(url: string, contentType: string): boolean {
  const path = url.split(/[?#]/)[0] ?? url;
  return contentType.includes("markdown") ||
         contentType.includes("text/md") ||
         path.endsWith(".md") ||
         path.endsWith(".mdx");
}

/**
 * Turns a page into plain text with Markdown-style heading lines, so the
 * chunker can title chunks the same way for HTML and Markdown sources.
 */
export class DocExtractor implements Extractor {
  async extract(content: string, url: string, contentType: string): Promise<ExtractedContent> {
    if (isMarkdownSource(url, contentType)) {
      return this.extractMarkdown(content, url);
    }
    if (contentType.includes("text/plain")) {
      const text = cleanText(content);
      return { url, title: firstLine(text) || "Untitled", content: text, links: [], headings: [] };
    }
    return this.extractHtml(content, url);
  }

  private extractHtml(html: string, url: string): ExtractedContent {
    const { document } = parseHTML(html);

    const title = document.querySelector("title")?.textContent?.trim() ||
                  document.querySelector("h1")?.textContent?.trim() ||
                  "Untitled";

    // Readability rewrites the document, so links are collected first
    const links = this.extractLinks(document, url);

    // linkedom provides a DOM-compatible document that Readability can process
    const reader = new Readability(document as unknown as Document, {
      charThreshold: 0,
    });
    const article = reader.parse();

    const body = article?.content ?? document.body?.innerHTML ?? "";
    const content = this.htmlToText(body);

    return {
      url,
      title: article?.title?.trim() || title,
      content,
      links,
      headings: findHeadings(content),
    };
  }

  private extractMarkdown(md: string, url: string): ExtractedContent {
    const content = cleanMarkdown(md);
    const headings = findHeadings(content);
    const title = headings.find(h => h.level === 1)?.text ?? headings[0]?.text ?? "Untitled";

    return { url, title, content, links: this.extractMarkdownLinks(md, url), headings };
  }

  private extractLinks(document: LinkedDocument, baseUrl: string): string[] {
    const links = new Set<string>();
    for (const anchor of document.querySelectorAll("a[href]")) {
      const href = anchor.getAttribute("href");
      if (!href || href.startsWith("#") || href.startsWith("mailto:") || href.startsWith("javascript:")) continue;

      const absolute = normalizeUrl(href, baseUrl);
      if (absolute) {
        links.add(absolute);
      }
    }
    return [...links];
  }

  private extractMarkdownLinks(md: string, baseUrl: string): string[] {
    const links = new Set<string>();
    const linkRegex = /\[[^\]]*\]\(([^)\s]+)(?:\s+"[^"]*")?\)/g;
    let match: RegExpExecArray | null;

    while ((match = linkRegex.exec(md)) !== null) {
      const href = match[1];
      if (!href || href.startsWith("#")) continue;

      const absolute = normalizeUrl(href, baseUrl);
      if (absolute) {
        links.add(absolute);
      }
    }
    return [...links];
  }

  private htmlToText(html: string): string {
    const { document } = parseHTML(`<!DOCTYPE html><html><body>${html}</body></html>`);

    for (const node of document.querySelectorAll("script, style, noscript, svg, button")) {
      node.remove();
    }

    for (const heading of document.querySelectorAll("h1, h2, h3, h4, h5, h6")) {
      const level = Number(heading.tagName.slice(1));
      const text = (heading.textContent ?? "").replace(/\s+/g, " ").trim();
      heading.textContent = text ? `\n\n${"#".repeat(level)} ${text}\n\n` : "";
    }

    for (const br of document.querySelectorAll("br")) {
      br.parentNode?.insertBefore(document.createTextNode("\n"), br);
    }

    for (const block of document.querySelectorAll(BLOCK_SELECTOR)) {
      block.insertBefore(document.createTextNode("\n\n"), block.firstChild);
      block.appendChild(document.createTextNode("\n\n"));
    }

    return cleanText(document.body?.textContent ?? "");
  }
}

export function cleanText(text: string): string {
  return text
    .replace(/\r\n?/g, "\n")
    .replace(/\u00a0/g, " ")
    .replace(/\t/g, " ")
    .replace(/ +/g, " ")
    .split("\n")
    .map(line => line.trim())
    .join("\n")
    .replace(/\n{3,}/g, "\n\n")
    .trim();
}

function cleanMarkdown(md: string): string {
  return md
    .replace(/\r\n?/g, "\n")
    .replace(/^---\n[\s\S]*?\n---\n?/, "")
    .replace(/<!--[\s\S]*?-->/g, "")
    .replace(/\n{3,}/g, "\n\n")
    .trim();
}

function firstLine(text: string): string {
  return text.split("\n", 1)[0]?.trim().slice(0, 120) ?? "";
}
