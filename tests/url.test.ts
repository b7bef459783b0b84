import { describe, test, expect } from "vitest";
import { normalizeUrl, parseSiteUrl, isInScope, baseDomain, rootPathPrefix } from "../src/utils/url";
import { ValidationError } from "../src/errors";

describe("normalizeUrl", () => {
  test("treats trailing slash, fragment, default port and host case as identical", () => {
    const variants = [
      "https://Docs.Example.com/guide/",
      "https://docs.example.com/guide#install",
      "https://docs.example.com:443/guide",
      "https://docs.example.com//guide",
    ];
    for (const variant of variants) {
      expect(normalizeUrl(variant)).toBe("https://docs.example.com/guide");
    }
  });

  test("sorts query parameters", () => {
    expect(normalizeUrl("https://docs.example.com/search?b=2&a=1")).toBe("https://docs.example.com/search?a=1&b=2");
  });

  test("keeps the root path slash", () => {
    expect(normalizeUrl("https://docs.example.com")).toBe("https://docs.example.com/");
  });

  test("resolves relative links against a base", () => {
    expect(normalizeUrl("../api/", "https://docs.example.com/guide/intro")).toBe("https://docs.example.com/api");
  });

  test("rejects non-http schemes and garbage", () => {
    expect(normalizeUrl("mailto:team@example.com")).toBeNull();
    expect(normalizeUrl("not a url")).toBeNull();
  });
});

describe("parseSiteUrl", () => {
  test("adds https when the scheme is missing", () => {
    expect(parseSiteUrl("docs.example.com/start/")).toBe("https://docs.example.com/start");
  });

  test("rejects empty and malformed input with ValidationError", () => {
    expect(() => parseSiteUrl("")).toThrow(ValidationError);
    expect(() => parseSiteUrl(42)).toThrow("url is required");
    expect(() => parseSiteUrl("ftp://docs.example.com")).toThrow(ValidationError);
    expect(() => parseSiteUrl("http://intranet")).toThrow("Invalid URL host: intranet");
  });
});

describe("crawl scope", () => {
  const root = "https://docs.example.com/v2/intro";

  test("host scope stays on the root host", () => {
    expect(isInScope("https://docs.example.com/other", root, "host")).toBe(true);
    expect(isInScope("https://blog.example.com/post", root, "host")).toBe(false);
  });

  test("domain scope allows sibling subdomains", () => {
    expect(isInScope("https://blog.example.com/post", root, "domain")).toBe(true);
    expect(isInScope("https://example.org/", root, "domain")).toBe(false);
  });

  test("path scope stays under the root directory", () => {
    expect(isInScope("https://docs.example.com/v2/setup", root, "path")).toBe(true);
    expect(isInScope("https://docs.example.com/v1/setup", root, "path")).toBe(false);
  });

  test("skips asset links", () => {
    expect(isInScope("https://docs.example.com/logo.png", root, "host")).toBe(false);
    expect(isInScope("https://docs.example.com/manual.pdf", root, "host")).toBe(false);
  });

  test("helpers", () => {
    expect(baseDomain("a.b.example.com")).toBe("example.com");
    expect(rootPathPrefix("/docs/intro")).toBe("/docs/");
    expect(rootPathPrefix("/intro")).toBe("/");
    expect(rootPathPrefix("/docs/")).toBe("/docs/");
  });
});
