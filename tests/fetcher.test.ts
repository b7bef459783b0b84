import { describe, test, expect, vi, afterEach } from "vitest";
import { HttpFetcher, isTransientStatus, parseRetryAfter, classifyFetchError } from "../src/crawler/fetcher";
import { FetchError } from "../src/errors";

type FetchInput = string | URL | Request;

function stubFetch(handler: (input: FetchInput, init?: RequestInit) => Promise<Response>) {
  const mock = vi.fn(handler);
  vi.stubGlobal("fetch", mock);
  return mock;
}

function hangUntilAborted(init?: RequestInit): Promise<Response> {
  return new Promise((_resolve, reject) => {
    const signal = init?.signal;
    if (signal) signal.addEventListener("abort", () => reject(signal.reason), { once: true });
  });
}

async function fetchError(promise: Promise<unknown>): Promise<FetchError> {
  const error = await promise.then(() => null, (e: unknown) => e);
  if (!(error instanceof FetchError)) {
    throw new Error(`expected FetchError, got ${String(error)}`);
  }
  return error;
}

afterEach(() => {
  vi.unstubAllGlobals();
});

describe("HttpFetcher", () => {
  const url = "https://docs.example.com/guide";

  test("returns extracted content with the status code", async () => {
    stubFetch(async () => new Response("<html><head><title>Guide</title></head><body><p>Hello docs.</p></body></html>", {
      status: 200,
      headers: { "Content-Type": "text/html; charset=utf-8" },
    }));

    const page = await new HttpFetcher().fetch(url);
    expect(page.url).toBe(url);
    expect(page.title).toBe("Guide");
    expect(page.statusCode).toBe(200);
    expect(page.contentType).toBe("text/html; charset=utf-8");
  });

  test("sends the configured user agent", async () => {
    const mock = stubFetch(async () => new Response("hello", { headers: { "Content-Type": "text/plain" } }));
    await new HttpFetcher({ userAgent: "test-agent" }).fetch(url);

    const init = mock.mock.calls[0]?.[1];
    expect(new Headers(init?.headers).get("User-Agent")).toBe("test-agent");
  });

  test("classifies 404 as permanent", async () => {
    stubFetch(async () => new Response("missing", { status: 404 }));
    const error = await fetchError(new HttpFetcher().fetch(url));

    expect(error.kind).toBe("permanent");
    expect(error.status).toBe(404);
    expect(error.message).toBe(`HTTP 404: ${url}`);
  });

  test("classifies 503 as transient and keeps Retry-After", async () => {
    stubFetch(async () => new Response("busy", { status: 503, headers: { "Retry-After": "2" } }));
    const error = await fetchError(new HttpFetcher().fetch(url));

    expect(error.kind).toBe("transient");
    expect(error.retryAfterMs).toBe(2000);
  });

  test("classifies network failures as transient", async () => {
    stubFetch(async () => {
      throw new TypeError("fetch failed");
    });
    const error = await fetchError(new HttpFetcher().fetch(url));

    expect(error.kind).toBe("transient");
    expect(error.message).toBe(`Network error fetching ${url}: fetch failed`);
  });

  test("times out slow responses", async () => {
    stubFetch((_input, init) => hangUntilAborted(init));
    const error = await fetchError(new HttpFetcher({ timeout: 20 }).fetch(url));

    expect(error.kind).toBe("transient");
    expect(error.message).toBe(`Timed out after 20ms: ${url}`);
  });

  test("rethrows the caller's abort reason", async () => {
    const controller = new AbortController();
    stubFetch((_input, init) => hangUntilAborted(init));

    const pending = new HttpFetcher().fetch(url, controller.signal);
    const reason = new Error("site deleted");
    controller.abort(reason);
    await expect(pending).rejects.toBe(reason);
  });

  test("rejects unsupported content types permanently", async () => {
    stubFetch(async () => new Response("binary", { headers: { "Content-Type": "image/png" } }));
    const error = await fetchError(new HttpFetcher().fetch(url));

    expect(error.kind).toBe("permanent");
    expect(error.message).toBe(`Unsupported content type "image/png": ${url}`);
  });

  test("rejects an unsupported type without reading the body", async () => {
    let cancelled = false;
    const endless = new ReadableStream<Uint8Array>({
      pull() {},
      cancel() {
        cancelled = true;
      },
    });
    stubFetch(async () => new Response(endless, { headers: { "Content-Type": "application/pdf" } }));

    const error = await fetchError(new HttpFetcher().fetch(url));

    expect(error.message).toBe(`Unsupported content type "application/pdf": ${url}`);
    expect(cancelled).toBe(true);
  });

  test("detects markdown served as text/plain", async () => {
    stubFetch(async () => new Response("# Raw Guide\n\nBody text.", { headers: { "Content-Type": "text/plain" } }));
    const page = await new HttpFetcher().fetch(url);

    expect(page.contentType).toBe("text/markdown");
    expect(page.title).toBe("Raw Guide");
  });

  test("reports extractor failures as malformed content", async () => {
    stubFetch(async () => new Response("<p>x</p>", { headers: { "Content-Type": "text/html" } }));
    const fetcher = new HttpFetcher({
      extractor: {
        extract: async () => {
          throw new Error("parse failure");
        },
      },
    });
    const error = await fetchError(fetcher.fetch(url));

    expect(error.kind).toBe("permanent");
    expect(error.message).toBe(`Malformed content at ${url}: parse failure`);
  });
});

describe("status helpers", () => {
  test("isTransientStatus", () => {
    expect(isTransientStatus(429)).toBe(true);
    expect(isTransientStatus(502)).toBe(true);
    expect(isTransientStatus(404)).toBe(false);
  });

  test("parseRetryAfter reads seconds and HTTP dates", () => {
    expect(parseRetryAfter("3")).toBe(3000);
    expect(parseRetryAfter("Wed, 21 Oct 2015 07:28:10 GMT", Date.parse("Wed, 21 Oct 2015 07:28:00 GMT"))).toBe(10000);
    expect(parseRetryAfter("soon")).toBeNull();
    expect(parseRetryAfter(null)).toBeNull();
  });

  test("classifyFetchError uses the FetchError kind", () => {
    expect(classifyFetchError(new FetchError("x", "permanent", "https://docs.example.com/"))).toBe("permanent");
    expect(classifyFetchError(new TypeError("fetch failed"))).toBe("transient");
  });
});
