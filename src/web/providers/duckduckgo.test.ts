// pattern: Imperative Shell

import { describe, it, expect, vi, afterEach } from "vitest";
import { createDuckDuckGoAdapter, parseDuckDuckGoHtml } from "./duckduckgo.js";
import { ProviderError } from "../types.js";

const MOCK_DDG_HTML = `
<html><body>
<div id="links">
  <div class="result results_links">
    <h2 class="result__title"><a class="result__a" href="https://example.com/page1">Example <b>Page</b> 1</a></h2>
    <a class="result__snippet">This is the first   result snippet.</a>
  </div>
  <div class="result results_links">
    <h2 class="result__title"><a class="result__a" href="//duckduckgo.com/l/?uddg=https%3A%2F%2Fexample.com%2Fpage2&amp;rut=abc">Example Page 2</a></h2>
    <a class="result__snippet">This is the second result snippet.</a>
  </div>
  <div class="result results_links">
    <h2 class="result__title"><a class="result__a" href="https://example.com/page3">Example Page 3</a></h2>
    <a class="result__snippet">This is the third result snippet.</a>
  </div>
</div>
</body></html>`;

const BOT_CHALLENGE_HTML = `<html><body><form id="challenge-form"><p>Please confirm you are human.</p></form></body></html>`;

function stubFetch(body: string, status = 200) {
  const fetchMock = vi.fn(async (_input: string | URL | Request, _init?: RequestInit) => new Response(body, { status }));
  vi.stubGlobal("fetch", fetchMock);
  return fetchMock;
}

describe("DuckDuckGo adapter", () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it("parses the HTML results page into title, url and snippet", async () => {
    stubFetch(MOCK_DDG_HTML);

    const adapter = createDuckDuckGoAdapter();
    const results = await adapter.search("test query", 10);

    expect(adapter.name).toBe("duckduckgo");
    expect(results).toEqual([
      { title: "Example Page 1", url: "https://example.com/page1", snippet: "This is the first result snippet." },
      { title: "Example Page 2", url: "https://example.com/page2", snippet: "This is the second result snippet." },
      { title: "Example Page 3", url: "https://example.com/page3", snippet: "This is the third result snippet." },
    ]);
  });

  it("returns at most maxResults results", async () => {
    stubFetch(MOCK_DDG_HTML);

    const results = await createDuckDuckGoAdapter().search("test query", 2);

    expect(results.map((r) => r.title)).toEqual(["Example Page 1", "Example Page 2"]);
  });

  it("returns an empty list for a page without result containers", async () => {
    stubFetch(BOT_CHALLENGE_HTML);

    const results = await createDuckDuckGoAdapter().search("test query", 5);

    expect(results).toEqual([]);
  });

  it("issues a GET with the query percent-encoded and a browser User-Agent", async () => {
    const fetchMock = stubFetch("<html><body></body></html>");

    await createDuckDuckGoAdapter().search("test & special chars", 5);

    expect(fetchMock).toHaveBeenCalledTimes(1);
    const [input, init] = fetchMock.mock.calls[0] ?? [];
    expect(String(input)).toBe("https://html.duckduckgo.com/html/?q=test%20%26%20special%20chars");
    expect(init?.method).toBeUndefined();
    expect(new Headers(init?.headers).get("User-Agent")).toContain("Mozilla/5.0");
    expect(init?.signal).toBeInstanceOf(AbortSignal);
  });

  it("raises an http ProviderError on a non-2xx status", async () => {
    stubFetch("forbidden", 403);

    const error = await createDuckDuckGoAdapter().search("test", 5).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ProviderError);
    expect(error).toHaveProperty("kind", "http");
    expect(error).toHaveProperty("message", "duckduckgo returned status 403");
  });

  it("raises a timeout ProviderError when the request times out", async () => {
    vi.stubGlobal("fetch", vi.fn(async () => {
      throw Object.assign(new Error("The operation was aborted due to timeout"), { name: "TimeoutError" });
    }));

    const error = await createDuckDuckGoAdapter({ timeoutMs: 2500 }).search("test", 5).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ProviderError);
    expect(error).toHaveProperty("kind", "timeout");
    expect(error).toHaveProperty("message", "duckduckgo timed out after 2500ms");
  });

  it("raises a network ProviderError when the connection fails", async () => {
    vi.stubGlobal("fetch", vi.fn(async () => {
      throw new TypeError("fetch failed");
    }));

    const error = await createDuckDuckGoAdapter().search("test", 5).catch((e: unknown) => e);

    expect(error).toHaveProperty("kind", "network");
    expect(error).toHaveProperty("message", "duckduckgo request failed: fetch failed");
  });
});

describe("parseDuckDuckGoHtml", () => {
  it("skips result containers without a title anchor", () => {
    const html = `
<html><body>
<div class="result">
  <a class="result__a" href="https://example.com/1">Valid Result</a>
  <a class="result__snippet">Valid snippet</a>
</div>
<div class="result">
  <a class="result__snippet">Missing anchor</a>
</div>
<div class="result">
  <a class="result__a" href="https://example.com/2">Another Valid</a>
</div>
</body></html>`;

    expect(parseDuckDuckGoHtml(html, 10)).toEqual([
      { title: "Valid Result", url: "https://example.com/1", snippet: "Valid snippet" },
      { title: "Another Valid", url: "https://example.com/2", snippet: "" },
    ]);
  });

  it("falls back to the displayed url when the anchor has no href", () => {
    const html = `
<html><body>
<div class="result">
  <a class="result__a">Docs</a>
  <a class="result__url"> example.org/docs </a>
  <a class="result__snippet">Reference manual</a>
</div>
</body></html>`;

    expect(parseDuckDuckGoHtml(html, 10)).toEqual([
      { title: "Docs", url: "https://example.org/docs", snippet: "Reference manual" },
    ]);
  });
});
