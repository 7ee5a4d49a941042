// pattern: Imperative Shell

import { parseHTML } from "linkedom";
import { fetchProviderText } from "../request.js";
import type { SearchProvider, SearchResult } from "../types.js";

const DEFAULT_BASE_URL = "https://html.duckduckgo.com/html/";
const USER_AGENT = "Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36";

const RESULT_SELECTOR = ".result";
const TITLE_SELECTOR = ".result__a";
const SNIPPET_SELECTOR = ".result__snippet";
const DISPLAY_URL_SELECTOR = ".result__url";

export type DuckDuckGoOptions = {
  readonly baseUrl?: string;
  readonly timeoutMs?: number;
};

function normalizeText(text: string | null | undefined): string {
  return (text ?? "").replace(/\s+/g, " ").trim();
}

function extractUrl(href: string): string {
  if (href.includes("uddg=")) {
    try {
      const parsed = new URL(href, "https://duckduckgo.com");
      const uddg = parsed.searchParams.get("uddg");
      if (uddg) return uddg;
    } catch {
      // fall through to raw href
    }
  }
  if (href.startsWith("//")) {
    return `https:${href}`;
  }
  return href;
}

function displayUrlToHref(displayUrl: string): string {
  if (!displayUrl) return "";
  return /^https?:\/\//.test(displayUrl) ? displayUrl : `https://${displayUrl}`;
}

/**
 * Parse a DuckDuckGo HTML results page.
 * A page without result containers (a bot challenge, for instance) yields no results rather than an error.
 */
export function parseDuckDuckGoHtml(html: string, maxResults: number): Array<SearchResult> {
  const { document } = parseHTML(html);
  const results: Array<SearchResult> = [];

  for (const el of Array.from(document.querySelectorAll(RESULT_SELECTOR))) {
    if (results.length >= maxResults) break;

    const anchor = el.querySelector(TITLE_SELECTOR);
    if (!anchor) continue;

    const title = normalizeText(anchor.textContent);
    const href = anchor.getAttribute("href") ?? "";
    const url = href
      ? extractUrl(href)
      : displayUrlToHref(normalizeText(el.querySelector(DISPLAY_URL_SELECTOR)?.textContent));
    const snippet = normalizeText(el.querySelector(SNIPPET_SELECTOR)?.textContent);

    if (title && url) {
      results.push({ title, url, snippet });
    }
  }

  return results;
}

export function createDuckDuckGoAdapter(options: DuckDuckGoOptions = {}): SearchProvider {
  const baseUrl = options.baseUrl ?? DEFAULT_BASE_URL;

  return {
    name: "duckduckgo",
    async search(query: string, maxResults: number): Promise<ReadonlyArray<SearchResult>> {
      const html = await fetchProviderText(
        "duckduckgo",
        `${baseUrl}?q=${encodeURIComponent(query)}`,
        { headers: { "User-Agent": USER_AGENT } },
        options.timeoutMs
      );

      return parseDuckDuckGoHtml(html, maxResults);
    },
  };
}
