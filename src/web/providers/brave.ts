// pattern: Imperative Shell

import { z } from "zod";
import { fetchProviderText } from "../request.js";
import { ProviderError } from "../types.js";
import type { SearchProvider, SearchResult } from "../types.js";

const DEFAULT_BASE_URL = "https://api.search.brave.com/res/v1/web/search";
const MAX_COUNT = 20;

const BraveApiResponseSchema = z.object({
  web: z
    .object({
      results: z
        .array(
          z.object({
            title: z.string().default(""),
            url: z.string().default(""),
            description: z.string().default(""),
          })
        )
        .default([]),
    })
    .optional(),
});

export type BraveOptions = {
  readonly baseUrl?: string;
  readonly timeoutMs?: number;
};

function decodeBraveBody(body: string): z.infer<typeof BraveApiResponseSchema> {
  let json: unknown;
  try {
    json = JSON.parse(body);
  } catch (error) {
    const detail = error instanceof Error ? error.message : String(error);
    throw new ProviderError("decode", "brave", `brave returned malformed JSON: ${detail}`);
  }

  const parsed = BraveApiResponseSchema.safeParse(json);
  if (!parsed.success) {
    throw new ProviderError("decode", "brave", `brave returned an unexpected body: ${parsed.error.message}`);
  }
  return parsed.data;
}

export function createBraveAdapter(apiKey: string, options: BraveOptions = {}): SearchProvider {
  const baseUrl = options.baseUrl ?? DEFAULT_BASE_URL;

  return {
    name: "brave",
    async search(query: string, maxResults: number): Promise<ReadonlyArray<SearchResult>> {
      const url = new URL(baseUrl);
      url.searchParams.set("q", query);
      url.searchParams.set("count", String(Math.min(maxResults, MAX_COUNT)));

      const body = await fetchProviderText(
        "brave",
        url,
        {
          headers: {
            Accept: "application/json",
            "X-Subscription-Token": apiKey,
          },
        },
        options.timeoutMs
      );

      const data = decodeBraveBody(body);
      return (data.web?.results ?? [])
        .filter((r) => r.title && r.url)
        .slice(0, maxResults)
        .map((r) => ({
          title: r.title,
          url: r.url,
          snippet: r.description,
        }));
    },
  };
}
