// pattern: Functional Core

/**
 * Shared types for web search.
 * These types define the port interface that every search provider adapter normalises to.
 */

export type SearchResult = {
  readonly title: string;
  readonly url: string;
  readonly snippet: string;
};

export interface SearchProvider {
  readonly name: ProviderName;
  search(query: string, maxResults: number): Promise<ReadonlyArray<SearchResult>>;
}

export type ProviderName = "duckduckgo" | "brave";

export type ProviderErrorKind = "http" | "decode" | "timeout" | "network";

export class ProviderError extends Error {
  constructor(
    public kind: ProviderErrorKind,
    public provider: ProviderName,
    message: string = ""
  ) {
    super(message);
    this.name = "ProviderError";
  }
}
