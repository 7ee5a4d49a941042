// pattern: Functional Core

export type { SearchResult, ProviderName, ProviderErrorKind } from "./types.js";
export { ProviderError, type SearchProvider } from "./types.js";
export { fetchProviderText, DEFAULT_PROVIDER_TIMEOUT_MS } from "./request.js";
export { createBraveAdapter } from "./providers/brave.js";
export { createDuckDuckGoAdapter, parseDuckDuckGoHtml } from "./providers/duckduckgo.js";
export {
  planSearchProvider,
  resolveSearchProvider,
  createDefaultProviderFactories,
  type ProviderSelection,
  type ProviderPlan,
  type ProviderFactories,
} from "./resolve.js";
