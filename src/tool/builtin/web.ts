// pattern: Imperative Shell

/**
 * Built-in web_search tool.
 * Delegates to the resolved search provider and hands provider failures back as tool output.
 */

import type { Tool } from '../types.js';
import type { SearchProvider, SearchResult } from '../../web/types.js';

export const WEB_SEARCH_TOOL_NAME = 'web_search';

export type SearchRecorder = {
  record(query: string, results: ReadonlyArray<SearchResult>): void;
};

export type WebSearchToolOptions = {
  readonly provider: SearchProvider;
  readonly maxResults: number;
  readonly recorder?: SearchRecorder;
};

export function createWebSearchTool(options: WebSearchToolOptions): Tool {
  const { provider, maxResults, recorder } = options;

  return {
    definition: {
      name: WEB_SEARCH_TOOL_NAME,
      description:
        "Search the web for current information, latest versions, recent documentation, or up-to-date facts. Use this when you need information that may have changed recently or when the user asks about 'latest' or 'current' versions. Returns a list of results with title, url, and snippet.",
      parameters: [
        {
          name: 'query',
          type: 'string',
          description: 'The search query to execute',
          required: true,
        },
      ],
    },
    handler: async (params) => {
      const query = String(params['query']).trim();

      try {
        const results = await provider.search(query, maxResults);
        recorder?.record(query, results);
        return {
          success: true,
          output: JSON.stringify(results, null, 2),
        };
      } catch (err) {
        recorder?.record(query, []);
        return {
          success: false,
          output: '',
          error: `web search failed: ${err instanceof Error ? err.message : String(err)}`,
        };
      }
    },
  };
}
