// pattern: Functional Core

/**
 * Verbose trace of the searches made during one run.
 * Rendering is post-processing on the final answer; nothing here reaches the model.
 */

import type { SearchRecorder } from '../tool/builtin/web.js';
import type { SearchResult } from '../web/types.js';
import type { SourceSummary, TraceEntry } from './types.js';

export const TRACE_SOURCES_PER_QUERY = 3;
export const TRACE_SNIPPET_LENGTH = 100;

const NO_SEARCH_SENTINEL = 'no search required';
const NO_SOURCES_SENTINEL = 'N/A';

export type TraceCollector = SearchRecorder & {
  entries(): ReadonlyArray<TraceEntry>;
  hasSearches(): boolean;
};

export type TraceCollectorOptions = {
  /** Keep result summaries alongside each query; queries are always kept. */
  readonly includeSources: boolean;
};

export function truncateSnippet(snippet: string, maxLength: number = TRACE_SNIPPET_LENGTH): string {
  return snippet.length > maxLength ? `${snippet.slice(0, maxLength)}...` : snippet;
}

export function summarizeResults(
  results: ReadonlyArray<SearchResult>,
  limit: number = TRACE_SOURCES_PER_QUERY,
): Array<SourceSummary> {
  return results.slice(0, limit).map((result) => ({
    title: result.title,
    url: result.url,
    snippet: truncateSnippet(result.snippet),
  }));
}

export function createTraceCollector(options: TraceCollectorOptions): TraceCollector {
  const entries: Array<TraceEntry> = [];

  return {
    record(query: string, results: ReadonlyArray<SearchResult>): void {
      entries.push({
        query,
        sources: options.includeSources ? summarizeResults(results) : [],
      });
    },

    entries(): ReadonlyArray<TraceEntry> {
      return entries.slice();
    },

    hasSearches(): boolean {
      return entries.length > 0;
    },
  };
}

/**
 * Render the searched-for line, the numbered source list and the answer, in that order.
 */
export function renderTrace(entries: ReadonlyArray<TraceEntry>, answer: string): string {
  const queries = entries.map((entry) => entry.query);
  const sources = entries.flatMap((entry) => entry.sources);

  const lines: Array<string> = [
    `Searched for: ${queries.length > 0 ? queries.join('; ') : NO_SEARCH_SENTINEL}`,
  ];

  if (sources.length === 0) {
    lines.push(`Sources: ${NO_SOURCES_SENTINEL}`);
  } else {
    lines.push('Sources:');
    sources.forEach((source, index) => {
      lines.push(`${index + 1}. ${source.title} - ${source.url}`);
      if (source.snippet) {
        lines.push(`   ${source.snippet}`);
      }
    });
  }

  lines.push('', answer);
  return lines.join('\n');
}
