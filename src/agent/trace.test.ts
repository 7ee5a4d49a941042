// pattern: Functional Core

import { describe, it, expect } from 'vitest';
import { createTraceCollector, renderTrace, summarizeResults, truncateSnippet } from './trace.js';
import type { TraceEntry } from './types.js';

describe('truncateSnippet', () => {
  it('leaves short snippets alone', () => {
    expect(truncateSnippet('short')).toBe('short');
    expect(truncateSnippet('a'.repeat(100))).toBe('a'.repeat(100));
  });

  it('caps long snippets at 100 characters plus an ellipsis', () => {
    expect(truncateSnippet('b'.repeat(150))).toBe(`${'b'.repeat(100)}...`);
  });
});

describe('summarizeResults', () => {
  it('keeps the top three results', () => {
    const results = ['one', 'two', 'three', 'four', 'five'].map((title) => ({
      title,
      url: `https://example.com/${title}`,
      snippet: `${title} snippet`,
    }));

    expect(summarizeResults(results).map((s) => s.title)).toEqual(['one', 'two', 'three']);
  });
});

describe('createTraceCollector', () => {
  const results = [{ title: 'Rust', url: 'https://example.com/rust', snippet: 'Rust releases' }];

  it('records queries with summaries when sources are included', () => {
    const trace = createTraceCollector({ includeSources: true });
    trace.record('rust version', results);

    expect(trace.hasSearches()).toBe(true);
    expect(trace.entries()).toEqual([
      { query: 'rust version', sources: [{ title: 'Rust', url: 'https://example.com/rust', snippet: 'Rust releases' }] },
    ]);
  });

  it('records only queries when sources are excluded', () => {
    const trace = createTraceCollector({ includeSources: false });
    trace.record('rust version', results);

    expect(trace.entries()).toEqual([{ query: 'rust version', sources: [] }]);
  });

  it('starts empty', () => {
    const trace = createTraceCollector({ includeSources: true });

    expect(trace.hasSearches()).toBe(false);
    expect(trace.entries()).toEqual([]);
  });
});

describe('renderTrace', () => {
  const entries: ReadonlyArray<TraceEntry> = [
    {
      query: 'node lts',
      sources: [
        { title: 'Node Releases', url: 'https://example.com/node', snippet: 'Node 22 is LTS' },
        { title: 'No Snippet', url: 'https://example.com/bare', snippet: '' },
      ],
    },
    { query: 'nvm install', sources: [] },
  ];

  it('renders the searched-for line, numbered sources, then the answer', () => {
    expect(renderTrace(entries, 'nvm install --lts')).toBe(
      [
        'Searched for: node lts; nvm install',
        'Sources:',
        '1. Node Releases - https://example.com/node',
        '   Node 22 is LTS',
        '2. No Snippet - https://example.com/bare',
        '',
        'nvm install --lts',
      ].join('\n'),
    );
  });

  it('renders sentinels when nothing was searched', () => {
    expect(renderTrace([], 'brew install redis')).toBe(
      'Searched for: no search required\nSources: N/A\n\nbrew install redis',
    );
  });

  it('renders N/A when searches returned no sources', () => {
    expect(renderTrace([{ query: 'obscure thing', sources: [] }], 'echo ok')).toBe(
      'Searched for: obscure thing\nSources: N/A\n\necho ok',
    );
  });

  it('renders identically for the same entries', () => {
    expect(renderTrace(entries, 'answer')).toBe(renderTrace(entries, 'answer'));
  });
});
