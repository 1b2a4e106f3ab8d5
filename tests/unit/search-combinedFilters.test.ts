import { describe, it, expect } from 'vitest';
import { applyFacetFilters } from '../../src/lib/facetFilter';
import { createSearchIndex } from '../../src/lib/searchBuild';
import { runSearch } from '../../src/lib/searchQuery';
import type { SearchDoc } from '../../src/types/search';

describe('search: combined facet filters', () => {
  const docs: SearchDoc[] = [
    {
      id: '/sec/SEC01.html',
      title: 'SEC01 - How do you operate?',
      path: 'sec/SEC01.md',
      text: '',
      pillar: 'security',
      kind: 'question',
      pageId: 'SEC01',
    },
    {
      id: '/sec/SEC01-BP01.html',
      title: 'SEC01-BP01 - How to separate accounts',
      path: 'sec/SEC01-BP01.md',
      text: '',
      pillar: 'security',
      kind: 'practice',
      pageId: 'SEC01-BP01',
    },
    {
      id: '/rel/REL01.html',
      title: 'REL01 - How do you manage quotas?',
      path: 'rel/REL01.md',
      text: '',
      pillar: 'reliability',
      kind: 'question',
      pageId: 'REL01',
    },
  ];
  const mini = createSearchIndex(docs, {});

  it('narrows by pillar and kind together', () => {
    expect(runSearch(mini, 'how', { pillars: ['security'], kinds: ['question'] }).map((h) => h.id)).toEqual([
      '/sec/SEC01.html',
    ]);
    expect(runSearch(mini, 'how', { kinds: ['question'] }).map((h) => h.id).sort()).toEqual([
      '/rel/REL01.html',
      '/sec/SEC01.html',
    ]);
    expect(runSearch(mini, 'how', { pillars: ['security'], kinds: ['practice'] }).map((h) => h.id)).toEqual([
      '/sec/SEC01-BP01.html',
    ]);
  });

  it('sorts by score, then id', () => {
    const rows = [
      {
      id: 'b',
      score: 1,
      kind: 'question',
    },
      {
      id: 'a',
      score: 1,
      kind: 'question',
    },
      {
      id: 'c',
      score: 2,
      kind: 'practice',
    },
    ];
    expect(applyFacetFilters(rows, {}).map((r) => r.id)).toEqual(['c', 'a', 'b']);
    expect(applyFacetFilters(rows, { kinds: ['question'] }).map((r) => r.id)).toEqual(['a', 'b']);
  });
});
