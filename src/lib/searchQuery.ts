import type MiniSearch from 'minisearch';
import type { PageKind } from '../types/page';
import type { SearchDoc, SearchHit } from '../types/search';
import { applyFacetFilters, type FacetSelections } from './facetFilter';
import { searchOptions } from './searchOptions';

const KINDS: readonly PageKind[] = ['pillar', 'question', 'practice', 'page'];

function isPageKind(v: unknown): v is PageKind {
  return typeof v === 'string' && (KINDS as readonly string[]).includes(v);
}

export function runSearch(
  mini: MiniSearch<SearchDoc>,
  query: string,
  sel: FacetSelections = {},
  limit = 20,
): SearchHit[] {
  const q = query.trim();
  if (!q) return [];
  const hits: SearchHit[] = mini.search(q, searchOptions.searchOptions).map((r) => ({
    id: String(r.id),
    title: typeof r.title === 'string' ? r.title : String(r.id),
    path: typeof r.path === 'string' ? r.path : '',
    pillar: typeof r.pillar === 'string' ? r.pillar : undefined,
    kind: isPageKind(r.kind) ? r.kind : 'page',
    score: r.score,
  }));
  return applyFacetFilters(hits, sel).slice(0, Math.max(0, limit));
}

export function formatHits(hits: SearchHit[]): string {
  if (!hits.length) return 'No matches.';
  return hits
    .map((h) => `${h.score.toFixed(2).padStart(7)}  ${h.title}  ${h.id}${h.pillar ? `  [${h.pillar}]` : ''}`)
    .join('\n');
}
