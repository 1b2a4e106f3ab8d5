import MiniSearch from 'minisearch';
import type { Catalog } from '../content/schema';
import SYNONYMS from '../search/synonyms.json';
import type { DocPage } from '../types/page';
import type { SearchDoc } from '../types/search';
import { deriveKind, derivePillar } from './facets';
import { navFields } from './navigation';
import { plainText } from './plainText';
import { searchOptions } from './searchOptions';
import { basicClean, normalizePhrases, normalizeTokens } from './tokenize';
import { pageIdFromPath } from './wafr';

/** Canonical phrase -> aliases a reader might type instead. */
export type SynonymMap = Record<string, string[] | undefined>;

export function toSearchDoc(page: DocPage, catalog: Catalog, docsDir: string): SearchDoc | null {
  const fields = navFields(page);
  if (fields.nav_exclude) return null;
  const id = pageIdFromPath(page.path);
  return {
    id: page.url,
    title: fields.title ?? page.path,
    path: page.path,
    text: plainText(page.body),
    pillar: derivePillar(page, catalog, docsDir),
    kind: deriveKind(page, catalog, docsDir),
    pageId: id?.id,
  };
}

/**
 * Augment a document with normalized token fields and canonical aliasTokens.
 * - Highest boost: slugTokens (page id) and titleTokens (title)
 * - Medium: aliasTokens (synonyms.json aliases of phrases the page mentions)
 * - Lower: text (handled by searchOptions boosts)
 */
function enrichDoc(doc: SearchDoc, synonyms: SynonymMap): SearchDoc {
  const slugTokens = normalizeTokens(doc.pageId ?? '');
  const titleTokens = normalizeTokens(doc.title);

  const haystack = ` ${basicClean(`${doc.title} ${doc.text}`)} `;
  const aliases: string[] = [];
  for (const [phrase, list] of Object.entries(synonyms)) {
    if (list && haystack.includes(` ${basicClean(phrase)} `)) aliases.push(...list);
  }
  const aliasTokens = normalizePhrases(aliases);

  return {
    ...doc,
    slugTokens,
    titleTokens,
    aliasTokens,
  };
}

export function createSearchIndex(docs: SearchDoc[], synonyms: SynonymMap = SYNONYMS): MiniSearch<SearchDoc> {
  const mini = new MiniSearch<SearchDoc>(searchOptions);
  mini.addAll(docs.map((d) => enrichDoc(d, synonyms)));
  return mini;
}

/**
 * Build a MiniSearch index payload given normalized docs.
 * Returns options and a serialized index JSON that can be revived via MiniSearch.loadJSON.
 * We do not create extra documents; we only expand the token vocabulary for existing docs.
 */
export function buildIndexPayload(docs: SearchDoc[], synonyms: SynonymMap = SYNONYMS) {
  const mini = createSearchIndex(docs, synonyms);
  return {
    options: searchOptions,
    index: JSON.stringify(mini.toJSON()),
  };
}
