import type { Options } from 'minisearch';
import type { SearchDoc } from '../types/search';

// Best-practice and question ids outrank titles, which outrank alias hits and body text.
const FIELD_BOOSTS = {
  slugTokens: 3,
  titleTokens: 2.5,
  aliasTokens: 1.8,
  text: 1,
} satisfies Partial<Record<keyof SearchDoc, number>>;

/**
 * MiniSearch options shared by `build`, which serializes them into search.json,
 * and by `search`, which queries an index built in process.
 */
export const searchOptions: Options<SearchDoc> = {
  idField: 'id',
  fields: Object.keys(FIELD_BOOSTS),
  storeFields: ['id', 'title', 'path', 'pillar', 'kind', 'pageId'],
  searchOptions: {
    prefix: true,
    fuzzy: 0.2,
    boost: FIELD_BOOSTS,
  },
};
