import type { PageKind } from './page';

export type SearchDoc = {
  id: string; // page URL
  title: string;
  path: string;
  text: string;
  pillar?: string; // pillar slug
  kind: PageKind;
  pageId?: string; // "SEC01-BP04"
  // Derived fields (filled in by the index builder)
  aliasTokens?: string[];
  slugTokens?: string[];
  titleTokens?: string[];
};

export type SearchHit = {
  id: string;
  title: string;
  path: string;
  pillar?: string;
  kind: PageKind;
  score: number;
};
