import type { Frontmatter } from '../content/schema';
import type { FrontmatterResult } from '../lib/frontmatter';

export interface DocPage {
  path: string; // posix path relative to the site root, e.g. "docs/security/SEC01-BP04.md"
  absolutePath: string;
  url: string; // output URL, e.g. "/docs/security/SEC01-BP04.html"
  raw: string;
  parsed: FrontmatterResult;
  frontmatter: Frontmatter | null; // null when the block is missing or fails the schema
  body: string;
  bodyLine: number; // 1-based line of the first body line
}

export type PageKind = 'pillar' | 'question' | 'practice' | 'page';
