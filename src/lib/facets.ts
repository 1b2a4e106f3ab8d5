/**
 * Facet derivation helpers shared at build time.
 * Keep heuristics minimal and deterministic.
 */
import path from 'node:path';
import type { Catalog } from '../content/schema';
import type { DocPage, PageKind } from '../types/page';
import { pageIdFromPath } from './wafr';

export function derivePillar(page: DocPage, catalog: Catalog, docsDir: string): string | undefined {
  const id = pageIdFromPath(page.path);
  if (id) {
    const byPrefix = catalog.pillars.find((p) => p.prefix === id.prefix);
    if (byPrefix) return byPrefix.slug;
  }
  // Otherwise the pillar directory the page lives in: "<docsDir>/<slug>/..."
  const prefix = docsDir ? `${docsDir}/` : '';
  if (!page.path.startsWith(prefix)) return undefined;
  const first = page.path.slice(prefix.length).split('/')[0];
  return catalog.pillars.find((p) => p.slug === first)?.slug;
}

export function deriveKind(page: DocPage, catalog: Catalog, docsDir: string): PageKind {
  const id = pageIdFromPath(page.path);
  if (id) return id.practice === undefined ? 'question' : 'practice';
  const dir = path.posix.dirname(page.path);
  const isIndex = /^index\.(md|markdown)$/i.test(path.posix.basename(page.path));
  if (isIndex && catalog.pillars.some((p) => path.posix.join(docsDir || '.', p.slug) === dir)) {
    return 'pillar';
  }
  return 'page';
}
