import type { DocPage } from '../types/page';
import { normalizeBaseUrl } from './links';
import { navFields } from './navigation';

export function xmlEscape(s: string) {
  return String(s).replace(/[&<>"']/g, (ch) => {
    switch (ch) {
      case '&':
        return '&#' + '38;';
      case '<':
        return '&#' + '60;';
      case '>':
        return '&#' + '62;';
      case '"':
        return '&#' + '34;';
      case "'":
        return '&#' + '39;';
      default:
        return ch;
    }
  });
}

type SitemapEntry = {
  loc: string;
  lastmod?: string;
};

function lastModified(page: DocPage): string | undefined {
  const value = page.parsed.kind === 'ok' ? page.parsed.data.last_modified_at : undefined;
  if (!(typeof value === 'string' || value instanceof Date)) return undefined;
  const d = new Date(value);
  return Number.isNaN(d.getTime()) ? undefined : d.toISOString();
}

export function buildSitemap(pages: DocPage[], options: { siteUrl: string; baseUrl?: string }): string {
  const origin = options.siteUrl.replace(/\/+$/, '');
  const base = normalizeBaseUrl(options.baseUrl ?? '');

  const entries: SitemapEntry[] = [];
  for (const page of pages) {
    if (navFields(page).nav_exclude) continue;
    entries.push({ loc: `${origin}${base}${page.url}`, lastmod: lastModified(page) });
  }
  entries.sort((a, b) => (a.loc < b.loc ? -1 : a.loc > b.loc ? 1 : 0));

  return `<?xml version="1.0" encoding="UTF-8"?>
<urlset xmlns="http://www.sitemaps.org/schemas/sitemap/0.9">
${entries
  .map(
    (e) => `  <url>
    <loc>${xmlEscape(e.loc)}</loc>${e.lastmod ? `\n    <lastmod>${xmlEscape(e.lastmod)}</lastmod>` : ''}
  </url>`,
  )
  .join('\n')}
</urlset>
`;
}
