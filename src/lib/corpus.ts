import { readdir, readFile, stat } from 'node:fs/promises';
import path from 'node:path';
import { frontmatterSchema, type Frontmatter } from '../content/schema';
import type { DocPage } from '../types/page';
import { parseFrontmatter } from './frontmatter';
import { DEFAULT_EXCLUDE, PAGE_EXTENSIONS } from './constants';

export type CorpusOptions = {
  root: string;
  exclude?: string[];
};

export interface Corpus {
  root: string;
  pages: DocPage[];
  assets: Set<string>; // root-absolute URLs of static files, e.g. "/assets/css/site.css"
  resolveTarget(url: string): DocPage | 'asset' | null;
}

function toPosix(p: string): string {
  return p.split(path.sep).join('/');
}

function isPageFile(name: string): boolean {
  return PAGE_EXTENSIONS.includes(path.extname(name).toLowerCase());
}

/**
 * Output URL of a page the way Jekyll computes it:
 * permalink wins; "index.md" maps to its directory; other pages get ".html".
 */
export function pageUrl(relPath: string, permalink?: string): string {
  if (permalink) return permalink.startsWith('/') ? permalink : `/${permalink}`;
  const withoutExt = relPath.replace(/\.(md|markdown)$/i, '');
  if (withoutExt === 'index') return '/';
  if (withoutExt.endsWith('/index')) return `/${withoutExt.slice(0, -'index'.length)}`;
  return `/${withoutExt}.html`;
}

export function createPage(relPath: string, absolutePath: string, raw: string): DocPage {
  const parsed = parseFrontmatter(raw);
  let frontmatter: Frontmatter | null = null;
  if (parsed.kind === 'ok') {
    const res = frontmatterSchema.safeParse(parsed.data);
    if (res.success) frontmatter = res.data;
  }
  const permalink =
    parsed.kind === 'ok' && typeof parsed.data.permalink === 'string' ? parsed.data.permalink : undefined;
  return {
    path: relPath,
    absolutePath,
    url: pageUrl(relPath, permalink),
    raw,
    parsed,
    frontmatter,
    body: parsed.body,
    bodyLine: parsed.bodyLine,
  };
}

/** Every URL a page answers to, primary URL first. */
export function pageAliases(page: DocPage): string[] {
  const out = new Set<string>([page.url]);
  const url = page.url;
  if (url.endsWith('/')) {
    out.add(`${url}index.html`);
    if (url.length > 1) out.add(url.slice(0, -1));
  } else if (url.endsWith('/index.html')) {
    const dir = url.slice(0, -'index.html'.length);
    out.add(dir);
    if (dir.length > 1) out.add(dir.slice(0, -1));
  } else if (url.endsWith('.html')) {
    // GitHub Pages serves "x.html" at "x"
    out.add(url.slice(0, -'.html'.length));
  }
  // Links to the source file, as jekyll-relative-links rewrites them
  out.add(`/${page.path}`);
  return Array.from(out);
}

export function createCorpus(root: string, pages: DocPage[], assets: Iterable<string> = []): Corpus {
  const sorted = [...pages].sort((a, b) => (a.path < b.path ? -1 : a.path > b.path ? 1 : 0));
  const byUrl = new Map<string, DocPage>();
  for (const page of sorted) {
    for (const alias of pageAliases(page)) {
      if (!byUrl.has(alias)) byUrl.set(alias, page);
    }
  }
  const assetSet = new Set(assets);
  return {
    root,
    pages: sorted,
    assets: assetSet,
    resolveTarget(url: string) {
      const page = byUrl.get(url);
      if (page) return page;
      if (assetSet.has(url)) return 'asset';
      return null;
    },
  };
}

async function walk(
  absDir: string,
  relDir: string,
  exclude: Set<string>,
  out: { pages: string[]; assets: string[] },
): Promise<void> {
  const entries = await readdir(absDir, { withFileTypes: true });
  for (const entry of entries) {
    if (entry.name.startsWith('.') || exclude.has(entry.name)) continue;
    const rel = relDir ? `${relDir}/${entry.name}` : entry.name;
    if (exclude.has(rel)) continue;
    if (entry.isDirectory()) {
      await walk(path.join(absDir, entry.name), rel, exclude, out);
    } else if (entry.isFile()) {
      if (isPageFile(entry.name)) out.pages.push(rel);
      else out.assets.push(`/${rel}`);
    }
  }
}

/**
 * Load every page and static file under the site root.
 * The whole site is always loaded so that links into pages outside the lint target resolve.
 */
export async function loadCorpus(options: CorpusOptions): Promise<Corpus> {
  const root = path.resolve(options.root);
  const info = await stat(root).catch((err: unknown) => {
    const msg = err instanceof Error ? err.message : String(err);
    throw new Error(`Cannot read site root ${root}: ${msg}`);
  });
  if (!info.isDirectory()) throw new Error(`Site root is not a directory: ${root}`);

  const exclude = new Set((options.exclude ?? DEFAULT_EXCLUDE).map((e) => toPosix(e).replace(/\/+$/, '')));
  const found = { pages: [] as string[], assets: [] as string[] };
  await walk(root, '', exclude, found);

  const pages: DocPage[] = [];
  for (const rel of found.pages) {
    const abs = path.join(root, ...rel.split('/'));
    const raw = await readFile(abs, 'utf8');
    pages.push(createPage(rel, abs, raw));
  }
  return createCorpus(root, pages, found.assets);
}

/**
 * Pages under the given paths (files or directories, relative to the site root).
 * No paths, or ".", selects every page.
 */
export function selectPages(corpus: Corpus, paths: string[] = []): DocPage[] {
  const prefixes = paths
    .map((p) => toPosix(path.normalize(p)).replace(/^\.\/?/, '').replace(/\/+$/, ''))
    .filter((p) => p !== '.');
  if (!prefixes.length || prefixes.includes('')) return corpus.pages;
  return corpus.pages.filter((page) =>
    prefixes.some((p) => page.path === p || page.path.startsWith(`${p}/`)),
  );
}
