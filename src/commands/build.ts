import { Command } from 'commander';
import { mkdir, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { loadCatalog } from '../lib/catalog';
import { buildIndexPayload, toSearchDoc } from '../lib/searchBuild';
import { buildSitemap } from '../lib/sitemap';
import type { SearchDoc } from '../types/search';
import { loadContext, loadSiteCorpus, type CommonOptions } from './context';

type BuildOptions = CommonOptions & { outDir?: string; siteUrl?: string };

export const buildCommand = new Command('build')
  .description('Write search.json (and sitemap.xml when a site URL is known)')
  .option('-c, --config <path>', 'Path to config file')
  .option('-q, --quiet', 'Suppress informational logs', false)
  .option('-o, --out-dir <dir>', 'Output directory (default: the site root)')
  .option('--site-url <url>', 'Absolute site origin for the sitemap')
  .action(async (options: BuildOptions) => {
    const ctx = await loadContext(options);
    const [corpus, catalog] = await Promise.all([loadSiteCorpus(ctx), loadCatalog(ctx.config.catalog)]);
    const outDir = options.outDir ? path.resolve(ctx.cwd, options.outDir) : ctx.config.root;
    await mkdir(outDir, { recursive: true });

    const docs = corpus.pages
      .map((p) => toSearchDoc(p, catalog, ctx.config.docsDir))
      .filter((d): d is SearchDoc => d !== null);
    const payload = buildIndexPayload(docs);
    const searchPath = path.join(outDir, 'search.json');
    await writeFile(searchPath, JSON.stringify({ v: Date.now(), ...payload }), 'utf8');
    ctx.logger.log?.(`Wrote ${searchPath} (${docs.length} documents)`);

    const siteUrl = options.siteUrl ?? ctx.config.siteUrl;
    if (siteUrl) {
      const sitemapPath = path.join(outDir, 'sitemap.xml');
      await writeFile(sitemapPath, buildSitemap(corpus.pages, { siteUrl, baseUrl: ctx.config.baseUrl }), 'utf8');
      ctx.logger.log?.(`Wrote ${sitemapPath}`);
    } else {
      ctx.logger.warn?.('No siteUrl configured; skipping sitemap.xml');
    }
  });
