import { Command } from 'commander';
import { loadCatalog } from '../lib/catalog';
import { createSearchIndex, toSearchDoc } from '../lib/searchBuild';
import { formatHits, runSearch } from '../lib/searchQuery';
import type { SearchDoc } from '../types/search';
import { loadContext, loadSiteCorpus, parseInteger, type CommonOptions } from './context';

type SearchOptions = CommonOptions & { pillar?: string[]; kind?: string[]; limit: number };

export const searchCommand = new Command('search')
  .description('Search the documentation pages')
  .argument('<query...>', 'Search terms')
  .option('-c, --config <path>', 'Path to config file')
  .option('-q, --quiet', 'Suppress informational logs', false)
  .option('--pillar <slugs...>', 'Only pages of these pillars')
  .option('--kind <kinds...>', 'Only these page kinds: pillar, question, practice, page')
  .option('-n, --limit <n>', 'Maximum number of hits', parseInteger, 10)
  .action(async (query: string[], options: SearchOptions) => {
    const ctx = await loadContext(options);
    const [corpus, catalog] = await Promise.all([loadSiteCorpus(ctx), loadCatalog(ctx.config.catalog)]);
    const docs = corpus.pages
      .map((p) => toSearchDoc(p, catalog, ctx.config.docsDir))
      .filter((d): d is SearchDoc => d !== null);
    const hits = runSearch(createSearchIndex(docs), query.join(' '), { pillars: options.pillar, kinds: options.kind }, options.limit);
    console.log(formatHits(hits));
  });
