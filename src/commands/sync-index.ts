import { Command } from 'commander';
import { loadCatalog } from '../lib/catalog';
import { syncQuestionCards } from '../lib/questionCards';
import { loadContext, loadSiteCorpus, type CommonOptions } from './context';

type SyncIndexOptions = CommonOptions & { dryRun: boolean };

export const syncIndexCommand = new Command('sync-index')
  .description('Regenerate the question cards of every pillar index page')
  .option('-c, --config <path>', 'Path to config file')
  .option('-q, --quiet', 'Suppress informational logs', false)
  .option('--dry-run', 'Report what would change without writing', false)
  .action(async (options: SyncIndexOptions) => {
    const ctx = await loadContext(options);
    const [corpus, catalog] = await Promise.all([loadSiteCorpus(ctx), loadCatalog(ctx.config.catalog)]);
    const result = await syncQuestionCards(corpus, catalog, ctx.config.docsDir, {
      dryRun: options.dryRun,
      logger: ctx.logger,
    });
    const verb = options.dryRun ? 'Would update' : 'Updated';
    console.log(`${verb} ${result.updated.length} index page(s), ${result.unchanged.length} already current`);
    if (result.missingSection.length) process.exitCode = 1;
  });
