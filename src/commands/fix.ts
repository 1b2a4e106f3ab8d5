import { Command } from 'commander';
import { fixCorpus } from '../lib/fix';
import { loadContext, loadSiteCorpus, selectTargets, type CommonOptions } from './context';

type FixCommandOptions = CommonOptions & { dryRun: boolean };

export const fixCommand = new Command('fix')
  .description('Apply automatic fixes (link prefixes, .html extensions, template leftovers, punctuation)')
  .argument('[paths...]', 'Files or directories to fix (default: configured include)')
  .option('-c, --config <path>', 'Path to config file')
  .option('-q, --quiet', 'Suppress informational logs', false)
  .option('--dry-run', 'Report what would change without writing', false)
  .action(async (paths: string[], options: FixCommandOptions) => {
    const ctx = await loadContext(options);
    const corpus = await loadSiteCorpus(ctx);
    const pages = selectTargets(ctx, corpus, paths);
    const results = await fixCorpus(corpus, ctx.config, pages, { dryRun: options.dryRun, logger: ctx.logger });
    const verb = options.dryRun ? 'Would update' : 'Updated';
    console.log(`${verb} ${results.length} file${results.length === 1 ? '' : 's'}`);
  });
