import { Command } from 'commander';
import { buildNavigation, renderNavigation } from '../lib/navigation';
import { loadContext, loadSiteCorpus, type CommonOptions } from './context';

export const navCommand = new Command('nav')
  .description('Print the navigation tree built from parent/grand_parent/nav_order')
  .option('-c, --config <path>', 'Path to config file')
  .option('-q, --quiet', 'Suppress informational logs', false)
  .action(async (options: CommonOptions) => {
    const ctx = await loadContext(options);
    const corpus = await loadSiteCorpus(ctx);
    const nav = buildNavigation(corpus.pages);
    console.log(renderNavigation(nav.roots));
    for (const p of nav.problems) ctx.logger.warn?.(`${p.page.path}: ${p.message}`);
  });
