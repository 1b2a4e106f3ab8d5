import { Command } from 'commander';
import { formatVerifyReport, loadCatalog, verifyCatalog } from '../lib/catalog';
import { loadContext, loadSiteCorpus, type CommonOptions } from './context';

type VerifyOptions = CommonOptions & { json: boolean };

export const verifyCommand = new Command('verify')
  .description('Compare question pages with the Well-Architected question catalog')
  .option('-c, --config <path>', 'Path to config file')
  .option('-q, --quiet', 'Suppress informational logs', false)
  .option('--json', 'Print the report as JSON', false)
  .action(async (options: VerifyOptions) => {
    const ctx = await loadContext(options);
    const [corpus, catalog] = await Promise.all([loadSiteCorpus(ctx), loadCatalog(ctx.config.catalog)]);
    const report = verifyCatalog(corpus, catalog, ctx.config.docsDir);
    console.log(options.json ? JSON.stringify(report, null, 2) : formatVerifyReport(report));
    if (!report.ok) process.exitCode = 1;
  });
