import { Command } from 'commander';
import { lintCorpus } from '../lib/lint';
import { formatJson, formatText } from '../lib/report';
import { loadContext, loadSiteCorpus, parseInteger, selectTargets, type CommonOptions } from './context';

type LintOptions = CommonOptions & {
  format: 'text' | 'json';
  maxWarnings: number;
};

export const lintCommand = new Command('lint')
  .description('Check front-matter, links, headings and navigation of the documentation pages')
  .argument('[paths...]', 'Files or directories to lint (default: configured include)')
  .option('-c, --config <path>', 'Path to config file')
  .option('-q, --quiet', 'Suppress informational logs', false)
  .option('-f, --format <format>', 'Output format: text or json', 'text')
  .option('--max-warnings <n>', 'Fail when there are more warnings than this', parseInteger, -1)
  .action(async (paths: string[], options: LintOptions) => {
    if (options.format !== 'text' && options.format !== 'json') {
      throw new Error(`Unknown format: ${options.format}`);
    }
    const ctx = await loadContext(options);
    const corpus = await loadSiteCorpus(ctx);
    const pages = selectTargets(ctx, corpus, paths);
    ctx.logger.log?.(`Linting ${pages.length} pages under ${ctx.config.root}`);

    const result = lintCorpus(corpus, ctx.config, pages);
    console.log(options.format === 'json' ? formatJson(result) : formatText(result));

    const tooManyWarnings = options.maxWarnings >= 0 && result.warningCount > options.maxWarnings;
    if (result.errorCount > 0 || tooManyWarnings) process.exitCode = 1;
  });
