import { Command } from 'commander';
import path from 'node:path';
import { loadCatalog } from '../lib/catalog';
import { loadPractices, scaffoldPractices, scaffoldQuestions, type ScaffoldResult } from '../lib/scaffold';
import { loadContext, type CommonOptions } from './context';

type QuestionsOptions = CommonOptions & { pillar: string; dryRun: boolean };
type PracticesOptions = CommonOptions & { question: string; file: string; dryRun: boolean };

function summary(result: ScaffoldResult, dryRun: boolean): string {
  const verb = dryRun ? 'Would generate' : 'Generated';
  return `${verb} ${result.written.length} page(s), skipped ${result.skipped.length} existing`;
}

const questionsCommand = new Command('questions')
  .description('Generate missing question pages of a pillar from the catalog')
  .requiredOption('-p, --pillar <slug>', 'Pillar slug or prefix, e.g. security or SEC')
  .option('-c, --config <path>', 'Path to config file')
  .option('-q, --quiet', 'Suppress informational logs', false)
  .option('--dry-run', 'List the pages without writing them', false)
  .action(async (options: QuestionsOptions) => {
    const ctx = await loadContext(options);
    const catalog = await loadCatalog(ctx.config.catalog);
    const result = await scaffoldQuestions(catalog, options.pillar, {
      root: ctx.config.root,
      docsDir: ctx.config.docsDir,
      dryRun: options.dryRun,
      logger: ctx.logger,
    });
    console.log(summary(result, options.dryRun));
  });

const practicesCommand = new Command('practices')
  .description('Generate best-practice pages for a question from a JSON list')
  .requiredOption('--question <id>', 'Question id, e.g. SEC01')
  .requiredOption('--file <path>', 'JSON array of { id, title, description, nav_order? }')
  .option('-c, --config <path>', 'Path to config file')
  .option('-q, --quiet', 'Suppress informational logs', false)
  .option('--dry-run', 'List the pages without writing them', false)
  .action(async (options: PracticesOptions) => {
    const ctx = await loadContext(options);
    const [catalog, practices] = await Promise.all([
      loadCatalog(ctx.config.catalog),
      loadPractices(path.resolve(ctx.cwd, options.file)),
    ]);
    const result = await scaffoldPractices(catalog, options.question, practices, {
      root: ctx.config.root,
      docsDir: ctx.config.docsDir,
      dryRun: options.dryRun,
      logger: ctx.logger,
    });
    console.log(summary(result, options.dryRun));
  });

export const scaffoldCommand = new Command('scaffold')
  .description('Generate placeholder pages for questions and best practices')
  .addCommand(questionsCommand)
  .addCommand(practicesCommand);
