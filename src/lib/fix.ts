import { writeFile } from 'node:fs/promises';
import type { ResolvedConfig } from '../config';
import type { Logger } from '../logger';
import type { DocPage } from '../types/page';
import { createPage, type Corpus } from './corpus';
import { createRuleContext, severityOf } from './lint';
import { RULES } from './rules';

export type FixOptions = {
  dryRun?: boolean;
  logger?: Logger;
};

export type FixResult = {
  path: string;
  applied: string[]; // rule ids whose fixer changed the file
  content: string;
};

/**
 * Apply the fixers of every enabled fixable rule to `pages`, in rule order.
 * Each fixer sees the output of the previous one; unchanged files are not reported.
 */
export async function fixCorpus(
  corpus: Corpus,
  config: ResolvedConfig,
  pages: DocPage[] = corpus.pages,
  options: FixOptions = {},
): Promise<FixResult[]> {
  const ctx = createRuleContext(corpus, config, pages);
  const fixers = RULES.filter((r) => r.fix && severityOf(r, config) !== 'off');
  const results: FixResult[] = [];

  for (const original of pages) {
    let page = original;
    const applied: string[] = [];
    for (const rule of fixers) {
      const next = rule.fix ? rule.fix(page, ctx) : page.raw;
      if (next === page.raw) continue;
      applied.push(rule.id);
      page = createPage(page.path, page.absolutePath, next);
    }
    if (!applied.length) continue;

    results.push({ path: original.path, applied, content: page.raw });
    if (options.dryRun) {
      options.logger?.log?.(`Would fix ${original.path} (${applied.join(', ')})`);
    } else {
      await writeFile(original.absolutePath, page.raw, 'utf8');
      options.logger?.log?.(`Fixed ${original.path} (${applied.join(', ')})`);
    }
  }
  return results;
}
