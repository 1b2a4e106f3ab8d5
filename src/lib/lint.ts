import type { ResolvedConfig } from '../config';
import type { Diagnostic, LintResult, RuleSetting } from '../types/diagnostic';
import type { DocPage } from '../types/page';
import type { Corpus } from './corpus';
import { buildNavigation } from './navigation';
import { RULES, type Rule, type RuleContext } from './rules';

export function severityOf(rule: Rule, config: ResolvedConfig): RuleSetting {
  return config.rules[rule.id] ?? rule.defaultSeverity;
}

export function createRuleContext(corpus: Corpus, config: ResolvedConfig, pages: DocPage[] = corpus.pages): RuleContext {
  return { corpus, pages, config, navigation: buildNavigation(corpus.pages) };
}

function compareDiagnostics(a: Diagnostic, b: Diagnostic): number {
  if (a.path !== b.path) return a.path < b.path ? -1 : 1;
  return a.line - b.line || a.column - b.column || (a.ruleId < b.ruleId ? -1 : a.ruleId > b.ruleId ? 1 : 0);
}

/**
 * Run every enabled rule over `pages` (default: the whole corpus).
 * Cross-page rules see the whole corpus but only report on `pages`.
 */
export function lintCorpus(corpus: Corpus, config: ResolvedConfig, pages: DocPage[] = corpus.pages): LintResult {
  const ctx = createRuleContext(corpus, config, pages);
  const diagnostics: Diagnostic[] = [];
  for (const rule of RULES) {
    const severity = severityOf(rule, config);
    if (severity === 'off') continue;
    for (const r of rule.check(ctx)) {
      diagnostics.push({ ...r, ruleId: rule.id, severity, fixable: rule.fix !== undefined });
    }
  }
  diagnostics.sort(compareDiagnostics);
  return {
    diagnostics,
    fileCount: pages.length,
    errorCount: diagnostics.filter((d) => d.severity === 'error').length,
    warningCount: diagnostics.filter((d) => d.severity === 'warn').length,
  };
}
