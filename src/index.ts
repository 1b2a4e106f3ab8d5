export { defineConfig, resolveConfig, type ResolvedConfig, type WafrDocsConfig } from './config';
export { createConsoleLogger, type Logger } from './logger';
export { loadConfig } from './utils/config-loader';
export { loadCorpus, selectPages, type Corpus } from './lib/corpus';
export { parseFrontmatter, type FrontmatterResult } from './lib/frontmatter';
export { lintCorpus } from './lib/lint';
export { fixCorpus } from './lib/fix';
export { RULES, RULE_IDS } from './lib/rules';
export { buildNavigation, renderNavigation } from './lib/navigation';
export { loadCatalog, verifyCatalog, formatVerifyReport } from './lib/catalog';
export { scaffoldQuestions, scaffoldPractices } from './lib/scaffold';
export { syncQuestionCards } from './lib/questionCards';
export { buildIndexPayload, createSearchIndex, toSearchDoc } from './lib/searchBuild';
export { runSearch } from './lib/searchQuery';
export { buildSitemap } from './lib/sitemap';
export { formatText, formatJson } from './lib/report';
export type { Diagnostic, LintResult, Severity, RuleSetting } from './types/diagnostic';
export type { DocPage, PageKind } from './types/page';
