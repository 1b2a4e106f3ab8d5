import path from 'node:path';
import type { RuleSetting } from './types/diagnostic';
import {
  DEFAULT_DOCS_DIR,
  DEFAULT_DUPLICATE_SECTION_THRESHOLD,
  DEFAULT_EXCLUDE,
  DEFAULT_REQUIRED_FRONTMATTER,
} from './lib/constants';

/**
 * Configuration types and helpers for wafr-docs
 */

export interface HeadingsConfig {
  /**
   * Treat `<h1>`..`<h6>` tags as headings in the hierarchy check.
   * Page headers are commonly written as HTML, so this is off by default.
   */
  includeHtml?: boolean;
}

export interface WafrDocsConfig {
  /**
   * Site source root. Page URLs are computed relative to it.
   *
   * @example '.'
   */
  root?: string;

  /** Paths under `root` that `lint` and `fix` check when none are given on the command line. */
  include?: string[];

  /** Path segments skipped during discovery. */
  exclude?: string[];

  /** Jekyll `baseurl`; stripped from root-absolute links before they are resolved. */
  baseUrl?: string;

  /**
   * Absolute origin used for sitemap entries.
   *
   * @example 'https://docs.example.com'
   */
  siteUrl?: string;

  /** Directory under `root` holding one sub-directory per pillar. */
  docsDir?: string;

  /** Front-matter keys every page must define. */
  requiredFrontmatter?: string[];

  headings?: HeadingsConfig;

  /** Similarity (0..1) at which two same-named sections count as duplicates. */
  duplicateSectionThreshold?: number;

  /** Path to a question catalog JSON replacing the bundled one. */
  catalog?: string;

  /** Severity overrides keyed by rule id. */
  rules?: Record<string, RuleSetting>;
}

export interface ResolvedConfig {
  root: string; // absolute
  include: string[];
  exclude: string[];
  baseUrl: string;
  siteUrl?: string;
  docsDir: string;
  requiredFrontmatter: string[];
  headings: Required<HeadingsConfig>;
  duplicateSectionThreshold: number;
  catalog?: string; // absolute
  rules: Record<string, RuleSetting>;
}

/**
 * Define a type-safe wafr-docs configuration.
 * Use this in your `wafr-docs.config.ts` file.
 *
 * @example
 * ```ts
 * // wafr-docs.config.ts
 * import { defineConfig } from 'wafr-docs';
 *
 * export default defineConfig({
 *   include: ['docs'],
 *   rules: { 'ascii-punctuation': 'warn' },
 * });
 * ```
 */
export function defineConfig(config: WafrDocsConfig): WafrDocsConfig {
  return config;
}

export function resolveConfig(config: WafrDocsConfig = {}, cwd: string = process.cwd()): ResolvedConfig {
  const root = path.resolve(cwd, config.root ?? '.');
  return {
    root,
    include: config.include ?? ['.'],
    exclude: config.exclude ?? DEFAULT_EXCLUDE,
    baseUrl: config.baseUrl ?? '',
    siteUrl: config.siteUrl,
    docsDir: (config.docsDir ?? DEFAULT_DOCS_DIR).replace(/^\.\/|\/+$/g, ''),
    requiredFrontmatter: config.requiredFrontmatter ?? DEFAULT_REQUIRED_FRONTMATTER,
    headings: { includeHtml: config.headings?.includeHtml ?? false },
    duplicateSectionThreshold: config.duplicateSectionThreshold ?? DEFAULT_DUPLICATE_SECTION_THRESHOLD,
    catalog: config.catalog ? path.resolve(cwd, config.catalog) : undefined,
    rules: config.rules ?? {},
  };
}
