import { existsSync } from 'node:fs';
import path from 'node:path';
import { resolveConfig, type ResolvedConfig, type WafrDocsConfig } from '../config';
import { loadCorpus, selectPages, type Corpus } from '../lib/corpus';
import { createConsoleLogger, type Logger } from '../logger';
import type { DocPage } from '../types/page';
import { findConfigFile, loadConfig } from '../utils/config-loader';

export type CommonOptions = {
  config?: string;
  quiet?: boolean;
};

export type CommandContext = {
  config: ResolvedConfig;
  logger: Logger;
  cwd: string;
};

export async function loadContext(options: CommonOptions, cwd: string = process.cwd()): Promise<CommandContext> {
  const logger = createConsoleLogger(options.quiet ? 'test' : 'normal');

  let configPath: string | undefined;
  if (options.config) {
    configPath = path.resolve(cwd, options.config);
    if (!existsSync(configPath)) {
      throw new Error(`Config file not found: ${configPath}`);
    }
  } else {
    configPath = findConfigFile(cwd);
  }

  let user: WafrDocsConfig = {};
  if (configPath) {
    logger.log?.(`Loading config from: ${configPath}`);
    user = await loadConfig(configPath);
  }
  const config = resolveConfig(user, configPath ? path.dirname(configPath) : cwd);
  return { config, logger, cwd };
}

export function loadSiteCorpus(ctx: CommandContext): Promise<Corpus> {
  return loadCorpus({ root: ctx.config.root, exclude: ctx.config.exclude });
}

/** Command-line paths are relative to the working directory; configured ones to the site root. */
export function selectTargets(ctx: CommandContext, corpus: Corpus, cliPaths: string[]): DocPage[] {
  if (!cliPaths.length) return selectPages(corpus, ctx.config.include);
  const rel = cliPaths.map((p) => path.relative(ctx.config.root, path.resolve(ctx.cwd, p)) || '.');
  const outside = rel.find((p) => p.startsWith('..'));
  if (outside) throw new Error(`Path is outside the site root ${ctx.config.root}: ${outside}`);
  return selectPages(corpus, rel);
}

export function parseInteger(value: string): number {
  const n = Number.parseInt(value, 10);
  if (!Number.isFinite(n)) throw new Error(`Not a number: ${value}`);
  return n;
}
