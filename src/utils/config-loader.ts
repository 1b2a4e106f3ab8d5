import { existsSync } from 'node:fs';
import path from 'node:path';
import { z } from 'zod';
import type { WafrDocsConfig } from '../config';
import { formatIssues } from '../lib/catalog';
import { RULE_IDS } from '../lib/rules';

export const CONFIG_FILES = [
  'wafr-docs.config.ts',
  'wafr-docs.config.mts',
  'wafr-docs.config.js',
  'wafr-docs.config.mjs',
  'wafr-docs.config.json',
];

const ruleSetting = z.enum(['off', 'warn', 'error']);

const configSchema = z
  .object({
    root: z.string().min(1),
    include: z.array(z.string().min(1)),
    exclude: z.array(z.string().min(1)),
    baseUrl: z.string(),
    siteUrl: z.string().url(),
    docsDir: z.string(),
    requiredFrontmatter: z.array(z.string().min(1)),
    headings: z.object({ includeHtml: z.boolean() }).partial().strict(),
    duplicateSectionThreshold: z.number().min(0).max(1),
    catalog: z.string().min(1),
    rules: z.record(ruleSetting).superRefine((rules, ctx) => {
      for (const id of Object.keys(rules)) {
        if (!RULE_IDS.includes(id)) {
          ctx.addIssue({ code: z.ZodIssueCode.custom, path: [id], message: `unknown rule "${id}"` });
        }
      }
    }),
  })
  .partial()
  .strict();

export function validateConfig(value: unknown, configPath: string): WafrDocsConfig {
  const res = configSchema.safeParse(value);
  if (!res.success) {
    throw new Error(`Invalid wafr-docs config (${configPath}): ${formatIssues(res.error)}`);
  }
  return res.data;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Load and parse a wafr-docs config file
 */
export async function loadConfig(configPath: string): Promise<WafrDocsConfig> {
  // Use jiti for TypeScript config file support
  const { createJiti } = await import('jiti');
  const jiti = createJiti(process.cwd());

  let loaded: unknown;
  try {
    loaded = await jiti.import(configPath);
  } catch (err) {
    if (err instanceof Error) {
      throw new Error(`Failed to load config from ${configPath}: ${err.message}`);
    }
    throw err;
  }

  // Handle both default export and named export
  const config = isRecord(loaded) && 'default' in loaded ? loaded.default : loaded;
  if (!config) {
    throw new Error(`Failed to load config from ${configPath}: Config file must export a configuration object`);
  }
  return validateConfig(config, configPath);
}

/** First default config file present in `cwd`, if any. */
export function findConfigFile(cwd: string): string | undefined {
  for (const name of CONFIG_FILES) {
    const candidate = path.join(cwd, name);
    if (existsSync(candidate)) return candidate;
  }
  return undefined;
}
