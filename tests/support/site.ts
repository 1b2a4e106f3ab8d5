import { mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { resolveConfig, type ResolvedConfig, type WafrDocsConfig } from '../../src/config';
import { catalogSchema, type Catalog } from '../../src/content/schema';
import { createCorpus, createPage, type Corpus } from '../../src/lib/corpus';
import type { DocPage } from '../../src/types/page';

export const SITE_ROOT = '/site';

export function makePage(path: string, raw: string): DocPage {
  return createPage(path, `${SITE_ROOT}/${path}`, raw);
}

export function makeCorpus(files: Record<string, string>, assets: string[] = []): Corpus {
  return createCorpus(
    SITE_ROOT,
    Object.entries(files).map(([path, raw]) => makePage(path, raw)),
    assets,
  );
}

export function testConfig(overrides: WafrDocsConfig = {}): ResolvedConfig {
  return resolveConfig(overrides, SITE_ROOT);
}

/** Front-matter block followed by a body. */
export function md(fields: Record<string, string | number | boolean>, body = ''): string {
  const lines = Object.entries(fields).map(([k, v]) => `${k}: ${typeof v === 'string' ? JSON.stringify(v) : v}`);
  return `---\n${lines.join('\n')}\n---\n${body}`;
}

export const SECURITY_CATALOG: Catalog = catalogSchema.parse({
  pillars: [
    {
      slug: 'security',
      title: 'Security',
      prefix: 'SEC',
      navOrder: 2,
      questions: [
        { id: 'SEC01', title: 'How do you securely operate your workload?' },
        { id: 'SEC02', title: 'How do you manage authentication for people and machines?' },
      ],
    },
    {
      slug: 'reliability',
      title: 'Reliability',
      prefix: 'REL',
      navOrder: 3,
      questions: [{ id: 'REL01', title: 'How do you manage service quotas and constraints?' }],
    },
  ],
});

export async function withTempDir<T>(fn: (dir: string) => Promise<T>): Promise<T> {
  const dir = await mkdtemp(join(tmpdir(), 'wafr-docs-'));
  try {
    return await fn(dir);
  } finally {
    await rm(dir, { recursive: true, force: true });
  }
}
