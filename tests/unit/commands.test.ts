import { mkdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { afterEach, describe, it, expect, vi } from 'vitest';
import { loadContext, loadSiteCorpus, selectTargets } from '../../src/commands/context';
import { lintCommand } from '../../src/commands/lint';
import { syncIndexCommand } from '../../src/commands/sync-index';
import { verifyCommand } from '../../src/commands/verify';
import { withTempDir } from '../support/site';

afterEach(() => {
  vi.restoreAllMocks();
  process.exitCode = undefined;
});

describe('loadContext', () => {
  it('resolves the site root against the config file directory', async () => {
    await withTempDir(async (dir) => {
      const config = join(dir, 'wafr-docs.config.ts');
      await writeFile(config, "export default { root: 'site' };");
      await mkdir(join(dir, 'site', 'docs'), { recursive: true });
      await writeFile(join(dir, 'site', 'index.md'), '---\ntitle: Home\n---\n');
      await writeFile(join(dir, 'site', 'docs', 'a.md'), '---\ntitle: A\n---\n');

      const ctx = await loadContext({ config, quiet: true }, dir);
      expect(ctx.config.root).toBe(join(dir, 'site'));
      const corpus = await loadSiteCorpus(ctx);
      expect(selectTargets(ctx, corpus, ['site/docs']).map((p) => p.path)).toEqual(['docs/a.md']);
      expect(() => selectTargets(ctx, corpus, ['..'])).toThrow(/outside the site root/);
    });
  });

  it('fails when a named config file does not exist', async () => {
    await withTempDir(async (dir) => {
      await expect(loadContext({ config: 'missing.config.ts', quiet: true }, dir)).rejects.toThrow(
        `Config file not found: ${join(dir, 'missing.config.ts')}`,
      );
    });
  });
});

describe('lint command', () => {
  it('prints JSON diagnostics and fails on errors', async () => {
    await withTempDir(async (dir) => {
      const config = join(dir, 'wafr-docs.config.ts');
      await writeFile(config, "export default { root: '.' };");
      await writeFile(join(dir, 'index.md'), '# Home\n');
      const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);

      await lintCommand.parseAsync(['-c', config, '-q', '-f', 'json'], { from: 'user' });

      expect(log).toHaveBeenCalledTimes(1);
      expect(JSON.parse(String(log.mock.calls[0][0]))).toEqual([
        {
          ruleId: 'frontmatter-missing',
          severity: 'error',
          path: 'index.md',
          line: 1,
          column: 1,
          message: 'Page has no front-matter block',
          fixable: false,
        },
      ]);
      expect(process.exitCode).toBe(1);
    });
  });
});

describe('lint --max-warnings', () => {
  it('passes at the warning limit and fails one past it', async () => {
    await withTempDir(async (dir) => {
      const config = join(dir, 'wafr-docs.config.ts');
      await writeFile(config, "export default { root: '.' };");
      await writeFile(join(dir, 'index.md'), '---\ntitle: Home\nlayout: default\n---\nSee [next](SEC02.html).\n');
      await writeFile(join(dir, 'SEC02.md'), '---\ntitle: "SEC02 - Sign-in"\nlayout: default\n---\n');
      const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);

      await lintCommand.parseAsync(['-c', config, '-q', '-f', 'json', '--max-warnings', '1'], { from: 'user' });
      const diagnostics: Array<{ ruleId: string; severity: string }> = JSON.parse(String(log.mock.calls[0][0]));
      expect(diagnostics.map((d) => [d.ruleId, d.severity])).toEqual([['relative-link-prefix', 'warn']]);
      expect(process.exitCode).toBeUndefined();

      await lintCommand.parseAsync(['-c', config, '-q', '-f', 'json', '--max-warnings', '0'], { from: 'user' });
      expect(process.exitCode).toBe(1);
    });
  });
});

describe('sync-index command', () => {
  it('fails when a pillar index has no questions section', async () => {
    await withTempDir(async (dir) => {
      const config = join(dir, 'wafr-docs.config.ts');
      await writeFile(config, "export default { catalog: 'catalog.json' };");
      await writeFile(
        join(dir, 'catalog.json'),
        JSON.stringify({
          pillars: [{ slug: 'security', title: 'Security', prefix: 'SEC', navOrder: 2, questions: [] }],
        }),
      );
      await mkdir(join(dir, 'docs', 'security'), { recursive: true });
      await writeFile(join(dir, 'docs', 'security', 'index.md'), '---\ntitle: Security\nlayout: default\n---\nIntro.\n');
      const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
      const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);

      await syncIndexCommand.parseAsync(['-c', config, '-q'], { from: 'user' });

      expect(log.mock.calls.map((c) => c[0])).toEqual(['Updated 0 index page(s), 0 already current']);
      expect(warn).toHaveBeenCalledWith('Warning: Could not find questions section in docs/security/index.md');
      expect(process.exitCode).toBe(1);
    });
  });
});

describe('verify command', () => {
  it('passes when every catalog question has a page', async () => {
    await withTempDir(async (dir) => {
      const config = join(dir, 'wafr-docs.config.ts');
      await writeFile(config, "export default { catalog: 'catalog.json' };");
      await writeFile(
        join(dir, 'catalog.json'),
        JSON.stringify({
          pillars: [
            {
              slug: 'security',
              title: 'Security',
              prefix: 'SEC',
              navOrder: 2,
              questions: [{ id: 'SEC01', title: 'How do you securely operate your workload?' }],
            },
          ],
        }),
      );
      await mkdir(join(dir, 'docs', 'security'), { recursive: true });
      await writeFile(
        join(dir, 'docs', 'security', 'SEC01.md'),
        '---\ntitle: "SEC01 - How do you securely operate your workload?"\nlayout: default\n---\n',
      );
      const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);

      await verifyCommand.parseAsync(['-c', config, '-q'], { from: 'user' });

      expect(log.mock.calls.map((c) => c[0])).toEqual([
        'Security (docs/security): 1/1 questions\nCatalog coverage complete.',
      ]);
      expect(process.exitCode).toBeUndefined();
    });
  });
});
