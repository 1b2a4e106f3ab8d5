import { writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { describe, it, expect } from 'vitest';
import { findPillar, findQuestion, formatVerifyReport, loadCatalog, verifyCatalog } from '../../src/lib/catalog';
import { SECURITY_CATALOG, makeCorpus, md, withTempDir } from '../support/site';

const title = (t: string) => md({ title: t, layout: 'default' });

describe('verifyCatalog', () => {
  it('reports missing, extra and orphan pages', () => {
    const corpus = makeCorpus({
      'docs/security/index.md': md({ title: 'Security', layout: 'default', nav_order: 2 }),
      'docs/security/SEC01.md': title('SEC01 - How do you securely operate your workload?'),
      'docs/security/SEC01-BP01.md': title('SEC01-BP01 - Separate workloads using accounts'),
      'docs/security/SEC03.md': title('SEC03 - Extra'),
      'docs/security/SEC02-BP01.md': title('SEC02-BP01 - Use strong sign-in mechanisms'),
      'docs/reliability/REL01.md': title('REL01: How do you manage service quotas and constraints?'),
    });
    const report = verifyCatalog(corpus, SECURITY_CATALOG, 'docs');
    expect(report.ok).toBe(false);
    const [security, reliability] = report.pillars;
    expect(security.missing.map((q) => q.id)).toEqual(['SEC02']);
    expect(security.extra).toEqual(['SEC03']);
    expect(security.orphanPractices).toEqual(['SEC02-BP01']);
    expect(security.mismatched).toEqual([]);
    expect(security.navOrder).toBeNull();
    expect(reliability.found).toBe(1);
    expect(formatVerifyReport(report)).toBe(
      [
        'Security (docs/security): 1/2 questions',
        '  missing  SEC02: How do you manage authentication for people and machines?',
        '  extra    SEC03',
        '  orphan   SEC02-BP01',
        'Reliability (docs/reliability): 1/1 questions',
        'Catalog coverage has gaps.',
      ].join('\n'),
    );
  });

  it('reports question titles that differ from the catalog', () => {
    const corpus = makeCorpus({ 'docs/security/SEC01.md': title('SEC01 - Something else') });
    const [security] = verifyCatalog(corpus, SECURITY_CATALOG, 'docs').pillars;
    expect(security.mismatched).toEqual([
      {
        id: 'SEC01',
        path: 'docs/security/SEC01.md',
        expected: 'How do you securely operate your workload?',
        actual: 'SEC01 - Something else',
      },
    ]);
  });

  it('reports a pillar index whose nav_order differs from the catalog', () => {
    const corpus = makeCorpus({
      'docs/security/index.md': md({ title: 'Security', layout: 'default', nav_order: 5 }),
      'docs/security/SEC01.md': title('SEC01 - How do you securely operate your workload?'),
      'docs/security/SEC02.md': title('SEC02 - How do you manage authentication for people and machines?'),
      'docs/reliability/index.md': title('Reliability'),
      'docs/reliability/REL01.md': title('REL01 - How do you manage service quotas and constraints?'),
    });
    const report = verifyCatalog(corpus, SECURITY_CATALOG, 'docs');
    const [security, reliability] = report.pillars;
    expect(security.mismatched).toEqual([]);
    expect(security.navOrder).toEqual({ path: 'docs/security/index.md', expected: 2, actual: 5 });
    expect(reliability.navOrder).toEqual({ path: 'docs/reliability/index.md', expected: 3, actual: undefined });
    expect(report.ok).toBe(false);
    expect(formatVerifyReport(report)).toBe(
      [
        'Security (docs/security): 2/2 questions',
        '  nav_order docs/security/index.md: 5 (expected 2)',
        'Reliability (docs/reliability): 1/1 questions',
        '  nav_order docs/reliability/index.md: none (expected 3)',
        'Catalog coverage has gaps.',
      ].join('\n'),
    );
  });

  it('passes a complete site laid out at the root', () => {
    const corpus = makeCorpus({
      'security/SEC01.md': title('SEC01 - How do you securely operate your workload?'),
      'security/SEC02.md': title('SEC02 - How do you manage authentication for people and machines?'),
      'reliability/REL01.md': title('REL01 - How do you manage service quotas and constraints?'),
    });
    const report = verifyCatalog(corpus, SECURITY_CATALOG, '');
    expect(report.ok).toBe(true);
    expect(formatVerifyReport(report).split('\n').pop()).toBe('Catalog coverage complete.');
  });
});

describe('catalog lookups', () => {
  it('finds pillars by slug or prefix and questions by id', () => {
    expect(findPillar(SECURITY_CATALOG, 'sec')?.slug).toBe('security');
    expect(findPillar(SECURITY_CATALOG, 'Reliability')?.prefix).toBe('REL');
    expect(findPillar(SECURITY_CATALOG, 'cost')).toBeUndefined();
    const ref = findQuestion(SECURITY_CATALOG, 'sec02');
    expect(ref?.pillar.slug).toBe('security');
    expect(ref?.position).toBe(2);
  });
});

describe('loadCatalog', () => {
  it('returns the bundled catalog without a path', async () => {
    const catalog = await loadCatalog();
    expect(catalog.pillars[0].slug).toBe('security');
    expect(catalog.pillars[0].questions[1]).toEqual({
      id: 'SEC02',
      title: 'How do you manage authentication for people and machines?',
    });
  });

  it('validates a catalog file', async () => {
    await withTempDir(async (dir) => {
      const file = join(dir, 'catalog.json');
      await writeFile(file, JSON.stringify({ pillars: [] }));
      await expect(loadCatalog(file)).rejects.toThrow(`Invalid catalog (${file})`);
      await expect(loadCatalog(join(dir, 'missing.json'))).rejects.toThrow(/Failed to read catalog/);
    });
  });
});
