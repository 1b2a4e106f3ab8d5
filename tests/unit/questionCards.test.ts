import { readFile, mkdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { describe, it, expect } from 'vitest';
import { loadCorpus } from '../../src/lib/corpus';
import { questionCards, replaceQuestionsSection, syncQuestionCards } from '../../src/lib/questionCards';
import { renderQuestionCards } from '../../src/lib/templates';
import { createConsoleLogger } from '../../src/logger';
import { SECURITY_CATALOG, makeCorpus, md, withTempDir } from '../support/site';

const HEAD = '---\ntitle: Security\n---\n# Security\n\n';
const OLD_CARDS = [
  '## Questions',
  '',
  'Old intro.',
  '',
  '<div class="question-cards">',
  '  <div class="question-card">',
  '    <h3>Old</h3>',
  '  </div>',
  '</div>',
].join('\n');

describe('replaceQuestionsSection', () => {
  it('replaces the heading through the balanced cards block', () => {
    const raw = `${HEAD}${OLD_CARDS}\n\n## Next\n`;
    expect(replaceQuestionsSection(raw, 'NEW')).toBe(`${HEAD}NEW\n\n## Next\n`);
  });

  it('returns null without a questions section', () => {
    expect(replaceQuestionsSection(`${HEAD}No cards here.\n`, 'NEW')).toBeNull();
    const split = `${HEAD}## Questions\n\n## Other\n\n<div class="question-cards"></div>\n`;
    expect(replaceQuestionsSection(split, 'NEW')).toBeNull();
  });
});

describe('questionCards', () => {
  it('lists question pages in id order', () => {
    const corpus = makeCorpus({
      'docs/security/SEC10.md': md({ title: 'SEC10 - Incident response' }),
      'docs/security/SEC02.md': md({ title: 'SEC02 - Identities' }),
      'docs/security/SEC02-BP01.md': md({ title: 'SEC02-BP01 - Sign-in' }),
      'docs/security/index.md': md({ title: 'Security' }),
    });
    expect(questionCards(corpus.pages, 'SEC')).toEqual([
      { id: 'SEC02', title: 'SEC02 - Identities', href: './SEC02.html' },
      { id: 'SEC10', title: 'SEC10 - Incident response', href: './SEC10.html' },
    ]);
  });
});

describe('syncQuestionCards', () => {
  const files = {
    'docs/security/index.md': `${HEAD}${OLD_CARDS}\n`,
    'docs/security/SEC01.md': md({ title: 'SEC01 - Operate' }),
    'docs/security/SEC02.md': md({ title: 'SEC02 - Identities' }),
  };
  const cards = [
    { id: 'SEC01', title: 'SEC01 - Operate', href: './SEC01.html' },
    { id: 'SEC02', title: 'SEC02 - Identities', href: './SEC02.html' },
  ];

  it('reports stale and missing index pages on a dry run', async () => {
    const corpus = makeCorpus(files);
    const result = await syncQuestionCards(corpus, SECURITY_CATALOG, 'docs', {
      dryRun: true,
      logger: createConsoleLogger('test'),
    });
    expect(result).toEqual({
      updated: ['docs/security/index.md'],
      unchanged: [],
      missingSection: [],
      missingIndex: ['docs/reliability'],
    });
  });

  it('leaves a current index page alone', async () => {
    const corpus = makeCorpus({ ...files, 'docs/security/index.md': `${HEAD}${renderQuestionCards(cards)}\n` });
    const result = await syncQuestionCards(corpus, SECURITY_CATALOG, 'docs', { dryRun: true });
    expect(result.unchanged).toEqual(['docs/security/index.md']);
    expect(result.updated).toEqual([]);
  });

  it('rewrites the index page on disk', async () => {
    await withTempDir(async (dir) => {
      await mkdir(join(dir, 'docs', 'security'), { recursive: true });
      for (const [path, raw] of Object.entries(files)) await writeFile(join(dir, path), raw);

      const corpus = await loadCorpus({ root: dir });
      await syncQuestionCards(corpus, SECURITY_CATALOG, 'docs', { logger: createConsoleLogger('test') });
      expect(await readFile(join(dir, 'docs', 'security', 'index.md'), 'utf8')).toBe(
        `${HEAD}${renderQuestionCards(cards)}\n`,
      );
    });
  });
});

describe('renderQuestionCards', () => {
  it('renders one card per question', () => {
    const html = renderQuestionCards([{ id: 'SEC01', title: 'SEC01 - Operate', href: './SEC01.html' }]);
    expect(html.startsWith('## Questions\n')).toBe(true);
    expect(html).toContain(
      '  <div class="question-card">\n    <h3>SEC01 - Operate</h3>\n    <a href="./SEC01.html">View details →</a>\n  </div>',
    );
    expect(html.endsWith('</div>\n</div>')).toBe(true);
  });
});
