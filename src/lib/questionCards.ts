import { writeFile } from 'node:fs/promises';
import type { Catalog } from '../content/schema';
import type { Logger } from '../logger';
import type { DocPage } from '../types/page';
import { pillarDir, pillarPages } from './catalog';
import type { Corpus } from './corpus';
import { navFields } from './navigation';
import { renderQuestionCards, type QuestionCard } from './templates';
import { comparePageIds, pageIdFromPath, type PageId } from './wafr';

export type SyncOptions = {
  dryRun?: boolean;
  logger?: Logger;
};

export type SyncResult = {
  updated: string[];
  unchanged: string[];
  missingSection: string[]; // index pages without a "## Questions" + question-cards block
  missingIndex: string[]; // pillar directories without index.md
};

const QUESTIONS_HEADING_RE = /^##[ \t]+Questions[ \t]*$/m;
const CARDS_OPEN_RE = /<div\s+class=(["'])question-cards\1[^>]*>/g;
const DIV_TAG_RE = /<div\b[^>]*>|<\/div\s*>/gi;

/**
 * Replace the "## Questions" section (heading through the balanced question-cards div).
 * Returns null when the section cannot be found.
 */
export function replaceQuestionsSection(raw: string, section: string): string | null {
  const heading = QUESTIONS_HEADING_RE.exec(raw);
  if (!heading) return null;

  const openRe = new RegExp(CARDS_OPEN_RE.source, 'g');
  openRe.lastIndex = heading.index;
  const open = openRe.exec(raw);
  if (!open) return null;
  const between = raw.slice(heading.index + heading[0].length, open.index);
  if (/^#{1,2}[ \t]/m.test(between)) return null;

  const tagRe = new RegExp(DIV_TAG_RE.source, 'gi');
  tagRe.lastIndex = open.index + open[0].length;
  let depth = 1;
  let end = -1;
  for (let m = tagRe.exec(raw); m; m = tagRe.exec(raw)) {
    depth += m[0].startsWith('</') ? -1 : 1;
    if (depth === 0) {
      end = m.index + m[0].length;
      break;
    }
  }
  if (end === -1) return null;

  const text = raw.includes('\r\n') ? section.replace(/\n/g, '\r\n') : section;
  return raw.slice(0, heading.index) + text + raw.slice(end);
}

export function questionCards(pages: DocPage[], prefix: string): QuestionCard[] {
  const entries: Array<{ id: PageId; page: DocPage }> = [];
  for (const page of pages) {
    const id = pageIdFromPath(page.path);
    if (id && id.prefix === prefix && id.practice === undefined) entries.push({ id, page });
  }
  entries.sort((a, b) => comparePageIds(a.id, b.id));
  return entries.map(({ id, page }) => ({
    id: id.id,
    title: navFields(page).title ?? id.id,
    href: `./${id.id}.html`,
  }));
}

/** Regenerate the question cards of every pillar index page from the question pages beside it. */
export async function syncQuestionCards(
  corpus: Corpus,
  catalog: Catalog,
  docsDir: string,
  options: SyncOptions = {},
): Promise<SyncResult> {
  const result: SyncResult = { updated: [], unchanged: [], missingSection: [], missingIndex: [] };
  for (const pillar of catalog.pillars) {
    const dir = pillarDir(docsDir, pillar);
    const indexPath = `${dir}/index.md`;
    const index = corpus.pages.find((p) => p.path === indexPath);
    if (!index) {
      result.missingIndex.push(dir);
      options.logger?.warn?.(`Warning: ${indexPath} does not exist`);
      continue;
    }

    const cards = questionCards(pillarPages(corpus, docsDir, pillar), pillar.prefix);
    const next = replaceQuestionsSection(index.raw, renderQuestionCards(cards));
    if (next === null) {
      result.missingSection.push(indexPath);
      options.logger?.warn?.(`Warning: Could not find questions section in ${indexPath}`);
      continue;
    }
    if (next === index.raw) {
      result.unchanged.push(indexPath);
      continue;
    }

    result.updated.push(indexPath);
    if (options.dryRun) {
      options.logger?.log?.(`Would update ${indexPath} with ${cards.length} questions`);
    } else {
      await writeFile(index.absolutePath, next, 'utf8');
      options.logger?.log?.(`Updated ${indexPath} with ${cards.length} questions`);
    }
  }
  return result;
}
