import { existsSync } from 'node:fs';
import { mkdir, readFile, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { practicesFileSchema, type Catalog, type Practice } from '../content/schema';
import type { Logger } from '../logger';
import { findPillar, findQuestion, formatIssues, pillarDir } from './catalog';
import { renderPracticePage, renderQuestionPage } from './templates';
import { parsePageId } from './wafr';

export type ScaffoldOptions = {
  root: string;
  docsDir: string;
  dryRun?: boolean;
  logger?: Logger;
};

export type ScaffoldResult = {
  written: string[]; // paths relative to root
  skipped: string[];
};

async function writeNew(
  rel: string,
  content: string,
  options: ScaffoldOptions,
  result: ScaffoldResult,
): Promise<void> {
  const abs = path.join(options.root, ...rel.split('/'));
  if (existsSync(abs)) {
    result.skipped.push(rel);
    options.logger?.log?.(`File already exists: ${rel} - skipping`);
    return;
  }
  result.written.push(rel);
  if (options.dryRun) {
    options.logger?.log?.(`Would generate ${rel}`);
    return;
  }
  await mkdir(path.dirname(abs), { recursive: true });
  await writeFile(abs, content, 'utf8');
  options.logger?.log?.(`Generated ${rel}`);
}

/** Write a page for every catalog question of a pillar that has none yet. */
export async function scaffoldQuestions(
  catalog: Catalog,
  pillarKey: string,
  options: ScaffoldOptions,
): Promise<ScaffoldResult> {
  const pillar = findPillar(catalog, pillarKey);
  if (!pillar) throw new Error(`Unknown pillar: ${pillarKey}`);
  const dir = pillarDir(options.docsDir, pillar);
  const result: ScaffoldResult = { written: [], skipped: [] };
  for (const [i, question] of pillar.questions.entries()) {
    await writeNew(`${dir}/${question.id}.md`, renderQuestionPage(pillar, question, i + 1), options, result);
  }
  return result;
}

export async function loadPractices(file: string): Promise<Practice[]> {
  let data: unknown;
  try {
    data = JSON.parse(await readFile(file, 'utf8'));
  } catch (err) {
    const msg = err instanceof Error ? err.message : String(err);
    throw new Error(`Failed to read practices file ${file}: ${msg}`);
  }
  const res = practicesFileSchema.safeParse(data);
  if (!res.success) throw new Error(`Invalid practices file (${file}): ${formatIssues(res.error)}`);
  return res.data;
}

/** Write best-practice pages for one question; nav_order defaults to the practice number. */
export async function scaffoldPractices(
  catalog: Catalog,
  questionId: string,
  practices: Practice[],
  options: ScaffoldOptions,
): Promise<ScaffoldResult> {
  const ref = findQuestion(catalog, questionId);
  if (!ref) throw new Error(`Unknown question: ${questionId}`);
  const { pillar, question } = ref;

  for (const p of practices) {
    if (!p.id.startsWith(`${question.id}-BP`)) {
      throw new Error(`Practice ${p.id} does not belong to question ${question.id}`);
    }
  }

  const dir = pillarDir(options.docsDir, pillar);
  const result: ScaffoldResult = { written: [], skipped: [] };
  for (const practice of practices) {
    const navOrder = practice.nav_order ?? parsePageId(practice.id)?.practice ?? 1;
    await writeNew(
      `${dir}/${practice.id}.md`,
      renderPracticePage(pillar, question, practice, navOrder),
      options,
      result,
    );
  }
  return result;
}
