import { readFile } from 'node:fs/promises';
import path from 'node:path';
import type { ZodError } from 'zod';
import { catalogSchema, type Catalog, type Pillar, type Question } from '../content/schema';
import bundled from '../data/pillars.json';
import type { DocPage } from '../types/page';
import type { Corpus } from './corpus';
import { navFields } from './navigation';
import { comparePageIds, pageIdFromPath, questionIdOf } from './wafr';

export function formatIssues(error: ZodError): string {
  return error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`).join('; ');
}

export function loadBundledCatalog(): Catalog {
  return catalogSchema.parse(bundled);
}

/** Load a catalog JSON file, or the bundled catalog when no path is given. */
export async function loadCatalog(file?: string): Promise<Catalog> {
  if (!file) return loadBundledCatalog();
  let data: unknown;
  try {
    data = JSON.parse(await readFile(file, 'utf8'));
  } catch (err) {
    const msg = err instanceof Error ? err.message : String(err);
    throw new Error(`Failed to read catalog ${file}: ${msg}`);
  }
  const res = catalogSchema.safeParse(data);
  if (!res.success) throw new Error(`Invalid catalog (${file}): ${formatIssues(res.error)}`);
  return res.data;
}

export function findPillar(catalog: Catalog, key: string): Pillar | undefined {
  const k = key.trim();
  return catalog.pillars.find((p) => p.slug === k.toLowerCase() || p.prefix === k.toUpperCase());
}

export type QuestionRef = {
  pillar: Pillar;
  question: Question;
  position: number; // 1-based position within the pillar
};

export function findQuestion(catalog: Catalog, id: string): QuestionRef | undefined {
  const qid = id.trim().toUpperCase();
  for (const pillar of catalog.pillars) {
    const i = pillar.questions.findIndex((q) => q.id === qid);
    if (i !== -1) return { pillar, question: pillar.questions[i], position: i + 1 };
  }
  return undefined;
}

export function pillarDir(docsDir: string, pillar: Pillar): string {
  return path.posix.join(docsDir || '.', pillar.slug).replace(/^\.\//, '');
}

/** Pages directly inside a pillar directory. */
export function pillarPages(corpus: Corpus, docsDir: string, pillar: Pillar): DocPage[] {
  const dir = pillarDir(docsDir, pillar);
  return corpus.pages.filter((p) => path.posix.dirname(p.path) === dir);
}

export type TitleMismatch = {
  id: string;
  path: string;
  expected: string;
  actual: string;
};

export type NavOrderMismatch = {
  path: string;
  expected: number;
  actual?: number;
};

export type PillarReport = {
  slug: string;
  title: string;
  dir: string;
  expected: number;
  found: number;
  missing: Question[];
  extra: string[];
  mismatched: TitleMismatch[];
  orphanPractices: string[]; // best-practice pages whose question page is missing
  navOrder: NavOrderMismatch | null; // pillar index page out of the catalog's order
};

export type VerifyReport = {
  pillars: PillarReport[];
  ok: boolean;
};

function stripIdPrefix(title: string, id: string): string {
  return title.startsWith(id) ? title.slice(id.length).replace(/^\s*[-:\u2013\u2014]\s*/, '').trim() : title.trim();
}

export function verifyCatalog(corpus: Corpus, catalog: Catalog, docsDir: string): VerifyReport {
  const pillars: PillarReport[] = [];
  for (const pillar of catalog.pillars) {
    const pages = pillarPages(corpus, docsDir, pillar);
    const questionPages = new Map<string, DocPage>();
    const practicePages: string[] = [];
    for (const page of pages) {
      const id = pageIdFromPath(page.path);
      if (!id || id.prefix !== pillar.prefix) continue;
      if (id.practice === undefined) questionPages.set(id.id, page);
      else practicePages.push(id.id);
    }

    const expectedIds = new Set(pillar.questions.map((q) => q.id));
    const missing = pillar.questions.filter((q) => !questionPages.has(q.id));
    const extra = [...questionPages.keys()]
      .filter((id) => !expectedIds.has(id))
      .sort((a, b) => {
        const pa = pageIdFromPath(a);
        const pb = pageIdFromPath(b);
        return pa && pb ? comparePageIds(pa, pb) : a < b ? -1 : 1;
      });

    const mismatched: TitleMismatch[] = [];
    for (const q of pillar.questions) {
      const page = questionPages.get(q.id);
      const title = page ? navFields(page).title : undefined;
      if (!page || !title) continue;
      if (stripIdPrefix(title, q.id) !== q.title) {
        mismatched.push({ id: q.id, path: page.path, expected: q.title, actual: title });
      }
    }

    const orphanPractices = practicePages
      .filter((bp) => {
        const id = pageIdFromPath(bp);
        return id !== null && !questionPages.has(questionIdOf(id));
      })
      .sort();

    const indexPage = pages.find((p) => /^index\.(md|markdown)$/i.test(path.posix.basename(p.path)));
    const indexOrder = indexPage ? navFields(indexPage).nav_order : undefined;
    const navOrder =
      indexPage && indexOrder !== pillar.navOrder
        ? { path: indexPage.path, expected: pillar.navOrder, actual: indexOrder }
        : null;

    pillars.push({
      slug: pillar.slug,
      title: pillar.title,
      dir: pillarDir(docsDir, pillar),
      expected: pillar.questions.length,
      found: pillar.questions.length - missing.length,
      missing,
      extra,
      mismatched,
      orphanPractices,
      navOrder,
    });
  }
  const ok = pillars.every(
    (p) =>
      !p.missing.length && !p.extra.length && !p.mismatched.length && !p.orphanPractices.length && !p.navOrder,
  );
  return { pillars, ok };
}

export function formatVerifyReport(report: VerifyReport): string {
  const lines: string[] = [];
  for (const p of report.pillars) {
    lines.push(`${p.title} (${p.dir}): ${p.found}/${p.expected} questions`);
    for (const q of p.missing) lines.push(`  missing  ${q.id}: ${q.title}`);
    for (const id of p.extra) lines.push(`  extra    ${id}`);
    for (const m of p.mismatched) lines.push(`  title    ${m.id}: "${m.actual}" (expected "${m.expected}")`);
    for (const id of p.orphanPractices) lines.push(`  orphan   ${id}`);
    if (p.navOrder) {
      lines.push(`  nav_order ${p.navOrder.path}: ${p.navOrder.actual ?? 'none'} (expected ${p.navOrder.expected})`);
    }
  }
  lines.push(report.ok ? 'Catalog coverage complete.' : 'Catalog coverage has gaps.');
  return lines.join('\n');
}
