/**
 * Well-Architected page identifiers: questions ("SEC01") and best practices ("SEC01-BP04").
 */

export type PageId = {
  id: string;
  prefix: string;
  question: number;
  practice?: number;
};

const PAGE_ID_RE = /^([A-Z]+)(\d{2})(?:-BP(\d{2}))?$/;

export function parsePageId(name: string): PageId | null {
  const m = PAGE_ID_RE.exec(name);
  if (!m) return null;
  const out: PageId = { id: name, prefix: m[1], question: Number(m[2]) };
  if (m[3] !== undefined) out.practice = Number(m[3]);
  return out;
}

/** Identifier carried by a source path's file name, if any. */
export function pageIdFromPath(path: string): PageId | null {
  const base = path.split('/').pop() ?? '';
  return parsePageId(base.replace(/\.(md|markdown|html)$/i, ''));
}

export function questionIdOf(id: PageId): string {
  return `${id.prefix}${String(id.question).padStart(2, '0')}`;
}

export function comparePageIds(a: PageId, b: PageId): number {
  if (a.prefix !== b.prefix) return a.prefix < b.prefix ? -1 : 1;
  if (a.question !== b.question) return a.question - b.question;
  return (a.practice ?? 0) - (b.practice ?? 0);
}

/** True for link targets that name a WAF page, e.g. "SEC01.html", "./SEC01-BP02", "../security/SEC03.html". */
export const WAF_LINK_RE = /^((?:\.{1,2}\/)*(?:[\w-]+\/)*)([A-Z]+\d{2}(?:-BP\d{2})?)(\.html)?([#?].*)?$/;
