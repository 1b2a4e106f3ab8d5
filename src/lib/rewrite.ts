import type { DocPage } from '../types/page';
import { extractLinks, scanLines } from './markdown';

// code spans and one-line HTML comments, the spans scanLines blanks
const SKIPPED_SPAN_RE = /`+[^`]*`+|<!--.*?-->/g;
const FENCE_OPEN_RE = /^ {0,3}(`{3,}|~{3,})/;
const FENCE_CLOSE_RE = /^ {0,3}(`{3,}|~{3,})\s*$/;

/** Apply `fn` to the parts of a line that are neither inline code spans nor HTML comments. */
export function outsideCodeSpans(text: string, fn: (segment: string) => string): string {
  let out = '';
  let last = 0;
  for (const m of text.matchAll(SKIPPED_SPAN_RE)) {
    const at = m.index ?? 0;
    out += fn(text.slice(last, at)) + m[0];
    last = at + m[0].length;
  }
  return out + fn(text.slice(last));
}

/**
 * Rewrite body lines outside fenced code blocks. Front-matter and fenced lines are kept
 * byte-for-byte; returning null from `fn` deletes the line.
 */
export function rewriteBody(page: DocPage, fn: (text: string, line: number) => string | null): string {
  const eol = page.raw.includes('\r\n') ? '\r\n' : '\n';
  const lines = page.raw.split(/\r?\n/);
  const out: string[] = lines.slice(0, page.bodyLine - 1);
  let fence: string | null = null;
  for (let i = page.bodyLine - 1; i < lines.length; i++) {
    const text = lines[i];
    if (fence) {
      const close = FENCE_CLOSE_RE.exec(text);
      if (close && close[1][0] === fence[0] && close[1].length >= fence.length) fence = null;
      out.push(text);
      continue;
    }
    const open = FENCE_OPEN_RE.exec(text);
    if (open) {
      fence = open[1];
      out.push(text);
      continue;
    }
    const next = fn(text, i + 1);
    if (next !== null) out.push(next);
  }
  return out.join(eol);
}

/**
 * Rewrite the targets `extractLinks` finds (inline, angle-bracket, reference definitions and
 * href/src attributes), so a fixer touches exactly the links the checks report.
 */
export function rewriteLinkTargets(page: DocPage, transform: (target: string) => string): string {
  const eol = page.raw.includes('\r\n') ? '\r\n' : '\n';
  const lines = page.raw.split(/\r?\n/);
  const links = extractLinks(scanLines(page.body, page.bodyLine));
  // right to left so earlier columns on the same line stay valid
  for (const link of links.reverse()) {
    const next = transform(link.target);
    if (next === link.target) continue;
    const i = link.line - 1;
    // a page without front-matter keeps its BOM in raw but not in body
    const at = link.column - 1 + (i === 0 && lines[0].startsWith('\uFEFF') ? 1 : 0);
    lines[i] = lines[i].slice(0, at) + next + lines[i].slice(at + link.target.length);
  }
  return lines.join(eol);
}

/** 1-based line of a front-matter key, or 1 when the key is not on a line of its own. */
export function frontmatterKeyLine(page: DocPage, key: string): number {
  const lines = page.raw.split(/\r?\n/);
  const escaped = key.replace(/[-/\\^$*+?.()|[\]{}]/g, '\\$&');
  const re = new RegExp(`^${escaped}\\s*:`);
  const end = Math.max(page.bodyLine - 1, 1);
  for (let i = 1; i < end && i < lines.length; i++) {
    if (re.test(lines[i])) return i + 1;
  }
  return 1;
}
