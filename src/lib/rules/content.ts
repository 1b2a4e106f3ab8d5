import { scanLines } from '../markdown';
import { outsideCodeSpans, rewriteBody } from '../rewrite';
import { PLACEHOLDER_PATTERNS } from '../templates';
import type { DocPage } from '../../types/page';
import type { Rule, RuleReport } from './types';

const LIQUID_TAG_RE = /\{%-?\s*(\w+)[^%]*?-?%\}/g;
const LIQUID_BLOCKS = new Set(['for', 'if', 'unless', 'case', 'capture', 'tablerow']);

type Orphan = { line: number; column: number; tag: string };

/** Liquid block closers ({% endfor %}, {% endif %}, ...) with no opener before them. */
export function findOrphanClosers(page: DocPage): Orphan[] {
  const open = new Map<string, number>();
  const out: Orphan[] = [];
  for (const { text, line } of scanLines(page.body, page.bodyLine)) {
    for (const m of text.matchAll(LIQUID_TAG_RE)) {
      const name = m[1];
      if (LIQUID_BLOCKS.has(name)) {
        open.set(name, (open.get(name) ?? 0) + 1);
      } else if (name.startsWith('end') && LIQUID_BLOCKS.has(name.slice(3))) {
        const block = name.slice(3);
        const count = open.get(block) ?? 0;
        if (count > 0) open.set(block, count - 1);
        else out.push({ line, column: (m.index ?? 0) + 1, tag: m[0] });
      }
    }
  }
  return out;
}

export const templatePlaceholder: Rule = {
  id: 'template-placeholder',
  description: 'No leftover template closers or scaffold placeholder copy',
  defaultSeverity: 'warn',
  check({ pages }) {
    const out: RuleReport[] = [];
    for (const page of pages) {
      for (const o of findOrphanClosers(page)) {
        out.push({ path: page.path, line: o.line, column: o.column, message: `Leftover template tag ${o.tag} has no opening tag` });
      }
      for (const { text, line } of scanLines(page.body, page.bodyLine)) {
        for (const re of PLACEHOLDER_PATTERNS) {
          const m = re.exec(text);
          if (!m) continue;
          out.push({ path: page.path, line, column: m.index + 1, message: `Placeholder text "${m[0]}" has not been replaced` });
          break;
        }
      }
    }
    return out;
  },
  fix(page) {
    const orphans = findOrphanClosers(page);
    if (!orphans.length) return page.raw;
    const byLine = new Map<number, Orphan[]>();
    for (const o of orphans) byLine.set(o.line, [...(byLine.get(o.line) ?? []), o]);
    return rewriteBody(page, (text, line) => {
      const here = byLine.get(line);
      if (!here) return text;
      let next = text;
      // remove right to left so earlier columns stay valid
      for (const o of [...here].sort((a, b) => b.column - a.column)) {
        next = next.slice(0, o.column - 1) + next.slice(o.column - 1 + o.tag.length);
      }
      return next.trim() ? next.replace(/\s+$/, '') : null;
    });
  },
};

const TYPOGRAPHIC: Record<string, string> = {
  '\u2014': '--', // em dash
  '\u2013': '-', // en dash
  '\u201C': '"',
  '\u201D': '"',
  '\u2018': "'",
  '\u2019': "'",
  '\u2026': '...',
};
const TYPOGRAPHIC_RE = /[\u2013\u2014\u2018\u2019\u201C\u201D\u2026]/g;

export function toAsciiPunctuation(text: string): string {
  return text.replace(TYPOGRAPHIC_RE, (ch) => TYPOGRAPHIC[ch] ?? ch);
}

export const asciiPunctuation: Rule = {
  id: 'ascii-punctuation',
  description: 'Body text uses ASCII dashes, quotes and ellipses',
  defaultSeverity: 'off',
  check({ pages }) {
    const out: RuleReport[] = [];
    for (const page of pages) {
      for (const { text, line } of scanLines(page.body, page.bodyLine)) {
        const at = text.search(TYPOGRAPHIC_RE);
        if (at === -1) continue;
        out.push({ path: page.path, line, column: at + 1, message: `Typographic character "${text[at]}" (use "${TYPOGRAPHIC[text[at]]}")` });
      }
    }
    return out;
  },
  fix(page) {
    return rewriteBody(page, (text) => outsideCodeSpans(text, toAsciiPunctuation));
  },
};
