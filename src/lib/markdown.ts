/**
 * Line-level Markdown scanning. Fenced code blocks are illustrative content and are never
 * inspected; inline code spans are blanked so their contents cannot look like links.
 * Indented code blocks are not recognised: page bodies indent nested HTML freely.
 */

export type ScannedLine = {
  line: number; // 1-based line in the file
  text: string;
};

export type Heading = {
  level: number;
  text: string;
  line: number;
  source: 'atx' | 'setext' | 'html';
};

export type LinkKind = 'markdown' | 'reference' | 'html';

export type Link = {
  target: string;
  line: number;
  column: number; // 1-based column of the target's first character
  kind: LinkKind;
};

export type Section = {
  heading: string;
  line: number;
  text: string;
};

const FENCE_OPEN_RE = /^ {0,3}(`{3,}|~{3,})/;
const FENCE_CLOSE_RE = /^ {0,3}(`{3,}|~{3,})\s*$/;

function blank(s: string): string {
  return ' '.repeat(s.length);
}

/** Lines outside fenced code blocks, with code spans and one-line HTML comments blanked. */
export function scanLines(body: string, bodyLine = 1): ScannedLine[] {
  const out: ScannedLine[] = [];
  let fence: string | null = null;
  body.split(/\r?\n/).forEach((text, i) => {
    if (fence) {
      const close = FENCE_CLOSE_RE.exec(text);
      if (close && close[1][0] === fence[0] && close[1].length >= fence.length) fence = null;
      return;
    }
    const open = FENCE_OPEN_RE.exec(text);
    if (open) {
      fence = open[1];
      return;
    }
    out.push({
      line: bodyLine + i,
      text: text.replace(/`+[^`]*`+/g, blank).replace(/<!--.*?-->/g, blank),
    });
  });
  return out;
}

const ATX_RE = /^ {0,3}(#{1,6})(?=[ \t]|$)(.*)$/;
const SETEXT_RE = /^ {0,3}(=+|-+)[ \t]*$/;
const HTML_HEADING_RE = /<h([1-6])\b[^>]*>(.*?)<\/h\1\s*>/gi;

function stripTags(s: string): string {
  return s.replace(/<[^>]+>/g, '').trim();
}

function canBeSetextText(text: string): boolean {
  const t = text.trim();
  if (!t) return false;
  return !/^(#|<|[-*+]\s|\d+[.)]\s|>|\||`{3}|~{3})/.test(t);
}

export function extractHeadings(lines: ScannedLine[], options: { includeHtml?: boolean } = {}): Heading[] {
  const out: Heading[] = [];
  for (let i = 0; i < lines.length; i++) {
    const { text, line } = lines[i];
    const atx = ATX_RE.exec(text);
    if (atx) {
      out.push({
        level: atx[1].length,
        text: atx[2].replace(/[ \t]+#+[ \t]*$/, '').trim(),
        line,
        source: 'atx',
      });
      continue;
    }

    const next = lines[i + 1];
    if (next && next.line === line + 1 && canBeSetextText(text)) {
      const setext = SETEXT_RE.exec(next.text);
      if (setext) {
        out.push({ level: setext[1][0] === '=' ? 1 : 2, text: text.trim(), line, source: 'setext' });
        i++;
        continue;
      }
    }

    if (options.includeHtml) {
      for (const m of text.matchAll(HTML_HEADING_RE)) {
        out.push({ level: Number(m[1]), text: stripTags(m[2]), line, source: 'html' });
      }
    }
  }
  return out;
}

const INLINE_LINK_RE = /!?\[(?:[^\[\]]|\[[^\]]*\])*\]\(\s*(<[^>]*>|[^\s)]+)(?:\s+(?:"[^"]*"|'[^']*'|\([^)]*\)))?\s*\)/g;
const REFERENCE_DEF_RE = /^ {0,3}\[[^\]]+\]:\s*(<[^>]*>|\S+)/;
const HTML_ATTR_RE = /\b(?:href|src)\s*=\s*(["'])(.*?)\1/gi;

export function extractLinks(lines: ScannedLine[]): Link[] {
  const out: Link[] = [];
  for (const { text, line } of lines) {
    const ref = REFERENCE_DEF_RE.exec(text);
    if (ref) {
      const at = text.indexOf(ref[1], text.indexOf(']:') + 2);
      const angled = ref[1].startsWith('<');
      out.push({
        target: angled ? ref[1].slice(1, -1) : ref[1],
        line,
        column: at + 1 + (angled ? 1 : 0),
        kind: 'reference',
      });
      continue;
    }
    for (const m of text.matchAll(INLINE_LINK_RE)) {
      const rawTarget = m[1];
      const angled = rawTarget.startsWith('<');
      const at = (m.index ?? 0) + m[0].indexOf(rawTarget, m[0].indexOf('](') + 2);
      out.push({
        target: angled ? rawTarget.slice(1, -1) : rawTarget,
        line,
        column: at + 1 + (angled ? 1 : 0),
        kind: 'markdown',
      });
    }
    for (const m of text.matchAll(HTML_ATTR_RE)) {
      const start = (m.index ?? 0) + m[0].indexOf(m[1]) + 1;
      out.push({ target: m[2], line, column: start + 1, kind: 'html' });
    }
  }
  return out.sort((a, b) => a.line - b.line || a.column - b.column);
}

/** Level-2 sections of a body; text runs from the heading to the next level-1 or level-2 heading. */
export function splitSections(body: string, bodyLine = 1): Section[] {
  const raw = body.split(/\r?\n/);
  const headings = extractHeadings(scanLines(body, bodyLine)).filter((h) => h.level <= 2);
  const out: Section[] = [];
  headings.forEach((h, i) => {
    if (h.level !== 2) return;
    const from = h.line - bodyLine + (h.source === 'setext' ? 2 : 1);
    const to = i + 1 < headings.length ? headings[i + 1].line - bodyLine : raw.length;
    out.push({ heading: h.text, line: h.line, text: raw.slice(from, to).join('\n').trim() });
  });
  return out;
}
