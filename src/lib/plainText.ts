import { SEARCH_TEXT_LIMIT } from './constants';
import { scanLines } from './markdown';

export function sanitize(val: unknown): string {
  // Normalize to plain text, collapse whitespace, strip control chars
  let s = String(val ?? '');
  // Replace newlines and tabs with a space
  s = s.replace(/[\r\n\t]+/g, ' ');
  // Replace remaining ASCII control characters with a space (avoid word-joins), then collapse
  s = s.replace(/[\u0000-\u001F\u007F]+/g, ' ');
  // Collapse multiple spaces
  s = s.replace(/\s{2,}/g, ' ');
  return s.trim();
}

const ENTITIES: Record<string, string> = { amp: '&', lt: '<', gt: '>', quot: '"', apos: "'", nbsp: ' ' };

/**
 * Prose of a page body: code blocks dropped, HTML tags and Markdown markup removed,
 * link text kept, whitespace collapsed, capped at `limit` characters.
 */
export function plainText(body: string, limit = SEARCH_TEXT_LIMIT): string {
  const text = scanLines(body)
    .map((l) => l.text)
    .join('\n')
    .replace(/<[^>]+>/g, ' ')
    .replace(/&(amp|lt|gt|quot|apos|nbsp);/g, (_m, name: string) => ENTITIES[name] ?? ' ')
    .replace(/!?\[([^\]]*)\]\([^)]*\)/g, '$1')
    .replace(/^\s{0,3}(#{1,6}|>|[-*+]|\d+[.)])\s+/gm, '')
    .replace(/[*_~]{1,3}/g, '')
    .replace(/\{%.*?%\}|\{\{.*?\}\}/g, ' ');
  const clean = sanitize(text);
  return clean.length > limit ? clean.slice(0, limit).replace(/\s+\S*$/, '') : clean;
}
