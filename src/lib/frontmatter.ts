import { parseDocument } from 'yaml';

/**
 * Front-matter splitting and YAML parsing.
 * A block opens with "---" on the first line and closes at the next line that is exactly
 * "---" or "...".
 */

type Split = { body: string; bodyLine: number };

export type FrontmatterResult =
  | ({ kind: 'missing' } & Split)
  | ({ kind: 'unterminated' } & Split)
  | ({ kind: 'invalid'; message: string; line: number } & Split)
  | ({ kind: 'ok'; data: Record<string, unknown> } & Split);

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function parseFrontmatter(input: string): FrontmatterResult {
  const raw = input.replace(/^\uFEFF/, '');
  const lines = raw.split(/\r?\n/);

  if (lines[0]?.trimEnd() !== '---') {
    return { kind: 'missing', body: raw, bodyLine: 1 };
  }

  let close = -1;
  for (let i = 1; i < lines.length; i++) {
    const l = lines[i].trimEnd();
    if (l === '---' || l === '...') {
      close = i;
      break;
    }
  }
  if (close === -1) {
    return { kind: 'unterminated', body: lines.slice(1).join('\n'), bodyLine: 2 };
  }

  const yamlText = lines.slice(1, close).join('\n');
  const body = lines.slice(close + 1).join('\n');
  const bodyLine = close + 2;

  const doc = parseDocument(yamlText);
  if (doc.errors.length) {
    const err = doc.errors[0];
    // linePos is relative to the YAML text, which starts on file line 2
    const line = (err.linePos?.[0].line ?? 1) + 1;
    const message = err.message.split('\n')[0];
    return { kind: 'invalid', message, line, body, bodyLine };
  }

  const data: unknown = doc.toJS();
  if (data === null || data === undefined) {
    return { kind: 'ok', data: {}, body, bodyLine };
  }
  if (!isRecord(data)) {
    return { kind: 'invalid', message: 'front-matter must be a YAML mapping', line: 2, body, bodyLine };
  }
  return { kind: 'ok', data, body, bodyLine };
}
