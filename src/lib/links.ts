import path from 'node:path';

export type TargetKind = 'empty' | 'template' | 'external' | 'anchor' | 'internal';

export function classifyTarget(target: string): TargetKind {
  const t = target.trim();
  if (!t) return 'empty';
  if (/\{\{|\{%/.test(t)) return 'template';
  if (/^[a-z][a-z0-9+.-]*:/i.test(t) || t.startsWith('//')) return 'external';
  if (t.startsWith('#')) return 'anchor';
  return 'internal';
}

export function normalizeBaseUrl(baseUrl: string): string {
  const b = baseUrl.trim().replace(/\/+$/, '');
  if (!b) return '';
  return b.startsWith('/') ? b : `/${b}`;
}

/**
 * Root-absolute URL an internal link points at, seen from the page served at `fromUrl`.
 * Query and fragment are dropped; a trailing slash is kept. Returns null for links that are
 * not internal (external, anchor-only, templated or empty).
 */
export function resolveLinkUrl(fromUrl: string, target: string, baseUrl = ''): string | null {
  if (classifyTarget(target) !== 'internal') return null;
  let p = target.trim().split(/[?#]/)[0];
  if (!p) return null;
  try {
    p = decodeURI(p);
  } catch {
    // malformed escapes are checked verbatim
  }

  if (p.startsWith('/')) {
    const base = normalizeBaseUrl(baseUrl);
    if (base && (p === base || p.startsWith(`${base}/`))) p = p.slice(base.length) || '/';
    return path.posix.normalize(p);
  }

  const dir = fromUrl.endsWith('/') ? fromUrl : fromUrl.slice(0, fromUrl.lastIndexOf('/') + 1);
  return path.posix.join(dir || '/', p);
}
