import { extractLinks, scanLines } from '../markdown';
import { resolveLinkUrl } from '../links';
import { rewriteLinkTargets } from '../rewrite';
import { WAF_LINK_RE } from '../wafr';
import type { Rule, RuleReport } from './types';

export const internalLink: Rule = {
  id: 'internal-link',
  description: 'Internal links resolve to a page or static file of the site',
  defaultSeverity: 'error',
  check({ pages, corpus, config }) {
    const out: RuleReport[] = [];
    for (const page of pages) {
      for (const link of extractLinks(scanLines(page.body, page.bodyLine))) {
        const url = resolveLinkUrl(page.url, link.target, config.baseUrl);
        if (url === null || corpus.resolveTarget(url) !== null) continue;
        out.push({
          path: page.path,
          line: link.line,
          column: link.column,
          message: `Link target "${link.target}" does not resolve (${url})`,
        });
      }
    }
    return out;
  },
};

function addDotSlash(target: string): string {
  const m = WAF_LINK_RE.exec(target);
  return m && m[1] === '' ? `./${target}` : target;
}

function addHtml(target: string): string {
  const m = WAF_LINK_RE.exec(target);
  if (!m || m[3]) return target;
  return `${m[1]}${m[2]}.html${m[4] ?? ''}`;
}

export const relativeLinkPrefix: Rule = {
  id: 'relative-link-prefix',
  description: 'Links to sibling question and best-practice pages start with "./"',
  defaultSeverity: 'warn',
  check({ pages }) {
    const out: RuleReport[] = [];
    for (const page of pages) {
      for (const link of extractLinks(scanLines(page.body, page.bodyLine))) {
        if (addDotSlash(link.target) === link.target) continue;
        out.push({
          path: page.path,
          line: link.line,
          column: link.column,
          message: `Link "${link.target}" should be written "./${link.target}"`,
        });
      }
    }
    return out;
  },
  fix(page) {
    return rewriteLinkTargets(page, addDotSlash);
  },
};

export const extensionlessLink: Rule = {
  id: 'extensionless-link',
  description: 'Links to question and best-practice pages name the .html file',
  defaultSeverity: 'warn',
  check({ pages }) {
    const out: RuleReport[] = [];
    for (const page of pages) {
      for (const link of extractLinks(scanLines(page.body, page.bodyLine))) {
        const fixed = addHtml(link.target);
        if (fixed === link.target) continue;
        out.push({
          path: page.path,
          line: link.line,
          column: link.column,
          message: `Link "${link.target}" should be written "${fixed}"`,
        });
      }
    }
    return out;
  },
  fix(page) {
    return rewriteLinkTargets(page, addHtml);
  },
};
