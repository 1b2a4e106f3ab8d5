import { frontmatterKeyLine } from '../rewrite';
import { navFields } from '../navigation';
import type { Rule, RuleReport } from './types';
import type { DocPage } from '../../types/page';

export const duplicateNavOrder: Rule = {
  id: 'duplicate-nav-order',
  description: 'Sibling pages do not share a nav_order',
  defaultSeverity: 'error',
  check({ pages, navigation }) {
    const targets = new Set(pages);
    const out: RuleReport[] = [];
    for (const clash of navigation.clashes) {
      const [first, ...rest] = clash.pages;
      for (const page of rest) {
        if (!targets.has(page)) continue;
        out.push({
          path: page.path,
          line: frontmatterKeyLine(page, 'nav_order'),
          column: 1,
          message: `nav_order ${clash.navOrder} is also used by sibling ${first.path}`,
        });
      }
    }
    return out;
  },
};

export const navParent: Rule = {
  id: 'nav-parent',
  description: 'parent and grand_parent name exactly one existing page',
  defaultSeverity: 'error',
  check({ pages, navigation }) {
    const targets = new Set(pages);
    return navigation.problems
      .filter((p) => targets.has(p.page))
      .map((p) => ({
        path: p.page.path,
        line: frontmatterKeyLine(p.page, p.field),
        column: 1,
        message: p.message,
      }));
  },
};

export const navHasChildren: Rule = {
  id: 'nav-has-children',
  description: 'Pages with child pages set has_children: true',
  defaultSeverity: 'warn',
  check({ pages, navigation }) {
    const out: RuleReport[] = [];
    for (const page of pages) {
      const count = navigation.childCount.get(page) ?? 0;
      if (!count || navFields(page).has_children) continue;
      out.push({
        path: page.path,
        line: frontmatterKeyLine(page, 'title'),
        column: 1,
        message: `Page has ${count} child page${count === 1 ? '' : 's'} but does not set has_children: true`,
      });
    }
    return out;
  },
};

export const duplicatePermalink: Rule = {
  id: 'duplicate-permalink',
  description: 'No two pages produce the same URL',
  defaultSeverity: 'error',
  check({ pages, corpus }) {
    const targets = new Set(pages);
    const byUrl = new Map<string, DocPage[]>();
    for (const page of corpus.pages) {
      const list = byUrl.get(page.url) ?? [];
      list.push(page);
      byUrl.set(page.url, list);
    }
    const out: RuleReport[] = [];
    for (const [url, list] of byUrl) {
      const [first, ...rest] = list;
      for (const page of rest) {
        if (!targets.has(page)) continue;
        out.push({
          path: page.path,
          line: frontmatterKeyLine(page, 'permalink'),
          column: 1,
          message: `URL ${url} is also produced by ${first.path}`,
        });
      }
    }
    return out;
  },
};
