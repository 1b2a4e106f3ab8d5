import type { DocPage } from '../types/page';

/**
 * Navigation tree reconstruction with just-the-docs semantics: `parent` names the parent
 * page's title and `grand_parent` the title of the parent's parent.
 */

export type NavFields = {
  title?: string;
  parent?: string;
  grand_parent?: string;
  nav_order?: number;
  nav_exclude?: boolean;
  has_children?: boolean;
};

export type NavNode = {
  page: DocPage;
  title: string;
  navOrder?: number;
  children: NavNode[];
};

export type NavProblem = {
  page: DocPage;
  kind: 'unresolved' | 'ambiguous';
  field: 'parent' | 'grand_parent';
  message: string;
};

export type NavOrderClash = {
  navOrder: number;
  pages: DocPage[]; // sorted by path
};

export type Navigation = {
  roots: NavNode[];
  problems: NavProblem[];
  clashes: NavOrderClash[];
  parentOf: Map<DocPage, DocPage>;
  childCount: Map<DocPage, number>;
};

/** Navigation keys read leniently, so one bad key does not drop a page from the tree. */
export function navFields(page: DocPage): NavFields {
  if (page.parsed.kind !== 'ok') return {};
  const d = page.parsed.data;
  const str = (v: unknown) => (typeof v === 'string' && v.trim() ? v.trim() : undefined);
  return {
    title: str(d.title),
    parent: str(d.parent),
    grand_parent: str(d.grand_parent),
    nav_order: typeof d.nav_order === 'number' && Number.isFinite(d.nav_order) ? d.nav_order : undefined,
    nav_exclude: d.nav_exclude === true,
    has_children: d.has_children === true,
  };
}

type Entry = { page: DocPage; fields: NavFields & { title: string } };

function byPath(a: DocPage, b: DocPage): number {
  return a.path < b.path ? -1 : a.path > b.path ? 1 : 0;
}

function compareEntries(a: Entry, b: Entry): number {
  const oa = a.fields.nav_order;
  const ob = b.fields.nav_order;
  if (oa !== undefined && ob !== undefined && oa !== ob) return oa - ob;
  if (oa !== undefined && ob === undefined) return -1;
  if (oa === undefined && ob !== undefined) return 1;
  const ta = a.fields.title.toLowerCase();
  const tb = b.fields.title.toLowerCase();
  if (ta !== tb) return ta < tb ? -1 : 1;
  return byPath(a.page, b.page);
}

export function buildNavigation(pages: DocPage[]): Navigation {
  const entries: Entry[] = [];
  for (const page of pages) {
    const fields = navFields(page);
    if (!fields.title || fields.nav_exclude) continue;
    entries.push({ page, fields: { ...fields, title: fields.title } });
  }

  const byTitle = new Map<string, Entry[]>();
  for (const e of entries) {
    const list = byTitle.get(e.fields.title) ?? [];
    list.push(e);
    byTitle.set(e.fields.title, list);
  }

  const problems: NavProblem[] = [];
  const parentOf = new Map<DocPage, DocPage>();
  const groups = new Map<string, Entry[]>();

  const addToGroup = (key: string, e: Entry) => {
    const list = groups.get(key) ?? [];
    list.push(e);
    groups.set(key, list);
  };

  for (const e of entries) {
    const { parent, grand_parent } = e.fields;
    if (!parent) {
      addToGroup('', e);
      continue;
    }
    const titled = (byTitle.get(parent) ?? []).filter((c) => c.page !== e.page);
    const candidates = grand_parent ? titled.filter((c) => c.fields.parent === grand_parent) : titled;

    if (candidates.length === 1) {
      parentOf.set(e.page, candidates[0].page);
      addToGroup(`page:${candidates[0].page.path}`, e);
      continue;
    }

    addToGroup(`declared:${parent}\u0000${grand_parent ?? ''}`, e);
    if (candidates.length === 0 && titled.length > 0 && grand_parent) {
      problems.push({
        page: e.page,
        kind: 'unresolved',
        field: 'grand_parent',
        message: `No page titled "${parent}" has parent "${grand_parent}"`,
      });
    } else if (candidates.length === 0) {
      problems.push({
        page: e.page,
        kind: 'unresolved',
        field: 'parent',
        message: `No page titled "${parent}"`,
      });
    } else {
      const where = candidates.map((c) => c.page.path).sort().join(', ');
      problems.push({
        page: e.page,
        kind: 'ambiguous',
        field: 'parent',
        message: `Parent "${parent}" matches ${candidates.length} pages (${where}); add grand_parent to disambiguate`,
      });
    }
  }

  const clashes: NavOrderClash[] = [];
  for (const list of groups.values()) {
    const byOrder = new Map<number, DocPage[]>();
    for (const e of list) {
      if (e.fields.nav_order === undefined) continue;
      const same = byOrder.get(e.fields.nav_order) ?? [];
      same.push(e.page);
      byOrder.set(e.fields.nav_order, same);
    }
    for (const [navOrder, same] of byOrder) {
      if (same.length > 1) clashes.push({ navOrder, pages: same.sort(byPath) });
    }
  }
  clashes.sort((a, b) => byPath(a.pages[0], b.pages[0]) || a.navOrder - b.navOrder);

  const childCount = new Map<DocPage, number>();
  const childrenOf = new Map<DocPage, Entry[]>();
  for (const e of entries) {
    const p = parentOf.get(e.page);
    if (!p) continue;
    childCount.set(p, (childCount.get(p) ?? 0) + 1);
    const list = childrenOf.get(p) ?? [];
    list.push(e);
    childrenOf.set(p, list);
  }

  const toNode = (e: Entry): NavNode => ({
    page: e.page,
    title: e.fields.title,
    navOrder: e.fields.nav_order,
    children: (childrenOf.get(e.page) ?? []).sort(compareEntries).map(toNode),
  });
  const roots = (groups.get('') ?? []).sort(compareEntries).map(toNode);

  problems.sort((a, b) => byPath(a.page, b.page));
  return { roots, problems, clashes, parentOf, childCount };
}

export function renderNavigation(roots: NavNode[]): string {
  const lines: string[] = [];
  const visit = (node: NavNode, depth: number) => {
    const order = node.navOrder === undefined ? '' : ` [${node.navOrder}]`;
    lines.push(`${'  '.repeat(depth)}${node.title}${order}  ${node.page.url}`);
    for (const child of node.children) visit(child, depth + 1);
  };
  for (const root of roots) visit(root, 0);
  return lines.join('\n');
}
