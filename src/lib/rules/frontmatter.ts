import { frontmatterSchema } from '../../content/schema';
import { frontmatterKeyLine } from '../rewrite';
import { navFields } from '../navigation';
import { pageIdFromPath } from '../wafr';
import type { Rule, RuleReport } from './types';

export const frontmatterMissing: Rule = {
  id: 'frontmatter-missing',
  description: 'Every page starts with a front-matter block',
  defaultSeverity: 'error',
  check({ pages }) {
    const out: RuleReport[] = [];
    for (const page of pages) {
      if (page.parsed.kind === 'missing') {
        out.push({ path: page.path, line: 1, column: 1, message: 'Page has no front-matter block' });
      } else if (page.parsed.kind === 'unterminated') {
        out.push({ path: page.path, line: 1, column: 1, message: 'Front-matter block is never closed with "---"' });
      }
    }
    return out;
  },
};

export const frontmatterYaml: Rule = {
  id: 'frontmatter-yaml',
  description: 'Front-matter is a valid YAML mapping',
  defaultSeverity: 'error',
  check({ pages }) {
    const out: RuleReport[] = [];
    for (const page of pages) {
      if (page.parsed.kind !== 'invalid') continue;
      out.push({ path: page.path, line: page.parsed.line, column: 1, message: `Invalid front-matter: ${page.parsed.message}` });
    }
    return out;
  },
};

export const frontmatterSchemaRule: Rule = {
  id: 'frontmatter-schema',
  description: 'Front-matter keys have the expected types',
  defaultSeverity: 'error',
  check({ pages }) {
    const out: RuleReport[] = [];
    for (const page of pages) {
      if (page.parsed.kind !== 'ok') continue;
      const res = frontmatterSchema.safeParse(page.parsed.data);
      if (res.success) continue;
      for (const issue of res.error.issues) {
        const key = issue.path.length ? String(issue.path[0]) : '';
        out.push({
          path: page.path,
          line: key ? frontmatterKeyLine(page, key) : 1,
          column: 1,
          message: `${issue.path.join('.') || 'front-matter'}: ${issue.message}`,
        });
      }
    }
    return out;
  },
};

export const frontmatterRequired: Rule = {
  id: 'frontmatter-required',
  description: 'Required front-matter keys are present',
  defaultSeverity: 'error',
  check({ pages, config }) {
    const out: RuleReport[] = [];
    for (const page of pages) {
      if (page.parsed.kind !== 'ok') continue;
      const data = page.parsed.data;
      for (const key of config.requiredFrontmatter) {
        const v = data[key];
        if (v === undefined || v === null || (typeof v === 'string' && !v.trim())) {
          out.push({ path: page.path, line: 1, column: 1, message: `Missing required front-matter key "${key}"` });
        }
      }
    }
    return out;
  },
};

export const pageIdTitle: Rule = {
  id: 'page-id-title',
  description: 'Pages named after a question or best practice carry that id in their title',
  defaultSeverity: 'warn',
  check({ pages }) {
    const out: RuleReport[] = [];
    for (const page of pages) {
      const id = pageIdFromPath(page.path);
      const title = navFields(page).title;
      if (!id || !title) continue;
      const re = new RegExp(`^${id.id}(?![A-Za-z0-9]|-BP)`);
      if (!re.test(title)) {
        out.push({
          path: page.path,
          line: frontmatterKeyLine(page, 'title'),
          column: 1,
          message: `Title "${title}" does not start with ${id.id}`,
        });
      }
    }
    return out;
  },
};
