import { extractHeadings, scanLines, splitSections } from '../markdown';
import { findDuplicateSections } from '../similarity';
import type { Rule, RuleReport } from './types';

export const headingHierarchy: Rule = {
  id: 'heading-hierarchy',
  description: 'Headings never skip a level; the first heading sets the baseline',
  defaultSeverity: 'error',
  check({ pages, config }) {
    const out: RuleReport[] = [];
    for (const page of pages) {
      const headings = extractHeadings(scanLines(page.body, page.bodyLine), {
        includeHtml: config.headings.includeHtml,
      });
      for (let i = 1; i < headings.length; i++) {
        const prev = headings[i - 1];
        const h = headings[i];
        if (h.level > prev.level + 1) {
          out.push({
            path: page.path,
            line: h.line,
            column: 1,
            message: `Heading level ${h.level} ("${h.text}") skips a level after level ${prev.level} ("${prev.text}")`,
          });
        }
      }
    }
    return out;
  },
};

export const duplicateSection: Rule = {
  id: 'duplicate-section',
  description: 'A page does not repeat a section under the same heading',
  defaultSeverity: 'warn',
  check({ pages, config }) {
    const out: RuleReport[] = [];
    for (const page of pages) {
      const pairs = findDuplicateSections(splitSections(page.body, page.bodyLine), config.duplicateSectionThreshold);
      for (const { first, second, similarity } of pairs) {
        out.push({
          path: page.path,
          line: second.line,
          column: 1,
          message: `Section "${second.heading}" repeats the section at line ${first.line} (${Math.round(similarity * 100)}% similar)`,
        });
      }
    }
    return out;
  },
};
