import { describe, it, expect } from 'vitest';
import { formatJson, formatText } from '../../src/lib/report';
import type { Diagnostic, LintResult } from '../../src/types/diagnostic';

const diagnostics: Diagnostic[] = [
  {
    ruleId: 'internal-link',
    severity: 'error',
    path: 'docs/security/SEC01.md',
    line: 12,
    column: 5,
    message: 'Link target "./SEC01-BP09.html" does not resolve (/docs/security/SEC01-BP09.html)',
    fixable: false,
  },
  {
    ruleId: 'extensionless-link',
    severity: 'warn',
    path: 'docs/security/SEC01.md',
    line: 14,
    column: 3,
    message: 'Link "./SEC02" should be written "./SEC02.html"',
    fixable: true,
  },
  {
    ruleId: 'frontmatter-missing',
    severity: 'error',
    path: 'notes.md',
    line: 1,
    column: 1,
    message: 'Page has no front-matter block',
    fixable: false,
  },
];

describe('formatText', () => {
  it('groups problems by file and summarizes', () => {
    const result: LintResult = { diagnostics, fileCount: 2, errorCount: 2, warningCount: 1 };
    expect(formatText(result)).toBe(
      [
        'docs/security/SEC01.md',
        '  12:5  error  Link target "./SEC01-BP09.html" does not resolve (/docs/security/SEC01-BP09.html)  internal-link',
        '  14:3  warn  Link "./SEC02" should be written "./SEC02.html" (fixable)  extensionless-link',
        '',
        'notes.md',
        '  1:1  error  Page has no front-matter block  frontmatter-missing',
        '',
        '3 problems (2 errors, 1 warning)',
      ].join('\n'),
    );
  });

  it('says so when there is nothing to report', () => {
    expect(formatText({ diagnostics: [], fileCount: 3, errorCount: 0, warningCount: 0 })).toBe('No problems found.');
  });
});

describe('formatJson', () => {
  it('prints the diagnostics array', () => {
    const result: LintResult = { diagnostics: diagnostics.slice(2), fileCount: 1, errorCount: 1, warningCount: 0 };
    expect(JSON.parse(formatJson(result))).toEqual([diagnostics[2]]);
  });
});
