import type { LintResult } from '../types/diagnostic';

function plural(n: number, word: string): string {
  return `${n} ${word}${n === 1 ? '' : 's'}`;
}

/**
 * Human-readable report: one block per file, then a summary line.
 *
 *   docs/security/SEC01.md
 *     12:5  error  Link target "./SEC01-BP09.html" does not resolve (...)  internal-link
 */
export function formatText(result: LintResult): string {
  if (!result.diagnostics.length) return 'No problems found.';
  const lines: string[] = [];
  let current = '';
  for (const d of result.diagnostics) {
    if (d.path !== current) {
      if (current) lines.push('');
      lines.push(d.path);
      current = d.path;
    }
    const fix = d.fixable ? ' (fixable)' : '';
    lines.push(`  ${d.line}:${d.column}  ${d.severity}  ${d.message}${fix}  ${d.ruleId}`);
  }
  const total = result.errorCount + result.warningCount;
  lines.push('');
  lines.push(
    `${plural(total, 'problem')} (${plural(result.errorCount, 'error')}, ${plural(result.warningCount, 'warning')})`,
  );
  return lines.join('\n');
}

export function formatJson(result: LintResult): string {
  return JSON.stringify(result.diagnostics, null, 2);
}
