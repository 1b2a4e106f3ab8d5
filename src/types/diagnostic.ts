export type Severity = 'error' | 'warn';
export type RuleSetting = Severity | 'off';

export interface Diagnostic {
  ruleId: string;
  severity: Severity;
  path: string;
  line: number;
  column: number;
  message: string;
  fixable: boolean;
}

export interface LintResult {
  diagnostics: Diagnostic[];
  fileCount: number;
  errorCount: number;
  warningCount: number;
}
