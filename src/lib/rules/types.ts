import type { ResolvedConfig } from '../../config';
import type { RuleSetting } from '../../types/diagnostic';
import type { DocPage } from '../../types/page';
import type { Corpus } from '../corpus';
import type { Navigation } from '../navigation';

export type RuleContext = {
  corpus: Corpus;
  pages: DocPage[]; // pages being linted; cross-page rules report only on these
  config: ResolvedConfig;
  navigation: Navigation;
};

export type RuleReport = {
  path: string;
  line: number;
  column: number;
  message: string;
};

export interface Rule {
  id: string;
  description: string;
  defaultSeverity: RuleSetting;
  check(ctx: RuleContext): RuleReport[];
  /** Rewrite a page's raw text; returns the input unchanged when nothing applies. */
  fix?(page: DocPage, ctx: RuleContext): string;
}
