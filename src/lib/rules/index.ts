import { asciiPunctuation, templatePlaceholder } from './content';
import {
  frontmatterMissing,
  frontmatterRequired,
  frontmatterSchemaRule,
  frontmatterYaml,
  pageIdTitle,
} from './frontmatter';
import { extensionlessLink, internalLink, relativeLinkPrefix } from './links';
import { duplicateNavOrder, duplicatePermalink, navHasChildren, navParent } from './navigation';
import { duplicateSection, headingHierarchy } from './structure';
import type { Rule } from './types';

export type { Rule, RuleContext, RuleReport } from './types';

export const RULES: Rule[] = [
  frontmatterMissing,
  frontmatterYaml,
  frontmatterSchemaRule,
  frontmatterRequired,
  internalLink,
  headingHierarchy,
  duplicateNavOrder,
  navParent,
  navHasChildren,
  duplicatePermalink,
  pageIdTitle,
  duplicateSection,
  templatePlaceholder,
  relativeLinkPrefix,
  extensionlessLink,
  asciiPunctuation,
];

export const RULE_IDS: string[] = RULES.map((r) => r.id);
