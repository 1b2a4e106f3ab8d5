import { stringify } from 'yaml';
import type { Pillar, Practice, Question } from '../content/schema';

/**
 * Page templates for scaffolding. Scaffolded pages carry placeholder copy that the
 * template-placeholder rule keeps flagging until an author replaces it.
 */

export const PLACEHOLDER_PATTERNS: RegExp[] = [
  /\bDescription of (?:the )?(?:first|second|third|fourth|fifth|how this service)\b/i,
  /\bAWS Service \d+\b/,
  /\bRelated Documentation Link \d+\b/,
  /<h4>Best Practice \d+<\/h4>/,
];

function frontmatter(data: Record<string, string | number | boolean>): string {
  return `---\n${stringify(data)}---\n`;
}

export function questionUrl(id: string): string {
  // "SEC01" -> "sec-01"
  const m = /^([A-Z]+)(\d{2})$/.exec(id);
  return m
    ? `https://docs.aws.amazon.com/wellarchitected/latest/framework/${m[1].toLowerCase()}-${m[2]}.html`
    : 'https://docs.aws.amazon.com/wellarchitected/latest/framework/welcome.html';
}

export function pillarUrl(pillar: Pillar): string {
  return `https://docs.aws.amazon.com/wellarchitected/latest/${pillar.slug}-pillar/welcome.html`;
}

export function questionTitle(question: Question): string {
  return `${question.id} - ${question.title}`;
}

export function renderQuestionPage(pillar: Pillar, question: Question, navOrder: number): string {
  const head = frontmatter({
    title: questionTitle(question),
    layout: 'default',
    parent: pillar.title,
    nav_order: navOrder,
    has_children: true,
  });
  const services = [1, 2, 3]
    .map(
      (n) => `<div class="aws-service">
  <div class="aws-service-content">
    <h4>AWS Service ${n}</h4>
    <p>Description of how this service helps with this question.</p>
  </div>
</div>`,
    )
    .join('\n\n');
  const practices = ['first', 'second', 'third']
    .map(
      (ord, i) => `<div class="best-practice">
  <h4>Best Practice ${i + 1}</h4>
  <p>Description of the ${ord} best practice for this question.</p>
</div>`,
    )
    .join('\n\n');

  return `${head}
<div class="pillar-header">
  <h1>${question.id}: ${question.title}</h1>
  <p>This page contains guidance for addressing this question from the AWS Well-Architected Framework.</p>
</div>

## Best Practices

${practices}

## AWS Services to Consider

${services}

## Related Resources

- [AWS Well-Architected Framework - ${pillar.title} Pillar](${pillarUrl(pillar)})
- [${question.id}: ${question.title}](${questionUrl(question.id)})
`;
}

export function renderPracticePage(
  pillar: Pillar,
  question: Question,
  practice: Practice,
  navOrder: number,
): string {
  const head = frontmatter({
    title: `${practice.id} - ${practice.title}`,
    layout: 'default',
    parent: questionTitle(question),
    grand_parent: pillar.title,
    nav_order: navOrder,
  });
  const steps = ['first', 'second', 'third', 'fourth']
    .map((ord, i) => `${i + 1}. **Step ${i + 1}**: Description of the ${ord} implementation step.`)
    .join('\n\n');
  const services = [1, 2, 3]
    .map(
      (n) => `<div class="aws-service">
  <div class="aws-service-content">
    <h4>AWS Service ${n}</h4>
    <p>Description of how this service helps with this best practice.</p>
  </div>
</div>`,
    )
    .join('\n\n');

  return `${head}
<div class="pillar-header">
  <h1>${practice.id}: ${practice.title}</h1>
  <p>${practice.description}</p>
</div>

## Implementation guidance

### Key steps for implementing this best practice

${steps}

## AWS services to consider

${services}

## Related Resources

- [AWS Well-Architected Framework - ${pillar.title} Pillar](${pillarUrl(pillar)})
- [${question.id}: ${question.title}](${questionUrl(question.id)})
`;
}

export type QuestionCard = {
  id: string;
  title: string;
  href: string;
};

export function renderQuestionCards(cards: QuestionCard[]): string {
  const items = cards
    .map(
      (c) => `  <div class="question-card">
    <h3>${c.title}</h3>
    <a href="${c.href}">View details →</a>
  </div>`,
    )
    .join('\n');
  return `## Questions

The AWS Well-Architected Framework provides a set of questions that allows you to review an existing or proposed architecture. It also provides a set of AWS best practices for each pillar.

<div class="question-cards">
${items}
</div>`;
}
