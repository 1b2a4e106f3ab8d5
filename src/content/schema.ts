import { z } from 'zod';

export const frontmatterSchema = z
  .object({
    title: z.string(),
    layout: z.string(),
    parent: z.string(), // title of the parent page
    grand_parent: z.string(), // title of the parent's parent
    nav_order: z.number().finite(),
    has_children: z.boolean(),
    nav_exclude: z.boolean(),
    permalink: z.string().startsWith('/', { message: 'permalink must start with "/"' }),
    description: z.string(),
    last_modified_at: z.union([z.string(), z.date()]),
  })
  .partial()
  .passthrough()
  .superRefine((fm, ctx) => {
    if (fm.grand_parent !== undefined && fm.parent === undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['grand_parent'],
        message: 'grand_parent requires parent',
      });
    }
  });

export type Frontmatter = z.infer<typeof frontmatterSchema>;

const QUESTION_ID = /^[A-Z]+\d{2}$/;
const PRACTICE_ID = /^[A-Z]+\d{2}-BP\d{2}$/;

export const questionSchema = z.object({
  id: z.string().regex(QUESTION_ID, 'question id must look like SEC01'),
  title: z.string().min(1),
});

export const pillarSchema = z
  .object({
    slug: z.string().regex(/^[a-z0-9-]+$/),
    title: z.string().min(1),
    prefix: z.string().regex(/^[A-Z]+$/),
    navOrder: z.number().int(),
    questions: z.array(questionSchema),
  })
  .superRefine((pillar, ctx) => {
    pillar.questions.forEach((q, i) => {
      if (!q.id.startsWith(pillar.prefix) || !/^\d{2}$/.test(q.id.slice(pillar.prefix.length))) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['questions', i, 'id'],
          message: `question ${q.id} does not belong to prefix ${pillar.prefix}`,
        });
      }
    });
  });

export const catalogSchema = z.object({
  pillars: z.array(pillarSchema).min(1),
});

export type Question = z.infer<typeof questionSchema>;
export type Pillar = z.infer<typeof pillarSchema>;
export type Catalog = z.infer<typeof catalogSchema>;

export const practiceSchema = z.object({
  id: z.string().regex(PRACTICE_ID, 'practice id must look like SEC01-BP01'),
  title: z.string().min(1),
  description: z.string().min(1),
  nav_order: z.number().int().positive().optional(),
});

export const practicesFileSchema = z.array(practiceSchema).min(1);

export type Practice = z.infer<typeof practiceSchema>;
