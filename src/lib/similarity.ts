import { MIN_TOKEN_LENGTH } from './constants';
import type { Section } from './markdown';

/** Lowercase alphanumeric words of at least MIN_TOKEN_LENGTH characters. */
export function wordSet(s: string): Set<string> {
  const words = s.toLowerCase().match(/[a-z0-9]+/g) ?? [];
  return new Set(words.filter((w) => w.length >= MIN_TOKEN_LENGTH));
}

// Two empty sets score 0.
export function jaccard(a: ReadonlySet<string>, b: ReadonlySet<string>): number {
  let shared = 0;
  a.forEach((w) => {
    if (b.has(w)) shared++;
  });
  const union = a.size + b.size - shared;
  return union === 0 ? 0 : shared / union;
}

export type DuplicatePair = {
  first: Section;
  second: Section;
  similarity: number;
};

/**
 * Pairs of sections sharing a heading whose bodies are at least `threshold` similar.
 * Identical text counts as 1 even when it has no tokens.
 */
export function findDuplicateSections(sections: Section[], threshold: number): DuplicatePair[] {
  const sets = sections.map((s) => wordSet(s.text));
  const out: DuplicatePair[] = [];
  const reported = new Set<number>();
  for (let j = 1; j < sections.length; j++) {
    for (let i = 0; i < j; i++) {
      if (reported.has(j)) break;
      const a = sections[i];
      const b = sections[j];
      if (a.heading.toLowerCase() !== b.heading.toLowerCase()) continue;
      const s = a.text === b.text ? 1 : jaccard(sets[i], sets[j]);
      if (s >= threshold) {
        out.push({ first: a, second: b, similarity: s });
        reported.add(j);
      }
    }
  }
  return out;
}
