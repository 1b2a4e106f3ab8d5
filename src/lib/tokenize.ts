/**
 * Term folding used on both sides of the search index, so that "SEC01-BP04",
 * "sec01 bp04" and "sec01bp04" all land on shared tokens.
 */

const COMBINING_MARKS = /[\u0300-\u036f]/g;
const UNICODE_DASHES = /[\u2012-\u2015\u2212]/g;
// "/" and "-" survive cleaning; they join compound ids and acronyms
const PUNCTUATION = /[!"#$%&'()*+,.:;<=>?@[\\\]^_`{|}~]/g;
const COMPOUND_SEPARATORS = ['/', '-'] as const;

/** Spellings the pages use interchangeably, folded onto one index term. */
const CANONICAL_TERMS: ReadonlyArray<{ pattern: RegExp; term: string }> = [
  { pattern: /^(denial of service|d?dos)$/, term: 'dos' },
  { pattern: /^(multi ?factor|2fa)$/, term: 'mfa' },
  { pattern: /^best ?practices?$/, term: 'bp' },
];

export function basicClean(s: string): string {
  return s
    .normalize('NFKD')
    .replace(COMBINING_MARKS, '')
    .toLowerCase()
    .replace(UNICODE_DASHES, '-')
    .replace(PUNCTUATION, ' ')
    .replace(/\s+/g, ' ')
    .trim();
}

// "sec01-bp04" yields itself, its parts and the parts run together
function variantsOf(word: string): string[] {
  const variants = new Set<string>([word]);
  for (const sep of COMPOUND_SEPARATORS) {
    if (!word.includes(sep)) continue;
    const parts = word.split(sep).filter(Boolean);
    parts.forEach((part) => variants.add(part));
    variants.add(parts.join(''));
  }
  const spaced = word.replace(/-/g, ' ');
  for (const { pattern, term } of CANONICAL_TERMS) {
    if (pattern.test(spaced)) variants.add(term);
  }
  return Array.from(variants);
}

export function normalizeTokens(input: string): string[] {
  const tokens = new Set<string>();
  for (const word of basicClean(input).split(' ')) {
    if (word) variantsOf(word).forEach((v) => tokens.add(v));
  }
  return Array.from(tokens);
}

export function normalizePhrases(phrases: ReadonlyArray<string | undefined>): string[] {
  return Array.from(new Set(phrases.flatMap((p) => (p ? normalizeTokens(p) : []))));
}
