import { describe, it, expect } from 'vitest';
import { findDuplicateSections, jaccard, wordSet } from '../../src/lib/similarity';

describe('similarity', () => {
  it('splits text into lowercase words of at least three characters', () => {
    expect([...wordSet('The AWS IAM roles, a b')]).toEqual(['the', 'aws', 'iam', 'roles']);
  });

  it('computes Jaccard similarity', () => {
    expect(jaccard(wordSet('alpha beta gamma'), wordSet('alpha beta delta'))).toBe(0.5);
    expect(jaccard(new Set(), new Set())).toBe(0);
  });

  it('pairs same-named sections above the threshold', () => {
    const sections = [
      { heading: 'Setup', line: 1, text: 'alpha beta gamma' },
      { heading: 'Other', line: 3, text: 'alpha beta gamma' },
      { heading: 'setup', line: 5, text: 'alpha beta delta' },
      { heading: 'Setup', line: 7, text: 'x' },
      { heading: 'Setup', line: 9, text: 'x' },
    ];
    const pairs = findDuplicateSections(sections, 0.5);
    expect(pairs.map((p) => [p.first.line, p.second.line, p.similarity])).toEqual([
      [1, 5, 0.5],
      [7, 9, 1],
    ]);
  });
});
