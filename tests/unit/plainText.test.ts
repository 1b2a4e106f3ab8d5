import { describe, it, expect } from 'vitest';
import { plainText, sanitize } from '../../src/lib/plainText';

describe('plainText', () => {
  it('strips markup and keeps link text', () => {
    const body = '# Title\n\nSee [the docs](./x.html) and <b>bold</b> &amp; **strong**.\n```\ncode\n```\n{% include note.html %}';
    expect(plainText(body)).toBe('Title See the docs and bold & strong.');
  });

  it('cuts at a word boundary', () => {
    expect(plainText('one two three', 9)).toBe('one two');
  });
});

describe('sanitize', () => {
  it('collapses whitespace and control characters', () => {
    expect(sanitize('  a\tb\r\nc\u0007d  ')).toBe('a b c d');
    expect(sanitize(undefined)).toBe('');
  });
});
