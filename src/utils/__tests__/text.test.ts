import { describe, it, expect } from 'vitest';

import { cleanText, extractJSON, truncateWithEllipsis } from '../text.js';

describe('cleanText', () => {
  it('collapses whitespace and trims', () => {
    expect(cleanText('  Hello\n\n\tworld   again ')).toBe('Hello world again');
  });

  it('truncates to the maximum length', () => {
    expect(cleanText('abcdef ghij', 4)).toBe('abcd');
  });

  it('leaves short text alone', () => {
    expect(cleanText('short', 100)).toBe('short');
  });

  it('returns an empty string for empty input', () => {
    expect(cleanText('')).toBe('');
    expect(cleanText(' \n ')).toBe('');
  });
});

describe('truncateWithEllipsis', () => {
  it('adds an ellipsis past the limit', () => {
    expect(truncateWithEllipsis('abcdefghij', 8)).toBe('abcde...');
  });

  it('returns text within the limit unchanged', () => {
    expect(truncateWithEllipsis('abc', 8)).toBe('abc');
  });
});

describe('extractJSON', () => {
  it('prefers a fenced block', () => {
    expect(extractJSON('Sure!\n```json\n[1, 2]\n```\nAnything else?')).toBe('[1, 2]');
  });

  it('accepts a fence without a language tag', () => {
    expect(extractJSON('```\n{"a": 1}\n```')).toBe('{"a": 1}');
  });

  it('takes the outermost array span', () => {
    expect(extractJSON('Result: [{"a": [1]}] (end)')).toBe('[{"a": [1]}]');
  });

  it('takes an object when it opens before any array', () => {
    expect(extractJSON('{"items": [1]}')).toBe('{"items": [1]}');
  });

  it('returns trimmed input when there is no JSON span', () => {
    expect(extractJSON('  nothing here  ')).toBe('nothing here');
  });
});
