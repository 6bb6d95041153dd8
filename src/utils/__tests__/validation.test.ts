import { describe, it, expect } from 'vitest';
import { z } from 'zod';

import { parseOrThrow, validateUrl } from '../validation.js';
import { ConfigurationError } from '../../core/errors.js';

describe('validateUrl', () => {
  it('keeps an http(s) URL as given', () => {
    expect(validateUrl('https://example.com/pricing')).toBe('https://example.com/pricing');
    expect(validateUrl('http://localhost:3000')).toBe('http://localhost:3000');
  });

  it('adds https:// to a bare host and trims', () => {
    expect(validateUrl('  example.com/docs ')).toBe('https://example.com/docs');
  });

  it('rejects an empty address', () => {
    expect(() => validateUrl('   ')).toThrow('URL must be a non-empty string');
  });

  it('rejects non-http schemes', () => {
    expect(() => validateUrl('ftp://example.com')).toThrow(
      'Unsupported URL scheme "ftp:" in ftp://example.com',
    );
  });

  it('rejects unparseable input with a configuration error', () => {
    expect(() => validateUrl('exa mple')).toThrow(ConfigurationError);
    expect(() => validateUrl('exa mple')).toThrow('Invalid URL: exa mple');
  });
});

describe('parseOrThrow', () => {
  const schema = z.object({ count: z.number().int(), name: z.string() });

  it('returns the parsed value', () => {
    expect(parseOrThrow(schema, { count: 2, name: 'x' }, 'thing')).toEqual({ count: 2, name: 'x' });
  });

  it('lists every issue with its path', () => {
    expect(() => parseOrThrow(schema, { count: 'two' }, 'thing')).toThrow(
      'Invalid thing: count: Expected number, received string; name: Required',
    );
  });

  it('labels root-level issues', () => {
    expect(() => parseOrThrow(schema, 'nope', 'thing')).toThrow(
      'Invalid thing: (root): Expected object, received string',
    );
  });
});
