import { describe, it, expect } from 'vitest';
import { parseEndpoints } from '../../src/pipeline/endpoints.js';

const FALLBACK = ['https://a.test', 'https://b.test'];

describe('parseEndpoints', () => {
  it('should fall back to the configured list when nothing is given', () => {
    const parsed = parseEndpoints(undefined, FALLBACK);
    expect(parsed).toEqual({ ok: true, endpoints: FALLBACK });
    if (parsed.ok) expect(parsed.endpoints).not.toBe(FALLBACK);
  });

  it('should accept an explicit list and trim entries', () => {
    expect(parseEndpoints(['  https://c.test '], FALLBACK)).toEqual({
      ok: true,
      endpoints: ['https://c.test'],
    });
  });

  it('should accept an explicit empty list', () => {
    expect(parseEndpoints([], FALLBACK)).toEqual({ ok: true, endpoints: [] });
  });

  it('should reject a non-list', () => {
    expect(parseEndpoints('https://c.test', FALLBACK)).toEqual({
      ok: false,
      error: 'mirrors must be a list',
    });
  });

  it('should reject blank entries', () => {
    expect(parseEndpoints(['https://c.test', '   '], FALLBACK)).toEqual({
      ok: false,
      error: 'mirror URL must not be empty',
    });
  });
});
