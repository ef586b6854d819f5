import { describe, it, expect } from 'vitest';
import { canonicalizeUrl, computeBookKey } from '../src/fingerprint.js';

describe('computeBookKey', () => {
  it('uses the UPC when present', () => {
    expect(computeBookKey('Any Title', 'Any Author', ' A897FE39B1053632 ')).toBe('upc:a897fe39b1053632');
  });

  it('falls back to a title/author hash', () => {
    expect(computeBookKey('Quiet Orchard', 'Lee Park')).toMatch(/^book:[a-f0-9]{64}$/);
  });

  it('is case- and whitespace-insensitive without a UPC', () => {
    const a = computeBookKey('Quiet  Orchard', 'Lee Park', null);
    const b = computeBookKey('quiet orchard ', 'LEE PARK');
    expect(a).toBe(b);
  });

  it('treats a blank UPC as absent', () => {
    expect(computeBookKey('Quiet Orchard', 'Lee Park', '   ')).toBe(computeBookKey('Quiet Orchard', 'Lee Park'));
  });

  it('distinguishes different books', () => {
    expect(computeBookKey('Quiet Orchard', 'Lee Park')).not.toBe(computeBookKey('Quiet Orchard', 'Kim Park'));
  });
});

describe('canonicalizeUrl', () => {
  it('drops the fragment', () => {
    expect(canonicalizeUrl('https://books.example.test/a/index.html#reviews')).toBe(
      'https://books.example.test/a/index.html',
    );
  });

  it('returns undefined for non-URLs', () => {
    expect(canonicalizeUrl('not a url')).toBeUndefined();
  });
});
