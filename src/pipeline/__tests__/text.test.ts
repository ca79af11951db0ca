/**
 * Tests for truncateText and truncateUtf8
 */

import { describe, it, expect } from 'vitest';
import { truncateText, truncateUtf8 } from '../text.js';

describe('truncateText', () => {
  it('returns text unchanged when within the limit', () => {
    expect(truncateText('hello', 10)).toBe('hello');
    expect(truncateText('hello', 5)).toBe('hello');
  });

  it('cuts to the limit', () => {
    expect(truncateText('hello world', 5)).toBe('hello');
  });

  it('returns empty string for a non-positive limit', () => {
    expect(truncateText('hello', 0)).toBe('');
    expect(truncateText('hello', -3)).toBe('');
  });

  it('does not split a surrogate pair at the cut', () => {
    const text = 'ab\u{1F600}cd'; // a, b, high, low, c, d
    expect(text.length).toBe(6);

    expect(truncateText(text, 3)).toBe('ab');
    expect(truncateText(text, 4)).toBe('ab\u{1F600}');
  });

  it('drops a lone leading emoji when the limit is one code unit', () => {
    expect(truncateText('\u{1F600}x', 1)).toBe('');
  });

  it('never exceeds the limit', () => {
    const text = '\u{1F4C4}'.repeat(50);
    for (const limit of [1, 2, 7, 33, 99]) {
      const result = truncateText(text, limit);
      expect(result.length).toBeLessThanOrEqual(limit);
      expect(result.length % 2).toBe(0);
    }
  });
});

describe('truncateUtf8', () => {
  it('returns text unchanged when it fits', () => {
    expect(truncateUtf8('claim.pdf', 9)).toBe('claim.pdf');
  });

  it('counts multi-byte characters by their encoded size', () => {
    expect(truncateUtf8('déjà vu', 3)).toBe('dé');
    expect(truncateUtf8('déjà vu', 4)).toBe('déj');
  });

  it('never splits a character', () => {
    expect(truncateUtf8('ab\u{1F600}c', 5)).toBe('ab');
    expect(truncateUtf8('ab\u{1F600}c', 6)).toBe('ab\u{1F600}');
  });

  it('returns empty string for a non-positive budget', () => {
    expect(truncateUtf8('abc', 0)).toBe('');
  });
});
