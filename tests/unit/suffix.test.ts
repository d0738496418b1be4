import { describe, expect, test } from 'vitest';
import { RandomSuffixGenerator, SequenceSuffixGenerator } from '../../src/naming/suffix.js';

describe('RandomSuffixGenerator', () => {
  test('draws hex tokens of the configured length', () => {
    const suffixes = new RandomSuffixGenerator({ suffixLength: 3, suffixAlphabet: '0123456789abcdef' });

    for (let i = 0; i < 200; i++) {
      expect(suffixes.next()).toMatch(/^[0-9a-f]{3}$/);
    }
  });

  test('honours a custom alphabet', () => {
    const suffixes = new RandomSuffixGenerator({ suffixLength: 5, suffixAlphabet: 'xy' });

    for (let i = 0; i < 50; i++) {
      expect(suffixes.next()).toMatch(/^[xy]{5}$/);
    }
  });

  test('spreads over the token space', () => {
    const suffixes = new RandomSuffixGenerator({ suffixLength: 3, suffixAlphabet: '0123456789abcdef' });
    const seen = new Set<string>();

    for (let i = 0; i < 2000; i++) {
      seen.add(suffixes.next());
    }

    expect(seen.size).toBeGreaterThan(1400);
  });
});

describe('SequenceSuffixGenerator', () => {
  test('replays tokens and wraps around', () => {
    const suffixes = new SequenceSuffixGenerator(['f3e', 'e64']);

    expect([suffixes.next(), suffixes.next(), suffixes.next()]).toEqual(['f3e', 'e64', 'f3e']);
  });

  test('throws without tokens', () => {
    expect(() => new SequenceSuffixGenerator([])).toThrow(
      'SequenceSuffixGenerator needs at least one token',
    );
  });
});
