/**
 * Suffix tokens that keep redundantly created resources apart.
 *
 * Three hex characters give 4096 combinations: enough to guess a free
 * name in one or two tries for the handful of unique resources a group
 * usually holds, while keeping names short. Nothing here guarantees
 * uniqueness; callers retry when the provider reports a conflict.
 */

import { customAlphabet } from 'nanoid';
import type { NamingOptions, SuffixGenerator } from './types.js';

/**
 * Uniform random tokens over a fixed alphabet.
 * Each instance binds its own generator, so instances never share state.
 *
 * @example
 * const suffixes = new RandomSuffixGenerator({ suffixLength: 3, suffixAlphabet: '0123456789abcdef' });
 * suffixes.next() // 'f3e'
 */
export class RandomSuffixGenerator implements SuffixGenerator {
  private readonly generate: () => string;

  constructor(options: Pick<NamingOptions, 'suffixLength' | 'suffixAlphabet'>) {
    this.generate = customAlphabet(options.suffixAlphabet, options.suffixLength);
  }

  next(): string {
    return this.generate();
  }
}

/**
 * Replays a fixed list of tokens in order, wrapping around at the end
 */
export class SequenceSuffixGenerator implements SuffixGenerator {
  private index = 0;

  constructor(private readonly tokens: readonly string[]) {
    if (tokens.length === 0) {
      throw new Error('SequenceSuffixGenerator needs at least one token');
    }
  }

  next(): string {
    const token = this.tokens[this.index % this.tokens.length];
    this.index++;
    return token;
  }
}
