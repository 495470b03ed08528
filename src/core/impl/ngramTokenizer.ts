import type { Token } from "../types.js";
import type { Tokenizer } from "../tokenizer.js";

/** Width used for both indexing and querying. */
export const DEFAULT_GRAM_WIDTH = 2;

/**
 * Sliding-window character n-gram tokenizer.
 *
 * Windows are taken over code points, so a surrogate pair is one character
 * and is never cut in half. "東京都" with width 2 yields "東京", "京都".
 */
export class NGramTokenizer implements Tokenizer {
  readonly width: number;

  constructor(width: number = DEFAULT_GRAM_WIDTH) {
    if (!Number.isInteger(width) || width < 1) {
      throw new RangeError(`n-gram width must be a positive integer, got ${width}`);
    }
    this.width = width;
  }

  *tokenize(text: string): Iterable<Token> {
    const chars = Array.from(text);
    const last = chars.length - this.width;

    for (let i = 0; i <= last; i++) {
      yield chars.slice(i, i + this.width).join("");
    }
  }
}

/** All n-grams of `text`, left to right. Empty when `text` has fewer than `n` characters. */
export function ngrams(text: string, n: number): Token[] {
  return Array.from(new NGramTokenizer(n).tokenize(text));
}
