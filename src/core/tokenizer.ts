import type { Token } from "./types.js";

/**
 * Turns text into a stream of tokens.
 *
 * Contract notes:
 * - must be deterministic for a given input; no state is retained between calls
 * - total over strings: text too short to produce a token yields nothing
 */
export interface Tokenizer {
  /** Characters per token. */
  readonly width: number;
  tokenize(text: string): Iterable<Token>;
}
