import type { Token } from "./types.js";

export interface TokenizeOptions {
  /** If true, lowercase every term. */
  normalizeCase?: boolean;
  /** Skip whitespace-delimited chunks that look like URLs. */
  ignoreUrls?: boolean;
  /** Skip whitespace-delimited chunks that look like e-mail addresses. */
  ignoreEmails?: boolean;
  /** Skip whitespace-delimited chunks that are decimal numbers. */
  ignoreNumbers?: boolean;
  /** Words shorter than this are not yielded. */
  minWordLength?: number;
}

/**
 * Turns text into a stream of word tokens.
 *
 * Contract notes:
 * - should be deterministic for given input+options
 * - URL / e-mail / number filtering happens here, never in the index
 */
export interface Tokenizer {
  tokenize(text: string, options?: TokenizeOptions): Iterable<Token>;
  /** True when a lone word would be dropped by `tokenize` with the same options. */
  isIgnored(word: string, options?: TokenizeOptions): boolean;
}
