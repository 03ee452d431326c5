import type { Token } from "../types.js";
import type { TokenizeOptions, Tokenizer } from "../tokenizer.js";

const URL_PATTERN = /^(?:https?:\/\/\S+|www\.\S+|[a-zA-Z0-9][a-zA-Z0-9-]*\.[a-z]{2,}(?:\/\S*)?)$/;
const EMAIL = /^[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}$/;
const NUMBER = /^[+-]?\d+(?:[.,]\d+)*$/;
const WORD = /[A-Za-z]+(?:'[A-Za-z]+)?/g;
const EDGE_PUNCTUATION = /^[("'[{<]+|[)"'\]}>.,;:!?]+$/g;

const DEFAULTS: Required<TokenizeOptions> = {
  normalizeCase: true,
  ignoreUrls: true,
  ignoreEmails: true,
  ignoreNumbers: true,
  minWordLength: 3,
};

function isSpace(code: number): boolean {
  return code === 32 || code === 9 || code === 10 || code === 13 || code === 12 || code === 11;
}

/**
 * Whitespace-chunked tokenizer:
 * - a chunk that is a URL / e-mail / number is skipped whole
 * - otherwise yields each ASCII word in the chunk (one inner apostrophe allowed)
 * - drops words shorter than `minWordLength`
 * - tracks 1-based line and column
 */
export class TextTokenizer implements Tokenizer {
  private readonly defaults: Required<TokenizeOptions>;

  constructor(defaults: TokenizeOptions = {}) {
    this.defaults = { ...DEFAULTS, ...defaults };
  }

  *tokenize(text: string, options?: TokenizeOptions): Iterable<Token> {
    const opts = { ...this.defaults, ...options };
    const n = text.length;
    let i = 0;
    let position = 0;
    let line = 1;
    let lineStart = 0;

    while (i < n) {
      // skip separators, counting newlines
      while (i < n && isSpace(text.charCodeAt(i))) {
        if (text.charCodeAt(i) === 10) {
          line++;
          lineStart = i + 1;
        }
        i++;
      }
      if (i >= n) break;

      const start = i;
      while (i < n && !isSpace(text.charCodeAt(i))) i++;
      const chunk = text.slice(start, i);
      if (this.isSkippedChunk(chunk, opts)) continue;

      for (const m of chunk.matchAll(WORD)) {
        const raw = m[0];
        if (raw.length < opts.minWordLength) continue;

        const startOffset = start + (m.index ?? 0);
        yield {
          term: opts.normalizeCase ? raw.toLowerCase() : raw,
          position: position++,
          startOffset,
          endOffset: startOffset + raw.length,
          line,
          column: startOffset - lineStart + 1,
        };
      }
    }
  }

  isIgnored(word: string, options?: TokenizeOptions): boolean {
    const opts = { ...this.defaults, ...options };
    const trimmed = word.trim();
    if (this.isSkippedChunk(trimmed, opts)) return true;

    const bare = trimmed.replace(EDGE_PUNCTUATION, "");
    return bare.length < opts.minWordLength || /\d/.test(bare);
  }

  private isSkippedChunk(chunk: string, opts: Required<TokenizeOptions>): boolean {
    const bare = chunk.replace(EDGE_PUNCTUATION, "");
    if (!bare.length) return true;
    if (opts.ignoreEmails && EMAIL.test(bare)) return true;
    if (opts.ignoreUrls && URL_PATTERN.test(bare)) return true;
    if (opts.ignoreNumbers && NUMBER.test(bare)) return true;
    return false;
  }
}
