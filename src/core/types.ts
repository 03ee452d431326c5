/** Shared core types used by module contracts. */

export type Word = string;

/** A word produced by a tokenizer. */
export interface Token {
  term: Word;
  /** 0-based position within the source text (token index, not byte offset). */
  position: number;
  /** Character offsets into the source text. */
  startOffset: number;
  endOffset: number;
  /** 1-based line and column of `startOffset`. */
  line: number;
  column: number;
}

export interface WordEntry {
  word: Word;
  frequency: number;
}

export interface IndexStats {
  wordCount: number;
  /** UTF-8 bytes held by the word set, frequency map and phonetic buckets (trie excluded). */
  memoryBytes: number;
}

export interface ScoredCandidate {
  word: Word;
  score: number;
}

export interface Misspelling {
  word: Word;
  position: number;
  offset: number;
  line: number;
  column: number;
  suggestions: Word[];
}
