import type { Word } from "./types.js";

export interface TriePrefixResult {
  word: Word;
  frequency: number;
}

/**
 * Prefix trie for the word dictionary.
 */
export interface Trie {
  /** Marks `word` as terminal, overwriting any stored frequency. */
  insert(word: Word, frequency: number): void;
  /** Unmarks the terminal node; returns false if `word` was not terminal. */
  unmark(word: Word): boolean;
  has(word: Word): boolean;
  frequencyOf(word: Word): number;

  /** Returns up to `limit` terminal words under `prefix`, in traversal order. */
  collect(prefix: string, limit: number): TriePrefixResult[];
  clear(): void;
}
