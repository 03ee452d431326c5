import type { IndexStats, Word } from "./types.js";

/**
 * Query side of the dictionary. This is the handle a suggestion engine borrows;
 * it never owns or mutates the index behind it.
 *
 * Contract notes:
 * - every lookup lowercases its input, except `phoneticMatches` whose code keeps
 *   the first letter of the word as supplied (callers normalize first)
 * - queries never throw; absent input gives empty / zero results
 */
export interface ReadonlyWordIndex {
  contains(word: Word): boolean;
  frequency(word: Word): number;
  /** Terminal words under `prefix`, at most `maxResults`, most frequent first. */
  wordsWithPrefix(prefix: string, maxResults: number): Word[];
  phoneticMatches(word: Word): Word[];
  allWords(): Set<Word>;
  wordCount(): number;
  stats(): IndexStats;
}

/**
 * Mutable dictionary: trie + word set + frequency table + phonetic buckets.
 */
export interface WordIndex extends ReadonlyWordIndex {
  insert(word: Word, frequency?: number): void;
  remove(word: Word): boolean;
  clear(): void;

  /** Returns false if the file cannot be read; throws DictionaryParseError on a bad frequency. */
  loadFromFile(path: string): boolean;
  /** Returns false if the file cannot be written. */
  saveToFile(path: string): boolean;
}
