import type { Word } from "../types.js";
import type { ReadonlyWordIndex } from "../wordIndex.js";

const ALPHABET = "abcdefghijklmnopqrstuvwxyz";

/** Drop one character: `len` candidates of length len-1. */
export function* deletions(word: Word): Generator<Word> {
  for (let i = 0; i < word.length; i++) {
    yield word.slice(0, i) + word.slice(i + 1);
  }
}

/** Insert each of a..z at each of len+1 positions. */
export function* insertions(word: Word): Generator<Word> {
  for (let i = 0; i <= word.length; i++) {
    const head = word.slice(0, i);
    const tail = word.slice(i);
    for (const ch of ALPHABET) yield head + ch + tail;
  }
}

/** Replace each position with each of the 25 other letters. */
export function* substitutions(word: Word): Generator<Word> {
  for (let i = 0; i < word.length; i++) {
    const head = word.slice(0, i);
    const tail = word.slice(i + 1);
    const current = word.charAt(i);
    for (const ch of ALPHABET) {
      if (ch !== current) yield head + ch + tail;
    }
  }
}

/** Swap each adjacent pair. */
export function* transpositions(word: Word): Generator<Word> {
  for (let i = 0; i + 1 < word.length; i++) {
    yield word.slice(0, i) + word.charAt(i + 1) + word.charAt(i) + word.slice(i + 2);
  }
}

/** "first second" for every split point where both halves are dictionary words. */
export function* splits(word: Word, index: ReadonlyWordIndex): Generator<Word> {
  for (let i = 1; i < word.length; i++) {
    const first = word.slice(0, i);
    const second = word.slice(i);
    if (index.contains(first) && index.contains(second)) yield `${first} ${second}`;
  }
}

/**
 * Completions of the leading `min(3, len)`..`len` characters, deduplicated.
 * Each prefix query is capped at `perPrefix` words.
 */
export function prefixCompletions(word: Word, index: ReadonlyWordIndex, perPrefix: number): Word[] {
  const seen = new Set<Word>();
  for (let len = Math.min(3, word.length); len <= word.length; len++) {
    for (const w of index.wordsWithPrefix(word.slice(0, len), perPrefix)) seen.add(w);
  }
  return Array.from(seen);
}

/** Every single-edit candidate that is a dictionary word. */
export function* knownEdits(word: Word, index: ReadonlyWordIndex): Generator<Word> {
  for (const gen of [deletions, insertions, substitutions, transpositions]) {
    for (const candidate of gen(word)) {
      if (index.contains(candidate)) yield candidate;
    }
  }
}
