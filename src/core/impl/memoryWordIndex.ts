import { readFileSync, writeFileSync } from "node:fs";

import type { IndexStats, Word, WordEntry } from "../types.js";
import type { WordIndex } from "../wordIndex.js";
import { ArenaTrie } from "./arenaTrie.js";
import { parseDictionary, serializeDictionary } from "./dictionaryFile.js";
import { phoneticCode } from "./phonetic.js";

function normalize(word: Word): Word {
  return word.toLowerCase();
}

function byteLength(s: string): number {
  return Buffer.byteLength(s, "utf8");
}

/**
 * In-memory dictionary.
 *
 * Data structure:
 * - words: authoritative membership set
 * - frequencies: word -> frequency (last write wins)
 * - trie: prefix queries, terminal frequency mirrors `frequencies`
 * - phonetic: code -> words in insertion order, one entry per word
 */
export class MemoryWordIndex implements WordIndex {
  private readonly words = new Set<Word>();
  private readonly frequencies = new Map<Word, number>();
  private readonly phonetic = new Map<string, Word[]>();
  private readonly trie = new ArenaTrie();

  /** Throws `RangeError` unless `frequency` is a non-negative safe integer. */
  insert(word: Word, frequency: number = 1): void {
    if (!Number.isSafeInteger(frequency) || frequency < 0) {
      throw new RangeError(`frequency must be a non-negative integer, got ${frequency}`);
    }
    if (!word.length) return;
    const w = normalize(word);
    const isNew = !this.words.has(w);

    this.words.add(w);
    this.frequencies.set(w, frequency);
    this.trie.insert(w, frequency);

    if (isNew) {
      const code = phoneticCode(w);
      let bucket = this.phonetic.get(code);
      if (!bucket) {
        bucket = [];
        this.phonetic.set(code, bucket);
      }
      bucket.push(w);
    }
  }

  remove(word: Word): boolean {
    const w = normalize(word);
    if (!this.words.has(w)) return false;

    this.words.delete(w);
    this.frequencies.delete(w);
    this.trie.unmark(w);

    const code = phoneticCode(w);
    const bucket = this.phonetic.get(code);
    if (bucket) {
      const rest = bucket.filter((x) => x !== w);
      if (rest.length) this.phonetic.set(code, rest);
      else this.phonetic.delete(code);
    }
    return true;
  }

  contains(word: Word): boolean {
    return this.words.has(normalize(word));
  }

  frequency(word: Word): number {
    return this.frequencies.get(normalize(word)) ?? 0;
  }

  wordsWithPrefix(prefix: string, maxResults: number): Word[] {
    const found = this.trie.collect(normalize(prefix), maxResults);
    found.sort((a, b) => b.frequency - a.frequency || (a.word < b.word ? -1 : a.word > b.word ? 1 : 0));
    return found.map((r) => r.word);
  }

  phoneticMatches(word: Word): Word[] {
    const bucket = this.phonetic.get(phoneticCode(word));
    return bucket ? Array.from(bucket) : [];
  }

  allWords(): Set<Word> {
    return new Set(this.words);
  }

  wordCount(): number {
    return this.words.size;
  }

  entries(): WordEntry[] {
    return Array.from(this.frequencies, ([word, frequency]) => ({ word, frequency }));
  }

  clear(): void {
    this.words.clear();
    this.frequencies.clear();
    this.phonetic.clear();
    this.trie.clear();
  }

  stats(): IndexStats {
    let memoryBytes = 0;
    for (const w of this.words) memoryBytes += byteLength(w);
    for (const w of this.frequencies.keys()) memoryBytes += byteLength(w);
    for (const [code, bucket] of this.phonetic) {
      memoryBytes += byteLength(code);
      for (const w of bucket) memoryBytes += byteLength(w);
    }
    return { wordCount: this.words.size, memoryBytes };
  }

  loadFromFile(path: string): boolean {
    let text: string;
    try {
      text = readFileSync(path, "utf8");
    } catch {
      return false;
    }

    // parse everything first so a bad line leaves the current contents alone
    const entries = parseDictionary(text, path);
    this.clear();
    for (const e of entries) this.insert(e.word, e.frequency);
    return true;
  }

  saveToFile(path: string): boolean {
    try {
      writeFileSync(path, serializeDictionary(this.entries()), "utf8");
      return true;
    } catch {
      return false;
    }
  }
}
