import { mkdtempSync, readFileSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { beforeEach, describe, expect, it } from "vitest";

import { DictionaryParseError } from "../../errors.js";
import { MemoryWordIndex } from "../memoryWordIndex.js";

describe("MemoryWordIndex", () => {
  let index: MemoryWordIndex;

  beforeEach(() => {
    index = new MemoryWordIndex();
  });

  describe("insert / contains / remove", () => {
    it("finds inserted words regardless of case", () => {
      for (const w of ["Hello", "world", "TypeScript"]) {
        index.insert(w);
        expect(index.contains(w)).toBe(true);
        expect(index.contains(w.toUpperCase())).toBe(true);
      }
      expect(index.wordCount()).toBe(3);
      expect(index.frequency("typescript")).toBe(1);
    });

    it("ignores empty words", () => {
      index.insert("");
      expect(index.wordCount()).toBe(0);
      expect(index.remove("")).toBe(false);
    });

    it("rejects frequencies that are not non-negative safe integers", () => {
      for (const f of [-5, 1.5, Number.NaN, Number.POSITIVE_INFINITY, 2 ** 60]) {
        expect(() => index.insert("bad", f)).toThrow(RangeError);
      }
      expect(index.contains("bad")).toBe(false);
      expect(index.wordCount()).toBe(0);

      index.insert("zero", 0);
      expect(index.frequency("zero")).toBe(0);
    });

    it("overwrites the frequency of a duplicate without recounting it", () => {
      index.insert("cat", 5);
      index.insert("CAT", 8);
      expect(index.wordCount()).toBe(1);
      expect(index.frequency("cat")).toBe(8);
      expect(index.wordsWithPrefix("ca", 10)).toEqual(["cat"]);
      expect(index.phoneticMatches("cat")).toEqual(["cat"]);
    });

    it("restores the previous state on insert then remove", () => {
      index.insert("car", 9);
      const before = index.wordCount();

      index.insert("cat", 5);
      expect(index.remove("Cat")).toBe(true);
      expect(index.contains("cat")).toBe(false);
      expect(index.frequency("cat")).toBe(0);
      expect(index.wordCount()).toBe(before);
      expect(index.wordsWithPrefix("ca", 10)).toEqual(["car"]);
      expect(index.phoneticMatches("cat")).toEqual([]);
    });

    it("reports false and changes nothing when removing an absent word", () => {
      index.insert("car", 9);
      const stats = index.stats();
      expect(index.remove("cat")).toBe(false);
      expect(index.stats()).toEqual(stats);
      expect(index.allWords()).toEqual(new Set(["car"]));
    });
  });

  describe("wordsWithPrefix", () => {
    beforeEach(() => {
      index.insert("car", 9);
      index.insert("cat", 5);
      index.insert("cats", 3);
    });

    it("orders completions by frequency", () => {
      expect(index.wordsWithPrefix("ca", 10)).toEqual(["car", "cat", "cats"]);
      expect(index.wordsWithPrefix("CA", 10)).toEqual(["car", "cat", "cats"]);
    });

    it("collects up to maxResults before sorting", () => {
      index.insert("cab", 50);
      // traversal reaches cab, car first
      expect(index.wordsWithPrefix("ca", 2)).toEqual(["cab", "car"]);
    });

    it("breaks frequency ties lexicographically", () => {
      index.insert("bat", 2);
      index.insert("bad", 2);
      index.insert("ban", 5);
      expect(index.wordsWithPrefix("ba", 10)).toEqual(["ban", "bad", "bat"]);
    });

    it("returns nothing for an unknown prefix", () => {
      expect(index.wordsWithPrefix("dog", 10)).toEqual([]);
    });
  });

  describe("phoneticMatches", () => {
    it("returns the bucket in insertion order and drops emptied buckets", () => {
      index.insert("the");
      index.insert("tax");
      index.insert("tea");
      expect(index.phoneticMatches("teh")).toEqual(["the", "tea"]);
      expect(index.phoneticMatches("tax")).toEqual(["tax"]);

      index.remove("tax");
      expect(index.phoneticMatches("tax")).toEqual([]);
      expect(index.stats().memoryBytes).toBe(3 + 3 + 3 + 3 + 4 + 3 + 3);
    });
  });

  it("returns a snapshot from allWords", () => {
    index.insert("one");
    const words = index.allWords();
    index.insert("two");
    expect(words).toEqual(new Set(["one"]));
  });

  it("estimates memory from the word set, frequency keys and buckets", () => {
    index.insert("cat", 7);
    expect(index.stats()).toEqual({ wordCount: 1, memoryBytes: 13 });
  });

  it("drops everything on clear", () => {
    index.insert("cat");
    index.clear();
    expect(index.stats()).toEqual({ wordCount: 0, memoryBytes: 0 });
    expect(index.wordsWithPrefix("c", 10)).toEqual([]);
    expect(index.phoneticMatches("cat")).toEqual([]);
  });

  describe("files", () => {
    let dir: string;

    beforeEach(() => {
      dir = mkdtempSync(join(tmpdir(), "spell-index-"));
    });

    it("loads word and word:frequency lines", () => {
      const path = join(dir, "a.dict");
      writeFileSync(path, "apple:10\nbanana\n");
      expect(index.loadFromFile(path)).toBe(true);
      expect(index.wordCount()).toBe(2);
      expect(index.frequency("apple")).toBe(10);
      expect(index.frequency("banana")).toBe(1);
    });

    it("trims lines and skips blanks", () => {
      const path = join(dir, "b.dict");
      writeFileSync(path, "  Apple : 10 \r\n\n\tbanana\t\n   \n");
      expect(index.loadFromFile(path)).toBe(true);
      expect(index.allWords()).toEqual(new Set(["apple", "banana"]));
      expect(index.frequency("apple")).toBe(10);
    });

    it("replaces the current contents", () => {
      index.insert("stale");
      const path = join(dir, "c.dict");
      writeFileSync(path, "fresh:2\n");
      index.loadFromFile(path);
      expect(index.allWords()).toEqual(new Set(["fresh"]));
    });

    it("returns false for a missing file and keeps the contents", () => {
      index.insert("kept");
      expect(index.loadFromFile(join(dir, "missing.dict"))).toBe(false);
      expect(index.contains("kept")).toBe(true);
    });

    it("aborts the whole load on a bad frequency", () => {
      index.insert("kept");
      const path = join(dir, "bad.dict");
      writeFileSync(path, "apple:10\nbanana:lots\ncherry\n");

      let caught: unknown;
      try {
        index.loadFromFile(path);
      } catch (e) {
        caught = e;
      }
      expect(caught).toBeInstanceOf(DictionaryParseError);
      expect(caught instanceof DictionaryParseError && caught.line).toBe(2);
      expect(index.allWords()).toEqual(new Set(["kept"]));
    });

    it("round-trips through save, clear and load", () => {
      index.insert("zebra", 4);
      index.insert("apple", 10);
      index.insert("mango");
      const path = join(dir, "out.dict");

      expect(index.saveToFile(path)).toBe(true);
      expect(readFileSync(path, "utf8")).toBe("apple:10\nmango:1\nzebra:4\n");

      const before = index.entries();
      index.clear();
      expect(index.loadFromFile(path)).toBe(true);
      expect(new Set(index.entries().map((e) => `${e.word}:${e.frequency}`))).toEqual(
        new Set(before.map((e) => `${e.word}:${e.frequency}`)),
      );
    });

    it("returns false when the destination cannot be written", () => {
      index.insert("apple");
      expect(index.saveToFile(join(dir, "no-such-dir", "out.dict"))).toBe(false);
    });
  });
});
