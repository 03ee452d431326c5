import { describe, expect, it } from "vitest";
import { ArenaTrie } from "../arenaTrie.js";

function sample(): ArenaTrie {
  const trie = new ArenaTrie();
  trie.insert("car", 9);
  trie.insert("cat", 5);
  trie.insert("cats", 3);
  return trie;
}

describe("ArenaTrie", () => {
  it("collects terminal words under a prefix in lexicographic order", () => {
    expect(sample().collect("ca", 10)).toEqual([
      { word: "car", frequency: 9 },
      { word: "cat", frequency: 5 },
      { word: "cats", frequency: 3 },
    ]);
  });

  it("stops collecting at the limit", () => {
    expect(sample().collect("ca", 2).map((r) => r.word)).toEqual(["car", "cat"]);
  });

  it("returns nothing when an edge of the prefix is missing", () => {
    expect(sample().collect("cx", 10)).toEqual([]);
    expect(sample().collect("ca", 0)).toEqual([]);
  });

  it("overwrites the frequency on re-insert", () => {
    const trie = sample();
    trie.insert("cat", 42);
    expect(trie.frequencyOf("cat")).toBe(42);
    expect(trie.nodeCount).toBe(6);
  });

  it("unmarks removed words without dropping their descendants", () => {
    const trie = sample();
    expect(trie.unmark("cat")).toBe(true);
    expect(trie.unmark("cat")).toBe(false);
    expect(trie.unmark("ca")).toBe(false);
    expect(trie.has("cat")).toBe(false);
    expect(trie.frequencyOf("cat")).toBe(0);
    expect(trie.has("cats")).toBe(true);
    expect(trie.collect("ca", 10).map((r) => r.word)).toEqual(["car", "cats"]);
  });

  it("resets to a lone root on clear", () => {
    const trie = sample();
    trie.clear();
    expect(trie.nodeCount).toBe(1);
    expect(trie.has("car")).toBe(false);
    expect(trie.collect("", 10)).toEqual([]);
  });
});
