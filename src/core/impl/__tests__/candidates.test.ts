import { describe, expect, it } from "vitest";
import {
  deletions,
  insertions,
  knownEdits,
  prefixCompletions,
  splits,
  substitutions,
  transpositions,
} from "../candidates.js";
import { MemoryWordIndex } from "../memoryWordIndex.js";

function indexOf(entries: Record<string, number>): MemoryWordIndex {
  const index = new MemoryWordIndex();
  for (const [w, f] of Object.entries(entries)) index.insert(w, f);
  return index;
}

describe("edit generators", () => {
  it("deletes each position", () => {
    expect([...deletions("abc")]).toEqual(["bc", "ac", "ab"]);
  });

  it("inserts 26 letters at len+1 positions", () => {
    const out = [...insertions("ab")];
    expect(out).toHaveLength(78);
    expect(out[0]).toBe("aab");
    expect(out[77]).toBe("abz");
  });

  it("substitutes the 25 other letters per position", () => {
    const out = [...substitutions("ab")];
    expect(out).toHaveLength(50);
    expect(out).not.toContain("ab");
    expect(out[0]).toBe("bb");
  });

  it("swaps adjacent pairs", () => {
    expect([...transpositions("abc")]).toEqual(["bac", "acb"]);
    expect([...transpositions("a")]).toEqual([]);
    expect([...transpositions("")]).toEqual([]);
  });

  it("keeps only dictionary words from single edits", () => {
    const index = indexOf({ the: 1, tea: 1, ten: 1 });
    expect(new Set(knownEdits("teh", index))).toEqual(new Set(["the", "tea", "ten"]));
  });
});

describe("splits", () => {
  it("yields two-word candidates when both halves are known", () => {
    const index = indexOf({ the: 1, cat: 1, he: 1 });
    expect([...splits("thecat", index)]).toEqual(["the cat"]);
  });

  it("yields nothing for single characters", () => {
    expect([...splits("a", indexOf({ a: 1 }))]).toEqual([]);
  });
});

describe("prefixCompletions", () => {
  it("unions completions of each leading prefix from length 3 up", () => {
    const index = indexOf({ car: 9, cart: 2, carton: 1, cat: 5 });
    expect(prefixCompletions("carx", index, 20)).toEqual(["car", "cart", "carton"]);
  });

  it("caps each prefix query", () => {
    const index = indexOf({ car: 9, cart: 2, carton: 1 });
    expect(prefixCompletions("car", index, 1)).toEqual(["car"]);
  });
});
