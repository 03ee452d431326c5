import type { Word } from "../types.js";
import type { Trie, TriePrefixResult } from "../trie.js";

const ROOT = 0;

/**
 * Trie stored as parallel arrays indexed by node id.
 *
 * Data structure:
 * - children[id]: char -> child id (sparse, so apostrophes and digits still fit)
 * - terminal[id], frequency[id]
 *
 * Nodes are never freed individually; `unmark` leaves the path in place and
 * `clear` resets the whole arena.
 */
export class ArenaTrie implements Trie {
  private children: Array<Map<string, number>> = [];
  private terminal: boolean[] = [];
  private weights: number[] = [];

  constructor() {
    this.clear();
  }

  get nodeCount(): number {
    return this.children.length;
  }

  insert(word: Word, frequency: number): void {
    let cur = ROOT;
    for (const ch of word) {
      const edges = this.edgesOf(cur);
      let next = edges.get(ch);
      if (next === undefined) {
        next = this.allocate();
        edges.set(ch, next);
      }
      cur = next;
    }

    this.terminal[cur] = true;
    this.weights[cur] = frequency;
  }

  unmark(word: Word): boolean {
    const node = this.find(word);
    if (node === undefined || !this.terminal[node]) return false;
    this.terminal[node] = false;
    this.weights[node] = 0;
    return true;
  }

  has(word: Word): boolean {
    const node = this.find(word);
    return node !== undefined && this.terminal[node] === true;
  }

  frequencyOf(word: Word): number {
    const node = this.find(word);
    if (node === undefined || !this.terminal[node]) return 0;
    return this.weights[node] ?? 0;
  }

  collect(prefix: string, limit: number): TriePrefixResult[] {
    const start = this.find(prefix);
    if (start === undefined || limit <= 0) return [];

    const out: TriePrefixResult[] = [];
    const stack: Array<{ node: number; word: string }> = [{ node: start, word: prefix }];

    while (stack.length && out.length < limit) {
      const top = stack.pop();
      if (!top) break;
      const { node, word } = top;
      if (this.terminal[node]) out.push({ word, frequency: this.weights[node] ?? 0 });

      // push children in reverse lexicographic so pop() yields lexicographic order
      const edges = Array.from(this.edgesOf(node)).sort((a, b) => (a[0] < b[0] ? 1 : a[0] > b[0] ? -1 : 0));
      for (const [ch, child] of edges) {
        stack.push({ node: child, word: word + ch });
      }
    }

    return out;
  }

  clear(): void {
    this.children = [];
    this.terminal = [];
    this.weights = [];
    this.allocate();
  }

  private find(word: string): number | undefined {
    let cur = ROOT;
    for (const ch of word) {
      const next = this.edgesOf(cur).get(ch);
      if (next === undefined) return undefined;
      cur = next;
    }
    return cur;
  }

  private edgesOf(node: number): Map<string, number> {
    const edges = this.children[node];
    if (!edges) throw new Error(`trie node ${node} out of range`);
    return edges;
  }

  private allocate(): number {
    const id = this.children.length;
    this.children.push(new Map());
    this.terminal.push(false);
    this.weights.push(0);
    return id;
  }
}
