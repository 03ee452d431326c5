import type { Comparator, Heap, TopKSelector } from "../heap.js";

/**
 * Binary heap whose root is the item that ranks last under `comparator`,
 * i.e. the first one to evict when a better item arrives.
 */
export class WorstFirstHeap<T> implements Heap<T> {
  private items: T[] = [];

  constructor(private readonly comparator: Comparator<T>) {}

  size(): number {
    return this.items.length;
  }

  peek(): T | undefined {
    return this.items[0];
  }

  push(item: T): void {
    this.items.push(item);
    this.siftUp(this.items.length - 1);
  }

  pop(): T | undefined {
    const top = this.items[0];
    const last = this.items.pop();
    if (this.items.length && last !== undefined) {
      this.items[0] = last;
      this.siftDown(0);
    }
    return top;
  }

  drain(): T[] {
    const out = this.items;
    this.items = [];
    return out;
  }

  /** true when the item at `i` should sit above the one at `j`. */
  private above(i: number, j: number): boolean {
    const a = this.items[i];
    const b = this.items[j];
    if (a === undefined || b === undefined) return false;
    return this.comparator(a, b) > 0;
  }

  private swap(i: number, j: number): void {
    const a = this.items[i];
    const b = this.items[j];
    if (a === undefined || b === undefined) return;
    this.items[i] = b;
    this.items[j] = a;
  }

  private siftUp(i: number): void {
    while (i > 0) {
      const parent = (i - 1) >> 1;
      if (!this.above(i, parent)) return;
      this.swap(i, parent);
      i = parent;
    }
  }

  private siftDown(i: number): void {
    const n = this.items.length;
    for (;;) {
      let target = i;
      for (const child of [2 * i + 1, 2 * i + 2]) {
        if (child < n && this.above(child, target)) target = child;
      }
      if (target === i) return;
      this.swap(i, target);
      i = target;
    }
  }
}

/**
 * Keeps a fixed-size heap of the best K items, then sorts them.
 *
 * Comparator uses Array.sort semantics (a before b if <0); a total order gives
 * a deterministic result regardless of input order.
 */
export class MinHeapTopKSelector<T> implements TopKSelector<T> {
  topK(items: Iterable<T>, k: number, comparator: Comparator<T>): T[] {
    if (k <= 0) return [];

    const heap = new WorstFirstHeap<T>(comparator);
    for (const item of items) {
      if (heap.size() < k) {
        heap.push(item);
        continue;
      }
      const worst = heap.peek();
      if (worst !== undefined && comparator(item, worst) < 0) {
        heap.pop();
        heap.push(item);
      }
    }

    return heap.drain().sort(comparator);
  }
}
