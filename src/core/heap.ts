/**
 * Minimal heap contract used for topK selection.
 * Intended for a fixed-size min-heap to keep best K items.
 */
export interface Heap<T> {
  size(): number;
  peek(): T | undefined;
  push(item: T): void;
  pop(): T | undefined;
  /** Removes every item; order implementation-defined. */
  drain(): T[];
}

export type Comparator<T> = (a: T, b: T) => number;

export interface TopKSelector<T> {
  /**
   * Returns top K items by comparator.
   * Comparator should behave like Array.sort: <0 means a before b.
   */
  topK(items: Iterable<T>, k: number, comparator: Comparator<T>): T[];
}
