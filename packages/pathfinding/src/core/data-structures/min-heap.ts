/**
 * Binary min-heap with insertion-order tie-breaking.
 *
 * Entries the comparator considers equal come out in the order they were
 * pushed, so a heap-backed frontier selects exactly what a linear
 * "first minimum in the list" scan would.
 */

export type MinHeapCompare<T> = (a: T, b: T) => number;

interface HeapEntry<T> {
  readonly value: T;
  readonly order: number;
}

export class MinHeap<T> {
  private readonly entries: HeapEntry<T>[] = [];
  private readonly compare: MinHeapCompare<T>;
  private pushed = 0;

  constructor(compare: MinHeapCompare<T>) {
    this.compare = compare;
  }

  get size(): number {
    return this.entries.length;
  }

  get isEmpty(): boolean {
    return this.entries.length === 0;
  }

  push(value: T): void {
    this.entries.push({ value, order: this.pushed++ });
    this.bubbleUp(this.entries.length - 1);
  }

  pop(): T | undefined {
    const best = this.entries[0];
    const tail = this.entries.pop();

    if (best === undefined) {
      return undefined;
    }
    if (tail === undefined || this.entries.length === 0) {
      return best.value;
    }

    this.entries[0] = tail;
    this.bubbleDown(0);
    return best.value;
  }

  private precedes(a: HeapEntry<T>, b: HeapEntry<T>): boolean {
    const byValue = this.compare(a.value, b.value);
    if (byValue !== 0) return byValue < 0;
    return a.order < b.order;
  }

  private bubbleUp(startIndex: number): void {
    let index = startIndex;
    const entry = this.entries[index];
    if (entry === undefined) return;

    while (index > 0) {
      const parent = (index - 1) >> 1;
      const parentEntry = this.entries[parent];
      if (parentEntry === undefined) break;
      if (!this.precedes(entry, parentEntry)) break;

      this.entries[index] = parentEntry;
      index = parent;
    }

    this.entries[index] = entry;
  }

  private bubbleDown(startIndex: number): void {
    let index = startIndex;
    const entry = this.entries[index];
    if (entry === undefined) return;

    while (true) {
      const left = index * 2 + 1;
      const right = left + 1;

      const leftEntry = this.entries[left];
      if (leftEntry === undefined) break;

      let bestChild = left;
      let bestChildEntry = leftEntry;

      const rightEntry = this.entries[right];
      if (rightEntry !== undefined && this.precedes(rightEntry, leftEntry)) {
        bestChild = right;
        bestChildEntry = rightEntry;
      }

      if (!this.precedes(bestChildEntry, entry)) break;

      this.entries[index] = bestChildEntry;
      index = bestChild;
    }

    this.entries[index] = entry;
  }
}
