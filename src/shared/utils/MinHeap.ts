/**
 * Binary min-heap ordered by a caller-supplied comparator.
 *
 * Used as the open set of A* and the frontier of the Dijkstra flood fill.
 *
 * @module shared/utils/MinHeap
 */
export class MinHeap<T> {
  private readonly items: T[] = [];

  constructor(private readonly compare: (a: T, b: T) => number) {}

  public get size(): number {
    return this.items.length;
  }

  public isEmpty(): boolean {
    return this.items.length === 0;
  }

  public peek(): T | undefined {
    return this.items[0];
  }

  public push(item: T): void {
    this.items.push(item);
    this.siftUp(this.items.length - 1);
  }

  public pop(): T | undefined {
    const items = this.items;
    if (items.length === 0) return undefined;

    const top = items[0];
    const last = items.pop();
    if (items.length > 0 && last !== undefined) {
      items[0] = last;
      this.siftDown(0);
    }
    return top;
  }

  public clear(): void {
    this.items.length = 0;
  }

  private siftUp(index: number): void {
    const items = this.items;
    let i = index;
    while (i > 0) {
      const parent = (i - 1) >> 1;
      if (this.compare(items[i], items[parent]) >= 0) break;
      [items[i], items[parent]] = [items[parent], items[i]];
      i = parent;
    }
  }

  private siftDown(index: number): void {
    const items = this.items;
    const length = items.length;
    let i = index;

    for (;;) {
      const left = i * 2 + 1;
      const right = left + 1;
      let smallest = i;

      if (left < length && this.compare(items[left], items[smallest]) < 0) {
        smallest = left;
      }
      if (right < length && this.compare(items[right], items[smallest]) < 0) {
        smallest = right;
      }
      if (smallest === i) return;

      [items[i], items[smallest]] = [items[smallest], items[i]];
      i = smallest;
    }
  }
}
