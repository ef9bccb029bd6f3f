/**
 * Frontier containers, one per expansion order
 */

export interface Frontier<T> {
  push(item: T): void;
  pop(): T | undefined;
  isEmpty(): boolean;
  size(): number;
}

/**
 * Last in, first out
 */
export class Stack<T> implements Frontier<T> {
  private items: T[] = [];

  push(item: T): void {
    this.items.push(item);
  }

  pop(): T | undefined {
    return this.items.pop();
  }

  isEmpty(): boolean {
    return this.items.length === 0;
  }

  size(): number {
    return this.items.length;
  }
}

/**
 * First in, first out
 */
export class Queue<T> implements Frontier<T> {
  private items: T[] = [];
  private head = 0;

  push(item: T): void {
    this.items.push(item);
  }

  pop(): T | undefined {
    if (this.head >= this.items.length) return undefined;

    const item = this.items[this.head++];

    // Compact once the consumed prefix dominates
    if (this.head > 1024 && this.head * 2 > this.items.length) {
      this.items = this.items.slice(this.head);
      this.head = 0;
    }

    return item;
  }

  isEmpty(): boolean {
    return this.head >= this.items.length;
  }

  size(): number {
    return this.items.length - this.head;
  }
}

interface HeapEntry<T> {
  item: T;
  priority: number;
  sequence: number;
}

/**
 * Binary min-heap keyed by a priority function.
 * Equal priorities come out in insertion order.
 */
export class PriorityQueue<T> implements Frontier<T> {
  private items: HeapEntry<T>[] = [];
  private nextSequence = 0;

  constructor(private readonly priorityOf: (item: T) => number) {}

  push(item: T): void {
    // Binary heap insert
    this.items.push({ item, priority: this.priorityOf(item), sequence: this.nextSequence++ });
    this.bubbleUp(this.items.length - 1);
  }

  pop(): T | undefined {
    if (this.items.length === 0) return undefined;

    const result = this.items[0];
    const last = this.items.pop();

    if (this.items.length > 0 && last !== undefined) {
      this.items[0] = last;
      this.bubbleDown(0);
    }

    return result.item;
  }

  peek(): T | undefined {
    return this.items[0]?.item;
  }

  isEmpty(): boolean {
    return this.items.length === 0;
  }

  size(): number {
    return this.items.length;
  }

  private before(a: HeapEntry<T>, b: HeapEntry<T>): boolean {
    return a.priority < b.priority || (a.priority === b.priority && a.sequence < b.sequence);
  }

  private bubbleUp(index: number): void {
    while (index > 0) {
      const parentIndex = Math.floor((index - 1) / 2);
      if (!this.before(this.items[index], this.items[parentIndex])) {
        break;
      }
      [this.items[parentIndex], this.items[index]] = [this.items[index], this.items[parentIndex]];
      index = parentIndex;
    }
  }

  private bubbleDown(index: number): void {
    while (true) {
      const leftChild = 2 * index + 1;
      const rightChild = 2 * index + 2;
      let smallest = index;

      if (leftChild < this.items.length &&
          this.before(this.items[leftChild], this.items[smallest])) {
        smallest = leftChild;
      }

      if (rightChild < this.items.length &&
          this.before(this.items[rightChild], this.items[smallest])) {
        smallest = rightChild;
      }

      if (smallest === index) break;

      [this.items[smallest], this.items[index]] = [this.items[index], this.items[smallest]];
      index = smallest;
    }
  }
}
