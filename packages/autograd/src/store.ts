/**
 * Node storage strategies.
 *
 * The tape only ever appends nodes and reads them back in reverse during
 * accumulation. `ArrayNodeStore` is the production backing store; the
 * linked-list store exists so the two layouts can be benchmarked against
 * each other (it is slower for common tape sizes: the backward scan chases
 * pointers instead of walking contiguous slots).
 */
import { IndexOutOfRangeError, type NodeStorage } from "@tapegrad/core";

export interface NodeStore<N> {
  readonly kind: NodeStorage;
  readonly length: number;
  push(node: N): void;
  at(index: number): N;
  /** Visit nodes `from`, `from - 1`, ..., `to` (inclusive). */
  scanBackward(from: number, to: number, fn: (node: N, index: number) => void): void;
}

function outOfRange(index: number, length: number): IndexOutOfRangeError {
  return new IndexOutOfRangeError({
    message: `Node index ${index} is out of range for a store of ${length} nodes`,
    index,
    nodeCount: length,
  });
}

// ── Array ──────────────────────────────────────────────────────────────────
export class ArrayNodeStore<N> implements NodeStore<N> {
  readonly kind = "array";
  private readonly items: N[];
  private count = 0;

  /** @param capacity - slots to reserve up front; the store still grows past it. */
  constructor(capacity = 0) {
    this.items = capacity >= 1 ? new Array<N>(Math.floor(capacity)) : [];
  }

  get length(): number {
    return this.count;
  }

  push(node: N): void {
    this.items[this.count++] = node;
  }

  at(index: number): N {
    if (index < 0 || index >= this.count) throw outOfRange(index, this.count);
    return this.items[index];
  }

  scanBackward(from: number, to: number, fn: (node: N, index: number) => void): void {
    const items = this.items;
    for (let i = from; i >= to; i--) fn(items[i], i);
  }
}

// ── Linked list ────────────────────────────────────────────────────────────
interface Link<N> {
  readonly value: N;
  prev: Link<N> | null;
  next: Link<N> | null;
}

export class LinkedListNodeStore<N> implements NodeStore<N> {
  readonly kind = "linked-list";
  private head: Link<N> | null = null;
  private tail: Link<N> | null = null;
  private count = 0;

  get length(): number {
    return this.count;
  }

  push(node: N): void {
    const link: Link<N> = { value: node, prev: this.tail, next: null };
    if (this.tail) this.tail.next = link;
    else this.head = link;
    this.tail = link;
    this.count++;
  }

  at(index: number): N {
    return this.linkAt(index).value;
  }

  scanBackward(from: number, to: number, fn: (node: N, index: number) => void): void {
    if (from < to) return;
    let link: Link<N> | null = this.linkAt(from);
    for (let i = from; i >= to && link; i--) {
      fn(link.value, i);
      link = link.prev;
    }
  }

  private linkAt(index: number): Link<N> {
    if (index < 0 || index >= this.count) throw outOfRange(index, this.count);
    // walk from whichever end is closer
    if (index < this.count / 2) {
      let link = this.head;
      for (let i = 0; i < index && link; i++) link = link.next;
      if (link) return link;
    } else {
      let link = this.tail;
      for (let i = this.count - 1; i > index && link; i--) link = link.prev;
      if (link) return link;
    }
    throw outOfRange(index, this.count);
  }
}

export function createNodeStore<N>(kind: NodeStorage, capacity = 0): NodeStore<N> {
  switch (kind) {
    case "array": return new ArrayNodeStore<N>(capacity);
    case "linked-list": return new LinkedListNodeStore<N>();
  }
}
