import type { PlanState } from './types';

export interface SearchNode {
  state: PlanState;
  g: number;
  h: number;
  f: number;
  seq: number;
}

/** Lowest f first, then lowest g, then earliest insertion. */
export function compareNodes(a: SearchNode, b: SearchNode): number {
  if (a.f !== b.f) {
    return a.f - b.f;
  }
  if (a.g !== b.g) {
    return a.g - b.g;
  }
  return a.seq - b.seq;
}

export class Frontier {
  private readonly heap: SearchNode[] = [];

  get size(): number {
    return this.heap.length;
  }

  push(node: SearchNode): void {
    this.heap.push(node);
    this.siftUp(this.heap.length - 1);
  }

  pop(): SearchNode | undefined {
    const top = this.heap[0];
    const last = this.heap.pop();
    if (top === undefined || last === undefined) {
      return undefined;
    }
    if (this.heap.length > 0) {
      this.heap[0] = last;
      this.siftDown(0);
    }
    return top;
  }

  peek(): SearchNode | undefined {
    return this.heap[0];
  }

  private siftUp(index: number): void {
    let child = index;
    while (child > 0) {
      const parent = (child - 1) >> 1;
      if (compareNodes(this.heap[child], this.heap[parent]) >= 0) {
        return;
      }
      this.swap(child, parent);
      child = parent;
    }
  }

  private siftDown(index: number): void {
    let parent = index;
    const length = this.heap.length;
    for (;;) {
      const left = parent * 2 + 1;
      const right = left + 1;
      let smallest = parent;
      if (left < length && compareNodes(this.heap[left], this.heap[smallest]) < 0) {
        smallest = left;
      }
      if (right < length && compareNodes(this.heap[right], this.heap[smallest]) < 0) {
        smallest = right;
      }
      if (smallest === parent) {
        return;
      }
      this.swap(parent, smallest);
      parent = smallest;
    }
  }

  private swap(a: number, b: number): void {
    const tmp = this.heap[a];
    this.heap[a] = this.heap[b];
    this.heap[b] = tmp;
  }
}
