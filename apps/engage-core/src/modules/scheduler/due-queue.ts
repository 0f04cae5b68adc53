/**
 * Binary min-heap of (dueAt, seq, jobId) entries.
 *
 * Ordered by due time, then by insertion sequence so jobs due at the same
 * instant pop in the order they were scheduled. Cancelled jobs are not
 * removed from the heap; the engine skips entries whose job is gone.
 */
export interface DueEntry {
  jobId: string;
  dueAt: number;
  seq: number;
}

export class DueQueue {
  private readonly heap: DueEntry[] = [];

  get length(): number {
    return this.heap.length;
  }

  push(entry: DueEntry): void {
    this.heap.push(entry);
    this.siftUp(this.heap.length - 1);
  }

  peek(): DueEntry | undefined {
    return this.heap[0];
  }

  pop(): DueEntry | undefined {
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

  clear(): void {
    this.heap.length = 0;
  }

  /**
   * Drop every entry the predicate rejects and restore heap order.
   */
  retain(predicate: (entry: DueEntry) => boolean): void {
    const kept = this.heap.filter(predicate);
    this.heap.length = 0;
    this.heap.push(...kept);
    for (let i = (this.heap.length >> 1) - 1; i >= 0; i--) {
      this.siftDown(i);
    }
  }

  private less(a: DueEntry, b: DueEntry): boolean {
    return a.dueAt < b.dueAt || (a.dueAt === b.dueAt && a.seq < b.seq);
  }

  private siftUp(index: number): void {
    let child = index;
    while (child > 0) {
      const parent = (child - 1) >> 1;
      if (!this.less(this.heap[child], this.heap[parent])) {
        break;
      }
      this.swap(child, parent);
      child = parent;
    }
  }

  private siftDown(index: number): void {
    const size = this.heap.length;
    let parent = index;
    for (;;) {
      const left = parent * 2 + 1;
      const right = left + 1;
      let smallest = parent;

      if (left < size && this.less(this.heap[left], this.heap[smallest])) {
        smallest = left;
      }
      if (right < size && this.less(this.heap[right], this.heap[smallest])) {
        smallest = right;
      }
      if (smallest === parent) {
        return;
      }
      this.swap(parent, smallest);
      parent = smallest;
    }
  }

  private swap(i: number, j: number): void {
    const tmp = this.heap[i];
    this.heap[i] = this.heap[j];
    this.heap[j] = tmp;
  }
}
