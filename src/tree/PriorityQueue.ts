interface QueueEntry<T> {
  item: T;
  priority: number;
  seq: number;
}

/**
 * Binary min-heap keyed by a numeric priority.
 * Items with equal priority leave the queue in the order they entered it.
 */
export class PriorityQueue<T> {
  private readonly heap: QueueEntry<T>[] = [];
  private seqCounter = 0;

  get size(): number {
    return this.heap.length;
  }

  enqueue(item: T, priority: number): void {
    this.heap.push({ item, priority, seq: this.seqCounter++ });
    this.siftUp(this.heap.length - 1);
  }

  /** Remove and return the item with the lowest priority. */
  dequeue(): T {
    const top = this.heap[0];
    if (top === undefined) {
      throw new Error('PriorityQueue: dequeue from empty queue');
    }
    const last = this.heap.pop();
    if (last !== undefined && this.heap.length > 0) {
      this.heap[0] = last;
      this.siftDown(0);
    }
    return top.item;
  }

  /** Priority of the next item to be dequeued, if any. */
  peekPriority(): number | undefined {
    return this.heap[0]?.priority;
  }

  private before(a: QueueEntry<T>, b: QueueEntry<T>): boolean {
    if (a.priority !== b.priority) return a.priority < b.priority;
    return a.seq < b.seq;
  }

  private siftUp(index: number): void {
    let i = index;
    while (i > 0) {
      const parent = (i - 1) >> 1;
      if (!this.before(this.heap[i], this.heap[parent])) break;
      this.swap(i, parent);
      i = parent;
    }
  }

  private siftDown(index: number): void {
    const n = this.heap.length;
    let i = index;
    for (;;) {
      const left = 2 * i + 1;
      const right = left + 1;
      let smallest = i;
      if (left < n && this.before(this.heap[left], this.heap[smallest])) smallest = left;
      if (right < n && this.before(this.heap[right], this.heap[smallest])) smallest = right;
      if (smallest === i) return;
      this.swap(i, smallest);
      i = smallest;
    }
  }

  private swap(i: number, j: number): void {
    const tmp = this.heap[i];
    this.heap[i] = this.heap[j];
    this.heap[j] = tmp;
  }
}
