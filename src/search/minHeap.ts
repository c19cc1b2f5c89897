export interface QueueEntry {
  readonly vertex: number;
  readonly priority: number;
}

/** Orders by priority, then by vertex index so equal distances settle in insertion order. */
function precedes(left: QueueEntry, right: QueueEntry): boolean {
  if (left.priority !== right.priority) {
    return left.priority < right.priority;
  }
  return left.vertex < right.vertex;
}

/** Binary min-heap of vertex indices keyed by tentative distance. */
export class MinHeap {
  private readonly data: QueueEntry[] = [];

  get size(): number {
    return this.data.length;
  }

  enqueue(entry: QueueEntry): void {
    this.data.push(entry);
    this.bubbleUp(this.data.length - 1);
  }

  dequeue(): QueueEntry | undefined {
    const min = this.data[0];
    const last = this.data.pop();
    if (this.data.length > 0 && last) {
      this.data[0] = last;
      this.bubbleDown(0);
    }
    return min;
  }

  isEmpty(): boolean {
    return this.data.length === 0;
  }

  private bubbleUp(index: number): void {
    while (index > 0) {
      const parent = Math.floor((index - 1) / 2);
      if (!precedes(this.data[index], this.data[parent])) {
        break;
      }
      this.swap(parent, index);
      index = parent;
    }
  }

  private bubbleDown(index: number): void {
    const length = this.data.length;
    while (true) {
      let smallest = index;
      const left = 2 * index + 1;
      const right = 2 * index + 2;
      if (left < length && precedes(this.data[left], this.data[smallest])) {
        smallest = left;
      }
      if (right < length && precedes(this.data[right], this.data[smallest])) {
        smallest = right;
      }
      if (smallest === index) {
        break;
      }
      this.swap(index, smallest);
      index = smallest;
    }
  }

  private swap(a: number, b: number): void {
    [this.data[a], this.data[b]] = [this.data[b], this.data[a]];
  }
}
