import { SymbolID } from './symbol-table'

export type QueuedPair = {
  a: SymbolID
  b: SymbolID
  /** @description weighted frequency when this entry was pushed */
  frequency: number
  a_chars: string
  b_chars: string
}

/**
 * @description higher frequency first,
 * then smaller left string, then smaller right string.
 * Returns negative when x should be taken before y.
 */
export function comparePairs(
  x: Omit<QueuedPair, 'a' | 'b'>,
  y: Omit<QueuedPair, 'a' | 'b'>,
): number {
  if (x.frequency != y.frequency) return y.frequency - x.frequency
  if (x.a_chars != y.a_chars) return x.a_chars < y.a_chars ? -1 : 1
  if (x.b_chars != y.b_chars) return x.b_chars < y.b_chars ? -1 : 1
  return 0
}

/**
 * @description binary max-heap of pair snapshots.
 * Entries are never updated in place, a changed pair is pushed again
 * and the outdated entry is dropped by the owner when it surfaces.
 */
export class PairQueue {
  private heap: QueuedPair[] = []

  get size(): number {
    return this.heap.length
  }

  push(entry: QueuedPair) {
    let { heap } = this
    heap.push(entry)
    let index = heap.length - 1
    while (index > 0) {
      let parent = (index - 1) >> 1
      if (comparePairs(heap[index], heap[parent]) >= 0) break
      ;[heap[index], heap[parent]] = [heap[parent], heap[index]]
      index = parent
    }
  }

  peek(): QueuedPair | null {
    return this.heap.length > 0 ? this.heap[0] : null
  }

  pop(): QueuedPair | null {
    let { heap } = this
    let top = heap[0]
    if (!top) return null
    let last = heap.pop()
    if (last && heap.length > 0) {
      heap[0] = last
      this.siftDown(0)
    }
    return top
  }

  clear() {
    this.heap = []
  }

  private siftDown(index: number) {
    let { heap } = this
    let count = heap.length
    for (;;) {
      let left = index * 2 + 1
      let right = left + 1
      let best = index
      if (left < count && comparePairs(heap[left], heap[best]) < 0) {
        best = left
      }
      if (right < count && comparePairs(heap[right], heap[best]) < 0) {
        best = right
      }
      if (best == index) return
      ;[heap[index], heap[best]] = [heap[best], heap[index]]
      index = best
    }
  }
}
