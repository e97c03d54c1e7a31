/**
 * Fixed-capacity circular buffer. When full, a push overwrites the oldest item.
 */
export class RingBuffer<T> {
  private readonly items: (T | undefined)[]
  private head = 0 // next write position
  private count = 0

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) throw new RangeError('RingBuffer capacity must be >= 1')
    this.items = new Array<T | undefined>(capacity).fill(undefined)
  }

  push(item: T): void {
    this.items[this.head] = item
    this.head = (this.head + 1) % this.capacity
    if (this.count < this.capacity) this.count++
  }

  /** Up to `n` items, newest first. */
  newest(n = this.count): T[] {
    const result: T[] = []
    const limit = Math.min(Math.max(0, n), this.count)
    for (let i = 1; i <= limit; i++) {
      const item = this.items[(this.head - i + this.capacity) % this.capacity]
      if (item !== undefined) result.push(item)
    }
    return result
  }

  get size(): number {
    return this.count
  }

  clear(): void {
    this.items.fill(undefined)
    this.head = 0
    this.count = 0
  }
}
