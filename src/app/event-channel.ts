type Waiter<T> = (result: IteratorResult<T, undefined>) => void

/**
 * Unbounded FIFO with a single consumer. Producers push from any callback;
 * the consumer awaits items one at a time in arrival order. Closing drops
 * whatever is still queued.
 */
export class EventChannel<T> implements AsyncIterable<T> {
  private readonly queue: T[] = []
  private waiter: Waiter<T> | null = null
  private closed = false

  push(item: T): boolean {
    if (this.closed) return false

    const waiter = this.waiter
    if (waiter) {
      this.waiter = null
      waiter({ value: item, done: false })
    } else {
      this.queue.push(item)
    }
    return true
  }

  close(): void {
    if (this.closed) return
    this.closed = true
    this.queue.length = 0

    const waiter = this.waiter
    if (waiter) {
      this.waiter = null
      waiter({ value: undefined, done: true })
    }
  }

  get size(): number {
    return this.queue.length
  }

  get isClosed(): boolean {
    return this.closed
  }

  next(): Promise<IteratorResult<T, undefined>> {
    if (this.queue.length > 0) {
      const [value] = this.queue.splice(0, 1)
      return Promise.resolve({ value, done: false })
    }
    if (this.closed) {
      return Promise.resolve({ value: undefined, done: true })
    }
    return new Promise((resolve) => {
      this.waiter = resolve
    })
  }

  [Symbol.asyncIterator](): AsyncIterator<T, undefined> {
    return { next: () => this.next() }
  }
}
