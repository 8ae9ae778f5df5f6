/**
 * Single-writer FIFO queue. Items are handed to `process` strictly one at a
 * time and in arrival order, whatever the number of producers.
 */

interface Pending<T, R> {
  item: T
  resolve(result: R): void
  reject(err: unknown): void
}

export class CommandQueue<T, R> {
  private pending: Pending<T, R>[] = []
  private draining = false

  constructor(private readonly process: (item: T) => R | Promise<R>) {}

  get size(): number {
    return this.pending.length
  }

  get busy(): boolean {
    return this.draining
  }

  /** Resolves with the handler's result once this item has been processed. */
  push(item: T): Promise<R> {
    return new Promise<R>((resolve, reject) => {
      this.pending.push({ item, resolve, reject })
      if (!this.draining) void this.drain()
    })
  }

  private async drain(): Promise<void> {
    this.draining = true
    try {
      let next = this.pending.shift()
      while (next) {
        try {
          next.resolve(await this.process(next.item))
        } catch (err) {
          next.reject(err)
        }
        next = this.pending.shift()
      }
    } finally {
      this.draining = false
    }
  }
}
