import type { SessionSnapshot } from '../types.js'

/**
 * Per-client snapshot stream with a version cursor.
 *
 * Versions only ever go up on a stream; anything at or below the cursor is
 * ignored. The buffer is bounded: when a slow reader lets it fill up, the
 * queued snapshots are dropped and only the newest is kept. Snapshots are
 * complete states, so the reader simply resyncs on the next one.
 */
export class SnapshotStream implements AsyncIterable<SessionSnapshot> {
  private buffer: SessionSnapshot[] = []
  private waiting: ((result: IteratorResult<SessionSnapshot>) => void) | null = null
  private cursor = -1
  private closed = false
  dropped = 0

  constructor(
    readonly clientId: string,
    private readonly capacity: number,
    initial: SessionSnapshot,
  ) {
    this.push(initial)
  }

  get isClosed(): boolean {
    return this.closed
  }

  get pending(): number {
    return this.buffer.length
  }

  /** Returns false when the snapshot was not newer than the cursor. */
  push(snapshot: SessionSnapshot): boolean {
    if (this.closed || snapshot.version <= this.cursor) return false
    this.cursor = snapshot.version

    if (this.waiting) {
      const deliver = this.waiting
      this.waiting = null
      deliver({ value: snapshot, done: false })
      return true
    }

    if (this.buffer.length >= this.capacity) {
      this.dropped += this.buffer.length
      this.buffer = []
    }
    this.buffer.push(snapshot)
    return true
  }

  next(): Promise<IteratorResult<SessionSnapshot>> {
    const queued = this.buffer.shift()
    if (queued) return Promise.resolve({ value: queued, done: false })
    if (this.closed) return Promise.resolve({ value: undefined, done: true })
    return new Promise((resolve) => { this.waiting = resolve })
  }

  close(): void {
    if (this.closed) return
    this.closed = true
    this.buffer = []
    if (this.waiting) {
      const deliver = this.waiting
      this.waiting = null
      deliver({ value: undefined, done: true })
    }
  }

  [Symbol.asyncIterator](): AsyncIterator<SessionSnapshot> {
    return {
      next: () => this.next(),
      return: async () => {
        this.close()
        return { value: undefined, done: true }
      },
    }
  }
}
