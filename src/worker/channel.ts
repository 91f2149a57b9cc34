import type { ProgressSender } from '../transfer/types.js'

interface PendingSend<T> {
  value: T
  resolve: (delivered: boolean) => void
}

/**
 * Async FIFO handoff between one producer side and one consumer.
 *
 * With a finite capacity, `send` waits while the buffer is full. `recv`
 * resolves null once the channel is closed and drained. Closing discards
 * sends that are still waiting for room; buffered values are still delivered.
 */
export class Channel<T extends {}> implements ProgressSender<T>, AsyncIterable<T> {
  private buffer: T[] = []
  private receivers: Array<(value: T | null) => void> = []
  private blockedSends: Array<PendingSend<T>> = []
  private closed = false

  constructor(readonly capacity: number = Infinity) {
    if (!(capacity >= 1)) {
      throw new RangeError(`Channel capacity must be at least 1, got ${capacity}`)
    }
  }

  get size(): number {
    return this.buffer.length
  }

  get isClosed(): boolean {
    return this.closed
  }

  trySend(value: T): boolean {
    if (this.closed) return false

    const receiver = this.receivers.shift()
    if (receiver) {
      receiver(value)
      return true
    }

    if (this.buffer.length < this.capacity) {
      this.buffer.push(value)
      return true
    }

    return false
  }

  send(value: T): Promise<boolean> {
    if (this.closed) return Promise.resolve(false)
    if (this.trySend(value)) return Promise.resolve(true)

    return new Promise((resolve) => {
      this.blockedSends.push({ value, resolve })
    })
  }

  recv(): Promise<T | null> {
    const value = this.buffer.shift()
    if (value !== undefined) {
      this.admitBlockedSend()
      return Promise.resolve(value)
    }

    if (this.closed) return Promise.resolve(null)

    return new Promise((resolve) => {
      this.receivers.push(resolve)
    })
  }

  close(): void {
    if (this.closed) return
    this.closed = true

    for (const receiver of this.receivers) receiver(null)
    this.receivers = []

    for (const pending of this.blockedSends) pending.resolve(false)
    this.blockedSends = []
  }

  async *[Symbol.asyncIterator](): AsyncGenerator<T, void, undefined> {
    while (true) {
      const value = await this.recv()
      if (value === null) return
      yield value
    }
  }

  private admitBlockedSend(): void {
    const pending = this.blockedSends.shift()
    if (!pending) return
    this.buffer.push(pending.value)
    pending.resolve(true)
  }
}
