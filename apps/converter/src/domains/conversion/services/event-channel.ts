import type { EventSink } from "../model/events.model"

/**
 * Unbounded in-process queue between producers (scheduler, validation) and the
 * presentation layer.
 *
 * `publish` never calls into the consumer; a waiting `next()` is resolved and the
 * consumer resumes on a later microtask. Events published after `close()` are dropped.
 */
export class EventChannel<E> implements EventSink<E>, AsyncIterable<E> {
  private readonly buffer: E[] = []
  private readonly waiters: Array<(result: IteratorResult<E, undefined>) => void> = []
  private closed = false

  publish(event: E): void {
    if (this.closed) return

    const waiter = this.waiters.shift()

    if (waiter) {
      waiter({ value: event, done: false })
      return
    }

    this.buffer.push(event)
  }

  /** Everything buffered so far, without waiting. */
  drain(): E[] {
    return this.buffer.splice(0, this.buffer.length)
  }

  next(): Promise<IteratorResult<E, undefined>> {
    const event = this.buffer.shift()

    if (event !== undefined) {
      return Promise.resolve({ value: event, done: false })
    }

    if (this.closed) {
      return Promise.resolve({ value: undefined, done: true })
    }

    return new Promise((resolve) => this.waiters.push(resolve))
  }

  /**
   * Ends iteration once the buffer is empty. Pending `next()` calls resolve as done.
   */
  close(): void {
    if (this.closed) return
    this.closed = true

    for (const waiter of this.waiters.splice(0, this.waiters.length)) {
      waiter({ value: undefined, done: true })
    }
  }

  get isClosed(): boolean {
    return this.closed
  }

  /** Number of buffered events. */
  get size(): number {
    return this.buffer.length
  }

  [Symbol.asyncIterator](): AsyncIterator<E, undefined> {
    return {
      next: () => this.next(),
      return: async () => {
        this.close()
        return { value: undefined, done: true }
      },
    }
  }
}
