/**
 * Unbuffered command channel
 *
 * A send settles only once a receiver has taken the value, so producers are
 * held back while the single consumer is busy. Closing the channel ends the
 * consumer's iteration and rejects any send still waiting.
 */

/**
 * Error raised when sending on a closed channel
 */
export class ChannelClosedError extends Error {
  constructor() {
    super('send on closed channel')
    this.name = 'ChannelClosedError'
  }
}

interface PendingSend<T> {
  value: T
  resolve: () => void
  reject: (error: Error) => void
}

type PendingReceive<T> = (result: IteratorResult<T, undefined>) => void

export class Channel<T> implements AsyncIterable<T> {
  private senders: Array<PendingSend<T>> = []
  private receivers: Array<PendingReceive<T>> = []
  private closed = false

  /**
   * Whether close() has been called
   */
  get isClosed(): boolean {
    return this.closed
  }

  /**
   * Hand a value to the consumer
   *
   * Resolves when the consumer receives it.
   */
  send(value: T): Promise<void> {
    if (this.closed) {
      return Promise.reject(new ChannelClosedError())
    }

    const receiver = this.receivers.shift()
    if (receiver) {
      receiver({ value, done: false })
      return Promise.resolve()
    }

    return new Promise((resolve, reject) => {
      this.senders.push({ value, resolve, reject })
    })
  }

  /**
   * Take the next value, waiting for a sender if none is queued
   *
   * Yields `done: true` once the channel is closed and drained.
   */
  receive(): Promise<IteratorResult<T, undefined>> {
    const sender = this.senders.shift()
    if (sender) {
      sender.resolve()
      return Promise.resolve({ value: sender.value, done: false })
    }

    if (this.closed) {
      return Promise.resolve({ value: undefined, done: true })
    }

    return new Promise((resolve) => {
      this.receivers.push(resolve)
    })
  }

  /**
   * Close the channel
   *
   * Waiting receivers finish; waiting senders are rejected.
   */
  close(): void {
    if (this.closed) {
      return
    }
    this.closed = true

    for (const receiver of this.receivers.splice(0)) {
      receiver({ value: undefined, done: true })
    }
    for (const sender of this.senders.splice(0)) {
      sender.reject(new ChannelClosedError())
    }
  }

  async *[Symbol.asyncIterator](): AsyncGenerator<T, void, undefined> {
    while (true) {
      const result = await this.receive()
      if (result.done) {
        return
      }
      yield result.value
    }
  }
}
