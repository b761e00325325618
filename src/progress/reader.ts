/**
 * Instrumented reader
 *
 * Wraps a byte source and reports the size of every chunk pulled through it,
 * plus a zero-byte report when the source ends.
 * Chunks and source errors pass through untouched, so any stream consumer
 * (`pipeline`, `for await`) gains progress reporting without changing its
 * own control flow.
 */

/**
 * Receiver of byte counts, normally the progress bar handle
 */
export interface ProgressReporter {
  progress(delta: number): Promise<void>
}

export class ProgressReader implements AsyncIterable<Uint8Array> {
  private count = 0
  private failure?: unknown

  constructor(
    private readonly source: AsyncIterable<Uint8Array>,
    private readonly reporter: ProgressReporter
  ) {}

  /**
   * Bytes pulled from the source so far
   */
  get bytesRead(): number {
    return this.count
  }

  /**
   * Whether the source itself raised an error
   */
  get readFailed(): boolean {
    return this.failure !== undefined
  }

  async *[Symbol.asyncIterator](): AsyncGenerator<Uint8Array, void, undefined> {
    const iterator = this.source[Symbol.asyncIterator]()
    let exhausted = false

    try {
      while (true) {
        const result = await this.read(iterator)
        if (result.done) {
          exhausted = true
          // The final read reports zero bytes, which still starts a bar
          await this.reporter.progress(0)
          return
        }

        const chunk = result.value
        this.count += chunk.length
        await this.reporter.progress(chunk.length)
        yield chunk
      }
    } finally {
      // Release the source when the consumer stops early
      if (!exhausted && !this.readFailed && iterator.return) {
        await iterator.return()
      }
    }
  }

  private async read(iterator: AsyncIterator<Uint8Array>): Promise<IteratorResult<Uint8Array>> {
    try {
      return await iterator.next()
    } catch (error) {
      this.failure = error ?? new Error('source failed')
      throw error
    }
  }
}
