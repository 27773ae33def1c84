/**
 * Fixed-size pool of concurrent jobs.
 *
 * `submit` waits for a free slot and starts the job without waiting for it to
 * finish; `drain` waits for everything that was started, including jobs whose
 * `submit` was still queued for a slot when `drain` was called. A job that
 * rejects is recorded as a rejected result instead of failing the pool.
 */
export class UploadPool<T> {
  private readonly concurrency: number
  private running = 0
  // submits waiting for a slot that have not pushed their job yet
  private queued = 0
  private readonly waiting: Array<() => void> = []
  private readonly jobs: Promise<PromiseSettledResult<T>>[] = []

  constructor(concurrency: number) {
    if (!Number.isInteger(concurrency) || concurrency < 1) {
      throw new Error(`Concurrency must be a positive integer, got ${concurrency}`)
    }
    this.concurrency = concurrency
  }

  /** Jobs currently in flight */
  get active(): number {
    return this.running
  }

  /** Jobs started so far */
  get submitted(): number {
    return this.jobs.length
  }

  async submit(job: () => Promise<T>): Promise<void> {
    this.queued++
    try {
      await this.acquire()
    } finally {
      this.queued--
    }

    const settled = Promise.resolve()
      .then(job)
      .then(
        (value): PromiseSettledResult<T> => ({status: 'fulfilled', value}),
        (reason: unknown): PromiseSettledResult<T> => ({status: 'rejected', reason}),
      )
      .finally(() => this.release())

    this.jobs.push(settled)
  }

  /**
   * Wait for every started job; results are in submission order
   */
  async drain(): Promise<PromiseSettledResult<T>[]> {
    for (;;) {
      const count = this.jobs.length
      const results = await Promise.all(this.jobs)
      if (this.jobs.length === count && this.queued === 0) return results
      if (this.jobs.length === count) {
        // a queued submit has its slot; let it push the job
        await new Promise<void>(resolve => setImmediate(resolve))
      }
    }
  }

  private acquire(): Promise<void> {
    if (this.running < this.concurrency) {
      this.running++
      return Promise.resolve()
    }
    return new Promise(resolve => this.waiting.push(resolve))
  }

  private release(): void {
    const next = this.waiting.shift()
    if (next) {
      // hand the slot straight to the next waiter
      next()
    } else {
      this.running--
    }
  }
}
