/**
 * Runs tasks one at a time in the order they were pushed.
 * A failing task rejects its own promise and does not stop the queue.
 *
 * @example
 * ```typescript
 * const queue = new TaskQueue()
 * const a = queue.run(async () => load())
 * const b = queue.run(() => apply()) // starts after `a` settles
 * ```
 */
export class TaskQueue {
  private tail: Promise<void> = Promise.resolve()
  private pending = 0

  run<T>(task: () => T | Promise<T>): Promise<T> {
    this.pending++
    const result = this.tail.then(task).finally(() => {
      this.pending--
    })
    // Failures reach the caller through `result`; the chain only waits.
    this.tail = result.then(
      () => undefined,
      () => undefined,
    )
    return result
  }

  /** Tasks pushed and not yet settled. */
  get size(): number {
    return this.pending
  }

  /** Resolves once every task pushed so far has settled. */
  idle(): Promise<void> {
    return this.tail
  }
}
