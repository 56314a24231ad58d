/**
 * Runs tasks one at a time in the order they were submitted. A failing task
 * rejects its own promise only; later tasks still run.
 */
export class SerialQueue {
  private tail: Promise<void> = Promise.resolve()
  private pendingCount = 0

  get pending(): number {
    return this.pendingCount
  }

  run<T>(task: () => Promise<T>): Promise<T> {
    this.pendingCount += 1
    const result = this.tail.then(task)
    this.tail = result.then(
      () => this.release(),
      () => this.release(),
    )
    return result
  }

  private release(): void {
    this.pendingCount -= 1
  }
}
