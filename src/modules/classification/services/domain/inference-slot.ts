/**
 * Runs tasks one at a time in submission order. A rejected task does not
 * block the tasks queued behind it.
 */
export class InferenceSlot {
  private tail: Promise<void> = Promise.resolve()

  run<T>(task: () => Promise<T>): Promise<T> {
    const result = this.tail.then(task)
    this.tail = result.then(
      () => undefined,
      () => undefined
    )
    return result
  }
}
