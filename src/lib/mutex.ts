/**
 * Serializes async critical sections within this process. Tasks run in the
 * order they were queued; a failing task does not block the ones after it.
 */
export class Mutex {
  private tail: Promise<void> = Promise.resolve()

  runExclusive<T>(task: () => Promise<T>): Promise<T> {
    const result = this.tail.then(task)
    this.tail = result.then(
      () => undefined,
      () => undefined,
    )
    return result
  }
}
