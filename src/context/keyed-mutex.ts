/**
 * Per-key async critical sections.
 *
 * Tasks sharing a key run strictly one after another in arrival order; tasks
 * under different keys never wait on each other. A failed task releases its
 * key like a successful one.
 */
export class KeyedMutex {
  private readonly tails = new Map<string, Promise<void>>()

  async run<T>(key: string, task: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve()
    const result = previous.then(task)
    const tail = result.then(
      () => undefined,
      () => undefined,
    )
    this.tails.set(key, tail)

    try {
      return await result
    } finally {
      if (this.tails.get(key) === tail) this.tails.delete(key)
    }
  }

  /** Keys with a task running or queued. */
  get activeKeys(): number {
    return this.tails.size
  }
}
