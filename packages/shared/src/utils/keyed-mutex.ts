/**
 * KeyedMutex - serializes async work per key.
 *
 * Callers sharing a key run one after another in arrival order; callers with
 * different keys never wait on each other. A rejected task does not block the
 * tasks queued behind it.
 *
 * @example
 * ```typescript
 * const mutex = new KeyedMutex();
 * await mutex.runExclusive('job-1', () => store.updateJob(...));
 * ```
 */
export class KeyedMutex {
  private readonly tails = new Map<string, Promise<void>>();

  async runExclusive<T>(key: string, task: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();

    let release: () => void = () => {};
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });
    const tail = previous.then(() => current);
    this.tails.set(key, tail);

    await previous;
    try {
      return await task();
    } finally {
      release();
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    }
  }
}
