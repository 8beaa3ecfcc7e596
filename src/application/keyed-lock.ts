/**
 * Serializes async sections that share a key.
 *
 * Each key keeps the tail of a promise chain; a new section runs after the
 * previous one settles, whether it resolved or threw. Different keys never
 * wait on each other.
 */
export class KeyedLock {
  private readonly tails = new Map<string, Promise<void>>();

  async run<T>(key: string, section: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    const result = previous.then(section);
    const tail = result.then(
      () => undefined,
      () => undefined,
    );
    this.tails.set(key, tail);

    try {
      return await result;
    } finally {
      if (this.tails.get(key) === tail) this.tails.delete(key);
    }
  }

  /** Keys with a section queued or running. */
  get size(): number {
    return this.tails.size;
  }
}
