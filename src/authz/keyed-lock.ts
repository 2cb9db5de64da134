/** Keeps the lock taken until `pending` settles, even after the task itself has returned. */
export type Hold = (pending: Promise<unknown>) => void;

const settle = (): void => undefined;

/**
 * Serializes async tasks that share a key. Tasks on different keys run
 * concurrently; a failed task does not block the ones queued behind it.
 */
export class KeyedLock {
  private tails = new Map<string, Promise<void>>();

  async run<T>(key: string, task: (hold: Hold) => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    const held: Promise<unknown>[] = [];
    const current = previous.then(() =>
      task((pending) => {
        held.push(pending);
      }),
    );
    const tail: Promise<void> = current
      .then(settle, settle)
      .then(() => Promise.allSettled(held))
      .then(() => this.release(key, tail));
    this.tails.set(key, tail);

    try {
      return await current;
    } finally {
      if (held.length === 0) this.release(key, tail);
    }
  }

  /** Acquires several keys in sorted order so overlapping callers cannot deadlock. */
  async runAll<T>(keys: string[], task: (hold: Hold) => Promise<T>): Promise<T> {
    const ordered = [...new Set(keys)].sort();
    const holds: Hold[] = [];
    const holdAll: Hold = (pending) => {
      for (const hold of holds) hold(pending);
    };
    const acquire = (index: number): Promise<T> => {
      if (index >= ordered.length) return task(holdAll);
      return this.run(ordered[index], (hold) => {
        holds.push(hold);
        return acquire(index + 1);
      });
    };
    return acquire(0);
  }

  isLocked(key: string): boolean {
    return this.tails.has(key);
  }

  private release(key: string, tail: Promise<void>): void {
    if (this.tails.get(key) === tail) this.tails.delete(key);
  }
}
