/**
 * Mutex-guarded container. The wrapped value is only reachable inside a
 * scoped callback, and the lock is released on every exit path of that
 * callback. Waiters acquire the lock in the order they asked for it.
 */
export class SharedStore<T> {
  private value: T;
  private tail: Promise<void> = Promise.resolve();

  constructor(initial: T) {
    this.value = initial;
  }

  async withLock<R>(fn: (value: T) => R | Promise<R>): Promise<R> {
    const release = await this.acquire();
    try {
      return await fn(this.value);
    } finally {
      release();
    }
  }

  async replace(next: T): Promise<void> {
    await this.withLock(() => {
      this.value = next;
    });
  }

  /** Replaces the value with whatever `fn` derives from the current one. */
  async update(fn: (current: T) => T | Promise<T>): Promise<T> {
    return this.withLock(async (current) => {
      const next = await fn(current);
      this.value = next;
      return next;
    });
  }

  async snapshot(): Promise<T> {
    return this.withLock((value) => value);
  }

  private acquire(): Promise<() => void> {
    const previous = this.tail;
    let release: () => void = () => {};
    this.tail = new Promise<void>((resolve) => {
      release = resolve;
    });
    return previous.then(() => release);
  }
}
