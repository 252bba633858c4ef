/**
 * Simple in-process mutex for serializing async work on a shared key
 */
export class Mutex {
  #queue: Array<() => void> = [];
  #locked = false;

  async acquire(): Promise<void> {
    if (!this.#locked) {
      this.#locked = true;
      return;
    }

    await new Promise<void>((resolve) => {
      this.#queue.push(resolve);
    });
  }

  release(): void {
    const next = this.#queue.shift();
    if (next) {
      next();
    } else {
      this.#locked = false;
    }
  }

  get locked(): boolean {
    return this.#locked;
  }

  async withLock<T>(fn: () => Promise<T>): Promise<T> {
    await this.acquire();
    try {
      return await fn();
    } finally {
      this.release();
    }
  }
}

/**
 * Lazily created mutexes, one per key
 */
export class KeyedMutex {
  #mutexes = new Map<string, Mutex>();

  get(key: string): Mutex {
    let mutex = this.#mutexes.get(key);
    if (!mutex) {
      mutex = new Mutex();
      this.#mutexes.set(key, mutex);
    }
    return mutex;
  }

  async withLock<T>(key: string, fn: () => Promise<T>): Promise<T> {
    const mutex = this.get(key);
    try {
      return await mutex.withLock(fn);
    } finally {
      // Drop idle mutexes so the map tracks only keys with work in flight
      if (!mutex.locked && this.#mutexes.get(key) === mutex) {
        this.#mutexes.delete(key);
      }
    }
  }
}
