export class Mutex {
  private queue: Promise<void> = Promise.resolve();

  async lock(): Promise<() => void> {
    let unlockNext: () => void = () => undefined;
    const willLock = new Promise<void>((resolve) => {
      unlockNext = resolve;
    });

    const previous = this.queue;
    this.queue = this.queue.then(() => willLock);
    await previous;

    let released = false;
    return () => {
      if (!released) {
        released = true;
        unlockNext();
      }
    };
  }

  async runExclusive<T>(fn: () => Promise<T> | T): Promise<T> {
    const release = await this.lock();
    try {
      return await fn();
    } finally {
      release();
    }
  }
}

/**
 * One mutex per key, dropped once nobody holds or waits on it so that the map
 * does not grow with every request id ever touched.
 */
export class KeyedMutex {
  private readonly entries = new Map<string, { mutex: Mutex; holders: number }>();

  async runExclusive<T>(key: string, fn: () => Promise<T> | T): Promise<T> {
    let entry = this.entries.get(key);
    if (!entry) {
      entry = { mutex: new Mutex(), holders: 0 };
      this.entries.set(key, entry);
    }
    entry.holders += 1;
    const held = entry;
    try {
      return await held.mutex.runExclusive(fn);
    } finally {
      held.holders -= 1;
      if (held.holders === 0 && this.entries.get(key) === held) {
        this.entries.delete(key);
      }
    }
  }

  get size(): number {
    return this.entries.size;
  }
}
