class Mutex {
  private queue: Array<() => void> = [];
  private locked = false;

  get idle(): boolean {
    return !this.locked && this.queue.length === 0;
  }

  async runExclusive<T>(fn: () => Promise<T> | T): Promise<T> {
    await this.acquire();
    try {
      return await fn();
    } finally {
      this.release();
    }
  }

  private acquire(): Promise<void> {
    return new Promise<void>((resolve) => {
      const tryAcquire = () => {
        if (!this.locked) {
          this.locked = true;
          resolve();
        } else {
          this.queue.push(tryAcquire);
        }
      };
      tryAcquire();
    });
  }

  private release() {
    this.locked = false;
    const next = this.queue.shift();
    if (next) next();
  }
}

/** One FIFO mutex per key; a key's mutex is dropped once nobody holds or waits on it. */
export class KeyedMutexes {
  private map = new Map<string, Mutex>();

  private get(key: string): Mutex {
    let m = this.map.get(key);
    if (!m) {
      m = new Mutex();
      this.map.set(key, m);
    }
    return m;
  }

  get size(): number {
    return this.map.size;
  }

  async runExclusive<T>(key: string, fn: () => Promise<T> | T): Promise<T> {
    const m = this.get(key);
    try {
      return await m.runExclusive(fn);
    } finally {
      if (m.idle && this.map.get(key) === m) this.map.delete(key);
    }
  }
}
