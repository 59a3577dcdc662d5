/**
 * Async locks.
 *
 * Mutex serializes a critical section; KeyedLock hands out one Mutex per key
 * so work on different keys never waits on each other. Entries for idle keys
 * are dropped as soon as the last holder releases.
 */

export class Mutex {
  private queue: Array<() => void> = [];
  private locked = false;

  async acquire(): Promise<void> {
    if (!this.locked) {
      this.locked = true;
      return;
    }

    return new Promise<void>((resolve) => {
      this.queue.push(resolve);
    });
  }

  release(): void {
    const next = this.queue.shift();
    if (next !== undefined) {
      next();
    } else {
      this.locked = false;
    }
  }

  get isLocked(): boolean {
    return this.locked;
  }

  /**
   * Execute fn with exclusive lock
   */
  async withLock<T>(fn: () => Promise<T>): Promise<T> {
    await this.acquire();
    try {
      return await fn();
    } finally {
      this.release();
    }
  }
}

interface KeyedSlot {
  mutex: Mutex;
  users: number;
}

export class KeyedLock {
  private readonly slots = new Map<string, KeyedSlot>();

  /**
   * Execute fn while holding the lock for key
   */
  async withLock<T>(key: string, fn: () => Promise<T>): Promise<T> {
    let slot = this.slots.get(key);
    if (slot === undefined) {
      slot = { mutex: new Mutex(), users: 0 };
      this.slots.set(key, slot);
    }
    slot.users += 1;

    try {
      return await slot.mutex.withLock(fn);
    } finally {
      slot.users -= 1;
      if (slot.users === 0) {
        this.slots.delete(key);
      }
    }
  }

  isLocked(key: string): boolean {
    return this.slots.get(key)?.mutex.isLocked ?? false;
  }

  /** Number of keys currently held or waited on */
  get size(): number {
    return this.slots.size;
  }
}
