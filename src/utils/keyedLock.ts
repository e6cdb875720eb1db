import pLimit from 'p-limit';

interface Entry {
  limit: ReturnType<typeof pLimit>;
  holders: number;
}

/**
 * One single-slot queue per key. A key's entry lives only while some
 * caller is running or waiting on it.
 */
export class KeyedLock {
  private readonly entries = new Map<string, Entry>();

  async run<T>(key: string, fn: () => Promise<T>): Promise<T> {
    let entry = this.entries.get(key);
    if (!entry) {
      entry = { limit: pLimit(1), holders: 0 };
      this.entries.set(key, entry);
    }
    entry.holders += 1;
    try {
      return await entry.limit(fn);
    } finally {
      entry.holders -= 1;
      if (entry.holders === 0 && this.entries.get(key) === entry) {
        this.entries.delete(key);
      }
    }
  }

  get size(): number {
    return this.entries.size;
  }
}
