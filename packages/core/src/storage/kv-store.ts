/**
 * Durable record store interface and an in-memory implementation
 * @module @tidewater/core/storage/kv-store
 */

export interface KeyValueEntry {
  key: string;
  value: string;
}

/**
 * The external record store. Implementations must make `put` and `delete`
 * visible to subsequent reads.
 */
export interface KeyValueStore {
  get(key: string): Promise<string | undefined>;
  put(key: string, value: string): Promise<void>;
  /** Resolves true when a value was removed */
  delete(key: string): Promise<boolean>;
  /** Entries whose key starts with `prefix`, in key order */
  list(prefix: string): Promise<KeyValueEntry[]>;
}

export class InMemoryKeyValueStore implements KeyValueStore {
  private readonly entries = new Map<string, string>();

  async get(key: string): Promise<string | undefined> {
    return this.entries.get(key);
  }

  async put(key: string, value: string): Promise<void> {
    this.entries.set(key, value);
  }

  async delete(key: string): Promise<boolean> {
    return this.entries.delete(key);
  }

  async list(prefix: string): Promise<KeyValueEntry[]> {
    return [...this.entries.entries()]
      .filter(([key]) => key.startsWith(prefix))
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
      .map(([key, value]) => ({ key, value }));
  }

  get size(): number {
    return this.entries.size;
  }
}
