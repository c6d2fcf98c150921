/**
 * Coalesces concurrent calls for the same key into one in-flight promise
 * @module @tidewater/core/concurrency/single-flight
 */

export class SingleFlight<T> {
  private readonly inflight = new Map<string, Promise<T>>();

  /**
   * Join the in-flight call for `key`, or start one with `fn`. The key is
   * forgotten once the call settles, so failures are not cached.
   */
  do(key: string, fn: () => Promise<T>): Promise<T> {
    const existing = this.inflight.get(key);
    if (existing) {
      return existing;
    }

    const call = Promise.resolve()
      .then(fn)
      .finally(() => {
        if (this.inflight.get(key) === call) {
          this.inflight.delete(key);
        }
      });
    this.inflight.set(key, call);
    return call;
  }

  isInFlight(key: string): boolean {
    return this.inflight.has(key);
  }

  get size(): number {
    return this.inflight.size;
  }
}
