/**
 * REQUEST COALESCER
 * =================
 *
 * Anti-stampede pattern: concurrent callers asking for the same key share
 * one in-flight promise. The key is released once the promise settles.
 */

export class RequestCoalescer<T> {
  private inflight = new Map<string, Promise<T>>();

  run(key: string, fn: () => Promise<T>): Promise<T> {
    const existing = this.inflight.get(key);
    if (existing) {
      return existing;
    }

    const p = (async () => {
      try {
        return await fn();
      } finally {
        this.inflight.delete(key);
      }
    })();

    this.inflight.set(key, p);
    return p;
  }

  isInFlight(key: string): boolean {
    return this.inflight.has(key);
  }

  size(): number {
    return this.inflight.size;
  }
}
