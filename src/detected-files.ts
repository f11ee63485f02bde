import type { DetectedFile } from './types.js';

/**
 * Detected download candidates keyed by absolute path.
 *
 * The filesystem observer inserts and the polling loop reads; both run on the
 * event loop, so each method completes without interleaving.
 */
export class DetectedFileRegistry {
  private readonly files = new Map<string, DetectedFile>();

  add(path: string, now: number = Date.now()): boolean {
    if (this.files.has(path)) {
      return false;
    }

    this.files.set(path, { path, firstSeenAt: now, stabilized: false });
    return true;
  }

  has(path: string): boolean {
    return this.files.has(path);
  }

  markStabilized(path: string): void {
    const file = this.files.get(path);

    if (file) {
      file.stabilized = true;
    }
  }

  pending(): string[] {
    return Array.from(this.files.values())
      .filter((file) => !file.stabilized)
      .sort((a, b) => a.firstSeenAt - b.firstSeenAt)
      .map((file) => file.path);
  }

  clear(): void {
    this.files.clear();
  }
}

export class AsyncQueue<T> {
  private items: T[] = [];
  private readonly waiters = new Set<() => void>();

  push(item: T): void {
    this.items.push(item);
    this.wake();
  }

  drain(): T[] {
    const drained = this.items;
    this.items = [];
    return drained;
  }

  clear(): void {
    this.items = [];
    this.wake();
  }

  // Wakes current waiters without enqueueing anything.
  wake(): void {
    for (const waiter of Array.from(this.waiters)) {
      waiter();
    }
  }

  /**
   * Resolves when an item is pushed, `wake()` is called, the signal aborts or
   * `timeoutMs` elapses, whichever comes first.
   */
  wait(timeoutMs: number, signal?: AbortSignal): Promise<void> {
    if (this.items.length > 0 || signal?.aborted) {
      return Promise.resolve();
    }

    return new Promise<void>((resolve) => {
      const done = (): void => {
        clearTimeout(timer);
        signal?.removeEventListener('abort', done);
        this.waiters.delete(done);
        resolve();
      };

      const timer = setTimeout(done, timeoutMs);
      signal?.addEventListener('abort', done, { once: true });
      this.waiters.add(done);
    });
  }
}
