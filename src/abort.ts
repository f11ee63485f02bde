/**
 * Resolves `true` after `ms`, or `false` as soon as `signal` aborts.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<boolean> {
  if (signal?.aborted) {
    return Promise.resolve(false);
  }

  return new Promise((resolve) => {
    const onAbort = (): void => {
      clearTimeout(timer);
      resolve(false);
    };

    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve(true);
    }, ms);

    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

export interface LinkedAbort {
  signal: AbortSignal;
  abort(): void;
  dispose(): void;
}

/**
 * A controller that aborts when `parent` aborts or after `timeoutMs`.
 * `dispose()` clears the timer and detaches from the parent.
 */
export function linkAbort(parent?: AbortSignal, timeoutMs?: number): LinkedAbort {
  const controller = new AbortController();
  const abort = (): void => controller.abort();
  const timer = timeoutMs === undefined ? null : setTimeout(abort, timeoutMs);

  if (parent?.aborted) {
    controller.abort();
  } else {
    parent?.addEventListener('abort', abort, { once: true });
  }

  return {
    signal: controller.signal,
    abort,
    dispose() {
      if (timer) {
        clearTimeout(timer);
      }

      parent?.removeEventListener('abort', abort);
    },
  };
}
