/** Single-owner lock; waiters are served in arrival order */
export interface Mutex {
  readonly locked: boolean;
  /**
   * Wait for the lock and return its release function.
   * Rejects with the signal's reason if aborted before the lock is granted.
   */
  acquire(signal?: AbortSignal): Promise<() => void>;
  /** Run `fn` while holding the lock */
  runExclusive<T>(fn: () => Promise<T>, signal?: AbortSignal): Promise<T>;
}

export function createMutex(): Mutex {
  let locked = false;
  const waiters: Array<() => void> = [];

  function release(): void {
    const next = waiters.shift();
    if (next) {
      next();
    } else {
      locked = false;
    }
  }

  function releaser(): () => void {
    let released = false;
    return () => {
      if (released) return;
      released = true;
      release();
    };
  }

  function acquire(signal?: AbortSignal): Promise<() => void> {
    if (signal?.aborted) return Promise.reject(signal.reason);
    if (!locked) {
      locked = true;
      return Promise.resolve(releaser());
    }

    return new Promise((resolve, reject) => {
      const grant = () => {
        signal?.removeEventListener('abort', onAbort);
        resolve(releaser());
      };
      const onAbort = () => {
        const index = waiters.indexOf(grant);
        if (index >= 0) waiters.splice(index, 1);
        reject(signal?.reason);
      };
      waiters.push(grant);
      signal?.addEventListener('abort', onAbort, { once: true });
    });
  }

  return {
    get locked() {
      return locked;
    },
    acquire,
    async runExclusive<T>(fn: () => Promise<T>, signal?: AbortSignal) {
      const unlock = await acquire(signal);
      try {
        return await fn();
      } finally {
        unlock();
      }
    },
  };
}
