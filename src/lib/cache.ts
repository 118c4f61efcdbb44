type CacheEntry<T> = {
  value: T;
  expiresAt: number;
};

const memoryCache = new Map<string, CacheEntry<unknown>>();
const pendingLoads = new Map<string, Promise<unknown>>();

export function getCached<T>(key: string): T | undefined {
  const entry = memoryCache.get(key);
  if (!entry) {
    return undefined;
  }

  if (entry.expiresAt <= Date.now()) {
    memoryCache.delete(key);
    return undefined;
  }

  return entry.value as T;
}

export function setCached<T>(key: string, value: T, ttlMs: number): void {
  memoryCache.set(key, {
    value,
    expiresAt: Date.now() + ttlMs
  });
}

/**
 * Returns the cached value for `key`, or runs `load` once and caches its
 * result. Concurrent callers for the same key share one pending load; a
 * rejected load is not cached.
 */
export async function getOrLoad<T>(key: string, ttlMs: number, load: () => Promise<T>): Promise<T> {
  const cached = getCached<T>(key);
  if (cached !== undefined) {
    return cached;
  }

  const pending = pendingLoads.get(key);
  if (pending) {
    return pending as Promise<T>;
  }

  const promise = load()
    .then((value) => {
      setCached(key, value, ttlMs);
      return value;
    })
    .finally(() => {
      pendingLoads.delete(key);
    });

  pendingLoads.set(key, promise);
  return promise;
}

export function clearCache(): void {
  memoryCache.clear();
  pendingLoads.clear();
}
