import { LRUCache } from "lru-cache";
import { appConfig } from "@/server/config";

export function createTTLCache<
  K extends NonNullable<unknown>,
  V extends NonNullable<unknown>,
>(
  ttlMs: number = appConfig.cache.ttlMs,
  max: number = appConfig.cache.maxEntries,
): LRUCache<K, V> {
  return new LRUCache<K, V>({
    max: Math.max(1, max),
    ttl: ttlMs,
    updateAgeOnGet: false,
  });
}

/**
 * Memoizes one async loader per key. Concurrent callers share the in-flight
 * promise; rejected loads are evicted so the next call retries.
 */
export function cachedLoader<V extends NonNullable<unknown>>(
  cache: LRUCache<string, Promise<V>>,
  key: string,
  load: () => Promise<V>,
): Promise<V> {
  const existing = cache.get(key);
  if (existing) return existing;
  const pending = load();
  cache.set(key, pending);
  void pending.catch(() => {
    if (cache.get(key) === pending) cache.delete(key);
  });
  return pending;
}
