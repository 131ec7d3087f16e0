import {LRUCache} from 'lru-cache';

/**
 * Fixed-capacity, least-recently-used cache. A capacity of 0 yields a cache
 * that never retains anything.
 */
export type BoundedCache<V> = {
  readonly capacity: number;
  get: (key: string) => V | undefined;
  set: (key: string, value: V) => void;
  delete: (key: string) => void;
  size: () => number;
};

const createDisabledCache = <V>(): BoundedCache<V> => ({
  capacity: 0,
  get: () => undefined,
  set: () => undefined,
  delete: () => undefined,
  size: () => 0
});

export const createBoundedCache = <V extends NonNullable<unknown>>({capacity}: {capacity: number}): BoundedCache<V> => {
  if (!Number.isInteger(capacity) || capacity < 0) {
    throw new RangeError(`Cache capacity must be a non-negative integer, got ${capacity}`);
  }

  if (capacity === 0) {
    return createDisabledCache<V>();
  }

  const cache = new LRUCache<string, V>({max: capacity});

  return {
    capacity,
    get: key => cache.get(key),
    set: (key, value) => {
      cache.set(key, value);
    },
    delete: key => {
      cache.delete(key);
    },
    size: () => cache.size
  };
};
