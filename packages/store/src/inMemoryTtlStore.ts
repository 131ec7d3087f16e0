import type {TtlStoreClient} from './types';
import {StoreKeySchema, StoreSetInputSchema} from './validation';

type Entry = {
  value: Buffer;
  expiresAtMs: number;
};

export type InMemoryTtlStore = TtlStoreClient & {
  expiresAt: (key: string) => Date | undefined;
  size: () => number;
};

/**
 * Process-local stand-in for the shared store. Used when no Redis is
 * configured and by tests; entries expire against the injected clock.
 */
export const createInMemoryTtlStore = ({now = () => new Date()}: {now?: () => Date} = {}): InMemoryTtlStore => {
  const entries = new Map<string, Entry>();

  const readLive = (key: string): Entry | undefined => {
    const entry = entries.get(key);
    if (!entry) {
      return undefined;
    }

    if (entry.expiresAtMs <= now().getTime()) {
      entries.delete(key);
      return undefined;
    }

    return entry;
  };

  return {
    get: key => {
      const entry = readLive(StoreKeySchema.parse(key));
      return Promise.resolve(entry ? Buffer.from(entry.value) : undefined);
    },
    set: input => {
      const {key, value, ttlSeconds} = StoreSetInputSchema.parse(input);
      entries.set(key, {
        value: Buffer.from(value),
        expiresAtMs: now().getTime() + ttlSeconds * 1000
      });
      return Promise.resolve();
    },
    expiresAt: key => {
      const entry = readLive(key);
      return entry ? new Date(entry.expiresAtMs) : undefined;
    },
    size: () => [...entries.keys()].filter(key => readLive(key) !== undefined).length
  };
};
