import {StoreUnavailableError} from './errors';
import type {RedisBinaryClient, TtlStoreClient} from './types';
import {StoreKeySchema, StoreSetInputSchema} from './validation';

export const createRedisTtlStore = ({redisClient}: {redisClient: RedisBinaryClient}): TtlStoreClient => ({
  get: async key => {
    const parsedKey = StoreKeySchema.parse(key);

    let result: Buffer | null;
    try {
      result = await redisClient.get(parsedKey);
    } catch (error) {
      throw new StoreUnavailableError({operation: 'get', key: parsedKey, cause: error});
    }

    return result ?? undefined;
  },
  set: async input => {
    const {key, value, ttlSeconds} = StoreSetInputSchema.parse(input);

    try {
      await redisClient.set(key, value, {EX: ttlSeconds});
    } catch (error) {
      throw new StoreUnavailableError({operation: 'set', key, cause: error});
    }
  }
});
