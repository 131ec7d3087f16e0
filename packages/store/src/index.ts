export {createBoundedCache, type BoundedCache} from './boundedCache';
export {isStoreUnavailableError, StoreUnavailableError, type StoreOperation} from './errors';
export {createInMemoryTtlStore, type InMemoryTtlStore} from './inMemoryTtlStore';
export {createRedisTtlStore} from './redisTtlStore';
export type {RedisBinaryClient, RedisBinarySetOptions, TtlStoreClient} from './types';
