export type RedisBinarySetOptions = {
  EX: number;
};

/**
 * The subset of a Redis client the TTL store needs. Values travel as raw
 * bytes so that stored configurations and DER certificates round-trip
 * unchanged.
 */
export type RedisBinaryClient = {
  get: (key: string) => Promise<Buffer | null> | Buffer | null;
  set: (key: string, value: Buffer, options: RedisBinarySetOptions) => Promise<unknown> | unknown;
};

/**
 * Shared key/value store used as the only coordination medium between
 * worker processes. `set` always overwrites and always (re)sets the expiry.
 */
export type TtlStoreClient = {
  get: (key: string) => Promise<Buffer | undefined>;
  set: (input: {key: string; value: Buffer; ttlSeconds: number}) => Promise<void>;
};
