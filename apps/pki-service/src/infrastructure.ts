import type {StructuredLogger} from '@adhoc-pki/logging'
import {
  createInMemoryTtlStore,
  createRedisTtlStore,
  type RedisBinaryClient,
  type TtlStoreClient
} from '@adhoc-pki/store'
import {commandOptions, createClient} from 'redis'

import type {ServiceConfig} from './config'

export type PkiRedisClient = ReturnType<typeof createClient>

export type ProcessInfrastructure = {
  enabled: boolean
  redis: PkiRedisClient | null
  store: TtlStoreClient
  close: () => Promise<void>
}

// Attempts before a first connection is given up on.
const STARTUP_CONNECT_ATTEMPTS = 3
const MAX_RECONNECT_DELAY_MS = 2_000

// Values are raw bytes (configurations, DER certificates), never strings.
export const toRedisBinaryClient = (redis: PkiRedisClient): RedisBinaryClient => ({
  get: key => redis.get(commandOptions({returnBuffers: true}), key),
  set: (key, value, options) => redis.set(key, value, options)
})

/**
 * Delay before the next reconnect attempt, or the error that ends them. A
 * client that never reached the store stops after a few attempts so startup
 * fails; one that did keeps retrying with capped backoff.
 */
export const reconnectDelay = ({retries, connectedOnce}: {retries: number; connectedOnce: boolean}) =>
  !connectedOnce && retries >= STARTUP_CONNECT_ATTEMPTS
    ? new Error(`Shared store unreachable after ${String(retries)} attempts`)
    : Math.min((retries + 1) * 100, MAX_RECONNECT_DELAY_MS)

// quit() waits for replies that a dropped connection will never deliver
const closeClient = async (redis: PkiRedisClient) => {
  if (redis.isReady) {
    await redis.quit()
    return
  }

  if (redis.isOpen) {
    await redis.disconnect()
  }
}

const createDisabledInfrastructure = ({logger}: {logger: StructuredLogger}): ProcessInfrastructure => {
  logger.warn({
    event: 'store.disabled',
    component: 'process.infrastructure',
    message: 'Shared store disabled; registered architectures are only visible to this worker'
  })

  return {
    enabled: false,
    redis: null,
    store: createInMemoryTtlStore(),
    close: () => Promise.resolve()
  }
}

export const createProcessInfrastructure = async ({
  config,
  logger
}: {
  config: ServiceConfig
  logger: StructuredLogger
}): Promise<ProcessInfrastructure> => {
  const storeConfig = config.store
  if (!storeConfig.enabled) {
    return createDisabledInfrastructure({logger})
  }

  if (!storeConfig.redisUrl) {
    throw new Error('Shared store is enabled but PKI_SERVICE_REDIS_URL is missing')
  }

  let connectedOnce = false

  // Commands fail at once while the connection is down instead of queueing
  // until it returns; the store maps those failures to StoreUnavailableError.
  const redis = createClient({
    url: storeConfig.redisUrl,
    disableOfflineQueue: true,
    socket: {
      connectTimeout: storeConfig.redisConnectTimeoutMs,
      reconnectStrategy: retries => reconnectDelay({retries, connectedOnce})
    }
  })

  // node-redis emits errors for dropped connections; commands reject on their own.
  redis.on('error', error => {
    logger.error({
      event: 'store.connection_error',
      component: 'process.infrastructure',
      reason_code: 'store_unavailable',
      metadata: {error}
    })
  })

  try {
    await redis.connect()
    connectedOnce = true
  } catch (error) {
    await Promise.allSettled([closeClient(redis)])
    throw error
  }

  return {
    enabled: true,
    redis,
    store: createRedisTtlStore({redisClient: toRedisBinaryClient(redis)}),
    close: async () => {
      await Promise.allSettled([closeClient(redis)])
    }
  }
}
