import {LogLevelSchema, type LogLevel} from '@adhoc-pki/logging'
import {z} from 'zod'

const integerFromEnv = z.preprocess(value => {
  if (typeof value !== 'string' || value.trim().length === 0) {
    return value
  }

  const parsed = Number.parseInt(value, 10)
  return Number.isNaN(parsed) ? value : parsed
}, z.number().int())

const numberFromEnv = integerFromEnv.pipe(z.number().int().positive())

// 0 turns the corresponding local cache layer off
const capacityFromEnv = integerFromEnv.pipe(z.number().int().gte(0))

const booleanFromEnv = z.preprocess(value => {
  if (typeof value !== 'string') {
    return value
  }

  const normalized = value.trim().toLowerCase()
  if (normalized === 'true' || normalized === '1') {
    return true
  }
  if (normalized === 'false' || normalized === '0') {
    return false
  }

  return value
}, z.boolean())

const optionalString = z.preprocess(value => {
  if (typeof value !== 'string') {
    return undefined
  }

  const trimmed = value.trim()
  return trimmed.length === 0 ? undefined : trimmed
}, z.string().optional())

const envSchema = z
  .object({
    NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
    PKI_SERVICE_HOST: z.string().default('0.0.0.0'),
    PKI_SERVICE_PORT: numberFromEnv.default(9000),
    PKI_SERVICE_REGISTRATION_PATH: z
      .string()
      .regex(/^\/[^?#]*$/u, 'PKI_SERVICE_REGISTRATION_PATH must be an absolute path')
      .default('/config'),
    PKI_SERVICE_MAX_BODY_BYTES: numberFromEnv.default(1024 * 1024),
    PKI_SERVICE_CONFIG_PATH: optionalString,
    PKI_SERVICE_KEY_DIR: optionalString,
    PKI_SERVICE_EXTERNAL_URL_PREFIX: optionalString.pipe(z.url().optional()),
    PKI_SERVICE_STORE_ENABLED: booleanFromEnv.optional(),
    PKI_SERVICE_REDIS_URL: optionalString,
    PKI_SERVICE_REDIS_CONNECT_TIMEOUT_MS: numberFromEnv.default(2_000),
    PKI_SERVICE_STORE_KEY_PREFIX: z.string().regex(/^[A-Za-z0-9:._-]+$/u).default('certomancer'),
    PKI_SERVICE_ARCH_CONFIG_TTL_SECONDS: numberFromEnv.default(3600),
    PKI_SERVICE_CERT_TTL_SECONDS: numberFromEnv.default(3600),
    PKI_SERVICE_LOCAL_ARCH_CACHE_SIZE: capacityFromEnv.default(32),
    PKI_SERVICE_LOCAL_CERT_CACHE_SIZE: capacityFromEnv.default(16),
    PKI_SERVICE_LOG_LEVEL: LogLevelSchema.optional(),
    PKI_SERVICE_LOG_REDACT_EXTRA_KEYS: optionalString
  })
  .strict()

export type ServiceConfig = {
  nodeEnv: 'development' | 'test' | 'production'
  host: string
  port: number
  registrationPath: string
  maxBodyBytes: number
  staticConfigPath?: string
  keyDir?: string
  // explicit override; otherwise the static file's prefix, then the default
  externalUrlPrefix?: string
  logging: {
    level: LogLevel
    extraSensitiveKeys: string[]
  }
  store: {
    enabled: boolean
    redisUrl?: string
    redisConnectTimeoutMs: number
    keyPrefix: string
    archConfigTtlSeconds: number
    certTtlSeconds: number
  }
  localCache: {
    architectureCapacity: number
    certificateCapacity: number
  }
}

export const DEFAULT_EXTERNAL_URL_PREFIX = 'http://localhost:9000'

const toEnvInput = (env: NodeJS.ProcessEnv) => ({
  NODE_ENV: env.NODE_ENV,
  PKI_SERVICE_HOST: env.PKI_SERVICE_HOST,
  PKI_SERVICE_PORT: env.PKI_SERVICE_PORT,
  PKI_SERVICE_REGISTRATION_PATH: env.PKI_SERVICE_REGISTRATION_PATH,
  PKI_SERVICE_MAX_BODY_BYTES: env.PKI_SERVICE_MAX_BODY_BYTES,
  PKI_SERVICE_CONFIG_PATH: env.PKI_SERVICE_CONFIG_PATH,
  PKI_SERVICE_KEY_DIR: env.PKI_SERVICE_KEY_DIR,
  PKI_SERVICE_EXTERNAL_URL_PREFIX: env.PKI_SERVICE_EXTERNAL_URL_PREFIX,
  PKI_SERVICE_STORE_ENABLED: env.PKI_SERVICE_STORE_ENABLED,
  PKI_SERVICE_REDIS_URL: env.PKI_SERVICE_REDIS_URL,
  PKI_SERVICE_REDIS_CONNECT_TIMEOUT_MS: env.PKI_SERVICE_REDIS_CONNECT_TIMEOUT_MS,
  PKI_SERVICE_STORE_KEY_PREFIX: env.PKI_SERVICE_STORE_KEY_PREFIX,
  PKI_SERVICE_ARCH_CONFIG_TTL_SECONDS: env.PKI_SERVICE_ARCH_CONFIG_TTL_SECONDS,
  PKI_SERVICE_CERT_TTL_SECONDS: env.PKI_SERVICE_CERT_TTL_SECONDS,
  PKI_SERVICE_LOCAL_ARCH_CACHE_SIZE: env.PKI_SERVICE_LOCAL_ARCH_CACHE_SIZE,
  PKI_SERVICE_LOCAL_CERT_CACHE_SIZE: env.PKI_SERVICE_LOCAL_CERT_CACHE_SIZE,
  PKI_SERVICE_LOG_LEVEL: env.PKI_SERVICE_LOG_LEVEL,
  PKI_SERVICE_LOG_REDACT_EXTRA_KEYS: env.PKI_SERVICE_LOG_REDACT_EXTRA_KEYS
})

const parseKeyList = (raw: string | undefined) =>
  (raw ?? '')
    .split(',')
    .map(value => value.trim())
    .filter(value => value.length > 0)

export const loadConfig = (env: NodeJS.ProcessEnv = process.env): ServiceConfig => {
  const parsed = envSchema.parse(toEnvInput(env))

  const storeEnabled = parsed.PKI_SERVICE_STORE_ENABLED ?? parsed.NODE_ENV !== 'test'
  if (storeEnabled && !parsed.PKI_SERVICE_REDIS_URL) {
    throw new Error('PKI_SERVICE_REDIS_URL is required when the shared store is enabled')
  }

  return {
    nodeEnv: parsed.NODE_ENV,
    host: parsed.PKI_SERVICE_HOST,
    port: parsed.PKI_SERVICE_PORT,
    registrationPath: parsed.PKI_SERVICE_REGISTRATION_PATH,
    maxBodyBytes: parsed.PKI_SERVICE_MAX_BODY_BYTES,
    ...(parsed.PKI_SERVICE_CONFIG_PATH ? {staticConfigPath: parsed.PKI_SERVICE_CONFIG_PATH} : {}),
    ...(parsed.PKI_SERVICE_KEY_DIR ? {keyDir: parsed.PKI_SERVICE_KEY_DIR} : {}),
    ...(parsed.PKI_SERVICE_EXTERNAL_URL_PREFIX
      ? {externalUrlPrefix: parsed.PKI_SERVICE_EXTERNAL_URL_PREFIX}
      : {}),
    logging: {
      level: parsed.PKI_SERVICE_LOG_LEVEL ?? (parsed.NODE_ENV === 'test' ? 'silent' : 'info'),
      extraSensitiveKeys: parseKeyList(parsed.PKI_SERVICE_LOG_REDACT_EXTRA_KEYS)
    },
    store: {
      enabled: storeEnabled,
      ...(parsed.PKI_SERVICE_REDIS_URL ? {redisUrl: parsed.PKI_SERVICE_REDIS_URL} : {}),
      redisConnectTimeoutMs: parsed.PKI_SERVICE_REDIS_CONNECT_TIMEOUT_MS,
      keyPrefix: parsed.PKI_SERVICE_STORE_KEY_PREFIX,
      archConfigTtlSeconds: parsed.PKI_SERVICE_ARCH_CONFIG_TTL_SECONDS,
      certTtlSeconds: parsed.PKI_SERVICE_CERT_TTL_SECONDS
    },
    localCache: {
      architectureCapacity: parsed.PKI_SERVICE_LOCAL_ARCH_CACHE_SIZE,
      certificateCapacity: parsed.PKI_SERVICE_LOCAL_CERT_CACHE_SIZE
    }
  }
}
