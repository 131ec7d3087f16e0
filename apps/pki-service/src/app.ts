import 'reflect-metadata'

import type {Server} from 'node:http'

import helmet from 'helmet'
import express from 'express'
import {NestFactory} from '@nestjs/core'
import {ExpressAdapter} from '@nestjs/platform-express'

import {createStructuredLogger, type StructuredLogger} from '@adhoc-pki/logging'
import {buildStaticArchitectures, loadStaticConfiguration, type StaticConfiguration} from '@adhoc-pki/pki'
import type {TtlStoreClient} from '@adhoc-pki/store'

import {createArchitectureRegistrar} from './architectureRegistrar'
import {createArchitectureStore} from './architectureStore'
import {createCertificateCacheFactory} from './certificateCache'
import {DEFAULT_EXTERNAL_URL_PREFIX, type ServiceConfig} from './config'
import {createProcessInfrastructure, type ProcessInfrastructure} from './infrastructure'
import {PkiServiceNestModule} from './nest/pkiServiceNestModule'
import {createStoreKeyLayout} from './storeKeys'

export const appName = 'pki-service'

const emptyStaticConfiguration = (): StaticConfiguration => ({
  keySets: new Map(),
  architectures: new Map()
})

const loadStatic = async ({config}: {config: ServiceConfig}) => {
  if (!config.staticConfigPath) {
    return emptyStaticConfiguration()
  }

  return loadStaticConfiguration({
    configPath: config.staticConfigPath,
    ...(config.keyDir ? {keyDir: config.keyDir} : {})
  })
}

/**
 * Wires one worker process. `store` and `staticConfiguration` replace the
 * Redis connection and the static configuration file when given.
 */
export const createPkiServiceApp = async ({
  config,
  logger,
  now,
  store,
  staticConfiguration
}: {
  config: ServiceConfig
  logger?: StructuredLogger
  now?: () => Date
  store?: TtlStoreClient
  staticConfiguration?: StaticConfiguration
}) => {
  const serviceLogger =
    logger ??
    createStructuredLogger({
      service: appName,
      env: config.nodeEnv,
      level: config.logging.level,
      extraSensitiveKeys: config.logging.extraSensitiveKeys
    })

  const configuration = staticConfiguration ?? (await loadStatic({config}))
  const externalUrlPrefix = config.externalUrlPrefix ?? configuration.externalUrlPrefix ?? DEFAULT_EXTERNAL_URL_PREFIX
  const staticArchitectures = await buildStaticArchitectures({configuration, externalUrlPrefix})

  let infrastructure: ProcessInfrastructure | null = null
  try {
    infrastructure = store
      ? {enabled: true, redis: null, store, close: () => Promise.resolve()}
      : await createProcessInfrastructure({config, logger: serviceLogger})
    const processInfrastructure = infrastructure

    const keys = createStoreKeyLayout({prefix: config.store.keyPrefix})
    const createCertificateCache = createCertificateCacheFactory({
      store: processInfrastructure.store,
      keys,
      ttlSeconds: config.store.certTtlSeconds,
      localCapacity: config.localCache.certificateCapacity,
      logger: serviceLogger
    })

    const registrar = createArchitectureRegistrar({
      store: processInfrastructure.store,
      keys,
      keySets: configuration.keySets,
      externalUrlPrefix,
      archConfigTtlSeconds: config.store.archConfigTtlSeconds,
      certTtlSeconds: config.store.certTtlSeconds,
      createCertificateCache,
      logger: serviceLogger
    })

    const architectureStore = createArchitectureStore({
      staticArchitectures,
      store: processInfrastructure.store,
      keys,
      keySets: configuration.keySets,
      externalUrlPrefix,
      localCapacity: config.localCache.architectureCapacity,
      createCertificateCache,
      logger: serviceLogger
    })

    const expressApp = express()
    expressApp.disable('x-powered-by')
    expressApp.use(
      helmet({
        contentSecurityPolicy: false
      })
    )

    const nestApp = await NestFactory.create(
      PkiServiceNestModule.register({
        config,
        registrar,
        architectureStore,
        logger: serviceLogger,
        ...(now ? {now} : {})
      }),
      new ExpressAdapter(expressApp),
      {
        bodyParser: false,
        logger: config.nodeEnv === 'test' ? false : ['error', 'warn', 'log']
      }
    )

    await nestApp.init()

    const server: Server = nestApp.getHttpServer()

    const start = async () => {
      await nestApp.listen(config.port, config.host)
      serviceLogger.info({
        event: 'process.started',
        component: 'process.entrypoint',
        message: 'PKI service listening',
        metadata: {
          host: config.host,
          port: config.port,
          static_architectures: [...staticArchitectures.keys()],
          shared_store: processInfrastructure.enabled
        }
      })
    }

    const stop = async () => {
      await Promise.allSettled([nestApp.close(), processInfrastructure.close()])
    }

    return {
      server,
      start,
      stop,
      registrar,
      architectureStore,
      staticArchitectures,
      infrastructure: processInfrastructure
    }
  } catch (error) {
    if (infrastructure) {
      await infrastructure.close()
    }

    throw error
  }
}

export type PkiServiceApp = Awaited<ReturnType<typeof createPkiServiceApp>>
