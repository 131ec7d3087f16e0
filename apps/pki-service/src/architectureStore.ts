import type {StructuredLogger} from '@adhoc-pki/logging'
import {
  buildArchitecture,
  isConfigurationError,
  parseArchitectureConfig,
  type BuiltArchitecture,
  type KeySet
} from '@adhoc-pki/pki'
import {createBoundedCache, type TtlStoreClient} from '@adhoc-pki/store'

import type {CertificateCacheFactory} from './certificateCache'
import {internal, notFound} from './errors'
import type {StoreKeyLayout} from './storeKeys'

export type ArchitectureSource = 'static' | 'local_cache' | 'shared_store'

export type ArchitectureStore = {
  resolve: (archLabel: string) => Promise<BuiltArchitecture>
  // seeds the local layer, e.g. right after a registration
  remember: (architecture: BuiltArchitecture) => void
}

/**
 * Lookup chain: static architectures, then the bounded local cache, then
 * the raw configuration in the shared store (rebuilt on demand). Concurrent
 * resolutions of one label share a single rebuild; failures are not kept.
 */
export const createArchitectureStore = ({
  staticArchitectures,
  store,
  keys,
  keySets,
  externalUrlPrefix,
  localCapacity,
  createCertificateCache,
  logger
}: {
  staticArchitectures: ReadonlyMap<string, BuiltArchitecture>
  store: TtlStoreClient
  keys: StoreKeyLayout
  keySets: ReadonlyMap<string, KeySet>
  externalUrlPrefix: string
  localCapacity: number
  createCertificateCache: CertificateCacheFactory
  logger: StructuredLogger
}): ArchitectureStore => {
  const local = createBoundedCache<BuiltArchitecture>({capacity: localCapacity})
  const pending = new Map<string, Promise<BuiltArchitecture>>()

  const logResolved = ({archLabel, source}: {archLabel: string; source: ArchitectureSource}) => {
    logger.debug({
      event: 'architecture.resolved',
      component: 'architecture_store',
      arch_label: archLabel,
      metadata: {source}
    })
  }

  const rebuild = async (archLabel: string) => {
    const rawConfig = await store.get(keys.archConfigKey(archLabel))
    if (!rawConfig) {
      logger.info({
        event: 'architecture.not_found',
        component: 'architecture_store',
        message: 'Architecture is not known to this worker or the shared store',
        arch_label: archLabel,
        reason_code: 'architecture_not_found'
      })
      throw notFound('architecture_not_found', `Architecture ${archLabel} is not known`)
    }

    let architecture: BuiltArchitecture
    try {
      architecture = await buildArchitecture({
        label: archLabel,
        config: parseArchitectureConfig(rawConfig),
        keySets,
        externalUrlPrefix,
        certCache: createCertificateCache(archLabel)
      })
    } catch (error) {
      if (!isConfigurationError(error)) {
        throw error
      }

      // The stored bytes were accepted once, so only a key-set change gets here.
      logger.error({
        event: 'architecture.rebuild_failed',
        component: 'architecture_store',
        message: error.message,
        arch_label: archLabel,
        reason_code: 'stored_configuration_invalid'
      })
      throw internal('stored_configuration_invalid', `Stored configuration of architecture ${archLabel} cannot be rebuilt`)
    }

    local.set(archLabel, architecture)
    logResolved({archLabel, source: 'shared_store'})
    return architecture
  }

  const resolve = async (archLabel: string) => {
    const staticArchitecture = staticArchitectures.get(archLabel)
    if (staticArchitecture) {
      logResolved({archLabel, source: 'static'})
      return staticArchitecture
    }

    const cached = local.get(archLabel)
    if (cached) {
      logResolved({archLabel, source: 'local_cache'})
      return cached
    }

    const inFlight = pending.get(archLabel)
    if (inFlight) {
      return inFlight
    }

    const building = rebuild(archLabel).finally(() => {
      pending.delete(archLabel)
    })
    pending.set(archLabel, building)
    return building
  }

  return {
    resolve,
    remember: architecture => {
      if (!staticArchitectures.has(architecture.label)) {
        local.set(architecture.label, architecture)
      }
    }
  }
}
