import {createHash} from 'node:crypto'

import type {StructuredLogger} from '@adhoc-pki/logging'
import {
  buildArchitecture,
  isConfigurationError,
  parseArchitectureConfig,
  type BuiltArchitecture,
  type KeySet
} from '@adhoc-pki/pki'
import {isStoreUnavailableError, type TtlStoreClient} from '@adhoc-pki/store'

import type {CertificateCacheFactory} from './certificateCache'
import {badRequest, isCorruptStoreEntryError} from './errors'
import type {StoreKeyLayout} from './storeKeys'

export type ArchitectureRegistrar = {
  register: (rawConfig: Buffer) => Promise<BuiltArchitecture>
}

// Content-addressed: identical bytes always map to the same label.
export const deriveArchitectureLabel = (rawConfig: Uint8Array) =>
  createHash('sha1').update(rawConfig).digest('hex')

const describeError = (error: unknown) => (error instanceof Error ? error.message : String(error))

export const createArchitectureRegistrar = ({
  store,
  keys,
  keySets,
  externalUrlPrefix,
  archConfigTtlSeconds,
  certTtlSeconds,
  createCertificateCache,
  logger
}: {
  store: TtlStoreClient
  keys: StoreKeyLayout
  keySets: ReadonlyMap<string, KeySet>
  externalUrlPrefix: string
  archConfigTtlSeconds: number
  certTtlSeconds: number
  createCertificateCache: CertificateCacheFactory
  logger: StructuredLogger
}): ArchitectureRegistrar => {
  const reject = ({archLabel, message}: {archLabel: string; message: string}) => {
    logger.warn({
      event: 'registration.rejected',
      component: 'architecture_registrar',
      message,
      arch_label: archLabel,
      reason_code: 'configuration_invalid'
    })

    return badRequest('configuration_invalid', message)
  }

  const register = async (rawConfig: Buffer) => {
    const archLabel = deriveArchitectureLabel(rawConfig)

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
      // the shared store failed us, not the submitted configuration
      if (isStoreUnavailableError(error) || isCorruptStoreEntryError(error)) {
        throw error
      }
      if (isConfigurationError(error)) {
        throw reject({archLabel, message: error.message})
      }

      throw reject({archLabel, message: `Architecture could not be built: ${describeError(error)}`})
    }

    // Unconditional: entries under a content-derived key are byte-identical,
    // so overwriting them only extends their expiry. Certificates are
    // refreshed too, or they would lapse before the configuration and be
    // reissued with new serials and validity.
    await store.set({
      key: keys.archConfigKey(archLabel),
      value: rawConfig,
      ttlSeconds: archConfigTtlSeconds
    })
    await Promise.all(
      [...architecture.certificates.values()].map(issued =>
        store.set({
          key: keys.certificateKey(archLabel, issued.label),
          value: issued.der,
          ttlSeconds: certTtlSeconds
        })
      )
    )

    logger.info({
      event: 'registration.accepted',
      component: 'architecture_registrar',
      message: 'Architecture registered',
      arch_label: archLabel,
      metadata: {
        certificate_count: architecture.certificates.size,
        config_bytes: rawConfig.length
      }
    })

    return architecture
  }

  return {register}
}
