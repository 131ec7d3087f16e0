import type {StructuredLogger} from '@adhoc-pki/logging'
import {CertificateNotCachedError, type CertificateCache} from '@adhoc-pki/pki'
import {createBoundedCache, type TtlStoreClient} from '@adhoc-pki/store'
import * as x509 from '@peculiar/x509'

import {CorruptStoreEntryError} from './errors'
import type {StoreKeyLayout} from './storeKeys'

export type CertificateCacheFactory = (archLabel: string) => CertificateCache

// `put` is checked at run time: anything but a certificate is a programming error.
export type SharedCertificateCache = {
  get: CertificateCache['get']
  put: (certLabel: string, certificate: unknown) => Promise<void>
}

const decodeStoredCertificate = ({key, value}: {key: string; value: Buffer}) => {
  try {
    return new x509.X509Certificate(Uint8Array.from(value))
  } catch (error) {
    throw new CorruptStoreEntryError({key, cause: error})
  }
}

/**
 * Certificate cache of one architecture, backed by the shared store with a
 * bounded in-process layer in front of it. Entries are write-once per
 * (architecture, certificate) key, so the local layer is never invalidated.
 */
export const createSharedCertificateCache = ({
  archLabel,
  store,
  keys,
  ttlSeconds,
  localCapacity,
  logger
}: {
  archLabel: string
  store: TtlStoreClient
  keys: StoreKeyLayout
  ttlSeconds: number
  localCapacity: number
  logger: StructuredLogger
}): SharedCertificateCache => {
  const local = createBoundedCache<x509.X509Certificate>({capacity: localCapacity})

  return {
    get: async certLabel => {
      const cached = local.get(certLabel)
      if (cached) {
        logger.debug({
          event: 'certificate_cache.hit',
          component: 'certificate_cache',
          arch_label: archLabel,
          cert_label: certLabel,
          metadata: {source: 'local_cache'}
        })
        return cached
      }

      const key = keys.certificateKey(archLabel, certLabel)
      const stored = await store.get(key)
      if (!stored) {
        logger.debug({
          event: 'certificate_cache.miss',
          component: 'certificate_cache',
          arch_label: archLabel,
          cert_label: certLabel
        })
        throw new CertificateNotCachedError(certLabel)
      }

      const certificate = decodeStoredCertificate({key, value: stored})
      local.set(certLabel, certificate)
      logger.debug({
        event: 'certificate_cache.hit',
        component: 'certificate_cache',
        arch_label: archLabel,
        cert_label: certLabel,
        metadata: {source: 'shared_store'}
      })
      return certificate
    },
    put: async (certLabel, certificate) => {
      if (!(certificate instanceof x509.X509Certificate)) {
        throw new TypeError(`Certificate cache only accepts X.509 certificates (label ${certLabel})`)
      }

      await store.set({
        key: keys.certificateKey(archLabel, certLabel),
        value: Buffer.from(certificate.rawData),
        ttlSeconds
      })
      local.set(certLabel, certificate)
    }
  }
}

export const createCertificateCacheFactory =
  (options: Omit<Parameters<typeof createSharedCertificateCache>[0], 'archLabel'>): CertificateCacheFactory =>
  archLabel =>
    createSharedCertificateCache({...options, archLabel})
