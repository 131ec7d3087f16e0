import {createHash} from 'node:crypto'

import {createNoopLogger, type StructuredLogger} from '@adhoc-pki/logging'
import {toArchitectureBundle} from '@adhoc-pki/pki'
import {createInMemoryTtlStore, StoreUnavailableError, type TtlStoreClient} from '@adhoc-pki/store'
import {describe, expect, it, vi} from 'vitest'

import {createArchitectureRegistrar, deriveArchitectureLabel} from '../architectureRegistrar'
import {createCertificateCacheFactory} from '../certificateCache'
import {AppError, CorruptStoreEntryError} from '../errors'
import {createStoreKeyLayout} from '../storeKeys'
import {architectureYaml, createFailingStore, createManualClock, createTestKeySets} from './fixtures'

const keySets = createTestKeySets()
const keys = createStoreKeyLayout({prefix: 'certomancer'})

const createRegistrar = ({store, logger = createNoopLogger()}: {store: TtlStoreClient; logger?: StructuredLogger}) =>
  createArchitectureRegistrar({
    store,
    keys,
    keySets,
    externalUrlPrefix: 'http://pki.test',
    archConfigTtlSeconds: 3600,
    certTtlSeconds: 3600,
    createCertificateCache: createCertificateCacheFactory({
      store,
      keys,
      ttlSeconds: 3600,
      localCapacity: 16,
      logger
    }),
    logger
  })

const createRecordingLogger = () => {
  const warn = vi.fn<StructuredLogger['warn']>()
  const info = vi.fn<StructuredLogger['info']>()
  const logger: StructuredLogger = {...createNoopLogger(), warn, info}
  return {logger, warn, info}
}

describe('deriveArchitectureLabel', () => {
  it('is the lowercase hex SHA-1 digest of the bytes', () => {
    expect(deriveArchitectureLabel(Buffer.from('abc'))).toBe('a9993e364706816aba3e25717850c26c9cd0d89d')
  })
})

describe('architecture registrar', () => {
  it('labels an architecture by the digest of its configuration and stores the raw bytes', async () => {
    const clock = createManualClock()
    const store = createInMemoryTtlStore({now: clock.now})
    const rawConfig = Buffer.from(architectureYaml(), 'utf8')
    const expectedLabel = createHash('sha1').update(rawConfig).digest('hex')

    const architecture = await createRegistrar({store}).register(rawConfig)

    expect(architecture.label).toBe(expectedLabel)
    expect([...architecture.certificates.keys()]).toEqual(['root', 'leaf'])
    expect(architecture.services.cert_repo).toEqual({root: `http://pki.test/${expectedLabel}/certs/root`})
    expect((await store.get(`certomancer_${expectedLabel}_config`))?.equals(rawConfig)).toBe(true)
    expect(store.expiresAt(`certomancer_${expectedLabel}_config`)?.toISOString()).toBe('2024-01-01T01:00:00.000Z')
    expect(await store.get(`certomancer_${expectedLabel}_cert_leaf`)).toBeInstanceOf(Buffer)
  })

  it('yields the same label and certificates for identical bytes, even on another worker', async () => {
    const store = createInMemoryTtlStore()
    const rawConfig = Buffer.from(architectureYaml(), 'utf8')

    const first = await createRegistrar({store}).register(rawConfig)
    const second = await createRegistrar({store}).register(Buffer.from(rawConfig))

    expect(second.label).toBe(first.label)
    expect(toArchitectureBundle(second)).toEqual(toArchitectureBundle(first))
  })

  it('yields different labels for different bytes', async () => {
    const store = createInMemoryTtlStore()
    const registrar = createRegistrar({store})

    const first = await registrar.register(Buffer.from(architectureYaml(), 'utf8'))
    const second = await registrar.register(Buffer.from(`${architectureYaml()}\n# trailing comment\n`, 'utf8'))

    expect(second.label).not.toBe(first.label)
  })

  it('extends the expiry of the stored configuration on every resubmission', async () => {
    const clock = createManualClock()
    const store = createInMemoryTtlStore({now: clock.now})
    const registrar = createRegistrar({store})
    const rawConfig = Buffer.from(architectureYaml(), 'utf8')
    const configKey = `certomancer_${deriveArchitectureLabel(rawConfig)}_config`

    await registrar.register(rawConfig)
    clock.advanceSeconds(3000)
    await registrar.register(rawConfig)
    clock.advanceSeconds(3000)

    expect((await store.get(configKey))?.equals(rawConfig)).toBe(true)
    expect(store.expiresAt(configKey)?.toISOString()).toBe('2024-01-01T01:50:00.000Z')
  })

  it('keeps issued certificates alive for as long as their configuration is resubmitted', async () => {
    const clock = createManualClock()
    const store = createInMemoryTtlStore({now: clock.now})
    const rawConfig = Buffer.from(architectureYaml(), 'utf8')
    const leafKey = `certomancer_${deriveArchitectureLabel(rawConfig)}_cert_leaf`

    const first = await createRegistrar({store}).register(rawConfig)
    clock.advanceSeconds(3000)
    const second = await createRegistrar({store}).register(rawConfig)
    clock.advanceSeconds(1000)
    const third = await createRegistrar({store}).register(rawConfig)

    const firstLeaf = first.certificates.get('leaf')?.der
    expect(firstLeaf).toBeInstanceOf(Buffer)
    expect(second.certificates.get('leaf')?.der.equals(firstLeaf ?? Buffer.alloc(0))).toBe(true)
    expect(third.certificates.get('leaf')?.der.equals(firstLeaf ?? Buffer.alloc(0))).toBe(true)
    expect(store.expiresAt(leafKey)?.toISOString()).toBe('2024-01-01T02:06:40.000Z')
  })

  it('converts configuration problems into a bad request and stores nothing', async () => {
    const store = createInMemoryTtlStore()
    const {logger, warn} = createRecordingLogger()
    const rawConfig = Buffer.from('certs: [unterminated', 'utf8')

    const error = await createRegistrar({store, logger})
      .register(rawConfig)
      .catch((caught: unknown) => caught)

    expect(error).toBeInstanceOf(AppError)
    expect(error).toMatchObject({status: 400, code: 'configuration_invalid'})
    expect(error instanceof Error ? error.message : '').toMatch(/^Configuration is not valid YAML: /u)
    expect(store.size()).toBe(0)
    expect(warn).toHaveBeenCalledWith(
      expect.objectContaining({
        event: 'registration.rejected',
        arch_label: deriveArchitectureLabel(rawConfig),
        reason_code: 'configuration_invalid'
      })
    )
  })

  it('reports builder cross-reference errors with their reason', async () => {
    const store = createInMemoryTtlStore()
    const rawConfig = Buffer.from(architectureYaml().replace('keyset: testing-ca', 'keyset: missing-set'), 'utf8')

    await expect(createRegistrar({store}).register(rawConfig)).rejects.toMatchObject({
      status: 400,
      code: 'configuration_invalid',
      message: 'Unknown key set missing-set'
    })
  })

  it('logs accepted registrations', async () => {
    const {logger, info} = createRecordingLogger()
    const rawConfig = Buffer.from(architectureYaml(), 'utf8')

    await createRegistrar({store: createInMemoryTtlStore(), logger}).register(rawConfig)

    expect(info).toHaveBeenCalledWith(
      expect.objectContaining({
        event: 'registration.accepted',
        arch_label: deriveArchitectureLabel(rawConfig),
        metadata: {certificate_count: 2, config_bytes: rawConfig.length}
      })
    )
  })

  it('surfaces unreadable stored certificates as a store fault, not a bad request', async () => {
    const store = createInMemoryTtlStore()
    const rawConfig = Buffer.from(architectureYaml(), 'utf8')
    const rootKey = `certomancer_${deriveArchitectureLabel(rawConfig)}_cert_root`
    await store.set({key: rootKey, value: Buffer.from('not a certificate'), ttlSeconds: 3600})

    const error = await createRegistrar({store})
      .register(rawConfig)
      .catch((caught: unknown) => caught)

    expect(error).toBeInstanceOf(CorruptStoreEntryError)
    expect(error).not.toBeInstanceOf(AppError)
    expect(error).toMatchObject({key: rootKey, code: 'store_entry_corrupt'})
  })

  it('surfaces store outages untouched', async () => {
    await expect(
      createRegistrar({store: createFailingStore()}).register(Buffer.from(architectureYaml(), 'utf8'))
    ).rejects.toBeInstanceOf(StoreUnavailableError)
  })
})
