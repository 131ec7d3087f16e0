import {generateKeyPairSync} from 'node:crypto'

import {keyMaterialFromPem, parseArchitectureConfig, type KeySet, type StaticConfiguration} from '@adhoc-pki/pki'
import {StoreUnavailableError, type TtlStoreClient} from '@adhoc-pki/store'

import type {ServiceConfig} from '../config'

const generatePrivateKeyPem = () =>
  generateKeyPairSync('ec', {
    namedCurve: 'P-256',
    privateKeyEncoding: {type: 'pkcs8', format: 'pem'},
    publicKeyEncoding: {type: 'spki', format: 'pem'}
  }).privateKey

export const createTestKeySets = (): ReadonlyMap<string, KeySet> => {
  const keySet: KeySet = {
    name: 'testing-ca',
    keys: new Map(['root', 'leaf'].map(label => [label, keyMaterialFromPem({label, pem: generatePrivateKeyPem()})]))
  }

  return new Map([[keySet.name, keySet]])
}

export const architectureYaml = ({leafName = 'Leaf'}: {leafName?: string} = {}) => `keyset: testing-ca
entities:
  root:
    common-name: Root CA
  leaf:
    common-name: ${leafName}
certs:
  root:
    issuer: root
    validity:
      valid-from: "2000-01-01T00:00:00Z"
      valid-to: "2100-01-01T00:00:00Z"
    profiles: [simple-ca]
  leaf:
    issuer: root
    validity:
      valid-from: "2000-01-01T00:00:00Z"
      valid-to: "2100-01-01T00:00:00Z"
services:
  cert-repo:
    root:
      for-issuer: root
`

export const createStaticConfiguration = (keySets: ReadonlyMap<string, KeySet>): StaticConfiguration => ({
  externalUrlPrefix: 'http://static.test',
  keySets,
  architectures: new Map([['testing-ca', parseArchitectureConfig(architectureYaml({leafName: 'Static Leaf'}))]])
})

export const createFailingStore = (): TtlStoreClient => ({
  get: key => Promise.reject(new StoreUnavailableError({operation: 'get', key, cause: new Error('connection refused')})),
  set: ({key}) =>
    Promise.reject(new StoreUnavailableError({operation: 'set', key, cause: new Error('connection refused')}))
})

export const createManualClock = (start = '2024-01-01T00:00:00.000Z') => {
  let current = new Date(start).getTime()

  return {
    now: () => new Date(current),
    advanceSeconds: (seconds: number) => {
      current += seconds * 1000
    }
  }
}

export const makeConfig = (overrides: Partial<ServiceConfig> = {}): ServiceConfig => ({
  nodeEnv: 'test',
  host: '127.0.0.1',
  port: 0,
  registrationPath: '/config',
  maxBodyBytes: 64 * 1024,
  externalUrlPrefix: 'http://pki.test',
  logging: {
    level: 'silent',
    extraSensitiveKeys: []
  },
  store: {
    enabled: false,
    redisConnectTimeoutMs: 2_000,
    keyPrefix: 'certomancer',
    archConfigTtlSeconds: 3600,
    certTtlSeconds: 3600
  },
  localCache: {
    architectureCapacity: 32,
    certificateCapacity: 16
  },
  ...overrides
})
