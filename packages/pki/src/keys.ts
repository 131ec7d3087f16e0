import {createPrivateKey, createPublicKey, type KeyObject} from 'node:crypto';
import {promises as fs} from 'node:fs';
import path from 'node:path';

import {ConfigurationError} from './errors';

type HashName = 'SHA-256' | 'SHA-384' | 'SHA-512';
type NamedCurve = 'P-256' | 'P-384' | 'P-521';

export type KeyAlgorithm =
  | {
      importAlgorithm: {name: 'RSASSA-PKCS1-v1_5'; hash: HashName};
      signingAlgorithm: {name: 'RSASSA-PKCS1-v1_5'; hash: HashName};
    }
  | {
      importAlgorithm: {name: 'ECDSA'; namedCurve: NamedCurve};
      signingAlgorithm: {name: 'ECDSA'; hash: HashName};
    };

export type KeyMaterial = {
  label: string;
  algorithm: KeyAlgorithm;
  // SubjectPublicKeyInfo DER
  publicKeyDer: Buffer;
  // PKCS#8 DER; absent for public-only entries
  privateKeyDer?: Buffer;
};

export type KeySet = {
  name: string;
  keys: ReadonlyMap<string, KeyMaterial>;
};

const curveHashes: Record<NamedCurve, HashName> = {
  'P-256': 'SHA-256',
  'P-384': 'SHA-384',
  'P-521': 'SHA-512'
};

// node reports OpenSSL curve names
const webCryptoCurveNames: Record<string, NamedCurve> = {
  prime256v1: 'P-256',
  secp384r1: 'P-384',
  secp521r1: 'P-521',
  'P-256': 'P-256',
  'P-384': 'P-384',
  'P-521': 'P-521'
};

const resolveKeyAlgorithm = ({label, keyObject}: {label: string; keyObject: KeyObject}): KeyAlgorithm => {
  const keyType = keyObject.asymmetricKeyType;
  if (keyType === 'rsa') {
    return {
      importAlgorithm: {name: 'RSASSA-PKCS1-v1_5', hash: 'SHA-256'},
      signingAlgorithm: {name: 'RSASSA-PKCS1-v1_5', hash: 'SHA-256'}
    };
  }

  if (keyType === 'ec') {
    const curveName = keyObject.asymmetricKeyDetails?.namedCurve;
    if (!curveName) {
      throw new ConfigurationError(`EC key ${label} is missing named curve metadata`);
    }
    const namedCurve = Object.hasOwn(webCryptoCurveNames, curveName) ? webCryptoCurveNames[curveName] : undefined;
    if (!namedCurve) {
      throw new ConfigurationError(`Unsupported EC named curve for key ${label}: ${curveName}`);
    }

    return {
      importAlgorithm: {name: 'ECDSA', namedCurve},
      signingAlgorithm: {name: 'ECDSA', hash: curveHashes[namedCurve]}
    };
  }

  throw new ConfigurationError(`Unsupported key algorithm for key ${label}: ${String(keyType)}`);
};

const PRIVATE_KEY_PEM = /-----BEGIN (?:RSA |EC )?PRIVATE KEY-----/u;

/**
 * Accepts unencrypted PKCS#8, PKCS#1 (RSA) or SEC1 (EC) private keys, or an
 * SPKI public key. With `publicOnly` the private part is discarded.
 */
export const keyMaterialFromPem = ({
  label,
  pem,
  publicOnly = false
}: {
  label: string;
  pem: string;
  publicOnly?: boolean;
}): KeyMaterial => {
  let privateKey: KeyObject | undefined;
  let publicKey: KeyObject;
  try {
    if (PRIVATE_KEY_PEM.test(pem)) {
      privateKey = createPrivateKey(pem);
      publicKey = createPublicKey(privateKey);
    } else {
      publicKey = createPublicKey(pem);
    }
  } catch (error) {
    throw new ConfigurationError(
      `Failed to parse key ${label}: ${error instanceof Error ? error.message : String(error)}`,
      {cause: error}
    );
  }

  const algorithm = resolveKeyAlgorithm({label, keyObject: publicKey});
  const publicKeyDer = publicKey.export({format: 'der', type: 'spki'});
  if (!privateKey || publicOnly) {
    return {label, algorithm, publicKeyDer};
  }

  return {
    label,
    algorithm,
    publicKeyDer,
    privateKeyDer: privateKey.export({format: 'der', type: 'pkcs8'})
  };
};

export type KeySetFileSpec = {
  pathPrefix?: string;
  keys: Record<string, {path: string; publicOnly: boolean}>;
};

export const loadKeySet = async ({
  name,
  spec,
  baseDir
}: {
  name: string;
  spec: KeySetFileSpec;
  baseDir: string;
}): Promise<KeySet> => {
  const root = path.resolve(baseDir, spec.pathPrefix ?? '.');
  const entries = await Promise.all(
    Object.entries(spec.keys).map(async ([label, keySpec]) => {
      const keyPath = path.resolve(root, keySpec.path);
      let pem: string;
      try {
        pem = await fs.readFile(keyPath, 'utf8');
      } catch (error) {
        throw new ConfigurationError(
          `Failed to read key ${label} of key set ${name} from ${keyPath}: ${
            error instanceof Error ? error.message : String(error)
          }`,
          {cause: error}
        );
      }

      return [label, keyMaterialFromPem({label, pem, publicOnly: keySpec.publicOnly})] as const;
    })
  );

  return {name, keys: new Map(entries)};
};
