import {createHash, webcrypto} from 'node:crypto';

import type {ServiceCatalog} from '@adhoc-pki/schemas';
import * as x509 from '@peculiar/x509';

import {toArrayBuffer} from './bytes';
import type {CertificateCache} from './certificateCache';
import type {ArchitectureConfig, CertSpec, ExtensionSpec, ProfileSpec} from './config';
import {ConfigurationError, isCertificateNotCachedError} from './errors';
import {buildExtension, expandProfile} from './extensions';
import type {KeyMaterial, KeySet} from './keys';
import {resolveEntityName} from './names';
import {buildServiceCatalog} from './services';

export type IssuedCertificate = {
  label: string;
  certificate: x509.X509Certificate;
  der: Buffer;
  // entity label of the issuer
  issuer: string;
  issuerCertLabel: string;
  subjectKeyLabel: string;
};

export type CertRepository = {
  label: string;
  forIssuer: string;
  caCertLabel: string;
  publishIssuedCerts: boolean;
};

export type BuiltArchitecture = {
  label: string;
  certificates: ReadonlyMap<string, IssuedCertificate>;
  services: ServiceCatalog;
  certRepositories: ReadonlyMap<string, CertRepository>;
  getCertificate: (certLabel: string) => IssuedCertificate | undefined;
  // issuer labels, nearest first; a self-signed certificate has an empty chain
  getChain: (certLabel: string) => string[];
  getPrivateKeyDer: (certLabel: string) => Buffer | undefined;
};

type ResolvedCertSpec = {
  label: string;
  subject: string;
  subjectKey: string;
  issuer: string;
  issuerCert: string;
  authorityKey: string;
  validFrom: Date;
  validTo: Date;
  serial?: number;
  extensions: ExtensionSpec[];
  profiles: ProfileSpec[];
};

// Identity fields (subject, subject-key, serial) are never inherited.
const inheritTemplate = ({base, own}: {base: CertSpec; own: CertSpec}): CertSpec => ({
  subject: own.subject,
  'subject-key': own['subject-key'],
  serial: own.serial,
  issuer: own.issuer ?? base.issuer,
  'issuer-cert': own['issuer-cert'] ?? base['issuer-cert'],
  'authority-key': own['authority-key'] ?? base['authority-key'],
  validity: own.validity ?? base.validity,
  extensions: own.extensions ?? base.extensions,
  profiles: own.profiles ?? base.profiles
});

const applyTemplates = ({
  certLabel,
  config,
  visiting
}: {
  certLabel: string;
  config: ArchitectureConfig;
  visiting: Set<string>;
}): CertSpec => {
  const spec = config.certs[certLabel];
  if (!spec) {
    throw new ConfigurationError(`Unknown certificate ${certLabel}`);
  }
  if (spec.template === undefined) {
    return spec;
  }
  if (visiting.has(certLabel)) {
    throw new ConfigurationError(`Template cycle involving certificate ${certLabel}`);
  }

  visiting.add(certLabel);
  return inheritTemplate({base: applyTemplates({certLabel: spec.template, config, visiting}), own: spec});
};

const resolveCertSpec = ({certLabel, config}: {certLabel: string; config: ArchitectureConfig}): ResolvedCertSpec => {
  const spec = applyTemplates({certLabel, config, visiting: new Set()});
  if (spec.issuer === undefined) {
    throw new ConfigurationError(`Certificate ${certLabel} has no issuer`);
  }
  if (spec.validity === undefined) {
    throw new ConfigurationError(`Certificate ${certLabel} has no validity period`);
  }
  if (spec.validity['valid-to'].getTime() <= spec.validity['valid-from'].getTime()) {
    throw new ConfigurationError(`Certificate ${certLabel} expires before it becomes valid`);
  }

  const subject = spec.subject ?? certLabel;
  return {
    label: certLabel,
    subject,
    subjectKey: spec['subject-key'] ?? subject,
    issuer: spec.issuer,
    issuerCert: spec['issuer-cert'] ?? spec.issuer,
    authorityKey: spec['authority-key'] ?? spec.issuer,
    validFrom: spec.validity['valid-from'],
    validTo: spec.validity['valid-to'],
    ...(spec.serial !== undefined ? {serial: spec.serial} : {}),
    extensions: spec.extensions ?? [],
    profiles: spec.profiles ?? []
  };
};

const serialNumberHex = ({
  archLabel,
  certLabel,
  serial
}: {
  archLabel: string;
  certLabel: string;
  serial?: number;
}) => {
  if (serial !== undefined) {
    const hex = serial.toString(16);
    const even = hex.length % 2 === 0 ? hex : `0${hex}`;
    return /^[89a-f]/u.test(even) ? `00${even}` : even;
  }

  // positive, minimally encoded and stable for a given (architecture, certificate)
  const bytes = createHash('sha256').update(`${archLabel}\u0000${certLabel}`, 'utf8').digest().subarray(0, 16);
  bytes.writeUInt8((bytes.readUInt8(0) & 0x7f) | 0x40, 0);
  return bytes.toString('hex');
};

const importPublicKey = (key: KeyMaterial): Promise<CryptoKey> =>
  webcrypto.subtle.importKey('spki', toArrayBuffer(key.publicKeyDer), key.algorithm.importAlgorithm, true, ['verify']);

const importSigningKey = (key: KeyMaterial): Promise<CryptoKey> => {
  if (!key.privateKeyDer) {
    throw new ConfigurationError(`Key ${key.label} has no private part and cannot sign`);
  }

  return webcrypto.subtle.importKey('pkcs8', toArrayBuffer(key.privateKeyDer), key.algorithm.importAlgorithm, false, [
    'sign'
  ]);
};

const resolveKeySet = ({
  archLabel,
  config,
  keySets
}: {
  archLabel: string;
  config: ArchitectureConfig;
  keySets: ReadonlyMap<string, KeySet>;
}) => {
  if (config.keyset === undefined) {
    throw new ConfigurationError(`Architecture ${archLabel} does not name a key set`);
  }

  const keySet = keySets.get(config.keyset);
  if (!keySet) {
    throw new ConfigurationError(`Unknown key set ${config.keyset}`);
  }

  return keySet;
};

/**
 * Issues every certificate of an architecture, issuers first. Certificates
 * already present in `certCache` are reused as-is; the others are derived
 * and written back to the cache.
 */
export const buildArchitecture = async ({
  label,
  config,
  keySets,
  externalUrlPrefix,
  certCache
}: {
  label: string;
  config: ArchitectureConfig;
  keySets: ReadonlyMap<string, KeySet>;
  externalUrlPrefix: string;
  certCache: CertificateCache;
}): Promise<BuiltArchitecture> => {
  const services = buildServiceCatalog({archLabel: label, services: config.services, externalUrlPrefix});
  const keySet = resolveKeySet({archLabel: label, config, keySets});
  const specs = new Map(
    Object.keys(config.certs).map(certLabel => [certLabel, resolveCertSpec({certLabel, config})] as const)
  );

  const requireSpec = (certLabel: string) => {
    const spec = specs.get(certLabel);
    if (!spec) {
      throw new ConfigurationError(`Unknown certificate ${certLabel}`);
    }

    return spec;
  };

  const requireKey = (keyLabel: string) => {
    const key = keySet.keys.get(keyLabel);
    if (!key) {
      throw new ConfigurationError(`Key ${keyLabel} not found in key set ${keySet.name}`);
    }

    return key;
  };

  const certRepositories = new Map(
    Object.entries(config.services?.['cert-repo'] ?? {}).map(([repoLabel, repo]) => {
      const caCertLabel = repo['issuer-cert'] ?? repo['for-issuer'];
      if (!specs.has(caCertLabel)) {
        throw new ConfigurationError(`Certificate repository ${repoLabel} refers to unknown certificate ${caCertLabel}`);
      }

      const repository: CertRepository = {
        label: repoLabel,
        forIssuer: repo['for-issuer'],
        caCertLabel,
        publishIssuedCerts: repo['publish-issued-certs']
      };
      return [repoLabel, repository] as const;
    })
  );

  // fail on dangling references before anything is signed
  for (const spec of specs.values()) {
    requireSpec(spec.issuerCert);
    requireKey(spec.subjectKey);
    if (!requireKey(spec.authorityKey).privateKeyDer) {
      throw new ConfigurationError(`Key ${spec.authorityKey} of certificate ${spec.label} cannot sign`);
    }
    resolveEntityName({label: spec.subject, config});
    resolveEntityName({label: spec.issuer, config});
  }

  const collectExtensions = (spec: ResolvedCertSpec) => {
    const byId = new Map<string, ExtensionSpec>();
    const add = (extensions: ExtensionSpec[]) => {
      for (const extension of extensions) {
        byId.set(extension.id, extension);
      }
    };

    if (spec.issuerCert !== spec.label) {
      for (const profile of requireSpec(spec.issuerCert).profiles) {
        add(expandProfile(profile).issued);
      }
    }
    for (const profile of spec.profiles) {
      add(expandProfile(profile).own);
    }
    add(spec.extensions);

    return [...byId.values()].map(extension => buildExtension({spec: extension, services}));
  };

  const deriveCertificate = async (spec: ResolvedCertSpec) => {
    const subjectKey = requireKey(spec.subjectKey);
    const authorityKey = requireKey(spec.authorityKey);
    const publicKey = await importPublicKey(subjectKey);
    const authorityPublicKey = await importPublicKey(authorityKey);
    const signingKey = await importSigningKey(authorityKey);

    const extensions: x509.Extension[] = [
      await x509.SubjectKeyIdentifierExtension.create(publicKey),
      await x509.AuthorityKeyIdentifierExtension.create(authorityPublicKey),
      ...collectExtensions(spec)
    ];

    return x509.X509CertificateGenerator.create({
      serialNumber: serialNumberHex({archLabel: label, certLabel: spec.label, serial: spec.serial}),
      subject: resolveEntityName({label: spec.subject, config}),
      issuer: resolveEntityName({label: spec.issuer, config}),
      notBefore: spec.validFrom,
      notAfter: spec.validTo,
      signingAlgorithm: authorityKey.algorithm.signingAlgorithm,
      publicKey,
      signingKey,
      extensions
    });
  };

  const loadOrDerive = async (spec: ResolvedCertSpec) => {
    try {
      return await certCache.get(spec.label);
    } catch (error) {
      if (!isCertificateNotCachedError(error)) {
        throw error;
      }
    }

    const certificate = await deriveCertificate(spec);
    await certCache.put(spec.label, certificate);
    return certificate;
  };

  const issued = new Map<string, IssuedCertificate>();
  const inProgress = new Set<string>();

  const issue = async (certLabel: string): Promise<IssuedCertificate> => {
    const existing = issued.get(certLabel);
    if (existing) {
      return existing;
    }
    if (inProgress.has(certLabel)) {
      throw new ConfigurationError(`Issuer cycle involving certificate ${certLabel}`);
    }

    const spec = requireSpec(certLabel);
    inProgress.add(certLabel);
    if (spec.issuerCert !== certLabel) {
      await issue(spec.issuerCert);
    }

    const certificate = await loadOrDerive(spec);
    const entry: IssuedCertificate = {
      label: certLabel,
      certificate,
      der: Buffer.from(certificate.rawData),
      issuer: spec.issuer,
      issuerCertLabel: spec.issuerCert,
      subjectKeyLabel: spec.subjectKey
    };
    inProgress.delete(certLabel);
    issued.set(certLabel, entry);
    return entry;
  };

  // sequential so every certificate is derived at most once per build
  for (const certLabel of specs.keys()) {
    await issue(certLabel);
  }

  const getChain = (certLabel: string) => {
    const chain: string[] = [];
    let current = issued.get(certLabel);
    while (current && current.issuerCertLabel !== current.label) {
      chain.push(current.issuerCertLabel);
      current = issued.get(current.issuerCertLabel);
    }

    return chain;
  };

  return {
    label,
    certificates: issued,
    services,
    certRepositories,
    getCertificate: certLabel => issued.get(certLabel),
    getChain,
    getPrivateKeyDer: certLabel => {
      const entry = issued.get(certLabel);
      return entry ? keySet.keys.get(entry.subjectKeyLabel)?.privateKeyDer : undefined;
    }
  };
};
