import {generateKeyPairSync} from 'node:crypto';

import {ArchitectureBundleSchema} from '@adhoc-pki/schemas';
import * as x509 from '@peculiar/x509';
import {describe, expect, it} from 'vitest';

import {
  buildArchitecture,
  CertificateNotCachedError,
  ConfigurationError,
  createLocalCertificateCache,
  keyMaterialFromPem,
  parseArchitectureConfig,
  toArchitectureBundle,
  type CertificateCache,
  type KeySet
} from '../index';

const generatePrivateKeyPem = () =>
  generateKeyPairSync('ec', {
    namedCurve: 'P-256',
    privateKeyEncoding: {type: 'pkcs8', format: 'pem'},
    publicKeyEncoding: {type: 'spki', format: 'pem'}
  }).privateKey;

const keySet: KeySet = {
  name: 'testing-ca',
  keys: new Map(
    ['root', 'interm', 'interm-ocsp', 'signer1', 'signer2'].map(label => [
      label,
      keyMaterialFromPem({label, pem: generatePrivateKeyPem()})
    ])
  )
};
const keySets = new Map([[keySet.name, keySet]]);

const scenarioYaml = `
keyset: testing-ca
entity-defaults:
  country-name: BE
  organization-name: Testing Authority
entities:
  root:
    common-name: Root CA
  interm:
    common-name: Intermediate CA
  interm-ocsp:
    common-name: OCSP responder
  signer1:
    organizational-unit-name: Signers
    common-name: Alice
  signer2:
    organizational-unit-name: Signers
    common-name: Bob
certs:
  root:
    subject: root
    issuer: root
    validity:
      valid-from: "2000-01-01T00:00:00+0000"
      valid-to: "2500-01-01T00:00:00+0000"
    profiles:
      - id: simple-ca
        params:
          crl-repo: root
  interm:
    issuer: root
    serial: 4096
    validity:
      valid-from: "2000-01-01T00:00:00+0000"
      valid-to: "2100-01-01T00:00:00+0000"
    profiles:
      - id: simple-ca
        params:
          max-path-len: 0
          crl-repo: interm
          ocsp-service: interm
  interm-ocsp:
    issuer: interm
    validity:
      valid-from: "2000-01-01T00:00:00+0000"
      valid-to: "2100-01-01T00:00:00+0000"
    profiles:
      - ocsp-responder
  signer1:
    issuer: interm
    validity:
      valid-from: "2020-01-01T00:00:00+0000"
      valid-to: "2022-01-01T00:00:00+0000"
    profiles:
      - digsig-commitment
    extensions:
      - id: extended_key_usage
        value: [email_protection, 1.3.6.1.4.1.311.10.3.12]
  signer2:
    template: signer1
    revocation:
      revoked-since: "2020-12-01T00:00:00+0000"
      reason: key_compromise
services:
  crl-repo:
    root:
      for-issuer: root
    interm:
      for-issuer: interm
  ocsp:
    interm:
      for-issuer: interm
      responder-cert: interm-ocsp
  time-stamping:
    tsa:
      signing-key: tsa
  plugin:
    dummy:
      plug1: {}
`;

const createRecordingCache = () => {
  const inner = createLocalCertificateCache();
  const puts: string[] = [];
  const cache: CertificateCache = {
    get: certLabel => inner.get(certLabel),
    put: async (certLabel, certificate) => {
      puts.push(certLabel);
      await inner.put(certLabel, certificate);
    }
  };

  return {cache, puts};
};

const build = ({yaml = scenarioYaml, certCache = createLocalCertificateCache()} = {}) =>
  buildArchitecture({
    label: 'arch1',
    config: parseArchitectureConfig(yaml),
    keySets,
    externalUrlPrefix: 'http://pki.test/',
    certCache
  });

const requireIssued = (architecture: Awaited<ReturnType<typeof build>>, certLabel: string) => {
  const issued = architecture.getCertificate(certLabel);
  if (!issued) {
    throw new Error(`missing ${certLabel}`);
  }

  return issued.certificate;
};

describe('buildArchitecture', () => {
  it('issues every certificate with the configured names and issuers', async () => {
    const architecture = await build();

    expect([...architecture.certificates.keys()]).toEqual(['root', 'interm', 'interm-ocsp', 'signer1', 'signer2']);

    const root = requireIssued(architecture, 'root');
    const interm = requireIssued(architecture, 'interm');
    const signer1 = requireIssued(architecture, 'signer1');
    const signer2 = requireIssued(architecture, 'signer2');

    expect(root.subject).toBe('C=BE, O=Testing Authority, CN=Root CA');
    expect(root.issuer).toBe(root.subject);
    expect(interm.issuer).toBe(root.subject);
    expect(signer1.subject).toBe('C=BE, O=Testing Authority, OU=Signers, CN=Alice');
    expect(signer1.issuer).toBe(interm.subject);
    expect(signer2.subject).toBe('C=BE, O=Testing Authority, OU=Signers, CN=Bob');
    expect(signer1.notBefore.toISOString()).toBe('2020-01-01T00:00:00.000Z');
    expect(signer2.notAfter.toISOString()).toBe('2022-01-01T00:00:00.000Z');
  });

  it('signs each certificate with its issuer key', async () => {
    const architecture = await build();
    const root = requireIssued(architecture, 'root');
    const interm = requireIssued(architecture, 'interm');

    await expect(root.verify({publicKey: root.publicKey, signatureOnly: true})).resolves.toBe(true);
    await expect(interm.verify({publicKey: root.publicKey, signatureOnly: true})).resolves.toBe(true);
    await expect(
      requireIssued(architecture, 'signer1').verify({publicKey: interm.publicKey, signatureOnly: true})
    ).resolves.toBe(true);
  });

  it('applies profile extensions and inherits the issuer profile endpoints', async () => {
    const architecture = await build();
    const root = requireIssued(architecture, 'root');
    const interm = requireIssued(architecture, 'interm');
    const responder = requireIssued(architecture, 'interm-ocsp');
    const signer1 = requireIssued(architecture, 'signer1');

    const rootConstraints = root.getExtension(x509.BasicConstraintsExtension);
    expect(rootConstraints?.ca).toBe(true);
    expect(rootConstraints?.pathLength).toBeUndefined();
    expect(interm.getExtension(x509.BasicConstraintsExtension)?.pathLength).toBe(0);
    expect(interm.getExtension(x509.KeyUsagesExtension)?.usages).toBe(
      x509.KeyUsageFlags.digitalSignature | x509.KeyUsageFlags.keyCertSign | x509.KeyUsageFlags.cRLSign
    );

    // a self-signed root does not point at its own CRL
    expect(root.getExtension('2.5.29.31')).toBeNull();
    expect(interm.getExtension('2.5.29.31')).not.toBeNull();
    expect(signer1.getExtension('2.5.29.31')).not.toBeNull();
    expect(signer1.getExtension('1.3.6.1.5.5.7.1.1')).not.toBeNull();
    expect(interm.getExtension('1.3.6.1.5.5.7.1.1')).toBeNull();

    expect(responder.getExtension(x509.ExtendedKeyUsageExtension)?.usages).toEqual(['1.3.6.1.5.5.7.3.9']);
    expect(responder.getExtension('1.3.6.1.5.5.7.48.1.5')).not.toBeNull();

    expect(signer1.getExtension(x509.KeyUsagesExtension)?.usages).toBe(
      x509.KeyUsageFlags.digitalSignature | x509.KeyUsageFlags.nonRepudiation
    );
    expect(signer1.getExtension(x509.ExtendedKeyUsageExtension)?.usages).toEqual([
      '1.3.6.1.5.5.7.3.4',
      '1.3.6.1.4.1.311.10.3.12'
    ]);
    expect(signer1.getExtension(x509.SubjectKeyIdentifierExtension)).not.toBeNull();
    expect(signer1.getExtension(x509.AuthorityKeyIdentifierExtension)?.keyId).toBe(
      interm.getExtension(x509.SubjectKeyIdentifierExtension)?.keyId
    );
  });

  it('uses configured serial numbers and stable derived ones otherwise', async () => {
    const first = await build();
    const second = await build();

    expect(requireIssued(first, 'interm').serialNumber).toBe('1000');

    const derived = requireIssued(first, 'signer1').serialNumber;
    expect(derived).toMatch(/^[4-7][0-9a-f]{31}$/u);
    expect(requireIssued(second, 'signer1').serialNumber).toBe(derived);
    expect(requireIssued(first, 'signer2').serialNumber).not.toBe(derived);
  });

  it('exposes issuer chains, private keys and service endpoints', async () => {
    const architecture = await build();

    expect(architecture.getChain('signer1')).toEqual(['interm', 'root']);
    expect(architecture.getChain('interm')).toEqual(['root']);
    expect(architecture.getChain('root')).toEqual([]);
    expect(architecture.getChain('unknown')).toEqual([]);
    expect(architecture.getPrivateKeyDer('signer1')).toEqual(keySet.keys.get('signer1')?.privateKeyDer);
    expect(architecture.services).toEqual({
      ocsp: {interm: 'http://pki.test/arch1/ocsp/interm'},
      time_stamping: {tsa: 'http://pki.test/arch1/tsa/tsa'},
      crl_repo: {
        root: 'http://pki.test/arch1/crls/root/latest.crl',
        interm: 'http://pki.test/arch1/crls/interm/latest.crl'
      },
      cert_repo: {},
      plugin: {'dummy/plug1': 'http://pki.test/arch1/plugin/dummy/plug1'}
    });
  });

  it('reuses cached certificates instead of deriving them again', async () => {
    const {cache, puts} = createRecordingCache();

    const first = await build({certCache: cache});
    expect(puts).toEqual(['root', 'interm', 'interm-ocsp', 'signer1', 'signer2']);

    const second = await build({certCache: cache});
    expect(puts).toHaveLength(5);
    for (const [certLabel, issued] of first.certificates) {
      expect(second.getCertificate(certLabel)?.der.equals(issued.der)).toBe(true);
    }
  });

  it('propagates cache failures other than a miss', async () => {
    const failure = new Error('store offline');
    const certCache: CertificateCache = {
      get: () => Promise.reject(failure),
      put: () => Promise.resolve()
    };

    await expect(build({certCache})).rejects.toBe(failure);
  });

  it('treats a cache miss as a request to derive', async () => {
    const stored: string[] = [];
    const certCache: CertificateCache = {
      get: certLabel => Promise.reject(new CertificateNotCachedError(certLabel)),
      put: certLabel => {
        stored.push(certLabel);
        return Promise.resolve();
      }
    };

    const architecture = await build({certCache});

    expect(architecture.certificates.size).toBe(5);
    expect(stored).toHaveLength(5);
  });

  it('renders the JSON bundle', async () => {
    const architecture = await build();

    const bundle = ArchitectureBundleSchema.parse(toArchitectureBundle(architecture));

    expect(bundle.arch_label).toBe('arch1');
    expect(Object.keys(bundle.cert_bundles)).toEqual(['root', 'interm', 'interm-ocsp', 'signer1', 'signer2']);
    expect(bundle.cert_bundles.signer1).toEqual({
      cert: architecture.getCertificate('signer1')?.der.toString('base64'),
      key: keySet.keys.get('signer1')?.privateKeyDer?.toString('base64'),
      other_certs: ['interm', 'root']
    });
    expect(bundle.cert_bundles.root?.other_certs).toEqual([]);
    expect(bundle.services.ocsp).toEqual({interm: 'http://pki.test/arch1/ocsp/interm'});
  });
});

describe('buildArchitecture configuration errors', () => {
  const single = (certYaml: string) => `
keyset: testing-ca
entities:
  root:
    common-name: Root CA
certs:
  root:
    issuer: root
    validity:
      valid-from: "2000-01-01T00:00:00Z"
      valid-to: "2030-01-01T00:00:00Z"
${certYaml}
`;

  it.each([
    ['an unknown issuer entity', single('  leaf:\n    issuer: nobody\n    subject: root\n    issuer-cert: root\n    authority-key: root\n    validity: {valid-from: "2000-01-01T00:00:00Z", valid-to: "2030-01-01T00:00:00Z"}'), 'Unknown entity nobody'],
    ['a key missing from the key set', single('    subject-key: ghost'), 'Key ghost not found in key set testing-ca'],
    ['an unknown profile', single('    profiles: [root-ca]'), 'Unsupported profile root-ca'],
    ['an unknown extension', single('    extensions: [{id: policy_constraints}]'), 'Unsupported extension policy_constraints'],
    [
      'a reference to an undeclared OCSP service',
      single(
        '    extensions:\n      - id: authority_information_access\n        smart-value: {schema: aia-urls, params: {ocsp-responder-names: [nope]}}'
      ),
      'Unknown ocsp service nope'
    ],
    [
      'a smart value of the wrong schema',
      single('    extensions:\n      - id: key_usage\n        smart-value: {schema: aia-urls, params: []}'),
      'Extension key_usage does not support smart value schema aia-urls'
    ],
    ['an unknown issuer certificate', single('    issuer-cert: elsewhere'), 'Unknown certificate elsewhere'],
    [
      'a validity period that ends before it starts',
      single('  late:\n    subject: root\n    issuer: root\n    validity: {valid-from: "2030-01-01T00:00:00Z", valid-to: "2000-01-01T00:00:00Z"}'),
      'Certificate late expires before it becomes valid'
    ],
    ['a missing issuer', single('  orphan:\n    subject: root\n    validity: {valid-from: "2000-01-01T00:00:00Z", valid-to: "2030-01-01T00:00:00Z"}'), 'Certificate orphan has no issuer'],
    ['a template cycle', single('  a:\n    subject: root\n    template: b\n  b:\n    subject: root\n    template: a'), 'Template cycle involving certificate a']
  ])('rejects %s', async (_name, yaml, message) => {
    await expect(build({yaml})).rejects.toThrowError(new ConfigurationError(message));
  });

  it('rejects issuer cycles', async () => {
    const yaml = `
keyset: testing-ca
entities:
  root: {common-name: Root CA}
  interm: {common-name: Intermediate CA}
certs:
  root:
    issuer: interm
    issuer-cert: interm
    validity: {valid-from: "2000-01-01T00:00:00Z", valid-to: "2030-01-01T00:00:00Z"}
  interm:
    issuer: root
    validity: {valid-from: "2000-01-01T00:00:00Z", valid-to: "2030-01-01T00:00:00Z"}
`;

    await expect(build({yaml})).rejects.toThrowError(new ConfigurationError('Issuer cycle involving certificate root'));
  });

  it('resolves certificate repositories to their CA certificates', async () => {
    const yaml = `${scenarioYaml}  cert-repo:
    root:
      for-issuer: root
    interm-repo:
      for-issuer: interm
      issuer-cert: interm
      publish-issued-certs: false
`;

    const architecture = await build({yaml});

    expect([...architecture.certRepositories.values()]).toEqual([
      {label: 'root', forIssuer: 'root', caCertLabel: 'root', publishIssuedCerts: true},
      {label: 'interm-repo', forIssuer: 'interm', caCertLabel: 'interm', publishIssuedCerts: false}
    ]);
    expect(architecture.services.cert_repo).toEqual({
      root: 'http://pki.test/arch1/certs/root',
      'interm-repo': 'http://pki.test/arch1/certs/interm-repo'
    });
    expect(architecture.getCertificate('signer1')?.issuer).toBe('interm');
  });

  it('rejects certificate repositories without a CA certificate', async () => {
    const yaml = `${scenarioYaml}  cert-repo:
    orphan:
      for-issuer: nobody
`;

    await expect(build({yaml})).rejects.toThrowError(
      new ConfigurationError('Certificate repository orphan refers to unknown certificate nobody')
    );
  });

  it('requires a known key set', async () => {
    const yaml = single('').replace('keyset: testing-ca', 'keyset: elsewhere');

    await expect(build({yaml})).rejects.toThrowError(new ConfigurationError('Unknown key set elsewhere'));
  });
});
