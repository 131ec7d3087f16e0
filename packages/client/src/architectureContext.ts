import {ArchitectureBundleSchema, type ServiceCatalog, type ServiceKind} from '@adhoc-pki/schemas';
import * as x509 from '@peculiar/x509';

import {PkiServiceClientError} from './errors';

export type CertificateEntry = {
  label: string;
  der: Buffer;
  certificate: x509.X509Certificate;
  // PKCS#8 DER, when the service handed out the key
  privateKeyDer?: Buffer;
  // issuer labels, nearest first
  chainLabels: string[];
};

export type ArchitectureContext = {
  label: string;
  certificates: ReadonlyMap<string, CertificateEntry>;
  services: ServiceCatalog;
  getCertificate: (certLabel: string) => CertificateEntry;
  getChain: (certLabel: string) => CertificateEntry[];
  getServiceUrl: (kind: ServiceKind, serviceLabel: string) => string;
};

const invalidResponse = (message: string, status: number) =>
  new PkiServiceClientError({code: 'invalid_response', message, status});

/**
 * Validates an architecture bundle document and decodes its certificates.
 * Every chain label must name another certificate of the same bundle.
 */
export const parseArchitectureBundle = ({body, status = 200}: {body: unknown; status?: number}): ArchitectureContext => {
  const parsed = ArchitectureBundleSchema.safeParse(body);
  if (!parsed.success) {
    throw invalidResponse(`Architecture bundle is malformed: ${parsed.error.issues[0]?.message ?? 'unknown issue'}`, status);
  }

  const bundle = parsed.data;
  const certificates = new Map<string, CertificateEntry>();
  for (const [certLabel, certBundle] of Object.entries(bundle.cert_bundles)) {
    const der = Buffer.from(certBundle.cert, 'base64');
    let certificate: x509.X509Certificate;
    try {
      certificate = new x509.X509Certificate(Uint8Array.from(der));
    } catch (error) {
      throw new PkiServiceClientError({
        code: 'invalid_response',
        message: `Certificate ${certLabel} cannot be decoded`,
        status,
        cause: error
      });
    }

    const missing = certBundle.other_certs.find(other => !Object.hasOwn(bundle.cert_bundles, other));
    if (missing !== undefined) {
      throw invalidResponse(`Certificate ${certLabel} refers to unknown certificate ${missing}`, status);
    }

    certificates.set(certLabel, {
      label: certLabel,
      der,
      certificate,
      ...(certBundle.key !== undefined ? {privateKeyDer: Buffer.from(certBundle.key, 'base64')} : {}),
      chainLabels: certBundle.other_certs
    });
  }

  const getCertificate = (certLabel: string) => {
    const entry = certificates.get(certLabel);
    if (!entry) {
      throw new Error(`Architecture ${bundle.arch_label} has no certificate ${certLabel}`);
    }

    return entry;
  };

  return {
    label: bundle.arch_label,
    certificates,
    services: bundle.services,
    getCertificate,
    getChain: certLabel => getCertificate(certLabel).chainLabels.map(getCertificate),
    getServiceUrl: (kind, serviceLabel) => {
      const endpoints = bundle.services[kind];
      const url = Object.hasOwn(endpoints, serviceLabel) ? endpoints[serviceLabel] : undefined;
      if (url === undefined) {
        throw new Error(`Architecture ${bundle.arch_label} has no ${kind} service ${serviceLabel}`);
      }

      return url;
    }
  };
};
