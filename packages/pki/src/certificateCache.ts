import type * as x509 from '@peculiar/x509';

import {CertificateNotCachedError} from './errors';

/**
 * Write-once store of issued certificates for one architecture.
 * `get` rejects with `CertificateNotCachedError` when the certificate has
 * to be derived; any other rejection aborts the build.
 */
export interface CertificateCache {
  get(certLabel: string): Promise<x509.X509Certificate>;
  put(certLabel: string, certificate: x509.X509Certificate): Promise<void>;
}

export const createLocalCertificateCache = (): CertificateCache => {
  const certificates = new Map<string, x509.X509Certificate>();

  return {
    get: certLabel => {
      const certificate = certificates.get(certLabel);
      return certificate ? Promise.resolve(certificate) : Promise.reject(new CertificateNotCachedError(certLabel));
    },
    put: (certLabel, certificate) => {
      certificates.set(certLabel, certificate);
      return Promise.resolve();
    }
  };
};
