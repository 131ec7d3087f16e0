import type {ArchitectureBundle, CertificateBundle} from '@adhoc-pki/schemas';

import type {BuiltArchitecture} from './builder';

export const toArchitectureBundle = (architecture: BuiltArchitecture): ArchitectureBundle => {
  const certBundles: Record<string, CertificateBundle> = {};
  for (const [certLabel, issued] of architecture.certificates) {
    const privateKeyDer = architecture.getPrivateKeyDer(certLabel);
    certBundles[certLabel] = {
      cert: issued.der.toString('base64'),
      ...(privateKeyDer ? {key: privateKeyDer.toString('base64')} : {}),
      other_certs: architecture.getChain(certLabel)
    };
  }

  return {
    arch_label: architecture.label,
    cert_bundles: certBundles,
    services: architecture.services
  };
};
