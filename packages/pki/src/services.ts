import type {ServiceCatalog} from '@adhoc-pki/schemas';

import type {ServicesSpec} from './config';

const joinUrl = (prefix: string, ...segments: string[]) =>
  [prefix.replace(/\/+$/u, ''), ...segments.map(segment => encodeURIComponent(segment))].join('/');

const endpointsFor = ({
  entries,
  build
}: {
  entries: Record<string, unknown> | undefined;
  build: (serviceLabel: string) => string;
}) => Object.fromEntries(Object.keys(entries ?? {}).map(serviceLabel => [serviceLabel, build(serviceLabel)]));

/**
 * Endpoint URLs of every service an architecture declares, keyed by service
 * label. Plugin services are keyed as `{plugin}/{label}`.
 */
export const buildServiceCatalog = ({
  archLabel,
  services,
  externalUrlPrefix
}: {
  archLabel: string;
  services: ServicesSpec | undefined;
  externalUrlPrefix: string;
}): ServiceCatalog => {
  const plugin: Record<string, string> = {};
  for (const [pluginName, entries] of Object.entries(services?.plugin ?? {})) {
    for (const serviceLabel of Object.keys(entries)) {
      plugin[`${pluginName}/${serviceLabel}`] = joinUrl(externalUrlPrefix, archLabel, 'plugin', pluginName, serviceLabel);
    }
  }

  return {
    ocsp: endpointsFor({
      entries: services?.ocsp,
      build: serviceLabel => joinUrl(externalUrlPrefix, archLabel, 'ocsp', serviceLabel)
    }),
    time_stamping: endpointsFor({
      entries: services?.['time-stamping'],
      build: serviceLabel => joinUrl(externalUrlPrefix, archLabel, 'tsa', serviceLabel)
    }),
    crl_repo: endpointsFor({
      entries: services?.['crl-repo'],
      build: serviceLabel => joinUrl(externalUrlPrefix, archLabel, 'crls', serviceLabel, 'latest.crl')
    }),
    cert_repo: endpointsFor({
      entries: services?.['cert-repo'],
      build: serviceLabel => joinUrl(externalUrlPrefix, archLabel, 'certs', serviceLabel)
    }),
    plugin
  };
};
