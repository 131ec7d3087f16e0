export {
  parseArchitectureBundle,
  type ArchitectureContext,
  type CertificateEntry
} from './architectureContext';
export {
  createPkiServiceClient,
  loadConfigurationFile,
  type FetchLike,
  type PkiServiceClient,
  type PkiServiceClientOptions
} from './client';
export {isPkiServiceClientError, PkiServiceClientError} from './errors';
