export {toArrayBuffer} from './bytes';
export {buildArchitecture, type BuiltArchitecture, type CertRepository, type IssuedCertificate} from './builder';
export {toArchitectureBundle} from './bundle';
export {createLocalCertificateCache, type CertificateCache} from './certificateCache';
export {
  ArchitectureConfigSchema,
  parseArchitectureConfig,
  parseArchitectureConfigDocument,
  type ArchitectureConfig
} from './config';
export {
  CertificateNotCachedError,
  ConfigurationError,
  isCertificateNotCachedError,
  isConfigurationError
} from './errors';
export {keyMaterialFromPem, loadKeySet, type KeyMaterial, type KeySet} from './keys';
export {buildServiceCatalog} from './services';
export {buildStaticArchitectures, loadStaticConfiguration, type StaticConfiguration} from './staticConfig';
