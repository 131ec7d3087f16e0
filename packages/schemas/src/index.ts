export {
  ArchitectureBundleSchema,
  CertificateBundleSchema,
  ErrorResponseSchema,
  HealthResponseSchema,
  ServiceCatalogSchema,
  ServiceKindSchema,
  type ArchitectureBundle,
  type CertificateBundle,
  type ErrorResponse,
  type ServiceCatalog,
  type ServiceKind
} from './api';
export {LogEventSchema, type LogEvent} from './logEvent';
