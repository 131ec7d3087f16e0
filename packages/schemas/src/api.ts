import {z} from 'zod';

const Base64Schema = z.string().regex(/^[A-Za-z0-9+/]*={0,2}$/u, 'Expected base64 data');

export const ErrorResponseSchema = z
  .object({
    error: z.string().min(1),
    message: z.string().min(1),
    correlation_id: z.string().min(1)
  })
  .strict();

export type ErrorResponse = z.infer<typeof ErrorResponseSchema>;

export const CertificateBundleSchema = z
  .object({
    cert: Base64Schema.min(1),
    key: Base64Schema.min(1).optional(),
    other_certs: z.array(z.string().min(1))
  })
  .strict();

export type CertificateBundle = z.infer<typeof CertificateBundleSchema>;

export const ServiceKindSchema = z.enum(['ocsp', 'time_stamping', 'crl_repo', 'cert_repo', 'plugin']);

export type ServiceKind = z.infer<typeof ServiceKindSchema>;

const ServiceEndpointMapSchema = z.record(z.string().min(1), z.url());

export const ServiceCatalogSchema = z
  .object({
    ocsp: ServiceEndpointMapSchema,
    time_stamping: ServiceEndpointMapSchema,
    crl_repo: ServiceEndpointMapSchema,
    cert_repo: ServiceEndpointMapSchema,
    plugin: ServiceEndpointMapSchema
  })
  .strict();

export type ServiceCatalog = z.infer<typeof ServiceCatalogSchema>;

/**
 * JSON document returned for a registered or resolved architecture. Every
 * label in `other_certs` refers to another entry of `cert_bundles`.
 */
export const ArchitectureBundleSchema = z
  .object({
    arch_label: z.string().min(1),
    cert_bundles: z.record(z.string().min(1), CertificateBundleSchema),
    services: ServiceCatalogSchema
  })
  .strict();

export type ArchitectureBundle = z.infer<typeof ArchitectureBundleSchema>;

export const HealthResponseSchema = z.object({status: z.literal('ok')}).strict();
