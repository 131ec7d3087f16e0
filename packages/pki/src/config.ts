import {parse as parseYaml} from 'yaml';
import {z} from 'zod';

import {ConfigurationError} from './errors';

const LabelSchema = z.string().min(1);

// accepts both "+00:00" and the compact "+0000" offset form
const DateTimeSchema = z.union([z.string(), z.date()]).transform((value, ctx) => {
  const date = typeof value === 'string' ? new Date(value.trim().replace(/([+-]\d{2})(\d{2})$/u, '$1:$2')) : value;
  if (Number.isNaN(date.getTime())) {
    ctx.addIssue({code: 'custom', message: `Invalid date-time: ${String(value)}`});
    return z.NEVER;
  }

  return date;
});

export const EntitySchema = z
  .object({
    'country-name': z.string().min(1).optional(),
    'state-or-province-name': z.string().min(1).optional(),
    'locality-name': z.string().min(1).optional(),
    'organization-name': z.string().min(1).optional(),
    'organizational-unit-name': z.string().min(1).optional(),
    'common-name': z.string().min(1).optional(),
    'email-address': z.string().min(1).optional()
  })
  .strict();

export type Entity = z.infer<typeof EntitySchema>;

export const ExtensionSpecSchema = z
  .object({
    id: LabelSchema,
    critical: z.boolean().default(false),
    value: z.unknown().optional(),
    'smart-value': z
      .object({
        schema: LabelSchema,
        params: z.unknown().optional()
      })
      .strict()
      .optional()
  })
  .strict();

export type ExtensionSpec = z.infer<typeof ExtensionSpecSchema>;

export const ProfileSpecSchema = z.union([
  LabelSchema.transform((id): {id: string; params: Record<string, unknown>} => ({id, params: {}})),
  z
    .object({
      id: LabelSchema,
      params: z.record(z.string(), z.unknown()).default({})
    })
    .strict()
]);

export type ProfileSpec = z.infer<typeof ProfileSpecSchema>;

const ValiditySchema = z
  .object({
    'valid-from': DateTimeSchema,
    'valid-to': DateTimeSchema
  })
  .strict();

// Unknown cert keys are tolerated; only the ones below drive issuance.
export const CertSpecSchema = z.object({
  subject: LabelSchema.optional(),
  'subject-key': LabelSchema.optional(),
  issuer: LabelSchema.optional(),
  'issuer-cert': LabelSchema.optional(),
  'authority-key': LabelSchema.optional(),
  validity: ValiditySchema.optional(),
  serial: z.number().int().positive().optional(),
  template: LabelSchema.optional(),
  extensions: z.array(ExtensionSpecSchema).optional(),
  profiles: z.array(ProfileSpecSchema).optional(),
  revocation: z.unknown().optional()
});

export type CertSpec = z.infer<typeof CertSpecSchema>;

const ServiceEntriesSchema = z.record(LabelSchema, z.unknown());

// `issuer-cert` defaults to the certificate labelled like `for-issuer`.
export const CertRepoSpecSchema = z.object({
  'for-issuer': LabelSchema,
  'issuer-cert': LabelSchema.optional(),
  'publish-issued-certs': z.boolean().default(true)
});

export type CertRepoSpec = z.infer<typeof CertRepoSpecSchema>;

export const ServicesSpecSchema = z.object({
  ocsp: ServiceEntriesSchema.optional(),
  'crl-repo': ServiceEntriesSchema.optional(),
  'cert-repo': z.record(LabelSchema, CertRepoSpecSchema).optional(),
  'time-stamping': ServiceEntriesSchema.optional(),
  plugin: z.record(LabelSchema, ServiceEntriesSchema).optional()
});

export type ServicesSpec = z.infer<typeof ServicesSpecSchema>;

export const ArchitectureConfigSchema = z.object({
  keyset: LabelSchema.optional(),
  'entity-defaults': EntitySchema.optional(),
  entities: z.record(LabelSchema, EntitySchema),
  certs: z
    .record(LabelSchema, CertSpecSchema)
    .refine(certs => Object.keys(certs).length > 0, 'At least one certificate is required'),
  services: ServicesSpecSchema.optional()
});

export type ArchitectureConfig = z.infer<typeof ArchitectureConfigSchema>;

export const formatIssues = (error: z.ZodError) =>
  error.issues
    .map(issue => (issue.path.length > 0 ? `${issue.path.map(String).join('.')}: ${issue.message}` : issue.message))
    .join('; ');

const utf8Decoder = new TextDecoder('utf-8', {fatal: true});

export const parseYamlDocument = (raw: Uint8Array | string): unknown => {
  let text: string;
  try {
    text = typeof raw === 'string' ? raw : utf8Decoder.decode(raw);
  } catch (error) {
    throw new ConfigurationError('Configuration is not valid UTF-8', {cause: error});
  }

  try {
    return parseYaml(text);
  } catch (error) {
    throw new ConfigurationError(
      `Configuration is not valid YAML: ${error instanceof Error ? error.message : String(error)}`,
      {cause: error}
    );
  }
};

export const parseArchitectureConfigDocument = (document: unknown): ArchitectureConfig => {
  const parsed = ArchitectureConfigSchema.safeParse(document);
  if (!parsed.success) {
    throw new ConfigurationError(`Invalid architecture configuration: ${formatIssues(parsed.error)}`);
  }

  return parsed.data;
};

export const parseArchitectureConfig = (raw: Uint8Array | string): ArchitectureConfig =>
  parseArchitectureConfigDocument(parseYamlDocument(raw));
