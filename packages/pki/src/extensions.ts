import type {ServiceCatalog} from '@adhoc-pki/schemas';
import {AsnConvert} from '@peculiar/asn1-schema';
import {
  AccessDescription,
  AuthorityInfoAccessSyntax,
  CRLDistributionPoints,
  DistributionPoint,
  DistributionPointName,
  GeneralName,
  id_ad_ocsp,
  id_ce_cRLDistributionPoints,
  id_pe_authorityInfoAccess
} from '@peculiar/asn1-x509';
import * as x509 from '@peculiar/x509';
import {z} from 'zod';

import {toArrayBuffer} from './bytes';
import {formatIssues, type ExtensionSpec, type ProfileSpec} from './config';
import {ConfigurationError} from './errors';

const ID_PKIX_OCSP_NOCHECK = '1.3.6.1.5.5.7.48.1.5';
const ASN1_NULL = new Uint8Array([0x05, 0x00]);

const KeyUsageNameSchema = z.enum([
  'digital_signature',
  'non_repudiation',
  'content_commitment',
  'key_encipherment',
  'data_encipherment',
  'key_agreement',
  'key_cert_sign',
  'crl_sign',
  'encipher_only',
  'decipher_only'
]);

const keyUsageFlags: Record<z.infer<typeof KeyUsageNameSchema>, number> = {
  digital_signature: x509.KeyUsageFlags.digitalSignature,
  non_repudiation: x509.KeyUsageFlags.nonRepudiation,
  content_commitment: x509.KeyUsageFlags.nonRepudiation,
  key_encipherment: x509.KeyUsageFlags.keyEncipherment,
  data_encipherment: x509.KeyUsageFlags.dataEncipherment,
  key_agreement: x509.KeyUsageFlags.keyAgreement,
  key_cert_sign: x509.KeyUsageFlags.keyCertSign,
  crl_sign: x509.KeyUsageFlags.cRLSign,
  encipher_only: x509.KeyUsageFlags.encipherOnly,
  decipher_only: x509.KeyUsageFlags.decipherOnly
};

const ExtendedKeyUsageNameSchema = z.enum([
  'server_auth',
  'client_auth',
  'code_signing',
  'email_protection',
  'time_stamping',
  'ocsp_signing'
]);

const extendedKeyUsageOids: Record<z.infer<typeof ExtendedKeyUsageNameSchema>, string> = {
  server_auth: '1.3.6.1.5.5.7.3.1',
  client_auth: '1.3.6.1.5.5.7.3.2',
  code_signing: '1.3.6.1.5.5.7.3.3',
  email_protection: '1.3.6.1.5.5.7.3.4',
  time_stamping: '1.3.6.1.5.5.7.3.8',
  ocsp_signing: '1.3.6.1.5.5.7.3.9'
};

const OidSchema = z.string().regex(/^\d+(?:\.\d+)+$/u, 'Expected a dotted OID');
const ExtendedKeyUsageSchema = z.union([
  ExtendedKeyUsageNameSchema.transform(name => extendedKeyUsageOids[name]),
  OidSchema
]);

const BasicConstraintsValueSchema = z
  .object({
    ca: z.boolean().default(false),
    'path-len-constraint': z.number().int().gte(0).optional()
  })
  .strict();

const CrlDistUrlParamsSchema = z
  .object({
    'crl-repo-names': z.array(z.string().min(1)).default([]),
    urls: z.array(z.url()).default([])
  })
  .strict();

const AiaUrlsParamsSchema = z
  .object({
    'ocsp-responder-names': z.array(z.string().min(1)).default([]),
    'ocsp-urls': z.array(z.url()).default([])
  })
  .strict();

const parseWith = <T extends z.ZodType>({
  schema,
  value,
  what
}: {
  schema: T;
  value: unknown;
  what: string;
}): z.output<T> => {
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    throw new ConfigurationError(`Invalid ${what}: ${formatIssues(parsed.error)}`);
  }

  return parsed.data;
};

const requireSmartValue = ({spec, schema}: {spec: ExtensionSpec; schema: string}) => {
  const smartValue = spec['smart-value'];
  if (!smartValue) {
    return undefined;
  }
  if (smartValue.schema !== schema) {
    throw new ConfigurationError(`Extension ${spec.id} does not support smart value schema ${smartValue.schema}`);
  }

  return smartValue.params;
};

const resolveServiceUrls = ({
  names,
  endpoints,
  kind
}: {
  names: string[];
  endpoints: Record<string, string>;
  kind: string;
}) =>
  names.map(name => {
    const url = endpoints[name];
    if (url === undefined) {
      throw new ConfigurationError(`Unknown ${kind} service ${name}`);
    }

    return url;
  });

const uriName = (url: string) => new GeneralName({uniformResourceIdentifier: url});

const buildKeyUsage = (spec: ExtensionSpec) => {
  const names = parseWith({
    schema: z.array(KeyUsageNameSchema).min(1),
    value: requireSmartValue({spec, schema: 'key-usage'}) ?? spec.value,
    what: 'key_usage value'
  });
  const flags = names.reduce<number>((accumulator, name) => accumulator | keyUsageFlags[name], 0);

  return new x509.KeyUsagesExtension(flags, spec.critical);
};

const buildCrlDistributionPoints = ({spec, services}: {spec: ExtensionSpec; services: ServiceCatalog}) => {
  const params = parseWith({
    schema: CrlDistUrlParamsSchema,
    value: requireSmartValue({spec, schema: 'crl-dist-url'}) ?? {urls: spec.value},
    what: 'crl_distribution_points value'
  });
  const urls = [
    ...resolveServiceUrls({names: params['crl-repo-names'], endpoints: services.crl_repo, kind: 'crl-repo'}),
    ...params.urls
  ];
  if (urls.length === 0) {
    throw new ConfigurationError('crl_distribution_points needs at least one URL');
  }

  const distributionPoints = new CRLDistributionPoints(
    urls.map(
      url =>
        new DistributionPoint({
          distributionPoint: new DistributionPointName({fullName: [uriName(url)]})
        })
    )
  );

  return new x509.Extension(id_ce_cRLDistributionPoints, spec.critical, AsnConvert.serialize(distributionPoints));
};

const buildAuthorityInformationAccess = ({spec, services}: {spec: ExtensionSpec; services: ServiceCatalog}) => {
  const params = parseWith({
    schema: AiaUrlsParamsSchema,
    value: requireSmartValue({spec, schema: 'aia-urls'}) ?? {'ocsp-urls': spec.value},
    what: 'authority_information_access value'
  });
  const urls = [
    ...resolveServiceUrls({names: params['ocsp-responder-names'], endpoints: services.ocsp, kind: 'ocsp'}),
    ...params['ocsp-urls']
  ];
  if (urls.length === 0) {
    throw new ConfigurationError('authority_information_access needs at least one URL');
  }

  const accessDescriptions = new AuthorityInfoAccessSyntax(
    urls.map(url => new AccessDescription({accessMethod: id_ad_ocsp, accessLocation: uriName(url)}))
  );

  return new x509.Extension(id_pe_authorityInfoAccess, spec.critical, AsnConvert.serialize(accessDescriptions));
};

export const buildExtension = ({spec, services}: {spec: ExtensionSpec; services: ServiceCatalog}): x509.Extension => {
  switch (spec.id) {
    case 'basic_constraints': {
      const value = parseWith({
        schema: BasicConstraintsValueSchema,
        value: spec.value ?? {},
        what: 'basic_constraints value'
      });
      return new x509.BasicConstraintsExtension(value.ca, value['path-len-constraint'], spec.critical);
    }
    case 'key_usage':
      return buildKeyUsage(spec);
    case 'extended_key_usage': {
      const usages = parseWith({
        schema: z.array(ExtendedKeyUsageSchema).min(1),
        value: spec.value,
        what: 'extended_key_usage value'
      });
      return new x509.ExtendedKeyUsageExtension(usages, spec.critical);
    }
    case 'crl_distribution_points':
      return buildCrlDistributionPoints({spec, services});
    case 'authority_information_access':
      return buildAuthorityInformationAccess({spec, services});
    case 'ocsp_no_check':
      return new x509.Extension(ID_PKIX_OCSP_NOCHECK, spec.critical, toArrayBuffer(ASN1_NULL));
    default:
      throw new ConfigurationError(`Unsupported extension ${spec.id}`);
  }
};

const SimpleCaParamsSchema = z
  .object({
    'max-path-len': z.number().int().gte(0).optional(),
    'crl-repo': z.string().min(1).optional(),
    'ocsp-service': z.string().min(1).optional()
  })
  .strict();

const NoParamsSchema = z.object({}).strict();

export type ProfileExtensions = {
  // extensions of the certificate carrying the profile
  own: ExtensionSpec[];
  // extensions added to certificates the profile's holder issues
  issued: ExtensionSpec[];
};

export const expandProfile = (profile: ProfileSpec): ProfileExtensions => {
  switch (profile.id) {
    case 'simple-ca': {
      const params = parseWith({schema: SimpleCaParamsSchema, value: profile.params, what: 'simple-ca params'});
      const issued: ExtensionSpec[] = [];
      if (params['crl-repo'] !== undefined) {
        issued.push({
          id: 'crl_distribution_points',
          critical: false,
          'smart-value': {schema: 'crl-dist-url', params: {'crl-repo-names': [params['crl-repo']]}}
        });
      }
      if (params['ocsp-service'] !== undefined) {
        issued.push({
          id: 'authority_information_access',
          critical: false,
          'smart-value': {schema: 'aia-urls', params: {'ocsp-responder-names': [params['ocsp-service']]}}
        });
      }

      return {
        own: [
          {
            id: 'basic_constraints',
            critical: true,
            value:
              params['max-path-len'] === undefined ? {ca: true} : {ca: true, 'path-len-constraint': params['max-path-len']}
          },
          {id: 'key_usage', critical: true, value: ['digital_signature', 'key_cert_sign', 'crl_sign']}
        ],
        issued
      };
    }
    case 'ocsp-responder':
      parseWith({schema: NoParamsSchema, value: profile.params, what: 'ocsp-responder params'});
      return {
        own: [
          {id: 'key_usage', critical: true, value: ['digital_signature']},
          {id: 'extended_key_usage', critical: true, value: ['ocsp_signing']},
          {id: 'ocsp_no_check', critical: false}
        ],
        issued: []
      };
    case 'digsig-commitment':
      parseWith({schema: NoParamsSchema, value: profile.params, what: 'digsig-commitment params'});
      return {
        own: [{id: 'key_usage', critical: true, value: ['digital_signature', 'non_repudiation']}],
        issued: []
      };
    default:
      throw new ConfigurationError(`Unsupported profile ${profile.id}`);
  }
};
