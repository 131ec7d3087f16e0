import {promises as fs} from 'node:fs';
import path from 'node:path';

import {z} from 'zod';

import {buildArchitecture, type BuiltArchitecture} from './builder';
import {createLocalCertificateCache} from './certificateCache';
import {formatIssues, parseArchitectureConfigDocument, parseYamlDocument, type ArchitectureConfig} from './config';
import {ConfigurationError} from './errors';
import {loadKeySet, type KeySet} from './keys';

const KeySetFileSchema = z
  .object({
    'path-prefix': z.string().min(1).optional(),
    keys: z.record(
      z.string().min(1),
      z
        .object({
          path: z.string().min(1),
          'public-only': z.boolean().default(false)
        })
        .strict()
    )
  })
  .strict();

const StaticConfigurationSchema = z.object({
  'external-url-prefix': z.url().optional(),
  keysets: z.record(z.string().min(1), KeySetFileSchema).default({}),
  'pki-architectures': z.record(z.string().min(1), z.unknown()).default({})
});

export type StaticConfiguration = {
  externalUrlPrefix?: string;
  keySets: ReadonlyMap<string, KeySet>;
  architectures: ReadonlyMap<string, ArchitectureConfig>;
};

export const loadStaticConfiguration = async ({
  configPath,
  keyDir
}: {
  configPath: string;
  keyDir?: string;
}): Promise<StaticConfiguration> => {
  let raw: Buffer;
  try {
    raw = await fs.readFile(configPath);
  } catch (error) {
    throw new ConfigurationError(
      `Failed to read configuration file ${configPath}: ${error instanceof Error ? error.message : String(error)}`,
      {cause: error}
    );
  }

  const parsed = StaticConfigurationSchema.safeParse(parseYamlDocument(raw));
  if (!parsed.success) {
    throw new ConfigurationError(`Invalid configuration file ${configPath}: ${formatIssues(parsed.error)}`);
  }

  const baseDir = keyDir ?? path.dirname(configPath);
  const keySets = await Promise.all(
    Object.entries(parsed.data.keysets).map(([name, spec]) =>
      loadKeySet({
        name,
        baseDir,
        spec: {
          ...(spec['path-prefix'] !== undefined ? {pathPrefix: spec['path-prefix']} : {}),
          keys: Object.fromEntries(
            Object.entries(spec.keys).map(([label, key]) => [label, {path: key.path, publicOnly: key['public-only']}])
          )
        }
      })
    )
  );

  const architectures = new Map<string, ArchitectureConfig>();
  for (const [archLabel, document] of Object.entries(parsed.data['pki-architectures'])) {
    try {
      architectures.set(archLabel, parseArchitectureConfigDocument(document));
    } catch (error) {
      if (error instanceof ConfigurationError) {
        throw new ConfigurationError(`Architecture ${archLabel}: ${error.message}`, {cause: error});
      }
      throw error;
    }
  }

  return {
    ...(parsed.data['external-url-prefix'] !== undefined
      ? {externalUrlPrefix: parsed.data['external-url-prefix']}
      : {}),
    keySets: new Map(keySets.map(keySet => [keySet.name, keySet])),
    architectures
  };
};

/**
 * Builds every preconfigured architecture once. Their certificates live in
 * a process-local cache and never touch the shared store.
 */
export const buildStaticArchitectures = async ({
  configuration,
  externalUrlPrefix
}: {
  configuration: StaticConfiguration;
  externalUrlPrefix: string;
}): Promise<Map<string, BuiltArchitecture>> => {
  const built = await Promise.all(
    [...configuration.architectures].map(([label, config]) =>
      buildArchitecture({
        label,
        config,
        keySets: configuration.keySets,
        externalUrlPrefix,
        certCache: createLocalCertificateCache()
      })
    )
  );

  return new Map(built.map(architecture => [architecture.label, architecture]));
};
