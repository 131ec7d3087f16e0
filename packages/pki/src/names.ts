import type * as x509 from '@peculiar/x509';

import type {ArchitectureConfig, Entity} from './config';
import {ConfigurationError} from './errors';

// RDN order of the issued distinguished names
const attributeTypes: ReadonlyArray<readonly [keyof Entity, string]> = [
  ['country-name', 'C'],
  ['state-or-province-name', 'ST'],
  ['locality-name', 'L'],
  ['organization-name', 'O'],
  ['organizational-unit-name', 'OU'],
  ['common-name', 'CN'],
  ['email-address', 'E']
];

export const resolveEntityName = ({label, config}: {label: string; config: ArchitectureConfig}): x509.JsonName => {
  const entity = config.entities[label];
  if (!entity) {
    throw new ConfigurationError(`Unknown entity ${label}`);
  }

  const merged: Entity = {...config['entity-defaults'], ...entity};
  const jsonName: x509.JsonName = [];
  for (const [field, type] of attributeTypes) {
    const value = merged[field];
    if (value !== undefined) {
      jsonName.push({[type]: [value]});
    }
  }

  if (jsonName.length === 0) {
    throw new ConfigurationError(`Entity ${label} has no name attributes`);
  }

  return jsonName;
};
