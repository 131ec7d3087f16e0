import {describe, expect, it} from 'vitest';

import {ConfigurationError, parseArchitectureConfig} from '../index';

const minimalYaml = `
keyset: testing-ca
entities:
  root:
    common-name: Root CA
certs:
  root:
    issuer: root
    validity:
      valid-from: "2000-01-01T00:00:00+0000"
      valid-to: "2030-01-01T00:00:00+0000"
    profiles:
      - simple-ca
`;

describe('parseArchitectureConfig', () => {
  it('parses a YAML document and normalizes compact UTC offsets', () => {
    const config = parseArchitectureConfig(minimalYaml);

    expect(config.keyset).toBe('testing-ca');
    expect(config.certs.root?.validity?.['valid-from'].toISOString()).toBe('2000-01-01T00:00:00.000Z');
    expect(config.certs.root?.validity?.['valid-to'].toISOString()).toBe('2030-01-01T00:00:00.000Z');
    expect(config.certs.root?.profiles).toEqual([{id: 'simple-ca', params: {}}]);
  });

  it('accepts raw bytes and JSON documents', () => {
    const json = JSON.stringify({
      keyset: 'testing-ca',
      entities: {root: {'common-name': 'Root CA'}},
      certs: {
        root: {
          issuer: 'root',
          validity: {'valid-from': '2000-01-01T00:00:00Z', 'valid-to': '2030-01-01T00:00:00Z'}
        }
      }
    });

    const config = parseArchitectureConfig(Buffer.from(json, 'utf8'));

    expect(config.entities.root).toEqual({'common-name': 'Root CA'});
    expect(config.certs.root?.issuer).toBe('root');
  });

  it('defaults extension criticality to false', () => {
    const config = parseArchitectureConfig(`${minimalYaml}    extensions:\n      - id: ocsp_no_check\n`);

    expect(config.certs.root?.extensions).toEqual([{id: 'ocsp_no_check', critical: false}]);
  });

  it('drops unknown service kinds and keeps plugin services', () => {
    const config = parseArchitectureConfig(`${minimalYaml}
services:
  attr-cert-repo:
    role-aa: {for-issuer: root}
  ocsp:
    root: {for-issuer: root}
  plugin:
    dummy:
      first: {}
`);

    expect(config.services).toEqual({
      ocsp: {root: {'for-issuer': 'root'}},
      plugin: {dummy: {first: {}}}
    });
  });

  it('rejects bytes that are not UTF-8', () => {
    expect(() => parseArchitectureConfig(Uint8Array.from([0xc3, 0x28]))).toThrowError(
      new ConfigurationError('Configuration is not valid UTF-8')
    );
  });

  it('rejects malformed YAML', () => {
    expect(() => parseArchitectureConfig('certs: [unclosed')).toThrowError(/^Configuration is not valid YAML: /u);
  });

  it('reports schema violations with their path', () => {
    expect(() =>
      parseArchitectureConfig(`
entities:
  root:
    common-name: Root CA
    nickname: Boss
certs:
  root:
    issuer: root
`)
    ).toThrowError(/^Invalid architecture configuration: .*entities\.root/u);
  });

  it('requires at least one certificate', () => {
    expect(() => parseArchitectureConfig('entities: {}\ncerts: {}\n')).toThrowError(
      'Invalid architecture configuration: certs: At least one certificate is required'
    );
  });

  it('rejects unparseable validity dates', () => {
    expect(() =>
      parseArchitectureConfig(`
entities: {root: {common-name: Root CA}}
certs:
  root:
    issuer: root
    validity: {valid-from: yesterday, valid-to: "2030-01-01T00:00:00Z"}
`)
    ).toThrowError(/Invalid date-time: yesterday/u);
  });

  it('rejects an empty document', () => {
    expect(() => parseArchitectureConfig('')).toThrowError(ConfigurationError);
  });
});
