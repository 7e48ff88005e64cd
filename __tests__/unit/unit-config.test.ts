import { describe, it, expect } from '@jest/globals';
import {
  ConfigError,
  StaticConfigSource,
  acmeConfigFrom,
  acmeServers,
  friendlyServerName,
  parseUnitConfig,
  resolveServerUrl,
} from '../../src/index.js';

describe('parseUnitConfig', () => {
  it('keeps strings and stringifies numbers and booleans', () => {
    expect(
      parseUnitConfig({ email: 'admin@example.com', gandi_ttl: 300, namecheap_sandbox: true }),
    ).toEqual({ email: 'admin@example.com', gandi_ttl: '300', namecheap_sandbox: 'true' });
  });

  it('drops null values', () => {
    expect(parseUnitConfig({ email: null, server: 'https://acme.test/dir' })).toEqual({
      server: 'https://acme.test/dir',
    });
  });

  it('rejects arrays and scalars', () => {
    expect(() => parseUnitConfig(['email'])).toThrow(
      'Configuration must be a flat JSON object: got an array',
    );
    expect(() => parseUnitConfig('email')).toThrow(ConfigError);
  });

  it('rejects nested values', () => {
    expect(() => parseUnitConfig({ gandi: { api_key: 'x' } })).toThrow(
      'Configuration value for gandi must be a string, number or boolean',
    );
  });
});

describe('StaticConfigSource', () => {
  it('returns fresh values after setConfig', () => {
    const source = new StaticConfigSource({ email: 'a@example.com' });
    expect(acmeConfigFrom(source)).toEqual({ email: 'a@example.com', server: undefined });

    source.setConfig({ server: 'https://acme.test/dir' });
    expect(acmeConfigFrom(source)).toEqual({ email: undefined, server: 'https://acme.test/dir' });
  });

  it('merges updates and unsets undefined keys', () => {
    const source = new StaticConfigSource({ email: 'a@example.com', gandi_ttl: '300' });
    source.update({ gandi_ttl: undefined, gandi_api_key: 'test-secret' });
    expect(source.get('gandi_ttl')).toBeUndefined();
    expect(source.get('gandi_api_key')).toBe('test-secret');
    expect(source.get('email')).toBe('a@example.com');
  });

  it('does not expose its internal map through snapshot', () => {
    const source = new StaticConfigSource({ email: 'a@example.com' });
    const snapshot = { ...source.snapshot(), email: 'changed@example.com' };
    expect(snapshot.email).toBe('changed@example.com');
    expect(source.get('email')).toBe('a@example.com');
  });
});

describe('resolveServerUrl', () => {
  it('prefers the staging and production flags', () => {
    expect(resolveServerUrl({ staging: true, server: 'https://other/dir' })).toBe(
      'https://acme-staging-v02.api.letsencrypt.org/directory',
    );
    expect(resolveServerUrl({ production: true })).toBe(
      'https://acme-v02.api.letsencrypt.org/directory',
    );
  });

  it('lets --server override the configured value', () => {
    expect(resolveServerUrl({ server: 'https://a/dir', configured: 'https://b/dir' })).toBe(
      'https://a/dir',
    );
    expect(resolveServerUrl({ configured: 'https://b/dir' })).toBe('https://b/dir');
    expect(resolveServerUrl({})).toBeUndefined();
  });

  it('names known directories', () => {
    expect(friendlyServerName(acmeServers.zerossl.production.directoryUrl)).toBe(
      'ZeroSSL Production',
    );
    expect(friendlyServerName('https://unknown/dir')).toBeUndefined();
  });
});
