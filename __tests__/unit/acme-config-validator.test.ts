import { describe, it, expect } from '@jest/globals';
import {
  isValidEmail,
  isValidServer,
  validateGenericAcmeConfig,
  validateProviderConfig,
  type AcmeConfig,
} from '../../src/index.js';

describe('isValidEmail', () => {
  it.each(['example@email.com', 'a@b.c', 'first.last+tag@sub.example.org'])(
    'accepts %p',
    (email) => {
      expect(isValidEmail(email)).toBe(true);
    },
  );

  it.each(['a@b', 'example.email.com', '@example.com', 'a@b.', ''])('rejects %p', (email) => {
    expect(isValidEmail(email)).toBe(false);
  });
});

describe('isValidServer', () => {
  it.each([
    'https://acme-v02.api.letsencrypt.org/directory',
    'https://host/path',
    'http://localhost:14000/dir',
  ])('accepts %p', (server) => {
    expect(isValidServer(server)).toBe(true);
  });

  it.each([
    'http:example.com',
    'https:/example.com',
    'example.com/directory',
    'https://',
    'file:///etc/acme',
    'not a url',
    '',
  ])('rejects %p', (server) => {
    expect(isValidServer(server)).toBe(false);
  });
});

describe('validateGenericAcmeConfig', () => {
  it('accepts a complete configuration', () => {
    expect(
      validateGenericAcmeConfig({ email: 'example@email.com', server: 'https://host/path' }),
    ).toEqual({ ok: true });
  });

  const cases: Array<[AcmeConfig, string]> = [
    [{}, 'Email address was not provided'],
    [{ email: '', server: 'https://host/path' }, 'Email address was not provided'],
    [{ server: 'https://host/path' }, 'Email address was not provided'],
    [{ email: 'a@b.c' }, 'ACME server was not provided'],
    [{ email: 'a@b', server: 'http:example.com' }, 'Invalid email address'],
    [{ email: 'a@b.c', server: 'http:example.com' }, 'Invalid ACME server'],
    [{ email: 'a@b.c', server: 'https:/example.com' }, 'Invalid ACME server'],
  ];

  it.each(cases)('checks %p in order', (config, reason) => {
    expect(validateGenericAcmeConfig(config)).toEqual({ ok: false, reason });
  });
});

describe('validateProviderConfig', () => {
  it('lists every missing key in declaration order', () => {
    expect(validateProviderConfig({ A: 'x' }, ['A', 'B', 'C'])).toEqual({
      ok: false,
      reason: 'The following config options must be set: B, C',
    });
  });

  it('treats empty values as missing', () => {
    expect(validateProviderConfig({ A: '', B: 'y' }, ['A', 'B'])).toEqual({
      ok: false,
      reason: 'The following config options must be set: A',
    });
  });

  it('passes when nothing is required', () => {
    expect(validateProviderConfig({}, [])).toEqual({ ok: true });
  });
});
