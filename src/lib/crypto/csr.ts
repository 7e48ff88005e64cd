/**
 * CSR generation
 *
 * Produces PKCS#10 requests for the `create-csr` command and for tests that
 * need a real request to push through the pipeline.
 */

import { Crypto, CryptoKey } from '@peculiar/webcrypto';
import {
  cryptoProvider,
  Pkcs10CertificateRequestGenerator,
  SubjectAlternativeNameExtension,
  type Pkcs10CertificateRequestCreateParamsName,
} from '@peculiar/x509';

// Keys and signatures both come from @peculiar/webcrypto so @peculiar/x509 sees one key type
const provider = new Crypto();

cryptoProvider.set(provider);

export type CsrEcAlgorithm = {
  kind: 'ec';
  namedCurve: 'P-256' | 'P-384' | 'P-521';
  hash: 'SHA-256' | 'SHA-384' | 'SHA-512';
};

export type CsrRsaAlgorithm = {
  kind: 'rsa';
  modulusLength: 2048 | 3072 | 4096;
  hash: 'SHA-256' | 'SHA-384' | 'SHA-512';
};

export type CsrAlgorithm = CsrEcAlgorithm | CsrRsaAlgorithm;

export interface CsrKeyPair {
  publicKey: CryptoKey;
  privateKey?: CryptoKey | undefined;
}

export interface CreateCsrResult {
  /** PEM-encoded request, the form the certificates relation carries */
  pem: string;
  /** PEM-encoded PKCS#8 private key matching the request */
  privateKeyPem: string;
  keys: CsrKeyPair;
}

export async function generateKeyPair(algo: CsrAlgorithm): Promise<CsrKeyPair> {
  if (algo.kind === 'ec') {
    return provider.subtle.generateKey({ name: 'ECDSA', namedCurve: algo.namedCurve }, true, [
      'sign',
      'verify',
    ]);
  }

  return provider.subtle.generateKey(
    {
      name: 'RSASSA-PKCS1-v1_5',
      modulusLength: algo.modulusLength,
      publicExponent: new Uint8Array([0x01, 0x00, 0x01]),
      hash: algo.hash,
    },
    true,
    ['sign', 'verify'],
  );
}

function toPem(label: string, der: ArrayBuffer): string {
  const body = Buffer.from(der).toString('base64').match(/.{1,64}/g) ?? [];
  return `-----BEGIN ${label}-----\n${body.join('\n')}\n-----END ${label}-----\n`;
}

/**
 * Creates a CSR with SAN = all provided DNS names.
 * `commonName` defaults to the first DNS name.
 */
export async function createCsr(
  dnsNames: string[],
  algo: CsrAlgorithm,
  commonName: string = dnsNames[0],
): Promise<CreateCsrResult> {
  if (!dnsNames.length) {
    throw new Error('dnsNames must contain at least one DNS name');
  }

  const keys = await generateKeyPair(algo);
  if (!keys.privateKey) throw new Error('Key generation did not return a private key');

  const name: Pkcs10CertificateRequestCreateParamsName = `CN=${commonName}`;
  const san = new SubjectAlternativeNameExtension(dnsNames.map((n) => ({ type: 'dns', value: n })));

  const signingAlgorithm =
    algo.kind === 'ec'
      ? ({ name: 'ECDSA', hash: algo.hash } as const)
      : ({ name: 'RSASSA-PKCS1-v1_5', hash: algo.hash } as const);

  const csr = await Pkcs10CertificateRequestGenerator.create({
    name,
    keys,
    signingAlgorithm,
    extensions: [san],
  });

  const pkcs8 = await provider.subtle.exportKey('pkcs8', keys.privateKey);

  return { pem: csr.toString('pem'), privateKeyPem: toPem('PRIVATE KEY', pkcs8), keys };
}
