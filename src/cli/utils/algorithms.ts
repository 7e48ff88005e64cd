import { select } from '@inquirer/prompts';
import type { CsrAlgorithm } from '../../index.js';

export const ALGORITHM_CODES = ['ec-p256', 'ec-p384', 'ec-p521', 'rsa-2048', 'rsa-3072', 'rsa-4096'];

/** Prompt for the key algorithm of a new CSR. */
export async function selectAlgorithm(): Promise<CsrAlgorithm> {
  const code = await select({
    message: 'Select key algorithm for the CSR:',
    choices: [
      { name: 'ECDSA P-256 (recommended)', value: 'ec-p256' },
      { name: 'ECDSA P-384', value: 'ec-p384' },
      { name: 'RSA 2048', value: 'rsa-2048' },
      { name: 'RSA 4096', value: 'rsa-4096' },
    ],
  });
  return parseAlgorithm(code);
}

/** Parse a short algorithm code (e.g. ec-p256) into a CSR algorithm descriptor. */
export function parseAlgorithm(code: string): CsrAlgorithm {
  switch (code) {
    case 'ec-p256':
      return { kind: 'ec', namedCurve: 'P-256', hash: 'SHA-256' };
    case 'ec-p384':
      return { kind: 'ec', namedCurve: 'P-384', hash: 'SHA-384' };
    case 'ec-p521':
      return { kind: 'ec', namedCurve: 'P-521', hash: 'SHA-512' };
    case 'rsa-2048':
      return { kind: 'rsa', modulusLength: 2048, hash: 'SHA-256' };
    case 'rsa-3072':
      return { kind: 'rsa', modulusLength: 3072, hash: 'SHA-256' };
    case 'rsa-4096':
      return { kind: 'rsa', modulusLength: 4096, hash: 'SHA-384' };
    default:
      throw new Error(`Unknown algorithm: ${code}. Use one of ${ALGORITHM_CODES.join(', ')}`);
  }
}
