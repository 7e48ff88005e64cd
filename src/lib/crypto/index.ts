/**
 * CSR generation and inspection
 */

export {
  generateKeyPair,
  createCsr,
  type CsrEcAlgorithm,
  type CsrRsaAlgorithm,
  type CsrAlgorithm,
  type CsrKeyPair,
  type CreateCsrResult,
} from './csr.js';

export { extractSubject, checkSubjectLength } from './csr-inspector.js';
