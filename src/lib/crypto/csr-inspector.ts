/**
 * Reads the subject of an incoming certificate signing request.
 *
 * Parsing and policy are separate: `extractSubject` only fails on requests it
 * cannot read, `checkSubjectLength` applies the issuance limit on top.
 */

import { Pkcs10CertificateRequest } from '@peculiar/x509';
import { MAX_SUBJECT_LENGTH } from '../constants/defaults.js';
import { CsrParseError, SubjectTooLongError } from '../errors/errors.js';

const PEM_CSR_PATTERN =
  /-----BEGIN (NEW )?CERTIFICATE REQUEST-----[\s\S]+-----END (NEW )?CERTIFICATE REQUEST-----/;

/** Common name of the request subject. */
export function extractSubject(pem: string): string {
  const match = PEM_CSR_PATTERN.exec(pem);
  if (!match) throw CsrParseError.notPem();

  let csr: Pkcs10CertificateRequest;
  try {
    csr = new Pkcs10CertificateRequest(match[0]);
  } catch (e) {
    throw CsrParseError.undecodable(e instanceof Error ? e.message : String(e));
  }

  const [commonName] = csr.subjectName.getField('CN');
  if (!commonName) throw CsrParseError.missingCommonName();
  return commonName;
}

/** Returns the violation, if any. */
export function checkSubjectLength(
  subject: string,
  limit = MAX_SUBJECT_LENGTH,
): SubjectTooLongError | undefined {
  return subject.length > limit ? new SubjectTooLongError(subject, limit) : undefined;
}
