/**
 * Issuer error codes
 *
 * Each code maps to one failure class of the request pipeline and decides the
 * status outcome: everything is blocking except infrastructure unavailability,
 * which makes the unit wait and defers the request.
 */
export const ISSUER_ERROR = {
  /** Missing or malformed settings */
  config: 'CONFIG_ERROR',
  /** The CSR is not a parsable PEM request or has no common name */
  csrParse: 'CSR_PARSE_ERROR',
  /** The CSR subject breaks the length policy */
  subjectPolicy: 'SUBJECT_POLICY_ERROR',
  /** The ACME client exited non-zero or timed out */
  execution: 'EXECUTION_ERROR',
  /** The client succeeded but its chain could not be read */
  retrieval: 'RETRIEVAL_ERROR',
  /** The execution backend cannot be reached */
  infrastructureUnavailable: 'INFRASTRUCTURE_UNAVAILABLE',
  /** No DNS provider registered under the requested name */
  unknownProvider: 'UNKNOWN_PROVIDER',
} as const;

export type IssuerErrorCode = (typeof ISSUER_ERROR)[keyof typeof ISSUER_ERROR];
