/**
 * Default configuration constants for the DNS-01 issuer
 *
 * Paths match the layout the lego client uses inside its workload container.
 */

// External ACME client
export const LEGO_BINARY = 'lego';
export const LEGO_WORKING_DIR = '/tmp';
export const CSR_PATH = '/tmp/csr.pem';
export const CERTIFICATES_DIR = '/tmp/.lego/certificates';
export const LEGO_TIMEOUT_MS = 300_000; // 5 minutes

// Subject policy: upper bound of the X.520 common name
export const MAX_SUBJECT_LENGTH = 64;

// Diagnostics
export const MAX_LOGGED_STDERR_LINES = 200;
export const MIN_REDACTED_SECRET_LENGTH = 4;
export const REDACTED = '***';
