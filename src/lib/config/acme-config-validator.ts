/**
 * Validation of the generic ACME settings and of provider credentials.
 *
 * Both validators return the first (generic) or the complete (provider) reason
 * as a single human-readable line, ready to be used as a blocked status.
 */

import { STATUS_MESSAGE } from '../constants/status.js';
import type { AcmeConfig, ProviderEnvironment, ValidationResult } from '../types/config.js';

const EMAIL_PATTERN = /^[^@]+@[^@]+\.[^@]+/;
const AUTHORITY_PATTERN = /^[a-z][a-z0-9+.-]*:\/\/[^/?#]+/i;

export const VALID: ValidationResult = { ok: true };

export function invalid(reason: string): ValidationResult {
  return { ok: false, reason };
}

/** `local@domain.tld`, checked as a prefix the way lego's own config is. */
export function isValidEmail(email: string): boolean {
  return EMAIL_PATTERN.test(email);
}

/**
 * Absolute URL with both a scheme and a host. The host must be spelled out as
 * an authority: `http:example.com` parses, but names no host.
 */
export function isValidServer(server: string): boolean {
  if (!AUTHORITY_PATTERN.test(server)) return false;
  let url: URL;
  try {
    url = new URL(server);
  } catch {
    return false;
  }
  return url.protocol.length > 1 && url.host.length > 0;
}

/**
 * Checks, in order: email present, server present, email format, server URL.
 */
export function validateGenericAcmeConfig(config: AcmeConfig): ValidationResult {
  if (!config.email) return invalid(STATUS_MESSAGE.EMAIL_MISSING);
  if (!config.server) return invalid(STATUS_MESSAGE.SERVER_MISSING);
  if (!isValidEmail(config.email)) return invalid(STATUS_MESSAGE.EMAIL_INVALID);
  if (!isValidServer(config.server)) return invalid(STATUS_MESSAGE.SERVER_INVALID);
  return VALID;
}

/**
 * Fails listing every required key without a non-empty value, in the order
 * the provider declares them.
 */
export function validateProviderConfig(
  environment: ProviderEnvironment,
  requiredKeys: Iterable<string>,
): ValidationResult {
  const missing = [...requiredKeys].filter((key) => !environment[key]);
  if (missing.length > 0) {
    return invalid(`The following config options must be set: ${missing.join(', ')}`);
  }
  return VALID;
}
