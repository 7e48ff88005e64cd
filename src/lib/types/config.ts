/**
 * Flat unit configuration as delivered by the host, e.g.
 * `{ email: 'admin@example.com', server: 'https://…/directory', gandi_api_key: '…' }`.
 */
export type UnitConfig = Readonly<Record<string, string | undefined>>;

/** Generic ACME settings, derived fresh from the unit configuration on every pass. */
export interface AcmeConfig {
  /** ACME account contact */
  email?: string;
  /** ACME directory URL */
  server?: string;
}

/** Environment variable name (upper case, lego plugin convention) to value. */
export type ProviderEnvironment = Readonly<Record<string, string>>;

/**
 * Live view over the unit configuration. Implementations must return the
 * current value on every call.
 */
export interface ConfigSource {
  get(key: string): string | undefined;
  snapshot(): UnitConfig;
}

export type ValidationResult = { ok: true } | { ok: false; reason: string };
