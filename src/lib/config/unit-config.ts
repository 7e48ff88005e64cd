import { ConfigError } from '../errors/errors.js';
import type { AcmeConfig, ConfigSource, UnitConfig } from '../types/config.js';

/**
 * Normalize a parsed JSON document into a flat unit configuration.
 * Numbers and booleans are stringified; `null` means unset.
 */
export function parseUnitConfig(raw: unknown): UnitConfig {
  if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
    throw ConfigError.invalidDocument(Array.isArray(raw) ? 'got an array' : `got ${typeof raw}`);
  }

  const config: Record<string, string | undefined> = {};
  for (const [key, value] of Object.entries(raw)) {
    if (value === null || value === undefined) continue;
    if (typeof value === 'string') config[key] = value;
    else if (typeof value === 'number' || typeof value === 'boolean') config[key] = String(value);
    else throw ConfigError.invalidValue(key);
  }
  return config;
}

export function acmeConfigFrom(source: ConfigSource): AcmeConfig {
  return { email: source.get('email'), server: source.get('server') };
}

/**
 * In-memory config source. `setConfig` replaces the whole document, the way a
 * config-changed event does.
 */
export class StaticConfigSource implements ConfigSource {
  private config: UnitConfig;

  constructor(config: UnitConfig = {}) {
    this.config = { ...config };
  }

  get(key: string): string | undefined {
    return this.config[key];
  }

  snapshot(): UnitConfig {
    return { ...this.config };
  }

  setConfig(config: UnitConfig): void {
    this.config = { ...config };
  }

  /** Merge `patch` over the current values; `undefined` unsets a key. */
  update(patch: UnitConfig): void {
    this.config = { ...this.config, ...patch };
  }
}
