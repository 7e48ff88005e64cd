import { existsSync, readFileSync } from 'fs';
import { ConfigError, parseUnitConfig, resolveServerUrl, type UnitConfig } from '../../index.js';

/** Flags that override values of the config file. */
export interface ConfigOverrides {
  config?: string;
  email?: string;
  server?: string;
  staging?: boolean;
  production?: boolean;
}

/**
 * Unit configuration from a JSON file (optional) with CLI overrides applied.
 */
export function loadUnitConfig(opts: ConfigOverrides): UnitConfig {
  let fromFile: UnitConfig = {};
  if (opts.config) {
    if (!existsSync(opts.config)) {
      throw new ConfigError(`Config file not found: ${opts.config}`, { path: opts.config });
    }
    let raw: unknown;
    try {
      raw = JSON.parse(readFileSync(opts.config, 'utf-8'));
    } catch (e) {
      throw ConfigError.invalidDocument(e instanceof Error ? e.message : String(e));
    }
    fromFile = parseUnitConfig(raw);
  }

  const server = resolveServerUrl({ ...opts, configured: fromFile.server });
  return {
    ...fromFile,
    ...(opts.email && { email: opts.email }),
    ...(server && { server }),
  };
}
