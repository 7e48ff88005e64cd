/**
 * DNS provider plugin contract
 *
 * A provider knows which lego DNS plugin it drives, how unit configuration
 * keys map to that plugin's environment variables, and which of them are
 * mandatory.
 */

import { validateProviderConfig } from '../config/acme-config-validator.js';
import type { ConfigSource, ProviderEnvironment, ValidationResult } from '../types/config.js';

export interface DnsProvider {
  /** Registry name, e.g. `gandiv5` */
  readonly name: string;
  /** Value passed to `lego --dns` */
  readonly plugin: string;
  /** Environment variable names that must be set before running lego */
  requiredKeys(): ReadonlySet<string>;
  /** Current configuration as lego environment; unset optional options are omitted */
  environment(): ProviderEnvironment;
  validate(): ValidationResult;
}

/** One unit config key feeding one environment variable. */
export interface ProviderOption {
  configKey: string;
  envName: string;
  required?: boolean;
  description?: string;
}

/**
 * Table-driven provider. Subclasses declare their options; the environment
 * and validation follow from them.
 */
export abstract class BaseDnsProvider implements DnsProvider {
  abstract readonly name: string;
  abstract readonly plugin: string;
  abstract readonly options: readonly ProviderOption[];

  constructor(protected readonly config: ConfigSource) {}

  requiredKeys(): ReadonlySet<string> {
    return new Set(this.options.filter((o) => o.required).map((o) => o.envName));
  }

  environment(): ProviderEnvironment {
    const env: Record<string, string> = {};
    for (const option of this.options) {
      const value = this.config.get(option.configKey);
      if (value) env[option.envName] = value;
    }
    return env;
  }

  validate(): ValidationResult {
    return validateProviderConfig(this.environment(), this.requiredKeys());
  }
}
