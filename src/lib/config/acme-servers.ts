// ACME directory endpoints lego can be pointed at

export interface AcmeServerEntry {
  /** The ACME directory URL for this environment */
  directoryUrl: string;
  /** Human-readable name for this directory */
  name: string;
  environment: 'staging' | 'production';
}

export interface AcmeServerConfig {
  letsencrypt: { staging: AcmeServerEntry; production: AcmeServerEntry };
  google: { staging: AcmeServerEntry; production: AcmeServerEntry };
  zerossl: { production: AcmeServerEntry };
}

/**
 * Pre-configured directories of common certificate authorities.
 *
 * @example
 * ```typescript
 * const config = { email: 'admin@example.com', server: acmeServers.letsencrypt.staging.directoryUrl };
 * ```
 */
export const acmeServers: AcmeServerConfig = {
  letsencrypt: {
    staging: {
      directoryUrl: 'https://acme-staging-v02.api.letsencrypt.org/directory',
      name: "Let's Encrypt Staging",
      environment: 'staging',
    },
    production: {
      directoryUrl: 'https://acme-v02.api.letsencrypt.org/directory',
      name: "Let's Encrypt Production",
      environment: 'production',
    },
  },
  google: {
    staging: {
      directoryUrl: 'https://dv.acme-v02.test-api.pki.goog/directory',
      name: 'Google Trust Services Staging',
      environment: 'staging',
    },
    production: {
      directoryUrl: 'https://dv.acme-v02.api.pki.goog/directory',
      name: 'Google Trust Services Production',
      environment: 'production',
    },
  },
  zerossl: {
    production: {
      directoryUrl: 'https://acme.zerossl.com/v2/DV90',
      name: 'ZeroSSL Production',
      environment: 'production',
    },
  },
};

/**
 * Server URL from CLI flags: `--staging` and `--production` pick Let's Encrypt,
 * `--server` wins over the configured value. Undefined when nothing applies.
 */
export function resolveServerUrl(opts: {
  staging?: boolean;
  production?: boolean;
  server?: string;
  configured?: string;
}): string | undefined {
  if (opts.staging) return acmeServers.letsencrypt.staging.directoryUrl;
  if (opts.production) return acmeServers.letsencrypt.production.directoryUrl;
  return opts.server ?? opts.configured;
}

/** Human-friendly name for a known directory URL. */
export function friendlyServerName(url: string): string | undefined {
  for (const environments of Object.values(acmeServers)) {
    for (const entry of Object.values<AcmeServerEntry>(environments)) {
      if (entry.directoryUrl === url) return entry.name;
    }
  }
  return undefined;
}
