import { UnknownProviderError } from '../errors/errors.js';
import type { ConfigSource } from '../types/config.js';
import type { BaseDnsProvider } from './dns-provider.js';
import { GandiLiveDnsProvider } from './gandi.js';
import { NamecheapProvider } from './namecheap.js';

type ProviderConstructor = new (config: ConfigSource) => BaseDnsProvider;

const providers: Record<string, ProviderConstructor> = {
  gandiv5: GandiLiveDnsProvider,
  namecheap: NamecheapProvider,
};

export function listDnsProviders(): string[] {
  return Object.keys(providers).sort();
}

/**
 * Instantiate a registered provider bound to `config`.
 * @throws UnknownProviderError for unregistered names
 */
export function createDnsProvider(name: string, config: ConfigSource): BaseDnsProvider {
  const Provider = Object.hasOwn(providers, name) ? providers[name] : undefined;
  if (!Provider) throw new UnknownProviderError(name, listDnsProviders());
  return new Provider(config);
}
