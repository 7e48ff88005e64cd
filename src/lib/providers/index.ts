export { BaseDnsProvider, type DnsProvider, type ProviderOption } from './dns-provider.js';
export { GandiLiveDnsProvider } from './gandi.js';
export { NamecheapProvider } from './namecheap.js';
export { createDnsProvider, listDnsProviders } from './registry.js';
