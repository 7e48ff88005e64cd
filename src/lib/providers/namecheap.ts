import { BaseDnsProvider, type ProviderOption } from './dns-provider.js';

export class NamecheapProvider extends BaseDnsProvider {
  readonly name = 'namecheap';
  readonly plugin = 'namecheap';
  readonly options: readonly ProviderOption[] = [
    {
      configKey: 'namecheap_api_user',
      envName: 'NAMECHEAP_API_USER',
      required: true,
      description: 'Account user name',
    },
    {
      configKey: 'namecheap_api_key',
      envName: 'NAMECHEAP_API_KEY',
      required: true,
      description: 'API key',
    },
    { configKey: 'namecheap_http_timeout', envName: 'NAMECHEAP_HTTP_TIMEOUT' },
    { configKey: 'namecheap_polling_interval', envName: 'NAMECHEAP_POLLING_INTERVAL' },
    { configKey: 'namecheap_propagation_timeout', envName: 'NAMECHEAP_PROPAGATION_TIMEOUT' },
    { configKey: 'namecheap_ttl', envName: 'NAMECHEAP_TTL' },
    // "true" targets the Namecheap sandbox API
    { configKey: 'namecheap_sandbox', envName: 'NAMECHEAP_SANDBOX' },
  ];
}
