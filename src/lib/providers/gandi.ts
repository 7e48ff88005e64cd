import { BaseDnsProvider, type ProviderOption } from './dns-provider.js';

/** Gandi LiveDNS (API v5). */
export class GandiLiveDnsProvider extends BaseDnsProvider {
  readonly name = 'gandiv5';
  readonly plugin = 'gandiv5';
  readonly options: readonly ProviderOption[] = [
    {
      configKey: 'gandi_api_key',
      envName: 'GANDIV5_API_KEY',
      required: true,
      description: 'LiveDNS API key',
    },
    { configKey: 'gandi_http_timeout', envName: 'GANDIV5_HTTP_TIMEOUT' },
    { configKey: 'gandi_polling_interval', envName: 'GANDIV5_POLLING_INTERVAL' },
    { configKey: 'gandi_propagation_timeout', envName: 'GANDIV5_PROPAGATION_TIMEOUT' },
    { configKey: 'gandi_ttl', envName: 'GANDIV5_TTL' },
  ];
}
