import { StaticConfigSource, createDnsProvider, listDnsProviders } from '../../index.js';
import { heading, kv, render } from '../logger.js';

/** List registered DNS providers with their lego plugin and options. */
export async function handleProvidersCommand() {
  for (const name of listDnsProviders()) {
    const provider = createDnsProvider(name, new StaticConfigSource());
    heading(name);
    kv('lego plugin', provider.plugin);
    kv('Required', [...provider.requiredKeys()].join(', '));
    render.list(
      provider.options.map(
        (o) => `${o.configKey} -> ${o.envName}${o.required ? ' (required)' : ''}`,
      ),
    );
  }
}
