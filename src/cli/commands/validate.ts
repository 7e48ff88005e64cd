import {
  CertificateRequestOrchestrator,
  InMemoryPublisher,
  InMemoryScheduler,
  LocalExecutionBackend,
  StaticConfigSource,
  StaticLeadership,
  UnitStatus,
  createDnsProvider,
  friendlyServerName,
  isActive,
  type OperationalStatus,
} from '../../index.js';
import { heading, kv, render } from '../logger.js';
import { loadUnitConfig, type ConfigOverrides } from '../utils/config-file.js';
import { resolveProviderName } from './provider-choice.js';

export interface ValidateCommandOptions extends ConfigOverrides {
  provider?: string;
}

/** Run the config-changed evaluation and print the resulting status. */
export async function handleValidateCommand(
  options: ValidateCommandOptions,
): Promise<OperationalStatus> {
  const providerName = await resolveProviderName(options.provider);
  const config = new StaticConfigSource(loadUnitConfig(options));
  const provider = createDnsProvider(providerName, config);

  const orchestrator = new CertificateRequestOrchestrator({
    provider,
    config,
    scheduler: new InMemoryScheduler(),
    leadership: new StaticLeadership(),
    backend: new LocalExecutionBackend(),
    status: new UnitStatus(),
    publisher: new InMemoryPublisher(),
  });

  heading('Configuration');
  kv('Provider', `${providerName} (lego --dns ${provider.plugin})`);
  const server = config.get('server');
  if (server) kv('Server', friendlyServerName(server) ?? server);

  const status = orchestrator.handleConfigChanged();
  render.status(status);
  if (isActive(status)) render.success('Configuration is valid');
  else process.exitCode = 1;
  return status;
}
