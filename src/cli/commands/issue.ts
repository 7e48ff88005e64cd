import { readFileSync } from 'fs';
import {
  CertificateRequestOrchestrator,
  FileCertificatePublisher,
  InMemoryScheduler,
  LocalExecutionBackend,
  StaticConfigSource,
  StaticLeadership,
  UnitStatus,
  createDnsProvider,
  describeStatus,
  type RequestOutcome,
} from '../../index.js';
import { StatusSpinner, heading, kv, render } from '../logger.js';
import { loadUnitConfig, type ConfigOverrides } from '../utils/config-file.js';
import { resolveProviderName } from './provider-choice.js';

export interface IssueCommandOptions extends ConfigOverrides {
  provider?: string;
  csr: string;
  relationId?: string;
  output?: string;
  lego?: string;
  certsDir?: string;
  csrPath?: string;
  timeout?: string;
}

/** Handle one certificate creation request against a local lego binary. */
export async function handleIssueCommand(options: IssueCommandOptions): Promise<RequestOutcome> {
  const providerName = await resolveProviderName(options.provider);
  const config = new StaticConfigSource(loadUnitConfig(options));
  const provider = createDnsProvider(providerName, config);
  const output = options.output ?? './certificates';
  const correlationId = options.relationId ?? 'local';
  const publisher = new FileCertificatePublisher(output);
  publisher.directoryFor(correlationId);
  const scheduler = new InMemoryScheduler();

  const spinner = new StatusSpinner();
  const status = new UnitStatus(undefined, (s) => spinner.update(s));

  const timeoutMs = options.timeout ? Number(options.timeout) * 1000 : undefined;
  if (timeoutMs !== undefined && !(timeoutMs > 0)) {
    throw new Error(`Invalid timeout: ${options.timeout}`);
  }

  const orchestrator = new CertificateRequestOrchestrator({
    provider,
    config,
    scheduler,
    leadership: new StaticLeadership(),
    backend: new LocalExecutionBackend(),
    status,
    publisher,
    execution: {
      ...(options.lego && { client: options.lego }),
      ...(options.csrPath && { csrPath: options.csrPath }),
      ...(timeoutMs !== undefined && { timeoutMs }),
    },
    ...(options.certsDir && { certsDir: options.certsDir }),
  });

  heading('Request');
  kv('Provider', providerName);
  kv('Relation', correlationId);
  kv('CSR', options.csr);
  kv('Output Dir', output);

  let outcome: RequestOutcome;
  try {
    outcome = await orchestrator.handleCertificateCreationRequest({
      correlationId,
      certificateSigningRequest: readFileSync(options.csr, 'utf-8'),
    });
  } finally {
    spinner.stop();
  }

  render.status(status.get());
  if (outcome.result === 'issued') {
    render.success('Certificate issued');
    render.list(publisher.written);
  } else if (outcome.defer) {
    render.warn(`Request deferred (${outcome.result}): ${describeStatus(status.get())}`);
    process.exitCode = 1;
  } else {
    render.error(`Request not fulfilled (${outcome.result})`);
    process.exitCode = 1;
  }
  return outcome;
}
