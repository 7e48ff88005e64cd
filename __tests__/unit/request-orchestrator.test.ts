import { describe, it, expect, jest, beforeAll, beforeEach } from '@jest/globals';
import {
  CertificateRequestOrchestrator,
  CertificateRetrievalError,
  GandiLiveDnsProvider,
  InMemoryPublisher,
  InMemoryScheduler,
  REQUEST_STATE,
  StaticConfigSource,
  StaticLeadership,
  UnitStatus,
  activeStatus,
  blockedStatus,
  maintenanceStatus,
  waitingStatus,
  type CertificateCreationRequest,
  type UnitConfig,
} from '../../src/index.js';
import { FakeExecutionBackend, RecordingLogger, chainFile, fakePem, makeCsr } from '../test-utils.js';

const validConfig: UnitConfig = {
  email: 'example@email.com',
  server: 'https://acme-staging-v02.api.letsencrypt.org/directory',
  gandi_api_key: 'test-secret-key',
};

const CHAIN_PATH = '/tmp/.lego/certificates/example.com.crt';

function setup(config: UnitConfig = validConfig) {
  const source = new StaticConfigSource(config);
  const backend = new FakeExecutionBackend();
  const scheduler = new InMemoryScheduler();
  const leadership = new StaticLeadership(true);
  const status = new UnitStatus();
  const publisher = new InMemoryPublisher();
  const logger = new RecordingLogger();
  const orchestrator = new CertificateRequestOrchestrator({
    provider: new GandiLiveDnsProvider(source),
    config: source,
    scheduler,
    leadership,
    backend,
    status,
    publisher,
    logger,
  });
  return { source, backend, scheduler, leadership, status, publisher, logger, orchestrator };
}

/** Make the fake backend behave like a successful lego run. */
function issueOnExec(backend: FakeExecutionBackend, path = CHAIN_PATH) {
  backend.onExec = (_call, b) => {
    b.files.set(path, chainFile('leaf', 'intermediate', 'root'));
  };
}

describe('CertificateRequestOrchestrator', () => {
  let csr: string;
  let longCsr: string;
  let request: CertificateCreationRequest;

  beforeAll(async () => {
    csr = await makeCsr('example.com');
    longCsr = await makeCsr('a'.repeat(65));
  });

  beforeEach(() => {
    request = { correlationId: 'certificates:7', certificateSigningRequest: csr };
  });

  describe('config changed', () => {
    it('is active with a valid email and complete provider config, publishing nothing', () => {
      const { orchestrator, status, publisher } = setup();
      expect(orchestrator.handleConfigChanged()).toEqual(activeStatus());
      expect(status.get()).toEqual(activeStatus());
      expect(publisher.published).toEqual([]);
    });

    it('blocks on an invalid email', () => {
      const { orchestrator, status } = setup({ ...validConfig, email: 'invalid-email' });
      orchestrator.handleConfigChanged();
      expect(status.get()).toEqual(blockedStatus('Invalid email address'));
    });

    it('checks provider credentials before the generic settings', () => {
      const { orchestrator, status } = setup({ email: 'invalid-email' });
      orchestrator.handleConfigChanged();
      expect(status.get()).toEqual(
        blockedStatus('The following config options must be set: GANDIV5_API_KEY'),
      );
    });

    it('blocks on a missing server', () => {
      const { orchestrator } = setup({ email: 'example@email.com', gandi_api_key: 'k' });
      expect(orchestrator.evaluateConfig()).toEqual(blockedStatus('ACME server was not provided'));
    });

    it('blocks on a server without scheme', () => {
      const { orchestrator } = setup({ ...validConfig, server: 'acme.example.com/directory' });
      expect(orchestrator.evaluateConfig()).toEqual(blockedStatus('Invalid ACME server'));
    });
  });

  describe('certificate creation request', () => {
    it('issues, publishes root-to-leaf and ends active', async () => {
      const { orchestrator, backend, status, publisher, scheduler } = setup();
      issueOnExec(backend);

      const outcome = await orchestrator.handleCertificateCreationRequest(request);

      expect(outcome.result).toBe('issued');
      expect(publisher.published).toEqual([
        {
          correlationId: 'certificates:7',
          certificateSigningRequest: csr,
          certificate: fakePem('leaf'),
          ca: fakePem('root'),
          chain: [fakePem('root'), fakePem('intermediate'), fakePem('leaf')],
        },
      ]);
      expect(status.get()).toEqual(activeStatus());
      expect(status.history()).toEqual([
        activeStatus(),
        maintenanceStatus('Executing lego command'),
        activeStatus(),
      ]);
      expect(scheduler.size).toBe(0);
      expect(orchestrator.currentState).toBe(REQUEST_STATE.ACTIVE);
    });

    it('stages the CSR and runs lego with the provider environment', async () => {
      const { orchestrator, backend } = setup({ ...validConfig, gandi_ttl: '300' });
      issueOnExec(backend);

      await orchestrator.handleCertificateCreationRequest(request);

      expect(backend.files.get('/tmp/csr.pem')).toBe(csr);
      expect(backend.calls).toEqual([
        {
          argv: [
            'lego',
            '--email',
            'example@email.com',
            '--accept-tos',
            '--csr',
            '/tmp/csr.pem',
            '--server',
            'https://acme-staging-v02.api.letsencrypt.org/directory',
            '--dns',
            'gandiv5',
            'run',
          ],
          opts: {
            env: { GANDIV5_API_KEY: 'test-secret-key', GANDIV5_TTL: '300' },
            timeoutMs: 300_000,
            cwd: '/tmp',
          },
        },
      ]);
    });

    it('defers while the config is invalid and leaves no other trace', async () => {
      const { orchestrator, backend, status, publisher, scheduler } = setup({
        ...validConfig,
        email: 'invalid-email',
      });

      const outcome = await orchestrator.handleCertificateCreationRequest(request);

      expect(outcome).toEqual({ result: 'config-invalid', defer: true });
      expect(status.get()).toEqual(blockedStatus('Invalid email address'));
      expect(scheduler.peek()).toEqual([request]);
      expect(backend.calls).toEqual([]);
      expect(backend.files.size).toBe(0);
      expect(publisher.published).toEqual([]);
    });

    it('publishes exactly once when a deferred request is redelivered after a config fix', async () => {
      const { orchestrator, backend, publisher, scheduler, source, status } = setup({
        ...validConfig,
        email: 'invalid-email',
      });
      issueOnExec(backend);

      await orchestrator.handleCertificateCreationRequest(request);
      await orchestrator.handleCertificateCreationRequest(request);
      expect(scheduler.size).toBe(1);
      expect(publisher.published).toEqual([]);

      source.setConfig(validConfig);
      const redelivered = await scheduler.redeliver((r) =>
        orchestrator.handleCertificateCreationRequest(r),
      );

      expect(redelivered).toBe(1);
      expect(publisher.published).toHaveLength(1);
      expect(publisher.get('certificates:7')?.certificate).toBe(fakePem('leaf'));
      expect(backend.calls).toHaveLength(1);
      expect(scheduler.size).toBe(0);
      expect(status.get()).toEqual(activeStatus());
    });

    it('stops silently on a non-leader unit', async () => {
      const { orchestrator, leadership, backend, status, publisher, scheduler } = setup();
      leadership.setLeader(false);

      const outcome = await orchestrator.handleCertificateCreationRequest(request);

      expect(outcome).toEqual({ result: 'not-leader', defer: false });
      expect(status.history()).toEqual([activeStatus()]);
      expect(backend.calls).toEqual([]);
      expect(publisher.published).toEqual([]);
      expect(scheduler.size).toBe(0);
    });

    it('waits and defers while the backend is unreachable', async () => {
      const { orchestrator, backend, status, scheduler } = setup();
      backend.reachable = false;

      const outcome = await orchestrator.handleCertificateCreationRequest(request);

      expect(outcome.result).toBe('backend-unavailable');
      expect(outcome.error?.code).toBe('INFRASTRUCTURE_UNAVAILABLE');
      expect(status.get()).toEqual(waitingStatus('Waiting for container to be ready'));
      expect(scheduler.peek()).toEqual([request]);
      expect(backend.files.size).toBe(0);
    });

    it('blocks on a subject longer than 64 characters without running lego', async () => {
      const { orchestrator, backend, status, scheduler, publisher } = setup();
      const subject = 'a'.repeat(65);

      const outcome = await orchestrator.handleCertificateCreationRequest({
        correlationId: 'certificates:8',
        certificateSigningRequest: longCsr,
      });

      expect(outcome.result).toBe('subject-too-long');
      expect(status.get()).toEqual(
        blockedStatus(`Subject is too long (> 64 characters): ${subject}`),
      );
      expect(backend.calls).toEqual([]);
      expect(backend.files.size).toBe(0);
      expect(scheduler.size).toBe(0);
      expect(publisher.published).toEqual([]);
    });

    it('blocks on a CSR that cannot be parsed', async () => {
      const { orchestrator, backend, status, scheduler } = setup();

      const outcome = await orchestrator.handleCertificateCreationRequest({
        correlationId: 'certificates:9',
        certificateSigningRequest: 'garbage',
      });

      expect(outcome.result).toBe('csr-invalid');
      expect(status.get()).toEqual(
        blockedStatus(
          'Invalid certificate signing request: CSR is not a PEM encoded certificate request',
        ),
      );
      expect(backend.calls).toEqual([]);
      expect(scheduler.size).toBe(0);
    });

    it('blocks with a generic message when lego fails, keeping stderr in the log', async () => {
      const { orchestrator, backend, status, publisher, scheduler, logger } = setup();
      backend.result = {
        exitCode: 1,
        stdout: '',
        stderr: 'gandiv5: 403 Forbidden for key test-secret-key\n',
        timedOut: false,
      };

      const outcome = await orchestrator.handleCertificateCreationRequest(request);

      expect(outcome.result).toBe('execution-failed');
      expect(status.get()).toEqual(
        blockedStatus('Workload command execution failed, inspect the logs for more information.'),
      );
      expect(logger.lines('error')).toEqual([
        'ACME client exited with code 1. Stderr:',
        '    gandiv5: 403 Forbidden for key ***',
      ]);
      expect(publisher.published).toEqual([]);
      expect(scheduler.size).toBe(0);
    });

    it('blocks when lego times out', async () => {
      const { orchestrator, backend, status } = setup();
      backend.result = { exitCode: undefined, stdout: '', stderr: '', timedOut: true };

      const outcome = await orchestrator.handleCertificateCreationRequest(request);

      expect(outcome.error).toMatchObject({ timedOut: true });
      expect(status.get().kind).toBe('blocked');
    });

    it('blocks when the backend itself throws during execution', async () => {
      const { orchestrator, backend, status, logger } = setup();
      backend.onExec = () => {
        throw new Error('connection reset');
      };

      const outcome = await orchestrator.handleCertificateCreationRequest(request);

      expect(outcome.result).toBe('execution-failed');
      expect(status.get()).toEqual(
        blockedStatus('Workload command execution failed, inspect the logs for more information.'),
      );
      expect(logger.lines('error')).toContain('Execution backend failed: connection reset');
    });

    it('blocks and rethrows when lego succeeds but the chain is missing', async () => {
      const { orchestrator, status, publisher } = setup();

      await expect(orchestrator.handleCertificateCreationRequest(request)).rejects.toBeInstanceOf(
        CertificateRetrievalError,
      );
      expect(status.get()).toEqual(
        blockedStatus('Certificate chain for example.com was not found'),
      );
      expect(publisher.published).toEqual([]);
    });

    it('blocks and rethrows when the publisher rejects the certificate', async () => {
      const { orchestrator, backend, status, publisher, logger } = setup();
      issueOnExec(backend);
      jest.spyOn(publisher, 'publish').mockRejectedValue(new Error('relation gone'));

      await expect(orchestrator.handleCertificateCreationRequest(request)).rejects.toThrow(
        'relation gone',
      );

      expect(status.get()).toEqual(
        blockedStatus('Failed to publish certificate for relation certificates:7'),
      );
      expect(orchestrator.currentState).toBe(REQUEST_STATE.BLOCKED);
      expect(logger.lines('error')).toContain(
        'Publishing certificate to relation=certificates:7 failed: relation gone',
      );
    });

    it('overwrites the staged CSR on every attempt', async () => {
      const { orchestrator, backend } = setup();
      backend.files.set('/tmp/csr.pem', 'stale');
      issueOnExec(backend);

      await orchestrator.handleCertificateCreationRequest(request);
      expect(backend.files.get('/tmp/csr.pem')).toBe(csr);
    });
  });

  describe('evaluate', () => {
    it('decides without touching status, scheduler or publisher', async () => {
      const { orchestrator, backend, status, publisher, scheduler } = setup();
      issueOnExec(backend);
      const reported: string[] = [];

      const outcome = await orchestrator.evaluate(request, (s) => reported.push(s.kind));

      expect(outcome.status).toEqual(activeStatus());
      expect(outcome.publication?.chain).toEqual([
        fakePem('root'),
        fakePem('intermediate'),
        fakePem('leaf'),
      ]);
      expect(reported).toEqual(['active', 'maintenance']);
      expect(status.history()).toEqual([]);
      expect(publisher.published).toEqual([]);
      expect(scheduler.size).toBe(0);
    });

    it('returns a blocked outcome for an oversized subject', async () => {
      const { orchestrator } = setup();
      const outcome = await orchestrator.evaluate({
        correlationId: 'certificates:1',
        certificateSigningRequest: longCsr,
      });
      expect(outcome).toMatchObject({
        result: 'subject-too-long',
        defer: false,
        status: { kind: 'blocked' },
      });
    });
  });
});
