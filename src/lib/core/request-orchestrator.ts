/**
 * Request Orchestrator
 *
 * Turns one certificate creation request into a published chain, or into a
 * status explaining why not. Decisions are made in `evaluate`, which never
 * touches the status sink, the scheduler or the publisher; the
 * `handle*` adapters apply what it returns.
 *
 * Request state transitions:
 * idle -> config-checking -> subject-checking -> executing -> retrieving -> publishing -> active
 *              |                  |                  |              |
 *              |-> (deferred)     |-> blocked        |-> blocked    |-> blocked
 *              |-> waiting (deferred)
 */

import { CERTIFICATES_DIR, MAX_SUBJECT_LENGTH } from '../constants/defaults.js';
import { REQUEST_STATE, STATUS_MESSAGE, type RequestStateValue } from '../constants/status.js';
import { acmeConfigFrom } from '../config/unit-config.js';
import { validateGenericAcmeConfig } from '../config/acme-config-validator.js';
import { checkSubjectLength, extractSubject } from '../crypto/csr-inspector.js';
import {
  CertificateRetrievalError,
  CsrParseError,
  ExecutionError,
  InfrastructureUnavailableError,
  type IssuerError,
} from '../errors/errors.js';
import type { DnsProvider } from '../providers/dns-provider.js';
import type { ExecutionBackend } from '../runtime/execution-backend.js';
import type { LeadershipOracle } from '../runtime/leadership.js';
import type { CertificatePublisher } from '../runtime/publisher.js';
import type { Scheduler } from '../runtime/scheduler.js';
import type { StatusSink } from '../runtime/status-sink.js';
import type { ConfigSource } from '../types/config.js';
import type { CertificateCreationRequest, Publication } from '../types/request.js';
import {
  activeStatus,
  blockedStatus,
  describeStatus,
  isActive,
  maintenanceStatus,
  waitingStatus,
  type OperationalStatus,
} from '../types/status.js';
import { createLogger, type Logger } from '../utils/logger.js';
import { ChallengeExecutor, type ChallengeExecutorOptions } from './challenge-executor.js';
import { CertificateRetriever } from './certificate-retriever.js';

export interface OrchestratorDependencies {
  provider: DnsProvider;
  config: ConfigSource;
  scheduler: Scheduler;
  leadership: LeadershipOracle;
  backend: ExecutionBackend;
  status: StatusSink;
  publisher: CertificatePublisher;
  logger?: Logger;
  /** lego binary, CSR path, working directory and timeout overrides */
  execution?: Omit<ChallengeExecutorOptions, 'logger'>;
  certsDir?: string;
  maxSubjectLength?: number;
}

/** Why a request ended where it did. */
export type RequestResult =
  | 'issued'
  | 'config-invalid'
  | 'not-leader'
  | 'backend-unavailable'
  | 'csr-invalid'
  | 'subject-too-long'
  | 'execution-failed'
  | 'retrieval-failed';

export interface RequestOutcome {
  result: RequestResult;
  /** Final status to apply; absent when the status must be left untouched */
  status?: OperationalStatus;
  /** Re-queue the request for later delivery */
  defer: boolean;
  publication?: Publication;
  error?: IssuerError;
}

interface ConfigCheck {
  status: OperationalStatus;
  acme?: { email: string; server: string };
}

export class CertificateRequestOrchestrator {
  private readonly provider: DnsProvider;
  private readonly config: ConfigSource;
  private readonly scheduler: Scheduler;
  private readonly leadership: LeadershipOracle;
  private readonly backend: ExecutionBackend;
  private readonly status: StatusSink;
  private readonly publisher: CertificatePublisher;
  private readonly logger: Logger;
  private readonly maxSubjectLength: number;
  readonly executor: ChallengeExecutor;
  readonly retriever: CertificateRetriever;
  private state: RequestStateValue = REQUEST_STATE.IDLE;

  constructor(deps: OrchestratorDependencies) {
    this.provider = deps.provider;
    this.config = deps.config;
    this.scheduler = deps.scheduler;
    this.leadership = deps.leadership;
    this.backend = deps.backend;
    this.status = deps.status;
    this.publisher = deps.publisher;
    this.logger = deps.logger ?? createLogger('orchestrator');
    this.maxSubjectLength = deps.maxSubjectLength ?? MAX_SUBJECT_LENGTH;
    this.executor = new ChallengeExecutor(deps.backend, { ...deps.execution, logger: this.logger });
    this.retriever = new CertificateRetriever(deps.backend, deps.certsDir ?? CERTIFICATES_DIR);
  }

  get currentState(): RequestStateValue {
    return this.state;
  }

  /**
   * Status implied by the current configuration: provider credentials first,
   * then the generic ACME settings.
   */
  evaluateConfig(): OperationalStatus {
    return this.checkConfig().status;
  }

  /** Config-changed hook. */
  handleConfigChanged(): OperationalStatus {
    const status = this.evaluateConfig();
    this.status.set(status);
    return status;
  }

  /**
   * Decide the fate of one request. Intermediate statuses (the config check,
   * maintenance while lego runs) are handed to `report` as they happen.
   */
  async evaluate(
    request: CertificateCreationRequest,
    report: (status: OperationalStatus) => void = () => {},
  ): Promise<RequestOutcome> {
    this.transition(REQUEST_STATE.CONFIG_CHECKING, request);
    const config = this.checkConfig();
    report(config.status);

    if (!isActive(config.status) || !config.acme) {
      this.transition(REQUEST_STATE.IDLE, request);
      return { result: 'config-invalid', defer: true };
    }

    if (!this.leadership.isLeader()) {
      this.transition(REQUEST_STATE.IDLE, request);
      return { result: 'not-leader', defer: false };
    }

    if (!(await this.backend.canConnect())) {
      this.transition(REQUEST_STATE.WAITING, request);
      return {
        result: 'backend-unavailable',
        status: waitingStatus(STATUS_MESSAGE.WAITING_FOR_BACKEND),
        defer: true,
        error: InfrastructureUnavailableError.backend(),
      };
    }

    this.transition(REQUEST_STATE.SUBJECT_CHECKING, request);
    let subject: string;
    try {
      subject = extractSubject(request.certificateSigningRequest);
    } catch (e) {
      if (!(e instanceof CsrParseError)) throw e;
      const message = `Invalid certificate signing request: ${e.message}`;
      return this.block(request, 'csr-invalid', message, e);
    }

    const violation = checkSubjectLength(subject, this.maxSubjectLength);
    if (violation) return this.block(request, 'subject-too-long', violation.message, violation);

    this.logger.info('Received Certificate Creation Request for domain %s', subject);

    this.transition(REQUEST_STATE.EXECUTING, request);
    try {
      await this.executor.pushCsr(request.certificateSigningRequest);
      report(maintenanceStatus(STATUS_MESSAGE.EXECUTING));
      await this.executor.run(config.acme, this.provider.plugin, this.provider.environment());
    } catch (e) {
      const error =
        e instanceof ExecutionError
          ? e
          : ExecutionError.abnormal(undefined, [e instanceof Error ? e.message : String(e)]);
      if (!(e instanceof ExecutionError)) {
        this.logger.error('Execution backend failed: %s', error.stderrLines[0]);
      }
      return this.block(request, 'execution-failed', STATUS_MESSAGE.EXECUTION_FAILED, error);
    }

    this.transition(REQUEST_STATE.RETRIEVING, request);
    let publication: Publication;
    try {
      const chain = await this.retriever.fetch(subject);
      publication = {
        correlationId: request.correlationId,
        certificateSigningRequest: request.certificateSigningRequest,
        certificate: chain.leaf,
        ca: chain.ca,
        chain: chain.chain,
      };
    } catch (e) {
      if (!(e instanceof CertificateRetrievalError)) throw e;
      this.logger.error('%s (%s)', e.message, this.retriever.pathFor(subject));
      return this.block(request, 'retrieval-failed', e.message, e);
    }

    this.transition(REQUEST_STATE.PUBLISHING, request);
    return { result: 'issued', status: activeStatus(), defer: false, publication };
  }

  /**
   * Certificate-creation hook: evaluate, then apply status, deferral and
   * publication. A chain that cannot be read after a successful run, or a
   * publication the publisher rejects, is rethrown once the unit is blocked.
   */
  async handleCertificateCreationRequest(
    request: CertificateCreationRequest,
  ): Promise<RequestOutcome> {
    const outcome = await this.evaluate(request, (status) => this.status.set(status));

    if (outcome.defer) {
      this.logger.debug('deferring request relation=%s (%s)', request.correlationId, outcome.result);
      this.scheduler.defer(request);
    }
    if (outcome.publication) {
      try {
        await this.publisher.publish(outcome.publication);
      } catch (e) {
        this.logger.error(
          'Publishing certificate to relation=%s failed: %s',
          request.correlationId,
          e instanceof Error ? e.message : String(e),
        );
        this.transition(REQUEST_STATE.BLOCKED, request);
        this.status.set(
          blockedStatus(`Failed to publish certificate for relation ${request.correlationId}`),
        );
        throw e;
      }
    }
    if (outcome.status) {
      this.status.set(outcome.status);
      if (isActive(outcome.status)) this.transition(REQUEST_STATE.ACTIVE, request);
    }
    if (outcome.error instanceof CertificateRetrievalError) throw outcome.error;
    return outcome;
  }

  private checkConfig(): ConfigCheck {
    const providerCheck = this.provider.validate();
    if (!providerCheck.ok) return { status: blockedStatus(providerCheck.reason) };

    const { email, server } = acmeConfigFrom(this.config);
    const genericCheck = validateGenericAcmeConfig({ email, server });
    if (!genericCheck.ok) return { status: blockedStatus(genericCheck.reason) };

    return { status: activeStatus(), acme: email && server ? { email, server } : undefined };
  }

  private block(
    request: CertificateCreationRequest,
    result: RequestResult,
    message: string,
    error: IssuerError,
  ): RequestOutcome {
    this.transition(REQUEST_STATE.BLOCKED, request);
    const status = blockedStatus(message);
    this.logger.warn('request relation=%s %s', request.correlationId, describeStatus(status));
    return { result, status, defer: false, error };
  }

  private transition(next: RequestStateValue, request: CertificateCreationRequest): void {
    this.logger.debug('relation=%s %s -> %s', request.correlationId, this.state, next);
    this.state = next;
  }
}
