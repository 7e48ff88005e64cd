/**
 * Issuer errors
 *
 * Typed representation of every failure the request pipeline can hit. Each
 * class carries a stable `code` plus a `context` record for logging; messages
 * are single lines suitable for the status surface and never include secret
 * values.
 */

import { ISSUER_ERROR, type IssuerErrorCode } from './codes.js';

/**
 * Base class for all issuer errors
 */
export abstract class IssuerError extends Error {
  abstract readonly code: IssuerErrorCode;
  abstract readonly type: string;

  constructor(
    message: string,
    public readonly context?: Record<string, unknown>,
  ) {
    super(message);
    this.name = this.constructor.name;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/**
 * Missing or malformed configuration
 */
export class ConfigError extends IssuerError {
  readonly code = ISSUER_ERROR.config;
  readonly type = 'config';

  static invalidDocument(reason: string): ConfigError {
    return new ConfigError(`Configuration must be a flat JSON object: ${reason}`, { reason });
  }

  static invalidValue(key: string): ConfigError {
    return new ConfigError(`Configuration value for ${key} must be a string, number or boolean`, {
      key,
    });
  }

  static invalidRelationId(correlationId: string): ConfigError {
    return new ConfigError(`Relation id "${correlationId}" cannot be used as a directory name`, {
      correlationId,
    });
  }
}

/**
 * The certificate signing request cannot be parsed
 */
export class CsrParseError extends IssuerError {
  readonly code = ISSUER_ERROR.csrParse;
  readonly type = 'csr';

  static notPem(): CsrParseError {
    return new CsrParseError('CSR is not a PEM encoded certificate request', { defect: 'not_pem' });
  }

  static undecodable(reason: string): CsrParseError {
    return new CsrParseError(`CSR could not be decoded: ${reason}`, {
      defect: 'undecodable',
      reason,
    });
  }

  static missingCommonName(): CsrParseError {
    return new CsrParseError('CSR subject has no common name', { defect: 'missing_cn' });
  }
}

/**
 * The CSR subject violates issuance policy
 */
export class SubjectTooLongError extends IssuerError {
  readonly code = ISSUER_ERROR.subjectPolicy;
  readonly type = 'policy';

  constructor(
    public readonly subject: string,
    public readonly limit: number,
  ) {
    super(`Subject is too long (> ${limit} characters): ${subject}`, {
      subject,
      length: subject.length,
      limit,
    });
  }
}

/**
 * The external ACME client failed
 */
export class ExecutionError extends IssuerError {
  readonly code = ISSUER_ERROR.execution;
  readonly type = 'execution';

  constructor(
    message: string,
    public readonly exitCode: number | undefined,
    public readonly timedOut: boolean,
    public readonly stderrLines: string[],
  ) {
    super(message, { exitCode, timedOut });
  }

  static exited(exitCode: number, stderrLines: string[]): ExecutionError {
    return new ExecutionError(
      `ACME client exited with code ${exitCode}`,
      exitCode,
      false,
      stderrLines,
    );
  }

  static abnormal(signal: string | undefined, stderrLines: string[]): ExecutionError {
    return new ExecutionError(
      `ACME client did not exit normally${signal ? ` (${signal})` : ''}`,
      undefined,
      false,
      stderrLines,
    );
  }

  static timedOut(timeoutMs: number, stderrLines: string[]): ExecutionError {
    return new ExecutionError(
      `ACME client timed out after ${timeoutMs}ms`,
      undefined,
      true,
      stderrLines,
    );
  }
}

/**
 * The client reported success but the chain could not be read
 */
export class CertificateRetrievalError extends IssuerError {
  readonly code = ISSUER_ERROR.retrieval;
  readonly type = 'retrieval';

  static missing(subject: string, path: string, cause?: unknown): CertificateRetrievalError {
    return new CertificateRetrievalError(`Certificate chain for ${subject} was not found`, {
      subject,
      path,
      cause: cause instanceof Error ? cause.message : cause,
    });
  }

  static empty(subject: string, path: string): CertificateRetrievalError {
    return new CertificateRetrievalError(`Certificate chain for ${subject} is empty`, {
      subject,
      path,
    });
  }
}

/**
 * A host dependency is not reachable yet
 */
export class InfrastructureUnavailableError extends IssuerError {
  readonly code = ISSUER_ERROR.infrastructureUnavailable;
  readonly type = 'infrastructure';

  static backend(): InfrastructureUnavailableError {
    return new InfrastructureUnavailableError('Execution backend is not reachable', {
      dependency: 'execution_backend',
    });
  }
}

/**
 * No provider registered under a name
 */
export class UnknownProviderError extends IssuerError {
  readonly code = ISSUER_ERROR.unknownProvider;
  readonly type = 'provider';

  constructor(
    public readonly provider: string,
    available: string[],
  ) {
    super(`Unknown DNS provider "${provider}". Available: ${available.join(', ')}`, {
      provider,
      available,
    });
  }
}

export type IssuerErrorType =
  | ConfigError
  | CsrParseError
  | SubjectTooLongError
  | ExecutionError
  | CertificateRetrievalError
  | InfrastructureUnavailableError
  | UnknownProviderError;

export function isIssuerError(error: unknown): error is IssuerError {
  return error instanceof IssuerError;
}
