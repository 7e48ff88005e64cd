/**
 * Challenge Executor
 *
 * Drives the lego client through a DNS-01 challenge for one CSR. lego talks
 * to the ACME server and to the DNS provider itself; this side only prepares
 * its inputs and interprets its exit.
 */

import {
  CSR_PATH,
  LEGO_BINARY,
  LEGO_TIMEOUT_MS,
  LEGO_WORKING_DIR,
} from '../constants/defaults.js';
import { ExecutionError } from '../errors/errors.js';
import type { ExecutionBackend } from '../runtime/execution-backend.js';
import type { ProviderEnvironment } from '../types/config.js';
import { createLogger, type Logger } from '../utils/logger.js';
import { boundLines, redactSecrets, splitOutputLines } from '../utils/redact.js';

export interface LegoCommand {
  client: string;
  email: string;
  server: string;
  csrPath: string;
  plugin: string;
}

export interface ChallengeExecutorOptions {
  client?: string;
  csrPath?: string;
  workingDir?: string;
  timeoutMs?: number;
  logger?: Logger;
}

export function buildLegoCommand(cmd: LegoCommand): string[] {
  return [
    cmd.client,
    '--email',
    cmd.email,
    '--accept-tos',
    '--csr',
    cmd.csrPath,
    '--server',
    cmd.server,
    '--dns',
    cmd.plugin,
    'run',
  ];
}

export class ChallengeExecutor {
  readonly client: string;
  readonly csrPath: string;
  readonly workingDir: string;
  readonly timeoutMs: number;
  private readonly logger: Logger;

  constructor(
    private readonly backend: ExecutionBackend,
    opts: ChallengeExecutorOptions = {},
  ) {
    this.client = opts.client ?? LEGO_BINARY;
    this.csrPath = opts.csrPath ?? CSR_PATH;
    this.workingDir = opts.workingDir ?? LEGO_WORKING_DIR;
    this.timeoutMs = opts.timeoutMs ?? LEGO_TIMEOUT_MS;
    this.logger = opts.logger ?? createLogger('executor');
  }

  /** Overwrites the CSR left by any previous attempt. */
  async pushCsr(csr: string): Promise<void> {
    await this.backend.push(this.csrPath, csr, { makeDirs: true });
  }

  /**
   * Run lego with the provider environment.
   * @throws ExecutionError on non-zero exit, abnormal termination or timeout
   */
  async run(
    acme: { email: string; server: string },
    plugin: string,
    environment: ProviderEnvironment,
  ): Promise<void> {
    const argv = buildLegoCommand({
      client: this.client,
      email: acme.email,
      server: acme.server,
      csrPath: this.csrPath,
      plugin,
    });
    const secrets = Object.values(environment);

    this.logger.debug('running %s (plugin=%s timeout=%dms)', this.client, plugin, this.timeoutMs);
    const result = await this.backend.exec(argv, {
      env: environment,
      timeoutMs: this.timeoutMs,
      cwd: this.workingDir,
    });

    const stderrLines = splitOutputLines(result.stderr).map((l) => redactSecrets(l, secrets));

    if (result.timedOut || result.exitCode !== 0) {
      const error = result.timedOut
        ? ExecutionError.timedOut(this.timeoutMs, stderrLines)
        : result.exitCode === undefined
          ? ExecutionError.abnormal(result.signal, stderrLines)
          : ExecutionError.exited(result.exitCode, stderrLines);

      this.logger.error('%s. Stderr:', error.message);
      for (const line of boundLines(stderrLines)) {
        this.logger.error('    %s', line);
      }
      throw error;
    }

    this.logger.info(
      'Return message: %s, %s',
      redactSecrets(result.stdout, secrets),
      stderrLines.join('\n'),
    );
  }
}
