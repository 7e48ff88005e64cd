/**
 * Where the ACME client runs.
 *
 * The orchestrator only needs to know whether the backend is reachable, to
 * move files in and out of it and to run one command. A workload container, a
 * remote host or the local machine can all provide that.
 */

import { mkdir, readFile, writeFile } from 'fs/promises';
import { dirname } from 'path';
import execa from 'execa';

export interface ExecOptions {
  /** Extra environment for the process */
  env: Readonly<Record<string, string>>;
  timeoutMs: number;
  cwd: string;
}

export interface ExecResult {
  /** Undefined when the process was killed before exiting */
  exitCode: number | undefined;
  stdout: string;
  stderr: string;
  timedOut: boolean;
  /** Signal that terminated the process, if any */
  signal?: string;
}

export interface ExecutionBackend {
  canConnect(): Promise<boolean>;
  /** Write `content` to `path`, replacing any existing file. */
  push(path: string, content: string, opts?: { makeDirs?: boolean }): Promise<void>;
  /** @throws when `path` does not exist */
  pull(path: string): Promise<string>;
  exec(argv: readonly string[], opts: ExecOptions): Promise<ExecResult>;
}

/**
 * Runs the client on this machine. The process inherits the current
 * environment with the provider variables layered on top.
 */
export class LocalExecutionBackend implements ExecutionBackend {
  async canConnect(): Promise<boolean> {
    return true;
  }

  async push(path: string, content: string, opts: { makeDirs?: boolean } = {}): Promise<void> {
    if (opts.makeDirs) await mkdir(dirname(path), { recursive: true });
    await writeFile(path, content, 'utf-8');
  }

  async pull(path: string): Promise<string> {
    return readFile(path, 'utf-8');
  }

  async exec(argv: readonly string[], opts: ExecOptions): Promise<ExecResult> {
    const [file, ...args] = argv;
    if (!file) throw new Error('Cannot execute an empty command');

    const result = await execa(file, args, {
      cwd: opts.cwd,
      env: { ...opts.env },
      timeout: opts.timeoutMs,
      reject: false,
    });

    const exited = !result.killed && !result.timedOut && typeof result.exitCode === 'number';
    return {
      exitCode: exited ? result.exitCode : undefined,
      stdout: result.stdout,
      stderr: result.stderr,
      timedOut: result.timedOut,
      ...(result.signal && { signal: result.signal }),
    };
  }
}
