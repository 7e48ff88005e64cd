/**
 * Logging for the issuer
 *
 * Output goes through the `debug` package and can be enabled with the DEBUG
 * environment variable:
 *
 * DEBUG=acme-dns01:* - All output
 * DEBUG=acme-dns01:orchestrator - Only request orchestration
 * DEBUG=acme-dns01:executor - Only ACME client execution
 *
 * Hosts that need the records elsewhere (a platform log stream, a test
 * recorder) install a sink with `setLogger()`; it receives every record
 * regardless of DEBUG.
 */

import debug from 'debug';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

export type LogSink = (level: LogLevel, namespace: string, message: string, args: unknown[]) => void;

const ROOT_NAMESPACE = 'acme-dns01';

let sink: LogSink | undefined;

export function setLogger(fn: LogSink | undefined): void {
  sink = fn;
}

/** Create a logger writing to `acme-dns01:<namespace>`. */
export function createLogger(namespace: string): Logger {
  const name = `${ROOT_NAMESPACE}:${namespace}`;
  const write = debug(name);

  const emit =
    (level: LogLevel) =>
    (message: string, ...args: unknown[]): void => {
      sink?.(level, name, message, args);
      write(`${level.toUpperCase()}: ${message}`, ...args);
    };

  return {
    debug: emit('debug'),
    info: emit('info'),
    warn: emit('warn'),
    error: emit('error'),
  };
}
