import {
  MAX_LOGGED_STDERR_LINES,
  MIN_REDACTED_SECRET_LENGTH,
  REDACTED,
} from '../constants/defaults.js';

/**
 * Replace every occurrence of the given secret values in `line`.
 * Values shorter than MIN_REDACTED_SECRET_LENGTH are left alone, they would
 * mangle unrelated text (e.g. a TTL of "300").
 */
export function redactSecrets(line: string, secrets: readonly string[]): string {
  let out = line;
  for (const secret of secrets) {
    if (secret.length < MIN_REDACTED_SECRET_LENGTH) continue;
    out = out.split(secret).join(REDACTED);
  }
  return out;
}

/** Split process output into lines, dropping the trailing empty one. */
export function splitOutputLines(output: string): string[] {
  const lines = output.split(/\r?\n/);
  if (lines.length > 0 && lines[lines.length - 1] === '') lines.pop();
  return lines;
}

/**
 * Cap the number of lines that reach the log. The last entry notes how many
 * lines were dropped.
 */
export function boundLines(lines: readonly string[], max = MAX_LOGGED_STDERR_LINES): string[] {
  if (lines.length <= max) return [...lines];
  const omitted = lines.length - max;
  return [...lines.slice(0, max), `… ${omitted} more line(s) omitted`];
}
