/**
 * Unit status and request state constants
 *
 * Using these constants instead of string literals keeps status comparisons
 * type safe.
 */

/**
 * Operational status of the unit, the only externally observable health signal.
 */
export const UNIT_STATUS = {
  /** Configuration is valid and the last request (if any) succeeded */
  ACTIVE: 'active' as const,
  /** Operator action is needed (bad config, bad CSR, failed execution) */
  BLOCKED: 'blocked' as const,
  /** A transient dependency is unavailable; the request was deferred */
  WAITING: 'waiting' as const,
  /** The external client is running */
  MAINTENANCE: 'maintenance' as const,
} as const;

/**
 * Request state transitions:
 * idle -> config-checking -> subject-checking -> executing -> retrieving -> publishing
 *                        |-> active | blocked | waiting
 */
export const REQUEST_STATE = {
  IDLE: 'idle' as const,
  CONFIG_CHECKING: 'config-checking' as const,
  SUBJECT_CHECKING: 'subject-checking' as const,
  EXECUTING: 'executing' as const,
  RETRIEVING: 'retrieving' as const,
  PUBLISHING: 'publishing' as const,
  ACTIVE: 'active' as const,
  BLOCKED: 'blocked' as const,
  WAITING: 'waiting' as const,
} as const;

/**
 * Status messages surfaced to operators. Kept short and free of secrets.
 */
export const STATUS_MESSAGE = {
  EMAIL_MISSING: 'Email address was not provided',
  SERVER_MISSING: 'ACME server was not provided',
  EMAIL_INVALID: 'Invalid email address',
  SERVER_INVALID: 'Invalid ACME server',
  WAITING_FOR_BACKEND: 'Waiting for container to be ready',
  EXECUTING: 'Executing lego command',
  STARTING: 'Waiting for the first configuration check',
  EXECUTION_FAILED:
    'Workload command execution failed, inspect the logs for more information.',
} as const;

export type UnitStatusValue = (typeof UNIT_STATUS)[keyof typeof UNIT_STATUS];
export type RequestStateValue = (typeof REQUEST_STATE)[keyof typeof REQUEST_STATE];
