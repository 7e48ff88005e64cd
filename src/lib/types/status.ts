import { UNIT_STATUS } from '../constants/status.js';

export interface ActiveStatus {
  kind: typeof UNIT_STATUS.ACTIVE;
}

export interface BlockedStatus {
  kind: typeof UNIT_STATUS.BLOCKED;
  message: string;
}

export interface WaitingStatus {
  kind: typeof UNIT_STATUS.WAITING;
  message: string;
}

export interface MaintenanceStatus {
  kind: typeof UNIT_STATUS.MAINTENANCE;
  message: string;
}

/** Exactly one of these holds for a unit at any time. */
export type OperationalStatus = ActiveStatus | BlockedStatus | WaitingStatus | MaintenanceStatus;

export const activeStatus = (): ActiveStatus => ({ kind: UNIT_STATUS.ACTIVE });

export const blockedStatus = (message: string): BlockedStatus => ({
  kind: UNIT_STATUS.BLOCKED,
  message,
});

export const waitingStatus = (message: string): WaitingStatus => ({
  kind: UNIT_STATUS.WAITING,
  message,
});

export const maintenanceStatus = (message: string): MaintenanceStatus => ({
  kind: UNIT_STATUS.MAINTENANCE,
  message,
});

export function isActive(status: OperationalStatus): status is ActiveStatus {
  return status.kind === UNIT_STATUS.ACTIVE;
}

/** One-line rendering, e.g. `blocked: Invalid email address`. */
export function describeStatus(status: OperationalStatus): string {
  return status.kind === UNIT_STATUS.ACTIVE ? status.kind : `${status.kind}: ${status.message}`;
}
