import { STATUS_MESSAGE } from '../constants/status.js';
import { describeStatus, maintenanceStatus, type OperationalStatus } from '../types/status.js';

export interface StatusSink {
  /** Replace the unit status. */
  set(status: OperationalStatus): void;
}

/**
 * Single-writer status holder. Keeps the history of writes so callers (and
 * tests) can see transient states such as maintenance. Until the first
 * configuration pass the unit reports maintenance, not active.
 */
export class UnitStatus implements StatusSink {
  private current: OperationalStatus;
  private readonly log: OperationalStatus[] = [];

  constructor(
    initial: OperationalStatus = maintenanceStatus(STATUS_MESSAGE.STARTING),
    private readonly onChange?: (status: OperationalStatus) => void,
  ) {
    this.current = initial;
  }

  set(status: OperationalStatus): void {
    this.current = status;
    this.log.push(status);
    this.onChange?.(status);
  }

  get(): OperationalStatus {
    return this.current;
  }

  history(): readonly OperationalStatus[] {
    return this.log;
  }

  toString(): string {
    return describeStatus(this.current);
  }
}
