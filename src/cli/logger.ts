import chalk from 'chalk';
import ora from 'ora';
import type { Ora } from 'ora';
import { UNIT_STATUS, describeStatus, type OperationalStatus } from '../index.js';

const statusColor: Record<OperationalStatus['kind'], (text: string) => string> = {
  [UNIT_STATUS.ACTIVE]: chalk.green,
  [UNIT_STATUS.BLOCKED]: chalk.red,
  [UNIT_STATUS.WAITING]: chalk.yellow,
  [UNIT_STATUS.MAINTENANCE]: chalk.cyan,
};

/**
 * Spinner driven by unit status changes: it spins while the unit is in
 * maintenance and settles on the next status.
 */
export class StatusSpinner {
  private spinner?: Ora;

  update(status: OperationalStatus): void {
    if (status.kind === UNIT_STATUS.MAINTENANCE) {
      if (this.spinner) this.spinner.text = status.message;
      else this.spinner = ora(status.message).start();
      return;
    }
    if (!this.spinner) return;

    const text = statusColor[status.kind](describeStatus(status));
    if (status.kind === UNIT_STATUS.ACTIVE) this.spinner.succeed(text);
    else if (status.kind === UNIT_STATUS.BLOCKED) this.spinner.fail(text);
    else this.spinner.warn(text);
    this.spinner = undefined;
  }

  stop(): void {
    this.spinner?.stop();
    this.spinner = undefined;
  }
}

export function heading(title: string) {
  console.log('\n' + chalk.bold.blue(title));
}

export function kv(label: string, value: string) {
  console.log('  ' + chalk.gray(label + ':') + ' ' + chalk.white(value));
}

export const render = {
  success(msg: string) {
    console.log(chalk.green('✔ ' + msg));
  },
  info(msg: string) {
    console.log(chalk.cyan('ℹ ' + msg));
  },
  warn(msg: string) {
    console.log(chalk.yellow('⚠ ' + msg));
  },
  error(msg: string) {
    console.log(chalk.red('✖ ' + msg));
  },
  status(status: OperationalStatus) {
    console.log('  ' + chalk.gray('Status:') + ' ' + statusColor[status.kind](describeStatus(status)));
  },
  list(values: string[]) {
    values.forEach((v) => console.log('  - ' + chalk.white(v)));
  },
};
