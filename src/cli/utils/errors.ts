import chalk from 'chalk';
import { ExecutionError, IssuerError, UnknownProviderError } from '../../index.js';

/** Central error handler for CLI commands. */
export function handleError(error: unknown): void {
  if (error instanceof UnknownProviderError) {
    console.error(chalk.red('Error:'), error.message);
    console.error(chalk.gray('Run `acme-dns01 providers` to list them.'));
  } else if (error instanceof ExecutionError) {
    console.error(chalk.red('lego failed:'), error.message);
    for (const line of error.stderrLines) console.error(chalk.gray(`    ${line}`));
  } else if (error instanceof IssuerError) {
    console.error(chalk.red(`${error.code}:`), error.message);
  } else if (error instanceof Error) {
    console.error(chalk.red('Error:'), error.message);
  } else {
    console.error('Unknown error:', error);
  }
}
