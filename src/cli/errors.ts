import chalk from 'chalk';
import { isStackOrderError } from '../core/errors.js';

/**
 * Print a command failure and mark the process as failed
 */
export const reportCommandError = ({
  action,
  error,
}: {
  action: string;
  error: unknown;
}): void => {
  const errorMessage = error instanceof Error ? error.message : String(error);

  console.error(chalk.red(`Failed to ${action}: ${errorMessage}`));
  if (isStackOrderError(error)) {
    console.error(chalk.dim(`  (${error.code})`));
  }

  process.exitCode = 1;
};
