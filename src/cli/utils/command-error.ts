/**
 * Shared failure path for CLI commands
 */

import { ErrorCode, isAppError } from '../../lib/errors';
import { createLogger } from '../../lib/logger';
import { ExitCode, exitCodeFor, getErrorMessage } from '../types';
import type { CLILogger } from './logger';

const logger = createLogger('cli');

/**
 * Print the error, log it, and exit with the matching code
 */
export function failCommand(cli: CLILogger, command: string, error: unknown): void {
  const exitCode = exitCodeFor(error);

  if (isAppError(error)) {
    logger.error(`${command}:failed`, error.toLogError());
  } else {
    logger.error(`${command}:failed`, { message: getErrorMessage(error) });
  }

  if (exitCode === ExitCode.UNEXPECTED_ERROR) {
    const internal = isAppError(error) && error.code === ErrorCode.INTERNAL_CONSISTENCY;
    cli.error(`${internal ? 'Internal error' : 'Unexpected error'}: ${getErrorMessage(error)}`);
  } else {
    cli.error(getErrorMessage(error));
  }

  process.exit(exitCode);
}
