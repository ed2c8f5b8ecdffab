/**
 * External command execution
 *
 * Every OS interaction (launchctl, defaults, dscl, id, SelfControl) goes
 * through a CommandRunner so tests can substitute an in-process fake.
 * Commands are executed with argument arrays and no shell.
 */

import { execFile } from 'child_process';
import { promisify } from 'util';
import { AppError, ErrorCode } from './errors';
import { createLogger } from './logger';

const execFileAsync = promisify(execFile);

const logger = createLogger('command-runner');

/**
 * Default timeout for external commands (30 seconds; SelfControl's
 * installer can take a while to come up)
 */
export const DEFAULT_COMMAND_TIMEOUT = 30_000;

export interface CommandResult {
  stdout: string;
  stderr: string;
  exitCode: number;
}

export interface CommandRunner {
  run(command: string, args: readonly string[]): Promise<CommandResult>;
}

/** Shape of the error execFile rejects with */
interface ExecFailure extends Error {
  code?: string | number | null;
  stdout?: string;
  stderr?: string;
}

function isExecFailure(error: unknown): error is ExecFailure {
  return error instanceof Error && 'code' in error;
}

/**
 * Run a command and require exit code 0
 *
 * @throws {AppError} COMMAND_FAILED with the command's stderr
 */
export async function runChecked(
  runner: CommandRunner,
  command: string,
  args: readonly string[]
): Promise<CommandResult> {
  const result = await runner.run(command, args);
  if (result.exitCode !== 0) {
    throw new AppError(
      ErrorCode.COMMAND_FAILED,
      `${command} exited with code ${result.exitCode}: ${result.stderr.trim() || result.stdout.trim()}`,
      { command, args: [...args], exitCode: result.exitCode }
    );
  }
  return result;
}

/**
 * CommandRunner backed by child_process.execFile
 */
export class ExecFileRunner implements CommandRunner {
  constructor(private readonly timeout: number = DEFAULT_COMMAND_TIMEOUT) {}

  async run(command: string, args: readonly string[]): Promise<CommandResult> {
    logger.debug('exec', { command, args: [...args] });
    try {
      const { stdout, stderr } = await execFileAsync(command, [...args], {
        timeout: this.timeout,
        encoding: 'utf-8',
      });
      return { stdout, stderr, exitCode: 0 };
    } catch (error: unknown) {
      if (isExecFailure(error) && typeof error.code === 'number') {
        return {
          stdout: error.stdout ?? '',
          stderr: error.stderr ?? '',
          exitCode: error.code,
        };
      }
      if (isExecFailure(error) && error.code === 'ENOENT') {
        throw new AppError(ErrorCode.COMMAND_FAILED, `Command not found: ${command}`, { command });
      }
      throw error;
    }
  }
}
