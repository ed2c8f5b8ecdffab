/**
 * Runtime factory for CLI commands
 *
 * Commands obtain their OS adapters here; tests replace this module with
 * vi.mock to inject fakes.
 */

import { ExecFileRunner, type CommandRunner } from '../../lib/command-runner';
import { PermissionError } from '../../lib/errors';
import { SelfControlClient } from '../../lib/selfcontrol';
import { LaunchdStore } from '../../lib/scheduler/launchd-store';

export interface CliRuntime {
  runner: CommandRunner;
  selfcontrol: SelfControlClient;
  createStore(plistPath: string): LaunchdStore;
}

export function createRuntime(): CliRuntime {
  const runner = new ExecFileRunner();
  return {
    runner,
    selfcontrol: new SelfControlClient(runner),
    createStore: (plistPath) => new LaunchdStore(plistPath, runner),
  };
}

/**
 * Require root privileges (installing into /Library/LaunchDaemons and
 * starting SelfControl both need them)
 *
 * @throws {PermissionError} when not running as root
 */
export function requireRoot(command: string): void {
  if (typeof process.getuid === 'function' && process.getuid() !== 0) {
    throw new PermissionError(`Please run this command as root: sudo weekblock ${command}`);
  }
}
