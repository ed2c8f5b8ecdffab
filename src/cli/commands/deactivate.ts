/**
 * Deactivate Command
 * Unload and remove the launchd job. A block already running is not
 * affected; SelfControl ends it on its own.
 */

import { DeactivateOptions, ExitCode } from '../types';
import { CLILogger } from '../utils/logger';
import { failCommand } from '../utils/command-error';
import { resolvePlistPath } from '../utils/paths';
import { createRuntime, requireRoot } from '../utils/runtime';

const logger = new CLILogger();

export async function deactivateCommand(options: DeactivateOptions): Promise<void> {
  try {
    requireRoot('deactivate');

    const store = createRuntime().createStore(resolvePlistPath(options.plist));
    if (await store.uninstall()) {
      logger.success(`Schedule removed (${store.path})`);
    } else {
      logger.info('No schedule is installed');
    }

    process.exit(ExitCode.SUCCESS);
  } catch (error) {
    failCommand(logger, 'deactivate', error);
  }
}
