/**
 * Config Command
 * Make sure a config file exists and open it for editing.
 *
 * A new file is seeded from ./config.json when present, otherwise from the
 * bundled config.example.json.
 */

import { spawnSync } from 'child_process';
import { copyFileSync, existsSync, mkdirSync } from 'fs';
import path from 'path';
import { ConfigOptions, ExitCode } from '../types';
import { CLILogger } from '../utils/logger';
import { failCommand } from '../utils/command-error';
import { EXAMPLE_CONFIG_FILE, getPackageRoot, resolveConfigPath } from '../utils/paths';

const logger = new CLILogger();

/**
 * Pick the file a new config is copied from
 */
export function getConfigTemplatePath(cwd: string = process.cwd()): string {
  const local = path.join(cwd, 'config.json');
  return existsSync(local) ? local : path.join(getPackageRoot(), EXAMPLE_CONFIG_FILE);
}

/**
 * Editor command: $EDITOR when set, else macOS `open -t`
 */
export function getEditorCommand(filePath: string): [string, string[]] {
  const editor = process.env.EDITOR?.trim();
  return editor ? [editor, [filePath]] : ['open', ['-t', filePath]];
}

export async function configCommand(options: ConfigOptions): Promise<void> {
  try {
    const configPath = resolveConfigPath();

    if (existsSync(configPath)) {
      logger.info(`Using ${configPath}`);
    } else {
      const template = getConfigTemplatePath();
      mkdirSync(path.dirname(configPath), { recursive: true });
      copyFileSync(template, configPath);
      logger.success(`Created ${configPath} from ${template}`);
    }

    if (options.edit !== false) {
      const [command, args] = getEditorCommand(configPath);
      const result = spawnSync(command, args, { stdio: 'inherit' });
      if (result.error || result.status !== 0) {
        logger.warn(`Could not open an editor; edit ${configPath} manually`);
      }
    }

    logger.info('Run "sudo weekblock activate" to apply changes');
    process.exit(ExitCode.SUCCESS);
  } catch (error) {
    failCommand(logger, 'config', error);
  }
}
