#!/usr/bin/env node
/**
 * weekblock CLI Entry Point
 */

import { Command, Option } from 'commander';
import { config as dotenvConfig } from 'dotenv';
import { activateCommand } from './commands/activate';
import { configCommand } from './commands/config';
import { deactivateCommand } from './commands/deactivate';
import { previewCommand } from './commands/preview';
import { runCommand } from './commands/run';
import { statusCommand } from './commands/status';
import { PREVIEW_FORMATS } from './types';
import { getPackageVersion } from './utils/paths';
import { getEnvFilePath } from '../lib/env';

// WB_* overrides from <config dir>/.env; real environment variables win
dotenvConfig({ path: getEnvFilePath() });

const program = new Command();

program
  .name('weekblock')
  .description('Weekly SelfControl schedules installed as a launchd job')
  .version(getPackageVersion());

program
  .command('activate')
  .description('Validate the config and install the schedule (requires sudo)')
  .option('-c, --config <path>', 'Config file path')
  .option('--plist <path>', 'launchd property list path')
  .action(async (options) => {
    await activateCommand({
      config: options.config,
      plist: options.plist,
    });
  });

program
  .command('deactivate')
  .description('Remove the installed schedule (requires sudo)')
  .option('--plist <path>', 'launchd property list path')
  .action(async (options) => {
    await deactivateCommand({ plist: options.plist });
  });

program
  .command('run')
  .description('Start SelfControl if a schedule is active (called by launchd)')
  .option('-c, --config <path>', 'Config file path')
  .action(async (options) => {
    await runCommand({ config: options.config });
  });

program
  .command('preview')
  .description('Show the compiled intervals and triggers without installing')
  .option('-c, --config <path>', 'Config file path')
  .addOption(
    new Option('-f, --format <format>', 'Output format').choices([...PREVIEW_FORMATS]).default('table')
  )
  .action(async (options) => {
    await previewCommand({
      config: options.config,
      format: options.format,
    });
  });

program
  .command('status')
  .description('Show installation state, active schedule and next trigger')
  .option('-c, --config <path>', 'Config file path')
  .option('--plist <path>', 'launchd property list path')
  .action(async (options) => {
    await statusCommand({
      config: options.config,
      plist: options.plist,
    });
  });

program
  .command('config')
  .description('Create the config file if needed and open it in an editor')
  .option('--no-edit', 'Do not open an editor')
  .action(async (options) => {
    await configCommand({ edit: options.edit });
  });

program.parse();
