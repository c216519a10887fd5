/**
 * Program
 *
 * Root `units` command. Global flags are declared here and read by every
 * subcommand through optsWithGlobals().
 */

import { Command } from 'commander';
import {
  createServiceLogger,
  describeError,
  formatDuration,
  type ServiceLogger,
} from '@unitfleet/core';
import { createDefaultContext, type CliContext } from './context.js';
import { createInstallCommand } from './commands/install.js';
import { createLogsCommand } from './commands/logs.js';
import { createStatusCommand } from './commands/status.js';
import { createUninstallCommand } from './commands/uninstall.js';

export const CLI_VERSION = '0.1.0';

export function createProgram(context: CliContext = createDefaultContext()): Command {
  const program = new Command();

  program
    .name('units')
    .description('Install, start, stop and inspect systemd unit bundles')
    .version(CLI_VERSION)
    .option('--force', 'Skip confirmations and overwrite existing files')
    .option('--dry-run', 'Show what would be done without doing it')
    .option('--root <dir>', 'Directory holding the apps (default: $UNITS_ROOT or cwd)');

  program.addCommand(createStatusCommand(context));
  program.addCommand(createInstallCommand(context));
  program.addCommand(createUninstallCommand(context));
  program.addCommand(createLogsCommand(context));

  return program;
}

export interface CliRunOptions {
  context?: CliContext;
  logger?: ServiceLogger;
}

/**
 * Run one command line (without the node and script arguments) and return
 * the exit code: 0 on success, dry runs and cancelled confirmations, 1 on
 * any error, which is logged at error level.
 */
export async function run(argv: string[], options: CliRunOptions = {}): Promise<number> {
  const context = options.context ?? createDefaultContext();
  const logger = options.logger ?? createServiceLogger('cli');
  const startedAt = Date.now();

  try {
    await createProgram(context).parseAsync(argv, { from: 'user' });
    logger.debug(`Finished in ${formatDuration(Date.now() - startedAt)}`);
    return 0;
  } catch (error) {
    logger.error(describeError(error), {
      stack: error instanceof Error ? error.stack : undefined,
    });
    return 1;
  } finally {
    context.close();
  }
}
