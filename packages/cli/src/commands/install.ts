/**
 * Install Command
 *
 * Copies app files into their install location, reloads systemd and starts
 * each app's service. With --dry-run nothing is touched.
 */

import { Command } from 'commander';
import { getGlobalOptions, type CliContext } from '../context.js';

export function createInstallCommand(context: CliContext): Command {
  return new Command('install')
    .description('Install and start all apps, or one app')
    .argument('[name]', 'App name (default: every app under the root)')
    .action((name: string | undefined, _options: unknown, command: Command) => {
      context.createFleet(getGlobalOptions(command)).install(name);
    });
}
