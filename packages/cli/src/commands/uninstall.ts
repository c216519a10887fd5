/**
 * Uninstall Command
 *
 * Stops each app's service and removes its installed files. Asks before
 * every app unless --force is given.
 */

import { Command } from 'commander';
import { getGlobalOptions, type CliContext } from '../context.js';

export function createUninstallCommand(context: CliContext): Command {
  return new Command('uninstall')
    .description('Stop and remove all apps, or one app')
    .argument('[name]', 'App name (default: every app under the root)')
    .action(async (name: string | undefined, _options: unknown, command: Command) => {
      await context.createFleet(getGlobalOptions(command)).uninstall(name);
    });
}
