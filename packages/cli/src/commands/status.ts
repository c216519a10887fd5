/**
 * Status Command
 *
 * Prints one status line per app.
 */

import { Command } from 'commander';
import { getGlobalOptions, type CliContext } from '../context.js';

export function createStatusCommand(context: CliContext): Command {
  return new Command('status')
    .description('Show the status of all apps, or of one app')
    .argument('[name]', 'App name (default: every app under the root)')
    .action((name: string | undefined, _options: unknown, command: Command) => {
      context.createFleet(getGlobalOptions(command)).status(name);
    });
}
