/**
 * Logs Command
 *
 * Follows an app's service journal until interrupted.
 */

import { Command } from 'commander';
import { getGlobalOptions, type CliContext } from '../context.js';

export function createLogsCommand(context: CliContext): Command {
  return new Command('logs')
    .description("Follow an app's service logs")
    .argument('<name>', 'App name')
    .action((name: string, _options: unknown, command: Command) => {
      context.createFleet(getGlobalOptions(command)).logs(name);
    });
}
