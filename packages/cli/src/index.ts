/**
 * @unitfleet/cli
 *
 * Command-line tools for running a fleet of systemd apps.
 *
 * Main entry point for the CLI is in ./cli.ts
 * This file exports the program pieces for programmatic use.
 */

export { CLI_VERSION, createProgram, run, type CliRunOptions } from './program.js';
export {
  createDefaultContext,
  getGlobalOptions,
  type CliContext,
  type DefaultContextOptions,
  type GlobalOptions,
} from './context.js';
export { ConfirmationPrompt, isAffirmative, type PromptStreams } from './prompt.js';
export { createStatusCommand } from './commands/status.js';
export { createInstallCommand } from './commands/install.js';
export { createUninstallCommand } from './commands/uninstall.js';
export { createLogsCommand } from './commands/logs.js';
