/**
 * CLI Context
 *
 * Turns the global flags into a FleetManager. The privilege check runs
 * before anything else is set up.
 */

import type { Command } from 'commander';
import {
  assertPrivileged,
  configureLogger,
  generateCorrelationId,
  getEffectiveUid,
  loadSettings,
  resolveFleetRoot,
  setCorrelationId,
} from '@unitfleet/core';
import {
  FleetManager,
  SystemctlController,
  type ConfirmPrompt,
  type ServiceController,
} from '@unitfleet/apps';
import { ConfirmationPrompt } from './prompt.js';

/**
 * Options defined on the root program
 */
export type GlobalOptions = {
  force?: boolean;
  dryRun?: boolean;
  root?: string;
};

export interface CliContext {
  createFleet(options: GlobalOptions): FleetManager;
  /** Release what the run opened (the terminal prompt) */
  close(): void;
}

export interface DefaultContextOptions {
  env?: Record<string, string | undefined>;
  cwd?: string;
  getUid?: () => number | null;
  confirm?: ConfirmPrompt;
  /** Replaces the systemctl-backed controller */
  controller?: ServiceController;
}

export function createDefaultContext(options: DefaultContextOptions = {}): CliContext {
  // opened on the first question so runs without one never hold stdin
  let prompt: ConfirmationPrompt | null = null;
  const askOperator: ConfirmPrompt = (message) => {
    const current = prompt ?? new ConfirmationPrompt();
    prompt = current;
    return current.confirm(message);
  };

  return {
    createFleet: (globals) => {
      assertPrivileged(options.getUid ?? getEffectiveUid);

      const settings = loadSettings(options.env ?? process.env);
      configureLogger({ level: settings.logLevel, logDir: settings.logDir });
      setCorrelationId(generateCorrelationId());

      const root = resolveFleetRoot(globals.root, settings.fleetRoot, options.cwd);
      const controller =
        options.controller ??
        new SystemctlController({
          systemctlBin: settings.systemctlBin,
          journalctlBin: settings.journalctlBin,
        });

      return new FleetManager(
        root,
        { dryRun: globals.dryRun ?? false, force: globals.force ?? false },
        { controller, confirm: options.confirm ?? askOperator }
      );
    },
    close: () => {
      prompt?.close();
      prompt = null;
    },
  };
}

export function getGlobalOptions(command: Command): GlobalOptions {
  return command.optsWithGlobals<GlobalOptions>();
}
