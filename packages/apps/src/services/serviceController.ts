/**
 * Service Controller - queries and drives systemd units
 *
 * Wraps `systemctl` and `journalctl` as opaque commands. Only the exit
 * status is consumed:
 * - queries (is-active, is-enabled) answer false on any failure
 * - mutations (start, stop, daemon-reload, log follow) throw ServiceCommandError
 *
 * Whether a mutation failure matters is left to the caller.
 */

import { spawnSync } from 'child_process';
import { ServiceCommandError, createServiceLogger, describeError } from '@unitfleet/core';
import type { ServiceScope } from '../types.js';

const logger = createServiceLogger('systemctl');

export interface ServiceController {
  isActive(unit: string, scope: ServiceScope): boolean;
  isEnabled(unit: string, scope: ServiceScope): boolean;
  start(unit: string, scope: ServiceScope): void;
  stop(unit: string, scope: ServiceScope): void;
  /** `daemon-reload`: make the manager re-read unit files */
  reload(scope: ServiceScope): void;
  /** Follow the unit's journal until the follower exits */
  followLogs(unit: string, scope: ServiceScope): void;
}

export interface CommandResult {
  /** Exit code, or null when the process was killed or never started */
  status: number | null;
  error?: Error;
}

/**
 * Runs a command to completion with the terminal attached
 */
export type CommandRunner = (command: string, args: string[]) => CommandResult;

export const spawnCommand: CommandRunner = (command, args) => {
  const result = spawnSync(command, args, { stdio: 'inherit' });
  return { status: result.status, error: result.error };
};

export interface SystemctlControllerOptions {
  systemctlBin?: string;
  journalctlBin?: string;
  run?: CommandRunner;
}

/**
 * Prepends `--user` for the per-user manager
 */
export function withScope(scope: ServiceScope, args: string[]): string[] {
  return scope === 'user' ? ['--user', ...args] : args;
}

export class SystemctlController implements ServiceController {
  private readonly systemctlBin: string;
  private readonly journalctlBin: string;
  private readonly run: CommandRunner;

  constructor(options: SystemctlControllerOptions = {}) {
    this.systemctlBin = options.systemctlBin ?? 'systemctl';
    this.journalctlBin = options.journalctlBin ?? 'journalctl';
    this.run = options.run ?? spawnCommand;
  }

  isActive(unit: string, scope: ServiceScope): boolean {
    return this.query(withScope(scope, ['is-active', '--quiet', unit]));
  }

  isEnabled(unit: string, scope: ServiceScope): boolean {
    return this.query(withScope(scope, ['is-enabled', '--quiet', unit]));
  }

  start(unit: string, scope: ServiceScope): void {
    this.mutate(this.systemctlBin, withScope(scope, ['start', unit]));
  }

  stop(unit: string, scope: ServiceScope): void {
    this.mutate(this.systemctlBin, withScope(scope, ['stop', unit]));
  }

  reload(scope: ServiceScope): void {
    this.mutate(this.systemctlBin, withScope(scope, ['daemon-reload']));
  }

  followLogs(unit: string, scope: ServiceScope): void {
    this.mutate(
      this.journalctlBin,
      withScope(scope, ['-u', unit, '-f']),
      `Failed to show logs for '${unit}'`
    );
  }

  private query(args: string[]): boolean {
    const commandLine = [this.systemctlBin, ...args].join(' ');
    let result: CommandResult;
    try {
      result = this.run(this.systemctlBin, args);
    } catch (error) {
      logger.debug(`${commandLine} failed: ${describeError(error)}`);
      return false;
    }
    if (result.error) {
      logger.debug(`${commandLine} failed: ${result.error.message}`);
    }
    return !result.error && result.status === 0;
  }

  private mutate(command: string, args: string[], message?: string): void {
    const commandLine = [command, ...args].join(' ');
    logger.debug(`Running ${commandLine}`);

    let result: CommandResult;
    try {
      result = this.run(command, args);
    } catch (error) {
      throw new ServiceCommandError(commandLine, null, message, { cause: error });
    }

    if (result.error) {
      throw new ServiceCommandError(commandLine, null, message, { cause: result.error });
    }
    if (result.status !== 0) {
      throw new ServiceCommandError(commandLine, result.status, message);
    }
  }
}
