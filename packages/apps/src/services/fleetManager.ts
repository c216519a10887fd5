/**
 * Fleet Manager - runs app operations across the fleet root
 *
 * The fleet is every non-hidden directory directly under the root. There is
 * no registry: membership is re-read from disk on every call, and every app
 * is loaded eagerly, so one directory without a usable config.toml fails
 * discovery for the whole fleet.
 *
 * Batches run one app at a time in directory order and stop at the first
 * error.
 */

import fs from 'fs';
import path from 'path';
import {
  ConfigError,
  createServiceLogger,
  describeError,
  isHiddenEntry,
  type ServiceLogger,
} from '@unitfleet/core';
import { Application, type ApplicationDeps } from './application.js';
import {
  APP_STATUS_LABELS,
  type AppStatusReport,
  type ConfirmPrompt,
  type InstallResult,
  type RunOptions,
  type UninstallResult,
} from '../types.js';

const defaultLogger = createServiceLogger('fleet');

/**
 * Follows symlinks; a dangling link is not a directory
 */
function isDirectory(entryPath: string): boolean {
  return fs.statSync(entryPath, { throwIfNoEntry: false })?.isDirectory() ?? false;
}

/**
 * Load every app under the fleet root, sorted by name
 */
export function listFleetRoot(root: string, deps: ApplicationDeps): Application[] {
  let entries: string[];
  try {
    entries = fs.readdirSync(root);
  } catch (error) {
    throw new ConfigError(`Failed to read fleet root ${root}: ${describeError(error)}`, root, {
      cause: error,
    });
  }

  return entries
    .filter((name) => !isHiddenEntry(name) && isDirectory(path.join(root, name)))
    .sort()
    .map((name) => Application.load(root, name, deps));
}

export interface FleetManagerDeps extends ApplicationDeps {
  confirm: ConfirmPrompt;
}

export class FleetManager {
  private readonly root: string;
  private readonly options: RunOptions;
  private readonly deps: FleetManagerDeps;
  private readonly logger: ServiceLogger;

  constructor(root: string, options: RunOptions, deps: FleetManagerDeps) {
    this.root = path.resolve(root);
    this.options = options;
    this.deps = deps;
    this.logger = deps.logger ?? defaultLogger;
  }

  getRoot(): string {
    return this.root;
  }

  /**
   * All apps currently under the root
   */
  discover(): Application[] {
    return listFleetRoot(this.root, this.deps);
  }

  getApp(name: string): Application {
    return Application.load(this.root, name, this.deps);
  }

  status(name?: string): AppStatusReport[] {
    const reports: AppStatusReport[] = [];
    for (const app of this.select(name)) {
      const status = app.getStatus();
      this.logger.info(`Status for ${app.name}: ${APP_STATUS_LABELS[status]}`);
      reports.push({ name: app.name, status });
    }
    return reports;
  }

  install(name?: string): InstallResult[] {
    const results: InstallResult[] = [];
    const apps = this.select(name);
    for (const app of apps) {
      if (name === undefined) {
        this.logger.info(`Installing app ${app.name}`);
      }
      const result = app.install(this.options);
      if (result.dryRun) {
        this.logger.success(`Dry run for app ${app.name} complete`);
      } else {
        this.logger.success(`App ${app.name} installed and started`);
      }
      results.push(result);
    }
    return results;
  }

  async uninstall(name?: string): Promise<UninstallResult[]> {
    const results: UninstallResult[] = [];
    for (const app of this.select(name)) {
      if (name === undefined) {
        this.logger.info(`Uninstalling app ${app.name}`);
      }
      const result = await app.uninstall(this.options, this.deps.confirm);
      if (result.outcome === 'uninstalled') {
        this.logger.success(`App ${app.name} uninstalled`);
      } else if (result.outcome === 'dry-run') {
        this.logger.success(`Dry run for app ${app.name} complete`);
      }
      results.push(result);
    }
    return results;
  }

  /**
   * Follow one app's journal; blocks until interrupted
   */
  logs(name: string): void {
    const app = this.getApp(name);
    this.logger.info(`Showing logs for ${app.name} (Press Ctrl+C to exit)`);
    app.followLogs();
  }

  /**
   * The named app, or the whole fleet (warning when it is empty)
   */
  private select(name?: string): Application[] {
    if (name !== undefined) {
      return [this.getApp(name)];
    }

    const apps = this.discover();
    if (apps.length === 0) {
      this.logger.warn('No apps found');
    }
    return apps;
  }
}
