/**
 * Application - one app directory under the fleet root
 *
 * An app is `<fleetRoot>/<name>/` holding a config.toml and the files to
 * install. Every regular file except the top-level config.toml is part of the
 * manifest and is copied to `<install_location>/<relative path>`.
 *
 * Nothing is cached: status is recomputed from the target directory and the
 * service manager on every call.
 */

import fs from 'fs';
import path from 'path';
import {
  AppNotFoundError,
  CollisionError,
  CopyError,
  EmptyManifestError,
  ManifestError,
  createServiceLogger,
  describeError,
  type ServiceLogger,
} from '@unitfleet/core';
import { loadAppConfig } from './appConfig.js';
import type { ServiceController } from './serviceController.js';
import {
  CONFIG_FILE_NAME,
  scopeFromConfig,
  type AppStatus,
  type ConfirmPrompt,
  type InstallResult,
  type ManifestEntry,
  type RunOptions,
  type ServiceScope,
  type UninstallResult,
} from '../types.js';

const defaultLogger = createServiceLogger('app');

export interface ApplicationDeps {
  controller: ServiceController;
  logger?: ServiceLogger;
}

export interface ApplicationInit {
  name: string;
  sourceDir: string;
  targetDir: string;
  scope: ServiceScope;
}

export class Application {
  readonly name: string;
  readonly sourceDir: string;
  readonly targetDir: string;
  readonly scope: ServiceScope;
  /** Primary unit started on install and stopped on uninstall */
  readonly unitName: string;

  private readonly controller: ServiceController;
  private readonly logger: ServiceLogger;

  constructor(init: ApplicationInit, deps: ApplicationDeps) {
    this.name = init.name;
    this.sourceDir = init.sourceDir;
    this.targetDir = init.targetDir;
    this.scope = init.scope;
    this.unitName = `${init.name}.service`;
    this.controller = deps.controller;
    this.logger = deps.logger ?? defaultLogger;
  }

  /**
   * Build an app from `<fleetRoot>/<name>/config.toml`
   */
  static load(fleetRoot: string, name: string, deps: ApplicationDeps): Application {
    const sourceDir = path.resolve(fleetRoot, name);
    if (!fs.existsSync(sourceDir) || !fs.statSync(sourceDir).isDirectory()) {
      throw new AppNotFoundError(name, sourceDir);
    }

    const config = loadAppConfig(path.join(sourceDir, CONFIG_FILE_NAME));

    return new Application(
      {
        name,
        sourceDir,
        targetDir: path.resolve(config.systemd.install_location),
        scope: scopeFromConfig(config),
      },
      deps
    );
  }

  /**
   * Where a manifest file lands inside the target directory
   */
  targetPathFor(relativePath: string): string {
    return path.join(this.targetDir, relativePath);
  }

  /**
   * Walk the app directory; entries are sorted by relative path
   */
  getManifest(): ManifestEntry[] {
    const relativePaths: string[] = [];
    try {
      this.walk('', relativePaths);
    } catch (error) {
      throw new ManifestError(this.sourceDir, { cause: error });
    }

    return relativePaths.sort().map((relativePath) => ({
      relativePath,
      sourcePath: path.join(this.sourceDir, relativePath),
      targetPath: this.targetPathFor(relativePath),
    }));
  }

  /**
   * Not Installed unless every manifest file exists in the target directory;
   * then active wins over enabled. An empty manifest passes the file check.
   */
  getStatus(): AppStatus {
    const missing = this.getManifest().find((entry) => !fs.existsSync(entry.targetPath));
    if (missing) {
      this.logger.debug(`${this.name}: ${missing.targetPath} is not installed`);
      return 'not-installed';
    }

    if (this.controller.isActive(this.unitName, this.scope)) {
      return 'running';
    }

    if (this.controller.isEnabled(this.unitName, this.scope)) {
      return 'stopped';
    }

    return 'installed';
  }

  /**
   * Copy every manifest file into the target directory, then reload the
   * service manager and start the primary unit.
   *
   * Without `force`, any existing target aborts before the first copy.
   * A failed copy leaves already copied files in place.
   */
  install(options: RunOptions): InstallResult {
    const manifest = this.requireManifest();
    const copies = manifest.map((entry) => ({
      source: entry.sourcePath,
      target: entry.targetPath,
    }));
    const actions = ['daemon-reload', `start ${this.unitName}`];

    if (options.dryRun) {
      this.logger.info(`[DRY RUN] Would install app ${this.name}`);
      for (const copy of copies) {
        this.logger.info(`[DRY RUN] Would copy ${copy.source} to ${copy.target}`);
      }
      this.logger.info(
        `[DRY RUN] Would reload systemd and start ${this.unitName}${
          this.scope === 'user' ? ' as user' : ''
        }`
      );
      return { name: this.name, dryRun: true, copies, actions };
    }

    const op = this.logger.startOperation('install', { app: this.name });
    try {
      // check every target before copying anything
      if (!options.force) {
        for (const entry of manifest) {
          if (fs.existsSync(entry.targetPath)) {
            throw new CollisionError(entry.targetPath);
          }
        }
      }

      for (const entry of manifest) {
        try {
          fs.mkdirSync(path.dirname(entry.targetPath), { recursive: true });
          fs.copyFileSync(entry.sourcePath, entry.targetPath);
        } catch (error) {
          throw new CopyError(entry.sourcePath, entry.targetPath, { cause: error });
        }
        this.logger.info(`Copied ${entry.relativePath}`);
      }

      this.controller.reload(this.scope);
      this.controller.start(this.unitName, this.scope);

      op.success(`Installed ${this.name}`, { files: manifest.length });
      return { name: this.name, dryRun: false, copies, actions };
    } catch (error) {
      op.failure(error instanceof Error ? error : String(error));
      throw error;
    }
  }

  /**
   * Stop the primary unit, remove every installed manifest file and reload
   * the service manager.
   *
   * Stop and per-file removal failures are logged and skipped so a broken
   * install still gets cleaned up as far as possible; the final reload
   * failure is not.
   */
  async uninstall(options: RunOptions, confirm: ConfirmPrompt): Promise<UninstallResult> {
    const manifest = this.requireManifest();

    if (options.dryRun) {
      this.logger.info(`[DRY RUN] Would stop ${this.unitName}`);
      for (const entry of manifest) {
        this.logger.info(`[DRY RUN] Would remove ${entry.targetPath}`);
      }
      return { name: this.name, outcome: 'dry-run', removed: [], failed: [] };
    }

    if (!options.force) {
      let confirmed: boolean;
      try {
        confirmed = await confirm(`Are you sure you want to uninstall ${this.name}?`);
      } catch (error) {
        this.logger.warn(`Uninstall confirmation failed: ${describeError(error)}`);
        confirmed = false;
      }

      if (!confirmed) {
        this.logger.info('Uninstall cancelled');
        return { name: this.name, outcome: 'cancelled', removed: [], failed: [] };
      }
    }

    const op = this.logger.startOperation('uninstall', { app: this.name });

    try {
      this.controller.stop(this.unitName, this.scope);
    } catch (error) {
      this.logger.warn(`Could not stop ${this.unitName}: ${describeError(error)}`);
    }

    const removed: string[] = [];
    const failed: string[] = [];
    for (const entry of manifest) {
      try {
        fs.unlinkSync(entry.targetPath);
        removed.push(entry.targetPath);
        this.logger.info(`Removed file ${entry.targetPath}`);
      } catch (error) {
        failed.push(entry.targetPath);
        this.logger.warn(`Could not remove ${entry.targetPath}: ${describeError(error)}`);
      }
    }

    try {
      this.controller.reload(this.scope);
    } catch (error) {
      op.failure(error instanceof Error ? error : String(error));
      throw error;
    }

    op.success(`Uninstalled ${this.name}`, { removed: removed.length, failed: failed.length });
    return { name: this.name, outcome: 'uninstalled', removed, failed };
  }

  /**
   * Follow the primary unit's journal; blocks until interrupted
   */
  followLogs(): void {
    this.controller.followLogs(this.unitName, this.scope);
  }

  private requireManifest(): ManifestEntry[] {
    const manifest = this.getManifest();
    if (manifest.length === 0) {
      throw new EmptyManifestError(this.name);
    }
    return manifest;
  }

  private walk(relativeDir: string, out: string[]): void {
    const absoluteDir = path.join(this.sourceDir, relativeDir);
    for (const entry of fs.readdirSync(absoluteDir, { withFileTypes: true })) {
      const relativePath = relativeDir ? path.join(relativeDir, entry.name) : entry.name;

      if (entry.isDirectory()) {
        this.walk(relativePath, out);
        continue;
      }

      if (relativePath === CONFIG_FILE_NAME) continue;

      if (entry.isFile() || this.isLinkToFile(path.join(absoluteDir, entry.name))) {
        out.push(relativePath);
      }
    }
  }

  private isLinkToFile(absolutePath: string): boolean {
    const stats = fs.statSync(absolutePath, { throwIfNoEntry: false });
    return stats?.isFile() ?? false;
  }
}
