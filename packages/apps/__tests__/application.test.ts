/**
 * Application Tests
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { existsSync, mkdirSync, readdirSync, readFileSync, rmSync, writeFileSync } from 'fs';
import { join } from 'path';
import {
  AppNotFoundError,
  CollisionError,
  ConfigError,
  CopyError,
  EmptyManifestError,
  ManifestError,
  ServiceCommandError,
} from '@unitfleet/core';
import {
  FakeServiceController,
  createMockServiceLogger,
  createTestFleet,
  unitFile,
  type MockServiceLogger,
  type TestFleet,
} from '@unitfleet/test-utils';
import { Application } from '../src/services/application.js';
import type { ConfirmPrompt } from '../src/types.js';

describe('Application', () => {
  let fleet: TestFleet;
  let controller: FakeServiceController;
  let logger: MockServiceLogger;

  const load = (name = 'webapp') => Application.load(fleet.root, name, { controller, logger });

  /** Put a file into the install location as if it had been installed */
  const placeInstalled = (relativePath: string, content = 'installed') => {
    const target = join(fleet.units, relativePath);
    mkdirSync(join(target, '..'), { recursive: true });
    writeFileSync(target, content);
    return target;
  };

  beforeEach(() => {
    fleet = createTestFleet();
    controller = new FakeServiceController();
    logger = createMockServiceLogger();
  });

  afterEach(() => {
    fleet.cleanup();
  });

  describe('load', () => {
    it('should read the install location and scope from config.toml', () => {
      fleet.addApp('webapp');

      const app = load();

      expect(app.name).toBe('webapp');
      expect(app.sourceDir).toBe(join(fleet.root, 'webapp'));
      expect(app.targetDir).toBe(fleet.units);
      expect(app.scope).toBe('system');
      expect(app.unitName).toBe('webapp.service');
    });

    it('should use the user scope when use_user is set', () => {
      fleet.addApp('webapp', { useUser: true });

      expect(load().scope).toBe('user');
    });

    it('should fail with AppNotFoundError for a missing directory', () => {
      expect(() => load('ghost')).toThrow(AppNotFoundError);
    });

    it('should fail with ConfigError when config.toml is missing', () => {
      mkdirSync(join(fleet.root, 'bare'));
      writeFileSync(join(fleet.root, 'bare', 'bare.service'), unitFile('bare'));

      expect(() => load('bare')).toThrow(ConfigError);
    });
  });

  describe('getManifest', () => {
    it('should list nested files and skip the top-level config.toml', () => {
      fleet.addApp('webapp', {
        files: {
          'webapp.timer': unitFile('timer'),
          'webapp.service': unitFile('service'),
          'env/webapp.env': 'PORT=8080\n',
          'nested/config.toml': 'kept = true\n',
        },
      });

      const manifest = load().getManifest();

      expect(manifest.map((entry) => entry.relativePath)).toEqual([
        join('env', 'webapp.env'),
        join('nested', 'config.toml'),
        'webapp.service',
        'webapp.timer',
      ]);
      expect(manifest[0]).toEqual({
        relativePath: join('env', 'webapp.env'),
        sourcePath: join(fleet.root, 'webapp', 'env', 'webapp.env'),
        targetPath: join(fleet.units, 'env', 'webapp.env'),
      });
    });

    it('should not list empty directories', () => {
      fleet.addApp('webapp');
      mkdirSync(join(fleet.root, 'webapp', 'empty'));

      expect(load().getManifest().map((entry) => entry.relativePath)).toEqual(['webapp.service']);
    });

    it('should fail with ManifestError when the source directory vanished', () => {
      fleet.addApp('webapp');
      const app = load();
      rmSync(app.sourceDir, { recursive: true, force: true });

      expect(() => app.getManifest()).toThrow(ManifestError);
    });
  });

  describe('getStatus', () => {
    beforeEach(() => {
      fleet.addApp('webapp', {
        files: { 'webapp.service': unitFile('service'), 'webapp.timer': unitFile('timer') },
      });
    });

    it('should report not-installed without asking the service manager', () => {
      controller.setUnit('webapp.service', { active: true, enabled: true });

      expect(load().getStatus()).toBe('not-installed');
      expect(controller.calls).toEqual([]);
    });

    it('should report not-installed when only some files are present', () => {
      placeInstalled('webapp.service');
      controller.setUnit('webapp.service', { active: true });

      expect(load().getStatus()).toBe('not-installed');
    });

    it('should report running when active even if not enabled', () => {
      placeInstalled('webapp.service');
      placeInstalled('webapp.timer');
      controller.setUnit('webapp.service', { active: true, enabled: false });

      expect(load().getStatus()).toBe('running');
      expect(controller.callsTo('isEnabled')).toEqual([]);
    });

    it('should report stopped when enabled but inactive', () => {
      placeInstalled('webapp.service');
      placeInstalled('webapp.timer');
      controller.setUnit('webapp.service', { active: false, enabled: true });

      expect(load().getStatus()).toBe('stopped');
    });

    it('should report installed when neither active nor enabled', () => {
      placeInstalled('webapp.service');
      placeInstalled('webapp.timer');

      expect(load().getStatus()).toBe('installed');
    });

    it('should treat a failing query as false', () => {
      placeInstalled('webapp.service');
      placeInstalled('webapp.timer');
      controller.setUnit('webapp.service', { active: true, enabled: true }).failOn('isActive');

      expect(load().getStatus()).toBe('stopped');
    });

    it('should query the user manager for user-scoped apps', () => {
      fleet.addApp('userapp', { useUser: true });
      placeInstalled('userapp.service');

      load('userapp').getStatus();

      expect(controller.calls).toEqual([
        { method: 'isActive', unit: 'userapp.service', scope: 'user' },
        { method: 'isEnabled', unit: 'userapp.service', scope: 'user' },
      ]);
    });
  });

  describe('empty manifest', () => {
    beforeEach(() => {
      fleet.addApp('hollow', { files: {} });
    });

    it('should pass the file check and report installed', () => {
      expect(load('hollow').getStatus()).toBe('installed');
    });

    it('should refuse to install without touching anything', () => {
      expect(() => load('hollow').install({ dryRun: false, force: true })).toThrow(
        EmptyManifestError
      );
      expect(readdirSync(fleet.units)).toEqual([]);
      expect(controller.mutations()).toEqual([]);
    });

    it('should refuse to uninstall', async () => {
      await expect(
        load('hollow').uninstall({ dryRun: false, force: true }, async () => true)
      ).rejects.toThrow('No files found for app hollow');
      expect(controller.mutations()).toEqual([]);
    });
  });

  describe('install', () => {
    it('should only report the plan on a dry run', () => {
      fleet.addApp('webapp');
      placeInstalled('webapp.service', 'old');

      const result = load().install({ dryRun: true, force: false });

      expect(result).toEqual({
        name: 'webapp',
        dryRun: true,
        copies: [
          {
            source: join(fleet.root, 'webapp', 'webapp.service'),
            target: join(fleet.units, 'webapp.service'),
          },
        ],
        actions: ['daemon-reload', 'start webapp.service'],
      });
      expect(readFileSync(join(fleet.units, 'webapp.service'), 'utf-8')).toBe('old');
      expect(controller.mutations()).toEqual([]);
      expect(logger.getCalls().info).toEqual([
        '[DRY RUN] Would install app webapp',
        `[DRY RUN] Would copy ${join(fleet.root, 'webapp', 'webapp.service')} to ${join(fleet.units, 'webapp.service')}`,
        '[DRY RUN] Would reload systemd and start webapp.service',
      ]);
    });

    it('should mention the user manager in the dry-run plan', () => {
      fleet.addApp('webapp', { useUser: true });

      load().install({ dryRun: true, force: false });

      expect(logger.getCalls().info).toContain(
        '[DRY RUN] Would reload systemd and start webapp.service as user'
      );
    });

    it('should copy every file, reload and start the unit', () => {
      fleet.addApp('webapp', {
        files: { 'webapp.service': unitFile('service'), 'drop-in/override.conf': '[Service]\n' },
      });

      const result = load().install({ dryRun: false, force: false });

      expect(result.dryRun).toBe(false);
      expect(readFileSync(join(fleet.units, 'webapp.service'), 'utf-8')).toBe(unitFile('service'));
      expect(readFileSync(join(fleet.units, 'drop-in', 'override.conf'), 'utf-8')).toBe(
        '[Service]\n'
      );
      expect(controller.mutations()).toEqual([
        { method: 'reload', scope: 'system' },
        { method: 'start', unit: 'webapp.service', scope: 'system' },
      ]);
    });

    it('should create a missing install location', () => {
      const userUnits = join(fleet.base, 'home', '.config', 'systemd', 'user');
      fleet.addApp('webapp', { installLocation: userUnits, useUser: true });

      load().install({ dryRun: false, force: false });

      expect(readFileSync(join(userUnits, 'webapp.service'), 'utf-8')).toBe(unitFile('webapp'));
      expect(existsSync(join(fleet.units, 'webapp.service'))).toBe(false);
      expect(controller.mutations()).toEqual([
        { method: 'reload', scope: 'user' },
        { method: 'start', unit: 'webapp.service', scope: 'user' },
      ]);
    });

    it('should abort on a collision before copying anything', () => {
      fleet.addApp('webapp', {
        files: {
          'a.service': unitFile('a'),
          'b.service': unitFile('b'),
          'webapp.service': unitFile('webapp'),
        },
      });
      const existing = placeInstalled('webapp.service', 'old');

      let caught: unknown;
      try {
        load().install({ dryRun: false, force: false });
      } catch (error) {
        caught = error;
      }

      expect(caught).toBeInstanceOf(CollisionError);
      expect(caught).toMatchObject({ targetPath: existing });
      expect(readdirSync(fleet.units)).toEqual(['webapp.service']);
      expect(readFileSync(existing, 'utf-8')).toBe('old');
      expect(controller.mutations()).toEqual([]);
    });

    it('should overwrite existing files with force and start the unit', () => {
      fleet.addApp('webapp');
      const existing = placeInstalled('webapp.service', 'old');

      load().install({ dryRun: false, force: true });

      expect(readFileSync(existing, 'utf-8')).toBe(unitFile('webapp'));
      expect(controller.callsTo('start')).toEqual([
        { method: 'start', unit: 'webapp.service', scope: 'system' },
      ]);
    });

    it('should keep already copied files when a copy fails', () => {
      fleet.addApp('webapp', {
        files: { 'a.service': unitFile('a'), 'b.service': unitFile('b') },
      });
      // a directory in the way makes the second copy fail
      mkdirSync(join(fleet.units, 'b.service'));

      expect(() => load().install({ dryRun: false, force: true })).toThrow(CopyError);
      expect(readFileSync(join(fleet.units, 'a.service'), 'utf-8')).toBe(unitFile('a'));
      expect(controller.mutations()).toEqual([]);
    });

    it('should propagate a failed reload without undoing the copy', () => {
      fleet.addApp('webapp');
      controller.failOn('reload');

      expect(() => load().install({ dryRun: false, force: false })).toThrow(ServiceCommandError);
      expect(existsSync(join(fleet.units, 'webapp.service'))).toBe(true);
      expect(controller.callsTo('start')).toEqual([]);
    });

    it('should propagate a failed start', () => {
      fleet.addApp('webapp');
      controller.failOn('start');

      expect(() => load().install({ dryRun: false, force: false })).toThrow(
        "Command 'systemctl start webapp.service' exited with code 1"
      );
      expect(existsSync(join(fleet.units, 'webapp.service'))).toBe(true);
    });
  });

  describe('uninstall', () => {
    beforeEach(() => {
      fleet.addApp('webapp', {
        files: {
          'a.service': unitFile('a'),
          'b.service': unitFile('b'),
          'webapp.service': unitFile('webapp'),
        },
      });
    });

    const installAll = () => {
      placeInstalled('a.service');
      placeInstalled('b.service');
      placeInstalled('webapp.service');
    };

    it('should only report the plan on a dry run', async () => {
      installAll();
      const confirm = vi.fn<ConfirmPrompt>(async () => true);

      const result = await load().uninstall({ dryRun: true, force: false }, confirm);

      expect(result.outcome).toBe('dry-run');
      expect(readdirSync(fleet.units).sort()).toEqual(['a.service', 'b.service', 'webapp.service']);
      expect(controller.mutations()).toEqual([]);
      expect(confirm).not.toHaveBeenCalled();
      expect(logger.getCalls().info).toEqual([
        '[DRY RUN] Would stop webapp.service',
        `[DRY RUN] Would remove ${join(fleet.units, 'a.service')}`,
        `[DRY RUN] Would remove ${join(fleet.units, 'b.service')}`,
        `[DRY RUN] Would remove ${join(fleet.units, 'webapp.service')}`,
      ]);
    });

    it('should leave everything in place when the operator declines', async () => {
      installAll();
      controller.setUnit('webapp.service', { active: true });
      const confirm = vi.fn<ConfirmPrompt>(async () => false);

      const result = await load().uninstall({ dryRun: false, force: false }, confirm);

      expect(result).toEqual({ name: 'webapp', outcome: 'cancelled', removed: [], failed: [] });
      expect(confirm).toHaveBeenCalledWith('Are you sure you want to uninstall webapp?');
      expect(readdirSync(fleet.units)).toHaveLength(3);
      expect(controller.mutations()).toEqual([]);
      expect(controller.getUnit('webapp.service').active).toBe(true);
    });

    it('should treat a failed prompt as a cancellation', async () => {
      installAll();

      const result = await load().uninstall({ dryRun: false, force: false }, async () => {
        throw new Error('stdin closed');
      });

      expect(result.outcome).toBe('cancelled');
      expect(readdirSync(fleet.units)).toHaveLength(3);
      expect(logger.getCalls().warn).toEqual(['Uninstall confirmation failed: stdin closed']);
    });

    it('should stop, remove and reload after confirmation', async () => {
      installAll();

      const result = await load().uninstall({ dryRun: false, force: false }, async () => true);

      expect(result.outcome).toBe('uninstalled');
      expect(result.removed).toEqual([
        join(fleet.units, 'a.service'),
        join(fleet.units, 'b.service'),
        join(fleet.units, 'webapp.service'),
      ]);
      expect(readdirSync(fleet.units)).toEqual([]);
      expect(controller.mutations()).toEqual([
        { method: 'stop', unit: 'webapp.service', scope: 'system' },
        { method: 'reload', scope: 'system' },
      ]);
    });

    it('should skip the prompt with force', async () => {
      installAll();
      const confirm = vi.fn<ConfirmPrompt>(async () => false);

      const result = await load().uninstall({ dryRun: false, force: true }, confirm);

      expect(result.outcome).toBe('uninstalled');
      expect(confirm).not.toHaveBeenCalled();
    });

    it('should keep removing files when one cannot be removed', async () => {
      placeInstalled('a.service');
      placeInstalled('webapp.service');
      // a directory cannot be unlinked
      mkdirSync(join(fleet.units, 'b.service'));

      const result = await load().uninstall({ dryRun: false, force: true }, async () => true);

      expect(result.removed).toEqual([
        join(fleet.units, 'a.service'),
        join(fleet.units, 'webapp.service'),
      ]);
      expect(result.failed).toEqual([join(fleet.units, 'b.service')]);
      expect(readdirSync(fleet.units)).toEqual(['b.service']);
      expect(controller.callsTo('reload')).toEqual([{ method: 'reload', scope: 'system' }]);
      expect(logger.getCalls().warn).toHaveLength(1);
    });

    it('should count files that were never installed as failed removals', async () => {
      placeInstalled('webapp.service');

      const result = await load().uninstall({ dryRun: false, force: true }, async () => true);

      expect(result.outcome).toBe('uninstalled');
      expect(result.removed).toEqual([join(fleet.units, 'webapp.service')]);
      expect(result.failed).toEqual([
        join(fleet.units, 'a.service'),
        join(fleet.units, 'b.service'),
      ]);
    });

    it('should carry on when the unit cannot be stopped', async () => {
      installAll();
      controller.failOn('stop');

      const result = await load().uninstall({ dryRun: false, force: true }, async () => true);

      expect(result.outcome).toBe('uninstalled');
      expect(readdirSync(fleet.units)).toEqual([]);
      expect(controller.callsTo('reload')).toHaveLength(1);
      expect(logger.getCalls().warn).toEqual([
        "Could not stop webapp.service: Command 'systemctl stop webapp.service' exited with code 1",
      ]);
    });

    it('should propagate a failed final reload', async () => {
      installAll();
      controller.failOn('reload');

      await expect(
        load().uninstall({ dryRun: false, force: true }, async () => true)
      ).rejects.toBeInstanceOf(ServiceCommandError);
      expect(readdirSync(fleet.units)).toEqual([]);
    });
  });

  describe('followLogs', () => {
    it('should follow the primary unit in the app scope', () => {
      fleet.addApp('webapp', { useUser: true });

      load().followLogs();

      expect(controller.calls).toEqual([
        { method: 'followLogs', unit: 'webapp.service', scope: 'user' },
      ]);
    });

    it('should surface a failed follower', () => {
      fleet.addApp('webapp');
      controller.failOn('followLogs');

      expect(() => load().followLogs()).toThrow(ServiceCommandError);
    });
  });
});
