/**
 * App Types
 *
 * Types for apps: directory trees of systemd unit files (plus whatever
 * assets they need) installed into the service manager's unit directory.
 */

import { z } from 'zod';

// ============================================
// CONFIG SCHEMA
// ============================================

/** File at the top of every app directory; never part of the manifest */
export const CONFIG_FILE_NAME = 'config.toml';

/**
 * `[systemd]` table of an app's config.toml
 */
export const SystemdConfigSchema = z.object({
  /** Directory the unit files are copied into, e.g. /etc/systemd/system */
  install_location: z.string().min(1, 'install_location must not be empty'),
  /** Talk to the per-user service manager (`systemctl --user`) */
  use_user: z.boolean(),
});

export type SystemdConfig = z.infer<typeof SystemdConfigSchema>;

export const AppConfigSchema = z.object({
  systemd: SystemdConfigSchema,
});

export type AppConfig = z.infer<typeof AppConfigSchema>;

// ============================================
// SERVICE MANAGER
// ============================================

/**
 * Which service manager instance a command targets
 */
export type ServiceScope = 'system' | 'user';

export function scopeFromConfig(config: AppConfig): ServiceScope {
  return config.systemd.use_user ? 'user' : 'system';
}

// ============================================
// STATUS
// ============================================

/**
 * Derived on every query from the target directory and the service manager;
 * never stored
 */
export type AppStatus = 'not-installed' | 'installed' | 'stopped' | 'running';

export const APP_STATUS_LABELS: Record<AppStatus, string> = {
  'not-installed': 'Not Installed',
  installed: 'Installed',
  stopped: 'Stopped',
  running: 'Running',
};

export interface AppStatusReport {
  name: string;
  status: AppStatus;
}

// ============================================
// OPERATIONS
// ============================================

/**
 * Flags shared by every app operation in one run
 */
export interface RunOptions {
  /** Report what would happen without touching files or services */
  dryRun: boolean;
  /** Overwrite existing files on install; skip the confirmation on uninstall */
  force: boolean;
}

/**
 * One file of an app's payload
 */
export interface ManifestEntry {
  /** Path relative to the app directory */
  relativePath: string;
  sourcePath: string;
  targetPath: string;
}

export interface PlannedCopy {
  source: string;
  target: string;
}

export interface InstallResult {
  name: string;
  dryRun: boolean;
  copies: PlannedCopy[];
  /** Service manager commands run (or planned) after copying */
  actions: string[];
}

export type UninstallOutcome = 'uninstalled' | 'cancelled' | 'dry-run';

export interface UninstallResult {
  name: string;
  outcome: UninstallOutcome;
  /** Target paths that were removed */
  removed: string[];
  /** Target paths that could not be removed */
  failed: string[];
}

/**
 * Asks the operator a yes/no question; resolves false for "no"
 */
export type ConfirmPrompt = (message: string) => Promise<boolean>;
