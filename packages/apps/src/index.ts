/**
 * @unitfleet/apps
 *
 * App lifecycle engine for systemd unit bundles.
 *
 * This package provides:
 * - config.toml schema and loading
 * - A systemctl/journalctl service controller
 * - Per-app status, install, uninstall and log following
 * - Fleet discovery and batch operations
 *
 * @example
 * import { FleetManager, SystemctlController } from '@unitfleet/apps';
 *
 * const fleet = new FleetManager('/srv/units', { dryRun: false, force: false }, {
 *   controller: new SystemctlController(),
 *   confirm: async () => true,
 * });
 * fleet.status();
 */

// Export schemas
export { SystemdConfigSchema, AppConfigSchema, CONFIG_FILE_NAME } from './types.js';

// Export types
export type {
  SystemdConfig,
  AppConfig,
  ServiceScope,
  AppStatus,
  AppStatusReport,
  RunOptions,
  ManifestEntry,
  PlannedCopy,
  InstallResult,
  UninstallOutcome,
  UninstallResult,
  ConfirmPrompt,
} from './types.js';

export { APP_STATUS_LABELS, scopeFromConfig } from './types.js';

// Export services
export * from './services/index.js';
