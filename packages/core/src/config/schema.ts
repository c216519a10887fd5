/**
 * Settings Schema Definitions
 *
 * Zod schemas for the process-wide settings the `units` CLI reads from the
 * environment (and from a `.env` file next to where it runs).
 */

import { z } from 'zod';

// =============================================================================
// Logging
// =============================================================================

/**
 * Log levels in priority order. `success` sits between `warn` and `info`
 * so finished operations still show when LOG_LEVEL=success.
 */
export const LOG_LEVELS = {
  error: 0,
  warn: 1,
  success: 2,
  info: 3,
  debug: 4,
} as const;

export const LogLevelSchema = z.enum(['error', 'warn', 'success', 'info', 'debug']);

export type LogLevel = z.infer<typeof LogLevelSchema>;

// =============================================================================
// Settings
// =============================================================================

const optionalPath = z
  .string()
  .trim()
  .optional()
  .transform((value) => (value ? value : undefined));

export const SettingsSchema = z.object({
  /** Directory whose subdirectories are the apps */
  fleetRoot: optionalPath,
  /** Console (and file) log level */
  logLevel: LogLevelSchema.default('info'),
  /** When set, rotating JSON log files are also written here */
  logDir: optionalPath,
  /** Service manager binary */
  systemctlBin: z.string().min(1, 'SYSTEMCTL_BIN must not be empty').default('systemctl'),
  /** Journal binary used for `units logs` */
  journalctlBin: z.string().min(1, 'JOURNALCTL_BIN must not be empty').default('journalctl'),
});

export type Settings = z.infer<typeof SettingsSchema>;

/**
 * Environment variable backing each settings field
 */
export const SETTINGS_ENV_VARS = {
  fleetRoot: 'UNITS_ROOT',
  logLevel: 'LOG_LEVEL',
  logDir: 'LOG_DIR',
  systemctlBin: 'SYSTEMCTL_BIN',
  journalctlBin: 'JOURNALCTL_BIN',
} as const satisfies Record<keyof Settings, string>;
