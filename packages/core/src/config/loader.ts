/**
 * Settings Loader
 *
 * Reads the CLI settings from the environment:
 * - Loads a `.env` file from the working directory (if present)
 * - Maps environment variables onto settings fields
 * - Validates with Zod
 */

import dotenv from 'dotenv';
import { ConfigError } from '../errors/index.js';
import { SETTINGS_ENV_VARS, SettingsSchema, type Settings } from './schema.js';

// Load environment variables
dotenv.config();

type Env = Record<string, string | undefined>;

const envVariables: Record<string, string | undefined> = SETTINGS_ENV_VARS;

/**
 * Collect the raw settings values from an environment object
 */
function readSettingsFromEnv(env: Env): Record<string, string | undefined> {
  const raw: Record<string, string | undefined> = {};
  for (const [field, variable] of Object.entries(SETTINGS_ENV_VARS)) {
    const value = env[variable];
    // Treat empty variables as unset so defaults still apply
    raw[field] = value === '' ? undefined : value;
  }
  return raw;
}

let cachedSettings: Settings | null = null;

/**
 * Load and validate settings.
 *
 * @param env - Environment to read from (defaults to process.env)
 * @param overrides - Values that win over the environment (e.g. CLI flags)
 */
export function loadSettings(env: Env = process.env, overrides: Partial<Settings> = {}): Settings {
  const raw = { ...readSettingsFromEnv(env) };
  for (const [key, value] of Object.entries(overrides)) {
    if (value !== undefined) raw[key] = value;
  }

  const result = SettingsSchema.safeParse(raw);

  if (!result.success) {
    const details = result.error.issues
      .map((issue) => {
        const field = issue.path.join('.');
        return `${envVariables[field] ?? field}: ${issue.message}`;
      })
      .join('; ');
    throw new ConfigError(`Invalid settings: ${details}`);
  }

  cachedSettings = result.data;
  return cachedSettings;
}

/**
 * Get the current settings, loading them from process.env on first use
 */
export function getSettings(): Settings {
  if (!cachedSettings) {
    return loadSettings();
  }
  return cachedSettings;
}

/**
 * Clear the cached settings
 * Useful for testing or reloading settings
 */
export function clearSettingsCache(): void {
  cachedSettings = null;
}
