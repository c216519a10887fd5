/**
 * App Config - reads an app's config.toml
 */

import fs from 'fs';
import { parse } from 'smol-toml';
import { ConfigError, describeError } from '@unitfleet/core';
import { AppConfigSchema, type AppConfig } from '../types.js';

/**
 * Parse and validate config.toml content
 *
 * @param path - Only used in error messages
 */
export function parseAppConfig(content: string, path: string): AppConfig {
  let parsed: unknown;
  try {
    parsed = parse(content);
  } catch (error) {
    throw new ConfigError(`Invalid TOML in ${path}: ${describeError(error)}`, path, {
      cause: error,
    });
  }

  const result = AppConfigSchema.safeParse(parsed);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid config in ${path}: ${details}`, path);
  }

  return result.data;
}

export function loadAppConfig(path: string): AppConfig {
  let content: string;
  try {
    content = fs.readFileSync(path, 'utf-8');
  } catch (error) {
    throw new ConfigError(`Failed to find config file at ${path}`, path, { cause: error });
  }
  return parseAppConfig(content, path);
}
