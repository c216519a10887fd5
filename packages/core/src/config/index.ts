/**
 * Configuration Module
 *
 * Central export for settings loading and validation.
 */

export { loadSettings, getSettings, clearSettingsCache } from './loader.js';

export * from './schema.js';
