/**
 * @unitfleet/core
 *
 * Shared building blocks for the units tooling.
 *
 * This package provides:
 * - Settings loading and validation
 * - Leveled logging with Winston
 * - Typed error classes
 * - Privilege and path helpers
 */

// Settings first: the loader reads .env before the logger picks its level
export * from './config/index.js';

export * from './logger/index.js';

export * from './errors/index.js';

export * from './utils/index.js';
