/**
 * @unitfleet/test-utils
 *
 * Shared test utilities for the units packages.
 *
 * This package provides:
 * - A mock service logger
 * - An in-memory ServiceController
 * - Temporary fleet roots with apps
 *
 * @example
 * ```typescript
 * import { createTestFleet, FakeServiceController } from '@unitfleet/test-utils';
 *
 * const fleet = createTestFleet();
 * fleet.addApp('webapp');
 * const controller = new FakeServiceController().setUnit('webapp.service', { active: true });
 * ```
 */

export * from './mocks/index.js';
export * from './helpers/index.js';
