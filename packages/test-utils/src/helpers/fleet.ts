/**
 * Fleet Test Helpers
 *
 * Build throwaway fleet roots and install directories under the OS temp dir.
 */

import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { dirname, join } from 'path';

export interface TestAppOptions {
  /** Defaults to `<fleet>/units` */
  installLocation?: string;
  useUser?: boolean;
  /** Relative path → content; defaults to a single `<name>.service` */
  files?: Record<string, string>;
  /** Raw config.toml content, written instead of the generated one */
  config?: string;
}

export interface TestFleet {
  /** Temp directory holding everything below */
  base: string;
  /** Fleet root: one directory per app */
  root: string;
  /** Default install location */
  units: string;
  addApp: (name: string, options?: TestAppOptions) => string;
  cleanup: () => void;
}

export function unitFile(description: string): string {
  return `[Unit]\nDescription=${description}\n\n[Service]\nExecStart=/bin/true\n`;
}

export function appConfigToml(installLocation: string, useUser = false): string {
  return `[systemd]\ninstall_location = "${installLocation}"\nuse_user = ${useUser}\n`;
}

/**
 * Create an empty fleet root plus an install location
 */
export function createTestFleet(prefix = 'units-test-'): TestFleet {
  const base = mkdtempSync(join(tmpdir(), prefix));
  const root = join(base, 'fleet');
  const units = join(base, 'units');
  mkdirSync(root, { recursive: true });
  mkdirSync(units, { recursive: true });

  return {
    base,
    root,
    units,
    addApp: (name, options = {}) => {
      const appDir = join(root, name);
      mkdirSync(appDir, { recursive: true });
      writeFileSync(
        join(appDir, 'config.toml'),
        options.config ?? appConfigToml(options.installLocation ?? units, options.useUser)
      );

      const files = options.files ?? { [`${name}.service`]: unitFile(name) };
      for (const [relativePath, content] of Object.entries(files)) {
        const filePath = join(appDir, relativePath);
        mkdirSync(dirname(filePath), { recursive: true });
        writeFileSync(filePath, content);
      }
      return appDir;
    },
    cleanup: () => {
      rmSync(base, { recursive: true, force: true });
    },
  };
}
