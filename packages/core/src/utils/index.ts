/**
 * Utility Functions Module
 *
 * Shared helpers used across all packages.
 */

import path from 'path';
import { PrivilegeError } from '../errors/index.js';

// ============================================
// PRIVILEGE
// ============================================

/**
 * Returns the effective user ID, or null where the platform has none
 */
export function getEffectiveUid(): number | null {
  return typeof process.geteuid === 'function' ? process.geteuid() : null;
}

/**
 * Whether the process runs as root
 */
export function isPrivileged(getUid: () => number | null = getEffectiveUid): boolean {
  return getUid() === 0;
}

/**
 * Throws a PrivilegeError unless the process runs as root.
 * systemctl writes (daemon-reload, start, stop) and the default unit
 * directories need it.
 */
export function assertPrivileged(getUid: () => number | null = getEffectiveUid): void {
  if (!isPrivileged(getUid)) {
    throw new PrivilegeError();
  }
}

// ============================================
// PATHS
// ============================================

/**
 * Resolve the fleet root: an explicit path wins, then the configured one,
 * then the working directory
 */
export function resolveFleetRoot(
  explicit?: string,
  configured?: string,
  cwd: string = process.cwd()
): string {
  return path.resolve(cwd, explicit || configured || '.');
}

/**
 * Whether a directory entry is hidden (dot-prefixed)
 */
export function isHiddenEntry(name: string): boolean {
  return name.startsWith('.');
}

/**
 * Format a duration in a human-readable way
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) return `${ms}ms`;
  if (ms < 60000) return `${(ms / 1000).toFixed(1)}s`;
  return `${Math.floor(ms / 60000)}m ${Math.floor((ms % 60000) / 1000)}s`;
}
