import { existsSync, mkdirSync, statSync } from 'fs';
import { posix } from 'path';

/**
 * Ensure directory exists
 */
export function ensureDir(path: string): void {
  if (!existsSync(path)) {
    mkdirSync(path, { recursive: true });
  }
}

/**
 * Check if path exists, optionally as a specific kind
 */
export function exists(path: string, kind?: 'file' | 'directory'): boolean {
  if (!existsSync(path)) {
    return false;
  }
  if (!kind) {
    return true;
  }
  const stats = statSync(path);
  return kind === 'directory' ? stats.isDirectory() : stats.isFile();
}

/**
 * Parent of a POSIX path, or null for a bare name or the root.
 * Deploy directories are POSIX paths on both local and remote hosts.
 */
export function parentDir(path: string): string | null {
  const parent = posix.dirname(path);
  if (parent === '.' || parent === path) {
    return null;
  }
  return parent;
}

/**
 * Double-quote a value for sh
 */
export function shellQuote(value: string): string {
  return `"${value.replace(/(["\\$`])/g, '\\$1')}"`;
}
