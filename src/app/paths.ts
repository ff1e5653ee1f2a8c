/**
 * Path resolution utilities
 *
 * Relative paths in config (session file, log file) resolve against the
 * project root, so nordport behaves the same from any working directory.
 */

import { fileURLToPath } from 'url';
import { dirname, join, isAbsolute } from 'path';
import { homedir } from 'os';

// tsx runs from src/app/paths.ts (2 levels up),
// node runs from dist/src/app/paths.js (3 levels up)
const here = dirname(fileURLToPath(import.meta.url));
export const PROJECT_ROOT = here.includes('/dist/')
  ? join(here, '..', '..', '..')
  : join(here, '..', '..');

/**
 * Resolve a path relative to project root (unless already absolute).
 * A leading `~` expands to the user's home directory.
 */
export function resolveProjectPath(path: string): string {
  if (isAbsolute(path)) return path;
  if (path === '~' || path.startsWith('~/')) {
    return join(homedir(), path.slice(1));
  }
  return join(PROJECT_ROOT, path);
}
