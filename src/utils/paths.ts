/**
 * Path utilities for comment-coder
 */

import { homedir } from 'os';
import { join, dirname } from 'path';
import { mkdirSync, existsSync } from 'fs';

/** SQLite's in-memory database name; never touches the filesystem */
export const MEMORY_DB = ':memory:';

/**
 * Expand a leading ~ to the home directory
 */
export function expandHome(path: string): string {
  if (path === '~') return homedir();
  if (path.startsWith('~/')) {
    return join(homedir(), path.slice(2));
  }
  return path;
}

/**
 * Expand ~ and make sure the parent directory exists
 * @param filePath - Output or database path (e.g., '~/.comment-coder/comments.db')
 */
export function resolveOutputPath(filePath: string): string {
  if (filePath === MEMORY_DB) return filePath;

  const resolved = expandHome(filePath);
  const dir = dirname(resolved);
  if (!existsSync(dir)) {
    mkdirSync(dir, { recursive: true });
  }
  return resolved;
}
