/**
 * Path validation utilities
 */

import * as path from "node:path";

/**
 * Check if a path is strictly inside a directory (the directory itself does not count).
 */
export function isPathWithinDir(filePath: string, allowedDir: string): boolean {
  const normalizedPath = path.resolve(filePath);
  const normalizedDir = path.resolve(allowedDir);

  return normalizedPath.startsWith(normalizedDir + path.sep);
}

/**
 * Check if a path is a direct child of a directory
 */
export function isDirectChild(filePath: string, parentDir: string): boolean {
  return path.dirname(path.resolve(filePath)) === path.resolve(parentDir);
}
