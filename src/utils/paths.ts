import * as path from "path";

import { GIT_CONSTANTS } from "../constants";

export function resolveEventPath(repoPath: string, eventPath: string): string {
  return path.resolve(repoPath, eventPath);
}

/**
 * True for the repository's `.git` entry and anything beneath it, including
 * the `.git` entries of nested checkouts.
 */
export function isInsideMetadataDir(repoPath: string, absolutePath: string): boolean {
  const relative = path.relative(repoPath, absolutePath);
  if (!relative) return false;
  return relative.split(path.sep).includes(GIT_CONSTANTS.GIT_DIR);
}

export function matchesIgnoreSubstring(absolutePath: string, ignore: readonly string[]): boolean {
  return ignore.some((pattern) => pattern.length > 0 && absolutePath.includes(pattern));
}
