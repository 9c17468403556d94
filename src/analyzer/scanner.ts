/**
 * File scanner
 * Walks a project directory and lists every regular file below it
 */

import { promises as fs } from 'node:fs';
import path from 'node:path';
import { InvalidPathError } from '../types/errors.js';

// ─── Constants ───────────────────────────────────────────

/** Directories never descended into */
export const IGNORED_DIRS: ReadonlySet<string> = new Set([
  '.git',
  'node_modules',
  '__pycache__',
  '.netlify',
  'venv',
  '.venv',
]);

// ─── Root Validation ─────────────────────────────────────

/**
 * Resolve a user-supplied path to an absolute project root
 *
 * @throws InvalidPathError when the path is missing or not a directory
 */
export async function resolveProjectRoot(projectPath: string): Promise<string> {
  const root = path.resolve(projectPath);

  const stat = await fs.stat(root).catch(() => null);
  if (!stat) {
    throw new InvalidPathError(root, 'missing');
  }

  if (!stat.isDirectory()) {
    throw new InvalidPathError(root, 'not-directory');
  }

  return root;
}

/**
 * Resolve a relative path inside a project root, refusing anything that escapes it
 */
export function resolveInsideRoot(root: string, relativePath: string): string {
  const resolved = path.resolve(root, relativePath);
  const relative = path.relative(root, resolved);

  if (relative.startsWith('..') || path.isAbsolute(relative)) {
    throw new InvalidPathError(relativePath, 'outside-root');
  }

  return resolved;
}

// ─── Traversal ───────────────────────────────────────────

/** Convert a native relative path to forward slashes */
function toPosix(relativePath: string): string {
  return relativePath.split(path.sep).join('/');
}

/**
 * Walk a directory top-down: a directory's own files first, then each
 * subdirectory in readdir order. Symbolic links are not followed.
 * Subdirectories that cannot be read are skipped; the root must be readable.
 */
async function walk(root: string, dir: string, files: string[]): Promise<void> {
  const entries = await fs.readdir(dir, { withFileTypes: true }).catch((error: unknown) => {
    if (dir === root) {
      throw error;
    }
    return null;
  });
  if (!entries) {
    return;
  }

  const subdirs: string[] = [];

  for (const entry of entries) {
    if (entry.isDirectory()) {
      if (!IGNORED_DIRS.has(entry.name)) {
        subdirs.push(entry.name);
      }
    } else if (entry.isFile()) {
      files.push(toPosix(path.relative(root, path.join(dir, entry.name))));
    }
  }

  for (const name of subdirs) {
    await walk(root, path.join(dir, name), files);
  }
}

/**
 * List all files beneath a project root, relative to it
 *
 * @param projectPath - Project directory
 * @returns Paths in directory-walk order, `/`-separated
 */
export async function scanProjectFiles(projectPath: string): Promise<string[]> {
  const root = await resolveProjectRoot(projectPath);
  const files: string[] = [];
  await walk(root, root, files);
  return files;
}

/**
 * Find the first file with the given basename using the same pruned walk
 *
 * @returns Relative path, or null when no file matches
 */
export async function findFileByName(root: string, fileName: string): Promise<string | null> {
  const files = await scanProjectFiles(root);
  return files.find((file) => path.posix.basename(file) === fileName) ?? null;
}
