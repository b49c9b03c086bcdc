/**
 * Path helpers shared by the file tools and the folder permission gate.
 */

import path from 'node:path';

import { ToolError } from './tool-error.js';

/**
 * Check if a resolved target path is `dir` itself or one of its descendants.
 * Siblings sharing a name prefix (`/a/b` vs `/a/bc`) and ancestors do not count.
 */
export function isWithinDir(target: string, dir: string): boolean {
  const rel = path.relative(path.resolve(dir), path.resolve(target));
  if (rel === '') return true;
  if (path.isAbsolute(rel)) return false;
  return rel !== '..' && !rel.startsWith('..' + path.sep);
}

/**
 * Resolve a tool argument path to an absolute path against `cwd`.
 */
export function resolvePath(cwd: string, p: unknown, argName = 'path'): string {
  if (typeof p !== 'string' || !p.trim()) {
    throw new ToolError('invalid_args', `missing ${argName}`, false, `pass ${argName} as a string`);
  }
  return path.resolve(cwd, p);
}

/**
 * Folder a read-oriented call touches: the directory itself for listings,
 * the parent directory for single files.
 */
export function folderFor(absPath: string, isDirectory: boolean): string {
  return isDirectory ? absPath : path.dirname(absPath);
}
