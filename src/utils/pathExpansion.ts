/**
 * Path Expansion Utilities
 *
 * Helpers for user-supplied directory paths and for the forward-slash
 * relative paths used as join keys between two trees.
 */

import { homedir } from 'os';
import path from 'path';

/**
 * Expand tilde (~) to user's home directory
 *
 * @example
 * expandTilde('~/publish') → '/Users/jane/publish'
 * expandTilde('/absolute/path') → '/absolute/path'
 */
export function expandTilde(filePath: string): string {
  if (filePath === '~') {
    return homedir();
  }
  if (filePath.startsWith('~/')) {
    return path.join(homedir(), filePath.slice(2));
  }
  return filePath;
}

/**
 * Expand ~ and resolve against the current working directory
 */
export function resolveLocalPath(filePath: string): string {
  return path.resolve(expandTilde(filePath));
}

export function fromPosix(value: string): string {
  return value.split('/').join(path.sep);
}

/**
 * True when target is root itself or lies below it
 */
export function isWithinRoot(targetPath: string, rootPath: string): boolean {
  const relative = path.relative(rootPath, targetPath);
  return (
    relative === '' ||
    (!relative.startsWith('..') && !path.isAbsolute(relative))
  );
}

/**
 * True when either directory contains the other
 */
export function rootsOverlap(a: string, b: string): boolean {
  const left = path.resolve(a);
  const right = path.resolve(b);
  return isWithinRoot(left, right) || isWithinRoot(right, left);
}
