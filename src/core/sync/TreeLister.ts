/**
 * TreeLister - enumerates every file below a root as forward-slash
 * relative paths.
 *
 * Hidden files are included and directories themselves are not listed.
 * A symbolic link to a directory is neither descended into nor listed, so a
 * link cycle cannot make the walk loop. Any other link (to a file, or
 * dangling) is listed like a file. A sub-directory that cannot be read is
 * left out rather than failing the listing.
 */

import { promises as fs, type Dirent } from 'fs';
import path from 'path';
import { log } from '../../utils/logger.js';
import { mcpLogger } from '../../utils/mcpLogger.js';
import { FileOperationError, errorCode, errorMessage } from '../../errors/mirrorErrors.js';
import type { RelativePath, TreeListing } from './types.js';

/**
 * List all files under an existing directory
 *
 * @throws FileOperationError when root is missing or not a directory
 */
export async function listTree(root: string): Promise<TreeListing> {
  await assertDirectory(root);

  const paths = new Set<RelativePath>();
  await walk(root, '', paths);

  log.debug(`[LISTER] ${paths.size} files under ${root}`);
  return { root, paths };
}

/**
 * Like listTree, but an absent root yields an empty listing
 */
export async function listTreeIfExists(root: string): Promise<TreeListing> {
  try {
    await fs.stat(root);
  } catch (error) {
    if (errorCode(error) === 'ENOENT') {
      log.debug(`[LISTER] ${root} does not exist - empty listing`);
      return { root, paths: new Set() };
    }
    throw new FileOperationError('list', root, errorMessage(error));
  }
  return listTree(root);
}

/**
 * Paths of a listing in lexicographic order
 */
export function sortedPaths(listing: TreeListing): RelativePath[] {
  return [...listing.paths].sort(comparePaths);
}

/**
 * Code-unit order, independent of locale
 */
export function comparePaths(a: RelativePath, b: RelativePath): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * Same set of relative paths, regardless of root
 */
export function listingsEqual(a: TreeListing, b: TreeListing): boolean {
  if (a.paths.size !== b.paths.size) {
    return false;
  }
  for (const p of a.paths) {
    if (!b.paths.has(p)) return false;
  }
  return true;
}

async function assertDirectory(root: string): Promise<void> {
  let isDirectory: boolean;
  try {
    isDirectory = (await fs.stat(root)).isDirectory();
  } catch (error) {
    throw new FileOperationError('list', root, errorMessage(error));
  }
  if (!isDirectory) {
    throw new FileOperationError('list', root, 'not a directory');
  }
}

/**
 * An unreadable directory below the root is skipped with a warning; its
 * files are simply absent from the listing
 */
async function walk(dir: string, relDir: string, paths: Set<RelativePath>): Promise<void> {
  let entries: Dirent[];
  try {
    entries = await fs.readdir(dir, { withFileTypes: true });
  } catch (error) {
    if (!relDir) {
      throw new FileOperationError('list', dir, errorMessage(error));
    }
    mcpLogger.warning('sync', `[LISTER] Skipping unreadable directory ${dir}: ${errorCode(error) || errorMessage(error)}`);
    return;
  }

  for (const entry of entries) {
    const rel = relDir ? `${relDir}/${entry.name}` : entry.name;
    const full = path.join(dir, entry.name);

    if (entry.isDirectory()) {
      await walk(full, rel, paths);
    } else if (entry.isSymbolicLink()) {
      if (!(await pointsToDirectory(full))) {
        paths.add(rel);
      }
    } else {
      paths.add(rel);
    }
  }
}

async function pointsToDirectory(linkPath: string): Promise<boolean> {
  try {
    return (await fs.stat(linkPath)).isDirectory();
  } catch {
    // Dangling link
    return false;
  }
}
