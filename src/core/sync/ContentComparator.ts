/**
 * ContentComparator - decides whether two files hold equivalent content
 *
 * Binary files must match byte for byte. Text files also match when they
 * only differ in CRLF versus LF line endings, so a checkout authored on
 * another platform does not churn on every sync.
 */

import { promises as fs } from 'fs';
import { log } from '../../utils/logger.js';
import { errorMessage } from '../../errors/mirrorErrors.js';

/** Number of leading bytes inspected by the binary heuristic */
export const BINARY_SNIFF_BYTES = 8192;

export interface ContentComparator {
  identical(pathA: string, pathB: string): Promise<boolean>;
}

/**
 * Binary when a zero byte occurs in the first 8 KiB
 */
export function isBinary(data: Buffer): boolean {
  return data.subarray(0, BINARY_SNIFF_BYTES).includes(0);
}

/**
 * Compare two in-memory file contents
 */
export function contentsEquivalent(a: Buffer, b: Buffer): boolean {
  if (a.equals(b)) {
    return true;
  }

  if (isBinary(a) || isBinary(b)) {
    return false;
  }

  return normalizeLineEndings(a) === normalizeLineEndings(b);
}

/**
 * latin1 maps every byte to one code unit, so the comparison stays
 * byte-exact apart from the CRLF replacement.
 */
function normalizeLineEndings(data: Buffer): string {
  return data.toString('latin1').replaceAll('\r\n', '\n');
}

/**
 * Compare two files on disk. Never rejects: a file that cannot be read is
 * reported as different so that it gets rewritten rather than skipped.
 */
export async function filesIdentical(pathA: string, pathB: string): Promise<boolean> {
  let dataA: Buffer;
  let dataB: Buffer;
  try {
    dataA = await fs.readFile(pathA);
    dataB = await fs.readFile(pathB);
  } catch (error) {
    log.debug(`[COMPARE] Treating ${pathA} and ${pathB} as different: ${errorMessage(error)}`);
    return false;
  }

  return contentsEquivalent(dataA, dataB);
}

export const defaultComparator: ContentComparator = {
  identical: filesIdentical
};
