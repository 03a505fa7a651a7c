import { realpathSync } from 'fs';
import { fileURLToPath } from 'url';

/**
 * True when the module at moduleUrl is the script node was started with.
 * Follows the symlink npm creates for bin entries.
 */
export function isEntryPoint(moduleUrl: string): boolean {
  const script = process.argv[1];
  if (!script) {
    return false;
  }
  try {
    return realpathSync(script) === realpathSync(fileURLToPath(moduleUrl));
  } catch {
    return false;
  }
}
