import * as os from 'os';
import * as path from 'path';
import { PkgdeckDirectories } from '../types/index.js';
import { DIR_PATTERNS, PKGDECK_DIRS } from '../constants/index.js';
import { ensureDir } from '../utils/fs.js';
import { logger } from '../utils/logger.js';

/**
 * Get pkgdeck directories using the dotfile convention (~/.pkgdeck).
 * PKGDECK_HOME relocates the whole tree.
 */
export function getPkgdeckDirectories(): PkgdeckDirectories {
  const baseDir = process.env.PKGDECK_HOME
    ? path.resolve(process.env.PKGDECK_HOME)
    : path.join(os.homedir(), DIR_PATTERNS.PKGDECK);

  return {
    config: baseDir,
    cache: path.join(baseDir, PKGDECK_DIRS.CACHE)
  };
}

/**
 * Ensure all pkgdeck directories exist
 */
export async function ensurePkgdeckDirectories(): Promise<PkgdeckDirectories> {
  const dirs = getPkgdeckDirectories();

  try {
    await Promise.all([ensureDir(dirs.config), ensureDir(dirs.cache)]);
    logger.debug('pkgdeck directories ensured', { directories: dirs });
    return dirs;
  } catch (error) {
    logger.error('Failed to create pkgdeck directories', { error, directories: dirs });
    throw error;
  }
}
