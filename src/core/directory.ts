import * as os from 'os';
import * as path from 'path';
import { DepweaveDirectories } from '../types/index.js';
import { DIR_PATTERNS, DEPWEAVE_DIRS } from '../constants/index.js';
import { ensureDir } from '../utils/fs.js';
import { logger } from '../utils/logger.js';

/**
 * Get depweave directories using the dotfile convention (~/.depweave)
 */
export function getDepweaveDirectories(homeDir: string = os.homedir()): DepweaveDirectories {
  const depweaveDir = path.join(homeDir, DIR_PATTERNS.DEPWEAVE);

  return {
    config: depweaveDir,
    data: depweaveDir,
    cache: path.join(depweaveDir, DEPWEAVE_DIRS.CACHE),
    runtime: path.join(os.tmpdir(), 'depweave')
  };
}

/**
 * Ensure all depweave directories exist
 */
export async function ensureDepweaveDirectories(
  dirs: DepweaveDirectories = getDepweaveDirectories()
): Promise<DepweaveDirectories> {
  try {
    await Promise.all([
      ensureDir(dirs.config),
      ensureDir(dirs.cache),
      ensureDir(dirs.runtime)
    ]);

    logger.debug('depweave directories ensured', { directories: dirs });
    return dirs;
  } catch (error) {
    logger.error('Failed to create depweave directories', { error, directories: dirs });
    throw error;
  }
}

/**
 * Artifact cache root under a cache directory
 */
export function getArtifactCacheDir(cacheDir: string): string {
  return path.join(cacheDir, DEPWEAVE_DIRS.ARTIFACTS);
}

/**
 * Base directory where globally installed build plugins keep their state
 */
export function getGlobalBaseDir(dirs: DepweaveDirectories): string {
  return path.join(dirs.data, DEPWEAVE_DIRS.GLOBAL);
}
