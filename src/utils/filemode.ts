import { join, resolve } from 'path';
import { existsSync } from 'fs';
import { findRepositories, setConfig } from '../git.js';
import { ui } from '../ui.js';
import { ErrorUtils } from './security.js';

/**
 * Filesystem utilities for mounts that do not keep executable bits.
 *
 * Windows drives mounted into WSL (`/mnt/c`, `/mnt/d`, ...) report every file
 * as executable, so git sees every file as modified unless `core.filemode` is
 * switched off in the repository.
 */

export type FilemodeFixResult = {
  success: boolean;
  message: string;
  fixed: string[];
  errors: Array<{ path: string; error: string }>;
};

export function isWindowsFilesystem(path: string): boolean {
  return resolve(path).startsWith('/mnt/');
}

export function shouldDisableFilemode(path: string): boolean {
  return isWindowsFilesystem(path);
}

/**
 * Sets `core.filemode=false` in one repository, or in every repository found
 * under `path` when `recursive` is set.
 */
export async function fixGitFilemode(
  path: string,
  options: { recursive?: boolean } = {}
): Promise<FilemodeFixResult> {
  const root = resolve(path);
  let repos: string[];

  if (options.recursive) {
    repos = await findRepositories(root);
  } else if (existsSync(join(root, '.git'))) {
    repos = [root];
  } else {
    return {
      success: false,
      message: `No git repository found at ${root}`,
      fixed: [],
      errors: []
    };
  }

  const fixed: string[] = [];
  const errors: FilemodeFixResult['errors'] = [];

  for (const repo of repos) {
    try {
      await setConfig(repo, 'core.filemode', 'false');
      fixed.push(repo);
      ui.success(`✓ Fixed filemode for: ${repo}`);
    } catch (error) {
      errors.push({ path: repo, error: ErrorUtils.extractErrorMessage(error) });
      ui.error(`✗ Failed to fix: ${repo}`);
    }
  }

  return {
    success: errors.length === 0,
    message: `Fixed ${fixed.length} repositories, ${errors.length} errors`,
    fixed,
    errors
  };
}

/**
 * Applies {@link fixGitFilemode} to every mirror under a cache root.
 */
export async function fixCacheFilemode(cacheDir: string): Promise<FilemodeFixResult> {
  if (!existsSync(cacheDir)) {
    return {
      success: false,
      message: `Cache directory not found: ${cacheDir}`,
      fixed: [],
      errors: []
    };
  }

  ui.info(`Fixing filemode for all repositories in cache: ${cacheDir}`);
  return fixGitFilemode(cacheDir, { recursive: true });
}
