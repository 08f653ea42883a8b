import { homedir } from 'os';
import { join, resolve } from 'path';

export type TreepackConfig = {
  /** Root directory holding the repository mirrors and index.json */
  cacheDir: string;
  /** Branch whose releases carry no branch segment in their tag names */
  defaultBranch: string;
};

export type ConfigOverrides = {
  cacheDir?: string;
  defaultBranch?: string;
};

export const DEFAULT_BRANCH = 'main';

export function defaultCacheDir(): string {
  return join(homedir(), '.treepack', 'cache');
}

/**
 * Resolves configuration from explicit overrides, then the environment
 * (`TREEPACK_CACHE_DIR`, `TREEPACK_DEFAULT_BRANCH`), then defaults.
 * Empty values count as unset.
 */
export function resolveConfig(
  overrides: ConfigOverrides = {},
  env: NodeJS.ProcessEnv = process.env
): TreepackConfig {
  const cacheDir = overrides.cacheDir || env.TREEPACK_CACHE_DIR || defaultCacheDir();
  const defaultBranch = overrides.defaultBranch?.trim() || env.TREEPACK_DEFAULT_BRANCH?.trim() || DEFAULT_BRANCH;
  return {
    cacheDir: resolve(cacheDir),
    defaultBranch
  };
}
