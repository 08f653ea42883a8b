import { RepositoryCache } from './cache.js';
import { resolveConfig } from './config.js';
import type { ConfigOverrides } from './config.js';
import type { TreepackContext } from './types.js';

/**
 * Resolves configuration and opens the cache it points at.
 */
export function createContext(overrides: ConfigOverrides = {}, env: NodeJS.ProcessEnv = process.env): TreepackContext {
  const config = resolveConfig(overrides, env);
  return {
    cache: new RepositoryCache(config.cacheDir),
    config
  };
}
