import type { RepositoryCache } from './cache.js';
import type { TreepackConfig } from './config.js';
import type { TagAction } from './tags.js';

/**
 * One repository mirror as recorded in the cache index.
 *
 * @example
 * ```typescript
 * const entry: CacheEntry = {
 *   cacheKey: 'github.com_acme_packages@dev',
 *   path: '/home/dev/.treepack/cache/github.com_acme_packages@dev',
 *   branch: 'dev',
 *   lastUpdated: '2024-05-02T10:14:07+02:00'
 * };
 * ```
 */
export type CacheEntry = {
  cacheKey: string;
  /** Absolute path of the mirror's working copy */
  path: string;
  /** Branch requested when the mirror was last synced (null for the default mirror) */
  branch: string | null;
  /** Committer date of the mirror's HEAD after the last sync */
  lastUpdated: string;
};

/**
 * A tag read back into its naming segments.
 */
export type VersionTag = {
  raw: string;
  /** Package subpath segment(s), when present */
  prefix?: string;
  /** Release stream for non-default branches */
  branch?: string;
  /** Last segment without its `v` prefix */
  versionText: string;
  /** Normalized semantic version, null when the last segment is not a version */
  version: string | null;
};

/**
 * Outcome of resolving a version request against a mirror.
 */
export type ResolvedVersion = {
  /** Selected tag, commit, ref or (for an untagged repository) branch name */
  ref: string;
  /** Whether the working copy was moved to `ref` */
  checkedOut: boolean;
};

/**
 * A package entry from a manifest.
 *
 * @example
 * ```typescript
 * const def: PackageDefinition = {
 *   pkgName: 'math-utils',
 *   domain: 'https://git.example.com/acme',
 *   repoName: 'packages',
 *   branch: 'main',
 *   localDir: 'vendor/math-utils',
 *   loaded: true,
 *   asPkg: { version: '>=1.0.0' },
 *   customConfig: { install: 'make install' },
 *   extra: {}
 * };
 * ```
 */
export type PackageDefinition = {
  readonly pkgName?: string;
  /** Base URL (or full URL when `repoName` is absent) */
  readonly domain?: string;
  readonly repoName?: string;
  readonly branch?: string;
  /** Alternative to `branch` */
  readonly tag?: string;
  /** Where the package is materialized */
  readonly localDir?: string;
  readonly loaded: boolean;
  /** Version request used when the package is consumed as a dependency */
  readonly asPkg?: { readonly version: string };
  readonly version?: string;
  /** String command hints (install, build, ...); surfaced, never executed */
  readonly customConfig: Readonly<Record<string, string>>;
  readonly pkgType?: string;
  /** Unrecognized keys, preserved for round-tripping */
  readonly extra: Readonly<Record<string, unknown>>;
};

/**
 * Package metadata stored as `pkg.json` in a package directory.
 */
export type PackageMeta = {
  name: string;
  version?: string;
  description?: string;
  /** Repository the package is published to */
  dbRepo?: string;
  /** Subdirectory of the repository that holds the package */
  rootDir?: string;
  /** Release branch; the configured default branch when absent */
  branch?: string;
  dependencies: PackageDefinition[];
};

/**
 * Shared collaborators handed to every orchestrator.
 */
export type TreepackContext = {
  cache: RepositoryCache;
  config: TreepackConfig;
};

export type OperationResult = {
  success: boolean;
  message: string;
  /** The triggering error, for failures */
  error?: Error;
};

export type LoadResult = OperationResult & {
  repo?: string;
  branch?: string;
  /** Resolved tag, commit, ref or branch */
  version?: string;
  targetDir?: string;
  symlink?: boolean;
  /** Install hint from the package's custom config */
  installHint?: string;
  package?: string;
};

export type TagResult = OperationResult & {
  action?: TagAction;
  tagName?: string;
};

export type DeleteTagResult = OperationResult & {
  local?: string;
  remote?: string | null;
};

export type PublishResult = OperationResult & {
  repoPath?: string;
  commitMessage?: string;
  commit?: string;
  pushed: boolean;
  tagResult: TagResult | null;
  package?: string;
};

export type PushResult = OperationResult & {
  repoPath?: string;
  commitMessage?: string;
  pushed: boolean;
};
