export { RepositoryCache, DEFAULT_BRANCHES, isDefaultBranch } from './cache.js';
export { CacheIndex } from './cache-index.js';
export type { IndexSnapshot } from './cache-index.js';
export { resolveConfig, defaultCacheDir, DEFAULT_BRANCH } from './config.js';
export type { TreepackConfig, ConfigOverrides } from './config.js';
export { createContext } from './context.js';
export * from './errors.js';
export { loadPackage, loadPackagesFromFile, defaultTargetDir } from './loader.js';
export type { LoadOptions, LoadFromFileOptions } from './loader.js';
export {
  parsePackageDefinition,
  readManifest,
  readPackageMeta,
  repoUrlOf,
  branchOrTagOf
} from './manifest.js';
export type { Manifest, LegacyPackage } from './manifest.js';
export { publishPackage, publishFromConfig } from './publisher.js';
export type { PublishOptions, PublishFromConfigOptions } from './publisher.js';
export { pushPackage } from './push.js';
export type { PushOptions } from './push.js';
export { resolveVersion, isCommitSha, isDirectReference } from './resolver.js';
export { buildTagName, parseTagName, createTag, deleteTag } from './tags.js';
export type { TagAction, TagNameParts, CreateTagOptions, DeleteTagOutcome } from './tags.js';
export { createRepoTag, tagPackage, deleteRepoTag } from './tagger.js';
export type { CreateRepoTagOptions, TagPackageOptions, DeleteRepoTagOptions } from './tagger.js';
export {
  findLatest,
  findMatching,
  parseConstraint,
  parseTagVersion,
  parseVersion,
  satisfiesConstraint,
  versionPartOf
} from './versions.js';
export type { Comparator, ComparatorOp, Constraint } from './versions.js';
export { fixGitFilemode, fixCacheFilemode, isWindowsFilesystem, shouldDisableFilemode } from './utils/filemode.js';
export type { FilemodeFixResult } from './utils/filemode.js';
export type * from './types.js';
