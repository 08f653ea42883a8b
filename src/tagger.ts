import { switchBranch } from './git.js';
import { readPackageMeta } from './manifest.js';
import { buildTagName, createTag, deleteTag } from './tags.js';
import { ErrorUtils } from './utils/security.js';
import type { DeleteTagResult, TagResult, TreepackContext } from './types.js';

export type CreateRepoTagOptions = {
  repoUrl: string;
  tagName: string;
  /** Defaults to `Release <tagName>` */
  message?: string;
  force?: boolean;
  push?: boolean;
};

export type TagPackageOptions = {
  pkgDir?: string;
  metaFile?: string;
  force?: boolean;
  push?: boolean;
};

export type DeleteRepoTagOptions = {
  repoUrl: string;
  tagName: string;
  remote?: boolean;
};

/**
 * Tags HEAD of a mirror and reports the outcome instead of throwing.
 */
export async function tagMirror(
  repoPath: string,
  tagName: string,
  options: { message?: string; force?: boolean; push?: boolean }
): Promise<TagResult> {
  try {
    const action = await createTag(repoPath, tagName, {
      message: options.message ?? `Release ${tagName}`,
      force: options.force ?? false,
      push: options.push ?? true
    });
    return { success: true, action, tagName, message: `Tag '${tagName}' ${action}` };
  } catch (error) {
    return {
      success: false,
      tagName,
      message: `Failed to create tag: ${ErrorUtils.extractErrorMessage(error)}`,
      error: ErrorUtils.toError(error)
    };
  }
}

/**
 * Creates a tag at the upstream head of a repository's default branch,
 * cloning the repository into the cache first when needed.
 */
export async function createRepoTag(options: CreateRepoTagOptions, context: TreepackContext): Promise<TagResult> {
  if (!options.repoUrl) {
    return { success: false, message: 'Repository URL is required' };
  }
  if (!options.tagName.trim()) {
    return { success: false, message: 'Tag name is required' };
  }

  let repoPath: string;
  try {
    repoPath = await context.cache.cloneOrUpdate(options.repoUrl, context.config.defaultBranch);
  } catch (error) {
    return {
      success: false,
      message: `Failed to create tag: ${ErrorUtils.extractErrorMessage(error)}`,
      error: ErrorUtils.toError(error)
    };
  }

  return tagMirror(repoPath, options.tagName.trim(), options);
}

/**
 * Tags a package's release from its metadata file.
 *
 * The tag is named from `root-dir`, the package branch and `version` (see
 * {@link buildTagName}) and placed at the head of that branch's mirror.
 */
export async function tagPackage(options: TagPackageOptions, context: TreepackContext): Promise<TagResult> {
  const pkgDir = options.pkgDir ?? '.';
  const metaFile = options.metaFile ?? 'pkg.json';

  try {
    const meta = await readPackageMeta(pkgDir, metaFile);
    if (!meta.version) {
      return { success: false, message: `No version found in ${metaFile}` };
    }
    if (!meta.dbRepo) {
      return { success: false, message: 'No db-repo found in package metadata' };
    }

    const { defaultBranch } = context.config;
    const branch = meta.branch ?? defaultBranch;
    const tagName = buildTagName({ rootDir: meta.rootDir, branch, version: meta.version, defaultBranch });

    const repoPath = await context.cache.cloneOrUpdate(meta.dbRepo, branch);
    await switchBranch(repoPath, branch);

    return await tagMirror(repoPath, tagName, { force: options.force, push: options.push });
  } catch (error) {
    return {
      success: false,
      message: ErrorUtils.extractErrorMessage(error),
      error: ErrorUtils.toError(error)
    };
  }
}

/**
 * Deletes a tag from a cached repository, and from origin unless `remote` is
 * false.
 */
export async function deleteRepoTag(options: DeleteRepoTagOptions, context: TreepackContext): Promise<DeleteTagResult> {
  try {
    const repoPath = await context.cache.getRepo(options.repoUrl, false);
    if (!repoPath) {
      return { success: false, message: `Repository ${options.repoUrl} not found in cache` };
    }

    const outcome = await deleteTag(repoPath, options.tagName, { remote: options.remote ?? true });
    return {
      success: true,
      local: outcome.local,
      remote: outcome.remote,
      message: outcome.remote ? `${outcome.local}; ${outcome.remote}` : outcome.local
    };
  } catch (error) {
    return {
      success: false,
      message: `Failed to delete tag: ${ErrorUtils.extractErrorMessage(error)}`,
      error: ErrorUtils.toError(error)
    };
  }
}
