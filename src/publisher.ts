import fs from 'fs-extra';
import { join, resolve } from 'path';
import { copyPackageContents } from './fsops.js';
import { commit, hasStagedChanges, pushOrigin, stagePath, switchBranch, tagExists, unpushedCommitCount } from './git.js';
import { readManifest, readPackageMeta } from './manifest.js';
import { buildTagName } from './tags.js';
import { tagMirror } from './tagger.js';
import { ManifestInvalidError } from './errors.js';
import { ErrorUtils } from './utils/security.js';
import type { PackageMeta, PublishResult, TagResult, TreepackContext } from './types.js';

export type PublishOptions = {
  pkgDir?: string;
  metaFile?: string;
  /** Defaults to `Update <name>` plus ` v<version>` when versioned */
  commitMessage?: string;
  push?: boolean;
  tag?: boolean;
  forceTag?: boolean;
};

export type PublishFromConfigOptions = Omit<PublishOptions, 'pkgDir' | 'metaFile'> & {
  packageNames?: string[];
};

function failure(message: string, error?: unknown): PublishResult {
  return {
    success: false,
    message,
    error: error === undefined ? undefined : ErrorUtils.toError(error),
    pushed: false,
    tagResult: null
  };
}

/**
 * Publishes a package directory into its repository.
 *
 * The package's top-level entries are copied into `<mirror>/<root-dir>` on
 * the package branch, committed, optionally pushed, and optionally tagged
 * with the version from the metadata file. Never throws.
 *
 * @example
 * ```typescript
 * const result = await publishPackage({ pkgDir: 'packages/math-utils', push: true }, context);
 * // result.tagResult?.tagName === 'src/math_utils/1.1.0'
 * ```
 */
export async function publishPackage(options: PublishOptions, context: TreepackContext): Promise<PublishResult> {
  const pkgDir = resolve(options.pkgDir ?? '.');
  const metaFile = options.metaFile ?? 'pkg.json';
  const push = options.push ?? true;
  const tag = options.tag ?? true;

  let meta: PackageMeta;
  try {
    meta = await readPackageMeta(pkgDir, metaFile);
  } catch (error) {
    return failure(ErrorUtils.extractErrorMessage(error), error);
  }
  if (!meta.dbRepo) {
    return failure("No 'db-repo' found in package metadata");
  }

  const { defaultBranch } = context.config;
  const branch = meta.branch ?? defaultBranch;
  const rootDir = meta.rootDir ?? '.';
  const commitMessage = options.commitMessage
    ?? (meta.version ? `Update ${meta.name} v${meta.version}` : `Update ${meta.name}`);

  try {
    const repoPath = await context.cache.cloneOrUpdate(meta.dbRepo, branch);
    await switchBranch(repoPath, branch, true);

    await copyPackageContents(pkgDir, join(repoPath, rootDir));
    await stagePath(repoPath, rootDir);

    if (!(await hasStagedChanges(repoPath))) {
      // An earlier publish may have committed without pushing
      if (push && (await unpushedCommitCount(repoPath, branch)) > 0) {
        await pushOrigin(repoPath, [branch], { setUpstream: true });
        let message = `No changes to commit; pushed pending commits on ${branch}`;
        const tagName = tag && meta.version
          ? buildTagName({ rootDir, branch, version: meta.version, defaultBranch })
          : null;
        if (tagName && (await tagExists(repoPath, tagName))) {
          await pushOrigin(repoPath, [`refs/tags/${tagName}`]);
          message += ` and tag ${tagName}`;
        }
        return {
          success: true,
          repoPath,
          commitMessage: 'No changes to commit',
          pushed: true,
          tagResult: null,
          message
        };
      }
      return {
        success: true,
        repoPath,
        commitMessage: 'No changes to commit',
        pushed: false,
        tagResult: null,
        message: 'No changes to commit'
      };
    }

    const commitId = await commit(repoPath, commitMessage);

    let pushed = false;
    if (push) {
      await pushOrigin(repoPath, [branch], { setUpstream: true });
      pushed = true;
    }

    let tagResult: TagResult | null = null;
    if (tag && meta.version) {
      const tagName = buildTagName({ rootDir, branch, version: meta.version, defaultBranch });
      tagResult = await tagMirror(repoPath, tagName, { force: options.forceTag, push });
      if (!tagResult.success) {
        return {
          success: false,
          repoPath,
          commitMessage,
          commit: commitId,
          pushed,
          tagResult,
          message: `Commit successful but tagging failed: ${tagResult.message}`,
          error: tagResult.error
        };
      }
    }

    const parts = [`Successfully published ${meta.name}`];
    if (pushed) parts.push('pushed to remote');
    if (tagResult?.tagName) parts.push(`tagged as ${tagResult.tagName}`);

    return {
      success: true,
      repoPath,
      commitMessage,
      commit: commitId,
      pushed,
      tagResult,
      message: parts.join(', ')
    };
  } catch (error) {
    return failure(`Failed to publish package: ${ErrorUtils.extractErrorMessage(error)}`, error);
  }
}

/**
 * Publishes every loaded entry of a workspace manifest from its local
 * directory, one result per entry.
 *
 * @throws {NotFoundError} When the manifest file does not exist
 * @throws {ManifestInvalidError} When it has no `miniatures` or `repos` list
 */
export async function publishFromConfig(
  configFile: string,
  options: PublishFromConfigOptions,
  context: TreepackContext
): Promise<PublishResult[]> {
  const manifest = await readManifest(configFile);
  if (manifest.shape !== 'miniatures') {
    throw new ManifestInvalidError("Expected a 'miniatures' or 'repos' list", resolve(configFile));
  }

  const wanted = options.packageNames?.length ? new Set(options.packageNames) : null;
  const results: PublishResult[] = [];

  for (const entry of manifest.entries.filter(e => e.loaded)) {
    if (wanted && !(entry.pkgName && wanted.has(entry.pkgName))) continue;

    if (!entry.localDir) {
      results.push({ ...failure('No local directory specified'), package: entry.pkgName });
      continue;
    }
    const localDir = resolve(entry.localDir);
    if (!(await fs.pathExists(localDir))) {
      results.push({ ...failure(`Local directory not found: ${entry.localDir}`), package: entry.pkgName });
      continue;
    }
    if (!(await fs.pathExists(join(localDir, 'pkg.json')))) {
      results.push({ ...failure('No pkg.json found in local directory'), package: entry.pkgName });
      continue;
    }

    const result = await publishPackage({
      pkgDir: localDir,
      commitMessage: options.commitMessage,
      push: options.push,
      tag: options.tag,
      forceTag: options.forceTag
    }, context);
    results.push({ ...result, package: entry.pkgName });
  }

  return results;
}
