import { basename, join, resolve } from 'path';
import { copyPackageContents, copyTree, removePath } from './fsops.js';
import { commit, pushOrigin, stagePath, statusPorcelain, switchBranch } from './git.js';
import { readPackageMeta } from './manifest.js';
import { ErrorUtils } from './utils/security.js';
import type { PushResult, TreepackContext } from './types.js';

export type PushOptions = {
  pkgDir?: string;
  metaFile?: string;
  /** Defaults to `Update from <package directory name>` */
  commitMessage?: string;
  push?: boolean;
};

const GIT_ONLY: readonly string[] = ['.git'];

/**
 * Mirrors a package directory into its repository without tagging.
 *
 * Unlike publishing, the package's `root-dir` is replaced as a whole, so
 * anything deleted locally is deleted in the repository too. A package that
 * lives at the repository root is copied entry by entry instead, keeping the
 * mirror's own `.git`.
 */
export async function pushPackage(options: PushOptions, context: TreepackContext): Promise<PushResult> {
  const pkgDir = resolve(options.pkgDir ?? '.');
  const commitMessage = options.commitMessage ?? `Update from ${basename(pkgDir)}`;
  const push = options.push ?? true;

  try {
    const meta = await readPackageMeta(pkgDir, options.metaFile ?? 'pkg.json');
    if (!meta.dbRepo) {
      return { success: false, message: `No 'db-repo' found in ${options.metaFile ?? 'pkg.json'}`, pushed: false };
    }

    const branch = meta.branch ?? context.config.defaultBranch;
    const repoPath = await context.cache.cloneOrUpdate(meta.dbRepo, branch);
    await switchBranch(repoPath, branch, true);

    const rootDir = meta.rootDir && meta.rootDir !== '.' ? meta.rootDir : null;
    if (rootDir) {
      const target = join(repoPath, rootDir);
      await removePath(target);
      await copyTree(pkgDir, target, GIT_ONLY);
    } else {
      await copyPackageContents(pkgDir, repoPath, GIT_ONLY);
    }

    if (!(await statusPorcelain(repoPath))) {
      return {
        success: true,
        repoPath,
        commitMessage,
        pushed: false,
        message: 'No changes to commit - repository is up to date'
      };
    }

    await stagePath(repoPath, '.');
    await commit(repoPath, commitMessage);

    if (!push) {
      return { success: true, repoPath, commitMessage, pushed: false, message: 'Changes committed but not pushed' };
    }

    await pushOrigin(repoPath, [branch], { setUpstream: true });
    return { success: true, repoPath, commitMessage, pushed: true, message: 'Successfully published to repository' };
  } catch (error) {
    return {
      success: false,
      commitMessage,
      pushed: false,
      message: `Failed to push package: ${ErrorUtils.extractErrorMessage(error)}`,
      error: ErrorUtils.toError(error)
    };
  }
}
