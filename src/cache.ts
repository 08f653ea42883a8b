import fs from 'fs-extra';
import { existsSync } from 'fs';
import { join, resolve } from 'path';
import { CacheIndex } from './cache-index.js';
import type { IndexSnapshot } from './cache-index.js';
import { GitCommandError, NotFoundError } from './errors.js';
import {
  checkout,
  cloneRepo,
  createBranch,
  currentBranch,
  fastForward,
  fetchOrigin,
  headCommitDate,
  localBranchExists,
  remoteBranchExists,
  remoteTrackingBranchExists,
  setConfig
} from './git.js';
import { removePath, replaceWithSymlink } from './fsops.js';
import { ui } from './ui.js';
import { shouldDisableFilemode } from './utils/filemode.js';
import { ErrorUtils } from './utils/security.js';

/**
 * Branches that share the unscoped mirror of a repository.
 */
export const DEFAULT_BRANCHES: readonly string[] = ['main', 'master'];

export function isDefaultBranch(branch: string | null | undefined): boolean {
  return !branch || DEFAULT_BRANCHES.includes(branch);
}

const INDEX_FILE = 'index.json';

/**
 * Local mirror of git repositories, keyed by (url, branch).
 *
 * Default-branch work shares one mirror per URL; every other branch gets a
 * mirror of its own. The index file under the cache root records each mirror
 * and is kept in step with the directories on disk.
 *
 * @example
 * ```typescript
 * const cache = new RepositoryCache('/home/dev/.treepack/cache');
 * const mirror = await cache.cloneOrUpdate('https://git.example.com/acme/packages', 'dev');
 * // '/home/dev/.treepack/cache/git.example.com_acme_packages@dev'
 * ```
 */
export class RepositoryCache {
  readonly cacheDir: string;
  private readonly index: CacheIndex;

  constructor(cacheDir: string) {
    this.cacheDir = resolve(cacheDir);
    fs.ensureDirSync(this.cacheDir);
    this.index = new CacheIndex(join(this.cacheDir, INDEX_FILE));
  }

  /**
   * Deterministic directory name for a repository and branch.
   *
   * @example
   * ```typescript
   * cache.getCacheKey('https://git.example.com/acme/pkgs');        // 'git.example.com_acme_pkgs'
   * cache.getCacheKey('https://git.example.com/acme/pkgs', 'dev'); // 'git.example.com_acme_pkgs@dev'
   * ```
   */
  getCacheKey(url: string, branch?: string | null): string {
    let key = url.replace('https://', '').replace('http://', '');
    key = key.replace('file://', 'file_');
    key = key.replace(/[/:]/g, '_');

    if (branch && !isDefaultBranch(branch)) {
      key = `${key}@${branch}`;
    }
    return key;
  }

  getRepoPath(url: string, branch?: string | null): string {
    return join(this.cacheDir, this.getCacheKey(url, branch));
  }

  hasRepo(url: string, branch?: string | null): boolean {
    return existsSync(join(this.getRepoPath(url, branch), '.git'));
  }

  /**
   * Makes a repository available in the cache and returns its mirror path.
   *
   * A cached mirror is fetched (a failed fetch only warns) and switched to
   * `branch` when that branch exists locally. An uncached non-default branch
   * is cloned shallow and single-branch, then every tag is fetched so older
   * releases stay resolvable; when the remote has no such branch,
   * the default branch is cloned and the branch is created from it.
   *
   * @param useBranchCache - Keep non-default branches in their own mirror
   * @throws {TransportError} When cloning fails
   * @throws {ReferenceInvalidError} When the branch cannot be checked out
   */
  async cloneOrUpdate(url: string, branch?: string | null, useBranchCache = true): Promise<string> {
    const cacheBranch = useBranchCache && !isDefaultBranch(branch) ? branch : null;
    const repoPath = this.getRepoPath(url, cacheBranch);

    if (this.hasRepo(url, cacheBranch)) {
      await this.refresh(url, repoPath);
      if (branch && await localBranchExists(repoPath, branch)) {
        await checkout(repoPath, branch);
        await this.fastForwardQuietly(repoPath, branch);
      }
    } else {
      await removePath(repoPath);
      await this.cloneFresh(url, repoPath, branch);
    }

    await this.index.upsert(this.indexKey(url, cacheBranch), {
      cacheKey: this.getCacheKey(url, cacheBranch),
      path: repoPath,
      branch: branch ?? null,
      lastUpdated: await this.lastCommitDate(repoPath)
    });

    if (shouldDisableFilemode(repoPath)) {
      try {
        await setConfig(repoPath, 'core.filemode', 'false');
      } catch (error) {
        ui.warning(`Could not disable filemode tracking for ${repoPath}: ${ErrorUtils.extractErrorMessage(error)}`);
      }
    }

    return repoPath;
  }

  /**
   * Default-branch mirror of a repository, or null when it was never cached.
   */
  async getRepo(url: string, ensureLatest = true): Promise<string | null> {
    if (!this.hasRepo(url)) {
      return null;
    }
    const repoPath = this.getRepoPath(url);
    if (ensureLatest) {
      await this.refresh(url, repoPath);
    }
    return repoPath;
  }

  async removeRepo(url: string, branch?: string | null): Promise<void> {
    const cacheBranch = isDefaultBranch(branch) ? null : branch;
    await removePath(this.getRepoPath(url, cacheBranch));
    await this.index.remove(this.indexKey(url, cacheBranch));
  }

  async clearCache(): Promise<void> {
    await fs.ensureDir(this.cacheDir);
    const keep = new Set([INDEX_FILE, `${INDEX_FILE}.lock`]);
    const entries = await fs.readdir(this.cacheDir);
    for (const entry of entries) {
      if (!keep.has(entry)) {
        await removePath(join(this.cacheDir, entry));
      }
    }
    await this.index.clear();
  }

  async listCachedRepos(): Promise<IndexSnapshot> {
    return this.index.read();
  }

  /**
   * Points `target` at a directory inside a cached mirror, replacing whatever
   * `target` currently is.
   *
   * @returns The link's destination
   * @throws {NotFoundError} When the mirror or the package path is missing
   */
  async createSymlink(url: string, target: string, packagePath = '.', branch?: string | null): Promise<string> {
    const cacheBranch = isDefaultBranch(branch) ? null : branch;
    if (!this.hasRepo(url, cacheBranch)) {
      throw new NotFoundError(`Repository ${url} (branch: ${branch ?? 'default'}) not in cache`);
    }

    const source = join(this.getRepoPath(url, cacheBranch), packagePath);
    if (!existsSync(source)) {
      throw new NotFoundError(`Package path ${packagePath} not found in repository`);
    }

    await replaceWithSymlink(source, target);
    ui.symlinkCreated(target, source);
    return source;
  }

  private indexKey(url: string, cacheBranch: string | null | undefined): string {
    return cacheBranch ? `${url}@${cacheBranch}` : url;
  }

  private async cloneFresh(url: string, repoPath: string, branch: string | null | undefined): Promise<void> {
    ui.cloning(url);

    if (branch && !isDefaultBranch(branch)) {
      if (await remoteBranchExists(url, branch)) {
        await cloneRepo(url, repoPath, { branch, depth: 1, singleBranch: true });
        // A shallow clone only follows tags on its tip
        await this.refresh(url, repoPath);
      } else {
        ui.branchCreated(branch);
        await cloneRepo(url, repoPath);
        await createBranch(repoPath, branch);
      }
      return;
    }

    await cloneRepo(url, repoPath);

    // The remote's HEAD may name the other default branch
    if (branch && (await currentBranch(repoPath)) !== branch) {
      if (await localBranchExists(repoPath, branch)) {
        await checkout(repoPath, branch);
      } else if (await remoteTrackingBranchExists(repoPath, branch)) {
        await createBranch(repoPath, branch, `origin/${branch}`);
      }
    }
  }

  private async refresh(url: string, repoPath: string): Promise<void> {
    try {
      await fetchOrigin(repoPath);
    } catch (error) {
      const reason = error instanceof Error && error.cause instanceof GitCommandError
        ? error.cause.message
        : ErrorUtils.extractErrorMessage(error);
      ui.fetchFailed(url, reason);
    }
  }

  private async fastForwardQuietly(repoPath: string, branch: string): Promise<void> {
    if (!(await remoteTrackingBranchExists(repoPath, branch))) return;
    try {
      await fastForward(repoPath, branch);
    } catch (error) {
      ui.warning(`Could not fast-forward '${branch}' to origin/${branch}: ${ErrorUtils.extractErrorMessage(error)}`);
    }
  }

  /**
   * Committer date of HEAD, or now for a repository without commits.
   */
  private async lastCommitDate(repoPath: string): Promise<string> {
    try {
      return await headCommitDate(repoPath);
    } catch (error) {
      if (error instanceof GitCommandError) {
        return new Date().toISOString();
      }
      throw error;
    }
  }
}
