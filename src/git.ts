import { execa } from 'execa';
import { resolve, join } from 'path';
import { existsSync, statSync } from 'fs';
import { readdir } from 'fs/promises';
import { GitCommandError, ReferenceInvalidError, TransportError } from './errors.js';
import { SecurityValidator } from './utils/security.js';

export interface GitResult {
  stdout: string;
  stderr: string;
  exitCode: number | undefined;
}

/**
 * Runs git without throwing; the caller inspects the exit code.
 */
export async function execGit(args: string[], cwd?: string): Promise<GitResult> {
  const fullArgs = cwd ? ['-C', resolve(cwd), ...args] : args;
  const result = await execa('git', fullArgs, {
    reject: false,
    shell: false, // Explicitly disable shell interpretation
    stdin: 'ignore',
    env: { GIT_TERMINAL_PROMPT: '0' }
  });
  return {
    stdout: result.stdout,
    stderr: result.stderr,
    exitCode: result.exitCode
  };
}

/**
 * Runs git and returns trimmed stdout.
 *
 * @throws {GitCommandError} When git cannot be started or exits non-zero
 */
export async function runGit(args: string[], cwd?: string): Promise<string> {
  const result = await execGit(args, cwd);
  if (result.exitCode !== 0) {
    throw new GitCommandError(args, result.exitCode, result.stderr);
  }
  return result.stdout.trim();
}

export interface CloneOptions {
  branch?: string;
  depth?: number;
  singleBranch?: boolean;
}

export async function cloneRepo(url: string, dest: string, options: CloneOptions = {}): Promise<void> {
  const remote = SecurityValidator.validateRemoteUrl(url);
  const args = ['clone'];
  if (options.depth !== undefined) args.push('--depth', String(options.depth));
  if (options.singleBranch) args.push('--single-branch');
  if (options.branch) args.push('--branch', SecurityValidator.validateRefName(options.branch));
  args.push('--', remote, resolve(dest));

  try {
    await runGit(args);
  } catch (error) {
    throw new TransportError(`Failed to clone ${remote}`, { cause: error });
  }
}

/**
 * Asks the remote whether a branch exists.
 *
 * `ls-remote --exit-code` exits with 2 when no ref matches, which separates a
 * missing branch from an unreachable remote.
 *
 * @throws {TransportError} When the remote cannot be queried
 */
export async function remoteBranchExists(url: string, branch: string): Promise<boolean> {
  const remote = SecurityValidator.validateRemoteUrl(url);
  const name = SecurityValidator.validateRefName(branch);
  const args = ['ls-remote', '--exit-code', '--heads', remote, `refs/heads/${name}`];
  const result = await execGit(args);
  if (result.exitCode === 0) return true;
  if (result.exitCode === 2) return false;
  throw new TransportError(`Failed to query ${remote}`, {
    cause: new GitCommandError(args, result.exitCode, result.stderr)
  });
}

/**
 * Fetches branches and tags from origin, overwriting tags that moved upstream.
 */
export async function fetchOrigin(repoPath: string): Promise<void> {
  try {
    await runGit(['fetch', 'origin', '--tags', '--force'], repoPath);
  } catch (error) {
    throw new TransportError('Failed to fetch from origin', { cause: error });
  }
}

async function refExists(repoPath: string, ref: string): Promise<boolean> {
  const result = await execGit(['show-ref', '--verify', '--quiet', ref], repoPath);
  return result.exitCode === 0;
}

export async function localBranchExists(repoPath: string, branch: string): Promise<boolean> {
  return refExists(repoPath, `refs/heads/${SecurityValidator.validateRefName(branch)}`);
}

export async function remoteTrackingBranchExists(repoPath: string, branch: string): Promise<boolean> {
  return refExists(repoPath, `refs/remotes/origin/${SecurityValidator.validateRefName(branch)}`);
}

export async function tagExists(repoPath: string, tag: string): Promise<boolean> {
  return refExists(repoPath, `refs/tags/${SecurityValidator.validateRefName(tag, 'tag')}`);
}

/**
 * Checks out a branch, tag or commit.
 *
 * @throws {ReferenceInvalidError} When git cannot resolve or switch to the ref
 */
export async function checkout(repoPath: string, ref: string): Promise<void> {
  if (ref.startsWith('-')) {
    throw new ReferenceInvalidError(`Invalid reference '${ref}'`);
  }
  try {
    await runGit(['checkout', '--quiet', ref, '--'], repoPath);
  } catch (error) {
    throw new ReferenceInvalidError(`Cannot check out '${ref}'`, { cause: error });
  }
}

/**
 * Creates a local branch (optionally from a start point) and checks it out.
 */
export async function createBranch(repoPath: string, branch: string, startPoint?: string): Promise<void> {
  const args = ['checkout', '--quiet', '-b', SecurityValidator.validateRefName(branch)];
  if (startPoint) args.push(startPoint);
  try {
    await runGit(args, repoPath);
  } catch (error) {
    throw new ReferenceInvalidError(`Cannot create branch '${branch}'`, { cause: error });
  }
}

/**
 * Checks out a branch, creating it from `origin/<branch>` when only the
 * remote-tracking ref exists. A branch found nowhere is created at HEAD when
 * `createMissing` is set; otherwise the working copy is left untouched.
 *
 * @returns Whether the branch is now checked out
 */
export async function switchBranch(repoPath: string, branch: string, createMissing = false): Promise<boolean> {
  if (await localBranchExists(repoPath, branch)) {
    await checkout(repoPath, branch);
    return true;
  }
  if (await remoteTrackingBranchExists(repoPath, branch)) {
    await createBranch(repoPath, branch, `origin/${branch}`);
    return true;
  }
  if (createMissing) {
    await createBranch(repoPath, branch);
    return true;
  }
  return false;
}

export async function fastForward(repoPath: string, branch: string): Promise<void> {
  await runGit(['merge', '--ff-only', '--quiet', `origin/${SecurityValidator.validateRefName(branch)}`], repoPath);
}

/**
 * Commits on a local branch that origin does not have; every commit of the
 * branch when origin has never seen it.
 */
export async function unpushedCommitCount(repoPath: string, branch: string): Promise<number> {
  const name = SecurityValidator.validateRefName(branch);
  const range = await remoteTrackingBranchExists(repoPath, name)
    ? `refs/remotes/origin/${name}..refs/heads/${name}`
    : `refs/heads/${name}`;
  return Number(await runGit(['rev-list', '--count', range], repoPath));
}

/**
 * Name of the checked-out branch, or null when HEAD is detached.
 */
export async function currentBranch(repoPath: string): Promise<string | null> {
  const result = await execGit(['symbolic-ref', '--short', '--quiet', 'HEAD'], repoPath);
  if (result.exitCode === 0) return result.stdout.trim();
  if (result.exitCode === 1) return null;
  throw new GitCommandError(['symbolic-ref'], result.exitCode, result.stderr);
}

export async function headCommit(repoPath: string): Promise<string> {
  return runGit(['rev-parse', 'HEAD'], repoPath);
}

/**
 * Committer date of HEAD in strict ISO 8601.
 */
export async function headCommitDate(repoPath: string): Promise<string> {
  return runGit(['log', '-1', '--format=%cI'], repoPath);
}

/**
 * All tag names in git's enumeration order (sorted by refname).
 */
export async function listTags(repoPath: string): Promise<string[]> {
  const stdout = await runGit(['tag', '--list'], repoPath);
  return stdout.split('\n').map(line => line.trim()).filter(Boolean);
}

export async function createAnnotatedTag(repoPath: string, tag: string, message: string): Promise<void> {
  await runGit(['tag', '--annotate', '--message', message, SecurityValidator.validateRefName(tag, 'tag')], repoPath);
}

export async function deleteLocalTag(repoPath: string, tag: string): Promise<void> {
  await runGit(['tag', '--delete', SecurityValidator.validateRefName(tag, 'tag')], repoPath);
}

export interface PushOptions {
  force?: boolean;
  tags?: boolean;
  setUpstream?: boolean;
}

/**
 * Pushes refspecs to origin.
 *
 * @throws {TransportError} When the push is rejected or the remote is unreachable
 */
export async function pushOrigin(repoPath: string, refspecs: string[], options: PushOptions = {}): Promise<void> {
  const args = ['push'];
  if (options.force) args.push('--force');
  if (options.tags) args.push('--tags');
  if (options.setUpstream) args.push('--set-upstream');
  args.push('origin', ...refspecs);
  try {
    await runGit(args, repoPath);
  } catch (error) {
    throw new TransportError(`Failed to push ${refspecs.join(' ') || 'tags'} to origin`, { cause: error });
  }
}

export async function stagePath(repoPath: string, pathspec: string): Promise<void> {
  await runGit(['add', '--all', '--', pathspec], repoPath);
}

/**
 * True when the index differs from HEAD (or when there is no HEAD yet and
 * something is staged).
 */
export async function hasStagedChanges(repoPath: string): Promise<boolean> {
  const result = await execGit(['diff', '--cached', '--quiet'], repoPath);
  if (result.exitCode === 0) return false;
  if (result.exitCode === 1) return true;
  throw new GitCommandError(['diff', '--cached', '--quiet'], result.exitCode, result.stderr);
}

export async function statusPorcelain(repoPath: string): Promise<string> {
  return runGit(['status', '--porcelain'], repoPath);
}

export async function commit(repoPath: string, message: string): Promise<string> {
  await runGit(['commit', '--quiet', '--message', message], repoPath);
  return headCommit(repoPath);
}

export async function setConfig(repoPath: string, key: string, value: string): Promise<void> {
  await runGit(['config', key, value], repoPath);
}

/**
 * Finds git repositories (directories holding a `.git` entry) under a root.
 *
 * Does not descend into a repository once found, nor into hidden directories.
 */
export async function findRepositories(baseDir: string, maxDepth = Number.POSITIVE_INFINITY): Promise<string[]> {
  const root = resolve(baseDir);
  if (!existsSync(root) || !statSync(root).isDirectory()) {
    return [];
  }

  const repos = new Set<string>();

  async function scanDir(dir: string, depth: number): Promise<void> {
    if (depth > maxDepth) return;

    const entries = await readdir(dir, { withFileTypes: true });

    if (entries.some(e => e.name === '.git')) {
      repos.add(dir);
      return; // Don't scan subdirectories of git repos
    }

    await Promise.all(
      entries
        .filter(e => e.isDirectory() && !e.name.startsWith('.'))
        .map(e => scanDir(join(dir, e.name), depth + 1))
    );
  }

  await scanDir(root, 0);
  return Array.from(repos).sort();
}
