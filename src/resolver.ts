import { checkout, currentBranch, listTags } from './git.js';
import { NotFoundError } from './errors.js';
import { findLatest, findMatching, parseConstraint } from './versions.js';
import type { ResolvedVersion } from './types.js';

const COMMIT_SHA = /^[0-9a-f]{6,40}$/;

export function isCommitSha(value: string): boolean {
  return COMMIT_SHA.test(value);
}

/**
 * Whether a request names a git reference directly rather than a version
 * constraint: anything containing `/` (a namespaced tag or remote branch) or
 * an abbreviated or full commit id.
 */
export function isDirectReference(request: string): boolean {
  return request.includes('/') || isCommitSha(request);
}

/**
 * Resolves a version request against a mirror and checks out the result.
 *
 * - `latest`: highest-versioned tag; with no tags at all, the active branch
 *   is reported and nothing is checked out.
 * - a direct reference (see {@link isDirectReference}) or the exact name of
 *   a tag: checked out verbatim.
 * - anything else: a constraint such as `>=1.0.0,<2.0.0` or `1.2.0`,
 *   matched against every tag's version part.
 *
 * @throws {NotFoundError} When no tag satisfies the constraint
 * @throws {ReferenceInvalidError} When the constraint does not parse or a ref cannot be checked out
 */
export async function resolveVersion(repoPath: string, request: string): Promise<ResolvedVersion> {
  const wanted = request.trim();

  const tags = await listTags(repoPath);

  if (wanted === 'latest') {
    const latest = findLatest(tags);
    if (!latest) {
      const branch = await currentBranch(repoPath);
      return { ref: branch ?? 'HEAD', checkedOut: false };
    }
    await checkout(repoPath, latest);
    return { ref: latest, checkedOut: true };
  }

  if (isDirectReference(wanted) || tags.includes(wanted)) {
    await checkout(repoPath, wanted);
    return { ref: wanted, checkedOut: true };
  }

  const constraint = parseConstraint(wanted);
  const match = findMatching(tags, constraint);
  if (!match) {
    throw new NotFoundError(`No tag found matching version ${wanted}`);
  }
  await checkout(repoPath, match);
  return { ref: match, checkedOut: true };
}
