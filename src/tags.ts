import {
  createAnnotatedTag,
  deleteLocalTag,
  pushOrigin,
  tagExists
} from './git.js';
import { AlreadyExistsError, ManifestInvalidError } from './errors.js';
import { parseTagVersion, versionPartOf } from './versions.js';
import { ErrorUtils } from './utils/security.js';
import type { VersionTag } from './types.js';

export interface TagNameParts {
  /** Package subpath inside the repository; `.` or empty means the root */
  rootDir?: string | null;
  /** Branch the release is cut from */
  branch?: string | null;
  version: string;
  defaultBranch?: string;
}

/**
 * Builds the canonical tag name for a release.
 *
 * Segments, joined with `/`: the root directory (trimmed of slashes, omitted
 * for the repository root), the branch (omitted on the default branch) and the
 * version without its `v` prefix. Several packages and several non-default
 * release streams can therefore share one repository's tags.
 *
 * @example
 * ```typescript
 * buildTagName({ rootDir: '.', branch: 'main', version: '1.0.0' });  // '1.0.0'
 * buildTagName({ rootDir: 'lib', branch: 'main', version: 'v1.0.0' }); // 'lib/1.0.0'
 * buildTagName({ rootDir: 'lib', branch: 'dev', version: '1.0.0' });  // 'lib/dev/1.0.0'
 * ```
 *
 * @throws {ManifestInvalidError} When the version is empty
 */
export function buildTagName({ rootDir, branch, version, defaultBranch = 'main' }: TagNameParts): string {
  const cleanVersion = version.trim().replace(/^v/, '');
  if (!cleanVersion) {
    throw new ManifestInvalidError('A version is required to build a tag name');
  }

  const parts: string[] = [];

  const prefix = (rootDir ?? '').trim().replace(/^\/+|\/+$/g, '');
  if (prefix && prefix !== '.') {
    parts.push(prefix);
  }

  if (branch && branch !== defaultBranch) {
    parts.push(branch);
  }

  parts.push(cleanVersion);
  return parts.join('/');
}

/**
 * Splits a tag into its prefix, branch and version.
 *
 * The version is always the last segment. With three or more segments the
 * second-to-last one is read as the branch, which assumes no root directory
 * segment is itself a version.
 *
 * @param knownPrefix - When given, a tag starting with it is split at the
 *   prefix boundary so that multi-segment root directories stay intact.
 */
export function parseTagName(raw: string, knownPrefix?: string): VersionTag {
  const segments = raw.split('/');
  const last = segments.pop() ?? raw;
  const version = parseTagVersion(last);
  const prefixText = knownPrefix?.replace(/^\/+|\/+$/g, '');

  let prefix: string | undefined;
  let branch: string | undefined;

  if (prefixText && raw.startsWith(`${prefixText}/`)) {
    prefix = prefixText;
    const middle = raw.slice(prefixText.length + 1, raw.length - last.length - 1);
    branch = middle || undefined;
  } else if (segments.length === 1) {
    prefix = segments[0];
  } else if (segments.length >= 2) {
    branch = segments.pop();
    prefix = segments.join('/');
  }

  return {
    raw,
    prefix,
    branch,
    versionText: versionPartOf(raw),
    version: version?.version ?? null
  };
}

export type TagAction = 'created' | 'updated' | 'pushed';

export interface CreateTagOptions {
  message: string;
  force?: boolean;
  push?: boolean;
}

/**
 * Creates an annotated tag at HEAD of a working copy.
 *
 * An existing tag is an error unless `force` is set, in which case the local
 * tag is replaced. A plain push sends every local tag; a forced one pushes
 * only this tag with `--force` so the remote copy is overwritten.
 *
 * @throws {AlreadyExistsError} When the tag exists and `force` is false
 * @throws {TransportError} When the push fails
 */
export async function createTag(repoPath: string, name: string, options: CreateTagOptions): Promise<TagAction> {
  let action: TagAction = 'created';

  if (await tagExists(repoPath, name)) {
    if (!options.force) {
      throw new AlreadyExistsError(`Tag '${name}' already exists. Use force to overwrite.`);
    }
    await deleteLocalTag(repoPath, name);
    action = 'updated';
  }

  await createAnnotatedTag(repoPath, name, options.message);

  if (options.push) {
    if (options.force) {
      await pushOrigin(repoPath, [`refs/tags/${name}`], { force: true });
    } else {
      await pushOrigin(repoPath, [], { tags: true });
    }
    action = 'pushed';
  }

  return action;
}

export interface DeleteTagOutcome {
  localDeleted: boolean;
  local: string;
  /** null when no remote deletion was attempted */
  remote: string | null;
  remoteError?: Error;
}

/**
 * Deletes a tag locally and, when asked, on origin.
 *
 * A missing local tag is not an error. A failed remote deletion is reported
 * in the outcome without affecting the local result.
 */
export async function deleteTag(repoPath: string, name: string, options: { remote?: boolean } = {}): Promise<DeleteTagOutcome> {
  if (!(await tagExists(repoPath, name))) {
    return { localDeleted: false, local: `Local tag '${name}' not found`, remote: null };
  }

  await deleteLocalTag(repoPath, name);
  const outcome: DeleteTagOutcome = {
    localDeleted: true,
    local: `Deleted local tag '${name}'`,
    remote: null
  };

  if (options.remote) {
    try {
      await pushOrigin(repoPath, [`:refs/tags/${name}`]);
      outcome.remote = `Deleted remote tag '${name}'`;
    } catch (error) {
      outcome.remote = `Failed to delete remote tag: ${ErrorUtils.extractErrorMessage(error)}`;
      outcome.remoteError = ErrorUtils.toError(error);
    }
  }

  return outcome;
}
