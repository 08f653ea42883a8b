import { basename, resolve } from 'path';
import { isDefaultBranch } from './cache.js';
import { copyTree, removePath } from './fsops.js';
import { setConfig, switchBranch } from './git.js';
import { branchOrTagOf, legacyToDefinition, readManifest, repoUrlOf } from './manifest.js';
import { resolveVersion } from './resolver.js';
import { ui } from './ui.js';
import { shouldDisableFilemode } from './utils/filemode.js';
import { ErrorUtils } from './utils/security.js';
import type { LoadResult, PackageDefinition, TreepackContext } from './types.js';

export type LoadOptions = {
  /** Repository URL; taken from `packageDef` when absent */
  repo?: string;
  /** `latest`, a constraint, a tag path or a commit */
  version?: string;
  targetDir?: string;
  branch?: string;
  /** Remove an existing target first */
  clean?: boolean;
  /** Link the target into the cache instead of copying */
  useSymlink?: boolean;
  packageDef?: PackageDefinition;
};

export type LoadFromFileOptions = {
  /** Restrict loading to these package names */
  packageNames?: string[];
  clean?: boolean;
  useSymlink?: boolean;
};

/**
 * Directory a repository lands in when no target is given: the last URL
 * segment without `.git`, suffixed with the branch for non-default branches.
 *
 * @example
 * ```typescript
 * defaultTargetDir('https://git.example.com/acme/tools.git', 'main'); // 'tools'
 * defaultTargetDir('https://git.example.com/acme/tools', 'dev');      // 'tools-dev'
 * ```
 */
export function defaultTargetDir(repo: string, branch: string): string {
  const name = basename(repo.replace(/\/+$/, '')).replace(/\.git$/, '');
  return isDefaultBranch(branch) ? name : `${name}-${branch}`;
}

/**
 * Materializes a package from its repository at the requested version.
 *
 * Never throws: every failure comes back as an unsuccessful result.
 */
export async function loadPackage(options: LoadOptions, context: TreepackContext): Promise<LoadResult> {
  const def = options.packageDef;
  const repo = options.repo ?? (def ? repoUrlOf(def) : null);
  if (!repo) {
    return { success: false, message: 'Repository URL is required', package: def?.pkgName };
  }

  // A tag without a branch pins a commit reached through the default mirror
  const pinnedTag = !options.branch && def && !def.branch && def.tag ? def.tag : undefined;
  const branch = options.branch ?? (def && !pinnedTag ? branchOrTagOf(def) : context.config.defaultBranch);
  const request = options.version ?? pinnedTag ?? def?.asPkg?.version ?? def?.version;
  const targetDir = resolve(options.targetDir ?? def?.localDir ?? defaultTargetDir(repo, branch));
  const useSymlink = options.useSymlink ?? false;
  const installHint = def?.customConfig.install;

  try {
    if (options.clean) {
      await removePath(targetDir);
    }

    const repoPath = await context.cache.cloneOrUpdate(repo, branch);

    let version: string;
    if (request) {
      version = (await resolveVersion(repoPath, request)).ref;
    } else {
      await switchBranch(repoPath, branch);
      version = branch;
    }

    if (useSymlink) {
      await context.cache.createSymlink(repo, targetDir, '.', branch);
    } else {
      await copyTree(repoPath, targetDir);
      if (shouldDisableFilemode(targetDir)) {
        try {
          await setConfig(targetDir, 'core.filemode', 'false');
          ui.info('Disabled git filemode tracking for Windows filesystem');
        } catch (error) {
          ui.warning(`Could not disable filemode tracking for ${targetDir}: ${ErrorUtils.extractErrorMessage(error)}`);
        }
      }
    }

    let message = `Successfully loaded repository from ${repo} (branch: ${branch})`;
    if (installHint) {
      ui.installHint(installHint);
      message += `. Run '${installHint}' to install the package`;
    }

    return {
      success: true,
      message,
      repo,
      branch,
      version,
      targetDir,
      symlink: useSymlink,
      installHint,
      package: def?.pkgName
    };
  } catch (error) {
    return {
      success: false,
      message: `Failed to load repository: ${ErrorUtils.extractErrorMessage(error)}`,
      error: ErrorUtils.toError(error),
      repo,
      branch,
      version: request ?? branch,
      targetDir,
      symlink: useSymlink,
      package: def?.pkgName
    };
  }
}

/**
 * Loads every selected package of a manifest, one result per package.
 *
 * @throws {NotFoundError} When the manifest file does not exist
 * @throws {ManifestInvalidError} When its shape is not recognized
 */
export async function loadPackagesFromFile(
  configFile: string,
  options: LoadFromFileOptions,
  context: TreepackContext
): Promise<LoadResult[]> {
  const manifest = await readManifest(configFile);
  const wanted = options.packageNames?.length ? new Set(options.packageNames) : null;
  const results: LoadResult[] = [];

  if (manifest.shape === 'packages') {
    const names = wanted ? [...wanted] : Object.keys(manifest.packages);
    for (const name of names) {
      const pkg = manifest.packages[name];
      if (!pkg) {
        results.push({ success: false, message: `Package '${name}' not found in config`, package: name });
        continue;
      }
      results.push(await loadPackage({
        packageDef: legacyToDefinition(name, pkg),
        clean: options.clean,
        useSymlink: options.useSymlink
      }, context));
    }
    return results;
  }

  const entries = manifest.shape === 'miniatures'
    ? manifest.entries.filter(entry => entry.loaded)
    : manifest.entries;

  for (const entry of entries) {
    if (wanted && !(entry.pkgName && wanted.has(entry.pkgName))) continue;
    results.push(await loadPackage({
      packageDef: entry,
      clean: options.clean,
      useSymlink: options.useSymlink
    }, context));
  }
  return results;
}
