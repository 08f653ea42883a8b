import fs from 'fs-extra';
import { basename, dirname, join, resolve } from 'path';
import { readdir } from 'fs/promises';
import type { Stats } from 'fs';

/**
 * Entries never copied out of a package directory into a repository mirror.
 */
export const PUBLISH_EXCLUDES: readonly string[] = [
  '.git',
  '.gitignore',
  '__pycache__',
  '.pytest_cache',
  'node_modules'
];

/**
 * Removes whatever occupies a path: a symlink (without following it), a
 * file, or a directory tree. A missing path is not an error.
 */
export async function removePath(target: string): Promise<void> {
  let stat: Stats;
  try {
    stat = await fs.lstat(target);
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') return;
    throw error;
  }
  if (stat.isSymbolicLink() || !stat.isDirectory()) {
    await fs.unlink(target);
  } else {
    await fs.rm(target, { recursive: true, force: true });
  }
}

/**
 * Copies a whole tree into `dest`, merging into an existing directory.
 * Symlinks are copied as links; entries whose name is in `excludes` are
 * skipped at any depth.
 */
export async function copyTree(src: string, dest: string, excludes: readonly string[] = []): Promise<void> {
  await fs.ensureDir(dirname(resolve(dest)));
  await fs.copy(src, dest, {
    overwrite: true,
    dereference: false,
    filter: (path: string) => !excludes.includes(basename(path))
  });
}

/**
 * Copies the top-level entries of a package directory into `dest`.
 *
 * Excluded names are skipped. A directory entry replaces its counterpart in
 * `dest` wholesale, so files deleted from the package disappear from the
 * mirror too; plain files overwrite.
 *
 * @returns Names of the entries copied
 */
export async function copyPackageContents(
  src: string,
  dest: string,
  excludes: readonly string[] = PUBLISH_EXCLUDES
): Promise<string[]> {
  await fs.ensureDir(dest);
  const entries = await readdir(src, { withFileTypes: true });
  const copied: string[] = [];

  for (const entry of entries) {
    if (excludes.includes(entry.name)) continue;

    const from = join(src, entry.name);
    const to = join(dest, entry.name);

    if (entry.isDirectory()) {
      await removePath(to);
      await fs.copy(from, to, {
        dereference: false,
        filter: (path: string) => !excludes.includes(basename(path))
      });
    } else {
      await fs.copy(from, to, { overwrite: true, dereference: false });
    }
    copied.push(entry.name);
  }

  return copied.sort();
}

/**
 * Replaces whatever is at `target` with a symlink to `source`.
 * Parent directories of `target` are created as needed.
 */
export async function replaceWithSymlink(source: string, target: string): Promise<void> {
  const absoluteTarget = resolve(target);
  await fs.ensureDir(dirname(absoluteTarget));
  await removePath(absoluteTarget);
  await fs.symlink(resolve(source), absoluteTarget, 'dir');
}
