import { describe, test, expect, beforeEach, afterEach } from 'vitest';
import { mkdirSync, rmSync } from 'fs';
import { join } from 'path';
import { execa } from 'execa';
import { fixCacheFilemode, fixGitFilemode, isWindowsFilesystem, shouldDisableFilemode } from '../src/utils/filemode.js';
import { createTestDir } from './utils/testDir.js';
import { git } from './utils/gitFixtures.js';

describe('Filemode utilities', () => {
  let testDir: string;

  async function initRepo(path: string): Promise<void> {
    mkdirSync(path, { recursive: true });
    await execa('git', ['init', '--quiet'], { cwd: path });
  }

  beforeEach(() => {
    testDir = createTestDir('filemode-test', expect.getState().currentTestName);
  });

  afterEach(() => {
    rmSync(testDir, { recursive: true, force: true });
  });

  test('recognizes Windows drives mounted into WSL', () => {
    expect(isWindowsFilesystem('/mnt/c/Users/dev/project')).toBe(true);
    expect(isWindowsFilesystem('/home/dev/project')).toBe(false);
    expect(isWindowsFilesystem('/mount/c')).toBe(false);
    expect(shouldDisableFilemode('/mnt/d/repos')).toBe(true);
  });

  test('disables filemode tracking in one repository', async () => {
    const repo = join(testDir, 'repo');
    await initRepo(repo);

    const result = await fixGitFilemode(repo);

    expect(result).toEqual({
      success: true,
      message: 'Fixed 1 repositories, 0 errors',
      fixed: [repo],
      errors: []
    });
    expect(await git(repo, ['config', 'core.filemode'])).toBe('false');
  });

  test('fixes every repository under a directory when recursive', async () => {
    const first = join(testDir, 'a');
    const second = join(testDir, 'group', 'b');
    await initRepo(first);
    await initRepo(second);

    const result = await fixGitFilemode(testDir, { recursive: true });

    expect(result.fixed).toEqual([first, second]);
    expect(await git(second, ['config', 'core.filemode'])).toBe('false');
  });

  test('reports a directory that is not a repository', async () => {
    expect(await fixGitFilemode(testDir)).toEqual({
      success: false,
      message: `No git repository found at ${testDir}`,
      fixed: [],
      errors: []
    });
  });

  test('fixes every mirror in a cache', async () => {
    const cacheDir = join(testDir, 'cache');
    await initRepo(join(cacheDir, 'git.example.com_acme_pkgs'));

    const result = await fixCacheFilemode(cacheDir);

    expect(result.fixed).toEqual([join(cacheDir, 'git.example.com_acme_pkgs')]);
  });

  test('reports a missing cache directory', async () => {
    const cacheDir = join(testDir, 'absent');

    expect(await fixCacheFilemode(cacheDir)).toMatchObject({
      success: false,
      message: `Cache directory not found: ${cacheDir}`
    });
  });
});
