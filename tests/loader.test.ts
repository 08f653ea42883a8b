import { describe, test, expect, beforeEach, afterEach, vi } from 'vitest';
import { existsSync, lstatSync, mkdirSync, readFileSync, realpathSync, rmSync, writeFileSync } from 'fs';
import { join } from 'path';
import { createContext } from '../src/context.js';
import { defaultTargetDir, loadPackage, loadPackagesFromFile } from '../src/loader.js';
import { parsePackageDefinition } from '../src/manifest.js';
import { NotFoundError, TransportError } from '../src/errors.js';
import { ui } from '../src/ui.js';
import { createTestDir } from './utils/testDir.js';
import { commitToRemote, createRemote } from './utils/gitFixtures.js';
import type { TestRemote } from './utils/gitFixtures.js';
import type { TreepackContext } from '../src/types.js';

describe('defaultTargetDir', () => {
  test('uses the last URL segment without .git', () => {
    expect(defaultTargetDir('https://git.example.com/acme/tools.git', 'main')).toBe('tools');
    expect(defaultTargetDir('https://git.example.com/acme/tools/', 'master')).toBe('tools');
  });

  test('adds the branch for non-default branches', () => {
    expect(defaultTargetDir('https://git.example.com/acme/tools', 'dev')).toBe('tools-dev');
  });
});

describe('Loader', () => {
  let testDir: string;
  let remote: TestRemote;
  let context: TreepackContext;

  function readTarget(dir: string, file = 'VERSION'): string {
    return readFileSync(join(dir, file), 'utf8');
  }

  function writeManifest(name: string, content: unknown): string {
    const file = join(testDir, name);
    writeFileSync(file, JSON.stringify(content, null, 2));
    return file;
  }

  beforeEach(async () => {
    testDir = createTestDir('loader-test', expect.getState().currentTestName);
    remote = await createRemote(testDir, 'tools', { 'README.md': '# tools\n' });
    await commitToRemote(remote, { VERSION: '1.0.0' }, { tag: 'v1.0.0' });
    await commitToRemote(remote, { VERSION: '1.1.0' }, { tag: 'v1.1.0' });
    context = createContext({ cacheDir: join(testDir, 'cache') });
  });

  afterEach(() => {
    vi.restoreAllMocks();
    rmSync(testDir, { recursive: true, force: true });
  });

  describe('loadPackage', () => {
    test('copies the branch head when no version is requested', async () => {
      const targetDir = join(testDir, 'vendor', 'tools');

      const result = await loadPackage({ repo: remote.url, targetDir }, context);

      expect(result).toMatchObject({
        success: true,
        message: `Successfully loaded repository from ${remote.url} (branch: main)`,
        repo: remote.url,
        branch: 'main',
        version: 'main',
        targetDir,
        symlink: false
      });
      expect(readTarget(targetDir)).toBe('1.1.0');
      expect(readTarget(targetDir, 'README.md')).toBe('# tools\n');
    });

    test('copies the tag that satisfies a constraint', async () => {
      const targetDir = join(testDir, 'vendor', 'tools');

      const result = await loadPackage({ repo: remote.url, version: '>=1.0.0,<1.1.0', targetDir }, context);

      expect(result.success).toBe(true);
      expect(result.version).toBe('v1.0.0');
      expect(readTarget(targetDir)).toBe('1.0.0');
    });

    test('resolves latest to the highest tag', async () => {
      await commitToRemote(remote, { VERSION: 'unreleased' });
      const targetDir = join(testDir, 'vendor', 'tools');

      const result = await loadPackage({ repo: remote.url, version: 'latest', targetDir }, context);

      expect(result.version).toBe('v1.1.0');
      expect(readTarget(targetDir)).toBe('1.1.0');
    });

    test('reports an unsatisfiable constraint as a failed result', async () => {
      const targetDir = join(testDir, 'vendor', 'tools');

      const result = await loadPackage({ repo: remote.url, version: '>=2.0.0', targetDir }, context);

      expect(result.success).toBe(false);
      expect(result.message).toBe('Failed to load repository: No tag found matching version >=2.0.0');
      expect(result.error).toBeInstanceOf(NotFoundError);
      expect(result.version).toBe('>=2.0.0');
      expect(existsSync(targetDir)).toBe(false);
    });

    test('reports a repository that cannot be cloned', async () => {
      const missing = join(testDir, 'absent.git');

      const result = await loadPackage({ repo: missing, targetDir: join(testDir, 'out') }, context);

      expect(result.success).toBe(false);
      expect(result.message).toBe(`Failed to load repository: Failed to clone ${missing}`);
      expect(result.error).toBeInstanceOf(TransportError);
      expect(result.version).toBe('main');
    });

    test('requires a repository', async () => {
      expect(await loadPackage({}, context)).toEqual({
        success: false,
        message: 'Repository URL is required',
        package: undefined
      });
    });

    test('merges into an existing target unless asked to clean it', async () => {
      const targetDir = join(testDir, 'vendor', 'tools');
      mkdirSync(targetDir, { recursive: true });
      writeFileSync(join(targetDir, 'stale.txt'), 'old');

      await loadPackage({ repo: remote.url, targetDir }, context);
      expect(existsSync(join(targetDir, 'stale.txt'))).toBe(true);

      await loadPackage({ repo: remote.url, targetDir, clean: true }, context);
      expect(existsSync(join(targetDir, 'stale.txt'))).toBe(false);
      expect(readTarget(targetDir)).toBe('1.1.0');
    });

    test('links the target into the cache when asked', async () => {
      const targetDir = join(testDir, 'vendor', 'tools');

      const result = await loadPackage({ repo: remote.url, targetDir, useSymlink: true }, context);

      expect(result.success).toBe(true);
      expect(result.symlink).toBe(true);
      expect(lstatSync(targetDir).isSymbolicLink()).toBe(true);
      expect(realpathSync(targetDir)).toBe(realpathSync(context.cache.getRepoPath(remote.url)));
    });

    test('takes repository, version and target from a package definition', async () => {
      const installHint = vi.spyOn(ui, 'installHint');
      const targetDir = join(testDir, 'vendor', 'from-def');
      const packageDef = parsePackageDefinition({
        pkgName: 'tools',
        domain: testDir,
        repoName: 'tools.git',
        localDir: targetDir,
        as_pkg: { version: '1.0.0' },
        custom_config: { install: 'make install' }
      });

      const result = await loadPackage({ packageDef }, context);

      expect(result).toMatchObject({
        success: true,
        message: `Successfully loaded repository from ${remote.url} (branch: main). Run 'make install' to install the package`,
        repo: remote.url,
        version: 'v1.0.0',
        targetDir,
        installHint: 'make install',
        package: 'tools'
      });
      expect(installHint).toHaveBeenCalledWith('make install');
      expect(readTarget(targetDir)).toBe('1.0.0');
    });

    test('checks out the tag a definition names without a branch', async () => {
      const targetDir = join(testDir, 'vendor', 'pinned');
      const packageDef = parsePackageDefinition({
        domain: testDir,
        repoName: 'tools.git',
        tag: 'v1.0.0',
        localDir: targetDir
      });

      const result = await loadPackage({ packageDef }, context);

      expect(result).toMatchObject({
        success: true,
        message: `Successfully loaded repository from ${remote.url} (branch: main)`,
        branch: 'main',
        version: 'v1.0.0'
      });
      expect(readTarget(targetDir)).toBe('1.0.0');
      expect(context.cache.hasRepo(remote.url, 'v1.0.0')).toBe(false);
    });

    test('lets explicit options override the definition', async () => {
      const targetDir = join(testDir, 'override');
      const packageDef = parsePackageDefinition({
        pkgName: 'tools',
        domain: testDir,
        repoName: 'tools.git',
        localDir: join(testDir, 'unused'),
        as_pkg: { version: '1.0.0' }
      });

      const result = await loadPackage({ packageDef, version: '1.1.0', targetDir }, context);

      expect(result.version).toBe('v1.1.0');
      expect(existsSync(join(testDir, 'unused'))).toBe(false);
      expect(readTarget(targetDir)).toBe('1.1.0');
    });

    test('loads a non-default branch from its own mirror', async () => {
      await commitToRemote(remote, { VERSION: 'dev' }, { branch: 'dev' });
      const targetDir = join(testDir, 'vendor', 'tools-dev');

      const result = await loadPackage({ repo: remote.url, branch: 'dev', targetDir }, context);

      expect(result).toMatchObject({ success: true, branch: 'dev', version: 'dev' });
      expect(readTarget(targetDir)).toBe('dev');
      expect(context.cache.hasRepo(remote.url, 'dev')).toBe(true);
    });
    test('resolves an older release on the first load of a branch over a URL', async () => {
      await commitToRemote(remote, { VERSION: '2.0.0' }, { branch: 'dev', tag: 'lib/dev/2.0.0' });
      await commitToRemote(remote, { VERSION: '2.1.0' }, { branch: 'dev', tag: 'lib/dev/2.1.0' });
      const url = `file://${remote.url}`;
      const targetDir = join(testDir, 'vendor', 'tools-dev');

      const result = await loadPackage({ repo: url, branch: 'dev', version: '>=2.0.0,<2.1.0', targetDir }, context);

      expect(result).toMatchObject({ success: true, branch: 'dev', version: 'lib/dev/2.0.0' });
      expect(readTarget(targetDir)).toBe('2.0.0');
    });
  });

  describe('loadPackagesFromFile', () => {
    test('loads only the entries marked loaded from a workspace list', async () => {
      const file = writeManifest('workspace.json', {
        miniatures: [
          { pkgName: 'tools', domain: testDir, repoName: 'tools.git', localDir: join(testDir, 'ws', 'tools'), loaded: true },
          { pkgName: 'skipped', domain: testDir, repoName: 'tools.git', localDir: join(testDir, 'ws', 'skipped') }
        ]
      });

      const results = await loadPackagesFromFile(file, {}, context);

      expect(results.map(r => [r.package, r.success])).toEqual([['tools', true]]);
      expect(readTarget(join(testDir, 'ws', 'tools'))).toBe('1.1.0');
      expect(existsSync(join(testDir, 'ws', 'skipped'))).toBe(false);
    });

    test('loads every dependency of a package manifest', async () => {
      const file = writeManifest('pkg.json', {
        name: 'app',
        dependencies: [
          { pkgName: 'tools', domain: testDir, repoName: 'tools.git', localDir: join(testDir, 'deps', 'tools'), as_pkg: { version: '~1.0' } }
        ]
      });

      const results = await loadPackagesFromFile(file, {}, context);

      expect(results).toHaveLength(1);
      expect(results[0]).toMatchObject({ success: true, package: 'tools', version: 'v1.0.0' });
    });

    test('loads named packages from a legacy map and reports unknown names', async () => {
      const file = writeManifest('legacy.json', {
        packages: {
          tools: { 'db-repo': remote.url, 'target-dir': join(testDir, 'legacy', 'tools'), version: '1.1.0' },
          other: { 'db-repo': remote.url, 'target-dir': join(testDir, 'legacy', 'other') }
        }
      });

      const results = await loadPackagesFromFile(file, { packageNames: ['tools', 'ghost'] }, context);

      expect(results).toHaveLength(2);
      expect(results[0]).toMatchObject({ success: true, package: 'tools', version: 'v1.1.0' });
      expect(results[1]).toEqual({ success: false, message: "Package 'ghost' not found in config", package: 'ghost' });
      expect(existsSync(join(testDir, 'legacy', 'other'))).toBe(false);
    });

    test('restricts a workspace list to the named packages', async () => {
      const file = writeManifest('workspace.json', {
        repos: [
          { pkgName: 'a', domain: testDir, repoName: 'tools.git', localDir: join(testDir, 'ws', 'a'), loaded: true },
          { pkgName: 'b', domain: testDir, repoName: 'tools.git', localDir: join(testDir, 'ws', 'b'), loaded: true }
        ]
      });

      const results = await loadPackagesFromFile(file, { packageNames: ['b'] }, context);

      expect(results.map(r => r.package)).toEqual(['b']);
    });

    test('rejects a missing manifest', async () => {
      await expect(loadPackagesFromFile(join(testDir, 'absent.json'), {}, context)).rejects.toBeInstanceOf(NotFoundError);
    });
  });
});
