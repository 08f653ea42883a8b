import { describe, test, expect, beforeEach, afterEach } from 'vitest';
import { rmSync } from 'fs';
import { join } from 'path';
import { buildTagName, createTag, deleteTag, parseTagName } from '../src/tags.js';
import { tagExists } from '../src/git.js';
import { AlreadyExistsError, ManifestInvalidError } from '../src/errors.js';
import { createTestDir } from './utils/testDir.js';
import { createRemote, git, remoteCommit, remoteTags, writeFiles } from './utils/gitFixtures.js';
import type { TestRemote } from './utils/gitFixtures.js';

describe('buildTagName', () => {
  test('uses the bare version at the repository root on the default branch', () => {
    expect(buildTagName({ rootDir: '.', branch: 'main', version: '1.0.0' })).toBe('1.0.0');
    expect(buildTagName({ version: '1.0.0' })).toBe('1.0.0');
  });

  test('prefixes the root directory and strips the v prefix', () => {
    expect(buildTagName({ rootDir: 'lib', branch: 'main', version: 'v1.0.0' })).toBe('lib/1.0.0');
  });

  test('adds the branch off the default branch', () => {
    expect(buildTagName({ rootDir: 'lib', branch: 'dev', version: '1.0.0' })).toBe('lib/dev/1.0.0');
  });

  test('trims slashes around the root directory', () => {
    expect(buildTagName({ rootDir: '/src/math_utils/', branch: null, version: '1.1.0' })).toBe('src/math_utils/1.1.0');
  });

  test('honours a custom default branch', () => {
    expect(buildTagName({ branch: 'develop', version: '2.0.0', defaultBranch: 'develop' })).toBe('2.0.0');
    expect(buildTagName({ branch: 'main', version: '2.0.0', defaultBranch: 'develop' })).toBe('main/2.0.0');
  });

  test('requires a version', () => {
    expect(() => buildTagName({ rootDir: 'lib', version: '' })).toThrow(ManifestInvalidError);
    expect(() => buildTagName({ rootDir: 'lib', version: ' v ' })).toThrow(ManifestInvalidError);
  });
});

describe('parseTagName', () => {
  test('reads a bare version', () => {
    expect(parseTagName('1.0.0')).toEqual({
      raw: '1.0.0',
      prefix: undefined,
      branch: undefined,
      versionText: '1.0.0',
      version: '1.0.0'
    });
  });

  test('reads prefix and branch segments', () => {
    expect(parseTagName('lib/1.0.0')).toMatchObject({ prefix: 'lib', branch: undefined, version: '1.0.0' });
    expect(parseTagName('src/math_utils/dev/v1.2')).toMatchObject({
      prefix: 'src/math_utils',
      branch: 'dev',
      versionText: '1.2',
      version: '1.2.0'
    });
  });

  test('keeps a multi-segment root directory intact when the prefix is known', () => {
    expect(parseTagName('src/math_utils/1.0.0', 'src/math_utils')).toMatchObject({
      prefix: 'src/math_utils',
      branch: undefined
    });
    expect(parseTagName('src/math_utils/dev/1.0.0', 'src/math_utils/')).toMatchObject({
      prefix: 'src/math_utils',
      branch: 'dev'
    });
  });

  test('round-trips a built name', () => {
    const name = buildTagName({ rootDir: 'lib', branch: 'feature', version: 'v3.1.4' });
    expect(parseTagName(name)).toMatchObject({ prefix: 'lib', branch: 'feature', version: '3.1.4' });
  });

  test('reports a null version for non-version tags', () => {
    expect(parseTagName('docs/latest').version).toBeNull();
  });
});

describe('Tag lifecycle', () => {
  let testDir: string;
  let remote: TestRemote;
  let work: string;

  async function commitFile(name: string, content: string): Promise<string> {
    writeFiles(work, { [name]: content });
    await git(work, ['add', '--all']);
    await git(work, ['commit', '--quiet', '-m', `Change ${name}`]);
    return git(work, ['rev-parse', 'HEAD']);
  }

  beforeEach(async () => {
    testDir = createTestDir('tags-test', expect.getState().currentTestName);
    remote = await createRemote(testDir);
    work = join(testDir, 'work');
    await git(testDir, ['clone', '--quiet', remote.url, work]);
  });

  afterEach(() => {
    rmSync(testDir, { recursive: true, force: true });
  });

  test('creates an annotated tag at HEAD', async () => {
    const action = await createTag(work, '1.0.0', { message: 'Release 1.0.0' });

    expect(action).toBe('created');
    expect(await tagExists(work, '1.0.0')).toBe(true);
    expect(await git(work, ['cat-file', '-t', '1.0.0'])).toBe('tag');
    expect(await git(work, ['tag', '--list', '--format=%(contents:subject)', '1.0.0'])).toBe('Release 1.0.0');
  });

  test('refuses to overwrite an existing tag without force', async () => {
    await createTag(work, '1.0.0', { message: 'first' });

    await expect(createTag(work, '1.0.0', { message: 'second' })).rejects.toBeInstanceOf(AlreadyExistsError);
    await expect(createTag(work, '1.0.0', { message: 'second' })).rejects.toThrow("Tag '1.0.0' already exists");
  });

  test('moves an existing tag to the new commit with force', async () => {
    await createTag(work, '1.0.0', { message: 'first' });
    const head = await commitFile('CHANGES.md', 'fixed\n');

    const action = await createTag(work, '1.0.0', { message: 'again', force: true });

    expect(action).toBe('updated');
    expect(await git(work, ['rev-parse', '1.0.0^{commit}'])).toBe(head);
  });

  test('pushes tags to origin', async () => {
    const action = await createTag(work, 'lib/1.0.0', { message: 'Release lib/1.0.0', push: true });

    expect(action).toBe('pushed');
    expect(await remoteTags(remote)).toEqual(['lib/1.0.0']);
  });

  test('force-pushes a moved tag', async () => {
    await createTag(work, '1.0.0', { message: 'first', push: true });
    await commitFile('CHANGES.md', 'fixed\n');
    await git(work, ['push', '--quiet', 'origin', 'main']);
    const head = await git(work, ['rev-parse', 'HEAD']);

    const action = await createTag(work, '1.0.0', { message: 'again', force: true, push: true });

    expect(action).toBe('pushed');
    expect(await remoteCommit(remote, '1.0.0')).toBe(head);
  });

  test('treats a missing local tag as nothing to delete', async () => {
    const outcome = await deleteTag(work, '9.9.9', { remote: true });

    expect(outcome).toEqual({
      localDeleted: false,
      local: "Local tag '9.9.9' not found",
      remote: null
    });
  });

  test('deletes a tag locally and on origin', async () => {
    await createTag(work, '1.0.0', { message: 'Release', push: true });

    const outcome = await deleteTag(work, '1.0.0', { remote: true });

    expect(outcome.localDeleted).toBe(true);
    expect(outcome.local).toBe("Deleted local tag '1.0.0'");
    expect(outcome.remote).toBe("Deleted remote tag '1.0.0'");
    expect(await tagExists(work, '1.0.0')).toBe(false);
    expect(await remoteTags(remote)).toEqual([]);
  });

  test('keeps the local deletion when the remote deletion fails', async () => {
    await createTag(work, 'local-only', { message: 'never pushed' });
    await git(work, ['remote', 'remove', 'origin']);

    const outcome = await deleteTag(work, 'local-only', { remote: true });

    expect(outcome.localDeleted).toBe(true);
    expect(outcome.remote).toMatch(/^Failed to delete remote tag: /);
    expect(outcome.remoteError).toBeInstanceOf(Error);
    expect(await tagExists(work, 'local-only')).toBe(false);
  });

  test('leaves origin alone unless asked', async () => {
    await createTag(work, '1.0.0', { message: 'Release', push: true });

    const outcome = await deleteTag(work, '1.0.0');

    expect(outcome.remote).toBeNull();
    expect(await remoteTags(remote)).toEqual(['1.0.0']);
  });
});
