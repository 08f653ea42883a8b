import { describe, test, expect, beforeEach, afterEach, vi } from 'vitest';
import { readdirSync, readFileSync, rmSync, writeFileSync } from 'fs';
import { join } from 'path';
import { CacheIndex } from '../src/cache-index.js';
import { ui } from '../src/ui.js';
import { createTestDir } from './utils/testDir.js';
import type { CacheEntry } from '../src/types.js';

function entry(name: string): CacheEntry {
  return {
    cacheKey: name,
    path: `/cache/${name}`,
    branch: null,
    lastUpdated: '2024-01-01T00:00:00+00:00'
  };
}

describe('CacheIndex', () => {
  let testDir: string;
  let file: string;

  beforeEach(() => {
    testDir = createTestDir('cache-index', expect.getState().currentTestName);
    file = join(testDir, 'index.json');
  });

  afterEach(() => {
    vi.restoreAllMocks();
    rmSync(testDir, { recursive: true, force: true });
  });

  test('reads a missing file as empty', async () => {
    expect(await new CacheIndex(file).read()).toEqual({});
  });

  test('warns about a corrupt or malformed file and reads it as empty', async () => {
    const warning = vi.spyOn(ui, 'warning').mockImplementation(() => {});
    const index = new CacheIndex(file);

    writeFileSync(file, 'not json');
    expect(await index.read()).toEqual({});

    writeFileSync(file, JSON.stringify({ key: { path: 42 } }));
    expect(await index.read()).toEqual({});

    expect(warning).toHaveBeenCalledTimes(2);
    expect(warning).toHaveBeenNthCalledWith(1, expect.stringContaining(`Ignoring unreadable cache index ${file}: `));
    expect(warning).toHaveBeenNthCalledWith(2, expect.stringContaining(`Ignoring unreadable cache index ${file}: key.`));
  });

  test('saves a copy of a corrupt file before the next write replaces it', async () => {
    const warning = vi.spyOn(ui, 'warning').mockImplementation(() => {});
    writeFileSync(file, '{"truncated":');
    const index = new CacheIndex(file);

    await index.upsert('a', entry('a'));

    expect(readFileSync(`${file}.corrupt`, 'utf8')).toBe('{"truncated":');
    expect(warning).toHaveBeenCalledTimes(1);
    expect(warning).toHaveBeenCalledWith(expect.stringContaining(`saved a copy to ${file}.corrupt`));
    expect(await index.read()).toEqual({ a: entry('a') });
  });

  test('does not warn about a healthy file', async () => {
    const warning = vi.spyOn(ui, 'warning');
    const index = new CacheIndex(file);

    await index.upsert('a', entry('a'));
    await index.read();

    expect(warning).not.toHaveBeenCalled();
  });

  test('upserts, removes and clears entries', async () => {
    const index = new CacheIndex(file);

    await index.upsert('a', entry('a'));
    await index.upsert('b', { ...entry('b'), branch: 'dev' });
    await index.upsert('a', { ...entry('a'), lastUpdated: '2024-02-02T00:00:00+00:00' });
    expect(await index.read()).toEqual({
      a: { ...entry('a'), lastUpdated: '2024-02-02T00:00:00+00:00' },
      b: { ...entry('b'), branch: 'dev' }
    });

    await index.remove('a');
    await index.remove('missing');
    expect(Object.keys(await index.read())).toEqual(['b']);

    await index.clear();
    expect(await index.read()).toEqual({});
  });

  test('writes snake_case JSON', async () => {
    await new CacheIndex(file).upsert('https://example.com/r@dev', { ...entry('r'), branch: 'dev' });

    expect(JSON.parse(readFileSync(file, 'utf8'))).toEqual({
      'https://example.com/r@dev': {
        cache_key: 'r',
        path: '/cache/r',
        branch: 'dev',
        last_updated: '2024-01-01T00:00:00+00:00'
      }
    });
  });

  test('keeps every entry when writers interleave', async () => {
    const first = new CacheIndex(file);
    const second = new CacheIndex(file);
    const names = Array.from({ length: 12 }, (_, i) => `repo-${i}`);

    await Promise.all(names.map((name, i) => (i % 2 === 0 ? first : second).upsert(name, entry(name))));

    const snapshot = await first.read();
    expect(Object.keys(snapshot).sort()).toEqual([...names].sort());
    expect(readdirSync(testDir)).toEqual(['index.json']);
  });
});
