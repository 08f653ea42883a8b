import fs from 'fs-extra';
import { randomBytes } from 'crypto';
import { basename, dirname, join } from 'path';
import lockfile from 'proper-lockfile';
import { z } from 'zod';
import { ui } from './ui.js';
import { ErrorUtils } from './utils/security.js';
import type { CacheEntry } from './types.js';

const storedEntrySchema = z.object({
  cache_key: z.string(),
  path: z.string(),
  branch: z.string().nullable().optional(),
  last_updated: z.string()
});

const storedIndexSchema = z.record(z.string(), storedEntrySchema);

type StoredEntry = z.infer<typeof storedEntrySchema>;

export type IndexSnapshot = Record<string, CacheEntry>;

function fromStored(entry: StoredEntry): CacheEntry {
  return {
    cacheKey: entry.cache_key,
    path: entry.path,
    branch: entry.branch ?? null,
    lastUpdated: entry.last_updated
  };
}

function toStored(entry: CacheEntry): StoredEntry {
  return {
    cache_key: entry.cacheKey,
    path: entry.path,
    branch: entry.branch,
    last_updated: entry.lastUpdated
  };
}

/**
 * The cache index file as a small key/value store.
 *
 * Every mutation is a read-modify-write of the whole file performed while
 * holding a lock on it, and lands through a temp file and rename, so
 * concurrent processes sharing a cache directory never lose each other's
 * entries or observe a half-written file.
 */
export class CacheIndex {
  readonly file: string;

  constructor(file: string) {
    this.file = file;
  }

  /**
   * Current contents. A missing index reads as empty; so does an unreadable
   * one, with a warning.
   */
  async read(): Promise<IndexSnapshot> {
    const { snapshot, problem } = await this.load();
    if (problem) {
      ui.warning(`Ignoring unreadable cache index ${this.file}: ${problem}`);
    }
    return snapshot;
  }

  /**
   * Applies `mutate` to the current contents under the index lock and
   * persists the result.
   */
  async update(mutate: (snapshot: IndexSnapshot) => void): Promise<IndexSnapshot> {
    await this.ensureFile();

    const release = await lockfile.lock(this.file, {
      stale: 10000,
      retries: { retries: 50, minTimeout: 50, maxTimeout: 200, factor: 1.5 }
    });
    try {
      const { snapshot, problem } = await this.load();
      if (problem) {
        // Keep what was there before it is overwritten
        const saved = `${this.file}.corrupt`;
        await fs.copy(this.file, saved, { overwrite: true });
        ui.warning(`Cache index ${this.file} was unreadable (${problem}); saved a copy to ${saved}`);
      }
      mutate(snapshot);
      await this.write(snapshot);
      return snapshot;
    } finally {
      await release();
    }
  }

  async upsert(key: string, entry: CacheEntry): Promise<void> {
    await this.update(snapshot => {
      snapshot[key] = entry;
    });
  }

  async remove(key: string): Promise<void> {
    await this.update(snapshot => {
      delete snapshot[key];
    });
  }

  async clear(): Promise<void> {
    await this.update(snapshot => {
      for (const key of Object.keys(snapshot)) {
        delete snapshot[key];
      }
    });
  }

  /**
   * The lock needs an existing file. Created exclusively so that a racing
   * process never truncates an index another one has already written.
   */
  private async ensureFile(): Promise<void> {
    await fs.ensureDir(dirname(this.file));
    try {
      await fs.writeFile(this.file, '{}\n', { flag: 'wx' });
    } catch (error) {
      if (!(error instanceof Error && 'code' in error && error.code === 'EEXIST')) {
        throw error;
      }
    }
  }

  private async load(): Promise<{ snapshot: IndexSnapshot; problem: string | null }> {
    if (!(await fs.pathExists(this.file))) {
      return { snapshot: {}, problem: null };
    }
    let raw: unknown;
    try {
      raw = await fs.readJson(this.file);
    } catch (error) {
      return { snapshot: {}, problem: ErrorUtils.extractErrorMessage(error) };
    }
    const parsed = storedIndexSchema.safeParse(raw);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      return { snapshot: {}, problem: issue ? `${issue.path.join('.')}: ${issue.message}` : 'unexpected shape' };
    }
    const snapshot: IndexSnapshot = {};
    for (const [key, entry] of Object.entries(parsed.data)) {
      snapshot[key] = fromStored(entry);
    }
    return { snapshot, problem: null };
  }

  private async write(snapshot: IndexSnapshot): Promise<void> {
    const stored: Record<string, StoredEntry> = {};
    for (const [key, entry] of Object.entries(snapshot)) {
      stored[key] = toStored(entry);
    }
    const tmpFile = join(dirname(this.file), `.${basename(this.file)}.${randomBytes(6).toString('hex')}.tmp`);
    try {
      await fs.writeJson(tmpFile, stored, { spaces: 2 });
      await fs.rename(tmpFile, this.file);
    } catch (error) {
      await fs.remove(tmpFile);
      throw error;
    }
  }
}
