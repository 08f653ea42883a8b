import fs from 'fs-extra';
import { join, resolve } from 'path';
import { z } from 'zod';
import { ManifestInvalidError, NotFoundError } from './errors.js';
import type { PackageDefinition, PackageMeta } from './types.js';

const definitionSchema = z.object({
  pkgName: z.string().optional(),
  pkg_name: z.string().optional(),
  domain: z.string().optional(),
  repoName: z.string().optional(),
  repo_name: z.string().optional(),
  repo: z.string().optional(),
  branch: z.string().optional(),
  tag: z.string().optional(),
  localDir: z.string().optional(),
  local_dir: z.string().optional(),
  loaded: z.boolean().optional(),
  as_pkg: z.object({ version: z.string() }).optional(),
  asPkg: z.object({ version: z.string() }).optional(),
  version: z.string().optional(),
  customConfig: z.record(z.string(), z.string()).optional(),
  custom_config: z.record(z.string(), z.string()).optional(),
  pkgType: z.string().optional(),
  pkg_type: z.string().optional()
});

const DEFINITION_KEYS = new Set(Object.keys(definitionSchema.shape));

const packageMetaSchema = z.object({
  name: z.string().default(''),
  version: z.string().optional(),
  description: z.string().optional(),
  'db-repo': z.string().optional(),
  'root-dir': z.string().optional(),
  branch: z.string().optional(),
  dependencies: z.array(z.unknown()).default([])
});

const legacyPackageSchema = z.object({
  'db-repo': z.string().default(''),
  'root-dir': z.string().default('.'),
  branch: z.string().default('main'),
  'target-dir': z.string().optional(),
  version: z.string().optional()
});

const objectSchema = z.record(z.string(), z.unknown());

export type LegacyPackage = {
  dbRepo: string;
  rootDir: string;
  branch: string;
  targetDir?: string;
  version?: string;
};

/**
 * A manifest file after shape detection.
 *
 * - `dependencies`: a `pkg.json` listing the packages it depends on
 * - `miniatures`: a workspace list (`miniatures` or `repos`); only entries
 *   marked `loaded` are acted on
 * - `packages`: the legacy name → location map
 */
export type Manifest =
  | { shape: 'dependencies'; name?: string; entries: PackageDefinition[] }
  | { shape: 'miniatures'; entries: PackageDefinition[] }
  | { shape: 'packages'; packages: Record<string, LegacyPackage> };

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map(issue => (issue.path.length ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

function firstDefined(...values: Array<string | undefined>): string | undefined {
  return values.find(value => value !== undefined && value !== '');
}

/**
 * Reads one package entry, accepting camelCase and snake_case keys.
 * Keys it does not know are kept in `extra`.
 *
 * @throws {ManifestInvalidError} When the entry is not an object or a known key has the wrong type
 */
export function parsePackageDefinition(data: unknown, source?: string): PackageDefinition {
  const record = objectSchema.safeParse(data);
  if (!record.success) {
    throw new ManifestInvalidError('Package entry must be an object', source);
  }
  const parsed = definitionSchema.safeParse(record.data);
  if (!parsed.success) {
    throw new ManifestInvalidError(`Invalid package entry: ${describeIssues(parsed.error)}`, source);
  }
  const entry = parsed.data;

  const extra: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(record.data)) {
    if (!DEFINITION_KEYS.has(key)) {
      extra[key] = value;
    }
  }

  return {
    pkgName: firstDefined(entry.pkgName, entry.pkg_name),
    domain: entry.domain,
    repoName: firstDefined(entry.repoName, entry.repo_name, entry.repo),
    branch: entry.branch,
    tag: entry.tag,
    localDir: firstDefined(entry.localDir, entry.local_dir),
    loaded: entry.loaded ?? false,
    asPkg: entry.as_pkg ?? entry.asPkg,
    version: entry.version,
    customConfig: entry.customConfig ?? entry.custom_config ?? {},
    pkgType: firstDefined(entry.pkgType, entry.pkg_type),
    extra
  };
}

/**
 * Repository URL of a package entry, or null when it names no domain.
 *
 * @example
 * ```typescript
 * repoUrlOf({ domain: 'https://git.example.com/acme/', repoName: 'packages', ... });
 * // 'https://git.example.com/acme/packages'
 * ```
 */
export function repoUrlOf(def: PackageDefinition): string | null {
  if (!def.domain) {
    return null;
  }
  const domain = def.domain.replace(/\/+$/, '');
  return def.repoName ? `${domain}/${def.repoName}` : domain;
}

export function branchOrTagOf(def: PackageDefinition): string {
  return def.branch || def.tag || 'main';
}

export function legacyToDefinition(name: string, pkg: LegacyPackage): PackageDefinition {
  return {
    pkgName: name,
    domain: pkg.dbRepo,
    branch: pkg.branch,
    localDir: pkg.targetDir ?? name,
    loaded: true,
    version: pkg.version,
    customConfig: {},
    extra: { rootDir: pkg.rootDir }
  };
}

async function readJsonObject(file: string, missing: string): Promise<Record<string, unknown>> {
  if (!(await fs.pathExists(file))) {
    throw new NotFoundError(`${missing}: ${file}`);
  }
  let raw: unknown;
  try {
    raw = await fs.readJson(file);
  } catch (error) {
    throw new ManifestInvalidError('File is not valid JSON', file, { cause: error });
  }
  const record = objectSchema.safeParse(raw);
  if (!record.success) {
    throw new ManifestInvalidError('Expected a JSON object', file);
  }
  return record.data;
}

function toPackageMeta(data: Record<string, unknown>, file: string): PackageMeta {
  const parsed = packageMetaSchema.safeParse(data);
  if (!parsed.success) {
    throw new ManifestInvalidError(`Invalid package metadata: ${describeIssues(parsed.error)}`, file);
  }
  const meta = parsed.data;

  return {
    name: meta.name,
    version: firstDefined(meta.version),
    description: meta.description,
    dbRepo: firstDefined(meta['db-repo']),
    rootDir: firstDefined(meta['root-dir']),
    branch: firstDefined(meta.branch),
    dependencies: meta.dependencies.map(entry => parsePackageDefinition(entry, file))
  };
}

/**
 * Reads the metadata file of a package directory.
 *
 * @throws {NotFoundError} When the file does not exist
 * @throws {ManifestInvalidError} When it is not valid package metadata
 */
export async function readPackageMeta(pkgDir: string, metaFile = 'pkg.json'): Promise<PackageMeta> {
  const file = resolve(join(pkgDir, metaFile));
  return toPackageMeta(await readJsonObject(file, 'Meta file not found'), file);
}

/**
 * Reads a manifest and detects its shape: a `dependencies` array first, then
 * a `miniatures` or `repos` array, then a legacy `packages` map.
 *
 * @throws {NotFoundError} When the file does not exist
 * @throws {ManifestInvalidError} When no known shape matches
 */
export async function readManifest(file: string): Promise<Manifest> {
  const path = resolve(file);
  const data = await readJsonObject(path, 'Config file not found');

  if (Array.isArray(data.dependencies)) {
    const meta = toPackageMeta(data, path);
    return { shape: 'dependencies', name: meta.name || undefined, entries: meta.dependencies };
  }

  if ('miniatures' in data || 'repos' in data) {
    const miniatures = data.miniatures;
    const list = Array.isArray(miniatures) && miniatures.length > 0 ? miniatures : data.repos ?? miniatures ?? [];
    if (!Array.isArray(list)) {
      throw new ManifestInvalidError("'miniatures' must be a list of package entries", path);
    }
    return { shape: 'miniatures', entries: list.map(entry => parsePackageDefinition(entry, path)) };
  }

  if ('packages' in data) {
    const packages = objectSchema.safeParse(data.packages);
    if (!packages.success) {
      throw new ManifestInvalidError("'packages' must map package names to locations", path);
    }
    const result: Record<string, LegacyPackage> = {};
    for (const [name, value] of Object.entries(packages.data)) {
      const parsed = legacyPackageSchema.safeParse(value);
      if (!parsed.success) {
        throw new ManifestInvalidError(`Invalid package '${name}': ${describeIssues(parsed.error)}`, path);
      }
      result[name] = {
        dbRepo: parsed.data['db-repo'],
        rootDir: parsed.data['root-dir'],
        branch: parsed.data.branch,
        targetDir: parsed.data['target-dir'],
        version: parsed.data.version
      };
    }
    return { shape: 'packages', packages: result };
  }

  throw new ManifestInvalidError(
    "Invalid config file format - expected 'dependencies', 'miniatures', or 'packages' field",
    path
  );
}
