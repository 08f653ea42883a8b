import semver from 'semver';
import type { SemVer } from 'semver';
import { ReferenceInvalidError } from './errors.js';

/**
 * Comparison operators accepted in a constraint clause.
 *
 * `~=` is the "compatible release" operator: `~=1.4.2` means `>=1.4.2,<1.5.0`
 * and `~=1.4` means `>=1.4.0,<2.0.0`.
 */
export type ComparatorOp = '>=' | '>' | '<=' | '<' | '=' | '!=' | '^' | '~' | '~=';

export interface Comparator {
  op: ComparatorOp;
  version: SemVer;
  /** Number of numeric components written in the clause (for `~=`) */
  precision: number;
}

export interface Constraint {
  raw: string;
  clauses: Comparator[];
  /** Pre-release versions only match when a clause names one */
  includePrerelease: boolean;
}

const NUMERIC_SHORT_FORM = /^\d+(\.\d+)?$/;
const CLAUSE_PATTERN = /^(>=|<=|==|!=|~=|>|<|=|\^|~)?v?(\S+)$/;

/**
 * The version part of a tag: its last `/` segment without a leading `v`.
 *
 * @example
 * ```typescript
 * versionPartOf('src/math_utils/dev/v1.2.0'); // '1.2.0'
 * ```
 */
export function versionPartOf(tag: string): string {
  const segments = tag.split('/');
  const last = segments[segments.length - 1] ?? '';
  return last.replace(/^v/, '');
}

/**
 * Parses a version string, accepting `1` and `1.2` as `1.0.0` and `1.2.0`.
 */
export function parseVersion(text: string): SemVer | null {
  const trimmed = text.trim().replace(/^v/, '');
  const parsed = semver.parse(trimmed);
  if (parsed) return parsed;
  if (NUMERIC_SHORT_FORM.test(trimmed)) {
    const parts = trimmed.split('.');
    while (parts.length < 3) parts.push('0');
    return semver.parse(parts.join('.'));
  }
  return null;
}

export function parseTagVersion(tag: string): SemVer | null {
  return parseVersion(versionPartOf(tag));
}

/**
 * Highest-versioned tag under semver precedence.
 *
 * Tags whose version part does not parse are skipped. When none parses, the
 * last tag in enumeration order is returned as a best-effort answer.
 */
export function findLatest(tags: readonly string[]): string | null {
  let best: { tag: string; version: SemVer } | null = null;

  for (const tag of tags) {
    const version = parseTagVersion(tag);
    if (!version) continue;
    if (!best || semver.compare(version, best.version) >= 0) {
      best = { tag, version };
    }
  }

  if (best) return best.tag;
  return tags.length > 0 ? tags[tags.length - 1] ?? null : null;
}

/**
 * Parses a constraint such as `>=1.0.0,<2.0.0` into comparator clauses.
 *
 * Clauses are separated by commas or whitespace; a bare version is an exact
 * match.
 *
 * @throws {ReferenceInvalidError} When the expression is empty or a clause does not parse
 */
export function parseConstraint(expression: string): Constraint {
  const normalized = expression.trim().replace(/(>=|<=|==|!=|~=|>|<|=|\^|~)\s+/g, '$1');
  const parts = normalized.split(/[\s,]+/).filter(Boolean);

  if (parts.length === 0) {
    throw new ReferenceInvalidError('Empty version constraint');
  }

  const clauses = parts.map((part): Comparator => {
    const match = CLAUSE_PATTERN.exec(part);
    const versionText = match?.[2];
    const version = versionText ? parseVersion(versionText) : null;
    if (!match || !versionText || !version) {
      throw new ReferenceInvalidError(`Invalid version constraint '${expression}'`);
    }
    const op = match[1] === '==' || match[1] === undefined ? '=' : toComparatorOp(match[1]);
    const precision = versionText.split(/[-+]/)[0]?.split('.').length ?? 3;
    if (op === '~=' && precision < 2) {
      throw new ReferenceInvalidError(`'~=' needs at least two version components in '${expression}'`);
    }
    return { op, version, precision };
  });

  return {
    raw: expression,
    clauses,
    includePrerelease: clauses.some(clause => clause.version.prerelease.length > 0)
  };
}

function toComparatorOp(op: string): ComparatorOp {
  switch (op) {
    case '>=':
    case '>':
    case '<=':
    case '<':
    case '=':
    case '!=':
    case '^':
    case '~':
    case '~=':
      return op;
    default:
      throw new ReferenceInvalidError(`Unknown comparison operator '${op}'`);
  }
}

function compatibleUpperBound(comparator: Comparator): SemVer | null {
  const { version, precision } = comparator;
  const bumped = precision >= 3
    ? `${version.major}.${version.minor + 1}.0`
    : `${version.major + 1}.0.0`;
  return semver.parse(bumped);
}

function matchesClause(version: SemVer, clause: Comparator): boolean {
  const order = semver.compare(version, clause.version);
  switch (clause.op) {
    case '>=': return order >= 0;
    case '>': return order > 0;
    case '<=': return order <= 0;
    case '<': return order < 0;
    case '=': return order === 0;
    case '!=': return order !== 0;
    case '^':
    case '~':
      return semver.satisfies(version, `${clause.op}${clause.version.version}`, { includePrerelease: true });
    case '~=': {
      const upper = compatibleUpperBound(clause);
      return order >= 0 && upper !== null && semver.compare(version, upper) < 0;
    }
  }
}

/**
 * Whether a version satisfies every clause of a constraint.
 */
export function satisfiesConstraint(version: SemVer, constraint: Constraint): boolean {
  if (version.prerelease.length > 0 && !constraint.includePrerelease) {
    return false;
  }
  return constraint.clauses.every(clause => matchesClause(version, clause));
}

/**
 * Highest-versioned tag that satisfies the constraint, or null.
 *
 * @throws {ReferenceInvalidError} When the constraint does not parse
 */
export function findMatching(tags: readonly string[], constraint: string | Constraint): string | null {
  const parsed = typeof constraint === 'string' ? parseConstraint(constraint) : constraint;
  let best: { tag: string; version: SemVer } | null = null;

  for (const tag of tags) {
    const version = parseTagVersion(tag);
    if (!version || !satisfiesConstraint(version, parsed)) continue;
    if (!best || semver.compare(version, best.version) >= 0) {
      best = { tag, version };
    }
  }

  return best?.tag ?? null;
}
