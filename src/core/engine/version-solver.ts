/**
 * Version constraint solver for the directory engine.
 * Accumulates constraints per module key across a traversal and picks the
 * highest available version that satisfies all of them.
 */

import semver from 'semver';

interface ConstraintEntry {
  ranges: string[];
  requestedBy: string[];
}

export interface VersionConflict {
  moduleKey: string;
  ranges: string[];
  requestedBy: string[];
}

export interface VersionSolution {
  resolved: Map<string, string>;
  conflicts: VersionConflict[];
}

/**
 * Constraints that accept any version.
 */
export function isWildcard(range: string | undefined): boolean {
  if (!range) return true;
  const trimmed = range.trim().toLowerCase();
  return trimmed === '' || trimmed === '*' || trimmed === 'latest' || trimmed.startsWith('latest.');
}

/**
 * Exact match first; semver range semantics when both sides parse.
 */
export function satisfiesConstraint(version: string, range: string): boolean {
  if (isWildcard(range) || version === range.trim()) {
    return true;
  }
  if (!semver.valid(version) || !semver.validRange(range)) {
    return false;
  }
  return semver.satisfies(version, range, { includePrerelease: true });
}

/**
 * Orders semver versions by precedence; anything else by its coerced semver
 * form, then lexically.
 */
export function compareVersions(a: string, b: string): number {
  const va = semver.valid(a) ?? semver.coerce(a)?.version;
  const vb = semver.valid(b) ?? semver.coerce(b)?.version;
  if (va && vb) {
    const byPrecedence = semver.compare(va, vb);
    if (byPrecedence !== 0) return byPrecedence;
  }
  return a < b ? -1 : a > b ? 1 : 0;
}

export function highestSatisfying(versions: Iterable<string>, ranges: ReadonlyArray<string>): string | null {
  let best: string | null = null;
  for (const version of versions) {
    if (!ranges.every(range => satisfiesConstraint(version, range))) continue;
    if (best === null || compareVersions(version, best) > 0) {
      best = version;
    }
  }
  return best;
}

export class ModuleVersionSolver {
  private constraints: Map<string, ConstraintEntry> = new Map();
  private availableVersions: Map<string, Set<string>> = new Map();

  /**
   * Add a constraint for a module. Wildcards are ignored.
   */
  addConstraint(moduleKey: string, range: string | undefined, requestedBy: string): void {
    if (range === undefined || isWildcard(range)) {
      return;
    }

    let entry = this.constraints.get(moduleKey);
    if (!entry) {
      entry = { ranges: [], requestedBy: [] };
      this.constraints.set(moduleKey, entry);
    }

    entry.ranges.push(range.trim());
    entry.requestedBy.push(requestedBy);
  }

  addAvailableVersions(moduleKey: string, versions: Iterable<string>): void {
    let known = this.availableVersions.get(moduleKey);
    if (!known) {
      known = new Set();
      this.availableVersions.set(moduleKey, known);
    }
    for (const version of versions) {
      known.add(version);
    }
  }

  /**
   * Highest version satisfying what is known so far for a module.
   */
  pick(moduleKey: string): string | null {
    const versions = this.availableVersions.get(moduleKey) ?? new Set<string>();
    return highestSatisfying(versions, this.constraints.get(moduleKey)?.ranges ?? []);
  }

  /**
   * Solve every module with known versions. Modules whose constraints no
   * available version meets are reported as conflicts.
   */
  solve(): VersionSolution {
    const resolved = new Map<string, string>();
    const conflicts: VersionConflict[] = [];

    for (const moduleKey of this.availableVersions.keys()) {
      const chosen = this.pick(moduleKey);
      if (chosen !== null) {
        resolved.set(moduleKey, chosen);
        continue;
      }
      const entry = this.constraints.get(moduleKey);
      conflicts.push({
        moduleKey,
        ranges: entry ? [...entry.ranges] : [],
        requestedBy: entry ? [...entry.requestedBy] : []
      });
    }

    return { resolved, conflicts };
  }
}
