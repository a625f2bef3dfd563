/**
 * Configuration graph builder
 *
 * Configurations and their `extends` edges form a graph. Configurations that
 * are connected through extends edges are resolved together as one
 * configuration set; the grouping depends only on the edges, never on
 * declaration order.
 */

import type {
  ConfigurationDef,
  ConfigurationSet,
  DependencyEntry,
  Logger
} from '../../types/index.js';

/**
 * Map each configuration to the configurations it directly extends.
 * Extends targets that are not declared become configurations of their own.
 */
export function configExtends(
  configurations: ReadonlyArray<ConfigurationDef>,
  logger?: Logger
): Map<string, string[]> {
  const extendsMap = new Map<string, string[]>();

  for (const config of configurations) {
    const existing = extendsMap.get(config.name) ?? [];
    extendsMap.set(config.name, Array.from(new Set([...existing, ...config.extends])));
  }

  for (const parents of Array.from(extendsMap.values())) {
    for (const parent of parents) {
      if (!extendsMap.has(parent)) {
        logger?.debug(`Configuration '${parent}' is extended but never declared`);
        extendsMap.set(parent, []);
      }
    }
  }

  return extendsMap;
}

function intersects(a: ReadonlySet<string>, b: ReadonlySet<string>): boolean {
  for (const value of a) {
    if (b.has(value)) return true;
  }
  return false;
}

/**
 * Group configurations into the sets that must be resolved jointly.
 *
 * Every configuration seeds {itself + what it extends}; seeds sharing a
 * configuration are merged until none overlap. Sets come back sorted, and
 * the list is sorted by each set's first name.
 */
export function configurationGraphs(extendsMap: ReadonlyMap<string, ReadonlyArray<string>>): ConfigurationSet[] {
  let sets: Array<Set<string>> = Array.from(extendsMap.entries()).map(
    ([name, parents]) => new Set([name, ...parents])
  );

  let merged = true;
  while (merged) {
    merged = false;
    outer: for (let i = 0; i < sets.length; i++) {
      for (let j = i + 1; j < sets.length; j++) {
        if (intersects(sets[i], sets[j])) {
          const union = new Set([...sets[i], ...sets[j]]);
          sets = sets.filter((_, index) => index !== i && index !== j);
          sets.push(union);
          merged = true;
          break outer;
        }
      }
    }
  }

  return sets
    .map(set => Array.from(set).sort())
    .sort((a, b) => (a[0] < b[0] ? -1 : a[0] > b[0] ? 1 : 0));
}

/**
 * Map each configuration to its transitive extends closure, itself included.
 */
export function configurationClosures(
  extendsMap: ReadonlyMap<string, ReadonlyArray<string>>
): Map<string, Set<string>> {
  const closures = new Map<string, Set<string>>();

  for (const name of extendsMap.keys()) {
    const closure = new Set<string>([name]);
    const pending = [name];
    while (pending.length > 0) {
      const current = pending.pop();
      if (current === undefined) break;
      for (const parent of extendsMap.get(current) ?? []) {
        if (!closure.has(parent)) {
          closure.add(parent);
          pending.push(parent);
        }
      }
    }
    closures.set(name, closure);
  }

  return closures;
}

export function configurationSetKey(set: ConfigurationSet): string {
  return set.join(',');
}

/**
 * Dependency entries declared in any configuration of the set.
 */
export function dependenciesForSet(
  entries: ReadonlyArray<DependencyEntry>,
  set: ConfigurationSet
): DependencyEntry[] {
  const names = new Set(set);
  return entries.filter(entry => names.has(entry.configuration));
}
