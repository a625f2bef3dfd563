import type { Artifact, ResolvedGraph, ResolvedModule } from '../../types/index.js';

export function moduleKey(module: { organization: string; name: string }): string {
  return `${module.organization}:${module.name}`;
}

/**
 * Classifiers the root dependencies of a graph ask for explicitly, per module.
 */
export function requestedClassifiers(graph: ResolvedGraph): Map<string, Set<string>> {
  const requested = new Map<string, Set<string>>();
  for (const { dependency } of graph.rootDependencies) {
    const classifier = dependency.attributes.classifier;
    if (!classifier) continue;
    const key = moduleKey(dependency.module);
    const set = requested.get(key) ?? new Set<string>();
    set.add(classifier);
    requested.set(key, set);
  }
  return requested;
}

/**
 * Artifacts of a module under a classifier selection. Without a selection
 * only the default artifact and explicitly requested classifiers qualify.
 */
export function selectArtifacts(
  module: ResolvedModule,
  classifiers: ReadonlyArray<string> | null,
  requested: ReadonlySet<string> = new Set()
): Artifact[] {
  if (classifiers === null) {
    return module.artifacts.filter(a => a.classifier === '' || requested.has(a.classifier));
  }
  const wanted = new Set(classifiers);
  return module.artifacts.filter(a => wanted.has(a.classifier));
}

/**
 * Union of the selected artifacts of every graph, deduplicated by url and
 * kept in first-seen order.
 */
export function collectArtifacts(
  graphs: ReadonlyArray<ResolvedGraph>,
  classifiers: ReadonlyArray<string> | null
): Artifact[] {
  const byUrl = new Map<string, Artifact>();
  for (const graph of graphs) {
    const requested = requestedClassifiers(graph);
    for (const module of graph.modules) {
      for (const artifact of selectArtifacts(module, classifiers, requested.get(moduleKey(module.module)))) {
        if (!byUrl.has(artifact.url)) {
          byUrl.set(artifact.url, artifact);
        }
      }
    }
  }
  return Array.from(byUrl.values());
}
