/**
 * @module @plugwork/plugin-runtime/resolver
 * Load order resolution between plugins
 */

import { UnresolvableDependencyGraphError, type DependencyMap, type DependencySpec } from '@plugwork/plugin-contracts';

function isSubset(names: ReadonlySet<string>, resolved: ReadonlySet<string>): boolean {
  for (const name of names) {
    if (!resolved.has(name)) {
      return false;
    }
  }
  return true;
}

function usedCandidates(deps: DependencySpec, candidates: DependencyMap): Set<string> {
  return new Set([...deps.used].filter((name) => candidates.has(name)));
}

/**
 * Split candidates into layers that can be loaded one after another.
 *
 * Each layer holds the candidates whose required and used dependencies are
 * all in earlier layers. When no candidate qualifies, the check is relaxed to
 * required dependencies only, so a soft dependency never blocks loading. A
 * used dependency that is not a candidate counts as met.
 *
 * The order of names inside a layer is undefined and should not be relied
 * upon. If a plugin must come before another, declare a (soft) dependency.
 *
 * @throws UnresolvableDependencyGraphError on a cycle of required
 *   dependencies, or a required dependency that is not a candidate
 */
export function resolveDependencyLayers(candidates: DependencyMap): string[][] {
  const pending = new Map<string, DependencySpec>();
  for (const [name, deps] of candidates) {
    pending.set(name, { required: deps.required, used: usedCandidates(deps, candidates) });
  }
  const resolved = new Set<string>();
  const layers: string[][] = [];

  while (pending.size > 0) {
    // Both hard and soft dependencies met
    let ready = [...pending].filter(([, deps]) => isSubset(deps.required, resolved) && isSubset(deps.used, resolved));
    if (ready.length === 0) {
      // Hard dependencies met
      ready = [...pending].filter(([, deps]) => isSubset(deps.required, resolved));
    }
    if (ready.length === 0) {
      throw new UnresolvableDependencyGraphError(describeUnresolved(pending, resolved));
    }

    const layer = ready.map(([name]) => name);
    for (const name of layer) {
      resolved.add(name);
      pending.delete(name);
    }
    layers.push(layer);
  }

  return layers;
}

/**
 * Flattened {@link resolveDependencyLayers}.
 */
export function resolveDependencies(candidates: DependencyMap): string[] {
  return resolveDependencyLayers(candidates).flat();
}

function describeUnresolved(
  pending: ReadonlyMap<string, DependencySpec>,
  resolved: ReadonlySet<string>
): Record<string, string[]> {
  const unresolved: Record<string, string[]> = {};
  for (const [name, deps] of pending) {
    unresolved[name] = [...deps.required].filter((dep) => !resolved.has(dep)).sort();
  }
  return unresolved;
}
