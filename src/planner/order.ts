/**
 * Dependency Resolver
 *
 * Orders the included nodes of a resolved graph so every node follows its
 * dependencies. Among ready nodes the smallest identity key goes first, so
 * two graphs with the same nodes and edges always order identically.
 */

import { CyclicDependencyError } from "../errors.js";
import type { ResourceGraph } from "../graph/graph.js";
import { compareIdentities, identityKey } from "../graph/identity.js";
import type { IdentityKey, ResourceIdentity } from "../graph/types.js";

// =============================================================================
// Adjacency
// =============================================================================

type Adjacency = {
  ids: Map<IdentityKey, ResourceIdentity>;
  inDegree: Map<IdentityKey, number>;
  dependents: Map<IdentityKey, IdentityKey[]>;
};

function buildAdjacency(graph: ResourceGraph): Adjacency {
  if (!graph.isResolved) graph.resolveReferences();

  const ids = new Map<IdentityKey, ResourceIdentity>();
  const inDegree = new Map<IdentityKey, number>();
  const dependents = new Map<IdentityKey, IdentityKey[]>();

  for (const node of graph.includedNodes()) {
    const key = identityKey(node.identity);
    ids.set(key, node.identity);
    inDegree.set(key, 0);
    dependents.set(key, []);
  }

  for (const [key, id] of ids) {
    for (const dep of graph.dependenciesOf(id)) {
      const depKey = identityKey(dep);
      const list = dependents.get(depKey);
      if (!list) continue;
      list.push(key);
      inDegree.set(key, (inDegree.get(key) ?? 0) + 1);
    }
  }

  return { ids, inDegree, dependents };
}

/** Insert into an array kept sorted by identity key. */
function insertSorted(queue: ResourceIdentity[], id: ResourceIdentity): void {
  let lo = 0;
  let hi = queue.length;
  while (lo < hi) {
    const mid = (lo + hi) >>> 1;
    if (compareIdentities(queue[mid], id) < 0) lo = mid + 1;
    else hi = mid;
  }
  queue.splice(lo, 0, id);
}

// =============================================================================
// Ordering
// =============================================================================

/**
 * Topological order of the included nodes (Kahn's algorithm with a
 * smallest-key-first ready queue).
 *
 * @throws CyclicDependencyError naming every node left with unmet dependencies.
 */
export function order(graph: ResourceGraph): ResourceIdentity[] {
  const { ids, inDegree, dependents } = buildAdjacency(graph);

  const ready: ResourceIdentity[] = [];
  for (const [key, degree] of inDegree) {
    const id = ids.get(key);
    if (degree === 0 && id) insertSorted(ready, id);
  }

  const ordered: ResourceIdentity[] = [];
  while (ready.length > 0) {
    const next = ready.shift();
    if (!next) break;
    ordered.push(next);

    for (const dependentKey of dependents.get(identityKey(next)) ?? []) {
      const degree = (inDegree.get(dependentKey) ?? 1) - 1;
      inDegree.set(dependentKey, degree);
      const dependent = ids.get(dependentKey);
      if (degree === 0 && dependent) insertSorted(ready, dependent);
    }
  }

  if (ordered.length < ids.size) {
    throw cycleError(graph, ids, inDegree);
  }

  return ordered;
}

/**
 * Group the topological order into waves. Every node in a wave has all of
 * its dependencies in earlier waves; members of one wave are sorted by key.
 */
export function orderLayers(graph: ResourceGraph): ResourceIdentity[][] {
  const { ids, inDegree, dependents } = buildAdjacency(graph);

  let layer = [...inDegree.entries()]
    .filter(([, degree]) => degree === 0)
    .flatMap(([key]) => {
      const id = ids.get(key);
      return id ? [id] : [];
    })
    .sort(compareIdentities);

  const layers: ResourceIdentity[][] = [];
  let processed = 0;

  while (layer.length > 0) {
    layers.push(layer);
    processed += layer.length;

    const nextLayer: ResourceIdentity[] = [];
    for (const id of layer) {
      for (const dependentKey of dependents.get(identityKey(id)) ?? []) {
        const degree = (inDegree.get(dependentKey) ?? 1) - 1;
        inDegree.set(dependentKey, degree);
        const dependent = ids.get(dependentKey);
        if (degree === 0 && dependent) nextLayer.push(dependent);
      }
    }
    layer = nextLayer.sort(compareIdentities);
  }

  if (processed < ids.size) {
    throw cycleError(graph, ids, inDegree);
  }

  return layers;
}

// =============================================================================
// Reachability
// =============================================================================

/** Every included node that depends on `id`, directly or transitively. Sorted by key. */
export function transitiveDependents(graph: ResourceGraph, id: ResourceIdentity): ResourceIdentity[] {
  const seen = new Map<IdentityKey, ResourceIdentity>();
  const stack = [...graph.dependentsOf(id)];

  while (stack.length > 0) {
    const current = stack.pop();
    if (!current) break;
    const key = identityKey(current);
    if (seen.has(key)) continue;
    seen.set(key, current);
    stack.push(...graph.dependentsOf(current));
  }

  return [...seen.values()].sort(compareIdentities);
}

/** True when `ancestor` is a direct or transitive dependency of `id`. */
export function dependsOnTransitively(
  graph: ResourceGraph,
  id: ResourceIdentity,
  ancestor: ResourceIdentity,
): boolean {
  const target = identityKey(ancestor);
  const visited = new Set<IdentityKey>();
  const stack = [...graph.dependenciesOf(id)];

  while (stack.length > 0) {
    const current = stack.pop();
    if (!current) break;
    const key = identityKey(current);
    if (key === target) return true;
    if (visited.has(key)) continue;
    visited.add(key);
    stack.push(...graph.dependenciesOf(current));
  }

  return false;
}

/** True when neither node depends on the other, directly or transitively. */
export function isIndependent(graph: ResourceGraph, a: ResourceIdentity, b: ResourceIdentity): boolean {
  return !dependsOnTransitively(graph, a, b) && !dependsOnTransitively(graph, b, a);
}

// =============================================================================
// Cycle Reporting
// =============================================================================

function cycleError(
  graph: ResourceGraph,
  ids: Map<IdentityKey, ResourceIdentity>,
  inDegree: Map<IdentityKey, number>,
): CyclicDependencyError {
  const stuck = [...inDegree.entries()]
    .filter(([, degree]) => degree > 0)
    .flatMap(([key]) => {
      const id = ids.get(key);
      return id ? [id] : [];
    })
    .sort(compareIdentities);

  return new CyclicDependencyError(stuck, findCycle(graph, stuck));
}

/**
 * DFS over the stuck nodes for one concrete cycle path, first node repeated
 * at the end (A → B → A). Returns an empty array if none is found.
 */
function findCycle(graph: ResourceGraph, candidates: ResourceIdentity[]): ResourceIdentity[] {
  const WHITE = 0, GRAY = 1, BLACK = 2;
  const color = new Map<IdentityKey, number>();
  for (const id of candidates) color.set(identityKey(id), WHITE);

  const path: ResourceIdentity[] = [];

  const visit = (id: ResourceIdentity): ResourceIdentity[] | null => {
    const key = identityKey(id);
    color.set(key, GRAY);
    path.push(id);

    for (const dep of graph.dependenciesOf(id)) {
      const depKey = identityKey(dep);
      const depColor = color.get(depKey);
      if (depColor === undefined) continue;
      if (depColor === GRAY) {
        const start = path.findIndex((p) => identityKey(p) === depKey);
        return [...path.slice(start), dep];
      }
      if (depColor === WHITE) {
        const found = visit(dep);
        if (found) return found;
      }
    }

    path.pop();
    color.set(key, BLACK);
    return null;
  };

  for (const id of candidates) {
    if (color.get(identityKey(id)) !== WHITE) continue;
    const found = visit(id);
    if (found) return found;
  }

  return [];
}
