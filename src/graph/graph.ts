/**
 * Resource Graph
 *
 * Holds declared nodes, materializes implicit dependency edges from
 * references, and answers dependency queries for the planner and engine.
 */

import { DanglingReferenceError, DuplicateIdentityError } from "../errors.js";
import { collectReferences, compareIdentities, identityKey } from "./identity.js";
import type { IdentityKey, ResourceIdentity, ResourceNode } from "./types.js";

export class ResourceGraph {
  private readonly nodesByKey = new Map<IdentityKey, ResourceNode>();
  /** Dependency set per node, explicit entries first, then materialized references. */
  private readonly deps = new Map<IdentityKey, Map<IdentityKey, ResourceIdentity>>();
  private resolved = false;

  /**
   * Declare a node. Fails when the kind/name pair already exists.
   */
  addNode(node: ResourceNode): this {
    const key = identityKey(node.identity);
    if (this.nodesByKey.has(key)) {
      throw new DuplicateIdentityError(node.identity);
    }
    this.nodesByKey.set(key, node);

    const depSet = new Map<IdentityKey, ResourceIdentity>();
    for (const dep of node.dependsOn) {
      depSet.set(identityKey(dep), { ...dep });
    }
    this.deps.set(key, depSet);
    this.resolved = false;
    return this;
  }

  /**
   * Validate every reference and explicit dependency of the included nodes
   * and add the implicit edges references imply.
   */
  resolveReferences(): void {
    for (const node of this.includedNodes()) {
      const key = identityKey(node.identity);
      const depSet = this.deps.get(key);
      if (!depSet) continue;

      // Explicit edges to excluded nodes are dropped; undeclared targets are not.
      for (const dep of node.dependsOn) {
        if (!this.hasNode(dep)) throw new DanglingReferenceError(node.identity, dep, "missing");
      }

      for (const value of Object.values(node.properties)) {
        for (const reference of collectReferences(value)) {
          this.assertIncluded(node.identity, reference.target);
          depSet.set(identityKey(reference.target), { ...reference.target });
        }
      }
    }
    this.resolved = true;
  }

  /** True once `resolveReferences()` has run against the current node set. */
  get isResolved(): boolean {
    return this.resolved;
  }

  get size(): number {
    return this.nodesByKey.size;
  }

  hasNode(id: ResourceIdentity): boolean {
    return this.nodesByKey.has(identityKey(id));
  }

  getNode(id: ResourceIdentity): ResourceNode | undefined {
    return this.nodesByKey.get(identityKey(id));
  }

  /** All declared nodes in insertion order. */
  nodes(): ResourceNode[] {
    return [...this.nodesByKey.values()];
  }

  /** Nodes whose inclusion flag is true, in insertion order. */
  includedNodes(): ResourceNode[] {
    return this.nodes().filter((n) => n.include);
  }

  isIncluded(id: ResourceIdentity): boolean {
    return this.getNode(id)?.include === true;
  }

  /**
   * Direct dependencies of a node among the included nodes, sorted by key.
   * Edges to excluded nodes are dropped.
   */
  dependenciesOf(id: ResourceIdentity): ResourceIdentity[] {
    const depSet = this.deps.get(identityKey(id));
    if (!depSet) return [];
    return [...depSet.values()].filter((d) => this.isIncluded(d)).sort(compareIdentities);
  }

  /** Included nodes that directly depend on `id`, sorted by key. */
  dependentsOf(id: ResourceIdentity): ResourceIdentity[] {
    const target = identityKey(id);
    const out: ResourceIdentity[] = [];
    for (const node of this.includedNodes()) {
      if (this.deps.get(identityKey(node.identity))?.has(target)) {
        out.push(node.identity);
      }
    }
    return out.sort(compareIdentities);
  }

  private assertIncluded(from: ResourceIdentity, target: ResourceIdentity): void {
    const targetNode = this.getNode(target);
    if (!targetNode) throw new DanglingReferenceError(from, target, "missing");
    if (!targetNode.include) throw new DanglingReferenceError(from, target, "excluded");
  }
}

/** Build a graph from a list of nodes, resolving references. */
export function buildGraph(nodes: readonly ResourceNode[]): ResourceGraph {
  const graph = new ResourceGraph();
  for (const n of nodes) graph.addNode(n);
  graph.resolveReferences();
  return graph;
}
