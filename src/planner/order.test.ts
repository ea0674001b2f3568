/**
 * Dependency Resolver Unit Tests
 */

import { describe, it, expect } from "vitest";
import { order, orderLayers, transitiveDependents, isIndependent, dependsOnTransitively } from "./order.js";
import { ResourceGraph, buildGraph } from "../graph/graph.js";
import { identity, identityKey, node, ref } from "../graph/identity.js";
import type { ResourceNode } from "../graph/types.js";
import { CyclicDependencyError } from "../errors.js";

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

const t = (name: string) => identity("t", name);

/** Node "t/<name>" referencing the `id` output of each dependency. */
function n(name: string, ...deps: string[]): ResourceNode {
  const properties: Record<string, unknown> = {};
  for (const dep of deps) properties[`from_${dep}`] = ref(t(dep), "id");
  return node({ kind: "t", name, properties });
}

const keys = (ids: { kind: string; name: string }[]) => ids.map(identityKey);

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe("order", () => {
  it("places every node after its dependencies", () => {
    const graph = buildGraph([n("c", "a", "b"), n("b"), n("a")]);

    expect(keys(order(graph))).toEqual(["t/a", "t/b", "t/c"]);
  });

  it("picks the smallest ready key first", () => {
    const graph = buildGraph([n("z"), n("y", "z"), n("a")]);

    expect(keys(order(graph))).toEqual(["t/a", "t/z", "t/y"]);
  });

  it("is independent of insertion order", () => {
    const nodes = [n("web", "plan", "vault"), n("plan"), n("vault"), n("secret", "vault"), n("dns", "web")];
    const forward = keys(order(buildGraph(nodes)));
    const reversed = keys(order(buildGraph([...nodes].reverse())));
    const shuffled = keys(order(buildGraph([nodes[3], nodes[0], nodes[4], nodes[2], nodes[1]])));

    expect(forward).toEqual(["t/plan", "t/vault", "t/secret", "t/web", "t/dns"]);
    expect(reversed).toEqual(forward);
    expect(shuffled).toEqual(forward);
  });

  it("honours explicit dependencies", () => {
    const graph = buildGraph([
      node({ kind: "t", name: "a", dependsOn: [t("b")] }),
      node({ kind: "t", name: "b" }),
    ]);

    expect(keys(order(graph))).toEqual(["t/b", "t/a"]);
  });

  it("leaves out excluded nodes", () => {
    const graph = buildGraph([n("a"), node({ kind: "t", name: "b", include: false }), n("c", "a")]);

    expect(keys(order(graph))).toEqual(["t/a", "t/c"]);
  });

  it("resolves references on an unresolved graph", () => {
    const graph = new ResourceGraph().addNode(n("b", "a")).addNode(n("a"));

    expect(keys(order(graph))).toEqual(["t/a", "t/b"]);
  });

  it("names both nodes of a two-node cycle", () => {
    const graph = buildGraph([n("a", "b"), n("b", "a"), n("c")]);

    try {
      order(graph);
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(CyclicDependencyError);
      if (!(err instanceof CyclicDependencyError)) return;
      expect(keys(err.nodes)).toEqual(["t/a", "t/b"]);
      expect(keys(err.cycle)).toEqual(["t/a", "t/b", "t/a"]);
      expect(err.message).toBe("Circular dependency among: t/a, t/b (t/a → t/b → t/a)");
    }
  });

  it("reports a self-reference as a cycle", () => {
    const graph = buildGraph([n("a", "a")]);

    expect(() => order(graph)).toThrow(CyclicDependencyError);
  });

  it("includes nodes stuck behind a cycle", () => {
    const graph = buildGraph([n("a", "b"), n("b", "a"), n("d", "a")]);

    try {
      order(graph);
      expect.unreachable();
    } catch (err) {
      if (!(err instanceof CyclicDependencyError)) throw err;
      expect(keys(err.nodes)).toEqual(["t/a", "t/b", "t/d"]);
    }
  });
});

describe("orderLayers", () => {
  it("groups nodes into waves", () => {
    const graph = buildGraph([n("c", "a", "b"), n("b"), n("a"), n("d", "c"), n("e", "a")]);

    expect(orderLayers(graph).map(keys)).toEqual([["t/a", "t/b"], ["t/c", "t/e"], ["t/d"]]);
  });

  it("throws on a cycle", () => {
    expect(() => orderLayers(buildGraph([n("a", "b"), n("b", "a")]))).toThrow(CyclicDependencyError);
  });
});

describe("reachability", () => {
  const graph = buildGraph([n("a"), n("b", "a"), n("c", "b"), n("x")]);

  it("collects transitive dependents", () => {
    expect(keys(transitiveDependents(graph, t("a")))).toEqual(["t/b", "t/c"]);
    expect(transitiveDependents(graph, t("c"))).toEqual([]);
  });

  it("answers transitive dependency queries", () => {
    expect(dependsOnTransitively(graph, t("c"), t("a"))).toBe(true);
    expect(dependsOnTransitively(graph, t("a"), t("c"))).toBe(false);
  });

  it("detects independent nodes", () => {
    expect(isIndependent(graph, t("a"), t("x"))).toBe(true);
    expect(isIndependent(graph, t("a"), t("c"))).toBe(false);
  });
});
