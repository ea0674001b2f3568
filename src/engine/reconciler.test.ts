/**
 * Reconciliation Engine Unit Tests
 */

import { createHash } from "node:crypto";
import { describe, it, expect, vi } from "vitest";
import { Reconciler, reconcile } from "./reconciler.js";
import type { ReconcileEvent, ReconcileOptions } from "./types.js";
import { ResourceGraph, buildGraph } from "../graph/graph.js";
import { identity, identityKey, node, ref } from "../graph/identity.js";
import type { ResourceNode } from "../graph/types.js";
import { createSimulatedRegistry, SimulatedProvider, type SimulatedProviderOptions } from "../provider/simulated.js";
import { ProviderRegistry } from "../provider/registry.js";
import { createReconcilerLogger, createSilentLogger, MemoryTransport, ReconcilerLoggerImpl } from "../logging/logger.js";
import { CyclicDependencyError, DanglingReferenceError } from "../errors.js";

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

const kv = identity("key-vault", "kv");
const appId = identity("managed-identity", "app-id");
const tls = identity("certificate", "tls");
const app = identity("app-registration", "app");

const FAST_POLL = { initialDelayMs: 1, multiplier: 2, maxDelayMs: 4 };

function defaults(extra: ReconcileOptions = {}): ReconcileOptions {
  return { logger: createSilentLogger(), poll: FAST_POLL, ...extra };
}

/** Key vault, managed identity, certificate in the vault, app registration using both. */
function appGraph(overrides: { tls?: Partial<ResourceNode["properties"]> } = {}): ResourceGraph {
  return buildGraph([
    node({ kind: "key-vault", name: "kv", properties: { sku: "standard", location: "westeurope" } }),
    node({ kind: "managed-identity", name: "app-id", properties: { location: "westeurope" } }),
    node({
      kind: "certificate",
      name: "tls",
      properties: { vaultUri: ref(kv, "vaultUri"), subject: "CN=app.example.test", ...overrides.tls },
    }),
    node({
      kind: "app-registration",
      name: "app",
      properties: {
        displayName: "app",
        certificateThumbprint: ref(tls, "thumbprint"),
        identityPrincipal: ref(appId, "principalId"),
      },
    }),
  ]);
}

function simulated(options: Omit<SimulatedProviderOptions, "outputs"> = {}) {
  const { registry, providers } = createSimulatedRegistry(options);
  const provider = (kind: string): SimulatedProvider => {
    const found = providers.get(kind);
    if (!found) throw new Error(`no simulated provider for ${kind}`);
    return found;
  };
  const totalCalls = (operation: "fetch" | "apply" | "poll" | "delete") =>
    [...providers.values()].reduce((sum, p) => sum + p.calls[operation], 0);
  return { registry, provider, totalCalls };
}

/** Registry with a single generic kind "t". */
function generic(options: SimulatedProviderOptions = {}) {
  const provider = new SimulatedProvider("t", options);
  return { provider, registry: new ProviderRegistry({ t: provider }) };
}

function t(name: string, ...deps: string[]): ResourceNode {
  const properties: Record<string, unknown> = { label: name };
  for (const dep of deps) properties[`from_${dep}`] = ref(identity("t", dep), "id");
  return node({ kind: "t", name, properties });
}

function collect(reconciler: Reconciler): ReconcileEvent[] {
  const events: ReconcileEvent[] = [];
  reconciler.on((event) => events.push(event));
  return events;
}

function indexOf(events: ReconcileEvent[], type: ReconcileEvent["type"], resource: string): number {
  return events.findIndex((e) => e.type === type && e.resource === resource);
}

// ---------------------------------------------------------------------------
// End to end
// ---------------------------------------------------------------------------

describe("Reconciler", () => {
  it("provisions a vault, identity, certificate and app registration", async () => {
    const { registry, provider } = simulated();
    const report = await new Reconciler(registry, defaults()).reconcile(appGraph());

    expect(report.succeeded()).toBe(true);
    expect(report.exitCode()).toBe(0);
    expect(report.counts().applied).toBe(4);

    const thumbprint = createHash("sha1").update("certificate:tls").digest("hex").toUpperCase();
    expect(report.outputsOf(tls)?.thumbprint).toBe(thumbprint);
    expect(provider("certificate").stored("tls")?.properties.vaultUri).toBe("https://kv.vault.azure.net/");
    expect(provider("app-registration").stored("app")?.properties).toEqual({
      displayName: "app",
      certificateThumbprint: thumbprint,
      identityPrincipal: report.outputsOf(appId)?.principalId,
    });
  });

  it("records start order with roots first", async () => {
    const { registry } = simulated();
    const report = await new Reconciler(registry, defaults()).reconcile(appGraph());

    expect(report.trace().map((r) => identityKey(r.identity))).toEqual([
      "key-vault/kv",
      "managed-identity/app-id",
      "certificate/tls",
      "app-registration/app",
    ]);
    expect(report.recordOf(kv)?.action).toBe("create");
  });

  it("makes no writes when run again against converged state", async () => {
    const { registry, totalCalls } = simulated();
    const reconciler = new Reconciler(registry, defaults());
    const first = await reconciler.reconcile(appGraph());
    const appliesAfterFirst = totalCalls("apply");

    const second = await reconciler.reconcile(appGraph());

    expect(appliesAfterFirst).toBe(4);
    expect(totalCalls("apply")).toBe(4);
    expect(second.succeeded()).toBe(true);
    expect(second.trace().map((r) => r.action)).toEqual(["noop", "noop", "noop", "noop"]);
    expect(second.outputsOf(tls)).toEqual(first.outputsOf(tls));
  });

  it("returns frozen outputs", async () => {
    const { registry } = simulated();
    const report = await new Reconciler(registry, defaults()).reconcile(appGraph());

    expect(Object.isFrozen(report.outputsOf(kv))).toBe(true);
  });

  // -------------------------------------------------------------------------
  // Failure propagation
  // -------------------------------------------------------------------------

  it("skips dependents of a failed node and finishes unrelated ones", async () => {
    const { registry } = simulated({
      failures: { kv: { on: "apply", message: "quota exceeded", code: "QuotaExceeded" } },
    });
    const report = await new Reconciler(registry, defaults()).reconcile(appGraph());

    expect(report.statusOf(kv)).toBe("failed");
    expect(report.statusOf(appId)).toBe("applied");
    expect(report.statusOf(tls)).toBe("skipped");
    expect(report.statusOf(app)).toBe("skipped");
    expect(report.recordOf(tls)?.reason).toBe('dependency "key-vault/kv" is failed');
    expect(report.recordOf(app)?.reason).toBe('dependency "certificate/tls" is skipped');
    expect(report.recordOf(kv)?.error).toEqual({
      code: "ProviderError",
      providerCode: "QuotaExceeded",
      message: "apply failed: quota exceeded",
    });
    expect(report.succeeded()).toBe(false);
    expect(report.exitCode()).toBe(1);
  });

  it("fails a node whose operation ends failed", async () => {
    const { registry } = simulated({ failures: { tls: { on: "poll", message: "conflict on tls", code: "Conflict" } } });
    const report = await new Reconciler(registry, defaults()).reconcile(appGraph());

    expect(report.recordOf(tls)?.error).toEqual({
      code: "ProviderError",
      providerCode: "Conflict",
      message: "conflict on tls",
    });
    expect(report.statusOf(app)).toBe("skipped");
  });

  it("fails a node with no provider for its kind", async () => {
    const { registry } = simulated();
    const graph = buildGraph([node({ kind: "dns-zone", name: "zone" })]);
    const report = await new Reconciler(registry, defaults()).reconcile(graph);

    expect(report.recordOf(identity("dns-zone", "zone"))?.error).toEqual({
      code: "ProviderError",
      providerCode: "NoProvider",
      message: 'No provider registered for kind "dns-zone"',
    });
  });

  it("times out an operation that never completes", async () => {
    const { registry } = generic({ pendingPolls: 1_000 });
    const report = await new Reconciler(registry, defaults({ poll: { ...FAST_POLL, timeoutMs: 10 } })).reconcile(
      buildGraph([t("a")]),
    );

    expect(report.recordOf(identity("t", "a"))?.error).toEqual({
      code: "Timeout",
      providerCode: "Timeout",
      message: 'Operation on "t/a" did not complete within 10ms',
    });
  });

  it("scrubs property values from error messages and logs", async () => {
    const transport = new MemoryTransport();
    const logger = createReconcilerLogger("test", { level: "trace" }, [transport]);
    const { registry } = simulated({
      failures: { db: { on: "apply", message: "rejected test-secret in westeurope" } },
    });
    const graph = buildGraph([
      node({
        kind: "key-vault-secret",
        name: "db",
        properties: { value: "test-secret", region: "westeurope", tier: "s1" },
        sensitive: ["value"],
      }),
    ]);

    const report = await new Reconciler(registry, defaults({ logger })).reconcile(graph);
    const record = report.recordOf(identity("key-vault-secret", "db"));

    expect(record?.error?.message).toBe("apply failed: rejected [REDACTED] in [REDACTED]");
    expect(record?.changes?.find((c) => c.property === "value")).toEqual({ property: "value", changeType: "added" });
    expect(transport.messages("error")).toEqual([
      "Failed: apply failed: rejected [REDACTED] in [REDACTED]",
      "Run failed: 0 applied, 1 failed, 0 skipped, 0 cancelled",
    ]);
  });

  it("scrubs resolved secret values from node logs and ignores one-character ones", async () => {
    const withRedactions = vi.spyOn(ReconcilerLoggerImpl.prototype, "withRedactions");
    const { registry } = simulated();
    const graph = buildGraph([
      node({ kind: "certificate", name: "tls", properties: { subject: "CN=app.example.test" } }),
      node({
        kind: "key-vault-secret",
        name: "db",
        properties: { value: ref(tls, "keyMaterial"), pin: "7" },
        sensitive: ["value", "pin"],
      }),
    ]);

    try {
      await new Reconciler(registry, defaults()).reconcile(graph);

      const keyMaterial = `simulated-key-material-${createHash("sha256").update("key:tls").digest("hex").slice(0, 16)}`;
      expect(withRedactions.mock.calls).toEqual([[[]], [[keyMaterial]]]);
    } finally {
      withRedactions.mockRestore();
    }
  });

  it("aborts the run when a reference cannot be resolved", async () => {
    const { registry, totalCalls } = simulated();
    const graph = appGraph({ tls: { vaultUri: ref(kv, "missing") } });

    const report = await new Reconciler(registry, defaults({ maxConcurrency: 1 })).reconcile(graph);

    expect(report.statusOf(kv)).toBe("applied");
    expect(report.statusOf(tls)).toBe("failed");
    expect(report.fatalError?.code).toBe("UnresolvedOutput");
    expect(report.statusOf(appId)).toBe("skipped");
    expect(report.recordOf(appId)?.reason).toMatch(/^run aborted: Cannot resolve "key-vault\/kv\.outputs\.missing"/);
    expect(report.succeeded()).toBe(false);
    expect(totalCalls("apply")).toBe(1);
  });

  // -------------------------------------------------------------------------
  // Construction errors
  // -------------------------------------------------------------------------

  it("throws construction errors before any provider call", async () => {
    const { registry, provider } = generic();
    const reconciler = new Reconciler(registry, defaults());

    await expect(reconciler.reconcile(buildGraph([t("a", "b"), t("b", "a")]))).rejects.toBeInstanceOf(
      CyclicDependencyError,
    );
    await expect(reconciler.reconcile(new ResourceGraph().addNode(t("a", "ghost")))).rejects.toBeInstanceOf(
      DanglingReferenceError,
    );
    expect(provider.history).toEqual([]);
  });

  it("rejects invalid configuration", async () => {
    const { registry } = generic();

    await expect(
      new Reconciler(registry, defaults({ maxConcurrency: 0 })).reconcile(buildGraph([t("a")])),
    ).rejects.toThrow("Invalid reconciler configuration");
  });

  // -------------------------------------------------------------------------
  // Scheduling
  // -------------------------------------------------------------------------

  it.each([1, 3])("starts a node only after its dependencies finish (pool of %i)", async (maxConcurrency) => {
    const { registry } = generic({ pendingPolls: 1 });
    const reconciler = new Reconciler(registry, defaults({ maxConcurrency }));
    const events = collect(reconciler);

    const report = await reconciler.reconcile(buildGraph([t("a"), t("b"), t("c", "a", "b")]));

    expect(report.succeeded()).toBe(true);
    const cStart = indexOf(events, "node:start", "t/c");
    expect(cStart).toBeGreaterThan(indexOf(events, "node:applied", "t/a"));
    expect(cStart).toBeGreaterThan(indexOf(events, "node:applied", "t/b"));
  });

  it("runs independent nodes concurrently", async () => {
    const { registry } = generic({ pendingPolls: 1 });
    const reconciler = new Reconciler(registry, defaults({ maxConcurrency: 3 }));
    const events = collect(reconciler);

    await reconciler.reconcile(buildGraph([t("a"), t("b")]));

    expect(indexOf(events, "node:start", "t/b")).toBeLessThan(indexOf(events, "node:applied", "t/a"));
  });

  it("sizes the pool by root count up to the cap", async () => {
    const { registry } = generic({ pendingPolls: 1 });
    const reconciler = new Reconciler(registry, defaults({ concurrencyCap: 3 }));
    let running = 0;
    let peak = 0;
    reconciler.on((event) => {
      if (event.type === "node:start") peak = Math.max(peak, ++running);
      if (event.type === "node:applied") running--;
    });

    const names = ["a", "b", "c", "d", "e", "f"];
    await reconciler.reconcile(buildGraph(names.map((name) => t(name))));

    expect(peak).toBe(3);
  });

  it("runs one at a time with a single root", async () => {
    const { registry } = generic({ pendingPolls: 1 });
    const reconciler = new Reconciler(registry, defaults());
    let running = 0;
    let peak = 0;
    reconciler.on((event) => {
      if (event.type === "node:start") peak = Math.max(peak, ++running);
      if (event.type === "node:applied") running--;
    });

    await reconciler.reconcile(buildGraph([t("root"), t("x", "root"), t("y", "root"), t("z", "root")]));

    expect(peak).toBe(1);
  });

  // -------------------------------------------------------------------------
  // Cancellation
  // -------------------------------------------------------------------------

  it("cancels in-flight and undispatched nodes", async () => {
    const controller = new AbortController();
    const { registry } = generic({ pendingPolls: 2, onApply: () => controller.abort() });

    const report = await new Reconciler(registry, defaults({ maxConcurrency: 1 })).reconcile(
      buildGraph([t("a"), t("b", "a"), t("c")]),
      { signal: controller.signal },
    );

    expect(report.statusOf(identity("t", "a"))).toBe("cancelled");
    expect(report.statusOf(identity("t", "b"))).toBe("skipped");
    expect(report.recordOf(identity("t", "b"))?.reason).toBe('dependency "t/a" is cancelled');
    expect(report.statusOf(identity("t", "c"))).toBe("cancelled");
    expect(report.recordOf(identity("t", "c"))?.reason).toBe("run cancelled before dispatch");
    expect(report.succeeded()).toBe(true);
    expect(report.exitCode()).toBe(130);
  });

  it("skips dependents of a failed node when the run is cancelled afterwards", async () => {
    const controller = new AbortController();
    const { registry } = generic({
      pendingPolls: 1,
      failures: { a: { on: "apply", message: "quota exceeded" } },
      onApply: (id) => {
        if (id.name === "b") controller.abort();
      },
    });

    const report = await new Reconciler(registry, defaults({ maxConcurrency: 1 })).reconcile(
      buildGraph([t("a"), t("z", "a"), t("b")]),
      { signal: controller.signal },
    );

    expect(report.statusOf(identity("t", "a"))).toBe("failed");
    expect(report.statusOf(identity("t", "b"))).toBe("cancelled");
    expect(report.statusOf(identity("t", "z"))).toBe("skipped");
    expect(report.recordOf(identity("t", "z"))?.reason).toBe('dependency "t/a" is failed');
    expect(report.exitCode()).toBe(1);
  });

  // -------------------------------------------------------------------------
  // Dry run
  // -------------------------------------------------------------------------

  it("plans without writing", async () => {
    const { registry, totalCalls } = simulated();
    const report = await new Reconciler(registry, defaults({ dryRun: true })).reconcile(appGraph());

    expect(report.dryRun).toBe(true);
    expect(report.counts().planned).toBe(4);
    expect(totalCalls("apply")).toBe(0);
    expect(report.recordOf(tls)?.changes).toContainEqual({
      property: "vaultUri",
      changeType: "added",
      expectedValue: "<pending:key-vault/kv.vaultUri>",
    });
    expect(report.outputsOf(tls)).toBeUndefined();
    expect(report.exitCode()).toBe(0);
  });

  it("plans no changes once converged", async () => {
    const { registry } = simulated();
    const reconciler = new Reconciler(registry, defaults());
    await reconciler.reconcile(appGraph());

    const plan = await reconciler.reconcile(appGraph(), { dryRun: true });

    expect(plan.trace().map((r) => `${r.status}:${r.action}`)).toEqual([
      "applied:noop",
      "applied:noop",
      "applied:noop",
      "applied:noop",
    ]);
  });

  // -------------------------------------------------------------------------
  // Events
  // -------------------------------------------------------------------------

  it("emits run and node events", async () => {
    const { registry } = generic();
    const reconciler = new Reconciler(registry, defaults({ runId: "run-1" }));
    const events = collect(reconciler);

    await reconciler.reconcile(buildGraph([t("a")]));

    expect(events.map((e) => `${e.type}:${e.resource ?? "-"}`)).toEqual([
      "run:start:-",
      "node:start:t/a",
      "node:applied:t/a",
      "run:complete:-",
    ]);
    expect(events.every((e) => e.runId === "run-1")).toBe(true);
  });

  it("keeps running when a listener throws, and stops calling unsubscribed ones", async () => {
    const { registry } = generic();
    const reconciler = new Reconciler(registry, defaults());
    reconciler.on(() => {
      throw new Error("listener bug");
    });
    const listener = vi.fn();
    const off = reconciler.on(listener);
    off();

    const report = await reconciler.reconcile(buildGraph([t("a")]));

    expect(report.succeeded()).toBe(true);
    expect(listener).not.toHaveBeenCalled();
  });

  it("offers a one-call helper", async () => {
    const { registry } = generic();
    const listener = vi.fn();

    const report = await reconcile(buildGraph([t("a")]), registry, defaults(), listener);

    expect(report.succeeded()).toBe(true);
    expect(listener).toHaveBeenCalledTimes(4);
  });

  // -------------------------------------------------------------------------
  // Rollback
  // -------------------------------------------------------------------------

  describe("rollback", () => {
    it("deletes applied nodes dependents first", async () => {
      const { registry, provider } = simulated();
      const reconciler = new Reconciler(registry, defaults());
      const graph = appGraph();
      const report = await reconciler.reconcile(graph);

      const result = await reconciler.rollback(graph, report);

      expect(result.deleted.map(identityKey)).toEqual([
        "app-registration/app",
        "managed-identity/app-id",
        "certificate/tls",
        "key-vault/kv",
      ]);
      expect(result.failed).toEqual([]);
      expect(provider("key-vault").names()).toEqual([]);
    });

    it("keeps going after a failed delete", async () => {
      const { registry, provider } = simulated();
      const reconciler = new Reconciler(registry, defaults());
      const graph = appGraph();
      const report = await reconciler.reconcile(graph);
      provider("certificate").fail("tls", { on: "delete", message: "locked" });

      const result = await reconciler.rollback(graph, report);

      expect(result.failed).toEqual([{ identity: tls, error: "delete failed: locked" }]);
      expect(result.deleted).toHaveLength(3);
    });

    it("leaves unchanged nodes alone with onlyChanged", async () => {
      const { registry, totalCalls } = simulated();
      const reconciler = new Reconciler(registry, defaults());
      const graph = appGraph();
      await reconciler.reconcile(graph);
      const second = await reconciler.reconcile(graph);

      const result = await reconciler.rollback(graph, second, { onlyChanged: true });

      expect(result.deleted).toEqual([]);
      expect(totalCalls("delete")).toBe(0);
    });

    it("does nothing for a dry run", async () => {
      const { registry, totalCalls } = simulated();
      const reconciler = new Reconciler(registry, defaults());
      const graph = appGraph();
      const plan = await reconciler.reconcile(graph, { dryRun: true });

      await expect(reconciler.rollback(graph, plan)).resolves.toEqual({ deleted: [], failed: [] });
      expect(totalCalls("delete")).toBe(0);
    });
  });
});
