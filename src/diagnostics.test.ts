import { describe, it, expect } from "vitest";
import { ProviderDiagnostics, type ProviderCall, type ProviderCallEvent } from "./diagnostics.js";
import { Reconciler } from "./engine/reconciler.js";
import { buildGraph } from "./graph/graph.js";
import { identity, node } from "./graph/identity.js";
import { createReconcilerLogger, createSilentLogger, MemoryTransport } from "./logging/logger.js";
import { ProviderRegistry } from "./provider/registry.js";
import { SimulatedProvider } from "./provider/simulated.js";

const FETCH: ProviderCall = { runId: "run-1", resource: "key-vault/kv", kind: "key-vault", operation: "fetch" };

describe("ProviderDiagnostics", () => {
  it("numbers calls and errors until unsubscribed", async () => {
    const diagnostics = new ProviderDiagnostics(createSilentLogger());
    const events: ProviderCallEvent[] = [];
    const off = diagnostics.on((e) => events.push(e));

    await diagnostics.trace(FETCH, async () => null);
    await expect(
      diagnostics.trace({ ...FETCH, operation: "apply" }, async () => {
        throw Object.assign(new Error("denied"), { code: "Forbidden" });
      }),
    ).rejects.toThrow("denied");
    off();
    await diagnostics.trace({ ...FETCH, operation: "poll", attempt: 1 }, async () => null);

    expect(events.map((e) => [e.type, e.operation, e.seq])).toEqual([
      ["provider.call", "fetch", 1],
      ["provider.error", "apply", 2],
    ]);
    expect(events[1].errorCode).toBe("Forbidden");
    expect(events[1].error).toBe("denied");
  });

  it("scrubs the given values from error text", async () => {
    const diagnostics = new ProviderDiagnostics(createSilentLogger());
    const errors: (string | undefined)[] = [];
    diagnostics.on((e) => errors.push(e.error));

    await expect(
      diagnostics.trace(
        FETCH,
        async () => {
          throw new Error("bad credential test-secret");
        },
        ["test-secret"],
      ),
    ).rejects.toThrow("bad credential test-secret");

    expect(errors).toEqual(["bad credential [REDACTED]"]);
  });

  it("logs a listener that throws and keeps notifying the others", async () => {
    const transport = new MemoryTransport();
    const diagnostics = new ProviderDiagnostics(createReconcilerLogger("test", { level: "warn" }, [transport]));
    const seen: number[] = [];
    diagnostics.on(() => {
      throw new Error("listener broke");
    });
    diagnostics.on((e) => seen.push(e.seq));

    await diagnostics.trace(FETCH, async () => null);

    expect(seen).toEqual([1]);
    expect(transport.messages("warn")).toEqual(["Diagnostics listener threw on fetch of key-vault/kv: listener broke"]);
  });
});

describe("engine diagnostics", () => {
  it("traces every provider call with poll attempts", async () => {
    const diagnostics = new ProviderDiagnostics(createSilentLogger());
    const calls: string[] = [];
    diagnostics.on((e) => calls.push(`${e.operation}:${e.resource}${e.attempt ? `#${e.attempt}` : ""}`));
    const registry = new ProviderRegistry({ "key-vault": new SimulatedProvider("key-vault", { pendingPolls: 1 }) });

    await new Reconciler(registry, {
      logger: createSilentLogger(),
      poll: { initialDelayMs: 1, maxDelayMs: 1 },
      diagnostics,
    }).reconcile(buildGraph([node({ kind: "key-vault", name: "kv" })]), { runId: "run-7" });

    expect(calls).toEqual(["fetch:key-vault/kv", "apply:key-vault/kv", "poll:key-vault/kv#1", "poll:key-vault/kv#2"]);
  });

  it("never carries a sensitive property value in error events", async () => {
    const diagnostics = new ProviderDiagnostics(createSilentLogger());
    const errors: (string | undefined)[] = [];
    diagnostics.on((e) => errors.push(e.error));
    const provider = new SimulatedProvider("key-vault-secret", {
      onApply: (_id, desired) => {
        throw new Error(`bad credential ${String(desired.password)}`);
      },
    });

    const report = await new Reconciler(new ProviderRegistry({ "key-vault-secret": provider }), {
      logger: createSilentLogger(),
      diagnostics,
    }).reconcile(
      buildGraph([
        node({ kind: "key-vault-secret", name: "db", properties: { password: "test-secret" }, sensitive: ["password"] }),
      ]),
    );

    expect(errors).toEqual(["bad credential [REDACTED]"]);
    expect(report.recordOf(identity("key-vault-secret", "db"))?.error?.message).toBe(
      "apply failed: bad credential [REDACTED]",
    );
  });
});
