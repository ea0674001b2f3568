/**
 * Simulated Provider
 *
 * In-process stand-in for a remote control plane. Keeps resources in memory,
 * completes operations after a configurable number of pending polls and can
 * be scripted to fail. Used by the test suite and by `infragraph apply --simulate`.
 */

import { createHash } from "node:crypto";
import type { OutputBindings, ResourceIdentity } from "../graph/types.js";
import { ProviderRegistry } from "./registry.js";
import type {
  ObservedState,
  OperationHandle,
  PollResult,
  ProviderClient,
  ProviderFailure,
  ProviderOperation,
} from "./types.js";

// =============================================================================
// Types
// =============================================================================

export type SimulatedOperation = ProviderOperation;

/**
 * A scripted failure for one resource name.
 * - `apply`, `fetch`, `delete`: the call throws.
 * - `poll`: the operation ends with a failed poll result.
 */
export type SimulatedFailure = {
  on: SimulatedOperation;
  message: string;
  code?: string;
};

export type OutputFactory = (identity: ResourceIdentity, properties: Record<string, unknown>) => Record<string, unknown>;

export type SimulatedCall = {
  operation: SimulatedOperation;
  name: string;
};

export type SimulatedProviderOptions = {
  /** Pending poll results returned before an operation completes (default: 0). */
  pendingPolls?: number;
  /** Extra outputs derived from the applied properties. */
  outputs?: OutputFactory;
  /** Scripted failures keyed by resource name. */
  failures?: Record<string, SimulatedFailure>;
  /** Called at the start of every apply, before any failure is raised. */
  onApply?: (identity: ResourceIdentity, desired: Record<string, unknown>) => void | Promise<void>;
};

type StoredResource = {
  properties: Record<string, unknown>;
  outputs: Record<string, unknown>;
};

type PendingOperation = {
  identity: ResourceIdentity;
  desired: Record<string, unknown>;
  remaining: number;
};

/** Thrown by scripted fetch/apply/delete failures. */
export class SimulatedProviderError extends Error {
  constructor(message: string, public readonly code?: string) {
    super(message);
    this.name = "SimulatedProviderError";
  }
}

// =============================================================================
// SimulatedProvider
// =============================================================================

export class SimulatedProvider implements ProviderClient {
  readonly calls: Record<SimulatedOperation, number> = { fetch: 0, apply: 0, poll: 0, delete: 0 };
  readonly history: SimulatedCall[] = [];

  private readonly resources = new Map<string, StoredResource>();
  private readonly operations = new Map<string, PendingOperation>();
  private readonly failures: Map<string, SimulatedFailure>;
  private opSeq = 0;

  constructor(
    public readonly kind: string,
    private readonly options: SimulatedProviderOptions = {},
  ) {
    this.failures = new Map(Object.entries(options.failures ?? {}));
  }

  async fetch(identity: ResourceIdentity): Promise<ObservedState | null> {
    this.track("fetch", identity);
    this.raiseScripted("fetch", identity);

    const stored = this.resources.get(identity.name);
    if (!stored) return null;
    return {
      // provisioningState is provider-assigned and never part of desired state
      properties: { ...structuredClone(stored.properties), provisioningState: "Succeeded" },
      outputs: structuredClone(stored.outputs),
    };
  }

  async apply(identity: ResourceIdentity, desired: Record<string, unknown>): Promise<OperationHandle> {
    this.track("apply", identity);
    await this.options.onApply?.(identity, desired);
    this.raiseScripted("apply", identity);

    const id = `${this.kind}/${identity.name}#${++this.opSeq}`;
    this.operations.set(id, {
      identity: { ...identity },
      desired: structuredClone(desired),
      remaining: this.options.pendingPolls ?? 0,
    });
    return { id, identity: { ...identity } };
  }

  async poll(handle: OperationHandle): Promise<PollResult> {
    this.track("poll", handle.identity);

    const op = this.operations.get(handle.id);
    if (!op) {
      return { status: "failed", error: { code: "OperationNotFound", message: `Unknown operation "${handle.id}"` } };
    }
    if (op.remaining > 0) {
      op.remaining--;
      return { status: "pending" };
    }

    this.operations.delete(handle.id);

    const failure = this.failures.get(op.identity.name);
    if (failure?.on === "poll") {
      const error: ProviderFailure = { message: failure.message, code: failure.code };
      return { status: "failed", error };
    }

    const outputs = {
      id: `/simulated/${this.kind}/${op.identity.name}`,
      ...(this.options.outputs?.(op.identity, op.desired) ?? {}),
    };
    this.resources.set(op.identity.name, { properties: op.desired, outputs });
    return { status: "succeeded", outputs: structuredClone(outputs) };
  }

  async delete(identity: ResourceIdentity): Promise<void> {
    this.track("delete", identity);
    this.raiseScripted("delete", identity);
    this.resources.delete(identity.name);
  }

  // ---------------------------------------------------------------------------
  // Test helpers
  // ---------------------------------------------------------------------------

  /** Pre-populate remote state, as if created outside this run. */
  seed(name: string, properties: Record<string, unknown>, outputs: Record<string, unknown> = {}): void {
    this.resources.set(name, {
      properties: structuredClone(properties),
      outputs: { id: `/simulated/${this.kind}/${name}`, ...structuredClone(outputs) },
    });
  }

  /** Stored state for a resource, or undefined. */
  stored(name: string): { properties: Record<string, unknown>; outputs: OutputBindings } | undefined {
    const stored = this.resources.get(name);
    return stored ? structuredClone(stored) : undefined;
  }

  /** Names of stored resources, sorted. */
  names(): string[] {
    return [...this.resources.keys()].sort();
  }

  fail(name: string, failure: SimulatedFailure): void {
    this.failures.set(name, failure);
  }

  clearFailure(name: string): void {
    this.failures.delete(name);
  }

  resetCalls(): void {
    this.calls.fetch = 0;
    this.calls.apply = 0;
    this.calls.poll = 0;
    this.calls.delete = 0;
    this.history.length = 0;
  }

  private track(operation: SimulatedOperation, identity: ResourceIdentity): void {
    this.calls[operation]++;
    this.history.push({ operation, name: identity.name });
  }

  private raiseScripted(operation: SimulatedOperation, identity: ResourceIdentity): void {
    const failure = this.failures.get(identity.name);
    if (failure && failure.on === operation) {
      throw new SimulatedProviderError(failure.message, failure.code);
    }
  }
}

// =============================================================================
// Built-in Kinds
// =============================================================================

/** Deterministic hex digest of a seed, for fake ids and thumbprints. */
function digest(seed: string, algorithm: "sha1" | "sha256" = "sha256"): string {
  return createHash(algorithm).update(seed).digest("hex");
}

/** Deterministic GUID-shaped id. */
function guid(seed: string): string {
  const h = digest(seed);
  return `${h.slice(0, 8)}-${h.slice(8, 12)}-${h.slice(12, 16)}-${h.slice(16, 20)}-${h.slice(20, 32)}`;
}

function vaultSecretUri(properties: Record<string, unknown>, name: string): string {
  const vaultUri = typeof properties.vaultUri === "string" ? properties.vaultUri : `https://vault.invalid/`;
  return `${vaultUri.endsWith("/") ? vaultUri : `${vaultUri}/`}secrets/${name}`;
}

/** Output factories for the resource kinds the bundled templates declare. */
export const SIMULATED_KIND_OUTPUTS: Record<string, OutputFactory> = {
  "key-vault": (id) => ({
    vaultUri: `https://${id.name}.vault.azure.net/`,
  }),
  "managed-identity": (id) => ({
    principalId: guid(`principal:${id.name}`),
    clientId: guid(`client:${id.name}`),
  }),
  certificate: (id, props) => ({
    thumbprint: digest(`certificate:${id.name}`, "sha1").toUpperCase(),
    keyMaterial: `simulated-key-material-${digest(`key:${id.name}`).slice(0, 16)}`,
    secretId: vaultSecretUri(props, id.name),
  }),
  "app-registration": (id) => ({
    appId: guid(`app:${id.name}`),
    objectId: guid(`object:${id.name}`),
  }),
  "app-service-plan": (id) => ({
    planId: `/simulated/serverfarms/${id.name}`,
  }),
  "web-app": (id) => ({
    defaultHostName: `${id.name}.azurewebsites.net`,
  }),
  "key-vault-secret": (id, props) => ({
    secretUri: vaultSecretUri(props, id.name),
  }),
};

/**
 * A registry with one simulated provider per built-in kind.
 * Providers are returned alongside so callers can inspect call counts.
 */
export function createSimulatedRegistry(options: Omit<SimulatedProviderOptions, "outputs"> = {}): {
  registry: ProviderRegistry;
  providers: Map<string, SimulatedProvider>;
} {
  const registry = new ProviderRegistry();
  const providers = new Map<string, SimulatedProvider>();

  for (const [kind, outputs] of Object.entries(SIMULATED_KIND_OUTPUTS)) {
    const provider = new SimulatedProvider(kind, { ...options, outputs });
    registry.register(kind, provider);
    providers.set(kind, provider);
  }

  return { registry, providers };
}
