/**
 * Provider Client: the boundary between the engine and a remote control plane.
 *
 * One client per resource kind. Request and response shapes of the real API
 * stay behind this interface; the engine only sees desired properties,
 * observed properties and outputs.
 */

import type { OutputBindings, ResourceIdentity } from "../graph/types.js";

/** Remote state as last observed. */
export type ObservedState = {
  /** Properties as the provider reports them, possibly with provider-assigned extras. */
  properties: Record<string, unknown>;
  /** Values dependents may reference (ids, URIs, generated secrets). */
  outputs: OutputBindings;
};

/** Handle to a (possibly long-running) create or update. */
export type OperationHandle = {
  id: string;
  identity: ResourceIdentity;
};

export type ProviderOperation = "fetch" | "apply" | "poll" | "delete";

export type ProviderFailure = {
  code?: string;
  message: string;
};

export type PollResult =
  | { status: "pending" }
  | { status: "succeeded"; outputs: OutputBindings }
  | { status: "failed"; error: ProviderFailure };

export interface ProviderClient {
  /** Current remote state, or null when the resource does not exist. */
  fetch(identity: ResourceIdentity, signal?: AbortSignal): Promise<ObservedState | null>;
  /** Start a create-or-update towards the desired properties. */
  apply(identity: ResourceIdentity, desired: Record<string, unknown>, signal?: AbortSignal): Promise<OperationHandle>;
  /** Check on an operation started by `apply`. */
  poll(handle: OperationHandle, signal?: AbortSignal): Promise<PollResult>;
  /** Remove the resource. Only used by rollback. */
  delete(identity: ResourceIdentity, signal?: AbortSignal): Promise<void>;
}
