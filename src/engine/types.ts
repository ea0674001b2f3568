/**
 * Reconciliation Engine: type definitions.
 */

import type { ReconcilerConfigInput } from "../config.js";
import type { ProviderDiagnostics } from "../diagnostics.js";
import type { ReconcilerLogger } from "../logging/logger.js";
import type { IdentityKey, OutputBindings, ResourceIdentity } from "../graph/types.js";

// =============================================================================
// Node State
// =============================================================================

/** Lifecycle status of one node during a run. */
export type NodeStatus =
  | "pending"
  | "applying"
  | "applied"
  | "failed"
  | "skipped"
  | "cancelled"
  /** Dry runs only: a create or update that would be made. */
  | "planned";

export const TERMINAL_STATUSES: ReadonlySet<NodeStatus> = new Set([
  "applied",
  "failed",
  "skipped",
  "cancelled",
  "planned",
]);

/** What the engine did (or, in a dry run, would do) for a node. */
export type NodeAction = "create" | "update" | "noop";

export type PropertyChange = {
  property: string;
  changeType: "added" | "modified" | "removed";
  /** Omitted for sensitive properties. */
  expectedValue?: unknown;
  /** Omitted for sensitive properties. */
  actualValue?: unknown;
};

export type NodeError = {
  /** Error taxonomy code, e.g. "ProviderError", "Timeout". */
  code: string;
  /** Provider-supplied code, when any. */
  providerCode?: string;
  /** Message with property values scrubbed. */
  message: string;
};

/**
 * Per-node outcome. Created Pending at run start; written only by the
 * worker that owns the node.
 */
export type ReconciliationRecord = {
  identity: ResourceIdentity;
  status: NodeStatus;
  action?: NodeAction;
  changes?: PropertyChange[];
  error?: NodeError;
  outputs?: OutputBindings;
  /** Why a node was skipped or cancelled. */
  reason?: string;
  startedAt?: string;
  completedAt?: string;
  durationMs: number;
  /** Number of poll calls made for this node. */
  pollCount: number;
  /** Dispatch sequence number; undefined for nodes never started. */
  startSeq?: number;
};

// =============================================================================
// Options
// =============================================================================

export type ReconcileOptions = ReconcilerConfigInput & {
  /** Cancels the run: no new dispatch, in-flight polls stop after their current check. */
  signal?: AbortSignal;
  /** Logger; defaults to a console logger at the configured level. */
  logger?: ReconcilerLogger;
  /** Run identifier for logs and events; random when omitted. */
  runId?: string;
  /** Receives one event per provider call. */
  diagnostics?: ProviderDiagnostics;
};

// =============================================================================
// Events
// =============================================================================

export type ReconcileEventType =
  | "run:start"
  | "run:complete"
  | "run:failed"
  | "run:cancelled"
  | "node:start"
  | "node:unchanged"
  | "node:poll"
  | "node:applied"
  | "node:planned"
  | "node:failed"
  | "node:skipped"
  | "node:cancelled"
  | "rollback:start"
  | "rollback:deleted"
  | "rollback:failed";

export type ReconcileEvent = {
  type: ReconcileEventType;
  runId: string;
  resource?: IdentityKey;
  timestamp: string;
  message: string;
  error?: string;
  progress?: { completed: number; total: number };
};

export type ReconcileEventListener = (event: ReconcileEvent) => void;

// =============================================================================
// Rollback
// =============================================================================

export type RollbackOptions = {
  /** Delete only nodes this run created or updated, not ones found unchanged. */
  onlyChanged?: boolean;
  signal?: AbortSignal;
};

export type RollbackResult = {
  deleted: ResourceIdentity[];
  failed: { identity: ResourceIdentity; error: string }[];
};
