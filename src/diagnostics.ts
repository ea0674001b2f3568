/**
 * Provider call diagnostics
 *
 * A `ProviderDiagnostics` handed to the engine (`ReconcileOptions.diagnostics`)
 * receives one event per provider call: which node, which operation, which
 * poll attempt, how long it took and, on failure, the scrubbed error.
 */

import { formatErrorMessage } from "./errors.js";
import { createReconcilerLogger, type ReconcilerLogger } from "./logging/logger.js";
import type { ProviderOperation } from "./provider/types.js";
import { redactValues } from "./report/redact.js";

// =============================================================================
// Types
// =============================================================================

export type ProviderCall = {
  runId: string;
  /** `kind/name` of the node the call is made for. */
  resource: string;
  kind: string;
  operation: ProviderOperation;
  /** 1-based poll attempt; only set on `poll`. */
  attempt?: number;
};

export type ProviderCallEvent = ProviderCall & {
  type: "provider.call" | "provider.error";
  seq: number;
  timestamp: number;
  durationMs: number;
  /** Provider error code, when the thrown error carries one. */
  errorCode?: string;
  /** Error text with the node's property values scrubbed. */
  error?: string;
};

export type ProviderCallListener = (event: ProviderCallEvent) => void;

function errorCodeOf(err: unknown): string | undefined {
  if (typeof err === "object" && err !== null && "code" in err && typeof err.code === "string") return err.code;
  return undefined;
}

// =============================================================================
// Recorder
// =============================================================================

export class ProviderDiagnostics {
  private seq = 0;
  private listeners = new Set<ProviderCallListener>();
  private readonly log: ReconcilerLogger;

  constructor(log?: ReconcilerLogger) {
    this.log = log ?? createReconcilerLogger("diagnostics");
  }

  /** Subscribe to provider call events. Returns an unsubscribe function. */
  on(listener: ProviderCallListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /**
   * Run `fn` as `call`, emitting `provider.call` or `provider.error`.
   * `redactions` are replaced in the error text before it leaves the engine.
   */
  async trace<T>(call: ProviderCall, fn: () => Promise<T>, redactions: readonly string[] = []): Promise<T> {
    if (this.listeners.size === 0) return fn();

    const start = Date.now();
    try {
      const result = await fn();
      this.emit({ ...call, type: "provider.call", durationMs: Date.now() - start });
      return result;
    } catch (err) {
      const errorCode = errorCodeOf(err);
      this.emit({
        ...call,
        type: "provider.error",
        durationMs: Date.now() - start,
        ...(errorCode ? { errorCode } : {}),
        error: redactValues(formatErrorMessage(err), redactions),
      });
      throw err;
    }
  }

  private emit(event: Omit<ProviderCallEvent, "seq" | "timestamp">): void {
    const full: ProviderCallEvent = { ...event, seq: ++this.seq, timestamp: Date.now() };
    for (const listener of this.listeners) {
      try {
        listener(full);
      } catch (err) {
        this.log.warn(`Diagnostics listener threw on ${full.operation} of ${full.resource}: ${formatErrorMessage(err)}`);
      }
    }
  }
}
