/**
 * Reconciliation Engine
 *
 * Drives a resolved resource graph to its desired state:
 * - orders nodes and schedules ready ones on a bounded worker pool
 * - substitutes references with upstream outputs
 * - skips the write when observed state already matches
 * - applies and polls long-running operations with backoff
 * - propagates failure downstream as Skipped, leaves unrelated subgraphs running
 * - honours cancellation (AbortSignal)
 * - offers a caller-invoked, best-effort rollback
 */

import { randomUUID } from "node:crypto";
import { resolveConfig, type ReconcilerConfig } from "../config.js";
import type { ProviderDiagnostics } from "../diagnostics.js";
import {
  PollTimeoutError,
  ProviderError,
  ReconcileError,
  UnresolvedOutputError,
  formatErrorMessage,
} from "../errors.js";
import type { ResourceGraph } from "../graph/graph.js";
import { identityKey } from "../graph/identity.js";
import type { IdentityKey, OutputBindings, ResourceIdentity, ResourceNode } from "../graph/types.js";
import { createReconcilerLogger, type ReconcilerLogger } from "../logging/logger.js";
import { order } from "../planner/order.js";
import type { ProviderRegistry } from "../provider/registry.js";
import type { ObservedState, ProviderClient, ProviderOperation } from "../provider/types.js";
import { ExecutionReport } from "../report/report.js";
import { redactValues, valuesToRedact } from "../report/redact.js";
import { diffProperties, propertiesMatch } from "./compare.js";
import { pollUntilTerminal } from "./poll.js";
import { resolveProperties, resolvePropertiesForPlan } from "./substitute.js";
import { TERMINAL_STATUSES } from "./types.js";
import type {
  NodeError,
  ReconcileEvent,
  ReconcileEventListener,
  ReconcileOptions,
  ReconciliationRecord,
  RollbackOptions,
  RollbackResult,
} from "./types.js";

// =============================================================================
// Run Context
// =============================================================================

type RunContext = {
  runId: string;
  graph: ResourceGraph;
  config: ReconcilerConfig;
  signal?: AbortSignal;
  log: ReconcilerLogger;
  diagnostics?: ProviderDiagnostics;
  records: Map<IdentityKey, ReconciliationRecord>;
  /** Position of each node in the topological order, for ready-queue ordering. */
  position: Map<IdentityKey, number>;
  /** Count of dependencies not yet terminal. */
  waitingOn: Map<IdentityKey, number>;
  ready: ResourceIdentity[];
  maxConcurrency: number;
  startSeq: number;
  completed: number;
  fatal?: NodeError;
};

/** Where a provider call is traced, and what its error text must not contain. */
type CallScope = {
  runId: string;
  diagnostics?: ProviderDiagnostics;
  redactions: readonly string[];
};

/** Shorter sensitive values are left out of log redaction. */
const MIN_SENSITIVE_LOG_LENGTH = 2;

const EMPTY_OUTPUTS: OutputBindings = Object.freeze({});

function deepFreeze<T>(value: T): T {
  if (typeof value === "object" && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const item of Object.values(value)) deepFreeze(item);
  }
  return value;
}

// =============================================================================
// Reconciler
// =============================================================================

export class Reconciler {
  private listeners: ReconcileEventListener[] = [];

  constructor(
    private readonly registry: ProviderRegistry,
    private readonly defaults: ReconcileOptions = {},
  ) {}

  /** Subscribe to run lifecycle events. Returns an unsubscribe function. */
  on(listener: ReconcileEventListener): () => void {
    this.listeners.push(listener);
    return () => {
      this.listeners = this.listeners.filter((l) => l !== listener);
    };
  }

  /**
   * Reconcile every included node of `graph`.
   *
   * Construction errors (duplicate identity, dangling reference, cycle)
   * are thrown before any provider call. Everything after that is captured
   * in the returned report.
   */
  async reconcile(graph: ResourceGraph, options: ReconcileOptions = {}): Promise<ExecutionReport> {
    const merged: ReconcileOptions = { ...this.defaults, ...options };
    const config = resolveConfig({
      maxConcurrency: merged.maxConcurrency,
      concurrencyCap: merged.concurrencyCap,
      dryRun: merged.dryRun,
      poll: { ...this.defaults.poll, ...options.poll },
      logging: { ...this.defaults.logging, ...options.logging },
      redaction: { ...this.defaults.redaction, ...options.redaction },
    });

    graph.resolveReferences();
    const sequence = order(graph);

    const runId = merged.runId ?? randomUUID();
    const started = Date.now();
    const log = (merged.logger ?? createReconcilerLogger("engine", config.logging)).withContext({ runId });

    const ctx: RunContext = {
      runId,
      graph,
      config,
      signal: merged.signal,
      log,
      diagnostics: merged.diagnostics,
      records: new Map(),
      position: new Map(),
      waitingOn: new Map(),
      ready: [],
      maxConcurrency: 1,
      startSeq: 0,
      completed: 0,
    };

    let roots = 0;
    sequence.forEach((id, index) => {
      const key = identityKey(id);
      const depCount = graph.dependenciesOf(id).length;
      ctx.records.set(key, { identity: id, status: "pending", durationMs: 0, pollCount: 0 });
      ctx.position.set(key, index);
      ctx.waitingOn.set(key, depCount);
      if (depCount === 0) {
        roots++;
        ctx.ready.push(id);
      }
    });
    ctx.maxConcurrency = config.maxConcurrency ?? Math.min(Math.max(roots, 1), config.concurrencyCap);

    log.info(`Reconciling ${sequence.length} resources`, {
      concurrency: ctx.maxConcurrency,
      dryRun: config.dryRun,
    });
    this.emit(ctx, "run:start", undefined, `Starting run with ${sequence.length} resources`);

    await this.schedule(ctx);
    this.settleUndispatched(ctx);

    const report = new ExecutionReport({
      runId,
      records: [...ctx.records.values()],
      startedAt: new Date(started).toISOString(),
      completedAt: new Date().toISOString(),
      dryRun: config.dryRun,
      fatalError: ctx.fatal,
      sensitiveOutputPattern: new RegExp(config.redaction.sensitiveOutputPattern, "i"),
    });

    const counts = report.counts();
    const tally = `${counts.applied} applied, ${counts.failed} failed, ${counts.skipped} skipped, ${counts.cancelled} cancelled`;
    if (!report.succeeded()) {
      log.error(`Run failed: ${tally}`);
      this.emit(ctx, "run:failed", undefined, `Run failed: ${tally}`, ctx.fatal?.message);
    } else if (report.cancelled()) {
      log.warn(`Run cancelled: ${tally}`);
      this.emit(ctx, "run:cancelled", undefined, `Run cancelled: ${tally}`);
    } else {
      log.info(`Run complete in ${Date.now() - started}ms: ${tally}`);
      this.emit(ctx, "run:complete", undefined, `Run complete: ${tally}`);
    }

    return report;
  }

  /**
   * Best-effort teardown of the nodes a run applied, dependents first.
   * Failures are collected and do not stop the pass.
   */
  async rollback(graph: ResourceGraph, report: ExecutionReport, options: RollbackOptions = {}): Promise<RollbackResult> {
    const result: RollbackResult = { deleted: [], failed: [] };
    if (report.dryRun) return result;

    const targets = order(graph)
      .filter((id) => {
        const record = report.recordOf(id);
        if (record?.status !== "applied") return false;
        return !(options.onlyChanged && record.action === "noop");
      })
      .reverse();

    const log = (this.defaults.logger ?? createReconcilerLogger("rollback", this.defaults.logging)).withContext({
      runId: report.runId,
    });
    const runId = report.runId;
    const { minLength } = resolveConfig({ redaction: this.defaults.redaction }).redaction;
    this.emitRaw({
      type: "rollback:start",
      runId,
      timestamp: new Date().toISOString(),
      message: `Rolling back ${targets.length} resources`,
    });

    for (const id of targets) {
      if (options.signal?.aborted) break;
      const key = identityKey(id);
      const node = graph.getNode(id);
      const scope: CallScope = {
        runId,
        diagnostics: this.defaults.diagnostics,
        redactions: node
          ? valuesToRedact(
              resolvePropertiesForPlan(node, (target) => report.outputsOf(target)),
              node.sensitive ?? [],
              minLength,
            )
          : [],
      };
      try {
        const client = this.clientFor(id);
        await this.callProvider(scope, id, "delete", () => client.delete(id, options.signal));
        result.deleted.push(id);
        log.info(`Deleted ${key}`);
        this.emitRaw({
          type: "rollback:deleted",
          runId,
          resource: key,
          timestamp: new Date().toISOString(),
          message: `Deleted "${key}"`,
        });
      } catch (err) {
        const message = redactValues(err instanceof Error ? err.message : formatErrorMessage(err), scope.redactions);
        result.failed.push({ identity: id, error: message });
        log.warn(`Failed to delete ${key}: ${message}`);
        this.emitRaw({
          type: "rollback:failed",
          runId,
          resource: key,
          timestamp: new Date().toISOString(),
          message: `Failed to delete "${key}"`,
          error: message,
        });
      }
    }

    return result;
  }

  // ---------------------------------------------------------------------------
  // Scheduling
  // ---------------------------------------------------------------------------

  private halted(ctx: RunContext): boolean {
    return ctx.signal?.aborted === true || ctx.fatal !== undefined;
  }

  private async schedule(ctx: RunContext): Promise<void> {
    const inFlight = new Set<Promise<void>>();

    for (;;) {
      while (!this.halted(ctx) && inFlight.size < ctx.maxConcurrency) {
        const next = ctx.ready.shift();
        if (!next) break;
        if (this.skipIfBlocked(ctx, next)) continue;

        const task: Promise<void> = this.runNode(ctx, next).finally(() => {
          inFlight.delete(task);
        });
        inFlight.add(task);
      }

      if (inFlight.size === 0) break;
      await Promise.race(inFlight);
    }
  }

  /**
   * A ready node whose dependency did not end Applied goes straight to
   * Skipped. Dry runs only block on failures, since nothing is applied.
   */
  private skipIfBlocked(ctx: RunContext, id: ResourceIdentity): boolean {
    for (const dep of ctx.graph.dependenciesOf(id)) {
      const status = ctx.records.get(identityKey(dep))?.status;
      const usable = ctx.config.dryRun ? status === "applied" || status === "planned" : status === "applied";
      if (usable) continue;

      const record = this.recordFor(ctx, id);
      record.status = "skipped";
      record.reason = `dependency "${identityKey(dep)}" is ${status ?? "unknown"}`;
      record.completedAt = new Date().toISOString();
      ctx.log.withContext({ resource: identityKey(id) }).info(`Skipped: ${record.reason}`);
      this.emit(ctx, "node:skipped", id, `Skipped "${identityKey(id)}": ${record.reason}`);
      this.release(ctx, id);
      return true;
    }
    return false;
  }

  /** Mark `id` terminal for scheduling purposes and enqueue dependents that became ready. */
  private release(ctx: RunContext, id: ResourceIdentity): void {
    ctx.completed++;
    for (const dependent of ctx.graph.dependentsOf(id)) {
      const key = identityKey(dependent);
      const remaining = (ctx.waitingOn.get(key) ?? 1) - 1;
      ctx.waitingOn.set(key, remaining);
      if (remaining === 0) this.enqueue(ctx, dependent);
    }
  }

  private enqueue(ctx: RunContext, id: ResourceIdentity): void {
    const pos = ctx.position.get(identityKey(id)) ?? Number.MAX_SAFE_INTEGER;
    const at = ctx.ready.findIndex((r) => (ctx.position.get(identityKey(r)) ?? 0) > pos);
    if (at === -1) ctx.ready.push(id);
    else ctx.ready.splice(at, 0, id);
  }

  /**
   * Nodes never handed to a worker once dispatch stopped. Records are kept
   * in topological order, so every dependency is settled before its dependents.
   * A node behind a Failed, Skipped or Cancelled dependency is Skipped even
   * when the run was cancelled.
   */
  private settleUndispatched(ctx: RunContext): void {
    const cancelled = ctx.signal?.aborted === true;
    for (const record of ctx.records.values()) {
      if (TERMINAL_STATUSES.has(record.status)) continue;
      const blocker = ctx.graph
        .dependenciesOf(record.identity)
        .map((dep) => ({ key: identityKey(dep), status: ctx.records.get(identityKey(dep))?.status }))
        .find((dep) => dep.status === "failed" || dep.status === "skipped" || dep.status === "cancelled");

      if (blocker) {
        record.status = "skipped";
        record.reason = `dependency "${blocker.key}" is ${blocker.status}`;
        this.emit(ctx, "node:skipped", record.identity, `Skipped "${identityKey(record.identity)}": ${record.reason}`);
      } else if (cancelled) {
        record.status = "cancelled";
        record.reason = "run cancelled before dispatch";
        this.emit(ctx, "node:cancelled", record.identity, `Cancelled "${identityKey(record.identity)}" before dispatch`);
      } else {
        record.status = "skipped";
        record.reason = ctx.fatal ? `run aborted: ${ctx.fatal.message}` : "not reached";
        this.emit(ctx, "node:skipped", record.identity, `Skipped "${identityKey(record.identity)}": ${record.reason}`);
      }
      record.completedAt = new Date().toISOString();
    }
  }

  // ---------------------------------------------------------------------------
  // Node Execution
  // ---------------------------------------------------------------------------

  /** Runs one node to a terminal status. Never rejects. */
  private async runNode(ctx: RunContext, id: ResourceIdentity): Promise<void> {
    const key = identityKey(id);
    const record = this.recordFor(ctx, id);
    const node = ctx.graph.getNode(id);
    const start = Date.now();

    record.status = "applying";
    record.startedAt = new Date(start).toISOString();
    record.startSeq = ++ctx.startSeq;

    const sensitive = node?.sensitive ?? [];
    let log = ctx.log.withContext({ resource: key });
    log.info(ctx.config.dryRun ? "Planning" : "Reconciling");
    this.emit(ctx, "node:start", id, `Starting "${key}"`);

    let desired: Record<string, unknown> | undefined;
    try {
      if (!node) throw new ReconcileError(`Resource "${key}" is not declared`, "DanglingReference");
      const client = this.clientFor(id);
      const lookup = (target: ResourceIdentity) => ctx.records.get(identityKey(target))?.outputs;

      desired = ctx.config.dryRun ? resolvePropertiesForPlan(node, lookup) : resolveProperties(node, lookup);
      log = log.withRedactions(
        valuesToRedact(pickKeys(desired, sensitive), sensitive, MIN_SENSITIVE_LOG_LENGTH).filter(
          (value) => value.length >= MIN_SENSITIVE_LOG_LENGTH,
        ),
      );
      const scope: CallScope = {
        runId: ctx.runId,
        diagnostics: ctx.diagnostics,
        redactions: valuesToRedact(desired, sensitive, ctx.config.redaction.minLength),
      };

      const observed = await this.callProvider(scope, id, "fetch", () => client.fetch(id, ctx.signal));

      if (ctx.config.dryRun) {
        this.finishPlanned(ctx, record, node, desired, observed, log);
      } else if (observed && propertiesMatch(desired, observed.properties)) {
        record.action = "noop";
        this.finishApplied(ctx, record, observed.outputs, log, "unchanged");
      } else if (ctx.signal?.aborted) {
        this.finishCancelled(ctx, record, "cancelled before apply", log);
      } else {
        record.action = observed ? "update" : "create";
        record.changes = diffProperties(desired, observed?.properties ?? null, sensitive);
        await this.applyAndWait(ctx, scope, record, client, desired, log);
      }
    } catch (err) {
      if (ctx.signal?.aborted && !(err instanceof ReconcileError)) {
        this.finishCancelled(ctx, record, "cancelled during a provider call", log);
      } else {
        this.finishFailed(ctx, record, err, node, desired, log);
      }
    } finally {
      record.durationMs = Date.now() - start;
      record.completedAt = new Date().toISOString();
      this.release(ctx, id);
    }
  }

  private async applyAndWait(
    ctx: RunContext,
    scope: CallScope,
    record: ReconciliationRecord,
    client: ProviderClient,
    desired: Record<string, unknown>,
    log: ReconcilerLogger,
  ): Promise<void> {
    const id = record.identity;
    const key = identityKey(id);
    log.info(`Applying (${record.action})`, { changes: record.changes?.length ?? 0 });

    const handle = await this.callProvider(scope, id, "apply", () => client.apply(id, desired, ctx.signal));
    const outcome = await pollUntilTerminal(
      (h) => {
        const attempt = ++record.pollCount;
        return this.callProvider(scope, id, "poll", () => client.poll(h, ctx.signal), attempt);
      },
      handle,
      ctx.config.poll,
      {
        signal: ctx.signal,
        onPending: (attempt, nextDelayMs) => {
          log.debug(`Operation pending, next check in ${nextDelayMs}ms`, { attempt });
          this.emit(ctx, "node:poll", id, `"${key}" still in progress (check ${attempt})`);
        },
      },
    );

    switch (outcome.status) {
      case "succeeded":
        this.finishApplied(ctx, record, outcome.outputs, log, "applied");
        return;
      case "failed":
        throw new ProviderError(id, outcome.error.message, outcome.error.code);
      case "timeout":
        throw new PollTimeoutError(id, ctx.config.poll.timeoutMs);
      case "cancelled":
        this.finishCancelled(ctx, record, "cancelled while waiting for the operation", log);
        return;
    }
  }

  private async callProvider<T>(
    scope: CallScope,
    id: ResourceIdentity,
    operation: ProviderOperation,
    fn: () => Promise<T>,
    attempt?: number,
  ): Promise<T> {
    try {
      if (!scope.diagnostics) return await fn();
      return await scope.diagnostics.trace(
        {
          runId: scope.runId,
          resource: identityKey(id),
          kind: id.kind,
          operation,
          ...(attempt !== undefined ? { attempt } : {}),
        },
        fn,
        scope.redactions,
      );
    } catch (err) {
      if (err instanceof ReconcileError) throw err;
      const providerCode =
        typeof err === "object" && err !== null && "code" in err && typeof err.code === "string" ? err.code : undefined;
      throw new ProviderError(id, `${operation} failed: ${err instanceof Error ? err.message : String(err)}`, providerCode);
    }
  }

  private clientFor(id: ResourceIdentity): ProviderClient {
    const client = this.registry.get(id.kind);
    if (!client) {
      throw new ProviderError(id, `No provider registered for kind "${id.kind}"`, "NoProvider");
    }
    return client;
  }

  // ---------------------------------------------------------------------------
  // Terminal Transitions
  // ---------------------------------------------------------------------------

  private finishApplied(
    ctx: RunContext,
    record: ReconciliationRecord,
    outputs: OutputBindings,
    log: ReconcilerLogger,
    how: "applied" | "unchanged",
  ): void {
    record.status = "applied";
    record.outputs = deepFreeze(structuredClone(outputs));
    const key = identityKey(record.identity);
    if (how === "unchanged") {
      log.info("Up to date");
      this.emit(ctx, "node:unchanged", record.identity, `"${key}" already matches desired state`);
    } else {
      log.info("Applied", { polls: record.pollCount });
      this.emit(ctx, "node:applied", record.identity, `Applied "${key}"`);
    }
  }

  private finishPlanned(
    ctx: RunContext,
    record: ReconciliationRecord,
    node: ResourceNode,
    desired: Record<string, unknown>,
    observed: ObservedState | null,
    log: ReconcilerLogger,
  ): void {
    const sensitive = node.sensitive ?? [];
    if (observed && propertiesMatch(desired, observed.properties)) {
      record.action = "noop";
    } else {
      record.action = observed ? "update" : "create";
      record.changes = diffProperties(desired, observed?.properties ?? null, sensitive);
    }
    record.status = record.action === "noop" ? "applied" : "planned";
    record.outputs = observed ? deepFreeze(structuredClone(observed.outputs)) : EMPTY_OUTPUTS;
    log.info(`Plan: ${record.action}`, { changes: record.changes?.length ?? 0 });
    this.emit(ctx, record.action === "noop" ? "node:unchanged" : "node:planned", record.identity, `Plan for "${identityKey(record.identity)}": ${record.action}`);
  }

  private finishCancelled(ctx: RunContext, record: ReconciliationRecord, reason: string, log: ReconcilerLogger): void {
    record.status = "cancelled";
    record.reason = reason;
    log.warn(`Cancelled: ${reason}`);
    this.emit(ctx, "node:cancelled", record.identity, `Cancelled "${identityKey(record.identity)}": ${reason}`);
  }

  private finishFailed(
    ctx: RunContext,
    record: ReconciliationRecord,
    err: unknown,
    node: ResourceNode | undefined,
    desired: Record<string, unknown> | undefined,
    log: ReconcilerLogger,
  ): void {
    const lookup = (target: ResourceIdentity) => ctx.records.get(identityKey(target))?.outputs;
    const properties = desired ?? (node ? resolvePropertiesForPlan(node, lookup) : {});
    const scrub = valuesToRedact(properties, node?.sensitive ?? [], ctx.config.redaction.minLength);

    const error: NodeError =
      err instanceof ReconcileError
        ? {
            code: err.code,
            message: redactValues(err.message, scrub),
            ...(err instanceof ProviderError && err.providerCode ? { providerCode: err.providerCode } : {}),
          }
        : { code: "ProviderError", message: redactValues(formatErrorMessage(err), scrub) };

    record.status = "failed";
    record.error = error;
    if (err instanceof UnresolvedOutputError && !ctx.fatal) {
      ctx.fatal = error;
      log.fatal(`Run aborted: ${error.message}`);
    } else {
      log.error(`Failed: ${error.message}`);
    }
    this.emit(ctx, "node:failed", record.identity, `Failed "${identityKey(record.identity)}"`, error.message);
  }

  // ---------------------------------------------------------------------------
  // Helpers
  // ---------------------------------------------------------------------------

  private recordFor(ctx: RunContext, id: ResourceIdentity): ReconciliationRecord {
    const key = identityKey(id);
    let record = ctx.records.get(key);
    if (!record) {
      record = { identity: id, status: "pending", durationMs: 0, pollCount: 0 };
      ctx.records.set(key, record);
    }
    return record;
  }

  private emit(
    ctx: RunContext,
    type: ReconcileEvent["type"],
    id: ResourceIdentity | undefined,
    message: string,
    error?: string,
  ): void {
    this.emitRaw(
      {
        type,
        runId: ctx.runId,
        resource: id ? identityKey(id) : undefined,
        timestamp: new Date().toISOString(),
        message,
        error,
        progress: { completed: ctx.completed, total: ctx.records.size },
      },
      ctx.log,
    );
  }

  private emitRaw(event: ReconcileEvent, log?: ReconcilerLogger): void {
    for (const listener of this.listeners) {
      try {
        listener(event);
      } catch (err) {
        (log ?? createReconcilerLogger("events", this.defaults.logging)).warn(
          `Event listener threw on ${event.type}: ${formatErrorMessage(err)}`,
        );
      }
    }
  }
}

function pickKeys(properties: Record<string, unknown>, keys: readonly string[]): Record<string, unknown> {
  const picked: Record<string, unknown> = {};
  for (const key of keys) {
    if (key in properties) picked[key] = properties[key];
  }
  return picked;
}

// =============================================================================
// Convenience
// =============================================================================

/**
 * Reconcile a graph in one call.
 */
export async function reconcile(
  graph: ResourceGraph,
  registry: ProviderRegistry,
  options?: ReconcileOptions,
  listener?: ReconcileEventListener,
): Promise<ExecutionReport> {
  const engine = new Reconciler(registry);
  if (listener) engine.on(listener);
  return engine.reconcile(graph, options);
}
