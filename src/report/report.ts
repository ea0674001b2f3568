/**
 * Execution Report
 *
 * Outcome of one reconciliation run: a record per included node, the
 * run-level fatal error (if any), and the views callers need to decide an
 * exit code or wire outputs into something else.
 */

import { compareIdentities, identityKey } from "../graph/identity.js";
import type { IdentityKey, OutputBindings, ResourceIdentity } from "../graph/types.js";
import type { NodeError, NodeStatus, ReconciliationRecord } from "../engine/types.js";
import { maskSensitiveOutputs } from "./redact.js";

export type NodeSummary = {
  status: NodeStatus;
  outputs: Record<string, unknown>;
  error: NodeError | null;
};

export type ReportSummary = Record<IdentityKey, NodeSummary>;

export type StatusCounts = Record<NodeStatus, number>;

export type ExecutionReportInit = {
  runId: string;
  records: readonly ReconciliationRecord[];
  startedAt: string;
  completedAt: string;
  dryRun: boolean;
  fatalError?: NodeError;
  sensitiveOutputPattern: RegExp;
};

export class ExecutionReport {
  readonly runId: string;
  readonly startedAt: string;
  readonly completedAt: string;
  readonly dryRun: boolean;
  /** Set when the run was aborted by an engine invariant violation. */
  readonly fatalError?: NodeError;

  private readonly records: ReadonlyMap<IdentityKey, ReconciliationRecord>;
  private readonly sensitiveOutputPattern: RegExp;

  constructor(init: ExecutionReportInit) {
    this.runId = init.runId;
    this.startedAt = init.startedAt;
    this.completedAt = init.completedAt;
    this.dryRun = init.dryRun;
    this.fatalError = init.fatalError;
    this.sensitiveOutputPattern = init.sensitiveOutputPattern;
    this.records = new Map(init.records.map((r) => [identityKey(r.identity), Object.freeze({ ...r })]));
  }

  /** True iff no node failed. */
  succeeded(): boolean {
    for (const record of this.records.values()) {
      if (record.status === "failed") return false;
    }
    return true;
  }

  /** True iff any node ended cancelled. */
  cancelled(): boolean {
    for (const record of this.records.values()) {
      if (record.status === "cancelled") return true;
    }
    return false;
  }

  /** Process exit code for a CLI: 1 on failure, 130 on cancellation, else 0. */
  exitCode(): number {
    if (!this.succeeded()) return 1;
    if (this.cancelled()) return 130;
    return 0;
  }

  /** Outputs of an applied node; undefined for any other status. */
  outputsOf(id: ResourceIdentity): OutputBindings | undefined {
    const record = this.records.get(identityKey(id));
    return record?.status === "applied" ? record.outputs : undefined;
  }

  recordOf(id: ResourceIdentity): ReconciliationRecord | undefined {
    return this.records.get(identityKey(id));
  }

  statusOf(id: ResourceIdentity): NodeStatus | undefined {
    return this.records.get(identityKey(id))?.status;
  }

  /**
   * Every record: started nodes in dispatch order, then the rest by key.
   */
  trace(): ReconciliationRecord[] {
    const all = [...this.records.values()];
    const started = all
      .filter((r) => r.startSeq !== undefined)
      .sort((a, b) => (a.startSeq ?? 0) - (b.startSeq ?? 0));
    const rest = all
      .filter((r) => r.startSeq === undefined)
      .sort((a, b) => compareIdentities(a.identity, b.identity));
    return [...started, ...rest];
  }

  counts(): StatusCounts {
    const counts: StatusCounts = {
      pending: 0,
      applying: 0,
      applied: 0,
      failed: 0,
      skipped: 0,
      cancelled: 0,
      planned: 0,
    };
    for (const record of this.records.values()) counts[record.status]++;
    return counts;
  }

  /**
   * Machine-readable `kind/name → { status, outputs, error }`, keys sorted.
   * Outputs whose names look secret are masked.
   */
  summary(): ReportSummary {
    const summary: ReportSummary = {};
    const keys = [...this.records.keys()].sort();
    for (const key of keys) {
      const record = this.records.get(key);
      if (!record) continue;
      summary[key] = {
        status: record.status,
        outputs: record.outputs ? maskSensitiveOutputs(record.outputs, this.sensitiveOutputPattern) : {},
        error: record.error ?? null,
      };
    }
    return summary;
  }

  toJSON(): {
    runId: string;
    startedAt: string;
    completedAt: string;
    dryRun: boolean;
    succeeded: boolean;
    fatalError: NodeError | null;
    counts: StatusCounts;
    resources: ReportSummary;
  } {
    return {
      runId: this.runId,
      startedAt: this.startedAt,
      completedAt: this.completedAt,
      dryRun: this.dryRun,
      succeeded: this.succeeded(),
      fatalError: this.fatalError ?? null,
      counts: this.counts(),
      resources: this.summary(),
    };
  }
}
