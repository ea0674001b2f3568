/**
 * infragraph: CLI Commands
 *
 * `order`, `plan` and `apply` over a JSON graph document.
 */

import type { Command } from "commander";
import { readGraphDocument } from "../document.js";
import { Reconciler } from "../engine/reconciler.js";
import type { ReconciliationRecord } from "../engine/types.js";
import { formatErrorMessage } from "../errors.js";
import { identityKey } from "../graph/identity.js";
import { createReconcilerLogger, type ReconcilerLogger } from "../logging/logger.js";
import { order, orderLayers } from "../planner/order.js";
import type { ProviderRegistry } from "../provider/registry.js";
import { createSimulatedRegistry } from "../provider/simulated.js";
import type { ExecutionReport } from "../report/report.js";

// =============================================================================
// Types
// =============================================================================

export type CliContext = {
  program: Command;
  logger?: ReconcilerLogger;
  /** Providers for `plan` and `apply --simulate`; the simulated registry by default. */
  createRegistry?: () => ProviderRegistry;
  /** Receives the process exit code; defaults to setting `process.exitCode`. */
  setExitCode?: (code: number) => void;
};

// =============================================================================
// Helpers
// =============================================================================

const STATUS_ICONS: Record<ReconciliationRecord["status"], string> = {
  pending: "·",
  applying: "…",
  applied: "✔",
  planned: "±",
  failed: "✖",
  skipped: "↷",
  cancelled: "⊘",
};

const ACTION_MARKS = { create: "+", update: "~", noop: "=" } as const;

function parsePositiveInt(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 1) throw new Error(`expected a positive integer, got "${value}"`);
  return n;
}

function formatRecord(record: ReconciliationRecord): string {
  const key = identityKey(record.identity);
  const icon = STATUS_ICONS[record.status];
  const action = record.action ? ` (${record.action})` : "";
  const detail = record.error ? ` — ${record.error.message}` : record.reason ? ` — ${record.reason}` : "";
  return `  ${icon} ${key} ${record.status}${action}${detail}`;
}

function printReport(report: ExecutionReport): void {
  const counts = report.counts();
  console.log(`\nRun ${report.runId}${report.dryRun ? " (dry run)" : ""}`);
  for (const record of report.trace()) console.log(formatRecord(record));
  console.log(
    `\n  ${counts.applied} applied, ${counts.planned} planned, ${counts.failed} failed, ${counts.skipped} skipped, ${counts.cancelled} cancelled`,
  );
  if (report.fatalError) console.log(`  Run aborted: ${report.fatalError.message}`);
}

// =============================================================================
// Registration
// =============================================================================

export function registerReconcileCli(ctx: CliContext): void {
  const { program } = ctx;
  const logger = ctx.logger ?? createReconcilerLogger("cli", { level: "warn" });
  const setExitCode =
    ctx.setExitCode ??
    ((code: number) => {
      process.exitCode = code;
    });
  const registryFor = () => ctx.createRegistry?.() ?? createSimulatedRegistry().registry;

  const fail = (err: unknown) => {
    console.error(`Error: ${formatErrorMessage(err)}`);
    setExitCode(2);
  };

  // ── order ─────────────────────────────────────────────────────
  program
    .command("order")
    .description("Print the deterministic apply order of a graph document")
    .argument("<file>", "Path to a graph document (JSON)")
    .option("--json", "Output as JSON")
    .option("--layers", "Group nodes into waves that may run in parallel")
    .action(async (file: string, opts: { json?: boolean; layers?: boolean }) => {
      try {
        const graph = await readGraphDocument(file);
        if (opts.layers) {
          const layers = orderLayers(graph).map((layer) => layer.map(identityKey));
          if (opts.json) {
            console.log(JSON.stringify(layers, null, 2));
            return;
          }
          layers.forEach((layer, i) => console.log(`  wave ${i + 1}: ${layer.join(", ")}`));
          return;
        }

        const keys = order(graph).map(identityKey);
        if (opts.json) {
          console.log(JSON.stringify(keys, null, 2));
          return;
        }
        keys.forEach((key, i) => console.log(`  ${i + 1}. ${key}`));
      } catch (err) {
        fail(err);
      }
    });

  // ── plan ──────────────────────────────────────────────────────
  program
    .command("plan")
    .description("Show what apply would change, without changing anything")
    .argument("<file>", "Path to a graph document (JSON)")
    .option("--json", "Output as JSON")
    .action(async (file: string, opts: { json?: boolean }) => {
      try {
        const graph = await readGraphDocument(file);
        const report = await new Reconciler(registryFor(), { logger }).reconcile(graph, { dryRun: true });

        if (opts.json) {
          console.log(JSON.stringify(report.toJSON(), null, 2));
        } else {
          console.log(`\nPlan:`);
          for (const record of report.trace()) {
            const mark = record.action ? ACTION_MARKS[record.action] : "!";
            console.log(`  ${mark} ${identityKey(record.identity)}${record.error ? ` — ${record.error.message}` : ""}`);
            for (const change of record.changes ?? []) {
              console.log(`      ${change.changeType} ${change.property}`);
            }
          }
        }
        setExitCode(report.exitCode());
      } catch (err) {
        fail(err);
      }
    });

  // ── apply ─────────────────────────────────────────────────────
  program
    .command("apply")
    .description("Reconcile a graph document")
    .argument("<file>", "Path to a graph document (JSON)")
    .option("--simulate", "Run against the in-memory simulated providers")
    .option("--concurrency <n>", "Worker pool size", parsePositiveInt)
    .option("--json", "Output the report as JSON")
    .action(async (file: string, opts: { simulate?: boolean; concurrency?: number; json?: boolean }) => {
      if (!opts.simulate) {
        fail(new Error("apply needs --simulate: no remote providers are bundled"));
        return;
      }

      const controller = new AbortController();
      const onSigint = () => controller.abort();
      process.once("SIGINT", onSigint);

      try {
        const graph = await readGraphDocument(file);
        const report = await new Reconciler(registryFor(), { logger }).reconcile(graph, {
          maxConcurrency: opts.concurrency,
          signal: controller.signal,
        });

        if (opts.json) {
          console.log(JSON.stringify(report.toJSON(), null, 2));
        } else {
          printReport(report);
        }
        setExitCode(report.exitCode());
      } catch (err) {
        fail(err);
      } finally {
        process.removeListener("SIGINT", onSigint);
      }
    });
}
