/**
 * Reconciler configuration schema (TypeBox) and defaults.
 */

import { Type, type Static } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import { ConfigValidationError } from "./errors.js";

const LogLevel = Type.Union([
  Type.Literal("trace"),
  Type.Literal("debug"),
  Type.Literal("info"),
  Type.Literal("warn"),
  Type.Literal("error"),
  Type.Literal("fatal"),
]);

export const pollConfigSchema = Type.Object({
  initialDelayMs: Type.Integer({ minimum: 0, description: "Wait before the second poll" }),
  multiplier: Type.Number({ minimum: 1, description: "Backoff growth factor" }),
  maxDelayMs: Type.Integer({ minimum: 0, description: "Upper bound for a single wait" }),
  timeoutMs: Type.Integer({ minimum: 0, description: "Budget for one operation; 0 disables the limit" }),
});

export const reconcilerConfigSchema = Type.Object({
  maxConcurrency: Type.Optional(Type.Integer({ minimum: 1, description: "Worker pool size; defaults to the number of root nodes" })),
  concurrencyCap: Type.Integer({ minimum: 1, description: "Upper bound for the derived pool size" }),
  dryRun: Type.Boolean({ description: "Fetch and diff only, never apply" }),
  poll: pollConfigSchema,
  logging: Type.Object({
    level: LogLevel,
    colors: Type.Optional(Type.Boolean()),
    timestamps: Type.Optional(Type.Boolean()),
  }),
  redaction: Type.Object({
    minLength: Type.Integer({ minimum: 1, description: "Shortest property value scrubbed from error text" }),
    sensitiveOutputPattern: Type.String({ description: "Case-insensitive regex for output keys masked in summaries" }),
  }),
});

export type PollConfig = Static<typeof pollConfigSchema>;
export type ReconcilerConfig = Static<typeof reconcilerConfigSchema>;
export type ReconcilerLogLevel = Static<typeof LogLevel>;

/** Partial input accepted by `resolveConfig`: every section optional, every field optional. */
export type ReconcilerConfigInput = {
  maxConcurrency?: number;
  concurrencyCap?: number;
  dryRun?: boolean;
  poll?: Partial<PollConfig>;
  logging?: Partial<ReconcilerConfig["logging"]>;
  redaction?: Partial<ReconcilerConfig["redaction"]>;
};

export const DEFAULT_SENSITIVE_OUTPUT_PATTERN = "secret|password|keyMaterial|privateKey|token|connectionString";

export function getDefaultConfig(): ReconcilerConfig {
  return {
    concurrencyCap: 8,
    dryRun: false,
    poll: {
      initialDelayMs: 2_000,
      multiplier: 2,
      maxDelayMs: 30_000,
      timeoutMs: 30 * 60_000,
    },
    logging: { level: "info" },
    redaction: {
      minLength: 4,
      sensitiveOutputPattern: DEFAULT_SENSITIVE_OUTPUT_PATTERN,
    },
  };
}

/**
 * Merge a partial config over the defaults and validate the result.
 *
 * @throws ConfigValidationError listing each `path: message`.
 */
export function resolveConfig(input: ReconcilerConfigInput = {}): ReconcilerConfig {
  const defaults = getDefaultConfig();
  const merged: ReconcilerConfig = {
    ...defaults,
    ...(input.maxConcurrency !== undefined ? { maxConcurrency: input.maxConcurrency } : {}),
    concurrencyCap: input.concurrencyCap ?? defaults.concurrencyCap,
    dryRun: input.dryRun ?? defaults.dryRun,
    poll: { ...defaults.poll, ...input.poll },
    logging: { ...defaults.logging, ...input.logging },
    redaction: { ...defaults.redaction, ...input.redaction },
  };

  if (!Value.Check(reconcilerConfigSchema, merged)) {
    const errors = [...Value.Errors(reconcilerConfigSchema, merged)].map(
      (e) => `${e.path || "/"}: ${e.message}`,
    );
    throw new ConfigValidationError("Invalid reconciler configuration", errors);
  }

  try {
    new RegExp(merged.redaction.sensitiveOutputPattern, "i");
  } catch (err) {
    throw new ConfigValidationError("Invalid reconciler configuration", [
      `/redaction/sensitiveOutputPattern: ${err instanceof Error ? err.message : String(err)}`,
    ]);
  }

  return merged;
}
