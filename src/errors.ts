/**
 * Reconciler error taxonomy.
 *
 * Construction errors (duplicate identity, dangling reference, cycle) abort a
 * run before any provider call. Provider errors are scoped to one node.
 * An unresolved output means the scheduler handed out a node too early and
 * is fatal to the whole run.
 */

import type { ResourceIdentity } from "./graph/types.js";
import { identityKey } from "./graph/identity.js";

export type ReconcileErrorCode =
  | "DuplicateIdentity"
  | "DanglingReference"
  | "CyclicDependency"
  | "ProviderError"
  | "Timeout"
  | "UnresolvedOutput"
  | "InvalidConfig"
  | "InvalidDocument";

export class ReconcileError extends Error {
  constructor(message: string, public readonly code: ReconcileErrorCode) {
    super(message);
    this.name = "ReconcileError";
  }
}

export class DuplicateIdentityError extends ReconcileError {
  constructor(public readonly identity: ResourceIdentity) {
    super(`Resource "${identityKey(identity)}" is already declared`, "DuplicateIdentity");
    this.name = "DuplicateIdentityError";
  }
}

export class DanglingReferenceError extends ReconcileError {
  constructor(
    public readonly from: ResourceIdentity,
    public readonly target: ResourceIdentity,
    public readonly reason: "missing" | "excluded",
  ) {
    super(
      reason === "missing"
        ? `Resource "${identityKey(from)}" refers to "${identityKey(target)}", which is not declared`
        : `Resource "${identityKey(from)}" refers to "${identityKey(target)}", which is excluded from this run`,
      "DanglingReference",
    );
    this.name = "DanglingReferenceError";
  }
}

export class CyclicDependencyError extends ReconcileError {
  constructor(
    public readonly nodes: ResourceIdentity[],
    /** One concrete cycle, first node repeated at the end. Empty when unknown. */
    public readonly cycle: ResourceIdentity[] = [],
  ) {
    super(
      cycle.length > 0
        ? `Circular dependency among: ${nodes.map(identityKey).join(", ")} (${cycle.map(identityKey).join(" → ")})`
        : `Circular dependency among: ${nodes.map(identityKey).join(", ")}`,
      "CyclicDependency",
    );
    this.name = "CyclicDependencyError";
  }
}

export class ProviderError extends ReconcileError {
  constructor(
    public readonly identity: ResourceIdentity,
    message: string,
    public readonly providerCode?: string,
    code: ReconcileErrorCode = "ProviderError",
  ) {
    super(message, code);
    this.name = "ProviderError";
  }
}

export class PollTimeoutError extends ProviderError {
  constructor(identity: ResourceIdentity, public readonly timeoutMs: number) {
    super(identity, `Operation on "${identityKey(identity)}" did not complete within ${timeoutMs}ms`, "Timeout", "Timeout");
    this.name = "PollTimeoutError";
  }
}

export class UnresolvedOutputError extends ReconcileError {
  constructor(
    public readonly identity: ResourceIdentity,
    public readonly target: ResourceIdentity,
    public readonly outputPath: string,
  ) {
    super(
      `Cannot resolve "${identityKey(target)}.outputs.${outputPath}" for "${identityKey(identity)}": no such output has been produced`,
      "UnresolvedOutput",
    );
    this.name = "UnresolvedOutputError";
  }
}

export class ConfigValidationError extends ReconcileError {
  constructor(message: string, public readonly errors: string[], code: ReconcileErrorCode = "InvalidConfig") {
    super(`${message}:\n  ${errors.join("\n  ")}`, code);
    this.name = "ConfigValidationError";
  }
}

/**
 * Render any thrown value as a single line.
 */
export function formatErrorMessage(error: unknown): string {
  if (error === null || error === undefined) return "Unknown error";
  if (typeof error === "string") return error;
  if (error instanceof ReconcileError) return `[${error.code}] ${error.message}`;
  if (error instanceof Error) return error.message;

  if (typeof error === "object") {
    const code = "code" in error && typeof error.code === "string" ? error.code : "";
    const message = "message" in error && typeof error.message === "string" ? error.message : JSON.stringify(error);
    return code ? `[${code}] ${message}` : message;
  }

  return String(error);
}
