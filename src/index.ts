/**
 * infragraph: a declarative resource graph reconciler.
 */

// Graph
export type {
  IdentityKey,
  LiteralValue,
  OutputBindings,
  PropertyValue,
  ReferenceValue,
  ResourceIdentity,
  ResourceNode,
  ResourceNodeInput,
} from "./graph/types.js";
export {
  collectReferences,
  compareIdentities,
  identity,
  identityKey,
  isLiteral,
  isReference,
  literal,
  node,
  parseIdentityKey,
  ref,
  sameIdentity,
} from "./graph/identity.js";
export { ResourceGraph, buildGraph } from "./graph/graph.js";

// Planner
export { order, orderLayers, transitiveDependents, dependsOnTransitively, isIndependent } from "./planner/order.js";

// Providers
export type { ObservedState, OperationHandle, PollResult, ProviderClient, ProviderFailure } from "./provider/types.js";
export { ProviderRegistry } from "./provider/registry.js";
export {
  SIMULATED_KIND_OUTPUTS,
  SimulatedProvider,
  SimulatedProviderError,
  createSimulatedRegistry,
  type SimulatedFailure,
  type SimulatedProviderOptions,
} from "./provider/simulated.js";

// Engine
export type {
  NodeAction,
  NodeError,
  NodeStatus,
  PropertyChange,
  ReconcileEvent,
  ReconcileEventListener,
  ReconcileEventType,
  ReconcileOptions,
  ReconciliationRecord,
  RollbackOptions,
  RollbackResult,
} from "./engine/types.js";
export { Reconciler, reconcile } from "./engine/reconciler.js";
export { backoffDelay } from "./engine/poll.js";
export { diffProperties, propertiesMatch } from "./engine/compare.js";

// Report
export { ExecutionReport, type NodeSummary, type ReportSummary, type StatusCounts } from "./report/report.js";

// Errors
export {
  ConfigValidationError,
  CyclicDependencyError,
  DanglingReferenceError,
  DuplicateIdentityError,
  PollTimeoutError,
  ProviderError,
  ReconcileError,
  UnresolvedOutputError,
  formatErrorMessage,
  type ReconcileErrorCode,
} from "./errors.js";

// Config, logging, diagnostics
export { getDefaultConfig, resolveConfig, type ReconcilerConfig, type ReconcilerConfigInput } from "./config.js";
export {
  ConsoleTransport,
  MemoryTransport,
  createReconcilerLogger,
  createSilentLogger,
  type LogEntry,
  type LogTransport,
  type ReconcilerLogger,
} from "./logging/logger.js";
export {
  ProviderDiagnostics,
  type ProviderCall,
  type ProviderCallEvent,
  type ProviderCallListener,
} from "./diagnostics.js";

// Documents
export { loadGraphDocument, readGraphDocument, type GraphDocument } from "./document.js";
