/**
 * Resource Graph: type definitions.
 */

// =============================================================================
// Identity
// =============================================================================

/** Unique identity of a declared resource: kind + name. */
export type ResourceIdentity = {
  /** Resource kind, e.g. "key-vault". Selects the provider client. */
  kind: string;
  /** Name, unique within its kind. */
  name: string;
};

/** Canonical string form of an identity: `kind/name`. */
export type IdentityKey = `${string}/${string}`;

// =============================================================================
// Property Values
// =============================================================================

/** A concrete value written as-is into the desired state. */
export type LiteralValue = {
  type: "literal";
  value: unknown;
};

/**
 * A value taken from another node's outputs once that node is applied.
 * `outputPath` is dotted: "vaultUri", "credentials.thumbprint".
 */
export type ReferenceValue = {
  type: "reference";
  target: ResourceIdentity;
  outputPath: string;
};

/**
 * A property is either a tagged literal/reference or a plain value.
 * Plain arrays and objects may contain references at any depth.
 */
export type PropertyValue = LiteralValue | ReferenceValue | unknown;

// =============================================================================
// Nodes
// =============================================================================

/** Outputs produced by a node after it reaches Applied. */
export type OutputBindings = Readonly<Record<string, unknown>>;

export type ResourceNode = {
  identity: ResourceIdentity;
  /** Desired-state properties. */
  properties: Record<string, PropertyValue>;
  /** Explicit dependencies. Implicit ones come from references. */
  dependsOn: ResourceIdentity[];
  /** When false the node and its outbound edges are dropped from the run. */
  include: boolean;
  /** Property keys whose values must never be echoed in logs or reports. */
  sensitive?: string[];
};

/** Input accepted by the `node()` builder. */
export type ResourceNodeInput = {
  kind: string;
  name: string;
  properties?: Record<string, PropertyValue>;
  dependsOn?: ResourceIdentity[];
  include?: boolean;
  sensitive?: string[];
};
