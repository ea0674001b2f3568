/**
 * Identity keys, property value builders and reference walking.
 */

import type {
  IdentityKey,
  LiteralValue,
  PropertyValue,
  ReferenceValue,
  ResourceIdentity,
  ResourceNode,
  ResourceNodeInput,
} from "./types.js";

// =============================================================================
// Identities
// =============================================================================

export function identity(kind: string, name: string): ResourceIdentity {
  return { kind, name };
}

export function identityKey(id: ResourceIdentity): IdentityKey {
  return `${id.kind}/${id.name}`;
}

/** Parse `kind/name`. The name may itself contain slashes. */
export function parseIdentityKey(key: string): ResourceIdentity | null {
  const slash = key.indexOf("/");
  if (slash <= 0 || slash === key.length - 1) return null;
  return { kind: key.slice(0, slash), name: key.slice(slash + 1) };
}

/** Ascending order of identity keys, used for every deterministic tie-break. */
export function compareIdentities(a: ResourceIdentity, b: ResourceIdentity): number {
  const ka = identityKey(a);
  const kb = identityKey(b);
  if (ka < kb) return -1;
  if (ka > kb) return 1;
  return 0;
}

export function sameIdentity(a: ResourceIdentity, b: ResourceIdentity): boolean {
  return a.kind === b.kind && a.name === b.name;
}

// =============================================================================
// Builders
// =============================================================================

export function literal(value: unknown): LiteralValue {
  return { type: "literal", value };
}

export function ref(target: ResourceIdentity, outputPath: string): ReferenceValue {
  return { type: "reference", target: { ...target }, outputPath };
}

export function node(input: ResourceNodeInput): ResourceNode {
  return {
    identity: { kind: input.kind, name: input.name },
    properties: input.properties ?? {},
    dependsOn: (input.dependsOn ?? []).map((d) => ({ ...d })),
    include: input.include ?? true,
    sensitive: input.sensitive,
  };
}

// =============================================================================
// Guards
// =============================================================================

function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== "object" || value === null || Array.isArray(value)) return false;
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

export function isReference(value: unknown): value is ReferenceValue {
  if (!isPlainObject(value) || value.type !== "reference") return false;
  const target = value.target;
  return (
    isPlainObject(target) &&
    typeof target.kind === "string" &&
    typeof target.name === "string" &&
    typeof value.outputPath === "string"
  );
}

export function isLiteral(value: unknown): value is LiteralValue {
  return isPlainObject(value) && value.type === "literal" && "value" in value;
}

// =============================================================================
// Walking
// =============================================================================

/**
 * Collect every reference inside a property value, at any depth.
 * Tagged literals are opaque: their contents are never scanned.
 */
export function collectReferences(value: PropertyValue, into: ReferenceValue[] = []): ReferenceValue[] {
  if (isReference(value)) {
    into.push(value);
  } else if (isLiteral(value)) {
    // opaque
  } else if (Array.isArray(value)) {
    for (const item of value) collectReferences(item, into);
  } else if (isPlainObject(value)) {
    for (const item of Object.values(value)) collectReferences(item, into);
  }
  return into;
}

/**
 * Rebuild a property value with every reference replaced by `resolve(ref)`
 * and every tagged literal unwrapped.
 */
export function mapReferences(value: PropertyValue, resolve: (reference: ReferenceValue) => unknown): unknown {
  if (isReference(value)) return resolve(value);
  if (isLiteral(value)) return value.value;
  if (Array.isArray(value)) return value.map((item) => mapReferences(item, resolve));
  if (isPlainObject(value)) {
    const out: Record<string, unknown> = {};
    for (const [key, item] of Object.entries(value)) {
      out[key] = mapReferences(item, resolve);
    }
    return out;
  }
  return value;
}

/** Read a dotted path ("a.b.c") out of a nested record. */
export function readPath(source: Readonly<Record<string, unknown>>, path: string): unknown {
  let current: unknown = source;
  for (const segment of path.split(".")) {
    if (!isPlainObject(current) && !Array.isArray(current)) return undefined;
    current = Array.isArray(current) ? current[Number(segment)] : current[segment];
    if (current === undefined) return undefined;
  }
  return current;
}
