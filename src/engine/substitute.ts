/**
 * Reference substitution: turns a node's declared properties into concrete
 * desired state using the outputs of already-applied nodes.
 */

import { UnresolvedOutputError } from "../errors.js";
import { identityKey, mapReferences, readPath } from "../graph/identity.js";
import type { OutputBindings, ReferenceValue, ResourceIdentity, ResourceNode } from "../graph/types.js";

export type OutputLookup = (target: ResourceIdentity) => OutputBindings | undefined;

/**
 * Resolve every reference in `node.properties`.
 *
 * @throws UnresolvedOutputError when a referenced node has no bindings yet or
 *   the bindings lack the referenced path.
 */
export function resolveProperties(node: ResourceNode, lookup: OutputLookup): Record<string, unknown> {
  return resolveWith(node, (reference) => {
    const outputs = lookup(reference.target);
    const value = outputs ? readPath(outputs, reference.outputPath) : undefined;
    if (value === undefined) {
      throw new UnresolvedOutputError(node.identity, reference.target, reference.outputPath);
    }
    return value;
  });
}

/** Placeholder written in place of an output a dry run cannot know yet. */
export function pendingPlaceholder(reference: ReferenceValue): string {
  return `<pending:${identityKey(reference.target)}.${reference.outputPath}>`;
}

/**
 * Like `resolveProperties`, but references to outputs that are not known
 * become `<pending:kind/name.path>` placeholders instead of failing.
 */
export function resolvePropertiesForPlan(node: ResourceNode, lookup: OutputLookup): Record<string, unknown> {
  return resolveWith(node, (reference) => {
    const outputs = lookup(reference.target);
    const value = outputs ? readPath(outputs, reference.outputPath) : undefined;
    return value === undefined ? pendingPlaceholder(reference) : value;
  });
}

function resolveWith(node: ResourceNode, resolve: (reference: ReferenceValue) => unknown): Record<string, unknown> {
  const resolved: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(node.properties)) {
    resolved[key] = mapReferences(value, resolve);
  }
  return resolved;
}
