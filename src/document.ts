/**
 * Graph documents: a JSON list of resource nodes loaded into a ResourceGraph.
 *
 * ```json
 * {
 *   "nodes": [
 *     { "kind": "key-vault", "name": "kv", "properties": { "sku": "standard" } },
 *     {
 *       "kind": "certificate",
 *       "name": "tls",
 *       "properties": { "vaultUri": { "$ref": "key-vault/kv", "path": "vaultUri" } }
 *     }
 *   ]
 * }
 * ```
 */

import { readFile } from "node:fs/promises";
import { Type, type Static } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import { ConfigValidationError, formatErrorMessage } from "./errors.js";
import { ResourceGraph } from "./graph/graph.js";
import { isLiteral, isReference, literal, node, parseIdentityKey, ref } from "./graph/identity.js";
import type { PropertyValue, ResourceIdentity } from "./graph/types.js";

// =============================================================================
// Schema
// =============================================================================

const IDENTITY_KEY_PATTERN = "^[^/]+/.+$";

export const graphDocumentNodeSchema = Type.Object(
  {
    kind: Type.String({ minLength: 1 }),
    name: Type.String({ minLength: 1 }),
    properties: Type.Optional(Type.Record(Type.String(), Type.Unknown())),
    dependsOn: Type.Optional(Type.Array(Type.String({ pattern: IDENTITY_KEY_PATTERN }))),
    include: Type.Optional(Type.Boolean()),
    sensitive: Type.Optional(Type.Array(Type.String())),
  },
  { additionalProperties: false },
);

export const graphDocumentSchema = Type.Object({
  nodes: Type.Array(graphDocumentNodeSchema),
});

export type GraphDocument = Static<typeof graphDocumentSchema>;

// =============================================================================
// Loading
// =============================================================================

function invalid(errors: string[]): ConfigValidationError {
  return new ConfigValidationError("Invalid graph document", errors, "InvalidDocument");
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function toIdentity(key: string, at: string): ResourceIdentity {
  const id = parseIdentityKey(key);
  if (!id) throw invalid([`${at}: "${key}" is not a kind/name key`]);
  return id;
}

/**
 * `{ "$ref", "path" }` objects become references. Objects already shaped
 * like a tagged value are wrapped as literals so they stay opaque.
 */
function toPropertyValue(value: unknown, at: string): PropertyValue {
  if (Array.isArray(value)) return value.map((item, i) => toPropertyValue(item, `${at}/${i}`));
  if (!isPlainObject(value)) return value;

  if ("$ref" in value) {
    const keys = Object.keys(value).sort();
    if (typeof value.$ref !== "string" || typeof value.path !== "string" || keys.join(",") !== "$ref,path") {
      throw invalid([`${at}: a reference needs exactly a string "$ref" and a string "path"`]);
    }
    if (value.path.length === 0) throw invalid([`${at}/path: must not be empty`]);
    return ref(toIdentity(value.$ref, `${at}/$ref`), value.path);
  }

  if (isReference(value) || isLiteral(value)) return literal(value);

  const out: Record<string, PropertyValue> = {};
  for (const [key, item] of Object.entries(value)) {
    out[key] = toPropertyValue(item, `${at}/${key}`);
  }
  return out;
}

/**
 * Validate a parsed (or raw JSON text) graph document and build its graph.
 * References are not resolved here; `reconcile()` and `order()` do that.
 *
 * @throws ConfigValidationError with code "InvalidDocument".
 */
export function loadGraphDocument(input: unknown): ResourceGraph {
  let data: unknown = input;
  if (typeof input === "string") {
    try {
      data = JSON.parse(input);
    } catch (err) {
      throw invalid([`/: ${formatErrorMessage(err)}`]);
    }
  }

  if (!Value.Check(graphDocumentSchema, data)) {
    throw invalid([...Value.Errors(graphDocumentSchema, data)].map((e) => `${e.path || "/"}: ${e.message}`));
  }

  const graph = new ResourceGraph();
  data.nodes.forEach((entry, i) => {
    const at = `/nodes/${i}`;
    const properties: Record<string, PropertyValue> = {};
    for (const [key, value] of Object.entries(entry.properties ?? {})) {
      properties[key] = toPropertyValue(value, `${at}/properties/${key}`);
    }
    graph.addNode(
      node({
        kind: entry.kind,
        name: entry.name,
        properties,
        dependsOn: (entry.dependsOn ?? []).map((key, j) => toIdentity(key, `${at}/dependsOn/${j}`)),
        include: entry.include,
        sensitive: entry.sensitive,
      }),
    );
  });
  return graph;
}

/** Read and load a graph document from disk. */
export async function readGraphDocument(file: string): Promise<ResourceGraph> {
  let text: string;
  try {
    text = await readFile(file, "utf-8");
  } catch (err) {
    throw invalid([`${file}: ${formatErrorMessage(err)}`]);
  }
  return loadGraphDocument(text);
}
