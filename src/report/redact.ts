/**
 * Scrubbing of property values and secret outputs from report text.
 */

export const REDACTED = "[REDACTED]";

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/** Every string found in a value, at any depth. */
export function collectStrings(value: unknown, into: string[] = []): string[] {
  if (typeof value === "string") {
    into.push(value);
  } else if (Array.isArray(value)) {
    for (const item of value) collectStrings(item, into);
  } else if (typeof value === "object" && value !== null) {
    for (const item of Object.values(value)) collectStrings(item, into);
  }
  return into;
}

/**
 * Strings an error message must not echo for a node: every sensitive
 * property's strings, plus every other string of at least `minLength`.
 * Top-level numbers and booleans are included in their string form under the same rule.
 */
export function valuesToRedact(
  properties: Record<string, unknown>,
  sensitive: readonly string[],
  minLength: number,
): string[] {
  const values = new Set<string>();
  for (const [key, value] of Object.entries(properties)) {
    const isSensitive = sensitive.includes(key);
    const strings = collectStrings(value);
    if (typeof value === "number" || typeof value === "boolean") strings.push(String(value));
    for (const s of strings) {
      if (s.length === 0) continue;
      if (isSensitive || s.length >= minLength) values.add(s);
    }
  }
  return [...values];
}

/** Replace each value (longest first) with `[REDACTED]`. */
export function redactValues(message: string, values: readonly string[]): string {
  let result = message;
  for (const value of [...values].sort((a, b) => b.length - a.length)) {
    result = result.replace(new RegExp(escapeRegExp(value), "g"), REDACTED);
  }
  return result;
}

/** Copy of `outputs` with keys matching `pattern` masked. */
export function maskSensitiveOutputs(
  outputs: Readonly<Record<string, unknown>>,
  pattern: RegExp,
): Record<string, unknown> {
  const masked: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(outputs)) {
    masked[key] = pattern.test(key) ? REDACTED : value;
  }
  return masked;
}
