/**
 * Desired vs observed comparison.
 *
 * Desired state is a subset of observed state: keys the provider adds on
 * its own (ids, provisioning state, timestamps) are ignored at every object
 * level. Arrays must match element for element.
 */

import type { PropertyChange } from "./types.js";

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** True when every desired value is present and equal in `observed`. */
export function matchesDesired(desired: unknown, observed: unknown): boolean {
  if (Array.isArray(desired)) {
    if (!Array.isArray(observed) || observed.length !== desired.length) return false;
    return desired.every((item, i) => matchesDesired(item, observed[i]));
  }
  if (isRecord(desired)) {
    if (!isRecord(observed)) return false;
    return Object.entries(desired).every(([key, value]) => key in observed && matchesDesired(value, observed[key]));
  }
  return Object.is(desired, observed);
}

export function propertiesMatch(desired: Record<string, unknown>, observed: Record<string, unknown>): boolean {
  return matchesDesired(desired, observed);
}

/**
 * Property-level differences between desired and observed state.
 * Values of keys listed in `sensitive` (top-level) are left out of the result.
 */
export function diffProperties(
  desired: Record<string, unknown>,
  observed: Record<string, unknown> | null,
  sensitive: readonly string[] = [],
): PropertyChange[] {
  const changes: PropertyChange[] = [];
  collect(desired, observed ?? {}, "", changes);

  return changes.map((change) => {
    const topLevel = change.property.split(".")[0];
    if (!sensitive.includes(topLevel)) return change;
    return { property: change.property, changeType: change.changeType };
  });
}

function collect(
  desired: Record<string, unknown>,
  observed: Record<string, unknown>,
  prefix: string,
  changes: PropertyChange[],
): void {
  for (const [key, expectedValue] of Object.entries(desired)) {
    const path = prefix ? `${prefix}.${key}` : key;

    if (!(key in observed)) {
      changes.push({ property: path, changeType: "added", expectedValue });
      continue;
    }

    const actualValue = observed[key];
    if (isRecord(expectedValue) && isRecord(actualValue)) {
      collect(expectedValue, actualValue, path, changes);
    } else if (!matchesDesired(expectedValue, actualValue)) {
      changes.push({ property: path, changeType: "modified", expectedValue, actualValue });
    }
  }
}
