import { describe, it, expect } from "vitest";
import { diffProperties, matchesDesired, propertiesMatch } from "./compare.js";

describe("matchesDesired", () => {
  it("ignores keys only the observed state has", () => {
    expect(
      propertiesMatch({ sku: "standard", network: { public: false } }, {
        sku: "standard",
        network: { public: false, rules: [] },
        provisioningState: "Succeeded",
      }),
    ).toBe(true);
  });

  it("requires arrays to match element for element", () => {
    expect(matchesDesired(["a", "b"], ["a", "b"])).toBe(true);
    expect(matchesDesired(["a", "b"], ["b", "a"])).toBe(false);
    expect(matchesDesired(["a"], ["a", "b"])).toBe(false);
  });

  it("treats a missing nested object as a difference", () => {
    expect(propertiesMatch({ tags: {} }, {})).toBe(false);
  });

  it("compares scalars strictly", () => {
    expect(matchesDesired(1, "1")).toBe(false);
    expect(matchesDesired(Number.NaN, Number.NaN)).toBe(true);
  });
});

describe("diffProperties", () => {
  it("reports every desired key as added when nothing exists", () => {
    expect(diffProperties({ sku: "standard" }, null)).toEqual([
      { property: "sku", changeType: "added", expectedValue: "standard" },
    ]);
  });

  it("walks nested objects with dotted paths", () => {
    expect(
      diffProperties(
        { network: { public: false, tier: "basic" }, sku: "standard" },
        { network: { public: true }, sku: "standard" },
      ),
    ).toEqual([
      { property: "network.public", changeType: "modified", expectedValue: false, actualValue: true },
      { property: "network.tier", changeType: "added", expectedValue: "basic" },
    ]);
  });

  it("leaves values of sensitive properties out", () => {
    expect(diffProperties({ password: "test-secret" }, { password: "old-secret" }, ["password"])).toEqual([
      { property: "password", changeType: "modified" },
    ]);
  });
});
