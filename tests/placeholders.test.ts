import { describe, expect, it } from "vitest";
import { DuplicateCaseError, PlaceholderResolutionError } from "../src/engine/errors.js";
import { resolve, resolveMap } from "../src/engine/placeholders.js";
import { ResolvedRegistry } from "../src/engine/registry.js";

describe("placeholder resolution", () => {
  const registry = new ResolvedRegistry();
  registry.record(
    "TC1",
    new Map([
      ["11", "XYZ"],
      ["35", "D"],
    ]),
  );

  it("resolves dotted references against the registry", () => {
    expect(resolve("${TC1.11}", new Map(), registry)).toBe("XYZ");
  });

  it("resolves bare references against the local message", () => {
    expect(resolve("ref-${11}-${TC1.11}", new Map([["11", "L"]]), registry)).toBe("ref-L-XYZ");
  });

  it("leaves text without placeholders untouched", () => {
    expect(resolve("plain", new Map(), new ResolvedRegistry())).toBe("plain");
  });

  it("fails on a missing local field", () => {
    let caught: unknown;
    try {
      resolve("${99}", new Map(), new ResolvedRegistry());
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(PlaceholderResolutionError);
    expect(caught).toMatchObject({
      code: "PLACEHOLDER_UNRESOLVED",
      token: "99",
      message: "Placeholder ${99} not found in current message",
    });
  });

  it("reports a reference to a case that has not run yet", () => {
    expect(() => resolve("${TC9.11}", new Map(), registry)).toThrow(
      "Placeholder ${TC9.11} references test case TC9, which has not been executed yet",
    );
  });

  it("reports a tag the referenced case never sent", () => {
    expect(() => resolve("${TC1.55}", new Map(), registry)).toThrow(
      "Placeholder ${TC1.55} not found: test case TC1 sent no tag 55",
    );
  });

  it("resolves every value of a map", () => {
    const resolved = resolveMap(
      new Map([
        ["41", "${TC1.11}"],
        ["55", "IBM"],
      ]),
      new Map(),
      registry,
    );
    expect(Array.from(resolved)).toEqual([
      ["41", "XYZ"],
      ["55", "IBM"],
    ]);
  });
});

describe("ResolvedRegistry", () => {
  it("is write-once per TestCaseID", () => {
    const registry = new ResolvedRegistry();
    registry.record("B", new Map([["11", "b"]]));
    registry.record("A", new Map([["11", "a"]]));

    expect(registry.has("B")).toBe(true);
    expect(() => registry.record("A", new Map())).toThrow(DuplicateCaseError);
    expect(registry.lookup("A")).toEqual({ status: "found", fields: new Map([["11", "a"]]) });
    expect(registry.lookup("C")).toEqual({ status: "not-executed" });
  });

  it("stores a copy of the sent fields", () => {
    const registry = new ResolvedRegistry();
    const fields = new Map([["11", "a"]]);
    registry.record("A", fields);
    fields.set("11", "changed");

    const entry = registry.lookup("A");
    expect(entry.status === "found" ? entry.fields.get("11") : undefined).toBe("a");
  });
});
