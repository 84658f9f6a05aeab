/**
 * Tests for the keyed registry behind the resolver's macro tables
 */

import { describe, it, expect } from "vitest";
import { SpecialDerives, createGenericRegistry, moduleKey } from "@expandite/core";

describe("GenericRegistry", () => {
  it("should store and remove entries", () => {
    const registry = createGenericRegistry<string, number>({ name: "Test" });
    registry.set("a", 1);
    registry.set("b", 2);

    expect(registry.get("a")).toBe(1);
    expect(registry.get("missing")).toBeUndefined();
    expect(registry.size).toBe(2);
    expect(registry.delete("a")).toBe(true);
    expect(registry.delete("a")).toBe(false);
    expect([...registry]).toEqual([["b", 2]]);
  });

  it("should iterate in insertion order", () => {
    const registry = createGenericRegistry<string, number>();
    registry.set("z", 26);
    registry.set("a", 1);

    expect([...registry.keys()]).toEqual(["z", "a"]);
    expect([...registry.values()]).toEqual([26, 1]);
  });

  it("should throw on a duplicate key by default", () => {
    const registry = createGenericRegistry<string, number>({ name: "BuiltinMacros" });
    registry.set("line", 1);
    expect(() => registry.set("line", 2)).toThrow("BuiltinMacros: entry for key 'line' already exists");
    expect(registry.get("line")).toBe(1);
  });

  it("should replace with the 'replace' strategy", () => {
    const registry = createGenericRegistry<string, number>({ duplicateStrategy: "replace" });
    registry.set("a", 1);
    registry.set("a", 2);
    expect(registry.get("a")).toBe(2);
  });

  it("should union derive flags with the 'merge' strategy", () => {
    const registry = createGenericRegistry<number, SpecialDerives>({
      duplicateStrategy: "merge",
      merge: (existing, incoming) => existing | incoming,
    });
    registry.set(3, SpecialDerives.PartialEq);
    registry.set(3, SpecialDerives.Copy);

    expect(registry.get(3)).toBe(SpecialDerives.PartialEq | SpecialDerives.Copy);
    expect(registry.size).toBe(1);
  });

  it("should require a merge function for the 'merge' strategy", () => {
    expect(() => createGenericRegistry<string, number>({ name: "Test", duplicateStrategy: "merge" })).toThrow(
      /merge function is required/,
    );
  });
});

describe("moduleKey", () => {
  it("should join the module path and name", () => {
    expect(moduleKey(["outer", "inner"], "m")).toBe("outer::inner::m");
    expect(moduleKey([], "m")).toBe("m");
  });
});
