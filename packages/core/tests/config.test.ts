/**
 * Tests for configuration loading and validation
 */

import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { ExpansionConfig, config, defineConfig, validateConfig } from "@expandite/core";

describe("validateConfig", () => {
  beforeEach(() => {
    vi.spyOn(console, "warn").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("should keep well-formed values", () => {
    const raw = { verbose: true, edition: "2015", recursionLimit: 8, traceMacros: false, colors: true };
    expect(validateConfig(raw, "test")).toEqual(raw);
    expect(console.warn).not.toHaveBeenCalled();
  });

  it("should accept an edition given as a number", () => {
    expect(validateConfig({ edition: 2018 }, "test")).toEqual({ edition: "2018" });
  });

  it("should drop invalid values with a warning", () => {
    const result = validateConfig({ verbose: "yes", recursionLimit: 0, edition: "2030" }, "expandite.config.js");
    expect(result).toEqual({});
    expect(console.warn).toHaveBeenCalledTimes(3);
    expect(console.warn).toHaveBeenCalledWith(
      '[expandite] ignoring invalid value "yes" for "verbose" in expandite.config.js',
    );
  });

  it("should ignore unknown keys", () => {
    expect(validateConfig({ plugins: [] }, "test")).toEqual({});
    expect(console.warn).not.toHaveBeenCalled();
  });

  it("should reject a non-object root", () => {
    expect(validateConfig([1], "test")).toEqual({});
    expect(validateConfig(undefined, "test")).toEqual({});
    expect(console.warn).toHaveBeenCalledTimes(1);
  });
});

describe("config", () => {
  beforeEach(() => {
    config.reset();
  });

  afterEach(() => {
    delete process.env.EXPANDITE_RECURSION_LIMIT;
    config.reset();
  });

  it("should start from the defaults", () => {
    expect(config.get("recursionLimit")).toBe(64);
    expect(config.get("edition")).toBe("2018");
    expect(config.has("verbose")).toBe(false);
  });

  it("should apply programmatic values", () => {
    config.set({ traceMacros: true, recursionLimit: 16 });
    expect(config.get("traceMacros")).toBe(true);
    expect(config.getAll().recursionLimit).toBe(16);

    config.reset();
    expect(config.get("traceMacros")).toBe(false);
  });

  it("should let the environment override programmatic values", () => {
    process.env.EXPANDITE_RECURSION_LIMIT = "128";
    config.set({ recursionLimit: 16 });
    expect(config.get("recursionLimit")).toBe(128);
  });

  it("should feed the expansion settings", () => {
    config.set({ traceMacros: true, edition: "2015" });
    expect(ExpansionConfig.fromConfig("app")).toEqual({
      crateName: "app",
      edition: "2015",
      recursionLimit: 64,
      traceMac: true,
      verbose: false,
    });
  });

  it("should pass a config file definition through", () => {
    expect(defineConfig({ verbose: true })).toEqual({ verbose: true });
  });
});
