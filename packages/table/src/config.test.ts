import { describe, it, expect } from "vitest";
import { DEFAULT_CONFIG, isDebugEnabled, resolveConfig } from "./config.js";
import { ConfigError } from "./errors.js";

describe("resolveConfig", () => {
  it("should fall back to defaults", () => {
    expect(resolveConfig({}, {})).toEqual(DEFAULT_CONFIG);
  });

  it("should read ROWSTORE_* variables", () => {
    expect(
      resolveConfig({}, { ROWSTORE_RENDER_STYLE: "simple", ROWSTORE_SNAPSHOT_INDENT: "4" })
    ).toEqual({ renderStyle: "simple", snapshotIndent: 4 });
  });

  it("should prefer explicit overrides", () => {
    expect(
      resolveConfig({ snapshotIndent: 0 }, { ROWSTORE_RENDER_STYLE: "simple", ROWSTORE_SNAPSHOT_INDENT: "4" })
    ).toEqual({ renderStyle: "simple", snapshotIndent: 0 });
  });

  it("should reject invalid values", () => {
    expect(() => resolveConfig({}, { ROWSTORE_RENDER_STYLE: "fancy" })).toThrow(ConfigError);
    expect(() => resolveConfig({}, { ROWSTORE_SNAPSHOT_INDENT: "12" })).toThrow(
      /^Invalid environment configuration: ROWSTORE_SNAPSHOT_INDENT: /
    );
  });
});

describe("isDebugEnabled", () => {
  it("should accept the usual truthy spellings", () => {
    for (const value of ["1", "true", "YES", " on "]) {
      expect(isDebugEnabled({ ROWSTORE_DEBUG: value })).toBe(true);
    }
  });

  it("should treat anything else as off", () => {
    expect(isDebugEnabled({})).toBe(false);
    expect(isDebugEnabled({ ROWSTORE_DEBUG: "0" })).toBe(false);
    expect(isDebugEnabled({ ROWSTORE_DEBUG: "verbose" })).toBe(false);
  });
});
