import path from "node:path";

import { describe, expect, it } from "vitest";

import { loadRuntimeConfigFromEnv, resolveCellLanguage } from "../src/config.js";

describe("loadRuntimeConfigFromEnv", () => {
  it("uses defaults when nothing is set", () => {
    expect(loadRuntimeConfigFromEnv({})).toEqual({
      searchPath: [process.cwd()],
      logLevel: "info",
      defaultLanguage: "javascript",
    });
  });

  it("splits NBKIT_PATH on the platform delimiter and drops blanks and duplicates", () => {
    const env = { NBKIT_PATH: ["/a", " ", "/b", "/a"].join(path.delimiter) };
    expect(loadRuntimeConfigFromEnv(env).searchPath).toEqual(["/a", "/b"]);
  });

  it("prefers NBKIT_LOG_LEVEL over LOG_LEVEL", () => {
    expect(loadRuntimeConfigFromEnv({ LOG_LEVEL: "warn" }).logLevel).toBe("warn");
    expect(loadRuntimeConfigFromEnv({ LOG_LEVEL: "warn", NBKIT_LOG_LEVEL: "DEBUG" }).logLevel).toBe("debug");
  });

  it("rejects unknown log levels", () => {
    expect(() => loadRuntimeConfigFromEnv({ NBKIT_LOG_LEVEL: "loud" })).toThrow(
      'NBKIT_LOG_LEVEL must be one of fatal, error, warn, info, debug, trace, silent (got "loud").'
    );
  });

  it("accepts language aliases for NBKIT_DEFAULT_LANGUAGE", () => {
    expect(loadRuntimeConfigFromEnv({ NBKIT_DEFAULT_LANGUAGE: "ts" }).defaultLanguage).toBe("typescript");
  });

  it("rejects languages it cannot run", () => {
    expect(() => loadRuntimeConfigFromEnv({ NBKIT_DEFAULT_LANGUAGE: "ruby" })).toThrow(
      'NBKIT_DEFAULT_LANGUAGE must be javascript or typescript (got "ruby").'
    );
  });
});

describe("resolveCellLanguage", () => {
  it("maps aliases case-insensitively", () => {
    expect(resolveCellLanguage("JavaScript")).toBe("javascript");
    expect(resolveCellLanguage("node")).toBe("javascript");
    expect(resolveCellLanguage("TS")).toBe("typescript");
  });

  it("returns null for missing or unknown languages", () => {
    expect(resolveCellLanguage(null)).toBeNull();
    expect(resolveCellLanguage("")).toBeNull();
    expect(resolveCellLanguage("ruby")).toBeNull();
  });
});
