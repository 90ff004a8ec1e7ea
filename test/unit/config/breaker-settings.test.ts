// ---------------------------------------------------------------------------
// Tests for breaker override loading and resolution.
// ---------------------------------------------------------------------------

import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { describe, it, expect, beforeAll, afterAll } from "vitest";

import {
  DEFAULT_BREAKERS_FILE,
  loadBreakerOverrides,
  resolveBreakerConfig,
} from "../../../src/config/breaker-settings.js";
import { ConfigurationError } from "../../../src/core/errors.js";

describe("loadBreakerOverrides", () => {
  let dir: string;

  beforeAll(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "resilient-breakers-"));
  });

  afterAll(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  const write = (name: string, content: string): string => {
    const file = path.join(dir, name);
    fs.writeFileSync(file, content);
    return file;
  };

  it("returns no overrides when the file does not exist", () => {
    expect(loadBreakerOverrides(path.join(dir, "nope.yaml"))).toEqual({});
  });

  it("treats an empty file as no overrides", () => {
    expect(loadBreakerOverrides(write("empty.yaml", "# nothing here\n"))).toEqual({});
  });

  it("reads the shipped settings file", () => {
    expect(loadBreakerOverrides(DEFAULT_BREAKERS_FILE)).toEqual({
      store: {},
      cache: { recoveryTimeoutMs: 15000 },
    });
  });

  it("rejects unknown fields", () => {
    const file = write("typo.yaml", "breakers:\n  store:\n    failureTreshold: 3\n");
    expect(() => loadBreakerOverrides(file)).toThrow(ConfigurationError);
  });

  it("rejects a non-positive threshold", () => {
    const file = write("zero.yaml", "breakers:\n  store:\n    failureThreshold: 0\n");
    expect(() => loadBreakerOverrides(file)).toThrow(/^Invalid breaker settings in .*zero\.yaml: breakers\.store\.failureThreshold: /);
  });

  it("rejects malformed YAML", () => {
    const file = write("broken.yaml", "breakers: [unclosed\n");
    expect(() => loadBreakerOverrides(file)).toThrow(
      `Cannot read breaker settings from ${file}`,
    );
  });
});

describe("resolveBreakerConfig", () => {
  const breakers = {
    defaults: { failureThreshold: 5, recoveryTimeoutMs: 30_000 },
    overrides: { cache: { recoveryTimeoutMs: 15_000 } },
  };

  it("layers a dependency's overrides over the defaults", () => {
    expect(resolveBreakerConfig(breakers, "cache")).toEqual({
      failureThreshold: 5,
      recoveryTimeoutMs: 15_000,
    });
  });

  it("uses the defaults for a dependency without overrides", () => {
    expect(resolveBreakerConfig(breakers, "store")).toEqual({
      failureThreshold: 5,
      recoveryTimeoutMs: 30_000,
    });
  });
});
