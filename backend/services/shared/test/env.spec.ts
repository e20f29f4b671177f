// backend/services/shared/test/env.spec.ts
import { afterEach, describe, it, expect } from "vitest";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import {
  assertEnv,
  loadEnvFiles,
  optionalEnv,
  redactEnv,
  requireEnum,
  requireEnv,
  requireNumber,
  requirePort,
  requireUrl,
} from "@shared/env";

describe("env validators", () => {
  it("assertEnv reports every missing or blank key at once", () => {
    expect(() => assertEnv(["A", "B", "C"], { A: "1", B: "  " })).toThrow(
      "Missing required env vars: B, C"
    );
    expect(() => assertEnv(["A"], { A: "1" })).not.toThrow();
  });

  it("requireEnv trims and rejects blanks", () => {
    expect(requireEnv("A", { A: "  value " })).toBe("value");
    expect(() => requireEnv("A", { A: " " })).toThrow("Missing required env var: A");
  });

  it("optionalEnv treats blank as unset", () => {
    expect(optionalEnv("A", { A: "" })).toBeUndefined();
    expect(optionalEnv("A", {})).toBeUndefined();
    expect(optionalEnv("A", { A: " x " })).toBe("x");
  });

  it("requireEnum accepts allowed values and falls back when unset", () => {
    const modes = ["release", "debug"] as const;
    expect(requireEnum("MODE", modes, { MODE: "debug" })).toBe("debug");
    expect(requireEnum("MODE", modes, {}, "release")).toBe("release");
    expect(() => requireEnum("MODE", modes, { MODE: "prod" })).toThrow(
      'Invalid env var MODE="prod". Allowed: release, debug'
    );
    expect(() => requireEnum("MODE", modes, {})).toThrow("Missing required env var: MODE");
  });

  it("requireNumber parses decimals and rejects junk", () => {
    expect(requireNumber("N", { N: "12.5" })).toBe(12.5);
    expect(requireNumber("N", { N: "-3" })).toBe(-3);
    expect(requireNumber("N", {}, 7)).toBe(7);
    expect(() => requireNumber("N", { N: "12ms" })).toThrow(
      'Env var N must be a number, got "12ms"'
    );
  });

  it("requirePort enforces the TCP range", () => {
    expect(requirePort("P", { P: "8080" })).toBe(8080);
    expect(requirePort("P", {}, 8080)).toBe(8080);
    expect(() => requirePort("P", { P: "70000" })).toThrow(
      'Env var P must be a TCP port (0-65535), got "70000"'
    );
    expect(() => requirePort("P", { P: "80.5" })).toThrow(
      'Env var P must be a TCP port (0-65535), got "80.5"'
    );
  });

  it("requireUrl accepts http(s) and strips trailing slashes", () => {
    expect(requireUrl("U", { U: "https://example.supabase.co/" })).toBe(
      "https://example.supabase.co"
    );
    expect(() => requireUrl("U", { U: "not a url" })).toThrow("Env U must be a valid URL");
    expect(() => requireUrl("U", { U: "ftp://example.com" })).toThrow(
      "Env U must be http or https URL"
    );
  });

  it("redactEnv keeps keys and hides values", () => {
    expect(redactEnv({ A: "1", B: 2 })).toEqual({
      A: "***redacted***",
      B: "***redacted***",
    });
  });
});

describe("loadEnvFiles", () => {
  const KEYS = ["UM_TEST_FOO", "UM_TEST_BAR", "UM_TEST_BAZ"];
  let dir = "";

  afterEach(() => {
    for (const k of KEYS) delete process.env[k];
    if (dir) fs.rmSync(dir, { recursive: true, force: true });
    dir = "";
  });

  it("loads files in order, expands references, and keeps the first value per key", () => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "env-spec-"));
    const first = path.join(dir, "first.env");
    const second = path.join(dir, "second.env");
    fs.writeFileSync(first, "UM_TEST_FOO=a\nUM_TEST_BAR=${UM_TEST_FOO}-x\n");
    fs.writeFileSync(second, "UM_TEST_FOO=b\nUM_TEST_BAZ=z\n");

    const loaded = loadEnvFiles([first, path.join(dir, "missing.env"), second]);

    expect(loaded).toEqual([first, second]);
    expect(process.env.UM_TEST_FOO).toBe("a");
    expect(process.env.UM_TEST_BAR).toBe("a-x");
    expect(process.env.UM_TEST_BAZ).toBe("z");
  });

  it("throws when nothing loads unless missing files are allowed", () => {
    const missing = path.join(os.tmpdir(), "definitely-missing-um.env");
    expect(() => loadEnvFiles([missing])).toThrow(`No env files loaded from: ${missing}`);
    expect(loadEnvFiles([missing], { allowMissing: true })).toEqual([]);
  });
});
