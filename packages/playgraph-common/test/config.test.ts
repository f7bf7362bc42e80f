import { mkdtemp, rm, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { ConfigError, getCachedConfig, loadConfig, resetConfigCache, validateConfig } from "@playgraph/common";

const TEMP_PREFIX = path.join(os.tmpdir(), "playgraph-config-");

describe("config", () => {
  let tempDir: string;
  let configPath: string;

  beforeEach(async () => {
    tempDir = await mkdtemp(TEMP_PREFIX);
    configPath = path.join(tempDir, ".playgraph.json");
    resetConfigCache();
  });

  afterEach(async () => {
    resetConfigCache();
    vi.unstubAllEnvs();
    await rm(tempDir, { recursive: true, force: true });
  });

  it("loads, applies defaults and caches the config", async () => {
    await writeFile(configPath, JSON.stringify({ userConfigDir: "./nodes" }), "utf8");

    const config = await loadConfig(configPath);
    expect(config).toEqual({
      userConfigDir: path.join(tempDir, "nodes"),
      verifyMode: "end",
      concurrency: 4,
      requestTimeoutMs: 30_000,
      retry: { attempts: 5, delayMs: 500, backoffFactor: 2 },
      spotify: undefined,
    });
    expect(getCachedConfig()).toBe(config);
    expect(await loadConfig(configPath)).toBe(config);
  });

  it("reads every supported key", async () => {
    await writeFile(
      configPath,
      JSON.stringify({
        userConfigDir: "/srv/playgraph",
        verifyMode: "incremental",
        concurrency: 2,
        requestTimeoutMs: 5000,
        retry: { attempts: 3, delayMs: 0, backoffFactor: 1.5 },
        spotify: { apiBaseUrl: "http://localhost:9999/v1" },
      }),
      "utf8"
    );

    const config = await loadConfig(configPath);
    expect(config.userConfigDir).toBe("/srv/playgraph");
    expect(config.verifyMode).toBe("incremental");
    expect(config.concurrency).toBe(2);
    expect(config.requestTimeoutMs).toBe(5000);
    expect(config.retry).toEqual({ attempts: 3, delayMs: 0, backoffFactor: 1.5 });
    expect(config.spotify).toEqual({ apiBaseUrl: "http://localhost:9999/v1" });
  });

  it("honours PLAYGRAPH_CONFIG and PLAYGRAPH_USER_CONFIG_DIR", async () => {
    await writeFile(configPath, JSON.stringify({ userConfigDir: "./nodes" }), "utf8");
    vi.stubEnv("PLAYGRAPH_CONFIG", configPath);
    vi.stubEnv("PLAYGRAPH_USER_CONFIG_DIR", "/tmp/override");

    const config = await loadConfig();
    expect(config.userConfigDir).toBe("/tmp/override");
  });

  it("rejects unreadable files", async () => {
    await expect(loadConfig(path.join(tempDir, "missing.json"))).rejects.toBeInstanceOf(ConfigError);
  });

  it("rejects invalid JSON", async () => {
    await writeFile(configPath, "{ not json", "utf8");
    await expect(loadConfig(configPath)).rejects.toThrow(`Invalid JSON in playgraph config at ${configPath}`);
  });

  it("throws when the config was never loaded", () => {
    expect(() => getCachedConfig()).toThrow(ConfigError);
  });
});

describe("validateConfig", () => {
  it("requires userConfigDir", () => {
    expect(() => validateConfig({}, "x.json")).toThrow('Config key "userConfigDir" must be a non-empty string');
  });

  it("rejects unknown verify modes", () => {
    expect(() => validateConfig({ userConfigDir: "n", verifyMode: "always" }, "x.json")).toThrow(
      'Config key "verifyMode" must be one of none, end, incremental'
    );
  });

  it("rejects a non-positive concurrency", () => {
    expect(() => validateConfig({ userConfigDir: "n", concurrency: 0 }, "x.json")).toThrow(
      'Config key "concurrency" must be a positive integer'
    );
  });

  it("rejects a retry count below one", () => {
    expect(() => validateConfig({ userConfigDir: "n", retry: { attempts: 0 } }, "x.json")).toThrow(
      'Config key "retry.attempts" must be a positive integer'
    );
  });

  it("rejects a non-object document", () => {
    expect(() => validateConfig([], "x.json")).toThrow("Config at x.json must be a JSON object");
  });
});
