import { describe, it, expect, beforeAll, afterAll } from "vitest";
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import { loadConfig, parseModuleSpec, readConfigFile, resolveConfig } from "../../src/config.js";
import { getEnv, getEnvFlag } from "../../src/shared/env.js";
import { ConfigError } from "../../src/shared/errors.js";

describe("getEnvFlag", () => {
  it("reads common boolean spellings", () => {
    expect(getEnvFlag("ARRAYS", { WIREBRIDGE_ARRAYS: "Yes" })).toBe(true);
    expect(getEnvFlag("ARRAYS", { WIREBRIDGE_ARRAYS: " off " })).toBe(false);
    expect(getEnvFlag("ARRAYS", { WIREBRIDGE_ARRAYS: "maybe" })).toBeUndefined();
    expect(getEnvFlag("ARRAYS", {})).toBeUndefined();
  });

  it("treats an empty variable as unset", () => {
    expect(getEnv("LOG_LEVEL", { WIREBRIDGE_LOG_LEVEL: "" })).toBeUndefined();
  });
});

describe("parseModuleSpec", () => {
  it("splits on the first equals sign", () => {
    expect(parseModuleSpec("text=./lib/text.mjs")).toEqual({ name: "text", path: "./lib/text.mjs" });
    expect(parseModuleSpec("a=b=c.mjs")).toEqual({ name: "a", path: "b=c.mjs" });
  });

  it("rejects incomplete specs", () => {
    expect(() => parseModuleSpec("text")).toThrow(ConfigError);
    expect(() => parseModuleSpec("=./x.mjs")).toThrow("invalid module spec '=./x.mjs': expected name=path");
    expect(() => parseModuleSpec("text=")).toThrow(ConfigError);
  });
});

describe("resolveConfig", () => {
  it("defaults to every capability and info text logging", () => {
    expect(resolveConfig({}, {})).toEqual({
      capabilities: { arrays: true, tables: true },
      modules: [],
      logLevel: "info",
      logFormat: "text",
    });
  });

  it("turns tables off together with arrays", () => {
    expect(resolveConfig({}, { WIREBRIDGE_ARRAYS: "0" }).capabilities).toEqual({ arrays: false, tables: false });
    expect(resolveConfig({ arrays: false }, { WIREBRIDGE_TABLES: "1" }).capabilities).toEqual({
      arrays: false,
      tables: false,
    });
  });

  it("lets a command line switch win over the environment", () => {
    expect(resolveConfig({ tables: false }, { WIREBRIDGE_TABLES: "true" }).capabilities).toEqual({
      arrays: true,
      tables: false,
    });
  });

  it("lets the environment win over the file", () => {
    const config = resolveConfig({}, { WIREBRIDGE_ARRAYS: "yes" }, { arrays: false, tables: false });
    expect(config.capabilities).toEqual({ arrays: true, tables: false });
  });

  it("resolves file modules against the file directory and appends command line modules", () => {
    const config = resolveConfig(
      { modules: [{ name: "b", path: "b.mjs" }] },
      {},
      { modules: { a: "./lib/a.mjs" } },
      "/srv/bridge"
    );
    expect(config.modules).toEqual([
      { name: "a", path: path.resolve("/srv/bridge", "./lib/a.mjs") },
      { name: "b", path: "b.mjs" },
    ]);
  });

  it("picks log settings by precedence", () => {
    const file = { log: { level: "warn", format: "json" } };
    expect(resolveConfig({}, {}, file)).toMatchObject({ logLevel: "warn", logFormat: "json" });
    expect(resolveConfig({}, { WIREBRIDGE_LOG_LEVEL: "error" }, file)).toMatchObject({
      logLevel: "error",
      logFormat: "json",
    });
    expect(resolveConfig({ logLevel: "debug", logFormat: "plain" }, { WIREBRIDGE_LOG_LEVEL: "error" }, file)).toMatchObject({
      logLevel: "debug",
      logFormat: "plain",
    });
  });
});

describe("config files", () => {
  let dir = "";

  beforeAll(async () => {
    dir = await mkdtemp(path.join(tmpdir(), "wirebridge-config-"));
    await writeFile(
      path.join(dir, "bridge.json"),
      JSON.stringify({ tables: false, modules: { text: "strings.mjs" }, log: { level: "debug" } })
    );
    await writeFile(path.join(dir, "broken.json"), "{ arrays: ");
    await writeFile(path.join(dir, "wrong.json"), JSON.stringify({ arrays: "sometimes" }));
  });

  afterAll(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("reads a valid file", async () => {
    expect(await readConfigFile(path.join(dir, "bridge.json"))).toEqual({
      tables: false,
      modules: { text: "strings.mjs" },
      log: { level: "debug" },
    });
  });

  it("reports unreadable, malformed and mistyped files", async () => {
    await expect(readConfigFile(path.join(dir, "absent.json"))).rejects.toThrow(/^cannot read config /);
    await expect(readConfigFile(path.join(dir, "broken.json"))).rejects.toThrow(/is not valid JSON/);
    await expect(readConfigFile(path.join(dir, "wrong.json"))).rejects.toThrow(/^invalid config /);
  });

  it("loads the file named on the command line or in the environment", async () => {
    const file = path.join(dir, "bridge.json");
    const expected = {
      capabilities: { arrays: true, tables: false },
      modules: [{ name: "text", path: path.join(dir, "strings.mjs") }],
      logLevel: "debug",
      logFormat: "text",
    };
    expect(await loadConfig({ config: file }, {})).toEqual(expected);
    expect(await loadConfig({}, { WIREBRIDGE_CONFIG: file })).toEqual(expected);
  });
});
