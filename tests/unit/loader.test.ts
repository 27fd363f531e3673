import { describe, it, expect } from "vitest";
import { fileURLToPath } from "node:url";
import { loadModuleFile, registerModuleFiles } from "../../src/bridge/loader.js";
import { ModuleRegistry } from "../../src/bridge/registry.js";
import { ConfigError } from "../../src/shared/errors.js";

const fixture = (name: string) => fileURLToPath(new URL(`../fixtures/${name}`, import.meta.url));

describe("loadModuleFile", () => {
  it("exposes named exports and members of a default object", async () => {
    const functions = await loadModuleFile(fixture("strings.mjs"));
    expect(Object.keys(functions).sort()).toEqual(["greet", "later", "repeat", "upper"]);
  });

  it("prefers named exports over default members", async () => {
    const functions = await loadModuleFile(fixture("strings.mjs"));
    expect(functions.upper("abc")).toBe("ABC");
  });

  it("calls default members with their object as this", async () => {
    const functions = await loadModuleFile(fixture("strings.mjs"));
    expect(functions.greet("world")).toBe("hello world");
  });

  it("fails for a module without functions", async () => {
    await expect(loadModuleFile(fixture("constants.mjs"))).rejects.toThrow(ConfigError);
  });

  it("fails for a module that cannot be imported", async () => {
    await expect(loadModuleFile(fixture("missing.mjs"))).rejects.toThrow(/^cannot load module /);
    await expect(loadModuleFile(fixture("broken.mjs"))).rejects.toThrow("module failed to initialise");
  });
});

describe("registerModuleFiles", () => {
  it("registers each file under its configured name", async () => {
    const registry = new ModuleRegistry();
    await registerModuleFiles(registry, [{ name: "text", path: fixture("strings.mjs") }]);
    const resolution = registry.resolve("text", "repeat");
    expect(resolution.kind).toBe("found");
    if (resolution.kind !== "found") return;
    expect(resolution.fn("ab", 3, { sep: "-" })).toBe("ab-ab-ab");

    const later = registry.resolve("text", "later");
    if (later.kind !== "found") throw new Error("expected later to be registered");
    await expect(later.fn("value")).resolves.toBe("value");
  });
});
