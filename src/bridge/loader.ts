import path from "node:path";
import { pathToFileURL } from "node:url";
import { isRecord } from "../protocols/wire/codec.js";
import { ConfigError } from "../shared/errors.js";
import { log } from "../shared/logging.js";
import type { BridgeFunction, BridgeModule, ModuleRegistry } from "./registry.js";

export interface ModuleSpec {
  name: string;
  path: string;
}

function collectFunctions(source: Record<string, unknown>, into: Record<string, BridgeFunction>): void {
  for (const [name, value] of Object.entries(source)) {
    if (typeof value !== "function") continue;
    into[name] = (...args) => Reflect.apply(value, source, args);
  }
}

/**
 * Import an ES module and expose its exported functions. A default export that
 * is an object (a CommonJS `module.exports`) contributes its function members;
 * named exports win on conflicts.
 */
export async function loadModuleFile(file: string): Promise<BridgeModule> {
  const url = pathToFileURL(path.resolve(file)).href;
  let imported: unknown;
  try {
    imported = await import(url);
  } catch (err) {
    throw new ConfigError(`cannot load module ${file}: ${err instanceof Error ? err.message : String(err)}`);
  }
  if (!isRecord(imported)) {
    throw new ConfigError(`module ${file} did not produce a namespace object`);
  }

  const functions: Record<string, BridgeFunction> = {};
  const fallback = imported.default;
  if (isRecord(fallback)) collectFunctions(fallback, functions);
  collectFunctions(imported, functions);

  if (Object.keys(functions).length === 0) {
    throw new ConfigError(`module ${file} exports no functions`);
  }
  return functions;
}

export async function registerModuleFiles(registry: ModuleRegistry, specs: readonly ModuleSpec[]): Promise<void> {
  for (const spec of specs) {
    const functions = await loadModuleFile(spec.path);
    registry.register(spec.name, functions);
    log.debug({ module: spec.name, path: spec.path, functions: Object.keys(functions) }, "module loaded");
  }
}
