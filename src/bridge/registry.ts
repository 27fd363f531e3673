import type { ExtendedValue } from "../protocols/wire/types.js";

/**
 * A callable exposed to the bridge. It receives decoded positional arguments,
 * followed by the keyword mapping when the request carried a non-empty one.
 * It may return a promise.
 */
export type BridgeFunction = (...args: ExtendedValue[]) => unknown;

export type BridgeModule = Readonly<Record<string, BridgeFunction>>;

export type Resolution =
  | { kind: "found"; fn: BridgeFunction }
  | { kind: "module-not-found"; module: string }
  | { kind: "function-not-found"; module: string; fn: string };

export interface ModuleListing {
  module: string;
  functions: string[];
}

/** Lookup from (module, function) names to callables; no reflection, explicit not-found results. */
export class ModuleRegistry {
  private readonly modules = new Map<string, Map<string, BridgeFunction>>();

  register(name: string, functions: BridgeModule): this {
    const existing = this.modules.get(name) ?? new Map<string, BridgeFunction>();
    for (const [fnName, fn] of Object.entries(functions)) {
      existing.set(fnName, fn);
    }
    this.modules.set(name, existing);
    return this;
  }

  has(name: string): boolean {
    return this.modules.has(name);
  }

  resolve(module: string, fn: string): Resolution {
    const functions = this.modules.get(module);
    if (!functions) return { kind: "module-not-found", module };
    const found = functions.get(fn);
    if (!found) return { kind: "function-not-found", module, fn };
    return { kind: "found", fn: found };
  }

  list(): ModuleListing[] {
    return Array.from(this.modules, ([module, functions]) => ({
      module,
      functions: Array.from(functions.keys()).sort(),
    })).sort((a, b) => a.module.localeCompare(b.module));
  }
}
