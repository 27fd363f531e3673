import { readFileSync } from "node:fs";
import { parseModuleSpec, type CliConfig } from "../config.js";

export function getPackageJsonVersion(): string {
  try {
    const raw = readFileSync(new URL("../../package.json", import.meta.url), "utf8");
    const pkg = JSON.parse(raw) as { version?: unknown };
    return typeof pkg.version === "string" ? pkg.version : "0.1.0";
  } catch {
    return "0.1.0";
  }
}

/** Argument parsed as JSON, or kept as a plain string when it is not JSON. */
export function parseCliValue(raw: string): unknown {
  try {
    return JSON.parse(raw) as unknown;
  } catch {
    return raw;
  }
}

function optString(value: unknown): string | undefined {
  return typeof value === "string" ? value : undefined;
}

/** Map commander option values onto the config layer's CLI input. */
export function toCliConfig(opts: Record<string, unknown>): CliConfig {
  const modules = Array.isArray(opts.module)
    ? opts.module.filter((m): m is string => typeof m === "string").map(parseModuleSpec)
    : [];
  return {
    config: optString(opts.config),
    arrays: opts.arrays === false ? false : undefined,
    tables: opts.tables === false ? false : undefined,
    modules,
    logLevel: opts.verbose === true ? "debug" : optString(opts.logLevel),
    logFormat: optString(opts.logFormat),
  };
}
