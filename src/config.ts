import { readFile } from "node:fs/promises";
import path from "node:path";
import { type } from "arktype";
import type { ModuleSpec } from "./bridge/loader.js";
import { normalizeCapabilities, type Capabilities } from "./protocols/wire/types.js";
import { DEFAULT_LOG_FORMAT, DEFAULT_LOG_LEVEL } from "./shared/constants.js";
import { getEnv, getEnvFlag } from "./shared/env.js";
import { ConfigError } from "./shared/errors.js";

/** Config file shape as stored on disk. */
export const FileConfigSchema = type({
  "arrays?": "boolean",
  "tables?": "boolean",
  "modules?": { "[string]": "string" },
  "log?": {
    "level?": "string",
    "format?": "string",
  },
});

export type FileConfig = typeof FileConfigSchema.infer;

export interface BridgeConfig {
  capabilities: Capabilities;
  modules: ModuleSpec[];
  logLevel: string;
  logFormat: string;
}

/** Values given on the command line. `false` capability flags come from `--no-arrays` / `--no-tables`. */
export interface CliConfig {
  config?: string;
  arrays?: boolean;
  tables?: boolean;
  modules?: ModuleSpec[];
  logLevel?: string;
  logFormat?: string;
}

export async function readConfigFile(file: string): Promise<FileConfig> {
  let raw: string;
  try {
    raw = await readFile(file, "utf8");
  } catch (err) {
    throw new ConfigError(`cannot read config ${file}: ${err instanceof Error ? err.message : String(err)}`);
  }
  let data: unknown;
  try {
    data = JSON.parse(raw) as unknown;
  } catch (err) {
    throw new ConfigError(`config ${file} is not valid JSON: ${err instanceof Error ? err.message : String(err)}`);
  }
  const parsed = FileConfigSchema(data);
  if (parsed instanceof type.errors) {
    throw new ConfigError(`invalid config ${file}: ${parsed.summary}`);
  }
  return parsed;
}

/** Parse `name=path` as given to `--module`. */
export function parseModuleSpec(spec: string): ModuleSpec {
  const eq = spec.indexOf("=");
  const name = eq === -1 ? "" : spec.slice(0, eq).trim();
  const file = eq === -1 ? "" : spec.slice(eq + 1).trim();
  if (!name || !file) {
    throw new ConfigError(`invalid module spec '${spec}': expected name=path`);
  }
  return { name, path: file };
}

/**
 * Merge command line, environment and config file. Precedence: CLI, then
 * environment, then file, then defaults. Module lists are combined, with CLI
 * entries registered last so they override file entries of the same name.
 */
export function resolveConfig(
  cli: CliConfig,
  env: NodeJS.ProcessEnv = process.env,
  file: FileConfig = {},
  fileDir: string = process.cwd()
): BridgeConfig {
  const pick = (cliFlag: boolean | undefined, envFlag: boolean | undefined, fileFlag: boolean | undefined) =>
    cliFlag === false ? false : (envFlag ?? fileFlag ?? true);

  const capabilities = normalizeCapabilities({
    arrays: pick(cli.arrays, getEnvFlag("ARRAYS", env), file.arrays),
    tables: pick(cli.tables, getEnvFlag("TABLES", env), file.tables),
  });

  const fromFile = Object.entries(file.modules ?? {}).map(([name, modulePath]) => ({
    name,
    path: path.resolve(fileDir, modulePath),
  }));

  return {
    capabilities,
    modules: [...fromFile, ...(cli.modules ?? [])],
    logLevel: cli.logLevel ?? getEnv("LOG_LEVEL", env) ?? file.log?.level ?? DEFAULT_LOG_LEVEL,
    logFormat: cli.logFormat ?? getEnv("LOG_FORMAT", env) ?? file.log?.format ?? DEFAULT_LOG_FORMAT,
  };
}

export async function loadConfig(cli: CliConfig, env: NodeJS.ProcessEnv = process.env): Promise<BridgeConfig> {
  const configPath = cli.config ?? getEnv("CONFIG", env);
  if (!configPath) return resolveConfig(cli, env);
  const file = await readConfigFile(configPath);
  return resolveConfig(cli, env, file, path.dirname(path.resolve(configPath)));
}
