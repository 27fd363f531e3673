/** Environment variable names read by the worker. */
export const BRIDGE_ENV = {
  CONFIG: "WIREBRIDGE_CONFIG",
  ARRAYS: "WIREBRIDGE_ARRAYS",
  TABLES: "WIREBRIDGE_TABLES",
  LOG_LEVEL: "WIREBRIDGE_LOG_LEVEL",
  LOG_FORMAT: "WIREBRIDGE_LOG_FORMAT",
} as const;

export function getEnv(
  key: keyof typeof BRIDGE_ENV,
  env: NodeJS.ProcessEnv = process.env
): string | undefined {
  const value = env[BRIDGE_ENV[key]];
  return value === "" ? undefined : value;
}

const TRUTHY = ["1", "true", "yes", "on"];
const FALSY = ["0", "false", "no", "off"];

/** Read a boolean flag; anything unrecognised counts as unset. */
export function getEnvFlag(
  key: keyof typeof BRIDGE_ENV,
  env: NodeJS.ProcessEnv = process.env
): boolean | undefined {
  const raw = getEnv(key, env)?.trim().toLowerCase();
  if (raw === undefined) return undefined;
  if (TRUTHY.includes(raw)) return true;
  if (FALSY.includes(raw)) return false;
  return undefined;
}
