import { getLogger } from "./logging.js";

/** CLI exit codes. */
export const EXIT = {
  SUCCESS: 0,
  GENERIC_ERROR: 1,
  INVALID_ARGS: 2,
  CONFIG_FAILURE: 3,
  TRANSPORT_FAILURE: 4,
} as const;

export function exit(code: number, message?: string): never {
  if (message) {
    if (code === EXIT.SUCCESS) getLogger().info(message);
    else getLogger().error(message);
  }
  process.exit(code);
}

/** Thrown when a marker payload cannot be turned into a native value (bad base64, shape/size mismatch). */
export class CodecError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CodecError";
  }
}

/** Thrown when an array or frame marker arrives at a worker started without that capability. */
export class UnsupportedTypeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UnsupportedTypeError";
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}
