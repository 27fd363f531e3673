import { Writable } from "node:stream";
import pino from "pino";
import pinoPretty from "pino-pretty";
import { BRIDGE_NAME } from "./constants.js";

export type LogLevel = "error" | "warn" | "info" | "debug";
export type LogFormat = "text" | "json" | "plain";

export const LOG_LEVELS: readonly LogLevel[] = ["error", "warn", "info", "debug"];
export const LOG_FORMATS: readonly LogFormat[] = ["text", "json", "plain"];

export function isLogLevel(s: string): s is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(s);
}

export function isLogFormat(s: string): s is LogFormat {
  return (LOG_FORMATS as readonly string[]).includes(s);
}

/** Writable that parses pino JSON lines and writes only the message (no time/level). */
function plainMessageStderr(): Writable {
  let buffer = "";
  return new Writable({
    write(chunk: Buffer | string, _enc, cb) {
      buffer += typeof chunk === "string" ? chunk : chunk.toString("utf8");
      const lines = buffer.split("\n");
      buffer = lines.pop() ?? "";
      for (const line of lines) {
        if (!line.trim()) continue;
        try {
          const o = JSON.parse(line) as { msg?: unknown };
          if (typeof o.msg === "string") {
            process.stderr.write(o.msg + "\n");
          }
        } catch {
          process.stderr.write(line + "\n");
        }
      }
      cb();
    },
  });
}

let rootLogger: pino.Logger | null = null;

// stdout carries protocol lines only, so every format writes to stderr.
export function initLogger(level = "info", format = "text"): pino.Logger {
  const logLevel = isLogLevel(level) ? level : "info";
  const logFormat = isLogFormat(format) ? format : "text";
  const options = { level: logLevel, name: BRIDGE_NAME };
  if (logFormat === "plain") {
    rootLogger = pino(options, plainMessageStderr());
  } else if (logFormat === "text") {
    rootLogger = pino(options, pinoPretty({ colorize: false, destination: 2 }));
  } else {
    rootLogger = pino(options, pino.destination(2));
  }
  return rootLogger;
}

function ensureLogger(): pino.Logger {
  return rootLogger ?? initLogger("info", "plain");
}

export function getLogger(): pino.Logger {
  return ensureLogger();
}

export type Logger = pino.Logger;

export const log = {
  info: (...args: Parameters<pino.Logger["info"]>) => ensureLogger().info(...args),
  warn: (...args: Parameters<pino.Logger["warn"]>) => ensureLogger().warn(...args),
  error: (...args: Parameters<pino.Logger["error"]>) => ensureLogger().error(...args),
  debug: (...args: Parameters<pino.Logger["debug"]>) => ensureLogger().debug(...args),
};
