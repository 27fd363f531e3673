import type { Capabilities, WireValue } from "../wire/types.js";
import type { ReadyEnvelope, ResponseEnvelope } from "./types.js";

export function okResponse(value: WireValue): ResponseEnvelope {
  return { ok: value };
}

/** Error strings are single-line; embedded line breaks collapse to one space. */
export function errorResponse(message: string): ResponseEnvelope {
  return { error: message.replace(/\s*[\r\n]+\s*/g, " ").trim() };
}

export function readyEnvelope(capabilities: Readonly<Capabilities>): ReadyEnvelope {
  return { ready: true, arrays: capabilities.arrays, tables: capabilities.tables };
}
