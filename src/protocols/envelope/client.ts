/**
 * Host side of the protocol: build request lines for a worker and read its
 * response and ready lines back.
 */

import { type } from "arktype";
import { isRecord, type WireCodec } from "../wire/codec.js";
import type { Capabilities, ExtendedValue, WireValue } from "../wire/types.js";
import { isBlankLine, parseJsonLine, serializeLine } from "./codec.js";
import { ReadyEnvelopeSchema } from "./types.js";

export type InvalidReason = "empty_line" | "invalid_response" | "decode_failed";

export type DecodedResponse =
  | { kind: "ok"; value: ExtendedValue }
  | { kind: "error"; message: string }
  | { kind: "invalid"; reason: InvalidReason };

export function encodeRequest(
  codec: WireCodec,
  module: string,
  fn: string,
  args: readonly unknown[] = [],
  kwargs: Readonly<Record<string, unknown>> = {}
): string {
  const envelope: { m: string; f: string; a: WireValue; k?: WireValue } = {
    m: module,
    f: fn,
    a: codec.encode(args),
  };
  if (Object.keys(kwargs).length > 0) envelope.k = codec.encode(kwargs);
  return serializeLine(envelope);
}

export function decodeResponse(codec: WireCodec, line: string): DecodedResponse {
  if (isBlankLine(line)) return { kind: "invalid", reason: "empty_line" };
  let data: unknown;
  try {
    data = parseJsonLine(line);
  } catch {
    return { kind: "invalid", reason: "decode_failed" };
  }
  if (!isRecord(data)) return { kind: "invalid", reason: "invalid_response" };
  if (Object.hasOwn(data, "ok")) {
    try {
      return { kind: "ok", value: codec.decode(data.ok) };
    } catch {
      return { kind: "invalid", reason: "decode_failed" };
    }
  }
  if (Object.hasOwn(data, "error")) {
    return { kind: "error", message: String(data.error) };
  }
  return { kind: "invalid", reason: "invalid_response" };
}

/** Capabilities announced by a worker's first line, or undefined if the line is not a ready envelope. */
export function parseReady(line: string): Capabilities | undefined {
  let data: unknown;
  try {
    data = parseJsonLine(line);
  } catch {
    return undefined;
  }
  const ready = ReadyEnvelopeSchema(data);
  if (ready instanceof type.errors) return undefined;
  return { arrays: ready.arrays ?? false, tables: ready.tables ?? false };
}
