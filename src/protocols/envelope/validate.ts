import { type } from "arktype";
import { isRecord } from "../wire/codec.js";
import { CONTROL_COMMANDS, RequestEnvelopeSchema, type CallRequest, type ControlCommand } from "./types.js";

export type ClassifiedEnvelope =
  | { kind: "control"; cmd: ControlCommand }
  | { kind: "call"; request: CallRequest }
  | { kind: "invalid"; message: string };

export const MISSING_TARGET = "missing m or f";

function isControlCommand(value: unknown): value is ControlCommand {
  return typeof value === "string" && (CONTROL_COMMANDS as readonly string[]).includes(value);
}

function isMissing(value: unknown): boolean {
  return value === undefined || value === null || value === "";
}

function describeKind(value: unknown): string {
  if (value === null) return "null";
  return Array.isArray(value) ? "array" : typeof value;
}

/**
 * Sort a parsed line into a control command, a call, or an envelope error.
 * Control commands win over `m`/`f`; an unknown `cmd` is ignored.
 */
export function classifyEnvelope(data: unknown): ClassifiedEnvelope {
  if (!isRecord(data)) {
    return { kind: "invalid", message: "Invalid envelope: expected an object" };
  }
  if (isControlCommand(data.cmd)) {
    return { kind: "control", cmd: data.cmd };
  }
  if (isMissing(data.m) || isMissing(data.f)) {
    return { kind: "invalid", message: MISSING_TARGET };
  }
  const envelope = RequestEnvelopeSchema(data);
  if (envelope instanceof type.errors) {
    return { kind: "invalid", message: `Invalid envelope: ${envelope.summary}` };
  }
  const kwargs = envelope.k ?? {};
  if (!isRecord(kwargs)) {
    return { kind: "invalid", message: `Invalid envelope: k must be an object (was ${describeKind(kwargs)})` };
  }
  return {
    kind: "call",
    request: { module: envelope.m, fn: envelope.f, args: envelope.a ?? [], kwargs },
  };
}
