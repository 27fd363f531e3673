import { type } from "arktype";
import type { WireValue } from "../wire/types.js";

export const CONTROL_COMMANDS = ["ping", "health"] as const;
export type ControlCommand = (typeof CONTROL_COMMANDS)[number];

export const RequestEnvelopeSchema = type({
  m: "string",
  f: "string",
  "a?": "unknown[]",
  "k?": "unknown",
});

export const ReadyEnvelopeSchema = type({
  ready: "true",
  "arrays?": "boolean",
  "tables?": "boolean",
});

/** Exactly one of `ok` or `error`. */
export type ResponseEnvelope = { ok: WireValue } | { error: string };

export type ReadyEnvelope = { ready: true; arrays: boolean; tables: boolean };

/** A request after envelope checks: arguments are still in wire form. */
export interface CallRequest {
  module: string;
  fn: string;
  args: unknown[];
  kwargs: Record<string, unknown>;
}
