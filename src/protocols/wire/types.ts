import { type } from "arktype";
import type { DType } from "./dtype.js";
import type { DataFrame, IndexLabel, Series } from "./frame.js";
import type { NDArray } from "./ndarray.js";

/** JSON-representable value: the only kind of value that reaches the transport. */
export type WireValue = null | boolean | number | string | WireValue[] | { [key: string]: WireValue };

/** Wire values plus the native kinds that travel as tagged mappings. */
export type ExtendedValue =
  | null
  | boolean
  | number
  | string
  | Uint8Array
  | NDArray
  | DataFrame
  | Series
  | ExtendedValue[]
  | { [key: string]: ExtendedValue };

export type ExtendedMapping = { [key: string]: ExtendedValue };

/** Optional value kinds a worker instance understands. */
export interface Capabilities {
  arrays: boolean;
  tables: boolean;
}

/** Frames are built on typed arrays, so tables are only available alongside arrays. */
export function normalizeCapabilities(caps: Partial<Capabilities>): Capabilities {
  const arrays = caps.arrays ?? true;
  return { arrays, tables: arrays && (caps.tables ?? true) };
}

export type NDArrayWire = { dtype: DType; shape: number[]; data: string };
export type FrameWire = { columns: string[]; data: NDArrayWire; index: IndexLabel[] | null };

export const NDArrayPayloadSchema = type({
  dtype: "string",
  shape: "number[]",
  data: "string",
});

export const FramePayloadSchema = type({
  columns: "(string | number)[]",
  data: "unknown",
  "index?": "(string | number)[] | null",
});
