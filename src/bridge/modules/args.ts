import { isDType, type DType, type Scalar } from "../../protocols/wire/dtype.js";
import { DataFrame, Series } from "../../protocols/wire/frame.js";
import { NDArray, type NestedScalars } from "../../protocols/wire/ndarray.js";
import type { ExtendedMapping, ExtendedValue } from "../../protocols/wire/types.js";

/** Name of a decoded value's kind, for error messages. */
export function kindOf(value: ExtendedValue | undefined): string {
  if (value === undefined) return "nothing";
  if (value === null) return "null";
  if (Array.isArray(value)) return "list";
  if (value instanceof Uint8Array) return "bytes";
  if (value instanceof NDArray) return "ndarray";
  if (value instanceof DataFrame) return "DataFrame";
  if (value instanceof Series) return "Series";
  if (typeof value === "object") return "dict";
  return typeof value;
}

export function isMapping(value: ExtendedValue | undefined): value is ExtendedMapping {
  return (
    typeof value === "object" &&
    value !== null &&
    !Array.isArray(value) &&
    !(value instanceof Uint8Array) &&
    !(value instanceof NDArray) &&
    !(value instanceof DataFrame) &&
    !(value instanceof Series)
  );
}

export function expectArity(fn: string, args: readonly ExtendedValue[], min: number, max = min): void {
  if (args.length >= min && args.length <= max) return;
  const expected = min === max ? `exactly ${min}` : `${min} to ${max}`;
  throw new TypeError(`${fn}() takes ${expected} argument${max === 1 ? "" : "s"} (${args.length} given)`);
}

export function expectNumber(fn: string, value: ExtendedValue | undefined): number {
  if (typeof value === "number") return value;
  if (typeof value === "boolean") return Number(value);
  throw new TypeError(`${fn}() argument must be a real number, not ${kindOf(value)}`);
}

export function expectInteger(fn: string, value: ExtendedValue | undefined): number {
  const n = expectNumber(fn, value);
  if (!Number.isInteger(n)) throw new TypeError(`${fn}() argument must be an integer, not ${n}`);
  return n;
}

export function expectString(fn: string, value: ExtendedValue | undefined): string {
  if (typeof value === "string") return value;
  throw new TypeError(`${fn}() argument must be a string, not ${kindOf(value)}`);
}

export function expectNDArray(fn: string, value: ExtendedValue | undefined): NDArray {
  if (value instanceof NDArray) return value;
  if (value instanceof Series) return value.values;
  throw new TypeError(`${fn}() argument must be an ndarray, not ${kindOf(value)}`);
}

export function expectFrame(fn: string, value: ExtendedValue | undefined): DataFrame {
  if (value instanceof DataFrame) return value;
  throw new TypeError(`${fn}() argument must be a DataFrame, not ${kindOf(value)}`);
}

export function expectShape(fn: string, value: ExtendedValue | undefined): number[] {
  if (typeof value === "number") return [expectInteger(fn, value)];
  if (Array.isArray(value)) return value.map((dim) => expectInteger(fn, dim));
  throw new TypeError(`${fn}() shape must be an integer or a list of integers, not ${kindOf(value)}`);
}

/** Dtype given positionally (`"i32"`) or as a keyword mapping (`{dtype: "i32"}`). */
export function readDtype(fn: string, value: ExtendedValue | undefined, fallback: DType): DType {
  const raw = isMapping(value) ? value.dtype : value;
  if (raw === undefined || raw === null) return fallback;
  if (isDType(raw)) return raw;
  throw new TypeError(`${fn}() got an unknown dtype ${typeof raw === "string" ? `'${raw}'` : kindOf(raw)}`);
}

export function toNestedScalars(fn: string, value: ExtendedValue): NestedScalars {
  if (typeof value === "number") return value;
  if (typeof value === "boolean") return Number(value);
  if (Array.isArray(value)) return value.map((item) => toNestedScalars(fn, item));
  if (value instanceof NDArray) return value.toNested();
  throw new TypeError(`${fn}() expected numbers, got ${kindOf(value)}`);
}

/** Plain JSON number where it fits exactly, decimal string otherwise (large 64-bit values). */
export function toWireScalar(value: Scalar): number | string {
  if (typeof value === "number") return value;
  const n = Number(value);
  return Number.isSafeInteger(n) ? n : value.toString();
}

export type WireNested = number | string | WireNested[];

export function toWireNested(value: NestedScalars): WireNested {
  return Array.isArray(value) ? value.map(toWireNested) : toWireScalar(value);
}
