/**
 * Fixed table of numeric element kinds. The set is closed at the wire level:
 * a tag outside it decodes as `f64`.
 */

export type DType = "f64" | "f32" | "i64" | "i32" | "i16" | "i8" | "u64" | "u32" | "u16" | "u8";

export type TypedArray =
  | Float64Array
  | Float32Array
  | BigInt64Array
  | Int32Array
  | Int16Array
  | Int8Array
  | BigUint64Array
  | Uint32Array
  | Uint16Array
  | Uint8Array;

export type Scalar = number | bigint;

export const DEFAULT_DTYPE: DType = "f64";

export const ITEMSIZE: Readonly<Record<DType, number>> = {
  f64: 8,
  f32: 4,
  i64: 8,
  i32: 4,
  i16: 2,
  i8: 1,
  u64: 8,
  u32: 4,
  u16: 2,
  u8: 1,
};

export const DTYPES: readonly DType[] = ["f64", "f32", "i64", "i32", "i16", "i8", "u64", "u32", "u16", "u8"];

export function isDType(tag: unknown): tag is DType {
  return typeof tag === "string" && (DTYPES as readonly string[]).includes(tag);
}

/** Lenient lookup: unknown tags fall back to `f64`. */
export function dtypeFromTag(tag: string): DType {
  return isDType(tag) ? tag : DEFAULT_DTYPE;
}

/** Narrow a view to one of the tabled element kinds; Uint8ClampedArray and DataView are not among them. */
export function toTypedArray(candidate: ArrayBufferView): TypedArray | undefined {
  if (candidate instanceof Float64Array) return candidate;
  if (candidate instanceof Float32Array) return candidate;
  if (candidate instanceof BigInt64Array) return candidate;
  if (candidate instanceof Int32Array) return candidate;
  if (candidate instanceof Int16Array) return candidate;
  if (candidate instanceof Int8Array) return candidate;
  if (candidate instanceof BigUint64Array) return candidate;
  if (candidate instanceof Uint32Array) return candidate;
  if (candidate instanceof Uint16Array) return candidate;
  if (candidate instanceof Uint8Array) return candidate;
  return undefined;
}

export function dtypeOf(array: TypedArray): DType {
  if (array instanceof Float64Array) return "f64";
  if (array instanceof Float32Array) return "f32";
  if (array instanceof BigInt64Array) return "i64";
  if (array instanceof Int32Array) return "i32";
  if (array instanceof Int16Array) return "i16";
  if (array instanceof Int8Array) return "i8";
  if (array instanceof BigUint64Array) return "u64";
  if (array instanceof Uint32Array) return "u32";
  if (array instanceof Uint16Array) return "u16";
  return "u8";
}

export function isBigIntDType(dtype: DType): boolean {
  return dtype === "i64" || dtype === "u64";
}

export function allocate(dtype: DType, length: number): TypedArray {
  return view(dtype, new ArrayBuffer(length * ITEMSIZE[dtype]));
}

/** Typed view over a whole buffer; the byte length must be a multiple of the item size. */
export function view(dtype: DType, buffer: ArrayBuffer): TypedArray {
  switch (dtype) {
    case "f64":
      return new Float64Array(buffer);
    case "f32":
      return new Float32Array(buffer);
    case "i64":
      return new BigInt64Array(buffer);
    case "i32":
      return new Int32Array(buffer);
    case "i16":
      return new Int16Array(buffer);
    case "i8":
      return new Int8Array(buffer);
    case "u64":
      return new BigUint64Array(buffer);
    case "u32":
      return new Uint32Array(buffer);
    case "u16":
      return new Uint16Array(buffer);
    case "u8":
      return new Uint8Array(buffer);
  }
}

/** Write scalars into a typed array, converting between number and bigint as the element kind needs. */
export function fill(target: TypedArray, values: ArrayLike<Scalar>): void {
  if (target.length !== values.length) {
    throw new RangeError(`cannot fill ${target.length} elements from ${values.length} values`);
  }
  if (target instanceof BigInt64Array || target instanceof BigUint64Array) {
    for (let i = 0; i < values.length; i++) target[i] = toBigInt(values[i]);
    return;
  }
  for (let i = 0; i < values.length; i++) target[i] = Number(values[i]);
}

function toBigInt(value: Scalar): bigint {
  if (typeof value === "bigint") return value;
  if (!Number.isInteger(value)) {
    throw new RangeError(`${value} is not an integer and cannot be stored in a 64-bit integer array`);
  }
  return BigInt(value);
}
