/**
 * Wire codec: recursive conversion between JSON-safe wire values and extended
 * native values. One codec serves every worker variant; which tagged kinds it
 * accepts is decided by its capability flags.
 *
 * Marker keys are reserved. A mapping that really needs a key named like a
 * marker is read as the tagged form; there is no escaping.
 */

import { type } from "arktype";
import { BYTES_MARKER, FRAME_MARKER, NDARRAY_MARKER } from "../../shared/constants.js";
import { CodecError, UnsupportedTypeError } from "../../shared/errors.js";
import { decodeBase64, encodeBase64 } from "./base64.js";
import { dtypeFromTag, toTypedArray } from "./dtype.js";
import { DataFrame, Series } from "./frame.js";
import { NDArray } from "./ndarray.js";
import {
  FramePayloadSchema,
  NDArrayPayloadSchema,
  normalizeCapabilities,
  type Capabilities,
  type ExtendedMapping,
  type ExtendedValue,
  type FrameWire,
  type NDArrayWire,
  type WireValue,
} from "./types.js";

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isPlainObject(value: object): boolean {
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

function isIterable(value: unknown): value is Iterable<unknown> {
  return typeof value === "object" && value !== null && typeof Reflect.get(value, Symbol.iterator) === "function";
}

function asRawBytes(value: object): Uint8Array | undefined {
  if (value instanceof Uint8Array) return value;
  if (value instanceof ArrayBuffer) return new Uint8Array(value);
  if (value instanceof DataView) return new Uint8Array(value.buffer, value.byteOffset, value.byteLength);
  return undefined;
}

/** Default textual form, used when nothing else applies. */
export function describeValue(value: unknown): string {
  if (typeof value === "function") return `[Function: ${value.name || "anonymous"}]`;
  try {
    return String(value);
  } catch {
    return Object.prototype.toString.call(value);
  }
}

/** Marker payload failures from lower layers (shape/size checks) are reported as codec errors. */
function asCodecError(err: unknown): unknown {
  return err instanceof RangeError ? new CodecError(err.message) : err;
}

export function encodeNDArray(array: NDArray): NDArrayWire {
  return {
    dtype: array.dtype,
    shape: [...array.shape],
    data: encodeBase64(array.toBytes()),
  };
}

export function encodeFrame(frame: DataFrame): FrameWire {
  return {
    columns: [...frame.columns],
    data: encodeNDArray(frame.values),
    index: frame.index ? [...frame.index] : null,
  };
}

export class WireCodec {
  readonly capabilities: Readonly<Capabilities>;

  constructor(capabilities: Partial<Capabilities> = {}) {
    this.capabilities = normalizeCapabilities(capabilities);
  }

  decode(value: unknown): ExtendedValue {
    if (value === null || typeof value === "boolean" || typeof value === "number" || typeof value === "string") {
      return value;
    }
    if (Array.isArray(value)) return this.decodeSequence(value);
    if (isRecord(value)) {
      if (Object.hasOwn(value, NDARRAY_MARKER)) return this.decodeNDArray(value[NDARRAY_MARKER]);
      if (Object.hasOwn(value, FRAME_MARKER)) return this.decodeFrame(value[FRAME_MARKER]);
      if (Object.hasOwn(value, BYTES_MARKER)) return this.decodeBytes(value[BYTES_MARKER]);
      return this.decodeMapping(value);
    }
    throw new CodecError(`not a wire value: ${typeof value}`);
  }

  decodeSequence(values: readonly unknown[]): ExtendedValue[] {
    return values.map((item) => this.decode(item));
  }

  /** Decode the values of a mapping without looking for markers on the mapping itself. */
  decodeMapping(value: Record<string, unknown>): ExtendedMapping {
    return Object.fromEntries(Object.entries(value).map(([key, item]): [string, ExtendedValue] => [key, this.decode(item)]));
  }

  private decodeBytes(payload: unknown): Buffer {
    if (typeof payload !== "string") {
      throw new CodecError(`${BYTES_MARKER} payload must be a base64 string`);
    }
    return decodeBase64(payload, BYTES_MARKER);
  }

  private decodeNDArray(payload: unknown): NDArray {
    if (!this.capabilities.arrays) {
      throw new UnsupportedTypeError(`${NDARRAY_MARKER} received but typed arrays are not enabled`);
    }
    const parsed = NDArrayPayloadSchema(payload);
    if (parsed instanceof type.errors) {
      throw new CodecError(`${NDARRAY_MARKER} payload ${parsed.summary}`);
    }
    const bytes = decodeBase64(parsed.data, `${NDARRAY_MARKER}.data`);
    try {
      return NDArray.fromBytes(dtypeFromTag(parsed.dtype), bytes, parsed.shape);
    } catch (err) {
      throw asCodecError(err);
    }
  }

  private decodeFrame(payload: unknown): DataFrame {
    if (!this.capabilities.tables) {
      throw new UnsupportedTypeError(`${FRAME_MARKER} received but tables are not enabled`);
    }
    const parsed = FramePayloadSchema(payload);
    if (parsed instanceof type.errors) {
      throw new CodecError(`${FRAME_MARKER} payload ${parsed.summary}`);
    }
    const values = this.decodeNDArray(parsed.data);
    const index = parsed.index && parsed.index.length > 0 ? parsed.index : null;
    try {
      return new DataFrame(parsed.columns.map(String), values, index);
    } catch (err) {
      throw asCodecError(err);
    }
  }

  /** Never throws: anything unrecognised degrades to its string form. */
  encode(value: unknown): WireValue {
    if (value === null || value === undefined) return null;
    if (typeof value === "number" || typeof value === "string" || typeof value === "boolean") return value;
    if (typeof value !== "object") return describeValue(value);

    const bytes = asRawBytes(value);
    if (bytes) return { [BYTES_MARKER]: encodeBase64(bytes) };
    if (Array.isArray(value)) return value.map((item: unknown) => this.encode(item));
    if (value instanceof Map || isPlainObject(value)) {
      // Reading entries can run user getters; a throwing one degrades the whole mapping.
      try {
        return this.encodeMapping(value);
      } catch {
        return describeValue(value);
      }
    }

    if (this.capabilities.arrays) {
      if (value instanceof NDArray) return { [NDARRAY_MARKER]: encodeNDArray(value) };
      if (ArrayBuffer.isView(value)) {
        const encoded = this.encodeTypedArray(value);
        if (encoded) return encoded;
      }
    }
    if (this.capabilities.tables) {
      if (value instanceof DataFrame) return { [FRAME_MARKER]: encodeFrame(value) };
      if (value instanceof Series) return { [NDARRAY_MARKER]: encodeNDArray(value.values) };
    }

    if (isIterable(value)) {
      try {
        return Array.from(value, (item) => this.encode(item));
      } catch {
        return describeValue(value);
      }
    }
    return describeValue(value);
  }

  private encodeMapping(value: object): { [key: string]: WireValue } {
    if (value instanceof Map) {
      return Object.fromEntries(Array.from(value, ([key, item]: [unknown, unknown]): [string, WireValue] => [describeValue(key), this.encode(item)]));
    }
    return Object.fromEntries(Object.entries(value).map(([key, item]: [string, unknown]): [string, WireValue] => [key, this.encode(item)]));
  }

  private encodeTypedArray(view: ArrayBufferView): WireValue | undefined {
    const typed = toTypedArray(view);
    if (typed) return { [NDARRAY_MARKER]: encodeNDArray(new NDArray(typed)) };
    // Element kinds outside the table travel as f64, converted so bytes and tag agree.
    if (view instanceof Uint8ClampedArray) {
      return { [NDARRAY_MARKER]: encodeNDArray(new NDArray(Float64Array.from(view))) };
    }
    return undefined;
  }
}
