import { allocate, dtypeOf, fill, ITEMSIZE, view, type DType, type Scalar, type TypedArray } from "./dtype.js";

export type NestedScalars = Scalar | NestedScalars[];

function product(shape: readonly number[]): number {
  return shape.reduce((acc, n) => acc * n, 1);
}

function formatShape(shape: readonly number[]): string {
  return shape.length === 1 ? `(${shape[0]},)` : `(${shape.join(", ")})`;
}

export function assertShape(shape: readonly number[], size: number): void {
  for (const dim of shape) {
    if (!Number.isInteger(dim) || dim < 0) {
      throw new RangeError(`invalid dimension ${dim} in shape ${formatShape(shape)}`);
    }
  }
  if (product(shape) !== size) {
    throw new RangeError(`cannot reshape array of size ${size} into shape ${formatShape(shape)}`);
  }
}

/**
 * N-dimensional numeric array: a contiguous row-major typed buffer with a dtype
 * tag and a shape. `i64`/`u64` elements are bigints, every other kind is a number.
 */
export class NDArray {
  readonly dtype: DType;
  readonly shape: readonly number[];
  readonly data: TypedArray;

  constructor(data: TypedArray, shape: readonly number[] = [data.length]) {
    assertShape(shape, data.length);
    this.dtype = dtypeOf(data);
    this.shape = [...shape];
    this.data = data;
  }

  /** Copy raw native-endian bytes into a fresh buffer of the given dtype. */
  static fromBytes(dtype: DType, bytes: Uint8Array, shape?: readonly number[]): NDArray {
    const itemsize = ITEMSIZE[dtype];
    if (bytes.byteLength % itemsize !== 0) {
      throw new RangeError(`buffer size ${bytes.byteLength} must be a multiple of element size ${itemsize}`);
    }
    const buffer = new ArrayBuffer(bytes.byteLength);
    new Uint8Array(buffer).set(bytes);
    const data = view(dtype, buffer);
    return new NDArray(data, shape && shape.length > 0 ? shape : [data.length]);
  }

  static from(values: ArrayLike<Scalar>, dtype: DType, shape: readonly number[] = [values.length]): NDArray {
    const data = allocate(dtype, values.length);
    fill(data, values);
    return new NDArray(data, shape);
  }

  /** Build from nested sequences; every level must be rectangular. */
  static fromNested(values: NestedScalars, dtype: DType): NDArray {
    const shape: number[] = [];
    let probe: NestedScalars = values;
    while (Array.isArray(probe)) {
      shape.push(probe.length);
      if (probe.length === 0) break;
      probe = probe[0];
    }
    const flat: Scalar[] = [];
    const walk = (node: NestedScalars, depth: number): void => {
      if (depth === shape.length) {
        if (Array.isArray(node)) throw new RangeError("inhomogeneous nesting depth");
        flat.push(node);
        return;
      }
      if (!Array.isArray(node) || node.length !== shape[depth]) {
        throw new RangeError(`inhomogeneous shape at depth ${depth}`);
      }
      for (const child of node) walk(child, depth + 1);
    };
    walk(values, 0);
    return NDArray.from(flat, dtype, shape);
  }

  get ndim(): number {
    return this.shape.length;
  }

  get size(): number {
    return this.data.length;
  }

  get itemsize(): number {
    return ITEMSIZE[this.dtype];
  }

  /** Element at a full index, row-major. */
  at(...index: number[]): Scalar {
    if (index.length !== this.ndim) {
      throw new RangeError(`expected ${this.ndim} indices, got ${index.length}`);
    }
    let offset = 0;
    for (let axis = 0; axis < this.ndim; axis++) {
      const i = index[axis];
      const dim = this.shape[axis];
      if (!Number.isInteger(i) || i < 0 || i >= dim) {
        throw new RangeError(`index ${i} is out of bounds for axis ${axis} with size ${dim}`);
      }
      offset = offset * dim + i;
    }
    return this.data[offset];
  }

  /** Same buffer, new shape. */
  reshape(shape: readonly number[]): NDArray {
    return new NDArray(this.data, shape);
  }

  toBytes(): Uint8Array {
    return new Uint8Array(this.data.buffer, this.data.byteOffset, this.data.byteLength);
  }

  toNested(): NestedScalars {
    if (this.ndim === 0) return this.data[0];
    const build = (axis: number, offset: number): NestedScalars[] => {
      const dim = this.shape[axis];
      const stride = product(this.shape.slice(axis + 1));
      const out: NestedScalars[] = [];
      for (let i = 0; i < dim; i++) {
        out.push(axis === this.ndim - 1 ? this.data[offset + i] : build(axis + 1, offset + i * stride));
      }
      return out;
    };
    return build(0, 0);
  }

  /** Iterates the first axis: scalars for a 1-D array, sub-array views otherwise. */
  *[Symbol.iterator](): Iterator<Scalar | NDArray> {
    if (this.ndim === 0) throw new TypeError("iteration over a 0-d array");
    if (this.ndim === 1) {
      for (let i = 0; i < this.data.length; i++) yield this.data[i];
      return;
    }
    const inner = this.shape.slice(1);
    const stride = product(inner);
    for (let i = 0; i < this.shape[0]; i++) {
      yield new NDArray(this.data.subarray(i * stride, (i + 1) * stride), inner);
    }
  }

  toString(): string {
    return `array(${formatNested(this.toNested())}, dtype=${this.dtype})`;
  }
}

function formatNested(value: NestedScalars): string {
  return Array.isArray(value) ? `[${value.map(formatNested).join(", ")}]` : String(value);
}
