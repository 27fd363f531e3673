import type { DType, Scalar } from "../../protocols/wire/dtype.js";
import { allocate, isBigIntDType } from "../../protocols/wire/dtype.js";
import { NDArray } from "../../protocols/wire/ndarray.js";
import type { BridgeModule } from "../registry.js";
import {
  expectArity,
  expectInteger,
  expectNDArray,
  expectShape,
  readDtype,
  toNestedScalars,
  toWireNested,
  toWireScalar,
} from "./args.js";

function sumOf(array: NDArray): Scalar {
  if (isBigIntDType(array.dtype)) {
    let total = 0n;
    for (let i = 0; i < array.size; i++) total += BigInt(array.data[i]);
    return total;
  }
  let total = 0;
  for (let i = 0; i < array.size; i++) total += Number(array.data[i]);
  return total;
}

function range(stop: number, dtype: DType): NDArray {
  const values: number[] = [];
  for (let i = 0; i < stop; i++) values.push(i);
  return NDArray.from(values, dtype);
}

/** Typed-array helpers; registered only when the worker has the `arrays` capability. */
export const ndarray: BridgeModule = {
  array: (...args) => {
    expectArity("array", args, 1, 2);
    return NDArray.fromNested(toNestedScalars("array", args[0]), readDtype("array", args[1], "f64"));
  },
  zeros: (...args) => {
    expectArity("zeros", args, 1, 2);
    const shape = expectShape("zeros", args[0]);
    const size = shape.reduce((acc, n) => acc * n, 1);
    return new NDArray(allocate(readDtype("zeros", args[1], "f64"), size), shape);
  },
  arange: (...args) => {
    expectArity("arange", args, 1, 2);
    const stop = expectInteger("arange", args[0]);
    return range(Math.max(stop, 0), readDtype("arange", args[1], "i64"));
  },
  reshape: (...args) => {
    expectArity("reshape", args, 2);
    return expectNDArray("reshape", args[0]).reshape(expectShape("reshape", args[1]));
  },
  transpose: (...args) => {
    expectArity("transpose", args, 1);
    const array = expectNDArray("transpose", args[0]);
    if (array.ndim !== 2) return array;
    const [rows, cols] = array.shape;
    const values: Scalar[] = [];
    for (let j = 0; j < cols; j++) {
      for (let i = 0; i < rows; i++) values.push(array.data[i * cols + j]);
    }
    return NDArray.from(values, array.dtype, [cols, rows]);
  },
  sum: (...args) => {
    expectArity("sum", args, 1);
    return toWireScalar(sumOf(expectNDArray("sum", args[0])));
  },
  shape: (...args) => {
    expectArity("shape", args, 1);
    return [...expectNDArray("shape", args[0]).shape];
  },
  dtype: (...args) => {
    expectArity("dtype", args, 1);
    return expectNDArray("dtype", args[0]).dtype;
  },
  tolist: (...args) => {
    expectArity("tolist", args, 1);
    return toWireNested(expectNDArray("tolist", args[0]).toNested());
  },
};
