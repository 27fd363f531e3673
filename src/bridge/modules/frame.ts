import type { Scalar } from "../../protocols/wire/dtype.js";
import { DataFrame, type IndexLabel } from "../../protocols/wire/frame.js";
import { NDArray } from "../../protocols/wire/ndarray.js";
import type { ExtendedValue } from "../../protocols/wire/types.js";
import type { BridgeModule } from "../registry.js";
import { expectArity, expectFrame, expectNumber, expectString, isMapping, kindOf, readDtype, toWireScalar } from "./args.js";

function toLabels(fn: string, value: ExtendedValue | undefined): IndexLabel[] {
  if (!Array.isArray(value)) throw new TypeError(`${fn}() index must be a list, not ${kindOf(value)}`);
  return value.map((label) => {
    if (typeof label === "string" || typeof label === "number") return label;
    throw new TypeError(`${fn}() index labels must be strings or numbers, not ${kindOf(label)}`);
  });
}

/** Tabular helpers; registered only when the worker has the `tables` capability. */
export const frame: BridgeModule = {
  /** `{column: [values...]}` to a frame; every column must have the same length. */
  from_columns: (...args) => {
    expectArity("from_columns", args, 1, 2);
    const source = args[0];
    if (!isMapping(source)) throw new TypeError(`from_columns() argument must be a dict, not ${kindOf(source)}`);
    const columns = Object.keys(source);
    const data = columns.map((name) => {
      const column = source[name];
      if (!Array.isArray(column)) throw new TypeError(`column '${name}' must be a list, not ${kindOf(column)}`);
      return column.map((x) => expectNumber("from_columns", x));
    });
    const rows = data.length > 0 ? data[0].length : 0;
    if (data.some((column) => column.length !== rows)) {
      throw new RangeError("All arrays must be of the same length");
    }
    const values: Scalar[] = [];
    for (let i = 0; i < rows; i++) {
      for (const column of data) values.push(column[i]);
    }
    const dtype = readDtype("from_columns", args[1], "f64");
    return new DataFrame(columns, NDArray.from(values, dtype, [rows, columns.length]));
  },
  columns: (...args) => {
    expectArity("columns", args, 1);
    return [...expectFrame("columns", args[0]).columns];
  },
  column: (...args) => {
    expectArity("column", args, 2);
    return expectFrame("column", args[0]).column(expectString("column", args[1]));
  },
  shape: (...args) => {
    expectArity("shape", args, 1);
    const df = expectFrame("shape", args[0]);
    return [df.rows, df.columns.length];
  },
  records: (...args) => {
    expectArity("records", args, 1);
    return expectFrame("records", args[0])
      .toRecords()
      .map((record) => Object.fromEntries(Object.entries(record).map(([k, v]): [string, number | string] => [k, toWireScalar(v)])));
  },
  set_index: (...args) => {
    expectArity("set_index", args, 2);
    const df = expectFrame("set_index", args[0]);
    return new DataFrame(df.columns, df.values, toLabels("set_index", args[1]));
  },
};
