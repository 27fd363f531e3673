import { setTimeout as sleep } from "node:timers/promises";
import { DataFrame, Series } from "../../protocols/wire/frame.js";
import { NDArray } from "../../protocols/wire/ndarray.js";
import type { BridgeModule } from "../registry.js";
import { expectArity, expectNumber, isMapping, kindOf } from "./args.js";

/** General-purpose callables, mostly useful for probing a worker. */
export const builtins: BridgeModule = {
  echo: (...args) => (args.length === 1 ? args[0] : args),
  len: (...args) => {
    expectArity("len", args, 1);
    const value = args[0];
    if (typeof value === "string" || Array.isArray(value)) return value.length;
    if (value instanceof Uint8Array) return value.byteLength;
    if (value instanceof NDArray) {
      if (value.ndim === 0) throw new TypeError("len() of unsized object");
      return value.shape[0];
    }
    if (value instanceof DataFrame) return value.rows;
    if (value instanceof Series) return value.length;
    if (isMapping(value)) return Object.keys(value).length;
    throw new TypeError(`object of type '${kindOf(value)}' has no len()`);
  },
  type: (...args) => {
    expectArity("type", args, 1);
    return kindOf(args[0]);
  },
  sleep: async (...args) => {
    expectArity("sleep", args, 1);
    const ms = expectNumber("sleep", args[0]);
    if (ms < 0) throw new RangeError("sleep length must be non-negative");
    await sleep(ms);
    return null;
  },
  fail: (...args) => {
    const message = args.length > 0 ? String(args[0]) : "failure requested";
    throw new Error(message);
  },
};
