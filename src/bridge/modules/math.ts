import type { BridgeModule } from "../registry.js";
import { expectArity, expectInteger, expectNumber } from "./args.js";
import type { ExtendedValue } from "../../protocols/wire/types.js";

type Unary = (x: number) => number;

function unary(name: string, impl: Unary): (...args: ExtendedValue[]) => number {
  return (...args) => {
    expectArity(name, args, 1);
    return impl(expectNumber(name, args[0]));
  };
}

function domain(ok: boolean): void {
  if (!ok) throw new RangeError("math domain error");
}

export const math: BridgeModule = {
  sqrt: unary("sqrt", (x) => {
    domain(x >= 0);
    return Math.sqrt(x);
  }),
  exp: unary("exp", Math.exp),
  fabs: unary("fabs", Math.abs),
  floor: unary("floor", Math.floor),
  ceil: unary("ceil", Math.ceil),
  trunc: unary("trunc", Math.trunc),
  sin: unary("sin", Math.sin),
  cos: unary("cos", Math.cos),
  tan: unary("tan", Math.tan),
  log2: unary("log2", (x) => {
    domain(x > 0);
    return Math.log2(x);
  }),
  log10: unary("log10", (x) => {
    domain(x > 0);
    return Math.log10(x);
  }),
  log: (...args) => {
    expectArity("log", args, 1, 2);
    const x = expectNumber("log", args[0]);
    domain(x > 0);
    if (args.length === 1) return Math.log(x);
    const base = expectNumber("log", args[1]);
    domain(base > 0 && base !== 1);
    return Math.log(x) / Math.log(base);
  },
  pow: (...args) => {
    expectArity("pow", args, 2);
    return Math.pow(expectNumber("pow", args[0]), expectNumber("pow", args[1]));
  },
  hypot: (...args) => Math.hypot(...args.map((x) => expectNumber("hypot", x))),
  fsum: (...args) => {
    expectArity("fsum", args, 1);
    const values = args[0];
    if (!Array.isArray(values)) throw new TypeError("fsum() argument must be a list of numbers");
    return values.reduce<number>((acc, x) => acc + expectNumber("fsum", x), 0);
  },
  factorial: (...args) => {
    expectArity("factorial", args, 1);
    const n = expectInteger("factorial", args[0]);
    if (n < 0) throw new RangeError("factorial() not defined for negative values");
    let result = 1;
    for (let i = 2; i <= n; i++) result *= i;
    return result;
  },
  gcd: (...args) => {
    let result = 0;
    for (const arg of args) {
      let b = Math.abs(expectInteger("gcd", arg));
      let a = result;
      while (b !== 0) [a, b] = [b, a % b];
      result = a;
    }
    return result;
  },
};
