import { describe, it, expect } from "vitest";
import pino from "pino";
import { describeFailure, Dispatcher } from "../../src/bridge/dispatcher.js";
import { registerBuiltins } from "../../src/bridge/modules/index.js";
import { ModuleRegistry, type BridgeModule } from "../../src/bridge/registry.js";
import { WireCodec } from "../../src/protocols/wire/codec.js";
import { NDArray } from "../../src/protocols/wire/ndarray.js";
import type { Capabilities } from "../../src/protocols/wire/types.js";
import { CodecError, UnsupportedTypeError } from "../../src/shared/errors.js";

const silent = pino({ enabled: false });

const probe: BridgeModule = {
  argc: (...args) => args.length,
  last: (...args) => args[args.length - 1] ?? null,
  later: async (...args) => {
    await new Promise((resolve) => setTimeout(resolve, 5));
    return args[0] ?? null;
  },
  rejects: async () => {
    throw new RangeError("bad input");
  },
  throwsString: () => {
    throw "plain failure";
  },
  multiline: () => {
    throw new Error("line one\nline two");
  },
  nothing: () => undefined,
  bigint: () => 2n ** 70n,
};

function makeDispatcher(capabilities: Partial<Capabilities> = {}): Dispatcher {
  const codec = new WireCodec(capabilities);
  const registry = registerBuiltins(new ModuleRegistry(), codec.capabilities).register("probe", probe);
  return new Dispatcher({ registry, codec, logger: silent });
}

const send = (dispatcher: Dispatcher, data: unknown) => dispatcher.handleLine(JSON.stringify(data));

describe("Dispatcher.handleLine", () => {
  const dispatcher = makeDispatcher();

  it("calls a function and wraps the result", async () => {
    expect(await send(dispatcher, { m: "math", f: "sqrt", a: [16] })).toEqual({ ok: 4 });
  });

  it("returns null for a blank line", async () => {
    expect(await dispatcher.handleLine("")).toBeNull();
    expect(await dispatcher.handleLine("   \r")).toBeNull();
  });

  it("reports malformed JSON", async () => {
    const response = await dispatcher.handleLine("{not json");
    expect(response).toHaveProperty("error");
    if (response && "error" in response) expect(response.error.startsWith("Invalid JSON: ")).toBe(true);
  });

  it("answers control commands", async () => {
    expect(await send(dispatcher, { cmd: "ping" })).toEqual({ ok: "pong" });
    expect(await send(dispatcher, { cmd: "ping", m: "math", f: "sqrt", a: [4] })).toEqual({ ok: "pong" });
    const [major, minor] = process.versions.node.split(".").map(Number);
    expect(await send(dispatcher, { cmd: "health" })).toEqual({
      ok: { ok: true, arrays: true, tables: true, runtime: "node", runtime_version: [major, minor] },
    });
  });

  it("reports envelope problems", async () => {
    expect(await send(dispatcher, { m: "math" })).toEqual({ error: "missing m or f" });
    expect(await send(dispatcher, [1, 2])).toEqual({ error: "Invalid envelope: expected an object" });
  });

  it("reports unknown modules and functions", async () => {
    expect(await send(dispatcher, { m: "nosuch", f: "x" })).toEqual({
      error: "Module not found: nosuch - no module named 'nosuch'",
    });
    expect(await send(dispatcher, { m: "math", f: "nosuch" })).toEqual({
      error: "Function not found: nosuch in math - module 'math' has no function 'nosuch'",
    });
  });

  it("passes keywords only when there are some", async () => {
    expect(await send(dispatcher, { m: "probe", f: "argc", a: [1, 2], k: {} })).toEqual({ ok: 2 });
    expect(await send(dispatcher, { m: "probe", f: "argc", a: [1, 2], k: { x: 1 } })).toEqual({ ok: 3 });
    expect(await send(dispatcher, { m: "probe", f: "last", a: [1], k: { x: { __bytes__: "aGVsbG8=" } } })).toEqual({
      ok: { x: { __bytes__: "aGVsbG8=" } },
    });
  });

  it("classifies failures raised by the callable", async () => {
    expect(await send(dispatcher, { m: "math", f: "sqrt", a: ["x"] })).toEqual({
      error: "Type error: sqrt() argument must be a real number, not string",
    });
    expect(await send(dispatcher, { m: "math", f: "sqrt", a: [-1] })).toEqual({
      error: "Value error: math domain error",
    });
    expect(await send(dispatcher, { m: "probe", f: "rejects" })).toEqual({ error: "Value error: bad input" });
    expect(await send(dispatcher, { m: "probe", f: "throwsString" })).toEqual({ error: "Error: plain failure" });
    expect(await send(dispatcher, { m: "probe", f: "multiline" })).toEqual({ error: "Error: line one line two" });
  });

  it("reports argument decoding failures", async () => {
    expect(await send(dispatcher, { m: "probe", f: "argc", a: [{ __bytes__: "!!" }] })).toEqual({
      error: "CodecError: __bytes__: invalid base64 payload",
    });
  });

  it("awaits asynchronous results", async () => {
    expect(await send(dispatcher, { m: "probe", f: "later", a: ["done"] })).toEqual({ ok: "done" });
  });

  it("encodes odd return values", async () => {
    expect(await send(dispatcher, { m: "probe", f: "nothing" })).toEqual({ ok: null });
    expect(await send(dispatcher, { m: "probe", f: "bigint" })).toEqual({ ok: "1180591620717411303424" });
  });

  it("round-trips a typed array through a call", async () => {
    const response = await send(dispatcher, {
      m: "builtins",
      f: "echo",
      a: [{ __numpy_array__: { dtype: "i32", shape: [2, 2], data: "AQAAAAIAAAADAAAABAAAAA==" } }],
    });
    expect(response).toEqual({
      ok: { __numpy_array__: { dtype: "i32", shape: [2, 2], data: "AQAAAAIAAAADAAAABAAAAA==" } },
    });
  });
});

describe("Dispatcher without optional capabilities", () => {
  const dispatcher = makeDispatcher({ arrays: false });

  it("announces reduced capabilities", async () => {
    expect(dispatcher.ready()).toEqual({ ready: true, arrays: false, tables: false });
    const response = await send(dispatcher, { cmd: "health" });
    expect(response).toMatchObject({ ok: { ok: true, arrays: false, tables: false, runtime: "node" } });
  });

  it("rejects typed array arguments explicitly", async () => {
    expect(
      await send(dispatcher, {
        m: "builtins",
        f: "echo",
        a: [{ __numpy_array__: { dtype: "i32", shape: [1], data: "AQAAAA==" } }],
      })
    ).toEqual({
      error: "UnsupportedTypeError: __numpy_array__ received but typed arrays are not enabled",
    });
  });

  it("does not expose the array modules", async () => {
    expect(await send(dispatcher, { m: "ndarray", f: "zeros", a: [2] })).toEqual({
      error: "Module not found: ndarray - no module named 'ndarray'",
    });
  });
});

describe("describeFailure", () => {
  it("prefixes by error kind", () => {
    expect(describeFailure(new CodecError("x"))).toBe("CodecError: x");
    expect(describeFailure(new UnsupportedTypeError("y"))).toBe("UnsupportedTypeError: y");
    expect(describeFailure(new TypeError("t"))).toBe("Type error: t");
    expect(describeFailure(new RangeError("r"))).toBe("Value error: r");
    expect(describeFailure(new SyntaxError("s"))).toBe("SyntaxError: s");
  });

  it("describes thrown non-errors by their string form", () => {
    expect(describeFailure(null)).toBe("Error: null");
    expect(describeFailure(NDArray.from([1], "i32"))).toBe("Error: array([1], dtype=i32)");
  });
});
