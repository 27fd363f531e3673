import { describe, it, expect } from "vitest";
import { decodeResponse, encodeRequest, parseReady } from "../../src/protocols/envelope/client.js";
import { WireCodec } from "../../src/protocols/wire/codec.js";
import { NDArray } from "../../src/protocols/wire/ndarray.js";

const codec = new WireCodec();

describe("encodeRequest", () => {
  it("omits an empty keyword mapping", () => {
    expect(encodeRequest(codec, "math", "sqrt", [16])).toBe('{"m":"math","f":"sqrt","a":[16]}\n');
  });

  it("encodes arguments and keywords through the codec", () => {
    const line = encodeRequest(codec, "text", "join", [Buffer.from("hello")], { arr: new Int32Array([1, 2, 3]) });
    expect(JSON.parse(line)).toEqual({
      m: "text",
      f: "join",
      a: [{ __bytes__: "aGVsbG8=" }],
      k: { arr: { __numpy_array__: { dtype: "i32", shape: [3], data: "AQAAAAIAAAADAAAA" } } },
    });
  });
});

describe("decodeResponse", () => {
  it("decodes a success value", () => {
    const decoded = decodeResponse(codec, '{"ok":{"__numpy_array__":{"dtype":"f32","shape":[2],"data":"AACAPwAAIEA="}}}');
    expect(decoded.kind).toBe("ok");
    if (decoded.kind !== "ok" || !(decoded.value instanceof NDArray)) throw new Error("expected an ndarray");
    expect(decoded.value.toNested()).toEqual([1, 2.5]);
  });

  it("returns the error message", () => {
    expect(decodeResponse(codec, '{"error":"Value error: math domain error"}')).toEqual({
      kind: "error",
      message: "Value error: math domain error",
    });
  });

  it("classifies unusable lines", () => {
    expect(decodeResponse(codec, "  ")).toEqual({ kind: "invalid", reason: "empty_line" });
    expect(decodeResponse(codec, "{")).toEqual({ kind: "invalid", reason: "decode_failed" });
    expect(decodeResponse(codec, '{"ok":{"__bytes__":"@@"}}')).toEqual({ kind: "invalid", reason: "decode_failed" });
    expect(decodeResponse(codec, "[1]")).toEqual({ kind: "invalid", reason: "invalid_response" });
    expect(decodeResponse(codec, '{"result":1}')).toEqual({ kind: "invalid", reason: "invalid_response" });
  });

  it("treats an ok of null as a success", () => {
    expect(decodeResponse(codec, '{"ok":null}')).toEqual({ kind: "ok", value: null });
  });
});

describe("parseReady", () => {
  it("reads the capability flags", () => {
    expect(parseReady('{"ready":true,"arrays":true,"tables":false}')).toEqual({ arrays: true, tables: false });
    expect(parseReady('{"ready":true}')).toEqual({ arrays: false, tables: false });
  });

  it("returns undefined for anything else", () => {
    expect(parseReady('{"ready":false}')).toBeUndefined();
    expect(parseReady('{"ok":"pong"}')).toBeUndefined();
    expect(parseReady("not json")).toBeUndefined();
  });
});
