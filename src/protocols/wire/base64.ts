import { CodecError } from "../../shared/errors.js";

const BASE64 = /^(?:[A-Za-z0-9+/]{4})*(?:[A-Za-z0-9+/]{2}==|[A-Za-z0-9+/]{3}=)?$/;

export function encodeBase64(bytes: Uint8Array): string {
  return Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength).toString("base64");
}

/** Strict decode: padding is required and characters outside the standard alphabet are rejected. */
export function decodeBase64(text: string, field: string): Buffer {
  if (!BASE64.test(text)) {
    throw new CodecError(`${field}: invalid base64 payload`);
  }
  return Buffer.from(text, "base64");
}
