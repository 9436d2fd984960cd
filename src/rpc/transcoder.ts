import { DecodeError } from "./errors.js";
import type { Base64File } from "./types.js";

const NON_BASE64 = /[^A-Za-z0-9+/=]/;

export function encode(bytes: Uint8Array): Base64File {
  return {
    declaredSize: bytes.length,
    encoded: Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength).toString("base64"),
  };
}

/**
 * Decodes an envelope into exactly `declaredSize` bytes. Any alphabet violation
 * or length mismatch fails the whole operation.
 */
export function decode(payload: Base64File): Buffer {
  const { declaredSize, encoded } = payload;
  if (!Number.isSafeInteger(declaredSize) || declaredSize < 0) {
    throw new DecodeError(`Invalid declared size: ${declaredSize}`);
  }
  if (!isPaddedBase64(encoded)) {
    throw new DecodeError("Invalid base64 payload");
  }

  const decoded = Buffer.from(encoded, "base64");
  if (decoded.length !== declaredSize) {
    throw new DecodeError(
      `Decoded size mismatch: declared ${declaredSize} bytes, got ${decoded.length}`,
    );
  }
  return decoded;
}

/** Padded standard alphabet; `=` only as the final one or two characters. */
function isPaddedBase64(encoded: string): boolean {
  if (encoded.length % 4 !== 0 || NON_BASE64.test(encoded)) return false;
  const padStart = encoded.indexOf("=");
  if (padStart === -1) return true;
  const padding = encoded.length - padStart;
  return padding <= 2 && encoded.endsWith("=".repeat(padding));
}
