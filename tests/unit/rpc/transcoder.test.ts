import { describe, it, expect } from "vitest";

import { DecodeError } from "../../../src/rpc/errors.js";
import { decode, encode } from "../../../src/rpc/transcoder.js";

describe("transcoder", () => {
  it("encodes bytes with their size", () => {
    expect(encode(Buffer.from("hello"))).toEqual({ declaredSize: 5, encoded: "aGVsbG8=" });
  });

  it("encodes only the visible part of a view", () => {
    const view = Buffer.from("xxhello").subarray(2);
    expect(encode(view)).toEqual({ declaredSize: 5, encoded: "aGVsbG8=" });
  });

  it("decodes a well-formed envelope", () => {
    expect(decode({ declaredSize: 5, encoded: "aGVsbG8=" }).toString("utf-8")).toBe("hello");
  });

  it("accepts an empty payload", () => {
    expect(decode({ declaredSize: 0, encoded: "" })).toHaveLength(0);
  });

  it("restores binary content exactly", () => {
    const bytes = Buffer.from([0, 255, 1, 254, 128, 127]);
    expect(decode(encode(bytes)).equals(bytes)).toBe(true);
  });

  it("rejects a size mismatch", () => {
    expect(() => decode({ declaredSize: 4, encoded: "aGVsbG8=" })).toThrow(
      "Decoded size mismatch: declared 4 bytes, got 5",
    );
  });

  it("round-trips an 8 MiB payload", () => {
    const bytes = Buffer.alloc(8 * 1024 * 1024, 0x5a);
    bytes[bytes.length - 1] = 0x01;
    expect(decode(encode(bytes)).equals(bytes)).toBe(true);
  });

  it("round-trips a payload with one byte of padding", () => {
    const bytes = Buffer.alloc(3 * 1024 * 1024 + 2, 7);
    const envelope = encode(bytes);
    expect(envelope.encoded.endsWith("=")).toBe(true);
    expect(envelope.encoded.endsWith("==")).toBe(false);
    expect(decode(envelope)).toHaveLength(bytes.length);
  });

  const malformed = ["aGVs*G8=", "aGVsbG8", "aGVsbG8=\n", "aGVs bG8=", "aG=sbG8=", "aGVsb===", "===="];

  it.each(malformed)("rejects malformed base64 %j", (encoded) => {
    expect(() => decode({ declaredSize: 5, encoded })).toThrow("Invalid base64 payload");
  });

  it.each([-1, 1.5, Number.NaN])("rejects declared size %s", (declaredSize) => {
    expect(() => decode({ declaredSize, encoded: "" })).toThrow(`Invalid declared size: ${declaredSize}`);
  });

  it("reports failures as DecodeError", () => {
    expect(() => decode({ declaredSize: 1, encoded: "!!" })).toThrow(DecodeError);
  });
});
