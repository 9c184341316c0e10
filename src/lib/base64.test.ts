// @vitest-environment node
import { describe, expect, it } from "vitest";
import { decodeBase64Strict, encodeBase64 } from "./base64";

describe("base64", () => {
  it("encodes and decodes bytes", () => {
    const bytes = new Uint8Array([0, 1, 254, 255]);
    expect(encodeBase64(bytes)).toBe("AAH+/w==");
    expect(Array.from(decodeBase64Strict("AAH+/w==") ?? [])).toEqual([0, 1, 254, 255]);
  });

  it("encodes only the viewed slice of a larger buffer", () => {
    const view = new Uint8Array([9, 0, 1, 254, 255, 9]).subarray(1, 5);
    expect(encodeBase64(view)).toBe("AAH+/w==");
  });

  it("refuses anything but canonical padded base64", () => {
    expect(decodeBase64Strict("")).toBeNull();
    expect(decodeBase64Strict("AAH+/w")).toBeNull();
    expect(decodeBase64Strict("AAH-_w==")).toBeNull();
    expect(decodeBase64Strict("AA H+")).toBeNull();
  });
});
