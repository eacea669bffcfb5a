// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

import { describe as suite, expect, it } from "vitest";
import {
  DTYPE_TABLE,
  UNSUPPORTED,
  describe,
  inferKind,
  isSupportedKind,
  kindForTag,
} from "./dtype.js";

suite("type registry", () => {
  it("has 13 entries with distinct one-character tags", () => {
    const descriptors = Object.values(DTYPE_TABLE);
    const tags = new Set(descriptors.map((d) => d.tag));

    expect(descriptors).toHaveLength(13);
    expect(tags.size).toBe(13);
    for (const { tag } of descriptors) {
      expect(tag).toHaveLength(1);
    }
  });

  it("uses the packed-struct tag alphabet", () => {
    const tags = Object.values(DTYPE_TABLE)
      .map((d) => d.tag)
      .join("");
    expect(tags).toBe("cbBhHiIlLqQfd");
  });

  it("widths match the typed arrays that store each kind", () => {
    expect(describe("int8").width).toBe(Int8Array.BYTES_PER_ELEMENT);
    expect(describe("uint8").width).toBe(Uint8Array.BYTES_PER_ELEMENT);
    expect(describe("int16").width).toBe(Int16Array.BYTES_PER_ELEMENT);
    expect(describe("uint16").width).toBe(Uint16Array.BYTES_PER_ELEMENT);
    expect(describe("int32").width).toBe(Int32Array.BYTES_PER_ELEMENT);
    expect(describe("uint32").width).toBe(Uint32Array.BYTES_PER_ELEMENT);
    expect(describe("int64").width).toBe(BigInt64Array.BYTES_PER_ELEMENT);
    expect(describe("uint64").width).toBe(BigUint64Array.BYTES_PER_ELEMENT);
    expect(describe("float32").width).toBe(Float32Array.BYTES_PER_ELEMENT);
    expect(describe("float64").width).toBe(Float64Array.BYTES_PER_ELEMENT);
  });

  it("describes long and char", () => {
    expect(describe("long")).toEqual({ tag: "l", width: 8 });
    expect(describe("ulong")).toEqual({ tag: "L", width: 8 });
    expect(describe("char")).toEqual({ tag: "c", width: 1 });
  });

  it("returns the sentinel for unknown kinds instead of throwing", () => {
    expect(describe("complex128")).toBe(UNSUPPORTED);
    expect(describe("")).toEqual({ tag: "0", width: 0 });
    expect(describe("toString")).toBe(UNSUPPORTED);
  });

  it("table is frozen", () => {
    expect(Object.isFrozen(DTYPE_TABLE)).toBe(true);
    expect(Object.isFrozen(DTYPE_TABLE.float64)).toBe(true);
  });

  it("maps tags back to kinds", () => {
    expect(kindForTag("d")).toBe("float64");
    expect(kindForTag("q")).toBe("int64");
    expect(kindForTag("l")).toBe("long");
    expect(kindForTag("0")).toBeUndefined();
    expect(kindForTag("x")).toBeUndefined();
  });

  it("narrows supported kinds", () => {
    expect(isSupportedKind("uint16")).toBe(true);
    expect(isSupportedKind("float16")).toBe(false);
  });

  it("infers kinds from typed arrays", () => {
    expect(inferKind(new Float64Array(1))).toBe("float64");
    expect(inferKind(new Float32Array(1))).toBe("float32");
    expect(inferKind(new Uint8ClampedArray(1))).toBe("uint8");
    expect(inferKind(new Uint8Array(1))).toBe("uint8");
    expect(inferKind(new Int16Array(1))).toBe("int16");
    expect(inferKind(new BigInt64Array(1))).toBe("int64");
    expect(inferKind(new BigUint64Array(1))).toBe("uint64");
  });
});
