// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

import { describe, expect, it } from "vitest";
import { formatShape, matrix, vector } from "./container.js";
import { InvalidShapeError, UnsupportedElementTypeError } from "./errors.js";

describe("vector", () => {
  it("reports rank-1 shape and count", () => {
    const xs = vector(new Float64Array([1, 2, 3, 4, 5]));

    expect(xs.kind).toBe("float64");
    expect(xs.elementCount()).toBe(5);
    expect(xs.shape()).toEqual([5]);
    expect(formatShape(xs.shape())).toBe("(5,)");
  });

  it("handles empty storage", () => {
    const empty = vector(new Int32Array(0));
    expect(empty.elementCount()).toBe(0);
    expect(formatShape(empty.shape())).toBe("(0,)");
    expect(empty.bytes().byteLength).toBe(0);
  });

  it("exposes the caller's memory without copying", () => {
    const data = new Int16Array([1, 2, 3]);
    const bytes = vector(data).bytes();

    expect(bytes.buffer).toBe(data.buffer);
    expect(bytes.byteLength).toBe(6);

    data[0] = 0x0102;
    expect(bytes[0]).toBe(0x02);
    expect(bytes[1]).toBe(0x01);
  });

  it("respects subarray offsets", () => {
    const backing = new Float32Array([9, 1, 2, 9]);
    const bytes = vector(backing.subarray(1, 3)).bytes();

    expect(bytes.byteOffset).toBe(4);
    expect(bytes.byteLength).toBe(8);
    expect(new Float32Array(bytes.buffer, bytes.byteOffset, 2)).toEqual(
      new Float32Array([1, 2]),
    );
  });

  it("accepts an explicit kind of the same width", () => {
    expect(vector(new Uint8Array(4), "char").kind).toBe("char");
    expect(vector(new BigInt64Array(2), "long").kind).toBe("long");
  });

  it("rejects an explicit kind of another width", () => {
    expect(() => vector(new Float32Array(2), "float64")).toThrow(
      UnsupportedElementTypeError,
    );
  });
});

describe("matrix", () => {
  it("reports rank-2 shape and count", () => {
    const m = matrix(new Float32Array(6), 2, 3);

    expect(m.elementCount()).toBe(6);
    expect(m.shape()).toEqual([2, 3]);
    expect(formatShape(m.shape())).toBe("(2,3)");
    expect(m.bytes().byteLength).toBe(24);
  });

  it("rejects storage that does not match rows × cols", () => {
    expect(() => matrix(new Float64Array(5), 2, 3)).toThrow(
      InvalidShapeError,
    );
  });

  it("rejects negative or fractional dimensions", () => {
    expect(() => matrix(new Float64Array(0), -1, 0)).toThrow(
      "Matrix rows must be a non-negative integer, got -1",
    );
    expect(() => matrix(new Float64Array(3), 1.5, 2)).toThrow(
      InvalidShapeError,
    );
  });

  it("allows zero-sized dimensions", () => {
    const m = matrix(new Int8Array(0), 0, 4);
    expect(formatShape(m.shape())).toBe("(0,4)");
    expect(m.elementCount()).toBe(0);
  });
});

describe("formatShape", () => {
  it("renders rank 0, 1 and 2", () => {
    expect(formatShape([])).toBe("()");
    expect(formatShape([7])).toBe("(7,)");
    expect(formatShape([3, 4])).toBe("(3,4)");
  });
});
