// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

import {
  describe,
  inferKind,
  isSupportedKind,
  type ElementKind,
  type ElementStorage,
} from "./dtype.js";
import { InvalidShapeError, UnsupportedElementTypeError } from "./errors.js";

/**
 * Uniform view over contiguous numeric storage.
 *
 * The wire format carries no strides, so `bytes()` must cover the elements in
 * the order the shape implies (row-major for rank 2). New container kinds
 * implement this interface; nothing else changes.
 */
export interface Container {
  /** Element kind used for the header type code */
  readonly kind: ElementKind;

  /** Total number of elements (product of `shape()`) */
  elementCount(): number;

  /** Dimension sizes, outermost first */
  shape(): readonly number[];

  /**
   * Read-only byte view over the caller's storage (no copy).
   * Do not mutate the storage until the send that references it settles.
   */
  bytes(): Uint8Array;
}

/**
 * Render a shape descriptor: `()`, `(N,)`, `(R,C)`.
 */
export function formatShape(shape: readonly number[]): string {
  if (shape.length === 1) {
    return `(${shape[0]},)`;
  }
  return `(${shape.join(",")})`;
}

/**
 * Rank-1 container over a typed array.
 *
 * @example
 * ```typescript
 * const xs = vector(new Float64Array([0, 0.5, 1]));
 * xs.shape(); // [3]
 * ```
 */
export function vector(data: ElementStorage, kind?: ElementKind): Container {
  const resolved = resolveKind(data, kind);
  return {
    kind: resolved,
    elementCount: () => data.length,
    shape: () => [data.length],
    bytes: () => byteView(data),
  };
}

/**
 * Rank-2 container over row-major storage: element (r, c) lives at
 * `data[r * cols + c]`.
 *
 * @throws {InvalidShapeError} if rows × cols differs from `data.length`
 */
export function matrix(
  data: ElementStorage,
  rows: number,
  cols: number,
  kind?: ElementKind,
): Container {
  assertDimension("rows", rows);
  assertDimension("cols", cols);
  if (rows * cols !== data.length) {
    throw new InvalidShapeError(
      `Matrix shape (${rows},${cols}) needs ${rows * cols} elements, storage has ${data.length}`,
    );
  }

  const resolved = resolveKind(data, kind);
  return {
    kind: resolved,
    elementCount: () => rows * cols,
    shape: () => [rows, cols],
    bytes: () => byteView(data),
  };
}

function byteView(data: ElementStorage): Uint8Array {
  return new Uint8Array(data.buffer, data.byteOffset, data.byteLength);
}

function assertDimension(label: string, value: number): void {
  if (!Number.isInteger(value) || value < 0) {
    throw new InvalidShapeError(
      `Matrix ${label} must be a non-negative integer, got ${value}`,
    );
  }
}

function resolveKind(data: ElementStorage, kind?: ElementKind): ElementKind {
  if (kind === undefined) {
    return inferKind(data);
  }

  // Plain JS callers can pass anything here
  if (!isSupportedKind(kind)) {
    throw new UnsupportedElementTypeError(
      `Unsupported element kind "${String(kind)}"`,
      String(kind),
    );
  }

  const { width } = describe(kind);
  if (width !== data.BYTES_PER_ELEMENT) {
    throw new UnsupportedElementTypeError(
      `Element kind "${kind}" is ${width} bytes wide, storage elements are ${data.BYTES_PER_ELEMENT}`,
      kind,
    );
  }
  return kind;
}
