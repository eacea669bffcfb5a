// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

/**
 * Element type registry.
 *
 * Maps each scalar element kind to the one-character type code and byte width
 * of the conventional packed-struct format, so a consumer can decode payloads
 * with a standard struct/array decoder and no shared schema.
 *
 * `long`/`ulong` use LP64 widths (8 bytes).
 */

/**
 * Element kinds with a wire encoding.
 */
export type ElementKind =
  | "char"
  | "int8"
  | "uint8"
  | "int16"
  | "uint16"
  | "int32"
  | "uint32"
  | "long"
  | "ulong"
  | "int64"
  | "uint64"
  | "float32"
  | "float64";

/**
 * One-character type code plus element byte width.
 */
export interface TypeDescriptor {
  readonly tag: string;
  readonly width: number;
}

/**
 * Typed arrays accepted as contiguous element storage.
 */
export type ElementStorage =
  | Int8Array
  | Uint8Array
  | Uint8ClampedArray
  | Int16Array
  | Uint16Array
  | Int32Array
  | Uint32Array
  | BigInt64Array
  | BigUint64Array
  | Float32Array
  | Float64Array;

/**
 * Returned for kinds outside the table. Width 0 makes it unencodable.
 */
export const UNSUPPORTED: TypeDescriptor = Object.freeze({ tag: "0", width: 0 });

export const DTYPE_TABLE: Readonly<Record<ElementKind, TypeDescriptor>> =
  Object.freeze({
    char: Object.freeze({ tag: "c", width: 1 }),
    int8: Object.freeze({ tag: "b", width: 1 }),
    uint8: Object.freeze({ tag: "B", width: 1 }),
    int16: Object.freeze({ tag: "h", width: 2 }),
    uint16: Object.freeze({ tag: "H", width: 2 }),
    int32: Object.freeze({ tag: "i", width: 4 }),
    uint32: Object.freeze({ tag: "I", width: 4 }),
    long: Object.freeze({ tag: "l", width: 8 }),
    ulong: Object.freeze({ tag: "L", width: 8 }),
    int64: Object.freeze({ tag: "q", width: 8 }),
    uint64: Object.freeze({ tag: "Q", width: 8 }),
    float32: Object.freeze({ tag: "f", width: 4 }),
    float64: Object.freeze({ tag: "d", width: 8 }),
  });

const KIND_BY_TAG: ReadonlyMap<string, ElementKind> = new Map(
  Object.entries(DTYPE_TABLE)
    .filter((entry): entry is [ElementKind, TypeDescriptor] =>
      isSupportedKind(entry[0]),
    )
    .map(([kind, descriptor]) => [descriptor.tag, kind]),
);

export function isSupportedKind(kind: string): kind is ElementKind {
  return Object.prototype.hasOwnProperty.call(DTYPE_TABLE, kind);
}

/**
 * Look up the wire descriptor for an element kind.
 *
 * Never throws: unknown kinds get the `UNSUPPORTED` sentinel, and callers
 * that send must reject it (see `encodeHeader`).
 */
export function describe(kind: string): TypeDescriptor {
  return isSupportedKind(kind) ? DTYPE_TABLE[kind] : UNSUPPORTED;
}

/**
 * Reverse lookup: type code → element kind
 */
export function kindForTag(tag: string): ElementKind | undefined {
  return KIND_BY_TAG.get(tag);
}

/**
 * Default element kind for a typed array.
 *
 * 64-bit integer arrays map to `int64`/`uint64`; pass `long`/`ulong`
 * explicitly when the consumer expects the `l`/`L` codes. `char` is never
 * inferred.
 */
export function inferKind(data: ElementStorage): ElementKind {
  if (data instanceof Int8Array) return "int8";
  if (data instanceof Uint8Array || data instanceof Uint8ClampedArray) {
    return "uint8";
  }
  if (data instanceof Int16Array) return "int16";
  if (data instanceof Uint16Array) return "uint16";
  if (data instanceof Int32Array) return "int32";
  if (data instanceof Uint32Array) return "uint32";
  if (data instanceof BigInt64Array) return "int64";
  if (data instanceof BigUint64Array) return "uint64";
  if (data instanceof Float32Array) return "float32";
  return "float64";
}
