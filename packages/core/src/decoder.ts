// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

import { EXIT, FIELD_SEPARATOR, FINALIZE, HEADER_TAG } from "./constants.js";
import {
  describe,
  kindForTag,
  type ElementKind,
  type ElementStorage,
} from "./dtype.js";
import { DecodeError } from "./errors.js";

/**
 * Parsed `data|<name>|<tag>|<count>|<shape>` header
 */
export interface BufferHeader {
  name: string;
  tag: string;
  kind: ElementKind;
  count: number;
  shape: number[];
}

export interface DecodedBuffer {
  name: string;
  kind: ElementKind;
  shape: number[];
  data: ElementStorage;
}

export interface DecodedBatch {
  buffers: DecodedBuffer[];
  commands: string;
}

export type DecoderEvent =
  | { type: "batch"; batch: DecodedBatch }
  | { type: "exit" };

const SHAPE = /^\((?:(\d+),|(\d+),(\d+))?\)$/;
const COUNT = /^\d+$/;
const textDecoder = new TextDecoder();

/**
 * Parse one header line.
 *
 * @throws {DecodeError} on a wrong field count, unknown type code, malformed
 * shape, or a count that differs from the shape's product
 */
export function parseHeader(text: string): BufferHeader {
  const fields = text.split(FIELD_SEPARATOR);
  if (fields.length !== 5 || fields[0] !== HEADER_TAG) {
    throw new DecodeError(`Malformed buffer header: ${JSON.stringify(text)}`);
  }
  const [, name = "", tag = "", countField = "", shapeField = ""] = fields;

  const kind = kindForTag(tag);
  if (kind === undefined) {
    throw new DecodeError(`Unknown type code "${tag}" for buffer "${name}"`);
  }
  if (!COUNT.test(countField)) {
    throw new DecodeError(`Invalid element count "${countField}" for "${name}"`);
  }

  const shape = parseShape(shapeField);
  const count = Number(countField);
  const product = shape.reduce((acc, dim) => acc * dim, 1);
  if (product !== count) {
    throw new DecodeError(
      `Buffer "${name}" declares ${count} elements but shape ${shapeField} holds ${product}`,
    );
  }

  return { name, tag, kind, count, shape };
}

/**
 * Parse `()`, `(N,)` or `(R,C)`.
 */
export function parseShape(text: string): number[] {
  const match = SHAPE.exec(text);
  if (!match) {
    throw new DecodeError(`Malformed shape "${text}"`);
  }
  const [, single, rows, cols] = match;
  if (single !== undefined) {
    return [Number(single)];
  }
  if (rows !== undefined && cols !== undefined) {
    return [Number(rows), Number(cols)];
  }
  return [];
}

/**
 * Consumer-side state machine for the message sequence of a session.
 *
 * Feed every received message to `push()`. After a header, the next message
 * is its payload. Once headers stop, the next message is the command text and
 * the one after must be `finalize`. `exit` is recognized anywhere a payload is
 * not expected, and drops any partial batch: a producer whose send failed
 * mid-batch still shuts the consumer down.
 *
 * Command text that starts with `data|` or is exactly `exit` cannot be told
 * apart from the control messages.
 *
 * @example
 * ```typescript
 * const decoder = new BatchDecoder();
 * transport.subscribe((message) => {
 *   const event = decoder.push(message);
 *   if (event?.type === "batch") render(event.batch);
 *   if (event?.type === "exit") process.exit(0);
 * });
 * ```
 */
export class BatchDecoder {
  private header: BufferHeader | null = null;
  private buffers: DecodedBuffer[] = [];
  private commands: string | null = null;

  /**
   * @throws {DecodeError} on an out-of-order or malformed message; the
   * decoder is reset and ready for the next batch
   */
  push(message: Uint8Array): DecoderEvent | undefined {
    try {
      return this.step(message);
    } catch (error) {
      this.reset();
      throw error;
    }
  }

  /**
   * Drop any partially received batch.
   */
  reset(): void {
    this.header = null;
    this.buffers = [];
    this.commands = null;
  }

  private step(message: Uint8Array): DecoderEvent | undefined {
    if (this.header) {
      const header = this.header;
      this.header = null;
      this.buffers.push(decodePayload(header, message));
      return undefined;
    }

    const text = textDecoder.decode(message);

    if (text === EXIT) {
      this.reset();
      return { type: "exit" };
    }

    if (this.commands !== null) {
      if (text !== FINALIZE) {
        throw new DecodeError(
          `Expected "${FINALIZE}" after command text, got ${JSON.stringify(text.slice(0, 32))}`,
        );
      }
      const batch: DecodedBatch = {
        buffers: this.buffers,
        commands: this.commands,
      };
      this.reset();
      return { type: "batch", batch };
    }

    if (text.startsWith(`${HEADER_TAG}${FIELD_SEPARATOR}`)) {
      this.header = parseHeader(text);
      return undefined;
    }

    this.commands = text;
    return undefined;
  }
}

/**
 * Decode every message of a recorded sequence. Returns the events in order.
 */
export function decodeMessages(messages: Iterable<Uint8Array>): DecoderEvent[] {
  const decoder = new BatchDecoder();
  const events: DecoderEvent[] = [];
  for (const message of messages) {
    const event = decoder.push(message);
    if (event) {
      events.push(event);
    }
  }
  return events;
}

function decodePayload(header: BufferHeader, bytes: Uint8Array): DecodedBuffer {
  const { width } = describe(header.kind);
  const expected = header.count * width;
  if (bytes.byteLength !== expected) {
    throw new DecodeError(
      `Payload for "${header.name}" is ${bytes.byteLength} bytes, expected ${expected}`,
    );
  }

  return {
    name: header.name,
    kind: header.kind,
    shape: header.shape,
    data: toStorage(header.kind, bytes, header.count),
  };
}

/**
 * Typed array over the received bytes. Copies only when the bytes are not
 * aligned to the element width (`new Uint8Array(bytes)` rather than `slice()`,
 * which returns a view on Node Buffers).
 */
function toStorage(
  kind: ElementKind,
  bytes: Uint8Array,
  count: number,
): ElementStorage {
  const { width } = describe(kind);
  const aligned =
    bytes.byteOffset % width === 0 ? bytes : new Uint8Array(bytes);
  const { buffer, byteOffset } = aligned;

  switch (kind) {
    case "char":
    case "uint8":
      return new Uint8Array(buffer, byteOffset, count);
    case "int8":
      return new Int8Array(buffer, byteOffset, count);
    case "int16":
      return new Int16Array(buffer, byteOffset, count);
    case "uint16":
      return new Uint16Array(buffer, byteOffset, count);
    case "int32":
      return new Int32Array(buffer, byteOffset, count);
    case "uint32":
      return new Uint32Array(buffer, byteOffset, count);
    case "long":
    case "int64":
      return new BigInt64Array(buffer, byteOffset, count);
    case "ulong":
    case "uint64":
      return new BigUint64Array(buffer, byteOffset, count);
    case "float32":
      return new Float32Array(buffer, byteOffset, count);
    case "float64":
      return new Float64Array(buffer, byteOffset, count);
  }
}
