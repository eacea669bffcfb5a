// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

import { describe, expect, it } from "vitest";
import {
  BatchDecoder,
  DecodeError,
  Session,
  TransportError,
  decodeMessages,
  matrix,
  parseHeader,
  parseShape,
  vector,
} from "../src/index.js";
import { RecordingTransport } from "./helpers.js";

const encoder = new TextEncoder();
const enc = (text: string) => encoder.encode(text);

describe("parseHeader", () => {
  it("parses vector, matrix and scalar headers", () => {
    expect(parseHeader("data|xs|d|3|(3,)")).toEqual({
      name: "xs",
      tag: "d",
      kind: "float64",
      count: 3,
      shape: [3],
    });
    expect(parseHeader("data|grid|f|6|(2,3)").shape).toEqual([2, 3]);
    expect(parseHeader("data|s|q|1|()").shape).toEqual([]);
  });

  it("rejects unknown type codes", () => {
    expect(() => parseHeader("data|x|z|1|(1,)")).toThrow(
      'Unknown type code "z" for buffer "x"',
    );
    expect(() => parseHeader("data|x|0|1|(1,)")).toThrow(DecodeError);
  });

  it("rejects counts that disagree with the shape", () => {
    expect(() => parseHeader("data|x|d|2|(3,)")).toThrow(
      'Buffer "x" declares 2 elements but shape (3,) holds 3',
    );
  });

  it("rejects malformed headers", () => {
    expect(() => parseHeader("data|x|d|1")).toThrow(DecodeError);
    expect(() => parseHeader("head|x|d|1|(1,)")).toThrow(DecodeError);
    expect(() => parseHeader("data|x|d|-1|(1,)")).toThrow(
      'Invalid element count "-1" for "x"',
    );
  });
});

describe("parseShape", () => {
  it("accepts the three shape forms", () => {
    expect(parseShape("()")).toEqual([]);
    expect(parseShape("(7,)")).toEqual([7]);
    expect(parseShape("(2,3)")).toEqual([2, 3]);
  });

  it("rejects anything else", () => {
    expect(() => parseShape("(3)")).toThrow('Malformed shape "(3)"');
    expect(() => parseShape("(1,2,3)")).toThrow(DecodeError);
    expect(() => parseShape("")).toThrow(DecodeError);
  });
});

describe("BatchDecoder", () => {
  it("decodes what a session sends", async () => {
    const transport = new RecordingTransport();
    const session = new Session({ transport });

    session.push("show()");
    await session.send({
      xs: vector(new Float64Array([1, 2, 3])),
      m: matrix(new Int32Array([1, 2, 3, 4, 5, 6]), 2, 3),
    });
    await session.close();

    expect(decodeMessages(transport.sent)).toEqual([
      {
        type: "batch",
        batch: {
          buffers: [
            {
              name: "xs",
              kind: "float64",
              shape: [3],
              data: new Float64Array([1, 2, 3]),
            },
            {
              name: "m",
              kind: "int32",
              shape: [2, 3],
              data: new Int32Array([1, 2, 3, 4, 5, 6]),
            },
          ],
          commands: "show()\n",
        },
      },
      { type: "exit" },
    ]);
  });

  it("decodes consecutive batches independently", () => {
    const events = decodeMessages([
      enc("data|a|b|1|(1,)"),
      new Uint8Array([0xff]),
      enc("first\n"),
      enc("finalize"),
      enc("second\n"),
      enc("finalize"),
    ]);

    expect(events).toEqual([
      {
        type: "batch",
        batch: {
          buffers: [
            { name: "a", kind: "int8", shape: [1], data: new Int8Array([-1]) },
          ],
          commands: "first\n",
        },
      },
      { type: "batch", batch: { buffers: [], commands: "second\n" } },
    ]);
  });

  it("views aligned payloads without copying", () => {
    const decoder = new BatchDecoder();
    const payload = new Uint8Array(new Uint32Array([7, 8]).buffer);

    decoder.push(enc("data|u|I|2|(2,)"));
    decoder.push(payload);
    decoder.push(enc(""));
    const event = decoder.push(enc("finalize"));

    expect(event?.type).toBe("batch");
    if (event?.type === "batch") {
      const [buffer] = event.batch.buffers;
      expect(buffer?.data).toEqual(new Uint32Array([7, 8]));
      expect(buffer?.data.buffer).toBe(payload.buffer);
    }
  });

  it("copies misaligned payloads", () => {
    const raw = new Uint8Array(17);
    raw.set(new Uint8Array(new Float64Array([1.5, -2]).buffer), 1);

    const [event] = decodeMessages([
      enc("data|v|d|2|(2,)"),
      raw.subarray(1),
      enc(""),
      enc("finalize"),
    ]);

    expect(event).toEqual({
      type: "batch",
      batch: {
        buffers: [
          {
            name: "v",
            kind: "float64",
            shape: [2],
            data: new Float64Array([1.5, -2]),
          },
        ],
        commands: "",
      },
    });
  });

  it("maps 8-byte integer codes to bigint storage", () => {
    const [event] = decodeMessages([
      enc("data|n|l|1|(1,)"),
      new Uint8Array(new BigInt64Array([-5n]).buffer),
      enc(""),
      enc("finalize"),
    ]);

    expect(event).toEqual({
      type: "batch",
      batch: {
        buffers: [
          { name: "n", kind: "long", shape: [1], data: new BigInt64Array([-5n]) },
        ],
        commands: "",
      },
    });
  });

  it("rejects a payload of the wrong size", () => {
    const decoder = new BatchDecoder();
    decoder.push(enc("data|v|d|2|(2,)"));

    expect(() => decoder.push(new Uint8Array(8))).toThrow(
      'Payload for "v" is 8 bytes, expected 16',
    );
  });

  it("requires finalize after the command text and recovers", () => {
    const decoder = new BatchDecoder();
    decoder.push(enc("cmd\n"));

    expect(() => decoder.push(enc("oops"))).toThrow(
      'Expected "finalize" after command text, got "oops"',
    );

    decoder.push(enc(""));
    expect(decoder.push(enc("finalize"))).toEqual({
      type: "batch",
      batch: { buffers: [], commands: "" },
    });
  });

  it("shuts down on exit after a batch broke before its command text", async () => {
    const transport = new RecordingTransport();
    const session = new Session({ transport });

    await session.sendNamedBuffers({ xs: vector(new Float64Array([1])) });
    transport.failNext(new Error("boom"));
    await expect(session.flushBatch()).rejects.toThrow(TransportError);
    await session.close();

    expect(transport.texts()).toHaveLength(3);
    expect(decodeMessages(transport.sent)).toEqual([{ type: "exit" }]);
  });

  it("shuts down on exit where finalize was expected", () => {
    const decoder = new BatchDecoder();
    decoder.push(enc("data|a|B|1|(1,)"));
    decoder.push(new Uint8Array([9]));
    decoder.push(enc("plot(a)\n"));

    expect(decoder.push(enc("exit"))).toEqual({ type: "exit" });

    decoder.push(enc("next\n"));
    expect(decoder.push(enc("finalize"))).toEqual({
      type: "batch",
      batch: { buffers: [], commands: "next\n" },
    });
  });

  it("reads exit bytes as a payload right after a header", () => {
    const events = decodeMessages([
      enc("data|u|I|1|(1,)"),
      enc("exit"),
      enc(""),
      enc("finalize"),
    ]);

    expect(events).toHaveLength(1);
    expect(events[0]?.type).toBe("batch");
  });

  it("reset drops a partial batch", () => {
    const decoder = new BatchDecoder();
    decoder.push(enc("data|a|B|1|(1,)"));
    decoder.push(new Uint8Array([1]));
    decoder.reset();

    decoder.push(enc("x"));
    expect(decoder.push(enc("finalize"))).toEqual({
      type: "batch",
      batch: { buffers: [], commands: "x" },
    });
  });
});
