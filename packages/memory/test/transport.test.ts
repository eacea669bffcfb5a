// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

import {
  BatchDecoder,
  Session,
  TransportError,
  matrix,
  vector,
  type DecoderEvent,
} from "@bufcast/core";
import { beforeEach, describe, expect, it, vi } from "vitest";
import { memoryTransport, type MemoryTransport } from "../src/index.js";

const enc = (text: string) => new TextEncoder().encode(text);

describe("memoryTransport", () => {
  let transport: MemoryTransport;

  beforeEach(() => {
    transport = memoryTransport();
  });

  it("records messages in send order", async () => {
    await transport.send(enc("a"));
    await transport.send(enc("b"));

    expect(transport.texts()).toEqual(["a", "b"]);
    expect(transport.messages()).toHaveLength(2);

    transport.clear();
    expect(transport.messages()).toEqual([]);
  });

  it("delivers each message by reference to every subscriber", async () => {
    const first: Uint8Array[] = [];
    const second: Uint8Array[] = [];
    transport.subscribe((m) => first.push(m));
    const unsubscribe = transport.subscribe((m) => second.push(m));

    const message = enc("x");
    await transport.send(message);
    unsubscribe();
    await transport.send(enc("y"));

    expect(first).toHaveLength(2);
    expect(first[0]).toBe(message);
    expect(second).toEqual([message]);
    expect(transport.subscriberCount()).toBe(1);
  });

  it("records a copy of payloads the sender mutates later", async () => {
    const xs = new Int32Array([1, 2]);
    const session = new Session({ transport });

    await session.sendNamedBuffers({ xs: vector(xs) });
    xs[0] = 99;

    const payload = transport.messages()[1];
    expect(payload).toEqual(new Uint8Array(new Int32Array([1, 2]).buffer));
    expect(payload?.buffer).not.toBe(xs.buffer);
  });

  it("skips recording when disabled", async () => {
    const quiet = memoryTransport({ record: false });
    const seen: string[] = [];
    quiet.subscribe((m) => seen.push(new TextDecoder().decode(m)));

    await quiet.send(enc("z"));

    expect(quiet.messages()).toEqual([]);
    expect(seen).toEqual(["z"]);
  });

  it("fails the next send once", async () => {
    transport.failNext();

    await expect(transport.send(enc("a"))).rejects.toThrow(
      "Send failed: injected failure",
    );
    await transport.send(enc("b"));
    expect(transport.texts()).toEqual(["b"]);
  });

  it("keeps the injected error as the cause", async () => {
    const cause = new Error("queue full");
    transport.failNext(cause);

    await expect(transport.send(enc("a"))).rejects.toMatchObject({
      name: "TransportError",
      cause,
    });
  });

  it("isolates a throwing subscriber and logs it", async () => {
    const logger = {
      debug: vi.fn(),
      info: vi.fn(),
      warn: vi.fn(),
      error: vi.fn(),
    };
    transport = memoryTransport({ logger });
    const seen: number[] = [];
    transport.subscribe(() => {
      throw new Error("bad handler");
    });
    transport.subscribe((m) => seen.push(m.byteLength));

    await transport.send(enc("abc"));

    expect(seen).toEqual([3]);
    expect(logger.error).toHaveBeenCalledWith(
      "transport",
      "Error in memory transport subscriber",
      "bad handler",
    );
  });

  it("rejects sends after close", async () => {
    transport.subscribe(() => {});
    await transport.close();

    expect(transport.isClosed()).toBe(true);
    expect(transport.subscriberCount()).toBe(0);
    await expect(transport.send(enc("a"))).rejects.toThrow(TransportError);
    await expect(transport.send(enc("a"))).rejects.toThrow(
      "Cannot send: memory transport is closed",
    );
  });
});

describe("session over memory transport", () => {
  it("delivers batches and exit to a decoding subscriber", async () => {
    const transport = memoryTransport();
    const decoder = new BatchDecoder();
    const events: DecoderEvent[] = [];
    transport.subscribe((message) => {
      const event = decoder.push(message);
      if (event) {
        events.push(event);
      }
    });

    const session = new Session({ transport });
    const heat = new Float32Array([0, 0.5, 1, 1.5]);
    session.push("import matplotlib.pyplot as plt");
    session.raw(`
      plt.imshow(heat)
      plt.show()
    `);
    await session.send({ heat: matrix(heat, 2, 2) });
    await session.send({ ids: vector(new Uint32Array([7])) });
    await session.close();

    expect(transport.isClosed()).toBe(true);
    expect(transport.messages()).toHaveLength(4 + 4 + 1);
    expect(events).toEqual([
      {
        type: "batch",
        batch: {
          buffers: [{ name: "heat", kind: "float32", shape: [2, 2], data: heat }],
          commands:
            "import matplotlib.pyplot as plt\nplt.imshow(heat)\nplt.show()\n",
        },
      },
      {
        type: "batch",
        batch: {
          buffers: [
            { name: "ids", kind: "uint32", shape: [1], data: new Uint32Array([7]) },
          ],
          commands: "",
        },
      },
      { type: "exit" },
    ]);
  });
});
