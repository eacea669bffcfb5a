// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

import { setTimeout as delay } from "node:timers/promises";
import { parseConfig, type SessionConfigInput } from "./config.js";
import { EXIT, FINALIZE } from "./constants.js";
import type { Container } from "./container.js";
import { dedent } from "./dedent.js";
import { describe } from "./dtype.js";
import {
  BufcastError,
  InvalidShapeError,
  SessionBusyError,
  SessionClosedError,
  TransportError,
  isRetryableNetworkError,
} from "./errors.js";
import { encodeHeader } from "./header.js";
import { LOG_CONTEXT, silentLogger, type LoggerAdapter } from "./logger.js";
import type { Transport } from "./transport.js";

/**
 * Named buffers for one batch: ordered `[name, container]` pairs (array, Map,
 * generator) or a plain record. Records are sent in property order.
 */
export type NamedBuffers =
  | Iterable<readonly [string, Container]>
  | Readonly<Record<string, Container>>;

export interface SessionOptions {
  transport: Transport;

  /**
   * Optional observability sink. Never logs by default.
   */
  logger?: LoggerAdapter;

  /**
   * Close the transport when the session closes (default: true).
   * Pass false when the transport is shared and you own its lifecycle.
   */
  ownsTransport?: boolean;
}

/**
 * Status snapshot of a session
 */
export interface SessionStatus {
  closed: boolean;
  /** Operation currently sending, if any */
  busy: string | null;
  /** Batches flushed so far */
  batches: number;
  /** Messages the transport accepted, sentinels included */
  messagesSent: number;
  /** UTF-8 size of the command text waiting for the next flush */
  pendingCommandBytes: number;
}

interface Frame {
  readonly name: string;
  readonly header: Uint8Array;
  readonly payload: Uint8Array;
}

const encoder = new TextEncoder();
const FINALIZE_MESSAGE = encoder.encode(FINALIZE);
const EXIT_MESSAGE = encoder.encode(EXIT);

/**
 * Producer side of the wire protocol.
 *
 * One batch on the wire is 2N+2 messages: a header and a payload per named
 * buffer (in caller order), the accumulated command text, then `finalize`.
 * `close()` sends `exit` exactly once.
 *
 * ## Semantics
 *
 * - **Ordering**: every send is awaited before the next starts
 * - **No locking**: overlapping operations fail with `SessionBusyError`;
 *   callers serialize push/send/flush themselves
 * - **Zero-copy payloads**: payload messages are views over the containers'
 *   storage; don't mutate it until the send promise settles
 * - **Fail fast**: every name and container of a call is validated before the
 *   first message goes out
 *
 * @example
 * ```typescript
 * const xs = new Float64Array([0, 1, 2, 3]);
 * session.push("import matplotlib.pyplot as plt");
 * session.raw(`
 *     plt.plot(xs)
 *     plt.show()
 * `);
 * await session.send({ xs: vector(xs) });
 * await session.close();
 * ```
 */
export class Session {
  private readonly transport: Transport;
  private readonly logger: LoggerAdapter;
  private readonly ownsTransport: boolean;

  private commands = "";
  private closed = false;
  private busy: string | null = null;
  private inflight: Promise<void> | null = null;
  private batches = 0;
  private messagesSent = 0;

  constructor(options: SessionOptions) {
    this.transport = options.transport;
    this.logger = options.logger ?? silentLogger;
    this.ownsTransport = options.ownsTransport ?? true;
  }

  /**
   * Start a new batch, discarding command text that was never flushed.
   */
  beginBatch(): void {
    this.assertUsable("begin a batch");
    if (this.commands.length > 0) {
      this.logger.warn(LOG_CONTEXT.SESSION, "Discarding unflushed commands", {
        bytes: encoder.encode(this.commands).byteLength,
      });
    }
    this.commands = "";
  }

  /**
   * Append one command line (a newline is added).
   */
  push(text: string): this {
    this.assertUsable("push text");
    this.commands += `${text}\n`;
    return this;
  }

  pushText(text: string): this {
    return this.push(text);
  }

  /**
   * Append a multi-line block after stripping its common indentation.
   */
  raw(text: string): this {
    this.assertUsable("push raw text");
    this.commands += dedent(text);
    return this;
  }

  pushRaw(text: string): this {
    return this.raw(text);
  }

  /**
   * Send a header and a payload message for each named buffer, in order.
   *
   * @throws {InvalidNameError} if a name is empty or contains `|` or a line break
   * @throws {UnsupportedElementTypeError} if a container has no type code
   * @throws {TransportError} if the transport rejects a message
   */
  async sendNamedBuffers(entries: NamedBuffers): Promise<void> {
    this.assertUsable("send buffers");
    const frames = toFrames(entries);

    await this.exclusive("send buffers", async () => {
      for (const frame of frames) {
        await this.transmit(frame.header);
        await this.transmit(frame.payload);
      }
    });
  }

  /**
   * Send the command text and the `finalize` sentinel, then clear the text.
   * The text is cleared even if a send fails, so a broken batch never leaks
   * into the next one.
   */
  async flushBatch(): Promise<void> {
    this.assertUsable("flush batch");

    await this.exclusive("flush batch", async () => {
      const commands = this.commands;
      try {
        await this.transmit(encoder.encode(commands));
        await this.transmit(FINALIZE_MESSAGE);
      } finally {
        this.commands = "";
      }
      this.batches++;
      this.logger.debug(LOG_CONTEXT.SESSION, "Batch flushed", {
        batch: this.batches,
        commandLength: commands.length,
      });
    });
  }

  /**
   * Send one complete batch: the named buffers, the command text, `finalize`.
   */
  async send(entries?: NamedBuffers): Promise<void> {
    if (entries !== undefined) {
      await this.sendNamedBuffers(entries);
    }
    await this.flushBatch();
  }

  /**
   * Send `exit` to the consumer and release the transport.
   *
   * Runs once; later calls resolve immediately. Waits for an in-flight send
   * first, and still sends `exit` if that send (or any earlier one) failed.
   *
   * @throws {TransportError} if `exit` itself was rejected
   */
  async close(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;

    if (this.inflight) {
      // Its failure was already reported to its own caller
      await this.inflight.catch(() => undefined);
    }

    try {
      await this.transmit(EXIT_MESSAGE);
      this.logger.info(LOG_CONTEXT.SESSION, "Session closed", {
        batches: this.batches,
        messagesSent: this.messagesSent,
      });
    } finally {
      if (this.ownsTransport) {
        await this.transport.close?.();
      }
    }
  }

  isClosed(): boolean {
    return this.closed;
  }

  status(): SessionStatus {
    return {
      closed: this.closed,
      busy: this.busy,
      batches: this.batches,
      messagesSent: this.messagesSent,
      pendingCommandBytes: encoder.encode(this.commands).byteLength,
    };
  }

  // ========== Private Methods ==========

  private assertUsable(operation: string): void {
    if (this.closed) {
      throw new SessionClosedError(`Cannot ${operation}: session is closed`);
    }
    if (this.busy !== null) {
      throw new SessionBusyError(operation);
    }
  }

  private async exclusive(
    operation: string,
    run: () => Promise<void>,
  ): Promise<void> {
    this.busy = operation;
    const pending = run();
    this.inflight = pending;
    try {
      await pending;
    } finally {
      this.busy = null;
      this.inflight = null;
    }
  }

  private async transmit(message: Uint8Array): Promise<void> {
    try {
      await this.transport.send(message);
      this.messagesSent++;
    } catch (error) {
      const err = toTransportError(error);
      this.logger.error(LOG_CONTEXT.SESSION, "Send failed", err);
      throw err;
    }
  }
}

/**
 * Create a session once the transport's subscribers have had
 * `startupDelayMs` to join.
 */
export async function createSession(
  options: SessionOptions & { config?: SessionConfigInput },
): Promise<Session> {
  const { config, ...sessionOptions } = options;
  const { startupDelayMs } = parseConfig(config ?? {});
  if (startupDelayMs > 0) {
    await delay(startupDelayMs);
  }
  return new Session(sessionOptions);
}

function toFrames(entries: NamedBuffers): Frame[] {
  const pairs: ReadonlyArray<readonly [string, Container]> = isPairIterable(
    entries,
  )
    ? Array.from(entries)
    : Object.entries(entries);

  return pairs.map(([name, container]) => {
    const header = encodeHeader(name, container);
    const payload = container.bytes();
    const expected = container.elementCount() * describe(container.kind).width;
    if (payload.byteLength !== expected) {
      throw new InvalidShapeError(
        `Buffer "${name}" exposes ${payload.byteLength} bytes, header promises ${expected}`,
      );
    }
    return { name, header: encoder.encode(header), payload };
  });
}

function isPairIterable(
  entries: NamedBuffers,
): entries is Iterable<readonly [string, Container]> {
  return Symbol.iterator in entries;
}

function toTransportError(error: unknown): BufcastError {
  if (error instanceof BufcastError) {
    return error;
  }
  const err = error instanceof Error ? error : new Error(String(error));
  return new TransportError(`Transport rejected message: ${err.message}`, {
    cause: err,
    retryable: isRetryableNetworkError(err),
  });
}
