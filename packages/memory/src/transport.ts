// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

import {
  LOG_CONTEXT,
  TransportError,
  silentLogger,
  type LoggerAdapter,
  type MessageHandler,
  type Transport,
  type Unsubscribe,
} from "@bufcast/core";

export interface MemoryTransportOptions {
  /**
   * Keep every sent message for `messages()` (default: true)
   */
  record?: boolean;

  logger?: LoggerAdapter;
}

/**
 * Memory transport with capture and failure injection.
 */
export interface MemoryTransport extends Transport {
  /** Deliver every later message to `handler` */
  subscribe(handler: MessageHandler): Unsubscribe;
  /** Messages sent so far, in order */
  messages(): readonly Uint8Array[];
  /** Sent messages decoded as UTF-8 (binary payloads come out garbled) */
  texts(): readonly string[];
  /** Make the next `send()` reject with `error` */
  failNext(error?: Error): void;
  /** Forget recorded messages */
  clear(): void;
  subscriberCount(): number;
  isClosed(): boolean;
  close(): Promise<void>;
}

/**
 * In-memory transport: synchronous fan-out to local subscribers.
 *
 * For tests and for producers and consumers that live in one process.
 * Subscribers get each message by reference and may read it only while
 * their call lasts. `messages()` holds copies taken at send time.
 *
 * Usage:
 * ```ts
 * import { memoryTransport } from "@bufcast/memory";
 * import { BatchDecoder, Session, vector } from "@bufcast/core";
 *
 * const transport = memoryTransport();
 * const decoder = new BatchDecoder();
 * transport.subscribe((message) => decoder.push(message));
 *
 * const session = new Session({ transport });
 * await session.send({ xs: vector(new Int32Array([1, 2, 3])) });
 * ```
 */
export function memoryTransport(
  options: MemoryTransportOptions = {},
): MemoryTransport {
  const record = options.record ?? true;
  const logger = options.logger ?? silentLogger;
  const subscribers = new Set<MessageHandler>();
  const sent: Uint8Array[] = [];
  const textDecoder = new TextDecoder();
  let pendingFailure: Error | null = null;
  let closed = false;

  return {
    async send(message: Uint8Array): Promise<void> {
      if (closed) {
        throw new TransportError("Cannot send: memory transport is closed", {
          retryable: false,
        });
      }
      if (pendingFailure) {
        const cause = pendingFailure;
        pendingFailure = null;
        throw new TransportError(`Send failed: ${cause.message}`, { cause });
      }

      if (record) {
        sent.push(message.slice());
      }

      // Snapshot so handlers can unsubscribe while being called
      for (const handler of Array.from(subscribers)) {
        try {
          handler(message);
        } catch (err) {
          logger.error(
            LOG_CONTEXT.TRANSPORT,
            "Error in memory transport subscriber",
            err instanceof Error ? err.message : String(err),
          );
        }
      }
    },

    subscribe(handler: MessageHandler): Unsubscribe {
      subscribers.add(handler);
      return () => {
        subscribers.delete(handler);
      };
    },

    messages(): readonly Uint8Array[] {
      return Object.freeze([...sent]);
    },

    texts(): readonly string[] {
      return Object.freeze(sent.map((message) => textDecoder.decode(message)));
    },

    failNext(error: Error = new Error("injected failure")): void {
      pendingFailure = error;
    },

    clear(): void {
      sent.length = 0;
    },

    subscriberCount(): number {
      return subscribers.size;
    },

    isClosed(): boolean {
      return closed;
    },

    async close(): Promise<void> {
      closed = true;
      subscribers.clear();
    },
  };
}
