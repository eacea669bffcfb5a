// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

/**
 * Outbound message channel used by a session.
 *
 * ## Semantics
 *
 * - **Delivery**: fire-and-forget to every current subscriber; no acknowledgement
 * - **Ordering**: messages from one sender arrive in `send()` order
 * - **Framing**: each `send()` is one discrete message; the transport adds no
 *   length prefix of its own to the payload
 * - **Borrowed payloads**: `message` may be a view over caller memory. The
 *   transport must finish reading (or copy) it before the returned promise
 *   settles, and must not keep a reference afterwards.
 */
export interface Transport {
  /**
   * Resolves once the transport has accepted the message for delivery
   * (not when a consumer has processed it).
   *
   * @throws {TransportError} if the message was rejected
   */
  send(message: Uint8Array): Promise<void>;

  /**
   * Release connections. Idempotent.
   */
  close?(): Promise<void>;
}

/**
 * Handler for inbound messages on the consumer side of a transport.
 */
export type MessageHandler = (message: Uint8Array) => void;

/**
 * Unsubscribe function type
 */
export type Unsubscribe = () => void;
