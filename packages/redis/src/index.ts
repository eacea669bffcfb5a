// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

/**
 * @bufcast/redis - Redis pub/sub transport for bufcast sessions
 *
 * ## Semantics
 *
 * - **Delivery**: fire-and-forget; subscribers that join late miss messages
 * - **Ordering**: per-channel FIFO
 * - **Send while disconnected**: connects lazily, fails if that fails (no buffering)
 * - **Payloads**: binary-safe; Buffers go to Redis as-is
 * - **Lifecycle**: if you pass `client`, you own cleanup; RedisTransport owns created clients
 *
 * ## Example
 *
 * ```typescript
 * import { createSession, vector } from "@bufcast/core";
 * import { createRedisTransport } from "@bufcast/redis";
 *
 * const session = await createSession({
 *   transport: createRedisTransport({ url: "redis://localhost:6379", channel: "plots" }),
 * });
 * await session.send({ xs: vector(new Float64Array([1, 2, 3])) });
 * await session.close();
 * ```
 */

export {
  RedisTransport,
  createRedisTransport,
  fromNodeRedis,
} from "./transport.js";
export type {
  Events,
  RedisClient,
  RedisTransportOptions,
  RedisTransportStatus,
  Subscription,
} from "./types.js";

export {
  DisconnectedError,
  PublishError,
  SubscribeError,
  isRetryableRedisError,
} from "./errors.js";
