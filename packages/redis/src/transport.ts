// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

import {
  BufcastError,
  ConfigurationError,
  DEFAULT_CHANNEL,
  LOG_CONTEXT,
  silentLogger,
  type LoggerAdapter,
  type MessageHandler,
  type Transport,
  type TransportError,
} from "@bufcast/core";
import type { createClient } from "redis";
import {
  DisconnectedError,
  PublishError,
  SubscribeError,
  isRetryableRedisError,
} from "./errors.js";
import type {
  Events,
  RedisClient,
  RedisTransportOptions,
  RedisTransportStatus,
  Subscription,
} from "./types.js";

type NodeRedisClient = ReturnType<typeof createClient>;
type EventName = keyof Events;
type EventHandler<K extends EventName> = (payload: Events[K]) => void;

/**
 * Transport that publishes every session message to one Redis pub/sub channel.
 *
 * ## Semantics
 *
 * - **Delivery**: fire-and-forget to the subscribers connected at publish time;
 *   a consumer that subscribes late misses earlier messages
 * - **Ordering**: per-channel FIFO, which keeps header/payload pairs adjacent
 * - **Send while disconnected**: connects lazily; fails if that fails (no buffering)
 * - **Payloads**: published as Buffers over the caller's memory (no copy); the
 *   `send()` promise settles only after Redis replied, so the memory is no
 *   longer read by then
 * - **Lifecycle**: if you pass `client`, you own it; RedisTransport quits only
 *   the connections it created
 *
 * Two connections are used when subscribing: Redis forbids publishing on a
 * connection in subscriber mode, so `subscribe()` works on `duplicate()`.
 */
export class RedisTransport implements Transport {
  private publishClient: RedisClient | null = null;
  private subscribeClient: RedisClient | null = null;
  private pendingPublishClient: Promise<RedisClient> | null = null;
  private handlers = new Set<MessageHandler>();
  private subscription: Promise<void> | null = null;

  private connected = false;
  private destroyed = false;
  private inflightSends = 0;
  private lastError: { error: Error; at: number } | undefined;
  private readonly userOwnedClient: boolean;
  private readonly channel: string;
  private readonly logger: LoggerAdapter;

  private watched = new WeakSet<RedisClient>();
  private eventListeners: { [K in EventName]: Set<EventHandler<K>> } = {
    connect: new Set(),
    disconnect: new Set(),
    error: new Set(),
  };

  public readonly options: RedisTransportOptions;

  constructor(options: RedisTransportOptions = {}) {
    validateOptions(options);
    this.options = options;
    this.userOwnedClient = options.client !== undefined;
    this.logger = options.logger ?? silentLogger;

    const channel = options.channel ?? DEFAULT_CHANNEL;
    const namespace = normalizeNamespace(options.namespace);
    this.channel = namespace ? `${namespace}:${channel}` : channel;
  }

  /**
   * Publish one message.
   *
   * @throws {DisconnectedError} if the transport has been closed (not retryable)
   * @throws {PublishError} if connecting or publishing fails (retryable based on cause)
   */
  async send(message: Uint8Array): Promise<void> {
    if (this.destroyed) {
      throw this.closedError("send");
    }

    this.inflightSends++;
    try {
      const client = await this.ensurePublishClient();
      if (this.destroyed) {
        throw this.closedError("send");
      }
      await client.publish(
        this.channel,
        Buffer.from(message.buffer, message.byteOffset, message.byteLength),
      );
    } catch (error) {
      const err = error instanceof Error ? error : new Error(String(error));
      this.recordError(err);

      if (error instanceof BufcastError) {
        throw error;
      }
      throw new PublishError(
        `Failed to publish to channel "${this.channel}": ${err.message}`,
        {
          cause: err,
          channel: this.channel,
          retryable: this.isRetryable(err),
        },
      );
    } finally {
      this.inflightSends--;
    }
  }

  /**
   * Receive the channel's messages (consumer side), e.g. to feed a
   * `BatchDecoder`. The first handler opens the subscriber connection.
   *
   * @throws {DisconnectedError} if the transport has been closed
   */
  subscribe(handler: MessageHandler): Subscription {
    if (this.destroyed) {
      throw this.closedError("subscribe");
    }

    this.handlers.add(handler);
    let ready = this.subscription;
    if (!ready) {
      ready = this.establishSubscription().catch((error) => {
        this.subscription = null;
        if (this.destroyed) {
          return;
        }
        const err = error instanceof Error ? error : new Error(String(error));
        this.recordError(err);
        const subError = new SubscribeError(
          `Failed to subscribe to channel "${this.channel}"`,
          {
            cause: err,
            channel: this.channel,
            retryable: this.isRetryable(err),
          },
        );
        this.logger.error(LOG_CONTEXT.TRANSPORT, "Subscribe error", subError);
        this.emit("error", subError);
      });
      this.subscription = ready;
    }

    return {
      channel: this.channel,
      ready,
      unsubscribe: () => {
        this.unsubscribe(handler);
      },
    };
  }

  /**
   * Connect the publish client now instead of on the first send.
   */
  async connect(): Promise<void> {
    if (this.destroyed) {
      throw this.closedError("connect");
    }
    await this.ensurePublishClient();
  }

  /**
   * Close connections this transport created. Later sends reject with
   * DisconnectedError (retryable: false). Idempotent.
   */
  async close(): Promise<void> {
    if (this.destroyed) {
      return;
    }
    this.destroyed = true;
    this.handlers.clear();

    // In-flight connects see `destroyed` and quit the clients they opened
    await Promise.allSettled([this.pendingPublishClient, this.subscription]);

    const closing: Promise<unknown>[] = [];
    if (this.publishClient?.isOpen && !this.userOwnedClient) {
      closing.push(this.quit(this.publishClient, "publish"));
    }
    // Always ours: created by duplicate() or from the URL
    if (this.subscribeClient?.isOpen) {
      closing.push(this.quit(this.subscribeClient, "subscribe"));
    }

    await Promise.allSettled(closing);
    this.publishClient = null;
    this.subscribeClient = null;
    this.subscription = null;
    this.connected = false;
    this.eventListeners.connect.clear();
    this.eventListeners.disconnect.clear();
    this.eventListeners.error.clear();
  }

  status(): RedisTransportStatus {
    const status: RedisTransportStatus = {
      connected: this.connected,
      channel: this.channel,
      inflightSends: this.inflightSends,
      subscribers: this.handlers.size,
    };
    if (this.lastError) {
      status.lastError = {
        name: this.lastError.error.name,
        message: this.lastError.error.message,
        at: this.lastError.at,
      };
    }
    return status;
  }

  isConnected(): boolean {
    return this.connected;
  }

  isClosed(): boolean {
    return this.destroyed;
  }

  /**
   * Listen for lifecycle events
   * @returns Function to stop listening
   */
  on<K extends EventName>(event: K, handler: EventHandler<K>): () => void {
    this.eventListeners[event].add(handler);
    return () => {
      this.off(event, handler);
    };
  }

  off<K extends EventName>(event: K, handler: EventHandler<K>): void {
    this.eventListeners[event].delete(handler);
  }

  // ========== Private Methods ==========

  private isRetryable(error: unknown): boolean {
    const hookResult = this.options.isRetryable?.(error);
    if (hookResult !== undefined) {
      return hookResult;
    }
    return isRetryableRedisError(error);
  }

  private closedError(operation: string): DisconnectedError {
    return new DisconnectedError(
      `Cannot ${operation}: transport has been closed`,
      { retryable: false },
    );
  }

  private emit<K extends EventName>(event: K, payload: Events[K]): void {
    for (const handler of Array.from(this.eventListeners[event])) {
      try {
        handler(payload);
      } catch (err) {
        this.logger.error(
          LOG_CONTEXT.TRANSPORT,
          `Error in ${event} event handler`,
          err instanceof Error ? err.message : String(err),
        );
      }
    }
  }

  private recordError(error: Error): void {
    this.lastError = { error, at: Date.now() };
  }

  private unsubscribe(handler: MessageHandler): void {
    if (!this.handlers.delete(handler) || this.handlers.size > 0) {
      return;
    }

    const client = this.subscribeClient;
    this.subscription = null;
    if (client?.isOpen) {
      client.unsubscribe(this.channel).catch((error) => {
        this.logger.warn(
          LOG_CONTEXT.TRANSPORT,
          "Unsubscribe failed",
          error instanceof Error ? error.message : String(error),
        );
      });
    }
  }

  private dispatch(message: Buffer): void {
    for (const handler of Array.from(this.handlers)) {
      try {
        handler(message);
      } catch (err) {
        this.logger.error(
          LOG_CONTEXT.TRANSPORT,
          "Error in message handler",
          err instanceof Error ? err.message : String(err),
        );
      }
    }
  }

  /**
   * Concurrent callers share one connection attempt.
   */
  private async ensurePublishClient(): Promise<RedisClient> {
    if (this.publishClient?.isOpen) {
      return this.publishClient;
    }
    if (!this.pendingPublishClient) {
      this.pendingPublishClient = this.openPublishClient().finally(() => {
        this.pendingPublishClient = null;
      });
    }
    return this.pendingPublishClient;
  }

  private async openPublishClient(): Promise<RedisClient> {
    try {
      const client = this.options.client ?? (await this.createClientFromUrl());
      if (this.destroyed) {
        throw this.closedError("send");
      }
      // node-redis throws on "error" events nobody listens to
      this.watch(client, "publish");
      if (!client.isOpen) {
        await client.connect();
      }
      if (this.destroyed) {
        if (!this.userOwnedClient) {
          await this.quit(client, "publish");
        }
        throw this.closedError("send");
      }
      this.publishClient = client;
      this.connected = true;
      this.logger.info(LOG_CONTEXT.TRANSPORT, "Connected to Redis (publish)");
      this.emit("connect", undefined);
      return client;
    } catch (error) {
      if (error instanceof BufcastError) {
        throw error;
      }
      throw new PublishError(
        `Failed to connect to Redis: ${error instanceof Error ? error.message : String(error)}`,
        {
          cause: error,
          channel: this.channel,
          retryable: true,
        },
      );
    }
  }

  private async establishSubscription(): Promise<void> {
    let client = this.subscribeClient;
    if (!client?.isOpen) {
      client = await this.openSubscribeClient();
    }
    await client.subscribe(this.channel, (message) => this.dispatch(message));
    this.logger.info(LOG_CONTEXT.TRANSPORT, "Subscribed", {
      channel: this.channel,
    });
  }

  private async openSubscribeClient(): Promise<RedisClient> {
    // Subscriber mode takes over the connection, so never reuse the publisher
    const client = this.options.client
      ? this.options.client.duplicate()
      : await this.createClientFromUrl();
    if (this.destroyed) {
      throw this.closedError("subscribe");
    }
    this.watch(client, "subscribe");
    if (!client.isOpen) {
      await client.connect();
    }
    if (this.destroyed) {
      await this.quit(client, "subscribe");
      throw this.closedError("subscribe");
    }
    this.subscribeClient = client;
    return client;
  }

  private watch(client: RedisClient, role: "publish" | "subscribe"): void {
    if (this.watched.has(client)) {
      return;
    }
    this.watched.add(client);

    client.on("error", (error) => {
      const err = error instanceof Error ? error : new Error(String(error));
      this.connected = false;
      this.recordError(err);
      this.logger.error(LOG_CONTEXT.TRANSPORT, `${role} client error`, err);
      const transportError: TransportError =
        role === "publish"
          ? new PublishError(`Connection error: ${err.message}`, {
              cause: err,
              channel: this.channel,
              retryable: true,
            })
          : new SubscribeError(`Connection error: ${err.message}`, {
              cause: err,
              channel: this.channel,
              retryable: true,
            });
      this.emit("error", transportError);
    });

    client.on("end", () => {
      this.connected = false;
      if (role === "publish") {
        this.publishClient = null;
      } else {
        this.subscribeClient = null;
        this.subscription = null;
      }
      this.logger.warn(LOG_CONTEXT.TRANSPORT, `${role} client disconnected`);
      this.emit("disconnect", undefined);
    });
  }

  private async quit(
    client: RedisClient,
    role: "publish" | "subscribe",
  ): Promise<void> {
    try {
      await client.quit();
    } catch (error) {
      this.logger.warn(
        LOG_CONTEXT.TRANSPORT,
        `Failed to quit ${role} client`,
        error instanceof Error ? error.message : String(error),
      );
    }
  }

  private async createClientFromUrl(): Promise<RedisClient> {
    let redis: typeof import("redis");
    try {
      redis = await import("redis");
    } catch (error) {
      throw new ConfigurationError(
        "redis module not found. Install it with: npm install redis",
        { cause: error },
      );
    }
    return fromNodeRedis(
      redis.createClient({ url: this.options.url ?? DEFAULT_URL }),
    );
  }
}

const DEFAULT_URL = "redis://localhost:6379";

/**
 * Adapt a node-redis v4 client to the transport's client interface.
 *
 * @example
 * ```typescript
 * import { createClient } from "redis";
 *
 * const transport = createRedisTransport({
 *   client: fromNodeRedis(createClient({ url: "redis://cache:6379" })),
 * });
 * ```
 */
export function fromNodeRedis(client: NodeRedisClient): RedisClient {
  return {
    get isOpen() {
      return client.isOpen;
    },
    connect: () => client.connect(),
    quit: () => client.quit(),
    publish: (channel, message) => client.publish(channel, message),
    subscribe: (channel, listener) =>
      client.subscribe(channel, (message) => listener(message), true),
    unsubscribe: (channel) => client.unsubscribe(channel),
    on: (event, handler) => {
      client.on(event, handler);
    },
    duplicate: () => fromNodeRedis(client.duplicate()),
  };
}

/**
 * Factory function to create a RedisTransport instance
 */
export function createRedisTransport(
  options?: RedisTransportOptions,
): RedisTransport {
  return new RedisTransport(options);
}

/**
 * Reject unknown keys and incompatible combinations.
 * Throws TypeError on invalid options.
 */
function validateOptions(options: RedisTransportOptions): void {
  const allowedKeys = new Set([
    "url",
    "client",
    "channel",
    "namespace",
    "logger",
    "isRetryable",
  ]);

  for (const key of Object.keys(options)) {
    if (!allowedKeys.has(key)) {
      throw new TypeError(
        `Unknown option "${key}". Allowed options: ${Array.from(allowedKeys).join(", ")}`,
      );
    }
  }

  if (options.url && options.client) {
    throw new TypeError(
      'Options "url" and "client" are mutually exclusive. Use one or the other.',
    );
  }

  if (options.channel !== undefined && !/^\S+$/.test(options.channel)) {
    throw new TypeError(
      `Invalid channel "${options.channel}". Channel must be non-empty and contain no whitespace.`,
    );
  }
}

/**
 * Namespace format: /^[A-Za-z0-9][A-Za-z0-9:_-]*$/
 */
function validateNamespace(ns: string): void {
  if (!/^[A-Za-z0-9][A-Za-z0-9:_-]*$/.test(ns)) {
    throw new TypeError(
      `Invalid namespace "${ns}". Namespace must start with alphanumeric and contain only alphanumerics, colons, underscores, and hyphens.`,
    );
  }
}

/**
 * Normalize namespace: accept "app", "app:", " app : " → "app"
 */
function normalizeNamespace(ns?: string): string {
  if (!ns) return "";
  let normalized = ns.trim();

  while (normalized.length > 0 && /[:_\s]/.test(normalized.slice(-1))) {
    normalized = normalized.slice(0, -1);
  }

  if (normalized.length === 0) return "";
  validateNamespace(normalized);
  return normalized;
}
