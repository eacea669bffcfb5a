// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

import type { LoggerAdapter } from "@bufcast/core";
import type { TransportError } from "@bufcast/core";

/**
 * Minimal Redis client surface the transport needs.
 *
 * node-redis v4 clients are adapted with `fromNodeRedis()`; any other client
 * can be passed directly if it implements this interface.
 */
export interface RedisClient {
  readonly isOpen: boolean;
  connect(): Promise<unknown>;
  quit(): Promise<unknown>;
  publish(channel: string, message: Buffer): Promise<number>;
  /** Subscribe in buffer mode: the listener gets raw bytes */
  subscribe(channel: string, listener: (message: Buffer) => void): Promise<void>;
  unsubscribe(channel: string): Promise<void>;
  on(event: "error" | "end", handler: (error?: unknown) => void): void;
  /** Second connection for subscribing (Redis forbids publish on a subscribed connection) */
  duplicate(): RedisClient;
}

/**
 * Options for configuring RedisTransport
 */
export interface RedisTransportOptions {
  /**
   * Redis connection URL (e.g., "redis://localhost:6379" or "rediss://..." for TLS)
   */
  url?: string;

  /**
   * Pre-configured client. Mutually exclusive with `url`.
   * RedisTransport will not call quit() on it; you own its lifecycle.
   */
  client?: RedisClient;

  /**
   * Pub/sub channel carrying the session's messages (default: "bufcast")
   */
  channel?: string;

  /**
   * Channel namespace prefix (default: "", no prefix).
   * The wire channel becomes `{namespace}:{channel}`.
   */
  namespace?: string;

  /**
   * Optional observability sink. Never logs by default.
   */
  logger?: LoggerAdapter;

  /**
   * Custom error classification for the `retryable` flag of publish failures.
   * Return undefined to fall back to the built-in network error check.
   */
  isRetryable?: (err: unknown) => boolean | undefined;
}

/**
 * Consumer-side subscription
 *
 * - `ready`: resolves once Redis confirmed the subscription (or it failed;
 *   failures are reported through the "error" event)
 * - `unsubscribe()`: detaches the handler (idempotent)
 */
export interface Subscription {
  readonly channel: string;
  readonly ready: Promise<void>;
  unsubscribe(): void;
}

/**
 * Status snapshot of RedisTransport
 */
export interface RedisTransportStatus {
  connected: boolean;
  /** Wire channel, namespace included */
  channel: string;
  /** Concurrent send() calls in flight */
  inflightSends: number;
  /** Local handlers registered with subscribe() */
  subscribers: number;
  /** Last error that occurred, if any (never auto-cleared) */
  lastError?: {
    name: string;
    message: string;
    at: number;
  };
}

/**
 * Event payloads for on() listeners
 */
export interface Events {
  connect: undefined;
  disconnect: undefined;
  error: TransportError;
}
