// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

import {
  BufcastError,
  TransportError,
  isRetryableNetworkError,
} from "@bufcast/core";

/**
 * Publishing a message to Redis failed
 */
export class PublishError extends TransportError {
  declare readonly code: "PUBLISH_FAILED";

  /**
   * Wire channel the message was meant for
   */
  channel?: string | undefined;

  constructor(
    message: string,
    options?: {
      retryable?: boolean;
      cause?: unknown;
      channel?: string;
    },
  ) {
    super(message, {
      code: "PUBLISH_FAILED",
      retryable: options?.retryable,
      cause: options?.cause,
    });
    this.name = "PublishError";
    this.channel = options?.channel;
    Object.setPrototypeOf(this, PublishError.prototype);
  }
}

/**
 * Subscribing to the channel failed
 */
export class SubscribeError extends TransportError {
  declare readonly code: "SUBSCRIBE_FAILED";

  channel?: string | undefined;

  constructor(
    message: string,
    options?: {
      retryable?: boolean;
      cause?: unknown;
      channel?: string;
    },
  ) {
    super(message, {
      code: "SUBSCRIBE_FAILED",
      retryable: options?.retryable,
      cause: options?.cause,
    });
    this.name = "SubscribeError";
    this.channel = options?.channel;
    Object.setPrototypeOf(this, SubscribeError.prototype);
  }
}

/**
 * Transport is disconnected or closed
 */
export class DisconnectedError extends TransportError {
  declare readonly code: "DISCONNECTED";

  constructor(
    message: string,
    options?: {
      retryable?: boolean;
      cause?: unknown;
    },
  ) {
    super(message, {
      code: "DISCONNECTED",
      retryable: options?.retryable ?? true,
      cause: options?.cause,
    });
    this.name = "DisconnectedError";
    Object.setPrototypeOf(this, DisconnectedError.prototype);
  }
}

/**
 * Redis transient states that resolve by themselves
 */
const REDIS_TRANSIENT_CODES = new Set([
  "READONLY", // replica failover; leader will be elected
  "LOADING", // Redis server starting up
  "TRYAGAIN", // cluster slot migration in progress
]);

/**
 * Network errors plus Redis transient server states
 */
export function isRetryableRedisError(error: unknown): boolean {
  if (error instanceof BufcastError) {
    return error.retryable;
  }
  if (isRetryableNetworkError(error)) {
    return true;
  }
  if (!(error instanceof Error)) {
    return false;
  }
  const firstWord = error.message.split(" ", 1)[0] ?? "";
  return REDIS_TRANSIENT_CODES.has(firstWord.toUpperCase());
}
