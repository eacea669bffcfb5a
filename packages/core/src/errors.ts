// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

/**
 * Unified error code type for bufcast
 */
export type BufcastErrorCode =
  | "UNSUPPORTED_ELEMENT_TYPE"
  | "INVALID_NAME"
  | "INVALID_SHAPE"
  | "TRANSPORT_FAILED"
  | "PUBLISH_FAILED"
  | "SUBSCRIBE_FAILED"
  | "DISCONNECTED"
  | "SESSION_CLOSED"
  | "SESSION_BUSY"
  | "CONFIGURATION_ERROR"
  | "DECODE_FAILED";

/**
 * Codes a transport reports. Transports without finer detail use TRANSPORT_FAILED.
 */
export type TransportErrorCode = Extract<
  BufcastErrorCode,
  "TRANSPORT_FAILED" | "PUBLISH_FAILED" | "SUBSCRIBE_FAILED" | "DISCONNECTED"
>;

/**
 * Base error class for bufcast
 *
 * Every public API throws errors that extend this class.
 * Check the `code` field for the specific failure and `retryable` to decide whether
 * repeating the same operation can succeed.
 */
export class BufcastError extends Error {
  /**
   * Error code for programmatic handling
   */
  declare readonly code: BufcastErrorCode;

  /**
   * Whether this error is transient and safe to retry
   * - true: network/connection issues reported by the transport
   * - false: invalid input or lifecycle misuse; retrying cannot help
   */
  retryable: boolean;

  /**
   * Original error that caused this, if any
   */
  override cause?: unknown;

  constructor(
    message: string,
    options?: {
      code?: BufcastErrorCode;
      retryable?: boolean;
      cause?: unknown;
    },
  ) {
    super(message);
    this.name = "BufcastError";
    this.code = options?.code ?? "TRANSPORT_FAILED";
    this.retryable = options?.retryable ?? false;
    if (options?.cause !== undefined) {
      this.cause = options.cause;
    }
    Object.setPrototypeOf(this, BufcastError.prototype);
  }
}

/**
 * Element kind has no wire encoding (registry returned the "0" sentinel),
 * or the declared kind does not match the storage's element width.
 */
export class UnsupportedElementTypeError extends BufcastError {
  declare readonly code: "UNSUPPORTED_ELEMENT_TYPE";

  constructor(
    message: string,
    public readonly kind: string,
  ) {
    super(message, { code: "UNSUPPORTED_ELEMENT_TYPE", retryable: false });
    this.name = "UnsupportedElementTypeError";
    Object.setPrototypeOf(this, UnsupportedElementTypeError.prototype);
  }
}

/**
 * Buffer name cannot be placed in a header (empty, or contains a field separator
 * or line break).
 */
export class InvalidNameError extends BufcastError {
  declare readonly code: "INVALID_NAME";

  constructor(
    message: string,
    public readonly bufferName: string,
  ) {
    super(message, { code: "INVALID_NAME", retryable: false });
    this.name = "InvalidNameError";
    Object.setPrototypeOf(this, InvalidNameError.prototype);
  }
}

/**
 * Dimensions are negative, fractional, or disagree with the storage length
 */
export class InvalidShapeError extends BufcastError {
  declare readonly code: "INVALID_SHAPE";

  constructor(message: string) {
    super(message, { code: "INVALID_SHAPE", retryable: false });
    this.name = "InvalidShapeError";
    Object.setPrototypeOf(this, InvalidShapeError.prototype);
  }
}

/**
 * Transport rejected a message
 */
export class TransportError extends BufcastError {
  declare readonly code: TransportErrorCode;

  constructor(
    message: string,
    options?: {
      code?: TransportErrorCode;
      retryable?: boolean;
      cause?: unknown;
    },
  ) {
    super(message, {
      code: options?.code ?? "TRANSPORT_FAILED",
      retryable: options?.retryable,
      cause: options?.cause,
    });
    this.name = "TransportError";
    Object.setPrototypeOf(this, TransportError.prototype);
  }
}

/**
 * Session has already sent its shutdown signal
 */
export class SessionClosedError extends BufcastError {
  declare readonly code: "SESSION_CLOSED";

  constructor(message = "Session is closed") {
    super(message, { code: "SESSION_CLOSED", retryable: false });
    this.name = "SessionClosedError";
    Object.setPrototypeOf(this, SessionClosedError.prototype);
  }
}

/**
 * Another session operation is still sending. Callers must serialize
 * push/send/flush; the session holds no lock.
 */
export class SessionBusyError extends BufcastError {
  declare readonly code: "SESSION_BUSY";

  constructor(public readonly operation: string) {
    super(`Cannot ${operation}: another send is in progress`, {
      code: "SESSION_BUSY",
      retryable: true,
    });
    this.name = "SessionBusyError";
    Object.setPrototypeOf(this, SessionBusyError.prototype);
  }
}

/**
 * Configuration error (invalid options or environment)
 */
export class ConfigurationError extends BufcastError {
  declare readonly code: "CONFIGURATION_ERROR";

  constructor(
    message: string,
    options?: {
      cause?: unknown;
    },
  ) {
    super(message, {
      code: "CONFIGURATION_ERROR",
      retryable: false,
      ...options,
    });
    this.name = "ConfigurationError";
    Object.setPrototypeOf(this, ConfigurationError.prototype);
  }
}

/**
 * Received message sequence does not follow the wire format
 */
export class DecodeError extends BufcastError {
  declare readonly code: "DECODE_FAILED";

  constructor(message: string) {
    super(message, { code: "DECODE_FAILED", retryable: false });
    this.name = "DecodeError";
    Object.setPrototypeOf(this, DecodeError.prototype);
  }
}

/**
 * Network error codes that mark a transport failure as transient.
 * Unknown errors default to non-retryable.
 */
const RETRYABLE_ERROR_CODES = new Set([
  "ECONNREFUSED",
  "ECONNRESET",
  "ETIMEDOUT",
  "EHOSTUNREACH",
  "ENETUNREACH",
  "EPIPE",
]);

/**
 * Check if an error is a transient network error (retryable)
 *
 * Checks `code` before `name` before `message`; the first is what Node.js
 * system errors carry.
 */
export function isRetryableNetworkError(error: unknown): boolean {
  if (!(error instanceof Error)) {
    return false;
  }

  if (error instanceof BufcastError) {
    return error.retryable;
  }

  const code = "code" in error ? error.code : undefined;
  if (typeof code === "string" && RETRYABLE_ERROR_CODES.has(code)) {
    return true;
  }

  if (RETRYABLE_ERROR_CODES.has(error.name)) {
    return true;
  }

  const message = error.message.toUpperCase();
  for (const known of RETRYABLE_ERROR_CODES) {
    if (message.includes(known)) {
      return true;
    }
  }

  return false;
}
