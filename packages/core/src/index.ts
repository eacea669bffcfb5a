// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

/**
 * @bufcast/core: push typed numeric buffers and command text to a consumer
 * process over a pub/sub transport
 *
 * ## Wire format (one transport message per line)
 *
 * ```text
 * data|<name>|<tag>|<count>|<shape>     header, per buffer
 * <count × width bytes>                 payload, right after its header
 * <command text>                        once per batch
 * finalize                              end of batch
 * exit                                  once, when the session closes
 * ```
 *
 * ## Example
 *
 * ```typescript
 * import { createSession, loadConfigFromEnv, launchConsumer, matrix } from "@bufcast/core";
 * import { createRedisTransport } from "@bufcast/redis";
 *
 * const config = loadConfigFromEnv();
 * if (config.consumer) {
 *   await launchConsumer(config.consumer, config);
 * }
 * const session = await createSession({
 *   transport: createRedisTransport({ url: config.endpoint, channel: config.channel }),
 *   config,
 * });
 *
 * const grid = new Float32Array(64 * 64);
 * session.push("plt.imshow(grid)");
 * await session.send({ grid: matrix(grid, 64, 64) });
 * await session.close();
 * ```
 */

// Element types
export {
  DTYPE_TABLE,
  UNSUPPORTED,
  describe,
  inferKind,
  isSupportedKind,
  kindForTag,
} from "./dtype.js";
export type { ElementKind, ElementStorage, TypeDescriptor } from "./dtype.js";

// Containers and headers
export { formatShape, matrix, vector } from "./container.js";
export type { Container } from "./container.js";
export { buildHeader, encodeHeader, validateName } from "./header.js";
export { EXIT, FIELD_SEPARATOR, FINALIZE, HEADER_TAG } from "./constants.js";

// Text
export { dedent, indentWidth } from "./dedent.js";

// Session and transport contract
export { Session, createSession } from "./session.js";
export type { NamedBuffers, SessionOptions, SessionStatus } from "./session.js";
export type { MessageHandler, Transport, Unsubscribe } from "./transport.js";

// Consumer side
export {
  BatchDecoder,
  decodeMessages,
  parseHeader,
  parseShape,
} from "./decoder.js";
export type {
  BufferHeader,
  DecodedBatch,
  DecodedBuffer,
  DecoderEvent,
} from "./decoder.js";
export { launchConsumer } from "./launcher.js";
export type {
  ConsumerHandle,
  ConsumerProcess,
  LaunchOptions,
  SpawnFn,
} from "./launcher.js";

// Configuration and logging
export {
  ConsumerConfigSchema,
  DEFAULT_CHANNEL,
  DEFAULT_ENDPOINT,
  SessionConfigSchema,
  loadConfigFromEnv,
  parseConfig,
} from "./config.js";
export type {
  ConsumerConfig,
  SessionConfig,
  SessionConfigInput,
} from "./config.js";
export { LOG_CONTEXT, createLogger, silentLogger } from "./logger.js";
export type { LogLevel, LoggerAdapter, LoggerOptions } from "./logger.js";

// Errors
export {
  BufcastError,
  ConfigurationError,
  DecodeError,
  InvalidNameError,
  InvalidShapeError,
  SessionBusyError,
  SessionClosedError,
  TransportError,
  UnsupportedElementTypeError,
  isRetryableNetworkError,
} from "./errors.js";
export type { BufcastErrorCode, TransportErrorCode } from "./errors.js";
