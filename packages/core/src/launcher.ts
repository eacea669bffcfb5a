// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

import { spawn as nodeSpawn, type SpawnOptions } from "node:child_process";
import { setTimeout as delay } from "node:timers/promises";
import type { ConsumerConfig } from "./config.js";
import { ConfigurationError } from "./errors.js";
import { LOG_CONTEXT, silentLogger, type LoggerAdapter } from "./logger.js";

/**
 * The part of a child process the launcher relies on.
 */
export interface ConsumerProcess {
  readonly pid?: number | undefined;
  readonly exitCode: number | null;
  readonly signalCode: NodeJS.Signals | null;
  kill(signal?: NodeJS.Signals): boolean;
  once(event: "exit", listener: (code: number | null) => void): unknown;
  on(event: "error", listener: (error: Error) => void): unknown;
}

export type SpawnFn = (
  command: string,
  args: readonly string[],
  options: SpawnOptions,
) => ConsumerProcess;

export interface LaunchOptions {
  /** Transport endpoint, passed to the consumer as its second-to-last argument */
  endpoint: string;
  /** Channel name, passed to the consumer as its last argument */
  channel: string;
  logger?: LoggerAdapter;
  /** Override process creation (tests) */
  spawn?: SpawnFn;
}

export interface ConsumerHandle {
  readonly pid: number | undefined;
  /** Resolves with the exit code (null when killed by a signal or never started) */
  readonly exited: Promise<number | null>;
  /** Signal the consumer (default SIGTERM) and wait for it to exit */
  stop(signal?: NodeJS.Signals): Promise<number | null>;
}

/**
 * Start the consumer process: `command ...args <endpoint> <channel>`.
 *
 * Resolves after `startupDelayMs` so the consumer can subscribe before the
 * first batch (pub/sub drops messages sent before a subscriber joins).
 * Shutting the consumer down is normally done by `Session.close()` sending
 * `exit`; `stop()` is for consumers that don't react to it.
 *
 * @throws {ConfigurationError} if the process cannot be started or exits
 * during the startup delay
 */
export async function launchConsumer(
  config: ConsumerConfig,
  options: LaunchOptions,
): Promise<ConsumerHandle> {
  const logger = options.logger ?? silentLogger;
  const spawn: SpawnFn = options.spawn ?? nodeSpawn;
  const { command, startupDelayMs } = config;
  const args = [...config.args, options.endpoint, options.channel];

  logger.info(LOG_CONTEXT.LAUNCHER, "Starting consumer", { command, args });
  const child = spawn(command, args, { stdio: "inherit" });

  let spawnError: Error | undefined;
  const exited = new Promise<number | null>((resolve) => {
    // Errors can follow the first one (a failed kill), so keep listening
    child.on("error", (error) => {
      spawnError ??= error;
      logger.error(LOG_CONTEXT.LAUNCHER, "Consumer process error", error);
      resolve(null);
    });
    child.once("exit", (code) => {
      logger.info(LOG_CONTEXT.LAUNCHER, "Consumer exited", { code });
      resolve(code);
    });
  });

  const startup = new AbortController();
  const early = await Promise.race([
    exited.then((code) => ({ code })),
    delay(startupDelayMs, undefined, { signal: startup.signal }).then(
      () => undefined,
    ),
  ]);
  startup.abort();

  if (early !== undefined) {
    throw new ConfigurationError(
      spawnError
        ? `Failed to start consumer "${command}": ${spawnError.message}`
        : `Consumer "${command}" exited with code ${early.code} during startup`,
      { cause: spawnError },
    );
  }

  return {
    pid: child.pid,
    exited,
    stop(signal: NodeJS.Signals = "SIGTERM") {
      if (child.exitCode === null && child.signalCode === null) {
        child.kill(signal);
      }
      return exited;
    },
  };
}
