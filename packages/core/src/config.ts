// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

import { z } from "zod";
import { ConfigurationError } from "./errors.js";

export const DEFAULT_ENDPOINT = "redis://127.0.0.1:6379";
export const DEFAULT_CHANNEL = "bufcast";

/**
 * How to start the consumer process. The endpoint and channel are appended
 * to `args` at launch.
 */
export const ConsumerConfigSchema = z
  .object({
    command: z.string().min(1),
    args: z.array(z.string()).default([]),
    /** Time the consumer needs to subscribe before the first batch */
    startupDelayMs: z.number().int().nonnegative().default(1500),
  })
  .strict();

/**
 * Session configuration. Unknown keys are rejected so typos surface early.
 */
export const SessionConfigSchema = z
  .object({
    endpoint: z.string().url().default(DEFAULT_ENDPOINT),
    channel: z
      .string()
      .min(1)
      .regex(/^\S+$/, "Channel must not contain whitespace")
      .default(DEFAULT_CHANNEL),
    /** Pause after the transport is up, before the session is handed out */
    startupDelayMs: z.number().int().nonnegative().default(100),
    consumer: ConsumerConfigSchema.optional(),
  })
  .strict();

export type ConsumerConfig = z.infer<typeof ConsumerConfigSchema>;
export type SessionConfig = z.infer<typeof SessionConfigSchema>;
export type SessionConfigInput = z.input<typeof SessionConfigSchema>;

/**
 * Validate configuration and fill in defaults.
 *
 * @throws {ConfigurationError} listing every invalid field
 */
export function parseConfig(input: unknown = {}): SessionConfig {
  const result = SessionConfigSchema.safeParse(input);
  if (!result.success) {
    const issues = result.error.issues.map(
      (issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`,
    );
    throw new ConfigurationError(
      `Invalid bufcast configuration: ${issues.join("; ")}`,
      { cause: result.error },
    );
  }
  return result.data;
}

/**
 * Read configuration from environment variables:
 *
 * - `BUFCAST_ENDPOINT` transport URL
 * - `BUFCAST_CHANNEL` pub/sub channel
 * - `BUFCAST_STARTUP_DELAY_MS` pause before the first batch
 * - `BUFCAST_CONSUMER` consumer command line, split on whitespace
 */
export function loadConfigFromEnv(
  env: NodeJS.ProcessEnv = process.env,
): SessionConfig {
  const input: Record<string, unknown> = {};

  if (env.BUFCAST_ENDPOINT) {
    input.endpoint = env.BUFCAST_ENDPOINT;
  }
  if (env.BUFCAST_CHANNEL) {
    input.channel = env.BUFCAST_CHANNEL;
  }
  if (env.BUFCAST_STARTUP_DELAY_MS) {
    input.startupDelayMs = Number(env.BUFCAST_STARTUP_DELAY_MS);
  }
  if (env.BUFCAST_CONSUMER) {
    const [command, ...args] = env.BUFCAST_CONSUMER.trim().split(/\s+/);
    input.consumer = { command, args };
  }

  return parseConfig(input);
}
