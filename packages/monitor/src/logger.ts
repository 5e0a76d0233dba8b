// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.

/**
 * Module-scoped pino loggers.
 *
 * Loggers are created by the composition root (CLI, facade) and handed to
 * the components that need them; nothing here holds a shared instance.
 */

import pino from "pino";
import { z } from "zod";

export type Logger = pino.Logger;

export type ModuleName = "monitor" | "simulator" | "config" | "source" | "notify" | "state" | "cli";

const LOG_LEVELS = ["fatal", "error", "warn", "info", "debug", "trace", "silent"] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

const EnvSchema = z.object({
  CHARGEWATCH_LOG_LEVEL: z.enum(LOG_LEVELS).default("info"),
  CHARGEWATCH_PRETTY_LOGS: z
    .enum(["0", "1"])
    .default("0")
    .transform((v) => v === "1"),
});

export interface LoggerOptions {
  /** Overrides CHARGEWATCH_LOG_LEVEL */
  level?: LogLevel;
  /** Overrides CHARGEWATCH_PRETTY_LOGS */
  pretty?: boolean;
}

export function readLogEnv(env: NodeJS.ProcessEnv = process.env): { level: LogLevel; pretty: boolean } {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    // Unknown values fall back to the defaults.
    return { level: "info", pretty: false };
  }
  return { level: parsed.data.CHARGEWATCH_LOG_LEVEL, pretty: parsed.data.CHARGEWATCH_PRETTY_LOGS };
}

/**
 * Create a logger for one module.
 *
 * @example
 * const log = createLogger("monitor");
 * log.info({ capacity: 42 }, "reading accepted");
 */
export function createLogger(module: ModuleName, options: LoggerOptions = {}): Logger {
  const env = readLogEnv();
  const level = options.level ?? env.level;
  const pretty = options.pretty ?? env.pretty;

  if (pretty) {
    return pino({
      name: module,
      level,
      transport: {
        target: "pino-pretty",
        options: {
          colorize: true,
          messageFormat: "[{name}] {msg}",
          ignore: "pid,hostname,name",
          translateTime: "HH:MM:ss",
        },
      },
    });
  }

  return pino({ name: module, level });
}
