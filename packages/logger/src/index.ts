/**
 * @uuid-shortener/logger - Structured Logging Package
 *
 * Provides consistent structured logging across uuid-shortener packages.
 * Uses pino for JSON logging, pretty-printed in development.
 *
 * Usage:
 * ```ts
 * import { getLogger, createLogger } from "@uuid-shortener/logger";
 *
 * // Use default logger
 * getLogger().info({ alphabetSize: 58 }, "Codec ready");
 *
 * // Create component-specific logger
 * const codecLogger = createLogger("codec");
 * codecLogger.warn({ length: 8 }, "Lossy code length");
 * ```
 */

import pino from "pino";
import type { DestinationStream, Logger, LoggerOptions } from "pino";

// ============================================================================
// Configuration
// ============================================================================

export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal" | "silent";

const LOG_LEVELS: readonly LogLevel[] = ["trace", "debug", "info", "warn", "error", "fatal", "silent"];

const DEFAULT_LOG_LEVEL: LogLevel = "info";

/**
 * Parse a log level string, falling back to the default for unknown values.
 */
export function parseLogLevel(level: string | undefined): LogLevel {
  const normalized = (level ?? "").trim().toLowerCase();
  return LOG_LEVELS.find((candidate) => candidate === normalized) ?? DEFAULT_LOG_LEVEL;
}

function nodeEnv(): string {
  return process.env.NODE_ENV || "development";
}

function serviceName(): string {
  return process.env.SERVICE_NAME || "uuid-shortener";
}

// ============================================================================
// Logger Factory
// ============================================================================

export interface CreateLoggerOptions {
  /** Overrides LOG_LEVEL */
  level?: LogLevel;

  /** Write here instead of stdout (disables the pretty transport) */
  destination?: DestinationStream;
}

/**
 * Create a logger instance for a specific component
 */
export function createLogger(name: string, options: CreateLoggerOptions = {}): Logger {
  const env = nodeEnv();
  const pretty = env === "development" && !options.destination;

  const loggerOptions: LoggerOptions = {
    name: `${serviceName()}:${name}`,
    level: options.level ?? parseLogLevel(process.env.LOG_LEVEL),
    timestamp: pino.stdTimeFunctions.isoTime,
    formatters: {
      level: (label) => ({ level: label }),
    },
    transport: pretty
      ? {
          target: "pino-pretty",
          options: {
            colorize: true,
            translateTime: "SYS:standard",
            ignore: "pid,hostname",
          },
        }
      : undefined,
    base: {
      service: name,
      env,
    },
  };

  return options.destination ? pino(loggerOptions, options.destination) : pino(loggerOptions);
}

// ============================================================================
// Default Logger Instance
// ============================================================================

let defaultLogger: Logger | undefined;

/**
 * Default logger for general use, created on first call so that importing
 * this package starts no transport.
 */
export function getLogger(): Logger {
  if (!defaultLogger) {
    defaultLogger = createLogger("main");
  }
  return defaultLogger;
}

// Re-export pino types for consumers
export type { Logger, DestinationStream } from "pino";
