// src/observability/logger.ts
// Structured JSON logging
//
// Pino root logger with:
// - level from LOG_LEVEL (defaults to info)
// - JSON output, or pino-pretty when LOG_PRETTY=true
// - module-scoped child loggers

import pino, { type Logger } from "pino";

/* ---------- Types ---------- */
export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal" | "silent";

const LOG_LEVELS: readonly LogLevel[] = [
  "trace",
  "debug",
  "info",
  "warn",
  "error",
  "fatal",
  "silent",
];

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/* ---------- Configuration ---------- */

/**
 * Log level from the environment; unknown values fall back to 'info'.
 */
export function getLogLevel(): LogLevel {
  const level = process.env.LOG_LEVEL?.toLowerCase();
  return level && isLogLevel(level) ? level : "info";
}

export function isPrettyEnabled(): boolean {
  return process.env.LOG_PRETTY === "true";
}

/* ---------- Logger Factory ---------- */

let rootLogger: Logger | null = null;

function getRootLogger(): Logger {
  if (!rootLogger) {
    const options: pino.LoggerOptions = {
      level: getLogLevel(),
      base: {
        service: "docgraph-metrics",
        version: process.env.npm_package_version || "unknown",
      },
      timestamp: pino.stdTimeFunctions.isoTime,
    };

    rootLogger = isPrettyEnabled()
      ? pino({
          ...options,
          transport: {
            target: "pino-pretty",
            options: {
              colorize: true,
              translateTime: "SYS:standard",
              ignore: "pid,hostname",
            },
          },
        })
      : pino(options);
  }

  return rootLogger;
}

/**
 * Create a logger, optionally scoped to a module
 *
 * @example
 * const log = createLogger('metrics/aggregator');
 * log.info({ scope: 'all' }, 'Report computed');
 */
export function createLogger(moduleName?: string): Logger {
  const root = getRootLogger();
  return moduleName ? root.child({ module: moduleName }) : root;
}

/**
 * Child logger carrying extra bindings on every line
 */
export function createChildLogger(
  parent: Logger,
  bindings: Record<string, unknown>
): Logger {
  return parent.child(bindings);
}

export const logger = createLogger();
