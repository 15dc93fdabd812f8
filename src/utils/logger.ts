/**
 * Logger Module
 * Structured logging using pino with file and console output
 */

import pino, { type Logger as PinoLogger } from "pino";
import * as fs from "node:fs";
import * as path from "node:path";

export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal" | "silent";

export interface LoggerOptions {
  level?: LogLevel;
  enableFileLogging?: boolean;
  logDir?: string;
}

const DEFAULT_LOG_DIR = path.join(".graphql-forge", "logs");
const VALID_LEVELS: readonly LogLevel[] = ["trace", "debug", "info", "warn", "error", "fatal", "silent"];

function ensureLogDir(logDir: string): void {
  if (!fs.existsSync(logDir)) {
    fs.mkdirSync(logDir, { recursive: true });
  }
}

function isDevelopment(): boolean {
  return process.env.NODE_ENV !== "production" && process.env.NODE_ENV !== "test";
}

function isLogLevel(value: string): value is LogLevel {
  return (VALID_LEVELS as readonly string[]).includes(value);
}

/**
 * Get log level from environment or default. Tests stay silent unless
 * LOG_LEVEL asks otherwise.
 */
function getLogLevel(): LogLevel {
  const envLevel = process.env.LOG_LEVEL?.toLowerCase();
  if (envLevel && isLogLevel(envLevel)) {
    return envLevel;
  }
  if (process.env.NODE_ENV === "test") return "silent";
  return isDevelopment() ? "debug" : "info";
}

// Weak, so per-build child loggers can be collected
const loggers = new Set<WeakRef<PinoLogger>>();

/**
 * Changes the level of every logger created so far, children included. The
 * CLI uses this once its flags are parsed, after module-level loggers
 * already exist.
 */
export function setLogLevel(level: LogLevel): void {
  for (const ref of loggers) {
    const logger = ref.deref();
    if (logger) {
      logger.level = level;
    } else {
      loggers.delete(ref);
    }
  }
}

function track(logger: PinoLogger): PinoLogger {
  loggers.add(new WeakRef(logger));
  return logger;
}

/**
 * Create a logger instance for a specific component
 *
 * @example
 * ```typescript
 * const logger = createLogger("build-project");
 * logger.info({ project: "web" }, "Build complete");
 * logger.error({ err }, "Failed to write artifacts");
 * ```
 */
export function createLogger(component: string, options: LoggerOptions = {}): PinoLogger {
  const { level = getLogLevel(), enableFileLogging = false, logDir } = options;

  const baseOptions: pino.LoggerOptions = {
    name: component,
    level,
  };

  if (isDevelopment() && !enableFileLogging) {
    return track(pino({
      ...baseOptions,
      transport: {
        target: "pino-pretty",
        options: {
          colorize: true,
          translateTime: "SYS:HH:MM:ss",
          ignore: "pid,hostname",
          destination: 2,
        },
      },
    }));
  }

  if (enableFileLogging) {
    const dir = logDir ?? DEFAULT_LOG_DIR;
    ensureLogDir(dir);

    const destination = pino.destination({
      dest: path.join(dir, `${component}.log`),
      sync: false,
    });

    return track(pino(baseOptions, destination));
  }

  return track(pino(baseOptions, pino.destination(2)));
}

/**
 * Create a child logger with additional context
 */
export function createChildLogger(parent: PinoLogger, bindings: Record<string, unknown>): PinoLogger {
  return track(parent.child(bindings));
}

/**
 * Logger type export for use in type annotations
 */
export type Logger = PinoLogger;
