import pino from "pino";
import { createFormatterStream, type FormatterStream, type LogFormat } from "./formatter.js";

/**
 * Structured logging with Pino.
 *
 * Design decisions:
 * - JSON output in production for machine parsing
 * - Compact, readable formats for development (via LOG_FORMAT)
 * - The development formatter stream doubles as the output log a progress bar
 *   suspends while it redraws, see `outputLogHooks`
 */

const isDev = process.env.NODE_ENV !== "production";

function resolveLogFormat(value: string | undefined): LogFormat | "pretty" {
  switch (value) {
    case "hybrid":
    case "minimal":
    case "pretty":
      return value;
    default:
      return "compact";
  }
}

const logFormat = resolveLogFormat(process.env.LOG_FORMAT);

const baseConfig = {
  level: process.env.LOG_LEVEL || "info",
  messageKey: "msg",
  timestamp: pino.stdTimeFunctions.isoTime,

  base: isDev
    ? null
    : {
        service: "terminal-progress-bar",
        version: process.env.npm_package_version || "0.0.0",
        pid: process.pid,
      },

  serializers: {
    err: pino.stdSerializers.err,
  },
};

function createBaseLogger(): { logger: pino.Logger<never>; stream?: FormatterStream } {
  if (!isDev) {
    return { logger: pino(baseConfig) };
  }

  if (logFormat === "pretty") {
    const logger = pino({
      ...baseConfig,
      transport: {
        target: "pino-pretty",
        options: {
          colorize: true,
          translateTime: "HH:MM:ss.l",
          ignore: "pid,hostname",
        },
      },
    });
    return { logger };
  }

  const stream = createFormatterStream(logFormat);
  return { logger: pino(baseConfig, stream), stream };
}

const { logger: baseLogger, stream: formatterStream } = createBaseLogger();

export interface LogContext {
  [key: string]: unknown;
}

export type Logger = pino.Logger<never>;

const children: Logger[] = [];

export function createLogger(component: string, context?: LogContext): Logger {
  const child = baseLogger.child({
    component,
    ...context,
  });
  children.push(child);
  return child;
}

export interface LoggingOptions {
  level?: string;
  format?: LogFormat | "pretty";
}

/**
 * Apply logging settings loaded after startup.
 *
 * The level reaches every logger created so far. The format can only switch
 * between the formatter stream's own formats; JSON and pino-pretty output are
 * fixed when the process starts.
 */
export function configureLogging(options: LoggingOptions): void {
  if (options.level !== undefined) {
    process.env.LOG_LEVEL = options.level;
    baseLogger.level = options.level;
    for (const child of children) {
      child.level = options.level;
    }
  }

  if (options.format !== undefined && options.format !== "pretty" && formatterStream) {
    formatterStream.setFormat(options.format);
  }
}

export { baseLogger as logger };

/**
 * Suspend/resume hooks over the formatted log output.
 *
 * Only the compact/hybrid/minimal formats run through an in-process stream
 * that can hold lines back; for JSON and pino-pretty output both hooks are
 * absent and callers skip them.
 */
export const outputLogHooks: {
  pauseOutputLog?: () => void;
  resumeOutputLog?: () => void;
} = formatterStream
  ? {
      pauseOutputLog: () => formatterStream.pause(),
      resumeOutputLog: () => formatterStream.resume(),
    }
  : {};
