/**
 * Custom log formatters for compact, readable output.
 *
 * Three formats available:
 * - compact: Single line with all info, good for multi-component systems
 * - hybrid: Event name on first line, details indented below (2 lines per log)
 * - minimal: Ultra-compact with minimal metadata
 *
 * The formatter stream can be paused while a progress bar owns the terminal;
 * lines written in the meantime are held back and flushed in order on resume.
 */

export type LogFormat = "compact" | "hybrid" | "minimal";

export interface LogObject {
  level: number;
  time: number | string;
  msg?: string;
  component?: string;
  event?: string;
  [key: string]: unknown;
}

// ANSI color codes
const colors = {
  dim: "\x1b[2m",
  cyan: "\x1b[36m",
  yellow: "\x1b[33m",
  green: "\x1b[32m",
  reset: "\x1b[0m",
};

const levelNames: Record<number, string> = {
  10: "TRACE",
  20: "DEBUG",
  30: "INFO",
  40: "WARN",
  50: "ERROR",
  60: "FATAL",
};

function formatTime(time: number | string): string {
  return new Date(time).toISOString().substring(11, 23); // HH:MM:SS.mmm
}

function formatTimeMinimal(time: number | string): string {
  return new Date(time).toISOString().substring(17, 23); // SS.mmm
}

function formatValue(value: unknown): string {
  if (typeof value === "object" && value !== null) {
    return JSON.stringify(value);
  }
  return String(value);
}

function formatPairs(data: Record<string, unknown>): string[] {
  const pairs: string[] = [];
  for (const [key, value] of Object.entries(data)) {
    pairs.push(`${colors.yellow}${key}${colors.reset}=${colors.green}${formatValue(value)}${colors.reset}`);
  }
  return pairs;
}

/**
 * Format log in compact single-line style.
 * Format: [dim]TIME LEVEL [component][/dim] [cyan]event[/cyan] [yellow]key[/yellow]=[green]value[/green] ...
 */
export function formatCompact(log: LogObject): string {
  const time = formatTime(log.time);
  const level = levelNames[log.level] ?? "UNKNOWN";
  const component = log.component ?? "app";

  const { level: _, time: __, msg: _msg, component: _c, event, ...data } = log;

  const pairs = formatPairs(data);
  const eventStr = event ? `${colors.cyan}${event}${colors.reset}` : "";
  const details = pairs.length > 0 ? ` ${pairs.join(" ")}` : "";

  return `${colors.dim}${time} ${level.padEnd(5)} [${component}]${colors.reset} ${eventStr}${details}`;
}

/**
 * Format log in hybrid style (event on first line, details below).
 */
export function formatHybrid(log: LogObject): string {
  const time = formatTime(log.time);
  const level = levelNames[log.level] ?? "UNKNOWN";
  const component = log.component ?? "app";

  const { level: _, time: __, msg: _msg, component: _c, event, ...data } = log;

  const eventStr = event ?? _msg ?? "";
  const firstLine = `${colors.dim}${time} ${level.padEnd(5)} [${component}]${colors.reset} ${colors.cyan}${eventStr}${colors.reset}`;

  if (Object.keys(data).length === 0) {
    return firstLine;
  }

  return `${firstLine}\n  ${formatPairs(data).join(" ")}`;
}

/**
 * Format log in minimal style (ultra-compact).
 */
export function formatMinimal(log: LogObject): string {
  const time = formatTimeMinimal(log.time);

  const { level: _, time: __, msg: _msg, component: _c, event, ...data } = log;

  const pairs = formatPairs(data);
  const eventStr = event ? `${colors.cyan}${event}${colors.reset}` : "";
  const details = pairs.length > 0 ? ` ${pairs.join(" ")}` : "";

  return `${colors.dim}${time}${colors.reset} ${eventStr}${details}`;
}

/**
 * Get the appropriate formatter based on format type.
 */
export function getFormatter(format: LogFormat): (log: LogObject) => string {
  switch (format) {
    case "compact":
      return formatCompact;
    case "hybrid":
      return formatHybrid;
    case "minimal":
      return formatMinimal;
    default:
      return formatCompact;
  }
}

// Pino log levels (same as defined in pino)
const pinoLevels: Record<string, number> = {
  trace: 10,
  debug: 20,
  info: 30,
  warn: 40,
  error: 50,
  fatal: 60,
  silent: Number.POSITIVE_INFINITY,
};

export interface LineSink {
  write(text: string): unknown;
}

export interface FormatterStreamOptions {
  /** Destination for formatted lines (default: process.stdout) */
  sink?: LineSink;
  /** Level threshold; read from LOG_LEVEL at write time when omitted */
  level?: string;
}

export interface FormatterStream {
  write(chunk: string): void;
  /** Hold back formatted lines until resume() */
  pause(): void;
  /** Flush held lines in order and resume direct writes */
  resume(): void;
  /** Switch the line format for subsequent writes */
  setFormat(format: LogFormat): void;
  readonly paused: boolean;
}

/**
 * Create a Pino write stream that formats logs using custom formatters.
 * Respects the LOG_LEVEL environment variable to suppress logs during tests.
 */
export function createFormatterStream(format: LogFormat, options: FormatterStreamOptions = {}): FormatterStream {
  let formatter = getFormatter(format);
  const sink = options.sink ?? process.stdout;
  const held: string[] = [];
  let paused = false;

  const emit = (text: string): void => {
    if (paused) {
      held.push(text);
    } else {
      sink.write(text);
    }
  };

  return {
    write(chunk: string) {
      let log: LogObject;
      try {
        log = JSON.parse(chunk) as LogObject;
      } catch {
        // Not JSON, pass the raw chunk through
        emit(chunk);
        return;
      }

      const configuredLevel = options.level ?? process.env.LOG_LEVEL ?? "info";
      const configuredLevelNum = pinoLevels[configuredLevel] ?? 30;

      if (log.level < configuredLevelNum) {
        return;
      }

      emit(`${formatter(log)}\n`);
    },

    pause() {
      paused = true;
    },

    resume() {
      paused = false;
      for (const line of held.splice(0)) {
        sink.write(line);
      }
    },

    setFormat(next: LogFormat) {
      formatter = getFormatter(next);
    },

    get paused() {
      return paused;
    },
  };
}
