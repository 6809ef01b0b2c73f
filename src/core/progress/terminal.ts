/**
 * Terminal size and interactivity detection.
 *
 * @module progress/terminal
 */

import type { TerminalProfile, TerminalSize } from "./types.js";

export const DEFAULT_TERMINAL_SIZE: TerminalSize = { rows: 24, columns: 80 };

function positiveInt(value: unknown): number | undefined {
  const n = typeof value === "string" ? Number.parseInt(value, 10) : value;
  return typeof n === "number" && Number.isInteger(n) && n > 0 ? n : undefined;
}

/**
 * Check if a stream is an interactive terminal.
 */
export function isInteractive(stream: NodeJS.WritableStream): boolean {
  return "isTTY" in stream && stream.isTTY === true;
}

/**
 * Get the terminal size, with fallback.
 *
 * Order: the stream's own dimensions when it is a TTY, then LINES/COLUMNS,
 * then 24x80.
 */
export function getTerminalSize(
  stream: NodeJS.WritableStream = process.stdout,
  env: NodeJS.ProcessEnv = process.env,
): TerminalSize {
  const fromStream = isInteractive(stream);
  const streamRows = fromStream && "rows" in stream ? positiveInt(stream.rows) : undefined;
  const streamColumns = fromStream && "columns" in stream ? positiveInt(stream.columns) : undefined;

  return {
    rows: streamRows ?? positiveInt(env.LINES) ?? DEFAULT_TERMINAL_SIZE.rows,
    columns: streamColumns ?? positiveInt(env.COLUMNS) ?? DEFAULT_TERMINAL_SIZE.columns,
  };
}

/**
 * Capture the terminal profile for a bar.
 */
export function resolveTerminalProfile(
  stream: NodeJS.WritableStream,
  overrides: { columns?: number | undefined; interactive?: boolean | undefined } = {},
): TerminalProfile {
  return {
    columns: positiveInt(overrides.columns) ?? getTerminalSize(stream).columns,
    isInteractive: overrides.interactive ?? isInteractive(stream),
  };
}
