/**
 * Layout and terminal formatting utilities for the progress bar.
 *
 * This module provides:
 * - ANSI escape codes for the color-sweep bar and cursor control
 * - Block glyphs for sub-character bar resolution
 * - Frame layout (label, progress text, gap, split point)
 * - Duration formatting and ANSI stripping
 *
 * @module progress/formatting
 */

import type { Layout, ProgressState, TerminalProfile } from "./types.js";

/**
 * ANSI escape codes and control characters used by the renderers.
 */
export const ansi = {
  cursorUp: (n = 1) => `\x1b[${n}A`,
  backspace: "\b",
  carriageReturn: "\r",

  reset: "\x1b[0m",

  // Bold white on blue: the filled segment
  barFilled: "\x1b[1;44;37m",
  // Default background, white foreground: the unfilled segment
  barUnfilled: "\x1b[49;37m",

  bgRgb: (r: number, g: number, b: number) => `\x1b[48;2;${r};${g};${b}m`,
} as const;

/**
 * Left-aligned block glyphs in eighths, empty through full.
 */
export const blockGlyphs = [" ", "▏", "▎", "▍", "▌", "▋", "▊", "▉", "█"] as const;

/**
 * The full block used for whole bar units.
 */
export const fullBlock = blockGlyphs[8];

/**
 * Pick the glyph for the fractional bar unit.
 *
 * @param fraction - Fractional part of the ideal fill, in [0, 1)
 *
 * @example
 * ```typescript
 * fractionalBlock(0.1); // " "
 * fractionalBlock(0.5); // "▌"
 * ```
 */
export function fractionalBlock(fraction: number): string {
  if (!(fraction >= 0.125)) return blockGlyphs[0];
  const index = Math.min(blockGlyphs.length - 1, Math.floor(fraction / 0.125));
  return blockGlyphs[index] ?? blockGlyphs[0];
}

function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, value));
}

/**
 * Totals of 0 and 1 show a bare percentage instead of a count.
 */
export function isRatioMode(total: number): boolean {
  return total <= 1;
}

/**
 * Digit width used for both numbers of the count.
 */
export function countWidth(total: number): number {
  return total > 0 ? Math.max(1, Math.ceil(Math.log10(total))) : 1;
}

function formatCount(n: number, width: number): string {
  return String(Math.round(n)).padStart(width, "0");
}

/**
 * Format a percentage with one decimal, right-aligned to the width of "99.9".
 */
export function formatPercent(percentage: number): string {
  return percentage.toFixed(1).padStart(4, " ");
}

/**
 * Truncate a string to fit within a width, adding ellipsis if needed.
 *
 * @param str - String to truncate
 * @param maxWidth - Maximum width
 * @param ellipsis - Ellipsis characters to use
 * @returns Truncated string
 */
export function truncate(str: string, maxWidth: number, ellipsis = "..."): string {
  if (str.length <= maxWidth) return str;
  if (maxWidth <= ellipsis.length) return ellipsis.slice(0, Math.max(0, maxWidth));
  return str.slice(0, maxWidth - ellipsis.length) + ellipsis;
}

/**
 * Compute the layout of one frame.
 *
 * In count mode the ratio is `(current - 1) / total`: `update(i)` announces that
 * item `i` is being processed, so the bar shows the progress made before it.
 *
 * @example
 * ```typescript
 * computeLayout({ total: 1, current: 0.5, message: "Loading" }, { columns: 40, isInteractive: true })
 *   .progressText; // "[ 50.0% ]"
 * computeLayout({ total: 10, current: 3, message: "Loading" }, { columns: 40, isInteractive: true })
 *   .progressText; // "3 / 10 [ 20.0% ]"
 * ```
 */
export function computeLayout(
  state: Pick<ProgressState, "total" | "current" | "message">,
  profile: TerminalProfile,
): Layout {
  const { columns } = profile;
  const current = Number.isNaN(state.current) ? 0 : Math.max(0, state.current);

  let ratio: number;
  let percentage: number;
  let progressText: string;

  if (isRatioMode(state.total)) {
    ratio = clamp(current, 0, 1);
    percentage = ratio * 100;
    progressText = `[ ${formatPercent(percentage)}% ]`;
  } else {
    ratio = (current - 1) / state.total;
    percentage = clamp(ratio * 100, 0, 100);
    const width = countWidth(state.total);
    const shown = Math.min(current, state.total);
    progressText = `${formatCount(shown, width)} / ${formatCount(state.total, width)} [ ${formatPercent(percentage)}% ]`;
  }

  // Clamped again after the percentage; count mode can leave [0, 1] above
  ratio = clamp(ratio, 0, 1);

  const progressLength = progressText.length;
  const labelText = truncate(state.message, columns - progressLength - 3);
  const gap = Math.max(0, columns - 1 - (labelText.length + 1) - progressLength);
  const tail = profile.isInteractive ? progressText : " ".repeat(progressLength);
  const line = `${labelText}${" ".repeat(gap)}${tail}`;

  return {
    labelText,
    progressText,
    percentage,
    fillRatio: ratio,
    gap,
    line,
    splitIndex: Math.min(columns, Math.ceil(ratio * columns)),
    totalWidth: columns,
  };
}

/**
 * Split a layout's line into the filled and unfilled segments.
 */
export function splitLine(layout: Layout): { filled: string; unfilled: string } {
  return {
    filled: layout.line.slice(0, layout.splitIndex),
    unfilled: layout.line.slice(layout.splitIndex),
  };
}

/**
 * Format a duration in milliseconds to a human-readable string.
 *
 * @example
 * ```typescript
 * formatDuration(500); // "500ms"
 * formatDuration(2500); // "2.5s"
 * formatDuration(90000); // "1m 30s"
 * ```
 */
export function formatDuration(ms: number): string {
  if (ms < 0) return "0ms";

  if (ms < 1000) {
    return `${Math.round(ms)}ms`;
  }

  if (ms < 60000) {
    return `${(ms / 1000).toFixed(1)}s`;
  }

  const minutes = Math.floor(ms / 60000);
  const seconds = Math.round((ms % 60000) / 1000);

  if (minutes < 60) {
    return `${minutes}m ${seconds}s`;
  }

  const hours = Math.floor(minutes / 60);
  const remainingMinutes = minutes % 60;
  return `${hours}h ${remainingMinutes}m`;
}

/**
 * Strip ANSI escape codes from a string.
 */
export function stripAnsi(str: string): string {
  // biome-ignore lint/suspicious/noControlCharactersInRegex: Intentional - stripping ANSI codes
  return str.replace(/\x1b\[[0-9;]*[mA]/g, "");
}
