/**
 * Terminal progress bar module.
 *
 * This module provides a single-line progress indicator with support for:
 * - Count mode ("3 / 10 [ 20.0% ]") and ratio mode ("[ 50.0% ]")
 * - ANSI color-sweep rendering for interactive terminals
 * - Block-character rendering with differential redraw for logs and pipes
 * - Aggregating progress from parallel workers through a shared channel
 *
 * @example
 * ```typescript
 * import { ProgressBar } from "./progress/index.js";
 *
 * const bar = new ProgressBar(100, "Processing %s", ["batch-1"]);
 * for (let i = 1; i <= 100; i++) {
 *   bar.update(i);
 * }
 * bar.finish();
 * ```
 *
 * @module progress
 */

// Aggregation
export { ParallelAggregator, REPORTER_RANK } from "./aggregator.js";
// Renderers
export { AnsiRenderer } from "./ansi-renderer.js";
export type { BlockBar } from "./block-renderer.js";
export { BlockRenderer, measureBlockBar } from "./block-renderer.js";
export type { ChannelDescriptor, ProgressChannel } from "./channel.js";
export { FileMarkerChannel, openChannel, SharedCounterChannel } from "./channel.js";
// Errors
export type { ProgressErrorCode } from "./errors.js";
export { InvalidRankError, MessageFormatError, ProgressBarError, UsedAfterFinishError } from "./errors.js";
// Formatting utilities
export {
  ansi,
  blockGlyphs,
  computeLayout,
  countWidth,
  formatDuration,
  formatPercent,
  fractionalBlock,
  fullBlock,
  isRatioMode,
  splitLine,
  stripAnsi,
  truncate,
} from "./formatting.js";
export type { Rgb } from "./gradient.js";
export { buildGradient, getGradient, hsvToRgb } from "./gradient.js";
// Messages
export type { MessageValue } from "./message.js";
export { countPlaceholders, formatMessage } from "./message.js";
// Bar
export { ProgressBar } from "./progress-bar.js";
// Terminal
export { DEFAULT_TERMINAL_SIZE, getTerminalSize, isInteractive, resolveTerminalProfile } from "./terminal.js";
// Types
export type {
  FrameContext,
  FrameRenderer,
  Layout,
  OutputLogHooks,
  ParallelOptions,
  ProgressBarOptions,
  ProgressState,
  ProgressStatus,
  RedrawMemory,
  RendererKind,
  TerminalProfile,
  TerminalSize,
  TrueColorOptions,
  WorkerHandle,
} from "./types.js";
