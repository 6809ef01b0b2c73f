/**
 * Type definitions for the terminal progress bar.
 *
 * This module defines:
 * - Progress state owned by a bar
 * - The terminal profile captured once at construction
 * - The layout computed for each frame
 * - Renderer and output-log hook contracts
 * - Worker handles for parallel aggregation
 *
 * @module progress/types
 */

import type { ChannelDescriptor } from "./channel.js";

/**
 * Mutable progress data owned by one bar.
 */
export interface ProgressState {
  /** Total unit count; 0 or 1 selects ratio mode */
  total: number;

  /** Last reported value, never below 0 */
  current: number;

  /** Live message shown as the bar label */
  message: string;

  /** Construction time (ms since epoch) */
  startedAt: number;

  /** True until the first frame has been drawn */
  isFirstUpdate: boolean;
}

/**
 * Terminal characteristics, captured once and never refreshed.
 */
export interface TerminalProfile {
  columns: number;
  isInteractive: boolean;
}

/**
 * Terminal dimensions as reported by the size probe.
 */
export interface TerminalSize {
  rows: number;
  columns: number;
}

/**
 * Textual layout of one frame.
 */
export interface Layout {
  /** Message, truncated with an ellipsis when it does not fit */
  labelText: string;

  /** "[ xx.x% ]" in ratio mode, "<cur> / <total> [ xx.x% ]" in count mode */
  progressText: string;

  /** Percentage shown in the progress text */
  percentage: number;

  /** Bar fill ratio in [0, 1] */
  fillRatio: number;

  /** Spaces between label and progress text */
  gap: number;

  /** Label, gap, and progress text (or blanks of the same width when not interactive) */
  line: string;

  /** Split point between the filled and unfilled segments of `line` */
  splitIndex: number;

  /** Terminal width the layout was computed for */
  totalWidth: number;
}

/**
 * Per-frame rendering context passed by the bar.
 */
export interface FrameContext {
  /** First frame drawn by this bar */
  first: boolean;

  /** Message changed since the previous frame (always true on the first frame) */
  messageChanged: boolean;

  /** Bar is in parallel mode */
  parallel: boolean;
}

/**
 * Block renderer redraw memory: the variable region of the last frame.
 */
export interface RedrawMemory {
  lastFilledUnits: number;
  lastPaddingUnits: number;
}

/**
 * A frame renderer turns a layout into terminal output.
 *
 * Renderers return the text to write; the bar owns the output stream.
 */
export interface FrameRenderer {
  render(layout: Layout, frame: FrameContext): string;

  /** Text that erases whatever the last frame left on screen */
  erase(parallel: boolean): string;
}

/**
 * Optional suspend/resume pair around each terminal write batch.
 */
export interface OutputLogHooks {
  pauseOutputLog?: () => void;
  resumeOutputLog?: () => void;
}

/**
 * Renderer selection.
 */
export type RendererKind = "auto" | "ansi" | "block";

/**
 * 24-bit gradient settings for the ANSI renderer.
 */
export interface TrueColorOptions {
  /** Hue in [0, 1] (default: 0.5) */
  hue?: number | undefined;

  /** Saturation in [0, 1] (default: 0.6) */
  saturation?: number | undefined;
}

/**
 * Options for a progress bar.
 */
export interface ProgressBarOptions {
  /** Output stream (default: process.stderr) */
  output?: NodeJS.WritableStream;

  /** Renderer selection (default: "auto", decided by whether output is a TTY) */
  renderer?: RendererKind;

  /** Override the probed terminal width */
  columns?: number;

  /** Render the filled segment with a 24-bit gradient (default: false) */
  trueColor?: boolean | TrueColorOptions;

  /** Output-log hooks invoked around each write batch */
  hooks?: OutputLogHooks;

  /** Draw the initial frame on construction (default: true) */
  initialRender?: boolean;
}

/**
 * Options for enabling parallel mode.
 */
export interface ParallelOptions {
  /** Channel implementation (default: "file") */
  channel?: "file" | "shared";

  /** Directory for marker files (default: os.tmpdir()) */
  tempDir?: string;

  /** Number of rank slots for a shared channel (default: os.availableParallelism()) */
  capacity?: number;

  /** Bind the owning bar to a worker rank as well */
  rank?: number;
}

/**
 * Everything a worker needs to rebuild the bar on its side.
 * Structured-clone safe; JSON safe for file channels.
 */
export interface WorkerHandle {
  total: number;
  message: string;
  profile: TerminalProfile;
  trueColor: TrueColorOptions | false;
  redraw: RedrawMemory;
  channel: ChannelDescriptor;
}

/**
 * Lifecycle status of a bar.
 */
export type ProgressStatus = "constructed" | "updating" | "finished";
