/**
 * Terminal progress bar.
 *
 * Owns the progress state and terminal profile, picks the ANSI renderer for
 * interactive terminals and the block renderer otherwise, and optionally
 * routes counts through a parallel aggregator.
 *
 * Lifecycle: constructed -> updating -> finished. Every method throws
 * UsedAfterFinishError once the bar has finished.
 *
 * @example
 * ```typescript
 * const bar = new ProgressBar(files.length, "Indexing %d files", [files.length]);
 * for (const [i, file] of files.entries()) {
 *   bar.update(i + 1);
 *   await indexFile(file);
 * }
 * bar.finish("Indexed %d files", [files.length]);
 * ```
 *
 * @module progress/progress-bar
 */

import { createLogger, outputLogHooks } from "../logging/logger.js";
import { ParallelAggregator } from "./aggregator.js";
import { AnsiRenderer } from "./ansi-renderer.js";
import { BlockRenderer } from "./block-renderer.js";
import { FileMarkerChannel, openChannel, SharedCounterChannel } from "./channel.js";
import { UsedAfterFinishError } from "./errors.js";
import { computeLayout, formatDuration } from "./formatting.js";
import { formatMessage, type MessageValue } from "./message.js";
import { resolveTerminalProfile } from "./terminal.js";
import type {
  FrameRenderer,
  OutputLogHooks,
  ParallelOptions,
  ProgressBarOptions,
  ProgressState,
  ProgressStatus,
  RedrawMemory,
  TerminalProfile,
  TrueColorOptions,
  WorkerHandle,
} from "./types.js";

const logger = createLogger("progress-bar");

const EMPTY_REDRAW: RedrawMemory = { lastFilledUnits: 0, lastPaddingUnits: 0 };

function normalizeTrueColor(option: ProgressBarOptions["trueColor"]): TrueColorOptions | false {
  if (!option) return false;
  return option === true ? {} : option;
}

function createRenderer(
  profile: TerminalProfile,
  trueColor: TrueColorOptions | false,
  redraw: RedrawMemory = EMPTY_REDRAW,
): FrameRenderer {
  return profile.isInteractive ? new AnsiRenderer(profile.columns, trueColor) : new BlockRenderer(profile.columns, redraw);
}

function interactiveOverride(renderer: ProgressBarOptions["renderer"]): boolean | undefined {
  if (renderer === "ansi") return true;
  if (renderer === "block") return false;
  return undefined;
}

function sanitizeTotal(total: number): number {
  return Number.isFinite(total) && total > 0 ? total : 0;
}

export class ProgressBar {
  private output: NodeJS.WritableStream;
  private profile: TerminalProfile;
  private trueColor: TrueColorOptions | false;
  private renderer: FrameRenderer;
  private hooks: OutputLogHooks;
  private progress: ProgressState;
  private lifecycle: ProgressStatus = "constructed";
  private aggregator: ParallelAggregator | undefined = undefined;
  private ownsChannel = false;

  constructor(total: number, message = "", values: readonly MessageValue[] = [], options: ProgressBarOptions = {}) {
    this.output = options.output ?? process.stderr;
    this.profile = resolveTerminalProfile(this.output, {
      columns: options.columns,
      interactive: interactiveOverride(options.renderer),
    });
    this.trueColor = normalizeTrueColor(options.trueColor);
    this.renderer = createRenderer(this.profile, this.trueColor);
    this.hooks = options.hooks ?? outputLogHooks;
    this.progress = {
      total: sanitizeTotal(total),
      current: 0,
      message: formatMessage(message, values),
      startedAt: Date.now(),
      isFirstUpdate: true,
    };

    if (options.initialRender ?? true) {
      this.draw(0, false);
    }
  }

  /**
   * Rebuild a bar inside a worker from the handle returned by enableParallel().
   *
   * The worker-side bar draws nothing on construction and continues from the
   * frame the owning bar last drew.
   */
  static attach(handle: WorkerHandle, rank: number, options: Pick<ProgressBarOptions, "output" | "hooks"> = {}): ProgressBar {
    const bar = new ProgressBar(handle.total, "", [], {
      ...options,
      columns: handle.profile.columns,
      renderer: handle.profile.isInteractive ? "ansi" : "block",
      trueColor: handle.trueColor,
      initialRender: false,
    });

    bar.progress.message = handle.message;
    bar.progress.isFirstUpdate = false;
    bar.renderer = createRenderer(bar.profile, bar.trueColor, handle.redraw);
    bar.aggregator = new ParallelAggregator(openChannel(handle.channel), rank);

    return bar;
  }

  /** Snapshot of the progress state */
  get state(): Readonly<ProgressState> {
    return { ...this.progress };
  }

  get status(): ProgressStatus {
    return this.lifecycle;
  }

  get terminal(): Readonly<TerminalProfile> {
    return { ...this.profile };
  }

  get isParallel(): boolean {
    return this.aggregator !== undefined;
  }

  get elapsedMs(): number {
    return Date.now() - this.progress.startedAt;
  }

  /**
   * Report progress.
   *
   * In count mode, `n` is the item now being processed; ratio mode (total 0 or 1)
   * takes a fraction in [0, 1]. Out-of-range values are clamped.
   *
   * @param message - New message template; omit to keep the current message
   * @param values - Substitution values for the template
   */
  update(n: number, message?: string, values: readonly MessageValue[] = []): void {
    this.assertActive("update");

    const text = message === undefined ? undefined : formatMessage(message, values);

    const resolved = this.aggregator ? this.aggregator.resolve(n) : n;
    if (resolved === undefined) {
      return;
    }

    if (text !== undefined) {
      this.progress.message = text;
    }

    this.draw(resolved, text !== undefined);
    this.lifecycle = "updating";
  }

  /**
   * Enable parallel aggregation.
   *
   * Allocates a fresh channel and returns the handle workers pass to
   * ProgressBar.attach(). Enabling again replaces the previous channel.
   */
  enableParallel(options: ParallelOptions = {}): WorkerHandle {
    this.assertActive("enableParallel");

    if (this.aggregator && this.ownsChannel) {
      this.aggregator.dispose();
    }

    const channel =
      options.channel === "shared" ? SharedCounterChannel.create(options.capacity) : FileMarkerChannel.create(options.tempDir);
    this.aggregator = new ParallelAggregator(channel, options.rank);
    this.ownsChannel = true;

    const handle: WorkerHandle = {
      total: this.progress.total,
      message: this.progress.message,
      profile: { ...this.profile },
      trueColor: this.trueColor,
      redraw: this.renderer instanceof BlockRenderer ? this.renderer.redrawMemory : { ...EMPTY_REDRAW },
      channel: channel.describe(),
    };

    logger.debug({ event: "parallel_enabled", channel: handle.channel.type, rank: options.rank });
    return handle;
  }

  /**
   * Erase the bar, optionally print a final message, and release the channel.
   */
  finish(message?: string, values: readonly MessageValue[] = []): void {
    this.assertActive("finish");

    const text = message === undefined ? undefined : formatMessage(message, values);

    if (text !== undefined) {
      this.progress.message = text;
    }

    if (!this.aggregator?.isSilent) {
      const summary = text === undefined ? "" : `${text}\n`;
      this.write(`${this.renderer.erase(this.isParallel)}${summary}`);
    }

    if (this.aggregator && this.ownsChannel) {
      this.aggregator.dispose();
    }
    this.lifecycle = "finished";

    logger.debug({
      event: "progress_finished",
      total: this.progress.total,
      current: this.progress.current,
      elapsed: formatDuration(this.elapsedMs),
    });
  }

  private draw(n: number, messageChanged: boolean): void {
    const first = this.progress.isFirstUpdate;

    this.progress.current = Number.isNaN(n) ? 0 : Math.max(0, n);

    const layout = computeLayout(this.progress, this.profile);
    const frame = this.renderer.render(layout, {
      first,
      messageChanged: messageChanged || first,
      parallel: this.isParallel,
    });

    this.write(frame);
    this.progress.isFirstUpdate = false;
  }

  private write(text: string): void {
    this.callHook("pauseOutputLog");
    try {
      this.output.write(text);
    } finally {
      this.callHook("resumeOutputLog");
    }
  }

  private callHook(name: keyof OutputLogHooks): void {
    const hook = this.hooks[name];
    if (!hook) return;

    try {
      hook();
    } catch (error) {
      logger.debug({ event: "output_log_hook_failed", hook: name, error: error instanceof Error ? error.message : String(error) });
    }
  }

  private assertActive(method: string): void {
    if (this.lifecycle === "finished") {
      throw new UsedAfterFinishError(method);
    }
  }
}
