/**
 * In-place single-line renderer for interactive terminals.
 *
 * The whole line is redrawn every frame: the filled segment on a highlight
 * background, the rest on the default background. In parallel mode the
 * reporter moves the cursor up one line instead of returning to column 0,
 * since each of its frames ends with a newline.
 *
 * @module progress/ansi-renderer
 */

import { ansi, splitLine } from "./formatting.js";
import { getGradient, type Rgb } from "./gradient.js";
import type { FrameContext, FrameRenderer, Layout, TrueColorOptions } from "./types.js";

export class AnsiRenderer implements FrameRenderer {
  private columns: number;
  private gradient: readonly Rgb[] | undefined;

  constructor(columns: number, trueColor: TrueColorOptions | false = false) {
    this.columns = columns;
    this.gradient = trueColor ? getGradient(columns, trueColor.hue, trueColor.saturation) : undefined;
  }

  get trueColor(): boolean {
    return this.gradient !== undefined;
  }

  render(layout: Layout, frame: FrameContext): string {
    const { filled, unfilled } = splitLine(layout);
    const rest = `${ansi.barUnfilled}${unfilled}${ansi.reset}`;

    if (frame.parallel) {
      return `${ansi.cursorUp(1)}${ansi.barFilled} ${this.paintFilled(filled)}${rest} \n`;
    }

    // Leading space keeps the backspace from eating what the caller printed before us
    const lead = frame.first ? " " : "";
    if (this.gradient) {
      return `${lead}${ansi.backspace}${ansi.carriageReturn}${this.paintFilled(filled)}${rest} `;
    }
    return `${lead}${ansi.backspace}${ansi.carriageReturn}${ansi.barFilled} ${this.paintFilled(filled)}${rest} `;
  }

  erase(parallel: boolean): string {
    const blank = " ".repeat(Math.max(0, this.columns - 1));
    if (parallel) {
      return `${ansi.cursorUp(1)}${blank}${ansi.reset}${ansi.carriageReturn}`;
    }
    return `${ansi.backspace}${ansi.carriageReturn}${blank}${ansi.reset}${ansi.carriageReturn}`;
  }

  /**
   * Wrap each filled character in its own gradient background.
   */
  private paintFilled(filled: string): string {
    const gradient = this.gradient;
    if (!gradient) return filled;

    let out = "";
    for (let i = 0; i < filled.length; i++) {
      const color = gradient[i] ?? gradient[gradient.length - 1];
      const ch = filled.charAt(i);
      out += color ? `${ansi.bgRgb(color[0], color[1], color[2])}${ch}` : ch;
    }
    return out;
  }
}
