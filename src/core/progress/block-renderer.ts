/**
 * Block-character renderer for non-interactive output.
 *
 * Frames are a label line followed by a bar line of full blocks, one
 * fractional glyph in eighths, and padding that ends in the progress text.
 * The cursor rests at the end of the bar line; the next frame backspaces
 * over only what changed:
 * - same message: the fractional glyph, the padding, and any blocks lost
 * - new message: the whole previous frame, label line included
 *
 * @module progress/block-renderer
 */

import { ansi, fractionalBlock, fullBlock } from "./formatting.js";
import type { FrameContext, FrameRenderer, Layout, RedrawMemory } from "./types.js";

/**
 * Bar geometry for one frame.
 */
export interface BlockBar {
  /** Whole block units */
  filled: number;

  /** Fractional glyph following the whole units */
  fractional: string;

  /** Width of the padding region (progress text included) */
  padding: number;
}

/**
 * Compute the bar geometry for a layout.
 */
export function measureBlockBar(layout: Layout): BlockBar {
  const usableWidth = layout.totalWidth - 4;
  const span = Math.max(0, usableWidth - layout.progressText.length - 2);
  const ideal = layout.fillRatio * span;
  const filled = Math.floor(ideal);

  return {
    filled,
    fractional: fractionalBlock(ideal - filled),
    padding: Math.max(0, usableWidth - filled),
  };
}

function padProgress(progressText: string, width: number): string {
  if (width <= 0) return "";
  return `${" ".repeat(width)}${progressText}`.slice(-width);
}

export class BlockRenderer implements FrameRenderer {
  private columns: number;
  private memory: RedrawMemory;

  constructor(columns: number, memory: RedrawMemory = { lastFilledUnits: 0, lastPaddingUnits: 0 }) {
    this.columns = columns;
    this.memory = { ...memory };
  }

  get redrawMemory(): RedrawMemory {
    return { ...this.memory };
  }

  render(layout: Layout, frame: FrameContext): string {
    const bar = measureBlockBar(layout);
    const { lastFilledUnits, lastPaddingUnits } = this.memory;

    let out = "";
    let kept = 0;

    if (!frame.first) {
      if (frame.messageChanged) {
        out += this.eraseFrame();
      } else {
        kept = Math.min(bar.filled, lastFilledUnits);
        out += ansi.backspace.repeat(lastFilledUnits - kept + lastPaddingUnits + 1);
      }
    }

    if (frame.first || frame.messageChanged) {
      out += `${layout.line}\n`;
    }

    out += fullBlock.repeat(bar.filled - kept);
    out += bar.fractional;
    out += padProgress(layout.progressText, bar.padding);

    this.memory = { lastFilledUnits: bar.filled, lastPaddingUnits: bar.padding };
    return out;
  }

  erase(_parallel: boolean): string {
    return this.eraseFrame();
  }

  private eraseFrame(): string {
    const { lastFilledUnits, lastPaddingUnits } = this.memory;
    return ansi.backspace.repeat(lastPaddingUnits + lastFilledUnits + 1 + this.columns - 1);
  }
}
