import { describe, expect, test } from "vitest";
import { BlockRenderer, measureBlockBar } from "./block-renderer.js";
import { computeLayout } from "./formatting.js";
import type { FrameContext } from "./types.js";

const COLUMNS = 40;

function layoutAt(current: number, message = "Work", columns = COLUMNS) {
  return computeLayout({ total: 100, current, message }, { columns, isInteractive: false });
}

const first: FrameContext = { first: true, messageChanged: true, parallel: false };
const next: FrameContext = { first: false, messageChanged: false, parallel: false };
const renamed: FrameContext = { first: false, messageChanged: true, parallel: false };

const bs = (n: number) => "\b".repeat(n);
const sp = (n: number) => " ".repeat(n);

describe("measureBlockBar", () => {
  test("fills the span left of the progress text", () => {
    expect(measureBlockBar(layoutAt(51))).toEqual({ filled: 8, fractional: " ", padding: 28 });
  });

  test("uses an eighth glyph for the remainder", () => {
    expect(measureBlockBar(layoutAt(42))).toEqual({ filled: 6, fractional: "▌", padding: 30 });
  });

  test("a complete bar fills the whole span", () => {
    expect(measureBlockBar(layoutAt(1e9))).toEqual({ filled: 14, fractional: " ", padding: 22 });
  });

  test("narrow terminals get no blocks", () => {
    expect(measureBlockBar(layoutAt(51, "Work", 10))).toEqual({ filled: 0, fractional: " ", padding: 6 });
  });
});

describe("BlockRenderer", () => {
  test("first frame prints the label line and an empty bar", () => {
    const renderer = new BlockRenderer(COLUMNS);
    const out = renderer.render(layoutAt(0), first);

    expect(out).toBe(`Work${sp(34)}\n ${sp(18)}00 / 100 [  0.0% ]`);
    expect(renderer.redrawMemory).toEqual({ lastFilledUnits: 0, lastPaddingUnits: 36 });
  });

  test("same-message frames redraw only what changed", () => {
    const renderer = new BlockRenderer(COLUMNS);
    renderer.render(layoutAt(0), first);

    expect(renderer.render(layoutAt(26), next)).toBe(`${bs(37)}████ ${sp(14)}26 / 100 [ 25.0% ]`);
    expect(renderer.render(layoutAt(39), next)).toBe(`${bs(33)}██ ${sp(12)}39 / 100 [ 38.0% ]`);
    expect(renderer.render(layoutAt(42), next)).toBe(`${bs(31)}▌${sp(12)}42 / 100 [ 41.0% ]`);
    expect(renderer.redrawMemory).toEqual({ lastFilledUnits: 6, lastPaddingUnits: 30 });
  });

  test("a shrinking bar backspaces over the lost blocks", () => {
    const renderer = new BlockRenderer(COLUMNS);
    renderer.render(layoutAt(0), first);
    renderer.render(layoutAt(42), next);

    expect(renderer.render(layoutAt(26), next)).toBe(`${bs(33)} ${sp(14)}26 / 100 [ 25.0% ]`);
    expect(renderer.redrawMemory).toEqual({ lastFilledUnits: 4, lastPaddingUnits: 32 });
  });

  test("repeating a frame leaves the memory unchanged", () => {
    const renderer = new BlockRenderer(COLUMNS);
    renderer.render(layoutAt(0), first);
    renderer.render(layoutAt(26), next);
    const before = renderer.redrawMemory;

    expect(renderer.render(layoutAt(26), next)).toBe(`${bs(33)} ${sp(14)}26 / 100 [ 25.0% ]`);
    expect(renderer.redrawMemory).toEqual(before);
  });

  test("a new message erases the whole frame and redraws every block", () => {
    const renderer = new BlockRenderer(COLUMNS);
    renderer.render(layoutAt(0), first);
    renderer.render(layoutAt(42), next);

    const out = renderer.render(layoutAt(51, "Next"), renamed);
    expect(out).toBe(`${bs(76)}Next${sp(34)}\n████████ ${sp(10)}51 / 100 [ 50.0% ]`);
  });

  test("bar lines always span columns - 3", () => {
    const renderer = new BlockRenderer(COLUMNS);
    for (const current of [0, 13, 42, 77, 99]) {
      const bar = measureBlockBar(layoutAt(current));
      expect(bar.filled + bar.fractional.length + bar.padding).toBe(COLUMNS - 3);
      renderer.render(layoutAt(current), current === 0 ? first : next);
    }
  });

  test("erase removes the last frame including its label line", () => {
    const renderer = new BlockRenderer(COLUMNS);
    renderer.render(layoutAt(0), first);
    expect(renderer.erase(false)).toBe(bs(76));

    renderer.render(layoutAt(51), next);
    expect(renderer.erase(false)).toBe(bs(28 + 8 + 1 + 39));
  });

  test("continues from inherited redraw memory", () => {
    const renderer = new BlockRenderer(COLUMNS, { lastFilledUnits: 4, lastPaddingUnits: 32 });
    expect(renderer.render(layoutAt(39), next)).toBe(`${bs(33)}██ ${sp(12)}39 / 100 [ 38.0% ]`);
  });

  test("redraw memory is a copy", () => {
    const memory = { lastFilledUnits: 2, lastPaddingUnits: 34 };
    const renderer = new BlockRenderer(COLUMNS, memory);
    memory.lastFilledUnits = 9;
    expect(renderer.redrawMemory.lastFilledUnits).toBe(2);
  });
});
