/**
 * Horizontal 24-bit color gradient for the true-color bar.
 *
 * One sample per column: a fixed hue and saturation with a sine-wave
 * brightness ramp between 0.65 and 0.95.
 *
 * @module progress/gradient
 */

export type Rgb = readonly [r: number, g: number, b: number];

/**
 * Convert HSV in [0, 1] to RGB in [0, 1].
 */
export function hsvToRgb(h: number, s: number, v: number): [number, number, number] {
  const sector = (((h % 1) + 1) % 1) * 6;
  const i = Math.floor(sector);
  const f = sector - i;
  const p = v * (1 - s);
  const q = v * (1 - s * f);
  const t = v * (1 - s * (1 - f));

  switch (i) {
    case 0:
      return [v, t, p];
    case 1:
      return [q, v, p];
    case 2:
      return [p, v, t];
    case 3:
      return [p, q, v];
    case 4:
      return [t, p, v];
    default:
      return [v, p, q];
  }
}

const RAMP_DEPTH = 0.3;
const RAMP_CEILING = 0.95;
const RAMP_PERIOD = 8;

/**
 * Build the gradient for a terminal width.
 */
export function buildGradient(columns: number, hue = 0.5, saturation = 0.6): Rgb[] {
  const samples: Rgb[] = [];
  for (let col = 1; col <= columns; col++) {
    const wave = 0.5 * (1 + Math.sin(col / RAMP_PERIOD));
    const brightness = wave * RAMP_DEPTH + RAMP_CEILING - RAMP_DEPTH;
    const [r, g, b] = hsvToRgb(hue, saturation, brightness);
    samples.push([Math.round(256 * r), Math.round(256 * g), Math.round(256 * b)]);
  }
  return samples;
}

const cache = new Map<string, Rgb[]>();

/**
 * Gradient for a width and hue/saturation pair, computed once per key.
 */
export function getGradient(columns: number, hue = 0.5, saturation = 0.6): readonly Rgb[] {
  const key = `${columns}:${hue}:${saturation}`;
  let samples = cache.get(key);
  if (!samples) {
    samples = buildGradient(columns, hue, saturation);
    cache.set(key, samples);
  }
  return samples;
}
