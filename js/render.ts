import type { FigureImage } from "./figure-data";
import { formatNumber } from "./format";

/** Find min/max range of a Float32Array, filtering out NaN and Infinity. */
export function findDataRange(data: Float32Array): { min: number; max: number } {
  let min = Infinity, max = -Infinity;
  for (let i = 0; i < data.length; i++) {
    const v = data[i];
    if (!isFinite(v)) continue;
    if (v < min) min = v;
    if (v > max) max = v;
  }
  if (min === Infinity) return { min: 0, max: 0 };
  return { min, max };
}

/**
 * RGBA bytes for drawing an image. Colour images hold fractions in [0, 1];
 * greyscale images are stretched over their finite data range.
 */
export function imageToRgba(image: FigureImage): Uint8ClampedArray {
  const n = image.width * image.height;
  const out = new Uint8ClampedArray(n * 4);

  if (image.channels === 3) {
    for (let i = 0; i < n; i++) {
      for (let c = 0; c < 3; c++) {
        const v = image.data[i * 3 + c];
        out[i * 4 + c] = isFinite(v) ? Math.round(Math.min(Math.max(v, 0), 1) * 255) : 0;
      }
      out[i * 4 + 3] = 255;
    }
    return out;
  }

  const { min, max } = findDataRange(image.data);
  const range = max - min;
  for (let i = 0; i < n; i++) {
    const v = image.data[i];
    const g = range > 0 && isFinite(v) ? Math.round(((v - min) / range) * 255) : 0;
    out[i * 4] = g;
    out[i * 4 + 1] = g;
    out[i * 4 + 2] = g;
    out[i * 4 + 3] = 255;
  }
  return out;
}

/** Values at pixel (x, y), or null outside the image. */
export function pixelAt(image: FigureImage, x: number, y: number): number[] | null {
  const col = Math.floor(x), row = Math.floor(y);
  if (col < 0 || row < 0 || col >= image.width || row >= image.height) return null;
  const start = (row * image.width + col) * image.channels;
  return Array.from(image.data.subarray(start, start + image.channels));
}

export function formatPixel(x: number, y: number, values: number[]): string {
  const shown = values.length === 1 ? formatNumber(values[0]) : `[${values.map((v) => formatNumber(v)).join(", ")}]`;
  return `(${Math.floor(x)}, ${Math.floor(y)}) = ${shown}`;
}
