/** RGBA byte-buffer fixtures. */

export type Rgba = readonly [number, number, number, number];

/** A `width`×`height` RGBA buffer filled with one color. */
export function solidRgba(width: number, height: number, color: Rgba): Uint8ClampedArray {
  const buffer = new Uint8ClampedArray(width * height * 4);
  for (let i = 0; i < buffer.length; i += 4) {
    buffer.set(color, i);
  }
  return buffer;
}

/**
 * A horizontal gradient: red rises with x, green with y, blue is fixed at
 * 128 and alpha at 255.
 */
export function gradientRgba(width: number, height: number): Uint8ClampedArray {
  const buffer = new Uint8ClampedArray(width * height * 4);
  for (let y = 0; y < height; y++) {
    for (let x = 0; x < width; x++) {
      const i = (y * width + x) * 4;
      buffer[i] = Math.round((x / Math.max(1, width - 1)) * 255);
      buffer[i + 1] = Math.round((y / Math.max(1, height - 1)) * 255);
      buffer[i + 2] = 128;
      buffer[i + 3] = 255;
    }
  }
  return buffer;
}

/** Values of every 4th byte starting at `channel` (0 = R … 3 = A). */
export function channel(buffer: ArrayLike<number>, index: 0 | 1 | 2 | 3): number[] {
  const values: number[] = [];
  for (let i = index; i + 3 - index < buffer.length; i += 4) {
    values.push(buffer[i]);
  }
  return values;
}
