import { NoiseStream, nextFloat01, smoothNoise2D, type NoiseSeed } from './generator.js';

/** Byte buffers the injector writes into. Plain `Uint8Array` writes wrap, so values are clamped first. */
export type ByteBuffer = Uint8Array | Uint8ClampedArray;

export type ScalarKind = 'float' | 'int';

export interface InjectorOptions {
  /** Pixel-to-noise-space scale. Default: 0.1 */
  coordinateScale?: number;
  /** Pixel delta at noise level 1 and full noise amplitude. Default: 10 */
  amplitude?: number;
  /** Lower bound on the magnitude scalar noise is proportional to. Default: 1 */
  scalarMagnitudeFloor?: number;
}

const DEFAULT_COORDINATE_SCALE = 0.1;
const DEFAULT_AMPLITUDE = 10;
const DEFAULT_SCALAR_MAGNITUDE_FLOOR = 1;

export function clampByte(value: number): number {
  return Math.max(0, Math.min(255, Math.round(value)));
}

/**
 * Per-channel fractional offsets into the noise field. Perlin noise is zero
 * on the integer lattice, so without an offset every tenth pixel column and
 * row would pass through unchanged.
 */
function channelOffsets(seed: NoiseSeed): Array<readonly [number, number]> {
  const stream = new NoiseStream(seed);
  const offsets: Array<readonly [number, number]> = [];
  for (let channel = 0; channel < 3; channel++) {
    offsets.push([0.05 + stream.nextFloat() * 0.9, 0.05 + stream.nextFloat() * 0.9]);
  }
  return offsets;
}

/**
 * Applies seeded noise to rendering buffers and numeric values in place.
 *
 * Every method is a pure function of its arguments: the same buffer,
 * level, seed and width always produce the same output bytes.
 */
export class BufferNoiseInjector {
  private readonly coordinateScale: number;
  private readonly amplitude: number;
  private readonly scalarMagnitudeFloor: number;

  constructor(options: InjectorOptions = {}) {
    this.coordinateScale = options.coordinateScale ?? DEFAULT_COORDINATE_SCALE;
    this.amplitude = options.amplitude ?? DEFAULT_AMPLITUDE;
    this.scalarMagnitudeFloor = options.scalarMagnitudeFloor ?? DEFAULT_SCALAR_MAGNITUDE_FLOOR;
  }

  /**
   * Perturb the R, G and B bytes of an RGBA buffer with spatially smooth
   * noise. Alpha bytes and a trailing partial pixel are never written.
   *
   * @param length - Number of bytes to process; clamped to the buffer length.
   * @param width - Row width in pixels, used to map byte offsets to (x, y).
   * @returns Whether any byte changed value.
   */
  injectPixelNoise(
    buffer: ByteBuffer,
    length: number,
    noiseLevel: number,
    seed: NoiseSeed,
    width: number,
  ): boolean {
    if (!(noiseLevel > 0) || !Number.isInteger(width) || width <= 0) return false;
    const usable = Math.min(Number.isFinite(length) ? Math.max(0, Math.floor(length)) : 0, buffer.length);
    const pixels = Math.floor(usable / 4);
    if (pixels === 0) return false;

    const offsets = channelOffsets(seed);
    const scale = this.coordinateScale;
    const strength = noiseLevel * this.amplitude;
    let changed = false;

    for (let p = 0; p < pixels; p++) {
      const x = p % width;
      const y = Math.floor(p / width);
      const base = p * 4;
      for (let c = 0; c < 3; c++) {
        const [ox, oy] = offsets[c];
        const n = smoothNoise2D(seed, x * scale + ox, y * scale + oy);
        const delta = Math.round(n * strength);
        if (delta === 0) continue;
        const next = clampByte(buffer[base + c] + delta);
        if (next !== buffer[base + c]) {
          buffer[base + c] = next;
          changed = true;
        }
      }
    }
    return changed;
  }

  /**
   * `value + (u - 0.5) * 2 * noiseLevel * max(floor, |value|)` where `u` is
   * the first LCG float for `seed`. `"int"` rounds the result.
   */
  injectScalarNoise(value: number, noiseLevel: number, seed: NoiseSeed, kind: ScalarKind = 'float'): number {
    if (!(noiseLevel > 0) || !Number.isFinite(value)) return value;
    const [u] = nextFloat01(seed);
    const magnitude = Math.max(this.scalarMagnitudeFloor, Math.abs(value));
    const noisy = value + (u - 0.5) * 2 * noiseLevel * magnitude;
    return kind === 'int' ? Math.round(noisy) : noisy;
  }

  /**
   * Perturb every byte of a raw data buffer (vertex/texture uploads) by up
   * to `noiseLevel * 255`, clamped to [0, 255].
   */
  injectByteNoise(bytes: ByteBuffer, noiseLevel: number, seed: NoiseSeed): boolean {
    if (!(noiseLevel > 0) || bytes.length === 0) return false;
    const stream = new NoiseStream(seed);
    const range = noiseLevel * 255;
    for (let i = 0; i < bytes.length; i++) {
      bytes[i] = clampByte(bytes[i] + stream.nextSigned() * range);
    }
    return true;
  }

  /**
   * Add `noiseLevel`-scaled uniform noise to audio samples, clamped to the
   * [-1, 1] sample range.
   */
  injectSampleNoise(samples: Float32Array | Float64Array, noiseLevel: number, seed: NoiseSeed): boolean {
    if (!(noiseLevel > 0) || samples.length === 0) return false;
    const stream = new NoiseStream(seed);
    for (let i = 0; i < samples.length; i++) {
      samples[i] = Math.max(-1, Math.min(1, samples[i] + stream.nextSigned() * noiseLevel));
    }
    return true;
  }
}
