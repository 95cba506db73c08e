import * as fc from 'fast-check';
import { describe, it, expect } from 'vitest';

import { channel, gradientRgba, solidRgba } from '@veilprint/test-utils';

import { seedFrom } from '../src/generator.js';
import { BufferNoiseInjector, clampByte } from '../src/injector.js';

const injector = new BufferNoiseInjector();

const rgbaBuffer = (maxPixels: number) =>
  fc
    .integer({ min: 1, max: maxPixels })
    .chain((pixels) => fc.uint8Array({ minLength: pixels * 4, maxLength: pixels * 4 }));

describe('clampByte', () => {
  it('rounds and clamps to [0, 255]', () => {
    expect(clampByte(-3)).toBe(0);
    expect(clampByte(12.5)).toBe(13);
    expect(clampByte(300)).toBe(255);
  });
});

describe('BufferNoiseInjector.injectPixelNoise', () => {
  it('is a no-op for non-positive noise levels', () => {
    const buffer = solidRgba(4, 4, [128, 128, 128, 255]);
    expect(injector.injectPixelNoise(buffer, buffer.length, 0, 1, 4)).toBe(false);
    expect(injector.injectPixelNoise(buffer, buffer.length, -0.5, 1, 4)).toBe(false);
    expect(Array.from(buffer)).toEqual(Array.from(solidRgba(4, 4, [128, 128, 128, 255])));
  });

  it('is a no-op for invalid widths and empty input', () => {
    const buffer = solidRgba(4, 4, [128, 128, 128, 255]);
    expect(injector.injectPixelNoise(buffer, buffer.length, 1, 1, 0)).toBe(false);
    expect(injector.injectPixelNoise(buffer, buffer.length, 1, 1, -4)).toBe(false);
    expect(injector.injectPixelNoise(buffer, buffer.length, 1, 1, 2.5)).toBe(false);
    expect(injector.injectPixelNoise(buffer, 3, 1, 1, 4)).toBe(false);
    expect(injector.injectPixelNoise(new Uint8ClampedArray(0), 0, 1, 1, 4)).toBe(false);
  });

  it('changes colour bytes of a flat image', () => {
    const buffer = solidRgba(32, 32, [128, 128, 128, 255]);
    expect(injector.injectPixelNoise(buffer, buffer.length, 1, seedFrom('frame-1'), 32)).toBe(true);
    expect(channel(buffer, 0).some((v) => v !== 128)).toBe(true);
  });

  it('produces fixed bytes for a known seed', () => {
    const pixel = new Uint8ClampedArray([100, 150, 200, 255]);
    expect(injector.injectPixelNoise(pixel, 4, 1, seedFrom('ctx-42'), 1)).toBe(true);
    expect(Array.from(pixel)).toEqual([103, 152, 199, 255]);

    const square = solidRgba(2, 2, [128, 128, 128, 255]);
    injector.injectPixelNoise(square, square.length, 1, seedFrom('ctx-42'), 2);
    expect(Array.from(square)).toEqual([
      131, 130, 127, 255, 131, 129, 128, 255, 130, 130, 126, 255, 131, 129, 127, 255,
    ]);
  });

  it('reports false when every delta rounds to zero', () => {
    const pixel = new Uint8ClampedArray([100, 150, 200, 255]);
    expect(injector.injectPixelNoise(pixel, 4, 0.1, seedFrom('ctx-42'), 1)).toBe(false);
    expect(Array.from(pixel)).toEqual([100, 150, 200, 255]);
  });

  it('reports false when clamping absorbs every delta', () => {
    const pixel = new Uint8ClampedArray([255, 255, 0, 255]);
    expect(injector.injectPixelNoise(pixel, 4, 1, seedFrom('ctx-42'), 1)).toBe(false);
    expect(Array.from(pixel)).toEqual([255, 255, 0, 255]);
  });

  it('never touches alpha', () => {
    fc.assert(
      fc.property(rgbaBuffer(64), fc.double({ min: 0, max: 1, noNaN: true }), fc.nat(), (data, level, seed) => {
        const before = channel(data, 3);
        injector.injectPixelNoise(data, data.length, level, seed, 8);
        expect(channel(data, 3)).toEqual(before);
      }),
    );
  });

  it('moves each colour byte by at most round(level * amplitude)', () => {
    fc.assert(
      fc.property(rgbaBuffer(64), fc.double({ min: 0, max: 1, noNaN: true }), fc.nat(), (data, level, seed) => {
        const before = Uint8Array.from(data);
        injector.injectPixelNoise(data, data.length, level, seed, 8);
        const bound = Math.round(level * 10);
        for (let i = 0; i < data.length; i++) {
          if (Math.abs(data[i] - before[i]) > bound) return false;
        }
        return true;
      }),
    );
  });

  it('is deterministic for the same inputs', () => {
    fc.assert(
      fc.property(rgbaBuffer(64), fc.double({ min: 0, max: 1, noNaN: true }), fc.nat(), (data, level, seed) => {
        const a = Uint8Array.from(data);
        const b = Uint8Array.from(data);
        injector.injectPixelNoise(a, a.length, level, seed, 8);
        injector.injectPixelNoise(b, b.length, level, seed, 8);
        expect(Array.from(a)).toEqual(Array.from(b));
      }),
    );
  });

  it('gives different output for different seeds', () => {
    const a = gradientRgba(32, 32);
    const b = gradientRgba(32, 32);
    injector.injectPixelNoise(a, a.length, 1, seedFrom('frame-1'), 32);
    injector.injectPixelNoise(b, b.length, 1, seedFrom('frame-2'), 32);
    expect(Array.from(a)).not.toEqual(Array.from(b));
  });

  it('leaves a trailing partial pixel untouched', () => {
    const buffer = new Uint8ClampedArray(4 * 20 + 3).fill(100);
    injector.injectPixelNoise(buffer, buffer.length, 1, 3, 5);
    expect(Array.from(buffer.subarray(80))).toEqual([100, 100, 100]);
  });

  it('only processes the first `length` bytes', () => {
    const full = solidRgba(16, 16, [90, 90, 90, 255]);
    const partial = solidRgba(16, 16, [90, 90, 90, 255]);
    const seed = seedFrom('frame-3');
    injector.injectPixelNoise(full, full.length, 1, seed, 16);
    injector.injectPixelNoise(partial, 16 * 4 * 4, 1, seed, 16);
    expect(Array.from(partial.subarray(0, 256))).toEqual(Array.from(full.subarray(0, 256)));
    expect(Array.from(partial.subarray(256))).toEqual(
      Array.from(solidRgba(16, 12, [90, 90, 90, 255])),
    );
  });

  it('clamps length to the real buffer size', () => {
    const a = solidRgba(4, 4, [10, 10, 10, 255]);
    const b = solidRgba(4, 4, [10, 10, 10, 255]);
    injector.injectPixelNoise(a, 10_000, 1, 11, 4);
    injector.injectPixelNoise(b, b.length, 1, 11, 4);
    expect(Array.from(a)).toEqual(Array.from(b));
  });

  it('depends on width through the pixel coordinates', () => {
    const a = gradientRgba(16, 16);
    const b = gradientRgba(16, 16);
    injector.injectPixelNoise(a, a.length, 1, 21, 16);
    injector.injectPixelNoise(b, b.length, 1, 21, 32);
    expect(Array.from(a)).not.toEqual(Array.from(b));
  });
});

describe('BufferNoiseInjector.injectScalarNoise', () => {
  it('offsets by the first LCG float scaled to the value', () => {
    const expected = 100 + (1103527590 / 2147483648 - 0.5) * 2 * 0.1 * 100;
    expect(injector.injectScalarNoise(100, 0.1, 1)).toBeCloseTo(expected, 10);
  });

  it('rounds integer parameters', () => {
    expect(injector.injectScalarNoise(100, 0.1, 1, 'int')).toBe(100);
  });

  it('uses the magnitude floor for small values', () => {
    const expected = (1103527590 / 2147483648 - 0.5) * 2 * 0.5;
    expect(injector.injectScalarNoise(0, 0.5, 1)).toBeCloseTo(expected, 10);
    const floored = new BufferNoiseInjector({ scalarMagnitudeFloor: 10 });
    expect(floored.injectScalarNoise(0, 0.5, 1)).toBeCloseTo(expected * 10, 10);
  });

  it('returns the value unchanged at level 0', () => {
    expect(injector.injectScalarNoise(42.5, 0, 1)).toBe(42.5);
  });

  it('stays within noiseLevel * max(1, |value|) of the input', () => {
    fc.assert(
      fc.property(
        fc.double({ min: -1e6, max: 1e6, noNaN: true }),
        fc.double({ min: 0, max: 1, noNaN: true }),
        fc.integer({ min: 0, max: 0xffffffff }),
        (value, level, seed) =>
          Math.abs(injector.injectScalarNoise(value, level, seed) - value) <=
          level * Math.max(1, Math.abs(value)) + 1e-9,
      ),
    );
  });
});

describe('BufferNoiseInjector.injectByteNoise', () => {
  it('perturbs bytes from the seeded stream', () => {
    const bytes = new Uint8Array([100, 0, 255]);
    expect(injector.injectByteNoise(bytes, 0.1, 1)).toBe(true);
    // first stream value from seed 1: (1103527590 / 2^31) * 2 - 1
    expect(bytes[0]).toBe(101);
  });

  it('clamps to the byte range', () => {
    fc.assert(
      fc.property(fc.uint8Array({ minLength: 1, maxLength: 256 }), fc.nat(), (bytes, seed) => {
        const before = Uint8Array.from(bytes);
        injector.injectByteNoise(bytes, 1, seed);
        for (let i = 0; i < bytes.length; i++) {
          if (bytes[i] < 0 || bytes[i] > 255) return false;
          if (Math.abs(bytes[i] - before[i]) > 255) return false;
        }
        return true;
      }),
    );
  });

  it('is a no-op for level 0 or empty input', () => {
    const bytes = new Uint8Array([1, 2, 3]);
    expect(injector.injectByteNoise(bytes, 0, 1)).toBe(false);
    expect(Array.from(bytes)).toEqual([1, 2, 3]);
    expect(injector.injectByteNoise(new Uint8Array(0), 0.5, 1)).toBe(false);
  });
});

describe('BufferNoiseInjector.injectSampleNoise', () => {
  it('adds level-scaled noise to samples', () => {
    const samples = new Float32Array([0.5]);
    injector.injectSampleNoise(samples, 0.01, 1);
    expect(samples[0]).toBeCloseTo(0.5 + ((1103527590 / 2147483648) * 2 - 1) * 0.01, 6);
  });

  it('keeps samples within [-1, 1]', () => {
    const samples = new Float64Array([1, -1, 0.999, -0.999]);
    injector.injectSampleNoise(samples, 0.5, 77);
    for (const s of samples) {
      expect(s).toBeGreaterThanOrEqual(-1);
      expect(s).toBeLessThanOrEqual(1);
    }
  });

  it('is a no-op at level 0', () => {
    const samples = new Float32Array([0.25, -0.25]);
    expect(injector.injectSampleNoise(samples, 0, 1)).toBe(false);
    expect(Array.from(samples)).toEqual([0.25, -0.25]);
  });
});
