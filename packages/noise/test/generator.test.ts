import { createHash } from 'node:crypto';

import * as fc from 'fast-check';
import { describe, it, expect } from 'vitest';

import {
  NoiseStream,
  createNoiseStream,
  nextFloat01,
  nextUint32,
  seedFrom,
  smoothNoise2D,
} from '../src/generator.js';

describe('seedFrom', () => {
  it('takes the first four digest bytes little-endian', () => {
    const expected = createHash('sha256').update('ctx-42').digest().readUInt32LE(0);
    expect(seedFrom('ctx-42')).toBe(expected);
  });

  it('is stable across calls', () => {
    expect(seedFrom('frame-1')).toBe(seedFrom('frame-1'));
  });

  it('separates contexts and extra bytes', () => {
    expect(seedFrom('frame-1')).not.toBe(seedFrom('frame-2'));
    expect(seedFrom('frame-1', 'audio')).not.toBe(seedFrom('frame-1'));
    expect(seedFrom('frame-1', 'audio')).not.toBe(seedFrom('frame-1', 'text'));
  });

  it('accepts binary extra bytes', () => {
    const expected = createHash('sha256')
      .update('ctx')
      .update('\u0000')
      .update(new Uint8Array([1, 2, 3]))
      .digest()
      .readUInt32LE(0);
    expect(seedFrom('ctx', new Uint8Array([1, 2, 3]))).toBe(expected);
  });

  it('always yields an unsigned 32-bit integer', () => {
    fc.assert(
      fc.property(fc.string(), (id) => {
        const seed = seedFrom(id);
        return Number.isInteger(seed) && seed >= 0 && seed <= 0xffffffff;
      }),
    );
  });
});

describe('nextUint32 / nextFloat01', () => {
  it('steps the LCG from known states', () => {
    expect(nextUint32(1)).toEqual([1103527590, 1103527590]);
    expect(nextUint32(0)).toEqual([12345, 12345]);
  });

  it('maps to [0, 1) by dividing by 2^31', () => {
    const [value, state] = nextFloat01(1);
    expect(value).toBe(1103527590 / 2147483648);
    expect(state).toBe(1103527590);
  });

  it('matches the exact modular recurrence for every 32-bit state', () => {
    fc.assert(
      fc.property(fc.integer({ min: 0, max: 0xffffffff }), (state) => {
        const expected = Number((BigInt(state) * 1103515245n + 12345n) % 2147483648n);
        const [value, next] = nextUint32(state);
        return value === expected && next === expected;
      }),
    );
  });

  it('stays within [0, 1)', () => {
    fc.assert(
      fc.property(fc.integer({ min: 0, max: 0xffffffff }), (state) => {
        const [value] = nextFloat01(state);
        return value >= 0 && value < 1;
      }),
    );
  });
});

describe('smoothNoise2D', () => {
  it('is zero on lattice points', () => {
    expect(smoothNoise2D(7, 0, 0)).toBeCloseTo(0, 12);
    expect(smoothNoise2D(7, 3, -2)).toBeCloseTo(0, 12);
  });

  it('is deterministic', () => {
    expect(smoothNoise2D(99, 1.37, 4.21)).toBe(smoothNoise2D(99, 1.37, 4.21));
  });

  it('stays within [-1, 1]', () => {
    fc.assert(
      fc.property(
        fc.integer({ min: 0, max: 0xffffffff }),
        fc.double({ min: -1000, max: 1000, noNaN: true }),
        fc.double({ min: -1000, max: 1000, noNaN: true }),
        (seed, x, y) => {
          const n = smoothNoise2D(seed, x, y);
          return n >= -1 && n <= 1;
        },
      ),
    );
  });

  it('is continuous', () => {
    fc.assert(
      fc.property(
        fc.integer({ min: 0, max: 0xffffffff }),
        fc.double({ min: -100, max: 100, noNaN: true }),
        fc.double({ min: -100, max: 100, noNaN: true }),
        (seed, x, y) => Math.abs(smoothNoise2D(seed, x, y) - smoothNoise2D(seed, x + 1e-4, y)) < 0.01,
      ),
    );
  });

  it('gives different fields for different seeds', () => {
    const sample = (seed: number) =>
      Array.from({ length: 20 }, (_, i) => smoothNoise2D(seed, i * 0.37 + 0.5, i * 0.21 + 0.5));
    expect(sample(seedFrom('frame-1'))).not.toEqual(sample(seedFrom('frame-2')));
  });
});

describe('NoiseStream', () => {
  it('starts from the seed state', () => {
    const stream = createNoiseStream(1);
    expect(stream.state).toBe(1);
    expect(stream.next()).toBe(1103527590);
    expect(stream.state).toBe(1103527590);
  });

  it('replays the same sequence for the same seed', () => {
    const a = new NoiseStream(12345);
    const b = new NoiseStream(12345);
    const seqA = Array.from({ length: 10 }, () => a.nextFloat());
    const seqB = Array.from({ length: 10 }, () => b.nextFloat());
    expect(seqA).toEqual(seqB);
  });

  it('keeps signed values in [-1, 1)', () => {
    const stream = new NoiseStream(42);
    for (let i = 0; i < 1000; i++) {
      const value = stream.nextSigned();
      expect(value).toBeGreaterThanOrEqual(-1);
      expect(value).toBeLessThan(1);
    }
  });

  it('consumes two LCG steps per pair of gaussian samples', () => {
    const gaussian = new NoiseStream(5);
    const raw = new NoiseStream(5);
    gaussian.nextGaussian();
    gaussian.nextGaussian();
    raw.next();
    raw.next();
    expect(gaussian.state).toBe(raw.state);
  });

  it('produces finite gaussian samples centred near zero', () => {
    const stream = new NoiseStream(2024);
    let sum = 0;
    for (let i = 0; i < 10000; i++) {
      const value = stream.nextGaussian();
      expect(Number.isFinite(value)).toBe(true);
      sum += value;
    }
    expect(Math.abs(sum / 10000)).toBeLessThan(0.1);
  });
});
