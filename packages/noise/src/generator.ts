import { createHash } from 'node:crypto';

import type { ContextId } from '@veilprint/core';

/** Unsigned 32-bit seed derived from a context id. */
export type NoiseSeed = number;

const LCG_MULTIPLIER = 1103515245;
const LCG_INCREMENT = 12345;
const LCG_MASK = 0x7fffffff;
const LCG_MODULUS = 0x80000000;

/**
 * Derive the noise seed for a context: the first four bytes (little-endian)
 * of SHA-256 over the context id, optionally followed by a NUL separator and
 * `extra` so one context can own several independent noise fields.
 */
export function seedFrom(contextId: ContextId, extra?: string | Uint8Array): NoiseSeed {
  const hash = createHash('sha256').update(contextId);
  if (extra !== undefined) {
    hash.update('\u0000').update(extra);
  }
  return hash.digest().readUInt32LE(0);
}

/**
 * One LCG step: `state' = (state * 1103515245 + 12345) mod 2^31`.
 * Returns `[value, nextState]`; the value is the new state.
 */
export function nextUint32(state: number): [number, number] {
  const next = (Math.imul(state, LCG_MULTIPLIER) + LCG_INCREMENT) & LCG_MASK;
  return [next, next];
}

/** One LCG step mapped to [0, 1). */
export function nextFloat01(state: number): [number, number] {
  const [value, next] = nextUint32(state);
  return [value / LCG_MODULUS, next];
}

function fade(t: number): number {
  return t * t * t * (t * (t * 6 - 15) + 10);
}

function lerp(a: number, b: number, t: number): number {
  return a + t * (b - a);
}

function grad(hash: number, x: number, y: number): number {
  const h = hash & 15;
  const u = h < 8 ? x : y;
  const v = h < 4 ? y : h === 12 || h === 14 ? x : 0;
  return ((h & 1) === 0 ? u : -u) + ((h & 2) === 0 ? v : -v);
}

/** Integer hash of a lattice corner, mixed with the seed. */
export function hashLattice(seed: NoiseSeed, xi: number, yi: number): number {
  let h = seed ^ Math.imul(xi, 73856093) ^ Math.imul(yi, 19349663);
  h = Math.imul((h >>> 16) ^ h, 0x45d9f3b);
  h = Math.imul((h >>> 16) ^ h, 0x45d9f3b);
  return ((h >>> 16) ^ h) >>> 0;
}

/**
 * Gradient (Perlin) noise at `(x, y)` for the field selected by `seed`.
 * Continuous in both coordinates, zero at integer lattice points, clamped
 * to [-1, 1].
 */
export function smoothNoise2D(seed: NoiseSeed, x: number, y: number): number {
  const xi = Math.floor(x);
  const yi = Math.floor(y);
  const xf = x - xi;
  const yf = y - yi;
  const u = fade(xf);
  const v = fade(yf);

  const aa = hashLattice(seed, xi, yi);
  const ba = hashLattice(seed, xi + 1, yi);
  const ab = hashLattice(seed, xi, yi + 1);
  const bb = hashLattice(seed, xi + 1, yi + 1);

  const bottom = lerp(grad(aa, xf, yf), grad(ba, xf - 1, yf), u);
  const top = lerp(grad(ab, xf, yf - 1), grad(bb, xf - 1, yf - 1), u);
  return Math.max(-1, Math.min(1, lerp(bottom, top, v)));
}

/**
 * Stateful wrapper around the LCG for sequential noise (byte buffers,
 * audio samples). Two streams built from the same seed produce the same
 * sequence.
 */
export class NoiseStream {
  private _state: number;
  private _spare: number | undefined;

  constructor(seed: NoiseSeed) {
    this._state = seed >>> 0;
  }

  get state(): number {
    return this._state;
  }

  /** Next raw value in [0, 2^31). */
  next(): number {
    const [value, state] = nextUint32(this._state);
    this._state = state;
    return value;
  }

  /** Next value in [0, 1). */
  nextFloat(): number {
    return this.next() / LCG_MODULUS;
  }

  /** Next value in [-1, 1). */
  nextSigned(): number {
    return this.nextFloat() * 2 - 1;
  }

  /** Standard normal sample (Box-Muller, the second value of each pair is cached). */
  nextGaussian(): number {
    if (this._spare !== undefined) {
      const cached = this._spare;
      this._spare = undefined;
      return cached;
    }
    // log(0) guard
    const u1 = Math.max(this.nextFloat(), Number.EPSILON);
    const u2 = this.nextFloat();
    const radius = Math.sqrt(-2 * Math.log(u1));
    this._spare = radius * Math.sin(2 * Math.PI * u2);
    return radius * Math.cos(2 * Math.PI * u2);
  }
}

export function createNoiseStream(seed: NoiseSeed): NoiseStream {
  return new NoiseStream(seed);
}
