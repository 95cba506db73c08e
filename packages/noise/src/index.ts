// @veilprint/noise
// Deterministic noise fields and in-place buffer noise injection.

export {
  NoiseStream,
  createNoiseStream,
  hashLattice,
  nextFloat01,
  nextUint32,
  seedFrom,
  smoothNoise2D,
  type NoiseSeed,
} from './generator.js';
export {
  BufferNoiseInjector,
  clampByte,
  type ByteBuffer,
  type InjectorOptions,
  type ScalarKind,
} from './injector.js';
