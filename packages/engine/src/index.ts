// @veilprint/engine
// The protection engine browser bindings call into.

export { FingerprintEngine } from './engine.js';
export { createEngine, engineOptionsFromEnv, parseEnvironment, type EnvironmentOptions } from './env.js';
export {
  TEXT_BOX_JITTER,
  TEXT_WIDTH_JITTER,
  applyImageNoise,
  isRgbaImage,
  offsetTextMetrics,
} from './canvas-protection.js';
export {
  DEFAULT_EXTENSIONS,
  DEFAULT_LIMITS,
  DEFAULT_VIEWPORT_DIMS,
  HIDDEN_EXTENSIONS,
  filterExtensions,
  shaderPrecisionFormat,
  spoofedParameter,
  spoofedStringParameter,
  textureBytesPerPixel,
} from './webgl-protection.js';
export {
  SurfaceSpoofer,
  type GeolocationSurface,
  type NavigatorSurface,
  type ScreenSurface,
  type SurfaceSpooferDeps,
  type TimezoneSurface,
  type WebRTCSurface,
} from './surface-spoofer.js';
export type {
  EngineEvents,
  EngineOptions,
  NoiseDomain,
  ShaderPrecisionFormat,
  TextMetricsLike,
  WebGLParameterValue,
} from './types.js';
