import type {
  ClockFn,
  ContextId,
  FingerprintConfig,
  Logger,
  ProfileCatalog,
} from '@veilprint/core';
import type { DetectionPolicy, DetectionReport } from '@veilprint/detection';
import type { InjectorOptions } from '@veilprint/noise';

export type EngineEvents = {
  /** Emitted the first time a context is classified as fingerprinting. */
  'fingerprinting-detected': (report: DetectionReport) => void;
  /** Emitted when a configuration update fails validation. `null` means the default. */
  'config-rejected': (contextId: ContextId | null, errors: readonly string[]) => void;
};

export interface EngineOptions {
  /** Process-wide switch. Default: true */
  enabled?: boolean;
  /** Default: silent. */
  logger?: Logger;
  /** Default: Date.now */
  clock?: ClockFn;
  policy?: DetectionPolicy;
  /** Per-context detector history size. Default: 100 */
  historyCapacity?: number;
  injector?: InjectorOptions;
  /** Initial default configuration. Default: the built-in default. */
  defaultConfig?: FingerprintConfig;
  /** Default: a catalog preloaded with the shipped profiles. */
  catalog?: ProfileCatalog;
}

/** Domains whose noise level drives `spoofScalar`. */
export type NoiseDomain = 'canvas' | 'webgl' | 'audio';

/** Subset of the canvas `TextMetrics` interface the engine adjusts. */
export interface TextMetricsLike {
  width: number;
  actualBoundingBoxLeft?: number;
  actualBoundingBoxRight?: number;
  actualBoundingBoxAscent?: number;
  actualBoundingBoxDescent?: number;
}

export interface ShaderPrecisionFormat {
  rangeMin: number;
  rangeMax: number;
  precision: number;
}

/** Values `WebGLRenderingContext#getParameter` can return that the engine deals in. */
export type WebGLParameterValue = string | number | boolean | null | Int32Array | Float32Array;
