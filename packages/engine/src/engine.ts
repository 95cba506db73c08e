import {
  ConfigResolver,
  ContextIdAllocator,
  ProfileCatalog,
  TypedEventEmitter,
  applyDeviceProfile,
  silentLogger,
} from '@veilprint/core';
import type {
  ConfigPatch,
  ContextId,
  ContextKind,
  FingerprintConfig,
  Logger,
  ValidationResult,
} from '@veilprint/core';
import { UsagePatternDetector, type DetectionReport } from '@veilprint/detection';
import { StatisticsAggregator, type StatisticsSnapshot } from '@veilprint/monitoring';
import { BufferNoiseInjector, seedFrom, type ByteBuffer, type ScalarKind } from '@veilprint/noise';

import { applyImageNoise, isRgbaImage, offsetTextMetrics } from './canvas-protection.js';
import { SurfaceSpoofer } from './surface-spoofer.js';
import type {
  EngineEvents,
  EngineOptions,
  NoiseDomain,
  ShaderPrecisionFormat,
  TextMetricsLike,
  WebGLParameterValue,
} from './types.js';
import {
  DEFAULT_EXTENSIONS,
  filterExtensions,
  shaderPrecisionFormat,
  spoofedParameter,
  spoofedStringParameter,
  textureBytesPerPixel,
} from './webgl-protection.js';

/** Per-context spoof state owned by the engine, dropped on `contextDestroyed`. */
interface ContextState {
  detected: boolean;
  audioProtected: boolean;
}

/** Bytes of an upload mixed into its noise seed. */
const BUFFER_SEED_PREFIX = 256;

function seedPrefix(data: ByteBuffer): Uint8Array {
  return new Uint8Array(data.buffer, data.byteOffset, Math.min(data.length, BUFFER_SEED_PREFIX));
}

/** Noise level `spoofScalar` uses for `domain`, or `undefined` when that domain adds no noise. */
function scalarNoiseLevel(config: FingerprintConfig, domain: NoiseDomain): number | undefined {
  if (!config.enabled) return undefined;
  switch (domain) {
    case 'canvas':
      return config.canvas.enabled && config.canvas.addNoise ? config.canvas.noiseLevel : undefined;
    case 'webgl':
      return config.webgl.enabled ? config.webgl.bufferNoiseLevel : undefined;
    case 'audio':
      return config.audio.enabled && config.audio.addNoise ? config.audio.noiseLevel : undefined;
  }
}

/**
 * The binding surface of the protection engine.
 *
 * Owns one configuration resolver, usage detector, statistics aggregator
 * and surface spoofer. Every entry point is synchronous. Entry points
 * never throw into the rendering path: failures are logged, counted as
 * `protection_errors` and the input is returned unchanged. While
 * `enabled` is false every entry point returns its input without touching
 * any store.
 *
 * @example
 * ```typescript
 * const engine = createEngine();
 * const ctx = engine.openContext('canvas');
 * engine.processImageData(ctx, imageData.data, imageData.width, imageData.height);
 * engine.on('fingerprinting-detected', (report) => console.warn(report.rules));
 * ```
 */
export class FingerprintEngine extends TypedEventEmitter<EngineEvents> {
  /** Process-wide switch. */
  enabled: boolean;

  readonly resolver: ConfigResolver;
  readonly detector: UsagePatternDetector;
  readonly stats: StatisticsAggregator;
  readonly surface: SurfaceSpoofer;
  readonly catalog: ProfileCatalog;

  private readonly _logger: Logger;
  private readonly _injector: BufferNoiseInjector;
  private readonly _allocator = new ContextIdAllocator();
  private readonly _contexts = new Map<ContextId, ContextState>();

  constructor(options: EngineOptions = {}) {
    const logger = options.logger ?? silentLogger;
    super({
      onListenerError: (event, error) =>
        logger.error('FingerprintEngine: listener threw during notification', {
          event,
          error: error instanceof Error ? error.message : String(error),
        }),
    });

    const clock = options.clock ?? Date.now;
    this.enabled = options.enabled ?? true;
    this._logger = logger;
    this._injector = new BufferNoiseInjector(options.injector);
    this.resolver = new ConfigResolver({ defaultConfig: options.defaultConfig, clock, logger });
    this.detector = new UsagePatternDetector({
      policy: options.policy,
      historyCapacity: options.historyCapacity,
      clock,
      logger,
    });
    this.stats = new StatisticsAggregator({ clock, logger });
    this.surface = new SurfaceSpoofer({
      resolver: this.resolver,
      statistics: this.stats,
      logger,
      isEnabled: () => this.enabled,
    });
    this.catalog = options.catalog ?? ProfileCatalog.withBuiltins({ logger });
  }

  // ---------------------------------------------------------------------------
  // Configuration
  // ---------------------------------------------------------------------------

  resolveConfig(contextId?: ContextId | null): FingerprintConfig {
    return this.resolver.resolve(contextId);
  }

  setContextConfig(contextId: ContextId, config: unknown): ValidationResult<FingerprintConfig> {
    return this._reportRejection(contextId, this.resolver.setForContext(contextId, config));
  }

  setDefaultConfig(config: unknown): ValidationResult<FingerprintConfig> {
    return this._reportRejection(null, this.resolver.setDefault(config));
  }

  updateDefaultConfig(patch: ConfigPatch): ValidationResult<FingerprintConfig> {
    return this._reportRejection(null, this.resolver.updateDefault(patch));
  }

  /**
   * Apply a catalog device profile to a context's effective configuration
   * (or to the default when `contextId` is omitted). Unknown profile names
   * resolve to the empty default profile, leaving the configuration as is.
   */
  useDeviceProfile(profileName: string, contextId?: ContextId): ValidationResult<FingerprintConfig> {
    const profile = this.catalog.getProfile(profileName);
    const applied = applyDeviceProfile(this.resolver.resolve(contextId), profile);
    return contextId === undefined ? this.setDefaultConfig(applied) : this.setContextConfig(contextId, applied);
  }

  // ---------------------------------------------------------------------------
  // Context lifecycle
  // ---------------------------------------------------------------------------

  /** Mint a fresh context id. Frames count towards `total_frames_protected`. */
  openContext(kind: ContextKind = 'frame'): ContextId {
    const contextId = this._allocator.mint(kind);
    if (this.enabled && kind === 'frame') {
      this.stats.increment('total_frames_protected');
    }
    return contextId;
  }

  /** Drop every piece of per-context state: override, usage, surface counts. */
  contextDestroyed(contextId: ContextId): void {
    this.resolver.removeForContext(contextId);
    this.detector.forget(contextId);
    this.surface.forget(contextId);
    this._contexts.delete(contextId);
    this._logger.debug('Context destroyed', { contextId });
  }

  /** Contexts with any engine-held state. */
  contexts(): ContextId[] {
    const ids = new Set<ContextId>([
      ...this._contexts.keys(),
      ...this.resolver.contexts(),
      ...this.detector.contexts(),
    ]);
    return [...ids];
  }

  /** Drop all state and listeners and disable the engine. */
  shutdown(): void {
    this.enabled = false;
    this.resolver.clear();
    this.detector.clear();
    this.surface.clear();
    this._contexts.clear();
    this.removeAllListeners();
    this._logger.info('Engine shut down');
  }

  // ---------------------------------------------------------------------------
  // Detection and statistics
  // ---------------------------------------------------------------------------

  /**
   * Record an API call that has no spoofing of its own (fillRect,
   * drawArrays, …). Returns whether the context now looks like
   * fingerprinting.
   */
  recordOperation(contextId: ContextId, operation: string, parameter?: string | number): boolean {
    return this._guard('recordOperation', contextId, false, () => {
      this.detector.record(contextId, operation, parameter);
      return this._observe(contextId).likelyFingerprinting;
    });
  }

  isLikelyFingerprinting(contextId: ContextId): boolean {
    return this.detector.isLikelyFingerprinting(contextId);
  }

  analyze(contextId: ContextId): DetectionReport {
    return this.detector.analyze(contextId);
  }

  statistics(): StatisticsSnapshot {
    return this.stats.snapshot();
  }

  // ---------------------------------------------------------------------------
  // Canvas
  // ---------------------------------------------------------------------------

  /** Noise an RGBA readback (`getImageData`) in place. Returns the same buffer. */
  processImageData<B extends ByteBuffer>(contextId: ContextId, buffer: B, width: number, height: number): B {
    return this._guard('processImageData', contextId, buffer, () => {
      const config = this.resolver.resolveSection(contextId, 'canvas');
      if (!config.enabled || !config.protectImageData) return buffer;
      this._track(contextId, 'getImageData');

      if (!this._checkImage(contextId, 'processImageData', buffer, width, height)) return buffer;
      if (applyImageNoise(this._injector, config, buffer, width, seedFrom(contextId))) {
        this.stats.increment('canvas_operations_spoofed');
      }
      return buffer;
    });
  }

  /**
   * Noise the pixels a data-URL export (`toDataURL`, `toBlob`) is about to
   * encode. Uses the same noise field as `processImageData`, so both views
   * of one canvas agree.
   */
  processDataUrlExport<B extends ByteBuffer>(
    contextId: ContextId,
    buffer: B,
    width: number,
    height: number,
    operation: 'toDataURL' | 'toBlob' = 'toDataURL',
  ): B {
    return this._guard('processDataUrlExport', contextId, buffer, () => {
      const config = this.resolver.resolveSection(contextId, 'canvas');
      if (!config.enabled || !config.protectDataUrl) return buffer;
      this._track(contextId, operation);

      if (!this._checkImage(contextId, 'processDataUrlExport', buffer, width, height)) return buffer;
      if (applyImageNoise(this._injector, config, buffer, width, seedFrom(contextId))) {
        this.stats.increment('canvas_operations_spoofed');
      }
      return buffer;
    });
  }

  /**
   * Offset `measureText` results. The offset depends only on the context
   * and the measured text, so repeated measurements agree.
   */
  processTextMetrics(contextId: ContextId, text: string, metrics: TextMetricsLike, font?: string): TextMetricsLike {
    return this._guard('processTextMetrics', contextId, metrics, () => {
      const config = this.resolver.resolveSection(contextId, 'canvas');
      if (!config.enabled || !config.spoofTextMetrics) return metrics;
      this._track(contextId, 'measureText');

      const fontConfig = font === undefined ? undefined : { name: font, config: this.resolver.resolveSection(contextId, 'font') };
      const adjusted = offsetTextMetrics(metrics, seedFrom(contextId, `text:${text}`), fontConfig);
      this.stats.increment('canvas_operations_spoofed');
      return adjusted;
    });
  }

  // ---------------------------------------------------------------------------
  // WebGL
  // ---------------------------------------------------------------------------

  /**
   * Value to report for `getParameter(parameter)`. Parameters the engine
   * does not control return `nativeValue`.
   */
  getSpoofedParameter(
    contextId: ContextId,
    parameter: string | number,
    nativeValue: WebGLParameterValue = null,
  ): WebGLParameterValue {
    return this._guard('getSpoofedParameter', contextId, nativeValue, () => {
      const config = this.resolver.resolveSection(contextId, 'webgl');
      if (!config.enabled) return nativeValue;
      this._track(contextId, 'getParameter', parameter);

      const value = spoofedParameter(config, parameter);
      if (value === undefined) return nativeValue;
      this.stats.increment('webgl_parameters_spoofed');
      return value;
    });
  }

  /** String form of `getSpoofedParameter` for VENDOR, RENDERER, VERSION and SHADING_LANGUAGE_VERSION. */
  getSpoofedStringParameter(contextId: ContextId, parameter: string | number, nativeValue = ''): string {
    return this._guard('getSpoofedStringParameter', contextId, nativeValue, () => {
      const config = this.resolver.resolveSection(contextId, 'webgl');
      if (!config.enabled) return nativeValue;
      this._track(contextId, 'getParameter', parameter);

      const value = spoofedStringParameter(config, parameter);
      if (value === undefined) return nativeValue;
      this.stats.increment('webgl_parameters_spoofed');
      return value;
    });
  }

  /** Filtered extension list; `native` defaults to a common desktop list. */
  getSupportedExtensions(contextId: ContextId, native: readonly string[] = DEFAULT_EXTENSIONS): string[] {
    return this._guard('getSupportedExtensions', contextId, [...native], () => {
      const config = this.resolver.resolveSection(contextId, 'webgl');
      if (!config.enabled) return [...native];
      this._track(contextId, 'getSupportedExtensions');

      this.stats.increment('webgl_parameters_spoofed');
      return filterExtensions(config, native);
    });
  }

  getShaderPrecisionFormat(
    contextId: ContextId,
    shaderType: number,
    precisionType: number,
    native: ShaderPrecisionFormat | null = null,
  ): ShaderPrecisionFormat | null {
    return this._guard('getShaderPrecisionFormat', contextId, native, () => {
      const config = this.resolver.resolveSection(contextId, 'webgl');
      if (!config.enabled) return native;
      this._track(contextId, 'getShaderPrecisionFormat', shaderType);

      this.stats.increment('webgl_parameters_spoofed');
      return shaderPrecisionFormat(precisionType);
    });
  }

  /**
   * Noise a buffer upload in place. The seed mixes the context with the
   * first bytes of the data, so identical uploads in one context get
   * identical noise.
   */
  processBufferData<B extends ByteBuffer>(contextId: ContextId, data: B, operation = 'bufferData'): B {
    return this._guard('processBufferData', contextId, data, () => {
      const config = this.resolver.resolveSection(contextId, 'webgl');
      if (!config.enabled) return data;
      this._track(contextId, operation);
      if (!config.addNoiseToBuffers) return data;

      const seed = seedFrom(contextId, seedPrefix(data));
      if (this._injector.injectByteNoise(data, config.bufferNoiseLevel, seed)) {
        this.stats.increment('webgl_buffers_protected');
      }
      return data;
    });
  }

  /**
   * Noise an unsigned-byte texture upload in place. Only the
   * `width * height * bytesPerPixel(format)` leading bytes are touched.
   */
  processTextureData<B extends ByteBuffer>(
    contextId: ContextId,
    data: B,
    width: number,
    height: number,
    format: number,
    operation = 'texImage2D',
  ): B {
    return this._guard('processTextureData', contextId, data, () => {
      const config = this.resolver.resolveSection(contextId, 'webgl');
      if (!config.enabled) return data;
      this._track(contextId, operation);
      if (!config.addNoiseToBuffers) return data;

      const bytesPerPixel = textureBytesPerPixel(format);
      const expected = bytesPerPixel === undefined ? NaN : width * height * bytesPerPixel;
      if (!Number.isInteger(width) || !Number.isInteger(height) || width <= 0 || height <= 0 || !(data.length >= expected)) {
        this._skipMalformed(contextId, 'processTextureData', { width, height, format, length: data.length });
        return data;
      }

      const seed = seedFrom(contextId, seedPrefix(data));
      if (this._injector.injectByteNoise(data.subarray(0, expected), config.bufferNoiseLevel, seed)) {
        this.stats.increment('webgl_textures_protected');
      }
      return data;
    });
  }

  // ---------------------------------------------------------------------------
  // Audio and scalars
  // ---------------------------------------------------------------------------

  /** Noise rendered audio samples in place. */
  processAudioSamples<S extends Float32Array | Float64Array>(contextId: ContextId, samples: S): S {
    return this._guard('processAudioSamples', contextId, samples, () => {
      const config = this.resolver.resolveSection(contextId, 'audio');
      if (!config.enabled || !config.addNoise) return samples;

      if (this._injector.injectSampleNoise(samples, config.noiseLevel, seedFrom(contextId, 'audio'))) {
        const state = this._state(contextId);
        if (!state.audioProtected) {
          state.audioProtected = true;
          this.stats.increment('audio_contexts_protected');
        }
      }
      return samples;
    });
  }

  /**
   * Perturb a single numeric reading with the noise level of `domain`.
   * The same context, name and value always give the same result.
   */
  spoofScalar(contextId: ContextId, domain: NoiseDomain, name: string, value: number, kind: ScalarKind = 'float'): number {
    return this._guard('spoofScalar', contextId, value, () => {
      const level = scalarNoiseLevel(this.resolver.resolve(contextId), domain);
      if (level === undefined) return value;
      return this._injector.injectScalarNoise(value, level, seedFrom(contextId, `${domain}:${name}`), kind);
    });
  }

  // ---------------------------------------------------------------------------
  // Internal
  // ---------------------------------------------------------------------------

  /**
   * Run `fn` unless the engine is disabled. Errors are logged and counted,
   * and `fallback` is returned in their place.
   */
  private _guard<T>(entryPoint: string, contextId: ContextId, fallback: T, fn: () => T): T {
    if (!this.enabled) return fallback;
    try {
      return fn();
    } catch (err) {
      this.stats.increment('protection_errors');
      this._logger.error('Protection failed; returning input unchanged', {
        entryPoint,
        contextId,
        error: err instanceof Error ? err.message : String(err),
      });
      return fallback;
    }
  }

  private _state(contextId: ContextId): ContextState {
    let state = this._contexts.get(contextId);
    if (state === undefined) {
      state = { detected: false, audioProtected: false };
      this._contexts.set(contextId, state);
    }
    return state;
  }

  private _track(contextId: ContextId, operation: string, parameter?: string | number): void {
    this.detector.record(contextId, operation, parameter);
    this._observe(contextId);
  }

  /** Analyze `contextId` and announce it the first time it is classified. */
  private _observe(contextId: ContextId): DetectionReport {
    const report = this.detector.analyze(contextId);
    if (!report.likelyFingerprinting) return report;

    const state = this._state(contextId);
    if (!state.detected) {
      state.detected = true;
      this._logger.warn('Fingerprinting pattern detected', { contextId, rules: report.rules });
      this.emit('fingerprinting-detected', report);
    }
    return report;
  }

  private _checkImage(contextId: ContextId, entryPoint: string, buffer: ByteBuffer, width: number, height: number): boolean {
    if (isRgbaImage(buffer, width, height)) return true;
    this._skipMalformed(contextId, entryPoint, { width, height, length: buffer.length });
    return false;
  }

  private _skipMalformed(contextId: ContextId, entryPoint: string, details: Record<string, unknown>): void {
    this.stats.increment('malformed_buffers_skipped');
    this._logger.debug('Skipping malformed buffer', { entryPoint, contextId, ...details });
  }

  private _reportRejection(
    contextId: ContextId | null,
    result: ValidationResult<FingerprintConfig>,
  ): ValidationResult<FingerprintConfig> {
    if (!result.ok) this.emit('config-rejected', contextId, result.errors);
    return result;
  }
}
