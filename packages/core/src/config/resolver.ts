import type { ClockFn, ContextId } from "../context/types.js";
import { ConfigValidationError } from "../errors.js";
import { silentLogger, type Logger } from "../logging/logger.js";
import { createDefaultConfig } from "./defaults.js";
import { cloneConfig, deepFreeze, mergeConfig } from "./merge.js";
import { validateConfig } from "./schema.js";
import type { ConfigPatch, ConfigSection, FingerprintConfig, ValidationResult } from "./types.js";

export interface ConfigResolverOptions {
  /** Initial default configuration. Default: `createDefaultConfig(clock)`. */
  defaultConfig?: FingerprintConfig;
  /** Default: silent. */
  logger?: Logger;
  /** Injectable clock for `updatedAt` stamps. Default: `Date.now`. */
  clock?: ClockFn;
}

/**
 * Holds the default configuration and per-context overrides.
 *
 * Stored values are validated, deep-frozen copies. Every update either
 * replaces the stored value in one assignment or leaves it untouched, so a
 * caller never observes a half-applied configuration.
 */
export class ConfigResolver {
  private readonly logger: Logger;
  private readonly clock: ClockFn;
  private readonly overrides = new Map<ContextId, FingerprintConfig>();
  private defaultConfig: FingerprintConfig;

  constructor(options: ConfigResolverOptions = {}) {
    this.logger = options.logger ?? silentLogger;
    this.clock = options.clock ?? Date.now;

    const result = validateConfig(options.defaultConfig ?? createDefaultConfig(this.clock));
    if (!result.ok) {
      throw new ConfigValidationError(result.errors);
    }
    this.defaultConfig = deepFreeze(result.value);
  }

  /**
   * Effective configuration for `contextId`: its override if one is set,
   * otherwise the default. Always returns an independent copy.
   */
  resolve(contextId?: ContextId | null): FingerprintConfig {
    return cloneConfig(this.lookup(contextId));
  }

  /**
   * One section of the effective configuration, copied. When the
   * configuration as a whole is disabled the section reads as disabled too,
   * whatever its own flag says.
   */
  resolveSection<S extends ConfigSection>(
    contextId: ContextId | null | undefined,
    section: S,
  ): FingerprintConfig[S] {
    const config = this.lookup(contextId);
    const copy = structuredClone(config[section]);
    return config.enabled ? copy : { ...copy, enabled: false };
  }

  /** Install an override for one context. Rejected configs leave prior state intact. */
  setForContext(contextId: ContextId, config: unknown): ValidationResult<FingerprintConfig> {
    const result = this.validate(config, { contextId });
    if (!result.ok) return result;

    const stored = deepFreeze(result.value);
    this.overrides.set(contextId, stored);
    this.logger.debug("Context override installed", { contextId });
    return { ok: true, value: cloneConfig(stored) };
  }

  /** Drop the override for `contextId`. Returns whether one existed. */
  removeForContext(contextId: ContextId): boolean {
    return this.overrides.delete(contextId);
  }

  /** Replace the default configuration; `updatedAt` is stamped from the clock. */
  setDefault(config: unknown): ValidationResult<FingerprintConfig> {
    const result = this.validate(config, {});
    if (!result.ok) return result;

    const stored = deepFreeze({ ...result.value, updatedAt: this.clock() });
    this.defaultConfig = stored;
    this.logger.info("Default configuration replaced", { profileName: stored.profileName });
    return { ok: true, value: cloneConfig(stored) };
  }

  /** Merge `patch` over the current default, validate, and store the result. */
  updateDefault(patch: ConfigPatch): ValidationResult<FingerprintConfig> {
    return this.setDefault(mergeConfig(this.defaultConfig, patch));
  }

  hasOverride(contextId: ContextId): boolean {
    return this.overrides.has(contextId);
  }

  /** Context ids that currently carry an override, in insertion order. */
  contexts(): ContextId[] {
    return [...this.overrides.keys()];
  }

  /** Number of context overrides. */
  get size(): number {
    return this.overrides.size;
  }

  /** Drop all overrides. The default is kept. */
  clear(): void {
    this.overrides.clear();
  }

  private lookup(contextId: ContextId | null | undefined): FingerprintConfig {
    if (contextId === undefined || contextId === null) return this.defaultConfig;
    return this.overrides.get(contextId) ?? this.defaultConfig;
  }

  private validate(
    config: unknown,
    context: Record<string, unknown>,
  ): ValidationResult<FingerprintConfig> {
    const result = validateConfig(config);
    if (!result.ok) {
      this.logger.error("Rejected configuration", { ...context, errors: result.errors });
    }
    return result;
  }
}
