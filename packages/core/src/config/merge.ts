import { createHash } from "node:crypto";

import type { ConfigPatch, ConfigSection, FingerprintConfig } from "./types.js";

function mergeSection<S extends ConfigSection>(
  base: FingerprintConfig,
  patch: ConfigPatch,
  section: S,
): FingerprintConfig[S] {
  const fields = patch[section];
  if (fields === undefined) return base[section];
  return { ...base[section], ...fields };
}

/**
 * Apply `patch` over `base` and return a new configuration. Top-level
 * scalars are replaced; each section present in the patch is merged
 * field-by-field over the base section (one level deep). The result is
 * not validated.
 */
export function mergeConfig(base: FingerprintConfig, patch: ConfigPatch): FingerprintConfig {
  return cloneConfig({
    ...base,
    enabled: patch.enabled ?? base.enabled,
    profileName: patch.profileName ?? base.profileName,
    deviceProfile: patch.deviceProfile ?? base.deviceProfile,
    behaviorPattern: patch.behaviorPattern ?? base.behaviorPattern,
    version: patch.version ?? base.version,
    canvas: mergeSection(base, patch, "canvas"),
    webgl: mergeSection(base, patch, "webgl"),
    navigator: mergeSection(base, patch, "navigator"),
    audio: mergeSection(base, patch, "audio"),
    font: mergeSection(base, patch, "font"),
    webrtc: mergeSection(base, patch, "webrtc"),
    geolocation: mergeSection(base, patch, "geolocation"),
    screen: mergeSection(base, patch, "screen"),
    timezone: mergeSection(base, patch, "timezone"),
    antiDetection: mergeSection(base, patch, "antiDetection"),
  });
}

/** Deep copy. Frozen inputs produce unfrozen copies. */
export function cloneConfig(config: FingerprintConfig): FingerprintConfig {
  return structuredClone(config);
}

/** Recursively freeze a plain object graph in place and return it. */
export function deepFreeze<T>(value: T): T {
  if (typeof value === "object" && value !== null && !Object.isFrozen(value)) {
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
    Object.freeze(value);
  }
  return value;
}

/**
 * JSON encoding with object keys sorted at every level, so structurally
 * equal values always produce the same string.
 */
export function stableStringify(value: unknown): string {
  if (Array.isArray(value)) {
    return `[${value.map((item) => stableStringify(item)).join(",")}]`;
  }
  if (typeof value === "object" && value !== null) {
    const entries = Object.entries(value)
      .filter(([, v]) => v !== undefined)
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
      .map(([key, v]) => `${JSON.stringify(key)}:${stableStringify(v)}`);
    return `{${entries.join(",")}}`;
  }
  return JSON.stringify(value) ?? "null";
}

/**
 * SHA-256 (hex) of the configuration's content. Timestamps are excluded,
 * so re-saving an unchanged configuration keeps its hash.
 */
export function configHash(config: FingerprintConfig): string {
  const content = stableStringify({ ...config, createdAt: 0, updatedAt: 0 });
  return createHash("sha256").update(content).digest("hex");
}
