/**
 * Factory functions for creating test fixtures.
 *
 * Every factory produces a valid value with sensible defaults. Override any
 * field by passing a partial object.
 */
import {
  createDefaultConfig,
  mergeConfig,
  type ConfigPatch,
  type DeviceProfile,
  type FingerprintConfig,
} from "@veilprint/core";

/** Timestamp stamped on every fixture configuration. */
export const FIXTURE_TIME = 1_700_000_000_000;

let _idCounter = 0;

/** Reset the auto-incrementing ID counter. Call in beforeEach if needed. */
export function resetIdCounter(): void {
  _idCounter = 0;
}

/** Next fixture context id, e.g. `test-ctx-1`. */
export function nextContextId(prefix = "test-ctx"): string {
  return `${prefix}-${++_idCounter}`;
}

/**
 * Create a valid configuration: the built-in default with `patch` merged
 * over it and both timestamps pinned to `FIXTURE_TIME`.
 *
 * @example
 * ```ts
 * const quiet = createTestConfig({ canvas: { noiseLevel: 0 } });
 * ```
 */
export function createTestConfig(patch: ConfigPatch = {}): FingerprintConfig {
  return mergeConfig(createDefaultConfig(() => FIXTURE_TIME), patch);
}

/** Create a device profile that pins a user agent and screen size. */
export function createDeviceProfile(overrides: Partial<DeviceProfile> = {}): DeviceProfile {
  const name = overrides.name ?? `profile-${++_idCounter}`;
  return {
    name,
    description: `Test profile ${name}`,
    navigator: { userAgent: `TestAgent/1.0 (${name})`, platform: "TestOS" },
    screen: { width: 1280, height: 720 },
    customProperties: {},
    ...overrides,
  };
}
