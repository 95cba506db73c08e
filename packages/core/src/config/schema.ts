import { z } from "zod";

import { ConfigValidationError } from "../errors.js";
import type { FingerprintConfig, ValidationResult } from "./types.js";

const finite = z.number().finite();
const int = z.number().int();
const stringList = z.array(z.string());

export const canvasSchema = z.object({
  enabled: z.boolean(),
  addNoise: z.boolean(),
  noiseLevel: finite,
  spoofTextMetrics: z.boolean(),
  protectDataUrl: z.boolean(),
  protectImageData: z.boolean(),
});

export const webglSchema = z.object({
  enabled: z.boolean(),
  vendor: z.string(),
  renderer: z.string(),
  version: z.string(),
  shadingLanguageVersion: z.string(),
  extensions: stringList,
  parameters: z.record(z.string()),
  addNoiseToBuffers: z.boolean(),
  bufferNoiseLevel: finite,
});

export const navigatorSchema = z.object({
  enabled: z.boolean(),
  userAgent: z.string(),
  platform: z.string(),
  languages: stringList,
  hardwareConcurrency: int.nonnegative(),
  deviceMemory: finite.nonnegative(),
  hideWebdriver: z.boolean(),
  spoofPlugins: z.boolean(),
  mimeTypes: stringList,
});

export const audioSchema = z.object({
  enabled: z.boolean(),
  addNoise: z.boolean(),
  noiseLevel: finite,
  protectAnalyserNode: z.boolean(),
  protectOfflineContext: z.boolean(),
  sampleRate: int.positive(),
  bufferSize: int.positive(),
});

export const fontSchema = z.object({
  enabled: z.boolean(),
  spoofEnumeration: z.boolean(),
  spoofMetrics: z.boolean(),
  availableFonts: stringList,
  metricsOffsets: z.record(finite),
});

const webrtcSchema = z.object({
  enabled: z.boolean(),
  maskLocalIps: z.boolean(),
  disableWebrtc: z.boolean(),
  fakePublicIp: z.string(),
  allowedIceServers: stringList,
  blockDeviceEnumeration: z.boolean(),
});

const geolocationSchema = z.object({
  enabled: z.boolean(),
  spoofLocation: z.boolean(),
  latitude: finite.min(-90).max(90),
  longitude: finite.min(-180).max(180),
  accuracy: finite.nonnegative(),
  blockHighAccuracy: z.boolean(),
});

export const screenSchema = z.object({
  enabled: z.boolean(),
  width: int,
  height: int,
  colorDepth: int.positive(),
  pixelDepth: int.positive(),
  devicePixelRatio: finite.positive(),
  orientation: z.string(),
});

const timezoneSchema = z.object({
  enabled: z.boolean(),
  timezone: z.string(),
  offsetMinutes: int,
  spoofDateMethods: z.boolean(),
});

const antiDetectionSchema = z.object({
  enabled: z.boolean(),
  webdriver: z.object({
    hideWebdriverProperty: z.boolean(),
    hideAutomationFlags: z.boolean(),
    spoofChromeRuntime: z.boolean(),
    hideSeleniumVariables: z.boolean(),
    blockedProperties: stringList,
  }),
  automation: z.object({
    hideHeadlessFlags: z.boolean(),
    spoofUserInteraction: z.boolean(),
    addHumanDelays: z.boolean(),
    randomizeRequestTiming: z.boolean(),
    minDelayMs: int.nonnegative(),
    maxDelayMs: int.nonnegative(),
  }),
  scriptBlocking: z.object({
    detectPuppeteer: z.boolean(),
    detectPlaywright: z.boolean(),
    detectSelenium: z.boolean(),
    blockDetectionScripts: z.boolean(),
    blockedScriptPatterns: stringList,
  }),
});

/**
 * Structural schema. Unknown keys are stripped, so a successful parse
 * yields a fresh object that shares nothing with the input.
 */
export const fingerprintConfigSchema: z.ZodType<FingerprintConfig> = z.object({
  enabled: z.boolean(),
  profileName: z.string(),
  deviceProfile: z.string(),
  behaviorPattern: z.string(),
  version: z.string(),
  createdAt: finite,
  updatedAt: finite,
  customScripts: stringList,
  canvas: canvasSchema,
  webgl: webglSchema,
  navigator: navigatorSchema,
  audio: audioSchema,
  font: fontSchema,
  webrtc: webrtcSchema,
  geolocation: geolocationSchema,
  screen: screenSchema,
  timezone: timezoneSchema,
  antiDetection: antiDetectionSchema,
});

function inUnitRange(value: number): boolean {
  return value >= 0 && value <= 1;
}

/**
 * Semantic rules on a structurally valid configuration. Noise levels are
 * checked whether or not their section is enabled, since a later merge can
 * enable the section without touching the level.
 */
export function configRuleViolations(config: FingerprintConfig): string[] {
  const errors: string[] = [];

  if (config.profileName.trim() === "") {
    errors.push("Profile name cannot be empty");
  }
  if (config.navigator.enabled && config.navigator.userAgent.trim() === "") {
    errors.push("User agent cannot be empty when navigator spoofing is enabled");
  }
  if (config.screen.enabled && (config.screen.width <= 0 || config.screen.height <= 0)) {
    errors.push("Screen dimensions must be positive when screen spoofing is enabled");
  }
  if (!inUnitRange(config.canvas.noiseLevel)) {
    errors.push("Canvas noise level must be between 0.0 and 1.0");
  }
  if (!inUnitRange(config.webgl.bufferNoiseLevel)) {
    errors.push("WebGL buffer noise level must be between 0.0 and 1.0");
  }
  if (!inUnitRange(config.audio.noiseLevel)) {
    errors.push("Audio noise level must be between 0.0 and 1.0");
  }
  if (config.antiDetection.automation.minDelayMs > config.antiDetection.automation.maxDelayMs) {
    errors.push("Automation minimum delay cannot exceed the maximum delay");
  }

  return errors;
}

/**
 * Validate an arbitrary value as a configuration.
 *
 * Shape errors are reported as `<path>: <message>`; semantic errors use the
 * sentences from `configRuleViolations`.
 */
export function validateConfig(input: unknown): ValidationResult<FingerprintConfig> {
  const parsed = fingerprintConfigSchema.safeParse(input);
  if (!parsed.success) {
    return {
      ok: false,
      errors: parsed.error.issues.map((issue) => {
        const path = issue.path.join(".");
        return path === "" ? issue.message : `${path}: ${issue.message}`;
      }),
    };
  }

  const violations = configRuleViolations(parsed.data);
  if (violations.length > 0) {
    return { ok: false, errors: violations };
  }
  return { ok: true, value: parsed.data };
}

/** Whether `input` is a valid configuration. */
export function isValidConfig(input: unknown): input is FingerprintConfig {
  return validateConfig(input).ok;
}

/**
 * Validate and return a fresh copy, or throw `ConfigValidationError`.
 * Intended for setup code; runtime updates go through `ConfigResolver`.
 */
export function assertValidConfig(input: unknown): FingerprintConfig {
  const result = validateConfig(input);
  if (!result.ok) {
    throw new ConfigValidationError(result.errors);
  }
  return result.value;
}
