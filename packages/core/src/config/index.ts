export type {
  AntiDetectionConfig,
  AudioConfig,
  AutomationProtection,
  CanvasConfig,
  ConfigPatch,
  ConfigSection,
  FingerprintConfig,
  FontConfig,
  GeolocationConfig,
  NavigatorConfig,
  ScreenConfig,
  ScriptBlocking,
  TimezoneConfig,
  ValidationResult,
  WebDriverProtection,
  WebGLConfig,
  WebRTCConfig,
} from "./types.js";
export { CONFIG_SECTIONS } from "./types.js";
export {
  CONFIG_FORMAT_VERSION,
  DEFAULT_USER_AGENT,
  createDefaultConfig,
  defaultAntiDetectionConfig,
  defaultAudioConfig,
  defaultCanvasConfig,
  defaultFontConfig,
  defaultGeolocationConfig,
  defaultNavigatorConfig,
  defaultScreenConfig,
  defaultTimezoneConfig,
  defaultWebGLConfig,
  defaultWebRTCConfig,
} from "./defaults.js";
export {
  assertValidConfig,
  configRuleViolations,
  fingerprintConfigSchema,
  isValidConfig,
  validateConfig,
} from "./schema.js";
export { cloneConfig, configHash, deepFreeze, mergeConfig, stableStringify } from "./merge.js";
export { ConfigResolver, type ConfigResolverOptions } from "./resolver.js";
