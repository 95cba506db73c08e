/**
 * Fingerprint configuration model.
 *
 * A `FingerprintConfig` is a plain, JSON-compatible value. Instances held by
 * `ConfigResolver` are deep-frozen; every value handed to a caller is an
 * independent copy.
 */

export interface CanvasConfig {
  enabled: boolean;
  addNoise: boolean;
  /** Pixel noise strength, 0.0-1.0. */
  noiseLevel: number;
  spoofTextMetrics: boolean;
  protectDataUrl: boolean;
  protectImageData: boolean;
}

export interface WebGLConfig {
  enabled: boolean;
  vendor: string;
  renderer: string;
  version: string;
  shadingLanguageVersion: string;
  /** Extensions always advertised, in addition to the filtered native list. */
  extensions: string[];
  /** Overrides for numeric limits, keyed by GL parameter name (e.g. `MAX_TEXTURE_SIZE`). */
  parameters: Record<string, string>;
  addNoiseToBuffers: boolean;
  /** Buffer/texture noise strength, 0.0-1.0. */
  bufferNoiseLevel: number;
}

export interface NavigatorConfig {
  enabled: boolean;
  userAgent: string;
  platform: string;
  languages: string[];
  hardwareConcurrency: number;
  /** In GiB. */
  deviceMemory: number;
  hideWebdriver: boolean;
  spoofPlugins: boolean;
  mimeTypes: string[];
}

export interface AudioConfig {
  enabled: boolean;
  addNoise: boolean;
  /** Sample noise strength, 0.0-1.0. */
  noiseLevel: number;
  protectAnalyserNode: boolean;
  protectOfflineContext: boolean;
  sampleRate: number;
  bufferSize: number;
}

export interface FontConfig {
  enabled: boolean;
  spoofEnumeration: boolean;
  spoofMetrics: boolean;
  availableFonts: string[];
  metricsOffsets: Record<string, number>;
}

export interface WebRTCConfig {
  enabled: boolean;
  maskLocalIps: boolean;
  disableWebrtc: boolean;
  fakePublicIp: string;
  allowedIceServers: string[];
  blockDeviceEnumeration: boolean;
}

export interface GeolocationConfig {
  enabled: boolean;
  spoofLocation: boolean;
  latitude: number;
  longitude: number;
  /** In meters. */
  accuracy: number;
  blockHighAccuracy: boolean;
}

export interface ScreenConfig {
  enabled: boolean;
  width: number;
  height: number;
  colorDepth: number;
  pixelDepth: number;
  devicePixelRatio: number;
  orientation: string;
}

export interface TimezoneConfig {
  enabled: boolean;
  /** IANA zone name. */
  timezone: string;
  /** Minutes from UTC as returned by `Date#getTimezoneOffset` (UTC-5 is -300 here). */
  offsetMinutes: number;
  spoofDateMethods: boolean;
}

export interface WebDriverProtection {
  hideWebdriverProperty: boolean;
  hideAutomationFlags: boolean;
  spoofChromeRuntime: boolean;
  hideSeleniumVariables: boolean;
  blockedProperties: string[];
}

export interface AutomationProtection {
  hideHeadlessFlags: boolean;
  spoofUserInteraction: boolean;
  addHumanDelays: boolean;
  randomizeRequestTiming: boolean;
  minDelayMs: number;
  maxDelayMs: number;
}

export interface ScriptBlocking {
  detectPuppeteer: boolean;
  detectPlaywright: boolean;
  detectSelenium: boolean;
  blockDetectionScripts: boolean;
  blockedScriptPatterns: string[];
}

export interface AntiDetectionConfig {
  enabled: boolean;
  webdriver: WebDriverProtection;
  automation: AutomationProtection;
  scriptBlocking: ScriptBlocking;
}

export interface FingerprintConfig {
  enabled: boolean;
  profileName: string;
  deviceProfile: string;
  behaviorPattern: string;
  version: string;
  /** ms epoch */
  createdAt: number;
  /** ms epoch */
  updatedAt: number;
  /** Opaque user scripts carried along for the injection layer; never executed here. */
  customScripts: string[];

  canvas: CanvasConfig;
  webgl: WebGLConfig;
  navigator: NavigatorConfig;
  audio: AudioConfig;
  font: FontConfig;
  webrtc: WebRTCConfig;
  geolocation: GeolocationConfig;
  screen: ScreenConfig;
  timezone: TimezoneConfig;
  antiDetection: AntiDetectionConfig;
}

/** Names of the protection-domain sections of a configuration. */
export type ConfigSection =
  | "canvas"
  | "webgl"
  | "navigator"
  | "audio"
  | "font"
  | "webrtc"
  | "geolocation"
  | "screen"
  | "timezone"
  | "antiDetection";

export const CONFIG_SECTIONS: readonly ConfigSection[] = [
  "canvas",
  "webgl",
  "navigator",
  "audio",
  "font",
  "webrtc",
  "geolocation",
  "screen",
  "timezone",
  "antiDetection",
];

/**
 * Partial update applied by `mergeConfig`. Section fields are merged
 * shallowly over the base section.
 */
export type ConfigPatch = {
  enabled?: boolean;
  profileName?: string;
  deviceProfile?: string;
  behaviorPattern?: string;
  version?: string;
} & { [S in ConfigSection]?: Partial<FingerprintConfig[S]> };

export type ValidationResult<T> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly errors: readonly string[] };
