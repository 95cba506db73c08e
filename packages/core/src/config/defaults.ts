import type { ClockFn } from "../context/types.js";
import type {
  AntiDetectionConfig,
  AudioConfig,
  CanvasConfig,
  FingerprintConfig,
  FontConfig,
  GeolocationConfig,
  NavigatorConfig,
  ScreenConfig,
  TimezoneConfig,
  WebGLConfig,
  WebRTCConfig,
} from "./types.js";

export const DEFAULT_USER_AGENT =
  "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36";

export const CONFIG_FORMAT_VERSION = "1.0.0";

const DEFAULT_FONTS = [
  "Arial", "Arial Black", "Calibri", "Cambria", "Comic Sans MS",
  "Consolas", "Courier New", "Georgia", "Impact", "Lucida Console",
  "Lucida Sans Unicode", "Microsoft Sans Serif", "Palatino Linotype",
  "Segoe UI", "Tahoma", "Times New Roman", "Trebuchet MS", "Verdana",
];

const DEFAULT_BLOCKED_PROPERTIES = [
  "webdriver", "__webdriver_evaluate", "__selenium_evaluate",
  "__webdriver_script_function", "__webdriver_script_func",
  "__webdriver_script_fn", "__fxdriver_evaluate", "__driver_unwrapped",
  "webdriver_id", "$chrome_asyncScriptInfo",
];

const DEFAULT_BLOCKED_SCRIPT_PATTERNS = [
  "puppeteer", "playwright", "selenium", "webdriver", "automation",
  "headless", "__nightmare", "_phantom", "callPhantom",
];

export function defaultCanvasConfig(): CanvasConfig {
  return {
    enabled: true,
    addNoise: true,
    noiseLevel: 0.1,
    spoofTextMetrics: true,
    protectDataUrl: true,
    protectImageData: true,
  };
}

export function defaultWebGLConfig(): WebGLConfig {
  return {
    enabled: true,
    vendor: "Google Inc. (Intel)",
    renderer: "ANGLE (Intel, Intel(R) UHD Graphics 620 Direct3D11 vs_5_0 ps_5_0, D3D11)",
    version: "OpenGL ES 2.0 (ANGLE 2.1.0.0)",
    shadingLanguageVersion: "OpenGL ES GLSL ES 1.00 (ANGLE 2.1.0.0)",
    extensions: [],
    parameters: {},
    addNoiseToBuffers: true,
    bufferNoiseLevel: 0.01,
  };
}

export function defaultNavigatorConfig(): NavigatorConfig {
  return {
    enabled: true,
    userAgent: DEFAULT_USER_AGENT,
    platform: "Win32",
    languages: ["en-US", "en"],
    hardwareConcurrency: 8,
    deviceMemory: 8,
    hideWebdriver: true,
    spoofPlugins: true,
    mimeTypes: [],
  };
}

export function defaultAudioConfig(): AudioConfig {
  return {
    enabled: true,
    addNoise: true,
    noiseLevel: 0.001,
    protectAnalyserNode: true,
    protectOfflineContext: true,
    sampleRate: 44100,
    bufferSize: 4096,
  };
}

export function defaultFontConfig(): FontConfig {
  return {
    enabled: true,
    spoofEnumeration: true,
    spoofMetrics: true,
    availableFonts: [...DEFAULT_FONTS],
    metricsOffsets: {},
  };
}

export function defaultWebRTCConfig(): WebRTCConfig {
  return {
    enabled: true,
    maskLocalIps: true,
    disableWebrtc: false,
    // TEST-NET-3 documentation range
    fakePublicIp: "203.0.113.1",
    allowedIceServers: [],
    blockDeviceEnumeration: true,
  };
}

export function defaultGeolocationConfig(): GeolocationConfig {
  return {
    enabled: true,
    spoofLocation: true,
    latitude: 40.7128,
    longitude: -74.006,
    accuracy: 10,
    blockHighAccuracy: true,
  };
}

export function defaultScreenConfig(): ScreenConfig {
  return {
    enabled: true,
    width: 1920,
    height: 1080,
    colorDepth: 24,
    pixelDepth: 24,
    devicePixelRatio: 1,
    orientation: "landscape-primary",
  };
}

export function defaultTimezoneConfig(): TimezoneConfig {
  return {
    enabled: true,
    timezone: "America/New_York",
    offsetMinutes: -300,
    spoofDateMethods: true,
  };
}

export function defaultAntiDetectionConfig(): AntiDetectionConfig {
  return {
    enabled: true,
    webdriver: {
      hideWebdriverProperty: true,
      hideAutomationFlags: true,
      spoofChromeRuntime: true,
      hideSeleniumVariables: true,
      blockedProperties: [...DEFAULT_BLOCKED_PROPERTIES],
    },
    automation: {
      hideHeadlessFlags: true,
      spoofUserInteraction: true,
      addHumanDelays: true,
      randomizeRequestTiming: true,
      minDelayMs: 100,
      maxDelayMs: 2000,
    },
    scriptBlocking: {
      detectPuppeteer: true,
      detectPlaywright: true,
      detectSelenium: true,
      blockDetectionScripts: true,
      blockedScriptPatterns: [...DEFAULT_BLOCKED_SCRIPT_PATTERNS],
    },
  };
}

/**
 * Build the built-in default configuration. Every call returns a fresh,
 * independently owned value.
 */
export function createDefaultConfig(clock: ClockFn = Date.now): FingerprintConfig {
  const now = clock();
  return {
    enabled: true,
    profileName: "default",
    deviceProfile: "windows_desktop",
    behaviorPattern: "normal_user",
    version: CONFIG_FORMAT_VERSION,
    createdAt: now,
    updatedAt: now,
    customScripts: [],
    canvas: defaultCanvasConfig(),
    webgl: defaultWebGLConfig(),
    navigator: defaultNavigatorConfig(),
    audio: defaultAudioConfig(),
    font: defaultFontConfig(),
    webrtc: defaultWebRTCConfig(),
    geolocation: defaultGeolocationConfig(),
    screen: defaultScreenConfig(),
    timezone: defaultTimezoneConfig(),
    antiDetection: defaultAntiDetectionConfig(),
  };
}
