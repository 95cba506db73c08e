import { silentLogger } from '@veilprint/core';
import type { AntiDetectionConfig, ConfigResolver, ContextId, Logger } from '@veilprint/core';
import type { StatisticsAggregator } from '@veilprint/monitoring';

export interface NavigatorSurface {
  userAgent: string;
  platform: string;
  language: string;
  languages: string[];
  hardwareConcurrency: number;
  deviceMemory: number;
  /** `false` when the webdriver flag is hidden, `null` to keep the native value. */
  webdriver: false | null;
  spoofPlugins: boolean;
  mimeTypes: string[];
}

export interface ScreenSurface {
  width: number;
  height: number;
  colorDepth: number;
  pixelDepth: number;
  devicePixelRatio: number;
  orientation: string;
}

export interface TimezoneSurface {
  timezone: string;
  offsetMinutes: number;
  spoofDateMethods: boolean;
}

export interface GeolocationSurface {
  latitude: number;
  longitude: number;
  accuracy: number;
}

export interface WebRTCSurface {
  disabled: boolean;
  maskLocalIps: boolean;
  publicIp: string;
  allowedIceServers: string[];
  blockDeviceEnumeration: boolean;
}

export interface SurfaceSpooferDeps {
  resolver: ConfigResolver;
  statistics: StatisticsAggregator;
  logger?: Logger;
  /** Process-wide switch; every getter returns `null` while it reads false. */
  isEnabled?: () => boolean;
}

// RFC 1918, loopback and link-local IPv4 addresses.
const PRIVATE_IPV4 =
  /\b(?:10(?:\.\d{1,3}){3}|127(?:\.\d{1,3}){3}|169\.254(?:\.\d{1,3}){2}|192\.168(?:\.\d{1,3}){2}|172\.(?:1[6-9]|2\d|3[01])(?:\.\d{1,3}){2})\b/g;
// mDNS host candidates (`<uuid>.local`).
const MDNS_HOST = /\b[0-9a-f-]{36}\.local\b/gi;

/**
 * Spoofed values for the non-rendering fingerprint surfaces: navigator,
 * screen, timezone, geolocation, fonts, WebRTC and automation markers.
 *
 * Every getter returns `null` when the relevant section (or the engine) is
 * disabled; the binding then keeps the native value.
 */
export class SurfaceSpoofer {
  private readonly _resolver: ConfigResolver;
  private readonly _statistics: StatisticsAggregator;
  private readonly _logger: Logger;
  private readonly _isEnabled: () => boolean;
  private readonly _operations = new Map<ContextId, number>();

  constructor(deps: SurfaceSpooferDeps) {
    this._resolver = deps.resolver;
    this._statistics = deps.statistics;
    this._logger = deps.logger ?? silentLogger;
    this._isEnabled = deps.isEnabled ?? (() => true);
  }

  navigator(contextId: ContextId): NavigatorSurface | null {
    if (!this._isEnabled()) return null;
    const config = this._resolver.resolveSection(contextId, 'navigator');
    if (!config.enabled) return null;

    this._count(contextId, 'navigator_properties_spoofed');
    return {
      userAgent: config.userAgent,
      platform: config.platform,
      language: config.languages[0] ?? 'en-US',
      languages: config.languages,
      hardwareConcurrency: config.hardwareConcurrency,
      deviceMemory: config.deviceMemory,
      webdriver: config.hideWebdriver ? false : null,
      spoofPlugins: config.spoofPlugins,
      mimeTypes: config.mimeTypes,
    };
  }

  screen(contextId: ContextId): ScreenSurface | null {
    if (!this._isEnabled()) return null;
    const { enabled, ...surface } = this._resolver.resolveSection(contextId, 'screen');
    if (!enabled) return null;
    this._count(contextId);
    return surface;
  }

  timezone(contextId: ContextId): TimezoneSurface | null {
    if (!this._isEnabled()) return null;
    const { enabled, ...surface } = this._resolver.resolveSection(contextId, 'timezone');
    if (!enabled) return null;
    this._count(contextId);
    return surface;
  }

  geolocation(contextId: ContextId): GeolocationSurface | null {
    if (!this._isEnabled()) return null;
    const config = this._resolver.resolveSection(contextId, 'geolocation');
    if (!config.enabled || !config.spoofLocation) return null;
    this._count(contextId, 'geolocation_requests_spoofed');
    return { latitude: config.latitude, longitude: config.longitude, accuracy: config.accuracy };
  }

  /** Whether a high-accuracy position request should be downgraded, or `null` when not spoofed. */
  blocksHighAccuracy(contextId: ContextId): boolean | null {
    if (!this._isEnabled()) return null;
    const config = this._resolver.resolveSection(contextId, 'geolocation');
    return config.enabled ? config.blockHighAccuracy : null;
  }

  /** Font list reported to enumeration APIs. */
  fonts(contextId: ContextId): string[] | null {
    if (!this._isEnabled()) return null;
    const config = this._resolver.resolveSection(contextId, 'font');
    if (!config.enabled || !config.spoofEnumeration) return null;
    this._count(contextId, 'font_enumerations_spoofed');
    return config.availableFonts;
  }

  webrtc(contextId: ContextId): WebRTCSurface | null {
    if (!this._isEnabled()) return null;
    const config = this._resolver.resolveSection(contextId, 'webrtc');
    if (!config.enabled) return null;
    this._count(contextId);
    return {
      disabled: config.disableWebrtc,
      maskLocalIps: config.maskLocalIps,
      publicIp: config.fakePublicIp,
      allowedIceServers: config.allowedIceServers,
      blockDeviceEnumeration: config.blockDeviceEnumeration,
    };
  }

  /**
   * Rewrite an ICE candidate line before it reaches the page. Returns
   * `null` to drop the candidate when WebRTC is disabled; otherwise
   * private IPv4 addresses and mDNS host names are replaced with the
   * configured public address.
   */
  maskIceCandidate(contextId: ContextId, candidate: string): string | null {
    if (!this._isEnabled()) return candidate;
    const config = this._resolver.resolveSection(contextId, 'webrtc');
    if (!config.enabled) return candidate;

    if (config.disableWebrtc) {
      this._count(contextId, 'webrtc_connections_protected');
      return null;
    }
    if (!config.maskLocalIps) return candidate;

    const masked = candidate.replace(PRIVATE_IPV4, config.fakePublicIp).replace(MDNS_HOST, config.fakePublicIp);
    if (masked !== candidate) {
      this._count(contextId, 'webrtc_connections_protected');
    }
    return masked;
  }

  antiDetection(contextId: ContextId): AntiDetectionConfig | null {
    if (!this._isEnabled()) return null;
    const config = this._resolver.resolveSection(contextId, 'antiDetection');
    if (!config.enabled) return null;
    this._count(contextId);
    return config;
  }

  /** Whether `navigator.webdriver` and related markers should read as absent. */
  shouldHideWebdriver(contextId: ContextId): boolean {
    if (!this._isEnabled()) return false;
    const navigator = this._resolver.resolveSection(contextId, 'navigator');
    const antiDetection = this._resolver.resolveSection(contextId, 'antiDetection');
    const hide =
      (navigator.enabled && navigator.hideWebdriver) ||
      (antiDetection.enabled && antiDetection.webdriver.hideWebdriverProperty);
    if (hide) this._count(contextId, 'webdriver_detections_blocked');
    return hide;
  }

  /** Whether a script (URL or source text) matches a blocked detection-script pattern. */
  isBlockedScript(contextId: ContextId, script: string): boolean {
    if (!this._isEnabled()) return false;
    const config = this._resolver.resolveSection(contextId, 'antiDetection');
    if (!config.enabled || !config.scriptBlocking.blockDetectionScripts) return false;

    const haystack = script.toLowerCase();
    const pattern = config.scriptBlocking.blockedScriptPatterns.find((p) => haystack.includes(p.toLowerCase()));
    if (pattern === undefined) return false;

    this._count(contextId, 'detection_scripts_blocked');
    this._logger.debug('Blocked detection script', { contextId, pattern });
    return true;
  }

  /** Spoofed surface reads served for `contextId`. */
  operationCount(contextId: ContextId): number {
    return this._operations.get(contextId) ?? 0;
  }

  /** Drop per-context counts. Returns whether any existed. */
  forget(contextId: ContextId): boolean {
    return this._operations.delete(contextId);
  }

  clear(): void {
    this._operations.clear();
  }

  private _count(contextId: ContextId, statistic?: string): void {
    this._operations.set(contextId, this.operationCount(contextId) + 1);
    if (statistic !== undefined) this._statistics.increment(statistic);
  }
}
