import { readFileSync } from "node:fs";

import { z } from "zod";

import { mergeConfig } from "../config/merge.js";
import {
  audioSchema,
  canvasSchema,
  fontSchema,
  navigatorSchema,
  screenSchema,
  webglSchema,
} from "../config/schema.js";
import type { FingerprintConfig } from "../config/types.js";
import { silentLogger, type Logger } from "../logging/logger.js";
import {
  defaultBehaviorPattern,
  defaultDeviceProfile,
  type BehaviorPattern,
  type DeviceProfile,
} from "./types.js";

const deviceProfileEntrySchema = z.object({
  description: z.string().default(""),
  navigator: navigatorSchema.partial().optional(),
  screen: screenSchema.partial().optional(),
  canvas: canvasSchema.partial().optional(),
  webgl: webglSchema.partial().optional(),
  audio: audioSchema.partial().optional(),
  font: fontSchema.partial().optional(),
  customProperties: z.record(z.string()).default({}),
});

const base = defaultBehaviorPattern();

const behaviorPatternEntrySchema = z.object({
  description: z.string().default(""),
  mouse: z
    .object({
      movementSpeed: z.number().positive().default(base.mouse.movementSpeed),
      clickDelayMs: z.number().nonnegative().default(base.mouse.clickDelayMs),
      addRandomMovements: z.boolean().default(base.mouse.addRandomMovements),
      randomMovementProbability: z.number().min(0).max(1).default(base.mouse.randomMovementProbability),
    })
    .default({}),
  keyboard: z
    .object({
      typingSpeedWpm: z.number().positive().default(base.keyboard.typingSpeedWpm),
      keyPressDelayMs: z.number().nonnegative().default(base.keyboard.keyPressDelayMs),
      addTypingErrors: z.boolean().default(base.keyboard.addTypingErrors),
      errorProbability: z.number().min(0).max(1).default(base.keyboard.errorProbability),
    })
    .default({}),
  scroll: z
    .object({
      scrollSpeed: z.number().positive().default(base.scroll.scrollSpeed),
      smoothScrolling: z.boolean().default(base.scroll.smoothScrolling),
      pauseProbability: z.number().min(0).max(1).default(base.scroll.pauseProbability),
      pauseDurationMs: z.number().int().nonnegative().default(base.scroll.pauseDurationMs),
    })
    .default({}),
  interaction: z
    .object({
      pageDwellTimeMs: z.number().nonnegative().default(base.interaction.pageDwellTimeMs),
      simulateReading: z.boolean().default(base.interaction.simulateReading),
      linkClickProbability: z.number().min(0).max(1).default(base.interaction.linkClickProbability),
      formFillSpeed: z.number().positive().default(base.interaction.formFillSpeed),
    })
    .default({}),
});

const profilesDocumentSchema = z.object({ profiles: z.record(z.unknown()) });
const patternsDocumentSchema = z.object({ patterns: z.record(z.unknown()) });

const BUILTIN_PROFILES_URL = new URL("../../data/device-profiles.json", import.meta.url);
const BUILTIN_PATTERNS_URL = new URL("../../data/behavior-patterns.json", import.meta.url);

export interface ProfileCatalogOptions {
  /** Default: silent. */
  logger?: Logger;
}

/**
 * Named device profiles and behavior patterns.
 *
 * Lookups never fail: an unknown name yields the default-constructed value
 * and a warning.
 */
export class ProfileCatalog {
  private readonly logger: Logger;
  private readonly profiles = new Map<string, DeviceProfile>();
  private readonly patterns = new Map<string, BehaviorPattern>();

  constructor(options: ProfileCatalogOptions = {}) {
    this.logger = options.logger ?? silentLogger;
  }

  /** A catalog preloaded with the profiles and patterns shipped in `data/`. */
  static withBuiltins(options: ProfileCatalogOptions = {}): ProfileCatalog {
    const catalog = new ProfileCatalog(options);
    catalog.registerProfilesFrom(JSON.parse(readFileSync(BUILTIN_PROFILES_URL, "utf8")));
    catalog.registerPatternsFrom(JSON.parse(readFileSync(BUILTIN_PATTERNS_URL, "utf8")));
    return catalog;
  }

  registerProfile(profile: DeviceProfile): void {
    this.profiles.set(profile.name, structuredClone(profile));
  }

  registerPattern(pattern: BehaviorPattern): void {
    this.patterns.set(pattern.name, structuredClone(pattern));
  }

  /**
   * Register every entry of a `{ "profiles": { <name>: {...} } }` document.
   * Entries that fail validation are skipped with a warning.
   *
   * @returns Number of profiles registered.
   */
  registerProfilesFrom(document: unknown): number {
    const parsed = profilesDocumentSchema.safeParse(document);
    if (!parsed.success) {
      this.logger.warn("Device profile document is missing a 'profiles' object");
      return 0;
    }

    let registered = 0;
    for (const [name, entry] of Object.entries(parsed.data.profiles)) {
      const result = deviceProfileEntrySchema.safeParse(entry);
      if (!result.success) {
        this.logger.warn("Skipping invalid device profile", {
          name,
          issues: result.error.issues.map((issue) => issue.message),
        });
        continue;
      }
      this.registerProfile({ name, ...result.data });
      registered++;
    }
    this.logger.info("Loaded device profiles", { count: registered });
    return registered;
  }

  /**
   * Register every entry of a `{ "patterns": { <name>: {...} } }` document.
   * Missing fields take the default pattern's values.
   *
   * @returns Number of patterns registered.
   */
  registerPatternsFrom(document: unknown): number {
    const parsed = patternsDocumentSchema.safeParse(document);
    if (!parsed.success) {
      this.logger.warn("Behavior pattern document is missing a 'patterns' object");
      return 0;
    }

    let registered = 0;
    for (const [name, entry] of Object.entries(parsed.data.patterns)) {
      const result = behaviorPatternEntrySchema.safeParse(entry);
      if (!result.success) {
        this.logger.warn("Skipping invalid behavior pattern", {
          name,
          issues: result.error.issues.map((issue) => issue.message),
        });
        continue;
      }
      this.registerPattern({ name, ...result.data });
      registered++;
    }
    this.logger.info("Loaded behavior patterns", { count: registered });
    return registered;
  }

  getProfile(name: string): DeviceProfile {
    const profile = this.profiles.get(name);
    if (profile === undefined) {
      this.logger.warn("Device profile not found", { name });
      return defaultDeviceProfile();
    }
    return structuredClone(profile);
  }

  getPattern(name: string): BehaviorPattern {
    const pattern = this.patterns.get(name);
    if (pattern === undefined) {
      this.logger.warn("Behavior pattern not found", { name });
      return defaultBehaviorPattern();
    }
    return structuredClone(pattern);
  }

  hasProfile(name: string): boolean {
    return this.profiles.has(name);
  }

  hasPattern(name: string): boolean {
    return this.patterns.has(name);
  }

  /** Registered profile names, sorted. */
  listProfiles(): string[] {
    return [...this.profiles.keys()].sort();
  }

  /** Registered pattern names, sorted. */
  listPatterns(): string[] {
    return [...this.patterns.keys()].sort();
  }
}

/**
 * Overlay a device profile's sections on `config`. The result is not
 * validated; pass it through `ConfigResolver` to install it.
 */
export function applyDeviceProfile(config: FingerprintConfig, profile: DeviceProfile): FingerprintConfig {
  return mergeConfig(config, {
    deviceProfile: profile.name === "" ? undefined : profile.name,
    navigator: profile.navigator,
    screen: profile.screen,
    canvas: profile.canvas,
    webgl: profile.webgl,
    audio: profile.audio,
    font: profile.font,
  });
}
