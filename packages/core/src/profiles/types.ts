import type {
  AudioConfig,
  CanvasConfig,
  FontConfig,
  NavigatorConfig,
  ScreenConfig,
  WebGLConfig,
} from "../config/types.js";

/**
 * A named device persona. Each section holds only the fields the profile
 * pins; everything else comes from the configuration it is applied to.
 */
export interface DeviceProfile {
  name: string;
  description: string;
  navigator?: Partial<NavigatorConfig>;
  screen?: Partial<ScreenConfig>;
  canvas?: Partial<CanvasConfig>;
  webgl?: Partial<WebGLConfig>;
  audio?: Partial<AudioConfig>;
  font?: Partial<FontConfig>;
  customProperties: Record<string, string>;
}

export interface MouseBehavior {
  movementSpeed: number;
  clickDelayMs: number;
  addRandomMovements: boolean;
  randomMovementProbability: number;
}

export interface KeyboardBehavior {
  typingSpeedWpm: number;
  keyPressDelayMs: number;
  addTypingErrors: boolean;
  errorProbability: number;
}

export interface ScrollBehavior {
  scrollSpeed: number;
  smoothScrolling: boolean;
  pauseProbability: number;
  pauseDurationMs: number;
}

export interface InteractionBehavior {
  pageDwellTimeMs: number;
  simulateReading: boolean;
  linkClickProbability: number;
  formFillSpeed: number;
}

/** Human-input timing persona consumed by interaction simulators. */
export interface BehaviorPattern {
  name: string;
  description: string;
  mouse: MouseBehavior;
  keyboard: KeyboardBehavior;
  scroll: ScrollBehavior;
  interaction: InteractionBehavior;
}

export function defaultDeviceProfile(): DeviceProfile {
  return { name: "", description: "", customProperties: {} };
}

export function defaultBehaviorPattern(): BehaviorPattern {
  return {
    name: "",
    description: "",
    mouse: {
      movementSpeed: 1.0,
      clickDelayMs: 100,
      addRandomMovements: true,
      randomMovementProbability: 0.1,
    },
    keyboard: {
      typingSpeedWpm: 60,
      keyPressDelayMs: 50,
      addTypingErrors: true,
      errorProbability: 0.02,
    },
    scroll: {
      scrollSpeed: 1.0,
      smoothScrolling: true,
      pauseProbability: 0.3,
      pauseDurationMs: 500,
    },
    interaction: {
      pageDwellTimeMs: 5000,
      simulateReading: true,
      linkClickProbability: 0.8,
      formFillSpeed: 1.0,
    },
  };
}
