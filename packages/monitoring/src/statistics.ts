import { silentLogger } from "@veilprint/core";
import type { ClockFn, Logger } from "@veilprint/core";

/** Counter names reported even before they are first incremented. */
export const WELL_KNOWN_STATISTICS = [
  "total_frames_protected",
  "canvas_operations_spoofed",
  "webgl_parameters_spoofed",
  "navigator_properties_spoofed",
  "webdriver_detections_blocked",
  "audio_contexts_protected",
  "font_enumerations_spoofed",
  "geolocation_requests_spoofed",
  "webrtc_connections_protected",
] as const;

export type WellKnownStatistic = (typeof WELL_KNOWN_STATISTICS)[number];

export interface StatisticsSnapshot {
  /** ms epoch when the snapshot was taken. */
  takenAt: number;
  /** ms epoch of construction or the last reset. */
  since: number;
  /** Counter values; well-known names first, then others in first-use order. */
  counters: Record<string, number>;
}

export type StatisticsListener = (name: string, value: number) => void;

export interface StatisticsConfig {
  clock?: ClockFn;
  logger?: Logger;
}

/**
 * Named, monotonically increasing counters shared by every protection
 * path. Values only move up, except through `reset()`.
 *
 * Statistics are observational: nothing reads them to make a protection
 * decision.
 *
 * Thread-safety: not thread-safe. Designed for single-threaded Node.js use.
 */
export class StatisticsAggregator {
  private readonly _clock: ClockFn;
  private readonly _logger: Logger;
  private readonly _counters = new Map<string, number>();
  private readonly _listeners: StatisticsListener[] = [];
  private _since: number;

  constructor(config: StatisticsConfig = {}) {
    this._clock = config.clock ?? Date.now;
    this._logger = config.logger ?? silentLogger;
    this._since = this._clock();
  }

  /**
   * Add `by` to `name` and return the new value. Negative, fractional or
   * non-finite amounts are ignored with a warning.
   */
  increment(name: string, by = 1): number {
    if (!Number.isSafeInteger(by) || by < 0) {
      this._logger.warn("Ignoring invalid statistics increment", { name, by });
      return this.get(name);
    }
    const value = this.get(name) + by;
    this._counters.set(name, value);
    this._notifyListeners(name, value);
    return value;
  }

  /** Current value; 0 for names never incremented. */
  get(name: string): number {
    return this._counters.get(name) ?? 0;
  }

  snapshot(): StatisticsSnapshot {
    const counters: Record<string, number> = {};
    for (const name of WELL_KNOWN_STATISTICS) {
      counters[name] = this.get(name);
    }
    for (const [name, value] of this._counters) {
      counters[name] = value;
    }
    return { takenAt: this._clock(), since: this._since, counters };
  }

  /** Zero every counter. */
  reset(): void {
    const total = [...this._counters.values()].reduce((sum, v) => sum + v, 0);
    this._counters.clear();
    this._since = this._clock();
    this._logger.info("Statistics reset", { discarded: total });
  }

  /**
   * Register a listener called after every increment.
   * Returns an unsubscribe function.
   */
  onIncrement(listener: StatisticsListener): () => void {
    this._listeners.push(listener);
    return () => {
      const idx = this._listeners.indexOf(listener);
      if (idx >= 0) this._listeners.splice(idx, 1);
    };
  }

  private _notifyListeners(name: string, value: number): void {
    const listeners = [...this._listeners];
    for (const listener of listeners) {
      try {
        listener(name, value);
      } catch (err) {
        this._logger.error("StatisticsAggregator: listener threw during notification", {
          name,
          error: err instanceof Error ? err.message : String(err),
        });
      }
    }
  }
}
