/**
 * Hand-driven clock for components that take a `clock: () => number`.
 *
 * @example
 * ```ts
 * const clock = new ManualClock(1000);
 * const detector = new UsagePatternDetector({ clock: clock.now });
 * clock.advance(250);
 * ```
 */
export class ManualClock {
  private _time: number;

  constructor(start = 0) {
    this._time = start;
  }

  /** Bound so it can be passed directly as a `ClockFn`. */
  readonly now = (): number => this._time;

  advance(ms: number): number {
    this._time += ms;
    return this._time;
  }

  set(time: number): void {
    this._time = time;
  }
}
