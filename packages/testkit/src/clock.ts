/**
 * Controllable time for cache expiry tests
 */

/**
 * Clock that only moves when told to
 */
export class ManualClock {
  #nowMs: number;

  constructor(start: Date | number = Date.UTC(2024, 0, 1)) {
    this.#nowMs = typeof start === "number" ? start : start.getTime();
  }

  /**
   * Current time in epoch milliseconds; pass as `now` to writer components
   */
  readonly now = (): number => this.#nowMs;

  advance(ms: number): void {
    this.#nowMs += ms;
  }

  set(time: Date | number): void {
    this.#nowMs = typeof time === "number" ? time : time.getTime();
  }
}

export const HOUR_MS = 60 * 60 * 1000;
