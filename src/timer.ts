import { getDefaultFacility } from "./facilities.js";
import type { MeasurementFacility, TimerState } from "./types.js";

/**
 * A labeled time measurement that starts when constructed and ends once.
 *
 * `ScopedTimer.scope` and `ScopedTimer.scopeAsync` tie the measurement to a
 * closure so it ends on every exit path, including a thrown error:
 *
 *   const value = ScopedTimer.scope("parse", () => parse(source));
 *
 * A timer created with `new` must be ended by the caller, usually in `finally`.
 */
export class ScopedTimer {
  readonly label: string;
  readonly #facility: MeasurementFacility;
  #state: TimerState = "active";

  constructor(label: string, facility: MeasurementFacility = getDefaultFacility()) {
    this.label = label;
    this.#facility = facility;
    facility.begin(label);
  }

  get state(): TimerState {
    return this.#state;
  }

  get isActive(): boolean {
    return this.#state === "active";
  }

  /**
   * Send the end signal. Only the first call reaches the facility; the timer
   * counts as ended even if the facility throws.
   */
  end(): void {
    if (this.#state === "ended") return;
    this.#state = "ended";
    this.#facility.end(this.label);
  }

  static scope<T>(label: string, body: () => T, facility?: MeasurementFacility): T {
    const timer = new ScopedTimer(label, facility);
    try {
      return body();
    } finally {
      timer.end();
    }
  }

  /** Like `scope`, but the measurement ends once the returned promise settles */
  static async scopeAsync<T>(
    label: string,
    body: () => Promise<T>,
    facility?: MeasurementFacility,
  ): Promise<T> {
    const timer = new ScopedTimer(label, facility);
    try {
      return await body();
    } finally {
      timer.end();
    }
  }
}
