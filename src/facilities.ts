import { loadTimerConfig } from "./config.js";
import type { FacilityName, MeasurementFacility } from "./types.js";
import { log } from "./utils/logger.js";
import type { Logger } from "./utils/logger.js";
import { createStopwatch } from "./utils/stopwatch.js";
import type { Clock, Stopwatch } from "./utils/stopwatch.js";

// ─── Built-in Facilities ─────────────────────────────────────────────────────

/** `console.time` / `console.timeEnd` */
export const consoleFacility: MeasurementFacility = {
  begin: (label) => console.time(label),
  end: (label) => console.timeEnd(label),
};

/**
 * User Timing marks, one `<label>:begin:<n>` / `<label>:end:<n>` pair per
 * measurement, joined into a measure named after the label. Repeated begins
 * for one label nest: each end pairs with the latest open begin. Marks are
 * cleared once measured; measures stay in the performance timeline until the
 * host clears them with `performance.clearMeasures(label)`.
 */
export function createPerformanceFacility(): MeasurementFacility {
  const open = new Map<string, number[]>();
  let sequence = 0;

  return {
    begin(label) {
      const id = ++sequence;
      performance.mark(`${label}:begin:${id}`);
      const stack = open.get(label) ?? [];
      stack.push(id);
      open.set(label, stack);
    },
    end(label) {
      const stack = open.get(label);
      const id = stack?.pop();
      if (!stack || id === undefined) {
        throw new Error(`No measurement in progress for "${label}"`);
      }
      if (stack.length === 0) open.delete(label);

      const beginMark = `${label}:begin:${id}`;
      const endMark = `${label}:end:${id}`;
      try {
        performance.mark(endMark);
        performance.measure(label, beginMark, endMark);
      } finally {
        performance.clearMarks(beginMark);
        performance.clearMarks(endMark);
      }
    },
  };
}

export const performanceFacility: MeasurementFacility = createPerformanceFacility();

export const noopFacility: MeasurementFacility = {
  begin: () => {},
  end: () => {},
};

/**
 * Log `<label>: <duration>` through the package logger when a measurement ends.
 * Repeated begins for one label nest: each end pairs with the latest open begin.
 */
export function createLoggingFacility(
  logger: Logger = log,
  now?: Clock,
): MeasurementFacility {
  const open = new Map<string, Stopwatch[]>();

  return {
    begin(label) {
      const stack = open.get(label) ?? [];
      stack.push(createStopwatch(now));
      open.set(label, stack);
    },
    end(label) {
      const stack = open.get(label);
      const stopwatch = stack?.pop();
      if (!stack || !stopwatch) {
        logger.warn(`No measurement in progress for "${label}"`);
        return;
      }
      if (stack.length === 0) open.delete(label);
      logger.info(`${label}: ${stopwatch.display()}`);
    },
  };
}

export function createFacility(name: FacilityName): MeasurementFacility {
  switch (name) {
    case "console":
      return consoleFacility;
    case "performance":
      return performanceFacility;
    case "log":
      return createLoggingFacility();
    case "off":
      return noopFacility;
  }
}

// ─── Default Facility ────────────────────────────────────────────────────────

let defaultFacility: MeasurementFacility | undefined;

/** The facility used by timers created without one; resolved from env on first use */
export function getDefaultFacility(): MeasurementFacility {
  if (!defaultFacility) {
    defaultFacility = createFacility(loadTimerConfig().facility);
  }
  return defaultFacility;
}

export function setDefaultFacility(facility: MeasurementFacility): void {
  defaultFacility = facility;
}

export function resetDefaultFacility(): void {
  defaultFacility = undefined;
}
