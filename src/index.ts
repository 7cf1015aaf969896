export { ScopedTimer } from "./timer.js";
export {
  consoleFacility,
  createFacility,
  createLoggingFacility,
  createPerformanceFacility,
  getDefaultFacility,
  noopFacility,
  performanceFacility,
  resetDefaultFacility,
  setDefaultFacility,
} from "./facilities.js";
export { FACILITY_ENV_VAR, loadTimerConfig } from "./config.js";
export { FACILITY_NAMES } from "./types.js";
export type { FacilityName, MeasurementFacility, TimerConfig, TimerState } from "./types.js";
export { createStopwatch, formatDuration } from "./utils/stopwatch.js";
export type { Clock, Stopwatch } from "./utils/stopwatch.js";
export type { Logger } from "./utils/logger.js";
