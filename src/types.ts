import { z } from "zod";

// ─── Measurement Facility ────────────────────────────────────────────────────

/**
 * The external side of a timer: something that records the time between
 * a `begin` and an `end` carrying the same label.
 */
export interface MeasurementFacility {
  begin(label: string): void;
  end(label: string): void;
}

export const FACILITY_NAMES = ["console", "performance", "log", "off"] as const;
export type FacilityName = (typeof FACILITY_NAMES)[number];

export const FacilityNameSchema = z
  .string()
  .transform((value) => value.trim().toLowerCase())
  .pipe(z.enum(FACILITY_NAMES))
  .describe("Which measurement facility timers use when none is given");

// ─── Configuration ───────────────────────────────────────────────────────────

export const TimerConfigSchema = z.object({
  facility: FacilityNameSchema.default("console"),
});

export type TimerConfig = z.infer<typeof TimerConfigSchema>;

// ─── Timer State ─────────────────────────────────────────────────────────────

export type TimerState = "active" | "ended";
