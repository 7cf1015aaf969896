import { TimerConfigSchema } from "./types.js";
import type { TimerConfig } from "./types.js";
import { log } from "./utils/logger.js";

// ─── Environment ─────────────────────────────────────────────────────────────

/** Env var selecting the default facility: console, performance, log or off */
export const FACILITY_ENV_VAR = "SCOPED_TIMER_FACILITY";

export const DEFAULT_CONFIG: TimerConfig = { facility: "console" };

type Env = Record<string, string | undefined>;

export function loadTimerConfig(env: Env = process.env): TimerConfig {
  const raw = env[FACILITY_ENV_VAR];
  const result = TimerConfigSchema.safeParse({
    facility: raw === undefined || raw.trim() === "" ? undefined : raw,
  });

  if (!result.success) {
    log.warn(
      `Ignoring invalid ${FACILITY_ENV_VAR}="${raw}": ${result.error.issues
        .map((i) => i.message)
        .join("; ")}. Falling back to "${DEFAULT_CONFIG.facility}"`,
    );
    return { ...DEFAULT_CONFIG };
  }

  return result.data;
}
