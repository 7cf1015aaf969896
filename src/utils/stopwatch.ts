export type Clock = () => number;

export interface Stopwatch {
  /** Elapsed time in milliseconds */
  elapsed(): number;
  /** Elapsed time as a human-readable string */
  display(): string;
}

export function formatDuration(ms: number): string {
  if (ms < 1000) return `${ms}ms`;
  return `${(ms / 1000).toFixed(1)}s`;
}

/**
 * Start a stopwatch against `now`, which defaults to the high-resolution clock.
 */
export function createStopwatch(now: Clock = () => performance.now()): Stopwatch {
  const start = now();

  return {
    elapsed(): number {
      return Math.round(now() - start);
    },

    display(): string {
      return formatDuration(this.elapsed());
    },
  };
}
