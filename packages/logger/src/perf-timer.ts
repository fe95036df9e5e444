/**
 * @fileoverview Duration measurement for log entries (`duration_ms`).
 */

/**
 * Monotonic millisecond source. Defaults to `performance.now`.
 */
export type TimeSource = () => number;

export interface PerfTimer {
  /** Whole milliseconds since the timer started, frozen once stopped */
  elapsed(): number;

  /** Stops the timer; later calls return the same duration */
  stop(): number;

  readonly running: boolean;
}

/**
 * Starts a timer.
 *
 * @example
 * ```typescript
 * const timer = startTimer();
 * const rows = readSessionFile(path);
 * logger.debug('Sessions parsed', { count: rows.length, duration_ms: timer.stop() });
 * ```
 */
export function startTimer(now: TimeSource = () => performance.now()): PerfTimer {
  const startedAt = now();
  let stoppedAt: number | undefined;

  const since = (end: number): number => Math.round(end - startedAt);

  return {
    get running() {
      return stoppedAt === undefined;
    },

    elapsed(): number {
      return since(stoppedAt ?? now());
    },

    stop(): number {
      if (stoppedAt === undefined) {
        stoppedAt = now();
      }
      return since(stoppedAt);
    },
  };
}
