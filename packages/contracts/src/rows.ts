/**
 * @fileoverview Row types exchanged between the configuration loader and
 * the session registry.
 *
 * @module @sessionkit/contracts/rows
 */

/**
 * Wall-clock time of day in the reference clock.
 *
 * @example
 * ```typescript
 * const nightOpen: ClockTime = { hour: 21, minute: 0 };
 * const lastTick: ClockTime = { hour: 14, minute: 59, second: 59, millisecond: 500 };
 * ```
 */
export interface ClockTime {
  hour: number;
  minute: number;
  second?: number;
  millisecond?: number;
}

/**
 * A time of day, either as milliseconds since midnight or as clock fields.
 */
export type TimeInput = number | ClockTime;

/**
 * One trading slice `[begin, end)` as written in configuration.
 * `end` may be earlier on the clock than `begin` for a night leg that
 * crosses midnight (21:00 → 02:30).
 */
export interface SliceSpec {
  begin: ClockTime;
  end: ClockTime;
}

/**
 * One configuration row: a product code and its slices.
 */
export interface SessionRow {
  /** Product code, e.g. "ag", "IF", "rb" */
  product: string;

  /** Exchange code when the source carries one, e.g. "SHFE" */
  exchange?: string;

  /** Slices in source order; need not be sorted or disjoint */
  slices: SliceSpec[];

  /** 1-based source line, when the row came from text */
  line?: number;
}
