/**
 * Clock normalization for trading days that start the evening before.
 *
 * A trading day runs from the rollover (20:00 on the previous calendar day)
 * to the next rollover. Shifting every wall-clock value by
 * `SHIFT_OFFSET` and reducing modulo one day maps that span onto
 * `[0, MS_PER_DAY)`, so a 21:00 night open sorts before a 09:00 morning
 * open and both sort before a 15:00 close with plain integer comparison.
 *
 *   wall clock   20:00  21:00  00:00  02:30  09:00  15:00
 *   normalized   00:00  01:00  04:00  06:30  13:00  19:00
 *
 * Nothing outside this module deals with midnight.
 */

import { ConfigError } from '@sessionkit/contracts';
import type { ClockTime, TimeInput } from '@sessionkit/contracts';

export const MS_PER_SECOND = 1_000;
export const MS_PER_MINUTE = 60 * MS_PER_SECOND;
export const MS_PER_HOUR = 60 * MS_PER_MINUTE;
export const MS_PER_DAY = 24 * MS_PER_HOUR;
export const MINUTES_PER_DAY = MS_PER_DAY / MS_PER_MINUTE;

/**
 * Start of the trading day on the wall clock. Night legs open at 21:00;
 * nothing that belongs to the next trading day opens before 20:00.
 */
export const TRADING_DAY_ROLLOVER = 20 * MS_PER_HOUR;

/**
 * Added to every wall-clock value so that the rollover lands on zero.
 */
export const SHIFT_OFFSET = MS_PER_DAY - TRADING_DAY_ROLLOVER;

/**
 * Unit for durations handed back to callers.
 */
export type ClockResolution = 'millisecond' | 'second' | 'minute';

const RESOLUTION_DIVISOR: Record<ClockResolution, number> = {
  millisecond: 1,
  second: MS_PER_SECOND,
  minute: MS_PER_MINUTE,
};

function checkField(name: string, value: number, max: number): void {
  if (!Number.isInteger(value) || value < 0 || value > max) {
    throw new ConfigError(`Invalid ${name} ${value}: expected an integer in 0..${max}`, {
      reason: 'time_out_of_range',
      field: name,
      value,
    });
  }
}

/**
 * Milliseconds since midnight for the given clock fields.
 *
 * @throws {ConfigError} When a field is outside its range
 *
 * @example
 * ```typescript
 * clockMillis(9, 30); // 34_200_000
 * ```
 */
export function clockMillis(hour: number, minute: number, second = 0, millisecond = 0): number {
  checkField('hour', hour, 23);
  checkField('minute', minute, 59);
  checkField('second', second, 59);
  checkField('millisecond', millisecond, 999);
  return hour * MS_PER_HOUR + minute * MS_PER_MINUTE + second * MS_PER_SECOND + millisecond;
}

/**
 * Milliseconds since midnight for any time input.
 *
 * Numbers are reduced modulo one day. A fractional millisecond rounds up:
 * an instant just past a boundary belongs to the unit that follows it.
 */
export function rawMillis(time: TimeInput): number {
  if (typeof time === 'number') {
    if (!Number.isFinite(time) || time < 0) {
      throw new ConfigError(`Invalid time ${time}: expected non-negative milliseconds since midnight`, {
        reason: 'time_out_of_range',
        value: time,
      });
    }
    return Math.ceil(time) % MS_PER_DAY;
  }
  return clockMillis(time.hour, time.minute, time.second ?? 0, time.millisecond ?? 0);
}

/**
 * Position of a wall-clock value within the trading day.
 */
export function normalize(time: TimeInput): number {
  return (rawMillis(time) + SHIFT_OFFSET) % MS_PER_DAY;
}

/**
 * As {@link normalize}, for a closing boundary: a close at the rollover
 * ends the trading day instead of starting the next one.
 */
export function normalizeEnd(time: TimeInput): number {
  const marker = normalize(time);
  return marker === 0 ? MS_PER_DAY : marker;
}

/**
 * Back from a normalized marker to milliseconds since midnight.
 */
export function denormalize(marker: number): number {
  return (((marker - SHIFT_OFFSET) % MS_PER_DAY) + MS_PER_DAY) % MS_PER_DAY;
}

export function toResolution(ms: number, unit: ClockResolution = 'millisecond'): number {
  return Math.floor(ms / RESOLUTION_DIVISOR[unit]);
}

function pad(value: number, width = 2): string {
  return String(value).padStart(width, '0');
}

/**
 * Formats milliseconds since midnight as `HH:MM`, widening to `HH:MM:SS`
 * or `HH:MM:SS.mmm` only when those parts are non-zero.
 *
 * @example
 * ```typescript
 * formatClock(9 * MS_PER_HOUR);                  // '09:00'
 * formatClock(9 * MS_PER_HOUR + 1_500);          // '09:00:01.500'
 * ```
 */
export function formatClock(ms: number): string {
  const value = rawMillis(ms);
  const hours = Math.floor(value / MS_PER_HOUR);
  const minutes = Math.floor((value % MS_PER_HOUR) / MS_PER_MINUTE);
  const seconds = Math.floor((value % MS_PER_MINUTE) / MS_PER_SECOND);
  const millis = value % MS_PER_SECOND;

  let text = `${pad(hours)}:${pad(minutes)}`;
  if (seconds !== 0 || millis !== 0) {
    text += `:${pad(seconds)}`;
  }
  if (millis !== 0) {
    text += `.${pad(millis, 3)}`;
  }
  return text;
}

const CLOCK_PATTERN = /^(\d{1,2}):(\d{2})(?::(\d{2})(?:\.(\d{1,3}))?)?$/;

/**
 * Parses `H:MM`, `HH:MM`, `HH:MM:SS` or `HH:MM:SS.mmm`.
 *
 * @throws {ConfigError} On any other text or out-of-range fields
 */
export function parseClock(text: string): ClockTime {
  const match = CLOCK_PATTERN.exec(text.trim());
  if (!match) {
    throw new ConfigError(`Invalid time "${text}": expected HH:MM[:SS[.mmm]]`, {
      reason: 'time_out_of_range',
      value: text,
    });
  }

  const [, hourText = '0', minuteText = '0', secondText = '0', fraction = ''] = match;
  const time: ClockTime = {
    hour: Number(hourText),
    minute: Number(minuteText),
    second: Number(secondText),
    millisecond: fraction === '' ? 0 : Number(fraction.padEnd(3, '0')),
  };
  clockMillis(time.hour, time.minute, time.second, time.millisecond);
  return time;
}
