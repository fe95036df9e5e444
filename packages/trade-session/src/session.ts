/**
 * Trading session: one instrument's daily slices as a canonical marker
 * sequence.
 *
 * A session is built in two phases. While open, `addSlice` records
 * normalized `[start, end)` pairs in any order. `seal()` sorts them, merges
 * overlapping or touching pairs and freezes the result as a strictly
 * ascending, even-length marker array `[open0, close0, open1, close1, ...]`.
 * Every query runs against that array, so the open phase must stay with the
 * code building the session.
 */

import { ConfigError } from '@sessionkit/contracts';
import type { ClockTime, SliceSpec, TimeInput } from '@sessionkit/contracts';
import {
  MINUTES_PER_DAY,
  MS_PER_DAY,
  MS_PER_MINUTE,
  SHIFT_OFFSET,
  denormalize,
  formatClock,
  normalize,
  normalizeEnd,
  toResolution,
  type ClockResolution,
} from './clock.js';

/**
 * Window in which a slice start counts as the morning open, `[from, to)`.
 */
export interface MorningWindow {
  from: TimeInput;
  to: TimeInput;
}

export const DEFAULT_MORNING_WINDOW: MorningWindow = {
  from: { hour: 6, minute: 0 },
  to: { hour: 11, minute: 0 },
};

export interface SessionOptions {
  /**
   * Where to look for the day leg of a dual-leg session.
   * @default 06:00 to 11:00
   */
  morningWindow?: MorningWindow;
}

/**
 * One canonical slice, as milliseconds since midnight. `end` is earlier
 * than `begin` for a slice that crosses midnight.
 */
export interface SliceBounds {
  begin: number;
  end: number;
}

/**
 * Index of the first element greater than `value`.
 */
function upperBound(sorted: readonly number[], value: number): number {
  let lo = 0;
  let hi = sorted.length;
  while (lo < hi) {
    const mid = (lo + hi) >>> 1;
    const current = sorted[mid];
    if (current !== undefined && current <= value) {
      lo = mid + 1;
    } else {
      hi = mid;
    }
  }
  return lo;
}

function labelOf(marker: number): string {
  return formatClock(denormalize(marker));
}

export class Session {
  private pending: Array<[number, number]> = [];
  private sealedMarkers: readonly number[] | null = null;
  private readonly morningFrom: number;
  private readonly morningTo: number;

  constructor(options: SessionOptions = {}) {
    const window = options.morningWindow ?? DEFAULT_MORNING_WINDOW;
    this.morningFrom = normalize(window.from);
    this.morningTo = normalizeEnd(window.to);
    if (this.morningTo <= this.morningFrom) {
      throw new ConfigError('Morning window must end after it begins', {
        reason: 'invalid_slice',
        from: labelOf(this.morningFrom),
        to: labelOf(this.morningTo),
      });
    }
  }

  /**
   * Builds and seals a session from configuration slices.
   *
   * @example
   * ```typescript
   * const ag = Session.fromSlices([
   *   { begin: { hour: 21, minute: 0 }, end: { hour: 2, minute: 30 } },
   *   { begin: { hour: 9, minute: 0 }, end: { hour: 10, minute: 15 } },
   * ]);
   * ```
   */
  static fromSlices(slices: Iterable<SliceSpec>, options?: SessionOptions): Session {
    const session = new Session(options);
    for (const slice of slices) {
      session.addSliceBetween(slice.begin, slice.end);
    }
    return session.seal();
  }

  /**
   * Rebuilds a sealed session from a sequence produced by `markers()`.
   *
   * @throws {ConfigError} Unless the sequence is even-length, strictly
   *   ascending and within one trading day
   */
  static fromMarkers(markers: readonly number[], options?: SessionOptions): Session {
    if (markers.length % 2 !== 0) {
      throw new ConfigError(`Marker sequence must have even length, got ${markers.length}`, {
        reason: 'invalid_markers',
        length: markers.length,
      });
    }

    let previous = -1;
    for (const [index, marker] of markers.entries()) {
      if (!Number.isInteger(marker) || marker < 0 || marker > MS_PER_DAY) {
        throw new ConfigError(`Marker ${marker} at index ${index} is outside the trading day`, {
          reason: 'invalid_markers',
          index,
          marker,
        });
      }
      if (marker <= previous) {
        throw new ConfigError(`Markers must be strictly ascending; index ${index} is ${marker} after ${previous}`, {
          reason: 'invalid_markers',
          index,
          marker,
        });
      }
      previous = marker;
    }

    const session = new Session(options);
    session.sealedMarkers = Object.freeze([...markers]);
    return session;
  }

  /**
   * Rebuilds a sealed session from normalized minute indices, each covering
   * `[minute, minute + 1)`. Consecutive minutes join into one slice.
   */
  static fromMinutes(minutes: Iterable<number>, options?: SessionOptions): Session {
    const sorted = [...new Set(minutes)].sort((a, b) => a - b);
    const markers: number[] = [];

    for (const minute of sorted) {
      if (!Number.isInteger(minute) || minute < 0 || minute >= MINUTES_PER_DAY) {
        throw new ConfigError(`Minute index ${minute} is outside the trading day`, {
          reason: 'invalid_markers',
          minute,
        });
      }
      const begin = minute * MS_PER_MINUTE;
      const last = markers.length - 1;
      if (markers[last] === begin) {
        markers[last] = begin + MS_PER_MINUTE;
      } else {
        markers.push(begin, begin + MS_PER_MINUTE);
      }
    }

    return Session.fromMarkers(markers, options);
  }

  /**
   * Every moment covered by any of `sessions`, e.g. the hours during which
   * at least one traded product is open.
   */
  static union(sessions: Iterable<Session>, options?: SessionOptions): Session {
    const combined = new Session(options);
    for (const session of sessions) {
      const markers = session.canonical();
      for (let i = 0; i < markers.length; i += 2) {
        const start = markers[i];
        const end = markers[i + 1];
        if (start !== undefined && end !== undefined) {
          combined.pending.push([start, end]);
        }
      }
    }
    return combined.seal();
  }

  get isSealed(): boolean {
    return this.sealedMarkers !== null;
  }

  /**
   * Records `[start, end)` from hour/minute pairs. A night leg is written
   * as it reads on the clock: `addSlice(21, 0, 2, 30)`.
   *
   * @throws {ConfigError} When the end does not follow the start within the
   *   trading day, a field is out of range, or the session is sealed
   */
  addSlice(startHour: number, startMinute: number, endHour: number, endMinute: number): this {
    const begin: ClockTime = { hour: startHour, minute: startMinute };
    const end: ClockTime = { hour: endHour, minute: endMinute };
    return this.addSliceBetween(begin, end);
  }

  addSliceBetween(begin: TimeInput, end: TimeInput): this {
    if (this.sealedMarkers !== null) {
      throw new ConfigError('Cannot add a slice to a sealed session', { reason: 'sealed' });
    }

    const start = normalize(begin);
    const stop = normalizeEnd(end);
    if (stop <= start) {
      throw new ConfigError(`Slice ${labelOf(start)}-${labelOf(stop)} ends before it starts`, {
        reason: 'invalid_slice',
        begin: labelOf(start),
        end: labelOf(stop),
      });
    }

    this.pending.push([start, stop]);
    return this;
  }

  /**
   * Sorts and merges the recorded slices into the canonical marker
   * sequence. Calling it again is a no-op.
   */
  seal(): this {
    if (this.sealedMarkers !== null) {
      return this;
    }

    const ordered = [...this.pending].sort((a, b) => a[0] - b[0]);
    const merged: Array<[number, number]> = [];
    for (const [start, end] of ordered) {
      const current = merged[merged.length - 1];
      if (current && start <= current[1]) {
        current[1] = Math.max(current[1], end);
      } else {
        merged.push([start, end]);
      }
    }

    this.sealedMarkers = Object.freeze(merged.flat());
    this.pending = [];
    return this;
  }

  private canonical(): readonly number[] {
    if (this.sealedMarkers === null) {
      throw new ConfigError('Session must be sealed before it is queried', { reason: 'not_sealed' });
    }
    return this.sealedMarkers;
  }

  /**
   * Canonical normalized markers; feed them to `Session.fromMarkers` to
   * rebuild the session.
   */
  markers(): number[] {
    return [...this.canonical()];
  }

  get isEmpty(): boolean {
    return this.canonical().length === 0;
  }

  /**
   * Open of the trading day: the night open for a dual-leg session.
   */
  dayBegin(unit: ClockResolution = 'millisecond'): number | null {
    const first = this.canonical()[0];
    return first === undefined ? null : toResolution(denormalize(first), unit);
  }

  dayEnd(unit: ClockResolution = 'millisecond'): number | null {
    const markers = this.canonical();
    const last = markers[markers.length - 1];
    return last === undefined ? null : toResolution(denormalize(last), unit);
  }

  /**
   * Open of the day leg: the first slice start inside the morning window,
   * or `dayBegin` when no slice starts there.
   */
  morningBegin(unit: ClockResolution = 'millisecond'): number | null {
    const markers = this.canonical();
    for (let i = 0; i < markers.length; i += 2) {
      const start = markers[i];
      if (start !== undefined && start >= this.morningFrom && start < this.morningTo) {
        return toResolution(denormalize(start), unit);
      }
    }
    return this.dayBegin(unit);
  }

  /**
   * Whether a slice opens between the rollover and midnight.
   */
  hasNight(): boolean {
    const markers = this.canonical();
    for (let i = 0; i < markers.length; i += 2) {
      const start = markers[i];
      if (start !== undefined && start < SHIFT_OFFSET) {
        return true;
      }
    }
    return false;
  }

  /**
   * Whether `time` falls inside a slice. Exactly at an open counts when
   * `includeBegin`; exactly at a close counts when `includeEnd`.
   *
   * @example
   * ```typescript
   * const session = commodityNightSession();
   * session.inSession({ hour: 0, minute: 59 });                 // true
   * session.inSession({ hour: 15, minute: 0 });                 // false
   * session.inSession({ hour: 15, minute: 0 }, true, true);     // true
   * ```
   */
  inSession(time: TimeInput, includeBegin = true, includeEnd = false): boolean {
    const markers = this.canonical();
    const position = normalize(time);
    // the rollover instant is also the close of a slice ending the day
    if (position === 0 && includeEnd && markers[markers.length - 1] === MS_PER_DAY) {
      return true;
    }
    const index = upperBound(markers, position);
    if (index === 0) {
      return false;
    }

    const boundary = markers[index - 1];
    if ((index - 1) % 2 === 0) {
      // boundary is an open and position lies before the matching close
      return position === boundary ? includeBegin : true;
    }
    return position === boundary && includeEnd;
  }

  /**
   * Whether any moment of `[start, end]` falls inside a slice. Touching a
   * slice exactly at its open or close counts only when `includeBeginEnd`.
   * An interval whose start comes after its end in the trading day wraps
   * past the rollover.
   */
  anyInSession(start: TimeInput, end: TimeInput, includeBeginEnd = true): boolean {
    const from = normalize(start);
    const shiftedEnd = normalize(end);
    // Ending at the rollover closes the trading day, unless the interval
    // is the rollover instant itself
    const to = shiftedEnd === 0 && from !== 0 ? MS_PER_DAY : shiftedEnd;
    if (from > to) {
      return this.overlaps(from, MS_PER_DAY, includeBeginEnd) || this.overlaps(0, to, includeBeginEnd);
    }
    return this.overlaps(from, to, includeBeginEnd);
  }

  private overlaps(from: number, to: number, inclusive: boolean): boolean {
    const markers = this.canonical();
    const count = markers.length / 2;
    if (inclusive && from === 0 && markers[markers.length - 1] === MS_PER_DAY) {
      return true;
    }

    // First slice whose close reaches `from`
    let lo = 0;
    let hi = count;
    while (lo < hi) {
      const mid = (lo + hi) >>> 1;
      const close = markers[2 * mid + 1] ?? MS_PER_DAY;
      if (inclusive ? close < from : close <= from) {
        lo = mid + 1;
      } else {
        hi = mid;
      }
    }

    for (let slice = lo; slice < count; slice++) {
      const open = markers[2 * slice];
      const close = markers[2 * slice + 1];
      if (open === undefined || close === undefined) {
        break;
      }
      if (inclusive ? open > to : open >= to) {
        break;
      }
      if (inclusive ? from <= close && to >= open : from < close && to > open) {
        return true;
      }
    }
    return false;
  }

  slices(): SliceBounds[] {
    const markers = this.canonical();
    const result: SliceBounds[] = [];
    for (let i = 0; i + 1 < markers.length; i += 2) {
      const start = markers[i];
      const end = markers[i + 1];
      if (start !== undefined && end !== undefined) {
        result.push({ begin: denormalize(start), end: denormalize(end) });
      }
    }
    return result;
  }

  /**
   * Slices as `HH:MM-HH:MM`, in trading-day order.
   */
  render(): string[] {
    return this.slices().map((slice) => `${formatClock(slice.begin)}-${formatClock(slice.end)}`);
  }

  /**
   * Normalized minute indices covered by the session, start inclusive and
   * end exclusive. A partially covered minute is included.
   */
  minutes(): number[] {
    const markers = this.canonical();
    const result: number[] = [];
    for (let i = 0; i + 1 < markers.length; i += 2) {
      const start = markers[i];
      const end = markers[i + 1];
      if (start === undefined || end === undefined) {
        continue;
      }
      for (let minute = Math.floor(start / MS_PER_MINUTE); minute < Math.ceil(end / MS_PER_MINUTE); minute++) {
        if (result[result.length - 1] !== minute) {
          result.push(minute);
        }
      }
    }
    return result;
  }

  equals(other: Session): boolean {
    const mine = this.canonical();
    const theirs = other.canonical();
    return mine.length === theirs.length && mine.every((marker, index) => marker === theirs[index]);
  }

  toJSON(): number[] {
    return this.markers();
  }

  toString(): string {
    if (!this.isSealed) {
      return `Session(open, ${this.pending.length} slices)`;
    }
    const summary = [this.dayBegin(), this.morningBegin(), this.dayEnd()].map((value) =>
      value === null ? '--:--' : formatClock(value)
    );
    return `Session(day ${summary[0]}, morning ${summary[1]}, close ${summary[2]}: ${this.render().join(' ')})`;
  }
}
