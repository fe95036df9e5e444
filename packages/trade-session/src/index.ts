/**
 * @sessionkit/trade-session
 *
 * Trading sessions as sorted slice sets, with a clock normalizer that
 * orders night legs (21:00-02:30) ahead of the day legs they belong to.
 *
 * @example
 * ```typescript
 * import { Session, commodityNightSession } from '@sessionkit/trade-session';
 *
 * const custom = new Session()
 *   .addSlice(21, 0, 23, 0)
 *   .addSlice(9, 0, 11, 30)
 *   .seal();
 *
 * custom.inSession({ hour: 22, minute: 15 }); // true
 * custom.dayBegin('minute');                  // 1260 (21:00)
 * custom.morningBegin('minute');              // 540 (09:00)
 *
 * commodityNightSession().anyInSession({ hour: 8, minute: 59 }, { hour: 9, minute: 1 }); // true
 * ```
 */

export {
  MS_PER_SECOND,
  MS_PER_MINUTE,
  MS_PER_HOUR,
  MS_PER_DAY,
  MINUTES_PER_DAY,
  TRADING_DAY_ROLLOVER,
  SHIFT_OFFSET,
  clockMillis,
  rawMillis,
  normalize,
  normalizeEnd,
  denormalize,
  toResolution,
  formatClock,
  parseClock,
} from './clock.js';
export type { ClockResolution } from './clock.js';

export { Session, DEFAULT_MORNING_WINDOW } from './session.js';
export type { MorningWindow, SessionOptions, SliceBounds } from './session.js';

export {
  PRESET_NAMES,
  isPresetName,
  createPresetSession,
  fullSession,
  stockSession,
  stockIndexSession,
  bondSession,
  commoditySession,
  commodityNightSession,
} from './presets.js';
export type { PresetName } from './presets.js';
