/**
 * Standard sessions for the common instrument families.
 */

import { Session, type SessionOptions } from './session.js';

type SliceTuple = readonly [startHour: number, startMinute: number, endHour: number, endMinute: number];

const NIGHT_LEG: SliceTuple = [21, 0, 2, 30];

const STOCK_SLICES: readonly SliceTuple[] = [
  [9, 30, 11, 30],
  [13, 0, 15, 0],
];

const COMMODITY_DAY_SLICES: readonly SliceTuple[] = [
  [9, 0, 10, 15],
  [10, 30, 11, 30],
  [13, 30, 15, 0],
];

export const PRESET_NAMES = ['full', 'stock', 'stockIndex', 'bond', 'commodity', 'commodityNight'] as const;

export type PresetName = (typeof PRESET_NAMES)[number];

const PRESET_SLICES: Record<PresetName, readonly SliceTuple[]> = {
  // Union of every family below, night leg included
  full: [NIGHT_LEG, [9, 0, 11, 30], [13, 0, 15, 15]],
  stock: STOCK_SLICES,
  // Index futures follow the stock market hours
  stockIndex: STOCK_SLICES,
  // Treasury futures close fifteen minutes after equities
  bond: [
    [9, 30, 11, 30],
    [13, 0, 15, 15],
  ],
  commodity: COMMODITY_DAY_SLICES,
  commodityNight: [NIGHT_LEG, ...COMMODITY_DAY_SLICES],
};

export function isPresetName(value: string): value is PresetName {
  return PRESET_NAMES.some((name) => name === value);
}

/**
 * Builds a new sealed session for the named preset.
 *
 * @example
 * ```typescript
 * const rb = createPresetSession('commodityNight');
 * rb.render(); // ['21:00-02:30', '09:00-10:15', '10:30-11:30', '13:30-15:00']
 * ```
 */
export function createPresetSession(name: PresetName, options?: SessionOptions): Session {
  const session = new Session(options);
  for (const [startHour, startMinute, endHour, endMinute] of PRESET_SLICES[name]) {
    session.addSlice(startHour, startMinute, endHour, endMinute);
  }
  return session.seal();
}

export const fullSession = (options?: SessionOptions): Session => createPresetSession('full', options);
export const stockSession = (options?: SessionOptions): Session => createPresetSession('stock', options);
export const stockIndexSession = (options?: SessionOptions): Session => createPresetSession('stockIndex', options);
export const bondSession = (options?: SessionOptions): Session => createPresetSession('bond', options);
export const commoditySession = (options?: SessionOptions): Session => createPresetSession('commodity', options);
export const commodityNightSession = (options?: SessionOptions): Session =>
  createPresetSession('commodityNight', options);
