import { describe, it, expect } from 'vitest';
import { ConfigError, isConfigError } from '@sessionkit/contracts';
import { MS_PER_DAY, MS_PER_HOUR, MS_PER_MINUTE } from '../src/clock.js';
import { Session } from '../src/session.js';
import { commodityNightSession, commoditySession, stockSession } from '../src/presets.js';

function reasonOf(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return isConfigError(err) ? err.data.reason : err;
  }
  return undefined;
}

const at = (hour: number, minute: number, second = 0) => ({ hour, minute, second });

/**
 * Deterministic pseudo-random integers for property checks.
 */
function sequence(seed: number): () => number {
  let state = seed;
  return () => {
    state = (state * 48_271) % 2_147_483_647;
    return state;
  };
}

describe('Session', () => {
  describe('addSlice() and seal()', () => {
    it('should merge overlapping slices', () => {
      const session = new Session().addSlice(9, 0, 10, 0).addSlice(9, 30, 11, 0).seal();

      expect(session.render()).toEqual(['09:00-11:00']);
    });

    it('should merge adjacent slices', () => {
      const session = new Session().addSlice(9, 0, 10, 0).addSlice(10, 0, 11, 0).seal();

      expect(session.render()).toEqual(['09:00-11:00']);
    });

    it('should sort slices into trading-day order', () => {
      const session = new Session().addSlice(13, 30, 15, 0).addSlice(21, 0, 2, 30).addSlice(9, 0, 10, 15).seal();

      expect(session.render()).toEqual(['21:00-02:30', '09:00-10:15', '13:30-15:00']);
    });

    it('should produce the canonical marker sequence', () => {
      expect(commodityNightSession().markers()).toEqual([
        3_600_000, 23_400_000, 46_800_000, 51_300_000, 52_200_000, 55_800_000, 63_000_000, 68_400_000,
      ]);
    });

    it('should be idempotent', () => {
      const session = new Session().addSlice(9, 0, 10, 0).addSlice(9, 30, 11, 0).seal();
      const once = session.markers();

      expect(session.seal().markers()).toEqual(once);
      expect(session.isSealed).toBe(true);
    });

    it('should keep markers strictly ascending with even length', () => {
      const next = sequence(7);
      for (let round = 0; round < 25; round++) {
        const session = new Session();
        for (let i = 0; i < 6; i++) {
          // wall-clock minutes that stay before the 20:00 rollover
          const start = next() % (18 * 60);
          const end = start + 1 + (next() % 120);
          session.addSliceBetween(start * MS_PER_MINUTE, end * MS_PER_MINUTE);
        }
        const markers = session.seal().markers();

        expect(markers.length % 2).toBe(0);
        for (let i = 1; i < markers.length; i++) {
          expect(markers[i]).toBeGreaterThan(markers[i - 1] ?? -1);
        }
      }
    });

    it('should accept sub-minute endpoints', () => {
      const session = new Session().addSliceBetween(at(9, 0, 30), at(9, 1)).seal();

      expect(session.render()).toEqual(['09:00:30-09:01']);
    });

    it('should allow a slice to close at the rollover', () => {
      const session = new Session().addSlice(13, 0, 20, 0).seal();

      expect(session.dayEnd('minute')).toBe(20 * 60);
      expect(session.inSession(at(19, 59))).toBe(true);
    });

    it('should match a rollover close exactly at 20:00', () => {
      const session = new Session().addSlice(13, 0, 20, 0).seal();

      expect(session.inSession(at(20, 0), true, true)).toBe(true);
      expect(session.inSession(at(20, 0), true, false)).toBe(false);
      expect(session.anyInSession(at(20, 0), at(20, 30), true)).toBe(true);
      expect(session.anyInSession(at(20, 0), at(20, 30), false)).toBe(false);
      expect(session.anyInSession(at(20, 0), at(20, 0), true)).toBe(true);
    });

    it('should reject a slice that does not end after it starts', () => {
      expect(reasonOf(() => new Session().addSlice(15, 0, 9, 0))).toBe('invalid_slice');
      expect(reasonOf(() => new Session().addSlice(9, 0, 9, 0))).toBe('invalid_slice');
    });

    it('should reject hour and minute values out of range', () => {
      expect(reasonOf(() => new Session().addSlice(24, 0, 1, 0))).toBe('time_out_of_range');
      expect(reasonOf(() => new Session().addSlice(9, 60, 10, 0))).toBe('time_out_of_range');
    });

    it('should refuse new slices once sealed', () => {
      const session = new Session().addSlice(9, 0, 10, 0).seal();

      expect(() => session.addSlice(13, 0, 14, 0)).toThrow(ConfigError);
      expect(reasonOf(() => session.addSlice(13, 0, 14, 0))).toBe('sealed');
    });

    it('should refuse queries before sealing', () => {
      const session = new Session().addSlice(9, 0, 10, 0);

      expect(reasonOf(() => session.inSession(at(9, 30)))).toBe('not_sealed');
      expect(reasonOf(() => session.markers())).toBe('not_sealed');
      expect(String(session)).toBe('Session(open, 1 slices)');
    });
  });

  describe('inSession()', () => {
    const session = commodityNightSession();

    it('should be true strictly inside a slice for any flags', () => {
      for (const [begin, end] of [
        [true, true],
        [true, false],
        [false, true],
        [false, false],
      ] as const) {
        expect(session.inSession(at(9, 30), begin, end)).toBe(true);
      }
    });

    it('should honour includeBegin exactly at an open', () => {
      expect(session.inSession(at(9, 0), true, false)).toBe(true);
      expect(session.inSession(at(9, 0), false, false)).toBe(false);
    });

    it('should honour includeEnd exactly at a close', () => {
      expect(session.inSession(at(10, 15))).toBe(false);
      expect(session.inSession(at(10, 15), true, true)).toBe(true);
    });

    it('should be false between slices whatever the flags', () => {
      expect(session.inSession(at(10, 20), true, true)).toBe(false);
      expect(session.inSession(at(8, 59, 10), true, true)).toBe(false);
      expect(session.inSession(at(20, 59), true, true)).toBe(false);
    });

    it('should cover the night leg across midnight', () => {
      expect(session.inSession(at(21, 0))).toBe(true);
      expect(session.inSession(at(0, 59, 10))).toBe(true);
      expect(session.inSession(at(2, 30))).toBe(false);
    });

    it('should resolve instants at millisecond granularity', () => {
      expect(session.inSession(15 * MS_PER_HOUR - 1)).toBe(true);
      expect(session.inSession(15 * MS_PER_HOUR)).toBe(false);
      expect(session.inSession(9 * MS_PER_HOUR + 1, false, false)).toBe(true);
    });

    it('should agree with the slices it was built from', () => {
      const next = sequence(11);
      for (let round = 0; round < 20; round++) {
        const built = new Session();
        const added: Array<[number, number]> = [];
        for (let i = 0; i < 4; i++) {
          const start = (next() % (18 * 60)) * MS_PER_MINUTE;
          const end = start + (1 + (next() % 90)) * MS_PER_MINUTE;
          built.addSliceBetween(start, end);
          added.push([start, end]);
        }
        built.seal();

        for (const [start, end] of added) {
          const inside = start + Math.floor((end - start) / 2);
          expect(built.inSession(inside, false, false)).toBe(true);
        }
      }
    });
  });

  describe('anyInSession()', () => {
    const session = commoditySession();

    it('should detect an interval straddling the first open', () => {
      expect(session.anyInSession(at(8, 59), at(9, 1), true)).toBe(true);
      expect(session.anyInSession(at(8, 0), at(8, 59), true)).toBe(false);
    });

    it('should count touching only when asked to', () => {
      expect(session.anyInSession(at(8, 0), at(9, 0), true)).toBe(true);
      expect(session.anyInSession(at(8, 0), at(9, 0), false)).toBe(false);
      expect(session.anyInSession(at(10, 15), at(10, 30), true)).toBe(true);
      expect(session.anyInSession(at(10, 15), at(10, 30), false)).toBe(false);
    });

    it('should be false inside a gap', () => {
      expect(session.anyInSession(at(10, 16), at(10, 29))).toBe(false);
      expect(session.anyInSession(at(16, 0), at(17, 0))).toBe(false);
    });

    it('should find a slice inside a wide interval', () => {
      expect(session.anyInSession(at(11, 45), at(14, 0))).toBe(true);
    });

    it('should treat an interval at the rollover instant as a single point', () => {
      const dayOnly = new Session().addSlice(9, 0, 15, 0).seal();

      expect(dayOnly.anyInSession(at(20, 0), at(20, 0), true)).toBe(false);
      expect(session.anyInSession(at(20, 0), at(20, 0), true)).toBe(false);
      expect(dayOnly.anyInSession(at(19, 0), at(20, 0), true)).toBe(false);
      expect(dayOnly.anyInSession(at(14, 0), at(20, 0), true)).toBe(true);
    });

    it('should handle an interval that wraps past the rollover', () => {
      const night = commodityNightSession();

      expect(night.anyInSession(at(19, 0), at(20, 30))).toBe(false);
      expect(night.anyInSession(at(19, 0), at(21, 30))).toBe(true);
      expect(session.anyInSession(at(19, 0), at(21, 30))).toBe(false);
    });
  });

  describe('day boundaries', () => {
    it('should report the night open as the day begin of a dual-leg session', () => {
      const session = commodityNightSession();

      expect(session.dayBegin()).toBe(21 * MS_PER_HOUR);
      expect(session.dayBegin('minute')).toBe(21 * 60);
      expect(session.morningBegin('minute')).toBe(9 * 60);
      expect(session.dayEnd('minute')).toBe(15 * 60);
      expect(session.dayEnd('second')).toBe(15 * 3600);
    });

    it('should equate morning begin and day begin for a single leg', () => {
      const session = stockSession();

      expect(session.dayBegin('minute')).toBe(9 * 60 + 30);
      expect(session.morningBegin('minute')).toBe(session.dayBegin('minute'));
    });

    it('should fall back to the day begin when nothing opens in the morning window', () => {
      const session = new Session().addSlice(21, 0, 23, 0).addSlice(13, 0, 15, 0).seal();

      expect(session.morningBegin('minute')).toBe(21 * 60);
    });

    it('should honour a configured morning window', () => {
      const session = new Session({ morningWindow: { from: at(12, 0), to: at(14, 0) } })
        .addSlice(21, 0, 23, 0)
        .addSlice(13, 0, 15, 0)
        .seal();

      expect(session.morningBegin('minute')).toBe(13 * 60);
    });

    it('should reject an empty morning window', () => {
      expect(reasonOf(() => new Session({ morningWindow: { from: at(11, 0), to: at(6, 0) } }))).toBe(
        'invalid_slice'
      );
    });

    it('should return null for an empty session', () => {
      const session = new Session().seal();

      expect(session.isEmpty).toBe(true);
      expect(session.dayBegin()).toBeNull();
      expect(session.morningBegin()).toBeNull();
      expect(session.dayEnd()).toBeNull();
      expect(session.inSession(at(9, 0))).toBe(false);
      expect(session.anyInSession(at(0, 0), at(19, 0))).toBe(false);
    });

    it('should detect a night leg', () => {
      expect(commodityNightSession().hasNight()).toBe(true);
      expect(commoditySession().hasNight()).toBe(false);
    });
  });

  describe('reconstruction', () => {
    it('should round-trip through markers', () => {
      const source = commodityNightSession();
      const rebuilt = Session.fromMarkers(source.markers());

      expect(rebuilt.equals(source)).toBe(true);
      expect(rebuilt.isSealed).toBe(true);
    });

    it('should reject invalid marker sequences', () => {
      expect(reasonOf(() => Session.fromMarkers([1, 2, 3]))).toBe('invalid_markers');
      expect(reasonOf(() => Session.fromMarkers([5, 5]))).toBe('invalid_markers');
      expect(reasonOf(() => Session.fromMarkers([10, 20, 20, 30]))).toBe('invalid_markers');
      expect(reasonOf(() => Session.fromMarkers([0, MS_PER_DAY + 1]))).toBe('invalid_markers');
    });

    it('should list covered minutes and rebuild from them', () => {
      const session = new Session().addSlice(9, 0, 9, 5).seal();
      const minutes = session.minutes();

      expect(minutes).toEqual([780, 781, 782, 783, 784]);

      const rebuilt = Session.fromMinutes([...minutes, 840, 841]);
      expect(rebuilt.render()).toEqual(['09:00-09:05', '10:00-10:02']);
      expect(Session.fromMinutes(rebuilt.minutes()).equals(rebuilt)).toBe(true);
    });

    it('should reject minute indices outside the day', () => {
      expect(reasonOf(() => Session.fromMinutes([1440]))).toBe('invalid_markers');
    });

    it('should build a session from configuration slices', () => {
      const session = Session.fromSlices([
        { begin: at(13, 30), end: at(15, 0) },
        { begin: at(21, 0), end: at(2, 30) },
      ]);

      expect(session.render()).toEqual(['21:00-02:30', '13:30-15:00']);
    });

    it('should take the union of several sessions', () => {
      const union = Session.union([stockSession(), commodityNightSession()]);

      expect(union.render()).toEqual(['21:00-02:30', '09:00-11:30', '13:00-15:00']);
    });

    it('should serialize to its markers', () => {
      const session = new Session().addSlice(9, 0, 10, 0).seal();

      expect(JSON.stringify(session)).toBe(JSON.stringify([13 * MS_PER_HOUR, 14 * MS_PER_HOUR]));
    });

    it('should compare by content only', () => {
      const a = new Session().addSlice(9, 0, 10, 0).addSlice(10, 0, 11, 0).seal();
      const b = new Session().addSlice(9, 0, 11, 0).seal();

      expect(a.equals(b)).toBe(true);
      expect(a.equals(commoditySession())).toBe(false);
    });
  });

  describe('toString()', () => {
    it('should summarise the day and list slices', () => {
      expect(String(commoditySession())).toBe(
        'Session(day 09:00, morning 09:00, close 15:00: 09:00-10:15 10:30-11:30 13:30-15:00)'
      );
    });
  });
});
