/**
 * @fileoverview Product to session registry.
 *
 * The registry holds one immutable snapshot. A load builds and seals every
 * session into a fresh map and publishes it with a single assignment, so a
 * failed load leaves the previous snapshot in place and readers never see a
 * half-applied one.
 */

import { ConfigError, SourceError, isConfigError, isSessionKitError, isSourceError } from '@sessionkit/contracts';
import type { SessionRow, TimeInput } from '@sessionkit/contracts';
import { createChildLogger, startTimer } from '@sessionkit/logger';
import type { Logger, PerfTimer } from '@sessionkit/logger';
import { Session } from '@sessionkit/trade-session';
import type { ClockResolution, SessionOptions } from '@sessionkit/trade-session';
import { parseSessionRows, readSessionFile } from './loader.js';
import type { LoadOptions, LoadResult, LoadSummary, SessionRegistryOptions, SessionSource } from './types.js';

export class SessionRegistry {
  private snapshot: ReadonlyMap<string, Session> = new Map();
  private readonly logger: Logger | undefined;
  private readonly sessionOptions: SessionOptions;

  constructor(options: SessionRegistryOptions = {}) {
    this.logger = options.logger ? createChildLogger(options.logger, { component: 'session-registry' }) : undefined;
    this.sessionOptions = options.session ?? {};
  }

  /**
   * Session for `product`; exact, case-sensitive match.
   */
  get(product: string): Session | undefined {
    return this.snapshot.get(product);
  }

  has(product: string): boolean {
    return this.snapshot.has(product);
  }

  count(): number {
    return this.snapshot.size;
  }

  keys(): string[] {
    return [...this.snapshot.keys()];
  }

  entries(): Array<[string, Session]> {
    return [...this.snapshot.entries()];
  }

  /**
   * Registers one sealed session, replacing any previous one.
   *
   * @throws {ConfigError} `not_sealed` for a session still being built
   */
  set(product: string, session: Session): this {
    if (!session.isSealed) {
      throw new ConfigError(`Session for ${product} must be sealed before it is registered`, {
        reason: 'not_sealed',
        product,
      });
    }
    const next = new Map(this.snapshot);
    next.set(product, session);
    this.snapshot = next;
    return this;
  }

  /**
   * Loads products from CSV text or rows.
   *
   * @throws {SourceError} On a malformed row or an invalid slice; the
   *   registry is left unchanged
   *
   * @example
   * ```typescript
   * const registry = new SessionRegistry({ logger });
   * registry.load('ag,21,0,2,30,9,0,10,15,10,30,11,30,13,30,15,0');
   * registry.load('IF,9,30,11,30,13,0,15,0');            // ag kept
   * registry.load('IF,9,30,11,30', { merge: false });    // ag dropped
   * ```
   */
  load(source: SessionSource, options: LoadOptions = {}): LoadSummary {
    const label = options.source ?? (typeof source === 'string' ? 'inline' : 'rows');
    return this.apply(label, options.merge ?? true, () =>
      typeof source === 'string' ? parseSessionRows(source) : source
    );
  }

  /**
   * Loads products from a configuration file.
   *
   * @throws {SourceError} `io` when the file cannot be read, otherwise as
   *   {@link load}
   */
  loadFile(path: string, options: LoadOptions = {}): LoadSummary {
    return this.apply(options.source ?? path, options.merge ?? true, () => readSessionFile(path), path);
  }

  /**
   * As {@link load}, reporting a source failure in the result.
   */
  tryLoad(source: SessionSource, options: LoadOptions = {}): LoadResult {
    return this.capture(() => this.load(source, options));
  }

  tryLoadFile(path: string, options: LoadOptions = {}): LoadResult {
    return this.capture(() => this.loadFile(path, options));
  }

  dayBegin(product: string, unit?: ClockResolution): number | null | undefined {
    return this.get(product)?.dayBegin(unit);
  }

  dayEnd(product: string, unit?: ClockResolution): number | null | undefined {
    return this.get(product)?.dayEnd(unit);
  }

  morningBegin(product: string, unit?: ClockResolution): number | null | undefined {
    return this.get(product)?.morningBegin(unit);
  }

  inSession(product: string, time: TimeInput, includeBegin?: boolean, includeEnd?: boolean): boolean | undefined {
    return this.get(product)?.inSession(time, includeBegin, includeEnd);
  }

  anyInSession(product: string, start: TimeInput, end: TimeInput, includeBeginEnd?: boolean): boolean | undefined {
    return this.get(product)?.anyInSession(start, end, includeBeginEnd);
  }

  private capture(load: () => LoadSummary): LoadResult {
    try {
      return { ok: true, summary: load() };
    } catch (err) {
      if (isSourceError(err)) {
        return { ok: false, error: err };
      }
      throw err;
    }
  }

  private apply(label: string, merge: boolean, readRows: () => Iterable<SessionRow>, path?: string): LoadSummary {
    const timer = startTimer();
    try {
      const built = this.build(readRows(), path);
      const summary = this.publish(built, merge, timer);
      this.logger?.info('Sessions loaded', {
        operation: 'load',
        source: label,
        merge,
        result: 'success',
        count: summary.loaded,
        replaced: summary.replaced,
        added: summary.added,
        removed: summary.removed,
        total: summary.total,
        duration_ms: summary.durationMs,
      });
      return summary;
    } catch (err) {
      this.logger?.error('Session load failed', {
        operation: 'load',
        source: label,
        result: 'error',
        error_code: isSessionKitError(err) ? err.code : undefined,
        line: isSourceError(err) ? err.data.line : undefined,
        product: isSourceError(err) ? err.data.product : undefined,
        error: err instanceof Error ? err.message : String(err),
        duration_ms: timer.stop(),
      });
      throw err;
    }
  }

  private build(rows: Iterable<SessionRow>, path?: string): Map<string, Session> {
    const built = new Map<string, Session>();
    const firstLine = new Map<string, number | undefined>();

    for (const row of rows) {
      if (row.product.trim() === '') {
        const at = row.line === undefined ? '' : `Line ${row.line}: `;
        throw new SourceError(`${at}missing product code`, { reason: 'malformed_row', line: row.line, path });
      }

      let session: Session;
      try {
        session = Session.fromSlices(row.slices, this.sessionOptions);
      } catch (err) {
        if (!isConfigError(err)) {
          throw err;
        }
        const at = row.line === undefined ? '' : `Line ${row.line}: `;
        throw new SourceError(
          `${at}invalid session for ${row.product}: ${err.message}`,
          { reason: 'invalid_slice', line: row.line, product: row.product, path },
          { cause: err }
        );
      }

      if (built.has(row.product)) {
        this.logger?.warn('Duplicate product in source, last row wins', {
          product: row.product,
          first_line: firstLine.get(row.product),
          line: row.line,
        });
      } else {
        firstLine.set(row.product, row.line);
      }
      built.set(row.product, session);
    }

    return built;
  }

  private publish(built: ReadonlyMap<string, Session>, merge: boolean, timer: PerfTimer): LoadSummary {
    const previous = this.snapshot;
    const next = new Map<string, Session>(merge ? previous : undefined);

    let replaced = 0;
    for (const [product, session] of built) {
      if (previous.has(product)) {
        replaced++;
      }
      next.set(product, session);
    }

    let removed = 0;
    if (!merge) {
      for (const product of previous.keys()) {
        if (!built.has(product)) {
          removed++;
        }
      }
    }

    this.snapshot = next;

    return {
      loaded: built.size,
      replaced,
      added: built.size - replaced,
      removed,
      total: next.size,
      durationMs: timer.stop(),
    };
  }
}
