/**
 * @fileoverview Reads session configuration into rows.
 *
 * Grammar, one product per line:
 *
 *   # comment
 *   product,sh,sm,eh,em[,sh,sm,eh,em ...]    flat form
 *   product,json                              JSON form
 *   product,exchange,json                     JSON form with exchange
 *
 * An optional header line starting with `product` is skipped. Rows are
 * returned in source order; duplicate products are left for the registry
 * to resolve.
 */

import { readFileSync } from 'node:fs';
import { SourceError, isSourceError } from '@sessionkit/contracts';
import type { SessionRow, SliceSpec } from '@sessionkit/contracts';
import { dataLines, splitFields } from './csv.js';
import { parseJsonSlices } from './json-slices.js';

const INTEGER_FIELD = /^\d+$/;
const FIELDS_PER_SLICE = 4;

function isJsonField(field: string | undefined): field is string {
  return field !== undefined && field.startsWith('[');
}

function flatSlices(values: readonly string[], line: number, product: string): SliceSpec[] {
  if (values.length === 0 || values.length % FIELDS_PER_SLICE !== 0) {
    throw new SourceError(
      `Line ${line}: expected groups of ${FIELDS_PER_SLICE} integers after the product, got ${values.length} fields`,
      { reason: 'malformed_row', line, product }
    );
  }

  const numbers = values.map((value, index) => {
    if (!INTEGER_FIELD.test(value)) {
      throw new SourceError(`Line ${line}: field ${index + 2} "${value}" is not an integer`, {
        reason: 'malformed_row',
        line,
        product,
      });
    }
    return Number(value);
  });

  const slices: SliceSpec[] = [];
  for (let i = 0; i < numbers.length; i += FIELDS_PER_SLICE) {
    const [startHour = 0, startMinute = 0, endHour = 0, endMinute = 0] = numbers.slice(i, i + FIELDS_PER_SLICE);
    slices.push({
      begin: { hour: startHour, minute: startMinute },
      end: { hour: endHour, minute: endMinute },
    });
  }
  return slices;
}

function parseRow(fields: readonly string[], line: number): SessionRow {
  const [product = '', ...rest] = fields;
  if (product === '') {
    throw new SourceError(`Line ${line}: missing product code`, { reason: 'malformed_row', line });
  }

  const last = rest[rest.length - 1];
  if ((rest.length === 1 || rest.length === 2) && isJsonField(last)) {
    const slices = parseJsonSlices(last, { line, product });
    const exchange = rest.length === 2 ? rest[0] : undefined;
    return exchange ? { product, exchange, slices, line } : { product, slices, line };
  }

  return { product, slices: flatSlices(rest, line, product), line };
}

/**
 * Parses CSV session configuration.
 *
 * @throws {SourceError} On the first malformed line, naming its number
 *
 * @example
 * ```typescript
 * const rows = parseSessionRows('ag,21,0,2,30,9,0,10,15\nIF,9,30,11,30,13,0,15,0\n');
 * rows[0].slices.length; // 2
 * ```
 */
export function parseSessionRows(content: string): SessionRow[] {
  const rows: SessionRow[] = [];
  let first = true;

  for (const { line, text } of dataLines(content)) {
    const fields = splitFields(text, line);
    if (first && fields[0]?.toLowerCase() === 'product') {
      first = false;
      continue;
    }
    first = false;
    rows.push(parseRow(fields, line));
  }

  return rows;
}

/**
 * Reads and parses a configuration file.
 *
 * @throws {SourceError} `io` when the file cannot be read; parse errors
 *   carry the path as well as the line
 */
export function readSessionFile(path: string): SessionRow[] {
  let content: string;
  try {
    content = readFileSync(path, 'utf8');
  } catch (err) {
    throw new SourceError(`Cannot read session file ${path}`, { reason: 'io', path }, { cause: err });
  }

  try {
    return parseSessionRows(content);
  } catch (err) {
    if (isSourceError(err)) {
      throw new SourceError(`${path}: ${err.message}`, { ...err.data, path }, { cause: err });
    }
    throw err;
  }
}

/**
 * Rows from a product to JSON slice list mapping, as read from a database
 * table. Products are returned sorted so reloads are deterministic.
 *
 * @example
 * ```typescript
 * rowsFromJsonMap({ ag: '[{"Begin":"21:00:00","End":"02:30:00"}]' });
 * ```
 */
export function rowsFromJsonMap(record: Readonly<Record<string, string>>): SessionRow[] {
  return Object.keys(record)
    .sort()
    .map((product) => {
      const json = record[product] ?? '';
      if (product.trim() === '') {
        throw new SourceError('Empty product code in slice map', { reason: 'malformed_row' });
      }
      return { product, slices: parseJsonSlices(json, { product }) };
    });
}
