/**
 * @fileoverview Slice lists stored as JSON, the shape a database export
 * writes: `[{"Begin":"09:00:00","End":"10:15:00"}, ...]`.
 */

import { z } from 'zod';
import { SourceError, isConfigError } from '@sessionkit/contracts';
import type { SliceSpec } from '@sessionkit/contracts';
import { parseClock } from '@sessionkit/trade-session';

const clockText = z.string().transform((text, ctx) => {
  try {
    return parseClock(text);
  } catch (err) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: isConfigError(err) ? err.message : `Invalid time "${text}"`,
    });
    return z.NEVER;
  }
});

function lowerCaseKeys(value: unknown): unknown {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return value;
  }
  return Object.fromEntries(Object.entries(value).map(([key, field]) => [key.toLowerCase(), field]));
}

// Exporters disagree on key case ("Begin", "begin", "BEGIN")
const sliceSchema = z.preprocess(
  lowerCaseKeys,
  z.object({
    begin: clockText,
    end: clockText,
  })
);

export const jsonSlicesSchema = z.array(sliceSchema).min(1, 'expected at least one slice');

export interface JsonSliceContext {
  line?: number;
  product?: string;
}

function where(context: JsonSliceContext): string {
  const parts: string[] = [];
  if (context.line !== undefined) parts.push(`Line ${context.line}`);
  if (context.product !== undefined) parts.push(`product ${context.product}`);
  return parts.length > 0 ? `${parts.join(', ')}: ` : '';
}

/**
 * Parses and validates a JSON slice list.
 *
 * @throws {SourceError} `malformed_row` for invalid JSON, a wrong shape or
 *   unreadable time text
 */
export function parseJsonSlices(text: string, context: JsonSliceContext = {}): SliceSpec[] {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    throw new SourceError(
      `${where(context)}invalid slice JSON`,
      { reason: 'malformed_row', ...context },
      { cause: err }
    );
  }

  const result = jsonSlicesSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.errors.map((e) => `${e.path.join('.') || '(root)'}: ${e.message}`);
    throw new SourceError(`${where(context)}invalid slice list (${issues.join('; ')})`, {
      reason: 'malformed_row',
      ...context,
      issues,
    });
  }

  return result.data;
}
