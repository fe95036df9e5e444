/**
 * @fileoverview Line and field splitting for session CSV files.
 */

import { SourceError } from '@sessionkit/contracts';

/**
 * A non-blank, non-comment line with its 1-based position in the source.
 */
export interface SourceLine {
  line: number;
  text: string;
}

const BYTE_ORDER_MARK = 0xfeff;

export function stripBom(content: string): string {
  return content.charCodeAt(0) === BYTE_ORDER_MARK ? content.slice(1) : content;
}

/**
 * Data lines of `content`, skipping blank lines and `#` comments.
 */
export function dataLines(content: string): SourceLine[] {
  const lines: SourceLine[] = [];
  stripBom(content)
    .split(/\r?\n/)
    .forEach((text, index) => {
      const trimmed = text.trim();
      if (trimmed !== '' && !trimmed.startsWith('#')) {
        lines.push({ line: index + 1, text });
      }
    });
  return lines;
}

/**
 * Splits one line into fields.
 *
 * Double-quoted fields keep commas and take `""` for a literal quote, so a
 * JSON slice list can sit in a single column. Unquoted fields are trimmed.
 *
 * @example
 * ```typescript
 * splitFields('ag, SHFE, "[{""Begin"":""21:00"",""End"":""02:30""}]"', 4);
 * // ['ag', 'SHFE', '[{"Begin":"21:00","End":"02:30"}]']
 * ```
 */
export function splitFields(text: string, line: number): string[] {
  const fields: string[] = [];
  let current = '';
  let inQuotes = false;
  let quoted = false;

  for (let i = 0; i < text.length; i++) {
    const ch = text.charAt(i);

    if (inQuotes) {
      if (ch !== '"') {
        current += ch;
      } else if (text.charAt(i + 1) === '"') {
        current += '"';
        i++;
      } else {
        inQuotes = false;
      }
      continue;
    }

    if (ch === ',') {
      fields.push(quoted ? current : current.trim());
      current = '';
      quoted = false;
    } else if (ch === '"' && !quoted && current.trim() === '') {
      inQuotes = true;
      quoted = true;
      current = '';
    } else if (quoted) {
      if (ch.trim() !== '') {
        throw new SourceError(`Line ${line}: unexpected "${ch}" after a quoted field`, {
          reason: 'malformed_row',
          line,
        });
      }
    } else {
      current += ch;
    }
  }

  if (inQuotes) {
    throw new SourceError(`Line ${line}: unterminated quoted field`, { reason: 'malformed_row', line });
  }

  fields.push(quoted ? current : current.trim());
  return fields;
}
