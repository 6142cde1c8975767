/**
 * ResultDecoder - turns an artifact record back into typed values.
 *
 * Values are matched to fields by position only; the record does not repeat
 * field names. Extra tokens are ignored, missing tokens truncate the result.
 */

import type { FieldKind, FieldSpec, ParsedRecord, ParsedValue } from '@recordc/types';
import { ParseError } from '../errors/RecordcError.js';
import { BOOLEAN_TRUE, FAILURE_SENTINEL, FIELD_DELIMITER, SUCCESS_SENTINEL } from './protocol.js';

export function coerceToken(kind: FieldKind, token: string): ParsedValue {
  switch (kind) {
    case 'string':
      return token;
    case 'integer':
      // left as text for the caller
      return token;
    case 'boolean':
      return token === BOOLEAN_TRUE;
  }
}

/**
 * Strip leading whitespace and the trailing line break. Whitespace inside the
 * last value is kept.
 */
export function normalizeOutput(output: string): string {
  return output.trimStart().replace(/\r?\n$/, '');
}

/**
 * THROWS ParseError:
 * - ERR_PARSE_FAILED when the output carries the failure sentinel
 * - ERR_PARSE_MALFORMED_OUTPUT when it starts with anything else
 */
export function decodeResult(output: string, fields: readonly FieldSpec[]): ParsedRecord {
  const normalized = normalizeOutput(output);
  const [status, ...values] = normalized.split(FIELD_DELIMITER);

  if (status !== SUCCESS_SENTINEL) {
    if (normalized.includes(FAILURE_SENTINEL)) {
      throw new ParseError('Parser rejected the document', 'ERR_PARSE_FAILED', { output });
    }
    throw new ParseError(
      `Unexpected parser output: expected "${SUCCESS_SENTINEL}|..."`,
      'ERR_PARSE_MALFORMED_OUTPUT',
      { output }
    );
  }

  const entries: [string, ParsedValue][] = [];
  for (const [index, field] of fields.entries()) {
    const token = values[index];
    if (token === undefined) break;
    entries.push([field.name, coerceToken(field.kind, token)]);
  }

  // fromEntries defines own properties, so a field named __proto__ stays a plain key
  return Object.fromEntries(entries);
}
