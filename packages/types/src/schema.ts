/**
 * Schema Types - the flat record model every other component consumes
 */

// === FIELD KINDS ===
/**
 * Primitive kinds a field may declare.
 * The set is closed: nested objects, arrays and other numeric widths are not modelled.
 */
export const FIELD_KINDS = ['string', 'integer', 'boolean'] as const;

export type FieldKind = (typeof FIELD_KINDS)[number];

export function isFieldKind(value: unknown): value is FieldKind {
  return typeof value === 'string' && FIELD_KINDS.some((kind) => kind === value);
}

// === VALIDATED SCHEMA ===
/**
 * A single field. `name` is both the C struct member and the expected JSON key.
 */
export interface FieldSpec {
  readonly name: string;
  readonly kind: FieldKind;
}

/**
 * A named record with an ordered field list.
 * Field order drives the generated struct layout and the positional wire protocol.
 */
export interface RecordSchema {
  readonly name: string;
  readonly fields: readonly FieldSpec[];
}

// === UNVALIDATED INPUT ===
/**
 * Field as read from a schema file or built by hand, before validation.
 * `kind` stays a plain string so that missing and unsupported kinds can be reported.
 */
export interface FieldSpecInput {
  readonly name: string;
  readonly kind?: string | null;
}

export interface RecordSchemaInput {
  readonly name: string;
  readonly fields: readonly FieldSpecInput[];
}

// === PARSED VALUES ===
/**
 * Decoded value of one kind. Integers travel as text; the caller converts them.
 */
export type ValueOfKind<K extends FieldKind> = K extends 'boolean' ? boolean : string;

export type ParsedValue = ValueOfKind<FieldKind>;

/**
 * Field name → decoded value, in schema declaration order.
 *
 * Covers the fields the artifact reported; a short reply truncates the mapping.
 */
export type ParsedRecord = Record<string, ParsedValue>;
