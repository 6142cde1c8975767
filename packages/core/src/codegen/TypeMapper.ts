/**
 * TypeMapper - field kind → C type name
 */

import { isFieldKind, type FieldKind } from '@recordc/types';

export const C_TYPES: Readonly<Record<FieldKind, string>> = {
  string: 'char*',
  integer: 'int64_t',
  boolean: 'bool',
};

export function mapFieldKind(kind: FieldKind): string {
  switch (kind) {
    case 'string':
      return C_TYPES.string;
    case 'integer':
      return C_TYPES.integer;
    case 'boolean':
      return C_TYPES.boolean;
    default: {
      const unreachable: never = kind;
      throw new Error(`Unhandled field kind: ${String(unreachable)}`);
    }
  }
}

/**
 * Lookup for unvalidated kind strings. Returns null for anything outside the supported set.
 */
export function lookupCType(kind: string): string | null {
  return isFieldKind(kind) ? mapFieldKind(kind) : null;
}
