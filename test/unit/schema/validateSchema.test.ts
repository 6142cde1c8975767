/**
 * Schema validation tests
 *
 * One case per rule, plus rule ordering: when several rules are broken, the
 * earliest one in the list is reported.
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import {
  validateSchema,
  assertValidSchema,
  isIdentifier,
  SchemaError,
  type RecordSchemaInput,
} from '@recordc/core';
import { PERSON } from '../../helpers/schemas.js';

function errorCode(input: RecordSchemaInput): string | null {
  const result = validateSchema(input);
  return result.valid ? null : result.error.code;
}

describe('validateSchema', () => {
  it('should accept a valid schema and return a copy', () => {
    const result = validateSchema(PERSON);
    assert.strictEqual(result.valid, true);
    if (!result.valid) return;

    assert.deepStrictEqual(result.schema, PERSON);
    assert.notStrictEqual(result.schema, PERSON);
  });

  it('should accept leading underscores and digits after the first character', () => {
    assert.strictEqual(errorCode({ name: '_Rec2', fields: [{ name: '_x1', kind: 'integer' }] }), null);
  });

  describe('schema name', () => {
    it('should reject an empty name', () => {
      assert.strictEqual(errorCode({ name: '', fields: [{ name: 'a', kind: 'string' }] }), 'ERR_SCHEMA_EMPTY_NAME');
    });

    it('should reject a name that is not an identifier', () => {
      assert.strictEqual(errorCode({ name: '1Person', fields: [{ name: 'a', kind: 'string' }] }), 'ERR_SCHEMA_INVALID_NAME');
      assert.strictEqual(errorCode({ name: 'Per son', fields: [{ name: 'a', kind: 'string' }] }), 'ERR_SCHEMA_INVALID_NAME');
    });

    it('should reject a schema without fields', () => {
      assert.strictEqual(errorCode({ name: 'Empty', fields: [] }), 'ERR_SCHEMA_NO_FIELDS');
    });
  });

  describe('fields', () => {
    it('should reject an empty field name', () => {
      assert.strictEqual(errorCode({ name: 'R', fields: [{ name: '', kind: 'string' }] }), 'ERR_SCHEMA_EMPTY_FIELD_NAME');
    });

    it('should reject a field name that is not an identifier', () => {
      assert.strictEqual(errorCode({ name: 'R', fields: [{ name: 'first-name', kind: 'string' }] }), 'ERR_SCHEMA_INVALID_FIELD_NAME');
    });

    it('should reject duplicate field names', () => {
      const result = validateSchema({
        name: 'R',
        fields: [
          { name: 'a', kind: 'string' },
          { name: 'a', kind: 'integer' },
        ],
      });
      assert.strictEqual(result.valid, false);
      if (result.valid) return;
      assert.strictEqual(result.error.code, 'ERR_SCHEMA_DUPLICATE_FIELD');
      assert.deepStrictEqual(result.error.context, { schema: 'R', field: 'a', index: 1 });
    });

    it('should reject a missing, null or empty kind', () => {
      assert.strictEqual(errorCode({ name: 'R', fields: [{ name: 'a' }] }), 'ERR_SCHEMA_EMPTY_TYPE');
      assert.strictEqual(errorCode({ name: 'R', fields: [{ name: 'a', kind: null }] }), 'ERR_SCHEMA_EMPTY_TYPE');
      assert.strictEqual(errorCode({ name: 'R', fields: [{ name: 'a', kind: '' }] }), 'ERR_SCHEMA_EMPTY_TYPE');
    });

    it('should reject an unsupported kind with a suggestion', () => {
      const result = validateSchema({ name: 'R', fields: [{ name: 'ratio', kind: 'float' }] });
      assert.strictEqual(result.valid, false);
      if (result.valid) return;
      assert.strictEqual(result.error.code, 'ERR_SCHEMA_UNSUPPORTED_TYPE');
      assert.strictEqual(result.error.message, 'Unsupported type "float" for field "ratio" in R');
      assert.strictEqual(result.error.suggestion, 'Use one of: string, integer, boolean');
    });
  });

  describe('rule order', () => {
    it('should report the schema name before anything about fields', () => {
      assert.strictEqual(errorCode({ name: '', fields: [] }), 'ERR_SCHEMA_EMPTY_NAME');
      assert.strictEqual(errorCode({ name: '9', fields: [] }), 'ERR_SCHEMA_INVALID_NAME');
    });

    it('should report the first failing field in declaration order', () => {
      const input: RecordSchemaInput = {
        name: 'R',
        fields: [
          { name: 'ok', kind: 'string' },
          { name: 'bad', kind: 'float' },
          { name: '', kind: 'string' },
        ],
      };
      assert.strictEqual(errorCode(input), 'ERR_SCHEMA_UNSUPPORTED_TYPE');
    });

    it('should check a field name before its kind', () => {
      assert.strictEqual(errorCode({ name: 'R', fields: [{ name: 'x y', kind: 'float' }] }), 'ERR_SCHEMA_INVALID_FIELD_NAME');
    });
  });

  it('should be deterministic', () => {
    const input = { name: 'R', fields: [{ name: 'a', kind: 'nope' }] };
    assert.deepStrictEqual(validateSchema(input), validateSchema(input));
  });
});

describe('assertValidSchema', () => {
  it('should return the schema', () => {
    assert.deepStrictEqual(assertValidSchema(PERSON), PERSON);
  });

  it('should throw the SchemaError', () => {
    assert.throws(
      () => assertValidSchema({ name: 'R', fields: [] }),
      (err: unknown) => err instanceof SchemaError && err.code === 'ERR_SCHEMA_NO_FIELDS'
    );
  });
});

describe('isIdentifier', () => {
  it('should follow [A-Za-z_][A-Za-z0-9_]*', () => {
    assert.strictEqual(isIdentifier('a'), true);
    assert.strictEqual(isIdentifier('A_b9'), true);
    assert.strictEqual(isIdentifier('9a'), false);
    assert.strictEqual(isIdentifier('a.b'), false);
    assert.strictEqual(isIdentifier(''), false);
  });
});
