import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert';
import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import { fillTemplate, loadTemplate, BuildError } from '@recordc/core';

describe('fillTemplate', () => {
  it('should substitute every placeholder, repeated ones included', () => {
    assert.strictEqual(
      fillTemplate('#ifndef {{guard}}\n#define {{ guard }}\n{{body}}', { guard: 'R_H', body: 'x' }),
      '#ifndef R_H\n#define R_H\nx'
    );
  });

  it('should accept empty values', () => {
    assert.strictEqual(fillTemplate('a{{x}}b', { x: '' }), 'ab');
  });

  it('should not treat inherited properties as values', () => {
    assert.throws(
      () => fillTemplate('{{toString}}', {}),
      (err: unknown) => err instanceof BuildError && err.code === 'ERR_BUILD_TEMPLATE'
    );
  });

  it('should list every unresolved placeholder', () => {
    assert.throws(
      () => fillTemplate('{{a}} {{b}} {{a}} {{c}}', { b: '1' }, 'test.tmpl'),
      (err: unknown) =>
        err instanceof BuildError &&
        err.message === 'Template test.tmpl has unresolved placeholders: a, c' &&
        JSON.stringify(err.context) === '{"template":"test.tmpl","missing":["a","c"]}'
    );
  });

  it('should leave text that is not a placeholder alone', () => {
    assert.strictEqual(fillTemplate('{ {x} } {{1x}}', {}), '{ {x} } {{1x}}');
  });
});

describe('loadTemplate', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'recordc-template-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('should load the bundled templates', () => {
    assert.ok(loadTemplate('header.h.tmpl').startsWith('#ifndef {{guard}}'));
    assert.ok(loadTemplate('parser.c.tmpl').includes('char* parse_and_serialize(const char* input) {'));
    assert.ok(loadTemplate('driver.c.tmpl').includes('int main(int argc, char* argv[]) {'));
  });

  it('should read from another directory', () => {
    writeFileSync(join(dir, 'driver.c.tmpl'), 'custom {{x}}');
    assert.strictEqual(loadTemplate('driver.c.tmpl', dir), 'custom {{x}}');
  });

  it('should throw ERR_BUILD_TEMPLATE when the file is missing', () => {
    assert.throws(
      () => loadTemplate('header.h.tmpl', dir),
      (err: unknown) => err instanceof BuildError && err.code === 'ERR_BUILD_TEMPLATE'
    );
  });
});
