/**
 * CodeGenerator - renders a validated schema into C sources.
 *
 * Output per schema `Person`:
 * - header:         include guard, `typedef struct { ... } Person;`, the two exported prototypes
 * - implementation: static scanner helpers, `parse_and_serialize`, `free_serialized`
 * - driver:         `main` for process mode and serve mode (RECORDC_SERVE=1)
 *
 * Struct members, key-matching branches and serialised values all follow the
 * schema's field order, so the output is deterministic and diffable.
 */

import type { FieldSpec, RecordSchema } from '@recordc/types';
import { BuildError } from '../errors/RecordcError.js';
import { assertValidSchema } from '../schema/validateSchema.js';
import { FAILURE_LINE, SERVE_ENV, SERVE_ENV_VALUE, SUCCESS_SENTINEL } from '../runtime/protocol.js';
import { mapFieldKind } from './TypeMapper.js';
import { fillTemplate, loadTemplate } from './template.js';

export interface GeneratedSource {
  /** `<Name>.h` contents, ending with the header guard marker */
  header: string;
  /** `<Name>.c` contents */
  implementation: string;
  /** `main_<Name>.c` contents */
  driver: string;
  /** header + implementation in one text, split again by splitAtHeaderGuard */
  combined: string;
  /** `#endif // <Name>_H\n` */
  headerGuardEnd: string;
}

export interface SourceFileNames {
  header: string;
  implementation: string;
  driver: string;
  executable: string;
}

export function sourceFileNames(schemaName: string): SourceFileNames {
  return {
    header: `${schemaName}.h`,
    implementation: `${schemaName}.c`,
    driver: `main_${schemaName}.c`,
    executable: `parser_${schemaName}`,
  };
}

export function headerGuardEnd(schemaName: string): string {
  return `#endif // ${schemaName}_H\n`;
}

const INDENT = '    ';

function indent(lines: string[], depth: number): string {
  const prefix = INDENT.repeat(depth);
  return lines.map((line) => (line === '' ? line : prefix + line)).join('\n');
}

// =============================================================================
// Per-kind fragments
// =============================================================================

function memberLine(field: FieldSpec): string {
  return `${INDENT}${mapFieldKind(field.kind)} ${field.name};`;
}

/**
 * Branch inside rc_parse for one recognised key. `key` is freed before the value is read.
 */
function parseBranch(field: FieldSpec): string[] {
  const open = [`if (strcmp(key, "${field.name}") == 0) {`, `${INDENT}free(key);`];
  const close = [`${INDENT}continue;`, '}'];

  switch (field.kind) {
    case 'string':
      return [
        ...open,
        `${INDENT}char* value = rc_read_string(&ptr);`,
        `${INDENT}if (value == NULL) {`,
        `${INDENT}${INDENT}return -1;`,
        `${INDENT}}`,
        `${INDENT}free(out->${field.name});`,
        `${INDENT}out->${field.name} = value;`,
        ...close,
      ];
    case 'integer':
      return [
        ...open,
        `${INDENT}if (!rc_read_integer(&ptr, &out->${field.name})) {`,
        `${INDENT}${INDENT}return -1;`,
        `${INDENT}}`,
        ...close,
      ];
    case 'boolean':
      return [
        ...open,
        `${INDENT}if (!rc_read_boolean(&ptr, &out->${field.name})) {`,
        `${INDENT}${INDENT}return -1;`,
        `${INDENT}}`,
        ...close,
      ];
  }
}

/**
 * Appends `|value` for one field to the `out` buffer in parse_and_serialize.
 */
function serializeStatement(field: FieldSpec): string[] {
  const member = `record.${field.name}`;

  switch (field.kind) {
    case 'string':
      return [
        `ok = ok && rc_append(&out, "|") && rc_append(&out, ${member} != NULL ? ${member} : "");`,
      ];
    case 'integer':
      return [
        'if (ok) {',
        `${INDENT}char number[32];`,
        `${INDENT}snprintf(number, sizeof(number), "|%lld", (long long)${member});`,
        `${INDENT}ok = rc_append(&out, number);`,
        '}',
      ];
    case 'boolean':
      return [`ok = ok && rc_append(&out, ${member} ? "|true" : "|false");`];
  }
}

function releaseStatements(fields: readonly FieldSpec[]): string[] {
  const owned = fields.filter((field) => field.kind === 'string');
  if (owned.length === 0) {
    return ['(void)record;'];
  }
  return owned.flatMap((field) => [`free(record->${field.name});`, `record->${field.name} = NULL;`]);
}

// =============================================================================
// Units
// =============================================================================

export function generateHeader(schema: RecordSchema): string {
  return fillTemplate(
    loadTemplate('header.h.tmpl'),
    {
      guard: `${schema.name}_H`,
      name: schema.name,
      members: schema.fields.map(memberLine).join('\n'),
      successSentinel: SUCCESS_SENTINEL,
    },
    'header.h.tmpl'
  );
}

export function generateImplementation(schema: RecordSchema): string {
  return fillTemplate(
    loadTemplate('parser.c.tmpl'),
    {
      header: sourceFileNames(schema.name).header,
      name: schema.name,
      release: indent(releaseStatements(schema.fields), 1),
      branches: schema.fields.map((field) => indent(parseBranch(field), 2)).join('\n\n'),
      serializers: indent(schema.fields.flatMap(serializeStatement), 1),
      successSentinel: SUCCESS_SENTINEL,
    },
    'parser.c.tmpl'
  );
}

export function generateDriver(schema: RecordSchema): string {
  return fillTemplate(
    loadTemplate('driver.c.tmpl'),
    {
      header: sourceFileNames(schema.name).header,
      failureLine: FAILURE_LINE,
      serveEnv: SERVE_ENV,
      serveEnvValue: SERVE_ENV_VALUE,
    },
    'driver.c.tmpl'
  );
}

/**
 * Render all sources for a schema. Refuses schemas that fail validation
 * (THROWS the SchemaError) even though the builder validates first.
 */
export function generateSource(schema: RecordSchema): GeneratedSource {
  assertValidSchema(schema);

  const header = generateHeader(schema);
  const implementation = generateImplementation(schema);

  return {
    header,
    implementation,
    driver: generateDriver(schema),
    combined: `${header}\n${implementation}`,
    headerGuardEnd: headerGuardEnd(schema.name),
  };
}

/**
 * Split combined source at the header guard marker; the marker stays with the header.
 * THROWS BuildError(ERR_BUILD_TEMPLATE) when the marker is missing.
 */
export function splitAtHeaderGuard(combined: string, schemaName: string): { header: string; implementation: string } {
  const marker = headerGuardEnd(schemaName);
  const index = combined.indexOf(marker);
  if (index === -1) {
    throw new BuildError(
      `Generated source for ${schemaName} has no header guard marker`,
      'ERR_BUILD_TEMPLATE',
      { schema: schemaName, marker: marker.trimEnd() }
    );
  }

  const end = index + marker.length;
  return {
    header: combined.slice(0, end),
    implementation: combined.slice(end),
  };
}
