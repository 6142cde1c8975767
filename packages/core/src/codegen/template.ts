/**
 * C source templates.
 *
 * Templates live in packages/core/templates and use `{{placeholder}}` slots.
 */

import { readFileSync } from 'fs';
import { join } from 'path';
import { fileURLToPath } from 'url';
import { BuildError } from '../errors/RecordcError.js';

const PLACEHOLDER = /\{\{\s*([A-Za-z_][A-Za-z0-9_]*)\s*\}\}/g;

export type TemplateName = 'header.h.tmpl' | 'parser.c.tmpl' | 'driver.c.tmpl';

export const TEMPLATE_DIR = fileURLToPath(new URL('../../templates/', import.meta.url));

const cache = new Map<TemplateName, string>();

/**
 * Read a template from TEMPLATE_DIR. THROWS BuildError(ERR_BUILD_TEMPLATE).
 */
export function loadTemplate(name: TemplateName, templateDir: string = TEMPLATE_DIR): string {
  const useCache = templateDir === TEMPLATE_DIR;
  const cached = useCache ? cache.get(name) : undefined;
  if (cached !== undefined) {
    return cached;
  }

  let text: string;
  try {
    text = readFileSync(join(templateDir, name), 'utf-8');
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new BuildError(
      `Cannot load template ${name}: ${message}`,
      'ERR_BUILD_TEMPLATE',
      { template: name, templateDir }
    );
  }

  if (useCache) {
    cache.set(name, text);
  }
  return text;
}

/**
 * Substitute every `{{key}}`. THROWS BuildError(ERR_BUILD_TEMPLATE) when a slot has no value.
 */
export function fillTemplate(template: string, values: Readonly<Record<string, string>>, templateName = '<inline>'): string {
  const missing = new Set<string>();

  const filled = template.replace(PLACEHOLDER, (_match, key: string) => {
    if (!Object.hasOwn(values, key)) {
      missing.add(key);
      return '';
    }
    return values[key] ?? '';
  });

  if (missing.size > 0) {
    throw new BuildError(
      `Template ${templateName} has unresolved placeholders: ${[...missing].join(', ')}`,
      'ERR_BUILD_TEMPLATE',
      { template: templateName, missing: [...missing] }
    );
  }

  return filled;
}
