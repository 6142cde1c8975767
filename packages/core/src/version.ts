/**
 * recordc version constants.
 *
 * Read from @recordc/core's package.json at module load time.
 */
import { readFileSync } from 'fs';
import { join, dirname } from 'path';
import { fileURLToPath } from 'url';

const __dirname = dirname(fileURLToPath(import.meta.url));
const pkg: unknown = JSON.parse(readFileSync(join(__dirname, '..', 'package.json'), 'utf-8'));

function readVersion(manifest: unknown): string {
  if (typeof manifest === 'object' && manifest !== null && 'version' in manifest && typeof manifest.version === 'string') {
    return manifest.version;
  }
  return '0.0.0';
}

/** Full recordc version string (e.g., "0.1.0") */
export const RECORDC_VERSION: string = readVersion(pkg);

/**
 * Version of the artifact wire protocol: `SUCCESS|v1|...|vN`, values correlated
 * with fields by position.
 */
export const PROTOCOL_VERSION = 1;

/**
 * Extract major.minor.patch from a version string, stripping pre-release tags.
 *
 * "0.1.0-beta" → "0.1.0"
 * "1.0.0-alpha.1" → "1.0.0"
 */
export function getSchemaVersion(version: string): string {
  return version.split('-')[0] ?? version;
}
