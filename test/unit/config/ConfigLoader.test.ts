/**
 * ConfigLoader Tests
 *
 * Tests:
 * - No config returns defaults
 * - Valid YAML is merged over defaults
 * - Unparseable YAML warns and falls back to defaults
 * - Invalid values throw ConfigError
 * - Version compatibility check
 * - buildOptionsFromConfig mapping
 */

import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert';
import { mkdirSync, mkdtempSync, writeFileSync, rmSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import {
  loadConfig,
  validateVersion,
  buildOptionsFromConfig,
  DEFAULT_CONFIG,
  RECORDC_VERSION,
  getSchemaVersion,
  ConfigError,
} from '@recordc/core';

// =============================================================================
// Test Helpers
// =============================================================================

interface LoggerMock {
  warnings: string[];
  warn: (msg: string) => void;
}

function createLoggerMock(): LoggerMock {
  const warnings: string[] = [];
  return {
    warnings,
    warn: (msg: string) => warnings.push(msg),
  };
}

// =============================================================================
// TESTS: ConfigLoader
// =============================================================================

describe('ConfigLoader', () => {
  let projectDir: string;

  beforeEach(() => {
    projectDir = mkdtempSync(join(tmpdir(), 'recordc-config-'));
    mkdirSync(join(projectDir, '.recordc'));
  });

  afterEach(() => {
    rmSync(projectDir, { recursive: true, force: true });
  });

  function writeConfig(yaml: string): void {
    writeFileSync(join(projectDir, '.recordc', 'config.yaml'), yaml);
  }

  describe('defaults', () => {
    it('should return defaults when no config file exists', () => {
      const logger = createLoggerMock();
      const config = loadConfig(projectDir, logger);

      assert.deepStrictEqual(config, {
        version: getSchemaVersion(RECORDC_VERSION),
        backend: 'process',
        parseTimeoutMs: 10000,
        compiler: { command: undefined, flags: ['-O2', '-std=c99'], timeoutMs: 60000 },
        workspaceRoot: undefined,
        logLevel: 'warnings',
        logFile: undefined,
      });
      assert.deepStrictEqual(logger.warnings, []);
    });

    it('should treat an empty file as defaults', () => {
      writeConfig('# nothing here\n');
      const config = loadConfig(projectDir, createLoggerMock());
      assert.strictEqual(config.backend, DEFAULT_CONFIG.backend);
      assert.deepStrictEqual(config.compiler.flags, DEFAULT_CONFIG.compiler.flags);
    });

    it('should not share the default flags array', () => {
      const config = loadConfig(projectDir, createLoggerMock());
      config.compiler.flags.push('-g');
      assert.deepStrictEqual(DEFAULT_CONFIG.compiler.flags, ['-O2', '-std=c99']);
    });
  });

  describe('YAML config', () => {
    it('should merge a partial config over defaults', () => {
      writeConfig(`backend: worker
parseTimeoutMs: 2500
compiler:
  command: clang
logLevel: debug
`);
      const config = loadConfig(projectDir, createLoggerMock());

      assert.strictEqual(config.backend, 'worker');
      assert.strictEqual(config.parseTimeoutMs, 2500);
      assert.strictEqual(config.compiler.command, 'clang');
      assert.deepStrictEqual(config.compiler.flags, ['-O2', '-std=c99']);
      assert.strictEqual(config.compiler.timeoutMs, 60000);
      assert.strictEqual(config.logLevel, 'debug');
    });

    it('should read compiler flags and paths', () => {
      writeConfig(`compiler:
  flags: ["-O0", "-g"]
  timeoutMs: 0
workspaceRoot: .recordc/build
logFile: .recordc/recordc.log
`);
      const config = loadConfig(projectDir, createLoggerMock());

      assert.deepStrictEqual(config.compiler.flags, ['-O0', '-g']);
      assert.strictEqual(config.compiler.timeoutMs, 0);
      assert.strictEqual(config.workspaceRoot, '.recordc/build');
      assert.strictEqual(config.logFile, '.recordc/recordc.log');
    });

    it('should warn about unknown keys', () => {
      writeConfig('backend: process\nplugins: []\ncompiler:\n  optimize: true\n');
      const logger = createLoggerMock();
      loadConfig(projectDir, logger);

      assert.deepStrictEqual(logger.warnings, [
        'Unknown config key "plugins" ignored',
        'Unknown config key "compiler.optimize" ignored',
      ]);
    });

    it('should fall back to defaults on a YAML syntax error', () => {
      writeConfig('backend: [process\n');
      const logger = createLoggerMock();
      const config = loadConfig(projectDir, logger);

      assert.strictEqual(config.backend, 'process');
      assert.strictEqual(logger.warnings.length, 2);
      assert.ok(logger.warnings[0]?.startsWith('Failed to parse config.yaml:'));
      assert.strictEqual(logger.warnings[1], 'Using default configuration');
    });
  });

  describe('invalid values', () => {
    const cases: [string, string, RegExp][] = [
      ['unknown backend', 'backend: threads\n', /backend must be "process" or "worker", got "threads"/],
      ['negative timeout', 'parseTimeoutMs: -1\n', /parseTimeoutMs must be a non-negative integer, got -1/],
      ['fractional timeout', 'parseTimeoutMs: 1.5\n', /parseTimeoutMs must be a non-negative integer/],
      ['compiler not a mapping', 'compiler: gcc\n', /compiler must be a mapping, got string/],
      ['flags not a list', 'compiler:\n  flags: -O2\n', /compiler.flags must be an array, got string/],
      ['empty flag', 'compiler:\n  flags: ["-O2", ""]\n', /compiler.flags\[1\] must be a non-empty string/],
      ['blank command', 'compiler:\n  command: "  "\n', /compiler.command cannot be empty/],
      ['unknown log level', 'logLevel: loud\n', /logLevel must be one of/],
      ['top level list', '- backend\n', /must be a mapping, got array/],
    ];

    for (const [label, yaml, pattern] of cases) {
      it(`should throw ConfigError for ${label}`, () => {
        writeConfig(yaml);
        assert.throws(
          () => loadConfig(projectDir, createLoggerMock()),
          (err: unknown) => err instanceof ConfigError && pattern.test(err.message)
        );
      });
    }
  });

  describe('validateVersion', () => {
    it('should accept a missing version', () => {
      assert.doesNotThrow(() => validateVersion(undefined));
      assert.doesNotThrow(() => validateVersion(null));
    });

    it('should compare major.minor.patch only', () => {
      assert.doesNotThrow(() => validateVersion('0.1.0', '0.1.0-beta.2'));
    });

    it('should reject a different version', () => {
      assert.throws(
        () => validateVersion('0.2.0', '0.1.0'),
        (err: unknown) =>
          err instanceof ConfigError &&
          err.message === 'Config error: config version "0.2.0" is not compatible with recordc 0.1.0. Expected "0.1.0".'
      );
    });

    it('should reject non-string and empty versions', () => {
      assert.throws(() => validateVersion(1), /version must be a string, got number/);
      assert.throws(() => validateVersion('  '), /version cannot be empty/);
    });

    it('should check the version in config.yaml', () => {
      writeConfig('version: "99.0.0"\n');
      assert.throws(() => loadConfig(projectDir, createLoggerMock()), ConfigError);
    });
  });

  describe('buildOptionsFromConfig', () => {
    it('should resolve workspaceRoot against the project', () => {
      writeConfig('backend: worker\nworkspaceRoot: build\ncompiler:\n  command: gcc\n');
      const config = loadConfig(projectDir, createLoggerMock());
      const options = buildOptionsFromConfig(config, projectDir);

      assert.deepStrictEqual(options, {
        backend: 'worker',
        compiler: 'gcc',
        compilerFlags: ['-O2', '-std=c99'],
        buildTimeoutMs: 60000,
        parseTimeoutMs: 10000,
        workspaceRoot: join(projectDir, 'build'),
        logger: undefined,
      });
    });

    it('should leave workspaceRoot unset by default', () => {
      const options = buildOptionsFromConfig(DEFAULT_CONFIG, projectDir);
      assert.strictEqual(options.workspaceRoot, undefined);
    });
  });
});
