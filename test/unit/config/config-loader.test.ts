/**
 * Tests for the config loader
 */

import { describe, it, beforeEach, afterEach } from 'mocha';
import { strict as assert } from 'assert';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import {
  buildCargoArgv,
  filesModeConfig,
  loadConfigFile,
  loadProjectConfig,
  mergeConfigs,
  normalizeExt,
  resolveSessionConfig,
  validateFileConfig,
  validateGlobs,
} from '../../../src/config/config-loader';
import { CARGO_WATCH_DEFAULTS, DEFAULT_CONFIG_FILE } from '../../../src/config/types';
import { ErrorCode } from '../../../src/errors/error-codes';
import { ReforgeError } from '../../../src/errors/reforge-error';
import { ReloadLogger } from '../../../src/logging/reload-logger';

function assertReforgeError(fn: () => unknown, code: ErrorCode, message?: string): void {
  assert.throws(fn, (err: unknown) => {
    assert.ok(err instanceof ReforgeError, `expected ReforgeError, got ${String(err)}`);
    assert.equal(err.code, code);
    if (message !== undefined) {
      assert.equal(err.message, message);
    }
    return true;
  });
}

describe('Config Loader', () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'reforge-config-'));
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  const writeConfig = (content: string, name = DEFAULT_CONFIG_FILE): string => {
    const file = path.join(tempDir, name);
    fs.writeFileSync(file, content);
    return file;
  };

  describe('validateFileConfig', () => {
    it('should accept an empty document', () => {
      assert.deepEqual(validateFileConfig(null, 'cfg'), {});
    });

    it('should reject a non-mapping top level', () => {
      assertReforgeError(
        () => validateFileConfig(['watch'], 'cfg'),
        ErrorCode.E104_CONFIG_SCHEMA_INVALID,
        '[E104] Configuration schema validation failed: cfg: top level must be a mapping'
      );
    });

    it('should name the offending key', () => {
      assertReforgeError(
        () => validateFileConfig({ watch: 'src' }, 'cfg'),
        ErrorCode.E104_CONFIG_SCHEMA_INVALID,
        '[E104] Configuration schema validation failed: cfg: "watch" must be a list of strings'
      );
      assertReforgeError(
        () => validateFileConfig({ debounce_ms: -5 }, 'cfg'),
        ErrorCode.E104_CONFIG_SCHEMA_INVALID,
        '[E104] Configuration schema validation failed: cfg: "debounce_ms" must be a non-negative integer'
      );
      assertReforgeError(
        () => validateFileConfig({ release: 'yes' }, 'cfg'),
        ErrorCode.E104_CONFIG_SCHEMA_INVALID,
        '[E104] Configuration schema validation failed: cfg: "release" must be true or false'
      );
    });

    it('should require hooks to be lists of argv lists', () => {
      assertReforgeError(
        () => validateFileConfig({ pre_build: ['make', 'gen'] }, 'cfg'),
        ErrorCode.E104_CONFIG_SCHEMA_INVALID,
        '[E104] Configuration schema validation failed: cfg: "pre_build" must be a list of argv lists'
      );
      assert.deepEqual(validateFileConfig({ pre_build: [['make', 'gen']] }, 'cfg'), {
        pre_build: [['make', 'gen']],
      });
    });

    it('should ignore unknown keys', () => {
      assert.deepEqual(validateFileConfig({ colour: 'blue', grace_ms: 100 }, 'cfg'), { grace_ms: 100 });
    });
  });

  describe('loadConfigFile', () => {
    it('should parse YAML', () => {
      const file = writeConfig(
        ['watch:', '  - src', 'debounce_ms: 100', 'post_build:', '  - [echo, built]', ''].join('\n')
      );

      assert.deepEqual(loadConfigFile(file), {
        watch: ['src'],
        debounce_ms: 100,
        post_build: [['echo', 'built']],
      });
    });

    it('should turn a YAML syntax error into E104', () => {
      const file = writeConfig('watch: [src\n');
      assertReforgeError(() => loadConfigFile(file), ErrorCode.E104_CONFIG_SCHEMA_INVALID);
    });
  });

  describe('loadProjectConfig', () => {
    it('should return undefined without a default config file', () => {
      assert.equal(loadProjectConfig(tempDir, undefined), undefined);
    });

    it('should fail on a missing explicit config file', () => {
      const missing = path.join(tempDir, 'custom.yaml');
      assertReforgeError(
        () => loadProjectConfig(tempDir, 'custom.yaml'),
        ErrorCode.E101_CONFIG_FILE_NOT_FOUND,
        `[E101] Configuration file not found: ${missing}`
      );
    });

    it('should load an explicit config file relative to cwd', () => {
      writeConfig('grace_ms: 750\n', 'custom.yaml');
      assert.deepEqual(loadProjectConfig(tempDir, 'custom.yaml'), { grace_ms: 750 });
    });

    it('should warn and fall back when the file is broken', () => {
      const file = writeConfig('watch: 12\n');
      const logger = new ReloadLogger();

      assert.equal(loadProjectConfig(tempDir, undefined, logger), undefined);

      const warnings = logger.getByCategory('CONFIG').filter((e) => e.level === 'warn');
      assert.equal(warnings.length, 1);
      assert.equal(
        warnings[0].message,
        `failed to load ${file}: [E104] Configuration schema validation failed: ${file}: "watch" must be a list of strings`
      );
    });
  });

  describe('mergeConfigs', () => {
    it('should let the overlay replace fields wholesale', () => {
      const merged = mergeConfigs(
        { watch: ['src', 'tests'], debounce_ms: 100, release: true },
        { watch: ['lib'], release: false, debounce_ms: undefined }
      );
      assert.deepEqual(merged, { watch: ['lib'], debounce_ms: 100, release: false });
    });
  });

  describe('normalizeExt', () => {
    it('should strip dots and lowercase', () => {
      assert.equal(normalizeExt('.RS'), 'rs');
      assert.equal(normalizeExt(' ..toml '), 'toml');
      assert.equal(normalizeExt('md'), 'md');
    });
  });

  describe('validateGlobs', () => {
    it('should reject an empty glob', () => {
      assertReforgeError(
        () => validateGlobs(['**/target/**', ' ']),
        ErrorCode.E102_INVALID_COMMAND,
        '[E102] Invalid command or pattern in configuration: empty ignore glob'
      );
    });

    it('should accept ordinary globs', () => {
      assert.doesNotThrow(() => validateGlobs(['**/target/**', '*.tmp', 'docs/**/*.md']));
    });
  });

  describe('buildCargoArgv', () => {
    it('should default to a plain cargo build', () => {
      assert.deepEqual(buildCargoArgv({}), ['cargo', 'build']);
    });

    it('should add selection flags in a fixed order', () => {
      const argv = buildCargoArgv({
        features: ['tls', 'json'],
        no_default_features: true,
        all_features: true,
        bin: 'server',
        package: 'app',
        workspace: true,
        manifest_path: 'crates/app/Cargo.toml',
        release: true,
      });

      assert.deepEqual(argv, [
        'cargo',
        'build',
        '--release',
        '--manifest-path',
        'crates/app/Cargo.toml',
        '--workspace',
        '-p',
        'app',
        '--bin',
        'server',
        '--all-features',
        '--no-default-features',
        '--features',
        'tls,json',
      ]);
    });

    it('should skip an empty feature list', () => {
      assert.deepEqual(buildCargoArgv({ features: [] }), ['cargo', 'build']);
    });
  });

  describe('filesModeConfig', () => {
    it('should reject files that are not .rs', () => {
      fs.writeFileSync(path.join(tempDir, 'main.c'), '');
      assertReforgeError(
        () => filesModeConfig(['main.c'], tempDir, '/tmp/out'),
        ErrorCode.E103_INVALID_SOURCE_FILE,
        '[E103] Invalid source file: not a .rs file: main.c'
      );
    });

    it('should reject missing files', () => {
      assertReforgeError(
        () => filesModeConfig(['gone.rs'], tempDir, '/tmp/out'),
        ErrorCode.E103_INVALID_SOURCE_FILE,
        '[E103] Invalid source file: file does not exist: gone.rs'
      );
    });

    it('should compile the files to the output path and run it', () => {
      fs.writeFileSync(path.join(tempDir, 'main.rs'), 'fn main() {}\n');
      fs.writeFileSync(path.join(tempDir, 'util.rs'), '\n');

      const config = filesModeConfig(['main.rs', 'util.rs'], tempDir, '/tmp/out');

      assert.deepEqual(config.build, ['rustc', 'main.rs', 'util.rs', '-o', '/tmp/out']);
      assert.deepEqual(config.run, ['/tmp/out']);
      assert.deepEqual(config.watch, ['.']);
      assert.deepEqual(config.include_ext, ['rs']);
      assert.equal(config.clear, true);
    });
  });

  describe('resolveSessionConfig', () => {
    it('should use cargo defaults inside a cargo project', () => {
      fs.writeFileSync(path.join(tempDir, 'Cargo.toml'), '[package]\nname = "app"\n');

      const config = resolveSessionConfig({ cwd: tempDir, cli: {} });

      assert.deepEqual(config.watch, CARGO_WATCH_DEFAULTS);
      assert.deepEqual(config.ignore, ['**/target/**', '**/.git/**']);
      assert.deepEqual(config.includeExt, ['rs', 'toml']);
      assert.deepEqual(config.excludeExt, []);
      assert.equal(config.debounceMs, 250);
      assert.equal(config.graceMs, 5000);
      assert.equal(config.clear, true);
      assert.deepEqual(config.build, {
        program: 'cargo',
        args: ['build'],
        workingDir: tempDir,
        mode: 'package',
        outputPath: undefined,
        resolveArtifact: true,
      });
      assert.deepEqual(config.run, { kind: 'artifact', args: [] });
      assert.deepEqual(config.cargo, { manifestPath: undefined, package: undefined, bin: undefined, release: false });
      assert.ok(Object.isFrozen(config));
    });

    it('should watch the working directory outside a cargo project', () => {
      const config = resolveSessionConfig({ cwd: tempDir, cli: {} });
      assert.deepEqual(config.watch, ['.']);
    });

    it('should let CLI flags override the file field by field', () => {
      writeConfig('watch: [src, assets]\ndebounce_ms: 100\ngrace_ms: 900\n');

      const config = resolveSessionConfig({ cwd: tempDir, cli: { debounce_ms: 40 } });

      assert.deepEqual(config.watch, ['src', 'assets']);
      assert.equal(config.debounceMs, 40);
      assert.equal(config.graceMs, 900);
    });

    it('should run an explicit command without resolving an artifact', () => {
      const config = resolveSessionConfig({
        cwd: tempDir,
        cli: { build: ['make', 'all'], run: ['./bin/server', '--port', '8080'] },
      });

      assert.equal(config.build.mode, 'override');
      assert.equal(config.build.program, 'make');
      assert.deepEqual(config.build.args, ['all']);
      assert.equal(config.build.resolveArtifact, false);
      assert.deepEqual(config.run, { kind: 'command', program: './bin/server', args: ['--port', '8080'] });
    });

    it('should derive the build argv from the cargo selection', () => {
      const config = resolveSessionConfig({ cwd: tempDir, cli: { package: 'app', release: true, bin: 'api' } });

      assert.deepEqual(config.build.args, ['build', '--release', '-p', 'app', '--bin', 'api']);
      assert.deepEqual(config.cargo, { manifestPath: undefined, package: 'app', bin: 'api', release: true });
    });

    it('should normalise and de-duplicate extensions', () => {
      const config = resolveSessionConfig({
        cwd: tempDir,
        cli: { include_ext: ['.RS', 'rs', 'toml'], exclude_ext: ['.Bak'] },
      });

      assert.deepEqual(config.includeExt, ['rs', 'toml']);
      assert.deepEqual(config.excludeExt, ['bak']);
    });

    it('should collect hooks and default missing ones to empty', () => {
      writeConfig('pre_build:\n  - [cargo, fmt]\n  - [cargo, clippy]\n');

      const config = resolveSessionConfig({ cwd: tempDir, cli: {} });

      assert.deepEqual(config.hooks.pre_build, [
        ['cargo', 'fmt'],
        ['cargo', 'clippy'],
      ]);
      assert.deepEqual(config.hooks.post_run, []);
      assert.deepEqual(config.hooks.on_build_fail, []);
    });

    it('should reject an empty hook step', () => {
      assertReforgeError(
        () => resolveSessionConfig({ cwd: tempDir, cli: { pre_run: [['echo', 'ok'], []] } }),
        ErrorCode.E102_INVALID_COMMAND,
        '[E102] Invalid command or pattern in configuration: pre_run[1] argv is empty'
      );
    });

    it('should reject an empty run argv', () => {
      assertReforgeError(
        () => resolveSessionConfig({ cwd: tempDir, cli: { run: [] } }),
        ErrorCode.E102_INVALID_COMMAND,
        '[E102] Invalid command or pattern in configuration: run argv is empty'
      );
    });

    it('should build files mode around the given sources', () => {
      fs.writeFileSync(path.join(tempDir, 'main.rs'), 'fn main() {}\n');
      writeConfig('watch: [elsewhere]\n');

      const config = resolveSessionConfig({
        cwd: tempDir,
        cli: {},
        files: ['main.rs'],
        outputPath: '/tmp/reforge-test-out',
      });

      assert.equal(config.build.mode, 'direct');
      assert.equal(config.build.program, 'rustc');
      assert.deepEqual(config.build.args, ['main.rs', '-o', '/tmp/reforge-test-out']);
      assert.equal(config.build.outputPath, '/tmp/reforge-test-out');
      assert.deepEqual(config.run, { kind: 'command', program: '/tmp/reforge-test-out', args: [] });
      assert.deepEqual(config.watch, ['.']);
      assert.deepEqual(config.includeExt, ['rs']);
    });
  });
});
