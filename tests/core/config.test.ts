import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert/strict';
import { writeFile } from 'node:fs/promises';
import path from 'node:path';

import { ConfigManager, DEFAULT_CONFIG, getConfigDirectory, mergeConfig, validateConfigFile } from '../../src/core/config.js';
import { ConfigError } from '../../src/utils/errors.js';
import { makeTempDir, removeTempDir } from '../test-helpers.js';

let dir: string;

beforeEach(async () => {
  dir = await makeTempDir('riverspider-config-');
});

afterEach(async () => {
  await removeTempDir(dir);
});

describe('ConfigManager', () => {
  it('uses the defaults when no config file exists', async () => {
    const config = await new ConfigManager(dir).load();
    assert.deepEqual(config, DEFAULT_CONFIG);
  });

  it('merges a JSONC file with comments and trailing commas over the defaults', async () => {
    await writeFile(
      path.join(dir, 'config.jsonc'),
      [
        '{',
        '  // course mirror',
        '  "archive": { "fileId": "test-file-id", },',
        '  "resolver": { "maxAttempts": 5 },',
        '  "packages": ["fd"],',
        '}'
      ].join('\n'),
      'utf8'
    );

    const config = await new ConfigManager(dir).load();

    assert.equal(config.archive.fileId, 'test-file-id');
    assert.equal(config.archive.fileName, 'riverSpiderForMac.zip');
    assert.equal(config.resolver.maxAttempts, 5);
    assert.deepEqual(config.packages, ['fd']);
    assert.deepEqual(config.toolsToVerify, DEFAULT_CONFIG.toolsToVerify);
    assert.deepEqual(config.profiles, { zsh: '.zprofile', bash: '.bash_profile' });
  });

  it('prefers config.jsonc over config.json', async () => {
    await writeFile(path.join(dir, 'config.json'), '{ "runtime": { "fallbackVersion": "openjdk-17" } }', 'utf8');
    await writeFile(path.join(dir, 'config.jsonc'), '{ "runtime": { "fallbackVersion": "openjdk-22" } }', 'utf8');

    const config = await new ConfigManager(dir).load();

    assert.equal(config.runtime.fallbackVersion, 'openjdk-22');
    assert.equal(config.runtime.name, 'java@openjdk');
  });

  it('reports syntax errors as ConfigError', async () => {
    await writeFile(path.join(dir, 'config.json'), '{ "packages": [ }', 'utf8');
    await assert.rejects(new ConfigManager(dir).load(), ConfigError);
  });

  it('caches the loaded configuration', async () => {
    const manager = new ConfigManager(dir);
    const first = await manager.load();
    await writeFile(path.join(dir, 'config.json'), '{ "packages": ["wget"] }', 'utf8');
    assert.equal(await manager.load(), first);
  });
});

describe('validateConfigFile', () => {
  it('rejects a non-positive attempt cap', () => {
    assert.throws(
      () => validateConfigFile({ resolver: { maxAttempts: 0 } }),
      { message: "Invalid configuration: 'resolver.maxAttempts' must be a positive integer" }
    );
  });

  it('rejects malformed lists and sections', () => {
    assert.throws(() => validateConfigFile({ packages: 'fd' }), ConfigError);
    assert.throws(() => validateConfigFile({ profiles: ['.zprofile'] }), ConfigError);
    assert.throws(() => validateConfigFile({ profiles: { zsh: '' } }), ConfigError);
    assert.throws(() => validateConfigFile([]), ConfigError);
  });

  it('leaves unset keys undefined so mergeConfig keeps the defaults', () => {
    const merged = mergeConfig(DEFAULT_CONFIG, validateConfigFile({ profiles: { bash: '.bashrc' } }));
    assert.deepEqual(merged.profiles, { zsh: '.zprofile', bash: '.bashrc' });
    assert.equal(merged.resolver.maxAttempts, 3);
    assert.equal(merged.packageManager.path, undefined);
  });

  it('reads a Homebrew location override', () => {
    const merged = mergeConfig(DEFAULT_CONFIG, validateConfigFile({ packageManager: { path: '/opt/brew/bin/brew' } }));
    assert.equal(merged.packageManager.path, '/opt/brew/bin/brew');
    assert.throws(() => validateConfigFile({ packageManager: { path: 42 } }), {
      message: "Invalid configuration: 'packageManager.path' must be a non-empty string"
    });
  });
});

describe('getConfigDirectory', () => {
  it('defaults to ~/.riverspider and honours RIVERSPIDER_CONFIG_DIR', () => {
    assert.equal(getConfigDirectory('/Users/student', {}), path.join('/Users/student', '.riverspider'));
    assert.equal(getConfigDirectory('/Users/student', { RIVERSPIDER_CONFIG_DIR: '/opt/rs' }), '/opt/rs');
  });
});
