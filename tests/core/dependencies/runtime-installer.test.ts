import { describe, it, afterEach } from 'node:test';
import assert from 'node:assert/strict';
import { readFile } from 'node:fs/promises';
import path from 'node:path';

import {
  configureVersionManager,
  installRuntimeWithVersionManager,
  isRecognizableVersion,
  resolveRuntimeVersion,
  runtimeToolName
} from '../../../src/core/dependencies/runtime-installer.js';
import type { ExecResult } from '../../../src/utils/exec.js';
import { CriticalTaskError, MissingCommandError } from '../../../src/utils/errors.js';
import { createTestContext, fail, installFakeBinaries, ok, removeTempDir } from '../../test-helpers.js';

const homes: string[] = [];
const LOG = '/tmp/riverspider_setup_test.log';

async function setup() {
  const test = await createTestContext();
  homes.push(test.home);
  return test;
}

afterEach(async () => {
  await Promise.all(homes.splice(0).map(removeTempDir));
});

function miseResponder(overrides: Partial<Record<string, ExecResult>> = {}) {
  const defaults: Record<string, ExecResult> = {
    latest: ok('openjdk-23.0.2\n'),
    install: ok(),
    use: ok(),
    exec: { code: 0, stdout: '', stderr: 'openjdk version "23.0.2" 2025-01-21\n' }
  };
  return (args: string[]): ExecResult => overrides[args[0]] ?? defaults[args[0]] ?? fail(2);
}

describe('isRecognizableVersion', () => {
  it('accepts the version strings mise prints', () => {
    assert.equal(isRecognizableVersion('openjdk-23.0.2'), true);
    assert.equal(isRecognizableVersion('21.0.5'), true);
  });

  it('rejects empty, multi-word and number-free output', () => {
    assert.equal(isRecognizableVersion(''), false);
    assert.equal(isRecognizableVersion('mise ERROR no versions found'), false);
    assert.equal(isRecognizableVersion('latest'), false);
  });
});

describe('runtimeToolName', () => {
  it('drops the variant after @', () => {
    assert.equal(runtimeToolName('java@openjdk'), 'java');
    assert.equal(runtimeToolName('java'), 'java');
  });
});

describe('configureVersionManager', () => {
  it('adds the activation line once and checks activation', async () => {
    const { ctx, home, binDir, exec } = await setup();
    await installFakeBinaries(binDir, ['mise']);
    exec.on('mise', ok('export MISE_SHELL=zsh\n'));
    const facts = { shellProfilePath: path.join(home, '.zprofile'), versionManagerShell: 'zsh' as const };

    const mise = await configureVersionManager(ctx, facts);
    await configureVersionManager(ctx, facts);

    assert.equal(mise, path.join(binDir, 'mise'));
    assert.equal(await readFile(facts.shellProfilePath, 'utf8'), `\neval "$(${mise} activate zsh)"\n\n`);
    assert.deepEqual(exec.callsTo('mise').map(call => call.args), [['activate', 'zsh'], ['activate', 'zsh']]);
  });

  it('fails when activation fails', async () => {
    const { ctx, home, binDir, exec } = await setup();
    await installFakeBinaries(binDir, ['mise']);
    exec.on('mise', fail(1));

    await assert.rejects(
      configureVersionManager(ctx, { shellProfilePath: path.join(home, '.bash_profile'), versionManagerShell: 'bash' }),
      { message: 'Failed to activate mise environment.' }
    );
  });

  it('requires mise on PATH', async () => {
    const { ctx, home } = await setup();
    await assert.rejects(
      configureVersionManager(ctx, { shellProfilePath: path.join(home, '.zprofile'), versionManagerShell: 'zsh' }),
      MissingCommandError
    );
  });
});

describe('resolveRuntimeVersion', () => {
  it('uses the first line mise reports', async () => {
    const { ctx, exec, output } = await setup();
    exec.on('mise', ok('openjdk-23.0.2\nopenjdk-24-ea\n'));

    assert.equal(await resolveRuntimeVersion(ctx, 'mise'), 'openjdk-23.0.2');
    assert.deepEqual(exec.calls[0].args, ['latest', 'java@openjdk']);
    assert.ok(output.of('info').includes('Latest recommended Java version: openjdk-23.0.2'));
  });

  it('falls back when mise prints something unusable', async () => {
    const { ctx, exec } = await setup();
    exec.on('mise', ok('mise ERROR no versions found\n'));

    assert.equal(await resolveRuntimeVersion(ctx, 'mise'), 'openjdk-21');
    assert.deepEqual(ctx.warnings, ['Failed to determine the latest Java version. Falling back to openjdk-21.']);
  });

  it('falls back when mise fails', async () => {
    const { ctx, exec } = await setup();
    exec.on('mise', fail(1));

    assert.equal(await resolveRuntimeVersion(ctx, 'mise'), 'openjdk-21');
  });
});

describe('installRuntimeWithVersionManager', () => {
  it('installs, selects and verifies the runtime', async () => {
    const { ctx, binDir, exec, output } = await setup();
    await installFakeBinaries(binDir, ['mise']);
    exec.on('mise', miseResponder());

    assert.equal(await installRuntimeWithVersionManager(ctx), 'openjdk-23.0.2');

    assert.deepEqual(exec.callsTo('mise').map(call => call.args), [
      ['latest', 'java@openjdk'],
      ['install', 'java@openjdk-23.0.2'],
      ['use', '--global', 'java@openjdk-23.0.2'],
      ['exec', '--', 'java', '-version']
    ]);
    assert.deepEqual(output.of('success'), [
      'Successfully installed Java openjdk-23.0.2',
      'Successfully set Java openjdk-23.0.2 as the global default.',
      "Java installation verified successfully using 'mise exec'.",
      'Java openjdk-23.0.2 is ready'
    ]);
    assert.deepEqual(ctx.warnings, []);
  });

  it('only warns when verification fails', async () => {
    const { ctx, binDir, exec, output } = await setup();
    await installFakeBinaries(binDir, ['mise']);
    exec.on('mise', miseResponder({ exec: fail(1) }));

    assert.equal(await installRuntimeWithVersionManager(ctx), 'openjdk-23.0.2');
    assert.deepEqual(ctx.warnings, [`Java verification failed. Check log: ${LOG}`]);
    assert.deepEqual(output.of('message'), [
      'You can try verifying manually after restarting your terminal by running: java -version'
    ]);
  });

  it('aborts when the install fails', async () => {
    const { ctx, binDir, exec } = await setup();
    await installFakeBinaries(binDir, ['mise']);
    exec.on('mise', miseResponder({ install: fail(1) }));

    await assert.rejects(installRuntimeWithVersionManager(ctx), {
      message: `Failed to install Java openjdk-23.0.2. Check the log file: ${LOG}`
    });
    assert.equal(exec.callsTo('mise').length, 2);
  });

  it('aborts when the global default cannot be set', async () => {
    const { ctx, binDir, exec } = await setup();
    await installFakeBinaries(binDir, ['mise']);
    exec.on('mise', miseResponder({ use: fail(1) }));

    await assert.rejects(installRuntimeWithVersionManager(ctx), (error: unknown) => {
      assert.ok(error instanceof CriticalTaskError);
      assert.equal(error.message, `Failed to set Java openjdk-23.0.2 as the global default. Check log: ${LOG}`);
      return true;
    });
  });
});
