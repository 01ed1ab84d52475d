import { describe, it, afterEach, mock } from 'node:test';
import assert from 'node:assert/strict';

import { createCliSetupContext } from '../../src/cli/context.js';
import { cloneConfig } from '../test-helpers.js';

const LOG = '/tmp/riverspider_setup_test.log';

function captureConsole() {
  return {
    stdout: mock.method(console, 'log', (..._args: unknown[]) => undefined),
    stderr: mock.method(console, 'error', (..._args: unknown[]) => undefined)
  };
}

afterEach(() => {
  mock.restoreAll();
});

describe('createCliSetupContext', () => {
  it('prints plain lines in verbose mode and keeps prompts interactive', () => {
    const ctx = createCliSetupContext({ config: cloneConfig(), logFile: LOG, interactive: true, verbose: true });
    const { stdout } = captureConsole();

    ctx.output.info('Checking for Homebrew...');
    const spinner = ctx.output.spinner();
    spinner.start('Updating Homebrew');
    spinner.stop();

    assert.equal(ctx.prompt.interactive, true);
    assert.deepEqual(
      stdout.mock.calls.map(call => call.arguments[0]),
      ['==> Checking for Homebrew...', '==> Updating Homebrew...']
    );
  });

  it('drops informational lines in quiet mode', () => {
    const ctx = createCliSetupContext({ config: cloneConfig(), logFile: LOG, interactive: false, quiet: true });
    const { stdout, stderr } = captureConsole();

    ctx.output.info('Checking for Homebrew...');
    ctx.output.success('Homebrew already installed');
    ctx.output.warn('Java verification failed.');

    assert.equal(ctx.prompt.interactive, false);
    assert.equal(stdout.mock.calls.length, 0);
    assert.deepEqual(stderr.mock.calls.map(call => call.arguments[0]), ['Warning: Java verification failed.']);
  });
});
