import { describe, it, afterEach } from 'node:test';
import assert from 'node:assert/strict';
import { mkdir, readFile, writeFile } from 'node:fs/promises';
import path from 'node:path';

import {
  absolutizeScriptPaths,
  buildPatchRules,
  injectShellFunctions,
  projectDirExportLine,
  setProjectDirVariable
} from '../../../src/core/projector/config-projector.js';
import { renderShellFunctionBlock } from '../../../src/core/projector/shell-functions.js';
import type { TargetDirectoryHandle } from '../../../src/types/index.js';
import { ValidationError } from '../../../src/utils/errors.js';
import { createTestContext, removeTempDir } from '../../test-helpers.js';

const homes: string[] = [];

async function setup() {
  const test = await createTestContext();
  homes.push(test.home);
  const project = path.join(test.home, 'riverSpider');
  await mkdir(project);
  const handle: TargetDirectoryHandle = { path: project, origin: 'found_existing' };
  const facts = { shellProfilePath: path.join(test.home, '.zprofile') };
  return { ...test, project, handle, facts };
}

afterEach(async () => {
  await Promise.all(homes.splice(0).map(removeTempDir));
});

const SUBMIT_SCRIPT = [
  '#!/bin/bash',
  'secretPath=secretString.txt',
  'webappUrlPath=webapp.url',
  'logisimPath=logisim310.jar',
  'processorCircPath=processor0004.circ',
  'echo "submitting"',
  ''
].join('\n');

describe('projectDirExportLine', () => {
  it('quotes the directory', () => {
    assert.equal(projectDirExportLine('/Users/s/riverSpider'), 'export RIVER_SPIDER_DIR="/Users/s/riverSpider"');
  });
});

describe('buildPatchRules', () => {
  it('maps every relative declaration to an absolute one', () => {
    const rules = buildPatchRules('/p');
    assert.equal(rules.length, 5);
    assert.deepEqual(rules[0], {
      oldLine: 'secretPath=secretString.txt',
      newLine: 'secretPath="/p/secretString.txt"',
      description: 'Secret File'
    });
    assert.deepEqual(rules.map(rule => rule.oldLine.split('=')[0]), [
      'secretPath',
      'webappUrlPath',
      'logisimPath',
      'processorCircPath',
      'urlencodeSedPath'
    ]);
  });
});

describe('setProjectDirVariable', () => {
  it('replaces an older location and exports the variable for this run', async () => {
    const { ctx, project, handle, facts } = await setup();
    await writeFile(facts.shellProfilePath, 'export RIVER_SPIDER_DIR="/Users/old/riverSpider"\nexport A=1\n', 'utf8');

    assert.equal(await setProjectDirVariable(ctx, facts, handle), 'replaced');
    assert.equal(ctx.env.RIVER_SPIDER_DIR, project);
    assert.equal(
      await readFile(facts.shellProfilePath, 'utf8'),
      `export RIVER_SPIDER_DIR="${project}"\nexport A=1\n`
    );

    assert.equal(await setProjectDirVariable(ctx, facts, handle), 'unchanged');
  });

  it('appends the line to a fresh profile', async () => {
    const { ctx, project, handle, facts } = await setup();

    assert.equal(await setProjectDirVariable(ctx, facts, handle), 'appended');
    assert.equal(await readFile(facts.shellProfilePath, 'utf8'), `\nexport RIVER_SPIDER_DIR="${project}"\n\n`);
  });

  it('rejects a handle that is not a directory', async () => {
    const { ctx, home, facts } = await setup();
    await assert.rejects(
      setProjectDirVariable(ctx, facts, { path: path.join(home, 'missing'), origin: 'found_existing' }),
      ValidationError
    );
  });
});

describe('absolutizeScriptPaths', () => {
  it('applies each rule on its own and warns about the missing one', async () => {
    const { ctx, project, handle } = await setup();
    const script = path.join(project, 'submit.sh');
    await writeFile(script, SUBMIT_SCRIPT, 'utf8');

    const outcomes = await absolutizeScriptPaths(ctx, handle);

    assert.deepEqual(outcomes.map(outcome => outcome.result.status), [
      'replaced',
      'replaced',
      'replaced',
      'replaced',
      'skipped'
    ]);
    assert.deepEqual(ctx.warnings, ["Could not find 'URLEncode Sed Script' in 'submit.sh'"]);
    assert.equal(
      await readFile(script, 'utf8'),
      [
        '#!/bin/bash',
        `secretPath="${project}/secretString.txt"`,
        `webappUrlPath="${project}/webapp.url"`,
        `logisimPath="${project}/logisim310.jar"`,
        `processorCircPath="${project}/processor0004.circ"`,
        'echo "submitting"',
        ''
      ].join('\n')
    );
  });

  it('leaves the script byte-identical on a second run', async () => {
    const { ctx, project, handle, output } = await setup();
    const script = path.join(project, 'submit.sh');
    await writeFile(script, SUBMIT_SCRIPT, 'utf8');

    await absolutizeScriptPaths(ctx, handle);
    const first = await readFile(script, 'utf8');
    const outcomes = await absolutizeScriptPaths(ctx, handle);

    assert.equal(await readFile(script, 'utf8'), first);
    assert.equal(outcomes.filter(outcome => outcome.result.status === 'already-set').length, 4);
    assert.ok(output.of('success').includes('Secret File path appears to be already correctly set in submit.sh.'));
  });
});

describe('injectShellFunctions', () => {
  it('adds the helper block once', async () => {
    const { ctx, facts, output } = await setup();
    await writeFile(facts.shellProfilePath, 'export A=1\n', 'utf8');

    assert.equal(await injectShellFunctions(ctx, facts), 'added');
    assert.equal(await injectShellFunctions(ctx, facts), 'present');

    assert.equal(
      await readFile(facts.shellProfilePath, 'utf8'),
      `export A=1\n${renderShellFunctionBlock(ctx.config.profiles)}\n`
    );
    assert.deepEqual(output.of('success'), [
      "Added 'riverspider' helper function to shell profile",
      "'riverspider' helper function already in shell profile"
    ]);
  });
});
