import { describe, it } from 'node:test';
import assert from 'node:assert/strict';

import { buildProfileInjection, renderShellFunctionBlock } from '../../../src/core/projector/shell-functions.js';

const PROFILES = { zsh: '.zprofile', bash: '.bash_profile' };

describe('renderShellFunctionBlock', () => {
  const block = renderShellFunctionBlock(PROFILES);
  const lines = block.split('\n');

  it('is framed by the section banners and ends with a newline', () => {
    assert.equal(lines[0], '#=======  River Spider helper function =======');
    assert.equal(lines[1], 'riverspider() {');
    assert.equal(lines[lines.length - 2], '#========================================');
    assert.equal(lines[lines.length - 1], '');
  });

  it('searches for the project the same way the installer does', () => {
    assert.ok(lines.includes(
      '    RIVER_SPIDER_DIR=$(fd --type f submit.sh "$HOME" --exec dirname {} \\; | grep "/riverSpider$" | head -n 1)'
    ));
    assert.ok(lines.includes('  "$RIVER_SPIDER_DIR/submit.sh" "$(realpath "$ttpasm_file")"'));
  });

  it('writes the configured profile basenames into the profile updater', () => {
    const custom = renderShellFunctionBlock({ zsh: '.zshrc', bash: '.bashrc' }).split('\n');
    assert.ok(custom.includes('    zsh) shell_profile="${ZDOTDIR:-$HOME}/.zshrc" ;;'));
    assert.ok(custom.includes('    bash) shell_profile="$HOME/.bashrc" ;;'));
  });

  it('opens the bundled circuits from the companion functions', () => {
    const logproc = lines.indexOf('logproc() {');
    assert.notEqual(logproc, -1);
    assert.equal(lines[logproc + 1], '  java -jar "$RIVER_SPIDER_DIR/logisim310.jar" "$RIVER_SPIDER_DIR/processor0004.circ"');
    assert.ok(lines.includes('logalu() {'));
    assert.ok(lines.includes('logreg() {'));
    assert.ok(lines.includes('logisim() {'));
  });
});

describe('buildProfileInjection', () => {
  it('marks the block by the primary function declaration', () => {
    const injection = buildProfileInjection(PROFILES);
    assert.equal(injection.marker, 'riverspider()');
    assert.equal(injection.block, renderShellFunctionBlock(PROFILES));
  });
});
