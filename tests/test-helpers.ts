import { chmod, mkdir, mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';

import type { RiverSpiderConfig, SetupContext } from '../src/types/index.js';
import type { CommandExecutor, ExecOptions, ExecResult } from '../src/utils/exec.js';
import type { OutputPort, UnifiedSpinner } from '../src/core/ports/output.js';
import type { PromptPort, TextPromptOptions } from '../src/core/ports/prompt.js';
import type { ProgressEvent, ProgressPort } from '../src/core/ports/progress.js';
import { nonInteractivePrompt } from '../src/core/ports/console-prompt.js';
import { DEFAULT_CONFIG } from '../src/core/config.js';

export interface ExecCall {
  command: string;
  args: string[];
  options?: ExecOptions;
}

type Responder = (args: string[], options?: ExecOptions) => ExecResult | Promise<ExecResult>;

export function ok(stdout: string = ''): ExecResult {
  return { code: 0, stdout, stderr: '' };
}

export function fail(code: number = 1, stderr: string = 'failed'): ExecResult {
  return { code, stdout: '', stderr };
}

/**
 * CommandExecutor stand-in. Responders are keyed by the command's basename
 * so absolute tool paths and bare names both match. Unknown commands exit 127.
 */
export class FakeExecutor implements CommandExecutor {
  readonly calls: ExecCall[] = [];
  private responders = new Map<string, Responder>();

  on(command: string, responder: Responder | ExecResult): this {
    this.responders.set(command, typeof responder === 'function' ? responder : () => responder);
    return this;
  }

  async run(command: string, args: string[], options?: ExecOptions): Promise<ExecResult> {
    this.calls.push({ command, args, options });
    const responder = this.responders.get(path.basename(command));
    if (!responder) {
      return { code: 127, stdout: '', stderr: `${command}: command not found` };
    }
    return responder(args, options);
  }

  callsTo(command: string): ExecCall[] {
    return this.calls.filter(call => path.basename(call.command) === command);
  }
}

export type OutputKind = 'info' | 'step' | 'message' | 'success' | 'error' | 'warn' | 'note';

export class RecordingOutput implements OutputPort {
  readonly lines: Array<{ kind: OutputKind; text: string }> = [];
  readonly spinners: string[] = [];

  private record(kind: OutputKind, text: string): void {
    this.lines.push({ kind, text });
  }

  of(kind: OutputKind): string[] {
    return this.lines.filter(line => line.kind === kind).map(line => line.text);
  }

  info(message: string): void { this.record('info', message); }
  step(message: string): void { this.record('step', message); }
  message(message: string): void { this.record('message', message); }
  success(message: string): void { this.record('success', message); }
  error(message: string): void { this.record('error', message); }
  warn(message: string): void { this.record('warn', message); }
  note(content: string, title?: string): void { this.record('note', title ? `${title}\n${content}` : content); }

  spinner(): UnifiedSpinner {
    const spinners = this.spinners;
    return {
      start(message: string) { spinners.push(message); },
      stop() {},
      message() {}
    };
  }
}

export class RecordingProgress implements ProgressPort {
  readonly events: ProgressEvent[] = [];

  emit(event: ProgressEvent): void {
    this.events.push(event);
  }

  types(): string[] {
    return this.events.map(event => event.type);
  }
}

/**
 * Interactive prompt answering from fixed queues. Running out of answers
 * is a test bug and throws.
 */
export class ScriptedPrompt implements PromptPort {
  readonly interactive = true;
  readonly asked: string[] = [];

  constructor(private confirms: boolean[] = [], private texts: string[] = []) {}

  async confirm(message: string): Promise<boolean> {
    this.asked.push(message);
    const answer = this.confirms.shift();
    if (answer === undefined) throw new Error(`Unexpected confirm: ${message}`);
    return answer;
  }

  async text(message: string, _options?: TextPromptOptions): Promise<string> {
    this.asked.push(message);
    const answer = this.texts.shift();
    if (answer === undefined) throw new Error(`Unexpected text prompt: ${message}`);
    return answer;
  }
}

export async function makeTempDir(prefix: string = 'riverspider-test-'): Promise<string> {
  return mkdtemp(path.join(tmpdir(), prefix));
}

export async function removeTempDir(dir: string): Promise<void> {
  await rm(dir, { recursive: true, force: true });
}

/** Create executable placeholder files so PATH lookups succeed */
export async function installFakeBinaries(binDir: string, names: readonly string[]): Promise<void> {
  await mkdir(binDir, { recursive: true });
  for (const name of names) {
    const file = path.join(binDir, name);
    await writeFile(file, '#!/bin/sh\nexit 0\n', 'utf8');
    await chmod(file, 0o755);
  }
}

export function cloneConfig(overrides: Partial<RiverSpiderConfig> = {}): RiverSpiderConfig {
  return {
    ...DEFAULT_CONFIG,
    profiles: { ...DEFAULT_CONFIG.profiles },
    archive: { ...DEFAULT_CONFIG.archive },
    runtime: { ...DEFAULT_CONFIG.runtime },
    packages: [...DEFAULT_CONFIG.packages],
    toolsToVerify: [...DEFAULT_CONFIG.toolsToVerify],
    checkDomains: [...DEFAULT_CONFIG.checkDomains],
    resolver: { ...DEFAULT_CONFIG.resolver },
    packageManager: { ...DEFAULT_CONFIG.packageManager },
    ...overrides
  };
}

export interface TestContext {
  ctx: SetupContext;
  home: string;
  binDir: string;
  exec: FakeExecutor;
  output: RecordingOutput;
  progress: RecordingProgress;
}

/**
 * A SetupContext rooted at a fresh temporary home directory, with an empty
 * bin directory as the whole PATH.
 */
export async function createTestContext(overrides: Partial<SetupContext> = {}): Promise<TestContext> {
  const home = await makeTempDir();
  const binDir = path.join(home, 'bin');
  await mkdir(binDir, { recursive: true });

  const exec = new FakeExecutor();
  const output = new RecordingOutput();
  const progress = new RecordingProgress();

  const ctx: SetupContext = {
    home,
    env: { HOME: home, PATH: binDir, SHELL: '/bin/zsh' },
    host: { platform: 'darwin', machine: 'arm64' },
    config: cloneConfig(),
    logFile: '/tmp/riverspider_setup_test.log',
    exec,
    output,
    prompt: nonInteractivePrompt,
    progress,
    warnings: [],
    ...overrides
  };

  return { ctx, home, binDir, exec, output, progress };
}
