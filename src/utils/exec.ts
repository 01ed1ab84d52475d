import { execFile } from 'child_process';
import { delimiter, join } from 'path';
import { promisify } from 'util';

import { isExecutable } from './fs.js';

const execFileAsync = promisify(execFile);

export interface ExecOptions {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  timeoutMs?: number;
}

export interface ExecResult {
  /** Process exit status; 127 when the command could not be started */
  code: number;
  stdout: string;
  stderr: string;
}

/**
 * Runs external commands. Never rejects on a non-zero exit: the caller
 * decides what a failure means.
 */
export interface CommandExecutor {
  run(command: string, args: string[], options?: ExecOptions): Promise<ExecResult>;
}

interface ExecFailure {
  code?: number | string;
  stdout?: string;
  stderr?: string;
  message?: string;
}

function toExecFailure(error: unknown): ExecFailure {
  if (!error || typeof error !== 'object') {
    return { message: String(error) };
  }
  const failure: ExecFailure = {};
  if ('code' in error && (typeof error.code === 'number' || typeof error.code === 'string')) {
    failure.code = error.code;
  }
  if ('stdout' in error && typeof error.stdout === 'string') {
    failure.stdout = error.stdout;
  }
  if ('stderr' in error && typeof error.stderr === 'string') {
    failure.stderr = error.stderr;
  }
  if ('message' in error && typeof error.message === 'string') {
    failure.message = error.message;
  }
  return failure;
}

export const nodeExecutor: CommandExecutor = {
  async run(command: string, args: string[], options: ExecOptions = {}): Promise<ExecResult> {
    try {
      const { stdout, stderr } = await execFileAsync(command, args, {
        cwd: options.cwd,
        env: options.env,
        timeout: options.timeoutMs,
        maxBuffer: 64 * 1024 * 1024
      });
      return { code: 0, stdout, stderr };
    } catch (error) {
      const failure = toExecFailure(error);
      // execFile reports spawn failures with a string code (ENOENT, EACCES)
      const code = typeof failure.code === 'number' ? failure.code : 127;
      return {
        code,
        stdout: failure.stdout ?? '',
        stderr: failure.stderr || failure.message || ''
      };
    }
  }
};

/**
 * Resolve a command name to an executable on PATH, like `command -v`.
 * Names containing a slash are checked as paths.
 */
export async function resolveExecutable(name: string, env: NodeJS.ProcessEnv = process.env): Promise<string | null> {
  if (name.includes('/')) {
    return (await isExecutable(name)) ? name : null;
  }

  const dirs = (env.PATH ?? '').split(delimiter).filter(Boolean);
  for (const dir of dirs) {
    const candidate = join(dir, name);
    if (await isExecutable(candidate)) {
      return candidate;
    }
  }
  return null;
}
