/**
 * Progress-Wrapped Process Runner
 *
 * Runs one long-running step at a time, reports it through the progress
 * port (which shows the spinner) and classifies the outcome. Whether a
 * failure is fatal is decided by the caller through `critical`, never by
 * the task itself.
 */

import type { SetupContext } from '../../types/index.js';
import type { ExecOptions, ExecResult } from '../../utils/exec.js';
import { CriticalTaskError } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import { createProgressEvent } from '../ports/progress.js';
import { reportSuccess, reportWarning } from '../setup-context.js';
import { failureMessage, successMessage } from './task-labels.js';

export interface TaskSpec {
  /** Progressive-form label, e.g. "Installing 'fd'" */
  label: string;
  /** A failing critical task aborts the run */
  critical: boolean;
  /** Resolves with the command result; a rejection counts as exit status 1 */
  run: () => Promise<ExecResult | void>;
}

export interface TaskOutcome {
  ok: boolean;
  code: number;
  message: string;
  result?: ExecResult;
}

export interface CommandTaskSpec {
  label: string;
  critical: boolean;
  command: string;
  args: string[];
  options?: ExecOptions;
}

const busy = new WeakSet<SetupContext>();

function isExecResult(value: unknown): value is ExecResult {
  return (
    typeof value === 'object' && value !== null &&
    'code' in value && typeof value.code === 'number' &&
    'stdout' in value && typeof value.stdout === 'string' &&
    'stderr' in value && typeof value.stderr === 'string'
  );
}

function logCommandOutput(label: string, result: ExecResult): void {
  const stdout = result.stdout.trim();
  const stderr = result.stderr.trim();
  if (stdout) {
    logger.debug(`[${label}] stdout:\n${stdout}`);
  }
  if (stderr) {
    logger.debug(`[${label}] stderr:\n${stderr}`);
  }
}

/**
 * Run a task and wait for it.
 *
 * Success is reported as "Successfully <past tense label>". Failure of a
 * critical task throws CriticalTaskError; failure of any other task is
 * recorded as a warning and returned with `ok: false`.
 */
export async function runTask(ctx: SetupContext, spec: TaskSpec): Promise<TaskOutcome> {
  if (busy.has(ctx)) {
    throw new Error(`Cannot start '${spec.label}' while another task is still running`);
  }

  busy.add(ctx);
  logger.debug(`Starting task: ${spec.label}${spec.critical ? ' (critical)' : ''}`);
  ctx.progress.emit(createProgressEvent({ type: 'task:start', label: spec.label, critical: spec.critical }));

  let code = 0;
  let result: ExecResult | undefined;
  try {
    const returned: unknown = await spec.run();
    if (isExecResult(returned)) {
      result = returned;
      code = returned.code;
      logCommandOutput(spec.label, returned);
    }
  } catch (error) {
    code = 1;
    logger.debug(`Task '${spec.label}' threw`, error);
  } finally {
    busy.delete(ctx);
  }

  const ok = code === 0;
  const message = ok ? successMessage(spec.label) : failureMessage(spec.label, ctx.logFile);
  logger.debug(`Task '${spec.label}' finished with exit status ${code}.`);
  ctx.progress.emit(createProgressEvent({ type: 'task:complete', label: spec.label, success: ok, message }));

  if (ok) {
    reportSuccess(ctx, message);
    return { ok, code, message, result };
  }

  if (spec.critical) {
    throw new CriticalTaskError(message, { label: spec.label, code });
  }

  reportWarning(ctx, message);
  return { ok, code, message, result };
}

/**
 * Run an external command as a task, with the run's environment.
 */
export async function runCommandTask(ctx: SetupContext, spec: CommandTaskSpec): Promise<TaskOutcome> {
  return runTask(ctx, {
    label: spec.label,
    critical: spec.critical,
    run: () => ctx.exec.run(spec.command, spec.args, { env: ctx.env, ...spec.options })
  });
}
