/**
 * Setup context factory and the reporting helpers every component uses.
 */

import { homedir, machine, tmpdir } from 'os';
import { join } from 'path';
import type { RiverSpiderConfig, SetupContext, HostInfo } from '../types/index.js';
import { LOG_FILE_PREFIX } from '../constants/index.js';
import type { CommandExecutor } from '../utils/exec.js';
import { nodeExecutor } from '../utils/exec.js';
import { logger } from '../utils/logger.js';
import type { OutputPort } from './ports/output.js';
import type { PromptPort } from './ports/prompt.js';
import type { ProgressPort } from './ports/progress.js';
import { consoleOutput } from './ports/console-output.js';
import { nonInteractivePrompt } from './ports/console-prompt.js';
import { silentProgress } from './ports/progress.js';

export interface CreateSetupContextOptions {
  config: RiverSpiderConfig;
  logFile: string;
  home?: string;
  env?: NodeJS.ProcessEnv;
  host?: HostInfo;
  exec?: CommandExecutor;
  output?: OutputPort;
  prompt?: PromptPort;
  progress?: ProgressPort;
}

export function detectHost(): HostInfo {
  return { platform: process.platform, machine: machine() };
}

export function createSetupContext(options: CreateSetupContextOptions): SetupContext {
  return {
    home: options.home ?? homedir(),
    env: options.env ?? process.env,
    host: options.host ?? detectHost(),
    config: options.config,
    logFile: options.logFile,
    exec: options.exec ?? nodeExecutor,
    output: options.output ?? consoleOutput,
    prompt: options.prompt ?? nonInteractivePrompt,
    progress: options.progress ?? silentProgress,
    warnings: []
  };
}

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/**
 * `<dir>/riverspider_setup_YYYYMMDD_HHMMSS.log` for the given start time.
 */
export function buildLogFilePath(startedAt: Date, dir: string = tmpdir()): string {
  const stamp =
    `${startedAt.getFullYear()}${pad(startedAt.getMonth() + 1)}${pad(startedAt.getDate())}` +
    `_${pad(startedAt.getHours())}${pad(startedAt.getMinutes())}${pad(startedAt.getSeconds())}`;
  return join(dir, `${LOG_FILE_PREFIX}${stamp}.log`);
}

/** Log and show an informational step */
export function reportInfo(ctx: SetupContext, message: string): void {
  logger.info(message);
  ctx.output.info(message);
}

export function reportSuccess(ctx: SetupContext, message: string): void {
  logger.info(`[SUCCESS] ${message}`);
  ctx.output.success(message);
}

/** Log, show and remember a recoverable problem */
export function reportWarning(ctx: SetupContext, message: string): void {
  logger.warn(message);
  ctx.output.warn(message);
  ctx.warnings.push(message);
}
