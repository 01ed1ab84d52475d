/**
 * CLI Context Factory
 *
 * Creates SetupContext instances with CLI-specific port implementations
 * (Clack output and prompts in a terminal, plain output elsewhere).
 * Command handlers use this instead of calling createSetupContext()
 * directly so the ports match the session.
 */

import type { RiverSpiderConfig, SetupContext, SetupOptions } from '../types/index.js';
import { createSetupContext } from '../core/setup-context.js';
import { createSpinnerProgress } from '../core/ports/progress.js';
import { nonInteractivePrompt } from '../core/ports/console-prompt.js';
import { createConsoleOutput } from '../core/ports/console-output.js';
import type { OutputPort } from '../core/ports/output.js';
import type { PromptPort } from '../core/ports/prompt.js';
import { createClackOutput } from './clack-output-adapter.js';
import { createClackPrompt } from './clack-prompt-adapter.js';

export interface CliContextOptions extends SetupOptions {
  config: RiverSpiderConfig;
  logFile: string;
}

/** Cached port singletons for the lifetime of the CLI process. */
let cachedClackOutput: OutputPort | undefined;
let cachedPlainOutput: OutputPort | undefined;
let cachedVerboseOutput: OutputPort | undefined;
let cachedClackPrompt: PromptPort | undefined;

function getCliPorts(isInteractive: boolean): { output: OutputPort; prompt: PromptPort } {
  if (isInteractive) {
    cachedClackOutput ??= createClackOutput();
    cachedClackPrompt ??= createClackPrompt();
    return { output: cachedClackOutput, prompt: cachedClackPrompt };
  }
  cachedPlainOutput ??= createConsoleOutput({ animate: process.stdout.isTTY === true });
  return { output: cachedPlainOutput, prompt: nonInteractivePrompt };
}

/** Interactive when stdin is a terminal and CI is not set. */
export function detectInteractive(override?: boolean, env: NodeJS.ProcessEnv = process.env): boolean {
  if (override !== undefined) return override;
  const isTTY = process.stdin.isTTY === true;
  return isTTY && env.CI !== 'true';
}

/** Output that drops informational lines; warnings and errors still show */
function quietOutput(base: OutputPort): OutputPort {
  const ignore = (): void => {};
  return { ...base, info: ignore, step: ignore, message: ignore, success: ignore };
}

/**
 * Create a SetupContext with CLI ports injected.
 *
 * With `verbose` the logger echoes debug lines to the console, so output
 * switches to plain, non-animated lines that interleave with them; prompts
 * stay interactive.
 */
export function createCliSetupContext(options: CliContextOptions): SetupContext {
  const ports = getCliPorts(detectInteractive(options.interactive));
  let output = ports.output;
  if (options.verbose) {
    cachedVerboseOutput ??= createConsoleOutput({ animate: false });
    output = cachedVerboseOutput;
  } else if (options.quiet) {
    output = quietOutput(ports.output);
  }

  return createSetupContext({
    config: options.config,
    logFile: options.logFile,
    output,
    prompt: ports.prompt,
    progress: createSpinnerProgress(output)
  });
}
