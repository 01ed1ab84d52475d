/**
 * Setup Context Types
 *
 * The single object threaded through every setup operation. It replaces
 * ambient globals: host facts, resolved configuration, the process runner
 * and the user-facing ports all travel here, so each component can be
 * exercised on its own with fakes.
 */

import type { CommandExecutor } from '../utils/exec.js';
import type { OutputPort } from '../core/ports/output.js';
import type { PromptPort } from '../core/ports/prompt.js';
import type { ProgressPort } from '../core/ports/progress.js';
import type { RiverSpiderConfig } from './index.js';

export interface HostInfo {
  /** process.platform of the running host */
  platform: NodeJS.Platform;
  /** Machine hardware name as `uname -m` prints it */
  machine: string;
}

export interface SetupContext {
  /** User's home directory; all searches and targets are rooted here */
  home: string;

  /**
   * Environment of this run. Mutated when the package manager or version
   * manager adjust PATH, so later steps see the new tools.
   */
  env: NodeJS.ProcessEnv;

  host: HostInfo;

  config: RiverSpiderConfig;

  /** Per-run log file every fatal message points at */
  logFile: string;

  /** Runs external commands (package manager, search, download, unzip) */
  exec: CommandExecutor;

  output: OutputPort;

  prompt: PromptPort;

  progress: ProgressPort;

  /** Recoverable problems collected over the run */
  warnings: string[];
}

/**
 * Options for creating a SetupContext
 */
export interface SetupOptions {
  /** --verbose flag: echo debug logging to the console */
  verbose?: boolean;

  /** --quiet flag: suppress everything but warnings and errors */
  quiet?: boolean;

  /** Override interactive mode detection (undefined = auto-detect from TTY) */
  interactive?: boolean;
}
