/**
 * Output Port
 *
 * Everything the setup run shows the user goes through here: step lines,
 * outcome lines, the closing notes and the spinner of the running task.
 * The log file is written separately by the logger, so an adapter is free
 * to drop lines (quiet mode) without losing the transcript.
 */

/** The spinner of the one background task that may run at a time */
export interface UnifiedSpinner {
  start(message: string): void;
  stop(finalMessage?: string): void;
  message(text: string): void;
}

export interface OutputPort {
  /** "Checking for Homebrew..." style progress line */
  info(message: string): void;

  /** Phase banner */
  step(message: string): void;

  /** Follow-up text under a warning or a prompt, no decoration */
  message(message: string): void;

  success(message: string): void;

  error(message: string): void;

  /** Recoverable problem; the run continues */
  warn(message: string): void;

  /** Multi-line block: manual instructions, completion summary */
  note(content: string, title?: string): void;

  spinner(): UnifiedSpinner;
}

export type OutputLineKind = Exclude<keyof OutputPort, 'note' | 'spinner'>;
