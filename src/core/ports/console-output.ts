/**
 * Plain console output for sessions without a terminal UI (piped output,
 * CI, `--quiet`). Lines keep the prefixes the log file readers expect;
 * warnings and errors go to stderr.
 */

import { Spinner } from '../../utils/spinner.js';
import type { OutputLineKind, OutputPort, UnifiedSpinner } from './output.js';

const PREFIX: Record<OutputLineKind, string> = {
  info: '==> ',
  step: '',
  message: '   ',
  success: '✓ ',
  error: 'Error: ',
  warn: 'Warning: '
};

const TO_STDERR = new Set<OutputLineKind>(['error', 'warn']);

function writeLine(kind: OutputLineKind, text: string): void {
  const line = `${PREFIX[kind]}${text}`;
  if (TO_STDERR.has(kind)) {
    console.error(line);
  } else {
    console.log(line);
  }
}

/**
 * Spinner on an ora instance; with `animate` off the task label is printed
 * once instead, which keeps logs of redirected runs readable.
 */
function taskSpinner(animate: boolean): UnifiedSpinner {
  let active: Spinner | null = null;
  let label = '';

  return {
    start(message: string) {
      label = message;
      if (animate) {
        active = new Spinner(message);
        active.start();
      } else {
        writeLine('info', `${message}...`);
      }
    },
    stop(finalMessage?: string) {
      active?.stop();
      active = null;
      if (finalMessage && finalMessage !== label) {
        writeLine('message', finalMessage);
      }
    },
    message(text: string) {
      label = text;
      active?.update(text);
    }
  };
}

export interface ConsoleOutputOptions {
  /** Animate task spinners (only useful on a terminal) */
  animate?: boolean;
}

export function createConsoleOutput(options: ConsoleOutputOptions = {}): OutputPort {
  const animate = options.animate ?? false;
  return {
    info: text => writeLine('info', text),
    step: text => writeLine('step', `\n${text}`),
    message: text => writeLine('message', text),
    success: text => writeLine('success', text),
    error: text => writeLine('error', text),
    warn: text => writeLine('warn', text),
    note(content: string, title?: string): void {
      console.log(title ? `\n${title}\n\n${content}\n` : `\n${content}\n`);
    },
    spinner: () => taskSpinner(animate)
  };
}

export const consoleOutput: OutputPort = createConsoleOutput();
