/**
 * OutputPort on @clack/prompts for interactive terminal sessions.
 */

import { log, note, spinner } from '@clack/prompts';
import type { OutputPort, UnifiedSpinner } from '../core/ports/output.js';

/** clack spinners throw when stopped twice, so track whether one is running */
function clackTaskSpinner(): UnifiedSpinner {
  const s = spinner();
  let running = false;

  return {
    start(message: string) {
      if (running) return;
      s.start(message);
      running = true;
    },
    stop(finalMessage?: string) {
      if (!running) return;
      s.stop(finalMessage);
      running = false;
    },
    message(text: string) {
      if (running) s.message(text);
    }
  };
}

export function createClackOutput(): OutputPort {
  return {
    info: text => log.info(text),
    step: text => log.step(text),
    message: text => log.message(text),
    success: text => log.success(text),
    error: text => log.error(text),
    warn: text => log.warn(text),
    note: (content, title) => note(content, title),
    spinner: clackTaskSpinner
  };
}
