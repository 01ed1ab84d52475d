import type { PromptPort } from './prompt.js';

/**
 * Raised when a question reaches a session that cannot answer it. Callers
 * are expected to check `PromptPort.interactive` first, so seeing this
 * means a step forgot to.
 */
export class NonInteractivePromptError extends Error {
  constructor(question: string) {
    super(`Cannot ask "${question}" without a terminal. Run riverspider-setup from Terminal to answer it.`);
    this.name = 'NonInteractivePromptError';
  }
}

export const nonInteractivePrompt: PromptPort = {
  interactive: false,

  async confirm(message: string): Promise<boolean> {
    throw new NonInteractivePromptError(message);
  },

  async text(message: string): Promise<string> {
    throw new NonInteractivePromptError(message);
  }
};
